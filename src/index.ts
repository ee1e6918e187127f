#!/usr/bin/env node
import "dotenv/config";

import readline from "node:readline";

import { withToolClient } from "./client/toolClient.js";
import { clientOptions, createRouter } from "./cli/bootstrap.js";
import { runSession } from "./cli/session.js";
import { loadConfig } from "./config/env.js";
import { createLogger } from "./logging/logger.js";

async function* promptLines(rl: readline.Interface): AsyncGenerator<string> {
  rl.prompt();
  for await (const line of rl) {
    yield line;
    rl.prompt();
  }
}

async function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, component: "client" });
  const router = createRouter(config, logger);

  console.log("Type 'exit' or 'quit' to leave the session.");

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "What is your query? → ",
  });

  try {
    await withToolClient(clientOptions(config, logger), (client) =>
      runSession({ client, router, logger, prompts: promptLines(rl) }),
    );
  } finally {
    rl.close();
  }
  console.log("Goodbye.");
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
