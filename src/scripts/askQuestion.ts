import "dotenv/config";

import readline from "node:readline";

import { withToolClient } from "../client/toolClient.js";
import { clientOptions, createRouter } from "../cli/bootstrap.js";
import { runSession } from "../cli/session.js";
import { loadConfig } from "../config/env.js";
import { createLogger } from "../logging/logger.js";

async function readPrompt(): Promise<string> {
  const [, , ...rest] = process.argv;
  if (rest.length > 0) {
    return rest.join(" ");
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const question = await new Promise<string>((resolve) => {
    rl.question("Enter your stock question: ", (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });

  if (!question) {
    throw new Error("A prompt is required to query the stock tools.");
  }
  return question;
}

async function run() {
  const prompt = await readPrompt();
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, component: "client" });
  const router = createRouter(config, logger);

  const answered = await withToolClient(clientOptions(config, logger), (client) =>
    runSession({ client, router, logger, prompts: [prompt] }),
  );
  if (answered === 0) {
    process.exitCode = 1;
  }
}

run().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
