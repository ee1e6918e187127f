/**
 * The prompt loop shared by the REPL and the one-shot script. A failure to
 * route or invoke is reported as one warning and the loop moves on.
 */
import type { ToolRouter } from "../agent/router.js";
import type { ToolClient } from "../client/toolClient.js";
import { getErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { renderResult } from "./render.js";

const EXIT_COMMANDS = new Set(["exit", "quit"]);

export interface SessionOptions {
  readonly client: Pick<ToolClient, "invoke">;
  readonly router: ToolRouter;
  readonly logger: Logger;
  readonly prompts: AsyncIterable<string> | Iterable<string>;
  readonly write?: (line: string) => void;
}

/** Returns the number of prompts answered successfully. */
export async function runSession(options: SessionOptions): Promise<number> {
  const { client, router, logger, prompts } = options;
  const write = options.write ?? ((line: string) => console.log(line));
  let answered = 0;

  for await (const raw of prompts) {
    const prompt = raw.trim();
    if (EXIT_COMMANDS.has(prompt.toLowerCase())) {
      break;
    }
    if (!prompt) continue;

    logger.log("debug", "User input", { prompt });

    const call = await router.route(prompt).then(
      (routed) => {
        logger.log("debug", "Routed tool call", {
          tool: routed.tool,
          arguments: routed.arguments,
          source: routed.source,
        });
        return routed;
      },
      (error: unknown) => {
        logger.log("warn", getErrorMessage(error));
        return undefined;
      },
    );
    if (!call) continue;

    try {
      const result = await client.invoke(call);
      write(renderResult(call, result));
      answered += 1;
    } catch (error) {
      logger.log("warn", getErrorMessage(error));
    }
  }

  return answered;
}
