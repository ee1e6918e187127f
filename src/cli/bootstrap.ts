import { HeuristicRouter } from "../agent/heuristicRouter.js";
import { LlmRouter } from "../agent/llmRouter.js";
import type { ToolRouter } from "../agent/router.js";
import type { ToolClientOptions } from "../client/toolClient.js";
import type { AppConfig } from "../config/env.js";
import type { Logger } from "../logging/logger.js";

export function createRouter(config: AppConfig, logger: Logger): ToolRouter {
  const heuristic = new HeuristicRouter(logger);
  if (!config.openRouterApiKey) {
    logger.log("info", "OpenRouter API key not found. Falling back to keyword routing.");
    return heuristic;
  }
  logger.log("info", "OpenRouter routing is enabled.", {
    model: config.openRouterModel,
  });
  return new LlmRouter({
    apiKey: config.openRouterApiKey,
    model: config.openRouterModel,
    fallback: heuristic,
    logger,
  });
}

export function clientOptions(config: AppConfig, logger: Logger): ToolClientOptions {
  return { logger, shutdownGraceMs: config.shutdownGraceMs };
}
