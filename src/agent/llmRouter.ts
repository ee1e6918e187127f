/**
 * Routes prompts through an OpenRouter chat completion with the two tools
 * advertised. Any failure along the way hands the prompt to the fallback
 * router instead of surfacing.
 */
import {
  OPENROUTER_BASE_URL,
  ROUTER_REQUEST_TIMEOUT_MS,
} from "../config/constants.js";
import { RoutingError, getErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { TOOL_ARGUMENT_SCHEMAS, isToolName } from "../protocol/messages.js";
import {
  openRouterResponseSchema,
  type ChatMessage,
  type OpenRouterResponsePayload,
} from "./chatTypes.js";
import { normaliseContent, safeJsonParse } from "./openRouterUtils.js";
import type { ToolCall, ToolRouter } from "./router.js";
import { systemPrompt } from "./systemPrompt.js";
import { toolDefinitions } from "./tooling.js";

export interface LlmRouterOptions {
  readonly apiKey: string;
  readonly model: string;
  readonly fallback: ToolRouter;
  readonly logger: Logger;
  readonly baseUrl?: string;
  readonly fetchImpl?: typeof fetch;
}

export class LlmRouter implements ToolRouter {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: LlmRouterOptions) {
    this.baseUrl = options.baseUrl ?? OPENROUTER_BASE_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async route(prompt: string): Promise<ToolCall> {
    const cleaned = prompt.trim();
    if (!cleaned) {
      throw new RoutingError("Query cannot be empty.");
    }

    try {
      const call = await this.routeWithModel(cleaned);
      this.options.logger.log("debug", `Model routed to ${call.tool}`, {
        arguments: call.arguments,
      });
      return call;
    } catch (error) {
      this.options.logger.log("debug", "Model routing failed; using heuristics", {
        error: getErrorMessage(error),
      });
      return this.options.fallback.route(cleaned);
    }
  }

  private async routeWithModel(prompt: string): Promise<ToolCall> {
    const messages: ChatMessage[] = [
      { role: "system", content: systemPrompt },
      { role: "user", content: prompt },
    ];
    const response = await this.requestCompletion(messages);
    const message = response.choices[0]?.message;
    if (!message) {
      throw new RoutingError("No choices returned from OpenRouter.");
    }

    for (const call of message.tool_calls ?? []) {
      const name = call.function.name;
      if (!isToolName(name)) continue;

      const args = safeJsonParse(call.function.arguments);
      if (name === "get_price") {
        const { symbol } = TOOL_ARGUMENT_SCHEMAS.get_price.parse(args);
        return { tool: name, arguments: { symbol }, source: "llm" };
      }
      const { symbol_a, symbol_b } = TOOL_ARGUMENT_SCHEMAS.compare.parse(args);
      return { tool: name, arguments: { symbol_a, symbol_b }, source: "llm" };
    }

    const text = normaliseContent(message.content);
    throw new RoutingError(
      `OpenRouter did not return a usable tool call${text ? `: ${text}` : "."}`,
    );
  }

  private async requestCompletion(
    messages: ChatMessage[],
  ): Promise<OpenRouterResponsePayload> {
    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.options.apiKey}`,
      },
      body: JSON.stringify({
        model: this.options.model,
        messages,
        tools: toolDefinitions,
        tool_choice: "auto",
      }),
      signal: AbortSignal.timeout(ROUTER_REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(
        `OpenRouter request failed (${response.status} ${response.statusText}): ${text}`,
      );
    }

    return openRouterResponseSchema.parse(await response.json());
  }
}
