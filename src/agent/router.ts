import type { ToolInvocation } from "../protocol/messages.js";

export type RouteSource = "heuristic" | "llm";

export interface ToolCall extends ToolInvocation {
  readonly source: RouteSource;
}

/** Maps a natural-language prompt to one tool call, or throws `RoutingError`. */
export interface ToolRouter {
  route(prompt: string): Promise<ToolCall>;
}
