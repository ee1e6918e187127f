/**
 * Utility helpers for working with OpenRouter responses and tool arguments.
 */
import { RoutingError } from "../errors.js";

export function normaliseContent(content: unknown): string {
  if (typeof content === "string") {
    return content;
  }
  if (!content) {
    return "";
  }
  if (Array.isArray(content)) {
    return content
      .map((chunk: unknown) => {
        if (typeof chunk === "string") {
          return chunk;
        }
        return textOf(chunk);
      })
      .filter(Boolean)
      .join("");
  }
  return textOf(content) || String(content);
}

function textOf(value: unknown): string {
  if (value && typeof value === "object" && "text" in value) {
    return String(value.text ?? "");
  }
  return "";
}

export function safeJsonParse(value: string | undefined): unknown {
  if (!value) {
    return {};
  }
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new RoutingError(`Failed to parse tool arguments: ${value}`, {
      cause: error,
    });
  }
}
