import type { ToolInvocation } from "../protocol/messages.js";

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function textField(record: Record<string, unknown>, key: string, fallback: string) {
  const value = record[key];
  return typeof value === "string" || typeof value === "number"
    ? String(value)
    : fallback;
}

/** Turns a tool result into the sentence shown to the user. */
export function renderResult(
  call: ToolInvocation,
  result: Record<string, unknown>,
): string {
  const data = asRecord(result.data);
  switch (call.tool) {
    case "get_price": {
      const symbol = textField(data, "symbol", "UNKNOWN");
      const price = textField(data, "price", "?");
      const source = textField(data, "source", "unknown");
      return `The current price of ${symbol} is $${price} (${source}).`;
    }
    case "compare":
      return textField(data, "summary", "Comparison data unavailable.");
    default:
      return "Received an unexpected tool response.";
  }
}
