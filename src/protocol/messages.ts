/**
 * Wire messages exchanged between the client and the worker. Every message is
 * a single JSON object on its own line; the zod schemas below are the only
 * place either side decodes a line.
 */
import { z } from "zod";

import { PROTOCOL_VERSION } from "../config/constants.js";

export const TOOL_NAMES = ["get_price", "compare"] as const;

export const toolNameSchema = z.enum(TOOL_NAMES);

export type ToolName = z.infer<typeof toolNameSchema>;

export const getPriceArgumentsSchema = z.object({
  symbol: z.string().describe("Ticker symbol, e.g. AAPL"),
});

export const compareArgumentsSchema = z.object({
  symbol_a: z.string().describe("First ticker symbol"),
  symbol_b: z.string().describe("Second ticker symbol"),
});

export const TOOL_ARGUMENT_SCHEMAS = {
  get_price: getPriceArgumentsSchema,
  compare: compareArgumentsSchema,
} satisfies Record<ToolName, z.ZodTypeAny>;

export type ToolArguments<T extends ToolName> = z.infer<
  (typeof TOOL_ARGUMENT_SCHEMAS)[T]
>;

export function isToolName(value: unknown): value is ToolName {
  return toolNameSchema.safeParse(value).success;
}

export const readyMessageSchema = z.object({
  type: z.literal("ready"),
  version: z.string(),
});

export type ReadyMessage = z.infer<typeof readyMessageSchema>;

export const READY_MESSAGE: ReadyMessage = {
  type: "ready",
  version: PROTOCOL_VERSION,
};

/**
 * Envelope check only. The tool name stays a plain string here so that an
 * unknown tool is reported against the request id instead of as a malformed
 * line.
 */
export const requestEnvelopeSchema = z.object({
  type: z.string(),
  id: z.string(),
  tool: z.string().optional(),
  arguments: z.record(z.unknown()).optional().nullable(),
});

export type RequestEnvelope = z.infer<typeof requestEnvelopeSchema>;

/** A shutdown that fails the envelope check (no id) still stops the worker. */
export const bareShutdownSchema = z.object({ type: z.literal("shutdown") });

export interface ToolInvocation {
  readonly tool: ToolName;
  readonly arguments: Record<string, string>;
}

export interface InvokeRequest {
  readonly type: "invoke";
  readonly id: string;
  readonly tool: ToolName;
  readonly arguments: Record<string, string>;
}

export interface ShutdownRequest {
  readonly type: "shutdown";
  readonly id: string;
}

export const responseSchema = z.object({
  type: z.literal("response").optional(),
  id: z.string().nullable(),
  result: z.record(z.unknown()).optional().nullable(),
  error: z.string().optional().nullable(),
});

export interface SuccessResponse {
  readonly type: "response";
  readonly id: string;
  readonly result: Record<string, unknown>;
}

export interface ErrorResponse {
  readonly type: "response";
  readonly id: string;
  readonly error: string;
}

export type OutgoingResponse = SuccessResponse | ErrorResponse;

export const UNKNOWN_REQUEST_ID = "unknown";

export function successResponse(
  id: string,
  result: Record<string, unknown>,
): SuccessResponse {
  return { type: "response", id, result };
}

export function errorResponse(id: string, error: string): ErrorResponse {
  return { type: "response", id, error };
}

export function encodeLine(message: unknown): string {
  return `${JSON.stringify(message)}\n`;
}
