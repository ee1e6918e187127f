/**
 * Server side of the stdio protocol. Reads one request per line, answers
 * each with exactly one response line, and stops on a shutdown request or
 * when the input ends.
 */
import { UnknownToolError, getErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import {
  READY_MESSAGE,
  TOOL_ARGUMENT_SCHEMAS,
  UNKNOWN_REQUEST_ID,
  bareShutdownSchema,
  errorResponse,
  isToolName,
  requestEnvelopeSchema,
  successResponse,
  type OutgoingResponse,
  type RequestEnvelope,
  type ToolName,
} from "../protocol/messages.js";
import type { Transport } from "../protocol/transport.js";
import {
  toWireComparison,
  toWireQuote,
  type DataResolver,
} from "../tools/stockData.js";

export type WorkerState =
  | "starting"
  | "ready"
  | "processing"
  | "shutting_down"
  | "terminated";

export class ToolWorker {
  private currentState: WorkerState = "starting";

  constructor(
    private readonly resolver: DataResolver,
    private readonly logger: Logger,
  ) {}

  get state(): WorkerState {
    return this.currentState;
  }

  async run(transport: Transport): Promise<void> {
    this.logger.log("info", "Worker starting; sending readiness signal");
    await transport.send(READY_MESSAGE);
    this.currentState = "ready";

    while (this.currentState === "ready") {
      const line = await transport.receive();
      if (line === null) {
        this.logger.log("info", "Input closed; stopping");
        break;
      }
      if (!line.trim()) continue;

      this.currentState = "processing";
      const { response, shutdown } = await this.handleLine(line);
      await transport.send(response);
      this.currentState = shutdown ? "shutting_down" : "ready";
    }

    this.currentState = "terminated";
  }

  private async handleLine(
    line: string,
  ): Promise<{ response: OutgoingResponse; shutdown: boolean }> {
    let payload: unknown;
    try {
      payload = JSON.parse(line);
    } catch {
      this.logger.log("warn", "Rejecting payload: invalid JSON");
      return {
        response: errorResponse(UNKNOWN_REQUEST_ID, "Invalid JSON payload."),
        shutdown: false,
      };
    }

    const envelope = requestEnvelopeSchema.safeParse(payload);
    if (!envelope.success && bareShutdownSchema.safeParse(payload).success) {
      this.logger.log("info", "Shutdown requested by client without an id");
      return {
        response: successResponse(UNKNOWN_REQUEST_ID, { status: "shutting_down" }),
        shutdown: true,
      };
    }
    if (!envelope.success) {
      const details = envelope.error.issues
        .map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
        .join("; ");
      this.logger.log("warn", "Rejecting payload: invalid request", { details });
      return {
        response: errorResponse(UNKNOWN_REQUEST_ID, `Invalid request: ${details}`),
        shutdown: false,
      };
    }

    const request = envelope.data;
    switch (request.type) {
      case "shutdown":
        this.logger.log("info", `Shutdown requested by client (id=${request.id})`);
        return {
          response: successResponse(request.id, { status: "shutting_down" }),
          shutdown: true,
        };
      case "invoke":
        return { response: await this.invoke(request), shutdown: false };
      default:
        this.logger.log("warn", `Unsupported message type '${request.type}'`, {
          id: request.id,
        });
        return {
          response: errorResponse(
            request.id,
            `Unsupported message type '${request.type}'.`,
          ),
          shutdown: false,
        };
    }
  }

  private async invoke(request: RequestEnvelope): Promise<OutgoingResponse> {
    const args = request.arguments ?? {};
    this.logger.log("info", `Executing tool '${request.tool}'`, {
      id: request.id,
      arguments: args,
    });

    try {
      if (!isToolName(request.tool)) {
        throw new UnknownToolError(request.tool);
      }
      const data = await this.dispatch(request.tool, args);
      this.logger.log("info", `Tool '${request.tool}' completed`, {
        id: request.id,
      });
      return successResponse(request.id, { data });
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.log("warn", `Request ${request.id} failed`, { error: message });
      return errorResponse(request.id, message);
    }
  }

  private async dispatch(
    tool: ToolName,
    rawArguments: Record<string, unknown>,
  ): Promise<unknown> {
    switch (tool) {
      case "get_price": {
        const { symbol } = TOOL_ARGUMENT_SCHEMAS.get_price.parse({
          symbol: stringArgument(rawArguments, "symbol"),
        });
        return toWireQuote(await this.resolver.getPrice(symbol));
      }
      case "compare": {
        const { symbol_a, symbol_b } = TOOL_ARGUMENT_SCHEMAS.compare.parse({
          symbol_a: stringArgument(rawArguments, "symbol_a"),
          symbol_b: stringArgument(rawArguments, "symbol_b"),
        });
        return toWireComparison(await this.resolver.compare(symbol_a, symbol_b));
      }
      default: {
        const unreachable: never = tool;
        throw new UnknownToolError(unreachable);
      }
    }
  }
}

/** Missing arguments read as empty strings; other scalars are stringified. */
function stringArgument(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}
