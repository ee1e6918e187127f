/**
 * Error taxonomy shared by the worker, the client and the routers.
 */
export class ToolkitError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends ToolkitError {}

/** The worker never produced a valid readiness line. */
export class HandshakeError extends ToolkitError {}

export class NotRunningError extends ToolkitError {
  constructor(message = "Worker process is not running.") {
    super(message);
  }
}

/** A response line was empty, missing or could not be decoded. */
export class ProtocolError extends ToolkitError {}

export class CorrelationError extends ProtocolError {
  constructor(
    readonly expectedId: string,
    readonly receivedId: unknown,
  ) {
    super(
      `Worker response did not match the request id (expected ${expectedId}, received ${String(receivedId)}).`,
    );
  }
}

/** The worker reported a failure for a well-formed request. */
export class RemoteError extends ToolkitError {
  constructor(readonly remoteMessage: string) {
    super(remoteMessage);
  }
}

export class NotFoundError extends ToolkitError {}

export class UnknownToolError extends ToolkitError {
  constructor(readonly toolName: unknown) {
    super(`Unknown tool '${String(toolName)}'.`);
  }
}

export class RoutingError extends ToolkitError {}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
