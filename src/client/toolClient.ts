/**
 * Client half of the stdio protocol: owns exactly one worker process, performs
 * the readiness handshake, and issues one correlated request at a time.
 */
import { spawn } from "node:child_process";
import { randomUUID } from "node:crypto";
import type { Readable, Writable } from "node:stream";

import { SHUTDOWN_GRACE_MS } from "../config/constants.js";
import { projectRoot, runningFromSources, workerEntryPath } from "../config/paths.js";
import {
  CorrelationError,
  HandshakeError,
  NotRunningError,
  ProtocolError,
  RemoteError,
  getErrorMessage,
} from "../errors.js";
import type { Logger } from "../logging/logger.js";
import {
  readyMessageSchema,
  responseSchema,
  type InvokeRequest,
  type ShutdownRequest,
  type ToolInvocation,
} from "../protocol/messages.js";
import { LineTransport } from "../protocol/transport.js";

/** The subset of `ChildProcess` the client relies on. */
export interface WorkerProcess {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(
    event: "exit",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): unknown;
  once(event: "error", listener: (error: Error) => void): unknown;
}

export type SpawnWorker = () => WorkerProcess;

export interface WorkerCommand {
  readonly command: string;
  readonly args: ReadonlyArray<string>;
  readonly cwd?: string;
  /** Variables layered over the parent's environment. */
  readonly env?: Readonly<Record<string, string>>;
}

export interface ToolClientOptions {
  readonly logger: Logger;
  readonly shutdownGraceMs?: number;
  /** Overrides how the worker is launched; defaults to {@link defaultWorkerCommand}. */
  readonly command?: WorkerCommand;
  /** Replaces process spawning entirely, e.g. with an in-process worker. */
  readonly spawnWorker?: SpawnWorker;
}

export function defaultWorkerCommand(): WorkerCommand {
  return {
    command: process.execPath,
    args: runningFromSources
      ? ["--import", "tsx", workerEntryPath]
      : [workerEntryPath],
    cwd: projectRoot,
  };
}

export function spawnCommand(command: WorkerCommand): SpawnWorker {
  return () =>
    spawn(command.command, [...command.args], {
      cwd: command.cwd,
      env: { ...process.env, ...command.env },
      stdio: ["pipe", "pipe", "inherit"],
    });
}

interface RunningWorker {
  readonly process: WorkerProcess;
  readonly transport: LineTransport;
  /** Settles once the process has exited (or failed to spawn). */
  readonly exited: Promise<void>;
  spawnError: Error | undefined;
}

export class ToolClient {
  private readonly logger: Logger;
  private readonly shutdownGraceMs: number;
  private readonly spawnWorker: SpawnWorker;
  private worker: RunningWorker | null = null;
  private starting: Promise<void> | null = null;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(options: ToolClientOptions) {
    this.logger = options.logger;
    this.shutdownGraceMs = options.shutdownGraceMs ?? SHUTDOWN_GRACE_MS;
    this.spawnWorker =
      options.spawnWorker ?? spawnCommand(options.command ?? defaultWorkerCommand());
  }

  get running(): boolean {
    return this.worker !== null;
  }

  /** Concurrent callers share one in-flight start, so one worker is spawned. */
  start(): Promise<void> {
    if (this.worker) return Promise.resolve();
    if (!this.starting) {
      this.starting = this.launch().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async launch(): Promise<void> {
    this.logger.log("debug", "Starting worker process");
    const child = this.spawnWorker();
    const { stdin, stdout } = child;
    if (!stdin || !stdout) {
      child.kill("SIGKILL");
      throw new HandshakeError("Worker stdio pipes are not available.");
    }

    const running: RunningWorker = {
      process: child,
      transport: new LineTransport(stdout, stdin),
      exited: new Promise<void>((resolve) => {
        if (child.exitCode !== null || child.signalCode !== null) {
          resolve();
          return;
        }
        child.once("exit", () => resolve());
        child.once("error", (error) => {
          running.spawnError = error;
          resolve();
        });
      }),
      spawnError: undefined,
    };

    const line = await running.transport.receive();
    this.logger.log("debug", "Handshake line received", { line });

    const failure = this.checkHandshake(line, running.spawnError);
    if (failure) {
      await this.teardown(running, false);
      throw failure;
    }

    this.worker = running;
    this.logger.log("info", "Worker ready");
  }

  /**
   * Sends one request and waits for its response. Calls are serialised so at
   * most one request is ever outstanding.
   */
  invoke(call: ToolInvocation): Promise<Record<string, unknown>> {
    const result = this.pending.then(() => this.invokeNow(call));
    // Failures reach the caller through `result`; the chain only orders calls.
    this.pending = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  async shutdown(): Promise<void> {
    if (this.starting) {
      // A failed start has already torn its worker down.
      await this.starting.then(
        () => undefined,
        (error: unknown) =>
          this.logger.log("debug", "Start failed before shutdown", {
            error: getErrorMessage(error),
          }),
      );
    }
    const running = this.worker;
    if (!running) return;
    this.worker = null;
    await this.teardown(running, true);
  }

  private async invokeNow(call: ToolInvocation): Promise<Record<string, unknown>> {
    const running = this.worker;
    if (!running) {
      throw new NotRunningError();
    }

    const request: InvokeRequest = {
      type: "invoke",
      id: randomUUID(),
      tool: call.tool,
      arguments: call.arguments,
    };
    this.logger.log("debug", "Sending request", { request });

    try {
      await running.transport.send(request);
    } catch (error) {
      throw new ProtocolError(
        `Failed to send request to worker: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }

    const line = await running.transport.receive();
    this.logger.log("debug", "Raw response line", { line });
    if (line === null) {
      throw new ProtocolError("Worker closed its output before responding.");
    }
    if (!line.trim()) {
      throw new ProtocolError("Worker returned an empty response.");
    }

    let payload: unknown;
    try {
      payload = JSON.parse(line);
    } catch (error) {
      throw new ProtocolError(`Worker returned malformed JSON: ${line}`, {
        cause: error,
      });
    }

    const parsed = responseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProtocolError(`Worker response has an unexpected shape: ${line}`, {
        cause: parsed.error,
      });
    }

    const response = parsed.data;
    if (response.id !== request.id) {
      throw new CorrelationError(request.id, response.id);
    }
    if (response.error !== undefined && response.error !== null) {
      throw new RemoteError(response.error);
    }
    if (response.result === undefined || response.result === null) {
      throw new ProtocolError(`Worker response carries neither result nor error: ${line}`);
    }
    return response.result;
  }

  private checkHandshake(
    line: string | null,
    spawnError: Error | undefined,
  ): HandshakeError | undefined {
    if (line === null) {
      return spawnError
        ? new HandshakeError(`Failed to start worker: ${spawnError.message}`, {
            cause: spawnError,
          })
        : new HandshakeError("Worker exited before sending a readiness signal.");
    }

    let payload: unknown;
    try {
      payload = JSON.parse(line);
    } catch (error) {
      return new HandshakeError(`Failed to start worker. Output: ${line}`, {
        cause: error,
      });
    }

    if (!readyMessageSchema.safeParse(payload).success) {
      return new HandshakeError(`Unexpected worker handshake: ${line}`);
    }
    return undefined;
  }

  private async teardown(running: RunningWorker, requestShutdown: boolean) {
    const { process: child, transport } = running;

    if (requestShutdown) {
      const request: ShutdownRequest = { type: "shutdown", id: randomUUID() };
      this.logger.log("debug", "Sending shutdown request", { request });
      try {
        await transport.send(request);
      } catch (error) {
        this.logger.log("debug", "Shutdown request could not be delivered", {
          error: getErrorMessage(error),
        });
      }
    }
    transport.endOutput();

    const exitedInTime = await waitForExit(running.exited, this.shutdownGraceMs);
    if (!exitedInTime) {
      this.logger.log("warn", "Worker did not exit in time; killing process", {
        graceMs: this.shutdownGraceMs,
      });
      child.kill("SIGKILL");
      await running.exited;
    }

    transport.close();
    child.stdout?.destroy();
    child.stdin?.destroy();
    this.logger.log("debug", "Worker stopped");
  }
}

function waitForExit(exited: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  return Promise.race([exited.then(() => true), timeout]).finally(() =>
    clearTimeout(timer),
  );
}

/**
 * Runs `fn` against a started client and always shuts the worker down
 * afterwards, whether `fn` returns or throws.
 */
export async function withToolClient<T>(
  options: ToolClientOptions,
  fn: (client: ToolClient) => Promise<T>,
): Promise<T> {
  const client = new ToolClient(options);
  try {
    await client.start();
    return await fn(client);
  } finally {
    await client.shutdown();
  }
}
