import readline from "node:readline";
import type { Readable, Writable } from "node:stream";

import { encodeLine } from "./messages.js";

/**
 * One reader and one writer over a pair of byte streams carrying
 * newline-delimited JSON.
 */
export interface Transport {
  send(message: unknown): Promise<void>;
  /** Next line without its terminator, or `null` once the input has ended. */
  receive(): Promise<string | null>;
  close(): void;
}

export class LineTransport implements Transport {
  private readonly lines: string[] = [];
  private readonly waiters: Array<(line: string | null) => void> = [];
  private readonly reader: readline.Interface;
  private ended = false;
  private writeError: Error | undefined;

  constructor(
    input: Readable,
    private readonly output: Writable,
  ) {
    this.reader = readline.createInterface({ input, crlfDelay: Infinity });
    this.reader.on("line", (line) => {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.lines.push(line);
      }
    });
    this.reader.once("close", () => this.finish());
    input.once("error", () => this.finish());
    output.on("error", (error) => {
      this.writeError = error;
    });
  }

  get closed(): boolean {
    return this.ended;
  }

  send(message: unknown): Promise<void> {
    const line = encodeLine(message);
    return new Promise<void>((resolve, reject) => {
      if (this.writeError) {
        reject(this.writeError);
        return;
      }
      if (this.output.destroyed || this.output.writableEnded) {
        reject(new Error("Output stream is closed"));
        return;
      }
      this.output.write(line, "utf-8", (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  receive(): Promise<string | null> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Ends the write side; lines already received stay readable. */
  endOutput(): void {
    if (!this.output.destroyed && !this.output.writableEnded) {
      this.output.end();
    }
  }

  close(): void {
    this.endOutput();
    this.reader.close();
    this.finish();
  }

  private finish(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }
}
