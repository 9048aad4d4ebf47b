import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { RemoteError, TransportError } from "./api/errors.js";

/**
 * Destination for diagnostic lines: HTTP traffic, expansion timings, swallowed per-child failures.
 */
export interface DiagnosticSink {
  log(message: string): void;
  logError(context: string, error: unknown): void;
}

/** Discards everything. Default for library calls made without a log. */
export const silentLog: DiagnosticSink = {
  log: () => {},
  logError: () => {},
};

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * "2026-01-15 17:19:20" for log lines, "20260115_171920" for file names.
 */
export function formatTimestamp(date: Date, style: "line" | "file" = "line"): string {
  const day = `${date.getFullYear()}${style === "line" ? "-" : ""}${pad(date.getMonth() + 1)}${style === "line" ? "-" : ""}${pad(date.getDate())}`;
  const time = [pad(date.getHours()), pad(date.getMinutes()), pad(date.getSeconds())].join(style === "line" ? ":" : "");
  return style === "line" ? `${day} ${time}` : `${day}_${time}`;
}

/**
 * Render an error with everything worth keeping in a log file.
 */
export function describeError(context: string, error: unknown): string {
  const lines = [`ERROR in ${context}`];
  if (error instanceof Error) {
    lines.push(`  ${error.name}: ${error.message}`);
    if (error instanceof RemoteError) {
      lines.push(`  status=${error.status} endpoint=${error.endpoint}`);
      if (error.body) lines.push(`  body: ${error.body}`);
    } else if (error instanceof TransportError) {
      lines.push(`  endpoint=${error.endpoint}`);
    }
    if (error.stack) {
      lines.push(...error.stack.split("\n").slice(1).map((l) => `  ${l.trim()}`));
    }
  } else {
    lines.push(`  ${String(error)}`);
  }
  return lines.join("\n");
}

export interface DiagnosticLogOptions {
  /** Directory the log file is created in. */
  dir: string;
  /** Mirror each line elsewhere (verbose console output). */
  echo?: (line: string) => void;
  now?: () => Date;
}

/**
 * Append-only log file kept for the lifetime of the process.
 * Writes are queued so lines land in call order; flush() waits for them.
 */
export class DiagnosticLog implements DiagnosticSink {
  readonly path: string;
  private readonly dir: string;
  private readonly echo?: (line: string) => void;
  private readonly now: () => Date;
  private pending: Promise<void> = Promise.resolve();
  private failure: unknown = null;
  private dirReady = false;

  constructor(options: DiagnosticLogOptions) {
    this.dir = options.dir;
    this.echo = options.echo;
    this.now = options.now ?? (() => new Date());
    this.path = join(this.dir, `explorer_${formatTimestamp(this.now(), "file")}.log`);
  }

  log(message: string): void {
    this.enqueue(`[${formatTimestamp(this.now())}] ${message}`);
  }

  logError(context: string, error: unknown): void {
    this.log(describeError(context, error));
  }

  /**
   * Wait for queued writes. Rejects with the first write failure, if any.
   */
  async flush(): Promise<void> {
    await this.pending;
    if (this.failure !== null) {
      const failure = this.failure;
      this.failure = null;
      throw failure;
    }
  }

  private enqueue(line: string): void {
    this.echo?.(line);
    this.pending = this.pending
      .then(() => this.write(line))
      .catch((error: unknown) => {
        this.failure ??= error;
      });
  }

  private async write(line: string): Promise<void> {
    if (!this.dirReady) {
      await mkdir(this.dir, { recursive: true });
      this.dirReady = true;
    }
    await appendFile(this.path, line + "\n", "utf-8");
  }
}
