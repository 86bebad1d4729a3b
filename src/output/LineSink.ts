/**
 * LineSink - destination of the writer's text lines
 *
 * A sink is chosen once when the writer is created: either a file opened for
 * writing or the process standard output.
 */

import * as fs from "node:fs";
import { OutputOpenError } from "@/errors";
import { debugLog, logError } from "@/logging/log";

/** Sentinel destination selecting standard output */
export const STDOUT_DESTINATION = "stdout";

export interface LineSink {
  /** Append one line; the terminating newline is added by the sink */
  writeLine(line: string): void;
  /** Release the destination */
  close(): void;
}

/**
 * Writes lines synchronously to a file.
 */
export class FileSink implements LineSink {
  readonly path: string;
  private fd: number | null;

  constructor(path: string) {
    this.path = path;
    try {
      this.fd = fs.openSync(path, "w");
    } catch (error) {
      throw new OutputOpenError(path, { cause: error });
    }
  }

  writeLine(line: string): void {
    if (this.fd === null) {
      throw new Error(`Output file "${this.path}" is already closed`);
    }
    fs.writeSync(this.fd, `${line}\n`);
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }
}

/**
 * Writes lines to a stream that stays open (standard output by default).
 *
 * A closed reader (EPIPE, as with `| head`) ends output quietly: later lines
 * are dropped. Any other stream error is logged and fails the process.
 */
export class StreamSink implements LineSink {
  private stream: NodeJS.WritableStream;
  private broken = false;

  constructor(stream: NodeJS.WritableStream = process.stdout) {
    this.stream = stream;
    // Stays attached after close: queued writes can still fail
    this.stream.on("error", this.handleError);
  }

  writeLine(line: string): void {
    if (this.broken) return;
    this.stream.write(`${line}\n`);
  }

  close(): void {
    // Standard output belongs to the process
  }

  private handleError = (error: Error): void => {
    if (this.broken) return;
    this.broken = true;
    if ("code" in error && error.code === "EPIPE") {
      debugLog("Output closed by reader, dropping remaining lines");
      return;
    }
    logError(`error writing output: ${error.message}`);
    process.exitCode = 1;
  };
}

/**
 * Open the sink for a destination: a file path or STDOUT_DESTINATION.
 * @throws OutputOpenError if the file cannot be opened for writing
 */
export function openSink(destination: string): LineSink {
  if (destination === STDOUT_DESTINATION) {
    return new StreamSink();
  }
  return new FileSink(destination);
}
