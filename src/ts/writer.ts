/**
 * JSONLineWriter - Write JSON lines to a file or a stream
 */

import { writeFileSync, appendFileSync } from "fs";
import type { LineSink } from "./types";

/** Writer options */
export interface JSONLineWriterOptions {
  /** Lines to buffer before auto-flush (default: 1000) */
  flushEvery?: number;
  /** Append to an existing file instead of truncating it */
  append?: boolean;
}

/**
 * Buffered writer; every line is followed by "\n".
 *
 * @example
 * ```ts
 * const writer = new JSONLineWriter(process.stdout);
 * writer.writeLine('["a",1]');
 * writer.close();
 * ```
 */
export class JSONLineWriter {
  private target: string | LineSink;
  private options: Required<JSONLineWriterOptions>;
  private buffer: string[] = [];
  private linesWritten: number = 0;
  private closed: boolean = false;

  constructor(target: string | LineSink, options: JSONLineWriterOptions = {}) {
    this.target = target;
    this.options = {
      flushEvery: options.flushEvery ?? 1000,
      append: options.append ?? false,
    };

    // Truncate the file unless appending
    if (typeof target === "string" && !this.options.append) {
      writeFileSync(target, "");
    }
  }

  /**
   * Write one JSON text as a line.
   */
  writeLine(json: string): void {
    if (this.closed) {
      throw new Error("Writer is closed");
    }

    this.buffer.push(json + "\n");

    if (this.buffer.length >= this.options.flushEvery) {
      this.flush();
    }
  }

  /**
   * Flush buffered lines to the target.
   */
  flush(): void {
    if (this.buffer.length === 0) return;

    const content = this.buffer.join("");

    if (typeof this.target === "string") {
      appendFileSync(this.target, content);
    } else {
      this.target.write(content);
    }

    this.linesWritten += this.buffer.length;
    this.buffer = [];
  }

  /**
   * Get total lines written (including buffered).
   */
  getLineCount(): number {
    return this.linesWritten + this.buffer.length;
  }

  /**
   * Close writer and flush remaining buffer.
   */
  close(): void {
    if (this.closed) return;

    this.flush();
    this.closed = true;
  }
}
