/**
 * CSVConverter - turns CSV lines into JSON lines
 */

import { CSVError, isCSVError } from "./errors";
import { FieldIterator } from "./field";
import { Header } from "./header";
import { debug } from "./log";
import { RowBuilder } from "./row";
import type { ConverterOptions, ConvertResult, ConvertStats } from "./types";
import type { JSONLineWriter } from "./writer";

const DEFAULT_MAX_LINE_LENGTH = 4096;

type ResolvedOptions = Required<Omit<ConverterOptions, "onError">> &
  Pick<ConverterOptions, "onError">;

/**
 * Converts CSV lines to JSON one line at a time.
 *
 * @example
 * ```ts
 * const converter = new CSVConverter({ hasHeader: true });
 * converter.convert("name,age\nAlice,30\n").rows;
 * // ['{"name":"Alice","age":30}']
 *
 * // Streaming
 * const writer = new JSONLineWriter(process.stdout);
 * await converter.run(scanLines(process.stdin), writer);
 * writer.close();
 * ```
 */
export class CSVConverter {
  private options: ResolvedOptions;
  private header: Header | null = null;
  private builder: RowBuilder | null = null;

  // Error tracking
  private _errors: CSVError[] = [];

  // Stats of the last run
  private linesRead: number = 0;
  private rowsWritten: number = 0;
  private startTime: number = 0;
  private endTime: number = 0;

  constructor(options: ConverterOptions = {}) {
    this.options = {
      hasHeader: options.hasHeader ?? false,
      failFast: options.failFast ?? false,
      maxLineLength: options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH,
      onError: options.onError,
    };
  }

  /**
   * Get all errors recorded so far.
   */
  get errors(): ReadonlyArray<CSVError> {
    return this._errors;
  }

  /**
   * Get header column names, or null when no header was read.
   */
  getHeaders(): string[] | null {
    return this.header ? [...this.header.fields] : null;
  }

  /**
   * Statistics of the last run() or convert().
   */
  get stats(): ConvertStats {
    return {
      linesRead: this.linesRead,
      rowsWritten: this.rowsWritten,
      errorCount: this._errors.length,
      elapsedMs: this.endTime - this.startTime,
    };
  }

  /**
   * Build the header from its line. Can only happen once.
   */
  readHeader(line: string, lineNumber: number = 1): Header {
    if (this.header) {
      throw new Error("Header already read");
    }
    this.checkLength(line, lineNumber);
    let header: Header;
    try {
      header = Header.fromLine(line);
    } catch (err) {
      throw tagLine(err, lineNumber);
    }
    this.header = header;
    this.builder = null;
    debug("Converter", () => `header [${header.fields.join("|")}]`);
    return header;
  }

  /**
   * Convert one line to JSON text.
   * Throws a CSVError carrying `lineNumber` when the line is malformed.
   */
  convertLine(line: string, lineNumber?: number): string {
    this.checkLength(line, lineNumber);

    const builder = this.getBuilder();
    try {
      for (const field of new FieldIterator(line)) {
        builder.append(field.value());
      }
      return builder.dump();
    } catch (err) {
      throw lineNumber === undefined ? err : tagLine(err, lineNumber);
    } finally {
      builder.reset();
    }
  }

  /**
   * Convert a whole document held in memory.
   * Errors are collected instead of thrown; with failFast conversion stops
   * at the first one, and a bad header line always stops it.
   */
  convert(text: string): ConvertResult {
    const rows: string[] = [];
    this.begin();

    for (const line of splitLines(text)) {
      if (!this.step(line, (json) => rows.push(json))) break;
    }

    this.endTime = performance.now();
    return { rows, errors: [...this._errors], header: this.getHeaders() };
  }

  /**
   * Convert every line of `lines` and write the results.
   * A failing line is recorded and skipped, or rethrown with failFast.
   * A failing header line is always rethrown.
   */
  async run(
    lines: AsyncIterable<string> | Iterable<string>,
    writer: JSONLineWriter
  ): Promise<ConvertStats> {
    this.begin();

    for await (const line of lines) {
      if (!this.step(line, (json) => writer.writeLine(json))) {
        this.endTime = performance.now();
        const last = this._errors[this._errors.length - 1];
        if (last) throw last;
        break;
      }
    }

    this.endTime = performance.now();
    return this.stats;
  }

  /**
   * Process one input line. Returns false when processing must stop.
   */
  private step(line: string, emit: (json: string) => void): boolean {
    this.linesRead++;
    const lineNumber = this.linesRead;
    debug("Converter", () => `Line ${lineNumber} - ${line}`);

    if (this.options.hasHeader && !this.header) {
      try {
        this.readHeader(line, lineNumber);
        return true;
      } catch (err) {
        this.recordError(err);
        return false;
      }
    }

    let json: string;
    try {
      json = this.convertLine(line, lineNumber);
    } catch (err) {
      this.recordError(err);
      debug("Converter", `Line ${lineNumber} failed`);
      return !this.options.failFast;
    }

    emit(json);
    this.rowsWritten++;
    return true;
  }

  private begin(): void {
    this.linesRead = 0;
    this.rowsWritten = 0;
    this._errors = [];
    this.startTime = performance.now();
    this.endTime = this.startTime;
  }

  private getBuilder(): RowBuilder {
    if (!this.builder) {
      this.builder = new RowBuilder(this.header);
    }
    return this.builder;
  }

  private checkLength(line: string, lineNumber?: number): void {
    const max = this.options.maxLineLength;
    // a line never has more characters than code units
    if (max <= 0 || line.length <= max) return;

    const length = [...line].length;
    if (length > max) {
      throw new CSVError(
        "LineTooLong",
        `Line length ${length} exceeds the limit of ${max}`,
        { line: lineNumber }
      );
    }
  }

  /**
   * Record a conversion error and invoke the onError callback if set.
   * Anything other than a CSVError is rethrown.
   */
  private recordError(err: unknown): void {
    if (!isCSVError(err)) throw err;
    this._errors.push(err);
    this.options.onError?.(err);
  }
}

function tagLine(err: unknown, lineNumber: number): unknown {
  return isCSVError(err) ? err.withLine(lineNumber) : err;
}

/**
 * Split text into lines the way the stream scanner does.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  if (text.endsWith("\n")) lines.pop();
  return lines;
}
