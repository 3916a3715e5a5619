/**
 * Type definitions for csv2json
 */

import type { CSVError, CSVErrorCallback } from "./errors";

/** Typed value of one CSV field */
export type Value =
  | { type: "null" }
  | { type: "string"; value: string }
  | { type: "integer"; value: bigint }
  | { type: "float"; value: number };

export type ValueType = Value["type"];

/** Converter options */
export interface ConverterOptions {
  /** Whether the first line is a header (default: false) */
  hasHeader?: boolean;
  /** Abort at the first line that fails to convert (default: false) */
  failFast?: boolean;
  /** Longest accepted line in characters, 0 = unlimited (default: 4096) */
  maxLineLength?: number;
  /** Error callback invoked for each conversion error */
  onError?: CSVErrorCallback;
}

/** Run statistics */
export interface ConvertStats {
  /** Input lines consumed, header included */
  linesRead: number;
  rowsWritten: number;
  errorCount: number;
  elapsedMs: number;
}

/** Result of converting a whole document at once */
export interface ConvertResult {
  /** One JSON text per converted line */
  rows: string[];
  errors: CSVError[];
  /** Header names, or null without header mode */
  header: string[] | null;
}

/** Anything JSON lines can be written to */
export interface LineSink {
  write(chunk: string): unknown;
}
