/**
 * convert command - CSV lines from a file or stdin to JSON lines
 */

import { CSVConverter } from "../../ts/parser";
import { JSONLineWriter } from "../../ts/writer";
import { scanLines } from "../../ts/scan";
import { isCSVError, type CSVError } from "../../ts/errors";
import type { Readable } from "stream";
import type { LineSink } from "../../ts/types";
import { formatSummary } from "../summary";

export interface ConvertOptions {
  hasHeader: boolean;
  failFast: boolean;
  maxLineLength: number;
  stats: boolean;
  output?: string;
  fileSize?: number;
}

export interface ConvertIO {
  input: Readable;
  stdout: LineSink;
  stderr: LineSink;
}

/** Diagnostic line for a failed input line */
export function formatLineError(error: CSVError, line: string): string {
  return `Line ${error.line ?? 0} ${line} ${error.code}: ${error.message}`;
}

/**
 * Convert every line of the input. Returns the process exit code.
 */
export async function convert(options: ConvertOptions, io: ConvertIO): Promise<number> {
  const startTime = performance.now();
  let current = "";

  const converter = new CSVConverter({
    hasHeader: options.hasHeader,
    failFast: options.failFast,
    maxLineLength: options.maxLineLength,
    onError: (error) => {
      io.stderr.write(formatLineError(error, current) + "\n");
    },
  });

  const writer = new JSONLineWriter(options.output ?? io.stdout);

  async function* tracked(): AsyncGenerator<string> {
    for await (const line of scanLines(io.input)) {
      current = line;
      yield line;
    }
  }

  let exitCode = 0;
  try {
    await converter.run(tracked(), writer);
  } catch (error) {
    if (!isCSVError(error)) throw error;
    exitCode = 1;
  } finally {
    writer.close();
  }

  if (options.output && exitCode === 0) {
    io.stderr.write(`✓ Written to: ${options.output}\n`);
  }

  if (options.stats) {
    const { rowsWritten, errorCount } = converter.stats;
    io.stderr.write(formatSummary(rowsWritten, errorCount, startTime, options.fileSize) + "\n");
  }

  return exitCode;
}
