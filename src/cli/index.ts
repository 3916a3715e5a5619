/**
 * csv2json CLI
 */

import { parseArgs } from "util";
import { existsSync, statSync } from "fs";
import type { Readable } from "stream";
import { convert } from "./commands/convert";
import { loadConfig, mergeConfig } from "./config";
import { openInput } from "../ts/scan";
import type { LineSink } from "../ts/types";

export const HELP = `
csv2json - Convert CSV lines into JSON lines

Usage: csv2json [options] [file]

Reads stdin when no file (or "-") is given.

Options:
  -h, --help         Show this help message
  -v, --version      Show version
  -i, --header       Read the first line as header
      --failfast     Exit on the first error
      --max-line     Longest accepted line (default: 4096, 0 = unlimited)
  -o, --output       Write JSON lines to a file instead of stdout
      --stats        Print a summary to stderr

Examples:
  cat data.csv | csv2json
  csv2json --header data.csv
  csv2json -i --failfast -o data.jsonl data.csv
`;

export const VERSION = "0.1.0";

export interface CLIStreams {
  stdin: Readable;
  stdout: LineSink;
  stderr: LineSink;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  home?: string;
}

function parseMaxLine(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const max = parseInt(value, 10);
  if (isNaN(max) || max < 0) {
    throw new Error(`Invalid --max-line value: ${value}`);
  }
  return max;
}

/**
 * Run the CLI with the given arguments. Returns the exit code.
 */
export async function main(argv: string[], io: CLIStreams): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: {
        help: { type: "boolean", short: "h" },
        version: { type: "boolean", short: "v" },
        header: { type: "boolean", short: "i" },
        failfast: { type: "boolean" },
        "max-line": { type: "string" },
        output: { type: "string", short: "o" },
        stats: { type: "boolean" },
      },
      allowPositionals: true,
    });

    if (values.version) {
      io.stdout.write(`csv2json v${VERSION}\n`);
      return 0;
    }

    if (values.help) {
      io.stdout.write(HELP + "\n");
      return 0;
    }

    if (positionals.length > 1) {
      io.stderr.write("Usage: csv2json [options] [file]\n");
      return 1;
    }

    const filePath = positionals[0] ?? "-";

    // Validate file exists
    if (filePath !== "-" && !existsSync(filePath)) {
      io.stderr.write(`Error: File not found: ${filePath}\n`);
      return 1;
    }

    const fileSize = filePath !== "-" ? statSync(filePath).size : undefined;

    // Load config file
    const env = io.env ?? process.env;
    const { config: fileConfig, path: configPath } = loadConfig(io.cwd, io.home);
    if (configPath && (env.CSV2JSON_DEBUG === "1" || env.CSV2JSON_DEBUG === "true")) {
      io.stderr.write(`Loaded config from: ${configPath}\n`);
    }

    // Merge config sources: CLI > env > file config
    const merged = mergeConfig(
      {
        hasHeader: values.header,
        failFast: values.failfast,
        maxLineLength: parseMaxLine(values["max-line"]),
        stats: values.stats,
      },
      fileConfig,
      env
    );

    return await convert(
      {
        hasHeader: merged.hasHeader ?? false,
        failFast: merged.failFast ?? false,
        maxLineLength: merged.maxLineLength ?? 4096,
        stats: merged.stats ?? false,
        output: values.output,
        fileSize,
      },
      {
        input: filePath === "-" ? io.stdin : openInput(filePath),
        stdout: io.stdout,
        stderr: io.stderr,
      }
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Error: ${message}\n`);
    return 1;
  }
}
