/**
 * Line scanning over readable streams
 */

import { createReadStream } from "fs";
import { StringDecoder } from "string_decoder";
import type { Readable } from "stream";

/** Drop one trailing "\r" left by a "\r\n" line ending */
function stripCR(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Yield every line of a stream without its line ending.
 * Only "\n" ends a line, optionally preceded by "\r"; a lone "\r" is data.
 * A final newline adds no empty line.
 */
export async function* scanLines(input: Readable): AsyncGenerator<string> {
  const decoder = new StringDecoder("utf-8");
  let pending = "";

  for await (const chunk of input) {
    const text = pending + (typeof chunk === "string" ? chunk : decoder.write(chunk));

    let start = 0;
    let newline = text.indexOf("\n");
    while (newline !== -1) {
      yield stripCR(text.slice(start, newline));
      start = newline + 1;
      newline = text.indexOf("\n", start);
    }
    pending = text.slice(start);
  }

  pending += decoder.end();
  if (pending.length > 0) {
    yield stripCR(pending);
  }
}

/**
 * Open a file for scanning, or stdin for "-".
 */
export function openInput(filePath: string): Readable {
  if (filePath === "-") return process.stdin;
  return createReadStream(filePath, { encoding: "utf-8" });
}
