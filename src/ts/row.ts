/**
 * RowBuilder - assembles one line's values into a JSON array or object
 */

import type { Header } from "./header";
import type { Value } from "./types";
import type { FieldValue } from "./value";

/**
 * Encode a single value as JSON text.
 * Integers are written digit for digit, so the whole 64-bit range survives.
 */
export function encodeValue(value: Value): string {
  switch (value.type) {
    case "null":
      return "null";
    case "string":
      return JSON.stringify(value.value);
    case "integer":
      return value.value.toString();
    case "float":
      return JSON.stringify(value.value);
  }
}

/**
 * Accumulates the values of one line.
 *
 * @example
 * ```ts
 * const builder = new RowBuilder(Header.fromLine("name,age"));
 * builder.append(FieldValue.parse("Alice"));
 * builder.append(FieldValue.parse("30"));
 * builder.dump(); // {"name":"Alice","age":30}
 * ```
 */
export class RowBuilder {
  private readonly header: Header | null;
  private list: FieldValue[] = [];

  constructor(header: Header | null = null) {
    this.header = header;
  }

  append(value: FieldValue): void {
    this.list.push(value);
  }

  /** Drop the current values; the header is kept. */
  reset(): void {
    this.list = [];
  }

  get length(): number {
    return this.list.length;
  }

  get values(): readonly FieldValue[] {
    return this.list;
  }

  /**
   * Dump a JSON string.
   * Without header, a JSON array of every value.
   * With header, a JSON object whose key for `list[i]` is `header[i]`:
   * missing values become null and values past the last key are dropped.
   */
  dump(): string {
    if (!this.header) {
      return `[${this.list.map((item) => encodeValue(item.value)).join(",")}]`;
    }

    // a repeated name keeps its first position and its last value
    const entries = new Map<string, string>();
    this.header.fields.forEach((key, index) => {
      const item = this.list[index];
      entries.set(key, item ? encodeValue(item.value) : "null");
    });

    const members: string[] = [];
    for (const [key, encoded] of entries) {
      members.push(`${JSON.stringify(key)}:${encoded}`);
    }
    return `{${members.join(",")}}`;
  }
}
