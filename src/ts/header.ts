/**
 * Header - ordered column names used to key JSON objects
 */

import { CSVError } from "./errors";
import { FieldIterator } from "./field";
import type { Value } from "./types";

export class Header {
  private readonly names: string[] = [];

  /**
   * Build a header from a CSV line. Every field is kept as text,
   * so a name like "123" stays a string.
   */
  static fromLine(line: string): Header {
    const header = new Header();
    for (const field of new FieldIterator(line)) {
      header.append(field.string().value);
    }
    return header;
  }

  /** Append a name. Only string values are accepted. */
  append(value: Value): void {
    if (value.type !== "string") {
      throw new CSVError("AppendFailed", `Header entry must be a string, got ${value.type}`);
    }
    this.names.push(value.value);
  }

  get fields(): readonly string[] {
    return this.names;
  }

  get length(): number {
    return this.names.length;
  }
}
