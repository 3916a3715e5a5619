/**
 * Field tokenizer - splits one CSV line into raw fields
 */

import { CSVError, type CSVErrorCode } from "./errors";
import { debug } from "./log";
import { FieldValue } from "./value";

const QUOTE = '"';
const DELIMITER = ",";

/**
 * One field of a line: a span of the line, outer quotes stripped,
 * doubled quotes kept as they are.
 */
export class Field {
  private readonly buffer: string;
  readonly start: number;
  readonly end: number;

  constructor(buffer: string, start: number, end: number) {
    this.buffer = buffer;
    this.start = start;
    this.end = end;
  }

  /** Raw field text */
  get raw(): string {
    return this.buffer.slice(this.start, this.end);
  }

  get length(): number {
    return this.end - this.start;
  }

  /** As an inferred value. */
  value(): FieldValue {
    return FieldValue.parse(this.raw);
  }

  /** As a string value. */
  string(): FieldValue {
    return FieldValue.string(this.raw);
  }
}

/**
 * Yield the fields of one CSV line.
 *
 * `next()` returns a field, or null at the end of the line. A malformed quote
 * throws a {@link CSVError}; the iterator is then exhausted and every later
 * call returns null.
 *
 * @example
 * ```ts
 * const it = new FieldIterator('"a,b",c');
 * it.next()?.raw; // "a,b"
 * it.next()?.raw; // "c"
 * it.next();      // null
 * ```
 */
export class FieldIterator implements Iterable<Field> {
  private readonly buffer: string;
  /** Offset of the next field, null once terminated */
  private index: number | null = 0;

  constructor(buffer: string) {
    this.buffer = buffer;
  }

  /** Split a whole line, throwing on the first malformed field. */
  static split(line: string): Field[] {
    return [...new FieldIterator(line)];
  }

  get done(): boolean {
    return this.index === null;
  }

  next(): Field | null {
    const start = this.index;
    if (start === null) return null;

    debug("FieldIterator", () => `start is [${this.buffer}][${start}]`);

    if (this.buffer.length === 0) return this.nextEmpty(0);

    if (start < this.buffer.length) {
      return this.buffer[start] === QUOTE
        ? this.nextQuoted(start)
        : this.nextRaw(start);
    }

    // line ended right after a delimiter
    if (start > 0 && this.buffer[start - 1] === DELIMITER) {
      return this.nextEmpty(start);
    }

    this.index = null;
    return null;
  }

  *[Symbol.iterator](): Iterator<Field> {
    let field = this.next();
    while (field !== null) {
      yield field;
      field = this.next();
    }
  }

  /** Yield an empty field and terminate. */
  private nextEmpty(at: number): Field {
    this.index = null;
    return new Field(this.buffer, at, at);
  }

  private nextRaw(start: number): Field {
    for (let i = start; i < this.buffer.length; i++) {
      const c = this.buffer[i];
      if (c === QUOTE) {
        // quote without an opening quote
        return this.fail("QuoteInTheMiddle", `Unexpected quote in unquoted field at index ${i}`, i);
      }
      if (c === DELIMITER) {
        this.index = i + 1;
        return this.cut(start, i);
      }
    }

    this.index = this.buffer.length;
    return this.cut(start, this.buffer.length);
  }

  private nextQuoted(start: number): Field {
    const len = this.buffer.length;
    let i = start + 1;

    while (i < len) {
      if (this.buffer[i] !== QUOTE) {
        i++;
        continue;
      }

      if (i + 1 === len) {
        // quote closed, last field
        this.index = len;
        return this.cut(start + 1, i);
      }

      const d = this.buffer[i + 1];
      if (d === QUOTE) {
        i += 2; // escaped quote
        continue;
      }
      if (d === DELIMITER) {
        this.index = i + 2;
        return this.cut(start + 1, i);
      }
      return this.fail("QuoteUnbalanced", `Unexpected character after closing quote at index ${i + 1}`, i + 1);
    }

    return this.fail("QuoteUnbalanced", `Missing closing quote for field starting at index ${start}`, start);
  }

  private cut(start: number, end: number): Field {
    debug("FieldIterator", () => `slice [${this.buffer}][${start}..${end}]`);
    return new Field(this.buffer, start, end);
  }

  private fail(code: CSVErrorCode, message: string, index: number): never {
    this.index = null;
    throw new CSVError(code, message, { index });
  }
}
