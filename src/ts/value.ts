/**
 * Field canonicalization and type inference
 */

import type { Value } from "./types";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Collapse every doubled quote ("") of a raw field into a single quote.
 * Other characters are copied unchanged.
 */
export function canonicalizeField(raw: string): string {
  if (!raw.includes('"')) return raw;

  let out = "";
  let pending = false;
  for (const c of raw) {
    if (c !== '"') {
      if (pending) {
        throw new Error(`Lone quote in raw field: ${raw}`);
      }
      out += c;
      continue;
    }
    if (pending) {
      out += c;
      pending = false;
      continue;
    }
    pending = true;
  }
  if (pending) {
    throw new Error(`Lone quote in raw field: ${raw}`);
  }
  return out;
}

/**
 * True when every character is an ASCII digit or a point.
 * "..", "1.2.3" pass too; they fall back to strings later.
 */
export function isMaybeNumberString(s: string): boolean {
  for (let i = 0; i < s.length; i++) {
    const c = s.charCodeAt(i);
    if (c !== 0x2e && (c < 0x30 || c > 0x39)) return false;
  }
  return true;
}

/** Signed 64-bit base-10 integer, or null */
export function parseInt64(raw: string): bigint | null {
  if (!INTEGER_PATTERN.test(raw)) return null;
  const n = BigInt(raw);
  if (n < INT64_MIN || n > INT64_MAX) return null;
  return n;
}

/** Finite decimal floating-point number, or null */
export function parseFloat64(raw: string): number | null {
  if (!FLOAT_PATTERN.test(raw)) return null;
  const x = Number(raw);
  return Number.isFinite(x) ? x : null;
}

/**
 * Typed value derived from a raw field.
 * Only the string variant holds canonicalized text.
 */
export class FieldValue {
  readonly value: Value;

  private constructor(value: Value) {
    this.value = value;
  }

  /** As a string value, whatever the content. */
  static string(raw: string): FieldValue {
    return new FieldValue({ type: "string", value: canonicalizeField(raw) });
  }

  /** As the inferred value: null, integer, float, then string. */
  static parse(raw: string): FieldValue {
    if (raw.length === 0) return new FieldValue({ type: "null" });

    const text = canonicalizeField(raw);
    if (!isMaybeNumberString(text)) {
      return new FieldValue({ type: "string", value: text });
    }

    const int = parseInt64(raw);
    if (int !== null) return new FieldValue({ type: "integer", value: int });

    const float = parseFloat64(raw);
    if (float !== null) return new FieldValue({ type: "float", value: float });

    // fallback to string
    return new FieldValue({ type: "string", value: text });
  }

  get type(): Value["type"] {
    return this.value.type;
  }
}
