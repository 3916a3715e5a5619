/**
 * Canonicalization and type inference tests
 */

import { describe, test, expect } from "vitest";
import {
  FieldValue,
  canonicalizeField,
  isMaybeNumberString,
  parseInt64,
  parseFloat64,
} from "../../src/ts/value";

describe("canonicalizeField", () => {
  test("no changes without quotes", () => {
    expect(canonicalizeField("a,b,c")).toBe("a,b,c");
  });

  test("collapses doubled quotes", () => {
    expect(canonicalizeField('a,b"",c')).toBe('a,b",c');
    expect(canonicalizeField('""""')).toBe('""');
  });

  test("rejects a lone quote", () => {
    expect(() => canonicalizeField('a"b')).toThrow("Lone quote");
    expect(() => canonicalizeField('ab"')).toThrow("Lone quote");
  });
});

describe("isMaybeNumberString", () => {
  test("digits and points", () => {
    expect(isMaybeNumberString("12345")).toBe(true);
    expect(isMaybeNumberString("1.5")).toBe(true);
    expect(isMaybeNumberString("..")).toBe(true);
  });

  test("anything else", () => {
    expect(isMaybeNumberString("12345a")).toBe(false);
    expect(isMaybeNumberString("-1")).toBe(false);
    expect(isMaybeNumberString("1e5")).toBe(false);
  });
});

describe("numeric parsers", () => {
  test("parseInt64 takes the signed 64-bit range", () => {
    expect(parseInt64("123")).toBe(123n);
    expect(parseInt64("-42")).toBe(-42n);
    expect(parseInt64("9223372036854775807")).toBe(9223372036854775807n);
    expect(parseInt64("9223372036854775808")).toBeNull();
    expect(parseInt64("1.0")).toBeNull();
    expect(parseInt64("")).toBeNull();
  });

  test("parseFloat64 takes decimal syntax", () => {
    expect(parseFloat64("123.4")).toBe(123.4);
    expect(parseFloat64(".5")).toBe(0.5);
    expect(parseFloat64("1e3")).toBe(1000);
    expect(parseFloat64(".")).toBeNull();
    expect(parseFloat64("1.2.3")).toBeNull();
    expect(parseFloat64("Infinity")).toBeNull();
    expect(parseFloat64("1e400")).toBeNull();
  });
});

describe("FieldValue.parse", () => {
  test("integer", () => {
    expect(FieldValue.parse("123").value).toEqual({ type: "integer", value: 123n });
  });

  test("float", () => {
    expect(FieldValue.parse("123.4").value).toEqual({ type: "float", value: 123.4 });
  });

  test("string", () => {
    expect(FieldValue.parse("12a").value).toEqual({ type: "string", value: "12a" });
  });

  test("null", () => {
    expect(FieldValue.parse("").value).toEqual({ type: "null" });
    expect(FieldValue.parse("").type).toBe("null");
  });

  test("digit and point strings that are not numbers stay strings", () => {
    expect(FieldValue.parse(".").value).toEqual({ type: "string", value: "." });
    expect(FieldValue.parse("..").value).toEqual({ type: "string", value: ".." });
    expect(FieldValue.parse("1.2.3").value).toEqual({ type: "string", value: "1.2.3" });
  });

  test("signs and exponents are not numeric candidates", () => {
    expect(FieldValue.parse("-5").value).toEqual({ type: "string", value: "-5" });
    expect(FieldValue.parse("1e3").value).toEqual({ type: "string", value: "1e3" });
  });

  test("integers past the 64-bit range become floats", () => {
    expect(FieldValue.parse("99999999999999999999").value).toEqual({ type: "float", value: 1e20 });
  });

  test("unescapes quoted strings", () => {
    expect(FieldValue.parse('say ""hi""').value).toEqual({ type: "string", value: 'say "hi"' });
  });
});

describe("FieldValue.string", () => {
  test("keeps numbers as text", () => {
    expect(FieldValue.string("123").value).toEqual({ type: "string", value: "123" });
  });

  test("keeps empty content as an empty string", () => {
    expect(FieldValue.string("").value).toEqual({ type: "string", value: "" });
  });
});
