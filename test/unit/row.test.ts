/**
 * Header and RowBuilder tests
 */

import { describe, test, expect } from "vitest";
import { Header } from "../../src/ts/header";
import { RowBuilder, encodeValue } from "../../src/ts/row";
import { FieldValue } from "../../src/ts/value";
import { CSVError } from "../../src/ts/errors";

function headerOf(...names: string[]): Header {
  const header = new Header();
  for (const name of names) {
    header.append({ type: "string", value: name });
  }
  return header;
}

function fill(builder: RowBuilder, raws: string[]): RowBuilder {
  for (const raw of raws) {
    builder.append(FieldValue.parse(raw));
  }
  return builder;
}

describe("Header", () => {
  test("appends names in order", () => {
    const header = new Header();
    header.append({ type: "string", value: "a" });
    header.append({ type: "string", value: "b" });
    expect(() => header.append({ type: "null" })).toThrow(CSVError);
    header.append({ type: "string", value: "c" });
    expect(header.fields).toEqual(["a", "b", "c"]);
    expect(header.length).toBe(3);
  });

  test("rejects non-string values with AppendFailed", () => {
    const header = new Header();
    let caught: unknown = null;
    try {
      header.append({ type: "integer", value: 1n });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CSVError);
    expect(caught).toMatchObject({ code: "AppendFailed", type: "Header" });
    expect(header.length).toBe(0);
  });

  test("fromLine keeps numeric names as text", () => {
    expect(Header.fromLine('id,123,"a,b",').fields).toEqual(["id", "123", "a,b", ""]);
  });

  test("fromLine propagates tokenizer errors", () => {
    expect(() => Header.fromLine('a,b"c')).toThrow(CSVError);
  });
});

describe("encodeValue", () => {
  test("encodes each variant", () => {
    expect(encodeValue({ type: "null" })).toBe("null");
    expect(encodeValue({ type: "string", value: 'a"b\n' })).toBe('"a\\"b\\n"');
    expect(encodeValue({ type: "integer", value: 9223372036854775807n })).toBe("9223372036854775807");
    expect(encodeValue({ type: "float", value: 12.8 })).toBe("12.8");
  });
});

describe("RowBuilder", () => {
  test("dumps an object, dropping values past the header", () => {
    const builder = fill(new RowBuilder(headerOf("string", "int")), ["str", "128", "12.8", ""]);
    expect(builder.dump()).toBe('{"string":"str","int":128}');
  });

  test("dumps an object", () => {
    const builder = fill(
      new RowBuilder(headerOf("string", "int", "float", "null")),
      ["str", "128", "12.8", ""]
    );
    expect(builder.dump()).toBe('{"string":"str","int":128,"float":12.8,"null":null}');
  });

  test("fills missing values with null", () => {
    const builder = fill(new RowBuilder(headerOf("string", "int", "float", "null")), ["str", "128"]);
    expect(builder.dump()).toBe('{"string":"str","int":128,"float":null,"null":null}');
  });

  test("dumps an array without header", () => {
    const builder = fill(new RowBuilder(), ["str", "128", "12.8", ""]);
    expect(builder.dump()).toBe('["str",128,12.8,null]');
  });

  test("dumps an empty array", () => {
    expect(new RowBuilder().dump()).toBe("[]");
  });

  test("repeated header names keep the first position and the last value", () => {
    const builder = fill(new RowBuilder(headerOf("a", "b", "a")), ["1", "2", "3"]);
    expect(builder.dump()).toBe('{"a":3,"b":2}');
  });

  test("special header names are plain keys", () => {
    const builder = fill(new RowBuilder(headerOf("__proto__", "constructor")), ["x", "y"]);
    expect(builder.dump()).toBe('{"__proto__":"x","constructor":"y"}');
  });

  test("reset empties the row and keeps the header", () => {
    const builder = fill(new RowBuilder(headerOf("a", "b")), ["1", "2"]);
    builder.reset();
    expect(builder.length).toBe(0);
    expect(builder.dump()).toBe('{"a":null,"b":null}');
    fill(builder, ["x"]);
    expect(builder.values.map((v) => v.type)).toEqual(["string"]);
    expect(builder.dump()).toBe('{"a":"x","b":null}');
  });
});
