import { describe, it, expect } from "vitest";
import { ConversionError, FieldDecodeError, UnknownFieldError } from "../errors.js";
import { parseNode } from "../json/tree.js";
import { DataTypes, type DataType } from "../schema/data-types.js";
import { FieldValues } from "../values/field-values.js";
import { decodeField, decodeFieldValue, decodeKey } from "./field-values.js";

const CONTACT = DataTypes.struct("contact", { email: DataTypes.STRING, phone: DataTypes.STRING });
const CONTEXT = { documentId: "id:shop:article::1", field: "views" };

function decode(json: string, type: DataType) {
  return decodeFieldValue(parseNode(json), type);
}

describe("decodeFieldValue", () => {
  describe("primitives", () => {
    it("should decode integers from numbers and strings", () => {
      expect(decode("12", DataTypes.INT)).toEqual(FieldValues.int(12));
      expect(decode('"-7"', DataTypes.INT)).toEqual(FieldValues.int(-7));
      expect(decode("-128", DataTypes.BYTE)).toEqual(FieldValues.byte(-128));
    });

    it("should keep long precision", () => {
      expect(decode("9223372036854775807", DataTypes.LONG)).toEqual(FieldValues.long(9223372036854775807n));
    });

    it("should enforce integer ranges", () => {
      expect(() => decode("2147483648", DataTypes.INT)).toThrow('For input string: "2147483648"');
      expect(() => decode("128", DataTypes.BYTE)).toThrow('For input string: "128"');
      expect(() => decode("1.5", DataTypes.INT)).toThrow('For input string: "1.5"');
      expect(() => decode("true", DataTypes.INT)).toThrow("Expected an integer, got boolean true");
    });

    it("should round floats to single precision", () => {
      expect(decode("0.1", DataTypes.FLOAT)).toEqual(FieldValues.float(Math.fround(0.1)));
      expect(decode("0.1", DataTypes.DOUBLE)).toEqual(FieldValues.double(0.1));
    });

    it("should decode floating point strings", () => {
      expect(decode('"2.5e1"', DataTypes.DOUBLE)).toEqual(FieldValues.double(25));
      expect(decode('"NaN"', DataTypes.DOUBLE)).toEqual(FieldValues.double(Number.NaN));
      expect(() => decode('"abc"', DataTypes.DOUBLE)).toThrow('For input string: "abc"');
      expect(() => decode('" 1"', DataTypes.DOUBLE)).toThrow('For input string: " 1"');
    });

    it("should only accept decimal notation in floating point strings", () => {
      expect(decode('"-.5"', DataTypes.DOUBLE)).toEqual(FieldValues.double(-0.5));
      expect(decode('"3."', DataTypes.FLOAT)).toEqual(FieldValues.float(3));
      for (const text of ["0x10", "0b1", "0o7", "1_000", "1e", "."]) {
        expect(() => decode(JSON.stringify(text), DataTypes.DOUBLE)).toThrow(`For input string: "${text}"`);
        expect(() => decode(JSON.stringify(text), DataTypes.FLOAT)).toThrow(`For input string: "${text}"`);
      }
    });

    it("should read the non-finite spellings the feed writer produces", () => {
      expect(decode('"-Infinity"', DataTypes.FLOAT)).toEqual(FieldValues.float(Number.NEGATIVE_INFINITY));
      expect(decode('"Infinity"', DataTypes.DOUBLE)).toEqual(FieldValues.double(Number.POSITIVE_INFINITY));
      expect(() => decode('"infinity"', DataTypes.DOUBLE)).toThrow('For input string: "infinity"');
    });

    it("should decode booleans", () => {
      expect(decode("true", DataTypes.BOOL)).toEqual(FieldValues.bool(true));
      expect(decode('"false"', DataTypes.BOOL)).toEqual(FieldValues.bool(false));
      expect(() => decode("1", DataTypes.BOOL)).toThrow("Expected a boolean, got number 1");
    });

    it("should require strings for string fields", () => {
      expect(decode('"x"', DataTypes.STRING)).toEqual(FieldValues.string("x"));
      expect(() => decode("5", DataTypes.STRING)).toThrow("Expected a string, got number 5");
    });
  });

  describe("structs", () => {
    it("should skip null members", () => {
      expect(decode('{"email": "a@example.com", "phone": null}', CONTACT)).toEqual(
        FieldValues.struct("contact", { email: FieldValues.string("a@example.com") })
      );
    });

    it("should reject undeclared members", () => {
      expect(() => decode('{"fax": "1"}', CONTACT)).toThrow(UnknownFieldError);
      expect(() => decode('{"fax": "1"}', CONTACT)).toThrow(
        "Could not get field 'fax' in the structure of type 'contact'"
      );
    });
  });

  describe("collections", () => {
    it("should decode arrays", () => {
      expect(decode("[1, 2]", DataTypes.array(DataTypes.INT))).toEqual(
        FieldValues.array([FieldValues.int(1), FieldValues.int(2)])
      );
      expect(() => decode("{}", DataTypes.array(DataTypes.INT))).toThrow("Expected an array, got an object");
    });

    it("should replace repeated map keys in place", () => {
      expect(decode('{"a": "1", "b": "2", "a": "3"}', DataTypes.map(DataTypes.STRING, DataTypes.STRING))).toEqual(
        FieldValues.map([
          { key: FieldValues.string("a"), value: FieldValues.string("3") },
          { key: FieldValues.string("b"), value: FieldValues.string("2") },
        ])
      );
    });

    it("should convert object keys to the key type", () => {
      expect(decode('{"7": 1.5}', DataTypes.map(DataTypes.INT, DataTypes.DOUBLE))).toEqual(
        FieldValues.map([{ key: FieldValues.int(7), value: FieldValues.double(1.5) }])
      );
    });

    it("should decode maps written as entry lists", () => {
      const type = DataTypes.map(DataTypes.INT, DataTypes.DOUBLE);
      expect(decode('[{"key": 1, "value": 2.5}]', type)).toEqual(
        FieldValues.map([{ key: FieldValues.int(1), value: FieldValues.double(2.5) }])
      );
      expect(() => decode('[{"key": 1}]', type)).toThrow("Map entry must have both 'key' and 'value'");
      expect(() => decode('[{"key": 1, "val": 2}]', type)).toThrow(
        "Unknown key 'val' in map entry, expected 'key' or 'value'"
      );
      expect(() => decode('"x"', type)).toThrow(
        "Expected a map object or an array of key/value objects, got string 'x'"
      );
    });

    it("should decode weighted sets", () => {
      expect(decode('{"red": 3, "blue": "4"}', DataTypes.weightedSet(DataTypes.STRING))).toEqual(
        FieldValues.weightedSet([
          { value: FieldValues.string("red"), weight: 3 },
          { value: FieldValues.string("blue"), weight: 4 },
        ])
      );
      expect(() => decode('{"red": 1.5}', DataTypes.weightedSet(DataTypes.STRING))).toThrow(
        'For input string: "1.5"'
      );
      expect(() => decode('["red"]', DataTypes.weightedSet(DataTypes.STRING))).toThrow(
        "Expected a weighted set object, got an array"
      );
    });
  });

  describe("special types", () => {
    it("should decode base64 raw data", () => {
      expect(decode('"aGVs bG8="', DataTypes.RAW)).toEqual(
        FieldValues.raw(new Uint8Array([0x68, 0x65, 0x6c, 0x6c, 0x6f]))
      );
      expect(() => decode('"!!"', DataTypes.RAW)).toThrow("Invalid base64 data '!!'");
    });

    it("should decode positions from strings", () => {
      expect(decode('"N63.429722;E10.393333"', DataTypes.POSITION)).toEqual(
        FieldValues.position(10393333, 63429722)
      );
      expect(decode('"S1.5; W2"', DataTypes.POSITION)).toEqual(FieldValues.position(-2000000, -1500000));
    });

    it("should decode positions from objects", () => {
      expect(decode('{"x": 1, "y": 2}', DataTypes.POSITION)).toEqual(FieldValues.position(1, 2));
    });

    it("should reject malformed positions", () => {
      expect(() => decode('"N1;N2"', DataTypes.POSITION)).toThrow(
        "Invalid position 'N1;N2', expected e.g. 'N63.429722;E10.393333'"
      );
      expect(() => decode('"63.4;10.3"', DataTypes.POSITION)).toThrow("Invalid position '63.4;10.3'");
      expect(() => decode("[1, 2]", DataTypes.POSITION)).toThrow("Expected a position string, got an array");
    });

    it("should parse predicates", () => {
      const value = decode('"a in [b]"', DataTypes.PREDICATE);
      expect(value).toEqual({
        kind: "predicate",
        predicate: { kind: "featureSet", key: "a", values: ["b"], negated: false },
      });
    });

    it("should decode tensors", () => {
      const value = decode('{"cells": [1, 2, 3]}', DataTypes.tensor("tensor<float>(x[3])"));
      expect(value.kind === "tensor" && value.tensor.toString()).toBe(
        "tensor<float>(x[3]):{{x:0}:1.0,{x:1}:2.0,{x:2}:3.0}"
      );
    });
  });
});

describe("decodeKey", () => {
  it("should convert key text to the declared type", () => {
    expect(decodeKey("true", DataTypes.BOOL)).toEqual(FieldValues.bool(true));
    expect(decodeKey("12", DataTypes.LONG)).toEqual(FieldValues.long(12n));
  });
});

describe("decodeField", () => {
  it("should name the document, field and type in conversion errors", () => {
    expect(() => decodeField(parseNode('"many"'), DataTypes.INT, CONTEXT)).toThrow(
      "Error in document 'id:shop:article::1' - could not parse field 'views' of type 'int': " +
        'For input string: "many"'
    );
  });

  it("should keep the original error as cause", () => {
    try {
      decodeField(parseNode('"x"'), DataTypes.array(DataTypes.INT), CONTEXT);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FieldDecodeError);
      expect(err instanceof Error && err.cause).toBeInstanceOf(ConversionError);
    }
  });

  it("should wrap predicate syntax errors", () => {
    expect(() => decodeField(parseNode('"a in ["'), DataTypes.PREDICATE, { ...CONTEXT, field: "filter" })).toThrow(
      "could not parse field 'filter' of type 'predicate': line 1:6 mismatched input '<EOF>' expecting a value"
    );
  });

  it("should name the document and field of an undeclared struct member", () => {
    expect(() => decodeField(parseNode('{"fax": "1"}'), CONTACT, CONTEXT)).toThrow(UnknownFieldError);
    expect(() => decodeField(parseNode('[{"fax": "1"}]'), DataTypes.array(CONTACT), CONTEXT)).toThrow(
      "Error in document 'id:shop:article::1' - could not parse field 'views' of type 'Array<contact>': " +
        "Could not get field 'fax' in the structure of type 'contact'"
    );
  });
});
