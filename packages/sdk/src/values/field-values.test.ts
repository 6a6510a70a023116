import { describe, it, expect } from "vitest";
import { parseTensorType } from "../schema/tensor-type.js";
import { FieldValues, fieldValueEquals, fieldValueKey, formatFieldValue, mapGet, weightOf } from "./field-values.js";
import { parsePredicate } from "./predicate.js";
import { Tensor } from "./tensor.js";

const red = FieldValues.string("red");
const blue = FieldValues.string("blue");

describe("field values", () => {
  describe("fieldValueEquals", () => {
    it("should tell kinds apart", () => {
      expect(fieldValueEquals(FieldValues.int(1), FieldValues.int(1))).toBe(true);
      expect(fieldValueEquals(FieldValues.int(1), FieldValues.long(1n))).toBe(false);
      expect(fieldValueEquals(FieldValues.string("1"), FieldValues.int(1))).toBe(false);
    });

    it("should ignore entry order in maps and weighted sets", () => {
      const a = FieldValues.weightedSet([
        { value: red, weight: 1 },
        { value: blue, weight: 2 },
      ]);
      const b = FieldValues.weightedSet([
        { value: blue, weight: 2 },
        { value: red, weight: 1 },
      ]);
      expect(fieldValueKey(a)).toBe(fieldValueKey(b));
    });

    it("should keep array order", () => {
      expect(fieldValueEquals(FieldValues.array([red, blue]), FieldValues.array([blue, red]))).toBe(false);
    });

    it("should compare tensors by cells", () => {
      const type = parseTensorType("tensor(x{})");
      const a = new Tensor(type, [
        { address: { x: "a" }, value: 1 },
        { address: { x: "b" }, value: 2 },
      ]);
      const b = new Tensor(type, [
        { address: { x: "b" }, value: 2 },
        { address: { x: "a" }, value: 1 },
      ]);
      expect(fieldValueEquals(FieldValues.tensor(a), FieldValues.tensor(b))).toBe(true);
    });
  });

  it("should look up map values and weights", () => {
    const map = FieldValues.map([{ key: FieldValues.int(3), value: red }]);
    expect(mapGet(map, FieldValues.int(3))).toEqual(red);
    expect(mapGet(map, FieldValues.int(4))).toBeUndefined();
    expect(mapGet(red, red)).toBeUndefined();

    const set = FieldValues.weightedSet([{ value: red, weight: 5 }]);
    expect(weightOf(set, red)).toBe(5);
    expect(weightOf(set, blue)).toBeUndefined();
  });

  describe("formatFieldValue", () => {
    it("should render values on one line", () => {
      expect(formatFieldValue(FieldValues.struct("contact", { email: FieldValues.string("a@example.com") }))).toBe(
        'contact{email:"a@example.com"}'
      );
      expect(formatFieldValue(FieldValues.raw(new Uint8Array(3)))).toBe("raw(3 bytes)");
      expect(formatFieldValue(FieldValues.long(12n))).toBe("12");
      expect(formatFieldValue(FieldValues.map([{ key: red, value: FieldValues.bool(true) }]))).toBe('{"red":true}');
      expect(formatFieldValue(FieldValues.predicate(parsePredicate("a in [b]")))).toBe("a in [b]");
    });
  });
});
