import { describe, it, expect } from "vitest";
import { DataTypes, dataTypeName, isNumericType, type StructDataType } from "./data-types.js";
import { parseTypeExpression } from "./type-expression.js";

describe("parseTypeExpression", () => {
  it("should parse primitives and special types", () => {
    expect(parseTypeExpression("int")).toEqual(DataTypes.INT);
    expect(parseTypeExpression(" string ")).toEqual(DataTypes.STRING);
    expect(parseTypeExpression("raw")).toEqual(DataTypes.RAW);
    expect(parseTypeExpression("position")).toEqual(DataTypes.POSITION);
    expect(parseTypeExpression("predicate")).toEqual(DataTypes.PREDICATE);
  });

  it("should parse nested collections", () => {
    expect(parseTypeExpression("map<string,array<int>>")).toEqual(
      DataTypes.map(DataTypes.STRING, DataTypes.array(DataTypes.INT))
    );
    expect(parseTypeExpression("weightedset<long>")).toEqual(DataTypes.weightedSet(DataTypes.LONG));
  });

  it("should parse tensor types, including inside collections", () => {
    expect(parseTypeExpression("tensor<float>(x[3])")).toEqual(DataTypes.tensor("tensor<float>(x[3])"));
    expect(parseTypeExpression("map<string,tensor(x{},y{})>")).toEqual(
      DataTypes.map(DataTypes.STRING, DataTypes.tensor("tensor(x{},y{})"))
    );
  });

  it("should resolve declared structs", () => {
    const contact: StructDataType = DataTypes.struct("contact", { email: DataTypes.STRING });
    const structs = new Map([["contact", contact]]);
    expect(parseTypeExpression("array<contact>", structs)).toEqual(DataTypes.array(contact));
  });

  it("should reject unknown types", () => {
    expect(() => parseTypeExpression("text")).toThrow("Unknown type 'text'");
    expect(() => parseTypeExpression("array<text>")).toThrow("Unknown type 'text'");
    expect(() => parseTypeExpression("list<int>")).toThrow("Unknown collection type 'list' in 'list<int>'");
  });

  it("should check the number of type arguments", () => {
    expect(() => parseTypeExpression("map<string>")).toThrow(
      "Wrong number of type arguments for 'map' in 'map<string>'"
    );
    expect(() => parseTypeExpression("array<int,int>")).toThrow(
      "Wrong number of type arguments for 'array' in 'array<int,int>'"
    );
  });
});

describe("dataTypeName", () => {
  it("should name composite types", () => {
    expect(dataTypeName(parseTypeExpression("map<string,array<int>>"))).toBe("Map<string,Array<int>>");
    expect(dataTypeName(parseTypeExpression("weightedset<string>"))).toBe("WeightedSet<string>");
    expect(dataTypeName(parseTypeExpression("tensor<float>(x[3])"))).toBe("tensor<float>(x[3])");
  });
});

describe("isNumericType", () => {
  it("should only accept numeric primitives", () => {
    expect(isNumericType(DataTypes.BYTE)).toBe(true);
    expect(isNumericType(DataTypes.DOUBLE)).toBe(true);
    expect(isNumericType(DataTypes.BOOL)).toBe(false);
    expect(isNumericType(DataTypes.STRING)).toBe(false);
    expect(isNumericType(DataTypes.RAW)).toBe(false);
  });
});
