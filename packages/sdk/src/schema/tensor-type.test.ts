import { describe, it, expect } from "vitest";
import {
  formatTensorType,
  isIndexedTensorType,
  parseTensorType,
  toMappedTensorType,
} from "./tensor-type.js";

describe("tensor types", () => {
  describe("parseTensorType", () => {
    it("should sort dimensions by name", () => {
      expect(parseTensorType("tensor<float>(y[3], x{})")).toEqual({
        valueType: "float",
        dimensions: [
          { name: "x", kind: "mapped" },
          { name: "y", kind: "indexed", size: 3 },
        ],
      });
    });

    it("should default to double cells", () => {
      expect(parseTensorType("tensor(x[])")).toEqual({
        valueType: "double",
        dimensions: [{ name: "x", kind: "indexed" }],
      });
    });

    it("should accept a tensor without dimensions", () => {
      expect(parseTensorType("tensor()")).toEqual({ valueType: "double", dimensions: [] });
    });

    it("should reject malformed specifications", () => {
      expect(() => parseTensorType("vector(x{})")).toThrow(
        "'vector(x{})' is not a tensor type specification"
      );
      expect(() => parseTensorType("tensor<int32>(x{})")).toThrow(
        "Unknown tensor value type 'int32' in 'tensor<int32>(x{})'"
      );
      expect(() => parseTensorType("tensor(1x{})")).toThrow("Invalid dimension '1x{}'");
      expect(() => parseTensorType("tensor(x{},x[2])")).toThrow("Dimension 'x' is declared twice");
      expect(() => parseTensorType("tensor(x[0])")).toThrow("Dimension 'x' must have a positive size");
    });
  });

  describe("formatTensorType", () => {
    it("should omit the default value type", () => {
      expect(formatTensorType(parseTensorType("tensor<double>(y[2],x{})"))).toBe("tensor(x{},y[2])");
    });

    it("should print other value types", () => {
      expect(formatTensorType(parseTensorType("tensor<int8>(x[])"))).toBe("tensor<int8>(x[])");
    });
  });

  it("should tell dense types apart", () => {
    expect(isIndexedTensorType(parseTensorType("tensor(x[2],y[])"))).toBe(true);
    expect(isIndexedTensorType(parseTensorType("tensor(x[2],y{})"))).toBe(false);
    expect(isIndexedTensorType(parseTensorType("tensor()"))).toBe(false);
  });

  it("should map every dimension", () => {
    const mapped = toMappedTensorType(parseTensorType("tensor<float>(x[2],y{})"));
    expect(formatTensorType(mapped)).toBe("tensor<float>(x{},y{})");
  });
});
