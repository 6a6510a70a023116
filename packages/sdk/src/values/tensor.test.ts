import { describe, it, expect } from "vitest";
import { parseTensorType } from "../schema/tensor-type.js";
import { Tensor } from "./tensor.js";

const SPARSE = parseTensorType("tensor(x{},y{})");
const DENSE = parseTensorType("tensor(x[2],y[2])");

describe("Tensor", () => {
  it("should look up cells by address", () => {
    const tensor = new Tensor(SPARSE, [
      { address: { x: "a", y: "b" }, value: 2 },
      { address: { x: "c", y: "b" }, value: 3.5 },
    ]);
    expect(tensor.size).toBe(2);
    expect(tensor.get({ y: "b", x: "c" })).toBe(3.5);
    expect(tensor.get({ x: "b", y: "a" })).toBeUndefined();
  });

  it("should let later cells replace earlier ones in place", () => {
    const tensor = new Tensor(SPARSE, [
      { address: { x: "a", y: "b" }, value: 1 },
      { address: { x: "c", y: "d" }, value: 2 },
      { address: { x: "a", y: "b" }, value: 9 },
    ]);
    expect(tensor.cells()).toEqual([
      { address: { x: "a", y: "b" }, value: 9 },
      { address: { x: "c", y: "d" }, value: 2 },
    ]);
  });

  it("should render cells in insertion order", () => {
    const tensor = new Tensor(SPARSE, [
      { address: { x: "a", y: "b" }, value: 2 },
      { address: { x: "c", y: "b" }, value: 3.5 },
    ]);
    expect(tensor.toString()).toBe("tensor(x{},y{}):{{x:a,y:b}:2.0,{x:c,y:b}:3.5}");
  });

  describe("dense", () => {
    it("should fill missing cells with zero in row-major order", () => {
      const tensor = Tensor.dense(DENSE, [2, 2], [{ address: { x: "1", y: "0" }, value: 5 }]);
      expect(tensor.isIndexed).toBe(true);
      expect(tensor.toString()).toBe(
        "tensor(x[2],y[2]):{{x:0,y:0}:0.0,{x:0,y:1}:0.0,{x:1,y:0}:5.0,{x:1,y:1}:0.0}"
      );
    });

    it("should be empty for an empty shape", () => {
      expect(Tensor.dense(DENSE, [0, 2], []).size).toBe(0);
    });
  });

  describe("equals", () => {
    const cells = [
      { address: { x: "a", y: "b" }, value: 1 },
      { address: { x: "c", y: "d" }, value: 2 },
    ];

    it("should ignore cell order", () => {
      const reversed = [...cells].reverse();
      expect(new Tensor(SPARSE, cells).equals(new Tensor(SPARSE, reversed))).toBe(true);
    });

    it("should compare values and types", () => {
      const changed = [
        { address: { x: "a", y: "b" }, value: 1 },
        { address: { x: "c", y: "d" }, value: 3 },
      ];
      expect(new Tensor(SPARSE, cells).equals(new Tensor(SPARSE, changed))).toBe(false);
      expect(new Tensor(SPARSE, []).equals(new Tensor(parseTensorType("tensor(x{})"), []))).toBe(false);
    });
  });
});
