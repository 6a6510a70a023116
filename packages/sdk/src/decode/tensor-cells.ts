/**
 * Tensor decoding from feed JSON
 *
 * A tensor is written as `{ "cells": [{ "address": { "x": "a" }, "value": 2.0 }] }`,
 * optionally with a `dimensions` list. Indexed tensors may also give their
 * cells as nested arrays in dimension order: `{ "cells": [[1, 2], [3, 4]] }`.
 */

import { ConversionError } from "../errors.js";
import { describeNode, type JsonNode } from "../json/tree.js";
import {
  formatTensorType,
  isIndexedTensorType,
  toMappedTensorType,
  type TensorDimension,
  type TensorType,
} from "../schema/tensor-type.js";
import { Tensor, type TensorCell } from "../values/tensor.js";

/** Largest cell count a dense indexed tensor may be filled out to */
export const MAX_DENSE_CELLS = 1 << 20;

/**
 * Decode a tensor field value
 * @throws ConversionError
 */
export function decodeTensor(node: JsonNode, type: TensorType): Tensor {
  if (node.kind !== "object") {
    throw new ConversionError(`Expected a tensor object, got ${describeNode(node)}`);
  }

  let cellsNode: JsonNode | undefined;
  for (const [key, value] of node.entries) {
    switch (key) {
      case "cells":
        cellsNode = value;
        break;
      case "dimensions":
        checkDimensionList(value);
        break;
      default:
        throw new ConversionError(`Unknown key '${key}' in tensor, expected 'cells' or 'dimensions'`);
    }
  }

  const indexed = isIndexedTensorType(type);

  if (cellsNode === undefined) {
    if (indexed) {
      throw missingValue(type);
    }
    return new Tensor(type);
  }

  if (cellsNode.kind !== "array") {
    throw new ConversionError(`Tensor cells must be an array, got ${describeNode(cellsNode)}`);
  }

  if (indexed && cellsNode.items.length > 0 && isDenseForm(cellsNode.items)) {
    return decodeDenseCells(cellsNode.items, type);
  }

  const cells = decodeCellList(cellsNode.items, type);
  if (!indexed) {
    return new Tensor(type, cells);
  }
  if (cells.length === 0) {
    throw missingValue(type);
  }
  return Tensor.dense(type, checkDenseSize(type, inferShape(type, cells)), cells);
}

/**
 * Decode the cell list of a tensor modify update. Cells are addressed with
 * labels only, so the result has the mapped form of the field's type.
 * @throws ConversionError
 */
export function decodeTensorModifyCells(node: JsonNode, type: TensorType): Tensor {
  if (node.kind !== "array") {
    throw new ConversionError(`Tensor cells must be an array, got ${describeNode(node)}`);
  }
  return new Tensor(toMappedTensorType(type), decodeCellList(node.items, type));
}

function missingValue(type: TensorType): ConversionError {
  return new ConversionError(`Indexed tensor of type '${formatTensorType(type)}' must have a value`);
}

function checkDimensionList(node: JsonNode): void {
  if (node.kind !== "array" || node.items.some((item) => item.kind !== "string")) {
    throw new ConversionError(`Tensor 'dimensions' must be an array of strings, got ${describeNode(node)}`);
  }
}

function isDenseForm(items: JsonNode[]): boolean {
  return items.every((item) => item.kind === "array" || item.kind === "number");
}

function decodeCellList(items: JsonNode[], type: TensorType): TensorCell[] {
  return items.map((item) => decodeCell(item, type));
}

function decodeCell(node: JsonNode, type: TensorType): TensorCell {
  if (node.kind !== "object") {
    throw new ConversionError(
      `Tensor cell must be an object with 'address' and 'value', got ${describeNode(node)}`
    );
  }

  let address: Record<string, string> | undefined;
  let value: number | undefined;

  for (const [key, child] of node.entries) {
    switch (key) {
      case "address":
        address = decodeAddress(child, type);
        break;
      case "value":
        if (child.kind !== "number") {
          throw new ConversionError(`Tensor cell value must be a number, got ${describeNode(child)}`);
        }
        value = child.value;
        break;
      default:
        throw new ConversionError(`Unknown key '${key}' in tensor cell, expected 'address' or 'value'`);
    }
  }

  if (address === undefined) {
    throw new ConversionError("Tensor cell is missing 'address'");
  }
  if (value === undefined) {
    throw new ConversionError("Tensor cell is missing 'value'");
  }
  return { address, value };
}

function decodeAddress(node: JsonNode, type: TensorType): Record<string, string> {
  if (node.kind !== "object") {
    throw new ConversionError(`Tensor cell address must be an object, got ${describeNode(node)}`);
  }

  const address: Record<string, string> = {};
  for (const [name, labelNode] of node.entries) {
    const dim = type.dimensions.find((d) => d.name === name);
    if (!dim) {
      throw new ConversionError(`Dimension '${name}' is not in ${formatTensorType(type)}`);
    }
    if (labelNode.kind !== "string") {
      throw new ConversionError(`Label of dimension '${name}' must be a string, got ${describeNode(labelNode)}`);
    }
    if (dim.kind === "indexed") {
      checkIndex(dim, labelNode.value);
    }
    address[name] = labelNode.value;
  }

  for (const dim of type.dimensions) {
    if (!Object.hasOwn(address, dim.name)) {
      throw new ConversionError(`Address is missing dimension '${dim.name}' of ${formatTensorType(type)}`);
    }
  }
  return address;
}

function checkIndex(dim: TensorDimension, label: string): number {
  if (!/^\d+$/.test(label)) {
    throw new ConversionError(`Label '${label}' of indexed dimension '${dim.name}' must be a non-negative integer`);
  }
  const index = Number.parseInt(label, 10);
  if (dim.size !== undefined && index >= dim.size) {
    throw new ConversionError(`Index ${index} is out of bounds for dimension '${dim.name}' of size ${dim.size}`);
  }
  return index;
}

/**
 * Bound sizes are kept; unbound ones are the largest index used plus one
 */
function inferShape(type: TensorType, cells: TensorCell[]): number[] {
  return type.dimensions.map((dim) => {
    if (dim.size !== undefined) {
      return dim.size;
    }
    let max = -1;
    for (const cell of cells) {
      max = Math.max(max, checkIndex(dim, cell.address[dim.name] ?? ""));
    }
    return max + 1;
  });
}

function checkDenseSize(type: TensorType, shape: number[]): number[] {
  const total = shape.reduce((product, size) => product * size, 1);
  if (total > MAX_DENSE_CELLS) {
    throw new ConversionError(
      `Indexed tensor of type '${formatTensorType(type)}' would have ${total} cells, more than the limit of ${MAX_DENSE_CELLS}`
    );
  }
  return shape;
}

/**
 * Nested arrays, outermost level is the first dimension in name order
 */
function decodeDenseCells(items: JsonNode[], type: TensorType): Tensor {
  const dims = type.dimensions;
  const shape = dims.map((dim) => dim.size ?? 0);
  const cells: TensorCell[] = [];

  const walk = (nodes: JsonNode[], depth: number, prefix: number[]): void => {
    const dim = dims[depth];
    if (!dim) {
      return;
    }
    if (dim.size !== undefined && nodes.length > dim.size) {
      throw new ConversionError(
        `Dimension '${dim.name}' has size ${dim.size} but ${nodes.length} values were given`
      );
    }
    if (dim.size === undefined) {
      shape[depth] = Math.max(shape[depth] ?? 0, nodes.length);
    }

    const last = depth === dims.length - 1;
    nodes.forEach((node, index) => {
      const position = [...prefix, index];
      if (last) {
        if (node.kind !== "number") {
          throw new ConversionError(`Dense tensor value must be a number, got ${describeNode(node)}`);
        }
        const address: Record<string, string> = {};
        dims.forEach((d, i) => {
          address[d.name] = String(position[i]);
        });
        cells.push({ address, value: node.value });
      } else {
        if (node.kind !== "array") {
          throw new ConversionError(
            `Expected an array for dimension '${dims[depth + 1]?.name ?? ""}', got ${describeNode(node)}`
          );
        }
        walk(node.items, depth + 1, position);
      }
    });
  };

  walk(items, 0, []);
  if (cells.length === 0) {
    throw missingValue(type);
  }
  return Tensor.dense(type, checkDenseSize(type, shape), cells);
}
