/**
 * Decoding of field update operators
 *
 * @example { "assign": "x" }
 * @example { "add": { "tag": 3 } }
 * @example { "match": { "element": 2, "increment": 1 } }
 * @example { "modify": { "operation": "add", "cells": [...] } }
 */

import { ConversionError, StructuralError, UnsupportedOperatorError } from "../errors.js";
import { describeNode, type JsonNode } from "../json/tree.js";
import { DataTypes, dataTypeName, isNumericType, type DataType } from "../schema/data-types.js";
import type { ArithmeticOperator, FieldValue, TensorModifyOperation, ValueUpdate } from "../types.js";
import { decodeFieldValue, decodeInteger, decodeKey, toFieldError, type DecodeContext } from "./field-values.js";
import { decodeTensorModifyCells } from "./tensor-cells.js";

const ARITHMETIC_OPERATORS = new Map<string, ArithmeticOperator>([
  ["increment", "ADD"],
  ["decrement", "SUB"],
  ["multiply", "MUL"],
  ["divide", "DIV"],
]);

const MODIFY_OPERATIONS = new Map<string, TensorModifyOperation>([
  ["replace", "REPLACE"],
  ["add", "ADD"],
  ["multiply", "MULTIPLY"],
]);

/**
 * Decode the operator object of one field into value updates, in the order written
 */
export function decodeValueUpdates(node: JsonNode, type: DataType, context: DecodeContext): ValueUpdate[] {
  try {
    if (node.kind !== "object") {
      throw new ConversionError(`Expected an object of update operations, got ${describeNode(node)}`);
    }
    const updates: ValueUpdate[] = [];
    for (const [operator, operand] of node.entries) {
      updates.push(...decodeOperator(operator, operand, type, context));
    }
    return updates;
  } catch (err) {
    throw toFieldError(err, type, context);
  }
}

function decodeOperator(
  operator: string,
  operand: JsonNode,
  type: DataType,
  context: DecodeContext
): ValueUpdate[] {
  const arithmetic = ARITHMETIC_OPERATORS.get(operator);
  if (arithmetic) {
    return [decodeArithmetic(operator, arithmetic, operand, type, context)];
  }

  switch (operator) {
    case "assign":
      // null clears the field, whatever its type
      if (operand.kind === "null") {
        return [{ kind: "clear" }];
      }
      return [{ kind: "assign", value: decodeFieldValue(operand, type) }];
    case "clear":
      return [{ kind: "clear" }];
    case "add":
      return decodeAdd(operand, type, context);
    case "remove":
      return decodeRemove(operand, type, context);
    case "match":
      return decodeMatch(operand, type, context);
    case "modify":
      return [decodeModify(operand, type, context)];
    default:
      throw new UnsupportedOperatorError(
        `Unknown update operation '${operator}' for field '${context.field}'`
      );
  }
}

function notApplicable(
  operator: string,
  expected: string,
  type: DataType,
  context: DecodeContext
): UnsupportedOperatorError {
  return new UnsupportedOperatorError(
    `'${operator}' can only be applied to ${expected} fields. ` +
      `Field '${context.field}' is of type '${dataTypeName(type)}'`
  );
}

function decodeArithmetic(
  name: string,
  operator: ArithmeticOperator,
  operand: JsonNode,
  type: DataType,
  context: DecodeContext
): ValueUpdate {
  if (!isNumericType(type)) {
    throw notApplicable(name, "numeric", type, context);
  }
  if (operand.kind !== "number") {
    throw new ConversionError(`Operand of '${name}' must be a number, got ${describeNode(operand)}`);
  }
  return { kind: "arithmetic", operator, operand: operand.value };
}

/**
 * Arrays take a list of elements; weighted sets take `{ element: weight }`
 */
function decodeAdd(operand: JsonNode, type: DataType, context: DecodeContext): ValueUpdate[] {
  switch (type.kind) {
    case "array":
      if (operand.kind !== "array") {
        throw new ConversionError(`Operand of 'add' must be an array, got ${describeNode(operand)}`);
      }
      return operand.items.map((item): ValueUpdate => ({
        kind: "add",
        value: decodeFieldValue(item, type.element),
        weight: 1,
      }));
    case "weightedset":
      if (operand.kind !== "object") {
        throw new ConversionError(
          `Operand of 'add' must be an object of element weights, got ${describeNode(operand)}`
        );
      }
      return operand.entries.map(([element, weight]): ValueUpdate => ({
        kind: "add",
        value: decodeKey(element, type.element),
        weight: Number(decodeInteger(weight, "int")),
      }));
    default:
      throw notApplicable("add", "array or weighted set", type, context);
  }
}

/**
 * Arrays take a list of values, maps a list of keys, weighted sets either
 */
function decodeRemove(operand: JsonNode, type: DataType, context: DecodeContext): ValueUpdate[] {
  let keyType: DataType;
  switch (type.kind) {
    case "array":
    case "weightedset":
      keyType = type.element;
      break;
    case "map":
      keyType = type.key;
      break;
    default:
      throw notApplicable("remove", "array, map or weighted set", type, context);
  }

  if (operand.kind === "array") {
    return operand.items.map((item): ValueUpdate => ({
      kind: "remove",
      value: decodeFieldValue(item, keyType),
    }));
  }
  if (operand.kind === "object" && type.kind === "weightedset") {
    return operand.entries.map(([element]): ValueUpdate => ({
      kind: "remove",
      value: decodeKey(element, keyType),
    }));
  }
  throw new ConversionError(`Operand of 'remove' must be an array, got ${describeNode(operand)}`);
}

/**
 * `{ "element": <index or key>, "<operator>": <operand> }`
 */
function decodeMatch(operand: JsonNode, type: DataType, context: DecodeContext): ValueUpdate[] {
  if (operand.kind !== "object") {
    throw new ConversionError(`Operand of 'match' must be an object, got ${describeNode(operand)}`);
  }

  let elementNode: JsonNode | undefined;
  const nested: Array<[string, JsonNode]> = [];
  for (const [key, value] of operand.entries) {
    if (key === "element") {
      elementNode = value;
    } else {
      nested.push([key, value]);
    }
  }

  if (elementNode === undefined) {
    throw new StructuralError(`Match update for field '${context.field}' does not contain an 'element'`);
  }
  const [operation, ...extra] = nested;
  if (!operation) {
    throw new StructuralError(`Match update for field '${context.field}' does not contain an update operation`);
  }
  if (extra.length > 0) {
    throw new StructuralError(
      `Match update for field '${context.field}' must contain exactly one update operation, ` +
        `got ${nested.map(([key]) => `'${key}'`).join(", ")}`
    );
  }

  let element: FieldValue;
  let elementType: DataType;
  switch (type.kind) {
    case "array":
      element = { kind: "int", value: Number(decodeInteger(elementNode, "int")) };
      elementType = type.element;
      break;
    case "map":
      element = decodeMatchKey(elementNode, type.key);
      elementType = type.value;
      break;
    case "weightedset":
      element = decodeMatchKey(elementNode, type.element);
      elementType = DataTypes.INT;
      break;
    default:
      throw notApplicable("match", "array, map or weighted set", type, context);
  }

  const [name, nestedOperand] = operation;
  return decodeOperator(name, nestedOperand, elementType, context).map((update): ValueUpdate => ({
    kind: "match",
    element,
    update,
  }));
}

function decodeMatchKey(node: JsonNode, keyType: DataType): FieldValue {
  // Numeric keys may be written either as numbers or as strings
  return node.kind === "string" ? decodeKey(node.value, keyType) : decodeFieldValue(node, keyType);
}

/**
 * `{ "operation": "replace" | "add" | "multiply", "cells": [...] }`
 */
function decodeModify(operand: JsonNode, type: DataType, context: DecodeContext): ValueUpdate {
  if (type.kind !== "tensor") {
    throw new UnsupportedOperatorError(
      `A modify update can only be applied to tensor fields. ` +
        `Field '${context.field}' is of type '${dataTypeName(type)}'`
    );
  }
  if (operand.kind !== "object") {
    throw new ConversionError(`Operand of 'modify' must be an object, got ${describeNode(operand)}`);
  }

  let operation: TensorModifyOperation | undefined;
  let cells: JsonNode | undefined;
  for (const [key, value] of operand.entries) {
    switch (key) {
      case "operation": {
        const text = value.kind === "string" ? value.value : describeNode(value);
        operation = MODIFY_OPERATIONS.get(text.toLowerCase());
        if (!operation) {
          throw new UnsupportedOperatorError(
            `Unknown operation '${text}' in modify update for field '${context.field}'`
          );
        }
        break;
      }
      case "cells":
        cells = value;
        break;
      default:
        throw new UnsupportedOperatorError(
          `Unknown JSON string '${key}' in modify update for field '${context.field}'`
        );
    }
  }

  if (!operation) {
    throw new StructuralError(`Modify update for field '${context.field}' does not contain an operation`);
  }
  if (!cells) {
    throw new StructuralError(`Modify update for field '${context.field}' does not contain tensor cells`);
  }
  return { kind: "tensorModify", operation, tensor: decodeTensorModifyCells(cells, type.tensorType) };
}
