/**
 * Feed writer: renders document operations back into feed JSON
 *
 * Reading the written JSON with a FeedReader over the same registry yields
 * equal operations.
 */

import { FeedEncodeError, UnknownDocumentTypeError } from "../errors.js";
import { stableStringify, type JsonValue } from "../format.js";
import { DataTypes, dataTypeName, type DataType } from "../schema/data-types.js";
import type { DocumentTypeRegistry } from "../schema/registry.js";
import type { DocumentOperation, FieldUpdate, FieldValue, ValueUpdate } from "../types.js";
import { formatPredicate } from "../values/predicate.js";
import type { Tensor } from "../values/tensor.js";

const ARITHMETIC_KEYS = {
  ADD: "increment",
  SUB: "decrement",
  MUL: "multiply",
  DIV: "divide",
} as const;

/**
 * Encode a field value in the form the value decoder reads
 * @throws FeedEncodeError for weighted set elements that cannot be JSON keys
 */
export function encodeFieldValue(value: FieldValue): JsonValue {
  switch (value.kind) {
    case "string":
    case "bool":
      return value.value;
    case "int":
    case "byte":
    case "float":
    case "double":
      return encodeNumber(value.value);
    case "long":
      return Number.isSafeInteger(Number(value.value)) ? Number(value.value) : value.value.toString();
    case "raw":
      return Buffer.from(value.value).toString("base64");
    case "struct": {
      const out: { [key: string]: JsonValue } = {};
      for (const [name, member] of value.fields) {
        out[name] = encodeFieldValue(member);
      }
      return out;
    }
    case "array":
      return value.items.map(encodeFieldValue);
    case "map":
      if (value.entries.every((e) => keyText(e.key) !== undefined)) {
        const out: { [key: string]: JsonValue } = {};
        for (const entry of value.entries) {
          out[keyText(entry.key) ?? ""] = encodeFieldValue(entry.value);
        }
        return out;
      }
      // Keys that cannot be JSON object keys use the key/value list form
      return value.entries.map((e) => ({ key: encodeFieldValue(e.key), value: encodeFieldValue(e.value) }));
    case "weightedset": {
      const out: { [key: string]: JsonValue } = {};
      for (const entry of value.entries) {
        out[requireKeyText(entry.value)] = entry.weight;
      }
      return out;
    }
    case "tensor":
      return encodeTensor(value.tensor);
    case "predicate":
      return formatPredicate(value.predicate);
  }
}

/**
 * Encode the updates of one field as an operator object.
 * Consecutive adds or removes share one operator entry.
 * @throws FeedEncodeError when an operator would repeat
 */
export function encodeFieldUpdate(update: FieldUpdate, type: DataType): JsonValue {
  const out: { [key: string]: JsonValue } = {};
  let previous: string | undefined;

  for (const valueUpdate of update.updates) {
    const [key, operand] = encodeValueUpdate(valueUpdate, type, update.field);
    const existing = out[key];

    if (existing !== undefined && key === previous && (key === "add" || key === "remove")) {
      out[key] = mergeOperands(existing, operand);
    } else if (existing !== undefined) {
      throw new FeedEncodeError(
        `Cannot encode updates of field '${update.field}': '${key}' appears more than once`
      );
    } else {
      out[key] = operand;
    }
    previous = key;
  }
  return out;
}

export class FeedWriter {
  readonly #registry: DocumentTypeRegistry;

  constructor(registry: DocumentTypeRegistry) {
    this.#registry = registry;
  }

  /**
   * Encode one operation as a feed object
   */
  encode(operation: DocumentOperation): JsonValue {
    const out: { [key: string]: JsonValue } = {};
    out[operation.kind] = operation.id.toString();
    if (operation.condition !== undefined) {
      out.condition = operation.condition;
    }

    switch (operation.kind) {
      case "put": {
        const fields: { [key: string]: JsonValue } = {};
        for (const [name, value] of operation.fields) {
          fields[name] = encodeFieldValue(value);
        }
        out.fields = fields;
        break;
      }
      case "update": {
        if (operation.createIfNonExistent) {
          out.create = true;
        }
        const type = this.#registry.resolve(operation.documentType);
        if (!type) {
          throw new UnknownDocumentTypeError(operation.documentType);
        }
        const fields: { [key: string]: JsonValue } = {};
        for (const update of operation.fieldUpdates) {
          const fieldType = type.fields.get(update.field);
          if (!fieldType) {
            throw new FeedEncodeError(`Field '${update.field}' is not declared in ${type.name}`);
          }
          fields[update.field] = encodeFieldUpdate(update, fieldType);
        }
        out.fields = fields;
        break;
      }
      case "remove":
        break;
    }
    return out;
  }

  /**
   * Write one operation as a JSON object
   */
  writeOperation(operation: DocumentOperation, indent = 2): string {
    return stableStringify(this.encode(operation), indent, "preserve");
  }

  /**
   * Write operations as a feed array
   */
  writeFeed(operations: Iterable<DocumentOperation>, indent = 2): string {
    const feed = Array.from(operations, (op) => this.encode(op));
    return stableStringify(feed, indent, "preserve");
  }
}

function encodeValueUpdate(update: ValueUpdate, type: DataType, field: string): [string, JsonValue] {
  switch (update.kind) {
    case "assign":
      return ["assign", encodeFieldValue(update.value)];
    case "clear":
      return ["assign", null];
    case "add":
      if (type.kind === "weightedset") {
        return ["add", { [requireKeyText(update.value)]: update.weight }];
      }
      return ["add", [encodeFieldValue(update.value)]];
    case "remove":
      return ["remove", [encodeFieldValue(update.value)]];
    case "match": {
      const [key, operand] = encodeValueUpdate(update.update, matchedType(type, field), field);
      return ["match", { element: encodeFieldValue(update.element), [key]: operand }];
    }
    case "arithmetic":
      return [ARITHMETIC_KEYS[update.operator], encodeNumber(update.operand)];
    case "tensorModify":
      return [
        "modify",
        {
          operation: update.operation.toLowerCase(),
          cells: tensorCells(update.tensor),
        },
      ];
  }
}

/**
 * Type of the element a match update targets
 */
function matchedType(type: DataType, field: string): DataType {
  switch (type.kind) {
    case "array":
      return type.element;
    case "map":
      return type.value;
    case "weightedset":
      return DataTypes.INT;
    default:
      throw new FeedEncodeError(
        `Field '${field}' of type '${dataTypeName(type)}' cannot have match updates`
      );
  }
}

function mergeOperands(existing: JsonValue, operand: JsonValue): JsonValue {
  if (Array.isArray(existing) && Array.isArray(operand)) {
    return [...existing, ...operand];
  }
  if (isJsonObject(existing) && isJsonObject(operand)) {
    return { ...existing, ...operand };
  }
  throw new FeedEncodeError("Cannot merge operands of different shapes");
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Non-finite numbers are written as the strings the decoders accept
 */
function encodeNumber(value: number): JsonValue {
  return Number.isFinite(value) ? value : String(value);
}

/**
 * Text of a primitive value when used as a JSON object key
 */
function keyText(value: FieldValue): string | undefined {
  switch (value.kind) {
    case "string":
      return value.value;
    case "int":
    case "byte":
    case "float":
    case "double":
    case "bool":
    case "long":
      return String(value.value);
    default:
      return undefined;
  }
}

function requireKeyText(value: FieldValue): string {
  const text = keyText(value);
  if (text === undefined) {
    throw new FeedEncodeError(`A ${value.kind} value cannot be written as a weighted set element`);
  }
  return text;
}

function tensorCells(tensor: Tensor): JsonValue {
  return tensor.cells().map((cell) => ({
    address: { ...cell.address },
    value: encodeNumber(cell.value),
  }));
}

function encodeTensor(tensor: Tensor): JsonValue {
  return { cells: tensorCells(tensor) };
}
