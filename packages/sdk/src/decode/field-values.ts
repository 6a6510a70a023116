/**
 * Schema-directed decoding of field values
 *
 * decodeFieldValue() dispatches on the declared DataType and raises plain
 * errors; decodeField() adds the document and field to them.
 */

import { ConversionError, DocFeedError, FieldDecodeError, UnknownFieldError } from "../errors.js";
import { describeNode, type JsonNode } from "../json/tree.js";
import {
  POSITION_STRUCT,
  dataTypeName,
  type DataType,
  type PrimitiveKind,
  type StructDataType,
} from "../schema/data-types.js";
import type { FieldValue, MapEntry, WeightedEntry } from "../types.js";
import { fieldValueKey } from "../values/field-values.js";
import { parsePredicate } from "../values/predicate.js";
import { decodeTensor } from "./tensor-cells.js";

/**
 * Where a value is being decoded, for error messages
 */
export interface DecodeContext {
  documentId: string;
  field: string;
}

type IntegerKind = "int" | "long" | "byte";

const INTEGER_RANGES: Record<IntegerKind, readonly [bigint, bigint]> = {
  byte: [-128n, 127n],
  int: [-2147483648n, 2147483647n],
  long: [-9223372036854775808n, 9223372036854775807n],
};

const INTEGER_PATTERN = /^[-+]?\d+$/;
const DECIMAL_PATTERN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
// The spellings the feed writer uses for values JSON numbers cannot hold
const NON_FINITE = new Map<string, number>([
  ["NaN", Number.NaN],
  ["Infinity", Number.POSITIVE_INFINITY],
  ["+Infinity", Number.POSITIVE_INFINITY],
  ["-Infinity", Number.NEGATIVE_INFINITY],
]);
const BASE64_PATTERN = /^[A-Za-z0-9+/_-]*={0,2}$/;
const POSITION_PART = /^([NSEW])(\d+(?:\.\d+)?)$/;

/**
 * Decode a field value, reporting failures as FieldDecodeError
 */
export function decodeField(node: JsonNode, type: DataType, context: DecodeContext): FieldValue {
  try {
    return decodeFieldValue(node, type);
  } catch (err) {
    throw toFieldError(err, type, context);
  }
}

/**
 * Attach document and field context to a decode failure.
 * Errors that already carry their own context pass through unchanged.
 */
export function toFieldError(err: unknown, type: DataType, context: DecodeContext): Error {
  if (err instanceof UnknownFieldError && err.location === undefined) {
    return new UnknownFieldError(err.field, err.structure, {
      cause: err,
      location: { ...context, fieldType: dataTypeName(type) },
    });
  }
  if (err instanceof DocFeedError) {
    return err;
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new FieldDecodeError(context.documentId, context.field, dataTypeName(type), reason, {
    cause: err,
  });
}

/**
 * Decode a JSON value against a declared type
 * @throws ConversionError for shape and range problems
 * @throws UnknownFieldError for undeclared struct members
 */
export function decodeFieldValue(node: JsonNode, type: DataType): FieldValue {
  switch (type.kind) {
    case "primitive":
      return decodePrimitive(node, type.name);
    case "struct":
      return decodeStruct(node, type);
    case "array":
      if (node.kind !== "array") {
        throw new ConversionError(`Expected an array, got ${describeNode(node)}`);
      }
      return { kind: "array", items: node.items.map((item) => decodeFieldValue(item, type.element)) };
    case "map":
      return decodeMap(node, type.key, type.value);
    case "weightedset":
      return decodeWeightedSet(node, type.element);
    case "tensor":
      return { kind: "tensor", tensor: decodeTensor(node, type.tensorType) };
    case "raw":
      return { kind: "raw", value: decodeRaw(node) };
    case "position":
      return decodePosition(node);
    case "predicate":
      if (node.kind !== "string") {
        throw new ConversionError(`Expected a predicate string, got ${describeNode(node)}`);
      }
      return { kind: "predicate", predicate: parsePredicate(node.value) };
  }
}

/**
 * Decode a key written as a JSON object key (map keys, weighted set elements)
 */
export function decodeKey(text: string, type: DataType): FieldValue {
  return decodeFieldValue({ kind: "string", value: text }, type);
}

/**
 * Integer conversion shared with the update decoder (weights, array indexes)
 */
export function decodeInteger(node: JsonNode, kind: IntegerKind): bigint {
  let text: string;
  if (node.kind === "number") {
    text = node.raw;
  } else if (node.kind === "string") {
    text = node.value;
  } else {
    throw new ConversionError(`Expected an integer, got ${describeNode(node)}`);
  }

  if (!INTEGER_PATTERN.test(text)) {
    throw forInputString(text);
  }
  const value = BigInt(text);
  const [min, max] = INTEGER_RANGES[kind];
  if (value < min || value > max) {
    throw forInputString(text);
  }
  return value;
}

function forInputString(text: string): ConversionError {
  return new ConversionError(`For input string: "${text}"`);
}

function decodePrimitive(node: JsonNode, kind: PrimitiveKind): FieldValue {
  switch (kind) {
    case "string":
      if (node.kind !== "string") {
        throw new ConversionError(`Expected a string, got ${describeNode(node)}`);
      }
      return { kind: "string", value: node.value };
    case "int":
      return { kind: "int", value: Number(decodeInteger(node, "int")) };
    case "byte":
      return { kind: "byte", value: Number(decodeInteger(node, "byte")) };
    case "long":
      return { kind: "long", value: decodeInteger(node, "long") };
    case "float":
      return { kind: "float", value: Math.fround(decodeFloatingPoint(node)) };
    case "double":
      return { kind: "double", value: decodeFloatingPoint(node) };
    case "bool":
      if (node.kind === "boolean") {
        return { kind: "bool", value: node.value };
      }
      if (node.kind === "string" && (node.value === "true" || node.value === "false")) {
        return { kind: "bool", value: node.value === "true" };
      }
      throw new ConversionError(`Expected a boolean, got ${describeNode(node)}`);
  }
}

function decodeFloatingPoint(node: JsonNode): number {
  if (node.kind === "number") {
    return node.value;
  }
  if (node.kind !== "string") {
    throw new ConversionError(`Expected a number, got ${describeNode(node)}`);
  }
  const named = NON_FINITE.get(node.value);
  if (named !== undefined) {
    return named;
  }
  if (!DECIMAL_PATTERN.test(node.value)) {
    throw forInputString(node.value);
  }
  return Number(node.value);
}

function decodeStruct(node: JsonNode, type: StructDataType): FieldValue {
  if (node.kind !== "object") {
    throw new ConversionError(`Expected a struct object, got ${describeNode(node)}`);
  }
  const fields = new Map<string, FieldValue>();
  for (const [name, member] of node.entries) {
    const memberType = type.fields.get(name);
    if (!memberType) {
      throw new UnknownFieldError(name, type.name);
    }
    if (member.kind === "null") {
      continue;
    }
    fields.set(name, decodeFieldValue(member, memberType));
  }
  return { kind: "struct", typeName: type.name, fields };
}

/**
 * Keeps keys unique; a repeated key replaces the earlier value in place
 */
class UniqueEntries<T> {
  readonly entries: T[] = [];
  #index = new Map<string, number>();

  put(key: FieldValue, entry: T): void {
    const id = fieldValueKey(key);
    const at = this.#index.get(id);
    if (at === undefined) {
      this.#index.set(id, this.entries.length);
      this.entries.push(entry);
    } else {
      this.entries[at] = entry;
    }
  }
}

function decodeMap(node: JsonNode, keyType: DataType, valueType: DataType): FieldValue {
  const entries = new UniqueEntries<MapEntry>();

  if (node.kind === "object") {
    for (const [keyText, valueNode] of node.entries) {
      const key = decodeKey(keyText, keyType);
      entries.put(key, { key, value: decodeFieldValue(valueNode, valueType) });
    }
    return { kind: "map", entries: entries.entries };
  }

  if (node.kind === "array") {
    for (const item of node.items) {
      const entry = decodeLegacyMapEntry(item, keyType, valueType);
      entries.put(entry.key, entry);
    }
    return { kind: "map", entries: entries.entries };
  }

  throw new ConversionError(`Expected a map object or an array of key/value objects, got ${describeNode(node)}`);
}

/**
 * `{ "key": K, "value": V }`
 */
function decodeLegacyMapEntry(node: JsonNode, keyType: DataType, valueType: DataType): MapEntry {
  if (node.kind !== "object") {
    throw new ConversionError(`Expected a map entry object, got ${describeNode(node)}`);
  }
  let key: FieldValue | undefined;
  let value: FieldValue | undefined;
  for (const [name, child] of node.entries) {
    if (name === "key") {
      key = decodeFieldValue(child, keyType);
    } else if (name === "value") {
      value = decodeFieldValue(child, valueType);
    } else {
      throw new ConversionError(`Unknown key '${name}' in map entry, expected 'key' or 'value'`);
    }
  }
  if (!key || !value) {
    throw new ConversionError(`Map entry must have both 'key' and 'value'`);
  }
  return { key, value };
}

function decodeWeightedSet(node: JsonNode, elementType: DataType): FieldValue {
  if (node.kind !== "object") {
    throw new ConversionError(`Expected a weighted set object, got ${describeNode(node)}`);
  }
  const entries = new UniqueEntries<WeightedEntry>();
  for (const [elementText, weightNode] of node.entries) {
    const value = decodeKey(elementText, elementType);
    entries.put(value, { value, weight: Number(decodeInteger(weightNode, "int")) });
  }
  return { kind: "weightedset", entries: entries.entries };
}

function decodeRaw(node: JsonNode): Uint8Array {
  if (node.kind !== "string") {
    throw new ConversionError(`Expected a base64 string, got ${describeNode(node)}`);
  }
  const text = node.value.replace(/\s+/g, "");
  if (!BASE64_PATTERN.test(text)) {
    throw new ConversionError(`Invalid base64 data '${node.value}'`);
  }
  return new Uint8Array(Buffer.from(text, "base64"));
}

/**
 * `N63.429722;E10.393333` or `{ "x": 10393333, "y": 63429722 }`
 */
function decodePosition(node: JsonNode): FieldValue {
  if (node.kind === "object") {
    return decodeStruct(node, POSITION_STRUCT);
  }
  if (node.kind !== "string") {
    throw new ConversionError(`Expected a position string, got ${describeNode(node)}`);
  }

  const invalid = () =>
    new ConversionError(`Invalid position '${node.value}', expected e.g. 'N63.429722;E10.393333'`);

  let x: number | undefined;
  let y: number | undefined;
  const parts = node.value.split(";");
  if (parts.length !== 2) {
    throw invalid();
  }

  for (const part of parts) {
    const match = POSITION_PART.exec(part.trim());
    if (!match?.[1] || !match[2]) {
      throw invalid();
    }
    const hemisphere = match[1];
    const micro = Math.round(Number.parseFloat(match[2]) * 1_000_000);
    const signed = hemisphere === "S" || hemisphere === "W" ? -micro : micro;

    if (hemisphere === "N" || hemisphere === "S") {
      if (y !== undefined) throw invalid();
      y = signed;
    } else {
      if (x !== undefined) throw invalid();
      x = signed;
    }
  }

  if (x === undefined || y === undefined) {
    throw invalid();
  }
  return {
    kind: "struct",
    typeName: POSITION_STRUCT.name,
    fields: new Map<string, FieldValue>([
      ["x", { kind: "int", value: x }],
      ["y", { kind: "int", value: y }],
    ]),
  };
}
