/**
 * Field type descriptors
 *
 * A closed union that the value and update decoders match on exhaustively.
 */

import { formatTensorType, parseTensorType, type TensorType } from "./tensor-type.js";

export type PrimitiveKind = "string" | "int" | "long" | "byte" | "float" | "double" | "bool";

export interface StructDataType {
  kind: "struct";
  name: string;
  fields: ReadonlyMap<string, DataType>;
}

export type DataType =
  | { kind: "primitive"; name: PrimitiveKind }
  | StructDataType
  | { kind: "array"; element: DataType }
  | { kind: "map"; key: DataType; value: DataType }
  | { kind: "weightedset"; element: DataType }
  | { kind: "tensor"; tensorType: TensorType }
  | { kind: "raw" }
  | { kind: "position" }
  | { kind: "predicate" };

export type DataTypeKind = DataType["kind"];

/**
 * A named document type and its fields, in declaration order
 */
export interface DocumentType {
  name: string;
  fields: ReadonlyMap<string, DataType>;
}

const primitive = (name: PrimitiveKind): DataType => ({ kind: "primitive", name });
const RAW: DataType = { kind: "raw" };
const POSITION: DataType = { kind: "position" };
const PREDICATE: DataType = { kind: "predicate" };

/**
 * Struct backing geo positions: integer micro-degrees, x = longitude, y = latitude
 */
export const POSITION_STRUCT: StructDataType = {
  kind: "struct",
  name: "position",
  fields: new Map<string, DataType>([
    ["x", primitive("int")],
    ["y", primitive("int")],
  ]),
};

export const DataTypes = {
  STRING: primitive("string"),
  INT: primitive("int"),
  LONG: primitive("long"),
  BYTE: primitive("byte"),
  FLOAT: primitive("float"),
  DOUBLE: primitive("double"),
  BOOL: primitive("bool"),
  RAW,
  POSITION,
  PREDICATE,

  array(element: DataType): DataType {
    return { kind: "array", element };
  },

  map(key: DataType, value: DataType): DataType {
    return { kind: "map", key, value };
  },

  weightedSet(element: DataType): DataType {
    return { kind: "weightedset", element };
  },

  tensor(spec: string | TensorType): DataType {
    return { kind: "tensor", tensorType: typeof spec === "string" ? parseTensorType(spec) : spec };
  },

  struct(name: string, fields: Record<string, DataType>): StructDataType {
    return { kind: "struct", name, fields: new Map(Object.entries(fields)) };
  },
};

/**
 * Build a document type from a field record (insertion order is kept)
 */
export function defineDocumentType(name: string, fields: Record<string, DataType>): DocumentType {
  return { name, fields: new Map(Object.entries(fields)) };
}

/**
 * Type name as used in error messages
 */
export function dataTypeName(type: DataType): string {
  switch (type.kind) {
    case "primitive":
      return type.name;
    case "struct":
      return type.name;
    case "array":
      return `Array<${dataTypeName(type.element)}>`;
    case "map":
      return `Map<${dataTypeName(type.key)},${dataTypeName(type.value)}>`;
    case "weightedset":
      return `WeightedSet<${dataTypeName(type.element)}>`;
    case "tensor":
      return formatTensorType(type.tensorType);
    case "raw":
      return "raw";
    case "position":
      return "position";
    case "predicate":
      return "predicate";
  }
}

export function isNumericType(type: DataType): boolean {
  return type.kind === "primitive" && type.name !== "string" && type.name !== "bool";
}
