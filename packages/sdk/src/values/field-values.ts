/**
 * Constructors and comparison helpers for field values
 */

import type { FieldValue, MapEntry, WeightedEntry } from "../types.js";
import type { Tensor } from "./tensor.js";
import { formatPredicate, type Predicate } from "./predicate.js";
import { formatTensorType } from "../schema/tensor-type.js";

export const FieldValues = {
  string(value: string): FieldValue {
    return { kind: "string", value };
  },
  int(value: number): FieldValue {
    return { kind: "int", value };
  },
  byte(value: number): FieldValue {
    return { kind: "byte", value };
  },
  long(value: bigint): FieldValue {
    return { kind: "long", value };
  },
  float(value: number): FieldValue {
    return { kind: "float", value };
  },
  double(value: number): FieldValue {
    return { kind: "double", value };
  },
  bool(value: boolean): FieldValue {
    return { kind: "bool", value };
  },
  raw(value: Uint8Array): FieldValue {
    return { kind: "raw", value };
  },
  struct(typeName: string, fields: Record<string, FieldValue> = {}): FieldValue {
    return { kind: "struct", typeName, fields: new Map(Object.entries(fields)) };
  },
  array(items: FieldValue[]): FieldValue {
    return { kind: "array", items };
  },
  map(entries: MapEntry[]): FieldValue {
    return { kind: "map", entries };
  },
  weightedSet(entries: WeightedEntry[]): FieldValue {
    return { kind: "weightedset", entries };
  },
  tensor(tensor: Tensor): FieldValue {
    return { kind: "tensor", tensor };
  },
  predicate(predicate: Predicate): FieldValue {
    return { kind: "predicate", predicate };
  },
  /** Geo position in micro-degrees */
  position(x: number, y: number): FieldValue {
    return FieldValues.struct("position", { x: FieldValues.int(x), y: FieldValues.int(y) });
  },
};

/**
 * Identity key of a value: equal values have equal keys.
 * Map, weighted set and struct keys ignore entry order.
 */
export function fieldValueKey(value: FieldValue): string {
  switch (value.kind) {
    case "string":
      return `s:${JSON.stringify(value.value)}`;
    case "int":
    case "byte":
    case "float":
    case "double":
    case "bool":
      return `${value.kind}:${String(value.value)}`;
    case "long":
      return `long:${value.value.toString()}`;
    case "raw":
      return `raw:${Buffer.from(value.value).toString("base64")}`;
    case "struct": {
      const members = Array.from(value.fields, ([name, member]) => `${JSON.stringify(name)}=${fieldValueKey(member)}`);
      return `struct<${value.typeName}>{${members.sort().join(",")}}`;
    }
    case "array":
      return `array[${value.items.map(fieldValueKey).join(",")}]`;
    case "map": {
      const entries = value.entries.map((e) => `${fieldValueKey(e.key)}=>${fieldValueKey(e.value)}`);
      return `map{${entries.sort().join(",")}}`;
    }
    case "weightedset": {
      const entries = value.entries.map((e) => `${fieldValueKey(e.value)}*${e.weight}`);
      return `wset{${entries.sort().join(",")}}`;
    }
    case "tensor":
      return `tensor:${canonicalTensor(value.tensor)}`;
    case "predicate":
      return `predicate:${formatPredicate(value.predicate)}`;
  }
}

export function fieldValueEquals(a: FieldValue, b: FieldValue): boolean {
  return fieldValueKey(a) === fieldValueKey(b);
}

/**
 * Look up a map value by key
 */
export function mapGet(map: FieldValue, key: FieldValue): FieldValue | undefined {
  if (map.kind !== "map") {
    return undefined;
  }
  const wanted = fieldValueKey(key);
  return map.entries.find((e) => fieldValueKey(e.key) === wanted)?.value;
}

/**
 * Weight of an element in a weighted set
 */
export function weightOf(set: FieldValue, element: FieldValue): number | undefined {
  if (set.kind !== "weightedset") {
    return undefined;
  }
  const wanted = fieldValueKey(element);
  return set.entries.find((e) => fieldValueKey(e.value) === wanted)?.weight;
}

/**
 * Short one-line rendering for logs and CLI output
 */
export function formatFieldValue(value: FieldValue): string {
  switch (value.kind) {
    case "string":
      return JSON.stringify(value.value);
    case "int":
    case "byte":
    case "float":
    case "double":
    case "bool":
    case "long":
      return String(value.value);
    case "raw":
      return `raw(${value.value.length} bytes)`;
    case "struct":
      return `${value.typeName}{${Array.from(value.fields, ([k, v]) => `${k}:${formatFieldValue(v)}`).join(",")}}`;
    case "array":
      return `[${value.items.map(formatFieldValue).join(",")}]`;
    case "map":
      return `{${value.entries.map((e) => `${formatFieldValue(e.key)}:${formatFieldValue(e.value)}`).join(",")}}`;
    case "weightedset":
      return `{${value.entries.map((e) => `${formatFieldValue(e.value)}:${e.weight}`).join(",")}}`;
    case "tensor":
      return value.tensor.toString();
    case "predicate":
      return formatPredicate(value.predicate);
  }
}

function canonicalTensor(tensor: Tensor): string {
  const cells = tensor
    .cells()
    .map((cell) => `${JSON.stringify(cell.address, Object.keys(cell.address).sort())}:${cell.value}`)
    .sort();
  return `${formatTensorType(tensor.type)}{${cells.join(",")}}`;
}
