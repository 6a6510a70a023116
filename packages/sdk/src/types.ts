/**
 * Core types for docfeed
 */

import type { DocumentId } from "./document-id.js";
import type { Predicate } from "./values/predicate.js";
import type { Tensor } from "./values/tensor.js";

/**
 * A typed field value. The variant always matches the declared type of the
 * field it was decoded for; positions are structs of type "position".
 */
export type FieldValue =
  | { kind: "string"; value: string }
  | { kind: "int"; value: number }
  | { kind: "byte"; value: number }
  | { kind: "long"; value: bigint }
  | { kind: "float"; value: number }
  | { kind: "double"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "raw"; value: Uint8Array }
  | { kind: "struct"; typeName: string; fields: Map<string, FieldValue> }
  | { kind: "array"; items: FieldValue[] }
  | { kind: "map"; entries: MapEntry[] }
  | { kind: "weightedset"; entries: WeightedEntry[] }
  | { kind: "tensor"; tensor: Tensor }
  | { kind: "predicate"; predicate: Predicate };

export type FieldValueKind = FieldValue["kind"];

/**
 * Map entry; keys are unique within a map value
 */
export interface MapEntry {
  key: FieldValue;
  value: FieldValue;
}

/**
 * Weighted set entry; values are unique within a set
 */
export interface WeightedEntry {
  value: FieldValue;
  weight: number;
}

export type ArithmeticOperator = "ADD" | "SUB" | "MUL" | "DIV";

export type TensorModifyOperation = "REPLACE" | "ADD" | "MULTIPLY";

/**
 * A single instruction for changing one field of a stored document
 */
export type ValueUpdate =
  | { kind: "assign"; value: FieldValue }
  | { kind: "clear" }
  /** Array adds carry weight 1 */
  | { kind: "add"; value: FieldValue; weight: number }
  | { kind: "remove"; value: FieldValue }
  /** `element` is an int index for arrays, a key for maps and weighted sets */
  | { kind: "match"; element: FieldValue; update: ValueUpdate }
  | { kind: "arithmetic"; operator: ArithmeticOperator; operand: number }
  | { kind: "tensorModify"; operation: TensorModifyOperation; tensor: Tensor };

export type ValueUpdateKind = ValueUpdate["kind"];

/**
 * All updates for one field, in the order they were written
 */
export interface FieldUpdate {
  field: string;
  updates: ValueUpdate[];
}

export interface PutOperation {
  kind: "put";
  id: DocumentId;
  documentType: string;
  /** Field values in the order they were written */
  fields: Map<string, FieldValue>;
  /** Test-and-set condition, passed through unchanged */
  condition?: string;
}

export interface UpdateOperation {
  kind: "update";
  id: DocumentId;
  documentType: string;
  fieldUpdates: FieldUpdate[];
  createIfNonExistent: boolean;
  condition?: string;
}

export interface RemoveOperation {
  kind: "remove";
  id: DocumentId;
  condition?: string;
}

export type DocumentOperation = PutOperation | UpdateOperation | RemoveOperation;

export type OperationKind = DocumentOperation["kind"];

export const OPERATION_KINDS: readonly OperationKind[] = ["put", "update", "remove"];

export function isOperationKind(value: string): value is OperationKind {
  return (OPERATION_KINDS as readonly string[]).includes(value);
}
