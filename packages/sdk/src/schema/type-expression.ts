/**
 * Field type expressions used in document type definition files
 *
 * @example "array<string>", "map<string,array<int>>", "weightedset<string>",
 *          "tensor<float>(x[3])", "position", or the name of a declared struct
 */

import { DataTypes, type DataType, type PrimitiveKind, type StructDataType } from "./data-types.js";
import { parseTensorType } from "./tensor-type.js";

const PRIMITIVES = new Map<string, PrimitiveKind>([
  ["string", "string"],
  ["int", "int"],
  ["long", "long"],
  ["byte", "byte"],
  ["float", "float"],
  ["double", "double"],
  ["bool", "bool"],
]);

/**
 * Parse a type expression
 * @param structs - Structs the expression may refer to by name
 * @throws Error naming the offending expression
 */
export function parseTypeExpression(
  expression: string,
  structs: ReadonlyMap<string, StructDataType> = new Map()
): DataType {
  const expr = expression.trim();

  if (expr.startsWith("tensor")) {
    return DataTypes.tensor(parseTensorType(expr));
  }

  const generic = /^([a-z]+)<(.*)>$/.exec(expr);
  if (generic) {
    const [, name = "", body = ""] = generic;
    const args = splitTopLevel(body).map((arg) => parseTypeExpression(arg, structs));
    const [first, second] = args;

    switch (name) {
      case "array":
        if (args.length === 1 && first) return DataTypes.array(first);
        break;
      case "weightedset":
        if (args.length === 1 && first) return DataTypes.weightedSet(first);
        break;
      case "map":
        if (args.length === 2 && first && second) return DataTypes.map(first, second);
        break;
      default:
        throw new Error(`Unknown collection type '${name}' in '${expression}'`);
    }
    throw new Error(`Wrong number of type arguments for '${name}' in '${expression}'`);
  }

  const primitive = PRIMITIVES.get(expr);
  if (primitive) {
    return { kind: "primitive", name: primitive };
  }

  switch (expr) {
    case "raw":
      return DataTypes.RAW;
    case "position":
      return DataTypes.POSITION;
    case "predicate":
      return DataTypes.PREDICATE;
  }

  const struct = structs.get(expr);
  if (struct) {
    return struct;
  }

  throw new Error(`Unknown type '${expression}'`);
}

/**
 * Split on commas that are not nested inside <> or ()
 */
function splitTopLevel(body: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";

  for (const ch of body) {
    if (ch === "<" || ch === "(") depth++;
    if (ch === ">" || ch === ")") depth--;

    if (ch === "," && depth === 0) {
      parts.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  parts.push(current);

  return parts;
}
