/**
 * Tensor type specifications: `tensor<float>(x{},y[3],z[])`
 */

export type TensorValueType = "double" | "float" | "bfloat16" | "int8";

export interface TensorDimension {
  name: string;
  kind: "mapped" | "indexed";
  /** Bound size of an indexed dimension; absent when unbound (`x[]`) */
  size?: number;
}

export interface TensorType {
  valueType: TensorValueType;
  /** Sorted by name */
  dimensions: readonly TensorDimension[];
}

const VALUE_TYPES: readonly TensorValueType[] = ["double", "float", "bfloat16", "int8"];
const TENSOR_PATTERN = /^tensor(?:<([a-z0-9]+)>)?\((.*)\)$/;
const DIMENSION_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)(?:\{\}|\[(\d*)\])$/;

/**
 * Parse a tensor type specification
 * @throws Error describing the first problem found
 */
export function parseTensorType(spec: string): TensorType {
  const match = TENSOR_PATTERN.exec(spec.replace(/\s+/g, ""));
  if (!match) {
    throw new Error(`'${spec}' is not a tensor type specification`);
  }

  const valueType = match[1] ?? "double";
  if (!isValueType(valueType)) {
    throw new Error(`Unknown tensor value type '${valueType}' in '${spec}'`);
  }

  const body = match[2] ?? "";
  const dimensions: TensorDimension[] = [];
  for (const part of body === "" ? [] : body.split(",")) {
    const dim = DIMENSION_PATTERN.exec(part);
    if (!dim?.[1]) {
      throw new Error(`Invalid dimension '${part}' in '${spec}'`);
    }
    const name = dim[1];
    if (dimensions.some((d) => d.name === name)) {
      throw new Error(`Dimension '${name}' is declared twice in '${spec}'`);
    }
    if (part.endsWith("{}")) {
      dimensions.push({ name, kind: "mapped" });
    } else if (dim[2]) {
      const size = Number.parseInt(dim[2], 10);
      if (size < 1) {
        throw new Error(`Dimension '${name}' must have a positive size in '${spec}'`);
      }
      dimensions.push({ name, kind: "indexed", size });
    } else {
      dimensions.push({ name, kind: "indexed" });
    }
  }

  dimensions.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return { valueType, dimensions };
}

export function formatTensorType(type: TensorType): string {
  const dims = type.dimensions.map((d) => {
    if (d.kind === "mapped") return `${d.name}{}`;
    return `${d.name}[${d.size ?? ""}]`;
  });
  const valueType = type.valueType === "double" ? "" : `<${type.valueType}>`;
  return `tensor${valueType}(${dims.join(",")})`;
}

/**
 * A dense tensor type: at least one dimension, all of them indexed
 */
export function isIndexedTensorType(type: TensorType): boolean {
  return type.dimensions.length > 0 && type.dimensions.every((d) => d.kind === "indexed");
}

/**
 * The same type with every dimension mapped; cell sets of modify updates use it
 */
export function toMappedTensorType(type: TensorType): TensorType {
  return {
    valueType: type.valueType,
    dimensions: type.dimensions.map((d) => ({ name: d.name, kind: "mapped" })),
  };
}

function isValueType(value: string): value is TensorValueType {
  return (VALUE_TYPES as readonly string[]).includes(value);
}
