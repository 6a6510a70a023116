/**
 * Tensor values built from address/value cells
 */

import { formatTensorType, isIndexedTensorType, type TensorType } from "../schema/tensor-type.js";

/** Dimension name to label; indexed labels are decimal indexes */
export type TensorAddress = Readonly<Record<string, string>>;

export interface TensorCell {
  address: TensorAddress;
  value: number;
}

export class Tensor {
  readonly type: TensorType;
  readonly #cells: Map<string, TensorCell>;

  /**
   * Cells with the same address replace earlier ones
   */
  constructor(type: TensorType, cells: Iterable<TensorCell> = []) {
    this.type = type;
    this.#cells = new Map();
    for (const cell of cells) {
      this.#cells.set(addressKey(type, cell.address), {
        address: { ...cell.address },
        value: cell.value,
      });
    }
  }

  /**
   * Dense tensor covering the full shape; cells not given are 0
   * @param shape - Size of each dimension, in the type's dimension order
   */
  static dense(type: TensorType, shape: readonly number[], cells: Iterable<TensorCell>): Tensor {
    const given = new Tensor(type, cells);
    const filled: TensorCell[] = [];
    for (const index of enumerateIndexes(shape)) {
      const address: Record<string, string> = {};
      type.dimensions.forEach((dim, i) => {
        address[dim.name] = String(index[i]);
      });
      filled.push({ address, value: given.get(address) ?? 0 });
    }
    return new Tensor(type, filled);
  }

  get size(): number {
    return this.#cells.size;
  }

  get isIndexed(): boolean {
    return isIndexedTensorType(this.type);
  }

  get(address: TensorAddress): number | undefined {
    return this.#cells.get(addressKey(this.type, address))?.value;
  }

  cells(): TensorCell[] {
    return Array.from(this.#cells.values());
  }

  equals(other: Tensor): boolean {
    if (formatTensorType(this.type) !== formatTensorType(other.type) || this.size !== other.size) {
      return false;
    }
    for (const [key, cell] of this.#cells) {
      if (other.#cells.get(key)?.value !== cell.value) {
        return false;
      }
    }
    return true;
  }

  /**
   * @example "tensor(x{},y{}):{{x:a,y:b}:2.0,{x:c,y:b}:3.0}"
   */
  toString(): string {
    const cells = this.cells().map((cell) => {
      const labels = this.type.dimensions.map((d) => `${d.name}:${cell.address[d.name] ?? ""}`);
      return `{${labels.join(",")}}:${formatNumber(cell.value)}`;
    });
    return `${formatTensorType(this.type)}:{${cells.join(",")}}`;
  }
}

function addressKey(type: TensorType, address: TensorAddress): string {
  return type.dimensions.map((d) => address[d.name] ?? "").join("\u0000");
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Row-major enumeration of every index in a shape
 */
function* enumerateIndexes(shape: readonly number[]): Generator<number[]> {
  if (shape.some((size) => size === 0)) {
    return;
  }
  const index = shape.map(() => 0);
  for (;;) {
    yield [...index];
    let dim = shape.length - 1;
    while (dim >= 0) {
      const size = shape[dim] ?? 0;
      const next = (index[dim] ?? 0) + 1;
      if (next < size) {
        index[dim] = next;
        break;
      }
      index[dim] = 0;
      dim--;
    }
    if (dim < 0) {
      return;
    }
  }
}
