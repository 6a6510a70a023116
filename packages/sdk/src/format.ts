/**
 * Deterministic JSON formatting utilities
 */

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * Key ordering: code point order, insertion order, or an explicit list
 * (listed keys first, the rest after them in insertion order)
 */
export type KeyOrder = "alpha" | "preserve" | readonly string[];

/**
 * Stable, deterministic JSON stringification
 * @param obj - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @param order - Key ordering (default: "alpha")
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(obj: unknown, indent = 2, order: KeyOrder = "alpha"): string {
  const seen = new WeakSet<object>();

  const sortKeys = (keys: string[]): string[] => {
    if (order === "preserve") {
      return keys;
    }
    if (order === "alpha") {
      return keys.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    }
    const rank = (key: string): number => {
      const index = order.indexOf(key);
      return index === -1 ? order.length : index;
    };
    // Array.prototype.sort is stable, unlisted keys keep their order
    return keys.sort((a, b) => rank(a) - rank(b));
  };

  const normalize = (value: unknown): unknown => {
    if (typeof value === "bigint") {
      return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
    }
    if (value && typeof value === "object") {
      // Detect cycles
      if (seen.has(value)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(value);

      try {
        // Arrays: preserve order but normalize contents
        if (Array.isArray(value)) {
          return value.map(normalize);
        }

        const out: Record<string, unknown> = {};
        const entries = new Map(Object.entries(value));
        for (const key of sortKeys(Array.from(entries.keys()))) {
          Object.defineProperty(out, key, {
            value: normalize(entries.get(key)),
            enumerable: true,
            writable: true,
            configurable: true,
          });
        }
        return out;
      } finally {
        seen.delete(value);
      }
    }
    return value;
  };

  return JSON.stringify(normalize(obj), null, indent) + "\n";
}
