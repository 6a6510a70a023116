/**
 * Materialized JSON values
 *
 * A JsonNode keeps object entries as an ordered list, so repeated keys and key
 * order survive buffering. The decoders work on nodes; the feed reader builds
 * them from the token stream one field (or one buffered 'fields' map) at a time.
 */

import { JsonSyntaxError } from "../errors.js";
import { JsonTokenizer, describeToken, type JsonToken, type TokenSource } from "./tokenizer.js";

export type JsonNode =
  | { kind: "object"; entries: Array<[string, JsonNode]> }
  | { kind: "array"; items: JsonNode[] }
  | { kind: "string"; value: string }
  | { kind: "number"; value: number; raw: string }
  | { kind: "boolean"; value: boolean }
  | { kind: "null" };

export type JsonObjectNode = Extract<JsonNode, { kind: "object" }>;

/**
 * Read the next complete value from a token source.
 * `first` is a token the caller already pulled.
 */
export function readNode(tokens: TokenSource, first?: JsonToken): JsonNode {
  const token = first ?? tokens.nextToken();
  if (!token) {
    throw unexpected(null, "a value");
  }

  switch (token.type) {
    case "startObject": {
      const entries: Array<[string, JsonNode]> = [];
      for (let next = tokens.nextToken(); next?.type !== "endObject"; next = tokens.nextToken()) {
        if (next?.type !== "fieldName") {
          throw unexpected(next, "a field name");
        }
        entries.push([next.value, readNode(tokens)]);
      }
      return { kind: "object", entries };
    }
    case "startArray": {
      const items: JsonNode[] = [];
      for (let next = tokens.nextToken(); next?.type !== "endArray"; next = tokens.nextToken()) {
        if (!next) {
          throw unexpected(next, "a value or ']'");
        }
        items.push(readNode(tokens, next));
      }
      return { kind: "array", items };
    }
    case "string":
      return { kind: "string", value: token.value };
    case "number":
      return { kind: "number", value: token.value, raw: token.raw };
    case "boolean":
      return { kind: "boolean", value: token.value };
    case "null":
      return { kind: "null" };
    default:
      throw unexpected(token, "a value");
  }
}

/**
 * Parse a complete JSON text into a node
 */
export function parseNode(text: string): JsonNode {
  const tokenizer = new JsonTokenizer(text);
  const node = readNode(tokenizer);
  // Rejects trailing content
  tokenizer.nextToken();
  return node;
}

/**
 * Short description of a node's JSON type for error messages
 */
export function describeNode(node: JsonNode): string {
  switch (node.kind) {
    case "object":
      return "an object";
    case "array":
      return "an array";
    case "string":
      return `string '${node.value}'`;
    case "number":
      return `number ${node.raw}`;
    case "boolean":
      return `boolean ${node.value}`;
    case "null":
      return "null";
  }
}

/**
 * Convert a node to a plain JavaScript value (last duplicate key wins)
 */
export function toPlain(node: JsonNode): unknown {
  switch (node.kind) {
    case "object":
      return Object.fromEntries(node.entries.map(([key, value]) => [key, toPlain(value)]));
    case "array":
      return node.items.map(toPlain);
    case "null":
      return null;
    default:
      return node.value;
  }
}

function unexpected(token: JsonToken | null, expected: string): JsonSyntaxError {
  // Only reachable with token sources other than JsonTokenizer, which reports positions itself
  return new JsonSyntaxError(`unexpected ${describeToken(token)}, expected ${expected}`, 0, 0);
}
