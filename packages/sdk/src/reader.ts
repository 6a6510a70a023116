/**
 * Feed reader: turns a JSON feed into document operations
 *
 * A feed is an array of operation objects, or a single one:
 *
 *   [
 *     { "put": "id:music:song::1", "fields": { "title": "Help" } },
 *     { "update": "id:music:song::1", "create": true, "fields": { "plays": { "increment": 1 } } },
 *     { "remove": "id:music:song::2", "condition": "song.plays < 10" }
 *   ]
 *
 * `fields` may come before or after the operation key. When it comes after,
 * each field is decoded as soon as it is read; when it comes first, the map is
 * kept as a JsonNode until the document type is known.
 */

import { DocumentId } from "./document-id.js";
import {
  DocFeedError,
  ReaderClosedError,
  StructuralError,
  UnknownDocumentTypeError,
  UnknownFieldError,
} from "./errors.js";
import { decodeField } from "./decode/field-values.js";
import { decodeValueUpdates } from "./decode/update-operators.js";
import { JsonTokenizer, describeToken, type JsonInput, type JsonToken } from "./json/tokenizer.js";
import { describeNode, readNode, type JsonNode, type JsonObjectNode } from "./json/tree.js";
import { logger as defaultLogger, type Logger } from "./observability/logs.js";
import { metrics as defaultMetrics, type MetricsCollector } from "./observability/metrics.js";
import type { DocumentType } from "./schema/data-types.js";
import type { DocumentTypeRegistry } from "./schema/registry.js";
import {
  isOperationKind,
  type DocumentOperation,
  type FieldUpdate,
  type FieldValue,
  type OperationKind,
} from "./types.js";

export interface FeedReaderOptions {
  /** Defaults to the global logger */
  logger?: Logger;
  /** Defaults to the global metrics collector */
  metrics?: MetricsCollector;
}

type ReaderState = "start" | "array" | "end" | "done" | "failed";

/**
 * Decoded fields of the operation being read
 */
type FieldTarget =
  | { kind: "put"; values: Map<string, FieldValue> }
  | { kind: "update"; updates: Map<string, FieldUpdate> };

/**
 * Document resolved from the operation key, needed to decode fields
 */
interface ResolvedDocument {
  kind: OperationKind;
  id: DocumentId;
  type: DocumentType;
}

/**
 * Everything read from one operation object
 */
interface OperationParts {
  kind?: OperationKind;
  explicitId?: string;
  aliasId?: string;
  condition?: string;
  create?: boolean;
  /** Set once a 'fields' key was read */
  fieldsSeen: boolean;
  buffered?: JsonObjectNode;
  resolved?: ResolvedDocument;
  target?: FieldTarget;
}

const UNKNOWN_TYPE = "(unknown)";

export class FeedReader implements Iterable<DocumentOperation> {
  readonly #registry: DocumentTypeRegistry;
  readonly #tokens: JsonTokenizer;
  readonly #logger: Logger;
  readonly #metrics: MetricsCollector;
  #state: ReaderState = "start";
  #failure: unknown;
  #currentType: string | undefined;

  constructor(registry: DocumentTypeRegistry, input: JsonInput, options: FeedReaderOptions = {}) {
    this.#registry = registry;
    this.#tokens = new JsonTokenizer(input);
    this.#logger = options.logger ?? defaultLogger;
    this.#metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Read the next operation
   * @returns The operation, or null at the end of the feed
   * @throws DocFeedError on the first problem; the reader is closed afterwards
   */
  next(): DocumentOperation | null {
    return this.#guard(() => this.#readNext());
  }

  /**
   * Read a body holding exactly one operation whose kind and id are given
   * out of band. The body may repeat the operation key with the same id.
   */
  readSingle(kind: OperationKind, id: string): DocumentOperation {
    return this.#guard(() => {
      if (this.#state !== "start") {
        throw new StructuralError("readSingle() must be the first read of a feed reader");
      }
      const first = this.#tokens.nextToken();
      if (first?.type !== "startObject") {
        throw new StructuralError(`Expected an operation object, got ${describeToken(first)}`);
      }
      const operation = this.#readOperation({ kind, id });
      // Rejects trailing content
      this.#tokens.nextToken();
      this.#state = "done";
      return operation;
    });
  }

  /**
   * Read all remaining operations
   */
  readAll(): DocumentOperation[] {
    return Array.from(this);
  }

  *[Symbol.iterator](): Iterator<DocumentOperation> {
    for (let op = this.next(); op !== null; op = this.next()) {
      yield op;
    }
  }

  #guard<T>(read: () => T): T {
    if (this.#state === "failed") {
      throw new ReaderClosedError({ cause: this.#failure });
    }
    try {
      return read();
    } catch (err) {
      this.#state = "failed";
      this.#failure = err;
      const code = err instanceof DocFeedError ? err.code : "E_INTERNAL";
      this.#metrics.recordError(this.#currentType ?? UNKNOWN_TYPE, code);
      this.#logger.error("feed.error", {
        type: this.#currentType,
        message: err instanceof Error ? err.message : String(err),
        details: { code },
      });
      throw err;
    }
  }

  #readNext(): DocumentOperation | null {
    switch (this.#state) {
      case "start": {
        const token = this.#tokens.nextToken();
        if (token?.type === "startArray") {
          this.#state = "array";
          return this.#readNext();
        }
        if (token?.type === "startObject") {
          this.#state = "end";
          return this.#readOperation();
        }
        throw new StructuralError(
          `Expected a feed array or an operation object, got ${describeToken(token)}`
        );
      }
      case "array": {
        const token = this.#tokens.nextToken();
        if (token?.type === "endArray") {
          this.#state = "end";
          return this.#readNext();
        }
        if (token?.type !== "startObject") {
          throw new StructuralError(`Expected an operation object, got ${describeToken(token)}`);
        }
        return this.#readOperation();
      }
      case "end":
        // Rejects trailing content
        this.#tokens.nextToken();
        this.#state = "done";
        return null;
      case "done":
      case "failed":
        return null;
    }
  }

  /**
   * Read one operation object; its '{' has been consumed
   */
  #readOperation(expected?: { kind: OperationKind; id: string }): DocumentOperation {
    const started = performance.now();
    this.#currentType = undefined;
    const parts: OperationParts = { fieldsSeen: false };
    if (expected) {
      parts.resolved = this.#resolve(expected.kind, expected.id);
    }

    for (let token = this.#nextToken(); token.type !== "endObject"; token = this.#nextToken()) {
      if (token.type !== "fieldName") {
        throw new StructuralError(`Expected a key in document operation, got ${describeToken(token)}`);
      }
      this.#readOperationKey(token.value, parts);
    }

    const operation = this.#finish(parts, expected);
    const fieldCount =
      operation.kind === "put"
        ? operation.fields.size
        : operation.kind === "update"
          ? operation.fieldUpdates.length
          : 0;
    const type = operation.kind === "remove" ? operation.id.documentType : operation.documentType;
    this.#metrics.recordOperation(type, operation.kind, fieldCount, performance.now() - started);
    this.#logger.debug("feed.operation", {
      type,
      documentId: operation.id.toString(),
      message: operation.kind,
    });
    this.#currentType = undefined;
    return operation;
  }

  #readOperationKey(key: string, parts: OperationParts): void {
    if (isOperationKind(key)) {
      if (parts.kind) {
        throw new StructuralError(`Document operation has both '${parts.kind}' and '${key}'`);
      }
      parts.kind = key;
      parts.explicitId = this.#readString(key);
      return;
    }

    switch (key) {
      case "id":
        if (parts.aliasId !== undefined) {
          throw new StructuralError("Duplicate key 'id' in document operation");
        }
        parts.aliasId = this.#readString(key);
        return;
      case "condition":
        parts.condition = this.#readString(key);
        return;
      case "create": {
        const token = this.#nextToken();
        if (token.type !== "boolean") {
          throw new StructuralError(`'create' must be a boolean, got ${describeToken(token)}`);
        }
        parts.create = token.value;
        return;
      }
      case "fields":
        this.#readFields(parts);
        return;
      default:
        throw new StructuralError(`Unknown field '${key}' in document operation`);
    }
  }

  #readFields(parts: OperationParts): void {
    if (parts.fieldsSeen) {
      throw new StructuralError("Duplicate key 'fields' in document operation");
    }
    parts.fieldsSeen = true;

    if (!parts.resolved && parts.kind && parts.explicitId !== undefined) {
      parts.resolved = this.#resolve(parts.kind, parts.explicitId);
    }
    const resolved = parts.resolved;
    if (!resolved) {
      // Operation key not seen yet
      const node = readNode(this.#tokens);
      if (node.kind !== "object") {
        throw new StructuralError(`'fields' must be an object, got ${describeNode(node)}`);
      }
      parts.buffered = node;
      return;
    }

    if (resolved.kind === "remove") {
      throw new StructuralError(`remove of document ${resolved.id.toString()} cannot have a 'fields' map`);
    }
    const token = this.#nextToken();
    if (token.type !== "startObject") {
      throw new StructuralError(`'fields' must be an object, got ${describeToken(token)}`);
    }
    const target = createTarget(resolved.kind);
    for (let next = this.#nextToken(); next.type !== "endObject"; next = this.#nextToken()) {
      if (next.type !== "fieldName") {
        throw new StructuralError(`Expected a field name in 'fields', got ${describeToken(next)}`);
      }
      this.#decodeFieldEntry(resolved, target, next.value, readNode(this.#tokens));
    }
    parts.target = target;
  }

  #finish(parts: OperationParts, expected?: { kind: OperationKind; id: string }): DocumentOperation {
    const { kind, id } = resolveOperationKey(parts, expected);
    const resolved = parts.resolved ?? this.#resolve(kind, id);

    let target = parts.target;
    if (parts.buffered) {
      if (resolved.kind === "remove") {
        throw new StructuralError(`remove of document ${id} cannot have a 'fields' map`);
      }
      target = createTarget(resolved.kind);
      for (const [name, node] of parts.buffered.entries) {
        this.#decodeFieldEntry(resolved, target, name, node);
      }
    }

    if (parts.create !== undefined && resolved.kind !== "update") {
      this.#logger.warn("feed.create_ignored", {
        type: resolved.type.name,
        documentId: id,
        message: `'create' has no effect on a ${resolved.kind}`,
      });
    }

    const condition = parts.condition !== undefined ? { condition: parts.condition } : {};

    switch (resolved.kind) {
      case "put":
        if (target?.kind !== "put") {
          throw new StructuralError(`put of document ${id} is missing a 'fields' map`);
        }
        return {
          kind: "put",
          id: resolved.id,
          documentType: resolved.type.name,
          fields: target.values,
          ...condition,
        };
      case "update":
        if (target?.kind !== "update") {
          throw new StructuralError(`update of document ${id} is missing a 'fields' map`);
        }
        return {
          kind: "update",
          id: resolved.id,
          documentType: resolved.type.name,
          fieldUpdates: Array.from(target.updates.values()),
          createIfNonExistent: parts.create ?? false,
          ...condition,
        };
      case "remove":
        return { kind: "remove", id: resolved.id, ...condition };
    }
  }

  #resolve(kind: OperationKind, idText: string): ResolvedDocument {
    const id = DocumentId.parse(idText);
    const type = this.#registry.resolve(id.documentType);
    if (!type) {
      throw new UnknownDocumentTypeError(id.documentType);
    }
    this.#currentType = type.name;
    return { kind, id, type };
  }

  #decodeFieldEntry(resolved: ResolvedDocument, target: FieldTarget, name: string, node: JsonNode): void {
    const fieldType = resolved.type.fields.get(name);
    if (!fieldType) {
      throw new UnknownFieldError(name, resolved.type.name);
    }
    const context = { documentId: resolved.id.toString(), field: name };

    if (target.kind === "put") {
      // null leaves the field unset
      if (node.kind !== "null") {
        target.values.set(name, decodeField(node, fieldType, context));
      }
      return;
    }

    const updates = decodeValueUpdates(node, fieldType, context);
    const existing = target.updates.get(name);
    if (existing) {
      existing.updates.push(...updates);
    } else {
      target.updates.set(name, { field: name, updates });
    }
  }

  #readString(key: string): string {
    const token = this.#nextToken();
    if (token.type !== "string") {
      throw new StructuralError(`'${key}' must be a string, got ${describeToken(token)}`);
    }
    return token.value;
  }

  #nextToken(): JsonToken {
    const token = this.#tokens.nextToken();
    if (!token) {
      throw new StructuralError("Unexpected end of input inside a document operation");
    }
    return token;
  }
}

function createTarget(kind: "put" | "update"): FieldTarget {
  return kind === "put" ? { kind, values: new Map() } : { kind, updates: new Map() };
}

/**
 * Pick the operation kind and id from the keys that were read.
 * `id` stands for `put` unless an explicit operation key is present.
 */
function resolveOperationKey(
  parts: OperationParts,
  expected?: { kind: OperationKind; id: string }
): { kind: OperationKind; id: string } {
  const bodyId = parts.explicitId ?? parts.aliasId;
  if (parts.explicitId !== undefined && parts.aliasId !== undefined && parts.explicitId !== parts.aliasId) {
    throw new StructuralError(
      `Document operation has 'id' ${parts.aliasId} and '${parts.kind ?? "put"}' ${parts.explicitId}`
    );
  }

  if (expected) {
    if (parts.kind && parts.kind !== expected.kind) {
      throw new StructuralError(`Expected a ${expected.kind} operation, got '${parts.kind}'`);
    }
    if (bodyId !== undefined && bodyId !== expected.id) {
      throw new StructuralError(`Document id ${bodyId} does not match ${expected.id}`);
    }
    return expected;
  }

  if (parts.kind && parts.explicitId !== undefined) {
    return { kind: parts.kind, id: parts.explicitId };
  }
  if (parts.aliasId !== undefined) {
    return { kind: "put", id: parts.aliasId };
  }
  throw new StructuralError("Missing a document operation ('put', 'update' or 'remove')");
}

/**
 * Read every operation of a feed
 */
export function readFeed(
  registry: DocumentTypeRegistry,
  input: JsonInput,
  options?: FeedReaderOptions
): DocumentOperation[] {
  return new FeedReader(registry, input, options).readAll();
}
