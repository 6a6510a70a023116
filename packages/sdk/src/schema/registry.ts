/**
 * Document type registry for loading, caching, and resolving document types
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { createHash } from "node:crypto";
import { fileURLToPath } from "node:url";
import { Ajv2020 } from "ajv/dist/2020.js";
import type { ErrorObject, ValidateFunction } from "ajv";
import { DocumentTypeDefinitionError } from "../errors.js";
import type { DataType, DocumentType, StructDataType } from "./data-types.js";
import { parseTypeExpression } from "./type-expression.js";

/**
 * Read-only view handed to feed readers. Lookups never mutate, so one registry
 * can serve any number of readers.
 */
export interface DocumentTypeRegistry {
  /**
   * Resolve a document type by name
   * @returns The type or null if not registered
   */
  resolve(name: string): DocumentType | null;

  /**
   * Check if a document type is registered
   */
  has(name: string): boolean;

  /**
   * List registered document type names in registration order
   */
  list(): string[];
}

/**
 * Shape of a document type definition file
 */
export interface DocumentTypeDefinition {
  name: string;
  description?: string;
  structs?: Record<string, Record<string, string>>;
  fields: Record<string, string>;
}

/**
 * Loaded type with content digest for reload detection
 */
interface TypeEntry {
  type: DocumentType;
  /** Absent for types registered programmatically */
  digest?: string;
}

const META_SCHEMA_PATH = fileURLToPath(
  new URL("../../schemas/document-type.schema.json", import.meta.url)
);

/**
 * Implementation of DocumentTypeRegistry
 * Loads definitions from `<dir>/*.json`, validates them against the definition
 * meta schema, and resolves field type expressions
 */
export class DocumentTypeRegistryImpl implements DocumentTypeRegistry {
  #types: Map<string, TypeEntry> = new Map();
  #ajv: Ajv2020;
  #validate: ValidateFunction | null = null;

  constructor() {
    this.#ajv = new Ajv2020({
      strict: true,
      allErrors: true,
    });
  }

  /**
   * Register a document type built in code. Replaces a type of the same name.
   */
  register(type: DocumentType): void {
    this.#types.set(type.name, { type });
  }

  /**
   * Load all definition files from a directory
   * A missing directory loads nothing.
   */
  async loadAll(dir: string): Promise<void> {
    let files: string[];
    try {
      files = await readdir(dir);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        return;
      }
      throw err;
    }

    for (const file of files.filter((f) => f.endsWith(".json")).sort()) {
      await this.#loadDefinitionFile(join(dir, file), file);
    }
  }

  /**
   * Validate and register a definition object
   * @param source - Where the definition came from, for error messages
   */
  async loadDefinition(definition: unknown, source = "<inline>"): Promise<DocumentType> {
    const type = await this.#buildType(definition, source);
    this.#types.set(type.name, { type });
    return type;
  }

  async #buildType(definition: unknown, source: string): Promise<DocumentType> {
    const validate = await this.#getValidator();
    if (!validate(definition)) {
      throw new DocumentTypeDefinitionError(source, formatAjvErrors(validate.errors ?? []));
    }
    if (!isDefinition(definition)) {
      throw new DocumentTypeDefinitionError(source, "definition must be a JSON object");
    }
    return buildDocumentType(definition, source);
  }

  async #loadDefinitionFile(filePath: string, filename: string): Promise<void> {
    const content = await readFile(filePath, "utf-8");
    const digest = createHash("sha256").update(content).digest("hex");

    const expectedName = filename.slice(0, -".json".length);
    const existing = this.#types.get(expectedName);
    if (existing?.digest === digest) {
      return;
    }

    let definition: unknown;
    try {
      definition = JSON.parse(content);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DocumentTypeDefinitionError(filename, reason, { cause: err });
    }

    const type = await this.#buildType(definition, filename);
    if (type.name !== expectedName) {
      throw new DocumentTypeDefinitionError(
        filename,
        `file name must match the type name (expected: "${type.name}.json")`
      );
    }
    this.#types.set(type.name, { type, digest });
  }

  async #getValidator(): Promise<ValidateFunction> {
    if (!this.#validate) {
      const metaSchema: unknown = JSON.parse(await readFile(META_SCHEMA_PATH, "utf-8"));
      if (typeof metaSchema !== "object" || metaSchema === null) {
        throw new Error(`Meta schema ${META_SCHEMA_PATH} must contain a JSON object`);
      }
      this.#validate = this.#ajv.compile(metaSchema);
    }
    return this.#validate;
  }

  resolve(name: string): DocumentType | null {
    return this.#types.get(name)?.type ?? null;
  }

  has(name: string): boolean {
    return this.#types.has(name);
  }

  list(): string[] {
    return Array.from(this.#types.keys());
  }
}

/**
 * Create a registry, optionally seeded with types built in code
 */
export function createDocumentTypeRegistry(types: DocumentType[] = []): DocumentTypeRegistryImpl {
  const registry = new DocumentTypeRegistryImpl();
  for (const type of types) {
    registry.register(type);
  }
  return registry;
}

function buildDocumentType(definition: DocumentTypeDefinition, source: string): DocumentType {
  const structs = new Map<string, StructDataType>();

  // Structs may refer to structs declared before them
  for (const [structName, members] of Object.entries(definition.structs ?? {})) {
    structs.set(structName, {
      kind: "struct",
      name: structName,
      fields: resolveFields(members, structs, source, structName),
    });
  }

  return {
    name: definition.name,
    fields: resolveFields(definition.fields, structs, source, definition.name),
  };
}

function resolveFields(
  fields: Record<string, string>,
  structs: ReadonlyMap<string, StructDataType>,
  source: string,
  owner: string
): Map<string, DataType> {
  const resolved = new Map<string, DataType>();
  for (const [name, expression] of Object.entries(fields)) {
    try {
      resolved.set(name, parseTypeExpression(expression, structs));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DocumentTypeDefinitionError(source, `field '${owner}.${name}': ${reason}`, {
        cause: err,
      });
    }
  }
  return resolved;
}

function isDefinition(value: unknown): value is DocumentTypeDefinition {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatAjvErrors(errors: ErrorObject[]): string {
  return errors
    .map((err) => {
      const pointer = err.instancePath || "/";
      return `${pointer} ${err.message ?? `failed '${err.keyword}'`}`;
    })
    .join("; ");
}
