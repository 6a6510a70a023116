/**
 * Loading and describing the document type directory
 */

import { stat } from "node:fs/promises";
import {
  createDocumentTypeRegistry,
  dataTypeName,
  type DocumentType,
  type DocumentTypeRegistryImpl,
} from "@docfeed/sdk";
import { CliError } from "./errors.js";

/**
 * Load every definition in a type directory
 * @throws CliError when the directory does not exist
 */
export async function loadTypesDir(dir: string): Promise<DocumentTypeRegistryImpl> {
  try {
    const info = await stat(dir);
    if (!info.isDirectory()) {
      throw new CliError(`Type directory ${dir} is not a directory`);
    }
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new CliError(`Type directory ${dir} does not exist (set --types or DOCFEED_TYPES)`, {
        cause: err,
      });
    }
    throw err;
  }

  const registry = createDocumentTypeRegistry();
  await registry.loadAll(dir);
  return registry;
}

/**
 * Format type list for CLI output
 */
export function formatTypeList(registry: DocumentTypeRegistryImpl): string[] {
  const names = registry.list();

  if (names.length === 0) {
    return ["No document types found"];
  }

  const lines = [`Found ${names.length} document type(s):`];
  for (const name of names) {
    const type = registry.resolve(name);
    if (!type) continue;
    lines.push(`  ${name} (${type.fields.size} fields)`);
  }
  return lines;
}

/**
 * Field listing of one type, names padded to one column
 */
export function formatTypeDetails(type: DocumentType): string[] {
  const lines = [`${type.name}:`];
  const width = Math.max(0, ...Array.from(type.fields.keys(), (name) => name.length));
  for (const [name, fieldType] of type.fields) {
    lines.push(`  ${name.padEnd(width)}  ${dataTypeName(fieldType)}`);
  }
  return lines;
}
