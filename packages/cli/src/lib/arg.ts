/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

const TYPE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`${name} is too large`);
  }

  return parsed;
}

/**
 * Validate a document type name argument
 */
export function parseTypeName(value: string): string {
  if (!TYPE_NAME.test(value)) {
    throw new InvalidArgumentError(
      `Invalid type name "${value}". Type names start with a letter or underscore and contain only letters, digits and underscores.`
    );
  }
  return value;
}
