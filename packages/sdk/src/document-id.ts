/**
 * Document identifiers: `id:<namespace>:<document-type>:<modifiers>:<user-specific>`
 *
 * @example "id:music:song::love-me-do"
 * @example "id:music:song:g=beatles:love-me-do"
 */

import { InvalidDocumentIdError } from "./errors.js";

export interface DocumentIdModifiers {
  /** Numeric location modifier (`n=<number>`) */
  number?: bigint;
  /** Group location modifier (`g=<group>`) */
  group?: string;
}

export class DocumentId {
  readonly namespace: string;
  readonly documentType: string;
  readonly modifiers: Readonly<DocumentIdModifiers>;
  readonly userSpecific: string;
  readonly #text: string;

  private constructor(
    text: string,
    namespace: string,
    documentType: string,
    modifiers: DocumentIdModifiers,
    userSpecific: string
  ) {
    this.#text = text;
    this.namespace = namespace;
    this.documentType = documentType;
    this.modifiers = Object.freeze({ ...modifiers });
    this.userSpecific = userSpecific;
    Object.freeze(this);
  }

  /**
   * Parse a document id
   * @throws InvalidDocumentIdError
   */
  static parse(text: string): DocumentId {
    if (!text.startsWith("id:")) {
      throw new InvalidDocumentIdError(text, "must start with 'id:'");
    }

    const parts = text.slice("id:".length).split(":");
    if (parts.length < 4) {
      throw new InvalidDocumentIdError(
        text,
        "expected id:<namespace>:<document-type>:<modifiers>:<user-specific>"
      );
    }

    const [namespace = "", documentType = "", modifierText = ""] = parts;
    const userSpecific = parts.slice(3).join(":");

    if (namespace === "") {
      throw new InvalidDocumentIdError(text, "namespace is empty");
    }
    if (documentType === "") {
      throw new InvalidDocumentIdError(text, "document type is empty");
    }
    if (userSpecific === "") {
      throw new InvalidDocumentIdError(text, "user-specific part is empty");
    }

    return new DocumentId(
      text,
      namespace,
      documentType,
      parseModifiers(text, modifierText),
      userSpecific
    );
  }

  equals(other: DocumentId): boolean {
    return this.#text === other.#text;
  }

  toString(): string {
    return this.#text;
  }

  toJSON(): string {
    return this.#text;
  }
}

function parseModifiers(id: string, text: string): DocumentIdModifiers {
  const modifiers: DocumentIdModifiers = {};
  if (text === "") {
    return modifiers;
  }

  for (const pair of text.split(",")) {
    const eq = pair.indexOf("=");
    const key = eq === -1 ? pair : pair.slice(0, eq);
    const value = eq === -1 ? "" : pair.slice(eq + 1);

    switch (key) {
      case "n":
        if (!/^\d+$/.test(value)) {
          throw new InvalidDocumentIdError(id, `number modifier must be an unsigned integer, got '${value}'`);
        }
        modifiers.number = BigInt(value);
        break;
      case "g":
        if (value === "") {
          throw new InvalidDocumentIdError(id, "group modifier is empty");
        }
        modifiers.group = value;
        break;
      default:
        throw new InvalidDocumentIdError(id, `unknown modifier '${pair}'`);
    }
  }

  if (modifiers.number !== undefined && modifiers.group !== undefined) {
    throw new InvalidDocumentIdError(id, "number and group modifiers cannot be combined");
  }

  return modifiers;
}
