/**
 * Error types for feed decoding
 *
 * Invariants:
 * - Errors raised while decoding a field name the document id, the field and its declared type
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all docfeed errors
 */
export abstract class DocFeedError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown by the tokenizer when the input is not well-formed JSON
 */
export class JsonSyntaxError extends DocFeedError {
  readonly code = "E_JSON_SYNTAX";

  constructor(
    reason: string,
    public readonly line: number,
    public readonly column: number,
    options?: ErrorOptions
  ) {
    super(`Invalid JSON at line ${line}, column ${column}: ${reason}`, options);
  }
}

/**
 * Thrown when an operation object has the wrong shape: unknown keys,
 * a missing operation, a missing 'fields' map, wrongly typed values
 */
export class StructuralError extends DocFeedError {
  readonly code = "E_STRUCTURE";
}

/**
 * Thrown when a document id cannot be parsed
 */
export class InvalidDocumentIdError extends DocFeedError {
  readonly code = "E_DOCUMENT_ID";

  constructor(
    public readonly id: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid document id "${id}": ${reason}`, options);
  }
}

/**
 * Thrown when the type named in a document id is not registered
 */
export class UnknownDocumentTypeError extends DocFeedError {
  readonly code = "E_UNKNOWN_TYPE";

  constructor(
    public readonly documentType: string,
    options?: ErrorOptions
  ) {
    super(`Document type ${documentType} does not exist`, options);
  }
}

/**
 * Thrown when a document field or struct member is not declared
 */
export class UnknownFieldError extends DocFeedError {
  readonly code = "E_UNKNOWN_FIELD";
  /** Document field the structure was found in, when it is nested in one */
  readonly location?: FieldLocation;

  constructor(
    public readonly field: string,
    public readonly structure: string,
    options?: ErrorOptions & { location?: FieldLocation }
  ) {
    super(unknownFieldMessage(field, structure, options?.location), options);
    this.location = options?.location;
  }
}

export interface FieldLocation {
  documentId: string;
  field: string;
  fieldType: string;
}

function fieldErrorMessage(location: FieldLocation, reason: string): string {
  return `Error in document '${location.documentId}' - could not parse field '${location.field}' of type '${location.fieldType}': ${reason}`;
}

function unknownFieldMessage(field: string, structure: string, location: FieldLocation | undefined): string {
  const reason = `Could not get field '${field}' in the structure of type '${structure}'`;
  return location ? fieldErrorMessage(location, reason) : reason;
}

/**
 * Thrown when a value cannot be converted to the declared type of its field
 */
export class FieldDecodeError extends DocFeedError {
  readonly code = "E_FIELD_DECODE";

  constructor(
    public readonly documentId: string,
    public readonly field: string,
    public readonly fieldType: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(fieldErrorMessage({ documentId, field, fieldType }, reason), options);
  }
}

/**
 * Thrown when an update operator is unknown or not valid for the field's type
 */
export class UnsupportedOperatorError extends DocFeedError {
  readonly code = "E_UNSUPPORTED_OPERATOR";
}

/**
 * Thrown when a document type definition file is invalid
 */
export class DocumentTypeDefinitionError extends DocFeedError {
  readonly code = "E_TYPE_DEFINITION";

  constructor(
    public readonly source: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid document type definition ${source}: ${reason}`, options);
  }
}

/**
 * Thrown when a reader is used after it failed
 */
export class ReaderClosedError extends DocFeedError {
  readonly code = "E_READER_CLOSED";

  constructor(options?: ErrorOptions) {
    super("Feed reader was aborted by an earlier error", options);
  }
}

/**
 * Thrown when an operation cannot be written back as feed JSON
 */
export class FeedEncodeError extends DocFeedError {
  readonly code = "E_ENCODE";
}

/**
 * Plain conversion failure raised inside the value decoders.
 * The field decoder wraps it into a FieldDecodeError with document context.
 */
export class ConversionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConversionError";
  }
}
