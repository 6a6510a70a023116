/**
 * docfeed SDK
 *
 * Streaming decoder for JSON document feeds: put, update and remove operations
 * decoded against a registry of document types
 */

// Re-export types
export type {
  FieldValue,
  FieldValueKind,
  MapEntry,
  WeightedEntry,
  ArithmeticOperator,
  TensorModifyOperation,
  ValueUpdate,
  ValueUpdateKind,
  FieldUpdate,
  PutOperation,
  UpdateOperation,
  RemoveOperation,
  DocumentOperation,
  OperationKind,
} from "./types.js";
export { OPERATION_KINDS, isOperationKind } from "./types.js";

// Errors
export {
  DocFeedError,
  JsonSyntaxError,
  StructuralError,
  InvalidDocumentIdError,
  UnknownDocumentTypeError,
  UnknownFieldError,
  FieldDecodeError,
  UnsupportedOperatorError,
  DocumentTypeDefinitionError,
  ReaderClosedError,
  FeedEncodeError,
  ConversionError,
} from "./errors.js";
export type { FieldLocation } from "./errors.js";

export { DocumentId, type DocumentIdModifiers } from "./document-id.js";

// Schema components
export {
  DataTypes,
  POSITION_STRUCT,
  defineDocumentType,
  dataTypeName,
  isNumericType,
  type DataType,
  type DataTypeKind,
  type DocumentType,
  type PrimitiveKind,
  type StructDataType,
} from "./schema/data-types.js";
export {
  parseTensorType,
  formatTensorType,
  isIndexedTensorType,
  toMappedTensorType,
  type TensorType,
  type TensorDimension,
  type TensorValueType,
} from "./schema/tensor-type.js";
export { parseTypeExpression } from "./schema/type-expression.js";
export {
  createDocumentTypeRegistry,
  DocumentTypeRegistryImpl,
  type DocumentTypeRegistry,
  type DocumentTypeDefinition,
} from "./schema/registry.js";

// Values
export { Tensor, type TensorAddress, type TensorCell } from "./values/tensor.js";
export {
  parsePredicate,
  formatPredicate,
  PredicateSyntaxError,
  type Predicate,
} from "./values/predicate.js";
export {
  FieldValues,
  fieldValueKey,
  fieldValueEquals,
  mapGet,
  weightOf,
  formatFieldValue,
} from "./values/field-values.js";

// Decoders
export {
  decodeField,
  decodeFieldValue,
  decodeKey,
  type DecodeContext,
} from "./decode/field-values.js";
export { decodeValueUpdates } from "./decode/update-operators.js";
export { MAX_DENSE_CELLS, decodeTensor, decodeTensorModifyCells } from "./decode/tensor-cells.js";

// Feed reading and writing
export { FeedReader, readFeed, type FeedReaderOptions } from "./reader.js";
export { FeedWriter, encodeFieldValue, encodeFieldUpdate } from "./format/feed-writer.js";
export { stableStringify, type JsonValue, type KeyOrder } from "./format.js";

// JSON plumbing
export {
  JsonTokenizer,
  describeToken,
  type JsonInput,
  type JsonToken,
  type JsonTokenType,
  type TokenSource,
} from "./json/tokenizer.js";
export { readNode, parseNode, toPlain, type JsonNode } from "./json/tree.js";

// Observability
export { Logger, logger, formatLogEntry, type LogEntry, type LogLevel, type LogSink } from "./observability/logs.js";
export { MetricsCollector, metrics, type DocumentTypeMetrics } from "./observability/metrics.js";
