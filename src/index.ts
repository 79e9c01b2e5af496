/**
 * validtree
 *
 * Declarative constraint validation with error trees shaped like the data,
 * and a validated decode pipeline in front of it.
 *
 * @module index
 */

export { v } from './schema/builders';
export {
  ArraySchema,
  BooleanSchema,
  ConstrainedSchema,
  NumberSchema,
  ObjectSchema,
  OptionalSchema,
  RecordSchema,
  Schema,
  StringSchema,
} from './schema/declarations';
export type {
  CheckResult,
  Infer,
  InferShape,
  ObjectOptions,
  ObjectShape,
  SchemaKind,
  SchemaVisitor,
  Validatable,
} from './schema/declarations';

export {
  maxItems,
  minItems,
  uniqueItems,
  validateArrayLength,
  validateArrayUniqueness,
} from './constraints/array';
export { custom, enumerate, validateEnumeratedValues } from './constraints/generic';
export type { CustomCheck, CustomIssue, CustomOutcome } from './constraints/generic';
export { DEFAULT_MESSAGES, defaultMessageId } from './constraints/messages';
export {
  MULTIPLE_OF_PRECISION,
  exclusiveMaximum,
  exclusiveMinimum,
  maximum,
  minimum,
  multipleOf,
  validateNumericMultipleOf,
  validateNumericRange,
} from './constraints/numeric';
export { maxProperties, minProperties, validateObjectSize } from './constraints/object';
export {
  maxLength,
  minLength,
  pattern,
  stringLength,
  validateStringLength,
  validateStringPattern,
} from './constraints/string';
export type {
  Constraint,
  ConstraintError,
  ConstraintKind,
  ConstraintOptions,
  ConstraintParams,
} from './constraints/types';

export { FieldValidator } from './validator/field-validator';
export type { FieldShape } from './validator/field-validator';
export { TypeValidator } from './validator/type-validator';
export { compileType } from './validator/compile';

export {
  arrayErrors,
  countErrors,
  mapErrorTree,
  newTypeErrors,
  objectErrors,
} from './error-tree/tree';
export type {
  ArrayErrors,
  ErrorTree,
  LocalizedErrors,
  NewTypeErrors,
  ObjectErrors,
  ValidationErrors,
} from './error-tree/tree';
export { flattenErrors } from './error-tree/flatten';
export type { FlatError } from './error-tree/flatten';
export { localizeErrors } from './error-tree/localize';
export type { Translator } from './error-tree/localize';
export { MessageCatalog, formatTemplate } from './error-tree/message-catalog';
export { serializeErrors } from './error-tree/serialize';
export type { SerializedErrorTree } from './error-tree/serialize';

export { generateJsonSchema } from './jsonschema/generate';
export { SchemaCache, defaultSchemaCache } from './jsonschema/schema-cache';
export type { CompiledSchema, SchemaCheckResult } from './jsonschema/schema-cache';
export type { JSONSchema } from './jsonschema/types';

export { createDecoder, jsonDecoder, yamlDecoder } from './validation/decoders';
export type { Decoder, InputFormat, RawInput } from './validation/decoders';
export { validateBody } from './validation/middleware';
export type { BodyResult } from './validation/middleware';

export { ValidatedDecodePipeline, decodeAndValidate } from './pipeline/pipeline';
export type { PipelineOptions, PipelineResult } from './pipeline/pipeline';
export { toErrorBody, toErrorResponse } from './pipeline/response';
export type { ErrorBody, ErrorResponse } from './pipeline/response';

export {
  PipelineConfigSchema,
  loadPipelineConfig,
  resolvePipelineConfig,
} from './config/pipeline-config';
export type { PipelineConfig } from './config/pipeline-config';

export { ValidtreeError } from './errors/validtree-error';
export { ConfigError } from './errors/config-error';
export { DecodeError } from './errors/decode-error';
export { IOError } from './errors/io-error';
export { InternalMismatchError } from './errors/internal-mismatch-error';
export { SchemaError } from './errors/schema-error';
export type { SchemaViolation } from './errors/schema-error';
export { ValidationError } from './errors/validation-error';
export { isPipelineError } from './errors/pipeline-error';
export type { PipelineError } from './errors/pipeline-error';
export { ErrorHandler } from './errors/handler';
export { ErrorLogger } from './errors/logger';
export type { LogSink } from './errors/logger';
