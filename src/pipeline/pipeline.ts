/**
 * Validated decode: raw input to a bound, constraint-checked value.
 *
 * Stages run once, in order, and the first failure is terminal:
 *
 * 1. decoding: text to a generic value (`DecodeError`)
 * 2. schemaChecking: optional JSON Schema check (`SchemaError`); a failure
 *    here is reported without attempting to bind
 * 3. deserializing: binding to the declared type (`DecodeError`, or
 *    `InternalMismatchError` when the schema check had passed)
 * 4. validating: the type's validator (`ValidationError`)
 *
 * @module pipeline/pipeline
 */

import { DecodeError } from '../errors/decode-error';
import { InternalMismatchError } from '../errors/internal-mismatch-error';
import { ErrorLogger } from '../errors/logger';
import { isPipelineError } from '../errors/pipeline-error';
import type { PipelineError } from '../errors/pipeline-error';
import { SchemaError } from '../errors/schema-error';
import { ValidationError } from '../errors/validation-error';
import { defaultSchemaCache } from '../jsonschema/schema-cache';
import type { SchemaCache } from '../jsonschema/schema-cache';
import type { InferShape, ObjectSchema, ObjectShape } from '../schema/declarations';
import { binderFor } from '../validation/binder';
import { createDecoder } from '../validation/decoders';
import type { Decoder, InputFormat, RawInput } from '../validation/decoders';
import { formatZodError } from '../validation/errors';

export interface PipelineOptions {
  /** Ignored when `decoder` is given. Defaults to `json`. */
  format?: InputFormat;
  decoder?: Decoder;
  /** Run the JSON Schema check before binding. Defaults to true. */
  schemaCheck?: boolean;
  schemaCache?: SchemaCache;
  maxInputBytes?: number;
  logger?: ErrorLogger;
}

export type PipelineResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: PipelineError };

export class ValidatedDecodePipeline<S extends ObjectShape> {
  private readonly decoder: Decoder;
  private readonly schemaCheck: boolean;
  private readonly schemaCache: SchemaCache;
  private readonly logger: ErrorLogger;

  constructor(
    readonly type: ObjectSchema<S>,
    options: PipelineOptions = {}
  ) {
    this.decoder =
      options.decoder ??
      createDecoder(options.format ?? 'json', { maxInputBytes: options.maxInputBytes });
    this.schemaCheck = options.schemaCheck ?? true;
    this.schemaCache = options.schemaCache ?? defaultSchemaCache;
    this.logger = options.logger ?? new ErrorLogger();
  }

  /**
   * Errors outside the pipeline taxonomy (a throwing custom check, say)
   * propagate unchanged.
   */
  run(raw: RawInput): PipelineResult<InferShape<S>> {
    try {
      return { ok: true, value: this.execute(raw) };
    } catch (error) {
      if (!isPipelineError(error)) {
        throw error;
      }
      if (error.kind === 'internalMismatch') {
        this.logger.logError(error, {
          module: 'pipeline',
          operation: 'decodeAndValidate',
          type: this.type.name,
        });
      }
      return { ok: false, error };
    }
  }

  parse(raw: RawInput): InferShape<S> {
    const result = this.run(raw);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  /**
   * Awaits the input, then runs synchronously.
   */
  async parseAsync(raw: RawInput | Promise<RawInput>): Promise<InferShape<S>> {
    return this.parse(await raw);
  }

  private execute(raw: RawInput): InferShape<S> {
    const decoded = this.decoder.decode(raw);

    if (this.schemaCheck) {
      const checked = this.schemaCache.check(this.type, decoded);
      if (!checked.valid) {
        throw new SchemaError(checked.violations, { context: { data: { type: this.type.name } } });
      }
    }

    const bound = this.bind(decoded);
    const errors = this.type.validate(bound);
    if (errors) {
      throw new ValidationError(errors);
    }
    return bound;
  }

  private bind(decoded: unknown): InferShape<S> {
    const result = binderFor(this.type).safeParse(decoded);
    if (!result.success) {
      const issues = formatZodError(result.error);
      if (this.schemaCheck) {
        throw new InternalMismatchError(
          `Value of type ${this.type.name} passed the schema check but could not be bound`,
          { cause: result.error, context: { data: { type: this.type.name, issues } } }
        );
      }
      throw new DecodeError('Value does not match the target type', {
        code: 'DECODE_TYPE_MISMATCH',
        stage: 'deserializing',
        cause: result.error,
        context: { data: { type: this.type.name, issues } },
      });
    }

    const bound = result.data;
    if (!this.type.conforms(bound)) {
      throw new InternalMismatchError(
        `Bound value does not conform to the declaration of ${this.type.name}`
      );
    }
    return bound;
  }
}

export function decodeAndValidate<S extends ObjectShape>(
  type: ObjectSchema<S>,
  raw: RawInput,
  options: PipelineOptions = {}
): PipelineResult<InferShape<S>> {
  return new ValidatedDecodePipeline(type, options).run(raw);
}
