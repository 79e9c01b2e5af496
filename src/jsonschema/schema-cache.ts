import Ajv from 'ajv';
import { ConfigError } from '../errors/config-error';
import { ErrorLogger } from '../errors/logger';
import type { SchemaViolation } from '../errors/schema-error';
import type { Schema } from '../schema/declarations';
import { generateJsonSchema } from './generate';
import type { JSONSchema } from './types';
import { toSchemaViolations } from './violations';

export type SchemaCheckResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly violations: readonly SchemaViolation[] };

export interface CompiledSchema {
  /** The document actually enforced; `{}` when compilation failed. */
  readonly schema: JSONSchema;
  check(value: unknown): SchemaCheckResult;
}

export interface SchemaCacheOptions {
  ajv?: Ajv;
  logger?: ErrorLogger;
}

export function createAjv(): Ajv {
  return new Ajv({
    allErrors: true,
    strict: false,
    strictNumbers: true,
  });
}

/**
 * Compiled JSON Schemas, one per declaration. Entries are pure functions of
 * their declaration, so a later compile of the same declaration (after
 * `clear()`) is interchangeable with the first.
 */
export class SchemaCache {
  private readonly ajv: Ajv;
  private readonly logger: ErrorLogger;
  private readonly entries = new Map<Schema<unknown>, CompiledSchema>();

  constructor(options: SchemaCacheOptions = {}) {
    this.ajv = options.ajv ?? createAjv();
    this.logger = options.logger ?? new ErrorLogger();
  }

  compile(type: Schema<unknown>): CompiledSchema {
    const cached = this.entries.get(type);
    if (cached) {
      return cached;
    }
    const compiled = this.build(type);
    this.entries.set(type, compiled);
    return compiled;
  }

  check(type: Schema<unknown>, value: unknown): SchemaCheckResult {
    return this.compile(type).check(value);
  }

  has(type: Schema<unknown>): boolean {
    return this.entries.has(type);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private build(type: Schema<unknown>): CompiledSchema {
    const generated = generateJsonSchema(type);
    try {
      return this.wrap(generated);
    } catch (error) {
      this.logger.logError(
        new ConfigError('Failed to compile JSON Schema; falling back to a permissive schema', {
          cause: error,
          context: {
            module: 'jsonschema/schema-cache',
            data: { title: generated.title ?? null },
          },
        })
      );
      return this.wrap({});
    }
  }

  private wrap(schema: JSONSchema): CompiledSchema {
    const validate = this.ajv.compile(schema);
    return {
      schema,
      check(value: unknown): SchemaCheckResult {
        if (validate(value)) {
          return { valid: true };
        }
        return { valid: false, violations: toSchemaViolations(validate.errors) };
      },
    };
  }
}

export const defaultSchemaCache = new SchemaCache();
