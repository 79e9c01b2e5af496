/**
 * Secure YAML Loader
 *
 * Layer 1: Path confinement - every file must resolve inside `baseDir`
 * Layer 2: Safe parsing - core schema only, no custom tags
 * Layer 3: Schema validation - optional JSON Schema check of the document
 *
 * Used for configuration and message catalogs, never for request bodies.
 *
 * @module loaders/yaml-loader
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import Ajv from 'ajv';
import { DecodeError } from '../errors/decode-error';
import { IOError } from '../errors/io-error';
import { SchemaError } from '../errors/schema-error';
import type { JSONSchema } from '../jsonschema/types';
import { toSchemaViolations } from '../jsonschema/violations';
import { pathExists } from '../utils/fs';

export interface SecureYAMLLoaderOptions {
  /**
   * Base directory for all file operations
   */
  baseDir: string;

  /**
   * Whether to follow symbolic links (default: false)
   */
  followSymlinks?: boolean;

  /**
   * Maximum file size in bytes (default: 1MB)
   */
  maxFileSize?: number;
}

export class SecureYAMLLoader {
  private readonly baseDir: string;
  private readonly followSymlinks: boolean;
  private readonly maxFileSize: number;
  private readonly ajv: Ajv;

  constructor(options: SecureYAMLLoaderOptions) {
    this.baseDir = path.resolve(options.baseDir);
    this.followSymlinks = options.followSymlinks ?? false;
    this.maxFileSize = options.maxFileSize ?? 1024 * 1024;
    this.ajv = new Ajv({ allErrors: true, strict: false });
  }

  /**
   * Resolve `filePath` against the base directory.
   *
   * @throws IOError (`IO_PERMISSION_DENIED`) if the path escapes it
   */
  sanitizePath(filePath: string): string {
    const resolvedPath = path.resolve(this.baseDir, filePath);
    const relativePath = path.relative(this.baseDir, resolvedPath);

    if (relativePath.startsWith('..') || path.isAbsolute(relativePath)) {
      throw new IOError(`Path escapes base directory: ${filePath}`, {
        code: 'IO_PERMISSION_DENIED',
        context: { requestedPath: filePath, baseDir: this.baseDir },
      });
    }

    return resolvedPath;
  }

  private safeParse(content: string, filePath: string): unknown {
    try {
      const parsed: unknown = YAML.parse(content);
      return parsed;
    } catch (error) {
      throw new DecodeError(`Failed to parse YAML file: ${filePath}`, {
        cause: error,
        context: {
          data: { filePath, message: error instanceof Error ? error.message : String(error) },
        },
      });
    }
  }

  /**
   * @throws SchemaError listing every violation
   */
  validateSchema(data: unknown, schema: JSONSchema, filePath?: string): void {
    // ajv keeps compiled schemas keyed by the schema object.
    const validate = this.ajv.compile(schema);
    if (!validate(data)) {
      throw new SchemaError(toSchemaViolations(validate.errors), {
        context: filePath ? { data: { filePath } } : undefined,
      });
    }
  }

  /**
   * Load and parse a YAML file with all layers.
   *
   * @throws IOError, DecodeError, SchemaError
   */
  async load(filePath: string, schema?: JSONSchema): Promise<unknown> {
    const sanitizedPath = this.sanitizePath(filePath);

    if (!(await pathExists(sanitizedPath))) {
      throw new IOError(`File not found: ${filePath}`, {
        code: 'IO_NOT_FOUND',
        context: { requestedPath: filePath, resolvedPath: sanitizedPath },
      });
    }

    const stats = await fs.lstat(sanitizedPath);

    if (stats.isSymbolicLink() && !this.followSymlinks) {
      throw new IOError(`Symbolic links not allowed: ${filePath}`, {
        code: 'IO_PERMISSION_DENIED',
        context: { requestedPath: filePath },
      });
    }

    if (stats.size > this.maxFileSize) {
      throw new IOError(`File too large: ${stats.size} bytes (max: ${this.maxFileSize})`, {
        code: 'IO_SIZE_LIMIT',
        context: { resolvedPath: sanitizedPath, fileSize: stats.size, maxSize: this.maxFileSize },
      });
    }

    const content = await fs.readFile(sanitizedPath, 'utf-8');
    const parsed = this.safeParse(content, filePath);

    if (schema) {
      this.validateSchema(parsed, schema, filePath);
    }

    return parsed;
  }
}
