import * as YAML from 'yaml';
import { z } from 'zod';
import { DecodeError } from '../errors/decode-error';
import { formatZodError } from './errors';

export const DEFAULT_MAX_INPUT_BYTES = 1024 * 1024; // 1MB

export type InputFormat = 'json' | 'yaml';

/**
 * Raw request body. A `Buffer` is a `Uint8Array`.
 */
export type RawInput = string | Uint8Array;

export interface DecoderOptions {
  readonly maxInputBytes?: number;
}

export interface Decoder {
  readonly format: InputFormat;
  decode(raw: RawInput): unknown;
}

const contentSchema = z
  .string()
  .min(1, 'Content cannot be empty')
  .refine((value) => !value.includes('\0'), 'Content cannot contain null bytes');

const utf8 = new TextDecoder('utf-8', { fatal: true });

function byteLength(raw: RawInput): number {
  return typeof raw === 'string' ? Buffer.byteLength(raw, 'utf8') : raw.byteLength;
}

function toText(raw: RawInput, maxInputBytes: number): string {
  const size = byteLength(raw);
  if (size > maxInputBytes) {
    throw new DecodeError('Input exceeds maximum allowed size', {
      code: 'DECODE_SIZE_LIMIT',
      context: { data: { size, maxInputBytes } },
    });
  }

  let text: string;
  if (typeof raw === 'string') {
    text = raw;
  } else {
    try {
      text = utf8.decode(raw);
    } catch (error) {
      throw new DecodeError('Input is not valid UTF-8', { cause: error });
    }
  }

  const checked = contentSchema.safeParse(text);
  if (!checked.success) {
    throw new DecodeError('Input failed content checks', {
      context: { data: { issues: formatZodError(checked.error) } },
    });
  }
  return checked.data;
}

function parseFailure(format: InputFormat, error: unknown): DecodeError {
  return new DecodeError(`Failed to parse ${format.toUpperCase()} content`, {
    cause: error,
    context: {
      data: { format, message: error instanceof Error ? error.message : String(error) },
    },
  });
}

export function jsonDecoder(options: DecoderOptions = {}): Decoder {
  const maxInputBytes = options.maxInputBytes ?? DEFAULT_MAX_INPUT_BYTES;
  return {
    format: 'json',
    decode(raw: RawInput): unknown {
      const text = toText(raw, maxInputBytes);
      try {
        const value: unknown = JSON.parse(text);
        return value;
      } catch (error) {
        throw parseFailure('json', error);
      }
    },
  };
}

/**
 * `YAML.parse` with the core schema: no custom tags, nothing executable.
 */
export function yamlDecoder(options: DecoderOptions = {}): Decoder {
  const maxInputBytes = options.maxInputBytes ?? DEFAULT_MAX_INPUT_BYTES;
  return {
    format: 'yaml',
    decode(raw: RawInput): unknown {
      const text = toText(raw, maxInputBytes);
      try {
        const value: unknown = YAML.parse(text);
        return value;
      } catch (error) {
        throw parseFailure('yaml', error);
      }
    },
  };
}

export function createDecoder(format: InputFormat, options: DecoderOptions = {}): Decoder {
  switch (format) {
    case 'json':
      return jsonDecoder(options);
    case 'yaml':
      return yamlDecoder(options);
  }
}
