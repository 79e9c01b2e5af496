import { ConfigError } from '../errors/config-error';
import { defineConstraint } from './define';
import type { Constraint, ConstraintOptions } from './types';

export interface LengthLimit {
  readonly min?: number;
  readonly max?: number;
}

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Length in extended grapheme clusters, so `"é"` counts as one.
 */
export function stringLength(value: string): number {
  return Array.from(graphemes.segment(value)).length;
}

export function validateStringLength(value: string, limit: LengthLimit): boolean {
  const length = stringLength(value);
  if (limit.min !== undefined && length < limit.min) {
    return false;
  }
  return limit.max === undefined || length <= limit.max;
}

export function validateStringPattern(value: string, pattern: RegExp): boolean {
  return pattern.test(value);
}

export function assertLength(kind: string, limit: number): void {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ConfigError(`${kind} must be a non-negative integer`, {
      context: { data: { kind, limit: String(limit) } },
    });
  }
}

export function minLength(limit: number, options?: ConstraintOptions): Constraint<string> {
  assertLength('minLength', limit);
  return defineConstraint<string>(
    {
      kind: 'minLength',
      params: { minLength: limit },
      test: (value) => validateStringLength(value, { min: limit }),
      describe: (value) => ({ length: stringLength(value) }),
    },
    options
  );
}

export function maxLength(limit: number, options?: ConstraintOptions): Constraint<string> {
  assertLength('maxLength', limit);
  return defineConstraint<string>(
    {
      kind: 'maxLength',
      params: { maxLength: limit },
      test: (value) => validateStringLength(value, { max: limit }),
      describe: (value) => ({ length: stringLength(value) }),
    },
    options
  );
}

function patternFlags(source: string | RegExp): string {
  if (typeof source === 'string') {
    return 'u';
  }
  // `g` and `y` make `test` stateful across calls.
  const kept = source.flags.replace(/[gy]/g, '');
  return kept.includes('u') || kept.includes('v') ? kept : `${kept}u`;
}

/**
 * Compiles the expression once; the returned constraint shares it across runs.
 * A `RegExp` keeps its flags, except `g` and `y`.
 */
export function compilePattern(source: string | RegExp): RegExp {
  const text = typeof source === 'string' ? source : source.source;
  try {
    return new RegExp(text, patternFlags(source));
  } catch (error) {
    throw new ConfigError(`Invalid pattern: ${text}`, {
      cause: error,
      context: { data: { pattern: text } },
    });
  }
}

export function pattern(source: string | RegExp, options?: ConstraintOptions): Constraint<string> {
  const compiled = compilePattern(source);
  return defineConstraint<string>(
    {
      kind: 'pattern',
      params: { pattern: compiled.source },
      test: (value) => validateStringPattern(value, compiled),
      describe: (value) => ({ value }),
    },
    options
  );
}
