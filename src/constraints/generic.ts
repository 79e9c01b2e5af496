import { isDeepStrictEqual } from 'util';
import type { JsonValue } from '../errors/types';
import { defineConstraint } from './define';
import { renderMessage } from './messages';
import type {
  CheckContext,
  Constraint,
  ConstraintError,
  ConstraintOptions,
  ConstraintParams,
} from './types';

export function validateEnumeratedValues(value: unknown, members: readonly unknown[]): boolean {
  return members.some((member) => isDeepStrictEqual(member, value));
}

export function enumerate<T extends JsonValue>(
  members: readonly T[],
  options?: ConstraintOptions
): Constraint<T> {
  const allowed: JsonValue[] = [...members];
  return defineConstraint<T>(
    {
      kind: 'enumerate',
      params: { enumerate: allowed },
      test: (value) => validateEnumeratedValues(value, allowed),
      describe: (value) => ({ value }),
    },
    options
  );
}

export interface CustomIssue {
  readonly message: string;
  readonly messageId?: string;
  readonly params?: ConstraintParams;
}

/**
 * `undefined` means the value passed.
 */
export type CustomOutcome = string | CustomIssue | undefined;

export type CustomCheck<T, A extends readonly unknown[]> = (value: T, ...args: A) => CustomOutcome;

/**
 * Wraps a user predicate. `args` are fixed at declaration and handed to every
 * call after the value.
 */
export function custom<T, A extends readonly unknown[]>(
  check: CustomCheck<T, A>,
  args: A,
  options: ConstraintOptions = {}
): Constraint<T> {
  return Object.freeze({
    kind: 'custom' as const,
    params: {},
    check(value: T, context: CheckContext): ConstraintError | undefined {
      const outcome = check(value, ...args);
      if (outcome === undefined) {
        return undefined;
      }
      const issue: CustomIssue = typeof outcome === 'string' ? { message: outcome } : outcome;
      const params = issue.params ?? {};
      return {
        kind: 'custom',
        message: renderMessage(options.message, () => issue.message, params),
        messageId: options.messageId ?? issue.messageId ?? 'custom',
        params,
        ...(context.field !== undefined ? { field: context.field } : {}),
      };
    },
  });
}
