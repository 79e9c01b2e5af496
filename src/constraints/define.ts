import { DEFAULT_MESSAGES, defaultMessageId, renderMessage } from './messages';
import type {
  CheckContext,
  Constraint,
  ConstraintError,
  ConstraintKind,
  ConstraintOptions,
  ConstraintParams,
} from './types';

export interface ConstraintDefinition<T> {
  readonly kind: Exclude<ConstraintKind, 'custom'>;
  readonly params: ConstraintParams;
  readonly test: (value: T) => boolean;
  /** Extra params describing the rejected value, merged into the failure. */
  readonly describe?: (value: T) => ConstraintParams;
}

export function defineConstraint<T>(
  definition: ConstraintDefinition<T>,
  options: ConstraintOptions = {}
): Constraint<T> {
  const { kind, params, test, describe } = definition;
  const messageId = options.messageId ?? defaultMessageId(kind);

  return Object.freeze({
    kind,
    params,
    check(value: T, context: CheckContext): ConstraintError | undefined {
      if (test(value)) {
        return undefined;
      }
      const failureParams: ConstraintParams = describe ? { ...params, ...describe(value) } : params;
      return {
        kind,
        message: renderMessage(options.message, DEFAULT_MESSAGES[kind], failureParams),
        messageId,
        params: failureParams,
        ...(context.field !== undefined ? { field: context.field } : {}),
      };
    },
  });
}
