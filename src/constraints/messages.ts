import type { JsonValue } from '../errors/types';
import type { ConstraintKind, ConstraintParams, MessageFormatter } from './types';

type BuiltinKind = Exclude<ConstraintKind, 'custom'>;

export function formatParam(value: JsonValue | undefined): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return '';
  }
  return JSON.stringify(value);
}

export function formatMembers(value: JsonValue | undefined): string {
  return Array.isArray(value) ? value.map((member) => formatParam(member)).join(', ') : formatParam(value);
}

export const DEFAULT_MESSAGES: Readonly<Record<BuiltinKind, MessageFormatter>> = {
  minimum: (p) => `the number must be >= ${formatParam(p.minimum)}.`,
  maximum: (p) => `the number must be <= ${formatParam(p.maximum)}.`,
  exclusiveMinimum: (p) => `the number must be > ${formatParam(p.exclusiveMinimum)}.`,
  exclusiveMaximum: (p) => `the number must be < ${formatParam(p.exclusiveMaximum)}.`,
  multipleOf: (p) => `the value must be multiple of ${formatParam(p.multipleOf)}.`,
  minLength: (p) => `the length of the value must be >= ${formatParam(p.minLength)}.`,
  maxLength: (p) => `the length of the value must be <= ${formatParam(p.maxLength)}.`,
  pattern: (p) => `the value must match the pattern of "${formatParam(p.pattern)}".`,
  minItems: (p) => `the length of the items must be >= ${formatParam(p.minItems)}.`,
  maxItems: (p) => `the length of the items must be <= ${formatParam(p.maxItems)}.`,
  uniqueItems: () => 'the items must be unique.',
  minProperties: (p) => `the size of the properties must be >= ${formatParam(p.minProperties)}.`,
  maxProperties: (p) => `the size of the properties must be <= ${formatParam(p.maxProperties)}.`,
  enumerate: (p) => `the value must be in [${formatMembers(p.enumerate)}].`,
};

/**
 * `exclusiveMinimum` -> `exclusive-minimum`
 */
export function defaultMessageId(kind: ConstraintKind): string {
  return kind.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}

export function renderMessage(
  override: string | MessageFormatter | undefined,
  fallback: MessageFormatter,
  params: ConstraintParams
): string {
  if (typeof override === 'string') {
    return override;
  }
  return (override ?? fallback)(params);
}
