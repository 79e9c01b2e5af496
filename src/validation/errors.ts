import { ZodError, ZodIssue } from 'zod';
import { joinPointer } from '../error-tree/flatten';

/**
 * JSON pointer of the issue, in the wire names of the checked value.
 */
export function issuePointer(issue: ZodIssue): string {
  return issue.path.reduce<string>((pointer, segment) => joinPointer(pointer, segment), '');
}

function formatField(issue: ZodIssue): string {
  if (issue.path.length === 0) {
    return 'value';
  }
  return issue.path.reduce<string>(
    (field, segment) =>
      typeof segment === 'number' ? `${field}[${segment}]` : field ? `${field}.${segment}` : segment,
    ''
  );
}

export function formatZodIssue(issue: ZodIssue): string {
  const field = formatField(issue);
  switch (issue.code) {
    case 'invalid_type':
      if (issue.received === 'undefined') {
        return `Parameter "${field}" is required`;
      }
      return `Parameter "${field}" must be of type ${issue.expected}`;
    case 'unrecognized_keys':
      return `Unknown ${issue.keys.length === 1 ? 'field' : 'fields'} in ${field}: ${issue.keys.join(', ')}`;
    case 'invalid_string':
      return `${field}: ${issue.message}`;
    case 'invalid_enum_value':
      return `Invalid ${field}: must be one of ${issue.options.join(', ')}`;
    case 'invalid_literal':
      return `Invalid ${field}: expected ${JSON.stringify(issue.expected)}`;
    case 'too_small': {
      const comparator = issue.inclusive ? 'at least' : 'greater than';
      if (issue.type === 'string') {
        return `${field} must be ${comparator} ${issue.minimum} characters`;
      }
      if (issue.type === 'array') {
        return `${field} must contain ${comparator} ${issue.minimum} items`;
      }
      return `${field} must be ${comparator} ${issue.minimum}`;
    }
    case 'too_big': {
      const comparator = issue.inclusive ? 'at most' : 'less than';
      if (issue.type === 'string') {
        return `${field} must be ${comparator} ${issue.maximum} characters`;
      }
      if (issue.type === 'array') {
        return `${field} must contain ${comparator} ${issue.maximum} items`;
      }
      return `${field} must be ${comparator} ${issue.maximum}`;
    }
    default:
      return issue.message || `Invalid ${field}`;
  }
}

export function formatZodError(error: ZodError): string[] {
  return error.issues.map((issue) => formatZodIssue(issue));
}
