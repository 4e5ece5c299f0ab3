import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';
import { ValidationError, type IssueLocation, type ValidationIssue } from './errors.js';

function issueType(issue: ZodIssue): string {
  switch (issue.code) {
    case 'too_small':
      if (issue.type === 'string') return 'string_too_short';
      if (issue.type === 'number' || issue.type === 'bigint') {
        return issue.inclusive ? 'greater_than_equal' : 'greater_than';
      }
      return 'too_short';
    case 'too_big':
      if (issue.type === 'string') return 'string_too_long';
      if (issue.type === 'number' || issue.type === 'bigint') {
        return issue.inclusive ? 'less_than_equal' : 'less_than';
      }
      return 'too_long';
    case 'invalid_type':
      if (issue.received === 'undefined') return 'missing';
      if (issue.received === 'nan') return 'number_parsing';
      return `${issue.expected}_type`;
    case 'invalid_string':
      return issue.validation === 'datetime' ? 'datetime_parsing' : 'string_pattern_mismatch';
    default:
      return issue.code;
  }
}

export function toValidationIssues(issues: ZodIssue[], location: IssueLocation): ValidationIssue[] {
  return issues.map(issue => ({
    loc: [location, ...issue.path],
    msg: issue.message,
    type: issueType(issue),
  }));
}

/**
 * Parse `input` with `schema`, throwing a {@link ValidationError} whose issue
 * locations are prefixed with where the input came from.
 */
export function parseOrThrow<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  input: unknown,
  location: IssueLocation,
): Output {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(toValidationIssues(parsed.error.issues, location));
  }
  return parsed.data;
}
