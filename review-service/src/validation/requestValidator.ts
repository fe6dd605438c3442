import type { ZodIssue } from 'zod';
import { ReviewRequestSchema } from '../types/types';
import type { ReviewRequest, ValidationErrorDetail, ValidationErrorKind } from '../types/types';

export type ValidationResult =
  | { success: true; data: ReviewRequest }
  | { success: false; errors: ValidationErrorDetail[] };

function errorKind(issue: ZodIssue): ValidationErrorKind {
  switch (issue.code) {
    case 'invalid_type':
      return issue.received === 'undefined' ? 'missing' : 'type_error';
    case 'too_small':
      return 'too_short';
    case 'too_big':
      return 'too_long';
    case 'invalid_string':
      return 'pattern_mismatch';
    case 'invalid_literal':
    case 'invalid_enum_value':
    case 'invalid_union':
    case 'invalid_union_discriminator':
    case 'invalid_intersection_types':
    case 'invalid_date':
    case 'invalid_arguments':
    case 'invalid_return_type':
    case 'not_multiple_of':
    case 'not_finite':
    case 'unrecognized_keys':
    case 'custom':
      return 'value_error';
    default: {
      const unhandled: never = issue;
      return unhandled;
    }
  }
}

export function toValidationErrors(issues: ZodIssue[]): ValidationErrorDetail[] {
  return issues.map(issue => ({
    loc: ['body', ...issue.path],
    msg: issue.message,
    type: errorKind(issue),
  }));
}

export function validateReviewRequest(input: unknown): ValidationResult {
  const parsed = ReviewRequestSchema.safeParse(input);
  if (!parsed.success) {
    return { success: false, errors: toValidationErrors(parsed.error.issues) };
  }
  return { success: true, data: parsed.data };
}
