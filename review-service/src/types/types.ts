import { z } from 'zod';

export const MAX_CODE_LENGTH = 100000;
export const DEFAULT_LANGUAGE = 'python';

export const SEVERITIES = ['low', 'medium', 'high'] as const;

export const SeveritySchema = z.enum(SEVERITIES);

export type Severity = z.infer<typeof SeveritySchema>;

const text = z.string({
  required_error: 'Field required',
  invalid_type_error: 'Input should be a valid string',
});

// Characters are Unicode code points, so an emoji counts once.
export function codePointLength(value: string): number {
  return [...value].length;
}

const code = text.superRefine((value, ctx) => {
  const length = codePointLength(value);
  if (length < 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.too_small,
      type: 'string',
      minimum: 1,
      inclusive: true,
      message: 'String should have at least 1 character',
    });
  } else if (length > MAX_CODE_LENGTH) {
    ctx.addIssue({
      code: z.ZodIssueCode.too_big,
      type: 'string',
      maximum: MAX_CODE_LENGTH,
      inclusive: true,
      message: `String should have at most ${MAX_CODE_LENGTH} characters`,
    });
  }
});

export const ReviewRequestSchema = z.object(
  {
    code,
    language: text.default(DEFAULT_LANGUAGE),
  },
  {
    required_error: 'Field required',
    invalid_type_error: 'Input should be a valid dictionary or object',
  },
);

// What a client sends (language optional) vs. what the validator hands on.
export type ReviewRequestInput = z.input<typeof ReviewRequestSchema>;
export type ReviewRequest = z.output<typeof ReviewRequestSchema>;

export const FindingSchema = z.object({
  type: z.string().min(3),
  severity: SeveritySchema,
  line: z.number().int().positive(),
  message: z.string().min(5),
  suggestion: z.string().min(10),
});

export type Finding = z.infer<typeof FindingSchema>;

export const ReviewResponseSchema = z.object({
  status: z.literal('success'),
  findings: z.array(FindingSchema).min(1),
  summary: z.string().min(10),
});

export type ReviewResponse = z.infer<typeof ReviewResponseSchema>;

export type HealthResponse = { status: 'healthy' };

export type RootResponse = { message: string };

export const VALIDATION_ERROR_KINDS = [
  'missing',
  'type_error',
  'too_short',
  'too_long',
  'pattern_mismatch',
  'value_error',
  'json_invalid',
] as const;

export type ValidationErrorKind = (typeof VALIDATION_ERROR_KINDS)[number];

export const ValidationErrorDetailSchema = z.object({
  loc: z.array(z.union([z.string(), z.number()])),
  msg: z.string(),
  type: z.enum(VALIDATION_ERROR_KINDS),
});

export type ValidationErrorDetail = z.infer<typeof ValidationErrorDetailSchema>;

export const ValidationErrorResponseSchema = z.object({
  detail: z.array(ValidationErrorDetailSchema),
});

export type ValidationErrorResponse = z.infer<typeof ValidationErrorResponseSchema>;
