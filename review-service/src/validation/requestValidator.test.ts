import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { toValidationErrors, validateReviewRequest } from './requestValidator';

describe('validateReviewRequest', () => {
  it('defaults language to python', () => {
    expect(validateReviewRequest({ code: 'x=1' })).toEqual({
      success: true,
      data: { code: 'x=1', language: 'python' },
    });
  });

  it('keeps an explicit language, including an empty one', () => {
    expect(validateReviewRequest({ code: 'print(1)', language: 'javascript' })).toEqual({
      success: true,
      data: { code: 'print(1)', language: 'javascript' },
    });
    expect(validateReviewRequest({ code: 'print(1)', language: '' })).toEqual({
      success: true,
      data: { code: 'print(1)', language: '' },
    });
  });

  it('drops unknown fields instead of rejecting them', () => {
    expect(validateReviewRequest({ code: 'a', extra: true, version: 2 })).toEqual({
      success: true,
      data: { code: 'a', language: 'python' },
    });
  });

  it('accepts code at exactly the maximum length', () => {
    const result = validateReviewRequest({ code: 'x'.repeat(100000) });
    expect(result.success).toBe(true);
  });

  it('counts astral characters once against the maximum length', () => {
    const code = '\u{1F600}'.repeat(100000);

    expect(validateReviewRequest({ code })).toEqual({ success: true, data: { code, language: 'python' } });
    expect(validateReviewRequest({ code: '\u{1F600}'.repeat(50001) }).success).toBe(true);
  });

  it('rejects astral code over the maximum length', () => {
    expect(validateReviewRequest({ code: '\u{1F600}'.repeat(100001) })).toEqual({
      success: false,
      errors: [{ loc: ['body', 'code'], msg: 'String should have at most 100000 characters', type: 'too_long' }],
    });
  });

  it('accepts a single astral character', () => {
    expect(validateReviewRequest({ code: '\u{1F600}' }).success).toBe(true);
  });

  it('reports a missing code field', () => {
    expect(validateReviewRequest({ language: 'python' })).toEqual({
      success: false,
      errors: [{ loc: ['body', 'code'], msg: 'Field required', type: 'missing' }],
    });
  });

  it.each([{ code: 42 }, { code: true }, { code: null }, { code: ['x'] }, { code: { text: 'x' } }])(
    'rejects non-string code $code',
    body => {
      expect(validateReviewRequest(body)).toEqual({
        success: false,
        errors: [{ loc: ['body', 'code'], msg: 'Input should be a valid string', type: 'type_error' }],
      });
    },
  );

  it('rejects empty code', () => {
    expect(validateReviewRequest({ code: '' })).toEqual({
      success: false,
      errors: [{ loc: ['body', 'code'], msg: 'String should have at least 1 character', type: 'too_short' }],
    });
  });

  it('rejects code over the maximum length', () => {
    expect(validateReviewRequest({ code: 'a'.repeat(100001) })).toEqual({
      success: false,
      errors: [{ loc: ['body', 'code'], msg: 'String should have at most 100000 characters', type: 'too_long' }],
    });
  });

  it('rejects a null language', () => {
    expect(validateReviewRequest({ code: 'x', language: null })).toEqual({
      success: false,
      errors: [{ loc: ['body', 'language'], msg: 'Input should be a valid string', type: 'type_error' }],
    });
  });

  it('reports every failing field', () => {
    expect(validateReviewRequest({ code: '', language: 5 })).toEqual({
      success: false,
      errors: [
        { loc: ['body', 'code'], msg: 'String should have at least 1 character', type: 'too_short' },
        { loc: ['body', 'language'], msg: 'Input should be a valid string', type: 'type_error' },
      ],
    });
  });

  it('rejects a body that is not an object', () => {
    expect(validateReviewRequest(undefined)).toEqual({
      success: false,
      errors: [{ loc: ['body'], msg: 'Field required', type: 'missing' }],
    });
    expect(validateReviewRequest(['code'])).toEqual({
      success: false,
      errors: [{ loc: ['body'], msg: 'Input should be a valid dictionary or object', type: 'type_error' }],
    });
  });
});

describe('toValidationErrors', () => {
  it('labels enum and pattern failures by their own kind', () => {
    const schema = z.object({
      severity: z.enum(['low', 'medium', 'high']),
      name: z.string().regex(/^[a-z]+$/),
      count: z.number().min(1).max(3),
    });
    const parsed = schema.safeParse({ severity: 'urgent', name: 'Long Method', count: 0 });
    if (parsed.success) throw new Error('expected the input to be rejected');

    expect(toValidationErrors(parsed.error.issues).map(e => [e.loc, e.type])).toEqual([
      [['body', 'severity'], 'value_error'],
      [['body', 'name'], 'pattern_mismatch'],
      [['body', 'count'], 'too_short'],
    ]);
  });
});
