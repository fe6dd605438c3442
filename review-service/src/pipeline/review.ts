import { codePointLength } from '../types/types';
import type { Finding, ReviewRequest, ReviewResponse } from '../types/types';
import { MOCK_FINDINGS } from './findings';
import { summarizeReview } from './summarize';

export function generateReview(request: ReviewRequest): ReviewResponse {
  const findings: Finding[] = MOCK_FINDINGS.map(f => ({ ...f }));
  const summary = summarizeReview.summarize({
    codeLength: codePointLength(request.code),
    language: request.language,
    findingCount: findings.length,
  });
  return { status: 'success', findings, summary };
}
