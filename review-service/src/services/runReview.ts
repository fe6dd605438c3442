import type { Logger } from 'pino';
import { codePointLength } from '../types/types';
import type { ReviewRequest, ReviewResponse } from '../types/types';
import { generateReview } from '../pipeline/review';

export function runReview(request: ReviewRequest, logger: Logger): ReviewResponse {
  logger.info(
    { language: request.language, codeLength: codePointLength(request.code) },
    `Code review requested for ${request.language} code`,
  );
  const review = generateReview(request);
  logger.info(
    { language: request.language, findingCount: review.findings.length },
    `Code review completed: found ${review.findings.length} issues`,
  );
  return review;
}
