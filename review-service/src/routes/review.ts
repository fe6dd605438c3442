import { Router } from 'express';
import type { Logger } from 'pino';
import { runReview } from '../services/runReview';
import { ReviewResponseSchema } from '../types/types';
import { validateReviewRequest } from '../validation/requestValidator';
import { buildRejectionPayload } from '../http/errors';

export const reviewRouter = (logger: Logger) => {
  const r = Router();

  r.post('/review', (req, res) => {
    const validated = validateReviewRequest(req.body);
    if (!validated.success) {
      logger.info({ errors: validated.errors.length }, 'review request rejected');
      res.status(422).json(buildRejectionPayload(validated.errors));
      return;
    }
    const review = runReview(validated.data, logger);
    res.json(ReviewResponseSchema.parse(review));
  });

  return r;
};
