import type { ErrorRequestHandler, RequestHandler } from 'express';
import type { Logger } from 'pino';
import type { ValidationErrorDetail, ValidationErrorResponse } from '../types/types';

type BodyParserError = { type: string };

function isBodyParserError(err: unknown): err is BodyParserError {
  return typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string';
}

export function buildRejectionPayload(errors: ValidationErrorDetail[]): ValidationErrorResponse {
  return { detail: errors };
}

export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({ detail: 'Not Found' });
};

export const errorHandler = (logger: Logger): ErrorRequestHandler => (err: unknown, req, res, _next) => {
  if (isBodyParserError(err) && err.type === 'entity.parse.failed') {
    res.status(422).json(buildRejectionPayload([{ loc: ['body'], msg: 'JSON decode error', type: 'json_invalid' }]));
    return;
  }
  if (isBodyParserError(err) && err.type === 'entity.too.large') {
    res.status(413).json({ detail: 'Request body too large' });
    return;
  }
  logger.error({ err, method: req.method, path: req.path }, 'unhandled request error');
  res.status(500).json({ detail: 'Internal Server Error' });
};
