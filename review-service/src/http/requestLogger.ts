import type { RequestHandler } from 'express';
import type { Logger } from 'pino';
import { v4 as uuid } from 'uuid';

export const REQUEST_ID_HEADER = 'X-Request-Id';

export const requestLogger = (logger: Logger): RequestHandler => (req, res, next) => {
  const requestId = uuid();
  const startedAt = performance.now();
  const { method, path } = req;
  const log = logger.child({ requestId, method, path });

  res.setHeader(REQUEST_ID_HEADER, requestId);
  log.info(`Request started: ${method} ${path}`);

  // 'finish' never fires when the client goes away first; 'close' always does.
  let completed = false;
  const complete = () => {
    if (completed) return;
    completed = true;
    const durationMs = Math.round((performance.now() - startedAt) * 100) / 100;
    log.info(
      { statusCode: res.statusCode, durationMs, aborted: !res.writableFinished },
      `Request completed: ${method} ${path}`,
    );
  };
  res.once('finish', complete);
  res.once('close', complete);

  next();
};
