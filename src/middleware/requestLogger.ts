import { RequestHandler } from 'express';
import { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';

export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const requestId = req.get('x-request-id') || uuidv4();
    const started = Date.now();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    res.on('finish', () => {
      const token: unknown = res.locals.tokenName;
      logger.info(
        {
          requestId,
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - started,
          token: typeof token === 'string' ? token : undefined,
        },
        'Request completed'
      );
    });

    next();
  };
}
