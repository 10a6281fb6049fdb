import { ErrorRequestHandler, RequestHandler } from 'express';
import { Logger } from 'pino';
import { HttpError, InvariantViolationError, NotFoundError } from '../errors';

// Errors raised by express.json() carry the status to answer with.
function clientStatusOf(err: Error): number | undefined {
  if (err instanceof HttpError) return err.status;
  const status: unknown = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export const notFoundHandler: RequestHandler = (_req, _res, next) => {
  next(new NotFoundError());
};

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: Error, _req, res, _next) => {
    const requestId: unknown = res.locals.requestId;
    const status = clientStatusOf(err);

    if (status !== undefined) {
      const body: { error: string; details?: unknown } = { error: err.message };
      if (err instanceof HttpError && err.details !== undefined) {
        body.details = err.details;
      }
      res.status(status).json(body);
      return;
    }

    if (err instanceof InvariantViolationError) {
      logger.fatal({ err, requestId }, 'Invariant violated');
    } else {
      logger.error({ err, requestId }, 'Request failed');
    }
    res.status(500).json({ error: 'Internal Server Error' });
  };
}
