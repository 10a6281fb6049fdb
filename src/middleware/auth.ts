import { RequestHandler } from 'express';
import { findMatchingToken } from '../auth/tokens';
import type { TokenConfig } from '../config';
import { UnauthorizedError } from '../errors';

export function requireToken(tokens: TokenConfig[]): RequestHandler {
  return (req, res, next) => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      return next(new UnauthorizedError('Missing or invalid Authorization header'));
    }

    findMatchingToken(header.slice('Bearer '.length).trim(), tokens).then((match) => {
      if (!match) {
        next(new UnauthorizedError('Invalid API token'));
        return;
      }
      res.locals.tokenName = match.name;
      next();
    }, next);
  };
}
