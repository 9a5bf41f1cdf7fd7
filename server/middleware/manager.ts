import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { Forbidden } from '../../conductor/errors';

export const MANAGER_TOKEN_HEADER = 'x-manager-token';

/**
 * Gate jam-manager routes behind a shared token.
 * No token configured = open access (local dev).
 */
export function requireManager(token: string | null): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!token) return next();
    if (req.header(MANAGER_TOKEN_HEADER) === token) return next();
    next(new Forbidden());
  };
}
