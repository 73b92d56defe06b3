import { createHash, timingSafeEqual } from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

export const ACCESS_PASSWORD_HEADER = 'x-access-password';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Shared-password gate. With no password configured every request passes;
 * otherwise the request header must match (compared in constant time).
 */
export function requireAccessPassword(password: string | undefined): RequestHandler {
  if (!password) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const expected = digest(password);
  return (req: Request, res: Response, next: NextFunction) => {
    const supplied = req.header(ACCESS_PASSWORD_HEADER);
    if (supplied === undefined || !timingSafeEqual(digest(supplied), expected)) {
      res.status(401).json({ error: 'unauthorized' });
      return;
    }
    next();
  };
}
