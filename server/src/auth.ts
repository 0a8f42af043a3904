/**
 * Bearer-token authentication against the configured master key
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { AuthenticationError } from '@modsync/core';

/**
 * Constant-time comparison of a presented key with the master key.
 * Both sides are hashed first so the lengths always agree.
 */
export function checkApiKey(masterKey: string, presented: string): boolean {
  const expected = createHash('sha256').update(masterKey).digest();
  const provided = createHash('sha256').update(presented).digest();
  return timingSafeEqual(expected, provided);
}

export function requireApiKey(masterKey: string) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const header = req.headers.authorization ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (!match || !checkApiKey(masterKey, match[1].trim())) {
      next(new AuthenticationError());
      return;
    }
    next();
  };
}
