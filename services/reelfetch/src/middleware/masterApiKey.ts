import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

function keysMatch(incoming: string, expected: string): boolean {
  const a = Buffer.from(incoming);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function createMasterApiKeyMiddleware(masterApiKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!masterApiKey) {
      next();
      return;
    }

    const incoming = req.header('x-api-key') || '';
    if (!keysMatch(incoming, masterApiKey)) {
      res.status(401).json({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Missing or invalid x-api-key',
        },
      });
      return;
    }

    next();
  };
}
