import type { NextFunction, Request, Response } from 'express';
import { sendError } from './errorResponse.js';

/** Operator gate; disabled when no key is configured. */
export function createMasterApiKeyMiddleware(masterApiKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!masterApiKey) {
      next();
      return;
    }

    const incoming = req.header('x-api-key') || '';
    if (incoming !== masterApiKey) {
      sendError(res, 401, 'UNAUTHORIZED', 'Missing or invalid x-api-key');
      return;
    }

    next();
  };
}
