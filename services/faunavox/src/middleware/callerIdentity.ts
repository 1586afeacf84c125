import type { NextFunction, Request, Response } from 'express';
import { sendError } from './errorResponse.js';

const CALLER_HEADER = 'x-caller-id';
const MAX_CALLER_ID_LENGTH = 200;

/**
 * Trusts the caller id set by the upstream gateway.
 *
 * On success:
 * - stores the caller id under `res.locals.callerId`
 */
export function createRequireCaller() {
  return (req: Request, res: Response, next: NextFunction) => {
    const callerId = (req.header(CALLER_HEADER) || '').trim();
    if (!callerId || callerId.length > MAX_CALLER_ID_LENGTH) {
      sendError(res, 401, 'UNAUTHORIZED', `Missing or invalid ${CALLER_HEADER} header`);
      return;
    }

    res.locals.callerId = callerId;
    next();
  };
}

export function callerIdOf(res: Response): string | null {
  const value: unknown = res.locals.callerId;
  return typeof value === 'string' && value.length > 0 ? value : null;
}
