import type { Response } from 'express';
import { FaunavoxError, errorMessage } from '../core/errors.js';

export function sendError(res: Response, status: number, code: string, message: string, details?: Record<string, unknown>): void {
  res.status(status).json({
    error: details ? { code, message, details } : { code, message },
  });
}

/** Maps a thrown error onto the `{ error: { code, message } }` envelope. */
export function sendFailure(res: Response, error: unknown, fallbackMessage: string): void {
  if (error instanceof FaunavoxError) {
    sendError(res, error.statusCode, error.code, error.message, error.details);
    return;
  }
  console.error(`[faunavox] unhandled_error message=${errorMessage(error, fallbackMessage)}`, error);
  sendError(res, 500, 'INTERNAL_ERROR', fallbackMessage);
}
