import type { Response } from 'express';
import type { Logger } from 'pino';
import { AppError, ConfigurationError } from '../utils/errors.js';

/**
 * AppErrors carry their own status; anything else is logged and
 * reported as a 500 with `fallbackMessage`.
 */
export function sendError(res: Response, err: unknown, log: Logger, fallbackMessage: string): void {
  if (err instanceof ConfigurationError) {
    res.status(err.statusCode).json({ error: err.message, code: err.code, issues: err.issues });
    return;
  }
  if (err instanceof AppError) {
    if (err.statusCode >= 500) log.error({ err }, fallbackMessage);
    res.status(err.statusCode).json({ error: err.message, code: err.code });
    return;
  }
  log.error({ err }, fallbackMessage);
  res.status(500).json({ error: fallbackMessage });
}
