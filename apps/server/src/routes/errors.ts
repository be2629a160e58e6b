import type { Response } from 'express';
import { errorMessage, InputError } from '../utils/errors';
import type { Logger } from '../utils/logger';

export function sendError(res: Response, log: Logger, error: unknown, failure: string) {
  if (error instanceof InputError) {
    log.warn(`${failure}: ${error.message}`);
    return res.status(400).json({ error: failure, message: error.message, details: error.details ?? [] });
  }
  log.error(`${failure}:`, error);
  return res.status(500).json({ error: failure, message: errorMessage(error) });
}
