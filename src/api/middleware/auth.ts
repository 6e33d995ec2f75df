import type { RequestHandler } from 'express';
import { config } from '../../config/env';
import { logger } from '../../utils/logger';

/**
 * Guards the JSON API with the `x-api-key` header. With no key configured
 * every request passes and a warning is logged once, when the guard is built.
 */
export function createApiKeyAuth(apiKey: string = config.api.apiKey): RequestHandler {
  if (!apiKey) {
    logger.warn('API_KEY is not set; /api/v1 routes accept unauthenticated requests');
    return (_req, _res, next) => next();
  }

  return (req, res, next) => {
    if (req.get('x-api-key') !== apiKey) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };
}
