import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../../config/env';

export const EMBED_SCOPE = 'admin-dashboard';

const embedTokenPayloadSchema = z.object({
  scope: z.literal(EMBED_SCOPE),
  viewer: z.string().optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type EmbedTokenPayload = z.infer<typeof embedTokenPayloadSchema>;

// Augment Express Request so downstream handlers see the verified token
declare global {
  namespace Express {
    interface Request {
      embedToken?: EmbedTokenPayload;
    }
  }
}

export const MIN_TOKEN_TTL = 300;
export const MAX_TOKEN_TTL = 86400;

export function clampTtl(ttlSeconds: number): number {
  return Math.max(MIN_TOKEN_TTL, Math.min(MAX_TOKEN_TTL, ttlSeconds));
}

/**
 * Generate a short-lived token that lets an iframe load the dashboard
 * without an API key.
 */
export function generateEmbedToken(ttlSeconds = 3600, viewer?: string): string {
  const payload: EmbedTokenPayload = viewer ? { scope: EMBED_SCOPE, viewer } : { scope: EMBED_SCOPE };
  return jwt.sign(payload, config.api.embedSecret, { expiresIn: ttlSeconds });
}

/** Throws if the token is invalid, expired or not an embed token. */
export function verifyEmbedToken(token: string): EmbedTokenPayload {
  return embedTokenPayloadSchema.parse(jwt.verify(token, config.api.embedSecret));
}

/**
 * Express middleware for /embed/* pages. Attaches req.embedToken on
 * success, answers 401 otherwise.
 */
export function embedAuthMiddleware(req: Request, res: Response, next: NextFunction) {
  const token = typeof req.query.token === 'string' ? req.query.token : undefined;

  if (!token) {
    res.status(401).send('Missing embed token');
    return;
  }

  try {
    req.embedToken = verifyEmbedToken(token);
  } catch {
    res.status(401).send('Invalid or expired embed token');
    return;
  }
  next();
}
