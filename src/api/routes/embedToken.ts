import { Router } from 'express';
import { z } from 'zod';
import { clampTtl, generateEmbedToken } from '../../embed/auth/embedToken';

const embedTokenRequestSchema = z.object({
  ttl: z.coerce.number().int().positive().optional().default(3600),
  viewer: z.string().min(1).max(200).optional(),
});

/**
 * POST /api/v1/embed-token  { ttl?, viewer? }
 * Called by the admin backend when it builds iframe URLs.
 */
export function createEmbedTokenRouter(): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const parsed = embedTokenRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'ttl must be a positive integer number of seconds' });
      return;
    }

    const expiresIn = clampTtl(parsed.data.ttl);
    res.json({ token: generateEmbedToken(expiresIn, parsed.data.viewer), expiresIn });
  });

  return router;
}
