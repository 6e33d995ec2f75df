import type { RequestHandler } from 'express';

export interface CorsOptions {
  /** Exact origins, or bare domains whose subdomains are also allowed. */
  allowedOrigins: string[];
  /** Accept any http(s)://localhost origin. */
  allowLocalhost: boolean;
}

const LOCALHOST_RE = /^https?:\/\/localhost(:\d+)?$/;

export function isAllowedOrigin(origin: string, opts: CorsOptions): boolean {
  if (opts.allowLocalhost && LOCALHOST_RE.test(origin)) return true;
  return opts.allowedOrigins.some((allowed) => origin === allowed || origin.endsWith(`.${allowed}`));
}

/**
 * CORS headers for known origins, preflight answers, and no frame blocking
 * under /embed/.
 */
export function createCorsMiddleware(opts: CorsOptions): RequestHandler {
  return (req, res, next) => {
    const origin = req.get('origin');
    if (origin && isAllowedOrigin(origin, opts)) {
      res.set({
        'Access-Control-Allow-Origin': origin,
        'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
        'Access-Control-Allow-Headers': 'x-api-key, content-type',
      });
      res.vary('Origin');
    }

    if (req.path.startsWith('/embed/')) res.removeHeader('X-Frame-Options');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  };
}
