import { Router, Request, Response } from 'express';
import { config } from '../../config/env';
import { embedAuthMiddleware } from '../auth/embedToken';
import { renderDashboardGrid } from '../templates/dashboardGrid';
import { embedQuerySchema, renderContextFor, describeQueryError } from './query';
import { logger, errorMessage } from '../../utils/logger';
import type { DashboardDataSource } from '../../data/dashboardSource';

/**
 * GET /embed/dashboard?token=T&theme=light&range=30
 * Returns the full dashboard page.
 */
export function createDashboardRouter(source: DashboardDataSource): Router {
  const router = Router();

  router.get('/', embedAuthMiddleware, async (req: Request, res: Response) => {
    const parsed = embedQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).send(`Invalid query: ${describeQueryError(parsed.error)}`);
      return;
    }

    try {
      const data = await source.load();
      const ctx = renderContextFor(parsed.data, req.baseUrl, {
        newsUrl: config.dashboard.newsUrl,
        stylesheetHref: config.dashboard.stylesheetHref,
      });
      const html = renderDashboardGrid({ data, title: config.dashboard.title, ctx });

      res.setHeader('Content-Type', 'text/html; charset=utf-8');
      res.setHeader('Cache-Control', `private, max-age=${config.dashboard.cacheMaxAgeSeconds}`);
      res.send(html);
    } catch (err) {
      logger.error('Dashboard render error', { error: errorMessage(err) });
      res.status(500).send('Internal error rendering dashboard');
    }
  });

  return router;
}
