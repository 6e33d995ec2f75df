import { Router, Request, Response } from 'express';
import { config } from '../../config/env';
import { embedAuthMiddleware } from '../auth/embedToken';
import { getWidget, renderWidgetPage } from '../templates/widgetRenderer';
import { escapeHtml } from '../templates/layout';
import { embedQuerySchema, renderContextFor, describeQueryError } from './query';
import { logger, errorMessage } from '../../utils/logger';
import type { DashboardDataSource } from '../../data/dashboardSource';

function notFoundPage(id: string): string {
  return `<!DOCTYPE html>
<html lang="en"><head><meta charset="utf-8">
<style>body{margin:0;font-family:system-ui,sans-serif;display:flex;align-items:center;justify-content:center;height:100vh;background:#f5f5f5;}.msg{text-align:center;color:#666;}.msg h3{margin:0;font-size:16px;font-weight:600;}</style>
</head><body>
<div class="msg"><h3>Unknown widget: ${escapeHtml(id)}</h3></div>
</body></html>`;
}

/**
 * GET /embed/widget/:id?token=T&theme=light
 * Returns a self-contained page with one widget.
 */
export function createWidgetRouter(source: DashboardDataSource): Router {
  const router = Router();

  router.get('/:id', embedAuthMiddleware, async (req: Request, res: Response) => {
    const { id } = req.params;
    const widget = getWidget(id);

    if (!widget) {
      res.status(404);
      res.setHeader('Content-Type', 'text/html; charset=utf-8');
      res.send(notFoundPage(id));
      return;
    }

    const parsed = embedQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).send(`Invalid query: ${describeQueryError(parsed.error)}`);
      return;
    }

    try {
      const data = await source.load();
      const ctx = renderContextFor(parsed.data, `${req.baseUrl}/${encodeURIComponent(widget.id)}`, {
        newsUrl: config.dashboard.newsUrl,
        stylesheetHref: config.dashboard.stylesheetHref,
      });
      const html = renderWidgetPage(widget, data, ctx);

      res.setHeader('Content-Type', 'text/html; charset=utf-8');
      res.setHeader('Cache-Control', `private, max-age=${config.dashboard.cacheMaxAgeSeconds}`);
      res.send(html);
    } catch (err) {
      logger.error('Widget render error', { widget: id, error: errorMessage(err) });
      res.status(500).send('Internal error rendering widget');
    }
  });

  return router;
}
