import { Router } from 'express';
import { getThemeStylesheet } from '../../embed/styles/theme';
import { errorMessage } from '../../utils/logger';
import type { DashboardDataSource } from '../../data/dashboardSource';

export function createHealthRouter(source: DashboardDataSource): Router {
  const router = Router();

  router.get('/', async (_req, res) => {
    try {
      const { css, rules } = getThemeStylesheet();
      const data = await source.load();

      res.json({
        status: 'ok',
        stylesheet: { rules: rules.length, bytes: Buffer.byteLength(css) },
        data: { generatedAt: data.generatedAt ?? null },
        ts: new Date().toISOString(),
      });
    } catch (err) {
      res.status(503).json({
        status: 'error',
        error: errorMessage(err),
      });
    }
  });

  return router;
}
