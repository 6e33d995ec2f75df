import { Router } from 'express';
import { getThemeStylesheet } from '../styles/theme';

/** GET /embed/styles.css: the compiled theme, for pages that link it instead of inlining. */
export function createStylesheetRouter(): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.setHeader('Content-Type', 'text/css; charset=utf-8');
    res.setHeader('Cache-Control', 'public, max-age=3600');
    res.send(getThemeStylesheet().css);
  });

  return router;
}
