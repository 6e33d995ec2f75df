import type { Server } from 'node:http';
import express from 'express';
import { config } from '../config/env';
import { logger } from '../utils/logger';
import { createApiKeyAuth } from './middleware/auth';
import { createCorsMiddleware } from './middleware/cors';
import { JsonFileDataSource, type DashboardDataSource } from '../data/dashboardSource';

import { createHealthRouter } from './routes/health';
import widgetsRouter from './routes/widgets';
import { createEmbedTokenRouter } from './routes/embedToken';
import { createDashboardRouter } from '../embed/routes/dashboard';
import { createWidgetRouter } from '../embed/routes/widget';
import { createStylesheetRouter } from '../embed/routes/stylesheet';

export interface ServerOptions {
  dataSource?: DashboardDataSource;
  /** Defaults to API_KEY. */
  apiKey?: string;
  /** Defaults to PORT; 0 picks a free port. */
  port?: number;
}

export function createServer(opts: ServerOptions = {}): express.Express {
  const app = express();
  const dataSource = opts.dataSource ?? new JsonFileDataSource();
  const requireApiKey = createApiKeyAuth(opts.apiKey ?? config.api.apiKey);

  app.set('trust proxy', 1);
  app.use(express.json({ limit: '100kb' }));
  app.use(
    createCorsMiddleware({
      allowedOrigins: config.api.allowedOrigins,
      allowLocalhost: config.env !== 'production',
    }),
  );

  // HTML for iframes; token checked per route
  app.use('/embed/styles.css', createStylesheetRouter());
  app.use('/embed/dashboard', createDashboardRouter(dataSource));
  app.use('/embed/widget', createWidgetRouter(dataSource));

  app.use('/api/v1/health', createHealthRouter(dataSource));
  app.use('/api/v1/widgets', requireApiKey, widgetsRouter);
  app.use('/api/v1/embed-token', requireApiKey, createEmbedTokenRouter());

  app.use((_req, res) => res.status(404).json({ error: 'Not found' }));

  return app;
}

export async function startServer(opts: ServerOptions = {}): Promise<Server> {
  const app = createServer(opts);
  const port = opts.port ?? config.api.port;

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, () => {
      listening.off('error', reject);
      const bound = boundPort(listening) ?? port;
      logger.info(`Admin dashboard listening on port ${bound}`, { env: config.env, port: bound });
      logger.info('Embed endpoints', {
        dashboard: `http://localhost:${bound}/embed/dashboard?token=<token>`,
        widget: `http://localhost:${bound}/embed/widget/news?token=<token>`,
        stylesheet: `http://localhost:${bound}/embed/styles.css`,
      });
      resolve(listening);
    });
    listening.once('error', reject);
  });

  return server;
}

/** Port the server is listening on, or undefined before it binds. */
export function boundPort(server: Server): number | undefined {
  const address = server.address();
  return address !== null && typeof address === 'object' ? address.port : undefined;
}
