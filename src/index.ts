import 'dotenv/config';
import { startServer } from './api/server';
import { JsonFileDataSource } from './data/dashboardSource';
import { getThemeStylesheet } from './embed/styles/theme';
import { logger, errorMessage } from './utils/logger';

async function main() {
  logger.info('Admin dashboard service starting...');

  // Fail fast on a broken theme or data file
  const { rules } = getThemeStylesheet();
  logger.info('Theme compiled', { rules: rules.length });

  const dataSource = new JsonFileDataSource();
  await dataSource.load();
  logger.info('Dashboard data loaded', { file: dataSource.filePath });

  await startServer({ dataSource });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    process.exit(0);
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err) => {
  logger.error('Fatal startup error', { error: errorMessage(err) });
  process.exit(1);
});
