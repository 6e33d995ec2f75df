/**
 * buildStylesheet.ts: write the compiled theme to a static file
 *
 * Usage:
 *   npx tsx src/scripts/buildStylesheet.ts [output-path]
 *
 * Defaults to dist/admin-dashboard.css. Exits non-zero if any variable
 * reference survives compilation.
 */
import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import { compileTheme } from '../embed/styles/theme';
import { findUnresolvedVariables } from '../embed/styles/compiler';
import { logger, errorMessage } from '../utils/logger';

async function buildStylesheet() {
  const outPath = path.resolve(process.argv[2] ?? 'dist/admin-dashboard.css');
  const { css, rules } = compileTheme();

  const unresolved = findUnresolvedVariables(css);
  if (unresolved.length > 0) {
    logger.error('Unresolved variables in compiled stylesheet', { variables: unresolved });
    process.exit(1);
  }

  await mkdir(path.dirname(outPath), { recursive: true });
  await writeFile(outPath, css, 'utf-8');
  logger.info(`Wrote ${outPath}`, { rules: rules.length, bytes: Buffer.byteLength(css) });
}

buildStylesheet().catch((err) => {
  logger.error('Stylesheet build failed', { error: errorMessage(err) });
  process.exit(1);
});
