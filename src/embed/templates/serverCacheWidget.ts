import { escapeHtml } from './layout';
import { fmtBytes, fmtCount, fmtPercent, fmtUptime } from './format';
import { serverCache } from '../styles/widgets/serverCacheWidget';
import type { CacheServer, CacheStats } from '../../data/schema';

/** Memory usage at or above this share of the limit is flagged. */
export const MEMORY_WARNING_RATIO = 0.9;
/** Hit rates below this are flagged once the server has seen traffic. */
export const HIT_RATE_WARNING_RATIO = 0.5;

interface CacheStatRow {
  label: string;
  value: string;
  warning: boolean;
}

export function cacheStatRows(stats: CacheStats): CacheStatRow[] {
  const lookups = stats.hits + stats.misses;
  const hitRate = lookups > 0 ? stats.hits / lookups : null;
  const memoryRatio = stats.memoryLimit > 0 ? stats.memoryUsed / stats.memoryLimit : 0;

  return [
    {
      label: 'Memory',
      value: `${fmtBytes(stats.memoryUsed)} / ${fmtBytes(stats.memoryLimit)}`,
      warning: memoryRatio >= MEMORY_WARNING_RATIO,
    },
    {
      label: 'Hit rate',
      value: hitRate === null ? 'n/a' : fmtPercent(hitRate),
      warning: hitRate !== null && hitRate < HIT_RATE_WARNING_RATIO,
    },
    { label: 'Items', value: fmtCount(stats.items), warning: false },
    { label: 'Connections', value: fmtCount(stats.connections), warning: false },
    { label: 'Uptime', value: fmtUptime(stats.uptimeSeconds), warning: false },
  ];
}

function renderServer(server: CacheServer): string {
  const body = server.stats
    ? `<dl class="${serverCache.element('stats')}">${cacheStatRows(server.stats).map((row) => `
        <div class="${serverCache.elementClasses('stat', { 'is-warning': row.warning })}">
          <dt class="${serverCache.element('stat-label')}">${escapeHtml(row.label)}</dt>
          <dd class="${serverCache.element('stat-value')}">${escapeHtml(row.value)}</dd>
        </div>`).join('')}
      </dl>`
    : `<div class="${serverCache.element('unavailable')}">This cache server is not responding.</div>`;

  return `
    <div class="${serverCache.elementClasses('server', { 'is-unavailable': !server.stats })}">
      <div class="${serverCache.element('server-name')}">${escapeHtml(server.hostname)}</div>
      ${body}
    </div>`;
}

export function renderServerCacheWidget(servers: CacheServer[]): string {
  const inner = servers.length > 0
    ? servers.map(renderServer).join('')
    : `<div class="${serverCache.element('empty')}">No cache servers are configured.</div>`;
  return `<div class="${serverCache.classes()}">${inner}</div>`;
}
