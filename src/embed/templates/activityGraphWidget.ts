import { escapeHtml } from './layout';
import { fmtCount, fmtShortDate } from './format';
import { renderChartScript } from './chart';
import { activityGraph } from '../styles/widgets/activityGraphWidget';
import { PALETTE, type ColorScheme } from '../styles/tokens';
import type { ActivityPoint } from '../../data/schema';

export const ACTIVITY_RANGES = [7, 30, 90] as const;
export type ActivityRange = (typeof ACTIVITY_RANGES)[number];

const SERIES: Array<{ key: keyof Omit<ActivityPoint, 'date'>; label: string; color: string }> = [
  { key: 'reviewRequests', label: 'Review requests', color: 'chart-1' },
  { key: 'reviews', label: 'Reviews', color: 'chart-2' },
  { key: 'changeDescriptions', label: 'Updates', color: 'chart-3' },
  { key: 'comments', label: 'Comments', color: 'chart-4' },
];

const DAY_MS = 24 * 60 * 60 * 1000;

function dayNumber(isoDate: string): number {
  return Math.floor(Date.parse(`${isoDate}T00:00:00Z`) / DAY_MS);
}

/** Points within `days` days of the latest point (inclusive), oldest first. */
export function pointsInRange(points: ActivityPoint[], days: number): ActivityPoint[] {
  if (points.length === 0) return [];
  const sorted = [...points].sort((a, b) => dayNumber(a.date) - dayNumber(b.date));
  const latest = dayNumber(sorted[sorted.length - 1].date);
  return sorted.filter((p) => dayNumber(p.date) > latest - days);
}

export interface ActivityGraphOptions {
  widgetId: string;
  range: ActivityRange;
  theme: ColorScheme;
  rangeHref: (days: ActivityRange) => string;
}

export function renderActivityGraphWidget(points: ActivityPoint[], opts: ActivityGraphOptions): string {
  const palette = PALETTE[opts.theme];
  const shown = pointsInRange(points, opts.range);
  const canvasId = `${opts.widgetId}-canvas`;

  const rangesHtml = `<nav class="${activityGraph.element('ranges')}">${ACTIVITY_RANGES.map((days) => `
      <a class="${activityGraph.elementClasses('range', { 'is-active': days === opts.range })}" href="${escapeHtml(opts.rangeHref(days))}">${days} days</a>`).join('')}
    </nav>`;

  if (shown.length === 0) {
    return `<div class="${activityGraph.classes()}">${rangesHtml}
      <div class="${activityGraph.element('empty')}">No activity has been recorded yet.</div>
    </div>`;
  }

  const legendHtml = `<ul class="${activityGraph.element('legend')}">${SERIES.map((s) => `
      <li class="${activityGraph.element('legend-item')}">
        <span class="${activityGraph.element('legend-swatch')}" style="background:${palette[s.color]}"></span>
        <span class="${activityGraph.element('legend-label')}">${escapeHtml(s.label)}</span>
        <span class="${activityGraph.element('legend-total')}">${fmtCount(shown.reduce((sum, p) => sum + p[s.key], 0))}</span>
      </li>`).join('')}
    </ul>`;

  const script = renderChartScript(canvasId, {
    type: 'line',
    labels: shown.map((p) => fmtShortDate(p.date)),
    datasets: SERIES.map((s) => ({ label: s.label, data: shown.map((p) => p[s.key]), color: palette[s.color] })),
  });

  return `<div class="${activityGraph.classes()}">${rangesHtml}
    <div class="${activityGraph.element('chart')}"><canvas class="${activityGraph.element('canvas')}" id="${escapeHtml(canvasId)}"></canvas></div>
    ${legendHtml}
  </div>${script}`;
}
