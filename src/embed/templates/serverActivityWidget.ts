import { escapeHtml } from './layout';
import { fmtCount } from './format';
import { renderChartScript } from './chart';
import { serverActivity } from '../styles/widgets/serverActivityWidget';
import { PALETTE, type ColorScheme } from '../styles/tokens';
import type { ServerActivity } from '../../data/schema';

const COUNTERS: Array<{ key: keyof ServerActivity; label: string }> = [
  { key: 'reviewRequests', label: 'Review requests' },
  { key: 'reviews', label: 'Reviews' },
  { key: 'diffs', label: 'Diffs' },
  { key: 'comments', label: 'Comments' },
  { key: 'users', label: 'Users' },
  { key: 'groups', label: 'Groups' },
];

/** Review objects only; user and group counts are on a different scale. */
const CHARTED: Array<keyof ServerActivity> = ['reviewRequests', 'reviews', 'diffs', 'comments'];

export function renderServerActivityWidget(
  activity: ServerActivity,
  opts: { widgetId: string; theme: ColorScheme },
): string {
  const palette = PALETTE[opts.theme];
  const canvasId = `${opts.widgetId}-canvas`;

  const countersHtml = COUNTERS.map((c) => `
      <div class="${serverActivity.element('counter')}">
        <span class="${serverActivity.element('counter-value')}">${fmtCount(activity[c.key])}</span>
        <span class="${serverActivity.element('counter-label')}">${escapeHtml(c.label)}</span>
      </div>`).join('');

  const charted = COUNTERS.filter((c) => CHARTED.includes(c.key));
  const script = renderChartScript(canvasId, {
    type: 'bar',
    labels: charted.map((c) => c.label),
    datasets: [{
      label: 'Total',
      data: charted.map((c) => activity[c.key]),
      color: [palette['chart-1'], palette['chart-2'], palette['chart-3'], palette['chart-4']],
    }],
  });

  return `<div class="${serverActivity.classes()}">
    <div class="${serverActivity.element('counters')}">${countersHtml}
    </div>
    <div class="${serverActivity.element('chart')}"><canvas class="${serverActivity.element('canvas')}" id="${escapeHtml(canvasId)}"></canvas></div>
  </div>${script}`;
}
