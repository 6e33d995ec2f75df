import { escapeHtml } from './layout';
import { fmtCount } from './format';
import { renderChartScript } from './chart';
import { userActivity } from '../styles/widgets/userActivityWidget';
import { PALETTE, type ColorScheme } from '../styles/tokens';
import type { UserActivity } from '../../data/schema';

export interface ActivityBucket {
  label: string;
  count: number;
  color: string;
}

export function activityBuckets(activity: UserActivity, theme: ColorScheme): ActivityBucket[] {
  const palette = PALETTE[theme];
  const active = activity.now + activity.sevenDays + activity.thirtyDays + activity.sixtyDays + activity.ninetyDays;
  return [
    { label: 'Active now', count: activity.now, color: palette['chart-1'] },
    { label: 'Within 7 days', count: activity.sevenDays, color: palette['chart-2'] },
    { label: 'Within 30 days', count: activity.thirtyDays, color: palette['chart-3'] },
    { label: 'Within 60 days', count: activity.sixtyDays, color: palette['chart-4'] },
    { label: 'Within 90 days', count: activity.ninetyDays, color: palette['chart-5'] },
    { label: 'Inactive', count: Math.max(0, activity.total - active), color: palette['border-strong'] },
  ];
}

export function renderUserActivityWidget(
  activity: UserActivity,
  opts: { widgetId: string; theme: ColorScheme },
): string {
  const buckets = activityBuckets(activity, opts.theme);
  const canvasId = `${opts.widgetId}-canvas`;

  const statsHtml = buckets.map((b) => `
      <li class="${userActivity.element('stat')}">
        <span class="${userActivity.element('stat-swatch')}" style="background:${b.color}"></span>
        <span class="${userActivity.element('stat-label')}">${escapeHtml(b.label)}</span>
        <span class="${userActivity.element('stat-value')}">${fmtCount(b.count)}</span>
      </li>`).join('');

  const script = renderChartScript(canvasId, {
    type: 'doughnut',
    labels: buckets.map((b) => b.label),
    datasets: [{ label: 'Users', data: buckets.map((b) => b.count), color: buckets.map((b) => b.color) }],
  });

  return `<div class="${userActivity.classes()}">
    <div class="${userActivity.element('chart')}"><canvas class="${userActivity.element('canvas')}" id="${escapeHtml(canvasId)}"></canvas></div>
    <ul class="${userActivity.element('stats')}">${statsHtml}
    </ul>
    <div class="${userActivity.element('total')}">${fmtCount(activity.total)} user${activity.total === 1 ? '' : 's'} in total</div>
  </div>${script}`;
}
