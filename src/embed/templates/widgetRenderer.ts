import { renderLayout, type ColorTheme } from './layout';
import { renderWidgetFrame, type WidgetAction } from './widgetFrame';
import { renderNewsWidget } from './newsWidget';
import { renderServerCacheWidget } from './serverCacheWidget';
import { renderActivityGraphWidget, type ActivityRange } from './activityGraphWidget';
import { renderRepositoriesWidget } from './repositoriesWidget';
import { renderUserActivityWidget } from './userActivityWidget';
import { renderServerActivityWidget } from './serverActivityWidget';
import { adminWidgets, type WidgetSize } from '../styles/widgets/adminWidget';
import { newsWidgetStyle } from '../styles/widgets/newsWidget';
import { serverCacheWidgetStyle } from '../styles/widgets/serverCacheWidget';
import { activityGraphWidgetStyle } from '../styles/widgets/activityGraphWidget';
import { repositoriesWidgetStyle } from '../styles/widgets/repositoriesWidget';
import { userActivityWidgetStyle } from '../styles/widgets/userActivityWidget';
import { serverActivityWidgetStyle } from '../styles/widgets/serverActivityWidget';
import type { WidgetStyle } from '../styles/types';
import type { DashboardData } from '../../data/schema';

export interface RenderContext {
  theme: ColorTheme;
  range: ActivityRange;
  /** Link to the current page with the given activity range. */
  rangeHref: (days: ActivityRange) => string;
  /** Link to the current page as rendered (same token, theme and range). */
  selfHref: () => string;
  newsUrl?: string;
  stylesheetHref?: string;
}

export const DEFAULT_RENDER_CONTEXT: RenderContext = {
  theme: 'light',
  range: 30,
  rangeHref: (days) => `?range=${days}`,
  selfHref: () => '?range=30',
};

interface WidgetBody {
  content: string;
  actions?: WidgetAction[];
  footer?: string;
}

export interface WidgetDefinition {
  id: string;
  title: string;
  size: WidgetSize;
  style: WidgetStyle;
  usesChart: boolean;
  render(data: DashboardData, ctx: RenderContext, widgetId: string): WidgetBody;
}

/** Dashboard widgets, in display order. */
export const WIDGETS: readonly WidgetDefinition[] = [
  {
    id: 'activity-graph',
    title: 'Activity',
    size: 'large',
    style: activityGraphWidgetStyle,
    usesChart: true,
    render: (data, ctx, widgetId) => ({
      content: renderActivityGraphWidget(data.activity, {
        widgetId,
        range: ctx.range,
        theme: ctx.theme,
        rangeHref: ctx.rangeHref,
      }),
    }),
  },
  {
    id: 'news',
    title: 'News',
    size: 'medium',
    style: newsWidgetStyle,
    usesChart: false,
    render: (data, ctx) => ({ content: renderNewsWidget(data.news, { moreUrl: ctx.newsUrl }) }),
  },
  {
    id: 'user-activity',
    title: 'User activity',
    size: 'medium',
    style: userActivityWidgetStyle,
    usesChart: true,
    render: (data, ctx, widgetId) => ({
      content: renderUserActivityWidget(data.userActivity, { widgetId, theme: ctx.theme }),
    }),
  },
  {
    id: 'server-activity',
    title: 'Server activity',
    size: 'medium',
    style: serverActivityWidgetStyle,
    usesChart: true,
    render: (data, ctx, widgetId) => ({
      content: renderServerActivityWidget(data.serverActivity, { widgetId, theme: ctx.theme }),
    }),
  },
  {
    id: 'repositories',
    title: 'Repositories',
    size: 'medium',
    style: repositoriesWidgetStyle,
    usesChart: false,
    render: (data) => ({
      content: renderRepositoriesWidget(data.repositories),
      actions: [{ label: 'Add', href: '/admin/db/scmtools/repository/add/' }],
    }),
  },
  {
    id: 'server-cache',
    title: 'Server cache',
    size: 'full',
    style: serverCacheWidgetStyle,
    usesChart: false,
    render: (data) => {
      const down = data.cacheServers.filter((s) => !s.stats).length;
      return {
        content: renderServerCacheWidget(data.cacheServers),
        footer: down > 0 ? `${down} of ${data.cacheServers.length} cache servers are not responding.` : undefined,
      };
    },
  },
];

export function getWidget(id: string): WidgetDefinition | undefined {
  return WIDGETS.find((w) => w.id === id);
}

export function renderWidgetHtml(
  widget: WidgetDefinition,
  data: DashboardData,
  ctx: RenderContext = DEFAULT_RENDER_CONTEXT,
): string {
  const widgetId = `w-${widget.id}`;
  const body = widget.render(data, ctx, widgetId);
  return renderWidgetFrame({
    widgetId: widget.id,
    title: widget.title,
    size: widget.size,
    content: body.content,
    actions: body.actions,
    footer: body.footer,
  });
}

export function renderWidgetPage(
  widget: WidgetDefinition,
  data: DashboardData,
  ctx: RenderContext = DEFAULT_RENDER_CONTEXT,
): string {
  const body = `<div class="${adminWidgets.classes()}">${renderWidgetHtml(widget, data, ctx)}</div>`;
  return renderLayout({
    title: widget.title,
    body,
    theme: ctx.theme,
    includeChartJs: widget.usesChart,
    stylesheetHref: ctx.stylesheetHref,
  });
}
