import { renderLayout, escapeHtml } from './layout';
import { fmtDate } from './format';
import { renderSidebar, buildNavigation } from './sidebar';
import { renderSupportBanner } from './supportBanner';
import { DEFAULT_RENDER_CONTEXT, WIDGETS, renderWidgetHtml, type RenderContext } from './widgetRenderer';
import { page } from '../styles/widgets/adminPage';
import { adminWidgets } from '../styles/widgets/adminWidget';
import type { DashboardData } from '../../data/schema';

export function renderDashboardGrid(opts: {
  data: DashboardData;
  title?: string;
  ctx?: RenderContext;
}): string {
  const { data, title = 'Administration', ctx = DEFAULT_RENDER_CONTEXT } = opts;

  const updated = data.generatedAt ? ` · Updated ${fmtDate(data.generatedAt.slice(0, 10))}` : '';
  const widgetsHtml = WIDGETS.map((w) => renderWidgetHtml(w, data, ctx)).join('');

  const body = `
  <div class="${page.classes()}">
    <aside class="${page.element('sidebar')}">
      ${renderSidebar({ title, sections: buildNavigation(data, ctx.selfHref()), activeId: 'dashboard' })}
    </aside>
    <main class="${page.element('main')}">
      <header class="${page.element('header')}">
        <h1 class="${page.element('title')}">Dashboard</h1>
        <div class="${page.element('subtitle')}">${escapeHtml(data.siteName + updated)}</div>
      </header>
      <div class="${page.element('banner')}">${renderSupportBanner(data.support)}</div>
      <div class="${page.element('content')}">
        <div class="${adminWidgets.classes()}">${widgetsHtml}
        </div>
      </div>
      <footer class="${page.element('footer')}">${WIDGETS.length} widgets</footer>
    </main>
  </div>`;

  return renderLayout({
    title: `${title}: Dashboard`,
    body,
    theme: ctx.theme,
    includeChartJs: WIDGETS.some((w) => w.usesChart),
    stylesheetHref: ctx.stylesheetHref,
  });
}
