import { escapeHtml } from './layout';
import { adminWidget, sizeModifier, type WidgetSize } from '../styles/widgets/adminWidget';

export interface WidgetAction {
  label: string;
  href: string;
  active?: boolean;
}

export interface WidgetFrameOptions {
  widgetId: string;
  title: string;
  size: WidgetSize;
  content: string;
  actions?: WidgetAction[];
  /** Plain text; escaped. */
  footer?: string;
}

export function renderWidgetFrame(opts: WidgetFrameOptions): string {
  const actionsHtml = opts.actions && opts.actions.length > 0
    ? `<nav class="${adminWidget.element('actions')}">${opts.actions.map((a) => `
        <a class="${adminWidget.elementClasses('action', { 'is-active': a.active })}" href="${escapeHtml(a.href)}">${escapeHtml(a.label)}</a>`).join('')}
      </nav>`
    : '';

  const footerHtml = opts.footer
    ? `<footer class="${adminWidget.element('footer')}">${escapeHtml(opts.footer)}</footer>`
    : '';

  return `
  <section class="${adminWidget.classes(sizeModifier(opts.size))}" id="admin-widget-${escapeHtml(opts.widgetId)}" data-widget-id="${escapeHtml(opts.widgetId)}">
    <header class="${adminWidget.element('header')}">
      <h2 class="${adminWidget.element('title')}">${escapeHtml(opts.title)}</h2>
      ${actionsHtml}
    </header>
    <div class="${adminWidget.element('content')}">${opts.content}</div>
    ${footerHtml}
  </section>`;
}
