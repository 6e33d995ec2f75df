import { escapeHtml } from './layout';
import { fmtDate } from './format';
import { news } from '../styles/widgets/newsWidget';
import type { NewsItem } from '../../data/schema';

export interface NewsWidgetOptions {
  maxItems?: number;
  moreUrl?: string;
}

export function renderNewsWidget(items: NewsItem[], opts: NewsWidgetOptions = {}): string {
  const shown = [...items]
    .sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0))
    .slice(0, opts.maxItems ?? 5);

  const listHtml = shown.length > 0
    ? `<ul class="${news.element('items')}">${shown.map((item) => `
        <li class="${news.elementClasses('item', { 'is-new': item.isNew })}">
          <time class="${news.element('item-date')}" datetime="${escapeHtml(item.date)}">${escapeHtml(fmtDate(item.date))}</time>
          <a class="${news.element('item-title')}" href="${escapeHtml(item.url)}" target="_blank" rel="noopener">${escapeHtml(item.title)}</a>
        </li>`).join('')}
      </ul>`
    : `<div class="${news.element('empty')}">There is no news right now.</div>`;

  const moreHtml = opts.moreUrl && shown.length > 0
    ? `<a class="${news.element('more')}" href="${escapeHtml(opts.moreUrl)}" target="_blank" rel="noopener">More news</a>`
    : '';

  return `<div class="${news.classes()}">${listHtml}${moreHtml}</div>`;
}
