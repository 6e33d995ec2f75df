import { createBlock } from '../classNames';
import type { WidgetStyle } from '../types';

export const news = createBlock('rb-c-admin-news-widget');

export const newsWidgetStyle: WidgetStyle = {
  id: 'news',
  block: news.name,
  description: 'Latest product news: a dated list of linked headlines.',
  structure: {
    children: [
      {
        element: 'items',
        optional: true,
        children: [
          {
            element: 'item',
            modifiers: ['is-new'],
            children: [{ element: 'item-date' }, { element: 'item-title' }],
          },
        ],
      },
      { element: 'empty', optional: true },
      { element: 'more', optional: true },
    ],
  },
  rules: [
    {
      selector: news.selector,
      declarations: { display: 'flex', 'flex-direction': 'column', gap: '@spacing-sm' },
      rules: [
        {
          selector: news.elementSelector('items'),
          declarations: { 'list-style': 'none', margin: '0', padding: '0' },
        },
        {
          selector: news.elementSelector('item'),
          declarations: {
            display: 'flex',
            'align-items': 'baseline',
            gap: '@spacing',
            padding: '@spacing-sm 0',
            'border-bottom': '@border',
          },
          rules: [
            { selector: '&:last-child', declarations: { 'border-bottom': 'none' } },
            {
              selector: `&.${news.modifier('is-new')} ${news.elementSelector('item-title')}`,
              declarations: { 'font-weight': '600' },
            },
          ],
        },
        {
          selector: news.elementSelector('item-date'),
          declarations: {
            flex: '0 0 auto',
            'min-width': '80px',
            'font-size': '@font-size-small',
            color: '@color-text-subtle',
            'font-variant-numeric': 'tabular-nums',
          },
        },
        {
          selector: news.elementSelector('item-title'),
          declarations: { color: '@color-link', 'text-decoration': 'none' },
          rules: [{ selector: '&:hover', declarations: { 'text-decoration': 'underline' } }],
        },
        {
          selector: news.elementSelector('empty'),
          declarations: { padding: '@spacing-xl 0', 'text-align': 'center', color: '@color-text-subtle' },
        },
        {
          selector: news.elementSelector('more'),
          declarations: { 'align-self': 'flex-end', 'font-size': '@font-size-small', color: '@color-link' },
        },
      ],
    },
  ],
};
