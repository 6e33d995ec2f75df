import { createBlock } from '../classNames';
import type { WidgetStyle } from '../types';

export const sidebar = createBlock('rb-c-sidebar');

export const sidebarStyle: WidgetStyle = {
  id: 'sidebar',
  block: sidebar.name,
  description: 'Administration navigation, grouped into labelled sections.',
  structure: {
    children: [
      { element: 'header', children: [{ element: 'title' }] },
      {
        element: 'section',
        children: [
          { element: 'section-label' },
          {
            element: 'items',
            children: [
              {
                element: 'nav-item',
                modifiers: ['is-active'],
                children: [{ element: 'item-label' }, { element: 'item-badge', optional: true }],
              },
            ],
          },
        ],
      },
    ],
  },
  rules: [
    {
      selector: sidebar.selector,
      declarations: { padding: '@spacing-lg 0', 'font-size': '@font-size' },
      rules: [
        {
          selector: sidebar.elementSelector('header'),
          declarations: { padding: '0 @spacing-lg @spacing-lg', 'border-bottom': '@border', 'margin-bottom': '@spacing-sm' },
        },
        {
          selector: sidebar.elementSelector('title'),
          declarations: { 'font-size': '@font-size-title', 'font-weight': '700', color: '@color-text' },
        },
        {
          selector: sidebar.elementSelector('section'),
          declarations: { 'margin-bottom': '@spacing-lg' },
        },
        {
          selector: sidebar.elementSelector('section-label'),
          declarations: {
            padding: '@spacing-xs @spacing-lg',
            'font-size': '@font-size-tiny',
            'font-weight': '700',
            'text-transform': 'uppercase',
            'letter-spacing': '.6px',
            color: '@color-text-subtle',
          },
        },
        {
          selector: sidebar.elementSelector('items'),
          declarations: { 'list-style': 'none', margin: '0', padding: '0' },
        },
        {
          selector: sidebar.elementSelector('nav-item'),
          declarations: {
            display: 'flex',
            'align-items': 'center',
            gap: '@spacing-sm',
            padding: '@sidebar-item-padding',
            color: '@color-text-muted',
            'text-decoration': 'none',
            'border-left': '3px solid transparent',
          },
          rules: [
            { selector: '&:hover', declarations: { background: '@color-sidebar-hover-bg', color: '@color-text' } },
            {
              selector: `&.${sidebar.modifier('is-active')}`,
              declarations: {
                background: '@color-sidebar-active-bg',
                color: '@color-text',
                'font-weight': '600',
                'border-left-color': '@color-accent',
              },
            },
          ],
        },
        {
          selector: sidebar.elementSelector('item-label'),
          declarations: { flex: '1', overflow: 'hidden', 'text-overflow': 'ellipsis', 'white-space': 'nowrap' },
        },
        {
          selector: sidebar.elementSelector('item-badge'),
          declarations: {
            'font-size': '@font-size-tiny',
            'font-weight': '700',
            padding: '0 @spacing-sm',
            'border-radius': '@radius-pill',
            background: '@color-accent-bg',
            color: '@color-accent',
          },
        },
      ],
    },
  ],
};
