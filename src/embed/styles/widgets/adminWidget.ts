import { createBlock } from '../classNames';
import type { WidgetStyle } from '../types';

export const adminWidget = createBlock('rb-c-admin-widget');
export const adminWidgets = createBlock('rb-c-admin-widgets');

export const WIDGET_SIZES = ['small', 'medium', 'large', 'full'] as const;
export type WidgetSize = (typeof WIDGET_SIZES)[number];

const SIZE_SPAN: Record<WidgetSize, number> = { small: 3, medium: 4, large: 8, full: 12 };

export function sizeModifier(size: WidgetSize): string {
  return size === 'full' ? 'is-full-size' : `is-${size}`;
}

/** Shared chrome around every dashboard widget. */
export const adminWidgetStyle: WidgetStyle = {
  id: 'admin-widget',
  block: adminWidget.name,
  description: 'Widget frame: header with title and optional actions, content area, optional footer.',
  structure: {
    modifiers: WIDGET_SIZES.map(sizeModifier),
    children: [
      {
        element: 'header',
        children: [
          { element: 'title' },
          { element: 'actions', optional: true, children: [{ element: 'action', modifiers: ['is-active'] }] },
        ],
      },
      { element: 'content' },
      { element: 'footer', optional: true },
    ],
  },
  rules: [
    {
      selector: adminWidget.selector,
      declarations: {
        display: 'flex',
        'flex-direction': 'column',
        background: '@widget-bg',
        border: '@widget-border',
        'border-radius': '@widget-radius',
        'box-shadow': '@shadow',
        'min-height': '@widget-min-height',
        overflow: 'hidden',
        'grid-column': 'span 4',
      },
      rules: [
        ...WIDGET_SIZES.map((size) => ({
          selector: `&.${adminWidget.modifier(sizeModifier(size))}`,
          declarations: { 'grid-column': `span ${SIZE_SPAN[size]}` },
        })),
        { selector: '&:hover', declarations: { 'box-shadow': '@shadow-raised' } },
        {
          selector: adminWidget.elementSelector('header'),
          declarations: {
            display: 'flex',
            'align-items': 'center',
            'justify-content': 'space-between',
            gap: '@spacing-sm',
            padding: '@widget-header-padding',
            background: '@widget-header-bg',
            'border-bottom': '@border',
          },
        },
        {
          selector: adminWidget.elementSelector('title'),
          declarations: { margin: '0', 'font-size': '@font-size-title', 'font-weight': '600', color: '@color-text' },
        },
        {
          selector: adminWidget.elementSelector('actions'),
          declarations: { display: 'flex', gap: '@spacing-xs' },
        },
        {
          selector: adminWidget.elementSelector('action'),
          declarations: {
            padding: '2px @spacing-sm',
            'border-radius': '@radius-small',
            'font-size': '@font-size-tiny',
            color: '@color-text-muted',
            'text-decoration': 'none',
          },
          rules: [
            { selector: '&:hover', declarations: { background: '@color-surface', color: '@color-link' } },
            {
              selector: `&.${adminWidget.modifier('is-active')}`,
              declarations: { background: '@color-accent-bg', color: '@color-accent', 'font-weight': '600' },
            },
          ],
        },
        {
          selector: adminWidget.elementSelector('content'),
          declarations: { flex: '1', padding: '@widget-content-padding', color: '@color-text' },
        },
        {
          selector: adminWidget.elementSelector('footer'),
          declarations: {
            padding: '@spacing-sm @spacing',
            'border-top': '@border',
            'font-size': '@font-size-small',
            color: '@color-text-subtle',
          },
        },
      ],
    },
  ],
};

/** Grid the widgets are laid out on. */
export const adminWidgetsStyle: WidgetStyle = {
  id: 'admin-widgets',
  block: adminWidgets.name,
  description: 'Twelve-column widget grid; collapses to one column on narrow screens.',
  structure: {},
  rules: [
    {
      selector: adminWidgets.selector,
      declarations: {
        display: 'grid',
        'grid-template-columns': 'repeat(@grid-columns, minmax(0, 1fr))',
        gap: '@widget-gap',
        'align-items': 'start',
      },
    },
    {
      selector: `${adminWidgets.selector} ${adminWidget.selector}`,
      media: '(max-width:@breakpoint-narrow)',
      declarations: { 'grid-column': '1 / -1' },
    },
  ],
};
