import { createBlock } from '../classNames';
import type { WidgetStyle } from '../types';

export const userActivity = createBlock('rb-c-admin-user-activity-widget');

export const userActivityWidgetStyle: WidgetStyle = {
  id: 'user-activity',
  block: userActivity.name,
  description: 'Doughnut chart of how recently users were active, with the counts beside it.',
  structure: {
    children: [
      { element: 'chart', children: [{ element: 'canvas' }] },
      {
        element: 'stats',
        children: [
          {
            element: 'stat',
            children: [{ element: 'stat-swatch' }, { element: 'stat-label' }, { element: 'stat-value' }],
          },
        ],
      },
      { element: 'total' },
    ],
  },
  rules: [
    {
      selector: userActivity.selector,
      declarations: {
        display: 'grid',
        'grid-template-columns': 'minmax(140px, 1fr) 1fr',
        gap: '@spacing-lg',
        'align-items': 'center',
      },
      rules: [
        {
          selector: userActivity.elementSelector('chart'),
          declarations: { position: 'relative', height: '180px' },
        },
        {
          selector: userActivity.elementSelector('canvas'),
          declarations: { width: '100%', height: '100%' },
        },
        {
          selector: userActivity.elementSelector('stats'),
          declarations: { 'list-style': 'none', margin: '0', padding: '0' },
        },
        {
          selector: userActivity.elementSelector('stat'),
          declarations: { display: 'flex', 'align-items': 'center', gap: '@spacing-sm', padding: '3px 0' },
        },
        {
          selector: userActivity.elementSelector('stat-swatch'),
          declarations: { width: '10px', height: '10px', 'border-radius': '50%', 'flex-shrink': '0' },
        },
        {
          selector: userActivity.elementSelector('stat-label'),
          declarations: { flex: '1', 'font-size': '@font-size-small', color: '@color-text-muted' },
        },
        {
          selector: userActivity.elementSelector('stat-value'),
          declarations: { 'font-weight': '700', color: '@color-text', 'font-variant-numeric': 'tabular-nums' },
        },
        {
          selector: userActivity.elementSelector('total'),
          declarations: {
            'grid-column': '1 / -1',
            'padding-top': '@spacing-sm',
            'border-top': '@border',
            'font-size': '@font-size-small',
            color: '@color-text-muted',
          },
        },
      ],
    },
    {
      selector: userActivity.selector,
      media: '(max-width:@breakpoint-mobile)',
      declarations: { 'grid-template-columns': '1fr' },
    },
  ],
};
