import { createBlock } from '../classNames';
import type { WidgetStyle } from '../types';

export const serverActivity = createBlock('rb-c-admin-server-activity-widget');

export const serverActivityWidgetStyle: WidgetStyle = {
  id: 'server-activity',
  block: serverActivity.name,
  description: 'Totals of review objects on the server, as counters and a bar chart.',
  structure: {
    children: [
      {
        element: 'counters',
        children: [
          {
            element: 'counter',
            children: [{ element: 'counter-value' }, { element: 'counter-label' }],
          },
        ],
      },
      { element: 'chart', children: [{ element: 'canvas' }] },
    ],
  },
  rules: [
    {
      selector: serverActivity.selector,
      declarations: { display: 'flex', 'flex-direction': 'column', gap: '@spacing' },
      rules: [
        {
          selector: serverActivity.elementSelector('counters'),
          declarations: {
            display: 'grid',
            'grid-template-columns': 'repeat(3, minmax(0, 1fr))',
            gap: '@spacing-sm',
          },
        },
        {
          selector: serverActivity.elementSelector('counter'),
          declarations: {
            padding: '@spacing-sm',
            'border-radius': '@radius',
            background: '@color-surface-alt',
            'text-align': 'center',
          },
        },
        {
          selector: serverActivity.elementSelector('counter-value'),
          declarations: {
            display: 'block',
            'font-size': '@stat-value-size',
            'font-weight': '800',
            color: '@color-text',
            'font-variant-numeric': 'tabular-nums',
          },
        },
        {
          selector: serverActivity.elementSelector('counter-label'),
          declarations: {
            display: 'block',
            'font-size': '@font-size-tiny',
            'text-transform': 'uppercase',
            'letter-spacing': '.5px',
            color: '@color-text-subtle',
          },
        },
        {
          selector: serverActivity.elementSelector('chart'),
          declarations: { position: 'relative', height: '160px' },
        },
        {
          selector: serverActivity.elementSelector('canvas'),
          declarations: { width: '100%', height: '100%' },
        },
      ],
    },
  ],
};
