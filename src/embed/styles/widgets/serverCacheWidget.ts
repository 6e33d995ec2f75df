import { createBlock } from '../classNames';
import type { WidgetStyle } from '../types';

export const serverCache = createBlock('rb-c-admin-server-cache-widget');

export const serverCacheWidgetStyle: WidgetStyle = {
  id: 'server-cache',
  block: serverCache.name,
  description: 'Cache server statistics, one card per configured cache host.',
  structure: {
    children: [
      {
        element: 'server',
        optional: true,
        modifiers: ['is-unavailable'],
        children: [
          { element: 'server-name' },
          {
            element: 'stats',
            optional: true,
            children: [
              {
                element: 'stat',
                modifiers: ['is-warning'],
                children: [{ element: 'stat-label' }, { element: 'stat-value' }],
              },
            ],
          },
          { element: 'unavailable', optional: true },
        ],
      },
      { element: 'empty', optional: true },
    ],
  },
  rules: [
    {
      selector: serverCache.selector,
      declarations: { display: 'flex', 'flex-direction': 'column', gap: '@spacing' },
      rules: [
        {
          selector: serverCache.elementSelector('server'),
          declarations: { border: '@border', 'border-radius': '@radius', padding: '@spacing', background: '@color-surface-alt' },
          rules: [
            {
              selector: `&.${serverCache.modifier('is-unavailable')}`,
              declarations: { background: '@color-danger-bg', 'border-color': '@color-danger' },
            },
          ],
        },
        {
          selector: serverCache.elementSelector('server-name'),
          declarations: {
            'font-family': 'monospace',
            'font-size': '@font-size-small',
            'font-weight': '600',
            color: '@color-text',
            'margin-bottom': '@spacing-sm',
          },
        },
        {
          selector: serverCache.elementSelector('stats'),
          declarations: {
            display: 'grid',
            'grid-template-columns': 'repeat(auto-fill, minmax(110px, 1fr))',
            gap: '@spacing-sm',
            margin: '0',
          },
        },
        {
          selector: serverCache.elementSelector('stat'),
          declarations: { display: 'flex', 'flex-direction': 'column', margin: '0' },
          rules: [
            {
              selector: `&.${serverCache.modifier('is-warning')} ${serverCache.elementSelector('stat-value')}`,
              declarations: { color: '@color-warning' },
            },
          ],
        },
        {
          selector: serverCache.elementSelector('stat-label'),
          declarations: {
            'font-size': '@font-size-tiny',
            'text-transform': 'uppercase',
            'letter-spacing': '.5px',
            color: '@color-text-subtle',
          },
        },
        {
          selector: serverCache.elementSelector('stat-value'),
          declarations: {
            margin: '0',
            'font-size': '@font-size-title',
            'font-weight': '700',
            color: '@color-text',
            'font-variant-numeric': 'tabular-nums',
          },
        },
        {
          selector: serverCache.elementSelector('unavailable'),
          declarations: { 'font-size': '@font-size-small', color: '@color-danger' },
        },
        {
          selector: serverCache.elementSelector('empty'),
          declarations: { padding: '@spacing-xl 0', 'text-align': 'center', color: '@color-text-subtle' },
        },
      ],
    },
  ],
};
