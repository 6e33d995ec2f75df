import { createBlock } from '../classNames';
import type { WidgetStyle } from '../types';

export const activityGraph = createBlock('rb-c-admin-activity-graph-widget');

export const activityGraphWidgetStyle: WidgetStyle = {
  id: 'activity-graph',
  block: activityGraph.name,
  description: 'Line chart of review activity over a selectable date range.',
  structure: {
    children: [
      {
        element: 'ranges',
        children: [{ element: 'range', modifiers: ['is-active'] }],
      },
      { element: 'chart', optional: true, children: [{ element: 'canvas' }] },
      {
        element: 'legend',
        optional: true,
        children: [
          {
            element: 'legend-item',
            children: [{ element: 'legend-swatch' }, { element: 'legend-label' }, { element: 'legend-total' }],
          },
        ],
      },
      { element: 'empty', optional: true },
    ],
  },
  rules: [
    {
      selector: activityGraph.selector,
      declarations: { display: 'flex', 'flex-direction': 'column', gap: '@spacing' },
      rules: [
        {
          selector: activityGraph.elementSelector('ranges'),
          declarations: { display: 'flex', gap: '@spacing-xs', 'justify-content': 'flex-end' },
        },
        {
          selector: activityGraph.elementSelector('range'),
          declarations: {
            padding: '2px @spacing-sm',
            border: '@border',
            'border-radius': '@radius-pill',
            'font-size': '@font-size-tiny',
            color: '@color-text-muted',
            'text-decoration': 'none',
          },
          rules: [
            {
              selector: `&.${activityGraph.modifier('is-active')}`,
              declarations: { background: '@color-accent', 'border-color': '@color-accent', color: '#FFFFFF' },
            },
          ],
        },
        {
          selector: activityGraph.elementSelector('chart'),
          declarations: { position: 'relative', height: '@widget-chart-height' },
        },
        {
          selector: activityGraph.elementSelector('canvas'),
          declarations: { width: '100%', height: '100%' },
        },
        {
          selector: activityGraph.elementSelector('legend'),
          declarations: { display: 'flex', 'flex-wrap': 'wrap', gap: '@spacing', 'list-style': 'none', margin: '0', padding: '0' },
        },
        {
          selector: activityGraph.elementSelector('legend-item'),
          declarations: { display: 'flex', 'align-items': 'center', gap: '@spacing-xs', 'font-size': '@font-size-small' },
        },
        {
          selector: activityGraph.elementSelector('legend-swatch'),
          declarations: { width: '10px', height: '10px', 'border-radius': '@radius-small' },
        },
        {
          selector: activityGraph.elementSelector('legend-label'),
          declarations: { color: '@color-text-muted' },
        },
        {
          selector: activityGraph.elementSelector('legend-total'),
          declarations: { 'font-weight': '700', color: '@color-text', 'font-variant-numeric': 'tabular-nums' },
        },
        {
          selector: activityGraph.elementSelector('empty'),
          declarations: { padding: '@spacing-xl 0', 'text-align': 'center', color: '@color-text-subtle' },
        },
      ],
    },
  ],
};
