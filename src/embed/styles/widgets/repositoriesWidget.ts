import { createBlock } from '../classNames';
import type { WidgetStyle } from '../types';

export const repositories = createBlock('rb-c-admin-repositories-widget');

export const repositoriesWidgetStyle: WidgetStyle = {
  id: 'repositories',
  block: repositories.name,
  description: 'Configured source code repositories with their tool type.',
  structure: {
    children: [
      { element: 'summary' },
      {
        element: 'list',
        optional: true,
        children: [
          {
            element: 'repo',
            modifiers: ['is-hidden'],
            children: [{ element: 'repo-name' }, { element: 'repo-tool' }],
          },
        ],
      },
      { element: 'empty', optional: true },
    ],
  },
  rules: [
    {
      selector: repositories.selector,
      rules: [
        {
          selector: repositories.elementSelector('summary'),
          declarations: { 'font-size': '@font-size-small', color: '@color-text-muted', 'margin-bottom': '@spacing-sm' },
        },
        {
          selector: repositories.elementSelector('list'),
          declarations: { 'list-style': 'none', margin: '0', padding: '0' },
        },
        {
          selector: repositories.elementSelector('repo'),
          declarations: {
            display: 'flex',
            'align-items': 'center',
            'justify-content': 'space-between',
            gap: '@spacing-sm',
            padding: '6px 0',
            'border-bottom': '@border',
          },
          rules: [
            { selector: '&:last-child', declarations: { 'border-bottom': 'none' } },
            {
              selector: `&.${repositories.modifier('is-hidden')}`,
              declarations: { opacity: '.6' },
            },
          ],
        },
        {
          selector: repositories.elementSelector('repo-name'),
          declarations: {
            flex: '1',
            'min-width': '0',
            overflow: 'hidden',
            'text-overflow': 'ellipsis',
            'white-space': 'nowrap',
            color: '@color-link',
            'text-decoration': 'none',
          },
        },
        {
          selector: repositories.elementSelector('repo-tool'),
          declarations: {
            'flex-shrink': '0',
            padding: '1px @spacing-sm',
            'border-radius': '@radius-pill',
            background: '@color-surface-alt',
            border: '@border',
            'font-size': '@font-size-tiny',
            color: '@color-text-muted',
          },
        },
        {
          selector: repositories.elementSelector('empty'),
          declarations: { padding: '@spacing-xl 0', 'text-align': 'center', color: '@color-text-subtle' },
        },
      ],
    },
  ],
};
