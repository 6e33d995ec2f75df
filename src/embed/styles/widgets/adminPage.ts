import { createBlock } from '../classNames';
import type { WidgetStyle } from '../types';

export const page = createBlock('rb-c-admin-page');

export const adminPageStyle: WidgetStyle = {
  id: 'admin-page',
  block: page.name,
  description: 'Page shell: sidebar column, header, widget area and footer.',
  structure: {
    children: [
      { element: 'sidebar' },
      {
        element: 'main',
        children: [
          {
            element: 'header',
            children: [{ element: 'title' }, { element: 'subtitle', optional: true }],
          },
          { element: 'banner', optional: true },
          { element: 'content' },
          { element: 'footer' },
        ],
      },
    ],
  },
  rules: [
    {
      selector: page.selector,
      declarations: { display: 'flex', 'min-height': '100vh', background: '@color-page-bg' },
      rules: [
        {
          selector: page.elementSelector('sidebar'),
          declarations: {
            flex: '0 0 @sidebar-width',
            background: '@color-sidebar-bg',
            'border-right': '@border',
          },
        },
        {
          selector: page.elementSelector('main'),
          declarations: { flex: '1', 'min-width': '0', padding: '@spacing-xl' },
        },
        {
          selector: page.elementSelector('header'),
          declarations: { 'margin-bottom': '@spacing-lg' },
        },
        {
          selector: page.elementSelector('title'),
          declarations: { 'font-size': '22px', 'font-weight': '700', color: '@color-text', margin: '0' },
        },
        {
          selector: page.elementSelector('subtitle'),
          declarations: { 'font-size': '@font-size-small', color: '@color-text-subtle', 'margin-top': '@spacing-xs' },
        },
        {
          selector: page.elementSelector('banner'),
          declarations: { 'margin-bottom': '@spacing-lg' },
        },
        {
          selector: page.elementSelector('content'),
          declarations: { 'min-width': '0' },
        },
        {
          selector: page.elementSelector('footer'),
          declarations: {
            'text-align': 'center',
            'font-size': '@font-size-tiny',
            color: '@color-text-subtle',
            padding: '@spacing-xl 0 @spacing-lg',
          },
        },
      ],
    },
    {
      selector: page.selector,
      media: '(max-width:@breakpoint-mobile)',
      declarations: { 'flex-direction': 'column' },
      rules: [
        { selector: page.elementSelector('sidebar'), declarations: { flex: 'none', 'border-right': 'none', 'border-bottom': '@border' } },
        { selector: page.elementSelector('main'), declarations: { padding: '@spacing' } },
      ],
    },
  ],
};
