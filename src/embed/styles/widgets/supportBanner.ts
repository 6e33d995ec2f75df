import { createBlock } from '../classNames';
import type { WidgetStyle } from '../types';

export const supportBanner = createBlock('rb-c-admin-support-banner');

export const SUPPORT_STATES = ['licensed', 'expiring', 'expired', 'trial', 'community', 'unknown'] as const;
export type SupportState = (typeof SUPPORT_STATES)[number];

export function supportModifier(state: SupportState): string {
  return `is-${state}`;
}

const STATE_COLORS: Record<SupportState, { accent: string; bg: string }> = {
  licensed: { accent: '@color-success', bg: '@color-success-bg' },
  expiring: { accent: '@color-warning', bg: '@color-warning-bg' },
  expired: { accent: '@color-danger', bg: '@color-danger-bg' },
  trial: { accent: '@color-accent', bg: '@color-accent-bg' },
  community: { accent: '@color-border-strong', bg: '@color-surface-alt' },
  unknown: { accent: '@color-border-strong', bg: '@color-surface' },
};

export const supportBannerStyle: WidgetStyle = {
  id: 'support-banner',
  block: supportBanner.name,
  description: 'Support contract status shown above the widgets.',
  structure: {
    modifiers: SUPPORT_STATES.map(supportModifier),
    children: [
      { element: 'icon' },
      {
        element: 'content',
        children: [{ element: 'title' }, { element: 'message' }, { element: 'expires', optional: true }],
      },
      { element: 'action', optional: true },
    ],
  },
  rules: [
    {
      selector: supportBanner.selector,
      declarations: {
        display: 'flex',
        'align-items': 'center',
        gap: '@spacing',
        padding: '@spacing @spacing-lg',
        border: '@border',
        'border-left-width': '@banner-border-width',
        'border-radius': '@radius',
        background: '@color-surface',
      },
      rules: [
        ...SUPPORT_STATES.map((state) => ({
          selector: `&.${supportBanner.modifier(supportModifier(state))}`,
          declarations: { background: STATE_COLORS[state].bg, 'border-left-color': STATE_COLORS[state].accent },
        })),
        {
          selector: supportBanner.elementSelector('icon'),
          declarations: { 'font-size': '20px', 'flex-shrink': '0' },
        },
        {
          selector: supportBanner.elementSelector('content'),
          declarations: { flex: '1', 'min-width': '0' },
        },
        {
          selector: supportBanner.elementSelector('title'),
          declarations: { 'font-weight': '700', color: '@color-text' },
        },
        {
          selector: supportBanner.elementSelector('message'),
          declarations: { 'font-size': '@font-size-small', color: '@color-text-muted' },
        },
        {
          selector: supportBanner.elementSelector('expires'),
          declarations: { 'font-size': '@font-size-tiny', color: '@color-text-subtle', 'margin-top': '2px' },
        },
        {
          selector: supportBanner.elementSelector('action'),
          declarations: {
            'flex-shrink': '0',
            padding: '@spacing-xs @spacing',
            'border-radius': '@radius',
            border: '@border-strong',
            color: '@color-link',
            'font-size': '@font-size-small',
            'font-weight': '600',
            'text-decoration': 'none',
          },
          rules: [{ selector: '&:hover', declarations: { background: '@color-surface-alt' } }],
        },
      ],
    },
  ],
};
