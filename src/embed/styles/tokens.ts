import { StylesheetCompileError } from '../../utils/errors';

/** Compile-time variables. Values may reference other variables as `@name`. */
export type ThemeTokens = Record<string, string>;

export type ColorScheme = 'light' | 'dark';

export const VARIABLE_RE = /@([a-z][a-z0-9-]*)/g;

/**
 * Runtime palette, emitted as custom properties so `body.dark` can swap it
 * without recompiling the rules.
 */
export const PALETTE: Record<ColorScheme, Record<string, string>> = {
  light: {
    'page-bg': '#F4F6F8',
    'surface': '#FFFFFF',
    'surface-alt': '#F7F9FB',
    'border': '#D8DEE4',
    'border-strong': '#B8C2CC',
    'text': '#24292F',
    'text-muted': '#57606A',
    'text-subtle': '#8C959F',
    'link': '#2F6FB0',
    'accent': '#3B7FC4',
    'accent-bg': '#E8F1FA',
    'success': '#2E8540',
    'success-bg': '#E6F4EA',
    'warning': '#B7791F',
    'warning-bg': '#FFF6E0',
    'danger': '#C0392B',
    'danger-bg': '#FDECEA',
    'sidebar-bg': '#EDF2F7',
    'sidebar-active-bg': '#D7E4F1',
    'sidebar-hover-bg': '#E2EAF3',
    'chart-1': '#3B7FC4',
    'chart-2': '#2E8540',
    'chart-3': '#B7791F',
    'chart-4': '#8E44AD',
    'chart-5': '#C0392B',
    'shadow': 'rgba(27,31,36,.08)',
  },
  dark: {
    'page-bg': '#0D1117',
    'surface': '#161B22',
    'surface-alt': '#1C2330',
    'border': '#30363D',
    'border-strong': '#484F58',
    'text': '#E6EDF3',
    'text-muted': '#8B949E',
    'text-subtle': '#6E7681',
    'link': '#58A6FF',
    'accent': '#58A6FF',
    'accent-bg': 'rgba(56,139,253,.15)',
    'success': '#3FB950',
    'success-bg': 'rgba(46,160,67,.15)',
    'warning': '#D29922',
    'warning-bg': 'rgba(187,128,9,.15)',
    'danger': '#F85149',
    'danger-bg': 'rgba(248,81,73,.15)',
    'sidebar-bg': '#11161D',
    'sidebar-active-bg': '#1F2A37',
    'sidebar-hover-bg': '#18202A',
    'chart-1': '#58A6FF',
    'chart-2': '#3FB950',
    'chart-3': '#D29922',
    'chart-4': '#BC8CFF',
    'chart-5': '#F85149',
    'shadow': 'rgba(0,0,0,.4)',
  },
};

export const CUSTOM_PROPERTY_PREFIX = 'rb-admin';

export function customProperty(name: string): string {
  return `var(--${CUSTOM_PROPERTY_PREFIX}-${name})`;
}

/** `--rb-admin-<name>: <value>` declarations for one color scheme. */
export function toCustomProperties(scheme: ColorScheme): Record<string, string> {
  return Object.fromEntries(
    Object.entries(PALETTE[scheme]).map(([name, value]) => [`--${CUSTOM_PROPERTY_PREFIX}-${name}`, value]),
  );
}

const paletteTokens: ThemeTokens = Object.fromEntries(
  Object.keys(PALETTE.light).map((name) => [`color-${name}`, customProperty(name)]),
);

export const DEFAULT_TOKENS: ThemeTokens = {
  ...paletteTokens,

  'font-family': "-apple-system,BlinkMacSystemFont,'Segoe UI',Roboto,'Helvetica Neue',Arial,sans-serif",
  'font-size': '14px',
  'font-size-small': '12px',
  'font-size-tiny': '11px',
  'font-size-title': '15px',
  'line-height': '1.5',

  'spacing-xs': '4px',
  'spacing-sm': '8px',
  'spacing': '12px',
  'spacing-lg': '16px',
  'spacing-xl': '24px',

  'radius': '6px',
  'radius-small': '3px',
  'radius-pill': '9999px',
  'border-width': '1px',
  'border': '@border-width solid @color-border',
  'border-strong': '@border-width solid @color-border-strong',
  'shadow': '0 1px 3px @color-shadow',
  'shadow-raised': '0 4px 10px @color-shadow',

  'sidebar-width': '220px',
  'sidebar-item-padding': '@spacing-sm @spacing-lg',

  'widget-bg': '@color-surface',
  'widget-border': '@border',
  'widget-radius': '@radius',
  'widget-header-bg': '@color-surface-alt',
  'widget-header-padding': '@spacing-sm @spacing',
  'widget-content-padding': '@spacing',
  'widget-gap': '@spacing-lg',
  'widget-min-height': '120px',
  'widget-chart-height': '220px',

  'grid-columns': '12',
  'breakpoint-narrow': '960px',
  'breakpoint-mobile': '640px',

  'banner-border-width': '4px',
  'stat-value-size': '22px',
};

/**
 * Resolve every `@name` reference in the token values. Unknown references and
 * cycles are compile errors.
 */
export function resolveTokens(tokens: ThemeTokens): ThemeTokens {
  const resolved: ThemeTokens = {};
  const resolving = new Set<string>();

  const resolve = (name: string, trail: string[]): string => {
    const done = resolved[name];
    if (done !== undefined) return done;

    const raw = tokens[name];
    if (raw === undefined) {
      const from = trail.length > 0 ? ` (referenced from @${trail[trail.length - 1]})` : '';
      throw new StylesheetCompileError(`Unknown variable @${name}${from}`, { variable: name });
    }
    if (resolving.has(name)) {
      throw new StylesheetCompileError(
        `Variable cycle: ${[...trail, name].map((n) => `@${n}`).join(' -> ')}`,
        { variable: name },
      );
    }

    resolving.add(name);
    const value = raw.replace(VARIABLE_RE, (_m, ref: string) => resolve(ref, [...trail, name]));
    resolving.delete(name);
    resolved[name] = value;
    return value;
  };

  for (const name of Object.keys(tokens)) resolve(name, []);
  return resolved;
}
