import { getThemeStylesheet } from '../styles/theme';

export type ColorTheme = 'light' | 'dark';

const CHART_JS_SRC = 'https://cdn.jsdelivr.net/npm/chart.js@4.4.0/dist/chart.umd.min.js';

export interface LayoutOptions {
  title?: string;
  body: string;
  scripts?: string;
  theme?: ColorTheme;
  includeChartJs?: boolean;
  /** Link this stylesheet instead of inlining the compiled theme. */
  stylesheetHref?: string;
}

/** Full HTML document around an embed page body. */
export function renderLayout(opts: LayoutOptions): string {
  const theme = opts.theme ?? 'light';

  const head = [
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${escapeHtml(opts.title ?? 'Administration')}</title>`,
    opts.stylesheetHref
      ? `<link rel="stylesheet" href="${escapeHtml(opts.stylesheetHref)}">`
      : `<style>${getThemeStylesheet().css}</style>`,
  ];
  // Chart.js has to load before the widgets' inline bootstrap scripts run
  if (opts.includeChartJs) head.push(`<script src="${CHART_JS_SRC}" crossorigin="anonymous"></script>`);

  return `<!DOCTYPE html>
<html lang="en">
<head>
  ${head.join('\n  ')}
</head>
<body class="${theme}">
${opts.body}
${opts.scripts ?? ''}
</body>
</html>`;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** JSON safe to place inside a `<script>` element. */
export function jsonEmbed(data: unknown): string {
  return JSON.stringify(data).replace(/[<>&]/g, (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`);
}
