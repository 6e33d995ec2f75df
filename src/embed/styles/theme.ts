import { compileStylesheet, type CompiledStylesheet, type RuleSet } from './compiler';
import { DEFAULT_TOKENS, toCustomProperties, type ThemeTokens } from './tokens';
import { WIDGET_STYLES } from './widgets';

const BASE_RULES: RuleSet[] = [
  { selector: ':root', declarations: toCustomProperties('light') },
  { selector: 'body.dark', declarations: toCustomProperties('dark') },
  { selector: '*, *::before, *::after', declarations: { 'box-sizing': 'border-box' } },
  {
    selector: 'html, body',
    declarations: {
      margin: '0',
      'font-family': '@font-family',
      'font-size': '@font-size',
      'line-height': '@line-height',
      color: '@color-text',
      background: '@color-page-bg',
      '-webkit-font-smoothing': 'antialiased',
    },
  },
  { selector: 'a', declarations: { color: '@color-link' } },
];

export function themeRules(): RuleSet[] {
  return [...BASE_RULES, ...WIDGET_STYLES.flatMap((s) => s.rules)];
}

export function compileTheme(tokens: ThemeTokens = DEFAULT_TOKENS): CompiledStylesheet {
  return compileStylesheet(themeRules(), { tokens });
}

let _compiled: CompiledStylesheet | undefined;

/** Default theme, compiled once per process. */
export function getThemeStylesheet(): CompiledStylesheet {
  if (!_compiled) _compiled = compileTheme();
  return _compiled;
}
