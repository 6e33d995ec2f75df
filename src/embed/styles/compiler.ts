import { StylesheetCompileError } from '../../utils/errors';
import { DEFAULT_TOKENS, resolveTokens, VARIABLE_RE, type ThemeTokens } from './tokens';

export type Declarations = Record<string, string | number>;

/**
 * A nested rule. Child selectors are joined to their parent with a
 * descendant combinator unless they contain `&`, which stands for the parent.
 */
export interface RuleSet {
  selector: string;
  declarations?: Declarations;
  rules?: RuleSet[];
  /** Media query (without `@media`) the rule and its children are emitted in. */
  media?: string;
}

export interface FlatRule {
  selector: string;
  declarations: Array<[string, string]>;
  media?: string;
}

export interface CompileOptions {
  tokens?: ThemeTokens;
  /** Plain CSS emitted before the compiled rules (`@import`, resets). */
  preamble?: string;
}

export interface CompiledStylesheet {
  css: string;
  rules: FlatRule[];
}

/** Split on top-level commas only: not inside `(...)`, `[...]` or quotes. */
function splitSelectorList(selector: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | undefined;
  let start = 0;

  for (let i = 0; i < selector.length; i++) {
    const ch = selector[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = undefined;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '(' || ch === '[') {
      depth++;
    } else if ((ch === ')' || ch === ']') && depth > 0) {
      depth--;
    } else if (ch === ',' && depth === 0) {
      parts.push(selector.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(selector.slice(start));

  return parts.map((s) => s.trim()).filter(Boolean);
}

/** Expand a child selector against its parent(s), cartesian over comma lists. */
export function joinSelectors(parent: string | undefined, child: string): string {
  const children = splitSelectorList(child);
  if (children.length === 0) {
    throw new StylesheetCompileError('Empty selector', { selector: child });
  }
  if (parent === undefined) {
    if (children.some((c) => c.includes('&'))) {
      throw new StylesheetCompileError(`"&" used in a top-level selector: ${child}`, { selector: child });
    }
    return children.join(', ');
  }

  const parents = splitSelectorList(parent);
  const joined: string[] = [];
  for (const p of parents) {
    for (const c of children) {
      joined.push(c.includes('&') ? c.replace(/&/g, p) : `${p} ${c}`);
    }
  }
  return joined.join(', ');
}

function substitute(value: string, tokens: ThemeTokens, selector: string): string {
  return value.replace(VARIABLE_RE, (_m, name: string) => {
    const resolved = tokens[name];
    if (resolved === undefined) {
      throw new StylesheetCompileError(`Unresolved variable @${name} in ${selector}`, { selector, variable: name });
    }
    return resolved;
  });
}

function combineMedia(outer: string | undefined, inner: string | undefined): string | undefined {
  if (!outer) return inner;
  if (!inner) return outer;
  return `${outer} and ${inner}`;
}

/** Flatten nested rules, substituting variables. Rules without declarations are dropped. */
export function flattenRules(rules: RuleSet[], tokens: ThemeTokens): FlatRule[] {
  const flat: FlatRule[] = [];

  const walk = (rule: RuleSet, parent: string | undefined, media: string | undefined) => {
    const selector = joinSelectors(parent, rule.selector);
    const ruleMedia = combineMedia(media, rule.media && substitute(rule.media, tokens, selector));

    const entries = Object.entries(rule.declarations ?? {});
    if (entries.length > 0) {
      flat.push({
        selector,
        declarations: entries.map(([prop, value]) => [prop, substitute(String(value), tokens, selector)]),
        media: ruleMedia,
      });
    }

    for (const child of rule.rules ?? []) walk(child, selector, ruleMedia);
  };

  for (const rule of rules) walk(rule, undefined, undefined);
  return flat;
}

function formatRule(rule: FlatRule, indent = ''): string {
  const body = rule.declarations.map(([prop, value]) => `${prop}:${value}`).join(';');
  return `${indent}${rule.selector}{${body}}`;
}

/** Serialize flat rules, grouping consecutive rules that share a media query. */
export function serializeRules(rules: FlatRule[]): string {
  const lines: string[] = [];
  let i = 0;
  while (i < rules.length) {
    const media = rules[i].media;
    if (!media) {
      lines.push(formatRule(rules[i]));
      i++;
      continue;
    }
    lines.push(`@media ${media}{`);
    while (i < rules.length && rules[i].media === media) {
      lines.push(formatRule(rules[i], '  '));
      i++;
    }
    lines.push('}');
  }
  return lines.join('\n');
}

export function compileStylesheet(rules: RuleSet[], opts: CompileOptions = {}): CompiledStylesheet {
  const tokens = resolveTokens(opts.tokens ?? DEFAULT_TOKENS);
  const flat = flattenRules(rules, tokens);
  const body = serializeRules(flat);
  const css = opts.preamble ? `${opts.preamble.trim()}\n${body}\n` : `${body}\n`;
  return { css, rules: flat };
}

const QUOTED_OR_URL_RE = /"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'|url\([^)]*\)/g;

/**
 * Variable references left in compiled CSS. At-rule keywords (`@media`,
 * `@import`, `@keyframes`, ...) at the start of a statement are not counted,
 * nor is anything inside a string or a `url(...)`.
 */
export function findUnresolvedVariables(compiled: string): string[] {
  const css = compiled.replace(QUOTED_OR_URL_RE, (m) => (m.startsWith('url(') ? 'url()' : '""'));
  const found = new Set<string>();
  const re = /@([a-z][a-z0-9-]*)/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(css)) !== null) {
    const before = css.slice(0, m.index).trimEnd();
    const atStatementStart = before === '' || /[;{}]$/.test(before);
    if (!atStatementStart) found.add(m[1]);
  }
  return [...found];
}
