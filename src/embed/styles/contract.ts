import * as cheerio from 'cheerio';
import { MarkupContractError, type ContractViolation } from '../../utils/errors';
import { blockClass, elementClass, modifierClass } from './classNames';
import type { MarkupNode, WidgetStyle } from './types';

interface DocumentedElement {
  element: string;
  className: string;
  /** Descendant selector chain from the block root to this element. */
  path: string;
  optional: boolean;
  modifiers: string[];
}

function collectElements(style: WidgetStyle): DocumentedElement[] {
  const root = `.${blockClass(style.block)}`;
  const out: DocumentedElement[] = [];

  const walk = (node: MarkupNode, parentPath: string, parentOptional: boolean) => {
    for (const child of node.children ?? []) {
      if (!child.element) continue;
      const className = elementClass(style.block, child.element);
      const path = `${parentPath} .${className}`;
      const optional = parentOptional || child.optional === true;
      out.push({ element: child.element, className, path, optional, modifiers: child.modifiers ?? [] });
      walk(child, path, optional);
    }
  };

  walk(style.structure, root, false);
  return out;
}

export function documentedElements(style: WidgetStyle): string[] {
  return collectElements(style).map((e) => e.element);
}

export function documentedModifiers(style: WidgetStyle): string[] {
  const mods = new Set<string>(style.structure.modifiers ?? []);
  for (const e of collectElements(style)) e.modifiers.forEach((m) => mods.add(m));
  return [...mods];
}

/** Every class the documented structure names: block, elements, modifiers. */
export function documentedClasses(style: WidgetStyle): string[] {
  const classes = new Set<string>([blockClass(style.block)]);
  for (const e of collectElements(style)) classes.add(e.className);
  for (const m of documentedModifiers(style)) classes.add(modifierClass(m));
  return [...classes];
}

function classList(value: string | undefined): string[] {
  return (value ?? '').split(/\s+/).filter(Boolean);
}

export function verifyMarkup(style: WidgetStyle, html: string): ContractViolation[] {
  const $ = cheerio.load(html);
  const block = blockClass(style.block);
  const roots = $(`.${block}`);

  if (roots.length === 0) {
    return [{ kind: 'missing-block', block, message: `no element has class "${block}"` }];
  }

  const violations: ContractViolation[] = [];
  const documented = collectElements(style);
  const byClass = new Map(documented.map((e) => [e.className, e]));
  const rootModifiers = new Set((style.structure.modifiers ?? []).map(modifierClass));

  for (const el of documented) {
    const placed = new Set($(el.path).toArray());
    const instances = roots.find(`.${el.className}`).toArray();
    if (instances.some((node) => !placed.has(node))) {
      violations.push({
        kind: 'unreachable-element',
        block,
        className: el.className,
        message: `"${el.className}" is not nested as documented (${el.path})`,
      });
    } else if (instances.length === 0 && !el.optional) {
      violations.push({
        kind: 'unreachable-element',
        block,
        className: el.className,
        message: `"${el.className}" is missing`,
      });
    }
  }

  const seenUnknown = new Set<string>();
  roots.each((_i, rootEl) => {
    for (const cls of classList($(rootEl).attr('class'))) {
      if (cls.startsWith('-') && !rootModifiers.has(cls) && !seenUnknown.has(`${block} ${cls}`)) {
        seenUnknown.add(`${block} ${cls}`);
        violations.push({
          kind: 'unknown-modifier',
          block,
          className: cls,
          message: `modifier "${cls}" is not documented for "${block}"`,
        });
      }
    }

    $(rootEl)
      .find(`[class*="${block}__"]`)
      .each((_j, child) => {
        const classes = classList($(child).attr('class'));
        for (const cls of classes) {
          if (!cls.startsWith(`${block}__`) || seenUnknown.has(cls)) continue;
          const doc = byClass.get(cls);
          if (!doc) {
            seenUnknown.add(cls);
            violations.push({
              kind: 'unknown-element',
              block,
              className: cls,
              message: `element "${cls}" is not documented`,
            });
            continue;
          }
          const allowed = new Set(doc.modifiers.map(modifierClass));
          for (const mod of classes) {
            const key = `${cls} ${mod}`;
            if (mod.startsWith('-') && !allowed.has(mod) && !seenUnknown.has(key)) {
              seenUnknown.add(key);
              violations.push({
                kind: 'unknown-modifier',
                block,
                className: mod,
                message: `modifier "${mod}" is not documented for "${cls}"`,
              });
            }
          }
        }
      });
  });

  return violations;
}

export function assertMarkup(style: WidgetStyle, html: string): void {
  const violations = verifyMarkup(style, html);
  if (violations.length > 0) throw new MarkupContractError(style.block, violations);
}
