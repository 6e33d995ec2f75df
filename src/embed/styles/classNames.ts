import clsx, { type ClassValue } from 'clsx';
import { ClassNameError } from '../../utils/errors';

/**
 * Class naming for dashboard components.
 *
 * A block is the component root (`rb-c-admin-news-widget`). Elements are
 * named parts of it (`rb-c-admin-news-widget__item-date`). Modifiers are
 * state flags written as a separate `-name` class on the block element, so
 * they are selected as `.block.-name` and never collide across blocks.
 */

const NAME_RE = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;

type NameKind = 'block' | 'element' | 'modifier';

function validate(kind: NameKind, name: string): string {
  if (typeof name !== 'string' || name.length === 0) {
    throw new ClassNameError(kind, String(name), 'must not be empty');
  }
  if (name.includes('__')) {
    throw new ClassNameError(kind, name, 'must not contain "__"');
  }
  if (kind === 'modifier' && name.startsWith('-')) {
    throw new ClassNameError(kind, name, 'pass the modifier without its leading "-"');
  }
  if (!NAME_RE.test(name)) {
    throw new ClassNameError(kind, name, 'use lowercase letters, digits and single hyphens, starting with a letter');
  }
  return name;
}

export function blockClass(block: string): string {
  return validate('block', block);
}

export function elementClass(block: string, element: string): string {
  return `${validate('block', block)}__${validate('element', element)}`;
}

export function modifierClass(modifier: string): string {
  return `-${validate('modifier', modifier)}`;
}

export function blockSelector(block: string): string {
  return `.${blockClass(block)}`;
}

export function elementSelector(block: string, element: string): string {
  return `.${elementClass(block, element)}`;
}

export function modifierSelector(block: string, modifier: string): string {
  return `${blockSelector(block)}.${modifierClass(modifier)}`;
}

/** Modifier flags: `'is-active'`, or `{ 'is-active': isActive }`. */
export type ModifierInput = string | Record<string, boolean | null | undefined> | false | null | undefined;

function modifierNames(mods: ModifierInput[]): string[] {
  const names: string[] = [];
  for (const mod of mods) {
    if (!mod) continue;
    if (typeof mod === 'string') {
      names.push(mod);
    } else {
      for (const [name, on] of Object.entries(mod)) {
        if (on) names.push(name);
      }
    }
  }
  return names;
}

export interface Block {
  readonly name: string;
  readonly selector: string;
  element(element: string): string;
  elementSelector(element: string): string;
  modifier(modifier: string): string;
  modifierSelector(modifier: string): string;
  /** Block class plus the active modifier classes, space-separated. */
  classes(...mods: ModifierInput[]): string;
  /** Element class plus modifier classes for that element. */
  elementClasses(element: string, ...mods: ModifierInput[]): string;
}

export function createBlock(name: string): Block {
  const block = blockClass(name);

  return {
    name: block,
    selector: `.${block}`,
    element: (element) => elementClass(block, element),
    elementSelector: (element) => elementSelector(block, element),
    modifier: (modifier) => modifierClass(modifier),
    modifierSelector: (modifier) => modifierSelector(block, modifier),
    classes: (...mods) => clsx(block, modifierNames(mods).map(modifierClass)),
    elementClasses: (element, ...mods) =>
      clsx(elementClass(block, element), modifierNames(mods).map(modifierClass)),
  };
}

/** clsx re-export for templates that mix block classes with plain ones. */
export function cx(...values: ClassValue[]): string {
  return clsx(values);
}
