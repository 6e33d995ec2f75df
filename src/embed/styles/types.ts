import type { RuleSet } from './compiler';

/**
 * Documented markup for a block. The root node stands for the block element
 * itself; every other node names one of its elements.
 */
export interface MarkupNode {
  element?: string;
  /** Modifier names allowed on this node. */
  modifiers?: string[];
  /** Rendered only in some states (an empty list, an unavailable server). */
  optional?: boolean;
  children?: MarkupNode[];
}

export interface WidgetStyle {
  id: string;
  block: string;
  description: string;
  structure: MarkupNode;
  rules: RuleSet[];
}
