import { DEFAULT_CATEGORY } from '../types/index.js';
import { resolveNode, type RuleNode } from './RuleNode.js';

export interface RuleMatch {
  category: string;
  subcategory: string | null;

  /** False when no rule applied and the default category was used */
  matched: boolean;
}

/**
 * Immutable classification structure. A new tree is built on every rules
 * reload and swapped in through {@link RuleTreeRef}.
 */
export class RuleTree {
  readonly rules: readonly RuleNode[];
  readonly defaultCategory: string;
  private managedNames: ReadonlySet<string>;

  constructor(rules: readonly RuleNode[], defaultCategory: string = DEFAULT_CATEGORY) {
    this.rules = Object.freeze([...rules]);
    this.defaultCategory = defaultCategory;
    this.managedNames = new Set([
      ...this.rules.map(rule => rule.category.toLowerCase()),
      defaultCategory.toLowerCase(),
    ]);
  }

  /**
   * First top-level rule that applies wins, then its most specific child
   * @param fileName Base name of the file
   */
  match(fileName: string): RuleMatch | null {
    for (const rule of this.rules) {
      const node = resolveNode(rule, fileName);
      if (node) {
        return { category: node.category, subcategory: node.subcategory, matched: true };
      }
    }
    return null;
  }

  categoryFor(fileName: string): RuleMatch {
    return this.match(fileName) ?? { category: this.defaultCategory, subcategory: null, matched: false };
  }

  /**
   * Folder names the engine creates at a root; such folders are never reorganized
   */
  isManagedFolderName(name: string): boolean {
    return this.managedNames.has(name.toLowerCase());
  }

  get size(): number {
    return this.rules.length;
  }
}

/**
 * Holder for the current tree. Readers take one snapshot per classification;
 * a swap never affects a classification already running.
 */
export class RuleTreeRef {
  private tree: RuleTree;

  constructor(initial: RuleTree) {
    this.tree = initial;
  }

  current(): RuleTree {
    return this.tree;
  }

  swap(next: RuleTree): RuleTree {
    const previous = this.tree;
    this.tree = next;
    return previous;
  }
}
