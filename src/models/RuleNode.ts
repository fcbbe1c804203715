import ignore from 'ignore';
import { lookup } from 'mime-types';

export interface RuleMatchers {
  /** Lowercase suffixes with a leading dot (e.g. '.pdf', '.tar.gz') */
  extensions: readonly string[];

  /** gitignore-style globs tested against the base name */
  patterns: readonly string[];

  /** 'type/subtype' or 'type/*', tested against the MIME type looked up from the name */
  mimeTypes: readonly string[];
}

export interface RuleNode {
  matchers: RuleMatchers;

  /** Top-level destination folder */
  category: string;

  /** Nested destination below the category, '/'-separated; null for top-level rules */
  subcategory: string | null;

  /** Ordered; the first applying child wins */
  children: readonly RuleNode[];
}

export interface RuleNodeInput {
  category: string;
  subcategory?: string | null;
  extensions?: readonly string[];
  patterns?: readonly string[];
  mimeTypes?: readonly string[];
  children?: readonly RuleNode[];
}

export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

export function createRuleNode(input: RuleNodeInput): RuleNode {
  return Object.freeze({
    matchers: Object.freeze({
      extensions: Object.freeze((input.extensions ?? []).map(normalizeExtension)),
      patterns: Object.freeze([...(input.patterns ?? [])]),
      mimeTypes: Object.freeze((input.mimeTypes ?? []).map(type => type.trim().toLowerCase())),
    }),
    category: input.category,
    subcategory: input.subcategory ?? null,
    children: Object.freeze([...(input.children ?? [])]),
  });
}

// Compiled gitignore matchers, one per pattern list
const patternCache: WeakMap<readonly string[], ReturnType<typeof ignore>> = new WeakMap();

function patternMatcher(patterns: readonly string[]): ReturnType<typeof ignore> {
  let matcher = patternCache.get(patterns);
  if (!matcher) {
    matcher = ignore().add([...patterns]);
    patternCache.set(patterns, matcher);
  }
  return matcher;
}

function mimeMatches(mimeType: string, hint: string): boolean {
  if (hint.endsWith('/*')) {
    return mimeType.startsWith(hint.slice(0, -1));
  }
  return mimeType === hint;
}

/**
 * Test a node's own matchers (children are not consulted)
 * @param node Rule node
 * @param fileName Base name of the file
 */
export function matchesOwn(node: RuleNode, fileName: string): boolean {
  const { extensions, patterns, mimeTypes } = node.matchers;
  const lowerName = fileName.toLowerCase();

  if (extensions.some(ext => lowerName.endsWith(ext) && lowerName.length > ext.length)) {
    return true;
  }

  if (patterns.length > 0 && fileName.length > 0 && patternMatcher(patterns).ignores(fileName)) {
    return true;
  }

  if (mimeTypes.length > 0) {
    const mimeType = lookup(fileName);
    if (mimeType && mimeTypes.some(hint => mimeMatches(mimeType, hint))) {
      return true;
    }
  }

  return false;
}

/**
 * Find the most specific node under (and including) `node` that applies to the file
 * @returns The deepest applying node, or null when neither the node nor any descendant applies
 */
export function resolveNode(node: RuleNode, fileName: string): RuleNode | null {
  for (const child of node.children) {
    const resolved = resolveNode(child, fileName);
    if (resolved) {
      return resolved;
    }
  }
  return matchesOwn(node, fileName) ? node : null;
}
