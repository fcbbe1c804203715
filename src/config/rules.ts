import { readFileSync } from 'fs';
import { z } from 'zod';
import { createRuleNode, type RuleNode } from '../models/RuleNode.js';
import { RuleTree } from '../models/RuleTree.js';
import { DEFAULT_CATEGORY } from '../types/index.js';
import { ConfigError } from '../lib/errors.js';
import { getLogger } from '../lib/logger.js';

// ============================================================================
// Schemas
// ============================================================================

/** A single folder name: no separators, not "." or ".." */
const SegmentSchema = z
  .string()
  .trim()
  .min(1)
  .refine(value => !/[\/\\]/.test(value) && value !== '.' && value !== '..', {
    message: 'must be a plain folder name',
  });

const PatternListSchema = z.array(z.string().trim().min(1));

export interface ChildRuleSpec {
  name: string;
  extensions?: string[];
  patterns?: string[];
  mimeTypes?: string[];
  children?: ChildRuleSpec[];
}

const ChildRuleSchema: z.ZodType<ChildRuleSpec> = z.lazy(() =>
  z.object({
    name: SegmentSchema,
    extensions: PatternListSchema.optional(),
    patterns: PatternListSchema.optional(),
    mimeTypes: PatternListSchema.optional(),
    children: z.array(ChildRuleSchema).optional(),
  })
);

export const RuleSpecSchema = z.object({
  category: SegmentSchema,
  extensions: PatternListSchema.optional(),
  patterns: PatternListSchema.optional(),
  mimeTypes: PatternListSchema.optional(),
  children: z.array(ChildRuleSchema).optional(),
});

export type RuleSpec = z.infer<typeof RuleSpecSchema>;

export const RulesFileSchema = z.object({
  defaultCategory: SegmentSchema.optional(),
  rules: z.array(RuleSpecSchema),
});

export type RulesFile = z.infer<typeof RulesFileSchema>;

/** `{ "Images": [".jpg"], "Documents": { "PDF": [".pdf"] } }` */
export const LegacyRulesSchema = z.record(
  SegmentSchema,
  z.union([PatternListSchema, z.record(SegmentSchema, PatternListSchema)])
);

export type LegacyRules = z.infer<typeof LegacyRulesSchema>;

// ============================================================================
// Building
// ============================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function buildChild(childRule: ChildRuleSpec, category: string, parentSubcategory: string | null): RuleNode {
  const subcategory = parentSubcategory ? `${parentSubcategory}/${childRule.name}` : childRule.name;
  return createRuleNode({
    category,
    subcategory,
    extensions: childRule.extensions,
    patterns: childRule.patterns,
    mimeTypes: childRule.mimeTypes,
    children: (childRule.children ?? []).map(child => buildChild(child, category, subcategory)),
  });
}

export function buildRuleTree(file: RulesFile): RuleTree {
  const nodes = file.rules.map(rule =>
    createRuleNode({
      category: rule.category,
      extensions: rule.extensions,
      patterns: rule.patterns,
      mimeTypes: rule.mimeTypes,
      children: (rule.children ?? []).map(child => buildChild(child, rule.category, null)),
    })
  );
  return new RuleTree(nodes, file.defaultCategory ?? DEFAULT_CATEGORY);
}

export function buildLegacyRuleTree(legacy: LegacyRules): RuleTree {
  const nodes = Object.entries(legacy).map(([category, value]) => {
    if (Array.isArray(value)) {
      return createRuleNode({ category, extensions: value });
    }
    return createRuleNode({
      category,
      children: Object.entries(value).map(([subcategory, extensions]) =>
        createRuleNode({ category, subcategory, extensions })
      ),
    });
  });
  return new RuleTree(nodes);
}

/**
 * Validate parsed JSON and build a rule tree
 * @throws ConfigError describing every invalid field
 */
export function parseRules(data: unknown): RuleTree {
  const isStructured = typeof data === 'object' && data !== null && 'rules' in data;

  if (isStructured) {
    const result = RulesFileSchema.safeParse(data);
    if (!result.success) {
      throw new ConfigError(`Invalid rules: ${formatIssues(result.error)}`);
    }
    return buildRuleTree(result.data);
  }

  const legacy = LegacyRulesSchema.safeParse(data);
  if (!legacy.success) {
    throw new ConfigError(`Invalid rules: ${formatIssues(legacy.error)}`);
  }
  return buildLegacyRuleTree(legacy.data);
}

/**
 * Read, validate and build the rules file
 * @throws ConfigError when the file is missing, not JSON, or invalid
 */
export function loadRulesFile(rulesPath: string): RuleTree {
  const logger = getLogger();

  let raw: string;
  try {
    raw = readFileSync(rulesPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Rules file not found at: ${rulesPath}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Rules file is not valid JSON: ${rulesPath}`, { cause: error });
  }

  const tree = parseRules(data);
  logger.info({ rulesPath, rules: tree.size, defaultCategory: tree.defaultCategory }, 'Rules loaded');
  return tree;
}
