import { z } from "zod";
import ruleData from "./data/trait-rules.json";
import { RuleTableError } from "./errors";
import { searchableText, termPattern } from "./preprocessing";
import type {
  PersonaSection,
  RuleTable,
  TraitCategory,
  TraitRule,
} from "./types/persona";
import type { TextItem } from "./types/reddit";

const SECTIONS = [
  "demographics",
  "behaviors",
  "motivations",
  "personality",
  "frustrations",
  "goals",
] as const satisfies readonly PersonaSection[];

interface TextMatcher {
  regex: RegExp;
  keyword?: string; // Reported as the term instead of the raw match
}

export interface CompiledRule extends TraitRule {
  index: number; // Registration order, used for tie-breaks
  textMatchers: readonly TextMatcher[];
  subredditSet: ReadonlySet<string>;
}

export interface CompiledRuleTable {
  categories: readonly TraitCategory[];
  rules: readonly CompiledRule[];
}

const nonEmptyString = z
  .string({ invalid_type_error: "must be a non-empty string" })
  .refine((value) => value.trim() !== "", "must be a non-empty string");

const stringList = z.array(nonEmptyString).default([]);

const TraitCategorySchema = z
  .object({
    id: nonEmptyString,
    label: nonEmptyString,
    section: z.enum(SECTIONS, {
      errorMap: () => ({ message: `section must be one of ${SECTIONS.join(", ")}` }),
    }),
    mode: z.enum(["single", "multi"]),
    maxValues: z.number().int().min(1).default(1),
    template: nonEmptyString.optional(),
  })
  .refine((category) => category.mode === "multi" || category.maxValues === 1, {
    message: "maxValues must be 1 for single-valued categories",
    path: ["maxValues"],
  });

const TraitRuleSchema = z
  .object({
    id: nonEmptyString,
    category: nonEmptyString,
    value: nonEmptyString,
    description: nonEmptyString.optional(),
    keywords: stringList.transform((list) => list.map((k) => k.toLowerCase())),
    patterns: stringList,
    subreddits: stringList.transform((list) => list.map((s) => s.toLowerCase())),
    weight: z
      .number({ invalid_type_error: "weight must be a positive number" })
      .finite()
      .positive("weight must be a positive number")
      .default(1),
  })
  .refine(
    (rule) => rule.keywords.length + rule.patterns.length + rule.subreddits.length > 0,
    "needs at least one keyword, pattern or subreddit"
  );

const RuleTableSchema = z.object({
  categories: z.array(TraitCategorySchema),
  rules: z.array(TraitRuleSchema),
});

function issuePath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>(
    (where, segment) =>
      typeof segment === "number" ? `${where}[${segment}]` : where ? `${where}.${segment}` : segment,
    ""
  );
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issuePath(issue.path);
      return where ? `${where}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/** Validates raw JSON into a rule table. */
export function parseRuleTable(raw: unknown): RuleTable {
  const parsed = RuleTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RuleTableError(`Invalid rule table: ${describeIssues(parsed.error)}`);
  }
  const { categories, rules } = parsed.data;

  const categoryIds = new Set<string>();
  for (const category of categories) {
    if (categoryIds.has(category.id)) {
      throw new RuleTableError(`Duplicate category id "${category.id}"`);
    }
    categoryIds.add(category.id);
  }

  const ruleIds = new Set<string>();
  for (const rule of rules) {
    if (ruleIds.has(rule.id)) {
      throw new RuleTableError(`Duplicate rule id "${rule.id}"`);
    }
    if (!categoryIds.has(rule.category)) {
      throw new RuleTableError(
        `Rule "${rule.id}" refers to unknown category "${rule.category}"`
      );
    }
    ruleIds.add(rule.id);
  }

  return { categories, rules };
}

function compileRule(rule: TraitRule, index: number): CompiledRule {
  const keywordMatchers = rule.keywords.map((keyword) => ({
    regex: termPattern(keyword),
    keyword,
  }));

  const patternMatchers = rule.patterns.map((pattern) => {
    try {
      return { regex: new RegExp(pattern, "i") };
    } catch (error) {
      throw new RuleTableError(
        `Rule "${rule.id}" has an invalid pattern /${pattern}/: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  });

  return Object.freeze({
    ...rule,
    keywords: Object.freeze([...rule.keywords]),
    patterns: Object.freeze([...rule.patterns]),
    subreddits: Object.freeze([...rule.subreddits]),
    index,
    textMatchers: Object.freeze([...keywordMatchers, ...patternMatchers]),
    subredditSet: new Set(rule.subreddits),
  });
}

export function compileRuleTable(table: RuleTable): CompiledRuleTable {
  return Object.freeze({
    categories: Object.freeze(table.categories.map((c) => Object.freeze({ ...c }))),
    rules: Object.freeze(table.rules.map(compileRule)),
  });
}

export function loadRuleTable(raw: unknown): CompiledRuleTable {
  return compileRuleTable(parseRuleTable(raw));
}

let defaultTable: CompiledRuleTable | null = null;

/** The bundled rule table, validated and compiled on first use. */
export function getDefaultRuleTable(): CompiledRuleTable {
  if (!defaultTable) {
    defaultTable = loadRuleTable(ruleData);
  }
  return defaultTable;
}

/**
 * Returns the term that makes `item` match `rule`, or null. Keywords and
 * patterns are tried against the title and body, then the item's subreddit.
 */
export function matchRule(item: TextItem, rule: CompiledRule): string | null {
  const text = searchableText(item);

  for (const matcher of rule.textMatchers) {
    const match = matcher.regex.exec(text);
    if (match) return matcher.keyword ?? match[0];
  }

  if (rule.subredditSet.has(item.subreddit.toLowerCase())) {
    return `r/${item.subreddit}`;
  }
  return null;
}
