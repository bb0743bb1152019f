import { matchRule, type CompiledRuleTable } from "./rules";
import type {
  ConfidenceLevel,
  Evidence,
  TraitMap,
  TraitResult,
} from "./types/persona";
import type { TextItem } from "./types/reddit";

interface ConfidenceBucket {
  minEvidence: number;
  level: ConfidenceLevel;
  label: string;
}

// Checked top-down; the first bucket whose minimum is reached wins.
export const CONFIDENCE_BUCKETS: readonly ConfidenceBucket[] = [
  { minEvidence: 5, level: "strong", label: "inferred from activity patterns" },
  { minEvidence: 2, level: "moderate", label: "based on language patterns" },
  { minEvidence: 1, level: "low", label: "based on a single mention" },
];

export function confidenceFor(evidenceCount: number): {
  level: ConfidenceLevel;
  label: string;
} {
  const bucket =
    CONFIDENCE_BUCKETS.find((b) => evidenceCount >= b.minEvidence) ??
    CONFIDENCE_BUCKETS[CONFIDENCE_BUCKETS.length - 1];
  return { level: bucket.level, label: bucket.label };
}

const MAX_CONFIDENCE = 0.99;

/** Maps an aggregate score onto [0, 1), in hundredths. */
export function confidenceScore(score: number): number {
  if (score <= 0) return 0;
  return Math.min(MAX_CONFIDENCE, Math.round((score / (score + 2)) * 100) / 100);
}

interface Candidate {
  value: string;
  description?: string;
  registeredAt: number;
  ruleIndexes: Set<number>;
  evidence: Evidence[];
  seen: Set<string>;
}

function itemKey(item: TextItem): string {
  return `${item.kind}:${item.id}`;
}

/**
 * Scans every item against every rule and builds the trait map.
 *
 * A value's score is the sum of weight × hit count over the rules naming it.
 * Single-valued categories keep the best value, multi-valued ones the best
 * `maxValues`; ties go to the value registered first in the table.
 * Categories without a match are left out.
 */
export function inferTraits(
  items: readonly TextItem[],
  table: CompiledRuleTable
): TraitMap {
  const hitsByRule = new Map<number, number>();
  const candidates = new Map<string, Map<string, Candidate>>();

  const registration = new Map<string, number>();
  for (const rule of table.rules) {
    const key = `${rule.category}\u0000${rule.value}`;
    if (!registration.has(key)) registration.set(key, rule.index);
  }

  for (const item of items) {
    for (const rule of table.rules) {
      const term = matchRule(item, rule);
      if (term === null) continue;

      hitsByRule.set(rule.index, (hitsByRule.get(rule.index) ?? 0) + 1);

      let byValue = candidates.get(rule.category);
      if (!byValue) {
        byValue = new Map();
        candidates.set(rule.category, byValue);
      }

      let candidate = byValue.get(rule.value);
      if (!candidate) {
        candidate = {
          value: rule.value,
          registeredAt:
            registration.get(`${rule.category}\u0000${rule.value}`) ?? rule.index,
          ruleIndexes: new Set(),
          evidence: [],
          seen: new Set(),
        };
        byValue.set(rule.value, candidate);
      }

      candidate.ruleIndexes.add(rule.index);
      if (candidate.description === undefined && rule.description) {
        candidate.description = rule.description;
      }

      const key = itemKey(item);
      if (!candidate.seen.has(key)) {
        candidate.seen.add(key);
        candidate.evidence.push({ item, ruleId: rule.id, term });
      }
    }
  }

  const traits: TraitMap = {};

  for (const category of table.categories) {
    const byValue = candidates.get(category.id);
    if (!byValue) continue;

    const scored = [...byValue.values()].map((candidate) => {
      let score = 0;
      for (const index of candidate.ruleIndexes) {
        score += table.rules[index].weight * (hitsByRule.get(index) ?? 0);
      }
      return { candidate, score };
    });

    scored.sort(
      (a, b) =>
        b.score - a.score || a.candidate.registeredAt - b.candidate.registeredAt
    );

    traits[category.id] = scored
      .slice(0, category.maxValues)
      .map(({ candidate, score }): TraitResult => {
        const { level, label } = confidenceFor(candidate.evidence.length);
        return {
          category: category.id,
          value: candidate.value,
          ...(candidate.description ? { description: candidate.description } : {}),
          score,
          confidence: confidenceScore(score),
          level,
          label,
          evidence: candidate.evidence,
        };
      });
  }

  return traits;
}
