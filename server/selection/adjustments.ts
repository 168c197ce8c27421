import type { Candidate, DocumentCategory } from '../../shared/types';
import { clampScore } from './scoring';

const OFFICIAL_CATEGORIES: ReadonlySet<DocumentCategory> = new Set(['executive_summary', 'material']);

export interface SetFacts {
  /** An executive summary or material scoring at least 4. */
  hasSubstantialMaterials: boolean;
  /** Any executive summary or material at all. */
  hasNormalMaterials: boolean;
}

export const collectSetFacts = (candidates: readonly Candidate[]): SetFacts => ({
  hasSubstantialMaterials: candidates.some((c) => OFFICIAL_CATEGORIES.has(c.category) && c.priorityScore >= 4),
  hasNormalMaterials: candidates.some((c) => OFFICIAL_CATEGORIES.has(c.category)),
});

/**
 * A set-wide rule. Returns the new score for the candidate, or null when the
 * rule does not change it.
 */
export interface AdjustmentRule {
  name: string;
  apply: (candidate: Candidate, facts: SetFacts) => number | null;
}

const changed = (before: number, after: number): number | null => (after === before ? null : after);

export const ADJUSTMENT_RULES: readonly AdjustmentRule[] = [
  {
    name: 'agenda_cap_to_4',
    apply: (c, facts) =>
      c.category === 'agenda' && facts.hasSubstantialMaterials && c.priorityScore >= 5 ? changed(c.priorityScore, 4) : null,
  },
  {
    name: 'reference_cap_to_4',
    apply: (c, facts) =>
      c.category === 'reference' && facts.hasNormalMaterials && c.priorityScore > 4 ? 4 : null,
  },
  {
    name: 'personal_cap_with_official',
    apply: (c, facts) =>
      c.category === 'personal_material' && facts.hasNormalMaterials
        ? changed(c.priorityScore, Math.min(c.priorityScore, 2))
        : null,
  },
  {
    name: 'personal_raise_without_official',
    apply: (c, facts) =>
      c.category === 'personal_material' && !facts.hasNormalMaterials
        ? changed(c.priorityScore, Math.max(c.priorityScore, 3))
        : null,
  },
];

/**
 * Applies every rule in order over the whole set. Facts are computed once,
 * before any rule runs. Returns new candidate objects.
 */
export const applyAdjustments = (
  candidates: readonly Candidate[],
  rules: readonly AdjustmentRule[] = ADJUSTMENT_RULES,
): Candidate[] => {
  const facts = collectSetFacts(candidates);
  return candidates.map((original) => {
    let current: Candidate = { ...original, adjustments: [...original.adjustments] };
    for (const rule of rules) {
      const next = rule.apply(current, facts);
      if (next === null) continue;
      current = { ...current, priorityScore: next, adjustments: [...current.adjustments, rule.name] };
    }
    return { ...current, priorityScore: clampScore(current.priorityScore) };
  });
};
