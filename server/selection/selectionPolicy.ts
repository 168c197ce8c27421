import type { Candidate, SelectedCandidate } from '../../shared/types';
import type { DecisionRegistry } from './deferredPairs';

export interface SelectionPolicyOptions {
  minScore: number;
  maxScoreBased: number;
}

const compareStrings = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Score, then category, then filename; all descending. */
export const compareCandidates = (a: Candidate, b: Candidate): number =>
  b.priorityScore - a.priorityScore ||
  compareStrings(b.category, a.category) ||
  compareStrings(b.filename, a.filename);

export const sortCandidates = (candidates: readonly Candidate[]): Candidate[] => [...candidates].sort(compareCandidates);

export const describeSelectionRule = ({ minScore, maxScoreBased }: SelectionPolicyOptions): string =>
  `score>=${minScore} with cap ${maxScoreBased} for score-based picks; deferred summary/full pairs are force-included`;

/**
 * Working set for download: every candidate at or above `minScore`, capped,
 * plus every member of a pending deferred group, uncapped.
 */
export const selectCandidates = (
  sorted: readonly Candidate[],
  registry: DecisionRegistry,
  options: SelectionPolicyOptions,
): SelectedCandidate[] => {
  const forced = registry.forcedUrls();
  const forcedPicks = sorted.filter((candidate) => forced.has(candidate.url));
  const scorePicks = sortCandidates(
    sorted.filter((candidate) => !forced.has(candidate.url) && candidate.priorityScore >= options.minScore),
  ).slice(0, Math.max(0, options.maxScoreBased));

  const seen = new Set<string>();
  const selected: SelectedCandidate[] = [];
  for (const candidate of [...forcedPicks, ...scorePicks]) {
    if (!candidate.url || seen.has(candidate.url)) continue;
    seen.add(candidate.url);
    const membership = registry.membershipOf(candidate.url);
    selected.push(
      membership
        ? { ...candidate, decisionPending: true, decisionGroupId: membership.groupId, decisionRole: membership.role }
        : { ...candidate, decisionPending: false },
    );
  }
  return selected;
};
