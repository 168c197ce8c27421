import type {
  Candidate,
  CandidateSnapshot,
  DecisionRole,
  DeferredDecisionGroup,
  ResolvedDecision,
} from '../../shared/types';
import { escapeRegExp, normalizeText } from '../utils/text';

export const SUMMARY_HINTS = ['概要', '要約', 'サマリー', 'エグゼクティブサマリー', 'executive summary'];

export const FULL_HINTS = ['本文', '本編', '報告書', 'とりまとめ', '取りまとめ', '詳細', '全文'];

export const DEFERRED_RULE = 'prefer_full_if_pages_le_threshold_else_summary';

const containsHint = (text: string, hints: readonly string[]): boolean => {
  const lower = normalizeText(text).toLowerCase();
  return hints.some((hint) => lower.includes(hint.toLowerCase()));
};

export const isSummaryText = (text: string): boolean => containsHint(text, SUMMARY_HINTS);

export const isFullText = (text: string): boolean => containsHint(text, FULL_HINTS);

// Longest first so that エグゼクティブサマリー goes before サマリー.
const HINT_PATTERN = new RegExp(
  [...SUMMARY_HINTS, ...FULL_HINTS]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|'),
  'gi',
);

const TRAILING_CONNECTIVES = [/の$/, /について$/, /に関する$/, /に係る$/];

const MATERIAL_PREFIX = /^資料\s*(\p{Nd}+(?:-\p{Nd}+)?)\s*/u;

/**
 * Topic of a label with the material number, hint words and connectives
 * removed. A label that is nothing but `資料N` plus hints keeps `資料N` as its
 * topic.
 */
export const topicKey = (text: string): string => {
  let t = normalizeText(text);
  const prefix = t.match(MATERIAL_PREFIX);
  t = t.replace(MATERIAL_PREFIX, '');
  t = t.replace(/[（(][^）)]*pdf[^）)]*[）)]/gi, '');
  t = t.replace(/[（(][^）)]*[）)]/g, '');
  t = t.replace(HINT_PATTERN, '');
  for (const connective of TRAILING_CONNECTIVES) {
    t = t.replace(connective, '');
  }
  t = t.replace(/[・／/,:：\-ー_　\s]+/g, '');
  if (!t && prefix) {
    return `資料${prefix[1]}`;
  }
  return t;
};

const snapshot = (candidate: Candidate): CandidateSnapshot => ({
  url: candidate.url,
  text: candidate.text,
  priorityScore: candidate.priorityScore,
});

export interface GroupMembership {
  groupId: string;
  role: DecisionRole;
}

/**
 * Arena of deferred decision groups keyed by group id. Candidates refer to
 * groups only through the URL index; the registry alone moves a group from
 * pending to resolved.
 */
export class DecisionRegistry {
  private readonly groups = new Map<string, DeferredDecisionGroup>();
  private readonly membershipByUrl = new Map<string, GroupMembership>();
  private readonly resolutions = new Map<string, ResolvedDecision>();
  private nextId = 1;

  open(summary: Candidate, full: Candidate, rule = DEFERRED_RULE): DeferredDecisionGroup {
    if (this.membershipByUrl.has(summary.url) || this.membershipByUrl.has(full.url)) {
      throw new Error(`Candidate already belongs to a deferred group: ${summary.url} / ${full.url}`);
    }
    const groupId = `deferred-${String(this.nextId).padStart(2, '0')}`;
    this.nextId += 1;
    const group: DeferredDecisionGroup = {
      groupId,
      status: 'pending',
      rule,
      summaryCandidate: snapshot(summary),
      fullCandidate: snapshot(full),
    };
    this.groups.set(groupId, group);
    this.membershipByUrl.set(summary.url, { groupId, role: 'summary' });
    this.membershipByUrl.set(full.url, { groupId, role: 'full' });
    return group;
  }

  /** Rebuilds a registry from groups persisted by an earlier stage. */
  static fromGroups(groups: readonly DeferredDecisionGroup[]): DecisionRegistry {
    const registry = new DecisionRegistry();
    for (const group of groups) {
      if (registry.groups.has(group.groupId)) {
        throw new Error(`Duplicate deferred group id: ${group.groupId}`);
      }
      for (const url of [group.summaryCandidate.url, group.fullCandidate.url]) {
        if (registry.membershipByUrl.has(url)) {
          throw new Error(`Candidate belongs to more than one deferred group: ${url}`);
        }
      }
      registry.groups.set(group.groupId, { ...group, status: 'pending' });
      registry.membershipByUrl.set(group.summaryCandidate.url, { groupId: group.groupId, role: 'summary' });
      registry.membershipByUrl.set(group.fullCandidate.url, { groupId: group.groupId, role: 'full' });
      const numeric = Number(group.groupId.replace(/^deferred-/, ''));
      if (Number.isInteger(numeric) && numeric >= registry.nextId) {
        registry.nextId = numeric + 1;
      }
    }
    return registry;
  }

  membershipOf(url: string): GroupMembership | undefined {
    return this.membershipByUrl.get(url);
  }

  forcedUrls(): Set<string> {
    const urls = new Set<string>();
    for (const group of this.groups.values()) {
      if (group.status !== 'pending') continue;
      urls.add(group.summaryCandidate.url);
      urls.add(group.fullCandidate.url);
    }
    return urls;
  }

  pending(): DeferredDecisionGroup[] {
    return Array.from(this.groups.values()).filter((group) => group.status === 'pending');
  }

  list(): DeferredDecisionGroup[] {
    return Array.from(this.groups.values(), (group) => ({ ...group }));
  }

  /** One-way transition; resolving a group twice is an error. */
  resolve(groupId: string, chosenRole: DecisionRole, reason: string, fullPageCount: number | null): ResolvedDecision {
    const group = this.groups.get(groupId);
    if (!group) {
      throw new Error(`Unknown deferred group: ${groupId}`);
    }
    if (group.status === 'resolved') {
      throw new Error(`Deferred group already resolved: ${groupId}`);
    }
    const chosen = chosenRole === 'full' ? group.fullCandidate : group.summaryCandidate;
    const rejected = chosenRole === 'full' ? group.summaryCandidate : group.fullCandidate;
    group.status = 'resolved';
    const resolution: ResolvedDecision = {
      groupId,
      status: 'resolved',
      rule: group.rule,
      chosenRole,
      chosenUrl: chosen.url,
      chosenText: chosen.text,
      rejectedUrl: rejected.url,
      rejectedText: rejected.text,
      reason,
      fullPageCount,
    };
    this.resolutions.set(groupId, resolution);
    return resolution;
  }

  resolved(): ResolvedDecision[] {
    return Array.from(this.resolutions.values());
  }
}

/**
 * Pairs summary-style candidates with the full document on the same topic.
 * `candidates` must already be in selection order; ties between equally good
 * full candidates go to the earlier one.
 */
export const buildDeferredDecisions = (candidates: readonly Candidate[]): DecisionRegistry => {
  const summaries: Candidate[] = [];
  const fulls: Candidate[] = [];
  for (const candidate of candidates) {
    (isSummaryText(candidate.text) ? summaries : fulls).push(candidate);
  }

  const registry = new DecisionRegistry();
  const claimed = new Set<string>();
  const fullKeys = new Map(fulls.map((candidate) => [candidate.url, topicKey(candidate.text)]));

  for (const summary of summaries) {
    const key = topicKey(summary.text);
    if (!key) continue;

    let best: Candidate | null = null;
    let bestScore = -Infinity;
    for (const full of fulls) {
      if (claimed.has(full.url) || full.url === summary.url) continue;
      if (fullKeys.get(full.url) !== key) continue;
      const score = (isFullText(full.text) ? 100 : 0) + full.priorityScore;
      if (score > bestScore) {
        best = full;
        bestScore = score;
      }
    }
    if (!best) continue;

    claimed.add(best.url);
    registry.open(summary, best);
  }

  return registry;
};
