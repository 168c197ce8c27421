import fs from 'node:fs/promises';
import type { DecisionRole, ResolvedDecision, SelectedCandidate } from '../../shared/types';
import type { DecisionRegistry } from '../selection/deferredPairs';
import type { DocumentTools } from './pdfTools';

export interface ProbeTarget {
  url: string;
  downloaded: boolean;
  savedPath: string;
}

export const fileExists = async (filePath: string): Promise<boolean> => {
  if (!filePath) return false;
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
};

/**
 * Cheap phase: page counts only, for every target. Unavailable files and
 * failing tools give null.
 */
export const probePageCounts = async (
  targets: readonly ProbeTarget[],
  tools: Pick<DocumentTools, 'pageCount'>,
): Promise<Record<string, number | null>> => {
  const counts: Record<string, number | null> = {};
  for (const target of targets) {
    if (!target.url) continue;
    counts[target.url] =
      target.downloaded && (await fileExists(target.savedPath)) ? await tools.pageCount(target.savedPath) : null;
  }
  return counts;
};

export const decideDeferred = (
  fullPageCount: number | null | undefined,
  pageThreshold: number,
): { chosenRole: DecisionRole; reason: string } => {
  if (typeof fullPageCount !== 'number') {
    return { chosenRole: 'summary', reason: 'default_to_summary' };
  }
  if (fullPageCount <= pageThreshold) {
    return { chosenRole: 'full', reason: `full_page_count=${fullPageCount} <= ${pageThreshold}` };
  }
  return { chosenRole: 'summary', reason: `full_page_count=${fullPageCount} > ${pageThreshold}` };
};

/** Resolves every pending group exactly once from the full candidate's page count. */
export const resolveDeferredDecisions = (
  registry: DecisionRegistry,
  pageCounts: Readonly<Record<string, number | null>>,
  pageThreshold: number,
): ResolvedDecision[] =>
  registry.pending().map((group) => {
    const fullPageCount = pageCounts[group.fullCandidate.url] ?? null;
    const { chosenRole, reason } = decideDeferred(fullPageCount, pageThreshold);
    return registry.resolve(group.groupId, chosenRole, reason, fullPageCount);
  });

/**
 * Drops every rejected candidate from the pre-resolution selection. No cap
 * applies here.
 */
export const buildFinalSelection = (
  selected: readonly SelectedCandidate[],
  resolved: readonly ResolvedDecision[],
): SelectedCandidate[] => {
  const rejected = new Set(resolved.map((r) => r.rejectedUrl).filter(Boolean));
  const chosen = new Set(resolved.map((r) => r.chosenUrl).filter(Boolean));
  const seen = new Set<string>();
  const out: SelectedCandidate[] = [];
  for (const item of selected) {
    if (!item.url || seen.has(item.url) || rejected.has(item.url)) continue;
    seen.add(item.url);
    out.push(chosen.has(item.url) ? { ...item, decisionPending: false, decisionResolved: true } : { ...item });
  }
  return out;
};
