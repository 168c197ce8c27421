import type { AppConfig } from '../../shared/config';
import type { LinkRecord, SelectionResult } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { applyAdjustments } from '../selection/adjustments';
import type { FallbackClassifierChain } from '../selection/classifier';
import { buildDeferredDecisions, type DecisionRegistry } from '../selection/deferredPairs';
import { normalizeLinkRecords, parseLinkLines, parseLinkRecords } from '../selection/linkNormalizer';
import { scoreCandidates } from '../selection/scoring';
import { describeSelectionRule, selectCandidates, sortCandidates } from '../selection/selectionPolicy';

export interface RunSelectionArgs {
  runId: string;
  /** Upstream JSON candidate list; validated here. */
  candidates?: unknown;
  /** `label<TAB>url` lines, used when the JSON list is absent or empty. */
  linkLines?: string;
  minutesText: string;
  config: Pick<AppConfig, 'selection'>;
  classifier: FallbackClassifierChain;
  logger: Logger;
}

export interface SelectionOutcome {
  result: SelectionResult;
  registry: DecisionRegistry;
}

export const runSelection = async ({
  runId,
  candidates,
  linkLines,
  minutesText,
  config,
  classifier,
  logger,
}: RunSelectionArgs): Promise<SelectionOutcome> => {
  let records: LinkRecord[] = candidates === undefined ? [] : parseLinkRecords(candidates);
  let source: SelectionResult['inputs']['source'] = 'json';
  if (records.length === 0 && linkLines) {
    records = parseLinkLines(linkLines);
    source = 'lines';
  }

  const unique = normalizeLinkRecords(records);
  const scored = await scoreCandidates(unique, { minutesText, classifier });
  const adjusted = applyAdjustments(scored.candidates);
  const sorted = sortCandidates(adjusted);
  const registry = buildDeferredDecisions(sorted);
  const selected = selectCandidates(sorted, registry, config.selection);

  logger.info('Selection complete', {
    runId,
    source,
    links: records.length,
    unique: unique.length,
    selected: selected.length,
    deferredGroups: registry.list().length,
    oracleErrors: scored.oracleClassification.errors.length,
  });

  return {
    registry,
    result: {
      runId,
      inputs: {
        source,
        linkCount: unique.length,
        minutesMentionCount: scored.mentionCount,
      },
      allCandidates: sorted,
      selectedCandidates: selected,
      deferredDecisions: registry.list(),
      selectionRule: describeSelectionRule(config.selection),
      oracleClassification: scored.oracleClassification,
    },
  };
};
