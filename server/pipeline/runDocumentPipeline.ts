import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import type {
  DeferredDecisionGroup,
  DocumentPipelineResult,
  DownloadRecord,
  ResolvedDecision,
  SelectedCandidate,
} from '../../shared/types';
import { analyzeDocuments, type AnalysisTarget } from '../documents/analyzeDocuments';
import type { DocumentTools } from '../documents/pdfTools';
import { buildFinalSelection, probePageCounts, resolveDeferredDecisions } from '../documents/resolution';
import type { Logger } from '../obs/logger';
import { DecisionRegistry } from '../selection/deferredPairs';
import { DownloadListSchema, MalformedInputError, parseOrThrow, SelectionPayloadSchema } from './validators';

export interface DocumentPipelineInput {
  selected: SelectedCandidate[];
  deferredDecisions: DeferredDecisionGroup[];
  downloads: DownloadRecord[];
  registry: DecisionRegistry;
}

/** Validates persisted selection and download payloads. Throws MalformedInputError. */
export const parseDocumentPipelineInput = (selection: unknown, downloads: unknown): DocumentPipelineInput => {
  const parsedSelection = parseOrThrow(SelectionPayloadSchema, selection, 'selection result');
  const parsedDownloads = parseOrThrow(DownloadListSchema, downloads, 'download records');
  let registry: DecisionRegistry;
  try {
    registry = DecisionRegistry.fromGroups(parsedSelection.deferredDecisions);
  } catch (error) {
    throw new MalformedInputError('selection result', [error instanceof Error ? error.message : String(error)]);
  }
  return {
    selected: parsedSelection.selectedCandidates,
    deferredDecisions: parsedSelection.deferredDecisions,
    downloads: parsedDownloads,
    registry,
  };
};

export interface RunDocumentPipelineArgs {
  runId: string;
  runDir: string;
  selected: readonly SelectedCandidate[];
  downloads: readonly DownloadRecord[];
  registry: DecisionRegistry;
  tools: DocumentTools;
  config: Pick<AppConfig, 'deferred' | 'analysis'>;
  maxWorkersOverride?: number;
  logger: Logger;
}

const isInsideRunDir = (runDir: string, savedPath: string): boolean => {
  const relative = path.relative(path.resolve(runDir), path.resolve(savedPath));
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
};

/** Records whose file lies outside the run directory count as not downloaded. */
const indexDownloads = (runDir: string, downloads: readonly DownloadRecord[]) => {
  const byUrl = new Map<string, DownloadRecord>();
  const outside: DownloadRecord[] = [];
  for (const record of downloads) {
    if (record.downloaded && !isInsideRunDir(runDir, record.savedPath)) {
      outside.push(record);
      byUrl.set(record.url, { ...record, downloaded: false });
    } else {
      byUrl.set(record.url, record);
    }
  }
  return { byUrl, outside };
};

const toTarget = (
  item: SelectedCandidate,
  downloadsByUrl: ReadonlyMap<string, DownloadRecord>,
  pageCounts: Readonly<Record<string, number | null>>,
): AnalysisTarget => {
  const download = downloadsByUrl.get(item.url);
  return {
    url: item.url,
    text: item.text,
    savedPath: download?.savedPath ?? '',
    downloaded: download?.downloaded ?? false,
    pageCount: pageCounts[item.url],
  };
};

export interface ResolutionOutcome {
  deferredResolutionProbe: Record<string, number | null>;
  resolvedDeferredDecisions: ResolvedDecision[];
  finalSelected: SelectedCandidate[];
}

/** Probes deferred members only, resolves every pending group and merges the final selection. */
export const resolveSelection = async ({
  runId,
  runDir,
  selected,
  downloads,
  registry,
  tools,
  config,
  logger,
}: Omit<RunDocumentPipelineArgs, 'maxWorkersOverride'>): Promise<ResolutionOutcome> => {
  const { byUrl: downloadsByUrl, outside } = indexDownloads(runDir, downloads);
  for (const record of outside) {
    logger.warn('Ignoring download outside the run directory', { url: record.url, savedPath: record.savedPath });
  }
  const probeTargets = selected
    .filter((item) => registry.membershipOf(item.url))
    .map((item) => toTarget(item, downloadsByUrl, {}));
  const deferredResolutionProbe = await probePageCounts(probeTargets, tools);

  const resolvedDeferredDecisions = resolveDeferredDecisions(
    registry,
    deferredResolutionProbe,
    config.deferred.pageThreshold,
  );
  const finalSelected = buildFinalSelection(selected, resolvedDeferredDecisions);
  logger.info('Deferred decisions resolved', {
    runId,
    groups: resolvedDeferredDecisions.length,
    finalSelected: finalSelected.length,
    chosen: resolvedDeferredDecisions.map((r) => `${r.groupId}:${r.chosenRole}`),
  });
  return { deferredResolutionProbe, resolvedDeferredDecisions, finalSelected };
};

export const analyzeFinalSelection = async (
  { runId, runDir, downloads, tools, config, maxWorkersOverride, logger }: RunDocumentPipelineArgs,
  resolution: ResolutionOutcome,
): Promise<DocumentPipelineResult> => {
  const { byUrl: downloadsByUrl } = indexDownloads(runDir, downloads);
  const maxWorkers = Math.max(1, maxWorkersOverride ?? config.analysis.maxWorkers);
  const perDocumentAnalysis = await analyzeDocuments({
    runDir,
    targets: resolution.finalSelected.map((item) =>
      toTarget(item, downloadsByUrl, resolution.deferredResolutionProbe),
    ),
    tools,
    maxWorkers,
    samplePages: config.analysis.samplePages,
    logger,
  });
  logger.info('Document analysis complete', {
    runId,
    analyzed: perDocumentAnalysis.filter((r) => r.analyzed).length,
    failed: perDocumentAnalysis.filter((r) => !r.analyzed).length,
  });

  return {
    runId,
    inputs: { maxWorkers, pageThreshold: config.deferred.pageThreshold },
    ...resolution,
    perDocumentAnalysis,
  };
};

/** Probe → resolve → final merge → analysis of the surviving documents. */
export const runDocumentPipeline = async (args: RunDocumentPipelineArgs): Promise<DocumentPipelineResult> =>
  analyzeFinalSelection(args, await resolveSelection(args));
