import type { AppConfig } from '../../shared/config';
import type { ArtifactStore } from '../../shared/artifacts';
import { makeRunId } from '../../shared/crypto';
import type { SseStream } from '../../shared/sse';
import type { PageReportRunResult, StageName } from '../../shared/types';
import { downloadSelected } from '../documents/fetcher';
import type { DocumentTools } from '../documents/pdfTools';
import type { Logger } from '../obs/logger';
import type { FallbackClassifierChain } from '../selection/classifier';
import { analyzeFinalSelection, resolveSelection, type RunDocumentPipelineArgs } from './runDocumentPipeline';
import { runSelection } from './runSelection';
import { makeStageEmitter } from './stageEmitter';
import { RunRequestSchema } from './validators';

export interface PageReportStreamArgs {
  body: unknown;
  config: AppConfig;
  stream: SseStream;
  store: ArtifactStore;
  classifier: FallbackClassifierChain;
  tools: DocumentTools;
  logger: Logger;
  now?: () => Date;
}

/**
 * Full run over one meeting page: selection, download, deferred resolution and
 * analysis. Each stage reports over SSE; the run ends with `pagereport-result`
 * or `fatal`.
 */
export const handlePageReportStream = async ({
  body,
  config,
  stream,
  store,
  classifier,
  tools,
  logger: baseLogger,
  now = () => new Date(),
}: PageReportStreamArgs): Promise<void> => {
  const parsed = RunRequestSchema.safeParse(body);
  if (!parsed.success) {
    stream.sendJson('fatal', {
      error: 'Invalid payload for page report run',
      issues: parsed.error.issues.map((issue) => issue.message),
    });
    stream.close();
    return;
  }

  const request = parsed.data;
  const runId = makeRunId(now());
  const logger = baseLogger.child({ runId });
  const emitterFor = (stage: StageName) =>
    makeStageEmitter(runId, stage, (event) => stream.send(event));

  try {
    await store.ensureLayout();
    const runDir = store.runDir(runId);

    const { result: selection, registry } = await emitterFor('selection').run(
      'Scoring candidate links',
      () =>
        runSelection({
          runId,
          candidates: request.candidates,
          linkLines: request.linkLines,
          minutesText: request.minutesText,
          config,
          classifier,
          logger,
        }),
      ({ result }) =>
        `Selected ${result.selectedCandidates.length} of ${result.allCandidates.length} candidates`,
    );
    await store.saveRunArtifact(runId, 'material-selection', selection);

    const downloads = await emitterFor('download').run(
      `Downloading ${selection.selectedCandidates.length} documents`,
      () => downloadSelected({ runDir, selected: selection.selectedCandidates, config, logger }),
      (records) => `Downloaded ${records.filter((r) => r.downloaded).length} of ${records.length}`,
    );

    const documentArgs: RunDocumentPipelineArgs = {
      runId,
      runDir,
      selected: selection.selectedCandidates,
      downloads,
      registry,
      tools,
      config,
      maxWorkersOverride: request.maxWorkers,
      logger,
    };

    const resolution = await emitterFor('resolution').run(
      'Resolving deferred summary/full pairs',
      () => resolveSelection(documentArgs),
      (outcome) =>
        `Resolved ${outcome.resolvedDeferredDecisions.length} groups; ${outcome.finalSelected.length} documents kept`,
    );

    const documents = await emitterFor('analysis').run(
      `Analysing ${resolution.finalSelected.length} documents`,
      () => analyzeFinalSelection(documentArgs, resolution),
      (result) => `Analysed ${result.perDocumentAnalysis.filter((r) => r.analyzed).length} documents`,
    );
    await store.saveRunArtifact(runId, 'document-pipeline', documents);

    const result: PageReportRunResult = { runId, selection, downloads, documents };
    stream.sendJson('pagereport-result', result);
    stream.close();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Page report run failed', { error: message });
    stream.sendJson('fatal', { runId, error: message });
    stream.close();
  }
};
