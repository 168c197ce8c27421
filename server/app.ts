import cors from 'cors';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { ArtifactStore } from '../shared/artifacts';
import { parseWorkerCountParam, getPublicConfig, type AppConfig } from '../shared/config';
import { isSafeRunId, makeRunId } from '../shared/crypto';
import type { DocumentTools } from './documents/pdfTools';
import { createSseStream } from './http/sse';
import type { Logger } from './obs/logger';
import { parseDocumentPipelineInput, runDocumentPipeline } from './pipeline/runDocumentPipeline';
import { handlePageReportStream } from './pipeline/runPageReportStream';
import { runSelection } from './pipeline/runSelection';
import { MalformedInputError, ResolutionRequestSchema, SelectionRequestSchema, parseOrThrow } from './pipeline/validators';
import type { FallbackClassifierChain } from './selection/classifier';

export interface AppDeps {
  config: AppConfig;
  store: ArtifactStore;
  logger: Logger;
  classifier: FallbackClassifierChain;
  tools: DocumentTools;
  now?: () => Date;
}

const ARTIFACT_KINDS = new Set(['material-selection', 'document-pipeline']);

const queryString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

export const createApp = ({ config, store, logger, classifier, tools, now = () => new Date() }: AppDeps) => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: now().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.post('/api/selection', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseOrThrow(SelectionRequestSchema, req.body, 'selection request');
      const runId = makeRunId(now());
      const { result } = await runSelection({
        runId,
        candidates: body.candidates,
        linkLines: body.linkLines,
        minutesText: body.minutesText,
        config,
        classifier,
        logger: logger.child({ runId }),
      });
      await store.saveRunArtifact(runId, 'material-selection', result);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/resolution', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseOrThrow(ResolutionRequestSchema, req.body, 'resolution request');
      const input = parseDocumentPipelineInput(body.selection, body.downloads);
      const result = await runDocumentPipeline({
        runId: body.runId,
        runDir: store.runDir(body.runId),
        selected: input.selected,
        downloads: input.downloads,
        registry: input.registry,
        tools,
        config,
        maxWorkersOverride: parseWorkerCountParam(queryString(req.query.workers), config.analysis.maxWorkers),
        logger: logger.child({ runId: body.runId }),
      });
      await store.saveRunArtifact(body.runId, 'document-pipeline', result);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/runs/stream', async (req: Request, res: Response) => {
    const stream = createSseStream(res, { heartbeatMs: config.server.heartbeatIntervalMs, label: 'pagereport' }, logger);
    await handlePageReportStream({ body: req.body, config, stream, store, classifier, tools, logger, now });
  });

  app.get('/api/runs/:runId/artifacts/:kind', async (req: Request, res: Response) => {
    const runId = String(req.params.runId || '').trim();
    const kind = String(req.params.kind || '').trim();
    if (!isSafeRunId(runId) || !ARTIFACT_KINDS.has(kind)) {
      res.status(400).json({ error: 'Invalid runId or kind' });
      return;
    }
    try {
      const content = await fs.readFile(path.join(store.runDir(runId), `${kind}.json`), 'utf-8');
      res.type('application/json').send(content);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        res.status(404).json({ error: 'Not found' });
        return;
      }
      res.status(500).json({ error: 'Failed to read artifact' });
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof MalformedInputError) {
      res.status(400).json({ error: error.message, issues: error.issues });
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Request failed', { error: message });
    res.status(500).json({ error: message });
  });

  return app;
};
