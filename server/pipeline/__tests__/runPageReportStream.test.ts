import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ArtifactStore } from '../../../shared/artifacts';
import type { SseStream } from '../../../shared/sse';
import { configFromEnv } from '../../config/config';
import type { DocumentTools } from '../../documents/pdfTools';
import { createSilentLogger } from '../../obs/logger';
import { FallbackClassifierChain, RuleBasedClassifier } from '../../selection/classifier';
import { handlePageReportStream } from '../runPageReportStream';

type Frame = [string, unknown];

const makeStream = (frames: Frame[]) => {
  const close = vi.fn();
  const stream: SseStream = {
    send: (event) => {
      frames.push(['stage-event', event]);
    },
    sendJson: (eventName, payload) => {
      frames.push([eventName, payload]);
    },
    close,
  };
  return { stream, close };
};

const makeStore = (rootDir: string, saved: string[]): ArtifactStore => ({
  ensureLayout: async () => {},
  runDir: (runId) => path.join(rootDir, runId),
  saveRunArtifact: async (_runId, kind) => {
    saved.push(kind);
    return kind;
  },
});

const tools: DocumentTools = {
  pageCount: async (pdfPath) => (pdfPath.includes('全文') ? 30 : 4),
  extractText: async () => ({ ok: true, text: '● 要点\n' }),
};

const logger = createSilentLogger();
const classifier = new FallbackClassifierChain(new RuleBasedClassifier(), null, logger);

describe('handlePageReportStream', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stream-'));
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('%PDF-1.4', { status: 200, headers: { 'content-type': 'application/pdf' } })),
    );
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reports every stage and ends with the run result', async () => {
    const frames: Frame[] = [];
    const saved: string[] = [];
    const { stream, close } = makeStream(frames);

    await handlePageReportStream({
      body: {
        candidates: [
          { text: '資料1概要', url: 'https://example.go.jp/docs/gaiyou.pdf', estimated_category: 'executive_summary' },
          { text: '資料1全文', url: 'https://example.go.jp/docs/zenbun.pdf' },
        ],
      },
      config: configFromEnv({ RUNS_ROOT: dir }),
      stream,
      store: makeStore(dir, saved),
      classifier,
      tools,
      logger,
      now: () => new Date('2026-10-19T08:30:00Z'),
    });

    const stageFrames = frames.filter(([name]) => name === 'stage-event').map(([, event]) => event);
    expect(stageFrames).toEqual([
      expect.objectContaining({ stage: 'selection', status: 'start' }),
      expect.objectContaining({ stage: 'selection', status: 'success', message: 'Selected 2 of 2 candidates' }),
      expect.objectContaining({ stage: 'download', status: 'start' }),
      expect.objectContaining({ stage: 'download', status: 'success', message: 'Downloaded 2 of 2' }),
      expect.objectContaining({ stage: 'resolution', status: 'start' }),
      expect.objectContaining({
        stage: 'resolution',
        status: 'success',
        message: 'Resolved 1 groups; 1 documents kept',
      }),
      expect.objectContaining({ stage: 'analysis', status: 'start' }),
      expect.objectContaining({ stage: 'analysis', status: 'success', message: 'Analysed 1 documents' }),
    ]);

    const [lastName, lastPayload] = frames[frames.length - 1];
    expect(lastName).toBe('pagereport-result');
    expect(lastPayload).toMatchObject({
      runId: expect.stringMatching(/^20261019T083000Z_[0-9a-f]{6}$/),
      documents: {
        resolvedDeferredDecisions: [expect.objectContaining({ chosenRole: 'summary', reason: 'full_page_count=30 > 20' })],
        finalSelected: [expect.objectContaining({ text: '資料1概要' })],
      },
    });
    expect(saved).toEqual(['material-selection', 'document-pipeline']);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('sends fatal for a payload without links', async () => {
    const frames: Frame[] = [];
    const { stream, close } = makeStream(frames);

    await handlePageReportStream({
      body: { minutesText: '資料1' },
      config: configFromEnv({ RUNS_ROOT: dir }),
      stream,
      store: makeStore(dir, []),
      classifier,
      tools,
      logger,
    });

    expect(frames).toEqual([
      ['fatal', { error: 'Invalid payload for page report run', issues: ['candidates or linkLines is required'] }],
    ]);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('sends fatal when the candidate list is malformed', async () => {
    const frames: Frame[] = [];
    const { stream } = makeStream(frames);

    await handlePageReportStream({
      body: { candidates: 'not-a-list' },
      config: configFromEnv({ RUNS_ROOT: dir }),
      stream,
      store: makeStore(dir, []),
      classifier,
      tools,
      logger,
    });

    expect(frames.map(([name]) => name)).toEqual(['stage-event', 'stage-event', 'fatal']);
    expect(frames[2][1]).toMatchObject({ error: expect.stringMatching(/^Malformed candidate list: /) });
  });
});
