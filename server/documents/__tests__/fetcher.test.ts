import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { SelectedCandidate } from '../../../shared/types';
import { createSilentLogger } from '../../obs/logger';
import { downloadSelected, fetchDocument, isPdfContent, selectedFileName } from '../fetcher';

const fetchConfig = { timeoutMs: 1_000, maxBytes: 1_024, concurrency: 2, userAgent: 'test-agent' };

const selected = (name: string, text: string): SelectedCandidate => ({
  text,
  url: `https://example.go.jp/docs/${name}`,
  filename: name,
  category: 'material',
  categorySource: 'rules',
  materialId: '',
  priorityScore: 4,
  scoreComponents: { base: 4, filenameBonus: 0, mentionBonus: 0, categoryPenalty: 0 },
  adjustments: [],
  decisionPending: false,
});

const hasUserAgent = (init?: RequestInit): boolean => new Headers(init?.headers).has('user-agent');

describe('fetchDocument', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('retries a blocked request with browser headers', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, init?: RequestInit) =>
      hasUserAgent(init)
        ? new Response('%PDF-1.4', { status: 200, headers: { 'content-type': 'application/pdf' } })
        : new Response('blocked', { status: 403 }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const fetched = await fetchDocument('https://example.go.jp/a.pdf', fetchConfig);
    expect(fetched.usedBrowserHeaders).toBe(true);
    expect(fetched.contentType).toBe('application/pdf');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry a missing document', async () => {
    const fetchMock = vi.fn(async () => new Response('not found', { status: 404 }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(fetchDocument('https://example.go.jp/a.pdf', fetchConfig)).rejects.toThrow(
      'Failed to fetch URL: https://example.go.jp/a.pdf (HTTP 404)',
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('refuses a response whose declared length is over the limit', async () => {
    const fetchMock = vi.fn(
      async () =>
        new Response('%PDF-1.4', {
          status: 200,
          headers: { 'content-type': 'application/pdf', 'content-length': '4096' },
        }),
    );
    vi.stubGlobal('fetch', fetchMock);

    await expect(fetchDocument('https://example.go.jp/a.pdf', fetchConfig)).rejects.toThrow(
      'Failed to fetch URL: https://example.go.jp/a.pdf (Response too large (>1024 bytes))',
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('stops reading an undeclared body once it passes the limit', async () => {
    let pulls = 0;
    const endless = new ReadableStream<Uint8Array>({
      pull(streamController) {
        pulls += 1;
        streamController.enqueue(new Uint8Array(512));
      },
    });
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(endless, { status: 200 })),
    );

    await expect(fetchDocument('https://example.go.jp/a.pdf', fetchConfig)).rejects.toThrow(
      'Response too large (>1024 bytes)',
    );
    expect(pulls).toBeLessThan(10);
  });

  it('retries once after a connection failure', async () => {
    const fetchMock = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });
    vi.stubGlobal('fetch', fetchMock);

    await expect(fetchDocument('https://example.go.jp/a.pdf', fetchConfig)).rejects.toThrow(
      'Failed to fetch URL: https://example.go.jp/a.pdf (fetch failed)',
    );
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe('file naming and content checks', () => {
  it('builds run-local file names from the label', () => {
    expect(selectedFileName(1, { text: '資料1 概要', filename: 'gaiyou.pdf', url: 'https://example.go.jp/gaiyou.pdf' })).toBe(
      'selected-01-資料1_概要.pdf',
    );
    expect(selectedFileName(3, { text: 'a/b: c', filename: '', url: 'https://example.go.jp/y.PDF' })).toBe(
      'selected-03-a_b_c.PDF',
    );
  });

  it('accepts PDFs by content type or magic bytes', () => {
    expect(isPdfContent('application/pdf', Buffer.from('x'))).toBe(true);
    expect(isPdfContent('application/octet-stream', Buffer.from('%PDF-1.7'))).toBe(true);
    expect(isPdfContent('text/html', Buffer.from('<html>'))).toBe(false);
  });
});

describe('downloadSelected', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'download-'));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('records per-document outcomes without aborting the run', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (input: string | URL | Request) =>
        String(input).endsWith('gaiyou.pdf')
          ? new Response('%PDF-1.4 test', { status: 200, headers: { 'content-type': 'application/pdf' } })
          : new Response('<html></html>', { status: 200, headers: { 'content-type': 'text/html' } }),
      ),
    );

    const records = await downloadSelected({
      runDir: dir,
      selected: [selected('gaiyou.pdf', '資料1 概要'), selected('page.pdf', '資料2')],
      config: { fetch: fetchConfig },
      logger: createSilentLogger(),
    });

    const savedPath = path.join(dir, 'selected-01-資料1_概要.pdf');
    expect(records[0]).toEqual({
      index: 1,
      url: 'https://example.go.jp/docs/gaiyou.pdf',
      originalFilename: 'gaiyou.pdf',
      savedPath,
      downloaded: true,
      sizeBytes: 13,
      contentType: 'application/pdf',
      usedBrowserHeaders: false,
    });
    await expect(fs.readFile(savedPath, 'utf-8')).resolves.toBe('%PDF-1.4 test');

    expect(records[1]).toMatchObject({
      index: 2,
      downloaded: false,
      error: 'selected file is not PDF: url=https://example.go.jp/docs/page.pdf, content_type=text/html',
    });
  });
});
