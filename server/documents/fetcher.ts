import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import type { DownloadRecord, SelectedCandidate } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { runSettledPool } from '../utils/concurrency';
import { filenameFromUrl, safeFilenamePart } from '../utils/text';

const RETRY_STATUS_CODES = new Set([403, 406, 429]);

export class FetchError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export interface FetchedDocument {
  finalUrl: string;
  status: number;
  contentType: string;
  body: Buffer;
  usedBrowserHeaders: boolean;
}

export type FetchOptions = Pick<AppConfig['fetch'], 'timeoutMs' | 'maxBytes' | 'userAgent'>;

const buildHeaders = (browser: boolean, userAgent: string): Record<string, string> =>
  browser
    ? {
        'User-Agent': userAgent,
        Accept: 'text/html,application/pdf,application/octet-stream,*/*',
        'Accept-Language': 'ja,en-US;q=0.9,en;q=0.8',
        'Cache-Control': 'no-cache',
        Pragma: 'no-cache',
      }
    : { Accept: '*/*' };

/** Reads the body chunk by chunk and gives up once it passes `maxBytes`. */
const readBodyWithin = async (response: Response, maxBytes: number): Promise<Buffer> => {
  if (!response.body) {
    return Buffer.alloc(0);
  }
  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw new FetchError(`Response too large (>${maxBytes} bytes)`);
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks, total);
};

const fetchOnce = async (url: string, browser: boolean, options: FetchOptions): Promise<FetchedDocument> => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: buildHeaders(browser, options.userAgent),
      redirect: 'follow',
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status}`, response.status);
    }
    const declared = Number(response.headers.get('content-length') ?? '');
    if (declared > options.maxBytes) {
      controller.abort();
      throw new FetchError(`Response too large (>${options.maxBytes} bytes)`);
    }
    const body = await readBodyWithin(response, options.maxBytes);
    return {
      finalUrl: response.url || url,
      status: response.status,
      contentType: (response.headers.get('content-type') ?? '').toLowerCase(),
      body,
      usedBrowserHeaders: browser,
    };
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Plain request first; one retry with browser headers when the server blocks
 * the plain request or the connection fails.
 */
export const fetchDocument = async (url: string, options: FetchOptions): Promise<FetchedDocument> => {
  let lastError: unknown = null;
  for (const browser of [false, true]) {
    try {
      return await fetchOnce(url, browser, options);
    } catch (error) {
      lastError = error;
      const status = error instanceof FetchError ? error.status : undefined;
      const retryable = status === undefined ? !(error instanceof FetchError) : RETRY_STATUS_CODES.has(status);
      if (browser || !retryable) break;
    }
  }
  const detail = lastError instanceof Error ? lastError.message : String(lastError);
  throw new FetchError(`Failed to fetch URL: ${url} (${detail})`);
};

export const isPdfContent = (contentType: string, body: Buffer): boolean =>
  contentType.includes('pdf') || body.subarray(0, 5).toString('latin1') === '%PDF-';

export const selectedFileName = (index: number, candidate: Pick<SelectedCandidate, 'text' | 'filename' | 'url'>): string => {
  const original = candidate.filename || filenameFromUrl(candidate.url) || 'source.pdf';
  const ext = path.extname(original) || '.pdf';
  return `selected-${String(index).padStart(2, '0')}-${safeFilenamePart(candidate.text)}${ext}`;
};

export interface DownloadSelectedArgs {
  runDir: string;
  selected: readonly SelectedCandidate[];
  config: Pick<AppConfig, 'fetch'>;
  logger: Logger;
}

/**
 * Downloads every selected candidate into the run directory. A failed
 * download becomes a record with `downloaded: false`; it never aborts the run.
 */
export const downloadSelected = async ({ runDir, selected, config, logger }: DownloadSelectedArgs): Promise<DownloadRecord[]> => {
  await fs.mkdir(runDir, { recursive: true });
  const settled = await runSettledPool(selected, config.fetch.concurrency, async (item, i): Promise<DownloadRecord> => {
    const index = i + 1;
    const savedPath = path.join(runDir, selectedFileName(index, item));
    const record: DownloadRecord = {
      index,
      url: item.url,
      originalFilename: item.filename || filenameFromUrl(item.url) || 'source.pdf',
      savedPath,
      downloaded: false,
    };
    try {
      const fetched = await fetchDocument(item.url, config.fetch);
      if (!isPdfContent(fetched.contentType, fetched.body)) {
        throw new FetchError(`selected file is not PDF: url=${item.url}, content_type=${fetched.contentType || "''"}`);
      }
      await fs.writeFile(savedPath, fetched.body);
      return {
        ...record,
        downloaded: true,
        sizeBytes: fetched.body.length,
        contentType: fetched.contentType,
        usedBrowserHeaders: fetched.usedBrowserHeaders,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Download failed', { url: item.url, error: message });
      return { ...record, error: message };
    }
  });

  return settled.map((outcome, i) => {
    if (outcome.status === 'fulfilled') return outcome.value;
    const item = selected[i];
    const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
    return {
      index: i + 1,
      url: item.url,
      originalFilename: item.filename,
      savedPath: path.join(runDir, selectedFileName(i + 1, item)),
      downloaded: false,
      error: message,
    };
  });
};
