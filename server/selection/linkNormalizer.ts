import type { LinkRecord } from '../../shared/types';
import { parseOrThrow, RawLinkListSchema } from '../pipeline/validators';
import { filenameFromUrl, normalizeText } from '../utils/text';
import { classifyByRules } from './categoryRules';

const MINUTES_KEYWORDS = ['議事録', '議事要旨', '議事概要', 'gijiroku', 'gijiyoshi', 'minutes'];

const REPLACEMENT_CHAR = '�';

const hasMinutesKeyword = (text: string): boolean => {
  const lower = text.toLowerCase();
  return MINUTES_KEYWORDS.some((kw) => lower.includes(kw));
};

/** True when `next` is a better label than `current` for the same URL. */
export const preferNewText = (current: string, next: string): boolean => {
  if (!next) return false;
  if (!current) return true;
  if (current.includes(REPLACEMENT_CHAR) && !next.includes(REPLACEMENT_CHAR)) return true;
  if (hasMinutesKeyword(next) && !hasMinutesKeyword(current)) return true;
  return false;
};

/**
 * Collapses records from one or more extractors into one record per URL,
 * in first-seen order.
 */
export const normalizeLinkRecords = (records: readonly LinkRecord[]): LinkRecord[] => {
  const merged = new Map<string, LinkRecord>();
  for (const record of records) {
    const url = normalizeText(record.url);
    if (!url) continue;
    const text = normalizeText(record.text);
    const existing = merged.get(url);
    if (!existing) {
      merged.set(url, {
        url,
        text,
        filename: normalizeText(record.filename) || normalizeText(filenameFromUrl(url)),
        estimatedCategory: record.estimatedCategory,
      });
      continue;
    }
    if (preferNewText(existing.text, text)) {
      existing.text = text;
    }
    if (existing.estimatedCategory === 'other' && record.estimatedCategory !== 'other') {
      existing.estimatedCategory = record.estimatedCategory;
    }
  }
  return Array.from(merged.values());
};

/** Validates an upstream `[{text, url, filename, estimated_category}]` payload. */
export const parseLinkRecords = (payload: unknown): LinkRecord[] =>
  parseOrThrow(RawLinkListSchema, payload, 'candidate list')
    .map((raw) => ({
      text: normalizeText(raw.text),
      url: normalizeText(raw.url),
      filename: normalizeText(raw.filename),
      estimatedCategory: raw.estimated_category,
    }))
    .filter((record) => record.url !== '');

/** Parses `label<TAB>url` (or bare `url`) lines. */
export const parseLinkLines = (content: string): LinkRecord[] => {
  const rows: LinkRecord[] = [];
  for (const line of content.split(/\r?\n/)) {
    const raw = line.trim();
    if (!raw) continue;
    const tab = raw.indexOf('\t');
    const text = tab >= 0 ? normalizeText(raw.slice(0, tab)) : '';
    const url = normalizeText(tab >= 0 ? raw.slice(tab + 1) : raw);
    if (!url) continue;
    const filename = filenameFromUrl(url);
    rows.push({ text, url, filename, estimatedCategory: classifyByRules(text, filename) });
  }
  return rows;
};
