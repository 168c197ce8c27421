import path from 'node:path';

export const normalizeText = (value: string | null | undefined): string =>
  String(value ?? '').replace(/\s+/g, ' ').trim();

const decodeSafely = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

/** Decoded basename of the URL path, or '' when the URL cannot be parsed. */
export const filenameFromUrl = (rawUrl: string): string => {
  try {
    const { pathname } = new URL(rawUrl);
    return path.posix.basename(decodeSafely(pathname));
  } catch {
    return '';
  }
};

const truncateUtf8 = (value: string, maxBytes: number): string => {
  const encoder = new TextEncoder();
  if (encoder.encode(value).length <= maxBytes) {
    return value;
  }
  let out = '';
  let used = 0;
  for (const char of value) {
    const size = encoder.encode(char).length;
    if (used + size > maxBytes) break;
    out += char;
    used += size;
  }
  return out;
};

const trimEdges = (value: string): string => value.replace(/^[._ ]+|[._ ]+$/g, '');

/**
 * Turns a display label into a file-name fragment. Length is bounded in UTF-8
 * bytes since Japanese labels are multi-byte.
 */
export const safeFilenamePart = (value: string, maxBytes = 120): string => {
  let s = normalizeText(value);
  s = s.replace(/[\x00-\x1f\x7f]/g, '');
  s = s.replace(/[\\/:*?"<>|]/g, '_');
  s = s.replace(/ /g, '_');
  s = s.replace(/_+/g, '_');
  s = trimEdges(s);
  if (!s) return 'pdf';
  s = trimEdges(truncateUtf8(s, maxBytes));
  return s || 'pdf';
};

export const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
