import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export type TextExtraction = { ok: true; text: string } | { ok: false; error: string };

/**
 * External document tools. `pageCount` never throws: a missing or failing tool
 * means the count is unknown.
 */
export interface DocumentTools {
  pageCount: (pdfPath: string) => Promise<number | null>;
  extractText: (pdfPath: string, firstPage: number, lastPage: number) => Promise<TextExtraction>;
}

export interface PopplerToolsOptions {
  pdfinfoPath: string;
  pdftotextPath: string;
  maxBuffer?: number;
}

const errorMessage = (error: unknown): string => {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const stderr = String(error.stderr ?? '').trim();
    if (stderr) return stderr;
  }
  return error instanceof Error ? error.message : String(error);
};

export const parsePdfinfoPages = (output: string): number | null => {
  const match = output.match(/^Pages:\s+(\d+)/m);
  return match ? Number(match[1]) : null;
};

/** poppler-utils (`pdfinfo`, `pdftotext`) invoked as child processes. */
export const createPopplerTools = ({
  pdfinfoPath,
  pdftotextPath,
  maxBuffer = 32 * 1024 * 1024,
}: PopplerToolsOptions): DocumentTools => ({
  pageCount: async (pdfPath) => {
    try {
      const { stdout } = await execFileAsync(pdfinfoPath, [pdfPath], { maxBuffer, encoding: 'utf8' });
      return parsePdfinfoPages(stdout);
    } catch {
      return null;
    }
  },
  extractText: async (pdfPath, firstPage, lastPage) => {
    try {
      const { stdout } = await execFileAsync(
        pdftotextPath,
        ['-f', String(firstPage), '-l', String(lastPage), pdfPath, '-'],
        { maxBuffer, encoding: 'utf8' },
      );
      return { ok: true, text: stdout };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  },
});
