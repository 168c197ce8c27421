import fs from 'node:fs/promises';
import path from 'node:path';
import type { AnalysisResult } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { runSettledPool } from '../utils/concurrency';
import { extractFeatures } from './features';
import { classifyDocumentType, summaryStrategyFor } from './layoutClassifier';
import type { DocumentTools } from './pdfTools';
import { fileExists } from './resolution';

export const PDF_NOT_AVAILABLE = 'pdf file not available for analysis';

export interface AnalysisTarget {
  url: string;
  text: string;
  savedPath: string;
  downloaded: boolean;
  /** Page count already known from the probe phase. */
  pageCount?: number | null;
}

export interface AnalyzeDocumentsArgs {
  runDir: string;
  targets: readonly AnalysisTarget[];
  tools: DocumentTools;
  maxWorkers: number;
  samplePages: number;
  logger: Logger;
}

export const analyzeOneDocument = async (
  target: AnalysisTarget,
  index: number,
  { runDir, tools, samplePages }: Pick<AnalyzeDocumentsArgs, 'runDir' | 'tools' | 'samplePages'>,
): Promise<AnalysisResult> => {
  const base: AnalysisResult = {
    url: target.url,
    text: target.text,
    savedPath: target.savedPath,
    analyzed: false,
  };
  if (!target.downloaded || !(await fileExists(target.savedPath))) {
    return { ...base, error: PDF_NOT_AVAILABLE };
  }

  const pageCount =
    typeof target.pageCount === 'number' ? target.pageCount : await tools.pageCount(target.savedPath);
  const extraction = await tools.extractText(target.savedPath, 1, samplePages);
  if (!extraction.ok) {
    return { ...base, pageCount, error: `pdftotext failed: ${extraction.error}` };
  }

  const samplePath = path.join(runDir, `sample-${String(index).padStart(2, '0')}.txt`);
  await fs.writeFile(samplePath, extraction.text, 'utf-8');

  const features = extractFeatures(extraction.text);
  const { documentType, reason } = classifyDocumentType(target.text, extraction.text, features);
  return {
    ...base,
    analyzed: true,
    pageCount,
    samplePath,
    features,
    documentType,
    classificationReason: reason,
    summaryStrategy: summaryStrategyFor(documentType),
  };
};

/**
 * One task per document on a bounded pool. Every task settles before the
 * results are sorted by saved path; a task that throws becomes an error
 * record and does not affect its siblings.
 */
export const analyzeDocuments = async ({
  runDir,
  targets,
  tools,
  maxWorkers,
  samplePages,
  logger,
}: AnalyzeDocumentsArgs): Promise<AnalysisResult[]> => {
  await fs.mkdir(runDir, { recursive: true });
  const settled = await runSettledPool(targets, maxWorkers, (target, i) =>
    analyzeOneDocument(target, i + 1, { runDir, tools, samplePages }),
  );

  const results = settled.map((outcome, i): AnalysisResult => {
    if (outcome.status === 'fulfilled') {
      return outcome.value;
    }
    const target = targets[i];
    const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
    logger.warn('Document analysis failed', { url: target.url, error: message });
    return { url: target.url, text: target.text, savedPath: target.savedPath, analyzed: false, error: message };
  });

  for (const result of results) {
    if (!result.analyzed) {
      logger.info('Document skipped', { url: result.url, error: result.error });
    }
  }

  return results.sort((a, b) => (a.savedPath < b.savedPath ? -1 : a.savedPath > b.savedPath ? 1 : 0));
};
