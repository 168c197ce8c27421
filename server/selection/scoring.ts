import type { Candidate, DocumentCategory, LinkRecord, OracleClassificationStatus } from '../../shared/types';
import { normalizeText } from '../utils/text';
import { BASE_SCORES, EXCLUDED_CATEGORIES } from './categoryRules';
import type { FallbackClassifierChain } from './classifier';

const FILENAME_BONUS_PATTERNS = [
  /shiryou[01]\./,
  /shiryou[01]-\d+\./,
  /honpen\./,
  /gaiyou\./,
  /torimatome\./,
];

export const filenameBonus = (filename: string): number => {
  const lower = filename.toLowerCase();
  return FILENAME_BONUS_PATTERNS.some((pattern) => pattern.test(lower)) ? 1 : 0;
};

// Any decimal digit, so full-width numbering (`資料１`) counts too.
const MATERIAL_NUMBER = /資料\s*(\p{Nd}+(?:-\p{Nd}+)?)/u;

/** `資料3`, `資料1-2`; '' when the label and filename carry no identifier. */
export const extractMaterialId = (text: string, filename: string): string => {
  const fromText = normalizeText(text).match(MATERIAL_NUMBER);
  if (fromText) {
    return `資料${fromText[1]}`;
  }
  const fromFile = filename.toLowerCase().match(/(?:shiryou|material)[_-]?(\p{Nd}+(?:[-_]\p{Nd}+)?)/u);
  if (fromFile) {
    return `資料${fromFile[1].replace(/_/g, '-')}`;
  }
  return '';
};

export const countMinutesMentions = (minutesText: string): Map<string, number> => {
  const counts = new Map<string, number>();
  for (const match of minutesText.matchAll(new RegExp(MATERIAL_NUMBER.source, 'gu'))) {
    const key = `資料${match[1]}`;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
};

export const mentionBonus = (materialId: string, mentions: ReadonlyMap<string, number>): number => {
  if (!materialId) return 0;
  const count = mentions.get(materialId) ?? 0;
  if (count >= 5) return 2;
  if (count >= 2) return 1;
  return 0;
};

export const categoryPenalty = (category: DocumentCategory, hasExecutiveSummary: boolean): number => {
  if (EXCLUDED_CATEGORIES.has(category)) return -10;
  if (category === 'reference' && hasExecutiveSummary) return -1;
  if (category === 'personal_material' && hasExecutiveSummary) return -2;
  return 0;
};

export const clampScore = (score: number): number => Math.max(1, score);

export interface ScoreCandidatesOptions {
  minutesText: string;
  classifier: FallbackClassifierChain;
}

export interface ScoreCandidatesResult {
  candidates: Candidate[];
  mentionCount: number;
  oracleClassification: OracleClassificationStatus;
}

export const scoreCandidates = async (
  records: readonly LinkRecord[],
  { minutesText, classifier }: ScoreCandidatesOptions,
): Promise<ScoreCandidatesResult> => {
  const mentions = countMinutesMentions(minutesText);
  const oracleErrors: string[] = [];

  // Oracle calls share the rate limiter, so classify sequentially.
  const classified: Array<{ record: LinkRecord; category: DocumentCategory; source: Candidate['categorySource'] }> = [];
  for (const record of records) {
    const outcome = await classifier.classify(
      { title: record.text, filename: record.filename, url: record.url },
      record.estimatedCategory,
    );
    if (outcome.oracleError) {
      oracleErrors.push(outcome.oracleError);
    }
    classified.push({ record, category: outcome.category, source: outcome.source });
  }

  const hasExecutiveSummary = classified.some((entry) => entry.category === 'executive_summary');

  const candidates = classified.map(({ record, category, source }): Candidate => {
    const materialId = extractMaterialId(record.text, record.filename);
    const scoreComponents = {
      base: BASE_SCORES[category],
      filenameBonus: filenameBonus(record.filename),
      mentionBonus: mentionBonus(materialId, mentions),
      categoryPenalty: categoryPenalty(category, hasExecutiveSummary),
    };
    const raw =
      scoreComponents.base + scoreComponents.filenameBonus + scoreComponents.mentionBonus + scoreComponents.categoryPenalty;
    return {
      text: record.text,
      url: record.url,
      filename: record.filename,
      category,
      categorySource: source,
      materialId,
      priorityScore: clampScore(raw),
      scoreComponents,
      adjustments: [],
    };
  });

  let mentionCount = 0;
  for (const count of mentions.values()) mentionCount += count;

  return {
    candidates,
    mentionCount,
    oracleClassification: { enabled: classifier.oracleEnabled, errors: oracleErrors },
  };
};
