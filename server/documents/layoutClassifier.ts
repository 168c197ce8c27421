import type { DocumentFeatures, DocumentType, SummaryStrategy } from '../../shared/types';

export interface LayoutClassification {
  documentType: DocumentType;
  reason: string;
}

export interface LayoutScores {
  wordScore: number;
  pptScore: number;
}

/** Prose-like versus slide-like evidence, as two independent tallies. */
export const computeLayoutScores = (f: DocumentFeatures): LayoutScores => {
  let wordScore = Math.min(f.sentenceLikeCount, 8);
  wordScore += f.paragraphCount >= 3 ? 2 : 0;
  wordScore += f.particleCount >= 20 ? 2 : 0;
  wordScore += f.politeStyleCount + f.plainStyleCount >= 3 ? 1 : 0;
  wordScore += f.citationCount >= 2 ? 1 : 0;

  let pptScore = Math.min(f.bulletCount, 8);
  pptScore += Math.min(f.nominalEndingCount, 4);
  pptScore += f.shortLineRatio >= 0.45 ? 2 : 0;
  pptScore += f.topicLineCount >= 4 ? 2 : 0;
  pptScore += f.referenceExprCount >= 2 ? 1 : 0;
  pptScore += f.pageNumberLineCount >= 2 ? 2 : 0;
  // Dense slide layout: short lines, few sentences, visible page numbers.
  if (f.shortLineRatio >= 0.6 && f.sentenceDensity <= 0.2 && f.pageNumberLineCount >= 2) {
    pptScore += 4;
  }
  return { wordScore, pptScore };
};

// H:MM with no letter or digit on either side; full-width digits and colon included.
const CLOCK_TIME = /(?<![\p{L}\p{N}_])\p{Nd}{1,2}[:：]\p{Nd}{2}(?![\p{L}\p{N}_])/u;

const hasAny = (value: string, keywords: readonly string[]) => keywords.some((kw) => value.includes(kw));

export const classifyDocumentType = (
  title: string,
  sampleText: string,
  features: DocumentFeatures,
): LayoutClassification => {
  const t = title.trim();

  if (hasAny(t, ['委員名簿', '出席者名簿'])) {
    return { documentType: 'participants_list', reason: '名簿系キーワード' };
  }
  if (hasAny(t, ['議事次第', '次第']) && (CLOCK_TIME.test(sampleText) || sampleText.includes('配布資料'))) {
    return { documentType: 'agenda', reason: '議事次第キーワード + 時刻/資料記載' };
  }
  if (hasAny(t, ['プレスリリース', '報道発表'])) {
    return { documentType: 'press_release', reason: '報道系キーワード' };
  }
  if (hasAny(t, ['調査結果', 'アンケート'])) {
    return { documentType: 'survey_report', reason: '調査系キーワード' };
  }

  const { wordScore, pptScore } = computeLayoutScores(features);
  if (wordScore >= pptScore + 2) {
    return { documentType: 'word_like', reason: `word_score=${wordScore}, ppt_score=${pptScore}` };
  }
  if (pptScore >= wordScore + 2) {
    return { documentType: 'powerpoint_like', reason: `ppt_score=${pptScore}, word_score=${wordScore}` };
  }
  return { documentType: 'mixed', reason: `close_scores word=${wordScore}, ppt=${pptScore}` };
};

const STRATEGIES: Partial<Record<DocumentType, SummaryStrategy>> = {
  word_like: 'longform_summary',
  powerpoint_like: 'slide_bullet_summary',
  agenda: 'agenda_structure_summary',
  participants_list: 'name_list_extract',
  press_release: 'news_style_summary',
  survey_report: 'data_points_summary',
};

export const summaryStrategyFor = (documentType: DocumentType): SummaryStrategy =>
  STRATEGIES[documentType] ?? 'hybrid_summary';
