import type { DocumentCategory } from '../../shared/types';
import { normalizeText } from '../utils/text';

export const BASE_SCORES: Record<DocumentCategory, number> = {
  executive_summary: 5,
  material: 4,
  agenda: 3,
  minutes: 3,
  reference: 2,
  personal_material: 2,
  participants: 1,
  seating: 1,
  disclosure_method: 1,
  other: 2,
};

export const EXCLUDED_CATEGORIES: ReadonlySet<DocumentCategory> = new Set([
  'participants',
  'seating',
  'disclosure_method',
]);

interface CategoryRule {
  category: DocumentCategory;
  matches: (title: string, filenameLower: string) => boolean;
}

const containsAny = (value: string, keywords: readonly string[]) => keywords.some((kw) => value.includes(kw));

/** Evaluated top to bottom; the first matching rule decides. */
export const CATEGORY_RULES: readonly CategoryRule[] = [
  { category: 'agenda', matches: (t) => containsAny(t, ['議事次第', '次第']) },
  { category: 'minutes', matches: (t) => containsAny(t, ['議事録', '議事要旨', '会議録', '議事概要']) },
  { category: 'participants', matches: (t) => containsAny(t, ['委員名簿', '出席者名簿']) },
  { category: 'seating', matches: (t) => containsAny(t, ['座席表', '座席配置']) },
  { category: 'disclosure_method', matches: (t) => containsAny(t, ['公開方法', '傍聴']) },
  {
    category: 'executive_summary',
    matches: (t) => containsAny(t, ['とりまとめ', '取りまとめ', '概要', 'Executive Summary', 'エグゼクティブサマリー']),
  },
  { category: 'reference', matches: (t, f) => t.includes('参考') || f.includes('sankou') },
  {
    category: 'material',
    matches: (t) =>
      /^資料\s*[：:]/.test(t) ||
      t.includes('説明資料') ||
      t.includes('事務局資料') ||
      /[^\s]+(?:省|府|庁)説明資料/.test(t) ||
      /^資料\s*\p{Nd}+/u.test(t),
  },
  { category: 'minutes', matches: (_t, f) => containsAny(f, ['gijiroku', 'gijiyoshi', 'minutes']) },
];

export const classifyByRules = (title: string, filename: string): DocumentCategory => {
  const t = normalizeText(title);
  const f = filename.toLowerCase();
  const rule = CATEGORY_RULES.find((candidate) => candidate.matches(t, f));
  return rule ? rule.category : 'other';
};
