import type { DocumentFeatures } from '../../shared/types';

const codePointLength = (line: string): number => [...line].length;

const countMatches = (text: string, pattern: RegExp): number => text.match(pattern)?.length ?? 0;

const round4 = (value: number): number => Math.round(value * 10_000) / 10_000;

const TOPIC_WORDS = /(議題|資料|方針|概要|案|について|に関して|調査|対策|検討)/;

export const countTopicLines = (text: string): number =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && codePointLength(line) <= 40 && TOPIC_WORDS.test(line)).length;

/**
 * Lexical and layout measures of a text sample. Counts are per line where the
 * measure is about line endings or leading glyphs.
 */
export const extractFeatures = (text: string): DocumentFeatures => {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
  const joined = lines.join('\n');

  const sentenceLikeCount = countMatches(joined, /[。．.!！?？]\s*$/gm);
  const markerBullets =
    countMatches(text, /^\s*[●・○◯■□◆◇▶▷➢①②③④⑤⑥⑦⑧⑨⑩]\s*/gm) + countMatches(text, /^\s*[-*]\s+/gm);
  // Garbled or private-use glyphs often stand in for bullets.
  const symbolBulletCount = countMatches(text, /^\s*[^\p{L}\p{N}_]{1,2}\s+/gmu);
  const nominalEndingCount = countMatches(
    joined,
    /(について|に関して|の推進|の強化|の検討|の概要|の方針|の方向性)\s*$/gm,
  );
  const paragraphCount = text.split(/\n\s*\n/).filter((block) => block.trim()).length;
  const shortLineCount = lines.filter((line) => codePointLength(line) <= 24).length;

  return {
    lineCount: lines.length,
    sentenceLikeCount,
    sentenceDensity: lines.length ? round4(sentenceLikeCount / lines.length) : 0,
    bulletCount: markerBullets + symbolBulletCount,
    symbolBulletCount,
    nominalEndingCount,
    topicLineCount: countTopicLines(text),
    paragraphCount,
    particleCount: countMatches(joined, /[はがをにでと]/g),
    politeStyleCount: countMatches(joined, /(です|ます)/g),
    plainStyleCount: countMatches(joined, /(である|だ。)/g),
    citationCount: countMatches(joined, /(によれば|によると|として|示す)/g),
    referenceExprCount: countMatches(joined, /(下図|次の表|以下|上記|図\p{Nd}|表\p{Nd})/gu),
    pageNumberLineCount: countMatches(text, /^\s*\p{Nd}{1,3}\s*$/gmu),
    shortLineRatio: lines.length ? round4(shortLineCount / lines.length) : 0,
  };
};
