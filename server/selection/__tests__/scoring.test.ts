import { describe, expect, it } from 'vitest';
import type { LinkRecord } from '../../../shared/types';
import { createSilentLogger } from '../../obs/logger';
import { FallbackClassifierChain, RuleBasedClassifier } from '../classifier';
import {
  countMinutesMentions,
  extractMaterialId,
  filenameBonus,
  mentionBonus,
  scoreCandidates,
} from '../scoring';

const classifier = new FallbackClassifierChain(new RuleBasedClassifier(), null, createSilentLogger());

const link = (text: string, filename: string, estimatedCategory: LinkRecord['estimatedCategory'] = 'other'): LinkRecord => ({
  text,
  filename,
  url: `https://example.go.jp/docs/${filename}`,
  estimatedCategory,
});

describe('score components', () => {
  it('gives the filename bonus to conventional names only', () => {
    expect(filenameBonus('gaiyou.pdf')).toBe(1);
    expect(filenameBonus('Shiryou1-2.pdf')).toBe(1);
    expect(filenameBonus('shiryou2.pdf')).toBe(0);
  });

  it('extracts material ids from the label before the filename', () => {
    expect(extractMaterialId('資料 3 説明', 'x.pdf')).toBe('資料3');
    expect(extractMaterialId('', 'shiryou1_2.pdf')).toBe('資料1-2');
    expect(extractMaterialId('お知らせ', 'notice.pdf')).toBe('');
  });

  it('accepts full-width digits in labels and minutes', () => {
    expect(extractMaterialId('資料１ 政策', 'x.pdf')).toBe('資料１');
    expect(extractMaterialId('資料１-２ 政策', 'x.pdf')).toBe('資料１-２');
    const mentions = countMinutesMentions('資料１について。資料１の説明。');
    expect([...mentions]).toEqual([['資料１', 2]]);
    expect(mentionBonus('資料１', mentions)).toBe(1);
  });

  it('scales the mention bonus with the mention count', () => {
    const mentions = countMinutesMentions('資料1、資料1、資料1、資料1、資料1。資料2と資料2。資料3');
    expect(mentions.get('資料1')).toBe(5);
    expect(mentionBonus('資料1', mentions)).toBe(2);
    expect(mentionBonus('資料2', mentions)).toBe(1);
    expect(mentionBonus('資料3', mentions)).toBe(0);
    expect(mentionBonus('', mentions)).toBe(0);
  });
});

describe('scoreCandidates', () => {
  it('adds bonuses and penalties and never scores below 1', async () => {
    const { candidates, mentionCount, oracleClassification } = await scoreCandidates(
      [
        link('資料1 概要', 'gaiyou.pdf'),
        link('参考資料2', 'sankou2.pdf'),
        link('委員名簿', 'meibo.pdf'),
        link('資料3 委員提出資料', 'teishutsu.pdf', 'personal_material'),
      ],
      { minutesText: '資料1を説明。資料1について質疑。資料2に言及。', classifier },
    );

    expect(mentionCount).toBe(3);
    expect(oracleClassification).toEqual({ enabled: false, errors: [] });
    expect(candidates.map((c) => [c.category, c.categorySource, c.priorityScore])).toEqual([
      ['executive_summary', 'rules', 7],
      ['reference', 'rules', 1],
      ['participants', 'rules', 1],
      ['personal_material', 'hint', 1],
    ]);
    expect(candidates[0].scoreComponents).toEqual({ base: 5, filenameBonus: 1, mentionBonus: 1, categoryPenalty: 0 });
    expect(candidates[1].scoreComponents.categoryPenalty).toBe(-1);
    expect(candidates[2].scoreComponents.categoryPenalty).toBe(-10);
    expect(candidates[3].materialId).toBe('資料3');
  });

  it('skips the summary-dependent penalties when no executive summary is present', async () => {
    const { candidates } = await scoreCandidates([link('参考資料2', 'sankou2.pdf')], { minutesText: '', classifier });
    expect(candidates[0].priorityScore).toBe(2);
    expect(candidates[0].scoreComponents.categoryPenalty).toBe(0);
  });
});
