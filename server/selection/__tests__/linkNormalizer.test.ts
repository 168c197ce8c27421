import { describe, expect, it } from 'vitest';
import type { LinkRecord } from '../../../shared/types';
import { MalformedInputError } from '../../pipeline/validators';
import { normalizeLinkRecords, parseLinkLines, parseLinkRecords, preferNewText } from '../linkNormalizer';

const records: LinkRecord[] = [
  { text: '資料1', url: ' https://example.go.jp/a/shiryou1.pdf ', filename: '', estimatedCategory: 'other' },
  { text: '資料1  概要', url: 'https://example.go.jp/a/shiryou1.pdf', filename: 'x.pdf', estimatedCategory: 'material' },
  { text: '議事次第', url: 'https://example.go.jp/a/shidai.pdf', filename: 'shidai.pdf', estimatedCategory: 'agenda' },
];

describe('normalizeLinkRecords', () => {
  it('keeps one record per url in first-seen order', () => {
    const result = normalizeLinkRecords(records);
    expect(result).toEqual([
      {
        text: '資料1',
        url: 'https://example.go.jp/a/shiryou1.pdf',
        filename: 'shiryou1.pdf',
        estimatedCategory: 'material',
      },
      { text: '議事次第', url: 'https://example.go.jp/a/shidai.pdf', filename: 'shidai.pdf', estimatedCategory: 'agenda' },
    ]);
  });

  it('is idempotent', () => {
    const once = normalizeLinkRecords(records);
    expect(normalizeLinkRecords(once)).toEqual(once);
  });

  it('drops records without a url', () => {
    expect(normalizeLinkRecords([{ text: 'x', url: '  ', filename: '', estimatedCategory: 'other' }])).toEqual([]);
  });

  it('replaces a garbled label with a clean one for the same url', () => {
    const result = normalizeLinkRecords([
      { text: '��', url: 'https://example.go.jp/g.pdf', filename: 'g.pdf', estimatedCategory: 'other' },
      { text: '第2回議事録', url: 'https://example.go.jp/g.pdf', filename: 'g.pdf', estimatedCategory: 'minutes' },
    ]);
    expect(result).toHaveLength(1);
    expect(result[0].text).toBe('第2回議事録');
    expect(result[0].estimatedCategory).toBe('minutes');
  });
});

describe('preferNewText', () => {
  it('prefers labels naming minutes', () => {
    expect(preferNewText('資料', '議事要旨')).toBe(true);
    expect(preferNewText('議事要旨', '資料')).toBe(false);
  });

  it('never replaces with an empty label', () => {
    expect(preferNewText('資料', '')).toBe(false);
    expect(preferNewText('', '資料')).toBe(true);
  });
});

describe('parseLinkRecords', () => {
  it('normalizes fields and unknown categories', () => {
    const parsed = parseLinkRecords([
      { text: ' 資料1 ', url: 'https://example.go.jp/1.pdf', filename: null, estimated_category: 'slides' },
      { text: 'no url', url: '' },
    ]);
    expect(parsed).toEqual([
      { text: '資料1', url: 'https://example.go.jp/1.pdf', filename: '', estimatedCategory: 'other' },
    ]);
  });

  it('rejects a payload that is not a list', () => {
    expect(() => parseLinkRecords({ text: 'x' })).toThrow(MalformedInputError);
  });
});

describe('parseLinkLines', () => {
  it('reads labelled and bare lines', () => {
    const parsed = parseLinkLines('議事次第\thttps://example.go.jp/shidai.pdf\n\nhttps://example.go.jp/%E8%B3%87%E6%96%99.pdf\n');
    expect(parsed).toEqual([
      { text: '議事次第', url: 'https://example.go.jp/shidai.pdf', filename: 'shidai.pdf', estimatedCategory: 'agenda' },
      { text: '', url: 'https://example.go.jp/%E8%B3%87%E6%96%99.pdf', filename: '資料.pdf', estimatedCategory: 'other' },
    ]);
  });
});
