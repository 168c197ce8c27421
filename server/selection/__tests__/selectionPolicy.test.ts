import { describe, expect, it } from 'vitest';
import type { Candidate, DocumentCategory } from '../../../shared/types';
import { buildDeferredDecisions, DecisionRegistry } from '../deferredPairs';
import { compareCandidates, describeSelectionRule, selectCandidates, sortCandidates } from '../selectionPolicy';

const candidate = (
  name: string,
  priorityScore: number,
  category: DocumentCategory = 'material',
  text = name,
): Candidate => ({
  text,
  url: `https://example.go.jp/${name}.pdf`,
  filename: `${name}.pdf`,
  category,
  categorySource: 'rules',
  materialId: '',
  priorityScore,
  scoreComponents: { base: priorityScore, filenameBonus: 0, mentionBonus: 0, categoryPenalty: 0 },
  adjustments: [],
});

const options = { minScore: 4, maxScoreBased: 5 };

describe('compareCandidates', () => {
  it('orders by score, then category, then filename, all descending', () => {
    const sorted = sortCandidates([
      candidate('a', 4, 'material'),
      candidate('b', 4, 'reference'),
      candidate('c', 6, 'agenda'),
      candidate('d', 4, 'material'),
    ]);
    expect(sorted.map((c) => c.filename)).toEqual(['c.pdf', 'b.pdf', 'd.pdf', 'a.pdf']);
    expect(compareCandidates(sorted[0], sorted[0])).toBe(0);
  });
});

describe('selectCandidates', () => {
  it('caps score-based picks and skips low scores', () => {
    const sorted = sortCandidates([
      candidate('s1', 8),
      candidate('s2', 7),
      candidate('s3', 6),
      candidate('s4', 5),
      candidate('s5', 5),
      candidate('s6', 4),
      candidate('low', 3),
    ]);
    const selected = selectCandidates(sorted, new DecisionRegistry(), options);
    expect(selected.map((c) => c.filename)).toEqual(['s1.pdf', 's2.pdf', 's3.pdf', 's5.pdf', 's4.pdf']);
    expect(selected.every((c) => !c.decisionPending)).toBe(true);
  });

  it('includes every deferred member regardless of score or cap', () => {
    const sorted = sortCandidates([
      candidate('s1', 8),
      candidate('s2', 7),
      candidate('s3', 6),
      candidate('s4', 5),
      candidate('s5', 5),
      candidate('s6', 4),
      candidate('gaiyou', 5, 'executive_summary', '資料1概要'),
      candidate('zenbun', 2, 'material', '資料1全文'),
    ]);
    const registry = buildDeferredDecisions(sorted);
    const selected = selectCandidates(sorted, registry, options);

    expect(selected.map((c) => c.filename)).toEqual([
      'gaiyou.pdf',
      'zenbun.pdf',
      's1.pdf',
      's2.pdf',
      's3.pdf',
      's5.pdf',
      's4.pdf',
    ]);
    expect(selected[0]).toMatchObject({ decisionPending: true, decisionGroupId: 'deferred-01', decisionRole: 'summary' });
    expect(selected[1]).toMatchObject({ decisionPending: true, decisionGroupId: 'deferred-01', decisionRole: 'full' });
  });

  it('describes the policy it applied', () => {
    expect(describeSelectionRule(options)).toBe(
      'score>=4 with cap 5 for score-based picks; deferred summary/full pairs are force-included',
    );
  });
});
