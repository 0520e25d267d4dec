import { describe, it, expect } from 'vitest';
import { ConfidenceScorer } from '../ConfidenceScorer';
import type { FieldDetail, ScoringTable } from '../FieldSpec';

const found = (patternLabel: string, signalCount?: number): FieldDetail => ({
  found: true,
  patternIndex: 0,
  patternLabel,
  raw: patternLabel,
  signalCount,
});

describe('ConfidenceScorer', () => {
  const scorer = new ConfidenceScorer();

  const weightedTable: ScoringTable = {
    weights: { name: 0.35, expiry: 0.35, number: 0.15, class: 0.1 },
    tiers: [{ label: 'name-and-expiry', requires: [['name'], ['expiry']], score: 0.95, combine: 'max' }],
    signalBonuses: [],
    qualityBonuses: [],
  };

  it('should sum the weights of present fields', () => {
    const result = scorer.score(weightedTable, { name: 'John Smith', number: 'D1234567', class: null, expiry: null }, {});

    expect(result).toEqual({ confidence: 0.5, weighted: 0.5, tier: null, bonuses: 0 });
  });

  it('should lift the score to a satisfied max tier', () => {
    const result = scorer.score(weightedTable, { name: 'John Smith', expiry: '2030-12-25', class: 'A' }, {});

    expect(result.weighted).toBe(0.8);
    expect(result.tier).toBe('name-and-expiry');
    expect(result.confidence).toBe(0.95);
  });

  it('should keep a weighted score above a max tier', () => {
    const table: ScoringTable = {
      ...weightedTable,
      tiers: [{ label: 'low', requires: [['name']], score: 0.2, combine: 'max' }],
    };

    expect(scorer.score(table, { name: 'John Smith', expiry: '2030-12-25' }, {}).confidence).toBe(0.7);
  });

  it('should treat empty strings, empty lists and false as absent', () => {
    const result = scorer.score(weightedTable, { name: '', number: [], class: false, expiry: null }, {});

    expect(result.confidence).toBe(0);
  });

  it('should honour a minimum present field count on a tier', () => {
    const table: ScoringTable = {
      weights: { a: 0.1, b: 0.1 },
      tiers: [{ label: 'either', requires: [['a', 'b']], minFields: 2, score: 0.7, combine: 'max' }],
      signalBonuses: [],
      qualityBonuses: [],
    };

    expect(scorer.score(table, { a: 'x', b: null }, {}).confidence).toBe(0.1);
    expect(scorer.score(table, { a: 'x', b: 'y' }, {}).confidence).toBe(0.7);
  });

  it('should apply the first satisfied replace tier and the best signal bonus', () => {
    const table: ScoringTable = {
      weights: {},
      tiers: [
        { label: 'signed-typed', requires: [['signed'], ['type']], score: 0.85, combine: 'replace' },
        { label: 'signed', requires: [['signed']], score: 0.7, combine: 'replace' },
      ],
      signalBonuses: [
        {
          field: 'signed',
          tiers: [
            { minSignals: 4, bonus: 0.15 },
            { minSignals: 2, bonus: 0.05 },
          ],
        },
      ],
      qualityBonuses: [],
    };

    const result = scorer.score(table, { signed: true, type: 'Carrier Agreement' }, { signed: found('signature-line', 5) });

    expect(result.tier).toBe('signed-typed');
    expect(result.bonuses).toBe(0.15);
    expect(result.confidence).toBe(1);
  });

  it('should skip signal bonuses for a field that is not present', () => {
    const table: ScoringTable = {
      weights: {},
      tiers: [],
      signalBonuses: [{ field: 'signed', tiers: [{ minSignals: 1, bonus: 0.1 }] }],
      qualityBonuses: [],
    };

    expect(scorer.score(table, { signed: false }, { signed: found('marks', 1) }).confidence).toBe(0);
  });

  it('should add quality bonuses whose condition holds', () => {
    const table: ScoringTable = {
      weights: { confirmed: 0.4, receiver: 0.1 },
      tiers: [],
      signalBonuses: [],
      qualityBonuses: [
        { field: 'confirmed', bonus: 0.02, when: (_value, detail) => detail.patternLabel !== 'document-type' },
        { field: 'receiver', bonus: 0.02, when: (value) => typeof value === 'string' && value.length > 5 },
      ],
    };

    const result = scorer.score(
      table,
      { confirmed: true, receiver: 'Jo' },
      { confirmed: found('delivery-confirmed'), receiver: found('name') }
    );

    expect(result.confidence).toBe(0.52);
    expect(result.bonuses).toBe(0.02);
  });
});
