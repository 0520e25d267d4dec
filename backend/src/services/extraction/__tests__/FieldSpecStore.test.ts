import { describe, it, expect } from 'vitest';
import { FieldSpecStore, getFieldSpecStore, validateDefinition } from '../FieldSpecStore';
import type { DocumentDefinition } from '../FieldSpec';
import { CDL_DEFINITION } from '../documents/cdl';

function minimalDefinition(overrides: Partial<DocumentDefinition> = {}): DocumentDefinition {
  return {
    documentType: 'CDL',
    ocrCorrections: false,
    fields: [{ fieldName: 'a', mode: 'first-match', patterns: [{ label: 'a', regex: /a/g }] }],
    scoring: { weights: { a: 0.5 }, tiers: [], signalBonuses: [], qualityBonuses: [] },
    gate: { flag: 'verified', threshold: 0.9, required: [['a']] },
    ...overrides,
  };
}

describe('FieldSpecStore', () => {
  it('should load the built-in document types', () => {
    const store = getFieldSpecStore();

    expect(store.getSupportedTypes()).toEqual(['CDL', 'COI', 'Agreement', 'POD', 'Rate Confirmation', 'Invoice']);
    expect(store.getFieldNames('CDL')).toEqual([
      'driverName',
      'licenseNumber',
      'expirationDate',
      'licenseClass',
      'address',
      'state',
    ]);
    expect(store.getCorrections()['del1very']).toBe('delivery');
  });

  it('should freeze tables but leave regexes usable', () => {
    const definition = getFieldSpecStore().getDefinition('CDL');

    expect(Object.isFrozen(definition.scoring.weights)).toBe(true);
    expect(Object.isFrozen(definition.fields[0].patterns)).toBe(true);
    expect(Object.isFrozen(definition.fields[0].patterns[0].regex)).toBe(false);
  });

  it('should throw for a type it does not hold', () => {
    const store = new FieldSpecStore([CDL_DEFINITION]);

    expect(() => store.getDefinition('COI')).toThrow('Unknown document type: COI');
  });

  it('should reject duplicate document types', () => {
    expect(() => new FieldSpecStore([minimalDefinition(), minimalDefinition()])).toThrow(
      'Duplicate field spec for CDL'
    );
  });

  it('should reject patterns without the global flag', () => {
    const definition = minimalDefinition({
      fields: [{ fieldName: 'a', mode: 'first-match', patterns: [{ label: 'a', regex: /a/ }] }],
    });

    expect(() => validateDefinition(definition)).toThrow(
      'Invalid field spec for CDL: fields.0.patterns.0.regex: regex must use the g flag'
    );
  });

  it('should reject references to fields that are not defined', () => {
    const definition = minimalDefinition({
      gate: { flag: 'verified', threshold: 0.9, required: [['missing']] },
    });

    expect(() => validateDefinition(definition)).toThrow(
      'Invalid field spec for CDL: (root): unknown field referenced: missing'
    );
  });

  it('should reject weights outside the unit interval', () => {
    const definition = minimalDefinition({
      scoring: { weights: { a: 1.5 }, tiers: [], signalBonuses: [], qualityBonuses: [] },
    });

    expect(() => validateDefinition(definition)).toThrow(/scoring\.weights\.a/);
  });

  it('should reject empty OCR corrections', () => {
    expect(() => new FieldSpecStore([], { p0d: '' })).toThrow(/^Invalid OCR corrections: p0d/);
  });
});
