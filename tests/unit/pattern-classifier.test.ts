import { describe, it, expect } from 'vitest';
import { PatternClassifier } from '../../src/application/services/pattern-classifier.js';
import type { ClassificationRule } from '../../src/application/services/classification-rules.js';
import { logEvent } from '../helpers/events.js';

describe('PatternClassifier', () => {
  const classifier = new PatternClassifier();

  it.each([
    ['2025-05-26 09:33:41,001 ERROR storeAction() fail: LoadAll:getAllReferenceTables', 'REFERENCE_TABLE_CORRUPT', 'reference-tables-load-failed'],
    ['2025-05-26 09:33:41,001 ERROR storeAction() fail: LoadByKey:getDeviceInfo', 'DEVICE_INFO_INVALID', 'device-info-load-failed'],
    ['2025-05-26 09:33:41,001 ERROR init schema: error: Internal error', 'SCHEMA_CORRUPT', 'schema-init-internal-error'],
    ['2025-05-26 09:33:41,001 ERROR Stores not correctly set up, db version 12', 'STORES_NOT_CORRECTLY_SET_UP', 'stores-not-set-up'],
    ["ERROR: object store 'charts' could not be opened", 'STORES_NOT_CORRECTLY_SET_UP', 'object-store-open-failed'],
  ])('classifies %s', (raw, kind, ruleId) => {
    expect(classifier.classifyText(raw)).toEqual({ kind, ruleId });
  });

  it('returns null for lines that match no rule', () => {
    expect(classifier.classifyText('2025-05-26 09:33:40,383 INFO JS API: getNativeVersion returned: 2023.2.208')).toBeNull();
  });

  it('uses the first matching rule in table order', () => {
    const raw = 'storeAction() fail: LoadAll:getAllReferenceTables; Stores not correctly set up, db';
    expect(classifier.classifyText(raw)?.kind).toBe('REFERENCE_TABLE_CORRUPT');
  });

  it('wraps the event in the classification', () => {
    const event = logEvent('2025-05-26 09:33:41,001 ERROR init schema: error: Internal error', { lineNumber: 7 });
    const result = classifier.classify(event);

    expect(result).toEqual({ event, kind: 'SCHEMA_CORRUPT', ruleId: 'schema-init-internal-error' });
  });

  it('gives the same answer for repeated pattern matches', () => {
    const raw = "object store 'x' could not be opened";
    expect(classifier.classifyText(raw)?.ruleId).toBe('object-store-open-failed');
    expect(classifier.classifyText(raw)?.ruleId).toBe('object-store-open-failed');
  });

  it('exposes the rule table', () => {
    expect(classifier.listRules().map((r) => r.id)).toEqual([
      'reference-tables-load-failed',
      'device-info-load-failed',
      'schema-init-internal-error',
      'stores-not-set-up',
      'object-store-open-failed',
    ]);
  });

  describe('rule table validation', () => {
    const rule = (overrides: Partial<ClassificationRule>): ClassificationRule => ({
      id: 'r1',
      kind: 'SCHEMA_CORRUPT',
      match: { type: 'substring', text: 'boom' },
      ...overrides,
    });

    it('rejects duplicate ids', () => {
      expect(() => new PatternClassifier([rule({}), rule({})])).toThrow('Duplicate classification rule id: r1');
    });

    it('rejects empty ids', () => {
      expect(() => new PatternClassifier([rule({ id: ' ' })])).toThrow('Classification rule with empty id');
    });

    it('rejects empty substrings', () => {
      expect(() => new PatternClassifier([rule({ match: { type: 'substring', text: '' } })])).toThrow(
        'Classification rule r1 has an empty substring',
      );
    });

    it('rejects stateful regexes', () => {
      expect(() => new PatternClassifier([rule({ match: { type: 'pattern', regex: /boom/g } })])).toThrow(
        'Classification rule r1 uses a global or sticky regex',
      );
    });

    it('accepts an empty table and classifies nothing', () => {
      expect(new PatternClassifier([]).classifyText('init schema: error: Internal error')).toBeNull();
    });
  });
});
