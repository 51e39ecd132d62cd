/**
 * Tests for the Score Aggregator
 */

import { getRuleTable } from '../src/core/rules';
import { buildReport, calculateCompatibilityScore, summarize } from '../src/core/scorer';
import { Change, ChangeKind, Severity } from '../src/core/types';

function change(kind: ChangeKind, severity: Severity, path = 'field'): Change {
  return {
    location: path.split('.'),
    path,
    kind,
    description: `${kind} at ${path}`,
    severity,
    isBreaking: severity === 'breaking',
  };
}

describe('Score Aggregator', () => {
  describe('calculateCompatibilityScore', () => {
    test('no changes scores 100', () => {
      expect(calculateCompatibilityScore([])).toBe(100);
    });

    test('info changes cost nothing by default', () => {
      expect(calculateCompatibilityScore([change('added', 'info'), change('constraint_loosened', 'info')])).toBe(100);
    });

    test('a warning costs 3', () => {
      expect(calculateCompatibilityScore([change('other', 'warning')])).toBe(97);
    });

    test('a breaking change costs 15', () => {
      expect(calculateCompatibilityScore([change('removed', 'breaking')])).toBe(85);
    });

    test('repeated breaking changes of the same kind cost less each time', () => {
      // 100 - 15 - 7.5 = 77.5
      const changes = [change('removed', 'breaking', 'a'), change('removed', 'breaking', 'b')];
      expect(calculateCompatibilityScore(changes)).toBe(78);
    });

    test('breaking changes of different kinds each cost the full penalty', () => {
      const changes = [change('removed', 'breaking', 'a'), change('type_changed', 'breaking', 'b')];
      expect(calculateCompatibilityScore(changes)).toBe(70);
    });

    test('the score never drops below 0', () => {
      const changes = Array.from({ length: 40 }, (_, i) => change('other', 'warning', `f${i}`));
      expect(calculateCompatibilityScore(changes)).toBe(0);
    });

    test('the score never exceeds 100 with a negative penalty', () => {
      expect(calculateCompatibilityScore([change('added', 'info')], { infoPenalty: -5 })).toBe(100);
    });

    test('penalties come from the scoring policy', () => {
      const changes = [change('removed', 'breaking', 'a'), change('removed', 'breaking', 'b')];
      expect(calculateCompatibilityScore(changes, { breakingPenalty: 20, breakingDecay: 1 })).toBe(60);
    });
  });

  describe('summarize', () => {
    test('counts changes per severity', () => {
      const summary = summarize([
        change('removed', 'breaking', 'a'),
        change('other', 'warning', 'b'),
        change('added', 'info', 'c'),
        change('added', 'info', 'd'),
      ]);
      expect(summary).toEqual({ breaking: 1, warning: 1, info: 2, total: 4 });
    });
  });

  describe('buildReport', () => {
    const table = getRuleTable('json-schema');

    test('a breaking change makes the report incompatible even above the threshold', () => {
      const report = buildReport([change('removed', 'breaking')], table);

      expect(report.compatibilityScore).toBe(85);
      expect(report.isCompatible).toBe(false);
    });

    test('warnings alone stay compatible while the score meets the threshold', () => {
      const changes = Array.from({ length: 10 }, (_, i) => change('other', 'warning', `f${i}`));
      const report = buildReport(changes, table);

      expect(report.compatibilityScore).toBe(70);
      expect(report.isCompatible).toBe(true);
    });

    test('warnings below the threshold are incompatible', () => {
      const changes = Array.from({ length: 11 }, (_, i) => change('other', 'warning', `f${i}`));
      const report = buildReport(changes, table);

      expect(report.compatibilityScore).toBe(67);
      expect(report.isCompatible).toBe(false);
    });

    test('issues carry a hint for breaking and warning changes only', () => {
      const removed = change('removed', 'breaking', 'a');
      const report = buildReport([removed, change('added', 'info', 'b')], table);

      expect(report.issues).toEqual([
        { change: removed, hint: 'Deprecate the member first and remove it in a later major version.' },
      ]);
    });

    test('records format and threshold in the metadata', () => {
      const report = buildReport([], table, {}, { oldVersion: '1.0.0' });
      expect(report.metadata).toEqual({ oldVersion: '1.0.0', format: 'json-schema', threshold: '70' });
    });
  });
});
