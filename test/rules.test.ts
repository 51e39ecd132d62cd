/**
 * Tests for the Compatibility Rule Set
 */

import { InvalidFormatError } from '../src/core/errors';
import { DEFAULT_THRESHOLD, classifyChange, classifyChanges, getRuleTable, listRuleIds } from '../src/core/rules';
import { StructuralChange } from '../src/core/types';

function structural(partial: Partial<StructuralChange> & Pick<StructuralChange, 'kind'>): StructuralChange {
  const location = partial.location ?? ['field'];
  return {
    location,
    path: location.join('.'),
    description: `${partial.kind} change`,
    ...partial,
  };
}

describe('Compatibility Rule Set', () => {
  // ─── Tables ───────────────────────────────────────────────────────────

  describe('Rule tables', () => {
    test('rejects unknown formats', () => {
      expect(() => getRuleTable('xml')).toThrow(InvalidFormatError);
      expect(() => getRuleTable('xml')).toThrow('Invalid schema format: xml');
    });

    test('uses the default threshold unless configured', () => {
      expect(getRuleTable('sql').threshold).toBe(DEFAULT_THRESHOLD);
      expect(getRuleTable('sql', { thresholds: { sql: 90 } }).threshold).toBe(90);
      expect(getRuleTable('openapi', { thresholds: { sql: 90 } }).threshold).toBe(70);
    });

    test('applies severity overrides by rule id', () => {
      const table = getRuleTable('protobuf', { severityOverrides: { 'protobuf-renamed-field': 'breaking' } });
      expect(classifyChange(structural({ kind: 'renamed', before: 'a', after: 'b' }), table).severity).toBe(
        'breaking'
      );
    });

    test('lists every rule id once', () => {
      const ids = listRuleIds();
      expect(ids).toContain('removed-member');
      expect(ids).toContain('protobuf-tag-reuse');
      expect(ids).toContain('sql-drop-primary-key');
      expect(new Set(ids).size).toBe(ids.length);
    });
  });

  // ─── Shared Defaults ──────────────────────────────────────────────────

  describe('Shared defaults', () => {
    const table = getRuleTable('json-schema');

    test.each([
      [structural({ kind: 'added', context: { required: false } }), 'info', 'added-optional-member'],
      [structural({ kind: 'added', context: { required: true } }), 'breaking', 'added-required-member'],
      [structural({ kind: 'removed' }), 'breaking', 'removed-member'],
      [structural({ kind: 'type_changed', before: 'integer', after: 'number' }), 'warning', 'type-widened'],
      [structural({ kind: 'type_changed', before: 'number', after: 'integer' }), 'breaking', 'type-narrowed'],
      [structural({ kind: 'constraint_tightened' }), 'breaking', 'constraint-tightened'],
      [structural({ kind: 'constraint_loosened' }), 'info', 'constraint-loosened'],
      [structural({ kind: 'requiredness_changed', after: 'required' }), 'breaking', 'made-required'],
      [structural({ kind: 'requiredness_changed', after: 'optional' }), 'warning', 'made-optional'],
      [structural({ kind: 'renamed' }), 'breaking', 'renamed-member'],
      [structural({ kind: 'other' }), 'warning', 'other-change'],
    ])('%#: classifies %p', (change, severity, rule) => {
      expect(classifyChange(change, table)).toMatchObject({ severity, rule });
    });

    test('a constraint on a member added in the same version is informational', () => {
      const change = structural({ kind: 'constraint_tightened', context: { onAddedMember: true } });
      expect(classifyChange(change, table)).toMatchObject({
        severity: 'info',
        rule: 'constraint-tightened-new-member',
      });
    });

    test('a type change into a union containing the old type is a widening', () => {
      const change = structural({
        kind: 'type_changed',
        before: 'string',
        after: 'oneOf(string, null)',
        context: { widenedToUnion: true },
      });
      expect(classifyChange(change, table).severity).toBe('warning');
    });

    test('removing a deprecated member is a warning', () => {
      const change = structural({ kind: 'removed', context: { oldMeta: { 'json-schema': { deprecated: true } } } });
      expect(classifyChange(change, table).rule).toBe('json-schema-removed-deprecated');
    });
  });

  // ─── OpenAPI ──────────────────────────────────────────────────────────

  describe('OpenAPI direction', () => {
    const table = getRuleTable('openapi');
    const response = { newMeta: { openapi: { direction: 'response' as const } } };
    const request = { newMeta: { openapi: { direction: 'request' as const } } };

    test('tightening a response constraint is safe', () => {
      const change = structural({ kind: 'constraint_tightened', context: response });
      expect(classifyChange(change, table)).toMatchObject({ severity: 'info' });
    });

    test('loosening a response constraint breaks clients', () => {
      const change = structural({ kind: 'constraint_loosened', context: response });
      expect(classifyChange(change, table)).toMatchObject({
        severity: 'breaking',
        rule: 'openapi-response-constraint-loosened',
      });
    });

    test('tightening a request constraint breaks clients', () => {
      const change = structural({ kind: 'constraint_tightened', context: request });
      expect(classifyChange(change, table).severity).toBe('breaking');
    });

    test('a response member becoming optional breaks clients', () => {
      const change = structural({ kind: 'requiredness_changed', after: 'optional', context: response });
      expect(classifyChange(change, table).rule).toBe('openapi-response-made-optional');
    });

    test('a response member becoming required is safe', () => {
      const change = structural({ kind: 'requiredness_changed', after: 'required', context: response });
      expect(classifyChange(change, table).severity).toBe('info');
    });
  });

  // ─── Protobuf ─────────────────────────────────────────────────────────

  describe('Protobuf', () => {
    const table = getRuleTable('protobuf');

    test('a reassigned field number is breaking', () => {
      const change = structural({
        kind: 'type_changed',
        before: 'string',
        after: 'int32',
        context: { renamedFrom: 'email' },
      });
      expect(classifyChange(change, table)).toMatchObject({ severity: 'breaking', rule: 'protobuf-tag-reuse' });
    });

    test('wire-compatible integer widening is a warning', () => {
      const change = structural({ kind: 'type_changed', before: 'int32', after: 'int64' });
      expect(classifyChange(change, table).rule).toBe('protobuf-wire-compatible-type');
    });

    test('a rename is a warning', () => {
      expect(classifyChange(structural({ kind: 'renamed' }), table).severity).toBe('warning');
    });

    test('moving an enum value name to another number is breaking', () => {
      const change = structural({
        kind: 'renamed',
        location: ['Status', 'ACTIVE'],
        before: 'ACTIVE',
        after: 'DELETED',
        context: { oldContainerMeta: { protobuf: { enum: true, enumValues: { ACTIVE: 1, DELETED: 2 } } } },
      });
      expect(classifyChange(change, table)).toMatchObject({
        severity: 'breaking',
        rule: 'protobuf-enum-number-reassigned',
      });
    });

    test('renaming an enum value to a new name is a warning', () => {
      const change = structural({
        kind: 'renamed',
        location: ['Status', 'ACTIVE'],
        before: 'ACTIVE',
        after: 'ENABLED',
        context: { oldContainerMeta: { protobuf: { enum: true, enumValues: { ACTIVE: 1 } } } },
      });
      expect(classifyChange(change, table).rule).toBe('protobuf-renamed-field');
    });

    test('removing a field whose number is now reserved is a warning', () => {
      const change = structural({
        kind: 'removed',
        location: ['User', 'name'],
        context: {
          oldMeta: { protobuf: { tag: 2 } },
          newContainerMeta: { protobuf: { reservedRanges: [[2, 2]], reservedNames: [] } },
        },
      });
      expect(classifyChange(change, table).rule).toBe('protobuf-removed-reserved');
    });

    test('removing an unreserved field is breaking', () => {
      const change = structural({ kind: 'removed', context: { oldMeta: { protobuf: { tag: 2 } } } });
      expect(classifyChange(change, table).rule).toBe('protobuf-removed-field');
    });

    test('adding a field on a reserved number is breaking', () => {
      const change = structural({
        kind: 'added',
        location: ['User', 'age'],
        context: {
          required: false,
          newMeta: { protobuf: { tag: 17 } },
          oldContainerMeta: { protobuf: { reservedRanges: [[15, 20]], reservedNames: [] } },
        },
      });
      expect(classifyChange(change, table)).toMatchObject({
        severity: 'breaking',
        rule: 'protobuf-reserved-tag-reuse',
      });
    });

    test('adding a field on a reserved name is breaking', () => {
      const change = structural({
        kind: 'added',
        location: ['User', 'legacy'],
        context: {
          required: false,
          newMeta: { protobuf: { tag: 9 } },
          oldContainerMeta: { protobuf: { reservedNames: ['legacy'] } },
        },
      });
      expect(classifyChange(change, table).rule).toBe('protobuf-reserved-tag-reuse');
    });
  });

  // ─── SQL ──────────────────────────────────────────────────────────────

  describe('SQL', () => {
    const table = getRuleTable('sql');

    test('dropping a primary key column is breaking', () => {
      const change = structural({ kind: 'removed', context: { oldMeta: { sql: { primaryKey: true, nullable: false } } } });
      expect(classifyChange(change, table)).toMatchObject({ severity: 'breaking', rule: 'sql-drop-primary-key' });
    });

    test('dropping a nullable column is a warning', () => {
      const change = structural({ kind: 'removed', context: { oldMeta: { sql: { nullable: true } } } });
      expect(classifyChange(change, table).severity).toBe('warning');
    });

    test('adding a NOT NULL column with a default is safe', () => {
      const change = structural({
        kind: 'added',
        context: { required: true, newMeta: { sql: { nullable: false, hasDefault: true } } },
      });
      expect(classifyChange(change, table).rule).toBe('sql-add-not-null-with-default');
    });

    test('integer to bigint is a widening', () => {
      const change = structural({ kind: 'type_changed', before: 'integer', after: 'bigint' });
      expect(classifyChange(change, table).severity).toBe('warning');
    });

    test('bigint to integer is a narrowing', () => {
      const change = structural({ kind: 'type_changed', before: 'bigint', after: 'integer' });
      expect(classifyChange(change, table).severity).toBe('breaking');
    });

    test.each([
      ['varchar(10)', 'varchar(20)', 'warning'],
      ['varchar(20)', 'varchar(10)', 'breaking'],
      ['varchar(20)', 'varchar', 'warning'],
      ['varchar', 'varchar(20)', 'breaking'],
      ['varchar(255)', 'text', 'warning'],
      ['char(10)', 'varchar(20)', 'warning'],
      ['char(10)', 'varchar(5)', 'breaking'],
      ['text', 'varchar(20)', 'breaking'],
      ['varchar(10)[]', 'varchar(20)[]', 'warning'],
    ])('%s to %s is %s', (before, after, severity) => {
      expect(classifyChange(structural({ kind: 'type_changed', before, after }), table).severity).toBe(severity);
    });
  });

  // ─── classifyChanges ──────────────────────────────────────────────────

  test('classifyChanges keeps order and sets isBreaking from severity', () => {
    const changes = classifyChanges(
      [structural({ kind: 'removed' }), structural({ kind: 'added', location: ['other'] })],
      getRuleTable('json-schema')
    );

    expect(changes.map((c) => [c.kind, c.severity, c.isBreaking, c.rule])).toEqual([
      ['removed', 'breaking', true, 'removed-member'],
      ['added', 'info', false, 'added-optional-member'],
    ]);
  });
});
