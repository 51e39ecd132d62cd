/**
 * Tests for the Migration Planner
 */

import { orderInstructions, planMigration, targetLocation, toInstruction } from '../src/core/planner';
import { Change, ChangeKind, FormatAdapter, SchemaNode, Severity } from '../src/core/types';

function change(kind: ChangeKind, path: string, severity: Severity = 'info', extra: Partial<Change> = {}): Change {
  return {
    location: path.split('.'),
    path,
    kind,
    description: `${kind} at ${path}`,
    severity,
    isBreaking: severity === 'breaking',
    ...extra,
  };
}

const recordingAdapter: FormatAdapter = {
  format: 'json-schema',
  check: () => undefined,
  normalize: (): SchemaNode => ({ kind: 'object', fields: [], required: [] }),
  render: (instruction) => `${instruction.op} ${instruction.location.join('.')}`,
};

const emptyTree: SchemaNode = { kind: 'object', fields: [], required: [] };

describe('Migration Planner', () => {
  describe('toInstruction', () => {
    test.each([
      ['added', 'add'],
      ['removed', 'remove'],
      ['renamed', 'rename'],
      ['type_changed', 'alter_type'],
      ['constraint_tightened', 'tighten'],
      ['constraint_loosened', 'loosen'],
      ['other', 'modify'],
    ] as const)('%s becomes %s', (kind, op) => {
      expect(toInstruction(change(kind, 'a')).op).toBe(op);
    });

    test('requiredness changes map by direction', () => {
      expect(toInstruction(change('requiredness_changed', 'a', 'breaking', { after: 'required' })).op).toBe(
        'make_required'
      );
      expect(toInstruction(change('requiredness_changed', 'a', 'warning', { after: 'optional' })).op).toBe(
        'make_optional'
      );
    });
  });

  describe('ordering', () => {
    test('renames, removals, in-place changes, additions, then required markers', () => {
      const changes = [
        change('added', 'email'),
        change('requiredness_changed', 'email', 'breaking', { after: 'required' }),
        change('type_changed', 'id', 'breaking'),
        change('removed', 'age', 'breaking'),
        change('constraint_loosened', 'name'),
        change('renamed', 'title', 'breaking', { before: 'title', after: 'heading' }),
      ];

      const ordered = orderInstructions(changes.map(toInstruction));
      expect(ordered.map((i) => `${i.op} ${i.location.join('.')}`)).toEqual([
        'rename title',
        'remove age',
        'alter_type id',
        'loosen name',
        'add email',
        'make_required email',
      ]);
    });

    test('keeps the original order within a phase', () => {
      const changes = [change('removed', 'b'), change('removed', 'a'), change('removed', 'c')];
      const ordered = orderInstructions(changes.map(toInstruction));
      expect(ordered.map((i) => i.location[0])).toEqual(['b', 'a', 'c']);
    });
  });

  describe('planMigration', () => {
    test('renders every instruction through the adapter', () => {
      const changes = [change('added', 'user.email'), change('removed', 'user.age', 'breaking')];
      const plan = planMigration(changes, recordingAdapter, { oldTree: emptyTree, newTree: emptyTree }, {
        sourceVersion: '1.0.0',
        targetVersion: '2.0.0',
      });

      expect(plan.steps).toEqual(['remove user.age', 'add user.email']);
      expect(plan.instructions).toHaveLength(2);
      expect(plan.metadata).toEqual({
        sourceVersion: '1.0.0',
        targetVersion: '2.0.0',
        format: 'json-schema',
        stepCount: '2',
        breakingChanges: '1',
      });
    });

    test('an empty change set yields an empty plan', () => {
      const plan = planMigration([], recordingAdapter, { oldTree: emptyTree, newTree: emptyTree });
      expect(plan.steps).toEqual([]);
      expect(plan.metadata.stepCount).toBe('0');
    });
  });

  test('targetLocation follows renames to the new name', () => {
    const rename = toInstruction(change('renamed', 'user.email', 'breaking', { before: 'email', after: 'contact' }));
    expect(targetLocation(rename)).toEqual(['user', 'contact']);
    expect(targetLocation(toInstruction(change('removed', 'user.age')))).toEqual(['user', 'age']);
  });
});
