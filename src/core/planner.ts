/**
 * Migration Planner
 *
 * Turns classified changes into abstract instructions, orders them so that no
 * intermediate step leaves data in an invalid state, and hands each one to the
 * format adapter for rendering.
 */

import {
  Change,
  ChangeKind,
  FormatAdapter,
  MigrationInstruction,
  MigrationOperation,
  MigrationPlan,
  RenderContext,
} from './types';

const OPERATION: Record<Exclude<ChangeKind, 'requiredness_changed'>, MigrationOperation> = {
  added: 'add',
  removed: 'remove',
  renamed: 'rename',
  type_changed: 'alter_type',
  constraint_tightened: 'tighten',
  constraint_loosened: 'loosen',
  other: 'modify',
};

// Lower phases run first: renames, removals, in-place changes, additions.
// A member is made required only after the step that adds it.
const PHASE: Record<MigrationOperation, number> = {
  rename: 0,
  remove: 1,
  alter_type: 2,
  tighten: 2,
  loosen: 3,
  modify: 3,
  make_optional: 3,
  add: 4,
  make_required: 5,
};

export function toInstruction(change: Change): MigrationInstruction {
  const op =
    change.kind === 'requiredness_changed'
      ? change.after === 'required'
        ? 'make_required'
        : 'make_optional'
      : OPERATION[change.kind];

  return { op, location: change.location, change };
}

/**
 * Order instructions by phase. The sort is stable, so instructions within a
 * phase keep the diff engine's deterministic order.
 */
export function orderInstructions(instructions: readonly MigrationInstruction[]): MigrationInstruction[] {
  return [...instructions].sort((a, b) => PHASE[a.op] - PHASE[b.op]);
}

export function planMigration(
  changes: readonly Change[],
  adapter: FormatAdapter,
  context: RenderContext,
  metadata: Record<string, string> = {}
): MigrationPlan {
  const instructions = orderInstructions(changes.map(toInstruction));
  const steps = instructions.map((instruction) => adapter.render(instruction, context));

  return {
    steps,
    instructions,
    metadata: {
      ...metadata,
      format: adapter.format,
      stepCount: String(steps.length),
      breakingChanges: String(changes.filter((c) => c.isBreaking).length),
    },
  };
}

/** Last segment of a location, or '(root)'. */
export function memberOf(location: readonly string[]): string {
  return location.length > 0 ? location[location.length - 1] : '(root)';
}

/** The location an instruction's target has in the new tree. */
export function targetLocation(instruction: MigrationInstruction): string[] {
  const { change, location } = instruction;
  if (instruction.op === 'rename' && change.after !== undefined) {
    return [...location.slice(0, -1), change.after];
  }
  return [...location];
}
