/**
 * Schema Diff Engine
 *
 * Compares two normalized SchemaNodes and produces the ordered list of
 * structural changes between them. No severity is assigned here; see rules.ts.
 */

import { ComparisonError } from './errors';
import {
  ARRAY_ITEMS,
  DEFAULT_MAX_DEPTH,
  constraintEquals,
  formatPath,
  isRequired,
  nodesEqual,
  typeLabel,
  variantSegment,
} from './node';
import {
  ArrayNode,
  ChangeContext,
  ChangeKind,
  ConstraintValue,
  Constraints,
  ObjectField,
  ObjectNode,
  ScalarNode,
  SchemaNode,
  StructuralChange,
  UnionNode,
} from './types';

export interface DiffOptions {
  /** Maximum nesting depth to descend into (default: 64) */
  maxDepth?: number;
}

// ─── Constraint Semantics ───────────────────────────────────────────────────

type ConstraintDirection = 'lower-bound' | 'upper-bound' | 'flag' | 'set';

const CONSTRAINT_DIRECTION: Record<string, ConstraintDirection> = {
  minimum: 'lower-bound',
  exclusiveMinimum: 'lower-bound',
  minLength: 'lower-bound',
  minItems: 'lower-bound',
  maximum: 'upper-bound',
  exclusiveMaximum: 'upper-bound',
  maxLength: 'upper-bound',
  maxItems: 'upper-bound',
  precision: 'upper-bound',
  scale: 'upper-bound',
  unique: 'flag',
  primaryKey: 'flag',
  enum: 'set',
};

interface ConstraintDelta {
  name: string;
  detail: string;
}

interface ConstraintComparison {
  tightened: ConstraintDelta[];
  loosened: ConstraintDelta[];
  other: ConstraintDelta[];
}

function describeValue(value: ConstraintValue | undefined): string {
  return value === undefined ? 'none' : JSON.stringify(value);
}

function compareBound(
  direction: 'lower-bound' | 'upper-bound',
  before: ConstraintValue | undefined,
  after: ConstraintValue | undefined
): 'tightened' | 'loosened' | 'other' {
  if (before === undefined) return 'tightened';
  if (after === undefined) return 'loosened';
  if (typeof before !== 'number' || typeof after !== 'number') return 'other';
  const raised = after > before;
  if (direction === 'lower-bound') return raised ? 'tightened' : 'loosened';
  return raised ? 'loosened' : 'tightened';
}

function compareConstraints(before: Constraints, after: Constraints): ConstraintComparison {
  const result: ConstraintComparison = { tightened: [], loosened: [], other: [] };
  const names = [
    ...Object.keys(before),
    ...Object.keys(after).filter((name) => !(name in before)),
  ];

  for (const name of names) {
    const a = before[name];
    const b = after[name];
    if (constraintEquals(a, b)) continue;

    const detail = `${name} ${describeValue(a)} → ${describeValue(b)}`;
    const direction = CONSTRAINT_DIRECTION[name];

    switch (direction) {
      case 'lower-bound':
      case 'upper-bound':
        result[compareBound(direction, a, b)].push({ name, detail });
        break;
      case 'flag':
        if (b === true && a !== true) result.tightened.push({ name, detail });
        else if (a === true && b !== true) result.loosened.push({ name, detail });
        else result.other.push({ name, detail });
        break;
      case 'set': {
        if (!Array.isArray(a) || !Array.isArray(b)) {
          // Introducing a value set restricts; dropping it relaxes.
          if (a === undefined) result.tightened.push({ name, detail });
          else if (b === undefined) result.loosened.push({ name, detail });
          else result.other.push({ name, detail });
          break;
        }
        const dropped = a.filter((v) => !b.includes(v));
        const added = b.filter((v) => !a.includes(v));
        if (dropped.length > 0) {
          result.tightened.push({ name, detail: `${name} removed ${JSON.stringify(dropped)}` });
        }
        if (added.length > 0) {
          result.loosened.push({ name, detail: `${name} added ${JSON.stringify(added)}` });
        }
        if (dropped.length === 0 && added.length === 0) {
          result.other.push({ name, detail: `${name} reordered` });
        }
        break;
      }
      default:
        result.other.push({ name, detail });
    }
  }

  return result;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function change(
  kind: ChangeKind,
  location: string[],
  description: string,
  before?: string,
  after?: string,
  context?: ChangeContext
): StructuralChange {
  const result: StructuralChange = {
    location: [...location],
    path: formatPath(location),
    kind,
    description,
  };
  if (before !== undefined) result.before = before;
  if (after !== undefined) result.after = after;
  if (context && Object.keys(context).length > 0) result.context = context;
  return result;
}

function metaContext(before?: SchemaNode, after?: SchemaNode): ChangeContext {
  const context: ChangeContext = {};
  if (before?.meta) context.oldMeta = before.meta;
  if (after?.meta) context.newMeta = after.meta;
  return context;
}

function containerContext(before: SchemaNode, after: SchemaNode): ChangeContext {
  const context: ChangeContext = {};
  if (before.meta) context.oldContainerMeta = before.meta;
  if (after.meta) context.newContainerMeta = after.meta;
  return context;
}

// ─── Engine ─────────────────────────────────────────────────────────────────

class Differ {
  readonly changes: StructuralChange[] = [];

  constructor(private readonly maxDepth: number) {}

  compare(
    before: SchemaNode,
    after: SchemaNode,
    location: string[],
    depth: number,
    renamedFrom?: string
  ): void {
    if (depth > this.maxDepth) {
      throw new ComparisonError(
        `maximum depth of ${this.maxDepth} exceeded at "${formatPath(location)}"`
      );
    }

    const path = formatPath(location);

    if (before.kind !== after.kind) {
      const context = metaContext(before, after);
      if (renamedFrom !== undefined) context.renamedFrom = renamedFrom;
      if (after.kind === 'union' && after.variants.some((v) => nodesEqual(v, before))) {
        context.widenedToUnion = true;
      }
      this.changes.push(
        change(
          'type_changed',
          location,
          `Type changed at "${path}" (${typeLabel(before)} → ${typeLabel(after)})`,
          typeLabel(before),
          typeLabel(after),
          context
        )
      );
      return; // Don't recurse further on different kinds
    }

    switch (before.kind) {
      case 'scalar':
        if (after.kind === 'scalar') this.compareScalars(before, after, location, renamedFrom);
        return;
      case 'object':
        if (after.kind === 'object') this.compareObjects(before, after, location, depth);
        return;
      case 'array':
        if (after.kind === 'array') this.compareArrays(before, after, location, depth);
        return;
      case 'union':
        if (after.kind === 'union') this.compareUnions(before, after, location, depth);
        return;
      case 'reference':
        if (after.kind === 'reference' && before.target !== after.target) {
          const context = metaContext(before, after);
          if (renamedFrom !== undefined) context.renamedFrom = renamedFrom;
          this.changes.push(
            change(
              'type_changed',
              location,
              `Reference changed at "${path}" (${before.target} → ${after.target})`,
              typeLabel(before),
              typeLabel(after),
              context
            )
          );
        }
        return;
    }
  }

  private compareScalars(
    before: ScalarNode,
    after: ScalarNode,
    location: string[],
    renamedFrom?: string
  ): void {
    const path = formatPath(location);

    if (before.type !== after.type) {
      const context = metaContext(before, after);
      if (renamedFrom !== undefined) context.renamedFrom = renamedFrom;
      this.changes.push(
        change(
          'type_changed',
          location,
          `Type changed at "${path}" (${before.type} → ${after.type})`,
          before.type,
          after.type,
          context
        )
      );
      return;
    }

    this.pushConstraintChanges(
      compareConstraints(before.constraints, after.constraints),
      location,
      metaContext(before, after)
    );
  }

  private compareArrays(before: ArrayNode, after: ArrayNode, location: string[], depth: number): void {
    const bounds = (node: ArrayNode): Constraints => {
      const result: Constraints = {};
      if (node.minItems !== undefined) result.minItems = node.minItems;
      if (node.maxItems !== undefined) result.maxItems = node.maxItems;
      return result;
    };

    this.pushConstraintChanges(
      compareConstraints(bounds(before), bounds(after)),
      location,
      metaContext(before, after)
    );
    this.compare(before.items, after.items, [...location, ARRAY_ITEMS], depth + 1);
  }

  private compareObjects(before: ObjectNode, after: ObjectNode, location: string[], depth: number): void {
    const consumed = new Set<string>();
    const byIdentity = new Map<string, ObjectField>();
    for (const field of after.fields) {
      if (field.node.identity !== undefined && !byIdentity.has(field.node.identity)) {
        byIdentity.set(field.node.identity, field);
      }
    }

    for (const oldField of before.fields) {
      const match = this.matchField(oldField, after, byIdentity, consumed);
      const oldLocation = [...location, oldField.name];

      if (!match) {
        this.changes.push(
          change(
            'removed',
            oldLocation,
            `Field removed: "${formatPath(oldLocation)}" (was: ${typeLabel(oldField.node)})`,
            typeLabel(oldField.node),
            undefined,
            {
              required: isRequired(before, oldField.name),
              ...metaContext(oldField.node, undefined),
              ...containerContext(before, after),
            }
          )
        );
        continue;
      }

      consumed.add(match.name);
      const newLocation = [...location, match.name];
      const renamed = match.name !== oldField.name;

      if (renamed) {
        this.changes.push(
          change(
            'renamed',
            oldLocation,
            `Field renamed: "${formatPath(oldLocation)}" → "${match.name}"`,
            oldField.name,
            match.name,
            { ...metaContext(oldField.node, match.node), ...containerContext(before, after) }
          )
        );
      }

      const wasRequired = isRequired(before, oldField.name);
      const nowRequired = isRequired(after, match.name);
      if (wasRequired !== nowRequired) {
        const from = wasRequired ? 'required' : 'optional';
        const to = nowRequired ? 'required' : 'optional';
        this.changes.push(
          change(
            'requiredness_changed',
            newLocation,
            `Field "${formatPath(newLocation)}" changed from ${from} to ${to}`,
            from,
            to,
            metaContext(oldField.node, match.node)
          )
        );
      }

      this.compare(
        oldField.node,
        match.node,
        newLocation,
        depth + 1,
        renamed ? oldField.name : undefined
      );
    }

    for (const field of after.fields) {
      if (consumed.has(field.name)) continue;
      const fieldLocation = [...location, field.name];
      this.changes.push(
        change(
          'added',
          fieldLocation,
          `Field added: "${formatPath(fieldLocation)}" (${typeLabel(field.node)})`,
          undefined,
          typeLabel(field.node),
          {
            required: isRequired(after, field.name),
            ...metaContext(undefined, field.node),
            ...containerContext(before, after),
          }
        )
      );
    }
  }

  /**
   * Identity keys win over names; a same-named member with a different
   * identity is a different member.
   */
  private matchField(
    oldField: ObjectField,
    after: ObjectNode,
    byIdentity: Map<string, ObjectField>,
    consumed: Set<string>
  ): ObjectField | undefined {
    const identity = oldField.node.identity;

    if (identity !== undefined) {
      const candidate = byIdentity.get(identity);
      if (candidate && !consumed.has(candidate.name)) return candidate;
    }

    const candidate = after.fields.find((f) => f.name === oldField.name);
    if (!candidate || consumed.has(candidate.name)) return undefined;

    const otherIdentity = candidate.node.identity;
    if (identity !== undefined && otherIdentity !== undefined && identity !== otherIdentity) {
      return undefined;
    }
    return candidate;
  }

  private compareUnions(before: UnionNode, after: UnionNode, location: string[], depth: number): void {
    const pairs = new Map<number, number>();
    const used = new Set<number>();

    const pairUp = (matches: (a: SchemaNode, b: SchemaNode) => boolean): void => {
      before.variants.forEach((variant, i) => {
        if (pairs.has(i)) return;
        const j = after.variants.findIndex((candidate, k) => !used.has(k) && matches(variant, candidate));
        if (j >= 0) {
          pairs.set(i, j);
          used.add(j);
        }
      });
    };

    // Exact matches first, then same-shape matches
    pairUp(nodesEqual);
    pairUp(sameShape);

    before.variants.forEach((variant, i) => {
      const variantLocation = [...location, variantSegment(i)];
      const j = pairs.get(i);
      if (j === undefined) {
        this.changes.push(
          change(
            'removed',
            variantLocation,
            `Union variant removed: "${formatPath(variantLocation)}" (was: ${typeLabel(variant)})`,
            typeLabel(variant),
            undefined,
            { required: false, ...metaContext(variant, undefined), ...containerContext(before, after) }
          )
        );
        return;
      }
      // Changes inside a paired variant are located in the new tree
      this.compare(variant, after.variants[j], [...location, variantSegment(j)], depth + 1);
    });

    after.variants.forEach((variant, j) => {
      if (used.has(j)) return;
      const variantLocation = [...location, variantSegment(j)];
      this.changes.push(
        change(
          'added',
          variantLocation,
          `Union variant added: "${formatPath(variantLocation)}" (${typeLabel(variant)})`,
          undefined,
          typeLabel(variant),
          { required: false, ...metaContext(undefined, variant), ...containerContext(before, after) }
        )
      );
    });
  }

  private pushConstraintChanges(
    comparison: ConstraintComparison,
    location: string[],
    context: ChangeContext
  ): void {
    const path = formatPath(location);
    const groups: Array<[ChangeKind, string, ConstraintDelta[]]> = [
      ['constraint_tightened', 'Constraint tightened', comparison.tightened],
      ['constraint_loosened', 'Constraint loosened', comparison.loosened],
      ['other', 'Constraint changed', comparison.other],
    ];

    for (const [kind, label, deltas] of groups) {
      if (deltas.length === 0) continue;
      this.changes.push(
        change(
          kind,
          location,
          `${label} at "${path}": ${deltas.map((d) => d.detail).join(', ')}`,
          undefined,
          undefined,
          { ...context, constraints: deltas.map((d) => d.name) }
        )
      );
    }
  }
}

function sameShape(a: SchemaNode, b: SchemaNode): boolean {
  if (a.kind !== b.kind) return false;
  if (a.kind === 'scalar' && b.kind === 'scalar') return a.type === b.type;
  if (a.kind === 'reference' && b.kind === 'reference') return a.target === b.target;
  return true;
}

// ─── Main Diff ──────────────────────────────────────────────────────────────

/**
 * Compare two schema trees and return all detected changes, in traversal order:
 * members in the old tree's declared order, then members only the new tree has.
 *
 * @param before - The previous/baseline tree
 * @param after  - The current/new tree
 */
export function diffNodes(
  before: SchemaNode,
  after: SchemaNode,
  options: DiffOptions = {}
): StructuralChange[] {
  if (before.kind !== after.kind) {
    throw new ComparisonError(`cannot compare a ${before.kind} root against a ${after.kind} root`);
  }

  const differ = new Differ(options.maxDepth ?? DEFAULT_MAX_DEPTH);
  differ.compare(before, after, [], 0);
  return differ.changes;
}
