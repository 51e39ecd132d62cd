/**
 * Helpers shared by the JSON-based format adapters.
 */

import { ParseError, errorMessage } from '../core/errors';
import { nodeAt } from '../core/node';
import { targetLocation } from '../core/planner';
import { ConstraintValue, MigrationInstruction, RenderContext } from '../core/types';

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON string into a JavaScript value.
 * Handles common edge cases like BOM markers, trailing commas (lenient mode).
 */
export function parseJson(input: string): unknown {
  // Remove BOM if present
  let cleaned = input.trim();
  if (cleaned.charCodeAt(0) === 0xfeff) {
    cleaned = cleaned.substring(1);
  }

  try {
    return JSON.parse(cleaned);
  } catch (error) {
    // Try lenient parsing: strip trailing commas
    try {
      const lenient = cleaned.replace(/,\s*([\]}])/g, '$1');
      return JSON.parse(lenient);
    } catch {
      throw new ParseError(`Failed to parse JSON: ${errorMessage(error)}`, error);
    }
  }
}

/**
 * Resolve a local JSON pointer reference ('#/definitions/User') against a
 * document. Returns undefined for remote or dangling references.
 */
export function resolvePointer(document: unknown, ref: string): unknown {
  if (ref === '#') return document;
  if (!ref.startsWith('#/')) return undefined;

  let current: unknown = document;
  for (const raw of ref.slice(2).split('/')) {
    const token = decodeURIComponent(raw).replace(/~1/g, '/').replace(/~0/g, '~');
    if (Array.isArray(current)) {
      current = current[Number(token)];
    } else if (isObject(current)) {
      current = current[token];
    } else {
      return undefined;
    }
    if (current === undefined) return undefined;
  }
  return current;
}

export function toConstraintValue(value: unknown): ConstraintValue | undefined {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value === null
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    const items: Array<string | number | boolean | null> = [];
    for (const item of value) {
      if (
        typeof item === 'string' ||
        typeof item === 'number' ||
        typeof item === 'boolean' ||
        item === null
      ) {
        items.push(item);
      } else {
        return undefined;
      }
    }
    return items;
  }
  return undefined;
}

/**
 * Describe the new values of the constraints an instruction touches,
 * e.g. 'maximum=120, minimum removed'.
 */
export function constraintAssignments(instruction: MigrationInstruction, context: RenderContext): string {
  const names = instruction.change.context?.constraints ?? [];
  const node = nodeAt(context.newTree, targetLocation(instruction));
  if (!node || names.length === 0) return instruction.change.description;

  return names
    .map((name) => {
      let value: ConstraintValue | undefined;
      if (node.kind === 'scalar') {
        value = node.constraints[name];
      } else if (node.kind === 'array') {
        value = name === 'minItems' ? node.minItems : name === 'maxItems' ? node.maxItems : undefined;
      }
      return value === undefined ? `${name} removed` : `${name}=${JSON.stringify(value)}`;
    })
    .join(', ');
}

/**
 * Generic sentence for an instruction once the adapter has rendered the
 * member it applies to.
 */
export function describeInstruction(
  instruction: MigrationInstruction,
  context: RenderContext,
  subject: string
): string {
  const { change } = instruction;

  switch (instruction.op) {
    case 'add':
      return `Add ${subject} (${change.after ?? 'unknown'}${change.context?.required ? ', required' : ''})`;
    case 'remove':
      return `Remove ${subject}`;
    case 'rename':
      return `Rename ${subject} to "${change.after ?? ''}"`;
    case 'alter_type':
      return `Change type of ${subject} from ${change.before ?? 'unknown'} to ${change.after ?? 'unknown'}`;
    case 'tighten':
    case 'loosen':
    case 'modify':
      return `Update ${subject}: ${constraintAssignments(instruction, context)}`;
    case 'make_required':
      return `Make ${subject} required`;
    case 'make_optional':
      return `Make ${subject} optional`;
  }
}
