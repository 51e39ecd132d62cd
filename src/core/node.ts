/**
 * Helpers over the normalized schema model shared by the diff engine,
 * the planner and the format adapters.
 */

import { ConstraintValue, NodeMetadata, ObjectNode, SchemaNode } from './types';

export const ARRAY_ITEMS = '[]';

export const DEFAULT_MAX_DEPTH = 64;

export function variantSegment(index: number): string {
  return `oneOf[${index}]`;
}

/**
 * Render a location as a dotted path: ['user', 'tags', '[]'] → 'user.tags[]'.
 */
export function formatPath(location: readonly string[]): string {
  if (location.length === 0) return '(root)';
  let path = '';
  for (const segment of location) {
    if (segment === ARRAY_ITEMS || path === '') {
      path += segment;
    } else {
      path += `.${segment}`;
    }
  }
  return path;
}

export function typeLabel(node: SchemaNode): string {
  switch (node.kind) {
    case 'scalar':
      return node.type;
    case 'object':
      return 'object';
    case 'array':
      return `array<${typeLabel(node.items)}>`;
    case 'union':
      return `oneOf(${node.variants.map(typeLabel).join(', ')})`;
    case 'reference':
      return `ref(${node.target})`;
  }
}

export function isRequired(node: ObjectNode, name: string): boolean {
  return node.required.includes(name);
}

export function fieldOf(node: ObjectNode, name: string): SchemaNode | undefined {
  return node.fields.find((f) => f.name === name)?.node;
}

/**
 * Resolve a location against a tree; undefined when the path does not exist.
 */
export function nodeAt(root: SchemaNode, location: readonly string[]): SchemaNode | undefined {
  let current: SchemaNode | undefined = root;

  for (const segment of location) {
    if (!current) return undefined;

    if (current.kind === 'object') {
      current = fieldOf(current, segment);
    } else if (current.kind === 'array' && segment === ARRAY_ITEMS) {
      current = current.items;
    } else if (current.kind === 'union') {
      const match = /^oneOf\[(\d+)\]$/.exec(segment);
      current = match ? current.variants[Number(match[1])] : undefined;
    } else {
      return undefined;
    }
  }

  return current;
}

export function constraintEquals(a: ConstraintValue | undefined, b: ConstraintValue | undefined): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((v, i) => v === b[i]);
  }
  return a === b;
}

/**
 * Deep structural equality; metadata and identity keys are ignored.
 */
export function nodesEqual(a: SchemaNode, b: SchemaNode): boolean {
  switch (a.kind) {
    case 'scalar': {
      if (b.kind !== 'scalar' || a.type !== b.type) return false;
      const keys = new Set([...Object.keys(a.constraints), ...Object.keys(b.constraints)]);
      for (const key of keys) {
        if (!constraintEquals(a.constraints[key], b.constraints[key])) return false;
      }
      return true;
    }
    case 'object': {
      if (b.kind !== 'object' || a.fields.length !== b.fields.length) return false;
      if (a.required.length !== b.required.length) return false;
      if (!a.required.every((name) => b.required.includes(name))) return false;
      return a.fields.every((field) => {
        const other = fieldOf(b, field.name);
        return other !== undefined && nodesEqual(field.node, other);
      });
    }
    case 'array':
      return (
        b.kind === 'array' &&
        a.minItems === b.minItems &&
        a.maxItems === b.maxItems &&
        nodesEqual(a.items, b.items)
      );
    case 'union':
      return (
        b.kind === 'union' &&
        a.variants.length === b.variants.length &&
        a.variants.every((v, i) => nodesEqual(v, b.variants[i]))
      );
    case 'reference':
      return b.kind === 'reference' && a.target === b.target;
  }
}

export function isDeprecated(meta: NodeMetadata | undefined): boolean {
  if (!meta) return false;
  return Boolean(
    meta['json-schema']?.deprecated || meta.openapi?.deprecated || meta.protobuf?.deprecated
  );
}
