/**
 * JSON Schema Adapter
 *
 * Normalizes JSON Schema documents (draft-04 through 2020-12) into the schema
 * model. Local references are inlined; a reference that would recurse into
 * itself stays a reference node.
 */

import { ParseError } from '../core/errors';
import { ARRAY_ITEMS, DEFAULT_MAX_DEPTH } from '../core/node';
import {
  ArrayNode,
  Constraints,
  FormatAdapter,
  MigrationInstruction,
  NodeMetadata,
  ObjectField,
  RenderContext,
  Schema,
  SchemaNode,
} from '../core/types';
import { JsonObject, describeInstruction, isObject, parseJson, resolvePointer, toConstraintValue } from './common';

const SCALAR_CONSTRAINTS = [
  'minimum',
  'maximum',
  'exclusiveMinimum',
  'exclusiveMaximum',
  'multipleOf',
  'minLength',
  'maxLength',
  'pattern',
  'format',
  'enum',
  'const',
];

export interface JsonSchemaNormalizeOptions {
  /** Look up the schema a $ref points to; undefined when it cannot be resolved */
  resolve: (ref: string) => unknown;

  /** Metadata stamped on the node built from a schema object */
  meta: (schema: JsonObject) => NodeMetadata | undefined;

  maxDepth: number;
}

function withMeta(node: SchemaNode, meta: NodeMetadata | undefined): SchemaNode {
  return meta ? { ...node, meta } : node;
}

function inferScalarType(schema: JsonObject): string {
  const sample = Array.isArray(schema.enum) ? schema.enum[0] : schema.const;
  if (typeof sample === 'string') return 'string';
  if (typeof sample === 'boolean') return 'boolean';
  if (typeof sample === 'number') return Number.isInteger(sample) ? 'integer' : 'number';
  if (sample === null && (Array.isArray(schema.enum) || 'const' in schema)) return 'null';
  return 'any';
}

/**
 * Fold allOf members into a single schema: properties and required lists are
 * merged, other keywords keep their first value.
 */
function mergeAllOf(schema: JsonObject, resolve: (ref: string) => unknown): JsonObject {
  const { allOf, ...rest } = schema;
  const merged: JsonObject = { ...rest };
  const properties: JsonObject = isObject(rest.properties) ? { ...rest.properties } : {};
  const required = new Set<string>(Array.isArray(rest.required) ? rest.required.filter(isString) : []);

  for (const raw of Array.isArray(allOf) ? allOf : []) {
    const member = isObject(raw) && typeof raw.$ref === 'string' ? resolve(raw.$ref) : raw;
    if (!isObject(member)) continue;

    if (isObject(member.properties)) Object.assign(properties, member.properties);
    if (Array.isArray(member.required)) member.required.filter(isString).forEach((r) => required.add(r));

    for (const [key, value] of Object.entries(member)) {
      if (key !== 'properties' && key !== 'required' && !(key in merged)) merged[key] = value;
    }
  }

  if (Object.keys(properties).length > 0) {
    merged.properties = properties;
    if (merged.type === undefined) merged.type = 'object';
  }
  if (required.size > 0) merged.required = [...required];
  return merged;
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * Normalize one JSON Schema value (object or boolean) into a SchemaNode.
 */
export function normalizeJsonSchema(
  schema: unknown,
  options: JsonSchemaNormalizeOptions,
  refStack: readonly string[] = [],
  depth = 0
): SchemaNode {
  if (depth > options.maxDepth) {
    throw new ParseError(`Schema nesting exceeds ${options.maxDepth} levels`);
  }

  if (schema === true) return { kind: 'scalar', type: 'any', constraints: {} };
  if (schema === false) return { kind: 'scalar', type: 'never', constraints: {} };
  if (!isObject(schema)) {
    throw new ParseError(`Expected a schema object, got ${Array.isArray(schema) ? 'array' : typeof schema}`);
  }

  const meta = options.meta(schema);
  const next = (child: unknown, stack: readonly string[] = refStack): SchemaNode =>
    normalizeJsonSchema(child, options, stack, depth + 1);

  if (typeof schema.$ref === 'string') {
    const ref = schema.$ref;
    const target = refStack.includes(ref) ? undefined : options.resolve(ref);
    if (target === undefined) return withMeta({ kind: 'reference', target: ref }, meta);
    return next(target, [...refStack, ref]);
  }

  const variants = Array.isArray(schema.oneOf) ? schema.oneOf : schema.anyOf;
  if (Array.isArray(variants)) {
    return withMeta({ kind: 'union', variants: variants.map((v) => next(v)) }, meta);
  }

  if (Array.isArray(schema.allOf)) {
    return normalizeJsonSchema(mergeAllOf(schema, options.resolve), options, refStack, depth);
  }

  const { type } = schema;

  if (Array.isArray(type)) {
    const types = type.filter(isString);
    if (types.length === 1) return normalizeJsonSchema({ ...schema, type: types[0] }, options, refStack, depth);
    return withMeta({ kind: 'union', variants: types.map((t) => next({ ...schema, type: t })) }, meta);
  }

  if (type === 'object' || (type === undefined && isObject(schema.properties))) {
    const properties = isObject(schema.properties) ? schema.properties : {};
    const fields: ObjectField[] = Object.entries(properties).map(([name, child]) => ({
      name,
      node: next(child),
    }));
    const required = Array.isArray(schema.required) ? schema.required.filter(isString) : [];
    return withMeta({ kind: 'object', fields, required }, meta);
  }

  if (type === 'array' || (type === undefined && schema.items !== undefined)) {
    let items: SchemaNode;
    if (Array.isArray(schema.items)) {
      // Tuple form: any of the positional schemas
      items =
        schema.items.length === 1
          ? next(schema.items[0])
          : { kind: 'union', variants: schema.items.map((item) => next(item)) };
    } else {
      items = next(schema.items ?? true);
    }
    const node: ArrayNode = { kind: 'array', items };
    if (typeof schema.minItems === 'number') node.minItems = schema.minItems;
    if (typeof schema.maxItems === 'number') node.maxItems = schema.maxItems;
    return withMeta(node, meta);
  }

  const constraints: Constraints = {};
  for (const name of SCALAR_CONSTRAINTS) {
    const value = toConstraintValue(schema[name]);
    if (value !== undefined) constraints[name] = value;
  }

  return withMeta(
    { kind: 'scalar', type: typeof type === 'string' ? type : inferScalarType(schema), constraints },
    meta
  );
}

// ─── Rendering ──────────────────────────────────────────────────────────────

function escapePointer(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * JSON pointer of a location inside the schema document:
 * ['user', 'tags', '[]'] → '#/properties/user/properties/tags/items'.
 */
export function schemaPointer(location: readonly string[]): string {
  let pointer = '#';
  for (const segment of location) {
    const variant = /^oneOf\[(\d+)\]$/.exec(segment);
    if (segment === ARRAY_ITEMS) pointer += '/items';
    else if (variant) pointer += `/oneOf/${variant[1]}`;
    else pointer += `/properties/${escapePointer(segment)}`;
  }
  return pointer;
}

function renderJsonSchema(instruction: MigrationInstruction, context: RenderContext): string {
  return describeInstruction(instruction, context, schemaPointer(instruction.location));
}

// ─── Adapter ────────────────────────────────────────────────────────────────

function parseDocument(content: string): unknown {
  const document = parseJson(content);
  if (!isObject(document) && typeof document !== 'boolean') {
    throw new ParseError('Failed to parse schema: a JSON Schema must be an object or a boolean');
  }
  return document;
}

export const jsonSchemaAdapter: FormatAdapter = {
  format: 'json-schema',

  check(content: string): void {
    parseDocument(content);
  },

  normalize(schema: Schema): SchemaNode {
    const document = parseDocument(schema.content);
    return normalizeJsonSchema(document, {
      resolve: (ref) => resolvePointer(document, ref),
      meta: (s) => (s.deprecated === true ? { 'json-schema': { deprecated: true } } : undefined),
      maxDepth: DEFAULT_MAX_DEPTH,
    });
  },

  render: renderJsonSchema,
};
