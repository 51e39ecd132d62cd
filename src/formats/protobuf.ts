/**
 * Protocol Buffers Adapter
 *
 * Normalizes .proto sources with protobufjs. The root object holds one member
 * per message or enum, keyed by its name qualified with enclosing messages
 * (package names are dropped). Fields and enum values carry their number as
 * identity, so a renamed field still matches its old self.
 */

import { Enum, Field, MapField, Namespace, Root, Type, parse } from 'protobufjs';
import { FormatSpecificError, ParseError, errorMessage } from '../core/errors';
import { ARRAY_ITEMS, nodeAt } from '../core/node';
import { memberOf, targetLocation } from '../core/planner';
import {
  FormatAdapter,
  MigrationInstruction,
  ObjectField,
  ObjectNode,
  ProtobufMetadata,
  RenderContext,
  ScalarNode,
  Schema,
  SchemaNode,
} from '../core/types';

const SCALAR_TYPES = new Set([
  'double',
  'float',
  'int32',
  'int64',
  'uint32',
  'uint64',
  'sint32',
  'sint64',
  'fixed32',
  'fixed64',
  'sfixed32',
  'sfixed64',
  'bool',
  'string',
  'bytes',
]);

// ─── Parsing ────────────────────────────────────────────────────────────────

export function parseProto(content: string): Root {
  // Without a syntax statement protobufjs assumes proto2 and rejects unlabelled fields
  const source = /^\s*(syntax|edition)\s*=/m.test(content) ? content : `syntax = "proto3";\n${content}`;

  let root: Root;
  try {
    root = parse(source, { keepCase: true }).root;
  } catch (error) {
    throw new FormatSpecificError('protobuf', errorMessage(error), error);
  }

  const definitions = collectDefinitions(root);
  if (definitions.length === 0) {
    throw new ParseError('Failed to parse schema: no message or enum definitions found');
  }
  return root;
}

// ─── Normalization ──────────────────────────────────────────────────────────

function label(field: Field): ProtobufMetadata['label'] {
  if (field.repeated) return 'repeated';
  if (field.required) return 'required';
  if (field.options?.proto3_optional === true) return 'optional';
  // Field does not declare rule in every protobufjs release
  return 'rule' in field && field.rule === 'optional' ? 'optional' : undefined;
}

function normalizeField(field: Field): SchemaNode {
  let base: SchemaNode;
  if (field instanceof MapField) {
    base = { kind: 'scalar', type: `map<${field.keyType},${field.type}>`, constraints: {} };
  } else if (SCALAR_TYPES.has(field.type)) {
    base = { kind: 'scalar', type: field.type, constraints: {} };
  } else {
    base = { kind: 'reference', target: field.type };
  }

  const meta: ProtobufMetadata = { tag: field.id };
  const fieldLabel = label(field);
  if (fieldLabel) meta.label = fieldLabel;
  if (field.options?.deprecated === true) meta.deprecated = true;

  const node: SchemaNode = field.repeated ? { kind: 'array', items: base } : base;
  return { ...node, identity: `tag:${field.id}`, meta: { protobuf: meta } };
}

function reservedMeta(reserved: Array<number[] | string> | undefined): ProtobufMetadata | undefined {
  const reservedRanges: Array<[number, number]> = [];
  const reservedNames: string[] = [];
  for (const entry of reserved ?? []) {
    if (typeof entry === 'string') reservedNames.push(entry);
    else if (entry.length > 0) reservedRanges.push([entry[0], entry.length > 1 ? entry[1] : entry[0]]);
  }
  return reservedRanges.length > 0 || reservedNames.length > 0 ? { reservedRanges, reservedNames } : undefined;
}

function normalizeMessage(type: Type): ObjectNode {
  const fields: ObjectField[] = type.fieldsArray.map((field) => ({
    name: field.name,
    node: normalizeField(field),
  }));
  const required = type.fieldsArray.filter((field) => field.required).map((field) => field.name);

  const node: ObjectNode = { kind: 'object', fields, required };
  const reserved = reservedMeta(type.reserved);
  if (reserved) node.meta = { protobuf: reserved };
  return node;
}

function normalizeEnum(definition: Enum): ObjectNode {
  const values = Object.entries(definition.values);
  const fields: ObjectField[] = values.map(([name, number]) => {
    const node: ScalarNode = {
      kind: 'scalar',
      type: 'enum value',
      constraints: {},
      identity: `tag:${number}`,
      meta: { protobuf: { tag: number } },
    };
    return { name, node };
  });

  return {
    kind: 'object',
    fields,
    required: [],
    meta: { protobuf: { ...reservedMeta(definition.reserved), enum: true, enumValues: definition.values } },
  };
}

function isEnum(node: SchemaNode | undefined): boolean {
  return node?.meta?.protobuf?.enum === true;
}

function collectDefinitions(namespace: Namespace, prefix = '', out: ObjectField[] = []): ObjectField[] {
  for (const nested of namespace.nestedArray) {
    if (nested instanceof Type) {
      const name = prefix ? `${prefix}.${nested.name}` : nested.name;
      out.push({ name, node: normalizeMessage(nested) });
      collectDefinitions(nested, name, out);
    } else if (nested instanceof Enum) {
      out.push({ name: prefix ? `${prefix}.${nested.name}` : nested.name, node: normalizeEnum(nested) });
    } else if (nested instanceof Namespace) {
      // Package namespaces
      collectDefinitions(nested, prefix, out);
    }
  }
  return out;
}

// ─── Rendering ──────────────────────────────────────────────────────────────

function protoType(node: SchemaNode): string {
  switch (node.kind) {
    case 'scalar':
      return node.type;
    case 'reference':
      return node.target;
    case 'array':
      return protoType(node.items);
    default:
      return node.kind;
  }
}

/** Field declaration as it would appear in the .proto source. */
function fieldDeclaration(name: string, node: SchemaNode): string {
  const meta = node.meta?.protobuf;
  const prefix = meta?.label ? `${meta.label} ` : '';
  const tag = meta?.tag !== undefined ? ` = ${meta.tag}` : '';
  return `${prefix}${protoType(node)} ${name}${tag};`;
}

function renderEnumValue(instruction: MigrationInstruction, context: RenderContext): string {
  const { change, location, op } = instruction;
  const scope = `enum ${location[0]}:`;
  const value = location[1];
  const oldNode = nodeAt(context.oldTree, location.slice(0, 2));
  const newNode = nodeAt(context.newTree, targetLocation(instruction).slice(0, 2));
  const tag = (oldNode ?? newNode)?.meta?.protobuf?.tag;

  switch (op) {
    case 'add':
      return tag !== undefined ? `${scope} add value ${value} = ${tag};` : `${scope} ${change.description}`;
    case 'remove':
      return tag !== undefined
        ? `${scope} remove value ${value} and add "reserved ${tag};"`
        : `${scope} remove value ${value}`;
    case 'rename':
      return `${scope} rename value ${value} to ${change.after ?? ''}${tag !== undefined ? ` (number ${tag})` : ''}`;
    default:
      return `${scope} ${change.description}`;
  }
}

function renderProtobuf(instruction: MigrationInstruction, context: RenderContext): string {
  const { change, location, op } = instruction;
  const definition = location[0] ?? '(root)';

  if (location.length <= 1) {
    const node = nodeAt(op === 'remove' ? context.oldTree : context.newTree, location);
    const what = isEnum(node) ? 'enum' : 'message';
    switch (op) {
      case 'add':
        return `Add ${what} ${definition}`;
      case 'remove':
        return `Remove ${what} ${definition}`;
      default:
        return `${what} ${definition}: ${change.description}`;
    }
  }

  const container = nodeAt(op === 'remove' ? context.oldTree : context.newTree, location.slice(0, 1));
  if (isEnum(container)) return renderEnumValue(instruction, context);

  const field = location[1];
  const oldNode = nodeAt(context.oldTree, location.slice(0, 2));
  const newNode = nodeAt(context.newTree, targetLocation(instruction).slice(0, 2));
  const tag = (oldNode ?? newNode)?.meta?.protobuf?.tag;
  const tagNote = tag !== undefined ? ` (field number ${tag})` : '';
  const scope = `message ${definition}:`;

  switch (op) {
    case 'add':
      return location.length === 2 && newNode
        ? `${scope} add field ${fieldDeclaration(field, newNode)}`
        : `${scope} ${change.description}`;
    case 'remove':
      return tag !== undefined && location.length === 2
        ? `${scope} remove field ${field} and add "reserved ${tag};"`
        : `${scope} remove ${memberOf(location)} from ${field}`;
    case 'rename':
      return `${scope} rename field ${field} to ${change.after ?? ''}${tagNote}`;
    case 'alter_type': {
      const inner = location.length > 2 && location[2] === ARRAY_ITEMS ? ' element' : '';
      return `${scope} change${inner} type of field ${field}${tagNote} from ${change.before ?? ''} to ${change.after ?? ''}`;
    }
    case 'make_required':
      return `${scope} mark field ${field} as required`;
    case 'make_optional':
      return `${scope} mark field ${field} as optional`;
    default:
      return `${scope} ${change.description}`;
  }
}

// ─── Adapter ────────────────────────────────────────────────────────────────

export const protobufAdapter: FormatAdapter = {
  format: 'protobuf',

  check(content: string): void {
    parseProto(content);
  },

  normalize(schema: Schema): SchemaNode {
    return { kind: 'object', fields: collectDefinitions(parseProto(schema.content)), required: [] };
  },

  render: renderProtobuf,
};
