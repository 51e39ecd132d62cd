/**
 * Compatibility Rule Set
 *
 * Table-driven policy mapping each structural change to a severity. Every
 * format gets its own table: format-specific rules first, then the shared
 * defaults. The first rule whose kind matches and whose predicate holds wins.
 */

import { InvalidFormatError } from './errors';
import { isDeprecated } from './node';
import {
  Change,
  ChangeKind,
  NodeMetadata,
  SCHEMA_FORMATS,
  SchemaFormat,
  Severity,
  StructuralChange,
  isSchemaFormat,
} from './types';

// ─── Rule Model ─────────────────────────────────────────────────────────────

export interface CompatibilityRule {
  /** Stable id, usable as a key in severity overrides */
  id: string;
  kind: ChangeKind;
  severity: Severity;

  /** Remediation hint attached to the report issue */
  hint: string;

  applies?: (change: StructuralChange, table: RuleTable) => boolean;
}

export interface RuleTable {
  format: SchemaFormat;

  /** Minimum score for a compatible verdict */
  threshold: number;

  /** type → types it can safely widen into */
  widenings: Readonly<Record<string, readonly string[]>>;

  rules: readonly CompatibilityRule[];
}

export interface RulePolicy {
  /** Per-format score thresholds (default: 70) */
  thresholds?: Partial<Record<SchemaFormat, number>>;

  /** Rule id → severity, replacing the rule's default severity */
  severityOverrides?: Record<string, Severity>;
}

export interface Classification {
  severity: Severity;
  rule: string;
  hint: string;
}

export const DEFAULT_THRESHOLD = 70;

// ─── Predicates ─────────────────────────────────────────────────────────────

interface SizedType {
  base: string;
  length?: number;
}

/** Split a sized type such as 'varchar(20)' into its base type and length. */
function sizedType(type: string): SizedType {
  const match = /^(.+?)\((\d+)\)(\[\])?$/.exec(type);
  if (!match) return { base: type };
  return { base: `${match[1]}${match[3] ?? ''}`, length: Number(match[2]) };
}

function isWidening(change: StructuralChange, table: RuleTable): boolean {
  if (change.context?.widenedToUnion) return true;
  if (change.before === undefined || change.after === undefined) return false;

  const before = sizedType(change.before);
  const after = sizedType(change.after);
  // A missing length is unbounded
  const shrinks = after.length !== undefined && (before.length === undefined || after.length < before.length);
  if (before.base === after.base) return !shrinks;
  if (shrinks && before.length !== undefined) return false;
  return table.widenings[before.base]?.includes(after.base) ?? false;
}

function direction(change: StructuralChange): string | undefined {
  const ctx = change.context;
  return ctx?.newMeta?.openapi?.direction ?? ctx?.oldMeta?.openapi?.direction;
}

function isResponse(change: StructuralChange): boolean {
  return direction(change) === 'response';
}

function inReservedRange(tag: number, meta: NodeMetadata | undefined): boolean {
  const ranges = meta?.protobuf?.reservedRanges ?? [];
  return ranges.some(([start, end]) => tag >= start && tag <= end);
}

function tagReservedIn(
  change: StructuralChange,
  container: NodeMetadata | undefined,
  name?: string
): boolean {
  const tag = change.context?.oldMeta?.protobuf?.tag ?? change.context?.newMeta?.protobuf?.tag;
  if (tag !== undefined && inReservedRange(tag, container)) return true;
  return name !== undefined && (container?.protobuf?.reservedNames ?? []).includes(name);
}

function memberName(change: StructuralChange): string | undefined {
  return change.location[change.location.length - 1];
}

// ─── Shared Defaults ────────────────────────────────────────────────────────

const DEFAULT_RULES: CompatibilityRule[] = [
  {
    id: 'added-required-member',
    kind: 'added',
    severity: 'breaking',
    hint: 'Make the new member optional or give it a default so existing data and clients stay valid.',
    applies: (c) => c.context?.required === true,
  },
  {
    id: 'added-optional-member',
    kind: 'added',
    severity: 'info',
    hint: 'No action needed.',
  },
  {
    id: 'removed-member',
    kind: 'removed',
    severity: 'breaking',
    hint: 'Deprecate the member first and remove it in a later major version.',
  },
  {
    id: 'type-widened',
    kind: 'type_changed',
    severity: 'warning',
    hint: 'Readers built against the old type may not handle the wider range of values.',
    applies: isWidening,
  },
  {
    id: 'type-narrowed',
    kind: 'type_changed',
    severity: 'breaking',
    hint: 'Introduce a new member with the new type and migrate readers before removing the old one.',
  },
  {
    id: 'constraint-tightened-new-member',
    kind: 'constraint_tightened',
    severity: 'info',
    hint: 'No action needed: the member is new in this version.',
    applies: (c) => c.context?.onAddedMember === true,
  },
  {
    id: 'constraint-tightened',
    kind: 'constraint_tightened',
    severity: 'breaking',
    hint: 'Existing values may violate the stricter constraint; validate or backfill data first.',
  },
  {
    id: 'constraint-loosened',
    kind: 'constraint_loosened',
    severity: 'info',
    hint: 'No action needed.',
  },
  {
    id: 'made-required',
    kind: 'requiredness_changed',
    severity: 'breaking',
    hint: 'Populate the member for all existing data before making it required.',
    applies: (c) => c.after === 'required',
  },
  {
    id: 'made-optional',
    kind: 'requiredness_changed',
    severity: 'warning',
    hint: 'Readers that assume the member is present must handle its absence.',
  },
  {
    id: 'renamed-member',
    kind: 'renamed',
    severity: 'breaking',
    hint: 'Keep the old name as an alias until all clients use the new one.',
  },
  {
    id: 'other-change',
    kind: 'other',
    severity: 'warning',
    hint: 'Review this change manually.',
  },
];

// ─── Format Rules ───────────────────────────────────────────────────────────

const JSON_SCHEMA_RULES: CompatibilityRule[] = [
  {
    id: 'json-schema-removed-deprecated',
    kind: 'removed',
    severity: 'warning',
    hint: 'The member was deprecated; confirm no producer still sends it.',
    applies: (c) => isDeprecated(c.context?.oldMeta),
  },
];

const OPENAPI_RULES: CompatibilityRule[] = [
  {
    id: 'openapi-removed-deprecated',
    kind: 'removed',
    severity: 'warning',
    hint: 'The element was deprecated; confirm no client still depends on it.',
    applies: (c) => isDeprecated(c.context?.oldMeta),
  },
  {
    id: 'openapi-response-member-added',
    kind: 'added',
    severity: 'info',
    hint: 'No action needed: clients ignore response members they do not know.',
    applies: isResponse,
  },
  {
    id: 'openapi-response-type-changed',
    kind: 'type_changed',
    severity: 'breaking',
    hint: 'Clients parse responses with the old type; version the response instead.',
    applies: isResponse,
  },
  {
    id: 'openapi-response-constraint-tightened',
    kind: 'constraint_tightened',
    severity: 'info',
    hint: 'No action needed: responses narrower than before still satisfy clients.',
    applies: isResponse,
  },
  {
    id: 'openapi-response-constraint-loosened',
    kind: 'constraint_loosened',
    severity: 'breaking',
    hint: 'Clients may receive values they reject; keep response constraints stable.',
    applies: isResponse,
  },
  {
    id: 'openapi-response-made-required',
    kind: 'requiredness_changed',
    severity: 'info',
    hint: 'No action needed: the member is now always returned.',
    applies: (c) => isResponse(c) && c.after === 'required',
  },
  {
    id: 'openapi-response-made-optional',
    kind: 'requiredness_changed',
    severity: 'breaking',
    hint: 'Clients expect this member in every response; keep returning it.',
    applies: isResponse,
  },
];

const PROTOBUF_RULES: CompatibilityRule[] = [
  {
    id: 'protobuf-reserved-tag-reuse',
    kind: 'added',
    severity: 'breaking',
    hint: 'Pick a field number that was never used or reserved in this message.',
    applies: (c) => tagReservedIn(c, c.context?.oldContainerMeta, memberName(c)),
  },
  {
    id: 'protobuf-removed-reserved',
    kind: 'removed',
    severity: 'warning',
    hint: 'No action needed: the field number is reserved.',
    applies: (c) =>
      c.context?.oldMeta?.protobuf?.tag !== undefined &&
      tagReservedIn(c, c.context.newContainerMeta, memberName(c)),
  },
  {
    id: 'protobuf-removed-deprecated',
    kind: 'removed',
    severity: 'warning',
    hint: 'Add "reserved <number>;" so the field number is never reused.',
    applies: (c) => isDeprecated(c.context?.oldMeta),
  },
  {
    id: 'protobuf-removed-field',
    kind: 'removed',
    severity: 'breaking',
    hint: 'Deprecate the field and reserve its number instead of deleting it.',
    applies: (c) => c.context?.oldMeta?.protobuf?.tag !== undefined,
  },
  {
    id: 'protobuf-tag-reuse',
    kind: 'type_changed',
    severity: 'breaking',
    hint: 'A field number was reassigned to a different field; reserve the old number and use a new one.',
    applies: (c) => c.context?.renamedFrom !== undefined,
  },
  {
    id: 'protobuf-wire-compatible-type',
    kind: 'type_changed',
    severity: 'warning',
    hint: 'The wire encoding is compatible, but generated code changes type.',
    applies: isWidening,
  },
  {
    id: 'protobuf-enum-number-reassigned',
    kind: 'renamed',
    severity: 'breaking',
    hint: 'An enum value name moved to a different number; keep each name on its original number.',
    applies: (c) => {
      const values = c.context?.oldContainerMeta?.protobuf?.enumValues;
      return values !== undefined && c.after !== undefined && Object.hasOwn(values, c.after);
    },
  },
  {
    id: 'protobuf-renamed-field',
    kind: 'renamed',
    severity: 'warning',
    hint: 'Binary encoding is unaffected; JSON encoding and generated code use the new name.',
  },
];

const SQL_RULES: CompatibilityRule[] = [
  {
    id: 'sql-drop-primary-key',
    kind: 'removed',
    severity: 'breaking',
    hint: 'Dropping a primary key column breaks row identity and every foreign key referencing it.',
    applies: (c) => c.context?.oldMeta?.sql?.primaryKey === true,
  },
  {
    id: 'sql-drop-nullable-column',
    kind: 'removed',
    severity: 'warning',
    hint: 'Stop reading and writing the column in application code before dropping it.',
    applies: (c) => c.context?.oldMeta?.sql?.nullable === true,
  },
  {
    id: 'sql-add-not-null-with-default',
    kind: 'added',
    severity: 'info',
    hint: 'No action needed: existing rows receive the default.',
    applies: (c) => c.context?.required === true && c.context.newMeta?.sql?.hasDefault === true,
  },
];

// ─── Widening Tables ────────────────────────────────────────────────────────

const WIDENINGS: Record<SchemaFormat, Record<string, string[]>> = {
  'json-schema': {
    integer: ['number'],
  },
  openapi: {
    integer: ['number'],
  },
  protobuf: {
    int32: ['int64'],
    uint32: ['uint64', 'int64'],
    sint32: ['sint64'],
    string: ['bytes'],
  },
  sql: {
    smallint: ['integer', 'bigint', 'decimal'],
    integer: ['bigint', 'decimal'],
    bigint: ['decimal'],
    real: ['double'],
    char: ['varchar', 'text'],
    varchar: ['text'],
    date: ['timestamp', 'timestamptz'],
    timestamp: ['timestamptz'],
  },
};

const FORMAT_RULES: Record<SchemaFormat, CompatibilityRule[]> = {
  'json-schema': JSON_SCHEMA_RULES,
  openapi: OPENAPI_RULES,
  protobuf: PROTOBUF_RULES,
  sql: SQL_RULES,
};

// ─── Table Construction ─────────────────────────────────────────────────────

/**
 * Build the rule table for a format under the given policy.
 * Throws InvalidFormatError for formats without a table.
 */
export function getRuleTable(format: string, policy: RulePolicy = {}): RuleTable {
  if (!isSchemaFormat(format)) {
    throw new InvalidFormatError(format);
  }

  const overrides = policy.severityOverrides ?? {};
  const rules = [...FORMAT_RULES[format], ...DEFAULT_RULES].map((rule) => {
    const severity = overrides[rule.id];
    return severity ? { ...rule, severity } : rule;
  });

  return {
    format,
    threshold: policy.thresholds?.[format] ?? DEFAULT_THRESHOLD,
    widenings: WIDENINGS[format],
    rules,
  };
}

/** Ids of every rule in every table; used to validate policy files. */
export function listRuleIds(): string[] {
  const ids = new Set<string>();
  for (const format of SCHEMA_FORMATS) {
    for (const rule of [...FORMAT_RULES[format], ...DEFAULT_RULES]) ids.add(rule.id);
  }
  return [...ids];
}

// ─── Classification ─────────────────────────────────────────────────────────

export function classifyChange(change: StructuralChange, table: RuleTable): Classification {
  for (const rule of table.rules) {
    if (rule.kind !== change.kind) continue;
    if (rule.applies && !rule.applies(change, table)) continue;
    return { severity: rule.severity, rule: rule.id, hint: rule.hint };
  }

  // Every kind has an unconditional default rule, so this is a table defect.
  throw new Error(`No ${table.format} rule classifies "${change.kind}" changes`);
}

export function classifyChanges(changes: readonly StructuralChange[], table: RuleTable): Change[] {
  return changes.map((change) => {
    const { severity, rule } = classifyChange(change, table);
    return { ...change, severity, isBreaking: severity === 'breaking', rule };
  });
}
