/**
 * Canonical type definitions for schema-evolution-analyzer.
 * These types represent the normalized schema model and every value the
 * analysis produces.
 */

// ─── Formats ────────────────────────────────────────────────────────────────

export type SchemaFormat = 'json-schema' | 'openapi' | 'protobuf' | 'sql';

export const SCHEMA_FORMATS: readonly SchemaFormat[] = ['json-schema', 'openapi', 'protobuf', 'sql'];

export function isSchemaFormat(format: string): format is SchemaFormat {
  return SCHEMA_FORMATS.some((f) => f === format);
}

// ─── Schema ─────────────────────────────────────────────────────────────────

export interface Schema {
  /** Declared format of `content` */
  readonly format: SchemaFormat;

  /** Raw schema text */
  readonly content: string;

  /** Semantic version of this schema (e.g. '1.4.0') */
  readonly version: string;
}

// ─── Format Metadata ────────────────────────────────────────────────────────

export interface JsonSchemaMetadata {
  deprecated?: boolean;
}

export type OpenApiDirection = 'request' | 'response' | 'none';

export interface OpenApiMetadata {
  /** Whether the node describes data sent by clients or returned to them */
  direction: OpenApiDirection;
  deprecated?: boolean;
  /** Parameter location ('query', 'path', 'header', 'cookie') */
  in?: string;
}

export interface ProtobufMetadata {
  /** Field number */
  tag?: number;
  label?: 'optional' | 'required' | 'repeated';
  deprecated?: boolean;
  /** Reserved field number ranges of a message, inclusive */
  reservedRanges?: Array<[number, number]>;
  reservedNames?: string[];
  /** Set on enum definitions */
  enum?: boolean;
  /** Value name → number of an enum definition */
  enumValues?: Record<string, number>;
}

export interface SqlMetadata {
  nullable?: boolean;
  primaryKey?: boolean;
  unique?: boolean;
  hasDefault?: boolean;
  /** Column data type as written (e.g. 'VARCHAR(255)') */
  dataType?: string;
  /** Column definition or full CREATE TABLE statement as written */
  definition?: string;
}

/** Format-specific side channel carried by nodes, keyed by format. */
export interface NodeMetadata {
  'json-schema'?: JsonSchemaMetadata;
  openapi?: OpenApiMetadata;
  protobuf?: ProtobufMetadata;
  sql?: SqlMetadata;
}

// ─── Schema Node ────────────────────────────────────────────────────────────

export type ConstraintValue =
  | string
  | number
  | boolean
  | null
  | Array<string | number | boolean | null>;

export type Constraints = Record<string, ConstraintValue>;

interface NodeBase {
  /** Format-specific identity key (e.g. 'tag:3'); takes precedence over names when matching */
  identity?: string;

  meta?: NodeMetadata;
}

export interface ScalarNode extends NodeBase {
  kind: 'scalar';

  /** Primitive type name as the format spells it, lower-cased */
  type: string;

  constraints: Constraints;
}

export interface ObjectField {
  name: string;
  node: SchemaNode;
}

export interface ObjectNode extends NodeBase {
  kind: 'object';

  /** Child members in declared order */
  fields: ObjectField[];

  /** Names of required members */
  required: string[];
}

export interface ArrayNode extends NodeBase {
  kind: 'array';
  items: SchemaNode;
  minItems?: number;
  maxItems?: number;
}

export interface UnionNode extends NodeBase {
  kind: 'union';
  variants: SchemaNode[];
}

export interface ReferenceNode extends NodeBase {
  kind: 'reference';
  target: string;
}

export type SchemaNode = ScalarNode | ObjectNode | ArrayNode | UnionNode | ReferenceNode;

export type NodeKind = SchemaNode['kind'];

// ─── Changes ────────────────────────────────────────────────────────────────

export type Severity = 'breaking' | 'warning' | 'info';

export type ChangeKind =
  | 'added'
  | 'removed'
  | 'type_changed'
  | 'constraint_tightened'
  | 'constraint_loosened'
  | 'requiredness_changed'
  | 'renamed'
  | 'other';

export const CHANGE_KINDS: readonly ChangeKind[] = [
  'added',
  'removed',
  'type_changed',
  'constraint_tightened',
  'constraint_loosened',
  'requiredness_changed',
  'renamed',
  'other',
];

/** Facts about a change that the rule set needs to classify it. */
export interface ChangeContext {
  /** Added/removed: whether the member is required where it appears */
  required?: boolean;

  /** Constraint changes: names of the constraints involved */
  constraints?: string[];

  /** Type change on a member matched by identity whose name changed */
  renamedFrom?: string;

  /** Type change from a node to a union containing an equal variant */
  widenedToUnion?: boolean;

  /** Change applies to a member that is itself new in this version */
  onAddedMember?: boolean;

  oldMeta?: NodeMetadata;
  newMeta?: NodeMetadata;

  /** Metadata of the containing node in the old and new trees */
  oldContainerMeta?: NodeMetadata;
  newContainerMeta?: NodeMetadata;
}

/** A structural delta as produced by the diff engine, before classification. */
export interface StructuralChange {
  /** Ordered path of member identifiers ('[]' for array items, 'oneOf[i]' for variants) */
  location: string[];

  /** Dotted rendering of `location` (e.g. 'user.tags[]') */
  path: string;

  kind: ChangeKind;

  /** Human-readable description of the change */
  description: string;

  /** Previous value/state (for context) */
  before?: string;

  /** New value/state (for context) */
  after?: string;

  context?: ChangeContext;
}

export interface Change extends StructuralChange {
  severity: Severity;
  isBreaking: boolean;

  /** Id of the rule that produced the classification */
  rule?: string;
}

// ─── Report ─────────────────────────────────────────────────────────────────

export interface CompatibilityIssue {
  change: Change;

  /** Remediation hint */
  hint: string;
}

export interface ChangeSummary {
  breaking: number;
  warning: number;
  info: number;
  total: number;
}

export interface CompatibilityReport {
  isCompatible: boolean;

  /** Backward compatibility score (0-100) */
  compatibilityScore: number;

  changes: Change[];
  issues: CompatibilityIssue[];
  summary: ChangeSummary;
  metadata: Record<string, string>;
}

// ─── Migration ──────────────────────────────────────────────────────────────

export type MigrationOperation =
  | 'rename'
  | 'remove'
  | 'alter_type'
  | 'tighten'
  | 'loosen'
  | 'modify'
  | 'make_optional'
  | 'add'
  | 'make_required';

export interface MigrationInstruction {
  op: MigrationOperation;
  location: string[];

  /** The classified change this instruction was derived from */
  change: Change;
}

export interface MigrationPlan {
  /** Rendered steps, in execution order */
  steps: string[];

  instructions: MigrationInstruction[];
  metadata: Record<string, string>;
}

// ─── Validation ─────────────────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

// ─── Report Format ──────────────────────────────────────────────────────────

export type ReportFormat = 'console' | 'json' | 'markdown' | 'html';

// ─── Format Adapter ─────────────────────────────────────────────────────────

/** Trees a renderer may consult to look up definitions by location. */
export interface RenderContext {
  oldTree: SchemaNode;
  newTree: SchemaNode;
}

/**
 * Capability set implemented once per format and dispatched by SchemaFormat.
 */
export interface FormatAdapter {
  readonly format: SchemaFormat;

  /** Throws ParseError/FormatSpecificError when content is not well-formed */
  check(content: string): void;

  normalize(schema: Schema): SchemaNode;

  /** Render one migration instruction as a format-specific statement */
  render(instruction: MigrationInstruction, context: RenderContext): string;
}
