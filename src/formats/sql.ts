/**
 * SQL DDL Adapter
 *
 * Reads CREATE TABLE statements (PostgreSQL, MySQL and SQLite dialects) and
 * normalizes them to one object per table, one scalar per column. Other
 * statements are skipped. Migration steps are rendered as ALTER TABLE
 * statements.
 */

import { FormatSpecificError, ParseError } from '../core/errors';
import { nodeAt } from '../core/node';
import { targetLocation } from '../core/planner';
import {
  Constraints,
  FormatAdapter,
  MigrationInstruction,
  ObjectField,
  ObjectNode,
  RenderContext,
  ScalarNode,
  Schema,
  SchemaNode,
} from '../core/types';

export interface ColumnDefinition {
  name: string;

  /** Data type as written, e.g. 'VARCHAR(255)' */
  dataType: string;

  /** Canonical type name, e.g. 'varchar' */
  type: string;

  /** Declared length of a character or binary type */
  length?: number;

  constraints: Constraints;
  nullable: boolean;
  primaryKey: boolean;
  unique: boolean;
  defaultValue?: string;

  /** Column definition as written */
  definition: string;
}

export interface TableDefinition {
  name: string;
  columns: ColumnDefinition[];

  /** CREATE TABLE statement without its terminating semicolon */
  definition: string;
}

// ─── Type Aliases ───────────────────────────────────────────────────────────

const TYPE_ALIASES: Record<string, string> = {
  int: 'integer',
  int4: 'integer',
  integer: 'integer',
  mediumint: 'integer',
  serial: 'integer',
  serial4: 'integer',
  int2: 'smallint',
  smallint: 'smallint',
  tinyint: 'smallint',
  smallserial: 'smallint',
  serial2: 'smallint',
  int8: 'bigint',
  bigint: 'bigint',
  bigserial: 'bigint',
  serial8: 'bigint',
  real: 'real',
  float4: 'real',
  float: 'double',
  float8: 'double',
  double: 'double',
  'double precision': 'double',
  numeric: 'decimal',
  decimal: 'decimal',
  dec: 'decimal',
  varchar: 'varchar',
  'character varying': 'varchar',
  nvarchar: 'varchar',
  varchar2: 'varchar',
  char: 'char',
  character: 'char',
  nchar: 'char',
  bpchar: 'char',
  text: 'text',
  tinytext: 'text',
  mediumtext: 'text',
  longtext: 'text',
  clob: 'text',
  bool: 'boolean',
  boolean: 'boolean',
  datetime: 'timestamp',
  timestamp: 'timestamp',
  'timestamp without time zone': 'timestamp',
  timestamptz: 'timestamptz',
  'timestamp with time zone': 'timestamptz',
  bytea: 'binary',
  blob: 'binary',
  longblob: 'binary',
  binary: 'binary',
  varbinary: 'binary',
};

const LENGTH_TYPES = new Set(['varchar', 'char', 'binary']);

// Words that end a column's data type
const TYPE_STOP_WORDS = new Set([
  'NOT',
  'NULL',
  'PRIMARY',
  'UNIQUE',
  'DEFAULT',
  'REFERENCES',
  'CHECK',
  'CONSTRAINT',
  'COLLATE',
  'GENERATED',
  'AUTO_INCREMENT',
  'AUTOINCREMENT',
  'IDENTITY',
  'COMMENT',
  'ON',
  'UNSIGNED',
]);

const TABLE_CONSTRAINT = /^(?:CONSTRAINT\s+\S+\s+)?(PRIMARY\s+KEY|UNIQUE|FOREIGN\s+KEY|CHECK|EXCLUDE)\b/i;

// MySQL index clause: KEY (cols) or KEY name (cols)
const INDEX_CLAUSE = /^(KEY|INDEX)\s*(?:([A-Za-z_][\w$]*|`[^`]*`)\s*)?\(/i;

const CREATE_TABLE =
  /^CREATE\s+(?:OR\s+REPLACE\s+)?(?:(?:GLOBAL|LOCAL)\s+)?(?:TEMP(?:ORARY)?\s+)?(?:UNLOGGED\s+)?TABLE\s+(?:IF\s+NOT\s+EXISTS\s+)?/i;

// ─── Lexical Helpers ────────────────────────────────────────────────────────

function fail(message: string): never {
  throw new FormatSpecificError('sql', message);
}

function isQuote(char: string): boolean {
  return char === "'" || char === '"' || char === '`';
}

/** Index just past the quoted section starting at `start`. */
function skipQuoted(text: string, start: number): number {
  const quote = text[start];
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === quote) {
      // Doubled quote is an escaped quote
      if (text[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return fail(`unterminated ${quote} quote`);
}

export function stripComments(sql: string): string {
  let out = '';
  let i = 0;
  while (i < sql.length) {
    const char = sql[i];
    if (isQuote(char)) {
      const end = skipQuoted(sql, i);
      out += sql.slice(i, end);
      i = end;
    } else if (char === '-' && sql[i + 1] === '-') {
      const end = sql.indexOf('\n', i);
      i = end === -1 ? sql.length : end;
    } else if (char === '/' && sql[i + 1] === '*') {
      const end = sql.indexOf('*/', i + 2);
      if (end === -1) fail('unterminated block comment');
      out += ' ';
      i = end + 2;
    } else {
      out += char;
      i++;
    }
  }
  return out;
}

/**
 * Split on a separator at parenthesis depth zero, outside quotes.
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  let i = 0;

  while (i < text.length) {
    const char = text[i];
    if (isQuote(char)) {
      i = skipQuoted(text, i);
      continue;
    }
    if (char === '(') depth++;
    else if (char === ')') {
      depth--;
      if (depth < 0) fail(`unbalanced ")" near "${text.slice(Math.max(0, i - 20), i + 1).trim()}"`);
    } else if (char === separator && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
    i++;
  }

  if (depth !== 0) fail(`unbalanced "(" in "${text.trim().slice(0, 40)}"`);
  parts.push(text.slice(start));
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

/** Index of the parenthesis closing the one at `open`. */
function closingParen(text: string, open: number): number {
  let depth = 0;
  let i = open;
  while (i < text.length) {
    const char = text[i];
    if (isQuote(char)) {
      i = skipQuoted(text, i);
      continue;
    }
    if (char === '(') depth++;
    else if (char === ')' && --depth === 0) return i;
    i++;
  }
  return fail(`unbalanced "(" in "${text.trim().slice(0, 40)}"`);
}

function unquote(identifier: string): string {
  const first = identifier[0];
  if ((first === '"' || first === '`') && identifier.endsWith(first)) {
    return identifier.slice(1, -1).split(first + first).join(first);
  }
  if (first === '[' && identifier.endsWith(']')) return identifier.slice(1, -1);
  return identifier;
}

/** Read a possibly qualified, possibly quoted identifier; the last part is returned. */
function readIdentifier(text: string): { name: string; rest: string } | undefined {
  const match = /^\s*((?:"(?:[^"]|"")*"|`[^`]*`|\[[^\]]*\]|[A-Za-z_][\w$]*)(?:\s*\.\s*(?:"(?:[^"]|"")*"|`[^`]*`|\[[^\]]*\]|[A-Za-z_][\w$]*))*)/.exec(
    text
  );
  if (!match) return undefined;
  const parts = match[1].split(/\s*\.\s*/);
  return { name: unquote(parts[parts.length - 1]), rest: text.slice(match[0].length) };
}

function columnList(text: string): string[] {
  const open = text.indexOf('(');
  if (open === -1) return [];
  return splitTopLevel(text.slice(open + 1, closingParen(text, open)), ',').map(unquote);
}

// ─── Column Parsing ─────────────────────────────────────────────────────────

interface DataType {
  dataType: string;
  type: string;
  length?: number;
  constraints: Constraints;
  remainder: string;
}

function readDataType(text: string): DataType {
  const words: string[] = [];
  let args: number[] = [];
  let isArray = false;
  let i = 0;

  for (;;) {
    while (i < text.length && /\s/.test(text[i])) i++;
    const word = /^[A-Za-z_][\w]*/.exec(text.slice(i));
    if (word) {
      if (TYPE_STOP_WORDS.has(word[0].toUpperCase())) break;
      words.push(word[0]);
      i += word[0].length;
    } else if (text[i] === '(' && words.length > 0) {
      const close = closingParen(text, i);
      args = text
        .slice(i + 1, close)
        .split(',')
        .map((a) => Number(a.trim()))
        .filter((n) => Number.isFinite(n));
      i = close + 1;
    } else if (text.startsWith('[]', i)) {
      isArray = true;
      i += 2;
    } else {
      break;
    }
  }

  const raw = words.join(' ').toLowerCase();
  const type = TYPE_ALIASES[raw] ?? raw;
  const constraints: Constraints = {};
  let length: number | undefined;

  if (LENGTH_TYPES.has(type)) {
    if (args.length > 0) length = args[0];
  } else if (type === 'decimal') {
    if (args.length > 0) constraints.precision = args[0];
    if (args.length > 1) constraints.scale = args[1];
  } else if (args.length > 0) {
    constraints.precision = args[0];
  }

  const result: DataType = {
    dataType: text.slice(0, i).trim(),
    type: isArray ? `${type}[]` : type,
    constraints,
    remainder: text.slice(i),
  };
  if (length !== undefined) result.length = length;
  return result;
}

function parseColumn(item: string): ColumnDefinition {
  const identifier = readIdentifier(item);
  if (!identifier) fail(`cannot read column definition "${item}"`);

  const { dataType, type, length, constraints, remainder } = readDataType(identifier.rest);
  if (type === '') fail(`column "${identifier.name}" has no data type`);

  const primaryKey = /\bPRIMARY\s+KEY\b/i.test(remainder);
  const unique = /\bUNIQUE\b/i.test(remainder);
  const notNull = /\bNOT\s+NULL\b/i.test(remainder);
  const defaultMatch = /\bDEFAULT\s+('(?:[^']|'')*'|\((?:[^()]|\([^()]*\))*\)|[^\s,]+)/i.exec(remainder);

  if (unique) constraints.unique = true;
  if (primaryKey) constraints.primaryKey = true;
  if (defaultMatch) constraints.default = defaultMatch[1];

  const column: ColumnDefinition = {
    name: identifier.name,
    dataType,
    type,
    constraints,
    nullable: !notNull && !primaryKey,
    primaryKey,
    unique,
    definition: item,
  };
  if (length !== undefined) column.length = length;
  if (defaultMatch) column.defaultValue = defaultMatch[1];
  return column;
}

/** Kind of a table-level constraint item, or undefined for a column definition. */
function tableConstraintKind(item: string): string | undefined {
  const constraint = TABLE_CONSTRAINT.exec(item);
  if (constraint) return constraint[1];

  // A column named key or index is followed by its data type, not a column list
  const index = INDEX_CLAUSE.exec(item);
  if (index && !(index[2] !== undefined && Object.hasOwn(TYPE_ALIASES, index[2].toLowerCase()))) return index[1];
  return undefined;
}

function applyTableConstraint(item: string, kind: string, columns: ColumnDefinition[]): void {
  const keyword = kind.toUpperCase().replace(/\s+/g, ' ');
  if (keyword !== 'PRIMARY KEY' && keyword !== 'UNIQUE') return;

  const names = columnList(item.slice(item.toUpperCase().indexOf(keyword.split(' ')[0])));
  for (const name of names) {
    const column = columns.find((c) => c.name === name);
    if (!column) fail(`constraint "${item}" names unknown column "${name}"`);
    if (keyword === 'PRIMARY KEY') {
      column.primaryKey = true;
      column.nullable = false;
      column.constraints.primaryKey = true;
    } else if (names.length === 1) {
      column.unique = true;
      column.constraints.unique = true;
    }
  }
}

// ─── Statement Parsing ──────────────────────────────────────────────────────

function parseCreateTable(statement: string, header: string): TableDefinition {
  const identifier = readIdentifier(statement.slice(header.length));
  if (!identifier) fail(`cannot read table name in "${statement.slice(0, 60)}"`);

  const open = identifier.rest.indexOf('(');
  if (open === -1 || identifier.rest.slice(0, open).trim() !== '') {
    fail(`expected a column list after CREATE TABLE ${identifier.name}`);
  }
  const close = closingParen(identifier.rest, open);

  const columns: ColumnDefinition[] = [];
  const tableConstraints: Array<[string, string]> = [];
  for (const item of splitTopLevel(identifier.rest.slice(open + 1, close), ',')) {
    const kind = tableConstraintKind(item);
    if (kind !== undefined) {
      tableConstraints.push([item, kind]);
      continue;
    }
    const column = parseColumn(item);
    if (columns.some((c) => c.name === column.name)) {
      fail(`column "${column.name}" is defined twice in table "${identifier.name}"`);
    }
    columns.push(column);
  }
  for (const [item, kind] of tableConstraints) applyTableConstraint(item, kind, columns);

  return { name: identifier.name, columns, definition: statement };
}

/**
 * Parse every CREATE TABLE statement in a DDL script.
 */
export function parseCreateTables(sql: string): TableDefinition[] {
  const tables: TableDefinition[] = [];
  for (const statement of splitTopLevel(stripComments(sql), ';')) {
    const header = CREATE_TABLE.exec(statement);
    if (!header) continue;
    const table = parseCreateTable(statement, header[0]);
    if (tables.some((t) => t.name === table.name)) fail(`table "${table.name}" is defined twice`);
    tables.push(table);
  }
  if (tables.length === 0) {
    throw new ParseError('Failed to parse schema: no CREATE TABLE statements found');
  }
  return tables;
}

// ─── Normalization ──────────────────────────────────────────────────────────

/** Type label of a column; a declared length is part of the type, e.g. 'varchar(20)'. */
function columnType(column: ColumnDefinition): string {
  if (column.length === undefined) return column.type;
  return column.type.endsWith('[]')
    ? `${column.type.slice(0, -2)}(${column.length})[]`
    : `${column.type}(${column.length})`;
}

function columnNode(column: ColumnDefinition): ScalarNode {
  return {
    kind: 'scalar',
    type: columnType(column),
    constraints: column.constraints,
    meta: {
      sql: {
        nullable: column.nullable,
        primaryKey: column.primaryKey,
        unique: column.unique,
        hasDefault: column.defaultValue !== undefined,
        dataType: column.dataType,
        definition: column.definition,
      },
    },
  };
}

function tableNode(table: TableDefinition): ObjectNode {
  const fields: ObjectField[] = table.columns.map((column) => ({ name: column.name, node: columnNode(column) }));
  return {
    kind: 'object',
    fields,
    required: table.columns.filter((c) => !c.nullable).map((c) => c.name),
    meta: { sql: { definition: table.definition } },
  };
}

// ─── Rendering ──────────────────────────────────────────────────────────────

function renderConstraintChange(
  instruction: MigrationInstruction,
  context: RenderContext,
  table: string,
  column: string
): string {
  const node = nodeAt(context.newTree, targetLocation(instruction));
  const constraints: Constraints = node?.kind === 'scalar' ? node.constraints : {};
  const dataType = node?.meta?.sql?.dataType;
  const statements: string[] = [];

  for (const name of instruction.change.context?.constraints ?? []) {
    switch (name) {
      case 'precision':
      case 'scale': {
        const statement = `ALTER TABLE ${table} ALTER COLUMN ${column} TYPE ${dataType ?? 'unknown'};`;
        if (!statements.includes(statement)) statements.push(statement);
        break;
      }
      case 'unique':
        statements.push(
          constraints.unique === true
            ? `ALTER TABLE ${table} ADD CONSTRAINT ${table}_${column}_key UNIQUE (${column});`
            : `ALTER TABLE ${table} DROP CONSTRAINT ${table}_${column}_key;`
        );
        break;
      case 'primaryKey':
        statements.push(
          constraints.primaryKey === true
            ? `ALTER TABLE ${table} ADD PRIMARY KEY (${column});`
            : `ALTER TABLE ${table} DROP CONSTRAINT ${table}_pkey;`
        );
        break;
      case 'default': {
        const value = constraints.default;
        statements.push(
          value === undefined
            ? `ALTER TABLE ${table} ALTER COLUMN ${column} DROP DEFAULT;`
            : `ALTER TABLE ${table} ALTER COLUMN ${column} SET DEFAULT ${String(value)};`
        );
        break;
      }
    }
  }

  return statements.length > 0
    ? statements.join('\n')
    : `-- Review ${instruction.change.path}: ${instruction.change.description}`;
}

function renderSql(instruction: MigrationInstruction, context: RenderContext): string {
  const { change, location, op } = instruction;
  const table = location[0] ?? '(root)';

  if (location.length <= 1) {
    switch (op) {
      case 'add': {
        const definition = nodeAt(context.newTree, location)?.meta?.sql?.definition;
        return definition ? `${definition};` : `-- Create table ${table}`;
      }
      case 'remove':
        return `DROP TABLE ${table};`;
      case 'rename':
        return `ALTER TABLE ${table} RENAME TO ${change.after ?? table};`;
      default:
        return `-- Review table ${table}: ${change.description}`;
    }
  }

  const column = location[1];
  switch (op) {
    case 'add': {
      const definition = nodeAt(context.newTree, location)?.meta?.sql?.definition;
      return `ALTER TABLE ${table} ADD COLUMN ${definition ?? `${column} ${change.after ?? ''}`};`;
    }
    case 'remove':
      return `ALTER TABLE ${table} DROP COLUMN ${column};`;
    case 'rename':
      return `ALTER TABLE ${table} RENAME COLUMN ${column} TO ${change.after ?? column};`;
    case 'alter_type': {
      const dataType = nodeAt(context.newTree, location)?.meta?.sql?.dataType ?? change.after ?? '';
      return `ALTER TABLE ${table} ALTER COLUMN ${column} TYPE ${dataType};`;
    }
    case 'make_required':
      return `ALTER TABLE ${table} ALTER COLUMN ${column} SET NOT NULL;`;
    case 'make_optional':
      return `ALTER TABLE ${table} ALTER COLUMN ${column} DROP NOT NULL;`;
    case 'tighten':
    case 'loosen':
    case 'modify':
      return renderConstraintChange(instruction, context, table, column);
  }
}

// ─── Adapter ────────────────────────────────────────────────────────────────

export const sqlAdapter: FormatAdapter = {
  format: 'sql',

  check(content: string): void {
    parseCreateTables(content);
  },

  normalize(schema: Schema): SchemaNode {
    const tables = parseCreateTables(schema.content);
    return {
      kind: 'object',
      fields: tables.map((table) => ({ name: table.name, node: tableNode(table) })),
      required: [],
    };
  },

  render: renderSql,
};
