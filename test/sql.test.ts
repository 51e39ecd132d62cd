/**
 * Tests for the SQL DDL adapter
 */

import { analyzeCompatibility, generateMigrationPath } from '../src/analyzer';
import { FormatSpecificError, ParseError } from '../src/core/errors';
import { createSchema } from '../src/core/schema';
import { parseCreateTables, splitTopLevel, stripComments } from '../src/formats/sql';

function ddl(content: string, version = '1.0.0') {
  return createSchema('sql', content, version);
}

describe('SQL adapter', () => {
  // ─── Parsing ──────────────────────────────────────────────────────────

  describe('parseCreateTables', () => {
    const [users] = parseCreateTables(`
      -- accounts
      CREATE TABLE IF NOT EXISTS public.users (
        id SERIAL PRIMARY KEY,
        email VARCHAR(255) NOT NULL UNIQUE,
        balance NUMERIC(10, 2) DEFAULT 0,
        status TEXT NOT NULL DEFAULT 'active',
        created_at TIMESTAMP WITH TIME ZONE
      );
      CREATE INDEX users_email_idx ON users (email);
    `);

    test('reads the table name without its schema qualifier', () => {
      expect(users.name).toBe('users');
      expect(users.columns.map((c) => c.name)).toEqual(['id', 'email', 'balance', 'status', 'created_at']);
    });

    test('canonicalizes type aliases', () => {
      expect(users.columns.map((c) => c.type)).toEqual(['integer', 'varchar', 'decimal', 'text', 'timestamptz']);
      expect(users.columns[4].dataType).toBe('TIMESTAMP WITH TIME ZONE');
    });

    test('reads column constraints', () => {
      expect(users.columns[0]).toMatchObject({ primaryKey: true, nullable: false, constraints: { primaryKey: true } });
      expect(users.columns[1]).toMatchObject({
        dataType: 'VARCHAR(255)',
        length: 255,
        nullable: false,
        unique: true,
        constraints: { unique: true },
      });
      expect(users.columns[2].constraints).toEqual({ precision: 10, scale: 2, default: '0' });
      expect(users.columns[3]).toMatchObject({ nullable: false, defaultValue: "'active'" });
      expect(users.columns[4].nullable).toBe(true);
    });

    test('applies table-level primary key and unique constraints', () => {
      const [memberships] = parseCreateTables(
        'CREATE TABLE memberships (user_id INTEGER, team_id INTEGER, code TEXT, PRIMARY KEY (user_id, team_id), UNIQUE (code));'
      );

      expect(memberships.columns.map((c) => [c.name, c.primaryKey, c.nullable, c.unique])).toEqual([
        ['user_id', true, false, false],
        ['team_id', true, false, false],
        ['code', false, true, true],
      ]);
    });

    test('reads columns named key or index as columns', () => {
      const [settings] = parseCreateTables('CREATE TABLE settings (key TEXT PRIMARY KEY, index INTEGER, value TEXT);');

      expect(settings.columns.map((c) => [c.name, c.type, c.primaryKey])).toEqual([
        ['key', 'text', true],
        ['index', 'integer', false],
        ['value', 'text', false],
      ]);
    });

    test('reads a column named key whose type has a length', () => {
      const [settings] = parseCreateTables('CREATE TABLE settings (key VARCHAR(64) NOT NULL, value TEXT);');
      expect(settings.columns.map((c) => c.name)).toEqual(['key', 'value']);
      expect(settings.columns[0]).toMatchObject({ type: 'varchar', length: 64, nullable: false });
    });

    test('skips MySQL index clauses', () => {
      const [posts] = parseCreateTables(
        'CREATE TABLE posts (id INT PRIMARY KEY, author_id INT, KEY idx_author (author_id), INDEX (id, author_id));'
      );
      expect(posts.columns.map((c) => c.name)).toEqual(['id', 'author_id']);
    });

    test('rejects a column defined twice', () => {
      expect(() => ddl('CREATE TABLE t (a INTEGER, a TEXT);')).toThrow(FormatSpecificError);
      expect(() => ddl('CREATE TABLE t (a INTEGER, a TEXT);')).toThrow(
        'sql error: column "a" is defined twice in table "t"'
      );
    });

    test('rejects scripts without CREATE TABLE statements', () => {
      expect(() => ddl('SELECT 1;')).toThrow(ParseError);
      expect(() => ddl('SELECT 1;')).toThrow('Failed to parse schema: no CREATE TABLE statements found');
    });

    test('rejects unbalanced parentheses', () => {
      expect(() => ddl('CREATE TABLE t (id INTEGER')).toThrow(FormatSpecificError);
      expect(() => ddl('CREATE TABLE t (id INTEGER')).toThrow(/^sql error: unbalanced "\("/);
    });

    test('rejects a table defined twice', () => {
      expect(() => ddl('CREATE TABLE a (id INT); CREATE TABLE a (id INT);')).toThrow(
        'sql error: table "a" is defined twice'
      );
    });
  });

  describe('lexical helpers', () => {
    test('stripComments keeps comment markers inside strings', () => {
      expect(stripComments("a -- gone\nb '--kept' /* gone */ c")).toBe("a \nb '--kept'   c");
    });

    test('splitTopLevel ignores separators inside parentheses and quotes', () => {
      expect(splitTopLevel("a NUMERIC(10, 2), b TEXT DEFAULT 'x,y', c INT", ',')).toEqual([
        'a NUMERIC(10, 2)',
        "b TEXT DEFAULT 'x,y'",
        'c INT',
      ]);
    });
  });

  // ─── Compatibility & Rendering ────────────────────────────────────────

  describe('compatibility', () => {
    test('widening a varchar is a type widening', () => {
      const v1 = ddl('CREATE TABLE users (name VARCHAR(10));');
      const v2 = ddl('CREATE TABLE users (name VARCHAR(20));');

      const report = analyzeCompatibility(v1, v2);
      expect(report.changes).toHaveLength(1);
      expect(report.changes[0]).toMatchObject({
        kind: 'type_changed',
        before: 'varchar(10)',
        after: 'varchar(20)',
        severity: 'warning',
        rule: 'type-widened',
      });
      expect(report.compatibilityScore).toBe(97);
      expect(report.isCompatible).toBe(true);
      expect(generateMigrationPath(v1, v2).steps).toEqual(['ALTER TABLE users ALTER COLUMN name TYPE VARCHAR(20);']);
    });

    test('shrinking a varchar is breaking', () => {
      const v1 = ddl('CREATE TABLE users (name VARCHAR(20));');
      const v2 = ddl('CREATE TABLE users (name VARCHAR(10));');

      expect(analyzeCompatibility(v1, v2).changes[0]).toMatchObject({
        kind: 'type_changed',
        before: 'varchar(20)',
        after: 'varchar(10)',
        severity: 'breaking',
        rule: 'type-narrowed',
      });
    });

    test('a bounded varchar widens to text', () => {
      const v1 = ddl('CREATE TABLE users (name VARCHAR(20));');
      const v2 = ddl('CREATE TABLE users (name TEXT);');

      expect(analyzeCompatibility(v1, v2).changes[0]).toMatchObject({ severity: 'warning', rule: 'type-widened' });
    });

    test('dropping a primary key column named key is breaking', () => {
      const v1 = ddl('CREATE TABLE settings (key TEXT PRIMARY KEY, value TEXT);');
      const v2 = ddl('CREATE TABLE settings (value TEXT);');

      const report = analyzeCompatibility(v1, v2);
      expect(report.changes).toHaveLength(1);
      expect(report.changes[0]).toMatchObject({
        kind: 'removed',
        path: 'settings.key',
        severity: 'breaking',
        rule: 'sql-drop-primary-key',
      });
      expect(report.isCompatible).toBe(false);
    });

    test('adding a NOT NULL column with a default is safe', () => {
      const v1 = ddl('CREATE TABLE users (id INTEGER PRIMARY KEY);');
      const v2 = ddl("CREATE TABLE users (id INTEGER PRIMARY KEY, status TEXT NOT NULL DEFAULT 'active');");

      const report = analyzeCompatibility(v1, v2);
      expect(report.changes[0]).toMatchObject({ severity: 'info', rule: 'sql-add-not-null-with-default' });
      expect(generateMigrationPath(v1, v2).steps).toEqual([
        "ALTER TABLE users ADD COLUMN status TEXT NOT NULL DEFAULT 'active';",
      ]);
    });

    test('adding a NOT NULL column without a default is breaking', () => {
      const v1 = ddl('CREATE TABLE users (id INTEGER PRIMARY KEY);');
      const v2 = ddl('CREATE TABLE users (id INTEGER PRIMARY KEY, status TEXT NOT NULL);');

      expect(analyzeCompatibility(v1, v2).changes[0]).toMatchObject({
        severity: 'breaking',
        rule: 'added-required-member',
      });
    });

    test('dropping a nullable column is a warning', () => {
      const v1 = ddl('CREATE TABLE users (id INTEGER PRIMARY KEY, nickname TEXT);');
      const v2 = ddl('CREATE TABLE users (id INTEGER PRIMARY KEY);');

      expect(analyzeCompatibility(v1, v2).changes[0]).toMatchObject({
        severity: 'warning',
        rule: 'sql-drop-nullable-column',
      });
    });

    test('integer to bigint renders an ALTER COLUMN TYPE', () => {
      const v1 = ddl('CREATE TABLE users (id INTEGER PRIMARY KEY);');
      const v2 = ddl('CREATE TABLE users (id BIGINT PRIMARY KEY);');

      expect(analyzeCompatibility(v1, v2).changes[0]).toMatchObject({ kind: 'type_changed', severity: 'warning' });
      expect(generateMigrationPath(v1, v2).steps).toEqual(['ALTER TABLE users ALTER COLUMN id TYPE BIGINT;']);
    });

    test('making a column NOT NULL renders SET NOT NULL', () => {
      const v1 = ddl('CREATE TABLE users (name TEXT);');
      const v2 = ddl('CREATE TABLE users (name TEXT NOT NULL);');

      expect(analyzeCompatibility(v1, v2).changes[0]).toMatchObject({ severity: 'breaking', rule: 'made-required' });
      expect(generateMigrationPath(v1, v2).steps).toEqual(['ALTER TABLE users ALTER COLUMN name SET NOT NULL;']);
    });

    test('adding a unique constraint renders a named constraint', () => {
      const v1 = ddl('CREATE TABLE users (email TEXT);');
      const v2 = ddl('CREATE TABLE users (email TEXT UNIQUE);');

      expect(generateMigrationPath(v1, v2).steps).toEqual([
        'ALTER TABLE users ADD CONSTRAINT users_email_key UNIQUE (email);',
      ]);
    });

    test('changing a default renders SET DEFAULT', () => {
      const v1 = ddl("CREATE TABLE users (status TEXT DEFAULT 'new');");
      const v2 = ddl("CREATE TABLE users (status TEXT DEFAULT 'active');");

      expect(analyzeCompatibility(v1, v2).changes[0]).toMatchObject({ kind: 'other', severity: 'warning' });
      expect(generateMigrationPath(v1, v2).steps).toEqual([
        "ALTER TABLE users ALTER COLUMN status SET DEFAULT 'active';",
      ]);
    });

    test('creates and drops whole tables', () => {
      const v1 = ddl('CREATE TABLE users (id INTEGER PRIMARY KEY);\nCREATE TABLE sessions (token TEXT);');
      const v2 = ddl('CREATE TABLE users (id INTEGER PRIMARY KEY);\nCREATE TABLE orders (id INTEGER PRIMARY KEY);');

      expect(generateMigrationPath(v1, v2).steps).toEqual([
        'DROP TABLE sessions;',
        'CREATE TABLE orders (id INTEGER PRIMARY KEY);',
      ]);
    });
  });
});
