/**
 * Tests for file loading
 */

import * as fs from 'fs';
import * as path from 'path';
import { EncodingError, IoError } from '../src/core/errors';
import { loadSchemaFile, readTextFile, writeTextFile } from '../src/io';

const TEST_IO_DIR = path.join(__dirname, '.test-io');

beforeEach(() => {
  if (fs.existsSync(TEST_IO_DIR)) {
    fs.rmSync(TEST_IO_DIR, { recursive: true, force: true });
  }
  fs.mkdirSync(TEST_IO_DIR, { recursive: true });
});

afterAll(() => {
  if (fs.existsSync(TEST_IO_DIR)) {
    fs.rmSync(TEST_IO_DIR, { recursive: true, force: true });
  }
});

function fixture(name: string, content: string | Buffer): string {
  const file = path.join(TEST_IO_DIR, name);
  fs.writeFileSync(file, content);
  return file;
}

describe('readTextFile', () => {
  test('reads UTF-8 text and drops a byte order mark', () => {
    const file = fixture('schema.json', '\uFEFF{"type": "object"}');
    expect(readTextFile(file)).toBe('{"type": "object"}');
  });

  test('reports a missing file as an IoError', () => {
    const file = path.join(TEST_IO_DIR, 'missing.json');
    expect(() => readTextFile(file)).toThrow(IoError);
    expect(() => readTextFile(file)).toThrow(`IO error: File not found: ${file}`);
  });

  test('reports a directory as an IoError', () => {
    expect(() => readTextFile(TEST_IO_DIR)).toThrow(`IO error: Expected a file but found a directory: ${TEST_IO_DIR}`);
  });

  test('reports invalid UTF-8 as an EncodingError', () => {
    const file = fixture('binary.json', Buffer.from([0x7b, 0xff, 0x7d]));
    expect(() => readTextFile(file)).toThrow(EncodingError);
    expect(() => readTextFile(file)).toThrow(`Encoding error: ${file} is not valid UTF-8`);
  });
});

describe('writeTextFile', () => {
  test('creates missing directories', () => {
    const file = path.join(TEST_IO_DIR, 'reports', 'nested', 'report.md');
    writeTextFile(file, '# Report');
    expect(fs.readFileSync(file, 'utf-8')).toBe('# Report');
  });
});

describe('loadSchemaFile', () => {
  test('detects the format from the file name', () => {
    const file = fixture('users.sql', 'CREATE TABLE users (id INTEGER PRIMARY KEY);');
    const schema = loadSchemaFile(file, { version: '3.1.0' });

    expect(schema).toEqual({
      format: 'sql',
      content: 'CREATE TABLE users (id INTEGER PRIMARY KEY);',
      version: '3.1.0',
    });
  });

  test('detects OpenAPI documents saved as JSON', () => {
    const file = fixture('api.json', JSON.stringify({ openapi: '3.0.0', paths: {} }));
    expect(loadSchemaFile(file).format).toBe('openapi');
  });

  test('an explicit format wins over detection', () => {
    const file = fixture('user.txt', '{"type": "object"}');
    expect(loadSchemaFile(file, { format: 'json-schema' }).format).toBe('json-schema');
  });

  test('defaults the version to 1.0.0', () => {
    const file = fixture('user.proto', 'message User { string email = 1; }');
    expect(loadSchemaFile(file).version).toBe('1.0.0');
  });
});
