/**
 * Tests for policy and change-set files
 */

import * as fs from 'fs';
import * as path from 'path';
import { analyzeCompatibility } from '../src/analyzer';
import { loadChangeSet, loadPolicy, parseChangeSet, parsePolicy } from '../src/config';
import { ParseError } from '../src/core/errors';
import { createSchema } from '../src/core/schema';

const TEST_CONFIG_DIR = path.join(__dirname, '.test-config');

beforeEach(() => {
  if (fs.existsSync(TEST_CONFIG_DIR)) {
    fs.rmSync(TEST_CONFIG_DIR, { recursive: true, force: true });
  }
  fs.mkdirSync(TEST_CONFIG_DIR, { recursive: true });
});

afterAll(() => {
  if (fs.existsSync(TEST_CONFIG_DIR)) {
    fs.rmSync(TEST_CONFIG_DIR, { recursive: true, force: true });
  }
});

function writeFixture(name: string, content: string): string {
  const file = path.join(TEST_CONFIG_DIR, name);
  fs.writeFileSync(file, content, 'utf-8');
  return file;
}

describe('Policy', () => {
  test('accepts an empty policy', () => {
    expect(parsePolicy({})).toEqual({});
  });

  test('accepts every supported setting', () => {
    const policy = {
      scoring: { breakingPenalty: 20, breakingDecay: 1 },
      thresholds: { sql: 90 },
      severityOverrides: { 'made-required': 'warning' },
      maxDepth: 10,
    };
    expect(parsePolicy(policy)).toEqual(policy);
  });

  test('rejects thresholds outside 0 to 100', () => {
    expect(() => parsePolicy({ thresholds: { sql: 150 } })).toThrow(ParseError);
    expect(() => parsePolicy({ thresholds: { sql: 150 } })).toThrow(
      'Invalid policy: thresholds.sql: Number must be less than or equal to 100'
    );
  });

  test('rejects overrides for rules that do not exist', () => {
    expect(() => parsePolicy({ severityOverrides: { 'no-such-rule': 'info' } })).toThrow(
      'Invalid policy: severityOverrides: unknown rule id: no-such-rule'
    );
  });

  test('rejects unknown settings', () => {
    expect(() => parsePolicy({ colour: true })).toThrow(/^Invalid policy: Unrecognized key/);
  });

  test('loads a policy file', () => {
    const file = writeFixture('policy.json', JSON.stringify({ thresholds: { protobuf: 95 } }));
    expect(loadPolicy(file)).toEqual({ thresholds: { protobuf: 95 } });
  });

  test('reports malformed JSON with the file name', () => {
    const file = writeFixture('broken.json', '{ "thresholds": ');
    expect(() => loadPolicy(file)).toThrow(`Invalid policy file ${file}: `);
  });
});

describe('Change sets', () => {
  const change = {
    location: ['age'],
    path: 'age',
    kind: 'removed',
    description: 'Field removed: "age" (was: integer)',
    before: 'integer',
    severity: 'breaking',
    isBreaking: true,
  };

  test('accepts a bare array of changes', () => {
    expect(parseChangeSet([change])).toEqual([change]);
  });

  test('accepts a saved report', () => {
    expect(parseChangeSet({ isCompatible: false, changes: [change] })).toEqual([change]);
  });

  test('rejects an unknown change kind', () => {
    expect(() => parseChangeSet([{ ...change, kind: 'exploded' }])).toThrow(/^Invalid change set: 0\.kind: Invalid enum value/);
  });

  test('loads the changes of a report written as JSON', () => {
    const v1 = createSchema('protobuf', 'message User { string email = 1; }');
    const v2 = createSchema('protobuf', 'message User { int32 user_id = 1; }');
    const report = analyzeCompatibility(v1, v2);

    const file = writeFixture('report.json', JSON.stringify(report, null, 2));
    expect(loadChangeSet(file)).toEqual(report.changes);
  });
});
