/**
 * schema-evolution-analyzer
 *
 * Tell whether a new version of a schema is safe to roll out, and how to get there.
 *
 * @example
 * ```typescript
 * import { createSchema, analyzeCompatibility, generateMigrationPath } from 'schema-evolution-analyzer';
 *
 * const v1 = createSchema('sql', 'CREATE TABLE users (id INTEGER PRIMARY KEY, email TEXT);', '1.0.0');
 * const v2 = createSchema('sql', 'CREATE TABLE users (id INTEGER PRIMARY KEY);', '2.0.0');
 *
 * const report = analyzeCompatibility(v1, v2);
 * if (!report.isCompatible) {
 *   console.log(generateMigrationPath(v1, v2).steps);
 * }
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export {
  SchemaAnalyzer,
  AnalyzerOptions,
  analyzeCompatibility,
  generateMigrationPath,
  validateChanges,
} from './analyzer';
export { createSchema, isSemver } from './core/schema';

// ─── Core Types ─────────────────────────────────────────────────────────────
export * from './core/types';

// ─── Errors ─────────────────────────────────────────────────────────────────
export {
  SchemaDiffError,
  SchemaDiffErrorCode,
  ParseError,
  ComparisonError,
  InvalidFormatError,
  IoError,
  EncodingError,
  FormatSpecificError,
} from './core/errors';

// ─── Core Engines (for advanced usage) ──────────────────────────────────────
export { diffNodes, DiffOptions } from './core/differ';
export {
  getRuleTable,
  classifyChange,
  classifyChanges,
  listRuleIds,
  CompatibilityRule,
  RuleTable,
  RulePolicy,
  DEFAULT_THRESHOLD,
} from './core/rules';
export { calculateCompatibilityScore, buildReport, ScoringPolicy, DEFAULT_SCORING } from './core/scorer';
export { planMigration, orderInstructions, toInstruction } from './core/planner';
export { validateChangeSet } from './core/validator';
export { formatReport, formatPlan, PlanFormat } from './core/reporter';
export { formatPath, nodeAt, typeLabel } from './core/node';

// ─── Format Adapters ────────────────────────────────────────────────────────
export {
  getAdapter,
  detectFormat,
  jsonSchemaAdapter,
  openApiAdapter,
  protobufAdapter,
  sqlAdapter,
} from './formats';

// ─── Configuration, Files & Logging ─────────────────────────────────────────
export { loadPolicy, parsePolicy, loadChangeSet, parseChangeSet, AnalyzerPolicy } from './config';
export { loadSchemaFile, readTextFile, LoadSchemaOptions } from './io';
export { Logger, createConsoleLogger, silentLogger } from './logger';
