/**
 * SchemaAnalyzer — public entry point
 *
 * Wires the format adapters, the diff engine, the rule set, the scorer and the
 * planner together. Every operation is pure: the same inputs and options always
 * produce the same output.
 *
 * Usage:
 *   const analyzer = new SchemaAnalyzer({ thresholds: { protobuf: 90 } });
 *   const report = analyzer.analyzeCompatibility(oldSchema, newSchema);
 *   const plan = analyzer.generateMigrationPath(oldSchema, newSchema);
 */

import { diffNodes } from './core/differ';
import { ComparisonError } from './core/errors';
import { planMigration } from './core/planner';
import { RulePolicy, RuleTable, classifyChanges, getRuleTable } from './core/rules';
import { ScoringPolicy, buildReport } from './core/scorer';
import {
  Change,
  CompatibilityReport,
  FormatAdapter,
  MigrationPlan,
  Schema,
  SchemaNode,
  ValidationResult,
} from './core/types';
import { validateChangeSet } from './core/validator';
import { getAdapter } from './formats';
import { Logger, silentLogger } from './logger';

export interface AnalyzerOptions extends RulePolicy {
  /** Overrides for the score penalties */
  scoring?: Partial<ScoringPolicy>;

  /** Maximum nesting depth the diff engine descends into (default: 64) */
  maxDepth?: number;

  logger?: Logger;
}

interface Comparison {
  adapter: FormatAdapter;
  table: RuleTable;
  oldTree: SchemaNode;
  newTree: SchemaNode;
  changes: Change[];
}

export class SchemaAnalyzer {
  private readonly logger: Logger;

  constructor(private readonly options: AnalyzerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Compare two versions of a schema and report how compatible the new one is.
   */
  analyzeCompatibility(oldSchema: Schema, newSchema: Schema): CompatibilityReport {
    const { table, changes } = this.compare(oldSchema, newSchema);
    const report = buildReport(changes, table, this.options.scoring, {
      oldVersion: oldSchema.version,
      newVersion: newSchema.version,
    });

    this.logger.debug(
      `Score ${report.compatibilityScore} (threshold ${table.threshold}): ` +
        `${report.isCompatible ? 'compatible' : 'incompatible'}`
    );
    return report;
  }

  /**
   * Produce the ordered steps that take data from the old schema to the new one.
   */
  generateMigrationPath(oldSchema: Schema, newSchema: Schema): MigrationPlan {
    const { adapter, changes, oldTree, newTree } = this.compare(oldSchema, newSchema);
    const plan = planMigration(changes, adapter, { oldTree, newTree }, {
      sourceVersion: oldSchema.version,
      targetVersion: newSchema.version,
    });

    this.logger.debug(`Planned ${plan.steps.length} migration step(s)`);
    return plan;
  }

  /**
   * Check a change set against the rules of a format.
   */
  validateChanges(changes: readonly Change[], format: string): ValidationResult {
    const result = validateChangeSet(changes, getRuleTable(format, this.options));
    if (!result.valid) {
      this.logger.warn(`${result.errors.length} inconsistent change(s) found`);
    }
    return result;
  }

  private compare(oldSchema: Schema, newSchema: Schema): Comparison {
    if (oldSchema.format !== newSchema.format) {
      throw new ComparisonError(
        `cannot compare a ${oldSchema.format} schema against a ${newSchema.format} schema`
      );
    }

    const adapter = getAdapter(oldSchema.format);
    const table = getRuleTable(adapter.format, this.options);

    const oldTree = adapter.normalize(oldSchema);
    const newTree = adapter.normalize(newSchema);
    this.logger.debug(`Normalized ${adapter.format} schemas v${oldSchema.version} and v${newSchema.version}`);

    const changes = classifyChanges(diffNodes(oldTree, newTree, { maxDepth: this.options.maxDepth }), table);
    this.logger.debug(`Detected ${changes.length} change(s)`);

    return { adapter, table, oldTree, newTree, changes };
  }
}

// ─── Functional API ─────────────────────────────────────────────────────────

export function analyzeCompatibility(
  oldSchema: Schema,
  newSchema: Schema,
  options: AnalyzerOptions = {}
): CompatibilityReport {
  return new SchemaAnalyzer(options).analyzeCompatibility(oldSchema, newSchema);
}

export function generateMigrationPath(
  oldSchema: Schema,
  newSchema: Schema,
  options: AnalyzerOptions = {}
): MigrationPlan {
  return new SchemaAnalyzer(options).generateMigrationPath(oldSchema, newSchema);
}

export function validateChanges(
  changes: readonly Change[],
  format: string,
  options: AnalyzerOptions = {}
): ValidationResult {
  return new SchemaAnalyzer(options).validateChanges(changes, format);
}
