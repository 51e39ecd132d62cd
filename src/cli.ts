#!/usr/bin/env node

/**
 * schema-evolve CLI
 *
 * Commands:
 *   analyze   - Report the compatibility of a new schema version with an old one
 *   migrate   - Print the migration steps between two schema versions
 *   validate  - Check a saved change set against a format's rules
 */

import { Command, Option } from 'commander';
import { AnalyzerOptions, SchemaAnalyzer } from './analyzer';
import { loadChangeSet, loadPolicy } from './config';
import { SchemaDiffError, errorMessage } from './core/errors';
import { PlanFormat, formatPlan, formatReport } from './core/reporter';
import { ReportFormat, SCHEMA_FORMATS, Severity } from './core/types';
import { loadSchemaFile, writeTextFile } from './io';
import { createConsoleLogger } from './logger';

const program = new Command();

program
  .name('schema-evolve')
  .description('Analyze schema changes for compatibility and plan migrations.')
  .version('1.0.0');

// ─── Common Options ─────────────────────────────────────────────────────────

interface CompareOptions {
  old: string;
  new: string;
  format?: string;
  oldVersion: string;
  newVersion: string;
  output?: string;
  config?: string;
  verbose?: boolean;
}

interface AnalyzeOptions extends CompareOptions {
  report: ReportFormat;
  failOn: Severity;
}

interface MigrateOptions extends CompareOptions {
  report: PlanFormat;
}

interface ValidateOptions {
  changes: string;
  format: string;
  config?: string;
  verbose?: boolean;
}

const SEVERITY_RANK: Record<Severity, number> = { info: 0, warning: 1, breaking: 2 };

function withCompareOptions(command: Command): Command {
  return command
    .requiredOption('--old <file>', 'Previous schema version')
    .requiredOption('--new <file>', 'New schema version')
    .addOption(new Option('--format <format>', 'Schema format (detected when omitted)').choices(SCHEMA_FORMATS))
    .option('--old-version <semver>', 'Version of the previous schema', '1.0.0')
    .option('--new-version <semver>', 'Version of the new schema', '2.0.0')
    .option('-o, --output <file>', 'Write output to file instead of stdout')
    .option('-c, --config <file>', 'Policy file (JSON)')
    .option('-v, --verbose', 'Print diagnostic messages to stderr');
}

function analyzerFor(opts: { config?: string; verbose?: boolean }): SchemaAnalyzer {
  const options: AnalyzerOptions = opts.config ? loadPolicy(opts.config) : {};
  return new SchemaAnalyzer({ ...options, logger: createConsoleLogger(opts.verbose) });
}

function loadPair(opts: CompareOptions) {
  const oldSchema = loadSchemaFile(opts.old, { format: opts.format, version: opts.oldVersion });
  const newSchema = loadSchemaFile(opts.new, { format: opts.format ?? oldSchema.format, version: opts.newVersion });
  return { oldSchema, newSchema };
}

function emit(output: string, file?: string): void {
  if (file) {
    writeTextFile(file, output);
    console.log(`📄 Written to ${file}`);
  } else {
    console.log(output);
  }
}

function fail(error: unknown): never {
  const code = error instanceof SchemaDiffError ? ` [${error.code}]` : '';
  console.error(`❌ Error${code}: ${errorMessage(error)}`);
  process.exit(1);
}

// ─── analyze Command ────────────────────────────────────────────────────────

withCompareOptions(program.command('analyze'))
  .description('Compare two schema versions and report their compatibility')
  .addOption(
    new Option('-r, --report <format>', 'Report format')
      .choices(['console', 'json', 'markdown', 'html'])
      .default('console')
  )
  .addOption(
    new Option('--fail-on <severity>', 'Exit with code 1 when a change reaches this severity')
      .choices(['breaking', 'warning', 'info'])
      .default('breaking')
  )
  .action((opts: AnalyzeOptions) => {
    try {
      const analyzer = analyzerFor(opts);
      const { oldSchema, newSchema } = loadPair(opts);
      const report = analyzer.analyzeCompatibility(oldSchema, newSchema);

      emit(formatReport(report, opts.report), opts.output);

      const threshold = SEVERITY_RANK[opts.failOn];
      if (report.changes.some((c) => SEVERITY_RANK[c.severity] >= threshold)) {
        process.exit(1);
      }
    } catch (error) {
      fail(error);
    }
  });

// ─── migrate Command ────────────────────────────────────────────────────────

withCompareOptions(program.command('migrate'))
  .description('Print the ordered migration steps between two schema versions')
  .addOption(
    new Option('-r, --report <format>', 'Output format').choices(['console', 'json', 'markdown']).default('console')
  )
  .action((opts: MigrateOptions) => {
    try {
      const analyzer = analyzerFor(opts);
      const { oldSchema, newSchema } = loadPair(opts);
      const plan = analyzer.generateMigrationPath(oldSchema, newSchema);

      emit(formatPlan(plan, opts.report), opts.output);
    } catch (error) {
      fail(error);
    }
  });

// ─── validate Command ───────────────────────────────────────────────────────

program
  .command('validate')
  .description('Check a change set (JSON array or saved JSON report) against the rules of a format')
  .requiredOption('--changes <file>', 'Change set file')
  .addOption(new Option('--format <format>', 'Schema format').choices(SCHEMA_FORMATS).makeOptionMandatory())
  .option('-c, --config <file>', 'Policy file (JSON)')
  .option('-v, --verbose', 'Print diagnostic messages to stderr')
  .action((opts: ValidateOptions) => {
    try {
      const analyzer = analyzerFor(opts);
      const result = analyzer.validateChanges(loadChangeSet(opts.changes), opts.format);

      if (result.valid) {
        console.log('✅ Change set is consistent');
        return;
      }

      console.log(`❌ ${result.errors.length} problem(s) found:\n`);
      for (const error of result.errors) {
        console.log(`  • ${error}`);
      }
      process.exit(1);
    } catch (error) {
      fail(error);
    }
  });

// ─── Run ────────────────────────────────────────────────────────────────────

program.parse();
