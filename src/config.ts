/**
 * Policy files and change-set files read by the CLI, validated with zod.
 *
 * A policy file tunes scoring and classification:
 *
 * ```json
 * {
 *   "scoring": { "breakingPenalty": 20, "warningPenalty": 2 },
 *   "thresholds": { "protobuf": 90 },
 *   "severityOverrides": { "protobuf-renamed-field": "breaking" },
 *   "maxDepth": 32
 * }
 * ```
 */

import { z } from 'zod';
import { ParseError, errorMessage } from './core/errors';
import { listRuleIds } from './core/rules';
import { Change } from './core/types';
import { readTextFile } from './io';

const severitySchema = z.enum(['breaking', 'warning', 'info']);

const thresholdSchema = z.number().min(0).max(100);

function unknownRuleIds(overrides: Record<string, unknown>): string[] {
  const known = listRuleIds();
  return Object.keys(overrides).filter((id) => !known.includes(id));
}

export const policySchema = z
  .object({
    scoring: z
      .object({
        breakingPenalty: z.number().min(0),
        breakingDecay: z.number().min(0).max(1),
        warningPenalty: z.number().min(0),
        infoPenalty: z.number().min(0),
      })
      .partial()
      .strict()
      .optional(),
    thresholds: z
      .object({
        'json-schema': thresholdSchema,
        openapi: thresholdSchema,
        protobuf: thresholdSchema,
        sql: thresholdSchema,
      })
      .partial()
      .strict()
      .optional(),
    severityOverrides: z
      .record(severitySchema)
      .refine(
        (overrides) => unknownRuleIds(overrides).length === 0,
        (overrides) => ({ message: `unknown rule id: ${unknownRuleIds(overrides).join(', ')}` })
      )
      .optional(),
    maxDepth: z.number().int().positive().optional(),
  })
  .strict();

export type AnalyzerPolicy = z.infer<typeof policySchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseJsonText(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ParseError(`Invalid ${what}: ${errorMessage(error)}`, error);
  }
}

export function parsePolicy(input: unknown): AnalyzerPolicy {
  const parsed = policySchema.safeParse(input);
  if (!parsed.success) {
    throw new ParseError(`Invalid policy: ${describeIssues(parsed.error)}`, parsed.error);
  }
  return parsed.data;
}

export function loadPolicy(filePath: string): AnalyzerPolicy {
  return parsePolicy(parseJsonText(readTextFile(filePath), `policy file ${filePath}`));
}

// ─── Change Sets ────────────────────────────────────────────────────────────

const metadataSchema = z.object({
  'json-schema': z.object({ deprecated: z.boolean().optional() }).optional(),
  openapi: z
    .object({
      direction: z.enum(['request', 'response', 'none']),
      deprecated: z.boolean().optional(),
      in: z.string().optional(),
    })
    .optional(),
  protobuf: z
    .object({
      tag: z.number().int().optional(),
      label: z.enum(['optional', 'required', 'repeated']).optional(),
      deprecated: z.boolean().optional(),
      reservedRanges: z.array(z.tuple([z.number(), z.number()])).optional(),
      reservedNames: z.array(z.string()).optional(),
      enum: z.boolean().optional(),
      enumValues: z.record(z.number().int()).optional(),
    })
    .optional(),
  sql: z
    .object({
      nullable: z.boolean().optional(),
      primaryKey: z.boolean().optional(),
      unique: z.boolean().optional(),
      hasDefault: z.boolean().optional(),
      dataType: z.string().optional(),
      definition: z.string().optional(),
    })
    .optional(),
});

const changeSchema = z.object({
  location: z.array(z.string()),
  path: z.string(),
  kind: z.enum([
    'added',
    'removed',
    'type_changed',
    'constraint_tightened',
    'constraint_loosened',
    'requiredness_changed',
    'renamed',
    'other',
  ]),
  severity: severitySchema,
  isBreaking: z.boolean(),
  description: z.string(),
  before: z.string().optional(),
  after: z.string().optional(),
  rule: z.string().optional(),
  context: z
    .object({
      required: z.boolean().optional(),
      constraints: z.array(z.string()).optional(),
      renamedFrom: z.string().optional(),
      widenedToUnion: z.boolean().optional(),
      onAddedMember: z.boolean().optional(),
      oldMeta: metadataSchema.optional(),
      newMeta: metadataSchema.optional(),
      oldContainerMeta: metadataSchema.optional(),
      newContainerMeta: metadataSchema.optional(),
    })
    .optional(),
});

const changeListSchema = z.array(changeSchema);

const savedReportSchema = z.object({ changes: changeListSchema });

function checkChanges(input: unknown): z.infer<typeof changeListSchema> {
  const parsed = Array.isArray(input) ? changeListSchema.safeParse(input) : savedReportSchema.safeParse(input);
  if (!parsed.success) {
    throw new ParseError(`Invalid change set: ${describeIssues(parsed.error)}`, parsed.error);
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.changes;
}

/**
 * Accepts either a bare array of changes or a saved CompatibilityReport.
 */
export function parseChangeSet(input: unknown): Change[] {
  return checkChanges(input).map((change) => ({ ...change, location: [...change.location] }));
}

export function loadChangeSet(filePath: string): Change[] {
  return parseChangeSet(parseJsonText(readTextFile(filePath), `change set ${filePath}`));
}
