/**
 * Score Aggregator
 *
 * Reduces classified changes to a 0–100 compatibility score and builds the
 * compatibility report around it.
 */

import { RuleTable, classifyChange } from './rules';
import { Change, ChangeKind, ChangeSummary, CompatibilityIssue, CompatibilityReport } from './types';

export interface ScoringPolicy {
  /** Penalty for the first breaking change of a kind (default: 15) */
  breakingPenalty: number;

  /** Multiplier applied per additional breaking change of the same kind (default: 0.5) */
  breakingDecay: number;

  /** Penalty per warning (default: 3) */
  warningPenalty: number;

  /** Penalty per info change (default: 0) */
  infoPenalty: number;
}

export const DEFAULT_SCORING: ScoringPolicy = {
  breakingPenalty: 15,
  breakingDecay: 0.5,
  warningPenalty: 3,
  infoPenalty: 0,
};

/**
 * Calculate a backward compatibility score (0–100).
 *
 * - 100 = no changes
 * - The n-th breaking change of a kind costs breakingPenalty × breakingDecay^(n-1)
 * - Rounded, clamped to [0, 100]
 */
export function calculateCompatibilityScore(
  changes: readonly Change[],
  policy: Partial<ScoringPolicy> = {}
): number {
  const { breakingPenalty, breakingDecay, warningPenalty, infoPenalty } = {
    ...DEFAULT_SCORING,
    ...policy,
  };
  const breakingSeen = new Map<ChangeKind, number>();
  let score = 100;

  for (const c of changes) {
    switch (c.severity) {
      case 'breaking': {
        const seen = breakingSeen.get(c.kind) ?? 0;
        score -= breakingPenalty * Math.pow(breakingDecay, seen);
        breakingSeen.set(c.kind, seen + 1);
        break;
      }
      case 'warning':
        score -= warningPenalty;
        break;
      case 'info':
        score -= infoPenalty;
        break;
    }
  }

  return Math.min(100, Math.max(0, Math.round(score)));
}

export function summarize(changes: readonly Change[]): ChangeSummary {
  return {
    breaking: changes.filter((c) => c.severity === 'breaking').length,
    warning: changes.filter((c) => c.severity === 'warning').length,
    info: changes.filter((c) => c.severity === 'info').length,
    total: changes.length,
  };
}

/**
 * Issues carry the rule's remediation hint for every change that needs attention.
 */
export function collectIssues(changes: readonly Change[], table: RuleTable): CompatibilityIssue[] {
  return changes
    .filter((c) => c.severity !== 'info')
    .map((change) => ({ change, hint: classifyChange(change, table).hint }));
}

export function buildReport(
  changes: Change[],
  table: RuleTable,
  policy: Partial<ScoringPolicy> = {},
  metadata: Record<string, string> = {}
): CompatibilityReport {
  const compatibilityScore = calculateCompatibilityScore(changes, policy);
  const summary = summarize(changes);

  return {
    isCompatible: summary.breaking === 0 && compatibilityScore >= table.threshold,
    compatibilityScore,
    changes,
    issues: collectIssues(changes, table),
    summary,
    metadata: {
      ...metadata,
      format: table.format,
      threshold: String(table.threshold),
    },
  };
}
