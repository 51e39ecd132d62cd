/**
 * Change-set Validator
 *
 * Re-applies a format's rule table to a set of changes that did not
 * necessarily come from the diff engine (e.g. a hand-written migration intent)
 * and reports every entry whose classification is inconsistent.
 */

import { RuleTable, classifyChange } from './rules';
import { Change, ValidationResult } from './types';

export function validateChangeSet(changes: readonly Change[], table: RuleTable): ValidationResult {
  const errors: string[] = [];
  const seen = new Set<string>();

  changes.forEach((change, index) => {
    const label = `Change #${index + 1} (${change.kind} at "${change.path}")`;

    const key = `${change.path}\u0000${change.kind}`;
    if (seen.has(key)) {
      errors.push(`${label} duplicates an earlier change with the same path and kind`);
    }
    seen.add(key);

    if (change.isBreaking !== (change.severity === 'breaking')) {
      errors.push(
        `${label} is marked ${change.isBreaking ? 'breaking' : 'non-breaking'} but has severity "${change.severity}"`
      );
    }

    const expected = classifyChange(change, table);
    if (expected.severity !== change.severity) {
      errors.push(
        `${label} has severity "${change.severity}" but the ${table.format} rules classify it as "${expected.severity}" (${expected.rule})`
      );
    }
  });

  return { valid: errors.length === 0, errors };
}
