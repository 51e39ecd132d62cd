/**
 * Schema construction. A Schema is immutable once created and its content is
 * known to be well-formed for its declared format.
 */

import { getAdapter } from '../formats';
import { ParseError } from './errors';
import { Schema } from './types';

const SEMVER =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;

export function isSemver(version: string): boolean {
  return SEMVER.test(version);
}

/**
 * Create a Schema after checking its format, version and content.
 *
 * @throws InvalidFormatError for an unknown format
 * @throws ParseError for empty content, a malformed version or content the format rejects
 * @throws FormatSpecificError when the format's own parser fails
 */
export function createSchema(format: string, content: string, version = '1.0.0'): Schema {
  const adapter = getAdapter(format);

  if (content.trim() === '') {
    throw new ParseError('Failed to parse schema: content is empty');
  }
  if (!isSemver(version)) {
    throw new ParseError(`Failed to parse schema: "${version}" is not a semantic version`);
  }

  adapter.check(content);
  return Object.freeze({ format: adapter.format, content, version });
}
