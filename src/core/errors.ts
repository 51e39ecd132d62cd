/**
 * Error taxonomy surfaced to callers. Every failure the analyzer reports on
 * purpose is a SchemaDiffError carrying a stable `code`.
 */

import { SchemaFormat } from './types';

export type SchemaDiffErrorCode =
  | 'PARSE_ERROR'
  | 'COMPARISON_ERROR'
  | 'INVALID_FORMAT'
  | 'IO_ERROR'
  | 'ENCODING_ERROR'
  | 'FORMAT_SPECIFIC_ERROR';

export class SchemaDiffError extends Error {
  constructor(
    public readonly code: SchemaDiffErrorCode,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'SchemaDiffError';
  }
}

/** Content does not normalize for its declared format. */
export class ParseError extends SchemaDiffError {
  constructor(message: string, cause?: unknown) {
    super('PARSE_ERROR', message, cause);
    this.name = 'ParseError';
  }
}

/** Two trees (or two schemas) that cannot be compared. */
export class ComparisonError extends SchemaDiffError {
  constructor(message: string) {
    super('COMPARISON_ERROR', `Schema comparison failed: ${message}`);
    this.name = 'ComparisonError';
  }
}

export class InvalidFormatError extends SchemaDiffError {
  constructor(format: string) {
    super('INVALID_FORMAT', `Invalid schema format: ${format}`);
    this.name = 'InvalidFormatError';
  }
}

export class IoError extends SchemaDiffError {
  constructor(message: string, cause?: unknown) {
    super('IO_ERROR', `IO error: ${message}`, cause);
    this.name = 'IoError';
  }
}

export class EncodingError extends SchemaDiffError {
  constructor(message: string, cause?: unknown) {
    super('ENCODING_ERROR', `Encoding error: ${message}`, cause);
    this.name = 'EncodingError';
  }
}

/** Wraps an error raised by a format's own parser. */
export class FormatSpecificError extends SchemaDiffError {
  constructor(
    public readonly format: SchemaFormat,
    message: string,
    cause?: unknown
  ) {
    super('FORMAT_SPECIFIC_ERROR', `${format} error: ${message}`, cause);
    this.name = 'FormatSpecificError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
