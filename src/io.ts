/**
 * File loading. Filesystem failures surface as IoError and undecodable bytes
 * as EncodingError.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createSchema } from './core/schema';
import { EncodingError, IoError, errorMessage } from './core/errors';
import { Schema } from './core/types';
import { detectFormat } from './formats';

const decoder = new TextDecoder('utf-8', { fatal: true });

function ioMessage(filePath: string, error: unknown): string {
  const code = typeof error === 'object' && error !== null && 'code' in error ? String(error.code) : undefined;
  switch (code) {
    case 'ENOENT':
      return `File not found: ${filePath}`;
    case 'EACCES':
    case 'EPERM':
      return `Permission denied: ${filePath}`;
    case 'EISDIR':
      return `Expected a file but found a directory: ${filePath}`;
    default:
      return `Cannot read ${filePath}: ${errorMessage(error)}`;
  }
}

/**
 * Read a UTF-8 text file. A leading byte order mark is dropped.
 */
export function readTextFile(filePath: string): string {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (error) {
    throw new IoError(ioMessage(filePath, error), error);
  }

  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new EncodingError(`${filePath} is not valid UTF-8`, error);
  }
}

export function writeTextFile(filePath: string, content: string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf-8');
  } catch (error) {
    throw new IoError(`Cannot write ${filePath}: ${errorMessage(error)}`, error);
  }
}

export interface LoadSchemaOptions {
  /** Declared format; detected from the file name and content when omitted */
  format?: string;

  /** Schema version (default: '1.0.0') */
  version?: string;
}

export function loadSchemaFile(filePath: string, options: LoadSchemaOptions = {}): Schema {
  const content = readTextFile(filePath);
  const format = options.format ?? detectFormat(path.basename(filePath), content);
  return createSchema(format, content, options.version);
}
