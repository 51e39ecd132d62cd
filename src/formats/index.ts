/**
 * Format Adapters — registry and format detection
 */

import { InvalidFormatError } from '../core/errors';
import { FormatAdapter, SchemaFormat, isSchemaFormat } from '../core/types';
import { jsonSchemaAdapter } from './json-schema';
import { openApiAdapter } from './openapi';
import { protobufAdapter } from './protobuf';
import { sqlAdapter } from './sql';

export { jsonSchemaAdapter, normalizeJsonSchema, schemaPointer } from './json-schema';
export { openApiAdapter, parseOpenApiDocument, describeOpenApiLocation } from './openapi';
export { protobufAdapter, parseProto } from './protobuf';
export { sqlAdapter, parseCreateTables } from './sql';
export type { ColumnDefinition, TableDefinition } from './sql';

const ADAPTERS: Record<SchemaFormat, FormatAdapter> = {
  'json-schema': jsonSchemaAdapter,
  openapi: openApiAdapter,
  protobuf: protobufAdapter,
  sql: sqlAdapter,
};

export function getAdapter(format: string): FormatAdapter {
  if (!isSchemaFormat(format)) {
    throw new InvalidFormatError(format);
  }
  return ADAPTERS[format];
}

const EXTENSIONS: Record<string, SchemaFormat> = {
  '.proto': 'protobuf',
  '.sql': 'sql',
  '.ddl': 'sql',
  '.yaml': 'openapi',
  '.yml': 'openapi',
};

/**
 * Guess a schema's format from its file name, falling back to its content.
 * JSON files are OpenAPI when they declare an "openapi" or "swagger" version.
 */
export function detectFormat(fileName: string, content: string): SchemaFormat {
  const extension = /\.[^./\\]+$/.exec(fileName.toLowerCase())?.[0] ?? '';
  const byExtension = EXTENSIONS[extension];
  if (byExtension) return byExtension;

  const trimmed = content.trimStart();
  if (/^\s*\{?\s*["']?(openapi|swagger)["']?\s*:/m.test(content)) return 'openapi';
  if (trimmed.startsWith('{') || trimmed.startsWith('[') || extension === '.json') return 'json-schema';
  if (/^\s*(syntax|message|package|enum)\b/m.test(content)) return 'protobuf';
  if (/\bCREATE\s+TABLE\b/i.test(content)) return 'sql';

  throw new InvalidFormatError(extension || fileName);
}
