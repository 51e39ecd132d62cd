/**
 * OpenAPI Adapter
 *
 * Normalizes OpenAPI 3.x (and Swagger 2.0) documents, YAML or JSON. The tree
 * mirrors the document: paths → path → method → parameters / requestBody /
 * responses, plus components. Every node records whether it describes data
 * clients send (request) or receive (response), since the two evolve in
 * opposite directions.
 */

import { parse } from 'yaml';
import { FormatSpecificError, ParseError, errorMessage } from '../core/errors';
import { DEFAULT_MAX_DEPTH, formatPath } from '../core/node';
import {
  Constraints,
  FormatAdapter,
  MigrationInstruction,
  NodeMetadata,
  ObjectField,
  ObjectNode,
  OpenApiDirection,
  OpenApiMetadata,
  RenderContext,
  Schema,
  SchemaNode,
} from '../core/types';
import { JsonObject, describeInstruction, isObject, resolvePointer, toConstraintValue } from './common';
import { normalizeJsonSchema } from './json-schema';

const HTTP_METHODS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'];

function openApiMeta(
  direction: OpenApiDirection,
  source?: JsonObject,
  extra: Partial<OpenApiMetadata> = {}
): NodeMetadata {
  const meta: OpenApiMetadata = { direction, ...extra };
  if (source?.deprecated === true) meta.deprecated = true;
  return { openapi: meta };
}

function objectNode(fields: ObjectField[], required: string[], meta?: NodeMetadata): ObjectNode {
  return meta ? { kind: 'object', fields, required, meta } : { kind: 'object', fields, required };
}

// ─── Document Parsing ───────────────────────────────────────────────────────

export function parseOpenApiDocument(content: string): JsonObject {
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    throw new FormatSpecificError('openapi', errorMessage(error), error);
  }

  if (!isObject(document)) {
    throw new ParseError('Failed to parse schema: an OpenAPI document must be a mapping');
  }
  if (document.openapi === undefined && document.swagger === undefined) {
    throw new ParseError('Failed to parse schema: missing "openapi" or "swagger" version field');
  }
  if (!isObject(document.paths)) {
    throw new ParseError('Failed to parse schema: "paths" must be a mapping');
  }
  return document;
}

// ─── Normalization ──────────────────────────────────────────────────────────

class OpenApiNormalizer {
  constructor(private readonly document: JsonObject) {}

  normalize(): ObjectNode {
    const paths: JsonObject = isObject(this.document.paths) ? this.document.paths : {};
    const pathFields: ObjectField[] = Object.entries(paths)
      .filter((entry): entry is [string, JsonObject] => isObject(entry[1]))
      .map(([path, item]) => ({ name: path, node: this.pathItem(item) }));

    return objectNode(
      [
        { name: 'paths', node: objectNode(pathFields, []) },
        { name: 'components', node: this.components() },
      ],
      ['paths']
    );
  }

  private resolve(value: unknown): unknown {
    if (isObject(value) && typeof value.$ref === 'string') {
      return resolvePointer(this.document, value.$ref) ?? value;
    }
    return value;
  }

  private schema(schema: unknown, direction: OpenApiDirection): SchemaNode {
    return normalizeJsonSchema(schema ?? true, {
      resolve: (ref) => resolvePointer(this.document, ref),
      meta: (s) => openApiMeta(direction, s),
      maxDepth: DEFAULT_MAX_DEPTH,
    });
  }

  private pathItem(item: JsonObject): ObjectNode {
    const fields: ObjectField[] = [];
    for (const method of HTTP_METHODS) {
      const operation = item[method];
      if (isObject(operation)) {
        fields.push({ name: method, node: this.operation(operation, item.parameters) });
      }
    }
    return objectNode(fields, []);
  }

  private operation(operation: JsonObject, shared: unknown): ObjectNode {
    const fields: ObjectField[] = [{ name: 'parameters', node: this.parameters(shared, operation.parameters) }];
    const required: string[] = ['parameters'];

    const body = this.resolve(operation.requestBody);
    if (isObject(body)) {
      fields.push({ name: 'requestBody', node: this.content(body.content, 'request') });
      if (body.required === true) required.push('requestBody');
    }

    const responses = isObject(operation.responses) ? operation.responses : {};
    const statusFields: ObjectField[] = Object.entries(responses).map(([status, raw]) => {
      const response = this.resolve(raw);
      return {
        name: status,
        node: this.content(isObject(response) ? response.content : undefined, 'response'),
      };
    });
    fields.push({ name: 'responses', node: objectNode(statusFields, [], openApiMeta('response')) });
    required.push('responses');

    return objectNode(fields, required, openApiMeta('none', operation));
  }

  /**
   * Path-level and operation-level parameters, keyed 'in:name'. Operation
   * parameters override path-level ones with the same key.
   */
  private parameters(shared: unknown, own: unknown): ObjectNode {
    const byKey = new Map<string, JsonObject>();
    for (const list of [shared, own]) {
      if (!Array.isArray(list)) continue;
      for (const raw of list) {
        const parameter = this.resolve(raw);
        if (isObject(parameter) && typeof parameter.name === 'string' && typeof parameter.in === 'string') {
          byKey.set(`${parameter.in}:${parameter.name}`, parameter);
        }
      }
    }

    const fields: ObjectField[] = [];
    const required: string[] = [];
    for (const [key, parameter] of byKey) {
      const location = String(parameter.in);
      // Swagger 2.0 puts the schema keywords on the parameter itself
      const schema = parameter.schema ?? (parameter.type !== undefined ? parameter : true);
      const node = this.schema(schema, 'request');
      fields.push({ name: key, node: { ...node, meta: openApiMeta('request', parameter, { in: location }) } });
      if (location === 'path' || parameter.required === true) required.push(key);
    }
    return objectNode(fields, required, openApiMeta('request'));
  }

  /** Media types of a request body or response, keyed by content type. */
  private content(content: unknown, direction: OpenApiDirection): ObjectNode {
    const fields: ObjectField[] = [];
    if (isObject(content)) {
      for (const [mediaType, media] of Object.entries(content)) {
        fields.push({ name: mediaType, node: this.schema(isObject(media) ? media.schema : undefined, direction) });
      }
    }
    return objectNode(fields, [], openApiMeta(direction));
  }

  private components(): ObjectNode {
    const components: JsonObject = isObject(this.document.components) ? this.document.components : {};
    // Swagger 2.0 keeps shared schemas under "definitions"
    const schemas = isObject(components.schemas)
      ? components.schemas
      : isObject(this.document.definitions)
        ? this.document.definitions
        : {};

    const schemaFields: ObjectField[] = Object.entries(schemas).map(([name, schema]) => ({
      name,
      node: this.schema(schema, 'none'),
    }));

    const schemes = isObject(components.securitySchemes) ? components.securitySchemes : {};
    const schemeFields: ObjectField[] = Object.entries(schemes).map(([name, raw]): ObjectField => {
      const scheme = this.resolve(raw);
      const constraints: Constraints = {};
      if (isObject(scheme)) {
        for (const key of ['scheme', 'in', 'name', 'bearerFormat']) {
          const value = toConstraintValue(scheme[key]);
          if (value !== undefined) constraints[key] = value;
        }
      }
      const type = isObject(scheme) && typeof scheme.type === 'string' ? scheme.type : 'unknown';
      return { name, node: { kind: 'scalar', type, constraints, meta: openApiMeta('request') } };
    });

    return objectNode(
      [
        { name: 'schemas', node: objectNode(schemaFields, []) },
        { name: 'securitySchemes', node: objectNode(schemeFields, []) },
      ],
      []
    );
  }
}

// ─── Rendering ──────────────────────────────────────────────────────────────

/**
 * Operations are rendered as 'POST /users', component members by their
 * dotted path.
 */
export function describeOpenApiLocation(location: readonly string[]): string {
  if (location[0] === 'paths') {
    if (location.length === 1) return 'paths';
    if (location.length === 2) return `path ${location[1]}`;
    const operation = `${location[2].toUpperCase()} ${location[1]}`;
    if (location.length === 3) return `operation ${operation}`;
    return `${operation} ${formatPath(location.slice(3))}`;
  }
  return formatPath(location);
}

function renderOpenApi(instruction: MigrationInstruction, context: RenderContext): string {
  return describeInstruction(instruction, context, describeOpenApiLocation(instruction.location));
}

// ─── Adapter ────────────────────────────────────────────────────────────────

export const openApiAdapter: FormatAdapter = {
  format: 'openapi',

  check(content: string): void {
    parseOpenApiDocument(content);
  },

  normalize(schema: Schema): SchemaNode {
    return new OpenApiNormalizer(parseOpenApiDocument(schema.content)).normalize();
  },

  render: renderOpenApi,
};
