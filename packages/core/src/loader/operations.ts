/**
 * Operation extraction
 *
 * Walks `paths` into IROperations. Parameter, request body and response
 * schemas go through the same schema parser as the components, so they
 * share the arena and its cycle handling.
 */

import { errorMessage } from "@/core/errors";
import { createSchema, isPlaceholder } from "@/ir/schema";
import { HTTP_METHODS } from "@/ir/types";
import { isRawSchema, ownEntry, stringField, stringList } from "@/parsing/node";
import { parseNode } from "@/parsing/schema-parser";
import { capitalize, sanitizeClassName } from "@/utils/naming";

import type {
  IROperation,
  IRParameter,
  IRRequestBody,
  IRResponse,
  IRSchema,
  ParameterLocation,
  StreamFormat,
} from "@/ir/types";
import type { ParsingContext } from "@/parsing/context";
import type { RawSchema } from "@/parsing/node";

const PARAMETER_LOCATIONS: readonly ParameterLocation[] = [
  "path",
  "query",
  "header",
  "cookie",
];

/** Media types answered with a stream rather than one decoded body */
export const STREAM_FORMATS: Readonly<Record<string, StreamFormat>> = {
  "application/octet-stream": "octet-stream",
  "text/event-stream": "event-stream",
  "application/x-ndjson": "ndjson",
  "application/ndjson": "ndjson",
  "application/json-seq": "json-seq",
  "multipart/mixed": "multipart-mixed",
};

const PARAMETER_REF_PREFIX = "#/components/parameters/";
const REQUEST_BODY_REF_PREFIX = "#/components/requestBodies/";
const RESPONSE_REF_PREFIX = "#/components/responses/";

/**
 * Generate an operation ID from method and path
 * e.g., GET /users/{id} -> getUsersById
 */
export function generateOperationId(method: string, path: string): string {
  const parts = path.split("/").filter(Boolean);

  const nameParts = parts.map((part) => {
    // Handle path parameters like {id}
    if (part.startsWith("{") && part.endsWith("}")) {
      return `By${sanitizeClassName(part.slice(1, -1))}`;
    }
    return sanitizeClassName(part);
  });

  return method.toLowerCase() + nameParts.join("");
}

/**
 * Parse every operation under `paths`. An operation that cannot be parsed
 * is skipped with a warning.
 */
export function parseOperations(
  paths: Readonly<Record<string, unknown>>,
  context: ParsingContext,
): IROperation[] {
  const operations: IROperation[] = [];

  for (const [path, pathItem] of Object.entries(paths)) {
    if (!isRawSchema(pathItem)) continue;

    for (const method of HTTP_METHODS) {
      const node = pathItem[method];
      if (!isRawSchema(node)) continue;

      try {
        operations.push(parseOperation(path, method, pathItem, node, context));
      } catch (error) {
        context.warn(
          "validation",
          `Skipping operation parsing for ${method.toUpperCase()} ${path}: ${errorMessage(error)}`,
        );
      }
    }
  }

  return operations;
}

function parseOperation(
  path: string,
  method: IROperation["method"],
  pathItem: RawSchema,
  node: RawSchema,
  context: ParsingContext,
): IROperation {
  const operationId =
    stringField(node, "operationId") ?? generateOperationId(method, path);
  const label = sanitizeClassName(operationId);

  // Operation-level parameters override path-level ones with the same name
  // and location
  const own = parseParameters(node.parameters, label, context);
  const inherited = parseParameters(pathItem.parameters, label, context).filter(
    (base) => !own.some((p) => p.name === base.name && p.in === base.in),
  );

  return {
    operationId,
    method,
    path,
    summary: stringField(node, "summary"),
    description: stringField(node, "description"),
    parameters: [...inherited, ...own],
    requestBody: parseRequestBody(node.requestBody, label, context),
    responses: parseResponses(node.responses, label, context),
    tags: stringList(node.tags),
  };
}

// ============================================================================
// Components
// ============================================================================

/**
 * Follow a `$ref` into one of the component sections. A node that is not
 * a reference is returned as is; a reference that cannot be followed is
 * reported and yields undefined.
 */
function resolveComponent(
  node: unknown,
  prefix: string,
  section: Record<string, RawSchema> | undefined,
  context: ParsingContext,
): RawSchema | undefined {
  if (!isRawSchema(node)) return undefined;

  const ref = node.$ref;
  if (typeof ref !== "string") return node;

  const resolved = ref.startsWith(prefix)
    ? ownEntry(section ?? {}, ref.slice(prefix.length))
    : undefined;
  if (!resolved) {
    context.warn("unresolvable-reference", `Could not resolve $ref: ${ref}`);
  }
  return resolved;
}

/**
 * Name an anonymous object schema found in an operation and add it to the
 * arena, adding a counter when the name is taken
 */
function registerSynthesized(
  schema: IRSchema,
  base: string,
  context: ParsingContext,
): void {
  let name = base;
  let counter = 1;
  while (context.lookup(name) || ownEntry(context.rawSchemas, name)) {
    name = `${base}${counter}`;
    counter += 1;
  }
  schema.name = name;
  context.register(name, schema);
}

function isSynthesizable(schema: IRSchema): boolean {
  return (
    schema.name === undefined &&
    !isPlaceholder(schema) &&
    schema.type === "object" &&
    (Object.keys(schema.properties).length > 0 ||
      typeof schema.additionalProperties === "object")
  );
}

// ============================================================================
// Parameters
// ============================================================================

function parseParameters(
  value: unknown,
  label: string,
  context: ParsingContext,
): IRParameter[] {
  if (!Array.isArray(value)) return [];

  const parameters: IRParameter[] = [];
  for (const entry of value) {
    const node = resolveComponent(
      entry,
      PARAMETER_REF_PREFIX,
      context.components.parameters,
      context,
    );
    if (node) parameters.push(parseParameter(node, label, context));
  }
  return parameters;
}

function parseParameter(
  node: RawSchema,
  label: string,
  context: ParsingContext,
): IRParameter {
  const name = stringField(node, "name");
  if (!name) {
    throw new Error("Parameter is missing a 'name'");
  }

  const location =
    PARAMETER_LOCATIONS.find((candidate) => candidate === node.in) ?? "query";

  return {
    name,
    in: location,
    // Path parameters are always required
    required: location === "path" || node.required === true,
    schema:
      node.schema === undefined
        ? createSchema()
        : parseNode(node.schema, context, {
            hint: `${label}${sanitizeClassName(name)}`,
          }),
    description: stringField(node, "description"),
  };
}

// ============================================================================
// Bodies
// ============================================================================

/**
 * Media type -> parsed schema
 */
function parseContent(
  value: unknown,
  hint: string,
  context: ParsingContext,
): Record<string, IRSchema> {
  const content: Record<string, IRSchema> = {};
  if (!isRawSchema(value)) return content;

  for (const [mediaType, media] of Object.entries(value)) {
    const schema = isRawSchema(media) ? media.schema : undefined;
    content[mediaType] =
      schema === undefined
        ? createSchema()
        : parseNode(schema, context, { hint });
  }
  return content;
}

function parseRequestBody(
  value: unknown,
  label: string,
  context: ParsingContext,
): IRRequestBody | undefined {
  const node = resolveComponent(
    value,
    REQUEST_BODY_REF_PREFIX,
    context.components.requestBodies,
    context,
  );
  if (!node) return undefined;

  const name = `${label}Request`;
  const content = parseContent(node.content, name, context);
  for (const schema of Object.values(content)) {
    if (isSynthesizable(schema)) registerSynthesized(schema, name, context);
  }

  return {
    required: node.required === true,
    content,
    description: stringField(node, "description"),
  };
}

/**
 * Stream format of a response: by media type, else octet-stream when any
 * schema is binary
 */
export function detectStreamFormat(
  content: Record<string, IRSchema>,
): StreamFormat | undefined {
  for (const mediaType of Object.keys(content)) {
    const format = ownEntry(STREAM_FORMATS, mediaType.toLowerCase());
    if (format) return format;
  }

  const binary = Object.values(content).some(
    (schema) => schema.format === "binary",
  );
  return binary ? "octet-stream" : undefined;
}

/**
 * Name of a synthesized response schema: `{Op}Response` for 2xx codes,
 * `{Op}{Code}Response` otherwise
 */
export function responseSchemaName(label: string, statusCode: string): string {
  if (/^2(\d\d|XX)$/i.test(statusCode)) return `${label}Response`;
  return `${label}${capitalize(statusCode)}Response`;
}

function parseResponses(
  value: unknown,
  label: string,
  context: ParsingContext,
): IRResponse[] {
  if (!isRawSchema(value)) return [];

  const responses: IRResponse[] = [];
  for (const [statusCode, entry] of Object.entries(value)) {
    const node = resolveComponent(
      entry,
      RESPONSE_REF_PREFIX,
      context.components.responses,
      context,
    );
    if (!node) continue;

    const name = responseSchemaName(label, statusCode);
    const content = parseContent(node.content, name, context);
    const streamFormat = detectStreamFormat(content);

    if (!streamFormat) {
      for (const schema of Object.values(content)) {
        if (isSynthesizable(schema)) {
          registerSynthesized(schema, name, context);
        }
      }
    }

    responses.push({
      statusCode,
      description: stringField(node, "description"),
      content,
      stream: streamFormat !== undefined,
      streamFormat,
    });
  }
  return responses;
}
