/**
 * Intermediate Representation (IR) types
 *
 * One IRSchema per OpenAPI schema node. Named schemas live in a flat,
 * name-keyed arena; everything else references them by instance or by name.
 */

/** Any value that can appear in a decoded JSON/YAML document */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Primitive type tags as they appear in a schema's `type` field */
export const PRIMITIVE_TYPES = [
  "string",
  "integer",
  "number",
  "boolean",
  "null",
] as const;

export type PrimitiveType = (typeof PRIMITIVE_TYPES)[number];

/** Every `type` tag the OpenAPI vocabulary defines */
export type StructuralType = PrimitiveType | "object" | "array";

export interface IRDiscriminator {
  /** Name of the property selecting the active variant */
  propertyName: string;
  /** Discriminator value -> `$ref` of the variant */
  mapping?: Record<string, string>;
}

export interface IRSchema {
  /** Global name for named schemas, undefined for anonymous nodes */
  name?: string;
  /**
   * A StructuralType, or the name of another schema once an inline
   * property has been promoted
   */
  type?: string;
  format?: string;
  description?: string;
  title?: string;
  /** Ordered property map */
  properties: Record<string, IRSchema>;
  /** Sorted, duplicate-free property names */
  required: string[];
  items?: IRSchema;
  /** Ordered enum values; undefined means "not an enum" */
  enum?: JsonValue[];
  default?: JsonValue;
  example?: JsonValue;
  additionalProperties?: boolean | IRSchema;
  isNullable: boolean;
  anyOf?: IRSchema[];
  allOf?: IRSchema[];
  oneOf?: IRSchema[];
  discriminator?: IRDiscriminator;
  /** Object whose only, required property is `data` */
  isDataWrapper: boolean;

  /** Placeholder created for a `$ref` that could not be resolved */
  fromUnresolvedRef: boolean;
  /** Placeholder created when a cycle or the depth limit was hit */
  isCircularRef: boolean;
  circularRefPath?: string;
  /**
   * Lookup-only link from a slim property schema to the schema it stands
   * for (promoted object, hoisted enum, unified discriminator enum)
   */
  refersToSchema?: IRSchema;

  /** Emitted type name, set once by the naming pass */
  generationName?: string;
  /** Emitted module file stem, set alongside generationName */
  finalModuleStem?: string;
}

// ============================================================================
// Operations
// ============================================================================

export const HTTP_METHODS = [
  "get",
  "put",
  "post",
  "delete",
  "options",
  "head",
  "patch",
  "trace",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type ParameterLocation = "path" | "query" | "header" | "cookie";

export interface IRParameter {
  name: string;
  in: ParameterLocation;
  required: boolean;
  schema: IRSchema;
  description?: string;
}

export interface IRRequestBody {
  required: boolean;
  /** Media type -> schema */
  content: Record<string, IRSchema>;
  description?: string;
}

export type StreamFormat =
  | "octet-stream"
  | "event-stream"
  | "ndjson"
  | "json-seq"
  | "multipart-mixed";

export interface IRResponse {
  /** Status code such as "200", or "default" */
  statusCode: string;
  description?: string;
  /** Media type -> schema */
  content: Record<string, IRSchema>;
  stream: boolean;
  streamFormat?: StreamFormat;
}

export interface IROperation {
  operationId: string;
  method: HttpMethod;
  /** URL path template, e.g. "/pets/{petId}" */
  path: string;
  summary?: string;
  description?: string;
  parameters: IRParameter[];
  requestBody?: IRRequestBody;
  responses: IRResponse[];
  tags: string[];
}

// ============================================================================
// Spec
// ============================================================================

export interface IRSpec {
  title: string;
  version: string;
  description?: string;
  /** The arena, keyed by global schema name */
  schemas: Record<string, IRSchema>;
  operations: IROperation[];
  servers: string[];
  /** Per-variant enum names superseded by unified discriminator enums */
  discriminatorSkipList: Set<string>;
}

/**
 * One enum combining the discriminator values of every variant in a
 * discriminated union
 */
export interface UnifiedDiscriminatorEnum {
  /** e.g. "PetTypeEnum" */
  name: string;
  /** e.g. "type" */
  propertyName: string;
  /** e.g. "Pet" */
  unionSchemaName: string;
  /** [memberName, value] in variant order, duplicates preserved */
  values: [string, JsonValue][];
  variantEnumNames: Set<string>;
  description?: string;
}

// ============================================================================
// Type resolution
// ============================================================================

/**
 * Target-language type for one schema use site
 */
export interface ResolvedType {
  /** Type expression, e.g. "Pet[]" or "string | null" */
  type: string;
  /** The caller must import `importName` from `importModule` */
  needsImport: boolean;
  importModule?: string;
  importName?: string;
  isOptional: boolean;
  /** Refers to a type that is not imported eagerly (same module or cycle) */
  isForwardRef: boolean;
}
