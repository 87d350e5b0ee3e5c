/**
 * Type Resolver
 *
 * Maps a finished IRSchema to a TypeScript type expression, recording the
 * imports it needs through a ModuleContext.
 */

import { isPrimitiveType } from "@/ir/schema";
import { sanitizeModuleName } from "@/utils/naming";

import { formatTypeName } from "./formats";

import type { IRSchema, JsonValue, ResolvedType } from "@/ir/types";
import type { ModuleContext } from "./module-context";

/** Resolution result before optionality and nullability are applied */
type BaseType = Omit<ResolvedType, "isOptional">;

const UNKNOWN: BaseType = {
  type: "unknown",
  needsImport: false,
  isForwardRef: false,
};

function plain(type: string): BaseType {
  return { type, needsImport: false, isForwardRef: false };
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function propertyKey(key: string): string {
  return IDENTIFIER.test(key) ? key : JSON.stringify(key);
}

function literal(value: JsonValue): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

export interface SchemaTypeResolverOptions {
  /** Type used where nothing is known about a value (default "unknown") */
  unknownType?: string;
}

export class SchemaTypeResolver {
  private readonly schemas: Record<string, IRSchema>;
  private readonly unknown: BaseType;

  constructor(
    schemas: Record<string, IRSchema>,
    options: SchemaTypeResolverOptions = {},
  ) {
    this.schemas = schemas;
    this.unknown = options.unknownType
      ? plain(options.unknownType)
      : UNKNOWN;
  }

  /**
   * Resolve the type of one use of `schema`.
   *
   * @param required - false marks the result optional
   * @param resolveUnderlying - resolve a named schema to its structure
   *   instead of its name
   */
  resolveSchema(
    schema: IRSchema,
    context: ModuleContext,
    required = true,
    resolveUnderlying = false,
  ): ResolvedType {
    return this.resolveUse(
      schema,
      context,
      required,
      resolveUnderlying,
      new Set(),
    );
  }

  /**
   * resolveSchema carrying the schemas being resolved on the current path
   */
  private resolveUse(
    schema: IRSchema,
    context: ModuleContext,
    required: boolean,
    resolveUnderlying: boolean,
    seen: Set<IRSchema>,
  ): ResolvedType {
    const base = this.resolveBase(schema, context, resolveUnderlying, seen);
    const type =
      schema.isNullable && base.type !== this.unknown.type
        ? `${base.type} | null`
        : base.type;

    return { ...base, type, isOptional: !required };
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  private resolveBase(
    schema: IRSchema,
    context: ModuleContext,
    resolveUnderlying: boolean,
    seen: Set<IRSchema>,
  ): BaseType {
    // A schema met again on its own path is named, never expanded
    if (seen.has(schema)) {
      const name = schema.generationName ?? schema.name;
      return name ? plain(name) : this.unknown;
    }

    seen.add(schema);
    try {
      return this.dispatch(schema, context, resolveUnderlying, seen);
    } finally {
      seen.delete(schema);
    }
  }

  private dispatch(
    schema: IRSchema,
    context: ModuleContext,
    resolveUnderlying: boolean,
    seen: Set<IRSchema>,
  ): BaseType {
    // Slim reference to a promoted, hoisted or unified schema
    const target = this.referenceTarget(schema);
    if (target) {
      return target.generationName
        ? this.resolveNamed(target, context)
        : this.resolveBase(target, context, resolveUnderlying, seen);
    }

    if (schema.generationName && !resolveUnderlying) {
      return this.resolveNamed(schema, context);
    }

    if (schema.anyOf?.length || schema.oneOf?.length) {
      return this.resolveUnion(
        [...(schema.anyOf ?? []), ...(schema.oneOf ?? [])],
        context,
        seen,
      );
    }
    if (schema.allOf?.length) {
      return this.resolveAllOf(schema.allOf, context, seen);
    }

    // Placeholders and copies stand in for the arena schema of their name
    const named = schema.name ? this.arenaSchema(schema.name) : undefined;
    if (named && named !== schema && !resolveUnderlying) {
      return named.generationName
        ? this.resolveNamed(named, context)
        : this.resolveBase(named, context, resolveUnderlying, seen);
    }

    return this.resolveStructure(schema, context, seen);
  }

  private referenceTarget(schema: IRSchema): IRSchema | undefined {
    if (schema.refersToSchema) return schema.refersToSchema;
    const { type } = schema;
    if (type === undefined || type === "object" || type === "array") {
      return undefined;
    }
    return isPrimitiveType(type) ? undefined : this.arenaSchema(type);
  }

  private arenaSchema(name: string): IRSchema | undefined {
    return Object.hasOwn(this.schemas, name) ? this.schemas[name] : undefined;
  }

  /**
   * Named schemas: no import for the current module, otherwise the module
   * context decides between an import and a forward reference
   */
  private resolveNamed(schema: IRSchema, context: ModuleContext): BaseType {
    const name = schema.generationName;
    if (!name) return this.unknown;
    const module = schema.finalModuleStem ?? sanitizeModuleName(name);

    if (module === context.currentModule) {
      return { type: name, needsImport: false, isForwardRef: true };
    }

    const { path, isForwardRef } = context.resolveRelativeOrForward(module);
    if (isForwardRef) {
      return {
        type: name,
        needsImport: false,
        importModule: path,
        importName: name,
        isForwardRef: true,
      };
    }

    context.addImport(path, name);
    return {
      type: name,
      needsImport: true,
      importModule: path,
      importName: name,
      isForwardRef: false,
    };
  }

  // ==========================================================================
  // Compositions
  // ==========================================================================

  /**
   * Sorted, duplicate-free union of member types
   */
  private resolveUnion(
    members: IRSchema[],
    context: ModuleContext,
    seen: Set<IRSchema>,
  ): BaseType {
    const types = members.map((member) =>
      this.resolveElement(member, context, seen),
    );
    const unique = [...new Set(types.map((t) => t.type))].sort();
    const [only] = types;

    if (unique.length === 1 && only) {
      return { ...only, type: unique[0] ?? only.type };
    }
    return {
      type: unique.join(" | "),
      needsImport: false,
      isForwardRef: types.some((t) => t.isForwardRef),
    };
  }

  /**
   * First member with a declared type, else the first member
   */
  private resolveAllOf(
    members: IRSchema[],
    context: ModuleContext,
    seen: Set<IRSchema>,
  ): BaseType {
    const chosen =
      members.find((member) => member.type !== undefined) ?? members[0];
    if (!chosen) return this.unknown;
    return this.resolveBase(chosen, context, false, seen);
  }

  /**
   * Array elements and union members: always required, and named
   * primitive aliases are unwrapped to their primitive
   */
  private resolveElement(
    schema: IRSchema,
    context: ModuleContext,
    seen: Set<IRSchema>,
  ): ResolvedType {
    return this.resolveUse(
      schema,
      context,
      true,
      this.isPrimitiveAlias(schema),
      seen,
    );
  }

  private isPrimitiveAlias(schema: IRSchema): boolean {
    return (
      schema.generationName !== undefined &&
      isPrimitiveType(schema.type) &&
      schema.enum === undefined &&
      !schema.anyOf?.length &&
      !schema.oneOf?.length &&
      !schema.allOf?.length
    );
  }

  // ==========================================================================
  // Structural types
  // ==========================================================================

  private resolveStructure(
    schema: IRSchema,
    context: ModuleContext,
    seen: Set<IRSchema>,
  ): BaseType {
    if (schema.enum?.length) {
      return plain(schema.enum.map(literal).join(" | "));
    }

    switch (schema.type) {
      case "string": {
        const scalar = formatTypeName(schema.format);
        if (!scalar) return plain("string");
        context.addTypingImport(scalar);
        return plain(scalar);
      }
      case "integer":
      case "number":
        return plain("number");
      case "boolean":
        return plain("boolean");
      case "null":
        return plain("null");
      case "array":
        return this.resolveArray(schema, context, seen);
      case "object":
        return this.resolveObject(schema, context, seen);
      default:
        return Object.keys(schema.properties).length > 0
          ? this.resolveObject(schema, context, seen)
          : this.unknown;
    }
  }

  private resolveArray(
    schema: IRSchema,
    context: ModuleContext,
    seen: Set<IRSchema>,
  ): BaseType {
    if (!schema.items) return plain(`${this.unknown.type}[]`);

    const element = this.resolveElement(schema.items, context, seen);
    const type = element.type.includes(" | ")
      ? `(${element.type})[]`
      : `${element.type}[]`;
    return { ...element, type };
  }

  private resolveObject(
    schema: IRSchema,
    context: ModuleContext,
    seen: Set<IRSchema>,
  ): BaseType {
    const entries = Object.entries(schema.properties);

    if (entries.length === 0) {
      const value =
        typeof schema.additionalProperties === "object"
          ? this.resolveElement(schema.additionalProperties, context, seen)
              .type
          : this.unknown.type;
      return plain(`Record<string, ${value}>`);
    }

    const required = new Set(schema.required);
    const fields = entries.map(([key, property]) => {
      const isRequired = required.has(key);
      const resolved = this.resolveUse(
        property,
        context,
        isRequired,
        false,
        seen,
      );
      return `${propertyKey(key)}${isRequired ? "" : "?"}: ${resolved.type}`;
    });
    return plain(`{ ${fields.join("; ")} }`);
  }
}
