/**
 * SpecLoader
 *
 * Turns a decoded OpenAPI document into an IRSpec: every component schema
 * is parsed into the arena, operations are walked, then the post-parse
 * passes run in order.
 */

import * as z from "zod";

import { StructuralError } from "@/core/errors";
import { ParsingContext } from "@/parsing/context";
import { isRawSchema } from "@/parsing/node";
import { resolveNamedSchema } from "@/parsing/ref-resolver";
import { parseNode } from "@/parsing/schema-parser";
import { DiscriminatorEnumCollector } from "@/transformers/discriminator-enums";
import {
  extractInlineArrayItems,
  extractInlineEnums,
} from "@/transformers/inline-enums";
import { assignGenerationNames } from "@/transformers/naming";
import { defaultLogger } from "@/utils/logger";

import { parseOperations } from "./operations";

import type { IRSpec, UnifiedDiscriminatorEnum } from "@/ir/types";
import type { RawComponents } from "@/parsing/context";
import type { RawSchema } from "@/parsing/node";
import type { IrkitLogger } from "@/utils/logger";

// =============================================================================
// Document Shape
// =============================================================================

const infoSchema = z.object({
  title: z.string().optional().catch(undefined),
  version: z.string().optional().catch(undefined),
  description: z.string().optional().catch(undefined),
});

/**
 * Top-level fields the loader reads. Only `openapi` and `paths` are
 * mandatory; the rest falls back to defaults when malformed.
 */
export const openApiDocumentSchema = z.object({
  openapi: z.string({
    error: "Missing 'openapi' field in the specification.",
  }),
  paths: z.record(z.string(), z.unknown(), {
    error: "Missing 'paths' section in the specification.",
  }),
  info: infoSchema.optional().catch(undefined),
  servers: z.array(z.unknown()).optional().catch(undefined),
  components: z.record(z.string(), z.unknown()).optional().catch(undefined),
});

export type OpenApiDocument = z.output<typeof openApiDocumentSchema>;

/**
 * Validate the top level of a decoded document
 */
export function parseOpenApiDocument(value: unknown): OpenApiDocument {
  const result = openApiDocumentSchema.safeParse(value);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `  - ${e.path.join(".") || "(root)"}: ${e.message}`)
      .join("\n");
    throw new StructuralError(`Invalid OpenAPI document:\n${errors}`);
  }
  return result.data;
}

function schemaRecord(value: unknown): Record<string, RawSchema> | undefined {
  if (!isRawSchema(value)) return undefined;

  const record: Record<string, RawSchema> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (isRawSchema(entry)) record[name] = entry;
  }
  return record;
}

function readComponents(document: OpenApiDocument): RawComponents {
  const components = document.components ?? {};
  return {
    schemas: schemaRecord(components.schemas),
    parameters: schemaRecord(components.parameters),
    requestBodies: schemaRecord(components.requestBodies),
    responses: schemaRecord(components.responses),
  };
}

function readServers(document: OpenApiDocument): string[] {
  const servers: string[] = [];
  for (const server of document.servers ?? []) {
    if (isRawSchema(server) && typeof server.url === "string") {
      servers.push(server.url);
    }
  }
  return servers;
}

// =============================================================================
// Loader
// =============================================================================

export interface SpecLoaderOptions {
  logger?: IrkitLogger;
  /** Depth at which recursion stops with a placeholder (default 100) */
  maxDepth?: number;
  /** Stop logging cycles after this many (0 = no limit) */
  maxCycles?: number;
  /** Log every reference cycle as it is found */
  debugCycles?: boolean;
}

export interface LoadIRResult {
  spec: IRSpec;
  /** Every recovered problem, as `[code] message` */
  warnings: string[];
  /** Unified discriminator enums by name */
  unifiedEnums: Map<string, UnifiedDiscriminatorEnum>;
  /** Number of reference cycles met while parsing */
  cycleCount: number;
  /** Deepest nesting reached while parsing */
  maxDepthReached: number;
}

export class SpecLoader {
  readonly document: OpenApiDocument;
  readonly context: ParsingContext;

  constructor(document: unknown, options: SpecLoaderOptions = {}) {
    this.document = parseOpenApiDocument(document);
    this.context = new ParsingContext({
      components: readComponents(this.document),
      maxDepth: options.maxDepth,
      maxCycles: options.maxCycles,
      debugCycles: options.debugCycles,
      logger: options.logger ?? defaultLogger,
    });
  }

  get title(): string {
    return this.document.info?.title ?? "API Client";
  }

  get version(): string {
    return this.document.info?.version ?? "0.0.0";
  }

  /**
   * Build the IR. Each call starts from a clean context.
   */
  loadIR(): LoadIRResult {
    const { context } = this;
    context.reset();

    for (const name of Object.keys(context.rawSchemas)) {
      resolveNamedSchema(name, context, parseNode);
    }
    context.logger.debug(`Parsed ${context.schemas.size} component schemas`);

    const operations = parseOperations(this.document.paths, context);

    const collector = new DiscriminatorEnumCollector(
      context.schemas,
      context.logger,
    );
    for (const key of collector.identifyDiscriminatorProperties()) {
      context.discriminatorProperties.add(key);
    }

    extractInlineArrayItems(context);
    extractInlineEnums(context);

    const unifiedEnums = collector.collectUnifiedEnums();
    for (const warning of collector.warnings) {
      context.record(warning.code, warning.message);
    }

    assignGenerationNames(context.schemas);

    if (context.cycleDetected) {
      context.logger.info(
        `Resolved ${context.cycleCount} reference cycles (max depth reached: ${context.maxDepthReached})`,
      );
    }

    return {
      spec: {
        title: this.title,
        version: this.version,
        description: this.document.info?.description,
        schemas: Object.fromEntries(context.schemas),
        operations,
        servers: readServers(this.document),
        discriminatorSkipList: collector.variantEnumSkipList,
      },
      warnings: context.warningMessages(),
      unifiedEnums,
      cycleCount: context.cycleCount,
      maxDepthReached: context.maxDepthReached,
    };
  }
}
