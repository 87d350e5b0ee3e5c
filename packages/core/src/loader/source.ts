/**
 * OpenAPI document loading
 */

import SwaggerParser from "@apidevtools/swagger-parser";
import micromatch from "micromatch";

import { StructuralError, errorMessage } from "@/core/errors";
import { isRawSchema } from "@/parsing/node";
import { defaultLogger } from "@/utils/logger";

import type { IrkitConfig } from "@/core/config";
import type { ParseWarning } from "@/core/errors";
import type { RawSchema } from "@/parsing/node";
import type { IrkitLogger } from "@/utils/logger";

export interface LoadedSpecSource {
  /** The decoded document with its `$ref`s left in place */
  document: RawSchema;
  /** Findings of the external validator */
  warnings: ParseWarning[];
}

export type SpecSourceConfig = Pick<
  IrkitConfig,
  "spec" | "headers" | "include" | "exclude" | "validate"
>;

/**
 * Check if a spec path is a URL
 */
export function isUrl(spec: string): boolean {
  return spec.startsWith("http://") || spec.startsWith("https://");
}

function parserOptions(config: SpecSourceConfig): SwaggerParser.Options {
  // SwaggerParser handles both URLs and file paths; headers only matter
  // for remote documents
  if (isUrl(config.spec) && config.headers) {
    return { resolve: { http: { headers: config.headers } } };
  }
  return {};
}

/**
 * Read and decode an OpenAPI document (JSON or YAML, local or remote).
 *
 * The document is not dereferenced: reference cycles are resolved by the
 * schema parser, which needs the `$ref`s intact.
 */
export async function loadSpecDocument(
  config: SpecSourceConfig,
  logger: IrkitLogger = defaultLogger,
): Promise<LoadedSpecSource> {
  const options = parserOptions(config);

  let parsed: unknown;
  try {
    parsed = await SwaggerParser.parse(config.spec, options);
  } catch (error) {
    throw new StructuralError(
      `Failed to read OpenAPI document '${config.spec}': ${errorMessage(error)}`,
      { cause: error },
    );
  }

  if (!isRawSchema(parsed)) {
    throw new StructuralError(
      `OpenAPI document '${config.spec}' is not an object`,
    );
  }

  const warnings: ParseWarning[] = [];
  if (config.validate) {
    try {
      // Validation dereferences, so it reads its own copy of the document
      await SwaggerParser.validate(config.spec, options);
    } catch (error) {
      const message = `OpenAPI spec validation error: ${errorMessage(error)}`;
      warnings.push({ code: "validation", message });
      logger.warn(message);
    }
  }

  return {
    document: filterPaths(parsed, config.include, config.exclude),
    warnings,
  };
}

/**
 * Keep only the paths matching the include/exclude glob patterns. Returns a
 * new document; the input is left untouched.
 */
export function filterPaths(
  document: RawSchema,
  include?: string[],
  exclude?: string[],
): RawSchema {
  if (!isRawSchema(document.paths)) return document;
  if (!include?.length && !exclude?.length) return document;

  const paths: Record<string, unknown> = {};
  for (const [path, item] of Object.entries(document.paths)) {
    let shouldInclude = true;

    // Check include patterns (if specified, path must match at least one)
    if (include && include.length > 0) {
      shouldInclude = micromatch.isMatch(path, include);
    }

    // Check exclude patterns (if matches any, exclude it)
    if (shouldInclude && exclude && exclude.length > 0) {
      if (micromatch.isMatch(path, exclude)) {
        shouldInclude = false;
      }
    }

    if (shouldInclude) paths[path] = item;
  }

  return { ...document, paths };
}
