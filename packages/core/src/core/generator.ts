import { SpecLoader } from "@/loader/spec-loader";
import { loadSpecDocument } from "@/loader/source";
import { defaultLogger } from "@/utils/logger";

import { loadIrkitConfig, parseIrkitConfig } from "./config";
import { formatWarning } from "./errors";

import type { LoadIRResult } from "@/loader/spec-loader";
import type { IrkitLogger } from "@/utils/logger";
import type { IrkitConfig, IrkitConfigInput, LoadConfigOptions } from "./config";

export interface BuildIROptions {
  /**
   * Inline configuration. When omitted, irkit.config.* is loaded with c12
   * (honoring `configPath` and `overrides`).
   */
  config?: IrkitConfigInput;
  /** Path to the config file */
  configPath?: string;
  /** Values that take precedence over the loaded config (e.g. CLI flags) */
  overrides?: LoadConfigOptions["overrides"];
  logger?: IrkitLogger;
}

export interface BuildIRResult extends LoadIRResult {
  config: IrkitConfig;
  /** The config file used, when one was loaded */
  configPath?: string;
}

async function resolveConfig(
  options: BuildIROptions,
): Promise<{ config: IrkitConfig; configPath?: string }> {
  if (options.config) {
    return {
      config: parseIrkitConfig({ ...options.config, ...options.overrides }),
    };
  }
  return loadIrkitConfig({
    configPath: options.configPath,
    overrides: options.overrides,
  });
}

/**
 * Main orchestration: config -> document -> IR
 *
 * Validator findings come first in the returned warnings, followed by
 * the parser's in the order they were found.
 */
export async function buildIR(
  options: BuildIROptions = {},
): Promise<BuildIRResult> {
  const logger = options.logger ?? defaultLogger;
  const { config, configPath } = await resolveConfig(options);

  logger.start(`Loading OpenAPI document from ${config.spec}`);
  const source = await loadSpecDocument(config, logger);

  const loader = new SpecLoader(source.document, {
    maxDepth: config.maxDepth,
    maxCycles: config.maxCycles,
    debugCycles: config.debugCycles,
    logger,
  });
  const result = loader.loadIR();

  const warnings = [...source.warnings.map(formatWarning), ...result.warnings];
  logger.success(
    `Built IR for ${loader.title} ${loader.version}: ${Object.keys(result.spec.schemas).length} schemas, ${result.spec.operations.length} operations`,
  );

  return { ...result, warnings, config, configPath };
}
