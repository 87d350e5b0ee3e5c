import { dirname } from "node:path";

import { loadConfig } from "c12";
import * as z from "zod";

import { ConfigError } from "./errors";

import type { DotenvOptions } from "c12";

/**
 * Options for loading the irkit config
 */
export interface LoadConfigOptions {
  /** Path to the config file */
  configPath?: string;
  /** Dotenv configuration - true to load .env, false to disable, or DotenvOptions object */
  dotenv?: boolean | DotenvOptions;
  /** Values that take precedence over the config file (e.g. CLI flags) */
  overrides?: Partial<IrkitConfigInput>;
}

/**
 * Result of loading the irkit config
 */
export interface LoadConfigResult {
  /** The validated configuration */
  config: IrkitConfig;
  /** The resolved path to the config file, if one was found */
  configPath?: string;
}

// =============================================================================
// Config Schema
// =============================================================================

/**
 * Main irkit configuration schema
 */
export const irkitConfigSchema = z.object({
  /** OpenAPI spec URL or local file path */
  spec: z.string().min(1, "OpenAPI spec path or URL is required"),
  /** Headers to send when fetching a remote spec */
  headers: z.record(z.string(), z.string()).optional(),
  /** Glob patterns for paths to include (e.g., ["/users/**", "/posts/*"]) */
  include: z.array(z.string()).optional(),
  /** Glob patterns for paths to exclude */
  exclude: z.array(z.string()).optional(),
  /** Run the OpenAPI validator and report its findings as warnings */
  validate: z.boolean().default(true),
  /** Nesting depth at which schema parsing stops with a placeholder */
  maxDepth: z.number().int().positive().default(100),
  /** Log every reference cycle as it is found */
  debugCycles: z.boolean().default(false),
  /** Stop logging cycles after this many (0 = no limit) */
  maxCycles: z.number().int().nonnegative().default(0),
});

/**
 * The normalized configuration type used internally (after parsing)
 */
export type IrkitConfig = z.output<typeof irkitConfigSchema>;

/**
 * Input configuration type (before defaults applied)
 */
export type IrkitConfigInput = z.input<typeof irkitConfigSchema>;

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Helper for defining a typed config
 */
export function defineConfig(config: IrkitConfigInput): IrkitConfigInput {
  return config;
}

/**
 * Validate a raw config value, listing every issue
 */
export function parseIrkitConfig(
  value: unknown,
  source = "configuration",
): IrkitConfig {
  const result = irkitConfigSchema.safeParse(value);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Invalid configuration in ${source}:\n${errors}`);
  }
  return result.data;
}

/**
 * Load irkit.config.* (and .env) with c12, apply overrides and validate
 */
export async function loadIrkitConfig(
  options: LoadConfigOptions = {},
): Promise<LoadConfigResult> {
  // If a config path is provided, use its directory as cwd for dotenv resolution
  const cwd = options.configPath ? dirname(options.configPath) : undefined;

  const { config, configFile } = await loadConfig<Partial<IrkitConfigInput>>({
    name: "irkit",
    cwd,
    configFile: options.configPath,
    rcFile: false,
    globalRc: false,
    dotenv: options.dotenv ?? true,
    overrides: options.overrides,
  });

  if (!config || Object.keys(config).length === 0) {
    throw new ConfigError(
      `No configuration found. Create an irkit.config.ts file, specify one with --config, or pass --spec.`,
    );
  }

  return {
    config: parseIrkitConfig(config, configFile ?? "configuration"),
    configPath: configFile,
  };
}
