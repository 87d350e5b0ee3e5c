import { defineCommand } from "citty";
import consola from "consola";

import { IrkitError } from "@/core/errors";
import { buildIR } from "@/core/generator";
import { createConsolaLogger, createSilentLogger } from "@/utils/logger";

import type { IrkitConfigInput } from "@/core/config";
import type { BuildIRResult } from "@/core/generator";

/**
 * What `irkit inspect` reports about a built IR
 */
export interface IRSummary {
  title: string;
  version: string;
  schemas: string[];
  operations: string[];
  unifiedEnums: string[];
  cycles: number;
  maxDepthReached: number;
  warnings: string[];
}

export function summarizeIR(result: BuildIRResult): IRSummary {
  return {
    title: result.spec.title,
    version: result.spec.version,
    schemas: Object.keys(result.spec.schemas).sort(),
    operations: result.spec.operations.map(
      (op) => `${op.method.toUpperCase()} ${op.path} (${op.operationId})`,
    ),
    unifiedEnums: [...result.unifiedEnums.keys()].sort(),
    cycles: result.cycleCount,
    maxDepthReached: result.maxDepthReached,
    warnings: result.warnings,
  };
}

/**
 * Box body for the terminal summary
 */
export function formatSummary(summary: IRSummary): string {
  return [
    `Schemas:        ${summary.schemas.length}`,
    `Operations:     ${summary.operations.length}`,
    `Unified enums:  ${summary.unifiedEnums.length}`,
    `Cycles:         ${summary.cycles}`,
    `Max depth:      ${summary.maxDepthReached}`,
    `Warnings:       ${summary.warnings.length}`,
  ].join("\n");
}

/**
 * Turn CLI flags into config overrides. Unset flags leave the config file's
 * values alone.
 */
export function flagsToOverrides(flags: {
  spec?: string;
  maxDepth?: string;
  validate?: boolean;
}): Partial<IrkitConfigInput> {
  const overrides: Partial<IrkitConfigInput> = {};
  if (flags.spec) overrides.spec = flags.spec;
  if (flags.maxDepth) {
    const maxDepth = Number(flags.maxDepth);
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new IrkitError(
        "config",
        `--max-depth must be a positive integer, got '${flags.maxDepth}'`,
      );
    }
    overrides.maxDepth = maxDepth;
  }
  if (flags.validate === false) overrides.validate = false;
  return overrides;
}

export const inspectCommand = defineCommand({
  meta: {
    name: "inspect",
    description: "Build the IR for an OpenAPI document and summarize it",
  },
  args: {
    config: {
      type: "string",
      alias: "c",
      description: "Path to config file",
    },
    spec: {
      type: "string",
      alias: "s",
      description: "OpenAPI document path or URL (overrides the config)",
    },
    "max-depth": {
      type: "string",
      description: "Nesting depth at which parsing stops with a placeholder",
    },
    validate: {
      type: "boolean",
      description: "Run the OpenAPI validator (--no-validate to skip)",
      default: true,
    },
    json: {
      type: "boolean",
      description: "Print the summary as JSON",
      default: false,
    },
    verbose: {
      type: "boolean",
      alias: "v",
      description: "Show debug output, including every cycle found",
      default: false,
    },
  },
  async run({ args }) {
    // JSON output owns stdout
    const logger = args.json
      ? createSilentLogger()
      : createConsolaLogger({ verbose: args.verbose });

    try {
      const result = await buildIR({
        configPath: args.config,
        overrides: flagsToOverrides({
          spec: args.spec,
          maxDepth: args["max-depth"],
          validate: args.validate,
        }),
        logger,
      });
      const summary = summarizeIR(result);

      if (args.json) {
        process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
        return;
      }

      logger.box({
        title: `${summary.title} ${summary.version}`,
        message: formatSummary(summary),
      });
    } catch (error) {
      if (error instanceof IrkitError) {
        consola.error(error.message);
        process.exit(1);
      }
      throw error;
    }
  },
});
