// Configuration
export {
  defineConfig,
  irkitConfigSchema,
  loadIrkitConfig,
  parseIrkitConfig,
} from "./core/config";
export type {
  IrkitConfig,
  IrkitConfigInput,
  LoadConfigOptions,
  LoadConfigResult,
} from "./core/config";

// Errors
export {
  ConfigError,
  IrkitError,
  StructuralError,
  formatWarning,
} from "./core/errors";
export type { ParseWarning, ParseWarningCode } from "./core/errors";

// Orchestration
export { buildIR } from "./core/generator";
export type { BuildIROptions, BuildIRResult } from "./core/generator";
export { SpecLoader, parseOpenApiDocument } from "./loader/spec-loader";
export type { LoadIRResult, SpecLoaderOptions } from "./loader/spec-loader";
export { filterPaths, loadSpecDocument } from "./loader/source";

// IR
export type {
  HttpMethod,
  IRDiscriminator,
  IROperation,
  IRParameter,
  IRRequestBody,
  IRResponse,
  IRSchema,
  IRSpec,
  JsonValue,
  ResolvedType,
  StreamFormat,
  UnifiedDiscriminatorEnum,
} from "./ir/types";
export { createSchema, isPlaceholder } from "./ir/schema";
export {
  buildDependencyGraph,
  extractDependencies,
  topologicalSortSchemas,
} from "./ir/utils";

// Parsing
export { ParsingContext } from "./parsing/context";
export type { ParsingContextOptions, RawComponents } from "./parsing/context";
export { parseSchema } from "./parsing/schema-parser";
export { normalizeType } from "./parsing/type-field";
export { DiscriminatorEnumCollector } from "./transformers/discriminator-enums";

// Type resolution
export { SchemaTypeResolver } from "./types/resolver";
export {
  ModuleGraph,
  RenderModuleContext,
  getRelativeImportPath,
} from "./types/module-context";
export type { ModuleContext } from "./types/module-context";

// Logging
export {
  createConsolaLogger,
  createMemoryLogger,
  createSilentLogger,
} from "./utils/logger";
export type { IrkitLogger } from "./utils/logger";
