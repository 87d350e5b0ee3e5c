/**
 * Error taxonomy
 *
 * Only StructuralError and ConfigError abort a run. Everything the parser
 * can recover from is recorded as a ParseWarning instead of being thrown.
 */

export type IrkitErrorCode = "structural" | "config";

export class IrkitError extends Error {
  readonly code: IrkitErrorCode;

  constructor(code: IrkitErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "IrkitError";
    this.code = code;
  }
}

/**
 * The top-level document is not an OpenAPI document we can walk
 */
export class StructuralError extends IrkitError {
  constructor(message: string, options?: ErrorOptions) {
    super("structural", message, options);
    this.name = "StructuralError";
  }
}

/**
 * Missing or invalid irkit configuration
 */
export class ConfigError extends IrkitError {
  constructor(message: string, options?: ErrorOptions) {
    super("config", message, options);
    this.name = "ConfigError";
  }
}

// ============================================================================
// Recoverable warnings
// ============================================================================

export type ParseWarningCode =
  | "unresolvable-reference"
  | "cycle-detected"
  | "max-depth-exceeded"
  | "ambiguous-type"
  | "composition-failure"
  | "validation";

export interface ParseWarning {
  code: ParseWarningCode;
  message: string;
}

export function formatWarning(warning: ParseWarning): string {
  return `[${warning.code}] ${warning.message}`;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
