/**
 * Compile-CAR Engine — Errors
 *
 * Every failure the engine raises is a CompileCarError with a category the
 * CLI can label. Nothing is retried: given the same inputs, the same error
 * comes back.
 */

import type { FailureReport } from "./types";

export type ErrorCategory =
  | "CAPABILITY_ERROR"
  | "CONFIG_ERROR"
  | "FORMAT_ERROR"
  | "INPUT_ERROR"
  | "COMPILATION_ERROR";

export class CompileCarError extends Error {
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    category: ErrorCategory,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CompileCarError";
    this.category = category;
    this.details = details;
  }
}

/** actool is missing, unusable or older than required. */
export class CapabilityError extends CompileCarError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CAPABILITY_ERROR", message, details);
    this.name = "CapabilityError";
  }
}

/** The deployment target could not be determined. */
export class ConfigError extends CompileCarError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIG_ERROR", message, details);
    this.name = "ConfigError";
  }
}

/** Anything that went wrong while processing a single catalog. */
export class AssetCatalogError extends CompileCarError {
  constructor(
    category: ErrorCategory,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(category, message, details);
    this.name = "AssetCatalogError";
  }
}

/** The catalog path violates the `<Base>[_<Tag>].xcassets` convention. */
export class FormatError extends AssetCatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("FORMAT_ERROR", message, details);
    this.name = "FormatError";
  }
}

export class CompilationError extends AssetCatalogError {
  /** Present when classification rejected the compiler's reply */
  readonly report?: FailureReport;

  constructor(
    message: string,
    report?: FailureReport,
    details?: Record<string, unknown>,
  ) {
    super("COMPILATION_ERROR", message, details);
    this.name = "CompilationError";
    this.report = report;
  }
}

/** Message of a caught value, whatever was thrown. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
