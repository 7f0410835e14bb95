/**
 * Compile-CAR Engine — Public API
 *
 * The CLI imports from here, never from internal modules.
 */

export { CatalogCompiler } from "./engine";

export type {
  Version,
  CatalogRequest,
  CatalogLayout,
  Diagnostic,
  CompilationResults,
  ActoolInvocation,
  InvocationResult,
  FailureReason,
  FailureReport,
  Classification,
  CompileResult,
  CompilerOptions,
  CompileStage,
  CompileEvent,
  CompileEventHandler,
} from "./types";

export {
  CompileCarError,
  CapabilityError,
  ConfigError,
  AssetCatalogError,
  FormatError,
  CompilationError,
  describeError,
} from "./errors";
export type { ErrorCategory } from "./errors";

export {
  verifyCapability,
  REQUIRED_ACTOOL_VERSION,
  VERSION_QUERY_ARGS,
} from "./capability";
export {
  resolveMinimumDeploymentTarget,
  extractDeploymentTarget,
  MAC_SDK_CONFIG_PATH,
} from "./deployment-target";
export {
  resolveCatalogLayout,
  extractNameTag,
  CATALOG_EXTENSION,
} from "./catalog-path";
export { buildActoolArgs, parseCompilationReply } from "./invocation";
export {
  classifyInvocation,
  formatFailureReport,
  formatDiagnostic,
  ALLOWED_DOCUMENT_WARNING,
} from "./classifier";
export {
  planRelocation,
  relocateOutputs,
  destinationsByRole,
} from "./relocation";
export type { CopyStep, OutputRole } from "./relocation";

export { BaseRunner, XcrunRunner, createDefaultRunner } from "./runners";

// Utilities
export {
  parseVersion,
  formatVersion,
  compareVersions,
  isVersionAtLeast,
} from "./utils/version";
export { createLogger } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";
