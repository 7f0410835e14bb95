/**
 * Compile-CAR Engine — Core Type Definitions
 *
 * Shapes shared by the gate, the orchestrator, the classifier and the CLI.
 * Field names follow the actool reply where they mirror it, camelCased.
 */

import type { Logger } from "./utils/logger";
import type { BaseRunner } from "./runners/base-runner";

// ─── Versions ────────────────────────────────────────────────────

/** Dotted version as an ordered tuple, e.g. "26.0" → [26, 0] */
export type Version = readonly number[];

// ─── Requests ────────────────────────────────────────────────────

export interface CatalogRequest {
  /** Path to the `.xcassets` directory */
  readonly catalogPath: string;
  /** Value passed to `--minimum-deployment-target` */
  readonly minimumDeploymentTarget: string;
  /** Emit the command line and copy destinations as progress events */
  readonly verbose: boolean;
}

/** Everything derived from a catalog path before anything is run. */
export interface CatalogLayout {
  catalogPath: string;
  /** Directory holding the catalog; outputs are written here */
  sourceDir: string;
  /** Catalog file name without the extension, e.g. "Assets_beta" */
  baseName: string;
  /** "" or "_<tag>", e.g. "_beta" */
  nameTag: string;
  /** Sibling `AppIcon<NameTag>.icon` package */
  iconPackagePath: string;
  /** Destination for the compiled icon bundle */
  icnsDestination: string;
  /** Destination for the compiled asset archive */
  carDestination: string;
}

// ─── actool Replies ──────────────────────────────────────────────

/** One entry of an errors/warnings/notices collection. */
export interface Diagnostic {
  type?: string;
  description?: string;
  "failure-reason"?: string;
  "recovery-suggestion"?: string;
  [key: string]: unknown;
}

export interface CompilationResults {
  outputFiles?: string[];
}

/** Raw outcome of running the compiler, before parsing. */
export interface ActoolInvocation {
  exitCode: number;
  stdout: Buffer;
  stderr: string;
}

/** Parsed, validated compilation reply. */
export interface InvocationResult {
  returnCode: number;
  stderr: string;
  errors: Diagnostic[];
  documentErrors: Diagnostic[];
  warnings: Diagnostic[];
  documentWarnings: Diagnostic[];
  notices: Diagnostic[];
  documentNotices: Diagnostic[];
  compilationResults?: CompilationResults;
}

// ─── Classification ──────────────────────────────────────────────

export type FailureReason =
  | "return code"
  | "errors"
  | "document errors"
  | "warnings"
  | "document warnings"
  | "notices"
  | "document notices";

export interface FailureReport {
  reasons: Partial<Record<FailureReason, string | Diagnostic[]>>;
  /** Captured stderr, attached only when a reason was collected */
  stderr?: string;
}

export type Classification =
  | { passed: true }
  | { passed: false; report: FailureReport };

// ─── Results ─────────────────────────────────────────────────────

export interface CompileResult {
  catalogPath: string;
  nameTag: string;
  /** Where the icon bundle was written (`app<Tag>.icns`) */
  icnsPath: string;
  /** Where the asset archive was written (`Assets<Tag>.car`) */
  carPath: string;
  /** Destination files written, in the order they were copied */
  written: string[];
}

// ─── Compiler Options & Events ───────────────────────────────────

export interface CompilerOptions {
  /** Runs `xcrun`; defaults to the real process runner */
  runner?: BaseRunner;
  /** Logger; defaults to one created from `verbose` */
  logger?: Logger;
  /** Enable debug logging when no logger is supplied */
  verbose?: boolean;
}

export type CompileStage =
  | "validated"
  | "staged"
  | "invoking"
  | "classified"
  | "copied"
  | "completed";

export interface CompileEvent {
  stage: CompileStage;
  catalogPath: string;
  timestamp: string;
  message: string;
  /** Full command line, on "invoking" */
  command?: string[];
  /** Destination file, on "copied" */
  destination?: string;
}

export type CompileEventHandler = (event: CompileEvent) => void;
