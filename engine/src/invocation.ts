/**
 * Compile-CAR Engine — actool Invocation
 *
 * Builds the compile command line and turns actool's stdout into an
 * InvocationResult.
 *
 * Command shape (after `xcrun`):
 *   actool --output-format=xml1 --notices --warnings --errors
 *          --platform=macosx --target-device=mac
 *          --lightweight-asset-runtime-mode=enabled
 *          --enable-icon-stack-fallback-generation=disabled
 *          --app-icon=AppIcon --minimum-deployment-target=<target>
 *          --output-partial-info-plist=<scratch>/partial.plist
 *          --compile=<scratch> <catalog> <scratch>/AppIcon.icon
 */

import * as path from "path";
import type { ActoolInvocation, InvocationResult } from "./types";
import { CompilationError, describeError } from "./errors";
import {
  ACTOOL_KEYS,
  CompilationReplySchema,
  describeIssues,
  readPropertyList,
} from "./schemas";

/** Name the app icon is compiled under, whatever the catalog's tag */
export const APP_ICON_NAME = "AppIcon";
export const STAGED_ICON_PACKAGE = `${APP_ICON_NAME}.icon`;
export const PARTIAL_INFO_PLIST = "partial.plist";

export interface ActoolArgsOptions {
  catalogPath: string;
  /** The icon package copy inside the scratch directory */
  stagedIconPath: string;
  /** Scratch directory actool compiles into */
  scratchDir: string;
  minimumDeploymentTarget: string;
}

/**
 * Build the argument list passed to `xcrun`.
 */
export function buildActoolArgs(opts: ActoolArgsOptions): string[] {
  return [
    "actool",

    // Structured output, with every diagnostic class switched on
    "--output-format=xml1",
    "--notices",
    "--warnings",
    "--errors",

    "--platform=macosx",
    "--target-device=mac",

    // Undocumented. Use the asset catalog frameworks bundled with Xcode
    // rather than the host OS's, so output does not depend on the macOS
    // release the tool runs on.
    "--lightweight-asset-runtime-mode=enabled",

    // Undocumented. Keep the hand-made fallback bitmaps from the catalog
    // instead of letting actool generate 1x-only ones from the .icon.
    "--enable-icon-stack-fallback-generation=disabled",

    `--app-icon=${APP_ICON_NAME}`,
    `--minimum-deployment-target=${opts.minimumDeploymentTarget}`,

    `--output-partial-info-plist=${path.join(opts.scratchDir, PARTIAL_INFO_PLIST)}`,
    `--compile=${opts.scratchDir}`,

    opts.catalogPath,
    opts.stagedIconPath,
  ];
}

/**
 * Parse and validate actool's compile reply.
 *
 * The return code and stderr are carried along untouched; whether they mean
 * failure is for the classifier to decide.
 *
 * @throws CompilationError if stdout is not a property list of the expected shape
 */
export function parseCompilationReply(
  invocation: ActoolInvocation,
): InvocationResult {
  let parsed: unknown;
  try {
    parsed = readPropertyList(invocation.stdout);
  } catch (err) {
    throw new CompilationError(
      `actool returned unreadable output (exit code ${invocation.exitCode}): ${describeError(err)}\n` +
        `stderr: ${invocation.stderr}`,
      undefined,
      { exitCode: invocation.exitCode, stderr: invocation.stderr },
    );
  }

  const reply = CompilationReplySchema.safeParse(parsed);
  if (!reply.success) {
    throw new CompilationError(
      `actool returned output of an unexpected shape: ${describeIssues(reply.error).join("; ")}`,
      undefined,
      { exitCode: invocation.exitCode, stderr: invocation.stderr },
    );
  }

  const data = reply.data;
  const results = data[ACTOOL_KEYS.compilationResults];

  return {
    returnCode: invocation.exitCode,
    stderr: invocation.stderr,
    errors: data[ACTOOL_KEYS.errors],
    documentErrors: data[ACTOOL_KEYS.documentErrors],
    warnings: data[ACTOOL_KEYS.warnings],
    documentWarnings: data[ACTOOL_KEYS.documentWarnings],
    notices: data[ACTOOL_KEYS.notices],
    documentNotices: data[ACTOOL_KEYS.documentNotices],
    compilationResults: results
      ? { outputFiles: results["output-files"] }
      : undefined,
  };
}
