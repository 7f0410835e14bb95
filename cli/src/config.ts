/**
 * Compile-CAR CLI — Configuration
 *
 * The tool lives at <src>/tools/mac/icons/ in a source checkout, and the
 * deployment target is read from <src>/build/config/mac/mac_sdk.gni, so the
 * source root is found relative to this file unless overridden.
 */

import * as path from "path";
import type { BaseRunner, CompilerOptions } from "@compile-car/engine";

/** Environment variable that overrides the source root */
export const SOURCE_ROOT_ENV = "COMPILE_CAR_SOURCE_ROOT";

/** <src>, from <src>/tools/mac/icons/cli/{src,dist} */
export const DEFAULT_SOURCE_ROOT = path.resolve(
  __dirname,
  "..",
  "..",
  "..",
  "..",
  "..",
);

/**
 * Pick the source root: --source-root, then $COMPILE_CAR_SOURCE_ROOT, then
 * the location of the tool itself.
 */
export function resolveSourceRoot(option?: string): string {
  const fromEnv = process.env[SOURCE_ROOT_ENV];
  if (option) return path.resolve(option);
  if (fromEnv) return path.resolve(fromEnv);
  return DEFAULT_SOURCE_ROOT;
}

/**
 * Build CompilerOptions from CLI flags.
 */
export function getCompilerOptions(
  verbose: boolean = false,
  runner?: BaseRunner,
): CompilerOptions {
  return { verbose, runner };
}
