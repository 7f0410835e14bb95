/**
 * Compile-CAR CLI -- Check Command
 *
 * Runs the checks a compile starts with, without compiling anything:
 *
 *   compile-car check
 *
 *     ✔ actool 26.1 (26.0 or newer required)
 *     ✔ Minimum deployment target: 12.0
 */

import { Command } from "commander";
import {
  CatalogCompiler,
  REQUIRED_ACTOOL_VERSION,
  resolveMinimumDeploymentTarget,
  formatVersion,
} from "@compile-car/engine";
import type { BaseRunner } from "@compile-car/engine";
import { getCompilerOptions, resolveSourceRoot } from "../config";
import { printStageSuccess, colors } from "../output";

export function registerCheckCommand(
  program: Command,
  runner?: BaseRunner,
): void {
  program
    .command("check")
    .description("Check actool and the deployment target without compiling")
    .option(
      "--source-root <dir>",
      "Source checkout holding build/config/mac/mac_sdk.gni",
    )
    .action(async (opts: { sourceRoot?: string }) => {
      const compiler = new CatalogCompiler(getCompilerOptions(false, runner));

      const version = await compiler.verifyCapability();
      printStageSuccess(
        `actool ${colors.version(formatVersion(version))} ` +
          colors.dim(`(${formatVersion(REQUIRED_ACTOOL_VERSION)} or newer required)`),
      );

      const target = resolveMinimumDeploymentTarget(
        resolveSourceRoot(opts.sourceRoot),
      );
      printStageSuccess(`Minimum deployment target: ${colors.version(target)}`);
    });
}
