/**
 * Compile-CAR CLI -- Compile Command
 *
 * Compiles one or more asset catalogs with actool and writes the icon
 * bundle and asset archive beside each one.
 *
 * Usage:
 *   compile-car <paths...>                Compile catalogs
 *   compile-car <paths...> --verbose      Also show actool command lines
 *   compile-car <paths...> --source-root  Read the deployment target elsewhere
 *
 * Output:
 *
 *   compile-car Assets.xcassets Assets_canary.xcassets
 *
 *     ✔ actool 26.0
 *
 *   Compiling 2 asset catalogs
 *
 *     ✔ Compiled Assets.xcassets
 *     ✔ Compiled Assets_canary.xcassets
 *
 *   ✔ Compiled 2 asset catalogs in 3.1s
 */

import * as path from "path";
import { Command } from "commander";
import {
  CatalogCompiler,
  resolveMinimumDeploymentTarget,
  formatVersion,
} from "@compile-car/engine";
import type {
  BaseRunner,
  CompileEvent,
  CompileResult,
} from "@compile-car/engine";
import { getCompilerOptions, resolveSourceRoot } from "../config";
import {
  printSuccess,
  printInfo,
  printHeader,
  printStageSuccess,
  printStageInfo,
  printTable,
  createSpinner,
  formatDuration,
  colors,
} from "../output";

interface CompileOptions {
  verbose: boolean;
  sourceRoot?: string;
}

function plural(count: number): string {
  return count === 1 ? "asset catalog" : "asset catalogs";
}

/** Paths in the summary are shown relative to where the user ran us */
function displayPath(p: string): string {
  const relative = path.relative(process.cwd(), p);
  return relative && !relative.startsWith("..") ? relative : p;
}

function printSummary(results: CompileResult[]): void {
  const rows = results.map((result) => {
    return [
      displayPath(result.catalogPath),
      displayPath(result.icnsPath),
      displayPath(result.carPath),
    ];
  });
  printTable({ head: ["Catalog", "Icon bundle", "Asset archive"], rows });
}

export function registerCompileCommand(
  program: Command,
  runner?: BaseRunner,
): void {
  program
    .command("compile <paths...>", { isDefault: true })
    .description("Compile asset catalogs into .icns and .car files")
    .option("-v, --verbose", "Show the actool command line and each copy", false)
    .option(
      "--source-root <dir>",
      "Source checkout holding build/config/mac/mac_sdk.gni",
    )
    .action(async (paths: string[], opts: CompileOptions) => {
      const verbose = opts.verbose;
      const compiler = new CatalogCompiler(getCompilerOptions(verbose, runner));
      const startTime = Date.now();

      // 1. actool must be new enough before anything is compiled
      const version = await compiler.verifyCapability();
      printStageSuccess(`actool ${colors.version(formatVersion(version))}`);

      // 2. One deployment target for the whole batch
      const target = resolveMinimumDeploymentTarget(
        resolveSourceRoot(opts.sourceRoot),
      );
      if (verbose) {
        printInfo(`Determined the minimum deployment target to be ${target}.`);
      }

      printHeader(`Compiling ${paths.length} ${plural(paths.length)}`);

      // 3. Progress display
      let spinner = createSpinner("");
      let current = "";
      compiler.on((event: CompileEvent) => {
        if (event.stage === "validated") {
          current = path.basename(event.catalogPath);
        }
        if (verbose) {
          if (event.stage === "validated") {
            printInfo(`Processing: ${colors.path(event.catalogPath)}`);
          } else if (event.stage === "invoking" || event.stage === "copied") {
            printStageInfo(event.message);
          } else if (event.stage === "completed") {
            printStageSuccess(event.message);
          }
          return;
        }
        if (event.stage === "validated") {
          spinner = createSpinner(`Compiling ${current}...`);
          spinner.start();
        } else if (event.stage === "completed") {
          spinner.succeed(event.message);
        }
      });

      // 4. Compile in order, stopping at the first failure
      let results: CompileResult[];
      try {
        results = await compiler.compileAll(paths, target, verbose);
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail(`Failed ${current}`);
        }
        throw err;
      }

      console.log();
      printSummary(results);
      console.log();
      printSuccess(
        `Compiled ${results.length} ${plural(results.length)} in ${formatDuration(Date.now() - startTime)}`,
      );
    });
}
