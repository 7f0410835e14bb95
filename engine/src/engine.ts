/**
 * Compile-CAR Engine — Catalog Compiler
 *
 * Orchestrates one actool compile per catalog:
 *
 *   validate path → stage icon package → invoke actool → parse reply →
 *   classify → relocate outputs
 *
 * Each step is a precondition of the next; the first failure throws and
 * nothing after it runs. Catalogs are processed one at a time, each with
 * its own scratch directory, and destinations are only written once the
 * reply has been fully classified.
 *
 * The compiler has no UI. Callers follow progress through events.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  CatalogRequest,
  CompileEvent,
  CompileEventHandler,
  CompileResult,
  CompileStage,
  CompilerOptions,
  Version,
} from "./types";
import type { BaseRunner } from "./runners/base-runner";
import { createDefaultRunner } from "./runners";
import { createLogger, Logger } from "./utils/logger";
import { withScratchDirectory } from "./utils/scratch";
import { verifyCapability } from "./capability";
import { resolveCatalogLayout } from "./catalog-path";
import {
  STAGED_ICON_PACKAGE,
  buildActoolArgs,
  parseCompilationReply,
} from "./invocation";
import { classifyInvocation, formatFailureReport } from "./classifier";
import {
  destinationsByRole,
  planRelocation,
  relocateOutputs,
} from "./relocation";
import { AssetCatalogError, CompilationError, describeError } from "./errors";

export class CatalogCompiler {
  private readonly runner: BaseRunner;
  private readonly logger: Logger;
  private eventHandlers: CompileEventHandler[] = [];

  constructor(options: CompilerOptions = {}) {
    this.runner = options.runner ?? createDefaultRunner();
    this.logger =
      options.logger ??
      createLogger({ level: options.verbose ? "debug" : "silent" });
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register a progress handler. The CLI uses this to drive its output.
   */
  on(handler: CompileEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(
    stage: CompileStage,
    catalogPath: string,
    message: string,
    extra: Pick<CompileEvent, "command" | "destination"> = {},
  ): void {
    const event: CompileEvent = {
      stage,
      catalogPath,
      message,
      timestamp: new Date().toISOString(),
      ...extra,
    };
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err) {
        // A broken progress display must not fail the compile
        this.logger.warn(
          { stage, error: describeError(err) },
          "Compile event handler threw",
        );
      }
    }
  }

  // ─── Capability ──────────────────────────────────────────────

  /**
   * Check that the installed actool is recent enough. Call once, before
   * compiling anything.
   */
  verifyCapability(): Promise<Version> {
    return verifyCapability(this.runner, this.logger);
  }

  // ─── Core: Compile ───────────────────────────────────────────

  /**
   * Compile one catalog and write `app<Tag>.icns` and `Assets<Tag>.car`
   * beside it.
   *
   * @throws FormatError if the catalog path breaks the naming convention
   * @throws AssetCatalogError if the companion icon package is missing
   * @throws CompilationError if actool fails or reports anything unexpected
   */
  async compile(request: CatalogRequest): Promise<CompileResult> {
    const layout = resolveCatalogLayout(request.catalogPath);
    const catalogPath = layout.catalogPath;
    this.emit(
      "validated",
      catalogPath,
      `Validated ${path.basename(catalogPath)}` +
        (layout.nameTag ? ` (tag ${layout.nameTag})` : ""),
    );

    if (!fs.existsSync(layout.iconPackagePath)) {
      throw new AssetCatalogError(
        "INPUT_ERROR",
        `Icon package not found: ${layout.iconPackagePath}`,
        { catalogPath, iconPackagePath: layout.iconPackagePath },
      );
    }

    return withScratchDirectory(async (scratchDir) => {
      // actool embeds the icon under the name it is given, so the archive
      // must be built from a copy carrying the untagged name. Links are
      // followed: a relative one would dangle inside the scratch directory.
      const stagedIconPath = path.join(scratchDir, STAGED_ICON_PACKAGE);
      fs.cpSync(layout.iconPackagePath, stagedIconPath, {
        recursive: true,
        dereference: true,
      });
      this.emit(
        "staged",
        catalogPath,
        `Staged ${path.basename(layout.iconPackagePath)} as ${STAGED_ICON_PACKAGE}`,
      );

      const args = buildActoolArgs({
        catalogPath,
        stagedIconPath,
        scratchDir,
        minimumDeploymentTarget: request.minimumDeploymentTarget,
      });
      const command = [this.runner.command, ...args];
      this.logger.debug({ command: command.join(" ") }, "Invoking actool");
      if (request.verbose) {
        this.emit("invoking", catalogPath, `Invoking: ${command.join(" ")}`, {
          command,
        });
      }

      const invocation = await this.runner.run(args);
      const result = parseCompilationReply(invocation);

      const classification = classifyInvocation(result);
      if (!classification.passed) {
        this.logger.error(
          { catalog: catalogPath, reasons: Object.keys(classification.report.reasons) },
          "actool reported failures",
        );
        throw new CompilationError(
          formatFailureReport(classification.report),
          classification.report,
          { catalogPath },
        );
      }
      this.emit("classified", catalogPath, "actool reported no problems");

      const steps = planRelocation(result.compilationResults, layout);
      const { icnsPath, carPath } = destinationsByRole(steps);
      const written = relocateOutputs(steps, this.logger, (step) => {
        if (request.verbose) {
          this.emit(
            "copied",
            catalogPath,
            `Copying output to: ${step.destination}`,
            { destination: step.destination },
          );
        }
      });

      this.logger.info({ catalog: catalogPath, written }, "Catalog compiled");
      this.emit(
        "completed",
        catalogPath,
        `Compiled ${path.basename(catalogPath)}`,
      );

      return { catalogPath, nameTag: layout.nameTag, icnsPath, carPath, written };
    });
  }

  /**
   * Compile several catalogs in order, stopping at the first failure.
   */
  async compileAll(
    catalogPaths: string[],
    minimumDeploymentTarget: string,
    verbose: boolean = false,
  ): Promise<CompileResult[]> {
    const results: CompileResult[] = [];
    for (const catalogPath of catalogPaths) {
      results.push(
        await this.compile({ catalogPath, minimumDeploymentTarget, verbose }),
      );
    }
    return results;
  }
}
