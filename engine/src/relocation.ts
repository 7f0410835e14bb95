/**
 * Compile-CAR Engine — Output Relocation
 *
 * actool must report exactly three files: the partial Info.plist (dropped,
 * the app's own Info.plist already carries what it says), the icon bundle
 * and the compiled archive. Anything else means actool's output contract
 * changed, and the compile fails rather than guessing.
 *
 * All three names are checked before the first copy, so a rejected reply
 * never leaves one destination updated and the other stale.
 */

import * as fs from "fs";
import * as path from "path";
import type { CatalogLayout, CompilationResults } from "./types";
import type { Logger } from "./utils/logger";
import { CompilationError } from "./errors";
import { PARTIAL_INFO_PLIST } from "./invocation";

export type OutputRole = "partial-info-plist" | "icon-bundle" | "asset-archive";

/** actool output file name → role */
export const OUTPUT_ROLES: ReadonlyMap<string, OutputRole> = new Map<string, OutputRole>([
  [PARTIAL_INFO_PLIST, "partial-info-plist"],
  ["AppIcon.icns", "icon-bundle"],
  ["Assets.car", "asset-archive"],
]);

export const EXPECTED_OUTPUT_COUNT = OUTPUT_ROLES.size;

export interface CopyStep {
  role: OutputRole;
  source: string;
  destination: string;
}

function destinationFor(
  role: OutputRole,
  layout: CatalogLayout,
): string | null {
  switch (role) {
    case "partial-info-plist":
      return null;
    case "icon-bundle":
      return layout.icnsDestination;
    case "asset-archive":
      return layout.carDestination;
  }
}

/**
 * Check actool's reported outputs and decide where each one goes.
 *
 * @returns Copy steps in the order actool listed the files
 * @throws CompilationError if the outputs are not exactly the expected three
 */
export function planRelocation(
  results: CompilationResults | undefined,
  layout: CatalogLayout,
): CopyStep[] {
  if (!results) {
    throw new CompilationError("actool had no compilation results");
  }
  const outputFiles = results.outputFiles;
  if (!outputFiles) {
    throw new CompilationError("actool had no output files");
  }
  if (outputFiles.length !== EXPECTED_OUTPUT_COUNT) {
    throw new CompilationError(
      `expected actool to output ${EXPECTED_OUTPUT_COUNT} files, but it instead output ` +
        `${outputFiles.length} files, namely ${JSON.stringify(outputFiles)}`,
      undefined,
      { outputFiles },
    );
  }

  const seen = new Set<OutputRole>();
  const steps: CopyStep[] = [];

  for (const outputFile of outputFiles) {
    const name = path.basename(outputFile);
    const role = OUTPUT_ROLES.get(name);
    if (!role) {
      throw new CompilationError(`Unexpected output file: ${outputFile}`, undefined, {
        outputFiles,
      });
    }
    if (seen.has(role)) {
      throw new CompilationError(`Duplicate output file: ${outputFile}`, undefined, {
        outputFiles,
      });
    }
    seen.add(role);

    const destination = destinationFor(role, layout);
    if (destination) {
      steps.push({ role, source: outputFile, destination });
    }
  }

  return steps;
}

/**
 * Pick the icon bundle and asset archive destinations out of a plan,
 * whatever order actool listed them in.
 */
export function destinationsByRole(steps: CopyStep[]): {
  icnsPath: string;
  carPath: string;
} {
  const icns = steps.find((step) => step.role === "icon-bundle");
  const car = steps.find((step) => step.role === "asset-archive");
  if (!icns || !car) {
    throw new CompilationError(
      "actool did not output both an icon bundle and an asset archive",
    );
  }
  return { icnsPath: icns.destination, carPath: car.destination };
}

/**
 * Copy each planned output to its destination.
 *
 * @returns Destinations written, in order
 */
export function relocateOutputs(
  steps: CopyStep[],
  logger: Logger,
  onCopied?: (step: CopyStep) => void,
): string[] {
  const written: string[] = [];
  for (const step of steps) {
    logger.debug(
      { role: step.role, from: step.source, to: step.destination },
      "Copying actool output",
    );
    fs.copyFileSync(step.source, step.destination);
    written.push(step.destination);
    onCopied?.(step);
  }
  return written;
}
