/**
 * Compile-CAR Engine — Catalog Naming Rules
 *
 * A catalog is named `<Base>[_<Tag>].xcassets`. The optional tag ("beta",
 * "canary", ...) is carried into every derived name so that differently
 * branded builds sitting in one directory never collide:
 *
 *   Assets.xcassets       AppIcon.icon       → app.icns       Assets.car
 *   Assets_beta.xcassets  AppIcon_beta.icon  → app_beta.icns  Assets_beta.car
 */

import * as path from "path";
import type { CatalogLayout } from "./types";
import { FormatError } from "./errors";

export const CATALOG_EXTENSION = ".xcassets";
export const NAME_TAG_SEPARATOR = "_";

/**
 * Derive the NameTag from a catalog base name.
 *
 *   "Assets"          → ""
 *   "Assets_beta"     → "_beta"
 *   "Assets_beta_foo" → FormatError
 */
export function extractNameTag(baseName: string): string {
  const parts = baseName.split(NAME_TAG_SEPARATOR);
  if (parts.length > 2) {
    throw new FormatError(
      `Asset catalog filename must have at most one ${NAME_TAG_SEPARATOR}`,
      { baseName },
    );
  }
  return parts.length === 2 ? `${NAME_TAG_SEPARATOR}${parts[1]}` : "";
}

/**
 * Validate a catalog path and derive every path the compilation needs.
 *
 * @throws FormatError if the path breaks the naming convention
 */
export function resolveCatalogLayout(catalogPath: string): CatalogLayout {
  const resolved = path.resolve(catalogPath);
  const fileName = path.basename(resolved);

  if (path.extname(fileName) !== CATALOG_EXTENSION) {
    throw new FormatError(
      `Asset catalog filename must have ${CATALOG_EXTENSION} suffix`,
      { catalogPath },
    );
  }

  const baseName = path.basename(fileName, CATALOG_EXTENSION);
  const nameTag = extractNameTag(baseName);
  const sourceDir = path.dirname(resolved);

  return {
    catalogPath: resolved,
    sourceDir,
    baseName,
    nameTag,
    iconPackagePath: path.join(sourceDir, `AppIcon${nameTag}.icon`),
    icnsDestination: path.join(sourceDir, `app${nameTag}.icns`),
    carDestination: path.join(sourceDir, `Assets${nameTag}.car`),
  };
}
