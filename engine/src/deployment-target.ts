/**
 * Compile-CAR Engine — Minimum Deployment Target
 *
 * The deployment target passed to actool is the one the rest of the build
 * uses: the `mac_deployment_target` assignment in
 * //build/config/mac/mac_sdk.gni. It is read once per run and passed into
 * every CatalogRequest.
 */

import * as fs from "fs";
import * as path from "path";
import { ConfigError, describeError } from "./errors";

/** Location of the build configuration, relative to the source root */
export const MAC_SDK_CONFIG_PATH = path.join(
  "build",
  "config",
  "mac",
  "mac_sdk.gni",
);

const DEPLOYMENT_TARGET_PATTERN =
  /^\s*mac_deployment_target\s*=\s*"(.*)"(?:\s*#.*)?$/gm;

/**
 * Pull the deployment target out of the text of mac_sdk.gni.
 *
 * Exactly one assignment line must match. A trailing `# comment` is allowed.
 *
 * @param source - Where the text came from, for error messages
 * @throws ConfigError on zero or several matches
 */
export function extractDeploymentTarget(
  contents: string,
  source: string,
): string {
  const matches = Array.from(contents.matchAll(DEPLOYMENT_TARGET_PATTERN));

  if (matches.length !== 1) {
    throw new ConfigError(
      matches.length === 0
        ? `No mac_deployment_target assignment found in ${source}`
        : `Found ${matches.length} mac_deployment_target assignments in ${source}; expected exactly one`,
      { source, matches: matches.length },
    );
  }

  return matches[0][1];
}

/**
 * Read mac_sdk.gni under `sourceRoot` and return its deployment target.
 *
 * @throws ConfigError if the file cannot be read or is ambiguous
 */
export function resolveMinimumDeploymentTarget(sourceRoot: string): string {
  const configPath = path.join(sourceRoot, MAC_SDK_CONFIG_PATH);

  let contents: string;
  try {
    contents = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(
      `Cannot read build configuration ${configPath}: ${describeError(err)}`,
      { configPath },
    );
  }

  return extractDeploymentTarget(contents, configPath);
}
