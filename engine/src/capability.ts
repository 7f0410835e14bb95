/**
 * Compile-CAR Engine — actool Capability Gate
 *
 * Older actool releases do not understand `.icon` packages or the
 * correctness flags the engine passes, so the installed actool is checked
 * once before any catalog is touched. A failure here aborts the whole run.
 */

import type { Version } from "./types";
import type { BaseRunner } from "./runners/base-runner";
import type { Logger } from "./utils/logger";
import { CapabilityError, describeError } from "./errors";
import {
  ACTOOL_KEYS,
  VersionReplySchema,
  describeIssues,
  readPropertyList,
} from "./schemas";
import { formatVersion, isVersionAtLeast, parseVersion } from "./utils/version";

export const REQUIRED_ACTOOL_VERSION: Version = [26, 0];

/** Arguments after `xcrun` for the version query */
export const VERSION_QUERY_ARGS: readonly string[] = [
  "actool",
  "--output-format=xml1",
  "--version",
];

/**
 * Ask actool for its version and check it against REQUIRED_ACTOOL_VERSION.
 *
 * @returns The detected version
 * @throws CapabilityError if actool cannot answer or is too old
 */
export async function verifyCapability(
  runner: BaseRunner,
  logger: Logger,
  required: Version = REQUIRED_ACTOOL_VERSION,
): Promise<Version> {
  const invocation = await runner.run([...VERSION_QUERY_ARGS]);

  if (invocation.exitCode !== 0) {
    throw new CapabilityError(
      `actool version query failed with exit code ${invocation.exitCode}`,
      { exitCode: invocation.exitCode, stderr: invocation.stderr },
    );
  }

  let parsed: unknown;
  try {
    parsed = readPropertyList(invocation.stdout);
  } catch (err) {
    throw new CapabilityError(
      `actool version query returned unreadable output: ${describeError(err)}`,
      { stderr: invocation.stderr },
    );
  }

  const reply = VersionReplySchema.safeParse(parsed);
  if (!reply.success) {
    throw new CapabilityError(
      "actool version query returned no short-bundle-version",
      { issues: describeIssues(reply.error) },
    );
  }

  const reported = reply.data[ACTOOL_KEYS.version]["short-bundle-version"];
  const version = parseVersion(reported);
  if (!version) {
    throw new CapabilityError(
      `actool reported an unrecognized version "${reported}"`,
      { reported },
    );
  }

  logger.debug(
    { detected: formatVersion(version), required: formatVersion(required) },
    "actool version detected",
  );

  if (!isVersionAtLeast(version, required)) {
    throw new CapabilityError(
      "actool is too old; it is version " +
        `${formatVersion(version)} but at least version ` +
        `${formatVersion(required)} is required`,
      { detected: formatVersion(version), required: formatVersion(required) },
    );
  }

  return version;
}
