/**
 * Compile-CAR Engine — Runners
 */

import { BaseRunner } from "./base-runner";
import { XcrunRunner } from "./xcrun-runner";

export { BaseRunner } from "./base-runner";
export { XcrunRunner } from "./xcrun-runner";

/**
 * The runner used when the caller supplies none: the real `xcrun`.
 */
export function createDefaultRunner(): BaseRunner {
  return new XcrunRunner();
}
