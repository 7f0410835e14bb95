/**
 * Compile-CAR Engine — Base Runner
 *
 * The only seam between the engine and the external asset compiler. A
 * runner takes the arguments that follow `xcrun`, runs them to completion
 * and hands back the exit code with stdout and stderr fully buffered.
 *
 * Tests substitute a stub that answers with the same XML property lists
 * actool produces; nothing else in the engine spawns processes.
 */

import type { ActoolInvocation } from "../types";

export abstract class BaseRunner {
  /** Program the arguments are passed to, used when logging the command */
  abstract readonly command: string;

  /**
   * Run the command and wait for it to exit.
   *
   * Never rejects for a non-zero exit: callers decide what a failure
   * means. A process that cannot be launched resolves with exit code -1
   * and the launch error in stderr.
   */
  abstract run(args: string[]): Promise<ActoolInvocation>;
}
