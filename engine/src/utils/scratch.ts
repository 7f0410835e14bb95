/**
 * Compile-CAR Engine — Scratch Directories
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

export const SCRATCH_PREFIX = "compile-car-";

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or throws.
 */
export async function withScratchDirectory<T>(
  fn: (dir: string) => Promise<T>,
  prefix: string = SCRATCH_PREFIX,
): Promise<T> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
