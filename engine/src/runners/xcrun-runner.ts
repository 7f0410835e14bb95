/**
 * Compile-CAR Engine — xcrun Runner
 *
 * Runs `xcrun <args>` with stdout and stderr piped separately. stdout is kept
 * as raw bytes for the property-list parser; stderr is decoded as UTF-8.
 * There is no timeout: a hung actool hangs the run.
 */

import { spawn } from "child_process";
import type { ActoolInvocation } from "../types";
import { BaseRunner } from "./base-runner";

export class XcrunRunner extends BaseRunner {
  readonly command = "xcrun";

  run(args: string[]): Promise<ActoolInvocation> {
    return new Promise<ActoolInvocation>((resolve) => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      const child = spawn(this.command, args, {
        stdio: ["ignore", "pipe", "pipe"],
      });

      child.stdout.on("data", (chunk: Buffer) => {
        stdoutChunks.push(chunk);
      });
      child.stderr.on("data", (chunk: Buffer) => {
        stderrChunks.push(chunk);
      });

      child.on("close", (code) => {
        resolve({
          exitCode: code ?? 1,
          stdout: Buffer.concat(stdoutChunks),
          stderr: Buffer.concat(stderrChunks).toString("utf-8"),
        });
      });

      child.on("error", (err) => {
        resolve({
          exitCode: -1,
          stdout: Buffer.alloc(0),
          stderr: `Failed to launch ${this.command}: ${err.message}`,
        });
      });
    });
  }
}
