/**
 * Compile-CAR CLI -- Program
 *
 * Builds the commander program. Kept apart from the entry point so tests can
 * drive it with a stub actool.
 */

import { Command } from "commander";
import type { BaseRunner } from "@compile-car/engine";
import { registerCompileCommand } from "./commands/compile";
import { registerCheckCommand } from "./commands/check";

export function createProgram(runner?: BaseRunner): Command {
  const program = new Command();

  program
    .name("compile-car")
    .description("Compile macOS asset catalogs and app icons with actool")
    .version("0.1.0");

  registerCompileCommand(program, runner);
  registerCheckCommand(program, runner);

  return program;
}
