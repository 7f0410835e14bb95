#!/usr/bin/env node

/**
 * Compile-CAR CLI — Entry Point
 *
 *   compile-car <paths...>     Compile asset catalogs (default command)
 *   compile-car check          Check actool and the deployment target
 */

import { createProgram } from "./program";
import { printError, formatCliError } from "./output";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    printError(formatCliError(err));
    process.exit(1);
  });
