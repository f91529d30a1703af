/**
 * CLI Application
 */

export { createProgram, formatBytes, type CLIContext } from "./program.js";
export { runCLI } from "./run.js";
