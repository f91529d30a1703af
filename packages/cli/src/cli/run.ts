#!/usr/bin/env node
/**
 * CLI Entry Point
 */

import { CommanderError } from "commander";
import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import { createProgram, type CLIContext } from "./program.js";

/**
 * Parse `argv` and run the selected command.
 *
 * @returns The process exit code
 */
export async function runCLI(argv: string[] = process.argv): Promise<number> {
  const ctx: CLIContext = {
    cwd: process.cwd(),
    env: process.env,
    log: (line) => console.log(line),
    error: (line) => console.error(line),
    exitCode: 0,
  };

  try {
    await createProgram(ctx).parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  return ctx.exitCode;
}

// Run CLI if this is the main module
// Handle symlinks by resolving the real path
function isMainModule(): boolean {
  try {
    const currentFile = fileURLToPath(import.meta.url);
    const entryFile = realpathSync(process.argv[1]);
    return currentFile === entryFile;
  } catch {
    return false;
  }
}

const isTestEnvironment = typeof process !== "undefined" && !!process.env.VITEST;

if (!isTestEnvironment && isMainModule()) {
  runCLI().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
