/**
 * CLI Program
 *
 * Operator commands over a sheetbox base directory: derive ids, inspect
 * and purge workspaces, sweep expired sessions, and run a script in a
 * session the same way a front end would.
 */

import { Command, InvalidArgumentError } from "commander";
import * as fs from "fs/promises";
import * as path from "path";
import boxen from "boxen";
import pc from "picocolors";
import type { SessionId } from "@sheetbox/core";
import { resolveConfig, validateConfig, type ConfigOverrides } from "../config/index.js";
import { initLogger, isLogLevel, type Logger, type LogLevel } from "../logging.js";
import { SessionRuntime } from "../runtime/index.js";
import { deriveSessionId, isSessionId } from "../session/identity.js";

/**
 * Where commands write and how they report failure.
 */
export interface CLIContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  log: (line: string) => void;
  error: (line: string) => void;
  /** Logger for the runtime; built from the config when absent */
  logger?: Logger;
  /** Set to non-zero by a failing command */
  exitCode: number;
}

/**
 * Options shared by every command.
 */
type GlobalOptions = {
  config?: string;
  baseDir?: string;
  logLevel?: LogLevel;
};

type IdOptions = {
  userAgent?: string;
  platform?: string;
  token?: string;
};

type SweepOptions = {
  ttlHours?: number;
};

type RunOptions = {
  session?: string;
  userAgent?: string;
  var: Array<{ name: string; file: string }>;
  timeout?: number;
};

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError("Must be one of: error, warn, info, debug.");
  }
  return value;
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number.");
  }
  return parsed;
}

function parseSessionId(value: string): SessionId {
  if (!isSessionId(value)) {
    throw new InvalidArgumentError("Not a session id (expected user_ followed by 16 hex digits).");
  }
  return value;
}

/**
 * Collect repeated --var name=file.json options.
 */
function collectVariable(
  value: string,
  previous: Array<{ name: string; file: string }>
): Array<{ name: string; file: string }> {
  const separator = value.indexOf("=");
  const name = separator > 0 ? value.slice(0, separator) : "";
  const file = value.slice(separator + 1);
  if (!IDENTIFIER.test(name) || file.length === 0) {
    throw new InvalidArgumentError(`Expected name=file.json, got "${value}".`);
  }
  return previous.concat([{ name, file }]);
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  }
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

/**
 * Build the runtime for one command from config, environment and flags.
 */
async function openRuntime(
  ctx: CLIContext,
  options: GlobalOptions,
  extra: ConfigOverrides = {}
): Promise<SessionRuntime> {
  const resolved = await resolveConfig({
    cwd: ctx.cwd,
    env: ctx.env,
    configPath: options.config,
    overrides: { baseDir: options.baseDir, logLevel: options.logLevel, ...extra },
  });
  for (const warning of validateConfig(resolved.config)) {
    ctx.error(pc.yellow(`Warning: ${warning}`));
  }
  const logger = ctx.logger ?? initLogger(resolved.config.logging.level, resolved.config.logging.format);
  return new SessionRuntime({ baseDir: resolved.baseDir, config: resolved.config, logger });
}

async function withRuntime(
  ctx: CLIContext,
  options: GlobalOptions,
  fn: (runtime: SessionRuntime) => Promise<void>,
  extra?: ConfigOverrides
): Promise<void> {
  const runtime = await openRuntime(ctx, options, extra);
  try {
    await fn(runtime);
  } finally {
    await runtime.stop();
  }
}

async function readVariables(
  ctx: CLIContext,
  specs: Array<{ name: string; file: string }>
): Promise<Record<string, unknown>> {
  const variables: Record<string, unknown> = {};
  for (const { name, file } of specs) {
    const content = await fs.readFile(path.resolve(ctx.cwd, file), "utf-8");
    try {
      variables[name] = JSON.parse(content);
    } catch (err) {
      throw new Error(`--var ${name}: ${file} is not valid JSON (${err instanceof Error ? err.message : String(err)})`);
    }
  }
  return variables;
}

/**
 * Create the `sheetbox` command tree bound to `ctx`.
 */
export function createProgram(ctx: CLIContext): Command {
  const program = new Command();

  program
    .name("sheetbox")
    .description("Manage per-user sheetbox workspaces and run scripts inside them")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.log(text.trimEnd()),
      writeErr: (text) => ctx.error(text.trimEnd()),
    })
    .option("-c, --config <path>", "Config file (default: nearest sheetbox.config.yaml)")
    .option("-d, --base-dir <dir>", "Directory holding session workspaces")
    .option("-l, --log-level <level>", "Log level: error, warn, info, debug", parseLogLevel);

  program
    .command("id")
    .description("Derive the session id for a client signature")
    .option("--user-agent <ua>", "User agent string")
    .option("--platform <platform>", "Platform tag")
    .option("--token <token>", "Client token; takes precedence over the weak signals")
    .action((options: IdOptions) => {
      ctx.log(
        deriveSessionId({
          userAgent: options.userAgent,
          platform: options.platform,
          clientToken: options.token,
        })
      );
    });

  program
    .command("exports")
    .description("List a session's exported files, newest first")
    .argument("<session>", "Session id", parseSessionId)
    .action(async (session: SessionId) => {
      await withRuntime(ctx, program.opts<GlobalOptions>(), async (runtime) => {
        const entries = await runtime.store.listExports(session);
        if (entries.length === 0) {
          ctx.log(pc.dim("No exports"));
          return;
        }
        for (const entry of entries) {
          ctx.log(`${pc.bold(entry.displayName)}  ${pc.dim(entry.name)}  ${formatBytes(entry.size)}`);
        }
      });
    });

  program
    .command("upload")
    .description("Store a file in a session's uploads")
    .argument("<session>", "Session id", parseSessionId)
    .argument("<file>", "File to upload")
    .action(async (session: SessionId, file: string) => {
      const source = path.resolve(ctx.cwd, file);
      const bytes = new Uint8Array(await fs.readFile(source));
      await withRuntime(ctx, program.opts<GlobalOptions>(), async (runtime) => {
        const entry = await runtime.saveUpload(session, path.basename(source), bytes);
        ctx.log(`Stored ${pc.bold(entry.name)} (${entry.kind}, ${formatBytes(entry.size)})`);
      });
    });

  program
    .command("purge")
    .description("Delete a session's workspace")
    .argument("<session>", "Session id", parseSessionId)
    .action(async (session: SessionId) => {
      await withRuntime(ctx, program.opts<GlobalOptions>(), async (runtime) => {
        const purged = await runtime.purgeSession(session);
        ctx.log(purged ? `Purged ${session}` : pc.dim(`No workspace for ${session}`));
      });
    });

  program
    .command("stats")
    .description("Show storage usage across all workspaces")
    .action(async () => {
      await withRuntime(ctx, program.opts<GlobalOptions>(), async (runtime) => {
        await runtime.registry.adoptExisting();
        const stats = await runtime.stats();
        const lines = [
          `${pc.bold("Base directory")}: ${runtime.baseDir}`,
          `${pc.bold("Sessions")}: ${stats.totalSessions}`,
          `${pc.bold("Files")}: ${stats.totalFiles}`,
          `${pc.bold("Storage")}: ${formatBytes(stats.totalBytes)}`,
          `${pc.bold("TTL")}: ${stats.ttlHours}h, swept every ${stats.sweepIntervalMinutes}m`,
        ];
        ctx.log(
          boxen(lines.join("\n"), {
            title: pc.cyan("SHEETBOX"),
            padding: { left: 1, right: 1, top: 0, bottom: 0 },
            borderColor: "cyan",
            borderStyle: "round",
          })
        );
      });
    });

  program
    .command("sweep")
    .description("Purge workspaces idle past the TTL")
    .option("--ttl-hours <hours>", "Override the configured TTL", parsePositiveNumber)
    .action(async (options: SweepOptions) => {
      await withRuntime(
        ctx,
        program.opts<GlobalOptions>(),
        async (runtime) => {
          await runtime.registry.adoptExisting();
          const purged = await runtime.reaper.runOnce();
          ctx.log(`Purged ${purged} expired session${purged === 1 ? "" : "s"}`);
        },
        { ttlHours: options.ttlHours }
      );
    });

  program
    .command("run")
    .description("Run a JavaScript file in a session; saves land in its exports")
    .argument("<script>", "Script file (body of an async function)")
    .option("-s, --session <id>", "Session id to run in", parseSessionId)
    .option("--user-agent <ua>", "Derive the session id from this user agent", "sheetbox-cli")
    .option("--var <name=file.json>", "Expose a JSON file as a global (repeatable)", collectVariable, [])
    .option("-t, --timeout <ms>", "Execution timeout in milliseconds", parsePositiveNumber)
    .action(async (script: string, options: RunOptions) => {
      const code = await fs.readFile(path.resolve(ctx.cwd, script), "utf-8");
      const variables = await readVariables(ctx, options.var);

      await withRuntime(ctx, program.opts<GlobalOptions>(), async (runtime) => {
        const session =
          options.session ?? runtime.deriveOrAccept({ userAgent: options.userAgent, platform: process.platform });
        ctx.error(pc.dim(`Session: ${session}`));

        const result = await runtime.runCode(session, code, { variables, timeoutMs: options.timeout });

        if (result.output) {
          ctx.log(result.output.replace(/\n$/, ""));
        }
        for (const file of result.producedFiles) {
          ctx.log(`${pc.green("saved")} ${file}`);
        }
        for (const failure of result.failures) {
          ctx.error(`${pc.yellow("failed")} ${failure.requested}: ${failure.message}`);
        }
        if (!result.success) {
          ctx.error(pc.red(`Error: ${result.error ?? "unknown error"}`));
          ctx.exitCode = 1;
        }
      });
    });

  return program;
}
