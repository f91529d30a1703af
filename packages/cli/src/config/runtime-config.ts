/**
 * Runtime Configuration
 *
 * Schema and loader for sheetbox.config.yaml.
 * Precedence, lowest first: schema defaults, the YAML file,
 * SHEETBOX_* environment variables, command-line flags.
 */

import { z } from "zod";
import * as fs from "fs/promises";
import * as path from "path";
import * as yaml from "js-yaml";
import { formatSchemaIssues } from "@sheetbox/core";
import { isLogLevel, type LogLevel } from "../logging.js";

const MIB = 1024 * 1024;

/**
 * Session lifetime and sweep schedule.
 */
export const SessionConfigSchema = z.object({
  /** Idle time after which a session's workspace is purged */
  ttlHours: z.number().positive().default(24),
  /** Time between reaper sweeps */
  sweepIntervalMinutes: z.number().positive().default(60),
  /** Adopt leftover workspaces and sweep once when the runtime starts */
  sweepOnStart: z.boolean().default(true),
}).strict();

/**
 * Per-session storage limits.
 */
export const QuotaConfigSchema = z.object({
  maxSessionBytes: z.number().int().positive().default(1024 * MIB),
  maxFilesPerSession: z.number().int().positive().default(50),
  maxUploadBytes: z.number().int().positive().default(200 * MIB),
}).strict();

/**
 * Limits for executed code.
 */
export const ExecutionConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(30_000),
  maxOutputLength: z.number().int().positive().default(10_000),
}).strict();

export const LoggingConfigSchema = z.object({
  level: z.enum(["error", "warn", "info", "debug"]).default("info"),
  format: z.enum(["text", "json", "plain"]).default("text"),
}).strict();

/**
 * Complete runtime configuration schema.
 */
export const SheetboxConfigSchema = z.object({
  /** Directory holding every session workspace (relative to the config file) */
  baseDir: z.string().min(1).default("user_sessions"),
  session: SessionConfigSchema.default({}),
  quota: QuotaConfigSchema.default({}),
  execution: ExecutionConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
}).strict();

export type SheetboxConfig = z.output<typeof SheetboxConfigSchema>;
export type SheetboxConfigInput = z.input<typeof SheetboxConfigSchema>;

/**
 * Config file names to look for.
 */
const CONFIG_FILE_NAMES = [
  "sheetbox.config.yaml",
  "sheetbox.config.yml",
];

function parseConfig(raw: unknown, source: string): SheetboxConfig {
  const result = SheetboxConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new Error(`Invalid config in ${source}:\n${formatSchemaIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Default configuration.
 */
export function getDefaultConfig(): SheetboxConfig {
  return SheetboxConfigSchema.parse({});
}

/**
 * Load configuration from a YAML file. An empty file yields the defaults.
 *
 * @throws Error if the file can't be read, parsed or validated
 */
export async function loadConfigFile(configPath: string): Promise<SheetboxConfig> {
  const content = await fs.readFile(configPath, "utf-8");
  return parseConfig(yaml.load(content), configPath);
}

/**
 * Find and load configuration.
 *
 * Searches for sheetbox.config.yaml in the given directory and its
 * parents. A file that exists but is invalid is an error, not a miss.
 */
export async function findConfig(
  startDir: string
): Promise<{ config: SheetboxConfig; configPath: string; configDir: string } | null> {
  let currentDir = path.resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      const exists = await fs
        .access(configPath)
        .then(() => true)
        .catch(() => false);
      if (exists) {
        return { config: await loadConfigFile(configPath), configPath, configDir: currentDir };
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Values that take precedence over the config file.
 */
export interface ConfigOverrides {
  baseDir?: string;
  ttlHours?: number;
  logLevel?: LogLevel;
}

/**
 * Read overrides from SHEETBOX_* environment variables.
 *
 * @throws Error when a variable is set to an unusable value
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  if (env.SHEETBOX_BASE_DIR) {
    overrides.baseDir = env.SHEETBOX_BASE_DIR;
  }

  if (env.SHEETBOX_SESSION_TTL_HOURS) {
    const ttlHours = Number(env.SHEETBOX_SESSION_TTL_HOURS);
    if (!Number.isFinite(ttlHours) || ttlHours <= 0) {
      throw new Error(`SHEETBOX_SESSION_TTL_HOURS must be a positive number, got "${env.SHEETBOX_SESSION_TTL_HOURS}"`);
    }
    overrides.ttlHours = ttlHours;
  }

  if (env.SHEETBOX_LOG_LEVEL) {
    if (!isLogLevel(env.SHEETBOX_LOG_LEVEL)) {
      throw new Error(`SHEETBOX_LOG_LEVEL must be one of error, warn, info, debug, got "${env.SHEETBOX_LOG_LEVEL}"`);
    }
    overrides.logLevel = env.SHEETBOX_LOG_LEVEL;
  }

  return overrides;
}

/**
 * Apply overrides to a config. Later overrides win.
 */
export function applyOverrides(config: SheetboxConfig, ...layers: ConfigOverrides[]): SheetboxConfig {
  let merged = config;
  for (const layer of layers) {
    merged = {
      ...merged,
      baseDir: layer.baseDir ?? merged.baseDir,
      session: { ...merged.session, ttlHours: layer.ttlHours ?? merged.session.ttlHours },
      logging: { ...merged.logging, level: layer.logLevel ?? merged.logging.level },
    };
  }
  return parseConfig(merged, "overrides");
}

/**
 * Resolved configuration plus where it came from.
 */
export interface ResolvedConfig {
  config: SheetboxConfig;
  /** Config file that was loaded, if any */
  configPath: string | null;
  /** Absolute base directory */
  baseDir: string;
}

/**
 * Load configuration the way the CLI and the runtime do:
 * find the file, then apply environment and flag overrides, then
 * resolve `baseDir` against the config file's directory (or `cwd`).
 */
export async function resolveConfig(options: {
  cwd?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
} = {}): Promise<ResolvedConfig> {
  const cwd = options.cwd ?? process.cwd();

  let loaded: { config: SheetboxConfig; configPath: string; configDir: string } | null;
  if (options.configPath) {
    const configPath = path.resolve(cwd, options.configPath);
    loaded = { config: await loadConfigFile(configPath), configPath, configDir: path.dirname(configPath) };
  } else {
    loaded = await findConfig(cwd);
  }

  const base = loaded?.config ?? getDefaultConfig();
  const envOverrides = readEnvOverrides(options.env ?? process.env);
  const config = applyOverrides(base, envOverrides, options.overrides ?? {});

  // Overridden base directories are relative to cwd, file values to the file.
  const fromFile = envOverrides.baseDir === undefined && options.overrides?.baseDir === undefined;
  const anchor = fromFile && loaded ? loaded.configDir : cwd;

  return {
    config,
    configPath: loaded?.configPath ?? null,
    baseDir: path.resolve(anchor, config.baseDir),
  };
}

/**
 * Report settings that are valid on their own but inconsistent together.
 *
 * @returns Warning messages; empty when the config is consistent
 */
export function validateConfig(config: SheetboxConfig): string[] {
  const warnings: string[] = [];

  if (config.session.sweepIntervalMinutes > config.session.ttlHours * 60) {
    warnings.push(
      `session.sweepIntervalMinutes (${config.session.sweepIntervalMinutes}) is longer than session.ttlHours (${config.session.ttlHours}h); sessions will outlive their TTL`
    );
  }

  if (config.quota.maxUploadBytes > config.quota.maxSessionBytes) {
    warnings.push(
      `quota.maxUploadBytes (${config.quota.maxUploadBytes}) exceeds quota.maxSessionBytes (${config.quota.maxSessionBytes}); large uploads will be rejected by the session quota`
    );
  }

  if (config.quota.maxFilesPerSession < 2) {
    warnings.push("quota.maxFilesPerSession is below 2; a session cannot hold an upload and an export");
  }

  return warnings;
}
