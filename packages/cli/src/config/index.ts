/**
 * Config Module
 *
 * Runtime configuration schema and loading.
 */

export {
  SheetboxConfigSchema,
  SessionConfigSchema,
  QuotaConfigSchema,
  ExecutionConfigSchema,
  LoggingConfigSchema,
  type SheetboxConfig,
  type SheetboxConfigInput,
  type ConfigOverrides,
  type ResolvedConfig,
  getDefaultConfig,
  loadConfigFile,
  findConfig,
  readEnvOverrides,
  applyOverrides,
  resolveConfig,
  validateConfig,
} from "./runtime-config.js";
