/**
 * sheetbox - Per-user workspaces and intercepted file saves for shared
 * spreadsheet analysis
 */

// Path containment
export * from "./sandbox/index.js";

// Session identity, registry and expiry
export {
  SESSION_ID_PREFIX,
  SESSION_ID_PATTERN,
  isSessionId,
  hourBucket,
  deriveSessionId,
  deriveOrAccept,
  generateClientToken,
  type ClientSignature,
} from "./session/identity.js";
export { KeyedLock } from "./session/keyed-lock.js";
export {
  SessionRegistry,
  type SessionRegistryOptions,
  type RegistryStore,
  type RegistryStats,
} from "./session/registry.js";
export { Reaper, type ReaperOptions } from "./session/reaper.js";

// Workspaces
export {
  WorkspaceStore,
  CONFIG_FILE_NAME,
  WORKSPACE_DIRS,
  DEFAULT_QUOTA,
  type WorkspaceStoreOptions,
  type WorkspaceUsage,
  type StoredWorkspace,
  type PurgeOptions,
} from "./workspace/workspace-store.js";

// Interception and execution
export {
  FileInterceptor,
  BASE_OPERATIONS,
  encodeTable,
  type BaseOperations,
  type InterceptionSession,
  type InterceptionResult,
  type InterceptionEvent,
  type InterceptionEventCallback,
  type FileInterceptorOptions,
} from "./intercept/file-interceptor.js";
export {
  CodeRunner,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_OUTPUT_LENGTH,
  type RunCodeOptions,
  type CodeRunResult,
  type CodeRunnerOptions,
} from "./execute/code-runner.js";

// Runtime facade
export * from "./runtime/index.js";

// Configuration and logging
export * from "./config/index.js";
export {
  initLogger,
  getLogger,
  componentLogger,
  redactSecrets,
  isLogLevel,
  isLogFormat,
  LOG_LEVELS,
  LOG_FORMATS,
  type Logger,
  type LogLevel,
  type LogFormat,
} from "./logging.js";

// CLI
export * from "./cli/index.js";
