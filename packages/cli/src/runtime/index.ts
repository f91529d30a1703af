/**
 * Session Runtime
 */

export {
  SessionRuntime,
  type SessionRuntimeOptions,
  type RuntimeStats,
} from "./session-runtime.js";
