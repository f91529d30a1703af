/**
 * @sheetbox/core
 *
 * Platform-agnostic types and utilities for sheetbox.
 * Used by the Node.js runtime and by any front end that only needs
 * the shared types and the client-safe config view.
 *
 * @module @sheetbox/core
 */

// Sandbox types
export type {
  SessionId,
  Workspace,
  SessionRecord,
  ExportEntry,
  UploadKind,
  UploadEntry,
  UsageTotals,
  QuotaLimits,
  IncomingWrite,
  OperationKind,
  TableCell,
  TabularData,
  SaveFailure,
  ExportHandle,
  InterceptedOperations,
} from './sandbox-types.js';

// Sandbox errors
export {
  SandboxError,
  PathEscapeError,
  InvalidPathError,
  WriteFailedError,
  QuotaExceededError,
  InterceptionClosedError,
  InterceptionLeakError,
  ExecutionTimeoutError,
  isSandboxError,
} from './sandbox-errors.js';

// File naming
export {
  sanitizeFilename,
  splitExtension,
  formatTimestamp,
  synthesizeStoredName,
  withCollisionSuffix,
  displayNameOf,
  classifyUpload,
} from './filename.js';

// Table encoding
export {
  isTabularData,
  toMatrix,
  formatCell,
  encodeDelimited,
} from './table-encoding.js';

// Config record
export {
  ConfigRecordSchema,
  RedactedConfigRecordSchema,
  DEFAULT_CONFIG_RECORD,
  CREDENTIAL_PREVIEW_LENGTH,
  maskCredential,
  redactConfigRecord,
  formatSchemaIssues,
} from './config-record.js';
export type { ConfigRecord, RedactedConfigRecord } from './config-record.js';
