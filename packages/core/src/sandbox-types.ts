/**
 * Shared Sandbox Types
 *
 * Platform-agnostic type definitions for sessions, workspaces and the
 * intercepted file operations handed to executed code.
 *
 * @module @sheetbox/core/sandbox-types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Sessions and Workspaces
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Opaque session identifier: `user_` followed by 16 lowercase hex characters.
 */
export type SessionId = string;

/**
 * Resolved on-disk layout of one session's workspace.
 * All paths are absolute and descend from `root`.
 */
export interface Workspace {
  id: SessionId;
  root: string;
  uploads: string;
  exports: string;
  temp: string;
  /** Location of the persisted ConfigRecord */
  configPath: string;
}

/**
 * Registry entry for one active session.
 */
export interface SessionRecord {
  id: SessionId;
  createdAt: Date;
  /** Advanced on every touch; the only mutable field */
  lastSeenAt: Date;
  workspaceRoot: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// File Listings
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A file in a workspace's exports directory, for download listings.
 */
export interface ExportEntry {
  /** Stored file name, including the timestamp prefix */
  name: string;
  /** File name with the timestamp prefix removed */
  displayName: string;
  path: string;
  size: number;
  mtime: Date;
}

export type UploadKind = 'excel' | 'csv' | 'text' | 'pdf' | 'word' | 'other';

/**
 * A file in a workspace's uploads directory.
 */
export interface UploadEntry extends ExportEntry {
  kind: UploadKind;
}

/**
 * Aggregate storage usage across every workspace under the base directory.
 */
export interface UsageTotals {
  sessionCount: number;
  fileCount: number;
  bytesUsed: number;
}

/**
 * Per-session storage limits.
 */
export interface QuotaLimits {
  maxSessionBytes: number;
  maxFilesPerSession: number;
  maxUploadBytes: number;
}

/**
 * A write about to be admitted against a session's quota.
 */
export interface IncomingWrite {
  bytes: number;
  /** False when appending to a file that is already counted */
  newFile: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Intercepted Operations
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The fixed set of file-producing operation kinds that are redirected.
 */
export type OperationKind = 'open' | 'table' | 'data' | 'text';

export type TableCell = string | number | boolean | Date | null | undefined;

/**
 * Tabular data: either rows of cells (first row is the header) or
 * an array of records keyed by column name.
 */
export type TabularData =
  | ReadonlyArray<ReadonlyArray<TableCell>>
  | ReadonlyArray<Readonly<Record<string, TableCell>>>;

/**
 * A save that did not produce a file.
 */
export interface SaveFailure {
  operation: OperationKind;
  /** Target name exactly as the executed code supplied it */
  requested: string;
  code: string;
  message: string;
}

/**
 * Writable handle returned by the generic open-for-write shim.
 */
export interface ExportHandle {
  readonly path: string;
  write(chunk: string | Uint8Array): Promise<void>;
  close(): Promise<void>;
}

/**
 * Capability object handed to executed code.
 *
 * Each method redirects its target into the session's exports directory.
 * A failed save resolves to `null` and is recorded on the interception
 * session instead of rejecting, so one bad save does not stop the rest.
 */
export interface InterceptedOperations {
  /** Generic open-for-write */
  open(target: string): Promise<ExportHandle | null>;

  /** Tabular/spreadsheet export; format follows the target extension */
  writeTable(target: string, data: TabularData, options?: { sheetName?: string }): Promise<string | null>;

  /** Structured-data dump as JSON */
  dumpJson(target: string, value: unknown, options?: { indent?: number }): Promise<string | null>;

  /** Plain-text or document write */
  writeText(target: string, text: string): Promise<string | null>;

  /**
   * Convenience save that picks the operation from the data:
   * tables go through writeTable, strings through writeText, anything else through dumpJson.
   */
  saveToExports(name: string, data: unknown): Promise<string | null>;
}
