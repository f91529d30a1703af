/**
 * Workspace Store
 *
 * Per-session directories under one base directory:
 *
 *   {baseDir}/{sessionId}/uploads/
 *   {baseDir}/{sessionId}/exports/
 *   {baseDir}/{sessionId}/temp/
 *   {baseDir}/{sessionId}/config.json
 *
 * Every path is built from a validated session id and checked against
 * the base directory by the path sandbox. Creation, purge, config writes
 * and quota-checked writes for one id are serialized; different ids never
 * wait on each other.
 */

import * as fs from 'fs/promises';
import type { Dirent } from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';
import {
  ConfigRecordSchema,
  DEFAULT_CONFIG_RECORD,
  InvalidPathError,
  QuotaExceededError,
  WriteFailedError,
  classifyUpload,
  displayNameOf,
  formatSchemaIssues,
  sanitizeFilename,
  synthesizeStoredName,
  type ConfigRecord,
  type ExportEntry,
  type IncomingWrite,
  type QuotaLimits,
  type SessionId,
  type UploadEntry,
  type UsageTotals,
  type Workspace,
} from '@sheetbox/core';
import { componentLogger, type Logger } from '../logging.js';
import { createPathSandbox, type PathSandbox } from '../sandbox/path-sandbox.js';
import { isSessionId } from '../session/identity.js';
import { KeyedLock } from '../session/keyed-lock.js';
import { errorMessage, isNotFound, writeExclusive, writeFileAtomically } from './file-io.js';

export const CONFIG_FILE_NAME = 'config.json';
export const WORKSPACE_DIRS = ['uploads', 'exports', 'temp'] as const;

export const DEFAULT_QUOTA: Readonly<QuotaLimits> = Object.freeze({
  maxSessionBytes: 1024 * 1024 * 1024,
  maxFilesPerSession: 50,
  maxUploadBytes: 200 * 1024 * 1024,
});

export interface WorkspaceStoreOptions {
  baseDir: string;
  quota?: Partial<QuotaLimits>;
  logger?: Logger;
  /** Clock used for stored-name timestamps */
  now?: () => Date;
}

/**
 * Usage of a single workspace. The config file is not counted.
 */
export interface WorkspaceUsage {
  fileCount: number;
  bytesUsed: number;
}

/**
 * A workspace directory found on disk, with its last modification time.
 */
export interface StoredWorkspace {
  id: SessionId;
  mtime: Date;
}

export interface PurgeOptions {
  /**
   * Evaluated once the id's lock is held; returning false keeps the
   * workspace. Lets a sweep re-check expiry against work queued on the id.
   */
  when?: () => boolean;
}

export class WorkspaceStore {
  readonly baseDir: string;
  readonly quota: Readonly<QuotaLimits>;
  private readonly sandbox: PathSandbox;
  private readonly lock = new KeyedLock();
  private readonly pending = new Map<SessionId, Promise<Workspace>>();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: WorkspaceStoreOptions) {
    this.baseDir = path.resolve(options.baseDir);
    this.quota = Object.freeze({ ...DEFAULT_QUOTA, ...options.quota });
    this.sandbox = createPathSandbox(this.baseDir);
    this.logger = options.logger ?? componentLogger('workspace-store');
    this.now = options.now ?? (() => new Date());
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Layout
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Resolve the workspace paths for `id` without touching the disk beyond metadata.
   *
   * @throws InvalidPathError when `id` is not a well-formed session id
   */
  async locate(id: string): Promise<Workspace> {
    if (!isSessionId(id)) {
      throw new InvalidPathError('Malformed session id', id);
    }
    const root = await this.sandbox.resolve(id);
    return {
      id,
      root,
      uploads: path.join(root, 'uploads'),
      exports: path.join(root, 'exports'),
      temp: path.join(root, 'temp'),
      configPath: path.join(root, CONFIG_FILE_NAME),
    };
  }

  async exists(id: SessionId): Promise<boolean> {
    const workspace = await this.locate(id);
    try {
      const stat = await fs.stat(workspace.root);
      return stat.isDirectory();
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Create the workspace if needed. Concurrent calls for one id share a
   * single creation and resolve to the same layout.
   */
  ensure(id: SessionId): Promise<Workspace> {
    const inFlight = this.pending.get(id);
    if (inFlight) {
      return inFlight;
    }
    const creation = this.lock
      .run(id, () => this.create(id))
      .finally(() => {
        this.pending.delete(id);
      });
    this.pending.set(id, creation);
    return creation;
  }

  private async create(id: SessionId): Promise<Workspace> {
    const workspace = await this.locate(id);
    await scaffold(workspace);

    const hasConfig = await fs
      .access(workspace.configPath)
      .then(() => true)
      .catch(() => false);
    if (!hasConfig) {
      await this.writeConfig(workspace, DEFAULT_CONFIG_RECORD);
      this.logger.info({ sessionId: id }, 'Created workspace');
    }
    return workspace;
  }

  /**
   * Delete the workspace. Deleting a missing workspace is a no-op.
   *
   * @returns true when a workspace was removed
   */
  async purge(id: SessionId, options: PurgeOptions = {}): Promise<boolean> {
    const workspace = await this.locate(id);
    return this.lock.run(id, async () => {
      if (options.when && !options.when()) {
        return false;
      }
      const existed = await fs
        .lstat(workspace.root)
        .then(() => true)
        .catch(() => false);
      await fs.rm(workspace.root, { recursive: true, force: true });
      if (existed) {
        this.logger.info({ sessionId: id }, 'Purged workspace');
      }
      return existed;
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Config
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Load the persisted config record. A missing or unreadable record
   * yields the defaults.
   */
  async loadConfig(id: SessionId): Promise<ConfigRecord> {
    const workspace = await this.locate(id);
    let raw: string;
    try {
      raw = await fs.readFile(workspace.configPath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return { ...DEFAULT_CONFIG_RECORD };
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn({ sessionId: id }, 'Config record is not valid JSON; using defaults');
      return { ...DEFAULT_CONFIG_RECORD };
    }

    const result = ConfigRecordSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn(
        { sessionId: id },
        `Config record failed validation; using defaults\n${formatSchemaIssues(result.error)}`
      );
      return { ...DEFAULT_CONFIG_RECORD };
    }
    return result.data;
  }

  /**
   * Validate and persist a config record atomically. A missing workspace
   * is created in full first.
   *
   * @throws WriteFailedError when validation or the write fails
   */
  async saveConfig(id: SessionId, record: ConfigRecord): Promise<void> {
    const workspace = await this.locate(id);
    const result = ConfigRecordSchema.safeParse(record);
    if (!result.success) {
      throw new WriteFailedError(workspace.configPath, `invalid config record\n${formatSchemaIssues(result.error)}`);
    }
    await this.lock.run(id, async () => {
      await scaffold(workspace);
      await this.writeConfig(workspace, result.data);
    });
    this.logger.debug({ sessionId: id }, 'Saved config record');
  }

  private async writeConfig(workspace: Workspace, record: ConfigRecord): Promise<void> {
    const body = JSON.stringify({ ...record, updatedAt: this.now().toISOString() }, null, 2);
    try {
      await writeFileAtomically(workspace.configPath, body + '\n');
    } catch (error) {
      throw new WriteFailedError(workspace.configPath, errorMessage(error));
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Listings
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Files in the exports directory, newest first.
   */
  async listExports(id: SessionId): Promise<ExportEntry[]> {
    const workspace = await this.locate(id);
    return listFiles(workspace.exports);
  }

  /**
   * Files in the uploads directory, newest first, with their kind.
   */
  async listUploads(id: SessionId): Promise<UploadEntry[]> {
    const workspace = await this.locate(id);
    const entries = await listFiles(workspace.uploads);
    return entries.map((entry) => ({ ...entry, kind: classifyUpload(entry.displayName) }));
  }

  /**
   * Find an upload by stored name or by display name. The newest match wins.
   */
  async findUpload(id: SessionId, name: string): Promise<UploadEntry | null> {
    const uploads = await this.listUploads(id);
    return uploads.find((entry) => entry.name === name || entry.displayName === name) ?? null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Uploads and temp files
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Store an uploaded file as `{timestamp}_{sanitizedName}`.
   *
   * @throws QuotaExceededError when a size or count limit would be exceeded
   */
  async saveUpload(id: SessionId, name: string, bytes: Uint8Array): Promise<UploadEntry> {
    if (bytes.byteLength > this.quota.maxUploadBytes) {
      throw new QuotaExceededError(
        `Upload of ${bytes.byteLength} bytes exceeds the ${this.quota.maxUploadBytes}-byte limit`,
        name
      );
    }
    const workspace = await this.ensure(id);
    const storedName = synthesizeStoredName(name, this.now());
    const filePath = await this.withinQuota(id, { bytes: bytes.byteLength, newFile: true }, () =>
      writeExclusive(workspace.uploads, storedName, bytes)
    );
    const stat = await fs.stat(filePath);
    const stored = path.basename(filePath);
    const displayName = displayNameOf(stored);

    this.logger.info({ sessionId: id, file: stored, size: stat.size }, 'Saved upload');
    return {
      name: stored,
      displayName,
      path: filePath,
      size: stat.size,
      mtime: stat.mtime,
      kind: classifyUpload(displayName),
    };
  }

  /**
   * Path for a scratch file in the temp directory. Without a name a random
   * `temp_{8 hex}.tmp` is used. The file itself is not created.
   */
  async tempPath(id: SessionId, name?: string): Promise<string> {
    const workspace = await this.locate(id);
    const fileName = name ? sanitizeFilename(name) : `temp_${randomBytes(4).toString('hex')}.tmp`;
    return createPathSandbox(workspace.temp).resolve(fileName);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Usage and quota
  // ─────────────────────────────────────────────────────────────────────────

  async workspaceUsage(id: SessionId): Promise<WorkspaceUsage> {
    const workspace = await this.locate(id);
    return measure(workspace.root, workspace.configPath);
  }

  /**
   * Throw if `incoming` would exceed the session's limits. Only a new file
   * counts against the file limit.
   */
  async checkQuota(id: SessionId, incoming: IncomingWrite): Promise<void> {
    const usage = await this.workspaceUsage(id);
    const incomingBytes = incoming.bytes;
    if (incoming.newFile && usage.fileCount + 1 > this.quota.maxFilesPerSession) {
      throw new QuotaExceededError(`File limit of ${this.quota.maxFilesPerSession} reached`);
    }
    if (usage.bytesUsed + incomingBytes > this.quota.maxSessionBytes) {
      throw new QuotaExceededError(
        `Session storage limit of ${this.quota.maxSessionBytes} bytes would be exceeded`
      );
    }
  }

  /**
   * Check the quota and run `write` while holding the id's lock, so
   * concurrent writes to one session cannot all pass the same check.
   *
   * @throws QuotaExceededError when `incoming` does not fit
   */
  withinQuota<T>(id: SessionId, incoming: IncomingWrite, write: () => Promise<T>): Promise<T> {
    return this.lock.run(id, async () => {
      await this.checkQuota(id, incoming);
      return write();
    });
  }

  /**
   * Workspaces present on disk. Entries that are not session ids are ignored.
   */
  async listStored(): Promise<StoredWorkspace[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.baseDir, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const stored: StoredWorkspace[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory() || !isSessionId(entry.name)) {
        continue;
      }
      try {
        const stat = await fs.stat(path.join(this.baseDir, entry.name));
        stored.push({ id: entry.name, mtime: stat.mtime });
      } catch (error) {
        if (!isNotFound(error)) {
          throw error;
        }
      }
    }
    return stored;
  }

  /**
   * Totals across every workspace on disk.
   */
  async totalUsage(): Promise<UsageTotals> {
    const totals: UsageTotals = { sessionCount: 0, fileCount: 0, bytesUsed: 0 };
    for (const { id } of await this.listStored()) {
      const usage = await this.workspaceUsage(id);
      totals.sessionCount += 1;
      totals.fileCount += usage.fileCount;
      totals.bytesUsed += usage.bytesUsed;
    }
    return totals;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

async function scaffold(workspace: Workspace): Promise<void> {
  try {
    for (const dir of WORKSPACE_DIRS) {
      await fs.mkdir(path.join(workspace.root, dir), { recursive: true });
    }
  } catch (error) {
    throw new WriteFailedError(workspace.root, errorMessage(error));
  }
}

async function listFiles(dir: string): Promise<ExportEntry[]> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  const entries: ExportEntry[] = [];
  for (const name of names) {
    const filePath = path.join(dir, name);
    try {
      const stat = await fs.stat(filePath);
      if (!stat.isFile()) {
        continue;
      }
      entries.push({ name, displayName: displayNameOf(name), path: filePath, size: stat.size, mtime: stat.mtime });
    } catch (error) {
      // removed between readdir and stat
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }

  return entries.sort((a, b) => b.mtime.getTime() - a.mtime.getTime() || b.name.localeCompare(a.name));
}

async function measure(dir: string, excluded: string): Promise<WorkspaceUsage> {
  const usage: WorkspaceUsage = { fileCount: 0, bytesUsed: 0 };
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) {
      return usage;
    }
    throw error;
  }

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      const nested = await measure(entryPath, excluded);
      usage.fileCount += nested.fileCount;
      usage.bytesUsed += nested.bytesUsed;
    } else if (entry.isFile() && entryPath !== excluded) {
      try {
        const stat = await fs.stat(entryPath);
        usage.fileCount += 1;
        usage.bytesUsed += stat.size;
      } catch (error) {
        if (!isNotFound(error)) {
          throw error;
        }
      }
    }
  }
  return usage;
}
