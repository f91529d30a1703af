/**
 * Session Registry
 *
 * Process-wide directory of active sessions and their last-touch time.
 *
 * A session moves Unseen → Active on its first touch and Active → Expired
 * when a sweep finds it idle past the TTL. Expired is terminal: the
 * record and workspace are gone, and a later touch of the same id starts
 * a fresh Active session.
 */

import * as path from 'path';
import { InvalidPathError, type SessionId, type SessionRecord } from '@sheetbox/core';
import { componentLogger, type Logger } from '../logging.js';
import type { WorkspaceStore } from '../workspace/workspace-store.js';
import { errorMessage } from '../workspace/file-io.js';
import { isSessionId } from './identity.js';

/**
 * The part of the workspace store the registry depends on.
 */
export type RegistryStore = Pick<WorkspaceStore, 'baseDir' | 'purge' | 'listStored' | 'totalUsage'>;

export interface SessionRegistryOptions {
  store: RegistryStore;
  logger?: Logger;
  now?: () => Date;
}

export interface RegistryStats {
  /** Sessions with a live record in this process */
  activeSessions: number;
  /** Workspaces on disk, including ones not yet adopted */
  totalSessions: number;
  totalFiles: number;
  totalBytes: number;
}

function copy(record: SessionRecord): SessionRecord {
  return { ...record, createdAt: new Date(record.createdAt), lastSeenAt: new Date(record.lastSeenAt) };
}

export class SessionRegistry {
  private readonly records = new Map<SessionId, SessionRecord>();
  private readonly store: RegistryStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SessionRegistryOptions) {
    this.store = options.store;
    this.logger = options.logger ?? componentLogger('registry');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create the record if absent, otherwise advance `lastSeenAt`.
   *
   * @throws InvalidPathError when `id` is not a well-formed session id
   */
  touch(id: SessionId): SessionRecord {
    if (!isSessionId(id)) {
      throw new InvalidPathError('Malformed session id', id);
    }
    const at = this.now();
    const existing = this.records.get(id);
    if (existing) {
      if (at.getTime() > existing.lastSeenAt.getTime()) {
        existing.lastSeenAt = at;
      }
      return copy(existing);
    }

    const record: SessionRecord = {
      id,
      createdAt: at,
      lastSeenAt: at,
      workspaceRoot: path.join(this.store.baseDir, id),
    };
    this.records.set(id, record);
    this.logger.debug({ sessionId: id }, 'Session active');
    return copy(record);
  }

  get(id: SessionId): SessionRecord | undefined {
    const record = this.records.get(id);
    return record ? copy(record) : undefined;
  }

  list(): SessionRecord[] {
    return [...this.records.values()].map(copy);
  }

  remove(id: SessionId): boolean {
    return this.records.delete(id);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Register a workspace found on disk, dated by its modification time.
   * Ids that already have a record are left alone.
   */
  adopt(id: SessionId, lastSeenAt: Date): boolean {
    if (!isSessionId(id) || this.records.has(id)) {
      return false;
    }
    this.records.set(id, {
      id,
      createdAt: lastSeenAt,
      lastSeenAt,
      workspaceRoot: path.join(this.store.baseDir, id),
    });
    return true;
  }

  /**
   * Adopt every workspace left on disk by an earlier process.
   *
   * @returns Number of sessions adopted
   */
  async adoptExisting(): Promise<number> {
    let adopted = 0;
    for (const { id, mtime } of await this.store.listStored()) {
      if (this.adopt(id, mtime)) {
        adopted += 1;
      }
    }
    if (adopted > 0) {
      this.logger.info({ adopted }, 'Adopted existing workspaces');
    }
    return adopted;
  }

  /**
   * Purge every session idle for longer than `ttlMs`.
   *
   * Candidates come from a snapshot. Expiry is re-checked under the
   * store's per-id lock, after any work already queued on the id, so a
   * session touched after the snapshot survives along with its workspace.
   * When a purge fails the record is put back (unless the session was
   * touched again meanwhile) and the next sweep retries it.
   *
   * @returns Number of sessions expired
   */
  async sweep(ttlMs: number): Promise<number> {
    const isExpired = (record: SessionRecord) => this.now().getTime() - record.lastSeenAt.getTime() > ttlMs;
    const candidates = [...this.records.values()].filter(isExpired).map((record) => record.id);

    let purged = 0;
    for (const id of candidates) {
      let expired: SessionRecord | undefined;
      const when = () => {
        const current = this.records.get(id);
        if (!current || !isExpired(current)) {
          return false;
        }
        this.records.delete(id);
        expired = current;
        return true;
      };

      try {
        await this.store.purge(id, { when });
      } catch (error) {
        if (expired && !this.records.has(id)) {
          this.records.set(id, expired);
        }
        this.logger.error({ sessionId: id, err: errorMessage(error) }, 'Failed to purge expired session');
        continue;
      }
      if (expired) {
        purged += 1;
        this.logger.info({ sessionId: id, idleSince: expired.lastSeenAt.toISOString() }, 'Expired session');
      }
    }
    return purged;
  }

  async stats(): Promise<RegistryStats> {
    const usage = await this.store.totalUsage();
    return {
      activeSessions: this.records.size,
      totalSessions: usage.sessionCount,
      totalFiles: usage.fileCount,
      totalBytes: usage.bytesUsed,
    };
  }
}
