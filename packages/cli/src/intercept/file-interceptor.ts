/**
 * File Interceptor
 *
 * Redirects the file-producing operations of executed code into the
 * session's exports directory.
 *
 * Each execution gets its own capability object (`session.operations`).
 * Nothing process-wide is patched: the real writers live in a frozen
 * table shared by every session, and a shim only decides *where* a
 * write lands before delegating to it. Concurrent executions therefore
 * never see each other's shims.
 *
 * Whatever path the code asks for, only its last segment survives. The
 * name is sanitized, prefixed with a UTC timestamp and resolved through
 * a path sandbox bound to the exports directory. A failed save resolves
 * to `null` and is recorded on the session; it never throws into the
 * executed code. A chunk written through an open handle that does not
 * fit the quota is recorded the same way and dropped.
 */

import * as fs from 'fs/promises';
import * as nodePath from 'path';
import { randomUUID } from 'crypto';
import * as XLSX from 'xlsx';
import {
  InterceptionClosedError,
  InterceptionLeakError,
  InvalidPathError,
  WriteFailedError,
  encodeDelimited,
  isSandboxError,
  isTabularData,
  splitExtension,
  synthesizeStoredName,
  toMatrix,
  type ExportHandle,
  type IncomingWrite,
  type InterceptedOperations,
  type OperationKind,
  type SaveFailure,
  type TabularData,
  type Workspace,
} from '@sheetbox/core';
import { componentLogger, type Logger } from '../logging.js';
import { createPathSandbox, type PathSandbox } from '../sandbox/path-sandbox.js';
import { errorMessage, openExclusive, writeExclusive } from '../workspace/file-io.js';

// ─────────────────────────────────────────────────────────────────────────────
// Base operations
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The real writers behind the shims. Both create a new file in `dir`
 * under `name`, adding a collision suffix when the name is taken.
 */
export interface BaseOperations {
  open(dir: string, name: string): Promise<{ path: string; handle: fs.FileHandle }>;
  write(dir: string, name: string, content: string | Uint8Array): Promise<string>;
}

export const BASE_OPERATIONS: Readonly<BaseOperations> = Object.freeze({
  open: openExclusive,
  write: writeExclusive,
});

const MAX_SHEET_NAME_LENGTH = 31;

function toSheetName(name: string | undefined): string {
  const cleaned = (name ?? '').replace(/[[\]:*?/\\]/g, '').slice(0, MAX_SHEET_NAME_LENGTH).trim();
  return cleaned || 'Sheet1';
}

/**
 * Encode a table for the given file extension.
 * `.xlsx` and `.ods` are real workbooks, `.tsv` is tab-separated,
 * anything else is CSV.
 */
export function encodeTable(data: TabularData, extension: string, sheetName?: string): string | Uint8Array {
  const ext = extension.toLowerCase();
  if (ext === '.xlsx' || ext === '.ods') {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(toMatrix(data)), toSheetName(sheetName));
    const output: unknown = XLSX.write(workbook, { type: 'array', bookType: ext === '.ods' ? 'ods' : 'xlsx' });
    if (output instanceof ArrayBuffer) {
      return new Uint8Array(output);
    }
    if (output instanceof Uint8Array) {
      return output;
    }
    throw new Error('spreadsheet encoder returned no data');
  }
  return encodeDelimited(data, ext === '.tsv' ? '\t' : ',');
}

// ─────────────────────────────────────────────────────────────────────────────
// Sessions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One execution's view of the interceptor.
 */
export interface InterceptionSession {
  readonly id: string;
  readonly workspace: Workspace;
  readonly boundExportRoot: string;
  readonly operations: InterceptedOperations;
  readonly producedFiles: readonly string[];
  readonly failures: readonly SaveFailure[];
  readonly active: boolean;
  readonly startedAt: Date;
}

export interface InterceptionResult {
  producedFiles: string[];
  failures: SaveFailure[];
}

export type InterceptionEvent =
  | { type: 'file_saved'; sessionId: string; operation: OperationKind; path: string }
  | { type: 'save_failed'; sessionId: string; failure: SaveFailure }
  | { type: 'interception_leak'; sessionId: string };

export type InterceptionEventCallback = (event: InterceptionEvent & { timestamp: Date }) => void;

export interface FileInterceptorOptions {
  /**
   * Runs `write` once the workspace's quota admits `incoming`, otherwise
   * rejects with QuotaExceededError. Admissions for one workspace must
   * not interleave.
   */
  withinQuota?: <T>(workspace: Workspace, incoming: IncomingWrite, write: () => Promise<T>) => Promise<T>;
  now?: () => Date;
  logger?: Logger;
  onEvent?: InterceptionEventCallback;
}

function byteLength(data: string | Uint8Array): number {
  return typeof data === 'string' ? Buffer.byteLength(data, 'utf8') : data.byteLength;
}

const UNREADABLE_TARGET = '<invalid name>';

/**
 * Text form of a target supplied by executed code, or `null` when its
 * conversion throws.
 */
function targetLabel(target: unknown): string | null {
  try {
    return String(target);
  } catch {
    return null;
  }
}

class ActiveInterception implements InterceptionSession {
  readonly id = randomUUID();
  readonly boundExportRoot: string;
  readonly operations: InterceptedOperations;
  readonly startedAt: Date;
  active = true;

  private readonly produced: string[] = [];
  private readonly failed: SaveFailure[] = [];
  private readonly inFlight = new Set<Promise<unknown>>();
  private readonly handles = new Set<ExportHandle>();
  private readonly sandbox: PathSandbox;

  constructor(
    readonly workspace: Workspace,
    private readonly owner: FileInterceptor,
    private readonly options: FileInterceptorOptions
  ) {
    this.boundExportRoot = workspace.exports;
    this.sandbox = createPathSandbox(workspace.exports);
    this.startedAt = this.now();
    this.operations = Object.freeze(this.createOperations());
  }

  get producedFiles(): readonly string[] {
    return this.produced;
  }

  get failures(): readonly SaveFailure[] {
    return this.failed;
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  private createOperations(): InterceptedOperations {
    const operations: InterceptedOperations = {
      open: (target) =>
        this.track('open', target, async (dir, name) => {
          const { path, handle } = await this.admit({ bytes: 0, newFile: true }, () =>
            BASE_OPERATIONS.open(dir, name)
          );
          this.handles.add(this.wrapHandle(path, handle));
          return path;
        }).then((path) => (path === null ? null : this.handleFor(path))),

      writeTable: (target, data, options) =>
        this.track('table', target, async (dir, name, requested) => {
          if (!isTabularData(data)) {
            throw new WriteFailedError(requested, 'data is not a table');
          }
          const encoded = encodeTable(data, splitExtension(name).ext, options?.sheetName);
          return this.admit({ bytes: byteLength(encoded), newFile: true }, () =>
            BASE_OPERATIONS.write(dir, name, encoded)
          );
        }),

      dumpJson: (target, value, options) =>
        this.track('data', target, async (dir, name) => {
          const encoded = (JSON.stringify(value, null, options?.indent ?? 2) ?? 'null') + '\n';
          return this.admit({ bytes: byteLength(encoded), newFile: true }, () =>
            BASE_OPERATIONS.write(dir, name, encoded)
          );
        }),

      writeText: (target, text) =>
        this.track('text', target, async (dir, name) => {
          const content = String(text);
          return this.admit({ bytes: byteLength(content), newFile: true }, () =>
            BASE_OPERATIONS.write(dir, name, content)
          );
        }),

      saveToExports: (name, data) => {
        if (isTabularData(data)) {
          return operations.writeTable(name, data);
        }
        if (typeof data === 'string') {
          return operations.writeText(name, data);
        }
        if (ArrayBuffer.isView(data)) {
          const bytes = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
          return this.track('text', name, async (dir, stored) =>
            this.admit({ bytes: bytes.byteLength, newFile: true }, () => BASE_OPERATIONS.write(dir, stored, bytes))
          );
        }
        return operations.dumpJson(name, data);
      },
    };
    return operations;
  }

  private admit<T>(incoming: IncomingWrite, write: () => Promise<T>): Promise<T> {
    return this.options.withinQuota ? this.options.withinQuota(this.workspace, incoming, write) : write();
  }

  private handleFor(path: string): ExportHandle | null {
    for (const handle of this.handles) {
      if (handle.path === path) {
        return handle;
      }
    }
    return null;
  }

  private wrapHandle(path: string, fileHandle: fs.FileHandle): ExportHandle {
    let closed = false;
    const handle: ExportHandle = {
      path,
      write: (chunk) => {
        if (closed || !this.active) {
          return Promise.reject(new InterceptionClosedError(this.id));
        }
        const pending = (async () => {
          try {
            if (typeof chunk !== 'string' && !ArrayBuffer.isView(chunk)) {
              throw new WriteFailedError(nodePath.basename(path), 'chunk is neither text nor bytes');
            }
            const bytes =
              typeof chunk === 'string'
                ? Buffer.from(chunk, 'utf8')
                : new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength);
            await this.admit({ bytes: bytes.byteLength, newFile: false }, async () => {
              await fileHandle.write(bytes);
            });
          } catch (error) {
            this.recordFailure('open', nodePath.basename(path), error);
          }
        })();
        this.settleLater(pending);
        return pending;
      },
      close: async () => {
        if (closed) {
          return;
        }
        closed = true;
        this.handles.delete(handle);
        await fileHandle.close();
      },
    };
    return handle;
  }

  /**
   * Run one redirected save: build the stored name, resolve it inside the
   * exports directory, perform the write and record the outcome.
   */
  private track(
    operation: OperationKind,
    requested: unknown,
    write: (dir: string, name: string, requested: string) => Promise<string>
  ): Promise<string | null> {
    if (!this.active) {
      return Promise.reject(new InterceptionClosedError(this.id));
    }

    const label = targetLabel(requested);
    const attempt = (async (): Promise<string | null> => {
      try {
        if (label === null) {
          throw new InvalidPathError('Target name cannot be read as text');
        }
        const storedName = synthesizeStoredName(label, this.now());
        const target = await this.sandbox.resolve(storedName);
        const written = await write(nodePath.dirname(target), nodePath.basename(target), label);
        this.produced.push(written);
        this.owner.emit({ type: 'file_saved', sessionId: this.id, operation, path: written });
        return written;
      } catch (error) {
        this.recordFailure(operation, label ?? UNREADABLE_TARGET, error);
        return null;
      }
    })();

    this.settleLater(attempt);
    return attempt;
  }

  private recordFailure(operation: OperationKind, requested: string, error: unknown): void {
    const failure: SaveFailure = {
      operation,
      requested,
      code: isSandboxError(error) ? error.code : 'WRITE_FAILED',
      message: isSandboxError(error) ? error.toUserMessage() : errorMessage(error),
    };
    this.failed.push(failure);
    this.owner.emit({ type: 'save_failed', sessionId: this.id, failure });
  }

  /**
   * Keep `pending` in the in-flight set until it settles. The bookkeeping
   * chain never rejects; the outcome reaches the caller through `pending`.
   */
  private settleLater(pending: Promise<unknown>): void {
    const settle = () => {
      this.inFlight.delete(pending);
    };
    this.inFlight.add(pending);
    void pending.then(settle, settle);
  }

  /**
   * Deactivate, let in-flight saves settle, then close every handle the
   * executed code left open.
   */
  async close(): Promise<InterceptionResult> {
    this.active = false;
    await Promise.allSettled([...this.inFlight]);
    const closing = [...this.handles].map((handle) => handle.close());
    const results = await Promise.allSettled(closing);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.failed.push({
          operation: 'open',
          requested: '',
          code: 'WRITE_FAILED',
          message: errorMessage(result.reason),
        });
      }
    }
    return { producedFiles: [...this.produced], failures: [...this.failed] };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Interceptor
// ─────────────────────────────────────────────────────────────────────────────

export class FileInterceptor {
  private readonly active = new Set<ActiveInterception>();
  private readonly logger: Logger;
  private readonly onEvent?: InterceptionEventCallback;

  constructor(private readonly options: FileInterceptorOptions = {}) {
    this.logger = options.logger ?? componentLogger('interceptor');
    this.onEvent = options.onEvent;
  }

  /**
   * Emit an interception event and log it.
   */
  emit(event: InterceptionEvent): void {
    switch (event.type) {
      case 'file_saved':
        this.logger.debug({ interception: event.sessionId, operation: event.operation, file: event.path }, 'Saved file');
        break;
      case 'save_failed':
        this.logger.warn(
          { interception: event.sessionId, operation: event.failure.operation, code: event.failure.code },
          event.failure.message
        );
        break;
      case 'interception_leak':
        break;
    }
    if (this.onEvent) {
      this.onEvent({ ...event, timestamp: new Date() });
    }
  }

  /**
   * Start intercepting saves for one execution.
   */
  begin(workspace: Workspace): InterceptionSession {
    const session = new ActiveInterception(workspace, this, this.options);
    this.active.add(session);
    this.logger.debug({ interception: session.id, sessionId: workspace.id }, 'Interception started');
    return session;
  }

  /**
   * Stop intercepting. Later calls on the session's operations reject with
   * InterceptionClosedError. Ending twice returns the same files.
   */
  async end(session: InterceptionSession): Promise<InterceptionResult> {
    const owned = this.find(session);
    if (!owned) {
      return { producedFiles: [...session.producedFiles], failures: [...session.failures] };
    }
    try {
      return await owned.close();
    } finally {
      this.active.delete(owned);
      this.logger.debug(
        { interception: owned.id, files: owned.producedFiles.length, failures: owned.failures.length },
        'Interception ended'
      );
    }
  }

  /**
   * Run `fn` with an interception session that is ended on every exit path.
   */
  async run<T>(
    workspace: Workspace,
    fn: (operations: InterceptedOperations, session: InterceptionSession) => Promise<T>
  ): Promise<InterceptionResult & { value: T }> {
    const session = this.begin(workspace);
    try {
      const value = await fn(session.operations, session);
      return { value, ...(await this.end(session)) };
    } finally {
      if (session.active) {
        await this.end(session);
      }
    }
  }

  /**
   * Force-close sessions that are still active. Each one is reported as a
   * leak at error level.
   *
   * @returns Number of sessions closed
   */
  async closeLeaked(): Promise<number> {
    const leaked = [...this.active];
    for (const session of leaked) {
      const error = new InterceptionLeakError(session.id);
      this.logger.error({ interception: session.id, sessionId: session.workspace.id }, error.message);
      this.emit({ type: 'interception_leak', sessionId: session.id });
      await this.end(session);
    }
    return leaked.length;
  }

  /** Number of sessions that have begun and not ended */
  get activeCount(): number {
    return this.active.size;
  }

  private find(session: InterceptionSession): ActiveInterception | undefined {
    return session instanceof ActiveInterception && this.active.has(session) ? session : undefined;
  }
}
