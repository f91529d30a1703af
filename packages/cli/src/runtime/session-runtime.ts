/**
 * Session Runtime
 *
 * Composes the workspace store, session registry, file interceptor, code
 * runner and reaper into the single surface a front end talks to.
 *
 * Every per-session call touches the registry first, so an id is validated
 * before any path is built and a session in use is never swept.
 */

import {
  redactConfigRecord,
  type ConfigRecord,
  type ExportEntry,
  type RedactedConfigRecord,
  type SessionId,
  type UploadEntry,
  type Workspace,
} from "@sheetbox/core";
import { getDefaultConfig, type SheetboxConfig } from "../config/runtime-config.js";
import { CodeRunner, type CodeRunResult, type RunCodeOptions } from "../execute/code-runner.js";
import {
  FileInterceptor,
  type InterceptionEventCallback,
  type InterceptionResult,
  type InterceptionSession,
} from "../intercept/file-interceptor.js";
import { componentLogger, type Logger } from "../logging.js";
import { deriveOrAccept, type ClientSignature } from "../session/identity.js";
import { Reaper } from "../session/reaper.js";
import { SessionRegistry, type RegistryStats } from "../session/registry.js";
import { WorkspaceStore } from "../workspace/workspace-store.js";

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

export interface SessionRuntimeOptions {
  /** Absolute directory holding every workspace */
  baseDir: string;
  /** Runtime settings; `baseDir` here is ignored in favour of the option above */
  config?: SheetboxConfig;
  logger?: Logger;
  now?: () => Date;
  /** Receives file_saved, save_failed and interception_leak events */
  onEvent?: InterceptionEventCallback;
}

export interface RuntimeStats extends RegistryStats {
  ttlHours: number;
  sweepIntervalMinutes: number;
}

export class SessionRuntime {
  readonly store: WorkspaceStore;
  readonly registry: SessionRegistry;
  readonly interceptor: FileInterceptor;
  readonly runner: CodeRunner;
  readonly reaper: Reaper;
  readonly config: SheetboxConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SessionRuntimeOptions) {
    this.config = options.config ?? getDefaultConfig();
    this.logger = options.logger ?? componentLogger("runtime");
    this.now = options.now ?? (() => new Date());

    const child = (component: string) => this.logger.child({ component });

    this.store = new WorkspaceStore({
      baseDir: options.baseDir,
      quota: this.config.quota,
      logger: child("workspace-store"),
      now: this.now,
    });
    this.registry = new SessionRegistry({
      store: this.store,
      logger: child("registry"),
      now: this.now,
    });
    this.interceptor = new FileInterceptor({
      withinQuota: (workspace, incoming, write) => this.store.withinQuota(workspace.id, incoming, write),
      now: this.now,
      logger: child("interceptor"),
      onEvent: options.onEvent,
    });
    this.runner = new CodeRunner({
      interceptor: this.interceptor,
      tempPath: (workspace, name) => this.store.tempPath(workspace.id, name),
      timeoutMs: this.config.execution.timeoutMs,
      maxOutputLength: this.config.execution.maxOutputLength,
      logger: child("code-runner"),
    });
    this.reaper = new Reaper({
      registry: this.registry,
      ttlMs: this.config.session.ttlHours * HOUR_MS,
      intervalMs: this.config.session.sweepIntervalMinutes * MINUTE_MS,
      sweepOnStart: this.config.session.sweepOnStart,
      logger: child("reaper"),
    });
  }

  get baseDir(): string {
    return this.store.baseDir;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Identity and workspaces
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Keep a well-formed id the client already holds, otherwise derive one.
   */
  deriveOrAccept(signature: ClientSignature, existingId?: string): SessionId {
    return deriveOrAccept(signature, existingId, this.now());
  }

  /**
   * Mark the session active and make sure its workspace exists.
   */
  async ensureWorkspace(id: SessionId): Promise<Workspace> {
    this.registry.touch(id);
    return this.store.ensure(id);
  }

  async listExports(id: SessionId): Promise<ExportEntry[]> {
    this.registry.touch(id);
    return this.store.listExports(id);
  }

  async listUploads(id: SessionId): Promise<UploadEntry[]> {
    this.registry.touch(id);
    return this.store.listUploads(id);
  }

  async saveUpload(id: SessionId, name: string, bytes: Uint8Array): Promise<UploadEntry> {
    this.registry.touch(id);
    return this.store.saveUpload(id, name, bytes);
  }

  async findUpload(id: SessionId, name: string): Promise<UploadEntry | null> {
    this.registry.touch(id);
    return this.store.findUpload(id, name);
  }

  async tempPath(id: SessionId, name?: string): Promise<string> {
    this.registry.touch(id);
    return this.store.tempPath(id, name);
  }

  /**
   * Delete a session's workspace at the user's request.
   *
   * @returns false when there was nothing to delete
   */
  async purgeSession(id: SessionId): Promise<boolean> {
    this.registry.remove(id);
    const purged = await this.store.purge(id);
    this.logger.info({ sessionId: id, purged }, "Purged session on request");
    return purged;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Interception and execution
  // ───────────────────────────────────────────────────────────────────────────

  beginInterception(workspace: Workspace): InterceptionSession {
    this.registry.touch(workspace.id);
    return this.interceptor.begin(workspace);
  }

  endInterception(session: InterceptionSession): Promise<InterceptionResult> {
    return this.interceptor.end(session);
  }

  /**
   * Run a snippet against the session's workspace. Snippet errors and
   * timeouts are reported in the result.
   */
  async runCode(id: SessionId, code: string, options: RunCodeOptions = {}): Promise<CodeRunResult> {
    const workspace = await this.ensureWorkspace(id);
    return this.runner.run(workspace, code, options);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Config records
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Full record, credential included. Server side only.
   */
  async loadConfig(id: SessionId): Promise<ConfigRecord> {
    this.registry.touch(id);
    return this.store.loadConfig(id);
  }

  async saveConfig(id: SessionId, record: ConfigRecord): Promise<void> {
    this.registry.touch(id);
    await this.store.saveConfig(id, record);
  }

  /**
   * The only form of the config record that may be sent to a client.
   */
  async getClientConfig(id: SessionId): Promise<RedactedConfigRecord> {
    return redactConfigRecord(await this.loadConfig(id), this.now());
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────────

  async stats(): Promise<RuntimeStats> {
    return {
      ...(await this.registry.stats()),
      ttlHours: this.config.session.ttlHours,
      sweepIntervalMinutes: this.config.session.sweepIntervalMinutes,
    };
  }

  /**
   * Start the reaper. With `sweepOnStart`, leftover workspaces are adopted
   * and expired ones purged before this resolves.
   */
  async start(): Promise<void> {
    await this.reaper.start();
  }

  /**
   * Stop the reaper and force-close interception sessions left open.
   */
  async stop(): Promise<void> {
    await this.reaper.stop();
    const leaked = await this.interceptor.closeLeaked();
    if (leaked > 0) {
      this.logger.warn({ leaked }, "Closed interception sessions on shutdown");
    }
  }
}
