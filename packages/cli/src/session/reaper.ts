/**
 * Reaper
 *
 * Periodic sweep of idle sessions, independent of request handling.
 * Sweeps never overlap, and a failed sweep is logged and left for the
 * next tick.
 */

import { componentLogger, type Logger } from '../logging.js';
import { errorMessage } from '../workspace/file-io.js';
import type { SessionRegistry } from './registry.js';

export interface ReaperOptions {
  registry: Pick<SessionRegistry, 'sweep' | 'adoptExisting'>;
  ttlMs: number;
  intervalMs: number;
  /** Adopt workspaces left by an earlier process and sweep once on start */
  sweepOnStart?: boolean;
  logger?: Logger;
}

export class Reaper {
  private readonly registry: ReaperOptions['registry'];
  private readonly ttlMs: number;
  private readonly intervalMs: number;
  private readonly sweepOnStart: boolean;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | undefined;
  private current: Promise<number> | null = null;

  constructor(options: ReaperOptions) {
    this.registry = options.registry;
    this.ttlMs = options.ttlMs;
    this.intervalMs = options.intervalMs;
    this.sweepOnStart = options.sweepOnStart ?? true;
    this.logger = options.logger ?? componentLogger('reaper');
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Start the periodic sweep. Calling start on a running reaper does nothing.
   */
  async start(): Promise<void> {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);
    this.timer.unref();

    this.logger.info(
      { ttlMs: this.ttlMs, intervalMs: this.intervalMs },
      'Reaper started'
    );

    if (this.sweepOnStart) {
      try {
        await this.registry.adoptExisting();
      } catch (error) {
        this.logger.error({ err: errorMessage(error) }, 'Failed to adopt existing workspaces');
      }
      await this.runOnce();
    }
  }

  /**
   * Stop scheduling sweeps and wait for one in progress to finish.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      this.logger.info('Reaper stopped');
    }
    if (this.current) {
      await this.current;
    }
  }

  /**
   * Sweep now. While a sweep is in progress, callers share its result
   * instead of starting another one. Never rejects.
   */
  runOnce(): Promise<number> {
    if (this.current) {
      return this.current;
    }
    const sweep = this.sweep().finally(() => {
      this.current = null;
    });
    this.current = sweep;
    return sweep;
  }

  private async sweep(): Promise<number> {
    try {
      const purged = await this.registry.sweep(this.ttlMs);
      if (purged > 0) {
        this.logger.info({ purged }, 'Sweep finished');
      }
      return purged;
    } catch (error) {
      this.logger.error({ err: errorMessage(error) }, 'Sweep failed');
      return 0;
    }
  }
}
