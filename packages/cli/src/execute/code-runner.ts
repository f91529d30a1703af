/**
 * Code Runner
 *
 * Runs a JavaScript snippet (the body of an async function) in a fresh
 * `node:vm` context. The session's intercepted operations are injected
 * as globals, so every save the snippet makes lands in its exports
 * directory.
 *
 * This is not an isolation boundary: a vm context shares the process.
 * It only bounds time, captures output and routes saves.
 */

import * as vm from 'vm';
import { inspect } from 'util';
import {
  ExecutionTimeoutError,
  isSandboxError,
  type SaveFailure,
  type Workspace,
} from '@sheetbox/core';
import type { FileInterceptor } from '../intercept/file-interceptor.js';
import { componentLogger, type Logger } from '../logging.js';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_OUTPUT_LENGTH = 10_000;

export interface RunCodeOptions {
  /** Extra globals for the snippet; injected names take precedence */
  variables?: Record<string, unknown>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CodeRunResult {
  success: boolean;
  output: string;
  truncated: boolean;
  /** Value returned by the snippet */
  result?: unknown;
  error?: string;
  errorCode?: 'EXECUTION_TIMEOUT' | 'EXECUTION_ERROR';
  producedFiles: string[];
  failures: SaveFailure[];
  durationMs: number;
}

export interface CodeRunnerOptions {
  interceptor: FileInterceptor;
  /** Path for a scratch file in the workspace's temp directory */
  tempPath: (workspace: Workspace, name?: string) => Promise<string>;
  timeoutMs?: number;
  maxOutputLength?: number;
  logger?: Logger;
}

/**
 * Captured `print` output, cut off at a fixed length.
 */
class OutputBuffer {
  private text = '';
  truncated = false;

  constructor(private readonly limit: number) {}

  append(line: string): void {
    if (this.truncated) {
      return;
    }
    this.text += line + '\n';
    if (this.text.length > this.limit) {
      this.text = this.text.slice(0, this.limit);
      this.truncated = true;
    }
  }

  toString(): string {
    return this.truncated ? `${this.text}\n[output truncated]` : this.text;
  }
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : inspect(value, { depth: 4, breakLength: Infinity });
}

/**
 * Message of an error thrown inside the vm context. Those errors come
 * from another realm, so `instanceof Error` does not hold for them.
 */
function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

function isScriptTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT'
  );
}

/**
 * Race `promise` against a timer and an abort signal.
 */
async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, signal?: AbortSignal): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ExecutionTimeoutError(timeoutMs)), timeoutMs);
    if (signal) {
      onAbort = () => reject(new ExecutionTimeoutError(timeoutMs, true));
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
    if (signal && onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

export class CodeRunner {
  private readonly interceptor: FileInterceptor;
  private readonly tempPath: CodeRunnerOptions['tempPath'];
  private readonly timeoutMs: number;
  private readonly maxOutputLength: number;
  private readonly logger: Logger;

  constructor(options: CodeRunnerOptions) {
    this.interceptor = options.interceptor;
    this.tempPath = options.tempPath;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxOutputLength = options.maxOutputLength ?? DEFAULT_MAX_OUTPUT_LENGTH;
    this.logger = options.logger ?? componentLogger('code-runner');
  }

  /**
   * Run `code` against `workspace`. Errors raised by the snippet, timeouts
   * and cancellation are reported in the result; the interception session
   * is ended on every path.
   */
  async run(workspace: Workspace, code: string, options: RunCodeOptions = {}): Promise<CodeRunResult> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const started = Date.now();
    const output = new OutputBuffer(this.maxOutputLength);
    const timers = new Set<NodeJS.Timeout>();
    // first error thrown by a timer callback; it fails the run
    let timerError: string | undefined;
    const session = this.interceptor.begin(workspace);
    const operations = session.operations;

    const print = (...args: unknown[]) => output.append(args.map(formatValue).join(' '));

    const globals: Record<string, unknown> = {
      ...options.variables,
      open: operations.open,
      writeTable: operations.writeTable,
      dumpJson: operations.dumpJson,
      writeText: operations.writeText,
      saveToExports: operations.saveToExports,
      getTempPath: (name?: string) => this.tempPath(workspace, name),
      print,
      console: { log: print, info: print, warn: print, error: print, debug: print },
      setTimeout: (callback: unknown, ms?: number) => {
        if (typeof callback !== 'function') {
          return undefined;
        }
        const fire = callback;
        const timer = setTimeout(() => {
          timers.delete(timer);
          try {
            fire();
          } catch (error) {
            const message = describeError(error);
            if (timerError === undefined) {
              timerError = message;
            }
            output.append(`Uncaught error in timer callback: ${message}`);
          }
        }, ms);
        timers.add(timer);
        return timer;
      },
      clearTimeout: (timer: NodeJS.Timeout) => {
        timers.delete(timer);
        clearTimeout(timer);
      },
      SESSION_ID: workspace.id,
      UPLOADS_DIR: workspace.uploads,
      EXPORTS_DIR: workspace.exports,
      TEMP_DIR: workspace.temp,
    };

    let outcome: Pick<CodeRunResult, 'success' | 'result' | 'error' | 'errorCode'>;
    try {
      if (options.signal?.aborted) {
        throw new ExecutionTimeoutError(timeoutMs, true);
      }
      const context = vm.createContext(globals, {
        name: `session ${workspace.id}`,
        codeGeneration: { strings: false, wasm: false },
      });
      const script = new vm.Script(`(async () => {\n${code}\n})()`, { filename: 'snippet.js' });
      const pending: unknown = script.runInContext(context, { timeout: timeoutMs });
      const remaining = Math.max(1, timeoutMs - (Date.now() - started));
      const result = await withTimeout(Promise.resolve(pending), remaining, options.signal);
      outcome =
        timerError === undefined
          ? { success: true, result }
          : { success: false, error: timerError, errorCode: 'EXECUTION_ERROR' };
    } catch (error) {
      if (isScriptTimeout(error)) {
        error = new ExecutionTimeoutError(timeoutMs);
      }
      if (error instanceof ExecutionTimeoutError) {
        outcome = { success: false, error: error.message, errorCode: 'EXECUTION_TIMEOUT' };
      } else {
        outcome = {
          success: false,
          error: isSandboxError(error) ? error.toUserMessage() : describeError(error),
          errorCode: 'EXECUTION_ERROR',
        };
      }
    } finally {
      for (const timer of timers) {
        clearTimeout(timer);
      }
      timers.clear();
    }

    const { producedFiles, failures } = await this.interceptor.end(session);
    const durationMs = Date.now() - started;

    this.logger.info(
      {
        sessionId: workspace.id,
        success: outcome.success,
        files: producedFiles.length,
        failures: failures.length,
        durationMs,
      },
      outcome.success ? 'Code run finished' : `Code run failed: ${outcome.error ?? 'unknown error'}`
    );

    return {
      ...outcome,
      output: output.toString(),
      truncated: output.truncated,
      producedFiles,
      failures,
      durationMs,
    };
  }
}
