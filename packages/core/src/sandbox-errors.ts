/**
 * Shared Sandbox Errors
 *
 * Error types for workspace, path and interception failures.
 * Every error carries a stable code so callers can report failed saves
 * without matching on message text.
 *
 * @module @sheetbox/core/sandbox-errors
 */

/**
 * Base class for all sandbox errors.
 *
 * Provides:
 * - Structured error code for programmatic handling
 * - Human-readable message
 * - Optional path for context
 * - User-facing message formatting
 */
export class SandboxError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = 'SandboxError';
  }

  /**
   * Message suitable for showing to the end user next to a failed save.
   * Override in subclasses for better guidance.
   */
  toUserMessage(): string {
    return this.message;
  }
}

/**
 * Thrown when a candidate path resolves outside its sandbox root.
 */
export class PathEscapeError extends SandboxError {
  constructor(path: string, root?: string) {
    super(
      'PATH_ESCAPE',
      root
        ? `Path resolves outside sandbox root ${root}: ${path}`
        : `Path resolves outside sandbox root: ${path}`,
      path
    );
    this.name = 'PathEscapeError';
  }

  toUserMessage(): string {
    return `Cannot save to "${this.path}": the location is outside your workspace.`;
  }
}

/**
 * Thrown when a path is malformed (empty, NUL bytes, bad session id).
 */
export class InvalidPathError extends SandboxError {
  constructor(message: string, path?: string) {
    super('INVALID_PATH', message, path);
    this.name = 'InvalidPathError';
  }

  toUserMessage(): string {
    return `Invalid path${this.path !== undefined ? ` "${this.path}"` : ''}: ${this.message}`;
  }
}

/**
 * Thrown when the underlying storage rejects a write (disk full, permissions).
 */
export class WriteFailedError extends SandboxError {
  constructor(path: string, public readonly reason: string) {
    super('WRITE_FAILED', `Write failed for ${path}: ${reason}`, path);
    this.name = 'WriteFailedError';
  }

  toUserMessage(): string {
    return `Could not save ${this.path}: ${this.reason}`;
  }
}

/**
 * Thrown when a write would exceed the per-session storage quota.
 */
export class QuotaExceededError extends SandboxError {
  constructor(message: string = 'Storage quota exceeded', path?: string) {
    super('QUOTA_EXCEEDED', message, path);
    this.name = 'QuotaExceededError';
  }

  toUserMessage(): string {
    return 'Storage quota exceeded. Please delete some files to free up space.';
  }
}

/**
 * Thrown when a shim is called after its interception session has ended.
 */
export class InterceptionClosedError extends SandboxError {
  constructor(sessionId: string) {
    super('INTERCEPTION_CLOSED', `Interception session ${sessionId} has already ended`);
    this.name = 'InterceptionClosedError';
  }
}

/**
 * Raised when an interception session is still active after its scope exited.
 * Never expected in normal operation; logged at error level.
 */
export class InterceptionLeakError extends SandboxError {
  constructor(sessionId: string) {
    super('INTERCEPTION_LEAK', `Interception session ${sessionId} was not ended by its scope`);
    this.name = 'InterceptionLeakError';
  }
}

/**
 * Thrown when code execution exceeds its time budget or is aborted.
 */
export class ExecutionTimeoutError extends SandboxError {
  constructor(public readonly timeoutMs: number, aborted: boolean = false) {
    super(
      'EXECUTION_TIMEOUT',
      aborted ? 'Execution was cancelled' : `Execution timed out after ${timeoutMs}ms`
    );
    this.name = 'ExecutionTimeoutError';
  }
}

/**
 * Type guard for SandboxError and its subclasses.
 */
export function isSandboxError(error: unknown): error is SandboxError {
  return error instanceof SandboxError;
}
