/**
 * Sandbox Errors
 *
 * Error types for sandbox operations with LLM-friendly messages.
 * Operations throw these internally; the public API turns them into
 * structured failures (see toSandboxFailure).
 */

import type { SandboxFailure, SandboxFailureKind } from './types.js';

/**
 * Base class for all sandbox errors.
 */
export class SandboxError extends Error {
  constructor(
    public readonly kind: SandboxFailureKind,
    public readonly code: string,
    message: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = 'SandboxError';
  }

  /**
   * Get an LLM-friendly error message.
   * Override in subclasses for better guidance.
   */
  toLLMMessage(): string {
    return this.message;
  }
}

/**
 * Thrown when a path would resolve outside the sandbox root.
 */
export class ContainmentDeniedError extends SandboxError {
  constructor(path: string) {
    super('containment_denied', 'CONTAINMENT_DENIED', `Access denied: path is outside the sandbox root: ${path}`, path);
    this.name = 'ContainmentDeniedError';
  }

  toLLMMessage(): string {
    return `Access denied for path "${this.path}": it resolves outside the sandbox root. Use paths inside the sandbox.`;
  }
}

/**
 * Thrown when a file or directory is not found.
 */
export class NotFoundError extends SandboxError {
  constructor(path: string) {
    super('not_found', 'NOT_FOUND', `File or directory not found: ${path}`, path);
    this.name = 'NotFoundError';
  }

  toLLMMessage(): string {
    return `File not found: ${this.path}. Please check the path and try again.`;
  }
}

/**
 * Thrown when an operation expected a file and found a directory, or the
 * reverse.
 */
export class WrongTypeError extends SandboxError {
  constructor(
    path: string,
    public readonly expected: 'file' | 'directory'
  ) {
    super(
      'wrong_type',
      'WRONG_TYPE',
      expected === 'directory' ? `Not a directory: ${path}` : `Is a directory: ${path}`,
      path
    );
    this.name = 'WrongTypeError';
  }

  toLLMMessage(): string {
    return this.expected === 'directory'
      ? `${this.path} is not a directory.`
      : `${this.path} is a directory, not a file.`;
  }
}

/**
 * Thrown when the underlying filesystem fails. Keeps the system message.
 */
export class IOFailureError extends SandboxError {
  constructor(
    path: string,
    public readonly systemMessage: string,
    public readonly errno?: string,
    code: string = 'IO_FAILURE'
  ) {
    super('io_failure', code, `I/O failure on ${path}: ${systemMessage}`, path);
    this.name = 'IOFailureError';
  }

  toLLMMessage(): string {
    return `Operation failed on ${this.path}: ${this.systemMessage}`;
  }
}

/**
 * Thrown when file content is not valid UTF-8.
 */
export class DecodeError extends IOFailureError {
  constructor(path: string) {
    super(path, 'content is not valid UTF-8 text', undefined, 'DECODE_FAILED');
    this.name = 'DecodeError';
  }

  toLLMMessage(): string {
    return `Cannot read ${this.path}: the file is not valid UTF-8 text (it may be binary).`;
  }
}

/**
 * Type guard for SandboxError and its subclasses.
 */
export function isSandboxError(error: unknown): error is SandboxError {
  return error instanceof SandboxError;
}

/**
 * Type guard for errno-carrying exceptions raised by Node's fs.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Map an fs exception to the sandbox taxonomy.
 * Anything that is not an errno exception is returned unchanged.
 */
export function fromFsError(error: unknown, path: string): unknown {
  if (isSandboxError(error) || !isErrnoException(error)) {
    return error;
  }

  switch (error.code) {
    case 'ENOENT':
      return new NotFoundError(path);
    case 'EISDIR':
      return new WrongTypeError(path, 'file');
    case 'ENOTDIR':
    case 'EEXIST':
      return new WrongTypeError(path, 'directory');
    default:
      return new IOFailureError(path, error.message, error.code);
  }
}

/**
 * Convert a sandbox error to its structured failure result.
 */
export function toSandboxFailure(error: SandboxError, path: string): SandboxFailure {
  return {
    ok: false,
    kind: error.kind,
    code: error.code,
    path,
    message: error.toLLMMessage(),
  };
}
