/**
 * Sandbox Types
 *
 * Result and entry types returned by the sandboxed filesystem.
 */

/**
 * Kinds of failure an operation can report.
 */
export type SandboxFailureKind =
  | 'containment_denied'
  | 'not_found'
  | 'wrong_type'
  | 'io_failure';

/**
 * Structured failure. `path` echoes the caller's original input.
 */
export interface SandboxFailure {
  ok: false;
  kind: SandboxFailureKind;
  /** Finer-grained code, e.g. DECODE_FAILED within io_failure */
  code: string;
  path: string;
  message: string;
}

/**
 * Result of a sandbox operation: the payload on success, a failure otherwise.
 */
export type SandboxResult<T extends object> = ({ ok: true } & T) | SandboxFailure;

/**
 * Type guard for failed results.
 */
export function isSandboxFailure<T extends object>(result: SandboxResult<T>): result is SandboxFailure {
  return !result.ok;
}

export type EntryType = 'file' | 'directory';

/**
 * An immediate child of a directory.
 */
export interface DirectoryEntry {
  name: string;
  type: EntryType;
}

// ─────────────────────────────────────────────────────────────────────────────
// Operation payloads
// ─────────────────────────────────────────────────────────────────────────────

export interface ResolvedPath {
  /** Sandbox-relative path (leading / is the sandbox root) */
  path: string;
  /** Absolute real path, for in-process collaborators only */
  realPath: string;
}

export interface ExistsPayload {
  path: string;
  exists: boolean;
}

export interface LocationPayload {
  path: string;
}

export interface ListPayload {
  path: string;
  entries: DirectoryEntry[];
  count: number;
}

export interface MakeDirectoryPayload {
  path: string;
  /** False when the directory already existed */
  created: boolean;
}

export interface WritePayload {
  path: string;
  bytesWritten: number;
}

export interface ReadPayload {
  path: string;
  content: string;
}

export interface TreePayload {
  path: string;
  /** Sandbox-relative directory path → newline-joined listing */
  tree: Record<string, string>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for the directory tree walk.
 */
export interface TreeWalkOptions {
  /** Maximum recursion depth below the starting directory. Default: 32 */
  maxDepth?: number;
  /** Descend into symlinked directories that stay inside the root. Default: true */
  followSymlinks?: boolean;
}
