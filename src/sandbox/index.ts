/**
 * Sandbox Module
 *
 * Root-confined filesystem access with a virtual current directory.
 */

// Result and entry types
export type {
  SandboxFailureKind,
  SandboxFailure,
  SandboxResult,
  EntryType,
  DirectoryEntry,
  ResolvedPath,
  ExistsPayload,
  LocationPayload,
  ListPayload,
  MakeDirectoryPayload,
  WritePayload,
  ReadPayload,
  TreePayload,
  TreeWalkOptions,
} from './types.js';
export { isSandboxFailure } from './types.js';

// Errors
export {
  SandboxError,
  ContainmentDeniedError,
  NotFoundError,
  WrongTypeError,
  IOFailureError,
  DecodeError,
  isSandboxError,
  isErrnoException,
  fromFsError,
  toSandboxFailure,
} from './errors.js';

// Configuration
export type { SandboxConfig, ResolvedSandboxConfig } from './config-types.js';
export {
  SandboxConfigSchema,
  TreeWalkOptionsSchema,
  DEFAULT_TREE_MAX_DEPTH,
  DIRECTORY_MODE,
} from './config-types.js';

// Path primitives
export {
  canonicalizePath,
  isWithinRoot,
  toSandboxPath,
  splitSegments,
  SymlinkLoopError,
  MAX_SYMLINK_HOPS,
} from './canonicalize.js';
export { CursorLock } from './cursor-lock.js';

// Implementation
export {
  SandboxedFileSystem,
  createSandboxedFileSystem,
  createTestSandbox,
} from './sandboxed-fs.js';
