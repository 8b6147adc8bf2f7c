/**
 * Sandboxed Filesystem
 *
 * Root-confined file access with a virtual current directory.
 * Every caller path is canonicalized (symlinks included) and checked against
 * the root before any filesystem call is made.
 */

import * as fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import * as nodePath from 'path';
import * as os from 'os';
import type { ILogObj, Logger } from 'tslog';
import {
  canonicalizePath,
  isWithinRoot,
  joinSandboxPath,
  toSandboxPath,
} from './canonicalize.js';
import {
  DIRECTORY_MODE,
  SandboxConfigSchema,
  type ResolvedSandboxConfig,
  type SandboxConfig,
} from './config-types.js';
import { CursorLock } from './cursor-lock.js';
import {
  ContainmentDeniedError,
  DecodeError,
  WrongTypeError,
  fromFsError,
  isErrnoException,
  isSandboxError,
  toSandboxFailure,
  type SandboxError,
} from './errors.js';
import type {
  DirectoryEntry,
  EntryType,
  ExistsPayload,
  ListPayload,
  LocationPayload,
  MakeDirectoryPayload,
  ReadPayload,
  ResolvedPath,
  SandboxResult,
  TreePayload,
  TreeWalkOptions,
  WritePayload,
} from './types.js';
import { defaultLogger } from '../logging/index.js';

/**
 * Sandboxed filesystem implementation.
 */
export class SandboxedFileSystem {
  readonly root: string;
  private cwd: string;
  private readonly treeDefaults: ResolvedSandboxConfig['tree'];
  private readonly cursorLock = new CursorLock();
  private readonly logger: Logger<ILogObj>;

  constructor(config: ResolvedSandboxConfig, logger: Logger<ILogObj> = defaultLogger) {
    this.root = config.root;
    this.cwd = config.root;
    this.treeDefaults = { ...config.tree };
    this.logger = logger;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Path Operations
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Resolve a caller path to its canonical location inside the root.
   * Collaborators use this to validate a location before writing to it.
   */
  async resolvePath(path: string): Promise<SandboxResult<ResolvedPath>> {
    return this.attempt('resolvePath', path, async () => {
      const realPath = await this.resolve(path);
      return { path: this.display(realPath), realPath };
    });
  }

  /**
   * Whether a file or directory exists at `path`.
   */
  async exists(path: string): Promise<SandboxResult<ExistsPayload>> {
    return this.attempt('exists', path, async () => {
      const realPath = await this.resolve(path);
      try {
        await fs.stat(realPath);
        return { path: this.display(realPath), exists: true };
      } catch (error) {
        if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
          return { path: this.display(realPath), exists: false };
        }
        throw error;
      }
    });
  }

  /**
   * The current directory, sandbox-relative.
   */
  currentDirectory(): string {
    return this.display(this.cwd);
  }

  /**
   * Move the cursor. Commits only when the target is an existing directory.
   */
  async changeDirectory(path: string): Promise<SandboxResult<LocationPayload>> {
    return this.attempt('changeDirectory', path, () =>
      this.cursorLock.run(async () => {
        const realPath = await this.resolveFrom(this.anchorFor(path, this.cwd), path);
        await this.requireDirectory(realPath, path);

        const previous = this.display(this.cwd);
        this.cwd = realPath;
        const current = this.display(realPath);
        this.logger.debug('Changed directory', { from: previous, to: current });
        return { path: current };
      })
    );
  }

  /**
   * List the immediate children of `path`, or of the current directory when
   * no path is given.
   */
  async listContents(path?: string): Promise<SandboxResult<ListPayload>> {
    if (path === undefined) {
      const cwd = await this.cursorLock.run(() => this.cwd);
      const location = this.display(cwd);
      return this.attempt('listContents', location, () => this.listDirectory(cwd, location));
    }

    return this.attempt('listContents', path, async () =>
      this.listDirectory(await this.resolve(path), path)
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // File Operations
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Create a directory and any missing ancestors. Idempotent.
   */
  async makeDirectory(path: string): Promise<SandboxResult<MakeDirectoryPayload>> {
    return this.attempt('makeDirectory', path, async () => {
      const realPath = await this.resolve(path);

      const existing = await statOrUndefined(realPath);
      if (existing) {
        if (!existing.isDirectory()) {
          throw new WrongTypeError(path, 'directory');
        }
        return { path: this.display(realPath), created: false };
      }

      await fs.mkdir(realPath, { recursive: true, mode: DIRECTORY_MODE });
      this.logger.debug('Created directory', { path: this.display(realPath) });
      return { path: this.display(realPath), created: true };
    });
  }

  /**
   * Write text as UTF-8, replacing any existing content.
   * Parent directories are created as needed.
   */
  async writeFile(path: string, content: string): Promise<SandboxResult<WritePayload>> {
    return this.writeBytes('writeFile', path, Buffer.from(content, 'utf-8'));
  }

  /**
   * Write raw bytes, replacing any existing content.
   */
  async writeBinary(path: string, data: Uint8Array): Promise<SandboxResult<WritePayload>> {
    return this.writeBytes('writeBinary', path, data);
  }

  /**
   * Read a whole file as UTF-8 text.
   */
  async readFile(path: string): Promise<SandboxResult<ReadPayload>> {
    return this.attempt('readFile', path, async () => {
      const realPath = await this.resolve(path);

      const stats = await fs.stat(realPath);
      if (stats.isDirectory()) {
        throw new WrongTypeError(path, 'file');
      }

      const bytes = await fs.readFile(realPath);
      let content: string;
      try {
        content = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
      } catch (error) {
        if (error instanceof TypeError) {
          throw new DecodeError(path);
        }
        throw error;
      }

      return { path: this.display(realPath), content };
    });
  }

  /**
   * Map every directory reachable under `path` to a listing of its files
   * followed by its subdirectories (tagged " (directory)").
   */
  async getDirectoryTree(
    path: string,
    options: TreeWalkOptions = {}
  ): Promise<SandboxResult<TreePayload>> {
    const walk = {
      maxDepth: options.maxDepth ?? this.treeDefaults.maxDepth,
      followSymlinks: options.followSymlinks ?? this.treeDefaults.followSymlinks,
    };

    return this.attempt('getDirectoryTree', path, async () => {
      const realPath = await this.resolve(path);
      await this.requireDirectory(realPath, path);

      const start = this.display(realPath);
      const tree: Record<string, string> = {};
      await this.walkTree(realPath, start, 0, new Set<string>(), tree, walk);
      return { path: start, tree };
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Resolve a caller path. Relative inputs read the cursor through the lock,
   * so they observe cursor changes in submission order.
   */
  private async resolve(input: string): Promise<string> {
    if (nodePath.isAbsolute(input)) {
      return this.resolveFrom(this.root, input);
    }
    const cwd = await this.cursorLock.run(() => this.cwd);
    return this.resolveFrom(cwd, input);
  }

  private anchorFor(input: string, cwd: string): string {
    return nodePath.isAbsolute(input) ? this.root : cwd;
  }

  private async resolveFrom(anchor: string, input: string): Promise<string> {
    // canonicalizePath drops the root component of `input`, so absolute
    // inputs land under the anchor
    const realPath = await canonicalizePath(anchor, input);
    if (!isWithinRoot(this.root, realPath)) {
      throw new ContainmentDeniedError(input);
    }
    return realPath;
  }

  private display(realPath: string): string {
    return toSandboxPath(this.root, realPath);
  }

  private async requireDirectory(realPath: string, path: string): Promise<void> {
    const stats = await fs.stat(realPath);
    if (!stats.isDirectory()) {
      throw new WrongTypeError(path, 'directory');
    }
  }

  private async listDirectory(dir: string, path: string): Promise<ListPayload> {
    await this.requireDirectory(dir, path);
    const dirents = await fs.readdir(dir, { withFileTypes: true });

    const entries: DirectoryEntry[] = [];
    for (const dirent of dirents) {
      entries.push({ name: dirent.name, type: await this.classify(dir, dirent) });
    }
    entries.sort((a, b) => compareNames(a.name, b.name));

    return { path: this.display(dir), entries, count: entries.length };
  }

  private async writeBytes(
    operation: string,
    path: string,
    data: Uint8Array
  ): Promise<SandboxResult<WritePayload>> {
    return this.attempt(operation, path, async () => {
      const realPath = await this.resolve(path);
      if (realPath === this.root) {
        throw new WrongTypeError(path, 'file');
      }
      await fs.mkdir(nodePath.dirname(realPath), { recursive: true, mode: DIRECTORY_MODE });
      await fs.writeFile(realPath, data);
      return { path: this.display(realPath), bytesWritten: data.byteLength };
    });
  }

  /**
   * Classify a directory entry, following symlinks.
   * A link whose target cannot be stat'ed (dangling, looping) is a file.
   */
  private async classify(dir: string, dirent: Dirent): Promise<EntryType> {
    if (dirent.isDirectory()) {
      return 'directory';
    }
    if (!dirent.isSymbolicLink()) {
      return 'file';
    }
    try {
      const target = await fs.stat(nodePath.join(dir, dirent.name));
      return target.isDirectory() ? 'directory' : 'file';
    } catch (error) {
      if (!isErrnoException(error)) {
        throw error;
      }
      return 'file';
    }
  }

  /**
   * `ancestors` holds the canonical directories on the current descent. A link
   * back to one of them is listed but not walked; any other directory is walked
   * under each name it is reachable by.
   */
  private async walkTree(
    realDir: string,
    key: string,
    depth: number,
    ancestors: Set<string>,
    tree: Record<string, string>,
    walk: Required<TreeWalkOptions>
  ): Promise<void> {
    ancestors.add(realDir);
    try {
      await this.walkDirectory(realDir, key, depth, ancestors, tree, walk);
    } finally {
      ancestors.delete(realDir);
    }
  }

  private async walkDirectory(
    realDir: string,
    key: string,
    depth: number,
    ancestors: Set<string>,
    tree: Record<string, string>,
    walk: Required<TreeWalkOptions>
  ): Promise<void> {
    const dirents = await fs.readdir(realDir, { withFileTypes: true });

    const files: string[] = [];
    const subdirs: Array<{ name: string; isLink: boolean }> = [];
    for (const dirent of dirents) {
      if ((await this.classify(realDir, dirent)) === 'directory') {
        subdirs.push({ name: dirent.name, isLink: dirent.isSymbolicLink() });
      } else {
        files.push(dirent.name);
      }
    }
    files.sort(compareNames);
    subdirs.sort((a, b) => compareNames(a.name, b.name));

    tree[key] = [...files, ...subdirs.map((dir) => `${dir.name} (directory)`)].join('\n');

    if (depth >= walk.maxDepth) {
      if (subdirs.length > 0) {
        this.logger.debug('Tree walk depth limit reached', { path: key, maxDepth: walk.maxDepth });
      }
      return;
    }

    for (const dir of subdirs) {
      const childKey = joinSandboxPath(key, dir.name);
      if (dir.isLink && !walk.followSymlinks) {
        continue;
      }

      try {
        const childReal = dir.isLink
          ? await canonicalizePath(nodePath.join(realDir, dir.name))
          : nodePath.join(realDir, dir.name);

        if (!isWithinRoot(this.root, childReal)) {
          this.logger.debug('Tree walk skipped link leaving the root', { path: childKey });
          continue;
        }
        if (ancestors.has(childReal)) {
          this.logger.debug('Tree walk skipped link back to an enclosing directory', { path: childKey });
          continue;
        }

        await this.walkTree(childReal, childKey, depth + 1, ancestors, tree, walk);
      } catch (error) {
        // Directories that vanish or cannot be read mid-walk are left out
        if (!isErrnoException(error)) {
          throw error;
        }
        this.logger.warn('Tree walk could not read directory', { path: childKey, code: error.code });
      }
    }
  }

  /**
   * Run an operation and convert sandbox and fs errors into failures.
   * Anything else is unexpected and propagates.
   */
  private async attempt<T extends object>(
    operation: string,
    path: string,
    run: () => Promise<T>
  ): Promise<SandboxResult<T>> {
    try {
      const payload = await run();
      return { ...payload, ok: true as const };
    } catch (error) {
      const mapped = fromFsError(error, path);
      if (!isSandboxError(mapped)) {
        throw mapped;
      }
      this.logFailure(operation, mapped);
      return toSandboxFailure(mapped, path);
    }
  }

  private logFailure(operation: string, error: SandboxError): void {
    const details = { operation, path: error.path, code: error.code };
    switch (error.kind) {
      case 'containment_denied':
        this.logger.warn('Denied path outside sandbox root', details);
        break;
      case 'io_failure':
        this.logger.error('Filesystem operation failed', { ...details, message: error.message });
        break;
      default:
        this.logger.debug('Operation failed', details);
    }
  }
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

async function statOrUndefined(realPath: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(realPath);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return undefined;
    }
    throw error;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a sandboxed filesystem rooted at `config.root`.
 * The root is canonicalized (symlinks resolved) once, here.
 *
 * @example
 * const sandbox = await createSandboxedFileSystem({ root: "./workspace", createRoot: true });
 * await sandbox.writeFile("notes/todo.md", "- item");
 * await sandbox.changeDirectory("notes");
 * sandbox.currentDirectory(); // "/notes"
 */
export async function createSandboxedFileSystem(
  config: SandboxConfig,
  logger: Logger<ILogObj> = defaultLogger
): Promise<SandboxedFileSystem> {
  const parsed = SandboxConfigSchema.parse(config);
  const absoluteRoot = nodePath.resolve(parsed.root);

  if (parsed.createRoot) {
    await fs.mkdir(absoluteRoot, { recursive: true, mode: DIRECTORY_MODE });
  }

  const root = await fs.realpath(absoluteRoot);
  const stats = await fs.stat(root);
  if (!stats.isDirectory()) {
    throw new Error(`Sandbox root is not a directory: ${absoluteRoot}`);
  }

  logger.info('Sandbox created', { root });
  return new SandboxedFileSystem({ root, tree: parsed.tree }, logger);
}

/**
 * Create a sandbox over a fresh temporary directory.
 * Convenience function for tests.
 */
export async function createTestSandbox(logger?: Logger<ILogObj>): Promise<SandboxedFileSystem> {
  const tmpDir = await fs.mkdtemp(nodePath.join(os.tmpdir(), 'sandbox-fs-test-'));
  return createSandboxedFileSystem({ root: tmpDir }, logger);
}
