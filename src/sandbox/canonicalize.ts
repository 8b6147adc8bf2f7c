/**
 * Path Canonicalization
 *
 * Resolves `.`, `..` and symlinks component by component against the real
 * filesystem, and checks the result against a sandbox root.
 */

import * as fs from 'fs/promises';
import * as nodePath from 'path';
import { isErrnoException } from './errors.js';

/** Same bound Linux applies before failing with ELOOP. */
export const MAX_SYMLINK_HOPS = 40;

const SEGMENT_SEPARATOR = nodePath.sep === '\\' ? /[\\/]/ : /\//;

/**
 * Raised when a chain of symlinks does not terminate.
 * Carries an errno code so it maps like any other fs failure.
 */
export class SymlinkLoopError extends Error {
  readonly code = 'ELOOP';

  constructor(path: string) {
    super(`Too many levels of symbolic links: ${path}`);
    this.name = 'SymlinkLoopError';
  }
}

/**
 * Split a path into its segments, dropping its root component if any.
 */
export function splitSegments(path: string): string[] {
  const { root } = nodePath.parse(path);
  return path
    .slice(root.length)
    .split(SEGMENT_SEPARATOR)
    .filter((segment) => segment !== '' && segment !== '.');
}

/**
 * Canonicalize `input` anchored at the absolute directory `anchor`.
 *
 * Absolute inputs must be re-anchored by the caller; here `input` is always
 * treated as relative to `anchor`. The anchor itself is walked again, so a
 * symlink swapped into it since it was last resolved is still followed.
 *
 * A component that does not exist is appended lexically. Every later
 * component is still lstat'ed, so a `..` that climbs back out of the missing
 * part lands on real directories whose symlinks are followed.
 */
export async function canonicalizePath(anchor: string, input: string = ''): Promise<string> {
  const pending = [...splitSegments(anchor), ...splitSegments(input)];
  let resolved = nodePath.parse(anchor).root;
  let hops = 0;

  for (let segment = pending.shift(); segment !== undefined; segment = pending.shift()) {
    if (segment === '..') {
      resolved = nodePath.dirname(resolved);
      continue;
    }

    const candidate = nodePath.join(resolved, segment);
    let isLink: boolean;
    try {
      isLink = (await fs.lstat(candidate)).isSymbolicLink();
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        resolved = candidate;
        continue;
      }
      throw error;
    }

    if (!isLink) {
      resolved = candidate;
      continue;
    }

    hops++;
    if (hops > MAX_SYMLINK_HOPS) {
      throw new SymlinkLoopError(candidate);
    }

    // The link's target replaces it; `resolved` stays at the link's directory
    const target = await fs.readlink(candidate);
    if (nodePath.isAbsolute(target)) {
      resolved = nodePath.parse(target).root;
    }
    pending.unshift(...splitSegments(target));
  }

  return resolved;
}

/**
 * True when `candidate` equals `root` or lies beneath it.
 * Both must be absolute and canonical.
 */
export function isWithinRoot(root: string, candidate: string): boolean {
  const relative = nodePath.relative(root, candidate);
  if (relative === '') {
    return true;
  }
  return (
    relative !== '..' &&
    !relative.startsWith('..' + nodePath.sep) &&
    !nodePath.isAbsolute(relative)
  );
}

/**
 * Express a real path inside `root` as a sandbox-relative path ("/" is the root).
 */
export function toSandboxPath(root: string, realPath: string): string {
  const relative = nodePath.relative(root, realPath);
  if (relative === '') {
    return '/';
  }
  return '/' + relative.split(nodePath.sep).join('/');
}

/**
 * Join a sandbox-relative directory path and an entry name.
 */
export function joinSandboxPath(parent: string, name: string): string {
  return parent === '/' ? `/${name}` : `${parent}/${name}`;
}
