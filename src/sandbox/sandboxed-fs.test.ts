/**
 * Tests for the sandboxed filesystem
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  SandboxedFileSystem,
  createSandboxedFileSystem,
  createTestSandbox,
} from './sandboxed-fs.js';
import { isSandboxFailure, type SandboxResult } from './types.js';
import { createLogger } from '../logging/index.js';

const logger = createLogger({ type: 'hidden' });

/**
 * Unwrap a successful result, failing the test otherwise.
 */
function expectOk<T extends object>(result: SandboxResult<T>): T {
  if (isSandboxFailure(result)) {
    throw new Error(`Expected success, got ${result.kind}: ${result.message}`);
  }
  return result;
}

describe('SandboxedFileSystem', () => {
  let tempDir: string;
  let root: string;
  let sandbox: SandboxedFileSystem;

  beforeEach(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'sandboxed-fs-test-')));
    root = path.join(tempDir, 'root');
    await fs.mkdir(root);
    await fs.mkdir(path.join(tempDir, 'outside'));
    await fs.writeFile(path.join(tempDir, 'outside', 'secret.txt'), 'top secret');
    sandbox = await createSandboxedFileSystem({ root }, logger);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('scenario', () => {
    it('creates, writes, reads, navigates and denies traversal', async () => {
      const made = expectOk(await sandbox.makeDirectory('a/b'));
      expect(made).toEqual({ ok: true, path: '/a/b', created: true });
      expect((await fs.stat(path.join(root, 'a', 'b'))).isDirectory()).toBe(true);

      const written = expectOk(await sandbox.writeFile('a/b/f.txt', 'hello'));
      expect(written.bytesWritten).toBe(5);
      expect(written.path).toBe('/a/b/f.txt');

      const read = expectOk(await sandbox.readFile('a/b/f.txt'));
      expect(read.content).toBe('hello');
      expect(read.path).toBe('/a/b/f.txt');

      expect(expectOk(await sandbox.changeDirectory('a/b')).path).toBe('/a/b');
      expect(sandbox.currentDirectory()).toBe('/a/b');

      const denied = await sandbox.readFile('../../../etc/passwd');
      expect(denied).toMatchObject({
        ok: false,
        kind: 'containment_denied',
        code: 'CONTAINMENT_DENIED',
        path: '../../../etc/passwd',
      });
    });
  });

  describe('path resolution', () => {
    it('reinterprets absolute inputs as sandbox-absolute', async () => {
      await fs.mkdir(path.join(root, 'etc'));
      await fs.writeFile(path.join(root, 'etc', 'passwd'), 'sandboxed');

      const read = expectOk(await sandbox.readFile('/etc/passwd'));
      expect(read.content).toBe('sandboxed');
      expect(read.path).toBe('/etc/passwd');
    });

    it('anchors relative inputs at the current directory', async () => {
      await fs.mkdir(path.join(root, 'docs'));
      await fs.writeFile(path.join(root, 'docs', 'readme.md'), '# docs');
      await sandbox.changeDirectory('docs');

      expect(expectOk(await sandbox.readFile('readme.md')).content).toBe('# docs');
      expect(expectOk(await sandbox.readFile('/docs/readme.md')).content).toBe('# docs');
    });

    it('returns the real path for collaborators', async () => {
      const resolved = expectOk(await sandbox.resolvePath('downloads/../papers/x.pdf'));

      expect(resolved.path).toBe('/papers/x.pdf');
      expect(resolved.realPath).toBe(path.join(root, 'papers', 'x.pdf'));
    });

    it('denies .. that climbs above the root', async () => {
      for (const input of ['..', '../outside/secret.txt', 'a/../../x', '/../..']) {
        const result = await sandbox.resolvePath(input);
        expect(result).toMatchObject({ ok: false, kind: 'containment_denied', path: input });
      }
    });

    it('denies symlinks that point outside the root', async () => {
      await fs.symlink(path.join(tempDir, 'outside'), path.join(root, 'link'));

      expect(await sandbox.readFile('link/secret.txt')).toMatchObject({
        ok: false,
        kind: 'containment_denied',
      });
      expect(await sandbox.changeDirectory('link')).toMatchObject({
        ok: false,
        kind: 'containment_denied',
      });
      expect(await sandbox.writeFile('link/planted.txt', 'x')).toMatchObject({
        ok: false,
        kind: 'containment_denied',
      });
      await expect(fs.access(path.join(tempDir, 'outside', 'planted.txt'))).rejects.toThrow();
    });

    it('denies relative symlinks that climb out', async () => {
      await fs.symlink('../outside/secret.txt', path.join(root, 'peek.txt'));

      expect(await sandbox.readFile('peek.txt')).toMatchObject({
        ok: false,
        kind: 'containment_denied',
        path: 'peek.txt',
      });
    });

    it('denies an outward symlink reached past a missing component', async () => {
      await fs.symlink(path.join(tempDir, 'outside'), path.join(root, 'escape'));

      expect(await sandbox.readFile('nope/../escape/secret.txt')).toMatchObject({
        ok: false,
        kind: 'containment_denied',
        path: 'nope/../escape/secret.txt',
      });
      expect(await sandbox.writeFile('nope/../escape/planted.txt', 'x')).toMatchObject({
        ok: false,
        kind: 'containment_denied',
      });
      expect(await sandbox.changeDirectory('nope/../escape')).toMatchObject({
        ok: false,
        kind: 'containment_denied',
      });
      expect(sandbox.currentDirectory()).toBe('/');
      expect(await fs.readdir(path.join(tempDir, 'outside'))).toEqual(['secret.txt']);
    });

    describe('every operation denies escaping inputs', () => {
      const inputs = [
        '..',
        '../outside/secret.txt',
        '/../outside',
        'link',
        'link/secret.txt',
        '/link/../link/secret.txt',
        'a/../link/new.txt',
        'missing/../link',
        'missing/../link/secret.txt',
        '/missing/../../link',
        'a/missing/../../link/x',
        'a/missing/deeper/../../../link/x',
        'inward/../link',
      ];

      const operations: Array<[string, (target: SandboxedFileSystem, input: string) => Promise<object>]> = [
        ['resolvePath', (target, input) => target.resolvePath(input)],
        ['readFile', (target, input) => target.readFile(input)],
        ['writeFile', (target, input) => target.writeFile(input, 'planted')],
        ['makeDirectory', (target, input) => target.makeDirectory(input)],
        ['changeDirectory', (target, input) => target.changeDirectory(input)],
        ['exists', (target, input) => target.exists(input)],
        ['listContents', (target, input) => target.listContents(input)],
        ['getDirectoryTree', (target, input) => target.getDirectoryTree(input)],
      ];

      beforeEach(async () => {
        await fs.mkdir(path.join(root, 'a'));
        await fs.mkdir(path.join(root, 'inward'));
        await fs.symlink(path.join(tempDir, 'outside'), path.join(root, 'link'));
      });

      for (const [name, operation] of operations) {
        it(name, async () => {
          for (const input of inputs) {
            expect(await operation(sandbox, input), input).toMatchObject({
              ok: false,
              kind: 'containment_denied',
              path: input,
            });
          }
          expect(sandbox.currentDirectory()).toBe('/');
          expect(await fs.readdir(path.join(tempDir, 'outside'))).toEqual(['secret.txt']);
        });
      }
    });

    it('follows symlinks that stay inside the root', async () => {
      await fs.mkdir(path.join(root, 'a'));
      await fs.symlink(path.join(root, 'a'), path.join(root, 'alias'));

      expect(expectOk(await sandbox.changeDirectory('alias')).path).toBe('/a');
      expect(sandbox.currentDirectory()).toBe('/a');
    });

    it('reports a symlink loop as an I/O failure', async () => {
      await fs.symlink('loop', path.join(root, 'loop'));

      expect(await sandbox.exists('loop')).toMatchObject({
        ok: false,
        kind: 'io_failure',
        path: 'loop',
      });
    });
  });

  describe('exists', () => {
    it('reports files and directories', async () => {
      await fs.writeFile(path.join(root, 'f.txt'), 'x');

      expect(await sandbox.exists('f.txt')).toEqual({ ok: true, path: '/f.txt', exists: true });
      expect(await sandbox.exists('.')).toEqual({ ok: true, path: '/', exists: true });
      expect(await sandbox.exists('nope.txt')).toEqual({ ok: true, path: '/nope.txt', exists: false });
    });

    it('reports denial instead of throwing', async () => {
      expect(await sandbox.exists('../outside')).toMatchObject({
        ok: false,
        kind: 'containment_denied',
      });
    });
  });

  describe('changeDirectory', () => {
    beforeEach(async () => {
      await fs.mkdir(path.join(root, 'a', 'b'), { recursive: true });
      await fs.writeFile(path.join(root, 'a', 'file.txt'), 'x');
    });

    it('is idempotent for the same absolute input', async () => {
      await sandbox.changeDirectory('/a/b');
      const first = sandbox.currentDirectory();
      await sandbox.changeDirectory('/a/b');

      expect(first).toBe('/a/b');
      expect(sandbox.currentDirectory()).toBe('/a/b');
    });

    it('never climbs above the root', async () => {
      for (let i = 0; i < 3; i++) {
        const result = await sandbox.changeDirectory('..');
        expect(result).toMatchObject({ ok: false, kind: 'containment_denied' });
        expect(sandbox.currentDirectory()).toBe('/');
      }
    });

    it('moves back up with .. inside the root', async () => {
      await sandbox.changeDirectory('a/b');

      expect(expectOk(await sandbox.changeDirectory('..')).path).toBe('/a');
      expect(expectOk(await sandbox.changeDirectory('..')).path).toBe('/');
    });

    it('leaves the cursor unchanged on failure', async () => {
      await sandbox.changeDirectory('a');

      expect(await sandbox.changeDirectory('missing')).toMatchObject({
        ok: false,
        kind: 'not_found',
        path: 'missing',
      });
      expect(await sandbox.changeDirectory('file.txt')).toMatchObject({
        ok: false,
        kind: 'wrong_type',
        path: 'file.txt',
      });
      expect(sandbox.currentDirectory()).toBe('/a');
    });

    it('applies cursor changes in the order calls were made', async () => {
      await fs.writeFile(path.join(root, 'note.txt'), 'in root');
      await fs.writeFile(path.join(root, 'a', 'note.txt'), 'in a');

      const moved = sandbox.changeDirectory('a');
      const read = sandbox.readFile('note.txt');

      expect(expectOk(await moved).path).toBe('/a');
      expect(expectOk(await read).content).toBe('in a');
    });

    it('serializes concurrent relative moves', async () => {
      const results = await Promise.all([
        sandbox.changeDirectory('a'),
        sandbox.changeDirectory('b'),
      ]);

      expect(results.map((result) => expectOk(result).path)).toEqual(['/a', '/a/b']);
      expect(sandbox.currentDirectory()).toBe('/a/b');
    });
  });

  describe('listContents', () => {
    it('lists sorted entries with their type and count', async () => {
      await fs.mkdir(path.join(root, 'src'));
      await fs.writeFile(path.join(root, 'b.txt'), 'b');
      await fs.writeFile(path.join(root, 'a.txt'), 'a');
      await fs.symlink(path.join(root, 'src'), path.join(root, 'src-link'));

      const listing = expectOk(await sandbox.listContents());

      expect(listing.path).toBe('/');
      expect(listing.count).toBe(4);
      expect(listing.entries).toEqual([
        { name: 'a.txt', type: 'file' },
        { name: 'b.txt', type: 'file' },
        { name: 'src', type: 'directory' },
        { name: 'src-link', type: 'directory' },
      ]);
    });

    it('lists an empty directory', async () => {
      expect(await sandbox.listContents()).toEqual({ ok: true, path: '/', entries: [], count: 0 });
    });

    it('lists another directory without moving the cursor', async () => {
      await fs.mkdir(path.join(root, 'docs', 'drafts'), { recursive: true });
      await fs.writeFile(path.join(root, 'docs', 'index.md'), '#');

      expect(await sandbox.listContents('docs')).toEqual({
        ok: true,
        path: '/docs',
        entries: [
          { name: 'drafts', type: 'directory' },
          { name: 'index.md', type: 'file' },
        ],
        count: 2,
      });
      expect(sandbox.currentDirectory()).toBe('/');
      expect(await sandbox.listContents('docs/index.md')).toMatchObject({ ok: false, kind: 'wrong_type' });
      expect(await sandbox.listContents('..')).toMatchObject({ ok: false, kind: 'containment_denied' });
    });

    it('fails when the current directory was removed', async () => {
      await fs.mkdir(path.join(root, 'gone'));
      await sandbox.changeDirectory('gone');
      await fs.rm(path.join(root, 'gone'), { recursive: true });

      expect(await sandbox.listContents()).toMatchObject({
        ok: false,
        kind: 'not_found',
        path: '/gone',
      });
    });
  });

  describe('makeDirectory', () => {
    it('is idempotent', async () => {
      expect(expectOk(await sandbox.makeDirectory('x/y')).created).toBe(true);
      expect(await sandbox.makeDirectory('x/y')).toEqual({ ok: true, path: '/x/y', created: false });
    });

    it.skipIf(process.platform === 'win32')('creates directories owner-only', async () => {
      await sandbox.makeDirectory('private/inner');

      const stats = await fs.stat(path.join(root, 'private', 'inner'));
      expect(stats.mode & 0o777).toBe(0o700);
    });

    it('reports a file in the way', async () => {
      await fs.writeFile(path.join(root, 'taken'), 'x');

      expect(await sandbox.makeDirectory('taken')).toMatchObject({
        ok: false,
        kind: 'wrong_type',
        path: 'taken',
      });
      expect(await sandbox.makeDirectory('taken/sub')).toMatchObject({
        ok: false,
        kind: 'wrong_type',
      });
    });

    it('denies directories outside the root', async () => {
      expect(await sandbox.makeDirectory('../planted')).toMatchObject({
        ok: false,
        kind: 'containment_denied',
      });
      await expect(fs.access(path.join(tempDir, 'planted'))).rejects.toThrow();
    });
  });

  describe('writeFile / readFile', () => {
    it('round-trips UTF-8 text exactly', async () => {
      const content = '﻿héllo wörld 🌍\r\nline two\n';
      const written = expectOk(await sandbox.writeFile('text/u.txt', content));

      expect(written.bytesWritten).toBe(Buffer.byteLength(content, 'utf-8'));
      expect(expectOk(await sandbox.readFile('text/u.txt')).content).toBe(content);
    });

    it('counts bytes, not characters', async () => {
      expect(expectOk(await sandbox.writeFile('h.txt', 'héllo')).bytesWritten).toBe(6);
    });

    it('overwrites existing content in full', async () => {
      await sandbox.writeFile('f.txt', 'a much longer first version');
      await sandbox.writeFile('f.txt', 'v2');

      expect(expectOk(await sandbox.readFile('f.txt')).content).toBe('v2');
      expect(await fs.readFile(path.join(root, 'f.txt'), 'utf-8')).toBe('v2');
    });

    it('writes an empty file', async () => {
      expect(expectOk(await sandbox.writeFile('empty.txt', '')).bytesWritten).toBe(0);
      expect(expectOk(await sandbox.readFile('empty.txt')).content).toBe('');
    });

    it('refuses to write over a directory or the root', async () => {
      await fs.mkdir(path.join(root, 'dir'));

      expect(await sandbox.writeFile('dir', 'x')).toMatchObject({ ok: false, kind: 'wrong_type' });
      expect(await sandbox.writeFile('/', 'x')).toMatchObject({ ok: false, kind: 'wrong_type' });
    });

    it('reports each read failure distinctly', async () => {
      await fs.mkdir(path.join(root, 'dir'));
      await sandbox.writeBinary('blob.bin', new Uint8Array([0xff, 0xfe, 0xfd]));

      expect(await sandbox.readFile('dir')).toMatchObject({ ok: false, kind: 'wrong_type', path: 'dir' });
      expect(await sandbox.readFile('missing.txt')).toMatchObject({
        ok: false,
        kind: 'not_found',
        path: 'missing.txt',
      });
      expect(await sandbox.readFile('blob.bin')).toMatchObject({
        ok: false,
        kind: 'io_failure',
        code: 'DECODE_FAILED',
        path: 'blob.bin',
      });
      expect(await sandbox.readFile('../outside/secret.txt')).toMatchObject({
        ok: false,
        kind: 'containment_denied',
      });
    });

    it('writes binary data', async () => {
      const data = new Uint8Array([0x25, 0x50, 0x44, 0x46]);
      const written = expectOk(await sandbox.writeBinary('papers/p.pdf', data));

      expect(written).toEqual({ ok: true, path: '/papers/p.pdf', bytesWritten: 4 });
      expect(new Uint8Array(await fs.readFile(path.join(root, 'papers', 'p.pdf')))).toEqual(data);
    });
  });

  describe('getDirectoryTree', () => {
    it('maps each directory to its files then tagged subdirectories', async () => {
      await sandbox.makeDirectory('a/b');
      await sandbox.writeFile('a/b/f.txt', 'hello');

      const { path: start, tree } = expectOk(await sandbox.getDirectoryTree('.'));

      expect(start).toBe('/');
      expect(tree).toEqual({
        '/': 'a (directory)',
        '/a': 'b (directory)',
        '/a/b': 'f.txt',
      });
    });

    it('lists files before subdirectories, each sorted', async () => {
      await fs.mkdir(path.join(root, 'zeta'));
      await fs.mkdir(path.join(root, 'alpha'));
      await fs.writeFile(path.join(root, 'z.txt'), '');
      await fs.writeFile(path.join(root, 'a.txt'), '');

      const { tree } = expectOk(await sandbox.getDirectoryTree('/'));

      expect(tree['/']).toBe('a.txt\nz.txt\nalpha (directory)\nzeta (directory)');
      expect(tree['/alpha']).toBe('');
    });

    it('starts from a subdirectory with sandbox-relative keys', async () => {
      await sandbox.writeFile('a/b/c/deep.txt', 'x');

      const { tree } = expectOk(await sandbox.getDirectoryTree('a/b'));
      expect(tree).toEqual({ '/a/b': 'c (directory)', '/a/b/c': 'deep.txt' });
    });

    it('does not loop on self-referential symlinks', async () => {
      await fs.mkdir(path.join(root, 'a'));
      await fs.symlink(path.join(root, 'a'), path.join(root, 'a', 'loop'));

      const { tree } = expectOk(await sandbox.getDirectoryTree('.'));
      expect(tree).toEqual({ '/': 'a (directory)', '/a': 'loop (directory)' });
    });

    it('follows symlinked directories inside the root', async () => {
      await sandbox.writeFile('real/data.txt', 'x');
      await fs.mkdir(path.join(root, 'views'));
      await fs.symlink(path.join(root, 'real'), path.join(root, 'views', 'linked'));

      const { tree } = expectOk(await sandbox.getDirectoryTree('views'));
      expect(tree).toEqual({ '/views': 'linked (directory)', '/views/linked': 'data.txt' });
    });

    it('walks a directory under its own name and under an alias', async () => {
      await sandbox.writeFile('b/data.txt', 'x');
      await fs.mkdir(path.join(root, 'a'));
      await fs.symlink(path.join(root, 'b'), path.join(root, 'a', 'link'));

      const { tree } = expectOk(await sandbox.getDirectoryTree('.'));
      expect(tree).toEqual({
        '/': 'a (directory)\nb (directory)',
        '/a': 'link (directory)',
        '/a/link': 'data.txt',
        '/b': 'data.txt',
      });
    });

    it('stops at a link back to an enclosing directory below an alias', async () => {
      await fs.mkdir(path.join(root, 'b'));
      await fs.symlink(path.join(root, 'b'), path.join(root, 'alias'));
      await fs.symlink('..', path.join(root, 'b', 'up'));

      const { tree } = expectOk(await sandbox.getDirectoryTree('.'));
      expect(tree).toEqual({
        '/': 'alias (directory)\nb (directory)',
        '/alias': 'up (directory)',
        '/b': 'up (directory)',
      });
    });

    it('does not descend into symlinks leaving the root', async () => {
      await fs.symlink(path.join(tempDir, 'outside'), path.join(root, 'escape'));

      const { tree } = expectOk(await sandbox.getDirectoryTree('.'));
      expect(tree).toEqual({ '/': 'escape (directory)' });
    });

    it('skips symlinked directories when followSymlinks is false', async () => {
      await sandbox.makeDirectory('real');
      await fs.symlink(path.join(root, 'real'), path.join(root, 'alias'));

      const { tree } = expectOk(await sandbox.getDirectoryTree('.', { followSymlinks: false }));
      expect(tree).toEqual({ '/': 'alias (directory)\nreal (directory)', '/real': '' });
    });

    it('stops at maxDepth', async () => {
      await sandbox.makeDirectory('a/b/c');

      const { tree } = expectOk(await sandbox.getDirectoryTree('.', { maxDepth: 1 }));
      expect(tree).toEqual({ '/': 'a (directory)', '/a': 'b (directory)' });
    });

    it('reports denial, missing and non-directory starts', async () => {
      await fs.writeFile(path.join(root, 'f.txt'), 'x');

      expect(await sandbox.getDirectoryTree('..')).toMatchObject({ ok: false, kind: 'containment_denied' });
      expect(await sandbox.getDirectoryTree('nope')).toMatchObject({ ok: false, kind: 'not_found' });
      expect(await sandbox.getDirectoryTree('f.txt')).toMatchObject({ ok: false, kind: 'wrong_type' });
    });
  });
});

describe('createSandboxedFileSystem', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'sandbox-factory-test-')));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('canonicalizes a symlinked root', async () => {
    await fs.mkdir(path.join(tempDir, 'real'));
    await fs.symlink(path.join(tempDir, 'real'), path.join(tempDir, 'alias'));

    const sandbox = await createSandboxedFileSystem({ root: path.join(tempDir, 'alias') }, logger);
    expect(sandbox.root).toBe(path.join(tempDir, 'real'));
    expect(sandbox.currentDirectory()).toBe('/');
  });

  it('rejects a missing root unless createRoot is set', async () => {
    const missing = path.join(tempDir, 'new', 'root');

    await expect(createSandboxedFileSystem({ root: missing }, logger)).rejects.toThrow();

    const sandbox = await createSandboxedFileSystem({ root: missing, createRoot: true }, logger);
    expect(sandbox.root).toBe(missing);
  });

  it('rejects a root that is a file', async () => {
    const file = path.join(tempDir, 'file');
    await fs.writeFile(file, 'x');

    await expect(createSandboxedFileSystem({ root: file }, logger)).rejects.toThrow(
      'Sandbox root is not a directory'
    );
  });

  it('rejects an empty root', async () => {
    await expect(createSandboxedFileSystem({ root: '' }, logger)).rejects.toThrow();
  });

  it('createTestSandbox uses a fresh temporary directory', async () => {
    const sandbox = await createTestSandbox(logger);
    try {
      expect(sandbox.root.startsWith(await fs.realpath(os.tmpdir()))).toBe(true);
      expect(expectOk(await sandbox.listContents()).count).toBe(0);
    } finally {
      await fs.rm(sandbox.root, { recursive: true, force: true });
    }
  });
});
