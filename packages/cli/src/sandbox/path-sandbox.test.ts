/**
 * Tests for Path Sandbox
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { InvalidPathError, PathEscapeError } from '@sheetbox/core';
import { createPathSandbox, isWithin, resolveInSandbox } from './path-sandbox.js';

describe('PathSandbox', () => {
  let tempDir: string;
  let root: string;

  beforeEach(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'path-sandbox-test-')));
    root = path.join(tempDir, 'root');
    await fs.mkdir(root);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('isWithin', () => {
    it('should accept the root itself and descendants', () => {
      expect(isWithin('/srv/data', '/srv/data')).toBe(true);
      expect(isWithin('/srv/data/a/b.txt', '/srv/data')).toBe(true);
      expect(isWithin('/srv/data/..hidden', '/srv/data')).toBe(true);
    });

    it('should reject siblings sharing a prefix', () => {
      expect(isWithin('/srv/data-other/x', '/srv/data')).toBe(false);
      expect(isWithin('/srv', '/srv/data')).toBe(false);
    });
  });

  describe('resolveInSandbox', () => {
    it('should join relative candidates onto the root', async () => {
      expect(await resolveInSandbox('a/c.txt', root)).toBe(path.join(root, 'a', 'c.txt'));
    });

    it('should normalize . and .. segments', async () => {
      const direct = await resolveInSandbox('a/c.txt', root);
      expect(await resolveInSandbox('a/b/../c.txt', root)).toBe(direct);
      expect(await resolveInSandbox('./a/./c.txt', root)).toBe(direct);
    });

    it('should resolve the root itself', async () => {
      expect(await resolveInSandbox('.', root)).toBe(root);
    });

    it('should accept absolute candidates inside the root', async () => {
      const inside = path.join(root, 'reports', 'q1.csv');
      expect(await resolveInSandbox(inside, root)).toBe(inside);
    });

    it('should reject absolute candidates outside the root', async () => {
      await expect(resolveInSandbox('/etc/passwd', root)).rejects.toBeInstanceOf(PathEscapeError);
    });

    it('should reject traversal above the root', async () => {
      await expect(resolveInSandbox('../x', root)).rejects.toBeInstanceOf(PathEscapeError);
      await expect(resolveInSandbox('a/../../x', root)).rejects.toBeInstanceOf(PathEscapeError);
      await expect(resolveInSandbox('..', root)).rejects.toBeInstanceOf(PathEscapeError);
    });

    it('should reject a sibling directory sharing the root prefix', async () => {
      await expect(resolveInSandbox(`${root}-other/x.txt`, root)).rejects.toBeInstanceOf(PathEscapeError);
    });

    it('should reject empty candidates', async () => {
      await expect(resolveInSandbox('', root)).rejects.toBeInstanceOf(InvalidPathError);
    });

    it('should reject candidates containing NUL bytes', async () => {
      await expect(resolveInSandbox('a\0b.txt', root)).rejects.toBeInstanceOf(InvalidPathError);
    });

    it('should reject symlinks that point outside the root', async () => {
      const outside = path.join(tempDir, 'outside');
      await fs.mkdir(outside);
      await fs.symlink(outside, path.join(root, 'link'));

      await expect(resolveInSandbox('link/secret.txt', root)).rejects.toBeInstanceOf(PathEscapeError);
    });

    it('should follow symlinks that stay inside the root', async () => {
      await fs.mkdir(path.join(root, 'inner'));
      await fs.symlink(path.join(root, 'inner'), path.join(root, 'alias'));

      expect(await resolveInSandbox('alias/f.txt', root)).toBe(path.join(root, 'inner', 'f.txt'));
    });

    it('should reject dangling symlinks', async () => {
      await fs.symlink(path.join(tempDir, 'missing-target'), path.join(root, 'dangling'));

      await expect(resolveInSandbox('dangling', root)).rejects.toBeInstanceOf(PathEscapeError);
    });

    it('should either reject or contain every traversal payload', async () => {
      const payloads = [
        '../../../../etc/passwd',
        '..\\..\\windows\\system32',
        'a/b/c/../../../../..',
        '/tmp/evil.sh',
        './../root/ok.txt',
        'nested/./../../escape',
        '....//....//x',
        'ok/../still-ok.txt',
      ];

      for (const payload of payloads) {
        try {
          const resolved = await resolveInSandbox(payload, root);
          expect(isWithin(resolved, root)).toBe(true);
        } catch (error) {
          expect(error).toBeInstanceOf(PathEscapeError);
        }
      }
    });
  });

  describe('createPathSandbox', () => {
    it('should bind resolution to its root', async () => {
      const sandbox = createPathSandbox(root);

      expect(sandbox.root).toBe(root);
      expect(await sandbox.resolve('x.json')).toBe(path.join(root, 'x.json'));
      await expect(sandbox.resolve('/etc/passwd')).rejects.toBeInstanceOf(PathEscapeError);
    });

    it('should check containment lexically', () => {
      const sandbox = createPathSandbox(root);

      expect(sandbox.contains(path.join(root, 'a.txt'))).toBe(true);
      expect(sandbox.contains(path.join(root, '..', 'a.txt'))).toBe(false);
    });
  });
});
