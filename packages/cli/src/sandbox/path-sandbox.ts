/**
 * Path Sandbox
 *
 * Resolves untrusted candidate paths against a trusted root.
 * A candidate is accepted only if both its lexical form and its
 * canonical form (symlinks followed) stay inside the root.
 */

import * as fs from 'fs/promises';
import * as nodePath from 'path';
import { InvalidPathError, PathEscapeError } from '@sheetbox/core';
import { errorCode } from '../workspace/file-io.js';

/**
 * A root-bound resolver, handed to components that only ever write below one directory.
 */
export interface PathSandbox {
  /** Absolute root (not canonicalized) */
  readonly root: string;
  /** Resolve a candidate to a canonical path inside the root */
  resolve(candidate: string): Promise<string>;
  /** Lexical containment check for an absolute path */
  contains(absolutePath: string): boolean;
}

/**
 * Lexical check: `candidate` equals `root` or is a strict descendant.
 * Both arguments must be absolute and normalized.
 */
export function isWithin(candidate: string, root: string): boolean {
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
 * Canonicalize a path that may not exist yet.
 *
 * The deepest existing ancestor is resolved with realpath and the
 * missing tail is appended. A dangling symbolic link anywhere on the
 * path is refused, since writing through it would land at its target.
 */
export async function canonicalize(absolutePath: string): Promise<string> {
  const tail: string[] = [];
  let current = absolutePath;

  for (;;) {
    try {
      const real = await fs.realpath(current);
      return tail.length > 0 ? nodePath.join(real, ...tail.reverse()) : real;
    } catch (error) {
      const code = errorCode(error);
      if (code !== 'ENOENT' && code !== 'ENOTDIR') {
        throw error;
      }
    }

    const isDanglingLink = await fs
      .lstat(current)
      .then((stat) => stat.isSymbolicLink())
      .catch(() => false);
    if (isDanglingLink) {
      throw new PathEscapeError(absolutePath);
    }

    const parent = nodePath.dirname(current);
    if (parent === current) {
      return absolutePath;
    }
    tail.push(nodePath.basename(current));
    current = parent;
  }
}

/**
 * Resolve `candidate` against `root`.
 *
 * Relative candidates are joined onto the root; absolute candidates are
 * accepted only if they already lie inside it. `.` and `..` segments and
 * symbolic links are resolved before the containment check.
 *
 * @returns Canonical absolute path inside the canonical root
 * @throws PathEscapeError when the result would leave the root
 * @throws InvalidPathError for empty candidates or NUL bytes
 */
export async function resolveInSandbox(candidate: string, root: string): Promise<string> {
  if (candidate.length === 0) {
    throw new InvalidPathError('Path is empty', candidate);
  }
  if (candidate.includes('\0')) {
    throw new InvalidPathError('Path contains a NUL byte', candidate);
  }

  const absoluteRoot = nodePath.resolve(root);
  const canonicalRoot = await canonicalize(absoluteRoot);
  const joined = nodePath.resolve(absoluteRoot, candidate);

  if (!isWithin(joined, absoluteRoot) && !isWithin(joined, canonicalRoot)) {
    throw new PathEscapeError(candidate, absoluteRoot);
  }

  const canonical = await canonicalize(joined);
  if (!isWithin(canonical, canonicalRoot)) {
    throw new PathEscapeError(candidate, absoluteRoot);
  }

  return canonical;
}

/**
 * Create a resolver bound to one root.
 */
export function createPathSandbox(root: string): PathSandbox {
  const absoluteRoot = nodePath.resolve(root);
  return {
    root: absoluteRoot,
    resolve: (candidate) => resolveInSandbox(candidate, absoluteRoot),
    contains: (absolutePath) => isWithin(nodePath.resolve(absolutePath), absoluteRoot),
  };
}
