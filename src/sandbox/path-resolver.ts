import * as fs from 'node:fs';
import * as path from 'node:path';
import { InvalidPathError, SandboxEscapeError, hasErrorCode } from '../errors';

/**
 * Resolves tool-supplied paths against the workspace root.
 *
 * Every file tool goes through `resolve`, so this is the one place that
 * guarantees nothing is read or written outside the root. The check runs on
 * the canonical form: `..` segments are collapsed and any symlinks along the
 * existing part of the path are followed before comparing against the root.
 */
export class SandboxPathResolver {
  private constructor(readonly root: string) {}

  /**
   * Create the workspace directory if needed and bind a resolver to its
   * canonical location
   */
  static create(root: string): SandboxPathResolver {
    const absolute = path.resolve(root);
    fs.mkdirSync(absolute, { recursive: true });
    return new SandboxPathResolver(fs.realpathSync.native(absolute));
  }

  /**
   * @param requestedPath - Relative (to the root) or absolute path
   * @returns Canonical absolute path inside the root
   */
  resolve(requestedPath: string): string {
    if (requestedPath.trim() === '') {
      throw new InvalidPathError('Path must not be empty');
    }
    if (requestedPath.includes('\0')) {
      throw new InvalidPathError('Path must not contain NUL characters');
    }

    const joined = path.resolve(this.root, requestedPath);
    const canonical = canonicalize(joined);

    if (!this.contains(canonical)) {
      throw new SandboxEscapeError(requestedPath, this.root);
    }
    return canonical;
  }

  /** Path of `absolutePath` relative to the root, for display */
  relative(absolutePath: string): string {
    return path.relative(this.root, absolutePath) || '.';
  }

  private contains(candidate: string): boolean {
    return candidate === this.root || candidate.startsWith(this.root + path.sep);
  }
}

/**
 * Follow symlinks on the longest existing prefix of `absolutePath` and
 * re-attach the segments that do not exist yet (e.g. a file about to be
 * written). A dangling symlink is followed to its target, since writing
 * through it would create the target.
 */
function canonicalize(absolutePath: string): string {
  const pending: string[] = [];
  let current = absolutePath;

  for (;;) {
    try {
      const real = fs.realpathSync.native(current);
      return pending.length > 0 ? path.join(real, ...pending.reverse()) : real;
    } catch (error) {
      if (!isMissing(error)) {
        throw error;
      }
      const target = readDanglingLink(current);
      if (target !== null) {
        current = path.resolve(path.dirname(current), target);
        continue;
      }
      const parent = path.dirname(current);
      if (parent === current) {
        return absolutePath;
      }
      pending.push(path.basename(current));
      current = parent;
    }
  }
}

function readDanglingLink(linkPath: string): string | null {
  try {
    return fs.readlinkSync(linkPath);
  } catch (error) {
    if (isMissing(error) || hasErrorCode(error, 'EINVAL')) {
      return null;
    }
    throw error;
  }
}

function isMissing(error: unknown): boolean {
  return hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR');
}

