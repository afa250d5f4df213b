import { z } from 'zod';
import { InvalidFileSetError } from '../errors.js';
import type { FileSet } from './types.js';

export const FileSetSchema = z.record(z.string(), z.string());

/** Returns a reason when the path may not be written into a sandbox, else undefined. */
export function pathViolation(path: string): string | undefined {
  if (path.length === 0) return 'path is empty';
  if (path.includes('\\')) return 'backslashes are not allowed';
  if (path.includes('\0')) return 'NUL bytes are not allowed';
  if (path.startsWith('/') || /^[A-Za-z]:/.test(path)) return 'absolute paths are not allowed';

  const segments = path.split('/');
  if (segments.some((segment) => segment === '..')) return 'path traversal is not allowed';
  if (segments.some((segment) => segment.length === 0)) return 'empty path segment';
  return undefined;
}

/** Throws InvalidFileSetError on the first offending path. */
export function assertSafeFileSet(files: FileSet): void {
  for (const path of Object.keys(files)) {
    const reason = pathViolation(path);
    if (reason) throw new InvalidFileSetError(path, reason);
  }
}

/** Re-root every path of a file set under `prefix`. */
export function prefixFileSet(files: FileSet, prefix: string): Record<string, string> {
  const base = prefix.replace(/\/+$/, '');
  const out: Record<string, string> = {};
  for (const [path, content] of Object.entries(files)) {
    out[`${base}/${path}`] = content;
  }
  return out;
}
