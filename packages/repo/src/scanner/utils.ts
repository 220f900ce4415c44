import nodeFs from 'node:fs/promises';
import path from 'node:path';
import { PermissionDeniedError } from '@pplaces/shared';
import type { ScanWarning } from '../types';
import type { GitMarker, WalkerFs } from './types';

export const GIT_MARKER = '.git';

const GITFILE_PREFIX = 'gitdir:';

/**
 * Looks for git metadata directly inside `dir`: a `.git` directory, or a
 * `.git` file pointing elsewhere (worktrees, submodules). Symbolic links are
 * not considered markers.
 */
export async function findGitMarker(
  dir: string,
  fs: WalkerFs = nodeFs,
): Promise<GitMarker | undefined> {
  const markerPath = path.join(dir, GIT_MARKER);
  let stats;
  try {
    stats = await fs.lstat(markerPath);
  } catch {
    return undefined;
  }

  if (stats.isDirectory()) {
    return { kind: 'directory', path: markerPath };
  }

  if (stats.isFile()) {
    try {
      const content = await fs.readFile(markerPath, 'utf8');
      if (content.startsWith(GITFILE_PREFIX)) {
        return { kind: 'file', path: markerPath };
      }
    } catch {
      return undefined;
    }
  }

  return undefined;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Classifies a failed directory read as a scan warning.
 */
export function toReadWarning(dir: string, error: unknown): ScanWarning {
  const code = errorCode(error);
  if (code === 'EACCES' || code === 'EPERM') {
    const denied = new PermissionDeniedError(dir, { cause: error });
    return { kind: 'PermissionDenied', path: dir, message: denied.message };
  }
  const reason = error instanceof Error ? error.message : String(error);
  return { kind: 'Unreadable', path: dir, message: `Cannot read ${dir}: ${reason}` };
}

/**
 * Orders directory names by UTF-16 code unit, independent of locale.
 */
export function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
