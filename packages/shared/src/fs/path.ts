import path from 'node:path';
import os from 'node:os';

/**
 * Expands a leading `~` to the given home directory and resolves the result
 * against `cwd`.
 */
export function expandPath(p: string, cwd: string, home: string = os.homedir()): string {
  if (p === '~') {
    return home;
  }
  if (p.startsWith('~/') || p.startsWith('~\\')) {
    return path.join(home, p.slice(2));
  }
  return path.resolve(cwd, p);
}
