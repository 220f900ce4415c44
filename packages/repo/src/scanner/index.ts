import nodeFs from 'node:fs/promises';
import path from 'node:path';
import ignore from 'ignore';
import { DEFAULT_EXCLUDES } from '@pplaces/shared';
import type { WalkerFs, WalkOptions } from './types';
import { GIT_MARKER, compareNames, findGitMarker, toReadWarning } from './utils';

export * from './types';
export { findGitMarker, GIT_MARKER } from './utils';

type Ignore = ReturnType<typeof ignore>;

/**
 * Depth-first filesystem walker that yields repository roots.
 *
 * A directory holding git metadata is yielded and never descended into.
 * Symbolic links are never followed, so cyclic links cannot cause
 * non-termination. Unreadable directories are reported through
 * `onWarning` and skipped.
 */
export class RepositoryWalker {
  private fs: WalkerFs;

  constructor(fs: WalkerFs = nodeFs) {
    this.fs = fs;
  }

  async *walk(root: string, options: WalkOptions = {}): AsyncGenerator<string> {
    const ig = ignore().add(options.excludes ?? DEFAULT_EXCLUDES);
    yield* this.visit(path.resolve(root), '', 0, ig, options);
  }

  private async *visit(
    dir: string,
    relativeDir: string,
    depth: number,
    ig: Ignore,
    options: WalkOptions,
  ): AsyncGenerator<string> {
    let entries;
    try {
      entries = await this.fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      options.onWarning?.(toReadWarning(dir, error));
      return;
    }

    if (entries.some((entry) => entry.name === GIT_MARKER)) {
      if (await findGitMarker(dir, this.fs)) {
        yield dir;
        return;
      }
    }

    if (options.maxDepth !== undefined && depth >= options.maxDepth) {
      return;
    }

    // Dirent reports symlinks as such, so linked directories are skipped here.
    const subdirs = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort(compareNames);

    for (const name of subdirs) {
      const entryRelativePath = relativeDir ? `${relativeDir}/${name}` : name;
      // Trailing slash so directory-only patterns (`build/`) match.
      // Names made only of dots (`...`) are not valid `ignore` paths.
      const candidate = entryRelativePath + '/';
      if (ignore.isPathValid(candidate) && ig.ignores(candidate)) continue;

      yield* this.visit(path.join(dir, name), entryRelativePath, depth + 1, ig, options);
    }
  }
}
