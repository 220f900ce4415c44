import nodeFs from 'node:fs/promises';
import path from 'node:path';
import { CorruptRepositoryError } from '@pplaces/shared';
import type { GitMetadataReader, HeadState } from '../git/types';
import { findGitMarker } from '../scanner/utils';
import type { WalkerFs } from '../scanner/types';
import type { RemoteInfo, RepoRecord } from '../types';

export const UNKNOWN_BRANCH = '(unknown)';

export interface InspectorOptions {
  /** Remote reported as the primary one (default `origin`) */
  remoteName?: string;
  /** Count untracked files as changes (default true) */
  includeUntracked?: boolean;
}

interface Attempt<T> {
  value: T;
  issue?: string;
}

export function describeHead(head: HeadState): string {
  return head.kind === 'branch' ? head.name : `(detached at ${head.sha})`;
}

function describeFailure(repoRoot: string, what: string, error: unknown): string {
  if (error instanceof CorruptRepositoryError) {
    return `${what}: ${error.message}`;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return `${what}: ${new CorruptRepositoryError(repoRoot, reason).message}`;
}

/**
 * Classifies directories and reads per-repository metadata.
 *
 * Each field is read independently. A read that fails is recorded in
 * `issues` and the field falls back, so one damaged repository still yields
 * a record and never aborts a scan.
 */
export class RepositoryInspector {
  private readonly remoteName: string;
  private readonly includeUntracked: boolean;

  constructor(
    private readonly reader: GitMetadataReader,
    options: InspectorOptions = {},
    private readonly fs: WalkerFs = nodeFs,
  ) {
    this.remoteName = options.remoteName ?? 'origin';
    this.includeUntracked = options.includeUntracked ?? true;
  }

  async isRepository(dir: string): Promise<boolean> {
    return (await findGitMarker(path.resolve(dir), this.fs)) !== undefined;
  }

  async inspect(dir: string): Promise<RepoRecord | undefined> {
    const repoRoot = path.resolve(dir);
    if (!(await this.isRepository(repoRoot))) {
      return undefined;
    }

    // Reads run concurrently; issues are collected in a fixed order afterwards.
    const attempt = async <T>(
      what: string,
      read: () => Promise<T>,
      fallback: T,
    ): Promise<Attempt<T>> => {
      try {
        return { value: await read() };
      } catch (error) {
        return { value: fallback, issue: describeFailure(repoRoot, what, error) };
      }
    };

    const [head, lastCommitTime, isDirty, remoteUrl, remotes] = await Promise.all([
      attempt<HeadState | undefined>(
        'branch',
        () => this.reader.currentBranch(repoRoot),
        undefined,
      ),
      attempt<Date | undefined>(
        'last commit',
        () => this.reader.lastCommitTime(repoRoot),
        undefined,
      ),
      attempt(
        'status',
        () => this.reader.isDirty(repoRoot, { includeUntracked: this.includeUntracked }),
        false,
      ),
      attempt<string | undefined>(
        'remote',
        () => this.reader.remoteUrl(repoRoot, this.remoteName),
        undefined,
      ),
      attempt<RemoteInfo[]>('remotes', () => this.reader.remotes(repoRoot), []),
    ]);

    const issues = [head, lastCommitTime, isDirty, remoteUrl, remotes]
      .map((result) => result.issue)
      .filter((issue): issue is string => issue !== undefined);

    return {
      path: repoRoot,
      lastCommitTime: lastCommitTime.value,
      isDirty: isDirty.value,
      remoteUrl: remoteUrl.value,
      branch: head.value ? describeHead(head.value) : UNKNOWN_BRANCH,
      remotes: remotes.value,
      issues,
    };
  }
}
