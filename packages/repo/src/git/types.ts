import type { RemoteInfo } from '../types';

export type HeadState =
  | { kind: 'branch'; name: string }
  | { kind: 'detached'; sha: string };

export interface DirtyOptions {
  /** Count untracked files as changes (default true) */
  includeUntracked?: boolean;
}

/**
 * Capability for reading repository metadata.
 *
 * The inspector only talks to this interface, so a subprocess-backed reader
 * and a library-backed one are interchangeable.
 */
export interface GitMetadataReader {
  /** Current branch, or the detached commit */
  currentBranch(repoRoot: string): Promise<HeadState>;
  /** Committer time of HEAD; `undefined` when the repository has no commits */
  lastCommitTime(repoRoot: string): Promise<Date | undefined>;
  isDirty(repoRoot: string, options?: DirtyOptions): Promise<boolean>;
  /** URL of the named remote; `undefined` when it is not configured */
  remoteUrl(repoRoot: string, remoteName: string): Promise<string | undefined>;
  /** Every configured remote with a URL, sorted by name */
  remotes(repoRoot: string): Promise<RemoteInfo[]>;
}
