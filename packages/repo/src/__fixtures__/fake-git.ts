import { CorruptRepositoryError } from '@pplaces/shared';
import type { DirtyOptions, GitMetadataReader, HeadState } from '../git/types';
import type { RemoteInfo } from '../types';

type ReaderOperation = keyof GitMetadataReader;

export interface FakeRepoState {
  head?: HeadState;
  lastCommit?: Date;
  modified?: boolean;
  untracked?: boolean;
  remotes?: RemoteInfo[];
  /** Operations that throw CorruptRepositoryError */
  fail?: ReaderOperation[];
}

/**
 * In-memory GitMetadataReader keyed by absolute repository root.
 */
export class FakeGitReader implements GitMetadataReader {
  readonly calls: string[] = [];

  constructor(private readonly repos: Record<string, FakeRepoState> = {}) {}

  set(repoRoot: string, state: FakeRepoState): void {
    this.repos[repoRoot] = state;
  }

  private state(repoRoot: string, op: ReaderOperation): FakeRepoState {
    this.calls.push(`${op} ${repoRoot}`);
    const state = this.repos[repoRoot] ?? {};
    if (state.fail?.includes(op)) {
      throw new CorruptRepositoryError(repoRoot, `${op} failed`);
    }
    return state;
  }

  async currentBranch(repoRoot: string): Promise<HeadState> {
    return this.state(repoRoot, 'currentBranch').head ?? { kind: 'branch', name: 'main' };
  }

  async lastCommitTime(repoRoot: string): Promise<Date | undefined> {
    return this.state(repoRoot, 'lastCommitTime').lastCommit;
  }

  async isDirty(repoRoot: string, options: DirtyOptions = {}): Promise<boolean> {
    const state = this.state(repoRoot, 'isDirty');
    const untracked = options.includeUntracked !== false && state.untracked === true;
    return state.modified === true || untracked;
  }

  async remoteUrl(repoRoot: string, remoteName: string): Promise<string | undefined> {
    const state = this.state(repoRoot, 'remoteUrl');
    return state.remotes?.find((remote) => remote.name === remoteName)?.url;
  }

  async remotes(repoRoot: string): Promise<RemoteInfo[]> {
    const state = this.state(repoRoot, 'remotes');
    return [...(state.remotes ?? [])].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
}
