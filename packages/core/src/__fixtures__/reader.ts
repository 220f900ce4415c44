import type { GitMetadataReader, HeadState, RemoteInfo } from '@pplaces/repo';

/**
 * Reader answering from a fixed map of repository root to remotes.
 */
export class StaticGitReader implements GitMetadataReader {
  constructor(private readonly remotesByRoot: Record<string, RemoteInfo[]> = {}) {}

  async currentBranch(): Promise<HeadState> {
    return { kind: 'branch', name: 'main' };
  }

  async lastCommitTime(): Promise<Date | undefined> {
    return new Date('2026-10-01T00:00:00.000Z');
  }

  async isDirty(): Promise<boolean> {
    return false;
  }

  async remoteUrl(repoRoot: string, remoteName: string): Promise<string | undefined> {
    return this.remotesByRoot[repoRoot]?.find((remote) => remote.name === remoteName)?.url;
  }

  async remotes(repoRoot: string): Promise<RemoteInfo[]> {
    return this.remotesByRoot[repoRoot] ?? [];
  }
}
