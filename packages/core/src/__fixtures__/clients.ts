import fs from 'fs/promises';
import path from 'path';
import type { CommandResult, GitClient, HostingClient } from '../lifecycle/types';

/**
 * Records clone calls. On success it lays down a `.git` directory and an
 * `origin` entry the way a real clone would.
 */
export class FakeGitClient implements GitClient {
  readonly calls: Array<{ url: string; destination: string }> = [];

  constructor(private readonly result: Omit<CommandResult, 'commandLine'> = { exitCode: 0 }) {}

  async clone(url: string, destination: string): Promise<CommandResult> {
    this.calls.push({ url, destination });
    if (this.result.exitCode === 0) {
      await fs.mkdir(path.join(destination, '.git'), { recursive: true });
    }
    return { commandLine: `git clone ${url} ${destination}`, ...this.result };
  }
}

export class FakeHostingClient implements HostingClient {
  readonly calls: Array<{ repoPath: string; target: string }> = [];

  constructor(private readonly exitCode = 0) {}

  async upload(repoPath: string, target: string): Promise<CommandResult> {
    this.calls.push({ repoPath, target });
    return {
      commandLine: `gh repo create ${target} --source ${repoPath} --push --private`,
      exitCode: this.exitCode,
    };
  }
}
