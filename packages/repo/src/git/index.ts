import path from 'node:path';
import { execa } from 'execa';
import { CorruptRepositoryError } from '@pplaces/shared';
import type { RemoteInfo } from '../types';
import type { DirtyOptions, GitMetadataReader, HeadState } from './types';

export * from './types';
export * from './remote-url';

export interface GitServiceOptions {
  /** git executable (default `git`) */
  binary?: string;
  /** Per-command timeout in milliseconds */
  timeoutMs?: number;
}

interface GitOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Subprocess-backed {@link GitMetadataReader}.
 *
 * Every command names the metadata directory and work tree explicitly, so a
 * broken `.git` never makes git fall back to an enclosing repository.
 */
export class GitService implements GitMetadataReader {
  private readonly binary: string;
  private readonly timeoutMs: number;

  constructor(options: GitServiceOptions = {}) {
    this.binary = options.binary ?? 'git';
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  private async exec(repoRoot: string, args: string[]): Promise<GitOutput> {
    const fullArgs = [
      '--no-optional-locks',
      '--git-dir',
      path.join(repoRoot, '.git'),
      '--work-tree',
      repoRoot,
      ...args,
    ];
    const result = await execa(this.binary, fullArgs, {
      reject: false,
      timeout: this.timeoutMs,
      env: { GIT_TERMINAL_PROMPT: '0', LC_ALL: 'C' },
    });

    if (result.exitCode === undefined) {
      throw new Error(`git did not exit normally: ${this.binary} ${args.join(' ')}`);
    }

    return { exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr };
  }

  private fail(repoRoot: string, args: string[], output: GitOutput): CorruptRepositoryError {
    const reason = output.stderr.trim() || `exit code ${output.exitCode}`;
    return new CorruptRepositoryError(repoRoot, `git ${args.join(' ')} failed: ${reason}`, {
      details: { exitCode: output.exitCode },
    });
  }

  async currentBranch(repoRoot: string): Promise<HeadState> {
    const symbolic = ['symbolic-ref', '--quiet', '--short', 'HEAD'];
    const ref = await this.exec(repoRoot, symbolic);
    if (ref.exitCode === 0) {
      return { kind: 'branch', name: ref.stdout.trim() };
    }
    if (ref.exitCode !== 1) {
      throw this.fail(repoRoot, symbolic, ref);
    }

    // HEAD is not a symbolic ref: detached
    const revParse = ['rev-parse', '--short', 'HEAD'];
    const sha = await this.exec(repoRoot, revParse);
    if (sha.exitCode !== 0) {
      throw this.fail(repoRoot, revParse, sha);
    }
    return { kind: 'detached', sha: sha.stdout.trim() };
  }

  async lastCommitTime(repoRoot: string): Promise<Date | undefined> {
    const verify = ['rev-parse', '--verify', '--quiet', 'HEAD^{commit}'];
    const head = await this.exec(repoRoot, verify);
    if (head.exitCode === 1 && head.stdout.trim() === '') {
      // Unborn branch: no commits yet
      return undefined;
    }
    if (head.exitCode !== 0) {
      throw this.fail(repoRoot, verify, head);
    }

    const logArgs = ['log', '-1', '--format=%ct', 'HEAD'];
    const log = await this.exec(repoRoot, logArgs);
    const seconds = Number.parseInt(log.stdout.trim(), 10);
    if (log.exitCode !== 0 || Number.isNaN(seconds)) {
      throw this.fail(repoRoot, logArgs, log);
    }
    return new Date(seconds * 1000);
  }

  async isDirty(repoRoot: string, options: DirtyOptions = {}): Promise<boolean> {
    // Explicit mode so `status.showUntrackedFiles` in git config has no say
    const untracked = options.includeUntracked === false ? 'no' : 'normal';
    const args = ['status', '--porcelain', `--untracked-files=${untracked}`];
    const status = await this.exec(repoRoot, args);
    if (status.exitCode !== 0) {
      throw this.fail(repoRoot, args, status);
    }
    return status.stdout.trim().length > 0;
  }

  async remoteUrl(repoRoot: string, remoteName: string): Promise<string | undefined> {
    const args = ['config', '--get', `remote.${remoteName}.url`];
    const url = await this.exec(repoRoot, args);
    if (url.exitCode === 1) {
      return undefined;
    }
    if (url.exitCode !== 0) {
      throw this.fail(repoRoot, args, url);
    }
    return url.stdout.trim() || undefined;
  }

  async remotes(repoRoot: string): Promise<RemoteInfo[]> {
    const args = ['config', '--get-regexp', '^remote\\..*\\.url$'];
    const output = await this.exec(repoRoot, args);
    if (output.exitCode === 1) {
      return [];
    }
    if (output.exitCode !== 0) {
      throw this.fail(repoRoot, args, output);
    }
    return parseRemoteConfig(output.stdout);
  }
}

/**
 * Parses `git config --get-regexp` output of the form
 * `remote.<name>.url <url>`, one per line.
 */
export function parseRemoteConfig(stdout: string): RemoteInfo[] {
  const remotes: RemoteInfo[] = [];
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const space = trimmed.indexOf(' ');
    if (space === -1) continue;
    const key = trimmed.slice(0, space);
    const url = trimmed.slice(space + 1).trim();
    if (!key.startsWith('remote.') || !key.endsWith('.url') || !url) continue;
    remotes.push({ name: key.slice('remote.'.length, -'.url'.length), url });
  }
  return remotes.sort((a, b) => (a.name === b.name ? 0 : a.name < b.name ? -1 : 1));
}
