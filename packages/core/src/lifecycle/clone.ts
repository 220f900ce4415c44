import fs from 'fs/promises';
import path from 'path';
import {
  AlreadyExistsError,
  UsageError,
  createEvent,
  type PplacesEventInput,
} from '@pplaces/shared';
import {
  ScanAggregator,
  repoNameFromUrl,
  sameRemote,
  type AggregateOptions,
  type RepoRecord,
} from '@pplaces/repo';
import { assertSucceeded } from './outcome';
import type { GitClient, LifecycleContext } from './types';

export interface CloneOptions {
  /** Look for an existing clone of the same remote under this root first */
  searchRoot?: string;
  /** Walk settings for the search */
  scan?: AggregateOptions;
}

export interface CloneResult {
  path: string;
}

function hasRemote(record: RepoRecord, url: string): boolean {
  if (record.remoteUrl && sameRemote(record.remoteUrl, url)) {
    return true;
  }
  return record.remotes.some((remote) => sameRemote(remote.url, url));
}

async function isOccupied(destination: string): Promise<boolean> {
  try {
    const stats = await fs.stat(destination);
    if (!stats.isDirectory()) {
      return true;
    }
    return (await fs.readdir(destination)).length > 0;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Clones a remote unless a copy is already present.
 */
export class CloneService {
  constructor(
    private readonly ctx: LifecycleContext,
    private readonly git: GitClient,
  ) {}

  /** Directory a clone of `url` lands in when no destination is given. */
  defaultDestination(url: string): string {
    const name = repoNameFromUrl(url);
    if (!name) {
      throw new UsageError(`Cannot derive a directory name from ${url}; pass a destination`);
    }
    return path.resolve(this.ctx.cwd ?? process.cwd(), name);
  }

  async clone(url: string, destination?: string, options: CloneOptions = {}): Promise<CloneResult> {
    const target = destination
      ? path.resolve(this.ctx.cwd ?? process.cwd(), destination)
      : this.defaultDestination(url);

    const existing = await this.ctx.inspector.inspect(target);
    if (existing) {
      await this.finish('conflict', { path: target });
      throw new AlreadyExistsError(target, undefined, {
        details: {
          path: target,
          remoteUrl: existing.remoteUrl,
          sameRemote: hasRemote(existing, url),
        },
      });
    }

    if (await isOccupied(target)) {
      await this.finish('conflict', { path: target });
      throw new AlreadyExistsError(target, `Destination exists and is not an empty directory: ${target}`);
    }

    if (options.searchRoot) {
      const match = await this.findExisting(url, options.searchRoot, options.scan);
      if (match) {
        await this.finish('conflict', { path: match.path });
        throw new AlreadyExistsError(match.path, `${url} is already cloned at ${match.path}`, {
          details: { path: match.path, searchRoot: options.searchRoot },
        });
      }
    }

    await this.emit({
      type: 'LifecycleOperationStarted',
      payload: { operation: 'clone', source: url, target },
    });
    const startedAt = Date.now();
    const result = await this.git.clone(url, target);
    const durationMs = Date.now() - startedAt;

    await this.finish(result.exitCode === 0 ? 'completed' : 'failed', {
      path: target,
      exitCode: result.exitCode,
      durationMs,
    });
    assertSucceeded(result);

    return { path: target };
  }

  private async findExisting(
    url: string,
    searchRoot: string,
    scan: AggregateOptions = {},
  ): Promise<RepoRecord | undefined> {
    const aggregator = new ScanAggregator({
      inspector: this.ctx.inspector,
      logger: this.ctx.logger,
      runId: this.ctx.runId,
    });
    const report = await aggregator.aggregate(searchRoot, { full: false }, scan);
    return report.records.find((record) => hasRemote(record, url));
  }

  private async finish(
    outcome: 'completed' | 'failed' | 'conflict',
    extra: { path: string; exitCode?: number; durationMs?: number },
  ): Promise<void> {
    await this.emit({
      type: 'LifecycleOperationFinished',
      payload: { operation: 'clone', outcome, ...extra },
    });
  }

  private async emit(input: PplacesEventInput): Promise<void> {
    await this.ctx.logger.log(createEvent(this.ctx.runId, input));
  }
}
