import path from 'path';
import { NotARepositoryError, createEvent, type PplacesEventInput } from '@pplaces/shared';
import { assertSucceeded } from './outcome';
import type { HostingClient, LifecycleContext } from './types';

export interface UploadResult {
  path: string;
  target: string;
}

/**
 * Publishes an existing local repository through the hosting client.
 * Never retried.
 */
export class UploadService {
  constructor(
    private readonly ctx: LifecycleContext,
    private readonly hosting: HostingClient,
  ) {}

  async upload(repoPath: string, target: string): Promise<UploadResult> {
    const resolved = path.resolve(this.ctx.cwd ?? process.cwd(), repoPath);

    if (!(await this.ctx.inspector.isRepository(resolved))) {
      await this.emit({
        type: 'LifecycleOperationFinished',
        payload: { operation: 'upload', outcome: 'rejected', path: resolved },
      });
      throw new NotARepositoryError(resolved);
    }

    await this.emit({
      type: 'LifecycleOperationStarted',
      payload: { operation: 'upload', source: resolved, target },
    });
    const startedAt = Date.now();
    const result = await this.hosting.upload(resolved, target);
    const durationMs = Date.now() - startedAt;
    const succeeded = result.exitCode === 0;

    await this.emit({
      type: 'LifecycleOperationFinished',
      payload: {
        operation: 'upload',
        outcome: succeeded ? 'completed' : 'failed',
        exitCode: result.exitCode,
        path: resolved,
        durationMs,
      },
    });
    assertSucceeded(result);

    return { path: resolved, target };
  }

  private async emit(input: PplacesEventInput): Promise<void> {
    await this.ctx.logger.log(createEvent(this.ctx.runId, input));
  }
}
