import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  AlreadyExistsError,
  ExternalOperationFailedError,
  UsageError,
  exitCodeFor,
} from '@pplaces/shared';
import { RepositoryInspector } from '@pplaces/repo';
import { CloneService } from './clone';
import { FakeGitClient } from '../__fixtures__/clients';
import { createMockLogger } from '../__fixtures__/logger';
import { StaticGitReader } from '../__fixtures__/reader';

const REMOTE = 'https://example.com/team/tools.git';

describe('CloneService', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'pplaces-clone-test-')));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function setup(git = new FakeGitClient(), reader = new StaticGitReader()) {
    const { logger, events } = createMockLogger();
    const service = new CloneService(
      { inspector: new RepositoryInspector(reader), logger, runId: 'run-test', cwd: tmpDir },
      git,
    );
    return { service, git, events };
  }

  it('clones into a directory named after the remote by default', async () => {
    const { service, git } = setup();
    const result = await service.clone(REMOTE);

    expect(result).toEqual({ path: path.join(tmpDir, 'tools') });
    expect(git.calls).toEqual([{ url: REMOTE, destination: path.join(tmpDir, 'tools') }]);
  });

  it('resolves an explicit destination against the working directory', async () => {
    const { service, git } = setup();
    await service.clone('git@example.com:team/tools.git', 'checkouts/t');
    expect(git.calls[0].destination).toBe(path.join(tmpDir, 'checkouts', 't'));
  });

  it('clones into an existing empty directory', async () => {
    await fs.mkdir(path.join(tmpDir, 'tools'));
    const { service, git } = setup();
    await service.clone(REMOTE);
    expect(git.calls).toHaveLength(1);
  });

  it('refuses when a repository is already at the destination', async () => {
    const dest = path.join(tmpDir, 'tools');
    await fs.mkdir(path.join(dest, '.git'), { recursive: true });
    const reader = new StaticGitReader({
      [dest]: [{ name: 'origin', url: 'git@example.com:team/tools.git' }],
    });
    const { service, git } = setup(new FakeGitClient(), reader);

    const error = await service.clone(REMOTE).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AlreadyExistsError);
    expect(error).toMatchObject({
      code: 'AlreadyExists',
      path: dest,
      message: `A repository already exists at ${dest}`,
      details: { path: dest, remoteUrl: 'git@example.com:team/tools.git', sameRemote: true },
    });
    expect(git.calls).toEqual([]);
  });

  it('refuses a non-empty directory that is not a repository', async () => {
    const dest = path.join(tmpDir, 'tools');
    await fs.mkdir(dest);
    await fs.writeFile(path.join(dest, 'notes.txt'), 'keep me');
    const { service, git } = setup();

    await expect(service.clone(REMOTE)).rejects.toThrow(
      `Destination exists and is not an empty directory: ${dest}`,
    );
    expect(git.calls).toEqual([]);
    expect(await fs.readFile(path.join(dest, 'notes.txt'), 'utf8')).toBe('keep me');
  });

  it('finds an existing clone of the same remote under the search root', async () => {
    const elsewhere = path.join(tmpDir, 'code', 'old-tools');
    await fs.mkdir(path.join(elsewhere, '.git'), { recursive: true });
    const reader = new StaticGitReader({
      [elsewhere]: [{ name: 'origin', url: 'ssh://git@example.com/team/tools' }],
    });
    const { service, git, events } = setup(new FakeGitClient(), reader);

    await expect(
      service.clone(REMOTE, path.join(tmpDir, 'fresh'), { searchRoot: path.join(tmpDir, 'code') }),
    ).rejects.toThrow(`${REMOTE} is already cloned at ${elsewhere}`);
    expect(git.calls).toEqual([]);
    expect(events[events.length - 1]).toMatchObject({
      type: 'LifecycleOperationFinished',
      payload: { operation: 'clone', outcome: 'conflict', path: elsewhere },
    });
  });

  it('clones when the search root holds only other remotes', async () => {
    const other = path.join(tmpDir, 'code', 'other');
    await fs.mkdir(path.join(other, '.git'), { recursive: true });
    const reader = new StaticGitReader({
      [other]: [{ name: 'origin', url: 'https://example.com/team/other.git' }],
    });
    const { service, git } = setup(new FakeGitClient(), reader);

    await service.clone(REMOTE, 'tools', { searchRoot: path.join(tmpDir, 'code') });
    expect(git.calls).toHaveLength(1);
  });

  it('propagates the exit code of a failed clone', async () => {
    const { service, events } = setup(new FakeGitClient({ exitCode: 128 }));
    const error = await service.clone(REMOTE).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalOperationFailedError);
    expect(error).toMatchObject({
      exitCode: 128,
      message: `git clone ${REMOTE} ${path.join(tmpDir, 'tools')} exited with code 128`,
    });
    expect(events.map((e) => e.type)).toEqual([
      'LifecycleOperationStarted',
      'LifecycleOperationFinished',
    ]);
    expect(events[1].payload).toMatchObject({ outcome: 'failed', exitCode: 128 });
  });

  it('reports a clone that could not start without an exit code', async () => {
    const { service, git, events } = setup(
      new FakeGitClient({ failureReason: 'could not be started' }),
    );
    const error = await service.clone(REMOTE).catch((e: unknown) => e);

    expect(git.calls).toHaveLength(1);
    expect(error).toBeInstanceOf(ExternalOperationFailedError);
    expect(error).toMatchObject({
      exitCode: undefined,
      message: `git clone ${REMOTE} ${path.join(tmpDir, 'tools')} could not be started`,
    });
    expect(exitCodeFor(error)).toBe(1);
    expect(events[1].payload).toMatchObject({ outcome: 'failed' });
  });

  it('rejects a URL without a usable name when no destination is given', async () => {
    const { service } = setup();
    await expect(service.clone('https://example.com/')).rejects.toBeInstanceOf(UsageError);
  });

  it('emits start and finish events on success', async () => {
    const { service, events } = setup();
    await service.clone(REMOTE);
    expect(events.map((e) => e.type)).toEqual([
      'LifecycleOperationStarted',
      'LifecycleOperationFinished',
    ]);
    expect(events[0].payload).toEqual({
      operation: 'clone',
      source: REMOTE,
      target: path.join(tmpDir, 'tools'),
    });
    expect(events[1].payload).toMatchObject({ operation: 'clone', outcome: 'completed', exitCode: 0 });
  });
});
