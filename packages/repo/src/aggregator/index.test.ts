import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { PathNotFoundError } from '@pplaces/shared';
import { ScanAggregator, MS_PER_DAY } from './index';
import { RepositoryInspector } from '../inspector';
import { RepositoryWalker } from '../scanner';
import type { WalkerFs } from '../scanner';
import { FakeGitReader } from '../__fixtures__/fake-git';
import { createMockLogger } from '../__fixtures__/logger';

const NOW = new Date('2026-10-19T12:00:00.000Z');
const daysAgo = (days: number) => new Date(NOW.getTime() - days * MS_PER_DAY);

describe('ScanAggregator', () => {
  let tmpDir: string;
  let reader: FakeGitReader;

  beforeEach(async () => {
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'pplaces-aggregator-test-')));
    reader = new FakeGitReader();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  const abs = (rel: string) => path.join(tmpDir, rel);

  async function makeRepo(rel: string, lastCommit?: Date) {
    await fs.mkdir(path.join(tmpDir, rel, '.git'), { recursive: true });
    reader.set(abs(rel), { lastCommit });
  }

  function aggregator() {
    const { logger, events } = createMockLogger();
    const scan = new ScanAggregator({
      inspector: new RepositoryInspector(reader),
      logger,
      runId: 'run-test',
    });
    return { scan, logger, events };
  }

  it('reports one record per repository with a matching total', async () => {
    await makeRepo('alpha', daysAgo(1));
    await makeRepo('nested/beta', daysAgo(3));
    await makeRepo('nested/deeper/gamma', daysAgo(30));

    const { scan } = aggregator();
    const report = await scan.aggregate(tmpDir, { full: false }, { now: () => NOW });

    expect(report.root).toBe(tmpDir);
    expect(report.totalFound).toBe(3);
    expect(report.records.map((r) => r.path)).toEqual([
      abs('alpha'),
      abs('nested/beta'),
      abs('nested/deeper/gamma'),
    ]);
    expect(new Set(report.records.map((r) => r.path)).size).toBe(3);
    expect(report.warnings).toEqual([]);
    expect(report.scannedAt).toEqual(NOW);
  });

  it('filters by days since the last commit', async () => {
    await makeRepo('recent', daysAgo(2));
    await makeRepo('stale', daysAgo(10));
    await makeRepo('unborn');

    const { scan } = aggregator();
    const report = await scan.aggregate(tmpDir, { daysToShow: 5, full: false }, { now: () => NOW });

    expect(report.records.map((r) => r.path)).toEqual([abs('recent')]);
    expect(report.totalFound).toBe(3);
    expect(report.criteria).toEqual({ daysToShow: 5, full: false });
  });

  it('orders paths segment by segment', async () => {
    await makeRepo('a-b');
    await makeRepo('a/c');

    const { scan } = aggregator();
    const report = await scan.aggregate(tmpDir, { full: false });

    expect(report.records.map((r) => r.path)).toEqual([abs('a/c'), abs('a-b')]);
  });

  it('produces the same report for any concurrency', async () => {
    for (const name of ['q', 'b', 'x/y', 'm', 'c/d/e', 'k']) {
      await makeRepo(name, daysAgo(1));
    }

    const { scan } = aggregator();
    const serial = await scan.aggregate(tmpDir, { full: true }, { concurrency: 1, now: () => NOW });
    const parallel = await scan.aggregate(tmpDir, { full: true }, { concurrency: 4, now: () => NOW });

    expect(parallel.records).toEqual(serial.records);
    expect(parallel.records).toHaveLength(6);
  });

  it('is idempotent on an unchanged tree', async () => {
    await makeRepo('one', daysAgo(1));
    await makeRepo('two', daysAgo(2));

    const { scan } = aggregator();
    const first = await scan.aggregate(tmpDir, { full: false }, { now: () => NOW });
    const second = await scan.aggregate(tmpDir, { full: false }, { now: () => NOW });

    expect(second).toEqual(first);
  });

  it('passes excludes and depth limits to the walker', async () => {
    await makeRepo('keep');
    await makeRepo('archive/old');
    await makeRepo('a/b/deep');

    const { scan } = aggregator();
    const report = await scan.aggregate(
      tmpDir,
      { full: false },
      { excludes: ['archive/'], maxDepth: 2 },
    );

    expect(report.records.map((r) => r.path)).toEqual([abs('keep')]);
  });

  it('turns metadata issues into warnings and still reports the repository', async () => {
    await makeRepo('healthy', daysAgo(1));
    await fs.mkdir(abs('broken/.git'), { recursive: true });
    reader.set(abs('broken'), { fail: ['currentBranch'] });

    const { scan, logger } = aggregator();
    const report = await scan.aggregate(tmpDir, { full: false });

    expect(report.records.map((r) => r.path)).toEqual([abs('broken'), abs('healthy')]);
    const message = `branch: Unreadable git metadata at ${abs('broken')}: currentBranch failed`;
    expect(report.warnings).toEqual([
      { kind: 'CorruptRepository', path: abs('broken'), message },
    ]);
    expect(logger.warn).toHaveBeenCalledWith(message);
  });

  it('collects walker warnings and keeps scanning', async () => {
    await makeRepo('locked/inner');
    await makeRepo('open');
    const blocked = abs('locked');
    const deniedFs: WalkerFs = {
      readdir: async (p, options) => {
        if (p === blocked) {
          throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
        }
        return fs.readdir(p, options);
      },
      lstat: (p) => fs.lstat(p),
      readFile: (p, encoding) => fs.readFile(p, encoding),
    };
    const { logger } = createMockLogger();
    const scan = new ScanAggregator({
      inspector: new RepositoryInspector(reader),
      walker: new RepositoryWalker(deniedFs),
      logger,
    });

    const report = await scan.aggregate(tmpDir, { full: false });

    expect(report.records.map((r) => r.path)).toEqual([abs('open')]);
    expect(report.warnings).toEqual([
      { kind: 'PermissionDenied', path: blocked, message: `Permission denied: ${blocked}` },
    ]);
  });

  it('emits scan events carrying the run id', async () => {
    await makeRepo('recent', daysAgo(2));
    await makeRepo('stale', daysAgo(10));

    const { scan, events } = aggregator();
    await scan.aggregate(tmpDir, { daysToShow: 5, full: false }, { concurrency: 2, now: () => NOW });

    expect(events.map((e) => e.type)).toEqual([
      'ScanStarted',
      'RepositoryInspected',
      'RepositoryInspected',
      'ScanCompleted',
    ]);
    expect(events.every((e) => e.runId === 'run-test' && e.schemaVersion === 1)).toBe(true);
    expect(events[0].payload).toEqual({ root: tmpDir, daysToShow: 5, concurrency: 2 });
    expect(events[3].payload).toMatchObject({ root: tmpDir, found: 2, shown: 1, warnings: 0 });
  });

  it('rejects a missing root', async () => {
    const { scan } = aggregator();
    await expect(scan.aggregate(abs('missing'), { full: false })).rejects.toBeInstanceOf(
      PathNotFoundError,
    );
  });

  it('rejects a root that is a file', async () => {
    await fs.writeFile(abs('file.txt'), 'x');
    const { scan } = aggregator();
    await expect(scan.aggregate(abs('file.txt'), { full: false })).rejects.toThrow(
      `Path does not exist or is not a directory: ${abs('file.txt')}`,
    );
  });

  it('returns an empty report for a tree without repositories', async () => {
    await fs.mkdir(abs('just/folders'), { recursive: true });
    const { scan } = aggregator();
    const report = await scan.aggregate(tmpDir, { full: false });
    expect(report.records).toEqual([]);
    expect(report.totalFound).toBe(0);
  });
});
