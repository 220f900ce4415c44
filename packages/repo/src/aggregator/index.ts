import { randomUUID } from 'node:crypto';
import nodeFs from 'node:fs/promises';
import path from 'node:path';
import {
  PathNotFoundError,
  createEvent,
  logger as defaultLogger,
  type Logger,
  type PplacesEventInput,
} from '@pplaces/shared';
import { Semaphore } from '../concurrency/semaphore';
import type { RepositoryInspector } from '../inspector';
import { RepositoryWalker } from '../scanner';
import type { FilterCriteria, RepoRecord, ScanReport, ScanWarning } from '../types';
import { comparePaths, isWithinDays } from './filters';

export { comparePaths, isWithinDays, MS_PER_DAY } from './filters';

export const DEFAULT_CONCURRENCY = 8;

export interface AggregateOptions {
  /** gitignore-style patterns pruned from the walk */
  excludes?: string[];
  maxDepth?: number;
  /** Maximum number of repositories inspected at once */
  concurrency?: number;
  /** Clock used by the day filter */
  now?: () => Date;
}

export interface ScanAggregatorDeps {
  inspector: RepositoryInspector;
  walker?: RepositoryWalker;
  logger?: Logger;
  runId?: string;
}

interface InspectionOutcome {
  record?: RepoRecord;
  warning?: ScanWarning;
}

/**
 * Runs a scan: walks a root, inspects every candidate under bounded
 * concurrency, then filters and orders the records.
 */
export class ScanAggregator {
  private readonly inspector: RepositoryInspector;
  private readonly walker: RepositoryWalker;
  private readonly logger: Logger;
  private readonly runId: string;

  constructor(deps: ScanAggregatorDeps) {
    this.inspector = deps.inspector;
    this.walker = deps.walker ?? new RepositoryWalker();
    this.logger = deps.logger ?? defaultLogger;
    this.runId = deps.runId ?? randomUUID();
  }

  async aggregate(
    root: string,
    criteria: FilterCriteria,
    options: AggregateOptions = {},
  ): Promise<ScanReport> {
    const startedAt = Date.now();
    const resolvedRoot = path.resolve(root);
    await assertDirectory(resolvedRoot);

    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    const semaphore = new Semaphore(concurrency);

    await this.emit({
      type: 'ScanStarted',
      payload: { root: resolvedRoot, daysToShow: criteria.daysToShow, concurrency },
    });

    const walkWarnings: ScanWarning[] = [];
    const pending: Promise<InspectionOutcome>[] = [];

    for await (const candidate of this.walker.walk(resolvedRoot, {
      excludes: options.excludes,
      maxDepth: options.maxDepth,
      onWarning: (warning) => walkWarnings.push(warning),
    })) {
      pending.push(semaphore.run(() => this.inspectCandidate(candidate)));
    }

    const outcomes = await Promise.all(pending);

    const found = outcomes
      .map((outcome) => outcome.record)
      .filter((record): record is RepoRecord => record !== undefined)
      .sort((a, b) => comparePaths(a.path, b.path));

    const inspectionWarnings = outcomes
      .map((outcome) => outcome.warning)
      .filter((warning): warning is ScanWarning => warning !== undefined);
    for (const record of found) {
      for (const issue of record.issues) {
        inspectionWarnings.push({ kind: 'CorruptRepository', path: record.path, message: issue });
      }
    }
    inspectionWarnings.sort((a, b) => comparePaths(a.path, b.path));

    const warnings = [...walkWarnings, ...inspectionWarnings];
    for (const warning of warnings) {
      await this.logger.warn(warning.message);
      await this.emit({ type: 'ScanWarningRaised', payload: { ...warning } });
    }

    const scannedAt = options.now ? options.now() : new Date();
    const { daysToShow } = criteria;
    const records =
      daysToShow === undefined
        ? found
        : found.filter((record) => isWithinDays(record, daysToShow, scannedAt));

    await this.emit({
      type: 'ScanCompleted',
      payload: {
        root: resolvedRoot,
        found: found.length,
        shown: records.length,
        warnings: warnings.length,
        durationMs: Date.now() - startedAt,
      },
    });

    return {
      root: resolvedRoot,
      criteria,
      records,
      totalFound: found.length,
      warnings,
      scannedAt,
    };
  }

  private async inspectCandidate(candidate: string): Promise<InspectionOutcome> {
    try {
      const record = await this.inspector.inspect(candidate);
      if (!record) {
        return {};
      }
      await this.emit({
        type: 'RepositoryInspected',
        payload: {
          path: record.path,
          branch: record.branch,
          isDirty: record.isDirty,
          lastCommitTime: record.lastCommitTime?.toISOString(),
          remoteUrl: record.remoteUrl,
          issueCount: record.issues.length,
        },
      });
      return { record };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return {
        warning: { kind: 'Unreadable', path: candidate, message: `Cannot inspect ${candidate}: ${reason}` },
      };
    }
  }

  private async emit(input: PplacesEventInput): Promise<void> {
    await this.logger.log(createEvent(this.runId, input));
  }
}

async function assertDirectory(dir: string): Promise<void> {
  try {
    const stats = await nodeFs.stat(dir);
    if (stats.isDirectory()) {
      return;
    }
  } catch (error) {
    throw new PathNotFoundError(dir, { cause: error });
  }
  throw new PathNotFoundError(dir);
}
