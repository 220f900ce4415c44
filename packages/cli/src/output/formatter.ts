import type { RepoRecord, ScanReport } from '@pplaces/repo';
import { redactString } from '@pplaces/shared';

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'} ago`;
}

/**
 * Coarse relative age, e.g. `3 days ago`.
 */
export function formatAge(when: Date, now: Date): string {
  const elapsed = now.getTime() - when.getTime();
  if (elapsed < 0) return 'in the future';
  if (elapsed < MINUTE) return 'just now';
  if (elapsed < HOUR) return plural(Math.floor(elapsed / MINUTE), 'minute');
  if (elapsed < DAY) return plural(Math.floor(elapsed / HOUR), 'hour');
  return plural(Math.floor(elapsed / DAY), 'day');
}

/**
 * Strips credentials from a remote URL before it is printed.
 */
export function displayUrl(url: string): string {
  return redactString(url).redacted;
}

export interface RepoRow {
  path: string;
  lastCommit: string;
  branch: string;
  dirty: string;
  remote: string;
  issues: string;
}

export function toRow(record: RepoRecord, now: Date): RepoRow {
  return {
    path: record.path,
    lastCommit: record.lastCommitTime ? formatAge(record.lastCommitTime, now) : 'no commits',
    branch: record.branch,
    dirty: record.isDirty ? 'yes' : 'no',
    remote: record.remoteUrl ? displayUrl(record.remoteUrl) : '-',
    issues: record.issues.join('; '),
  };
}

/**
 * One-line summary of how many repositories were found and shown.
 */
export function summarize(report: ScanReport): string {
  const noun = report.totalFound === 1 ? 'repository' : 'repositories';
  const { daysToShow } = report.criteria;
  if (daysToShow === undefined) {
    return `Found ${report.totalFound} ${noun}`;
  }
  const days = daysToShow === 1 ? 'day' : 'days';
  return `Showing ${report.records.length} of ${report.totalFound} ${noun} committed within ${daysToShow} ${days}`;
}

/**
 * JSON shape of a report. Dates are ISO 8601 strings and remote URLs
 * carry no credentials.
 */
export function toJsonReport(report: ScanReport) {
  return {
    root: report.root,
    criteria: report.criteria,
    scannedAt: report.scannedAt.toISOString(),
    totalFound: report.totalFound,
    records: report.records.map((record) => ({
      ...record,
      lastCommitTime: record.lastCommitTime?.toISOString(),
      remoteUrl: record.remoteUrl === undefined ? undefined : displayUrl(record.remoteUrl),
      remotes: record.remotes.map((remote) => ({ ...remote, url: displayUrl(remote.url) })),
    })),
    warnings: report.warnings,
  };
}
