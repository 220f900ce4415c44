import path from 'node:path';
import type { RepoRecord } from '../types';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * True when the record's last commit lies within `days` of `now`.
 * Records without a commit time never match.
 */
export function isWithinDays(record: RepoRecord, days: number, now: Date): boolean {
  if (!record.lastCommitTime) {
    return false;
  }
  return now.getTime() - record.lastCommitTime.getTime() <= days * MS_PER_DAY;
}

/**
 * Ordinal, segment-wise path comparison. `/r/a/c` sorts before `/r/a-b`
 * because the segment `a` is a prefix of `a-b`.
 */
export function comparePaths(a: string, b: string, sep: string = path.sep): number {
  const left = a.split(sep);
  const right = b.split(sep);
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i++) {
    if (left[i] !== right[i]) {
      return left[i] < right[i] ? -1 : 1;
    }
  }
  return left.length - right.length;
}
