/** A configured git remote. */
export interface RemoteInfo {
  name: string;
  url: string;
}

/**
 * One discovered repository.
 * `path` is the absolute repository root and the unique key within a scan.
 */
export interface RepoRecord {
  path: string;
  /** Committer time of HEAD; absent when there are no commits or HEAD is unreadable */
  lastCommitTime?: Date;
  isDirty: boolean;
  /** URL of the primary remote (`origin` unless configured otherwise) */
  remoteUrl?: string;
  /** Branch name, `(detached at <sha>)`, or `(unknown)` */
  branch: string;
  remotes: RemoteInfo[];
  /** Problems met while reading metadata; empty for a healthy repository */
  issues: string[];
}

export type ScanWarningKind = 'PermissionDenied' | 'CorruptRepository' | 'Unreadable';

export interface ScanWarning {
  kind: ScanWarningKind;
  path: string;
  message: string;
}

export interface FilterCriteria {
  /** Keep only repositories with a commit within this many days */
  daysToShow?: number;
  /** Render every metadata field */
  full: boolean;
}

export interface ScanReport {
  root: string;
  criteria: FilterCriteria;
  /** Filtered records, ordered by path */
  records: RepoRecord[];
  /** Number of repositories found before filtering */
  totalFound: number;
  warnings: ScanWarning[];
  scannedAt: Date;
}
