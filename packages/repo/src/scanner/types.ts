import type { Dirent, Stats } from 'node:fs';
import type { ScanWarning } from '../types';

export interface WalkOptions {
  /** gitignore-style patterns, matched against paths relative to the root */
  excludes?: string[];
  /** Maximum recursion depth; the root is depth 0 */
  maxDepth?: number;
  /** Receives directories that could not be read */
  onWarning?: (warning: ScanWarning) => void;
}

export interface GitMarker {
  kind: 'directory' | 'file';
  /** Absolute path of the `.git` entry */
  path: string;
}

/**
 * The slice of `fs/promises` the walker and inspector rely on.
 */
export interface WalkerFs {
  readdir(path: string, options: { withFileTypes: true }): Promise<Dirent[]>;
  lstat(path: string): Promise<Stats>;
  readFile(path: string, encoding: 'utf8'): Promise<string>;
}
