import type { GitMetadataReader } from '@pplaces/repo';
import type { GitClient, HostingClient } from '@pplaces/core';

export type GlobalOptions = {
  daysToShow?: number;
  full?: boolean;
  json?: boolean;
  config?: string;
  verbose?: boolean;
  logFile?: string;
};

/**
 * Process-level inputs of the CLI. Tests substitute the git plumbing.
 */
export interface CliDeps {
  cwd: string;
  env: NodeJS.ProcessEnv;
  homeDir?: string;
  now?: () => Date;
  gitReader?: GitMetadataReader;
  gitClient?: (command: string) => GitClient;
  hostingClient?: (command: string, args: string[]) => HostingClient;
}
