import type { Logger } from '@pplaces/shared';
import type { RepositoryInspector } from '@pplaces/repo';

export interface CommandResult {
  /** Undefined when the process could not be started or was killed */
  exitCode?: number;
  /** Human-readable form of the invocation, for error messages */
  commandLine: string;
  /** Reason the process did not exit normally */
  failureReason?: string;
}

/** Runs `git clone`. */
export interface GitClient {
  clone(url: string, destination: string): Promise<CommandResult>;
}

/** Publishes a local repository to a hosting service. */
export interface HostingClient {
  upload(repoPath: string, target: string): Promise<CommandResult>;
}

export interface LifecycleContext {
  inspector: RepositoryInspector;
  logger: Logger;
  runId: string;
  cwd?: string;
}
