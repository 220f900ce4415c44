import { randomUUID } from 'node:crypto';
import type { Command } from 'commander';
import { ConfigLoader, type ConfigOverrides } from '@pplaces/core';
import { ConsoleLogger, JsonlLogger, expandPath, type Config, type Logger } from '@pplaces/shared';
import { GitService, RepositoryInspector, type AggregateOptions } from '@pplaces/repo';
import { OutputRenderer } from './output/renderer';
import type { CliDeps, GlobalOptions } from './types';

export interface CliContext {
  config: Config;
  globals: GlobalOptions;
  logger: Logger;
  runId: string;
  inspector: RepositoryInspector;
  renderer: OutputRenderer;
  deps: CliDeps;
  /** Walk settings derived from config */
  scanOptions: AggregateOptions;
}

/**
 * Resolves configuration and builds the services shared by every command.
 */
export function createContext(program: Command, deps: CliDeps): CliContext {
  const globals = program.opts<GlobalOptions>();

  const flags: ConfigOverrides = {};
  if (globals.daysToShow !== undefined) {
    flags.scan = { daysToShow: globals.daysToShow };
  }

  const config = ConfigLoader.load({
    configPath: globals.config,
    cwd: deps.cwd,
    env: deps.env,
    homeDir: deps.homeDir,
    flags,
  });

  const level = globals.verbose ? 'debug' : 'info';
  const logger: Logger = globals.logFile
    ? new JsonlLogger(expandPath(globals.logFile, deps.cwd, deps.homeDir), level)
    : new ConsoleLogger(level);

  const inspector = new RepositoryInspector(deps.gitReader ?? new GitService(), {
    remoteName: config.inspect.remoteName,
    includeUntracked: config.inspect.includeUntracked,
  });

  return {
    config,
    globals,
    logger,
    runId: randomUUID(),
    inspector,
    renderer: new OutputRenderer(globals.json === true, globals.full === true),
    deps,
    scanOptions: {
      excludes: config.scan.exclude,
      maxDepth: config.scan.maxDepth,
      concurrency: config.scan.concurrency,
      now: deps.now,
    },
  };
}
