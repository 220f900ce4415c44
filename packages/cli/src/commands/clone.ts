import type { Command } from 'commander';
import { CloneService, ExecaGitClient } from '@pplaces/core';
import { expandPath } from '@pplaces/shared';
import { createContext } from '../context';
import type { CliDeps } from '../types';

interface CloneCommandOptions {
  searchRoot?: string;
}

export function registerCloneCommand(program: Command, deps: CliDeps) {
  program
    .command('clone <url> [dest]')
    .description('Clone a repository unless it is already present')
    .option('--search-root <path>', 'Look for an existing clone of the same remote under this root')
    .action(async (url: string, dest: string | undefined, options: CloneCommandOptions) => {
      const ctx = createContext(program, deps);
      const git = deps.gitClient
        ? deps.gitClient(ctx.config.clone.command)
        : new ExecaGitClient(ctx.config.clone.command);
      const service = new CloneService(
        { inspector: ctx.inspector, logger: ctx.logger, runId: ctx.runId, cwd: deps.cwd },
        git,
      );

      const searchRoot = options.searchRoot
        ? expandPath(options.searchRoot, deps.cwd, deps.homeDir)
        : ctx.config.clone.searchRoot;
      const result = await service.clone(url, dest, { searchRoot, scan: ctx.scanOptions });
      ctx.renderer.renderCloned(result.path);
    });
}
