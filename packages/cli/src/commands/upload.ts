import type { Command } from 'commander';
import { CommandTemplateHostingClient, UploadService } from '@pplaces/core';
import { createContext } from '../context';
import type { CliDeps } from '../types';

export function registerUploadCommand(program: Command, deps: CliDeps) {
  program
    .command('upload <path> <target>')
    .description('Publish an existing local repository to the hosting service')
    .action(async (repoPath: string, target: string) => {
      const ctx = createContext(program, deps);
      const { command, args } = ctx.config.upload;
      const hosting = deps.hostingClient
        ? deps.hostingClient(command, args)
        : new CommandTemplateHostingClient(command, args);
      const service = new UploadService(
        { inspector: ctx.inspector, logger: ctx.logger, runId: ctx.runId, cwd: deps.cwd },
        hosting,
      );

      const result = await service.upload(repoPath, target);
      ctx.renderer.renderUploaded(result.path, result.target);
    });
}
