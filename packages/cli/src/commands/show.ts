import path from 'node:path';
import type { Command } from 'commander';
import { createContext } from '../context';
import type { CliDeps } from '../types';
import { runReport } from './report';

export function registerShowCommand(program: Command, deps: CliDeps) {
  program
    .command('show [path]')
    .description('Print a metadata report (default root: scan.root from config, else the current directory)')
    .action(async (root: string | undefined) => {
      const ctx = createContext(program, deps);
      const target = root ? path.resolve(deps.cwd, root) : (ctx.config.scan.root ?? deps.cwd);
      await runReport(ctx, target, 'show');
    });
}
