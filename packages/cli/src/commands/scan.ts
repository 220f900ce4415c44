import path from 'node:path';
import type { Command } from 'commander';
import { createContext } from '../context';
import type { CliDeps } from '../types';
import { runReport } from './report';

export function registerScanCommand(program: Command, deps: CliDeps) {
  program
    .command('scan <path>')
    .description('Recursively discover git repositories under <path>')
    .action(async (root: string) => {
      const ctx = createContext(program, deps);
      await runReport(ctx, path.resolve(deps.cwd, root), 'scan');
    });
}
