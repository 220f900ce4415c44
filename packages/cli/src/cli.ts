import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { AppError, exitCodeFor } from '@pplaces/shared';
import pkg from '../package.json';
import { registerScanCommand } from './commands/scan';
import { registerShowCommand } from './commands/show';
import { registerCloneCommand } from './commands/clone';
import { registerUploadCommand } from './commands/upload';
import type { CliDeps, GlobalOptions } from './types';

export function parseDays(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative whole number of days.');
  }
  return Number(value);
}

export function createProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name('pplaces')
    .description('Find the git repositories on this machine and report on them')
    .version(pkg.version)
    .option('-d, --days-to-show <days>', 'Only show repositories committed within this many days', parseDays)
    .option('-f, --full', 'Show every metadata field')
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--log-file <path>', 'Append structured events to this JSONL file')
    .exitOverride();

  registerScanCommand(program, deps);
  registerShowCommand(program, deps);
  registerCloneCommand(program, deps);
  registerUploadCommand(program, deps);

  return program;
}

function renderError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses and runs one invocation. Resolves to the process exit code.
 */
export async function run(argv: string[], deps: CliDeps): Promise<number> {
  const program = createProgram(deps);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // Commander has already printed help, the version or a usage message.
      return e.exitCode === 0 ? 0 : 2;
    }
    renderError(e, program.opts<GlobalOptions>());
    return exitCodeFor(e);
  }
}
