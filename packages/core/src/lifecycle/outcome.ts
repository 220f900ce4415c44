import { ExternalOperationFailedError } from '@pplaces/shared';
import type { CommandResult } from './types';

/**
 * Throws when a delegated command did not succeed. The subprocess exit code
 * is carried verbatim.
 */
export function assertSucceeded(result: CommandResult): void {
  if (result.exitCode === 0) {
    return;
  }
  if (result.exitCode === undefined) {
    throw new ExternalOperationFailedError(
      `${result.commandLine} ${result.failureReason ?? 'did not exit normally'}`,
    );
  }
  throw new ExternalOperationFailedError(
    `${result.commandLine} exited with code ${result.exitCode}`,
    { exitCode: result.exitCode },
  );
}
