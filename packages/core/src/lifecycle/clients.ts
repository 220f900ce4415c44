import { execa } from 'execa';
import type { CommandResult, GitClient, HostingClient } from './types';

/**
 * Runs a command with the terminal attached so the user sees progress and
 * can answer credential prompts.
 */
export async function runAttached(command: string, args: string[]): Promise<CommandResult> {
  const commandLine = [command, ...args].join(' ');
  const result = await execa(command, args, { stdio: 'inherit', reject: false });

  if (result.exitCode === undefined) {
    const reason = result.signal ? `terminated by ${result.signal}` : 'could not be started';
    return { commandLine, failureReason: reason };
  }
  return { commandLine, exitCode: result.exitCode };
}

export class ExecaGitClient implements GitClient {
  constructor(private readonly command: string = 'git') {}

  clone(url: string, destination: string): Promise<CommandResult> {
    return runAttached(this.command, ['clone', url, destination]);
  }
}

/**
 * Substitutes `{path}` and `{target}` in every argument.
 */
export function renderTemplate(args: string[], values: { path: string; target: string }): string[] {
  return args.map((arg) => arg.replaceAll('{path}', values.path).replaceAll('{target}', values.target));
}

/**
 * Hosting client driven by a configured command template, by default
 * `gh repo create {target} --source {path} --push --private`.
 */
export class CommandTemplateHostingClient implements HostingClient {
  constructor(
    private readonly command: string,
    private readonly args: string[],
  ) {}

  upload(repoPath: string, target: string): Promise<CommandResult> {
    return runAttached(this.command, renderTemplate(this.args, { path: repoPath, target }));
  }
}
