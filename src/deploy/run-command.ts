/**
 * OS Command Execution
 *
 * Thin synchronous wrapper around child processes used by the deploy and
 * update procedures. Every step runs to completion before the next starts.
 *
 * @module deploy/run-command
 */

import { spawnSync } from 'node:child_process';

export interface RunOptions {
  /** Capture output instead of streaming it to the terminal */
  silent?: boolean | undefined;
  /** Data written to the child's stdin */
  input?: string | undefined;
  cwd?: string | undefined;
}

export interface RunResult {
  success: boolean;
  status: number | null;
  output: string;
}

export function runCommand(cmd: string, args: string[], options: RunOptions = {}): RunResult {
  const { silent = false, input, cwd } = options;

  // stdin must be a pipe when we feed it, otherwise let the child share ours
  const stdin = input !== undefined ? 'pipe' : 'inherit';
  const stdout = silent ? 'pipe' : 'inherit';

  const result = spawnSync(cmd, args, {
    encoding: 'utf-8',
    stdio: [stdin, stdout, silent ? 'pipe' : 'inherit'],
    input,
    cwd,
  });

  if (result.error) {
    return { success: false, status: null, output: result.error.message };
  }

  return {
    success: result.status === 0,
    status: result.status,
    output: result.stdout || result.stderr || '',
  };
}

export function commandExists(cmd: string): boolean {
  const result = spawnSync('which', [cmd], { encoding: 'utf-8' });
  return result.status === 0;
}

/**
 * Render a command line for progress output and dry runs
 */
export function formatCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].map((part) => (/[\s"'$]/.test(part) ? JSON.stringify(part) : part)).join(' ');
}
