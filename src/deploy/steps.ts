/**
 * Step Runner
 *
 * Runs a linear list of deployment steps. The first failing step stops the
 * sequence; nothing is retried.
 *
 * @module deploy/steps
 */

import chalk from 'chalk';
import ora from 'ora';
import { formatCommand, runCommand } from './run-command.js';

export interface CommandSpec {
  cmd: string;
  args: string[];
  cwd?: string | undefined;
  /** Written to the command's stdin */
  input?: string | undefined;
  /** Capture output behind a spinner instead of streaming it */
  silent?: boolean | undefined;
}

export interface StepOutcome {
  success: boolean;
  error?: string | undefined;
}

export interface DeployStep<Name extends string = string> {
  name: Name;
  title: string;
  /** Run a command... */
  command?: CommandSpec | undefined;
  /** ...or do the work in-process */
  action?: ((dryRun: boolean) => StepOutcome) | undefined;
  /** Extra text shown for this step in a dry run */
  preview?: string | undefined;
}

export interface StepsResult<Name extends string = string> {
  success: boolean;
  completed: Name[];
  failedStep?: Name | undefined;
  error?: string | undefined;
}

/**
 * Prefix a command with sudo unless we already are root
 */
export function privileged(cmd: string, args: string[], isRoot: boolean): Pick<CommandSpec, 'cmd' | 'args'> {
  return isRoot ? { cmd, args } : { cmd: 'sudo', args: [cmd, ...args] };
}

export function isRootUser(): boolean {
  return process.getuid?.() === 0;
}

function runCommandStep(title: string, spec: CommandSpec): StepOutcome {
  const line = formatCommand(spec.cmd, spec.args);

  if (spec.silent) {
    const spinner = ora(title).start();
    const result = runCommand(spec.cmd, spec.args, { silent: true, input: spec.input, cwd: spec.cwd });
    if (result.success) {
      spinner.succeed(title);
      return { success: true };
    }
    spinner.fail(title);
    const detail = result.output.trim();
    return {
      success: false,
      error: `${line} failed (exit status ${result.status ?? 'unknown'})${detail ? `: ${detail}` : ''}`,
    };
  }

  console.log(chalk.bold(`\n${title}`));
  console.log(chalk.dim(`   $ ${line}`));
  const result = runCommand(spec.cmd, spec.args, { input: spec.input, cwd: spec.cwd });
  if (!result.success) {
    return {
      success: false,
      error: `${line} failed (exit status ${result.status ?? 'unknown'})${result.status === null && result.output ? `: ${result.output}` : ''}`,
    };
  }
  return { success: true };
}

function previewStep(step: DeployStep): void {
  console.log(chalk.bold(`\n${step.title}`));
  if (step.command) {
    console.log(chalk.dim(`   $ ${formatCommand(step.command.cmd, step.command.args)}`));
  }
  if (step.action) {
    step.action(true);
  }
  if (step.preview) {
    console.log(chalk.dim(step.preview.replace(/^/gm, '   | ')));
  }
}

export function runSteps<Name extends string>(
  steps: DeployStep<Name>[],
  options: { dryRun?: boolean | undefined } = {}
): StepsResult<Name> {
  const completed: Name[] = [];

  for (const step of steps) {
    if (options.dryRun) {
      previewStep(step);
      completed.push(step.name);
      continue;
    }

    let outcome: StepOutcome = { success: true };
    if (step.command) {
      outcome = runCommandStep(step.title, step.command);
    } else if (step.action) {
      console.log(chalk.bold(`\n${step.title}`));
      try {
        outcome = step.action(false);
      } catch (error) {
        outcome = { success: false, error: error instanceof Error ? error.message : String(error) };
      }
    }

    if (!outcome.success) {
      console.error(chalk.red(`\n❌ ${step.title.replace(/\.\.\.$/, '')} failed`));
      if (outcome.error) console.error(chalk.red(`   ${outcome.error}`));
      return { success: false, completed, failedStep: step.name, error: outcome.error };
    }

    completed.push(step.name);
  }

  return { success: true, completed };
}
