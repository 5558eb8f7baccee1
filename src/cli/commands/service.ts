/**
 * Service CLI Commands
 *
 * Usage:
 *   gifbot status       - Show service status
 *   gifbot logs         - Show the service journal
 *   gifbot stop         - Stop the service
 *   gifbot restart      - Restart the service
 *
 * @module cli/commands/service
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_SERVICE_NAME } from '../../deploy/systemd-unit.js';
import { controlService, printServiceStatus, tailServiceLogs } from '../service.js';

interface ServiceOptions {
  serviceName: string;
}

function statusCommand(options: ServiceOptions): void {
  console.log(chalk.bold('\nTelegram GIF Bot Status\n'));
  printServiceStatus(options.serviceName);
  console.log();
}

function logsCommand(options: ServiceOptions & { lines: string; follow?: boolean | undefined }): void {
  const lines = parseInt(options.lines, 10);
  const ok = tailServiceLogs(options.serviceName, {
    lines: Number.isNaN(lines) || lines <= 0 ? 50 : lines,
    follow: options.follow,
  });
  if (!ok) {
    console.error(chalk.red('Could not read the service journal.'));
    process.exitCode = 1;
  }
}

function controlCommand(action: 'stop' | 'restart') {
  return (options: ServiceOptions): void => {
    const result = controlService(action, options.serviceName);
    const done = { stop: 'stopped', restart: 'restarted' }[action];

    if (result.success) {
      console.log(chalk.green(`✓ ${options.serviceName} ${done}`));
    } else {
      console.error(chalk.red(`✗ Failed to ${action} ${options.serviceName}: ${result.error ?? 'unknown error'}`));
      process.exit(1);
    }
  };
}

/**
 * Register service commands
 */
export function registerServiceCommands(program: Command): void {
  program
    .command('status')
    .description('Show the systemd service status')
    .option('-s, --service-name <name>', 'systemd service name', DEFAULT_SERVICE_NAME)
    .action(statusCommand);

  program
    .command('logs')
    .description('View service logs from the journal')
    .option('-s, --service-name <name>', 'systemd service name', DEFAULT_SERVICE_NAME)
    .option('-n, --lines <n>', 'Number of lines to show', '50')
    .option('-f, --follow', 'Follow log output (like tail -f)')
    .action(logsCommand);

  program
    .command('stop')
    .description('Stop the service')
    .option('-s, --service-name <name>', 'systemd service name', DEFAULT_SERVICE_NAME)
    .action(controlCommand('stop'));

  program
    .command('restart')
    .description('Restart the service')
    .option('-s, --service-name <name>', 'systemd service name', DEFAULT_SERVICE_NAME)
    .action(controlCommand('restart'));
}
