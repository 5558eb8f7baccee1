#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { deployCommand } from './commands/deploy.js';
import { registerServiceCommands } from './commands/service.js';
import { setupCommand } from './commands/setup.js';
import { startCommand } from './commands/start.js';
import { registerWhitelistCommand } from './commands/whitelist.js';
import { DEFAULT_SERVICE_NAME } from '../deploy/systemd-unit.js';
import { getCurrentVersion, printVersionDetails, PROJECT_ROOT, updateInstallation } from './updater.js';

const program = new Command();

program
  .name('gifbot')
  .description('Telegram inline bot that translates text into animated GIFs')
  .version(getCurrentVersion(), '-v, --version', 'Output the current version');

// ============================================================================
// Provisioning
// ============================================================================

program
  .command('deploy')
  .description('Install dependencies, create config files and register the systemd service')
  .option('-p, --path <path>', 'Project path', PROJECT_ROOT)
  .option('-s, --service-name <name>', 'systemd service name', DEFAULT_SERVICE_NAME)
  .option('--skip-packages', 'Do not install system packages with apt-get')
  .option('--dry-run', 'Print every step without running it')
  .action(deployCommand);

program
  .command('setup')
  .description('Interactively set the bot token and whitelist')
  .option('-p, --path <path>', 'Project path', PROJECT_ROOT)
  .action(setupCommand);

// ============================================================================
// Whitelist
// ============================================================================

registerWhitelistCommand(program);

// ============================================================================
// Service Management
// ============================================================================

registerServiceCommands(program);

// ============================================================================
// Bot
// ============================================================================

program
  .command('start')
  .description('Run the bot in the foreground')
  .option('-p, --path <path>', 'Project path', PROJECT_ROOT)
  .action(startCommand);

// ============================================================================
// Updates
// ============================================================================

program
  .command('update')
  .description('Pull the latest version, rebuild and restart the service')
  .option('-p, --path <path>', 'Project path', PROJECT_ROOT)
  .option('-s, --service-name <name>', 'systemd service name', DEFAULT_SERVICE_NAME)
  .option('--no-restart', 'Do not restart the service afterwards')
  .action((options: { path: string; serviceName: string; restart: boolean }) => {
    const result = updateInstallation({
      projectPath: options.path,
      serviceName: options.serviceName,
      restart: options.restart,
    });
    if (!result.success) {
      console.error(chalk.red(`\nUpdate stopped at step "${result.failedStep ?? 'unknown'}".`));
      process.exit(1);
    }
  });

program
  .command('version-info')
  .description('Show detailed version information')
  .action(printVersionDetails);

program.parse();
