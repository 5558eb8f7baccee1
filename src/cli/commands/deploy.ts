/**
 * Deploy Command
 *
 * Usage:
 *   gifbot deploy                  - Provision this host and start the service
 *   gifbot deploy --dry-run        - Show what would be done
 *   gifbot deploy --skip-packages  - Leave apt packages alone
 *
 * @module cli/commands/deploy
 */

import path from 'node:path';
import chalk from 'chalk';
import { provision } from '../../deploy/provisioner.js';
import { commandExists } from '../../deploy/run-command.js';

export interface DeployCommandOptions {
  path: string;
  serviceName?: string | undefined;
  skipPackages?: boolean | undefined;
  dryRun?: boolean | undefined;
}

export function deployCommand(options: DeployCommandOptions): void {
  const projectPath = path.resolve(options.path);

  if (!options.dryRun) {
    const missing = ['systemctl', 'npm'].filter((cmd) => !commandExists(cmd));
    if (!options.skipPackages && !commandExists('apt-get')) missing.push('apt-get');

    if (missing.length > 0) {
      console.error(chalk.red(`Missing required commands: ${missing.join(', ')}`));
      console.log(chalk.dim('Deploy targets Debian-based systems running systemd (e.g. Raspberry Pi OS).'));
      process.exit(1);
    }
  }

  const result = provision({
    projectPath,
    serviceName: options.serviceName,
    skipPackages: options.skipPackages,
    dryRun: options.dryRun,
  });

  if (!result.success) {
    console.error(chalk.red(`\nDeployment stopped at step "${result.failedStep ?? 'unknown'}".`));
    process.exit(1);
  }
}
