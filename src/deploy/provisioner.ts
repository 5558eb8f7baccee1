/**
 * Provisioning
 *
 * Prepares a host to run the bot as a systemd service:
 * - installs OS prerequisites with apt
 * - installs npm dependencies into the project's node_modules and builds
 * - writes default .env and .whitelist files, only when missing
 * - generates, enables and starts the systemd unit
 *
 * Steps run in order and the first failure aborts the rest.
 *
 * @module deploy/provisioner
 */

import { existsSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import chalk from 'chalk';
import { DEFAULT_ENV_CONTENT, ENV_FILE_NAME } from '../core/env-file.js';
import { resolveWhitelistFile } from '../core/config.js';
import { DEFAULT_WHITELIST_CONTENT } from '../core/whitelist.js';
import { DEFAULT_SERVICE_NAME, renderServiceUnit, unitFilePath } from './systemd-unit.js';
import { isRootUser, privileged, runSteps, type DeployStep, type StepOutcome } from './steps.js';

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_PACKAGES = ['git', 'ca-certificates', 'fonts-dejavu-core'];

export type ProvisionStepName =
  | 'update-packages'
  | 'install-packages'
  | 'install-dependencies'
  | 'build'
  | 'env-file'
  | 'whitelist-file'
  | 'write-unit'
  | 'daemon-reload'
  | 'enable-service'
  | 'start-service';

export interface ProvisionOptions {
  projectPath: string;
  serviceName?: string | undefined;
  packages?: string[] | undefined;
  skipPackages?: boolean | undefined;
  dryRun?: boolean | undefined;
  /** User the service runs as (default: the invoking user) */
  user?: string | undefined;
  /** Node.js binary written into ExecStart (default: the one running us) */
  nodeBinary?: string | undefined;
  isRoot?: boolean | undefined;
}

export interface ProvisionResult {
  success: boolean;
  steps: ProvisionStepName[];
  /** Configuration files created by this run */
  createdFiles: string[];
  unitPath: string;
  unit: string;
  failedStep?: ProvisionStepName | undefined;
  error?: string | undefined;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * The invoking user. Under sudo that is the user who ran sudo, not root.
 */
export function invokingUser(): string {
  return process.env.SUDO_USER || os.userInfo().username;
}

/**
 * npm command that installs the declared dependencies into node_modules
 */
export function installCommand(projectPath: string): string[] {
  return existsSync(path.join(projectPath, 'package-lock.json')) ? ['ci'] : ['install'];
}

/**
 * Create a file with placeholder content unless it already exists
 */
function ensureFile(
  filePath: string,
  content: string,
  warning: string,
  createdFiles: string[]
): (dryRun: boolean) => StepOutcome {
  return (dryRun) => {
    const name = path.basename(filePath);

    if (existsSync(filePath)) {
      console.log(chalk.dim(`   ✓ ${name} already exists, leaving it unchanged`));
      return { success: true };
    }

    if (dryRun) {
      console.log(chalk.dim(`   Would create ${name}`));
      return { success: true };
    }

    writeFileSync(filePath, content, { flag: 'wx' });
    createdFiles.push(filePath);
    console.log(`   Created ${name}`);
    console.log(chalk.yellow(`⚠️  ${warning}`));
    return { success: true };
  };
}

// ============================================================================
// Provisioning
// ============================================================================

export function provision(options: ProvisionOptions): ProvisionResult {
  const projectPath = path.resolve(options.projectPath);
  const serviceName = options.serviceName ?? DEFAULT_SERVICE_NAME;
  const packages = options.packages ?? DEFAULT_PACKAGES;
  const isRoot = options.isRoot ?? isRootUser();
  const nodeBinary = options.nodeBinary ?? process.execPath;
  const unitPath = unitFilePath(serviceName);
  const createdFiles: string[] = [];

  const unit = renderServiceUnit({
    description: 'Telegram GIF Bot',
    user: options.user ?? invokingUser(),
    projectPath,
    nodeBinary,
  });

  const steps: DeployStep<ProvisionStepName>[] = [];

  if (!options.skipPackages) {
    steps.push(
      {
        name: 'update-packages',
        title: '📦 Updating package lists...',
        command: privileged('apt-get', ['update'], isRoot),
      },
      {
        name: 'install-packages',
        title: '📦 Installing system packages...',
        command: privileged('apt-get', ['install', '-y', ...packages], isRoot),
      }
    );
  }

  const whitelistFile = resolveWhitelistFile(projectPath);
  const whitelistName = path.relative(projectPath, whitelistFile);

  steps.push(
    {
      name: 'install-dependencies',
      title: '📚 Installing npm dependencies...',
      command: { cmd: 'npm', args: installCommand(projectPath), cwd: projectPath },
    },
    {
      name: 'build',
      title: '🔨 Building...',
      command: { cmd: 'npm', args: ['run', 'build'], cwd: projectPath },
    },
    {
      name: 'env-file',
      title: `⚙️  Checking ${ENV_FILE_NAME}...`,
      action: ensureFile(
        path.join(projectPath, ENV_FILE_NAME),
        DEFAULT_ENV_CONTENT,
        `Please edit ${ENV_FILE_NAME} and add your bot token`,
        createdFiles
      ),
    },
    {
      name: 'whitelist-file',
      title: `⚙️  Checking ${whitelistName}...`,
      action: ensureFile(
        whitelistFile,
        DEFAULT_WHITELIST_CONTENT,
        `Please edit ${whitelistName} and add authorized user IDs`,
        createdFiles
      ),
    },
    {
      name: 'write-unit',
      title: `Writing ${unitPath}`,
      command: { ...privileged('tee', [unitPath], isRoot), input: unit, silent: true },
      preview: unit,
    },
    {
      name: 'daemon-reload',
      title: 'Reloading systemd',
      command: { ...privileged('systemctl', ['daemon-reload'], isRoot), silent: true },
    },
    {
      name: 'enable-service',
      title: `Enabling ${serviceName} at boot`,
      command: { ...privileged('systemctl', ['enable', serviceName], isRoot), silent: true },
    },
    {
      name: 'start-service',
      title: `Starting ${serviceName}`,
      command: { ...privileged('systemctl', ['start', serviceName], isRoot), silent: true },
    }
  );

  console.log(
    chalk.bold(
      options.dryRun
        ? '\n🚀 Deployment plan for Telegram GIF Bot (dry run, nothing is changed)'
        : '\n🚀 Deploying Telegram GIF Bot...'
    )
  );
  console.log(chalk.dim(`   Project: ${projectPath}`));

  const outcome = runSteps(steps, { dryRun: options.dryRun });

  const result: ProvisionResult = {
    success: outcome.success,
    steps: outcome.completed,
    createdFiles,
    unitPath,
    unit,
    failedStep: outcome.failedStep,
    error: outcome.error,
  };

  if (outcome.success && !options.dryRun) {
    printNextSteps(serviceName);
  }

  return result;
}

function printNextSteps(serviceName: string): void {
  console.log(chalk.green('\n✅ Deployment complete!'));
  console.log('📋 Commands:');
  console.log(`  Status: sudo systemctl status ${serviceName}`);
  console.log(`  Logs:   sudo journalctl -u ${serviceName} -f`);
  console.log(`  Stop:   sudo systemctl stop ${serviceName}`);
}
