import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import chalk from 'chalk';
import { runCommand } from '../deploy/run-command.js';
import { installCommand } from '../deploy/provisioner.js';
import { isRootUser, privileged, runSteps, type DeployStep, type StepsResult } from '../deploy/steps.js';
import { DEFAULT_SERVICE_NAME } from '../deploy/systemd-unit.js';

// ============================================================================
// Version Management
// ============================================================================

/** Project root, two levels above this file in both src/ and dist/ */
export const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

export type UpdateStepName = 'pull' | 'install-dependencies' | 'build' | 'restart-service';

/**
 * Get the current installed version
 */
export function getCurrentVersion(projectPath: string = PROJECT_ROOT): string {
  const pkgPath = path.join(projectPath, 'package.json');
  if (!existsSync(pkgPath)) return '0.0.0';

  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * Get the current git commit hash
 */
export function getGitCommit(projectPath: string = PROJECT_ROOT): string {
  const result = runCommand('git', ['rev-parse', '--short', 'HEAD'], { silent: true, cwd: projectPath });
  return result.success ? result.output.trim() : 'unknown';
}

/**
 * Pull the latest code, reinstall, rebuild and restart the service
 */
export function updateInstallation(options: {
  projectPath: string;
  serviceName?: string | undefined;
  restart?: boolean | undefined;
  isRoot?: boolean | undefined;
}): StepsResult<UpdateStepName> {
  const projectPath = path.resolve(options.projectPath);
  const serviceName = options.serviceName ?? DEFAULT_SERVICE_NAME;
  const isRoot = options.isRoot ?? isRootUser();
  const previousVersion = getCurrentVersion(projectPath);
  const previousCommit = getGitCommit(projectPath);

  console.log(chalk.bold('\n🔄 Updating Telegram GIF Bot...'));
  console.log(chalk.dim(`   Current: v${previousVersion} (${previousCommit})`));

  const steps: DeployStep<UpdateStepName>[] = [
    {
      name: 'pull',
      title: '⬇️  Pulling latest changes...',
      command: { cmd: 'git', args: ['pull', '--ff-only'], cwd: projectPath },
    },
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
  ];

  if (options.restart !== false) {
    steps.push({
      name: 'restart-service',
      title: `Restarting ${serviceName}`,
      command: { ...privileged('systemctl', ['restart', serviceName], isRoot), silent: true },
    });
  }

  const result = runSteps(steps);

  if (result.success) {
    const newVersion = getCurrentVersion(projectPath);
    console.log(chalk.green('\n✓ Updated successfully!'));
    console.log(chalk.dim(`  v${previousVersion} (${previousCommit}) → v${newVersion} (${getGitCommit(projectPath)})`));
  }

  return result;
}

/**
 * Print version information
 */
export function printVersionDetails(): void {
  console.log(chalk.bold('\n📦 Telegram GIF Bot Version Info\n'));
  console.log(chalk.dim('Version:    ') + getCurrentVersion());
  console.log(chalk.dim('Commit:     ') + getGitCommit());
  console.log(chalk.dim('Install:    ') + PROJECT_ROOT);
  console.log(chalk.dim('Node.js:    ') + process.version);
  console.log();
}
