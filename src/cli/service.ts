import chalk from 'chalk';
import { runCommand } from '../deploy/run-command.js';
import { isRootUser, privileged } from '../deploy/steps.js';

// ============================================================================
// Service Manager
// ============================================================================

export interface ServiceStatus {
  /** systemd ActiveState: active, inactive, failed, activating, ... */
  activeState: string;
  /** UnitFileState: enabled, disabled, not-found, ... */
  unitFileState: string;
  pid?: number | undefined;
  since?: Date | undefined;
  restarts?: number | undefined;
}

const SHOW_PROPERTIES = ['ActiveState', 'UnitFileState', 'MainPID', 'ActiveEnterTimestamp', 'NRestarts'];

/**
 * systemd prints `Wed 2024-05-01 12:00:00 UTC`. Zones other than UTC are
 * read as local time.
 */
function parseTimestamp(value: string | undefined): Date | undefined {
  const match = value?.match(/(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})(?: (\S+))?$/);
  if (!match) return undefined;

  const [, date, time, zone] = match;
  const utc = zone === 'UTC' || zone === 'GMT';
  return new Date(`${date}T${time}${utc ? 'Z' : ''}`);
}

/**
 * Parse `systemctl show` KEY=VALUE output
 */
export function parseSystemctlShow(output: string): ServiceStatus {
  const props = new Map<string, string>();
  for (const line of output.split('\n')) {
    const eq = line.indexOf('=');
    if (eq > 0) props.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
  }

  const pid = Number(props.get('MainPID') ?? '0');
  const restarts = props.get('NRestarts');
  const since = parseTimestamp(props.get('ActiveEnterTimestamp'));

  return {
    activeState: props.get('ActiveState') || 'unknown',
    unitFileState: props.get('UnitFileState') || 'unknown',
    pid: pid > 0 ? pid : undefined,
    since: since && !Number.isNaN(since.getTime()) ? since : undefined,
    restarts: restarts !== undefined && restarts !== '' ? Number(restarts) : undefined,
  };
}

/**
 * Get service status
 */
export function getServiceStatus(serviceName: string): ServiceStatus | null {
  const result = runCommand(
    'systemctl',
    ['show', serviceName, `--property=${SHOW_PROPERTIES.join(',')}`],
    { silent: true }
  );
  if (!result.success) return null;
  return parseSystemctlShow(result.output);
}

export function formatElapsed(startedAt: Date, now: Date = new Date()): string {
  const ms = now.getTime() - startedAt.getTime();
  const seconds = Math.max(0, Math.floor(ms / 1000));
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days}d ${hours % 24}h`;
  } else if (hours > 0) {
    return `${hours}h ${minutes % 60}m`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${seconds}s`;
  }
}

/**
 * Print service status in a formatted way
 */
export function printServiceStatus(serviceName: string): boolean {
  const status = getServiceStatus(serviceName);

  if (!status) {
    console.log(chalk.red(`Could not query systemd for ${serviceName}.`));
    return false;
  }

  if (status.unitFileState === 'not-found' || status.unitFileState === 'unknown') {
    console.log(chalk.dim('Service: ') + chalk.yellow('Not installed'));
    console.log(chalk.dim('  Run: gifbot deploy'));
    return false;
  }

  const running = status.activeState === 'active';
  const state = running
    ? chalk.green('Running')
    : status.activeState === 'failed'
      ? chalk.red('Failed')
      : chalk.yellow(status.activeState);

  console.log(chalk.dim('Service: ') + `${serviceName} ` + state);
  console.log(chalk.dim('  Boot: ') + (status.unitFileState === 'enabled' ? 'enabled' : status.unitFileState));
  if (status.pid) console.log(chalk.dim('  PID: ') + status.pid);
  if (running && status.since) console.log(chalk.dim('  Running for: ') + formatElapsed(status.since));
  if (status.restarts !== undefined) console.log(chalk.dim('  Restarts: ') + status.restarts);
  console.log(chalk.dim('  Logs: ') + `journalctl -u ${serviceName}`);
  return running;
}

/**
 * Show the service journal
 */
export function tailServiceLogs(
  serviceName: string,
  options: { lines?: number | undefined; follow?: boolean | undefined } = {}
): boolean {
  const { lines = 50, follow = false } = options;
  const args = ['-u', serviceName, '-n', String(lines), '--no-pager'];
  if (follow) args.push('-f');

  const { cmd, args: fullArgs } = privileged('journalctl', args, isRootUser());
  return runCommand(cmd, fullArgs).success;
}

/**
 * stop | restart through systemctl
 */
export function controlService(
  action: 'stop' | 'restart',
  serviceName: string
): { success: boolean; error?: string | undefined } {
  const { cmd, args } = privileged('systemctl', [action, serviceName], isRootUser());
  const result = runCommand(cmd, args, { silent: true });
  if (result.success) return { success: true };
  return { success: false, error: result.output.trim() || `systemctl ${action} exited with status ${result.status ?? 'unknown'}` };
}
