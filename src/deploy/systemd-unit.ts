/**
 * systemd Unit Rendering
 *
 * @module deploy/systemd-unit
 */

import path from 'node:path';

export const DEFAULT_SERVICE_NAME = 'telegram-gif-bot';
export const SYSTEMD_UNIT_DIR = '/etc/systemd/system';
export const RESTART_DELAY_SECONDS = 10;

/** Entry point produced by `npm run build`, relative to the project root */
export const BUILT_ENTRY_POINT = path.join('dist', 'cli', 'index.js');

export interface ServiceUnitSpec {
  description: string;
  user: string;
  projectPath: string;
  /** Absolute path of the Node.js binary the service runs under */
  nodeBinary: string;
}

export function unitFilePath(serviceName: string): string {
  return path.posix.join(SYSTEMD_UNIT_DIR, `${serviceName}.service`);
}

/**
 * PATH for the service: project-local binaries first, then the directory of
 * the pinned Node.js binary, then the system defaults.
 */
export function servicePath(projectPath: string, nodeBinary: string): string {
  return [
    path.join(projectPath, 'node_modules', '.bin'),
    path.dirname(nodeBinary),
    '/usr/local/bin',
    '/usr/bin',
    '/bin',
  ]
    .filter((entry, index, all) => all.indexOf(entry) === index)
    .join(':');
}

export function renderServiceUnit(spec: ServiceUnitSpec): string {
  const { projectPath, nodeBinary } = spec;
  const entryPoint = path.join(projectPath, BUILT_ENTRY_POINT);

  return `[Unit]
Description=${spec.description}
After=network.target

[Service]
Type=simple
User=${spec.user}
WorkingDirectory=${projectPath}
Environment=PATH=${servicePath(projectPath, nodeBinary)}
ExecStart=${nodeBinary} ${entryPoint} start
Restart=always
RestartSec=${RESTART_DELAY_SECONDS}
EnvironmentFile=${path.join(projectPath, '.env')}

[Install]
WantedBy=multi-user.target
`;
}
