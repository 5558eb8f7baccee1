import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runCommand } from '../../deploy/run-command.js';
import { getCurrentVersion, updateInstallation } from '../updater.js';

vi.mock('../../deploy/run-command.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../deploy/run-command.js')>();
  return { ...actual, runCommand: vi.fn() };
});

vi.mock('ora', () => ({
  default: vi.fn(() => ({
    start() {
      return this;
    },
    succeed: vi.fn(),
    fail: vi.fn(),
  })),
}));

const mockRunCommand = vi.mocked(runCommand);

describe('updater', () => {
  let projectPath: string;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    mockRunCommand.mockImplementation((cmd, args) =>
      cmd === 'git' && args[0] === 'rev-parse'
        ? { success: true, status: 0, output: 'abc1234\n' }
        : { success: true, status: 0, output: '' }
    );
    projectPath = mkdtempSync(path.join(os.tmpdir(), 'gifbot-update-'));
    writeFileSync(path.join(projectPath, 'package.json'), JSON.stringify({ name: 'pi-gif-bot', version: '1.2.3' }));
  });

  afterEach(() => {
    vi.mocked(console.log).mockRestore();
    vi.mocked(console.error).mockRestore();
    rmSync(projectPath, { recursive: true, force: true });
  });

  describe('getCurrentVersion', () => {
    it('reads the package version', () => {
      expect(getCurrentVersion(projectPath)).toBe('1.2.3');
    });

    it('falls back when package.json is missing or broken', () => {
      expect(getCurrentVersion(path.join(projectPath, 'missing'))).toBe('0.0.0');

      writeFileSync(path.join(projectPath, 'package.json'), '{ not json');
      expect(getCurrentVersion(projectPath)).toBe('0.0.0');
    });
  });

  describe('updateInstallation', () => {
    it('pulls, reinstalls, rebuilds and restarts', () => {
      const result = updateInstallation({ projectPath, isRoot: false });

      expect(result).toEqual({
        success: true,
        completed: ['pull', 'install-dependencies', 'build', 'restart-service'],
      });

      const steps = mockRunCommand.mock.calls
        .map(([cmd, args]) => [cmd, ...args].join(' '))
        .filter((line) => line !== 'git rev-parse --short HEAD');
      expect(steps).toEqual([
        'git pull --ff-only',
        'npm install',
        'npm run build',
        'sudo systemctl restart telegram-gif-bot',
      ]);
    });

    it('can leave the service alone', () => {
      const result = updateInstallation({ projectPath, isRoot: true, restart: false });

      expect(result.completed).toEqual(['pull', 'install-dependencies', 'build']);
      expect(mockRunCommand.mock.calls.some(([cmd]) => cmd === 'systemctl')).toBe(false);
    });

    it('stops when the pull fails', () => {
      mockRunCommand.mockImplementation((cmd, args) =>
        cmd === 'git' && args[0] === 'pull'
          ? { success: false, status: 1, output: '' }
          : { success: true, status: 0, output: 'abc1234\n' }
      );

      const result = updateInstallation({ projectPath, isRoot: false });

      expect(result.success).toBe(false);
      expect(result.failedStep).toBe('pull');
      expect(mockRunCommand.mock.calls.some(([cmd]) => cmd === 'npm')).toBe(false);
    });
  });
});
