/**
 * Start Command
 *
 * Runs the bot in the foreground. This is what the systemd unit executes.
 *
 * @module cli/commands/start
 */

import path from 'node:path';
import chalk from 'chalk';
import { config as loadDotenv } from 'dotenv';
import { ConfigError, loadBotConfig } from '../../core/config.js';
import { ENV_FILE_NAME } from '../../core/env-file.js';
import { startBot } from '../../telegram/index.js';

export async function startCommand(options: { path: string }): Promise<void> {
  const projectPath = path.resolve(options.path);

  // Values already in the environment (systemd EnvironmentFile=) win over .env
  loadDotenv({ path: path.join(projectPath, ENV_FILE_NAME) });

  try {
    const config = loadBotConfig(process.env, projectPath);
    await startBot(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(error.message));
      process.exit(1);
    }
    throw error;
  }
}
