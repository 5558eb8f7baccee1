/**
 * Setup Command
 *
 * Interactive first-run configuration: bot token into .env, first user into
 * .whitelist.
 *
 * @module cli/commands/setup
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import { confirm, input } from '@inquirer/prompts';
import {
  DEFAULT_ENV_CONTENT,
  ENV_FILE_NAME,
  isPlaceholderToken,
  isValidTokenFormat,
  maskToken,
  readEnvFile,
  setEnvValue,
} from '../../core/env-file.js';
import { resolveWhitelistFile } from '../../core/config.js';
import { DEFAULT_WHITELIST_CONTENT, addToWhitelist, parseWhitelist } from '../../core/whitelist.js';
import { parseTelegramId } from './whitelist.js';

export async function setupCommand(options: { path: string }): Promise<void> {
  const projectPath = path.resolve(options.path);
  const envPath = path.join(projectPath, ENV_FILE_NAME);

  console.log(chalk.bold('\nTelegram GIF Bot Setup\n'));

  const current = readEnvFile(envPath).BOT_TOKEN;
  let writeToken = true;

  if (current !== undefined && !isPlaceholderToken(current)) {
    console.log(chalk.yellow(`A bot token is already configured: ${maskToken(current)}`));
    writeToken = await confirm({
      message: 'Overwrite existing token?',
      default: false,
    });
  }

  if (writeToken) {
    console.log(chalk.dim('To get a bot token:'));
    console.log(chalk.dim('1. Open Telegram and message @BotFather'));
    console.log(chalk.dim('2. Send /newbot and follow the prompts'));
    console.log(chalk.dim('3. Send /setinline to enable inline mode'));
    console.log(chalk.dim('4. Copy the token provided\n'));

    const token = await input({
      message: 'Enter bot token:',
      validate: (value) => {
        if (!value.trim()) return 'Token is required';
        if (!isValidTokenFormat(value)) return 'Invalid token format';
        return true;
      },
    });

    const envContent = existsSync(envPath) ? readFileSync(envPath, 'utf-8') : DEFAULT_ENV_CONTENT;
    writeFileSync(envPath, setEnvValue(envContent, 'BOT_TOKEN', token.trim()), { mode: 0o600 });
    console.log(chalk.green(`\n✓ Bot token saved to ${ENV_FILE_NAME}`));
  }

  const whitelistPath = resolveWhitelistFile(projectPath);
  const whitelistContent = existsSync(whitelistPath)
    ? readFileSync(whitelistPath, 'utf-8')
    : DEFAULT_WHITELIST_CONTENT;
  const listed = parseWhitelist(whitelistContent).ids.size;

  const addSelf = await confirm({
    message: listed > 0 ? `Whitelist has ${listed} user(s). Add another?` : 'Add yourself to the whitelist?',
    default: listed === 0,
  });

  if (addSelf) {
    console.log(chalk.dim('\nTo find your Telegram ID:'));
    console.log(chalk.dim('1. Message @userinfobot on Telegram'));
    console.log(chalk.dim('2. It will reply with your ID\n'));

    const idInput = await input({
      message: 'Telegram ID:',
      validate: (value) => (parseTelegramId(value) === null ? 'Invalid Telegram ID' : true),
    });
    const name = await input({ message: 'Name (kept as a comment):', default: '' });

    const id = parseTelegramId(idInput);
    if (id !== null) {
      writeFileSync(whitelistPath, addToWhitelist(whitelistContent, id, name));
      console.log(chalk.green(`\n✓ Added ${id} to ${path.relative(projectPath, whitelistPath)}`));
    }
  } else if (!existsSync(whitelistPath)) {
    writeFileSync(whitelistPath, whitelistContent);
  }

  console.log(chalk.dim('\nDeploy the service with: gifbot deploy'));
  console.log(chalk.dim('Or run it in this terminal with: gifbot start'));
}
