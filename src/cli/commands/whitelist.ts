/**
 * Whitelist CLI Command
 *
 * Usage:
 *   gifbot whitelist list              - List whitelisted user IDs
 *   gifbot whitelist add <id>          - Add a user ID
 *   gifbot whitelist remove <id>       - Remove a user ID
 *
 * The running bot picks up changes without a restart.
 *
 * @module cli/commands/whitelist
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import type { Command } from 'commander';
import chalk from 'chalk';
import { confirm } from '@inquirer/prompts';
import { resolveWhitelistFile } from '../../core/config.js';
import {
  DEFAULT_WHITELIST_CONTENT,
  WhitelistStore,
  addToWhitelist,
  parseWhitelist,
  removeFromWhitelist,
} from '../../core/whitelist.js';
import { PROJECT_ROOT } from '../updater.js';

interface WhitelistOptions {
  path: string;
}

export function parseTelegramId(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const id = Number(trimmed);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

function whitelistPath(options: WhitelistOptions): string {
  return resolveWhitelistFile(path.resolve(options.path));
}

function readWhitelist(filePath: string): string {
  return existsSync(filePath) ? readFileSync(filePath, 'utf-8') : DEFAULT_WHITELIST_CONTENT;
}

function requireId(value: string): number {
  const id = parseTelegramId(value);
  if (id === null) {
    console.error(chalk.red(`Invalid Telegram ID: ${value}`));
    process.exit(1);
  }
  return id;
}

/**
 * List whitelisted users
 */
export function listCommand(options: WhitelistOptions): void {
  const filePath = whitelistPath(options);

  if (!existsSync(filePath)) {
    console.log(chalk.yellow(`\nNo whitelist file at ${filePath}.`));
    console.log(chalk.dim('Create one with: gifbot whitelist add <telegram-id>'));
    return;
  }

  const store = new WhitelistStore(filePath);
  store.refresh();
  const ids = store.list();

  if (ids.length === 0) {
    console.log(chalk.yellow('\nWhitelist is empty. Every user is denied.'));
  } else {
    console.log(chalk.bold(`\nWhitelisted users (${ids.length}):\n`));
    for (const id of ids) {
      console.log(`  ${id}`);
    }
  }

  for (const entry of store.invalidEntries) {
    console.log(chalk.red(`  line ${entry.line}: invalid entry '${entry.text}' (ignored)`));
  }
  console.log();
}

/**
 * Add a user ID
 */
export function addCommand(telegramId: string, options: WhitelistOptions & { comment?: string | undefined }): void {
  const id = requireId(telegramId);
  const filePath = whitelistPath(options);
  const content = readWhitelist(filePath);
  const updated = addToWhitelist(content, id, options.comment);

  if (updated === content && existsSync(filePath)) {
    console.log(chalk.yellow(`${id} is already whitelisted.`));
    return;
  }

  writeFileSync(filePath, updated);
  console.log(chalk.green(`✓ Added ${id}`));
}

/**
 * Remove a user ID
 */
export async function removeCommand(
  telegramId: string,
  options: WhitelistOptions & { force?: boolean | undefined }
): Promise<void> {
  const id = requireId(telegramId);
  const filePath = whitelistPath(options);
  const content = readWhitelist(filePath);

  if (!parseWhitelist(content).ids.has(id)) {
    console.error(chalk.red(`${id} is not whitelisted.`));
    process.exit(1);
  }

  if (!options.force) {
    const confirmed = await confirm({ message: `Remove ${id} from the whitelist?`, default: false });
    if (!confirmed) {
      console.log(chalk.dim('Cancelled.'));
      return;
    }
  }

  writeFileSync(filePath, removeFromWhitelist(content, id));
  console.log(chalk.green(`✓ Removed ${id}`));
}

/**
 * Register whitelist command
 */
export function registerWhitelistCommand(program: Command): void {
  const whitelist = program
    .command('whitelist')
    .description('Manage the users allowed to use the bot')
    .option('-p, --path <path>', 'Project path', PROJECT_ROOT);

  const parentOptions = (cmd: Command): WhitelistOptions => {
    const opts: { path?: unknown } = cmd.parent?.opts() ?? {};
    return { path: typeof opts.path === 'string' ? opts.path : PROJECT_ROOT };
  };

  whitelist
    .command('list')
    .description('List whitelisted user IDs')
    .action((_opts: unknown, cmd: Command) => {
      listCommand(parentOptions(cmd));
    });

  whitelist
    .command('add <telegram-id>')
    .description('Add a user ID')
    .option('-c, --comment <text>', 'Note kept next to the ID')
    .action((telegramId: string, opts: { comment?: string }, cmd: Command) => {
      addCommand(telegramId, { ...parentOptions(cmd), comment: opts.comment });
    });

  whitelist
    .command('remove <telegram-id>')
    .description('Remove a user ID')
    .option('-f, --force', 'Skip confirmation')
    .action(async (telegramId: string, opts: { force?: boolean }, cmd: Command) => {
      await removeCommand(telegramId, { ...parentOptions(cmd), force: opts.force });
    });

  whitelist.action((opts: WhitelistOptions) => {
    listCommand(opts);
  });
}
