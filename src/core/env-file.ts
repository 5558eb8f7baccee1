/**
 * Credential File
 *
 * Reads and edits the `.env` file that holds the bot token. The same file is
 * handed to systemd through `EnvironmentFile=`.
 *
 * @module core/env-file
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'dotenv';

export const ENV_FILE_NAME = '.env';
export const TOKEN_PLACEHOLDER = 'your_bot_token_here';
export const DEFAULT_ENV_CONTENT = `BOT_TOKEN=${TOKEN_PLACEHOLDER}\n`;

/**
 * Read key/value pairs from an env file; a missing file reads as empty.
 */
export function readEnvFile(filePath: string): Record<string, string> {
  if (!existsSync(filePath)) {
    return {};
  }
  return parse(readFileSync(filePath, 'utf-8'));
}

/**
 * Set `key=value`, replacing the first existing assignment in place or
 * appending a new line. Other lines, comments included, are left alone.
 */
export function setEnvValue(content: string, key: string, value: string): string {
  const lines = content.length > 0 ? content.replace(/\n$/, '').split('\n') : [];
  const pattern = new RegExp(`^\\s*(?:export\\s+)?${escapeRegExp(key)}\\s*=`);
  const index = lines.findIndex((line) => pattern.test(line));

  if (index === -1) {
    lines.push(`${key}=${value}`);
  } else {
    lines[index] = `${key}=${value}`;
  }

  return lines.join('\n') + '\n';
}

export function isPlaceholderToken(token: string | undefined): boolean {
  return !token || token.trim() === '' || token.trim() === TOKEN_PLACEHOLDER;
}

/**
 * Telegram bot tokens look like `123456789:AA...`
 */
export function isValidTokenFormat(token: string): boolean {
  return /^\d+:[A-Za-z0-9_-]+$/.test(token.trim());
}

/**
 * Shorten a token for display
 */
export function maskToken(token: string): string {
  if (token.length <= 14) return '***';
  return token.substring(0, 10) + '...' + token.slice(-4);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
