/**
 * Bot Configuration
 *
 * Validates the process environment (populated from `.env`, either by dotenv
 * or by systemd's `EnvironmentFile=`) into a typed config object.
 *
 * @module core/config
 */

import path from 'node:path';
import { z } from 'zod';
import { ENV_FILE_NAME, isPlaceholderToken, readEnvFile } from './env-file.js';
import { DEFAULT_UPLOAD_URL } from './gif-host.js';
import { WHITELIST_FILE_NAME } from './whitelist.js';

// ============================================================================
// Schema
// ============================================================================

const durationMs = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const BotEnvSchema = z.object({
  BOT_TOKEN: z
    .string({ required_error: `BOT_TOKEN is not set. Edit ${ENV_FILE_NAME} and add your bot token.` })
    .refine((token) => !isPlaceholderToken(token), {
      message: `BOT_TOKEN still holds the placeholder. Edit ${ENV_FILE_NAME} and add your bot token.`,
    }),
  WHITELIST_FILE: z.string().min(1).default(WHITELIST_FILE_NAME),
  INLINE_TIMEOUT_MS: durationMs(25_000),
  TRANSLATE_TIMEOUT_MS: durationMs(10_000),
  UPLOAD_TIMEOUT_MS: durationMs(30_000),
  UPLOAD_URL: z.string().url().default(DEFAULT_UPLOAD_URL),
});

export interface BotConfig {
  botToken: string;
  /** Absolute path of the whitelist file */
  whitelistFile: string;
  inlineTimeoutMs: number;
  translateTimeoutMs: number;
  uploadTimeoutMs: number;
  uploadUrl: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Loading
// ============================================================================

export function loadBotConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): BotConfig {
  const parsed = BotEnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const key = issue.path.join('.');
        return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
      })
    );
  }

  const data = parsed.data;
  return {
    botToken: data.BOT_TOKEN.trim(),
    whitelistFile: path.resolve(cwd, data.WHITELIST_FILE),
    inlineTimeoutMs: data.INLINE_TIMEOUT_MS,
    translateTimeoutMs: data.TRANSLATE_TIMEOUT_MS,
    uploadTimeoutMs: data.UPLOAD_TIMEOUT_MS,
    uploadUrl: data.UPLOAD_URL,
  };
}

/**
 * Whitelist file the bot will read for a project: `WHITELIST_FILE` from the
 * project's .env, relative to the project directory.
 */
export function resolveWhitelistFile(projectPath: string): string {
  const configured = readEnvFile(path.join(projectPath, ENV_FILE_NAME)).WHITELIST_FILE?.trim();
  return path.resolve(projectPath, configured || WHITELIST_FILE_NAME);
}
