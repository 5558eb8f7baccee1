/**
 * Telegram Bot Setup
 *
 * Main bot entry point using grammy. Serves inline queries for whitelisted
 * users over long polling.
 *
 * @module telegram/bot
 */

import { Bot } from 'grammy';
import type { BotConfig } from '../core/config.js';
import { WhitelistStore } from '../core/whitelist.js';
import { whitelistMiddleware } from './security.js';
import { handleInlineQuery } from './inline.js';

let bot: Bot | null = null;

export function getHelpText(botUsername: string): string {
  return [
    '👋 I turn text into translated, animated GIFs.',
    '',
    `In any chat, type @${botUsername} followed by some text.`,
    'I translate it into a random language and send back a GIF.',
  ].join('\n');
}

/**
 * Load the whitelist and report problems with it
 */
function openWhitelist(filePath: string): WhitelistStore {
  const whitelist = new WhitelistStore(filePath);
  whitelist.refresh();

  for (const entry of whitelist.invalidEntries) {
    console.warn(`Ignoring invalid whitelist entry on line ${entry.line}: '${entry.text}'`);
  }

  if (whitelist.size === 0) {
    console.warn(`Whitelist ${filePath} is empty: every user will be denied`);
  } else {
    console.log(`Loaded ${whitelist.size} whitelisted user(s) from ${filePath}`);
  }

  return whitelist;
}

/**
 * Build the bot with all middleware and handlers registered
 */
export function createBot(config: BotConfig, whitelist: WhitelistStore): Bot {
  const instance = new Bot(config.botToken);

  instance.catch((err) => {
    console.error(`Bot error while handling update ${err.ctx.update.update_id}:`, err.error);
  });

  instance.use(whitelistMiddleware(whitelist));

  instance.command(['start', 'help'], async (ctx) => {
    await ctx.reply(getHelpText(ctx.me.username));
  });

  instance.on('inline_query', async (ctx) => {
    await handleInlineQuery(ctx, config);
  });

  return instance;
}

/**
 * Start the Telegram bot. Resolves once polling stops.
 */
export async function startBot(config: BotConfig): Promise<void> {
  const whitelist = openWhitelist(config.whitelistFile);
  bot = createBot(config, whitelist);

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, stopping bot...`);
    stopBot().catch((error: unknown) => {
      console.error('Error stopping bot:', error);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  console.log('Starting Translation GIF Bot...');

  await bot.start({
    drop_pending_updates: true,
    allowed_updates: ['message', 'inline_query'],
    onStart: (botInfo) => {
      console.log(`Bot started: @${botInfo.username}`);
    },
  });
}

/**
 * Stop the Telegram bot
 */
export async function stopBot(): Promise<void> {
  if (bot) {
    const running = bot;
    bot = null;
    await running.stop();
    console.log('Telegram bot stopped');
  }
}
