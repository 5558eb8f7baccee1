/**
 * Telegram Bot Module
 *
 * @module telegram
 */

export { startBot, stopBot, createBot, getHelpText } from './bot.js';
export * from './inline.js';
export * from './results.js';
export * from './security.js';
