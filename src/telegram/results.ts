/**
 * Inline Query Results
 *
 * Builders for the GIF results the bot answers inline queries with.
 *
 * @module telegram/results
 */

import { nanoid } from 'nanoid';
import type { InlineQueryResultGif } from 'grammy/types';

export const HELP_GIF_URL = 'https://media.giphy.com/media/l0HlBO7eyXzSZkJri/giphy.gif';
export const ERROR_GIF_URL = 'https://media.giphy.com/media/l2JehQ2GitHGdVG9y/giphy.gif';

/** Cache times, in seconds, passed to answerInlineQuery */
export const CACHE_TIME = {
  help: 1,
  translation: 0,
  error: 1,
} as const;

export function createHelpResult(botUsername: string): InlineQueryResultGif {
  return {
    type: 'gif',
    id: nanoid(),
    gif_url: HELP_GIF_URL,
    thumbnail_url: HELP_GIF_URL,
    title: '💡 How to use',
    caption: 'Type some text to translate and create a GIF!',
    input_message_content: {
      message_text:
        `💡 Type some text after @${botUsername} to translate it to a random language ` +
        'and create an animated GIF!',
    },
  };
}

export function createTranslationResult(
  gifUrl: string,
  query: string,
  translatedText: string,
  language: string
): InlineQueryResultGif {
  return {
    type: 'gif',
    id: nanoid(),
    gif_url: gifUrl,
    thumbnail_url: gifUrl,
    title: `🌍 ${translatedText}`,
    caption: `🔤 Original: ${query}\n🌍 ${language}: ${translatedText}`,
  };
}

export function createErrorResult(message: string): InlineQueryResultGif {
  return {
    type: 'gif',
    id: nanoid(),
    gif_url: ERROR_GIF_URL,
    thumbnail_url: ERROR_GIF_URL,
    title: '❌ Translation failed',
    caption: `Sorry, ${message}. Please try again.`,
  };
}
