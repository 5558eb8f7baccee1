/**
 * Inline Query Handling
 *
 * `@bot some text` → translate → render GIF → upload → answer.
 *
 * Rendering and uploading take seconds, so the work runs detached from the
 * update loop and is bounded by a timeout under Telegram's 30 s deadline.
 *
 * @module telegram/inline
 */

import type { Context } from 'grammy';
import type { InlineQueryResultGif } from 'grammy/types';
import type { BotConfig } from '../core/config.js';
import { translateText } from '../core/translator.js';
import { createGif, type RenderedGif } from '../core/gif-renderer.js';
import { isValidUrl, uploadGif } from '../core/gif-host.js';
import {
  CACHE_TIME,
  createErrorResult,
  createHelpResult,
  createTranslationResult,
} from './results.js';

export type InlineConfig = Pick<
  BotConfig,
  'inlineTimeoutMs' | 'translateTimeoutMs' | 'uploadTimeoutMs' | 'uploadUrl'
>;

// ============================================================================
// Timeout
// ============================================================================

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Produce the results for one query. Failures inside the pipeline become an
 * error result rather than a rejection.
 */
export async function buildTranslationResults(
  query: string,
  config: InlineConfig
): Promise<InlineQueryResultGif[]> {
  try {
    console.log(`Processing query: '${query}'`);

    if (!query.trim()) {
      console.warn('Empty query received');
      return [];
    }

    const translation = await translateText(query, { timeoutMs: config.translateTimeoutMs });

    let gif: RenderedGif;
    try {
      gif = await createGif(translation.text, translation.language);
    } catch (error) {
      console.error('Error creating GIF:', error);
      return [createErrorResult('Failed to create GIF')];
    }

    const gifUrl = await uploadGif(gif.data, gif.filename, {
      uploadUrl: config.uploadUrl,
      timeoutMs: config.uploadTimeoutMs,
    });

    if (!gifUrl || !isValidUrl(gifUrl)) {
      console.error('Failed to upload GIF or invalid URL');
      return [createErrorResult('Failed to upload GIF')];
    }

    return [createTranslationResult(gifUrl, query, translation.text, translation.language)];
  } catch (error) {
    console.error('Error building translation result:', error);
    return [createErrorResult('Translation error occurred')];
  }
}

/**
 * Run the pipeline for a query and answer it. Never rejects.
 */
export async function processInlineQuery(
  ctx: Context,
  query: string,
  config: InlineConfig
): Promise<void> {
  try {
    const results = await withTimeout(buildTranslationResults(query, config), config.inlineTimeoutMs);

    if (results.length > 0) {
      console.log(`Sending ${results.length} result(s) for query: '${query}'`);
      await ctx.answerInlineQuery(results, { cache_time: CACHE_TIME.translation });
    } else {
      console.warn(`No results for query: '${query}', sending error result`);
      await ctx.answerInlineQuery([createErrorResult('No results found')], {
        cache_time: CACHE_TIME.error,
      });
    }
  } catch (error) {
    const timedOut = error instanceof TimeoutError;
    console.error(
      timedOut ? `Processing timed out for query: '${query}'` : 'Error processing inline query:',
      timedOut ? '' : error
    );

    try {
      await ctx.answerInlineQuery(
        [createErrorResult(timedOut ? 'Processing timed out' : 'An error occurred')],
        { cache_time: CACHE_TIME.error }
      );
    } catch (answerError) {
      console.error('Failed to answer inline query:', answerError);
    }
  }
}

/**
 * Inline query entry point
 */
export async function handleInlineQuery(ctx: Context, config: InlineConfig): Promise<void> {
  const query = ctx.inlineQuery?.query.trim() ?? '';
  console.log(`Received inline query: '${query}'`);

  if (!query) {
    await ctx.answerInlineQuery([createHelpResult(ctx.me.username)], {
      cache_time: CACHE_TIME.help,
    });
    return;
  }

  // Detached so the next updates are not held up by this one
  processInlineQuery(ctx, query, config).catch((error: unknown) => {
    console.error('Unhandled inline query failure:', error);
  });
}
