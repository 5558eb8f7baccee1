/**
 * Random-Language Translator
 *
 * Translates text into a randomly picked language through the public Google
 * Translate `gtx` endpoint. Never throws: any failure returns the input
 * unchanged, labelled as English.
 *
 * @module core/translator
 */

import { z } from 'zod';

export const TRANSLATE_URL = 'https://translate.googleapis.com/translate_a/single';

export const LANGUAGE_CODES = [
  'es', 'fr', 'de', 'it', 'pt', 'ru', 'ja', 'ko', 'zh', 'ar',
  'hi', 'tr', 'pl', 'nl', 'sv', 'da', 'no', 'fi', 'el', 'he',
] as const;

export type LanguageCode = (typeof LANGUAGE_CODES)[number];

export const LANGUAGES: Record<LanguageCode, string> = {
  es: 'Spanish',
  fr: 'French',
  de: 'German',
  it: 'Italian',
  pt: 'Portuguese',
  ru: 'Russian',
  ja: 'Japanese',
  ko: 'Korean',
  zh: 'Chinese',
  ar: 'Arabic',
  hi: 'Hindi',
  tr: 'Turkish',
  pl: 'Polish',
  nl: 'Dutch',
  sv: 'Swedish',
  da: 'Danish',
  no: 'Norwegian',
  fi: 'Finnish',
  el: 'Greek',
  he: 'Hebrew',
};

export interface Translation {
  text: string;
  language: string;
  code: string;
}

export interface TranslateOptions {
  timeoutMs?: number | undefined;
  /** Source of randomness in [0, 1), for picking the target language */
  random?: (() => number) | undefined;
}

// Response is a nested array; the first element lists [translated, original, ...] segments
const GtxResponseSchema = z
  .tuple([z.array(z.tuple([z.string().nullable()]).rest(z.unknown())).min(1)])
  .rest(z.unknown());

export function pickLanguage(random: () => number = Math.random): LanguageCode {
  const index = Math.min(Math.floor(random() * LANGUAGE_CODES.length), LANGUAGE_CODES.length - 1);
  return LANGUAGE_CODES[index] ?? LANGUAGE_CODES[0];
}

function fallback(text: string): Translation {
  return { text, language: 'English', code: 'en' };
}

export async function translateText(text: string, options: TranslateOptions = {}): Promise<Translation> {
  const { timeoutMs = 10_000, random = Math.random } = options;
  const code = pickLanguage(random);
  const language = LANGUAGES[code];

  const params = new URLSearchParams({
    client: 'gtx',
    sl: 'auto',
    tl: code,
    dt: 't',
    q: text,
  });

  try {
    const response = await fetch(`${TRANSLATE_URL}?${params.toString()}`, {
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (response.status !== 200) {
      console.error(`Translation API error: ${response.status}`);
      return fallback(text);
    }

    const parsed = GtxResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      console.error('Translation API returned an unexpected response shape');
      return fallback(text);
    }

    const translated = parsed.data[0]
      .map((segment) => segment[0] ?? '')
      .join('')
      .trim();

    if (!translated) {
      return fallback(text);
    }

    console.log(`Translated '${text}' to ${language}: '${translated}'`);
    return { text: translated, language, code };
  } catch (error) {
    console.error(`Translation error: ${error instanceof Error ? error.message : String(error)}`);
    return fallback(text);
  }
}
