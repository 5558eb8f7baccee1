import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LANGUAGE_CODES, LANGUAGES, pickLanguage, translateText } from '../translator.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('pickLanguage', () => {
  it('maps the random value onto the language list', () => {
    expect(pickLanguage(() => 0)).toBe('es');
    expect(pickLanguage(() => 0.5)).toBe('hi');
    expect(pickLanguage(() => 0.999999)).toBe('he');
  });

  it('names every language', () => {
    expect(LANGUAGE_CODES).toHaveLength(20);
    for (const code of LANGUAGE_CODES) {
      expect(LANGUAGES[code]).toBeTruthy();
    }
  });
});

describe('translateText', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.mocked(console.log).mockRestore();
    vi.mocked(console.error).mockRestore();
  });

  it('translates into the picked language', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([[['hola', 'hello', null, null, 1]], null, 'en']));

    const result = await translateText('hello', { random: () => 0 });

    expect(result).toEqual({ text: 'hola', language: 'Spanish', code: 'es' });
    expect(fetchMock).toHaveBeenCalledWith(
      'https://translate.googleapis.com/translate_a/single?client=gtx&sl=auto&tl=es&dt=t&q=hello',
      expect.objectContaining({ signal: expect.any(AbortSignal) })
    );
  });

  it('joins multi-sentence responses', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse([
        [
          ['Bonjour. ', 'Hello. '],
          ['Ça va ?', 'How are you?'],
        ],
      ])
    );

    const result = await translateText('Hello. How are you?', { random: () => 0.06 });

    expect(result).toEqual({ text: 'Bonjour. Ça va ?', language: 'French', code: 'fr' });
  });

  it('encodes the query', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([[['x', 'y']]]));

    await translateText('a&b c', { random: () => 0 });

    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://translate.googleapis.com/translate_a/single?client=gtx&sl=auto&tl=es&dt=t&q=a%26b+c'
    );
  });

  it('falls back to the original text on HTTP errors', async () => {
    fetchMock.mockResolvedValueOnce(new Response('busy', { status: 429 }));

    expect(await translateText('hello', { random: () => 0 })).toEqual({
      text: 'hello',
      language: 'English',
      code: 'en',
    });
    expect(console.error).toHaveBeenCalledWith('Translation API error: 429');
  });

  it('falls back on an unexpected body', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'nope' }));

    expect(await translateText('hello')).toEqual({ text: 'hello', language: 'English', code: 'en' });
  });

  it('falls back on an empty translation', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([[['   ', 'hello']]]));

    expect(await translateText('hello')).toEqual({ text: 'hello', language: 'English', code: 'en' });
  });

  it('falls back when the request fails', async () => {
    fetchMock.mockRejectedValueOnce(new Error('The operation was aborted due to timeout'));

    expect(await translateText('hello', { timeoutMs: 5 })).toEqual({
      text: 'hello',
      language: 'English',
      code: 'en',
    });
  });
});
