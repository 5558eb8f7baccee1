import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DEFAULT_UPLOAD_URL, extractUploadUrl, isValidUrl, uploadGif } from '../gif-host.js';

describe('extractUploadUrl', () => {
  it('reads the files array', () => {
    expect(extractUploadUrl('{"success":true,"files":[{"hash":"x","url":"https://a.uguu.se/abc.gif"}]}')).toBe(
      'https://a.uguu.se/abc.gif'
    );
  });

  it('reads a bare object and a bare array', () => {
    expect(extractUploadUrl('{"url":"https://files.example.test/a.gif"}')).toBe('https://files.example.test/a.gif');
    expect(extractUploadUrl('[{"url":"https://files.example.test/b.gif"}]')).toBe('https://files.example.test/b.gif');
  });

  it('accepts a plain-text URL', () => {
    expect(extractUploadUrl('https://files.example.test/c.gif\n')).toBe('https://files.example.test/c.gif');
  });

  it('returns null for anything else', () => {
    expect(extractUploadUrl('{"error":"too large"}')).toBeNull();
    expect(extractUploadUrl('{"files":[]}')).toBeNull();
    expect(extractUploadUrl('<html>bad gateway</html>')).toBeNull();
  });
});

describe('isValidUrl', () => {
  it('requires an http(s) URL of some length', () => {
    expect(isValidUrl('https://a.uguu.se/abc.gif')).toBe(true);
    expect(isValidUrl('http://x.io')).toBe(true);
    expect(isValidUrl('https://')).toBe(false);
    expect(isValidUrl('ftp://files.example.test/a.gif')).toBe(false);
  });
});

describe('uploadGif', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const bytes = new Uint8Array([0x47, 0x49, 0x46, 0x38, 0x39, 0x61]);

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

  it('posts the GIF as multipart form data and returns its URL', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response('{"success":true,"files":[{"url":"https://a.uguu.se/xyz.gif"}]}', { status: 200 })
    );

    const url = await uploadGif(bytes, 'translation_abc.gif');

    expect(url).toBe('https://a.uguu.se/xyz.gif');
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe(DEFAULT_UPLOAD_URL);
    expect(init?.method).toBe('POST');

    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      const file = body.get('files[]');
      expect(file).not.toBeNull();
      expect(typeof file).not.toBe('string');
      if (file !== null && typeof file !== 'string') {
        expect(file.name).toBe('translation_abc.gif');
        expect(file.type).toBe('image/gif');
        expect(file.size).toBe(bytes.length);
      }
    }
  });

  it('uses the configured endpoint', async () => {
    fetchMock.mockResolvedValueOnce(new Response('https://files.example.test/1.gif', { status: 200 }));

    await uploadGif(bytes, 'a.gif', { uploadUrl: 'https://files.example.test/upload' });

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://files.example.test/upload');
  });

  it('returns null on HTTP errors', async () => {
    fetchMock.mockResolvedValueOnce(new Response('file too large', { status: 413 }));

    expect(await uploadGif(bytes, 'a.gif')).toBeNull();
    expect(console.error).toHaveBeenCalledWith('GIF upload error 413: file too large');
  });

  it('returns null on an unrecognised response', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"ok":false}', { status: 200 }));

    expect(await uploadGif(bytes, 'a.gif')).toBeNull();
  });

  it('returns null when the request fails', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    expect(await uploadGif(bytes, 'a.gif')).toBeNull();
  });
});
