/**
 * Temporary GIF Hosting
 *
 * Telegram inline results need a public URL, so rendered GIFs are uploaded
 * to uguu.se before the query is answered.
 *
 * @module core/gif-host
 */

import { z } from 'zod';

export const DEFAULT_UPLOAD_URL = 'https://uguu.se/upload';

export interface UploadOptions {
  uploadUrl?: string | undefined;
  timeoutMs?: number | undefined;
}

const UrlEntrySchema = z.object({ url: z.string().min(1) });

const UploadResponseSchema = z.union([
  z.object({ files: z.array(UrlEntrySchema).min(1) }),
  UrlEntrySchema,
  z.array(UrlEntrySchema).min(1),
]);

/**
 * Pull the file URL out of an upload response body. The host has answered
 * with an object holding `files`, a bare object, an array, and plain text.
 */
export function extractUploadUrl(body: string): string | null {
  let json: unknown = undefined;
  try {
    json = JSON.parse(body);
  } catch {
    json = undefined;
  }

  if (json !== undefined) {
    const parsed = UploadResponseSchema.safeParse(json);
    if (parsed.success) {
      const data = parsed.data;
      if (Array.isArray(data)) return data[0]?.url ?? null;
      if ('files' in data) return data.files[0]?.url ?? null;
      return data.url;
    }
  }

  const text = body.trim();
  return text.startsWith('http') ? text : null;
}

export function isValidUrl(url: string): boolean {
  return /^https?:\/\//.test(url) && url.length > 10;
}

/**
 * Upload GIF bytes. Returns the public URL, or null when the upload failed.
 */
export async function uploadGif(
  data: Uint8Array,
  filename: string,
  options: UploadOptions = {}
): Promise<string | null> {
  const { uploadUrl = DEFAULT_UPLOAD_URL, timeoutMs = 30_000 } = options;

  const form = new FormData();
  form.append('files[]', new Blob([data], { type: 'image/gif' }), filename);

  try {
    const response = await fetch(uploadUrl, {
      method: 'POST',
      body: form,
      signal: AbortSignal.timeout(timeoutMs),
    });
    const body = await response.text();

    if (response.status !== 200) {
      console.error(`GIF upload error ${response.status}: ${body.slice(0, 500)}`);
      return null;
    }

    const url = extractUploadUrl(body);
    if (!url) {
      console.error(`Unexpected upload response format: ${body.slice(0, 500)}`);
      return null;
    }

    console.log(`Uploaded GIF: ${url}`);
    return url;
  } catch (error) {
    console.error(`Error uploading GIF: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}
