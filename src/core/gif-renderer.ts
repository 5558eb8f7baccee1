/**
 * Animated GIF Renderer
 *
 * Draws the translated text on a white canvas with a hue that cycles from
 * frame to frame, plus a black "Language: ..." caption underneath.
 *
 * Text is rasterised with sharp (Pango markup), frames are reduced to a
 * 64-colour palette and encoded with omggif.
 *
 * @module core/gif-renderer
 */

import sharp from 'sharp';
import { GifWriter } from 'omggif';
import { nanoid } from 'nanoid';
import { BLACK, framePalette, hsvToRgb, packRgb, quantize, toHex, type Rgb } from './color.js';

// ============================================================================
// Settings
// ============================================================================

export interface GifOptions {
  width: number;
  height: number;
  frames: number;
  /** Delay between frames in milliseconds */
  frameDelayMs: number;
  fontSize: number;
  /** Characters per line before wrapping */
  wrapWidth: number;
  maxLines: number;
}

export const DEFAULT_GIF_OPTIONS: GifOptions = {
  width: 500,
  height: 300,
  frames: 20,
  frameDelayMs: 100,
  fontSize: 24,
  wrapWidth: 25,
  maxLines: 7,
};

const FONT_FAMILY = 'DejaVu Sans';
const CAPTION_GAP = 20;
const VERTICAL_OFFSET = 20;

export interface RenderedGif {
  data: Buffer;
  filename: string;
}

export interface RawFrame {
  pixels: Uint8Array;
  channels: number;
  palette: Rgb[];
}

// ============================================================================
// Text layout
// ============================================================================

/**
 * Greedy word wrap. Runs of whitespace collapse to one space; words longer
 * than the width are split into width-sized pieces.
 */
export function wrapText(text: string, width: number): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = '';

  for (let word of words) {
    if (word.length > width) {
      if (current) {
        lines.push(current);
        current = '';
      }
      while (word.length > width) {
        lines.push(word.slice(0, width));
        word = word.slice(width);
      }
    }

    if (!word) continue;

    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current += ' ' + word;
    } else {
      lines.push(current);
      current = word;
    }
  }

  if (current) lines.push(current);
  return lines;
}

/**
 * Keep at most `maxLines`, marking the cut with an ellipsis
 */
export function limitLines(lines: string[], maxLines: number, width: number): string[] {
  if (lines.length <= maxLines) return lines;

  const kept = lines.slice(0, maxLines);
  const last = kept[kept.length - 1] ?? '';
  kept[kept.length - 1] = (last.length >= width ? last.slice(0, width - 1) : last) + '…';
  return kept;
}

export function escapeMarkup(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function hueForFrame(frame: number, frames: number): number {
  return Math.floor((frame * 360) / frames) % 360;
}

// ============================================================================
// Rasterising
// ============================================================================

interface TextImage {
  data: Buffer;
  width: number;
  height: number;
}

async function renderTextImage(text: string, color: Rgb, fontSize: number): Promise<TextImage> {
  const { data, info } = await sharp({
    text: {
      text: `<span foreground="${toHex(color)}">${escapeMarkup(text)}</span>`,
      font: `${FONT_FAMILY} ${fontSize}`,
      // 72 dpi makes the point size equal the pixel size
      dpi: 72,
      rgba: true,
      align: 'left',
    },
  })
    .png()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height };
}

/**
 * Crop an overlay so it fits inside the canvas
 */
async function fitOverlay(image: TextImage, width: number, height: number): Promise<TextImage> {
  if (image.width <= width && image.height <= height) return image;

  const cropWidth = Math.min(image.width, width);
  const cropHeight = Math.min(image.height, height);
  const data = await sharp(image.data)
    .extract({ left: 0, top: 0, width: cropWidth, height: cropHeight })
    .png()
    .toBuffer();
  return { data, width: cropWidth, height: cropHeight };
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

async function renderFrame(
  lines: string[],
  caption: string,
  ink: Rgb,
  options: GifOptions
): Promise<RawFrame> {
  const { width, height, fontSize } = options;

  const text = await fitOverlay(await renderTextImage(lines.join('\n'), ink, fontSize), width, height);
  const label = await fitOverlay(await renderTextImage(caption, BLACK, fontSize), width, height);

  const x = clamp(Math.floor((width - text.width) / 2), 0, width - text.width);
  const y = clamp(Math.floor((height - text.height) / 2) - VERTICAL_OFFSET, 0, height - text.height);
  const labelX = clamp(x, 0, width - label.width);
  const labelY = clamp(y + text.height + CAPTION_GAP, 0, height - label.height);

  const { data, info } = await sharp({
    create: { width, height, channels: 3, background: { r: 255, g: 255, b: 255 } },
  })
    .composite([
      { input: text.data, left: x, top: y },
      { input: label.data, left: labelX, top: labelY },
    ])
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { pixels: data, channels: info.channels, palette: framePalette(ink) };
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Encode frames into a looping GIF. Each frame carries its own palette.
 */
export function encodeGif(frames: RawFrame[], width: number, height: number, frameDelayMs: number): Buffer {
  // LZW output stays well under two bytes per pixel at 64 colours
  const buffer = Buffer.alloc(width * height * frames.length * 2 + 4096);
  const writer = new GifWriter(buffer, width, height, { loop: 0 });
  const delay = Math.round(frameDelayMs / 10);

  for (const frame of frames) {
    writer.addFrame(0, 0, width, height, quantize(frame.pixels, frame.channels, frame.palette), {
      palette: frame.palette.map(packRgb),
      delay,
    });
  }

  return buffer.subarray(0, writer.end());
}

/**
 * Render the full animation for a translation
 */
export async function createGif(
  text: string,
  language: string,
  overrides: Partial<GifOptions> = {}
): Promise<RenderedGif> {
  const options: GifOptions = { ...DEFAULT_GIF_OPTIONS, ...overrides };
  const lines = limitLines(wrapText(text, options.wrapWidth), options.maxLines, options.wrapWidth);
  const caption = `Language: ${language}`;

  const frames: RawFrame[] = [];
  for (let i = 0; i < options.frames; i++) {
    const ink = hsvToRgb(hueForFrame(i, options.frames), 100, 80);
    frames.push(await renderFrame(lines.length > 0 ? lines : [' '], caption, ink, options));
  }

  const data = encodeGif(frames, options.width, options.height, options.frameDelayMs);
  console.log(`Created GIF with ${frames.length} frames`);

  return { data, filename: `translation_${nanoid(8)}.gif` };
}
