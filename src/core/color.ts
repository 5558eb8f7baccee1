/**
 * Colour helpers for GIF frames
 *
 * @module core/color
 */

export type Rgb = readonly [r: number, g: number, b: number];

export const WHITE: Rgb = [255, 255, 255];
export const BLACK: Rgb = [0, 0, 0];

/**
 * HSV to RGB. Hue in degrees, saturation and value in percent.
 * Channels are truncated, not rounded.
 */
export function hsvToRgb(h: number, s: number, v: number): Rgb {
  const hue = h / 360;
  const sat = s / 100;
  const val = v / 100;

  if (sat === 0) {
    const gray = Math.trunc(val * 255);
    return [gray, gray, gray];
  }

  const sector = Math.trunc(hue * 6);
  const f = hue * 6 - sector;
  const p = val * (1 - sat);
  const q = val * (1 - sat * f);
  const t = val * (1 - sat * (1 - f));

  let rgb: [number, number, number];
  switch (sector % 6) {
    case 0:
      rgb = [val, t, p];
      break;
    case 1:
      rgb = [q, val, p];
      break;
    case 2:
      rgb = [p, val, t];
      break;
    case 3:
      rgb = [p, q, val];
      break;
    case 4:
      rgb = [t, p, val];
      break;
    default:
      rgb = [val, p, q];
  }

  return [Math.trunc(rgb[0] * 255), Math.trunc(rgb[1] * 255), Math.trunc(rgb[2] * 255)];
}

export function toHex([r, g, b]: Rgb): string {
  return '#' + [r, g, b].map((c) => c.toString(16).padStart(2, '0')).join('');
}

export function packRgb([r, g, b]: Rgb): number {
  return (r << 16) | (g << 8) | b;
}

// ============================================================================
// Palette
// ============================================================================

/** Shades per ramp; two ramps make a 64-colour GIF palette */
export const RAMP_STEPS = 32;

/**
 * Linear blend from `from` to `to` in `steps` entries, both ends included.
 * Anti-aliased text on a flat background only ever produces these blends.
 */
export function colorRamp(from: Rgb, to: Rgb, steps: number = RAMP_STEPS): Rgb[] {
  return Array.from({ length: steps }, (_, i) => {
    const k = steps === 1 ? 1 : i / (steps - 1);
    return [
      Math.round(from[0] + (to[0] - from[0]) * k),
      Math.round(from[1] + (to[1] - from[1]) * k),
      Math.round(from[2] + (to[2] - from[2]) * k),
    ] as const;
  });
}

/**
 * Palette for a frame with text in `ink` and a black caption on white
 */
export function framePalette(ink: Rgb): Rgb[] {
  return [...colorRamp(WHITE, ink), ...colorRamp(WHITE, BLACK)];
}

/**
 * Map raw pixels (RGB or RGBA, `channels` bytes each) to palette indices,
 * picking the nearest entry by squared RGB distance.
 */
export function quantize(pixels: Uint8Array, channels: number, palette: readonly Rgb[]): number[] {
  const cache = new Map<number, number>();
  const count = Math.floor(pixels.length / channels);
  const indexed = new Array<number>(count);

  for (let i = 0; i < count; i++) {
    const offset = i * channels;
    const r = pixels[offset] ?? 0;
    const g = pixels[offset + 1] ?? 0;
    const b = pixels[offset + 2] ?? 0;
    const key = (r << 16) | (g << 8) | b;

    const cached = cache.get(key);
    if (cached !== undefined) {
      indexed[i] = cached;
      continue;
    }

    let best = 0;
    let bestDistance = Infinity;
    for (let index = 0; index < palette.length; index++) {
      const entry = palette[index];
      if (!entry) continue;
      const distance = (entry[0] - r) ** 2 + (entry[1] - g) ** 2 + (entry[2] - b) ** 2;
      if (distance < bestDistance) {
        bestDistance = distance;
        best = index;
      }
    }
    cache.set(key, best);
    indexed[i] = best;
  }

  return indexed;
}
