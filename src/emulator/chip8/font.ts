/**
 * Built-in hexadecimal font
 *
 * 16 glyphs (0-F), 5 rows each, 4 pixels wide in the high nibble of every
 * row byte. FX29 points I at glyph VX inside the 80 bytes installed at $050.
 */

import chip48 from './fonts/chip48.json';
import { FONT_GLYPH_COUNT, FONT_GLYPH_HEIGHT, FONT_SIZE } from '@/cpu/chip8/types';

function isByte(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xff;
}

/**
 * Flatten a `{ glyphs: number[16][5] }` font description into 80 bytes.
 * Throws on wrong glyph count, wrong glyph height or values outside 0-255.
 */
export function parseFont(json: unknown): Uint8Array {
  if (typeof json !== 'object' || json === null || !('glyphs' in json)) {
    throw new Error('Font description must be an object with a "glyphs" array');
  }
  const { glyphs } = json;
  if (!Array.isArray(glyphs) || glyphs.length !== FONT_GLYPH_COUNT) {
    throw new Error(`Font must define ${FONT_GLYPH_COUNT} glyphs`);
  }

  const bytes = new Uint8Array(FONT_SIZE);
  glyphs.forEach((glyph: unknown, i) => {
    if (!Array.isArray(glyph) || glyph.length !== FONT_GLYPH_HEIGHT) {
      throw new Error(`Glyph ${i.toString(16).toUpperCase()} must have ${FONT_GLYPH_HEIGHT} rows`);
    }
    glyph.forEach((row: unknown, r) => {
      if (!isByte(row)) {
        throw new Error(`Glyph ${i.toString(16).toUpperCase()} row ${r} is not a byte: ${String(row)}`);
      }
      bytes[i * FONT_GLYPH_HEIGHT + r] = row;
    });
  });
  return bytes;
}

export const DEFAULT_FONT: Uint8Array = parseFont(chip48);

export const DEFAULT_FONT_NAME: string = chip48.name;
