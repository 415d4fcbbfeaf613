import { describe, it, expect } from 'vitest';
import { DEFAULT_FONT, DEFAULT_FONT_NAME, parseFont } from '../font';

function glyphs(count: number, height = 5): number[][] {
  return Array.from({ length: count }, () => new Array(height).fill(0xf0));
}

describe('DEFAULT_FONT', () => {
  it('should hold 16 glyphs of 5 bytes', () => {
    expect(DEFAULT_FONT.length).toBe(80);
    expect(DEFAULT_FONT_NAME).toBe('CHIP-48 hexadecimal font');
  });

  it('should start with glyph 0 and end with glyph F', () => {
    expect(Array.from(DEFAULT_FONT.subarray(0, 5))).toEqual([0xf0, 0x90, 0x90, 0x90, 0xf0]);
    expect(Array.from(DEFAULT_FONT.subarray(75, 80))).toEqual([0xf0, 0x80, 0xf0, 0x80, 0x80]);
  });

  it('should draw glyph 1 as a narrow column', () => {
    expect(Array.from(DEFAULT_FONT.subarray(5, 10))).toEqual([0x20, 0x60, 0x20, 0x20, 0x70]);
  });
});

describe('parseFont', () => {
  it('should flatten glyph rows in order', () => {
    const description = { glyphs: glyphs(16) };
    description.glyphs[1][4] = 0x11;
    const bytes = parseFont(description);
    expect(bytes.length).toBe(80);
    expect(bytes[9]).toBe(0x11);
    expect(bytes[10]).toBe(0xf0);
  });

  it('should reject a value without glyphs', () => {
    expect(() => parseFont(null)).toThrow('Font description must be an object with a "glyphs" array');
    expect(() => parseFont({ name: 'x' })).toThrow('Font description must be an object with a "glyphs" array');
  });

  it('should reject the wrong glyph count', () => {
    expect(() => parseFont({ glyphs: glyphs(15) })).toThrow('Font must define 16 glyphs');
  });

  it('should reject a glyph of the wrong height', () => {
    const description = { glyphs: glyphs(16) };
    description.glyphs[10] = [0xf0, 0x90];
    expect(() => parseFont(description)).toThrow('Glyph A must have 5 rows');
  });

  it('should reject rows that are not bytes', () => {
    const description = { glyphs: glyphs(16) };
    description.glyphs[2][3] = 256;
    expect(() => parseFont(description)).toThrow('Glyph 2 row 3 is not a byte: 256');
  });
});
