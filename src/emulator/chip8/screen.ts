/**
 * CHIP-8 display: 64 × 32 monochrome pixels
 *
 * Pixels are stored row-major, one byte each:
 *   offset = y × 64 + x
 *
 * Sprites are 8 pixels wide and 1-15 rows tall; each byte is one row with
 * the most significant bit leftmost. Every set bit toggles the pixel under
 * it (XOR). The sprite origin wraps around the screen, but the sprite body
 * does not: rows and columns that run off the right or bottom edge are
 * clipped.
 */

export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

export type FrameBuffer = ReadonlyArray<ReadonlyArray<boolean>>;

export class Chip8Screen {
  private pixels: Uint8Array = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);

  clear(): void {
    this.pixels.fill(0);
  }

  /**
   * XOR a sprite onto the screen at (x, y).
   * Returns true if any pixel that was on got turned off (collision).
   */
  drawSprite(x: number, y: number, rows: ArrayLike<number>): boolean {
    const originX = x % SCREEN_WIDTH;
    const originY = y % SCREEN_HEIGHT;
    let collision = false;

    for (let row = 0; row < rows.length; row++) {
      const py = originY + row;
      if (py >= SCREEN_HEIGHT) break;

      const bits = rows[row];
      for (let bit = 0; bit < 8; bit++) {
        const px = originX + bit;
        if (px >= SCREEN_WIDTH) break;
        if ((bits & (0x80 >> bit)) === 0) continue;

        const offset = py * SCREEN_WIDTH + px;
        if (this.pixels[offset]) collision = true;
        this.pixels[offset] ^= 1;
      }
    }

    return collision;
  }

  isPixelOn(x: number, y: number): boolean {
    if (x < 0 || x >= SCREEN_WIDTH || y < 0 || y >= SCREEN_HEIGHT) return false;
    return this.pixels[y * SCREEN_WIDTH + x] === 1;
  }

  /** Snapshot of the screen as SCREEN_HEIGHT rows of SCREEN_WIDTH pixels. */
  getFrameBuffer(): FrameBuffer {
    const rows: boolean[][] = [];
    for (let y = 0; y < SCREEN_HEIGHT; y++) {
      const offset = y * SCREEN_WIDTH;
      rows.push(Array.from(this.pixels.subarray(offset, offset + SCREEN_WIDTH), (p) => p === 1));
    }
    return rows;
  }

  /** Render the screen as text, one line per row. */
  toText(on = '█', off = ' '): string {
    const lines: string[] = [];
    for (let y = 0; y < SCREEN_HEIGHT; y++) {
      let line = '';
      for (let x = 0; x < SCREEN_WIDTH; x++) {
        line += this.pixels[y * SCREEN_WIDTH + x] ? on : off;
      }
      lines.push(line);
    }
    return lines.join('\n');
  }

  reset(): void {
    this.pixels.fill(0);
  }
}
