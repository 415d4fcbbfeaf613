import { describe, it, expect } from 'vitest';
import { CHIP8_SOFTWARE_CATALOG, findSoftware } from '../software-catalog';

describe('CHIP8_SOFTWARE_CATALOG', () => {
  it('should have unique ids', () => {
    const ids = CHIP8_SOFTWARE_CATALOG.map((e) => e.id);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it('should load every entry at $200 with a matching size', () => {
    for (const entry of CHIP8_SOFTWARE_CATALOG) {
      expect(entry.regions[0].startAddress).toBe(0x200);
      expect(entry.sizeBytes).toBe(entry.regions.reduce((n, r) => n + r.data.length, 0));
    }
  });

  it('should describe the address range', () => {
    expect(findSoftware('hex-digits')?.addressRange).toBe('$200-$213');
    expect(findSoftware('beep')?.addressRange).toBe('$200-$205');
  });

  it('should store words big-endian', () => {
    const beep = findSoftware('beep');
    expect(Array.from(beep?.regions[0].data ?? [])).toEqual([0x60, 0x1e, 0xf0, 0x18, 0x12, 0x04]);
  });

  it('should return undefined for an unknown id', () => {
    expect(findSoftware('pong')).toBeUndefined();
  });
});
