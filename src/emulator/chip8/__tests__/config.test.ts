import { describe, it, expect } from 'vitest';
import { ConfigError, DEFAULT_CONFIG, QUIRK_PRESETS, resolveConfig } from '../config';
import { Chip8Error } from '@/cpu/chip8/types';

describe('resolveConfig', () => {
  it('should fall back to the defaults', () => {
    const config = resolveConfig();
    expect(config.instructionsPerSecond).toBe(700);
    expect(config.framesPerSecond).toBe(60);
    expect(config.quirks).toEqual({
      assignBeforeShift: true,
      setFlagOnIndexOverflow: true,
      modifyIndexOnDumpOrLoad: false,
    });
    expect(config.font).toBeUndefined();
    expect(DEFAULT_CONFIG.quirks).toBe('default');
  });

  it('should expand a preset name', () => {
    expect(resolveConfig({ quirks: 'cosmac-vip' }).quirks).toEqual({
      assignBeforeShift: true,
      setFlagOnIndexOverflow: false,
      modifyIndexOnDumpOrLoad: true,
    });
    expect(resolveConfig({ quirks: 'chip-48' }).quirks).toBe(QUIRK_PRESETS['chip-48']);
  });

  it('should layer individual switches over the default preset', () => {
    expect(resolveConfig({ quirks: { modifyIndexOnDumpOrLoad: true } }).quirks).toEqual({
      assignBeforeShift: true,
      setFlagOnIndexOverflow: true,
      modifyIndexOnDumpOrLoad: true,
    });
  });

  it('should reject an unknown preset', () => {
    const overrides = JSON.parse('{"quirks":"super-chip"}');
    expect(() => resolveConfig(overrides)).toThrow(
      'Unknown quirk preset "super-chip" (expected one of: default, cosmac-vip, chip-48)',
    );
  });

  it('should reject non-positive rates', () => {
    expect(() => resolveConfig({ instructionsPerSecond: 0 })).toThrow(
      'instructionsPerSecond must be a positive number, got 0',
    );
    expect(() => resolveConfig({ framesPerSecond: -30 })).toThrow(
      'framesPerSecond must be a positive number, got -30',
    );
    expect(() => resolveConfig({ framesPerSecond: Number.NaN })).toThrow(ConfigError);
  });

  it('should reject a font of the wrong size', () => {
    expect(() => resolveConfig({ font: new Uint8Array(40) })).toThrow('font must be 80 bytes, got 40');
  });

  it('should raise errors that are machine errors', () => {
    let error: unknown;
    try {
      resolveConfig({ instructionsPerSecond: -1 });
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toBeInstanceOf(Chip8Error);
  });

  it('should pass the random source through', () => {
    const random = () => 0.25;
    expect(resolveConfig({ random }).random).toBe(random);
  });
});
