/**
 * CHIP-8 system configuration
 *
 * Quirk presets model the interpreters most ROMs were written against:
 *   default     V-register copy on shift, VF on I overflow (Amiga-style)
 *   cosmac-vip  V-register copy on shift, I advanced by FX55/FX65
 *   chip-48     shifts in place, I untouched, no overflow flag
 */

import {
  DEFAULT_INSTRUCTIONS_PER_SECOND,
  DEFAULT_QUIRKS,
  FONT_SIZE,
  Chip8Error,
  type Chip8Quirks,
  type RandomSource,
} from '@/cpu/chip8/types';

export const QUIRK_PRESETS = {
  default: DEFAULT_QUIRKS,
  'cosmac-vip': Object.freeze({
    assignBeforeShift: true,
    setFlagOnIndexOverflow: false,
    modifyIndexOnDumpOrLoad: true,
  }),
  'chip-48': Object.freeze({
    assignBeforeShift: false,
    setFlagOnIndexOverflow: false,
    modifyIndexOnDumpOrLoad: false,
  }),
} satisfies Record<string, Chip8Quirks>;

export type QuirkPresetName = keyof typeof QUIRK_PRESETS;

export interface Chip8Config {
  /** Preset name, or individual switches layered over the default preset. */
  quirks: QuirkPresetName | Partial<Chip8Quirks>;
  instructionsPerSecond: number;
  /** Frame rate assumed when a frame is run without an explicit duration. */
  framesPerSecond: number;
  /** 80 bytes of glyph data; the built-in font when omitted. */
  font?: Uint8Array;
  /** Source for CXNN; Math.random when omitted. */
  random?: RandomSource;
}

export interface ResolvedConfig {
  quirks: Chip8Quirks;
  instructionsPerSecond: number;
  framesPerSecond: number;
  font?: Uint8Array;
  random?: RandomSource;
}

export const DEFAULT_CONFIG: Chip8Config = {
  quirks: 'default',
  instructionsPerSecond: DEFAULT_INSTRUCTIONS_PER_SECOND,
  framesPerSecond: 60,
};

export class ConfigError extends Chip8Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isPresetName(name: string): name is QuirkPresetName {
  return Object.prototype.hasOwnProperty.call(QUIRK_PRESETS, name);
}

function resolveQuirks(quirks: QuirkPresetName | Partial<Chip8Quirks>): Chip8Quirks {
  if (typeof quirks === 'string') {
    if (!isPresetName(quirks)) {
      throw new ConfigError(
        `Unknown quirk preset "${String(quirks)}" (expected one of: ${Object.keys(QUIRK_PRESETS).join(', ')})`,
      );
    }
    return QUIRK_PRESETS[quirks];
  }
  return Object.freeze({ ...DEFAULT_QUIRKS, ...quirks });
}

function requirePositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got ${value}`);
  }
  return value;
}

/** Merge over DEFAULT_CONFIG, expand the quirk preset and validate. */
export function resolveConfig(overrides: Partial<Chip8Config> = {}): ResolvedConfig {
  const merged: Chip8Config = { ...DEFAULT_CONFIG, ...overrides };

  if (merged.font !== undefined && merged.font.length !== FONT_SIZE) {
    throw new ConfigError(`font must be ${FONT_SIZE} bytes, got ${merged.font.length}`);
  }

  return {
    quirks: resolveQuirks(merged.quirks),
    instructionsPerSecond: requirePositive('instructionsPerSecond', merged.instructionsPerSecond),
    framesPerSecond: requirePositive('framesPerSecond', merged.framesPerSecond),
    font: merged.font,
    random: merged.random,
  };
}
