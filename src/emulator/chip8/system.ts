/**
 * CHIP-8 System Integration
 *
 * Wires the CHIP-8 machine to its font, configuration and host input into a
 * complete emulator that a front end drives one frame at a time:
 *
 *   1. Host key events call keyDown()/keyUp() at any time
 *   2. runFrame() hands the machine a fresh keypad snapshot of the keys held
 *      right now, ticks the timers and runs the frame's instructions
 *   3. The host pulls getFrameBuffer() and isPlayingSound() to present
 *
 * Audio, rendering and host keyboard mapping stay with the front end.
 */

import { Chip8 } from '@/cpu/chip8/chip8';
import { PROGRAM_START_ADDRESS, type TraceCallback } from '@/cpu/chip8/types';
import { resolveConfig, type Chip8Config, type ResolvedConfig } from './config';
import { DEFAULT_FONT } from './font';
import { Chip8Keypad, KEY_COUNT } from './keypad';
import type { FrameBuffer } from './screen';
import type { ParsedProgram, SoftwareEntry, MemoryRegion } from './software-library';

export class Chip8System {
  readonly cpu: Chip8;
  readonly config: ResolvedConfig;

  /** Keys the host is holding; copied into the machine each frame. */
  private readonly held = new Chip8Keypad();

  constructor(overrides: Partial<Chip8Config> = {}) {
    this.config = resolveConfig(overrides);
    this.cpu = new Chip8({
      quirks: this.config.quirks,
      instructionsPerSecond: this.config.instructionsPerSecond,
      random: this.config.random,
    });
    this.cpu.loadFont(this.font);
  }

  /** Build a system using the entry's quirk preset (if any) and load it. */
  static forSoftware(entry: SoftwareEntry, overrides: Partial<Chip8Config> = {}): Chip8System {
    const system = new Chip8System({
      ...overrides,
      quirks: entry.quirks ?? overrides.quirks ?? 'default',
    });
    system.loadSoftware(entry);
    return system;
  }

  private get font(): Uint8Array {
    return this.config.font ?? DEFAULT_FONT;
  }

  /** Frame duration used when runFrame() is called without one. */
  get frameDurationMs(): number {
    return 1000 / this.config.framesPerSecond;
  }

  /** Copy raw program bytes into memory (normally at $200). */
  loadProgram(data: Uint8Array, address: number = PROGRAM_START_ADDRESS): void {
    this.cpu.loadBytes(data, address);
  }

  loadParsedProgram(program: ParsedProgram): void {
    this.loadRegions(program.regions);
  }

  /**
   * Replace whatever is running with a catalog entry: memory is wiped,
   * the font reinstalled and the machine reset before the regions load.
   */
  loadSoftware(entry: SoftwareEntry): void {
    this.reset();
    this.cpu.clearMemory();
    this.cpu.loadFont(this.font);
    this.loadRegions(entry.regions);
  }

  private loadRegions(regions: MemoryRegion[]): void {
    for (const region of regions) {
      this.cpu.loadBytes(region.data, region.startAddress);
    }
  }

  /** Reset the machine and release all held keys. Memory is kept. */
  reset(): void {
    this.cpu.reset();
    this.held.reset();
  }

  keyDown(key: number): void {
    this.held.set(checkKey(key));
  }

  keyUp(key: number): void {
    this.held.clear(checkKey(key));
  }

  /**
   * Run one frame. Returns the number of instructions executed.
   * After the program has reached its end only the timers keep ticking.
   */
  runFrame(elapsedMs: number = this.frameDurationMs): number {
    if (this.cpu.hasReachedEnd()) {
      return this.cpu.runFrame(0);
    }
    this.cpu.loadKeypad(Chip8Keypad.fromStates(this.held.getStates()));
    return this.cpu.runFrame(elapsedMs);
  }

  /** Run `count` frames of equal length. Returns total instructions executed. */
  runFrames(count: number, elapsedMs: number = this.frameDurationMs): number {
    let total = 0;
    for (let i = 0; i < count; i++) {
      total += this.runFrame(elapsedMs);
    }
    return total;
  }

  getFrameBuffer(): FrameBuffer {
    return this.cpu.getFrameBuffer();
  }

  getScreenText(on?: string, off?: string): string {
    return this.cpu.getScreenText(on, off);
  }

  isPlayingSound(): boolean {
    return this.cpu.isPlayingSound();
  }

  hasReachedEnd(): boolean {
    return this.cpu.hasReachedEnd();
  }

  getPC(): number {
    return this.cpu.getPC();
  }

  setTraceCallback(cb: TraceCallback | null): void {
    this.cpu.setTraceCallback(cb);
  }
}

function checkKey(key: number): number {
  if (!Number.isInteger(key) || key < 0 || key >= KEY_COUNT) {
    throw new RangeError(`Key must be 0-${KEY_COUNT - 1}, got ${key}`);
  }
  return key;
}
