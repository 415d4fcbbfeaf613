/**
 * CHIP-8 CPU Types
 *
 * The CHIP-8 virtual machine has:
 * - 16 general-purpose 8-bit registers V0-VF (VF doubles as the flags output)
 * - A 16-bit index register I and a 16-bit program counter
 * - 4K of byte-addressed memory, font at $050, programs at $200
 * - A 24-entry return address stack
 * - Delay and sound timers, decremented once per frame
 */

/** Register VF: carry, borrow, shifted-out bit and sprite collision land here. */
export const FLAG_REG = 0xf;

export const REGISTER_COUNT = 16;

export const MEMORY_SIZE = 0x1000;

export const FONT_START_ADDRESS = 0x050;
export const FONT_GLYPH_COUNT = 16;
export const FONT_GLYPH_HEIGHT = 5;
export const FONT_SIZE = FONT_GLYPH_COUNT * FONT_GLYPH_HEIGHT;

export const PROGRAM_START_ADDRESS = 0x200;

export const STACK_DEPTH = 24;

/** Reference instruction rate (~700 Hz). */
export const DEFAULT_INSTRUCTIONS_PER_SECOND = 700;

export const NANOS_PER_SECOND = 1_000_000_000;
export const NANOS_PER_MILLI = 1_000_000;

/**
 * Dialect switches. Each one changes the meaning of a single instruction
 * family to match a historical interpreter.
 */
export interface Chip8Quirks {
  /** 8XY6 / 8XYE copy VY into VX before shifting. */
  readonly assignBeforeShift: boolean;
  /** FX1E sets VF to 1 when I leaves the addressable range. */
  readonly setFlagOnIndexOverflow: boolean;
  /** FX55 / FX65 leave I pointing past the last register transferred. */
  readonly modifyIndexOnDumpOrLoad: boolean;
}

export const DEFAULT_QUIRKS: Chip8Quirks = Object.freeze({
  assignBeforeShift: true,
  setFlagOnIndexOverflow: true,
  modifyIndexOnDumpOrLoad: false,
});

/** Source of uniformly distributed numbers in [0, 1), used by CXNN. */
export type RandomSource = () => number;

export interface Chip8Options {
  quirks?: Partial<Chip8Quirks>;
  instructionsPerSecond?: number;
  random?: RandomSource;
}

/** One executed instruction, as reported to a trace callback. */
export interface InstructionTrace {
  /** Address the opcode was fetched from. */
  address: number;
  opcode: number;
  mnemonic: string;
}

export type TraceCallback = (trace: InstructionTrace) => void;

export interface Chip8State {
  registers: number[];
  index: number;
  pc: number;
  delayTimer: number;
  soundTimer: number;
  playingSound: boolean;
  stackDepth: number;
  reachedEnd: boolean;
}

/** Format a value as `0x`-prefixed, zero-padded, upper-case hex. */
export function hex(value: number, digits: number): string {
  return '0x' + value.toString(16).toUpperCase().padStart(digits, '0');
}

export class Chip8Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'Chip8Error';
  }
}

/** The fetched word matches no defined instruction pattern. */
export class UnimplementedInstructionError extends Chip8Error {
  readonly opcode: number;
  readonly address: number;

  constructor(opcode: number, address: number) {
    super(`Unimplemented instruction ${hex(opcode, 4)} at address ${hex(address, 4)}`);
    this.name = 'UnimplementedInstructionError';
    this.opcode = opcode;
    this.address = address;
  }
}

export class StackOverflowError extends Chip8Error {
  constructor() {
    super(`Stack overflow: call depth exceeds ${STACK_DEPTH}`);
    this.name = 'StackOverflowError';
  }
}

export class StackUnderflowError extends Chip8Error {
  constructor() {
    super('Stack underflow: return with empty stack');
    this.name = 'StackUnderflowError';
  }
}

export class MemoryAccessError extends Chip8Error {
  readonly address: number;

  constructor(address: number) {
    super(`Memory access out of range: ${hex(address, 4)}`);
    this.name = 'MemoryAccessError';
    this.address = address;
  }
}
