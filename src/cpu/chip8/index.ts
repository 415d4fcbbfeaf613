export { Chip8 } from './chip8';
export { Chip8Stack } from './stack';
export { decode, disassemble, disassembleRange } from './opcodes';
export type { DecodedInstruction, DisassembledLine } from './opcodes';
export {
  FLAG_REG,
  REGISTER_COUNT,
  MEMORY_SIZE,
  FONT_START_ADDRESS,
  FONT_GLYPH_COUNT,
  FONT_GLYPH_HEIGHT,
  FONT_SIZE,
  PROGRAM_START_ADDRESS,
  STACK_DEPTH,
  DEFAULT_INSTRUCTIONS_PER_SECOND,
  DEFAULT_QUIRKS,
  Chip8Error,
  UnimplementedInstructionError,
  StackOverflowError,
  StackUnderflowError,
  MemoryAccessError,
  hex,
} from './types';
export type {
  Chip8Quirks,
  Chip8Options,
  Chip8State,
  RandomSource,
  InstructionTrace,
  TraceCallback,
} from './types';
