/**
 * CHIP-8 opcode decoding and disassembly
 *
 * Every instruction is one big-endian 16-bit word, split into nibbles:
 *
 *   15..12  11..8  7..4  3..0
 *   group   X      Y     N (subgroup)
 *
 * plus the derived immediates NNN (bits 11-0) and NN (bits 7-0).
 * Mnemonics follow Cowgod's Chip-8 technical reference.
 */

import { hex } from './types';

export interface DecodedInstruction {
  opcode: number;
  group: number;
  x: number;
  y: number;
  n: number;
  nn: number;
  nnn: number;
}

export function decode(opcode: number): DecodedInstruction {
  return {
    opcode,
    group: (opcode & 0xf000) >> 12,
    x: (opcode & 0x0f00) >> 8,
    y: (opcode & 0x00f0) >> 4,
    n: opcode & 0x000f,
    nn: opcode & 0x00ff,
    nnn: opcode & 0x0fff,
  };
}

function reg(id: number): string {
  return 'V' + id.toString(16).toUpperCase();
}

// Register-register ALU ops, indexed by the low nibble of 8XYN
const ALU_MNEMONICS: Record<number, string> = {
  0x0: 'LD',
  0x1: 'OR',
  0x2: 'AND',
  0x3: 'XOR',
  0x4: 'ADD',
  0x5: 'SUB',
  0x6: 'SHR',
  0x7: 'SUBN',
  0xe: 'SHL',
};

function disassembleF(x: number, nn: number): string | null {
  const vx = reg(x);
  switch (nn) {
    case 0x07: return `LD ${vx}, DT`;
    case 0x0a: return `LD ${vx}, K`;
    case 0x15: return `LD DT, ${vx}`;
    case 0x18: return `LD ST, ${vx}`;
    case 0x1e: return `ADD I, ${vx}`;
    case 0x29: return `LD F, ${vx}`;
    case 0x33: return `LD B, ${vx}`;
    case 0x55: return `LD [I], ${vx}`;
    case 0x65: return `LD ${vx}, [I]`;
    default: return null;
  }
}

function mnemonic(d: DecodedInstruction): string | null {
  const { group, x, y, n, nn, nnn } = d;
  switch (group) {
    case 0x0:
      if (d.opcode === 0x0000) return 'END';
      if (d.opcode === 0x00e0) return 'CLS';
      if (d.opcode === 0x00ee) return 'RET';
      return null;
    case 0x1: return `JP ${hex(nnn, 3)}`;
    case 0x2: return `CALL ${hex(nnn, 3)}`;
    case 0x3: return `SE ${reg(x)}, ${hex(nn, 2)}`;
    case 0x4: return `SNE ${reg(x)}, ${hex(nn, 2)}`;
    case 0x5: return n === 0 ? `SE ${reg(x)}, ${reg(y)}` : null;
    case 0x6: return `LD ${reg(x)}, ${hex(nn, 2)}`;
    case 0x7: return `ADD ${reg(x)}, ${hex(nn, 2)}`;
    case 0x8: {
      const name = ALU_MNEMONICS[n];
      return name === undefined ? null : `${name} ${reg(x)}, ${reg(y)}`;
    }
    case 0x9: return n === 0 ? `SNE ${reg(x)}, ${reg(y)}` : null;
    case 0xa: return `LD I, ${hex(nnn, 3)}`;
    case 0xb: return `JP V0, ${hex(nnn, 3)}`;
    case 0xc: return `RND ${reg(x)}, ${hex(nn, 2)}`;
    case 0xd: return `DRW ${reg(x)}, ${reg(y)}, ${n}`;
    case 0xe:
      if (nn === 0x9e) return `SKP ${reg(x)}`;
      if (nn === 0xa1) return `SKNP ${reg(x)}`;
      return null;
    case 0xf: return disassembleF(x, nn);
    default: return null;
  }
}

/** Render one instruction word. Words with no meaning render as `DW 0xNNNN`. */
export function disassemble(opcode: number): string {
  return mnemonic(decode(opcode)) ?? `DW ${hex(opcode, 4)}`;
}

export interface DisassembledLine {
  address: number;
  opcode: number;
  text: string;
}

/**
 * Disassemble `count` consecutive words starting at `start`.
 * Stops early at the end of `memory`.
 */
export function disassembleRange(
  memory: ArrayLike<number>,
  start: number,
  count: number,
): DisassembledLine[] {
  const lines: DisassembledLine[] = [];
  for (let i = 0, address = start; i < count && address + 1 < memory.length; i++, address += 2) {
    const opcode = (memory[address] << 8) | memory[address + 1];
    lines.push({ address, opcode, text: disassemble(opcode) });
  }
  return lines;
}
