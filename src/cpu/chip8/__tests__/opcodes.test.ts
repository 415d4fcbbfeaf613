import { describe, it, expect } from 'vitest';
import { decode, disassemble, disassembleRange } from '../opcodes';

describe('decode', () => {
  it('should split a word into its fields', () => {
    expect(decode(0xd125)).toEqual({
      opcode: 0xd125,
      group: 0xd,
      x: 0x1,
      y: 0x2,
      n: 0x5,
      nn: 0x25,
      nnn: 0x125,
    });
  });

  it('should take NNN from the low 12 bits', () => {
    expect(decode(0x1abc).nnn).toBe(0xabc);
    expect(decode(0x1abc).group).toBe(1);
  });
});

describe('disassemble', () => {
  it.each([
    [0x0000, 'END'],
    [0x00e0, 'CLS'],
    [0x00ee, 'RET'],
    [0x1200, 'JP 0x200'],
    [0x2abc, 'CALL 0xABC'],
    [0x3a05, 'SE VA, 0x05'],
    [0x4b10, 'SNE VB, 0x10'],
    [0x5120, 'SE V1, V2'],
    [0x6005, 'LD V0, 0x05'],
    [0x70ff, 'ADD V0, 0xFF'],
    [0x8120, 'LD V1, V2'],
    [0x8121, 'OR V1, V2'],
    [0x8122, 'AND V1, V2'],
    [0x8123, 'XOR V1, V2'],
    [0x8124, 'ADD V1, V2'],
    [0x8125, 'SUB V1, V2'],
    [0x8126, 'SHR V1, V2'],
    [0x8127, 'SUBN V1, V2'],
    [0x812e, 'SHL V1, V2'],
    [0x9120, 'SNE V1, V2'],
    [0xa123, 'LD I, 0x123'],
    [0xb300, 'JP V0, 0x300'],
    [0xc30f, 'RND V3, 0x0F'],
    [0xd125, 'DRW V1, V2, 5'],
    [0xe49e, 'SKP V4'],
    [0xe4a1, 'SKNP V4'],
    [0xf507, 'LD V5, DT'],
    [0xf50a, 'LD V5, K'],
    [0xf515, 'LD DT, V5'],
    [0xf518, 'LD ST, V5'],
    [0xf51e, 'ADD I, V5'],
    [0xf529, 'LD F, V5'],
    [0xf533, 'LD B, V5'],
    [0xf555, 'LD [I], V5'],
    [0xf565, 'LD V5, [I]'],
  ])('should render %i as %s', (opcode, text) => {
    expect(disassemble(opcode)).toBe(text);
  });

  it.each([0x0123, 0x5121, 0x812f, 0x9121, 0xe400, 0xf5ff])(
    'should render unknown word %i as a data word',
    (opcode) => {
      expect(disassemble(opcode)).toMatch(/^DW 0x[0-9A-F]{4}$/);
    },
  );

  it('should render a data word with its value', () => {
    expect(disassemble(0x5121)).toBe('DW 0x5121');
  });
});

describe('disassembleRange', () => {
  it('should list consecutive words with addresses', () => {
    const memory = new Uint8Array(0x1000);
    memory.set([0x60, 0x05, 0xa3, 0x00, 0x00, 0x00], 0x200);
    expect(disassembleRange(memory, 0x200, 3)).toEqual([
      { address: 0x200, opcode: 0x6005, text: 'LD V0, 0x05' },
      { address: 0x202, opcode: 0xa300, text: 'LD I, 0x300' },
      { address: 0x204, opcode: 0x0000, text: 'END' },
    ]);
  });

  it('should stop at the end of memory', () => {
    const memory = new Uint8Array([0x00, 0xe0, 0x12]);
    expect(disassembleRange(memory, 0, 5)).toEqual([
      { address: 0, opcode: 0x00e0, text: 'CLS' },
    ]);
  });
});
