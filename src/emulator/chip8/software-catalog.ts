/**
 * CHIP-8 Software Catalog: built-in hand-assembled programs
 */

import { PROGRAM_START_ADDRESS } from '@/cpu/chip8/types';
import type { SoftwareEntry } from './software-library';

/** Big-endian byte image of a list of instruction words. */
function assemble(words: number[]): Uint8Array {
  const bytes = new Uint8Array(words.length * 2);
  words.forEach((word, i) => {
    bytes[i * 2] = (word >> 8) & 0xff;
    bytes[i * 2 + 1] = word & 0xff;
  });
  return bytes;
}

const HEX_DIGITS = assemble([
  0x6000, // 200: LD V0, 0x00      ; glyph
  0x6101, // 202: LD V1, 0x01      ; x
  0x6201, // 204: LD V2, 0x01      ; y
  0xf029, // 206: LD F, V0
  0xd125, // 208: DRW V1, V2, 5
  0x7105, // 20A: ADD V1, 0x05
  0x7001, // 20C: ADD V0, 0x01
  0x3008, // 20E: SE V0, 0x08
  0x1206, // 210: JP 0x206
  0x0000, // 212: end of program
]);

const KEYPAD_ECHO = assemble([
  0x6a1c, // 200: LD VA, 0x1C      ; x = 28
  0x6b0d, // 202: LD VB, 0x0D      ; y = 13
  0xf00a, // 204: LD V0, K         ; wait for a key
  0x00e0, // 206: CLS
  0xf029, // 208: LD F, V0
  0xdab5, // 20A: DRW VA, VB, 5
  0xe09e, // 20C: SKP V0           ; still held?
  0x1204, // 20E: JP 0x204         ; released: next key
  0x120c, // 210: JP 0x20C         ; held: keep polling
]);

const BEEP = assemble([
  0x601e, // 200: LD V0, 0x1E      ; 30 frames
  0xf018, // 202: LD ST, V0
  0x1204, // 204: JP 0x204         ; spin
]);

function entry(
  fields: Omit<SoftwareEntry, 'regions' | 'sizeBytes' | 'addressRange'>,
  data: Uint8Array,
): SoftwareEntry {
  const end = PROGRAM_START_ADDRESS + data.length - 1;
  return {
    ...fields,
    regions: [{ startAddress: PROGRAM_START_ADDRESS, data }],
    sizeBytes: data.length,
    addressRange: `$${PROGRAM_START_ADDRESS.toString(16).toUpperCase()}-$${end.toString(16).toUpperCase()}`,
  };
}

export const CHIP8_SOFTWARE_CATALOG: SoftwareEntry[] = [
  entry(
    {
      id: 'hex-digits',
      name: 'HEX DIGITS',
      description: 'Draws font glyphs 0-7 across the top of the screen, then ends.',
      category: 'demo',
      author: 'Built-in',
    },
    HEX_DIGITS,
  ),
  entry(
    {
      id: 'keypad-echo',
      name: 'KEYPAD ECHO',
      description: 'Waits for a key and shows its hex digit in the middle of the screen until the next key.',
      category: 'test',
      author: 'Built-in',
      keys: 'Any key 0-F',
    },
    KEYPAD_ECHO,
  ),
  entry(
    {
      id: 'beep',
      name: 'BEEP',
      description: 'Sounds the buzzer for half a second, then idles.',
      category: 'test',
      author: 'Built-in',
    },
    BEEP,
  ),
];

export function findSoftware(id: string): SoftwareEntry | undefined {
  return CHIP8_SOFTWARE_CATALOG.find((e) => e.id === id);
}
