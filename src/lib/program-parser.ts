/**
 * CHIP-8 Program File Parsers
 *
 * Turns raw .ch8 binaries, Intel HEX and opcode-word listings into
 * MemoryRegion arrays ready to copy into the 4K address space.
 */

import { MEMORY_SIZE, PROGRAM_START_ADDRESS } from "@/cpu/chip8/types";
import type { MemoryRegion, ParsedProgram, ProgramFileFormat } from "@/emulator/chip8/software-library";

/** "$200"-style address. */
function formatAddr(addr: number): string {
  return "$" + addr.toString(16).toUpperCase().padStart(3, "0");
}

function computeAddressRange(regions: MemoryRegion[]): string {
  let lo = MEMORY_SIZE;
  let hi = 0;
  for (const r of regions) {
    lo = Math.min(lo, r.startAddress);
    hi = Math.max(hi, r.startAddress + r.data.length - 1);
  }
  return lo === hi ? formatAddr(lo) : `${formatAddr(lo)}-${formatAddr(hi)}`;
}

function computeSize(regions: MemoryRegion[]): number {
  return regions.reduce((sum, r) => sum + r.data.length, 0);
}

/** Every region must lie inside $000-$FFF and the program must not be empty. */
function finish(regions: MemoryRegion[], format: ProgramFileFormat): ParsedProgram {
  if (computeSize(regions) === 0) {
    throw new Error("Program is empty");
  }
  for (const r of regions) {
    const end = r.startAddress + r.data.length - 1;
    if (r.startAddress < 0 || end >= MEMORY_SIZE) {
      throw new Error(
        `Program does not fit in memory: ${formatAddr(r.startAddress)}-${formatAddr(end)} exceeds $FFF`
      );
    }
  }
  return {
    regions,
    format,
    sizeBytes: computeSize(regions),
    addressRange: computeAddressRange(regions),
  };
}

// One listing line: optional "ADDR:" then 4-digit words, optional comment
const HEX_WORDS_LINE = /^(?:[0-9A-Fa-f]{3,4}:\s*)?[0-9A-Fa-f]{4}(?:\s+[0-9A-Fa-f]{4})*\s*(?:[#;].*)?$/;

/**
 * Auto-detect file format from content.
 *
 * - Intel HEX: first significant line starts with ':'
 * - Opcode-word listing: first significant line is 4-digit hex words
 * - Otherwise: raw binary (.ch8)
 */
export function detectFormat(data: Uint8Array | string): ProgramFileFormat {
  const text = typeof data === "string" ? data : tryDecodeText(data);
  if (text === null) return "binary";

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith("#") || trimmed.startsWith(";")) continue;

    if (trimmed.startsWith(":")) return "intel-hex";
    if (HEX_WORDS_LINE.test(trimmed)) return "hex-words";
    break;
  }
  return "binary";
}

/** Decode as text unless more than 10% of the first 512 bytes are control bytes. */
function tryDecodeText(data: Uint8Array): string | null {
  const limit = Math.min(data.length, 512);
  if (limit === 0) return null;

  let nonPrintable = 0;
  for (let i = 0; i < limit; i++) {
    const b = data[i];
    if (b < 0x09 || (b > 0x0d && b < 0x20) || b > 0x7e) {
      nonPrintable++;
    }
  }
  if (nonPrintable / limit > 0.1) return null;
  return new TextDecoder("utf-8").decode(data);
}

/**
 * Parse Intel HEX.
 *
 * Record format: :LLAAAATT[DD...]CC
 * Only data (00) and EOF (01) records matter; other record types are skipped.
 */
export function parseIntelHex(text: string): ParsedProgram {
  const bytes = new Map<number, number>();

  const lines = text.split(/\r?\n/);
  for (let lineNum = 0; lineNum < lines.length; lineNum++) {
    const line = lines[lineNum].trim();
    if (line.length === 0) continue;
    if (!line.startsWith(":")) {
      throw new Error(`Intel HEX parse error on line ${lineNum + 1}: expected ':' prefix`);
    }

    const hex = line.slice(1);
    if (hex.length < 10 || hex.length % 2 !== 0 || !/^[0-9A-Fa-f]+$/.test(hex)) {
      throw new Error(`Intel HEX parse error on line ${lineNum + 1}: malformed record`);
    }

    const record: number[] = [];
    for (let i = 0; i < hex.length; i += 2) {
      record.push(parseInt(hex.slice(i, i + 2), 16));
    }

    if (record.reduce((sum, b) => (sum + b) & 0xff, 0) !== 0) {
      throw new Error(`Intel HEX checksum error on line ${lineNum + 1}`);
    }

    const [byteCount, addrHi, addrLo, recordType] = record;
    if (recordType === 0x01) break;
    if (recordType !== 0x00) continue;

    if (record.length - 5 !== byteCount) {
      throw new Error(`Intel HEX parse error on line ${lineNum + 1}: byte count mismatch`);
    }

    const address = (addrHi << 8) | addrLo;
    for (let i = 0; i < byteCount; i++) {
      bytes.set(address + i, record[4 + i]);
    }
  }

  return finish(buildRegions(bytes), "intel-hex");
}

/**
 * Parse an opcode-word listing.
 *
 *   # draw a zero
 *   6000 6101 6201      ; starts at $200
 *   0210: F029 D125     ; explicit address
 *
 * Words are big-endian. Without an address prefix a line continues where
 * the previous one stopped.
 */
export function parseHexWords(text: string): ParsedProgram {
  const bytes = new Map<number, number>();
  let address = PROGRAM_START_ADDRESS;

  const lines = text.split(/\r?\n/);
  for (let lineNum = 0; lineNum < lines.length; lineNum++) {
    let line = lines[lineNum];
    const comment = line.search(/[#;]/);
    if (comment !== -1) line = line.slice(0, comment);
    line = line.trim();
    if (line.length === 0) continue;

    const prefix = line.match(/^([0-9A-Fa-f]{3,4}):\s*/);
    if (prefix) {
      address = parseInt(prefix[1], 16);
      line = line.slice(prefix[0].length);
    }

    for (const token of line.split(/\s+/).filter((t) => t.length > 0)) {
      if (!/^[0-9A-Fa-f]{4}$/.test(token)) {
        throw new Error(`Hex word parse error on line ${lineNum + 1}: invalid word "${token}"`);
      }
      const word = parseInt(token, 16);
      bytes.set(address, word >> 8);
      bytes.set(address + 1, word & 0xff);
      address += 2;
    }
  }

  return finish(buildRegions(bytes), "hex-words");
}

/** Raw .ch8 image: one region at the load address. */
export function parseBinary(data: Uint8Array, loadAddress: number = PROGRAM_START_ADDRESS): ParsedProgram {
  return finish([{ startAddress: loadAddress, data }], "binary");
}

/**
 * Unified parse function. Auto-detects format if not specified.
 */
export function parseProgram(
  data: Uint8Array | string,
  options?: { format?: ProgramFileFormat; loadAddress?: number }
): ParsedProgram {
  const format = options?.format ?? detectFormat(data);
  switch (format) {
    case "intel-hex":
      return parseIntelHex(asText(data));
    case "hex-words":
      return parseHexWords(asText(data));
    case "binary": {
      const bytes = typeof data === "string" ? new TextEncoder().encode(data) : data;
      return parseBinary(bytes, options?.loadAddress);
    }
  }
}

function asText(data: Uint8Array | string): string {
  return typeof data === "string" ? data : new TextDecoder("utf-8").decode(data);
}

/** Group a sparse address → byte map into contiguous regions. */
function buildRegions(bytes: Map<number, number>): MemoryRegion[] {
  const addresses = Array.from(bytes.keys()).sort((a, b) => a - b);
  const regions: MemoryRegion[] = [];

  let start = 0;
  let run: number[] = [];
  for (const addr of addresses) {
    if (run.length > 0 && addr !== start + run.length) {
      regions.push({ startAddress: start, data: new Uint8Array(run) });
      run = [];
    }
    if (run.length === 0) start = addr;
    run.push(bytes.get(addr) ?? 0);
  }
  if (run.length > 0) {
    regions.push({ startAddress: start, data: new Uint8Array(run) });
  }

  return regions;
}
