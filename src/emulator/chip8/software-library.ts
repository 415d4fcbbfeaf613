/**
 * Software Library: Type Definitions
 *
 * Shared types for the built-in catalog and for programs parsed from files.
 */

import type { QuirkPresetName } from "./config";

export type SoftwareCategory = "demo" | "game" | "test" | "utility";

/** Supported program formats. */
export type ProgramFileFormat = "binary" | "intel-hex" | "hex-words";

/** A contiguous block of bytes to load at a specific address. */
export interface MemoryRegion {
  /** Start address in the 4K address space (programs normally start at 0x200). */
  startAddress: number;
  data: Uint8Array;
}

/** A single entry in the software catalog. */
export interface SoftwareEntry {
  /** Unique identifier (slug). */
  id: string;
  name: string;
  description: string;
  category: SoftwareCategory;
  regions: MemoryRegion[];
  author: string;
  sizeBytes: number;
  /** Address range summary for display (e.g., "$200-$21F"). */
  addressRange: string;
  /** Quirk preset the program was written for, if it matters. */
  quirks?: QuirkPresetName;
  /** Which pad keys the program reads. */
  keys?: string;
}

/** Result from parsing a program file. */
export interface ParsedProgram {
  regions: MemoryRegion[];
  format: ProgramFileFormat;
  sizeBytes: number;
  addressRange: string;
}
