/**
 * ZIP archive helpers using JSZip.
 * CHIP-8 programs are commonly distributed as packs of .ch8 files.
 */

import JSZip from "jszip";

export interface ZipFileEntry {
  name: string;
  path: string;
  sizeBytes: number;
}

const PROGRAM_EXTENSION = /\.(ch8|c8)$/i;

/** PK magic bytes. */
export function isZipData(data: Uint8Array): boolean {
  return data.length >= 4 && data[0] === 0x50 && data[1] === 0x4b;
}

export function isZipFilename(name: string): boolean {
  return /\.zip$/i.test(name);
}

export function isProgramFilename(name: string): boolean {
  return PROGRAM_EXTENSION.test(name);
}

/**
 * List files inside a zip archive, directories excluded, sorted by name.
 */
export async function listZipFiles(data: Uint8Array): Promise<ZipFileEntry[]> {
  const zip = await JSZip.loadAsync(data);
  const files: JSZip.JSZipObject[] = [];
  zip.forEach((_path, file) => {
    if (!file.dir) files.push(file);
  });

  const entries = await Promise.all(
    files.map(async (file) => {
      const content = await file.async("uint8array");
      return {
        name: file.name.split("/").pop() ?? file.name,
        path: file.name,
        sizeBytes: content.length,
      };
    })
  );

  return entries.sort((a, b) => a.name.localeCompare(b.name));
}

/** Only the .ch8 / .c8 entries of an archive. */
export async function listProgramFiles(data: Uint8Array): Promise<ZipFileEntry[]> {
  const entries = await listZipFiles(data);
  return entries.filter((e) => isProgramFilename(e.name));
}

/**
 * Extract a single file from a zip archive by path.
 */
export async function extractZipFile(data: Uint8Array, filePath: string): Promise<Uint8Array> {
  const zip = await JSZip.loadAsync(data);
  const file = zip.file(filePath);
  if (!file) {
    throw new Error(`File not found in archive: ${filePath}`);
  }
  return file.async("uint8array");
}
