import { describe, it, expect, beforeAll } from "vitest";
import JSZip from "jszip";
import {
  extractZipFile,
  isProgramFilename,
  isZipData,
  isZipFilename,
  listProgramFiles,
  listZipFiles,
} from "../zip-extract";

async function buildArchive(): Promise<Uint8Array> {
  const zip = new JSZip();
  zip.file("readme.txt", "Two test programs");
  zip.file("games/spin.ch8", new Uint8Array([0x12, 0x00]));
  zip.file("demos/ALPHA.C8", new Uint8Array([0x60, 0x05, 0x00, 0x00]));
  return zip.generateAsync({ type: "uint8array" });
}

describe("zip helpers", () => {
  let archive: Uint8Array;

  beforeAll(async () => {
    archive = await buildArchive();
  });

  it("recognizes zip data by its magic bytes", () => {
    expect(isZipData(archive)).toBe(true);
    expect(isZipData(new Uint8Array([0x12, 0x00, 0x00, 0x00]))).toBe(false);
    expect(isZipData(new Uint8Array([0x50, 0x4b]))).toBe(false);
  });

  it("recognizes file names", () => {
    expect(isZipFilename("pack.ZIP")).toBe(true);
    expect(isZipFilename("pack.ch8")).toBe(false);
    expect(isProgramFilename("pong.ch8")).toBe(true);
    expect(isProgramFilename("PONG.C8")).toBe(true);
    expect(isProgramFilename("pong.txt")).toBe(false);
  });

  it("lists files sorted by name without directories", async () => {
    const entries = await listZipFiles(archive);
    expect(entries).toEqual([
      { name: "ALPHA.C8", path: "demos/ALPHA.C8", sizeBytes: 4 },
      { name: "readme.txt", path: "readme.txt", sizeBytes: 17 },
      { name: "spin.ch8", path: "games/spin.ch8", sizeBytes: 2 },
    ]);
  });

  it("lists only program files", async () => {
    const entries = await listProgramFiles(archive);
    expect(entries.map((e) => e.path)).toEqual(["demos/ALPHA.C8", "games/spin.ch8"]);
  });

  it("extracts a file by path", async () => {
    const data = await extractZipFile(archive, "games/spin.ch8");
    expect(Array.from(data)).toEqual([0x12, 0x00]);
  });

  it("rejects a missing path", async () => {
    await expect(extractZipFile(archive, "games/missing.ch8")).rejects.toThrow(
      "File not found in archive: games/missing.ch8"
    );
  });
});
