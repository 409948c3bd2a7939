import AdmZip from "adm-zip";
import { closeSync, existsSync, openSync, readSync, rmSync } from "node:fs";
import { ExtractionError } from "./errors.ts";
import { fileExtension } from "./path.ts";

export type ArchiveType = "zip";

const MAGIC_BYTES: Record<ArchiveType, number[]> = {
  zip: [0x50, 0x4b, 0x03, 0x04],
};

/** `.epub` is a zip archive under another name. */
export const ARCHIVE_EXTENSIONS = ["epub", "zip"];

export function detectArchiveType(filePath: string): ArchiveType | null {
  const header = Buffer.alloc(8);
  let fd: number | undefined;
  try {
    fd = openSync(filePath, "r");
    readSync(fd, header, 0, header.length, 0);
  } catch {
    return null;
  } finally {
    if (fd !== undefined) closeSync(fd);
  }

  for (const [type, magic] of Object.entries(MAGIC_BYTES) as [ArchiveType, number[]][]) {
    if (magic.every((byte, i) => header[i] === byte)) {
      return type;
    }
  }
  return null;
}

/**
 * Extracts every entry of the archive into `directory`, replacing whatever
 * a previous extraction left there, and returns `directory`.
 */
export function extractArchive(filePath: string, directory: string): string {
  if (!existsSync(filePath)) {
    throw new ExtractionError(filePath, "archive does not exist");
  }

  const extension = fileExtension(filePath);
  if (!ARCHIVE_EXTENSIONS.includes(extension)) {
    throw new ExtractionError(filePath, `unsupported file extension "${extension}"`);
  }

  if (detectArchiveType(filePath) !== "zip") {
    throw new ExtractionError(filePath, "not a zip archive");
  }

  try {
    const zip = new AdmZip(filePath);
    rmSync(directory, { recursive: true, force: true });
    zip.extractAllTo(directory, true);
  } catch (error) {
    throw new ExtractionError(filePath, error instanceof Error ? error.message : String(error), error);
  }

  return directory;
}
