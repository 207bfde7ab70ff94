import { readdir, stat } from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { DirectoryNotFoundError, EmptyDirectoryError, OrderingError } from "../errors.js";
import { errnoCode } from "../utils.js";

export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg"] as const;

export type ImageEntry = {
  filename: string;
  // All digits of the filename, concatenated. bigint so long timestamp names keep their precision.
  key: bigint;
  path: string;
};

export function isImageFile(filename: string): boolean {
  const lower = filename.toLowerCase();
  return IMAGE_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Ordering key for a filename: "story10.png" -> 10n, "2024-01-05_3.jpg" -> 202401053n.
 * Returns null when the name has no digits.
 */
export function extractSequenceKey(filename: string): bigint | null {
  const digits = filename.replace(/[^0-9]/g, "");
  return digits.length > 0 ? BigInt(digits) : null;
}

function compareEntries(a: ImageEntry, b: ImageEntry): number {
  if (a.key !== b.key) return a.key < b.key ? -1 : 1;
  // Duplicate keys are not expected; fall back to the name so the order is still deterministic.
  if (a.filename === b.filename) return 0;
  return a.filename < b.filename ? -1 : 1;
}

/**
 * Regular files, plus symlinks unless they resolve to something other than a file.
 * A dangling link is kept so the publish step reports the missing image.
 */
async function isFileEntry(dir: string, d: Dirent): Promise<boolean> {
  if (d.isFile()) return true;
  if (!d.isSymbolicLink()) return false;
  try {
    return (await stat(path.join(dir, d.name))).isFile();
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ELOOP") return true;
    throw err;
  }
}

/**
 * Scan `dir` and return its images in ascending sequence-key order.
 * The directory is re-read on every call; nothing is cached.
 */
export async function listImages(dir: string): Promise<ImageEntry[]> {
  const dirents = await readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new DirectoryNotFoundError(dir);
    }
    throw err;
  });

  const entries: ImageEntry[] = [];
  for (const d of dirents) {
    if (!isImageFile(d.name) || !(await isFileEntry(dir, d))) continue;
    const key = extractSequenceKey(d.name);
    if (key === null) throw new OrderingError(d.name);
    entries.push({ filename: d.name, key, path: path.join(dir, d.name) });
  }

  if (entries.length === 0) throw new EmptyDirectoryError(dir);

  return entries.sort(compareEntries);
}
