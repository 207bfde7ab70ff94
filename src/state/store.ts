import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { CorruptStateError } from "../errors.js";
import { errorMessage, logger } from "../logger.js";
import { errnoCode } from "../utils.js";

/** Index meaning "nothing posted yet"; the first image to post is index 0. */
export const NOTHING_POSTED = -1;

export type StateStore = {
  /** Index of the last successfully posted image, or -1. Never throws. */
  read(): Promise<number>;
  /** Persist `index` as the last successfully posted image. */
  write(index: number): Promise<void>;
  readonly path: string;
};

/**
 * Parse the state file body. Surrounding whitespace is ignored; anything else
 * that is not a plain decimal integer >= -1 is corrupt.
 */
export function parsePostingState(raw: string): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) throw new CorruptStateError(raw);
  const n = Number(trimmed);
  if (!Number.isSafeInteger(n) || n < NOTHING_POSTED) throw new CorruptStateError(raw);
  return n;
}

export function createStateStore(filePath: string): StateStore {
  async function read(): Promise<number> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        logger.warn("state file unreadable; starting from the beginning", {
          path: filePath,
          error: errorMessage(err)
        });
      }
      return NOTHING_POSTED;
    }

    try {
      return parsePostingState(raw);
    } catch (err) {
      logger.warn("state file corrupt; starting from the beginning", {
        path: filePath,
        error: errorMessage(err)
      });
      return NOTHING_POSTED;
    }
  }

  async function write(index: number): Promise<void> {
    if (!Number.isSafeInteger(index) || index < NOTHING_POSTED) {
      throw new RangeError(`posting state must be an integer >= ${NOTHING_POSTED}, got ${index}`);
    }

    // Write beside the target, then rename over it: a crash mid-write leaves the previous value intact.
    await mkdir(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      await writeFile(tmpPath, String(index), "utf8");
      await rename(tmpPath, filePath);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }

    logger.info("state saved", { index, nextIndex: index + 1 });
  }

  return { read, write, path: filePath };
}
