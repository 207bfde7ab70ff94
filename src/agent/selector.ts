import { listImages, type ImageEntry } from "../images/lister.js";
import type { StateStore } from "../state/store.js";
import { logger } from "../logger.js";

export type Selection =
  | { kind: "next"; entry: ImageEntry; index: number; total: number }
  | { kind: "nothing-to-post"; total: number };

export type SelectorContext = {
  imagesDir: string;
  store: Pick<StateStore, "read">;
};

/**
 * Pick the image after the last successfully posted one.
 * At most one new image per call; lister errors propagate to the caller.
 */
export async function selectNext(ctx: SelectorContext): Promise<Selection> {
  const entries = await listImages(ctx.imagesDir);
  const lastPosted = await ctx.store.read();
  const candidate = lastPosted + 1;

  if (candidate < entries.length) {
    const entry = entries[candidate];
    logger.info("found next image to post", { filename: entry.filename, index: candidate, total: entries.length });
    return { kind: "next", entry, index: candidate, total: entries.length };
  }

  logger.info("all images have been posted; nothing new to post", { lastPosted, total: entries.length });
  return { kind: "nothing-to-post", total: entries.length };
}
