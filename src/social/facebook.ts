import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Selection } from "../agent/selector.js";
import { ImageFileMissingError, NetworkError, RemoteHttpError, type PublishError } from "../errors.js";
import { errorMessage, logger } from "../logger.js";
import type { StateStore } from "../state/store.js";
import { errnoCode } from "../utils.js";
import { formatCaption } from "./caption.js";

const GRAPH_BASE_URL = "https://graph.facebook.com";

export type PublishResult =
  | { ok: true; postId: string | null }
  | { ok: false; error: PublishError };

export type FacebookPublisherOptions = {
  pageId: string;
  accessToken: string;
  graphApiVersion: string;
  timeoutMs: number;
  captionTemplate: string;
  store: Pick<StateStore, "write">;
  now?: () => Date;
};

export type FacebookPublisher = {
  publish(selection: Extract<Selection, { kind: "next" }>): Promise<PublishResult>;
};

const PhotoCreatedResponse = z.object({
  id: z.string().optional(),
  post_id: z.string().optional()
});

const GraphErrorResponse = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().optional(),
    code: z.number().optional()
  })
});

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function mimeTypeFor(filename: string): string {
  return path.extname(filename).toLowerCase() === ".png" ? "image/png" : "image/jpeg";
}

export function photosUrl(graphApiVersion: string, pageId: string): string {
  return `${GRAPH_BASE_URL}/${graphApiVersion}/${encodeURIComponent(pageId)}/photos`;
}

function toNetworkError(err: unknown): NetworkError {
  const name = err instanceof Error ? err.name : "";
  const timedOut = name === "TimeoutError" || name === "AbortError";
  // undici reports "fetch failed" and keeps the useful part (ENOTFOUND, ECONNRESET...) on `cause`.
  const cause = err instanceof Error ? err.cause : undefined;
  const reason = cause !== undefined ? `${errorMessage(err)} (${errorMessage(cause)})` : errorMessage(err);
  return new NetworkError(reason, timedOut);
}

export function createFacebookPublisher(opts: FacebookPublisherOptions): FacebookPublisher {
  const now = opts.now ?? (() => new Date());

  async function publish(selection: Extract<Selection, { kind: "next" }>): Promise<PublishResult> {
    const { entry, index } = selection;

    let bytes: Buffer;
    try {
      bytes = await readFile(entry.path);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        return { ok: false, error: new ImageFileMissingError(entry.path) };
      }
      throw err;
    }

    const caption = formatCaption(opts.captionTemplate, now());
    logger.info("preparing to post image", { filename: entry.filename, index, caption });

    const url = new URL(photosUrl(opts.graphApiVersion, opts.pageId));
    url.searchParams.set("caption", caption);
    url.searchParams.set("access_token", opts.accessToken);

    const form = new FormData();
    form.append("source", new Blob([bytes], { type: mimeTypeFor(entry.filename) }), entry.filename);

    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        body: form,
        signal: AbortSignal.timeout(opts.timeoutMs)
      });
    } catch (err) {
      const error = toNetworkError(err);
      logger.error("network error while posting image", { filename: entry.filename, error: error.message });
      return { ok: false, error };
    }

    const raw = await res.text().catch(() => "");
    const body = safeJsonParse(raw);

    if (!res.ok) {
      const graphError = GraphErrorResponse.safeParse(body);
      const detail = graphError.success ? graphError.data.error.message : null;
      logger.error("photo API returned an error; check the access token permissions and page id", {
        filename: entry.filename,
        status: res.status,
        detail,
        body: raw.slice(0, 500)
      });
      return { ok: false, error: new RemoteHttpError(res.status, raw, detail) };
    }

    const created = PhotoCreatedResponse.safeParse(body);
    const postId = created.success ? created.data.post_id ?? created.data.id ?? null : null;
    logger.info("image posted", { filename: entry.filename, index, postId });

    // Only a confirmed 2xx advances the posting state.
    await opts.store.write(index);
    return { ok: true, postId };
  }

  return { publish };
}
