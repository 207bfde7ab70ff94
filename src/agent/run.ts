import {
  imagesDirFromConfig,
  requireCredentials,
  statePathFromConfig,
  type AppConfig
} from "../config.js";
import { PosterError } from "../errors.js";
import { errorMessage, logger } from "../logger.js";
import { createFacebookPublisher } from "../social/facebook.js";
import { createStateStore } from "../state/store.js";
import { selectNext } from "./selector.js";

export type RunOutcome =
  | { status: "posted"; index: number; filename: string; postId: string | null }
  | { status: "nothing-to-post" }
  | { status: "failed"; reason: string; kind: PosterError["kind"] | "unexpected" };

export type RunDeps = {
  now?: () => Date;
};

function failed(err: unknown): RunOutcome {
  if (err instanceof PosterError) {
    return { status: "failed", reason: err.message, kind: err.kind };
  }
  return { status: "failed", reason: errorMessage(err), kind: "unexpected" };
}

/**
 * One publish attempt: credentials check, selection, upload, state advance.
 * Never throws. Any failure leaves the posting state as it was.
 */
export async function runOnce(cfg: AppConfig, deps: RunDeps = {}): Promise<RunOutcome> {
  try {
    const credentials = requireCredentials(cfg);
    const store = createStateStore(statePathFromConfig(cfg));

    const selection = await selectNext({ imagesDir: imagesDirFromConfig(cfg), store });
    if (selection.kind === "nothing-to-post") {
      return { status: "nothing-to-post" };
    }

    const publisher = createFacebookPublisher({
      pageId: credentials.pageId,
      accessToken: credentials.accessToken,
      graphApiVersion: cfg.GRAPH_API_VERSION,
      timeoutMs: cfg.POST_TIMEOUT_SECONDS * 1000,
      captionTemplate: cfg.CAPTION_TEMPLATE,
      store,
      now: deps.now
    });

    const result = await publisher.publish(selection);
    if (!result.ok) {
      logger.error("publish failed; state unchanged", {
        kind: result.error.kind,
        error: result.error.message,
        index: selection.index
      });
      return failed(result.error);
    }

    logger.info("publish succeeded", {
      filename: selection.entry.filename,
      index: selection.index,
      postId: result.postId
    });
    return {
      status: "posted",
      index: selection.index,
      filename: selection.entry.filename,
      postId: result.postId
    };
  } catch (err) {
    const outcome = failed(err);
    if (err instanceof PosterError) {
      logger.error("run aborted", { kind: err.kind, error: err.message });
    } else {
      logger.error("run failed unexpectedly", { error: errorMessage(err) });
    }
    return outcome;
  }
}
