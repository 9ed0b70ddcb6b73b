import type { Logger } from "../lib/logger.js";
import type { ModerationService } from "../comments/moderation.js";
import type { CommentId, ThreadRef } from "../comments/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReclassifyResult {
  approved: CommentId[];
  stillPending: CommentId[];
  failed: CommentId[];
  durationMs: number;
}

export type JobState = "idle" | "running" | "completed" | "failed";

export interface JobStatus {
  state: JobState;
  lastRunAt: Date | null;
  lastDurationMs: number | null;
  lastError: string | null;
}

export interface ReclassifyPendingJob {
  run(thread: ThreadRef): Promise<ReclassifyResult>;
  getStatus(): JobStatus;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Retry classification for comments a thread still holds as pending, e.g.
 * after the classifier was unreachable at submission time. A failing comment
 * is counted and skipped.
 */
export function createReclassifyPendingJob(
  moderation: ModerationService,
  logger: Logger,
  now: () => number = Date.now,
): ReclassifyPendingJob {
  let state: JobState = "idle";
  let lastRunAt: Date | null = null;
  let lastDurationMs: number | null = null;
  let lastError: string | null = null;

  async function run(thread: ThreadRef): Promise<ReclassifyResult> {
    const start = now();
    state = "running";
    logger.info({ host: thread.host, path: thread.path }, "Reclassifying pending comments");

    try {
      const pending = await moderation.listPending(thread);
      const result: ReclassifyResult = { approved: [], stillPending: [], failed: [], durationMs: 0 };

      for (const id of pending) {
        try {
          if (await moderation.classify(thread, id)) {
            result.approved.push(id);
          } else {
            result.stillPending.push(id);
          }
        } catch (err: unknown) {
          logger.warn({ err, host: thread.host, path: thread.path, id }, "Reclassification failed");
          result.failed.push(id);
        }
      }

      result.durationMs = now() - start;
      state = "completed";
      lastRunAt = new Date(start);
      lastDurationMs = result.durationMs;
      lastError = null;

      logger.info(
        {
          host: thread.host,
          path: thread.path,
          approved: result.approved.length,
          stillPending: result.stillPending.length,
          failed: result.failed.length,
          durationMs: result.durationMs,
        },
        "Reclassification completed",
      );

      return result;
    } catch (err: unknown) {
      state = "failed";
      lastRunAt = new Date(start);
      lastDurationMs = now() - start;
      lastError = err instanceof Error ? err.message : String(err);
      logger.error({ err, host: thread.host, path: thread.path }, "Reclassification job failed");
      throw err;
    }
  }

  return {
    run,
    getStatus: () => ({ state, lastRunAt, lastDurationMs, lastError }),
  };
}
