import type { Store } from "../store/index.js";
import type { Logger } from "../lib/logger.js";
import type { SpamClassifier } from "../services/spam-classifier.js";
import { CommentNotFoundError, backendUnavailable } from "../lib/api-errors.js";
import type { KeySchema } from "./keys.js";
import type { CommentRecords } from "./records.js";
import type { CommentId, ThreadRef } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ModerationService {
  /**
   * Ask the spam classifier about a stored comment and, on a ham verdict,
   * promote it into the approved index. Resolves false when no classifier is
   * configured, on a spam verdict, or when the comment was already approved.
   * The comment record must exist.
   */
  classify(thread: ThreadRef, id: CommentId): Promise<boolean>;

  /** Ids in the full index that are not approved, oldest first. */
  listPending(thread: ThreadRef): Promise<CommentId[]>;

  /** Approve by hand. Resolves false when the id was already approved. */
  approve(thread: ThreadRef, id: CommentId): Promise<boolean>;

  /**
   * Mark an approved comment as spam: drop it from the approved index while
   * the full index and the record stay. Resolves false when it was not listed.
   */
  retract(thread: ThreadRef, id: CommentId): Promise<boolean>;
}

type Feedback = "spam" | "ham";

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createModerationService(
  store: Store,
  keys: KeySchema,
  records: CommentRecords,
  classifier: SpamClassifier,
  logger: Logger,
): ModerationService {
  async function promote(thread: ThreadRef, id: CommentId): Promise<boolean> {
    try {
      const added = await store.zadd(keys.approved(thread), "NX", id, String(id));
      return added === 1;
    } catch (err: unknown) {
      throw backendUnavailable(err, "approving comment");
    }
  }

  async function readIndex(key: string): Promise<CommentId[]> {
    try {
      const members = await store.zrangebyscore(key, "-inf", "+inf");
      return members.map(Number);
    } catch (err: unknown) {
      throw backendUnavailable(err, "reading comment index");
    }
  }

  // Classifier feedback never decides the outcome of a moderator action.
  async function sendFeedback(thread: ThreadRef, id: CommentId, kind: Feedback): Promise<void> {
    if (!classifier.isEnabled()) return;
    try {
      const comment = await records.load(thread, id);
      if (!comment) {
        logger.warn({ host: thread.host, path: thread.path, id }, "No record to report to spam classifier");
        return;
      }
      if (kind === "spam") {
        await classifier.submitSpam(comment);
      } else {
        await classifier.submitHam(comment);
      }
    } catch (err: unknown) {
      logger.warn({ err, host: thread.host, path: thread.path, id, kind }, "Failed to report comment to spam classifier");
    }
  }

  return {
    async classify(thread, id) {
      if (!classifier.isEnabled()) return false;

      const comment = await records.load(thread, id);
      if (!comment) {
        throw new CommentNotFoundError(id);
      }

      const isSpam = await classifier.checkComment(comment);
      if (isSpam) {
        logger.info({ host: thread.host, path: thread.path, id }, "Spam classifier flagged comment");
        return false;
      }

      return promote(thread, id);
    },

    async listPending(thread) {
      const [all, approved] = await Promise.all([
        readIndex(keys.all(thread)),
        readIndex(keys.approved(thread)),
      ]);
      const listed = new Set(approved);
      return all.filter((id) => !listed.has(id));
    },

    async approve(thread, id) {
      let score: string | null;
      try {
        score = await store.zscore(keys.all(thread), String(id));
      } catch (err: unknown) {
        throw backendUnavailable(err, "looking up comment");
      }
      if (score === null) {
        throw new CommentNotFoundError(id);
      }

      const added = await promote(thread, id);
      if (added) {
        await sendFeedback(thread, id, "ham");
      }
      return added;
    },

    async retract(thread, id) {
      let removed: number;
      try {
        removed = await store.zrem(keys.approved(thread), String(id));
      } catch (err: unknown) {
        throw backendUnavailable(err, "retracting comment");
      }
      if (removed !== 1) return false;

      await sendFeedback(thread, id, "spam");
      return true;
    },
  };
}
