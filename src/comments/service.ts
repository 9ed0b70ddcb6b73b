import type { Logger } from "../lib/logger.js";
import { CommentsDisabledError, InvalidInputError } from "../lib/api-errors.js";
import { describeIssue, submitCommentSchema } from "../validation/comments.js";
import type { CommentSubmission } from "../validation/comments.js";
import type { EnablementResolver } from "./enablement.js";
import type { IdAllocator } from "./allocator.js";
import type { CommentRecords } from "./records.js";
import type { ModerationService } from "./moderation.js";
import type { CommentReader } from "./reader.js";
import { parseThreadRef } from "./thread-ref.js";
import type { CommentId, PublicComment, StoredComment, ThreadRef } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SubmitResult {
  thread: ThreadRef;
  id: CommentId;
  approved: boolean;
  /** The submitted URL, where the poster is sent back to. */
  permalink: string;
}

export interface CommentService {
  /**
   * Store a new comment on an enabled thread and run it past the spam
   * classifier. Classification failures leave the comment pending; they
   * never fail the submission.
   */
  submit(input: CommentSubmission): Promise<SubmitResult>;

  /** Approved comments for the thread a URL names. */
  list(url: string, limit?: number): Promise<PublicComment[]>;
}

export interface CommentServiceDeps {
  enablement: EnablementResolver;
  allocator: IdAllocator;
  records: CommentRecords;
  moderation: ModerationService;
  reader: CommentReader;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createCommentService(deps: CommentServiceDeps): CommentService {
  const { enablement, allocator, records, moderation, reader, logger } = deps;

  async function classifySafely(thread: ThreadRef, id: CommentId): Promise<boolean> {
    try {
      return await moderation.classify(thread, id);
    } catch (err: unknown) {
      logger.warn({ err, host: thread.host, path: thread.path, id }, "Comment classification failed, left pending");
      return false;
    }
  }

  return {
    async submit(input) {
      const parsed = submitCommentSchema.safeParse(input);
      if (!parsed.success) {
        throw new InvalidInputError(describeIssue(parsed.error));
      }
      const req = parsed.data;
      const thread = parseThreadRef(req.url);

      if (!(await enablement.isEnabled(thread))) {
        throw new CommentsDisabledError();
      }

      const comment: StoredComment = {
        permalink: req.url,
        user_ip: req.user_ip,
        user_agent: req.user_agent,
        referrer: req.referrer,
        comment_author: req.comment_author,
        comment_author_email: req.comment_author_email,
        comment_author_url: req.comment_author_url,
        comment_content: req.comment_content,
      };

      const id = await allocator.allocate(thread);
      await records.save(thread, id, comment);

      const approved = await classifySafely(thread, id);
      logger.info(
        { host: thread.host, path: thread.path, id },
        approved ? "New approved comment" : "New unapproved comment",
      );

      return { thread, id, approved, permalink: req.url };
    },

    async list(url, limit) {
      return reader.list(parseThreadRef(url), limit);
    },
  };
}
