import type { Store } from "../store/index.js";
import { CorruptIndexError, backendUnavailable } from "../lib/api-errors.js";
import { escapeHtml } from "../lib/sanitize.js";
import type { KeySchema } from "./keys.js";
import type { CommentRecords } from "./records.js";
import type { PublicComment, ThreadRef } from "./types.js";

export interface CommentReader {
  /**
   * Approved comments of a thread, oldest first, at most `limit` of them.
   * Author and content come back HTML-escaped.
   */
  list(thread: ThreadRef, limit?: number): Promise<PublicComment[]>;
}

export function createCommentReader(
  store: Store,
  keys: KeySchema,
  records: CommentRecords,
  defaultLimit: number,
): CommentReader {
  return {
    async list(thread, limit = defaultLimit) {
      let ids: string[];
      try {
        ids = await store.zrangebyscore(keys.approved(thread), "-inf", "+inf", "LIMIT", 0, limit);
      } catch (err: unknown) {
        throw backendUnavailable(err, "listing comments");
      }

      const comments: PublicComment[] = [];
      for (const id of ids) {
        const record = await records.load(thread, Number(id));
        if (!record) {
          throw new CorruptIndexError(keys.comment(thread, Number(id)));
        }
        comments.push({
          id,
          author: escapeHtml(record.comment_author),
          content: escapeHtml(record.comment_content),
        });
      }
      return comments;
    },
  };
}
