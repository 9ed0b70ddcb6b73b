import type { Store } from "../store/index.js";
import { backendUnavailable } from "../lib/api-errors.js";
import type { KeySchema } from "./keys.js";
import type { CommentId, StoredComment, ThreadRef } from "./types.js";

export interface CommentRecords {
  save(thread: ThreadRef, id: CommentId, comment: StoredComment): Promise<void>;
  /** Returns null when no record exists under the id. */
  load(thread: ThreadRef, id: CommentId): Promise<StoredComment | null>;
}

export function createCommentRecords(store: Store, keys: KeySchema): CommentRecords {
  return {
    async save(thread, id, comment) {
      try {
        await store.hset(keys.comment(thread, id), { ...comment });
      } catch (err: unknown) {
        throw backendUnavailable(err, "storing comment");
      }
    },

    async load(thread, id) {
      let hash: Record<string, string>;
      try {
        hash = await store.hgetall(keys.comment(thread, id));
      } catch (err: unknown) {
        throw backendUnavailable(err, "reading comment");
      }
      if (Object.keys(hash).length === 0) return null;
      return toStoredComment(hash);
    },
  };
}

// Absent fields read back as empty strings, as they would from HGET.
function toStoredComment(hash: Record<string, string>): StoredComment {
  return {
    permalink: hash["permalink"] ?? "",
    user_ip: hash["user_ip"] ?? "",
    user_agent: hash["user_agent"] ?? "",
    referrer: hash["referrer"] ?? "",
    comment_author: hash["comment_author"] ?? "",
    comment_author_email: hash["comment_author_email"] ?? "",
    comment_author_url: hash["comment_author_url"] ?? "",
    comment_content: hash["comment_content"] ?? "",
  };
}
