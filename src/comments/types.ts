// ---------------------------------------------------------------------------
// Comment domain types
// ---------------------------------------------------------------------------

/** A comment thread: every comment posted against one (host, path) pair. */
export interface ThreadRef {
  host: string;
  path: string;
}

/** Thread-unique identifier; also the comment's creation time in epoch seconds. */
export type CommentId = number;

/**
 * A comment record as persisted. Field names are the ones the spam
 * classifier expects, so the record is forwarded without renaming.
 */
export interface StoredComment {
  permalink: string;
  user_ip: string;
  user_agent: string;
  referrer: string;
  comment_author: string;
  comment_author_email: string;
  comment_author_url: string;
  comment_content: string;
}

/** The part of a comment served to embedding pages. Text is HTML-escaped. */
export interface PublicComment {
  id: string;
  author: string;
  content: string;
}
