import type { CommentId, ThreadRef } from "./types.js";

/**
 * Key layout for one namespace. Per-thread keys share the `{ns://host/path}`
 * hash tag so a thread never spans cluster slots.
 *
 * - `{ns}:auto_enable`            set of hosts enabled on first use
 * - `{ns://host/path}:enabled`    explicit per-thread flag ("true"/"false")
 * - `{ns://host/path}:all`        sorted set of every allocated id
 * - `{ns://host/path}:approved`   sorted set of publicly listed ids
 * - `{ns://host/path}:comment:id` hash with the comment record
 */
export interface KeySchema {
  autoEnable(): string;
  enabled(thread: ThreadRef): string;
  all(thread: ThreadRef): string;
  approved(thread: ThreadRef): string;
  comment(thread: ThreadRef, id: CommentId): string;
}

export function createKeySchema(namespace: string): KeySchema {
  const threadTag = (thread: ThreadRef) =>
    `{${namespace}://${thread.host}${thread.path}}`;

  return {
    autoEnable: () => `{${namespace}}:auto_enable`,
    enabled: (thread) => `${threadTag(thread)}:enabled`,
    all: (thread) => `${threadTag(thread)}:all`,
    approved: (thread) => `${threadTag(thread)}:approved`,
    comment: (thread, id) => `${threadTag(thread)}:comment:${id}`,
  };
}
