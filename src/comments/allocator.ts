import { setTimeout as sleep } from "node:timers/promises";
import type { Store } from "../store/index.js";
import type { Logger } from "../lib/logger.js";
import { AllocationContentionError, backendUnavailable } from "../lib/api-errors.js";
import type { KeySchema } from "./keys.js";
import type { CommentId, ThreadRef } from "./types.js";

export interface AllocatorOptions {
  /** Attempts before giving up. 0 retries until a free second comes round. */
  maxAttempts: number;
  /** Wait between a collision and the next attempt. */
  retryDelayMs: number;
  /** Clock in epoch milliseconds. */
  now?: () => number;
  wait?: (ms: number) => Promise<unknown>;
}

export interface IdAllocator {
  /**
   * Claim a fresh identifier in the thread's full index. The id is the wall
   * clock second at which the claim succeeded; a collision with another
   * comment in the same second waits and samples the clock again.
   */
  allocate(thread: ThreadRef): Promise<CommentId>;
}

export function createIdAllocator(
  store: Store,
  keys: KeySchema,
  logger: Logger,
  options: AllocatorOptions,
): IdAllocator {
  const now = options.now ?? Date.now;
  const wait = options.wait ?? sleep;

  return {
    async allocate(thread) {
      const key = keys.all(thread);

      for (let attempt = 1; ; attempt++) {
        const candidate = Math.floor(now() / 1000);

        let added: number;
        try {
          added = await store.zadd(key, "NX", candidate, String(candidate));
        } catch (err: unknown) {
          throw backendUnavailable(err, "allocating comment id");
        }
        if (added === 1) return candidate;

        if (options.maxAttempts > 0 && attempt >= options.maxAttempts) {
          logger.warn({ key, attempts: attempt }, "Comment id allocation gave up");
          throw new AllocationContentionError(attempt);
        }

        logger.debug({ key, candidate, attempt }, "Comment id taken, retrying");
        await wait(options.retryDelayMs);
      }
    },
  };
}
