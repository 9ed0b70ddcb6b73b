import type { Env } from "../config/env.js";
import type { Logger } from "../lib/logger.js";
import type { Store } from "../store/index.js";
import type { SpamClassifier } from "../services/spam-classifier.js";
import { createKeySchema } from "./keys.js";
import type { KeySchema } from "./keys.js";
import { createEnablementResolver } from "./enablement.js";
import { createIdAllocator } from "./allocator.js";
import { createCommentRecords } from "./records.js";
import { createModerationService } from "./moderation.js";
import type { ModerationService } from "./moderation.js";
import { createCommentReader } from "./reader.js";
import { createCommentService } from "./service.js";
import type { CommentService } from "./service.js";

export interface CommentCore {
  keys: KeySchema;
  comments: CommentService;
  moderation: ModerationService;
}

type CoreEnv = Pick<
  Env,
  "KEY_NAMESPACE" | "COMMENTS_PAGE_SIZE" | "ALLOCATION_MAX_ATTEMPTS" | "ALLOCATION_RETRY_DELAY_MS"
>;

/** Wire the comment core onto one store connection and classifier. */
export function createCommentCore(
  store: Store,
  classifier: SpamClassifier,
  env: CoreEnv,
  logger: Logger,
): CommentCore {
  const keys = createKeySchema(env.KEY_NAMESPACE);
  const records = createCommentRecords(store, keys);
  const moderation = createModerationService(store, keys, records, classifier, logger);

  const comments = createCommentService({
    enablement: createEnablementResolver(store, keys, logger),
    allocator: createIdAllocator(store, keys, logger, {
      maxAttempts: env.ALLOCATION_MAX_ATTEMPTS,
      retryDelayMs: env.ALLOCATION_RETRY_DELAY_MS,
    }),
    records,
    moderation,
    reader: createCommentReader(store, keys, records, env.COMMENTS_PAGE_SIZE),
    logger,
  });

  return { keys, comments, moderation };
}
