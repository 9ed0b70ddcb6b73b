import type { Store } from "../store/index.js";
import type { Logger } from "../lib/logger.js";
import { BackendUnavailableError, backendUnavailable } from "../lib/api-errors.js";
import { parseBoolLiteral } from "../lib/bool-literal.js";
import type { KeySchema } from "./keys.js";
import type { ThreadRef } from "./types.js";

export interface EnablementResolver {
  /**
   * Whether the thread accepts new comments. An explicit per-thread flag wins;
   * without one, hosts on the auto-enable list are enabled and the decision is
   * cached as a flag. A negative fallback is never written.
   */
  isEnabled(thread: ThreadRef): Promise<boolean>;
}

export function createEnablementResolver(
  store: Store,
  keys: KeySchema,
  logger: Logger,
): EnablementResolver {
  async function readFlag(thread: ThreadRef): Promise<boolean | null> {
    const key = keys.enabled(thread);
    let raw: string | null;
    try {
      raw = await store.get(key);
    } catch (err: unknown) {
      throw backendUnavailable(err, "reading enablement flag");
    }
    if (raw === null) return null;

    const flag = parseBoolLiteral(raw);
    if (flag === null) {
      throw new BackendUnavailableError(`enablement flag ${key} holds non-boolean value "${raw}"`);
    }
    return flag;
  }

  async function cacheEnabled(thread: ThreadRef): Promise<void> {
    const key = keys.enabled(thread);
    try {
      await store.set(key, "true");
    } catch (err: unknown) {
      logger.warn({ err, key }, "Failed to cache auto-enabled flag");
    }
  }

  return {
    async isEnabled(thread) {
      const flag = await readFlag(thread);
      if (flag !== null) return flag;

      let member: number;
      try {
        member = await store.sismember(keys.autoEnable(), thread.host);
      } catch (err: unknown) {
        throw backendUnavailable(err, "checking auto-enable hosts");
      }
      if (member !== 1) return false;

      await cacheEnabled(thread);
      logger.debug({ host: thread.host, path: thread.path }, "Thread auto-enabled");
      return true;
    },
  };
}
