// ---------------------------------------------------------------------------
// In-process stand-in for the Valkey client
// ---------------------------------------------------------------------------
// Implements the subset of ioredis commands the comment core issues, with the
// same reply shapes. Spy on a method with `vi.spyOn(store, "get")` to inject
// failures.
// ---------------------------------------------------------------------------

import { vi } from "vitest";
import type { Store } from "../../src/store/index.js";
import type { Logger } from "../../src/lib/logger.js";

type Score = number | string;

function toScore(value: Score): number {
  if (value === "-inf") return -Infinity;
  if (value === "+inf" || value === "inf") return Infinity;
  return Number(value);
}

export class InMemoryStore {
  readonly strings = new Map<string, string>();
  readonly sets = new Map<string, Set<string>>();
  readonly zsets = new Map<string, Map<string, number>>();
  readonly hashes = new Map<string, Map<string, string>>();

  async get(key: string): Promise<string | null> {
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<"OK"> {
    this.strings.set(key, value);
    return "OK";
  }

  async sadd(key: string, ...members: string[]): Promise<number> {
    const set = this.sets.get(key) ?? new Set<string>();
    this.sets.set(key, set);
    let added = 0;
    for (const member of members) {
      if (!set.has(member)) {
        set.add(member);
        added++;
      }
    }
    return added;
  }

  async sismember(key: string, member: string): Promise<number> {
    return this.sets.get(key)?.has(member) ? 1 : 0;
  }

  async zadd(key: string, ...args: Array<string | number>): Promise<number> {
    const nx = args[0] === "NX";
    const pairs = nx ? args.slice(1) : args;
    const zset = this.zsets.get(key) ?? new Map<string, number>();
    this.zsets.set(key, zset);

    let added = 0;
    for (let i = 0; i + 1 < pairs.length; i += 2) {
      const score = Number(pairs[i]);
      const member = String(pairs[i + 1]);
      if (zset.has(member)) {
        if (!nx) zset.set(member, score);
        continue;
      }
      zset.set(member, score);
      added++;
    }
    return added;
  }

  async zscore(key: string, member: string): Promise<string | null> {
    const score = this.zsets.get(key)?.get(member);
    return score === undefined ? null : String(score);
  }

  async zrem(key: string, ...members: string[]): Promise<number> {
    const zset = this.zsets.get(key);
    if (!zset) return 0;
    let removed = 0;
    for (const member of members) {
      if (zset.delete(member)) removed++;
    }
    return removed;
  }

  async zrangebyscore(
    key: string,
    min: Score,
    max: Score,
    limitToken?: "LIMIT",
    offset?: number,
    count?: number,
  ): Promise<string[]> {
    const lo = toScore(min);
    const hi = toScore(max);
    const members = [...(this.zsets.get(key) ?? new Map<string, number>())]
      .filter(([, score]) => score >= lo && score <= hi)
      .sort(([ma, sa], [mb, sb]) => sa - sb || (ma < mb ? -1 : ma > mb ? 1 : 0))
      .map(([member]) => member);

    if (limitToken !== "LIMIT") return members;
    const start = offset ?? 0;
    return count === undefined || count < 0
      ? members.slice(start)
      : members.slice(start, start + count);
  }

  async hset(key: string, fields: Record<string, string>): Promise<number> {
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    this.hashes.set(key, hash);
    let added = 0;
    for (const [field, value] of Object.entries(fields)) {
      if (!hash.has(field)) added++;
      hash.set(field, value);
    }
    return added;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    return Object.fromEntries(this.hashes.get(key) ?? []);
  }

  async ping(): Promise<"PONG"> {
    return "PONG";
  }

  async quit(): Promise<"OK"> {
    return "OK";
  }

  /** Members of a sorted set in score order. */
  members(key: string): string[] {
    return [...(this.zsets.get(key) ?? new Map<string, number>())]
      .sort(([, a], [, b]) => a - b)
      .map(([member]) => member);
  }

  asStore(): Store {
    return this as unknown as Store;
  }
}

export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn().mockReturnThis(),
    silent: vi.fn(),
    level: "silent",
  } as unknown as Logger;
}
