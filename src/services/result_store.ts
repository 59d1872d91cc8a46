/**
 * Result Store
 * Shared key-value store with TTLs, atomic primitives and sorted-set queues.
 * Backs the job registry, result cache, rate limits and job queue.
 */

import { getLogger } from "@config/logging.ts";
import { redis } from "@config/redis.ts";
import type { RedisClient } from "@config/redis.ts";
import { ErrorFactory, ErrorUtils } from "@utils/error_catalog.ts";

export interface ResultStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  /** SET NX with a millisecond expiry; true when this caller created the key */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  delete(key: string): Promise<void>;
  /** Delete only while the key still holds `expected` */
  deleteIfEquals(key: string, expected: string): Promise<boolean>;
  /** Reset the expiry only while the key still holds `expected` */
  extendIfEquals(key: string, expected: string, ttlMs: number): Promise<boolean>;
  /** Increment a counter, setting its expiry when the counter is created */
  incrementWindow(key: string, ttlSeconds: number): Promise<number>;
  enqueue(queue: string, member: string, score: number): Promise<void>;
  /** Pop the lowest-scored member */
  dequeue(queue: string): Promise<string | null>;
  queueLength(queue: string): Promise<number>;
  /** Round trip latency in milliseconds */
  ping(): Promise<number>;
  memoryUsage(): Promise<MemoryUsage>;
}

export interface MemoryUsage {
  usedBytes: number;
  /** 0 when the store has no memory limit */
  maxBytes: number;
}

const INCREMENT_WINDOW_SCRIPT = `
local current = redis.call('INCR', KEYS[1])
if current == 1 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return current
`;

const COMPARE_AND_DELETE_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

const COMPARE_AND_EXPIRE_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('PEXPIRE', KEYS[1], ARGV[2])
end
return 0
`;

function readInfoField(info: string, field: string): number {
  const match = new RegExp(`^${field}:(\\d+)`, "m").exec(info);
  return match?.[1] ? Number(match[1]) : 0;
}

export class RedisResultStore implements ResultStore {
  private logger = getLogger("result-store");

  constructor(private readonly clientProvider: () => RedisClient = () => redis.getClient()) {}

  async get(key: string): Promise<string | null> {
    return await this.run("get", key, (client) => client.get(key));
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    await this.run("set", key, (client) =>
      ttlSeconds ? client.set(key, value, { EX: ttlSeconds }) : client.set(key, value));
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const reply = await this.run("setIfAbsent", key, (client) =>
      client.set(key, value, { NX: true, PX: ttlMs }));
    return reply === "OK";
  }

  async delete(key: string): Promise<void> {
    await this.run("delete", key, (client) => client.del(key));
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    const reply = await this.run("deleteIfEquals", key, (client) =>
      client.eval(COMPARE_AND_DELETE_SCRIPT, { keys: [key], arguments: [expected] }));
    return reply === 1;
  }

  async extendIfEquals(key: string, expected: string, ttlMs: number): Promise<boolean> {
    const reply = await this.run("extendIfEquals", key, (client) =>
      client.eval(COMPARE_AND_EXPIRE_SCRIPT, { keys: [key], arguments: [expected, String(ttlMs)] }));
    return reply === 1;
  }

  async incrementWindow(key: string, ttlSeconds: number): Promise<number> {
    const reply = await this.run("incrementWindow", key, (client) =>
      client.eval(INCREMENT_WINDOW_SCRIPT, { keys: [key], arguments: [String(ttlSeconds)] }));

    if (typeof reply !== "number") {
      throw ErrorFactory.storage("unavailable", {}, `Unexpected counter reply for ${key}`);
    }
    return reply;
  }

  async enqueue(queue: string, member: string, score: number): Promise<void> {
    await this.run("enqueue", queue, (client) => client.zAdd(queue, { score, value: member }));
  }

  async dequeue(queue: string): Promise<string | null> {
    const popped = await this.run("dequeue", queue, (client) => client.zPopMin(queue));
    return popped ? popped.value : null;
  }

  async queueLength(queue: string): Promise<number> {
    return await this.run("queueLength", queue, (client) => client.zCard(queue));
  }

  async ping(): Promise<number> {
    const startTime = Date.now();
    await this.run("ping", "-", (client) => client.ping());
    return Date.now() - startTime;
  }

  async memoryUsage(): Promise<MemoryUsage> {
    const info = await this.run("memoryUsage", "-", (client) => client.info("memory"));
    return {
      usedBytes: readInfoField(info, "used_memory"),
      maxBytes: readInfoField(info, "maxmemory"),
    };
  }

  /**
   * Run a command, surfacing any transport failure as StorageUnavailable
   */
  private async run<T>(operation: string, key: string, command: (client: RedisClient) => Promise<T>): Promise<T> {
    try {
      return await command(this.clientProvider());
    } catch (error) {
      this.logger.error(`Store operation ${operation} failed for ${key}`, {
        error: ErrorUtils.getMessage(error),
      });
      throw ErrorFactory.storage("unavailable", { metadata: { operation, key } }, ErrorUtils.getMessage(error));
    }
  }
}
