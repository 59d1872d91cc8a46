/**
 * Result Cache Service
 * Content-addressed extraction results with at-most-one computation per key
 */

import { generateUuid } from "@/deps.ts";
import { getLogger } from "@config/logging.ts";
import type { JobKind, ExtractionParameters } from "@models/job.ts";
import { StoredExtractionSchema } from "@models/document.ts";
import type { StoredExtraction } from "@models/document.ts";
import type { ResultStore } from "@services/result_store.ts";
import { ErrorUtils } from "@utils/error_catalog.ts";
import { sleep } from "@utils/error_recovery.ts";
import type { SleepFn } from "@utils/error_recovery.ts";
import { canonicalJson, sha256Hex } from "@utils/hashing.ts";
import { startLeaseHeartbeat } from "@utils/lease_heartbeat.ts";

export const CACHE_KEY_PREFIX = "ocr:result:";
export const LOCK_KEY_PREFIX = "lock:";

export interface CacheConfig {
  ttlSeconds: number;
  lockLeaseMs: number;
  lockWaitTimeoutMs: number;
  pollIntervalMs: number;
}

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  ttlSeconds: 3600,
  lockLeaseMs: 600_000,
  lockWaitTimeoutMs: 120_000,
  pollIntervalMs: 250,
};

export type CacheLookup =
  | { hit: true; value: StoredExtraction }
  | { hit: false };

export interface ComputeOutcome {
  value: StoredExtraction;
  cached: boolean;
}

export interface ComputeOptions {
  /** Whether a computed value may be written to the cache */
  shouldStore?: (value: StoredExtraction) => boolean;
}

export interface CacheStats {
  ttlSeconds: number;
  lookups: number;
  hits: number;
  misses: number;
  computations: number;
  lockWaits: number;
  redundantComputations: number;
}

/**
 * Cache key for a document and the parameters that influence its output
 */
export function deriveCacheKey(contentHash: string, kind: JobKind, parameters: ExtractionParameters): string {
  const fingerprint = sha256Hex(`${contentHash}|${canonicalJson({ kind, parameters })}`);
  return `${CACHE_KEY_PREFIX}${fingerprint}`;
}

export class CacheService {
  private logger = getLogger("cache");
  private config: CacheConfig;
  private stats = { lookups: 0, hits: 0, misses: 0, computations: 0, lockWaits: 0, redundantComputations: 0 };

  constructor(
    private readonly resultStore: ResultStore,
    config: Partial<CacheConfig> = {},
    private readonly sleepFn: SleepFn = sleep,
    private readonly now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
  }

  /**
   * Read a cached result. Corrupt entries count as misses.
   */
  async lookup(key: string): Promise<CacheLookup> {
    this.stats.lookups++;
    const raw = await this.resultStore.get(key);

    if (raw === null) {
      this.stats.misses++;
      return { hit: false };
    }

    const parsed = this.parse(raw);
    if (!parsed) {
      this.logger.warn(`Discarding unreadable cache entry ${key}`);
      this.stats.misses++;
      return { hit: false };
    }

    this.stats.hits++;
    return { hit: true, value: parsed };
  }

  /**
   * Write a result. Overwriting an existing entry is harmless: equal inputs give equal results.
   */
  async store(key: string, value: StoredExtraction, ttlSeconds = this.config.ttlSeconds): Promise<void> {
    await this.resultStore.set(key, JSON.stringify(value), ttlSeconds);
    this.logger.debug(`Cached result ${key} (ttl ${ttlSeconds}s)`);
  }

  /**
   * Return the cached value for `key`, or compute it while holding the key's lease lock.
   * Concurrent callers for the same key wait for the holder instead of computing.
   */
  async computeOrWait(
    key: string,
    compute: () => Promise<StoredExtraction>,
    options: ComputeOptions = {},
  ): Promise<ComputeOutcome> {
    const existing = await this.lookup(key);
    if (existing.hit) {
      return { value: existing.value, cached: true };
    }

    const lockKey = `${LOCK_KEY_PREFIX}${key}`;
    const deadline = this.now() + this.config.lockWaitTimeoutMs;
    let waited = false;

    while (true) {
      const token = generateUuid();
      if (await this.resultStore.setIfAbsent(lockKey, token, this.config.lockLeaseMs)) {
        return await this.computeWithLock(key, lockKey, token, compute, options);
      }

      if (!waited) {
        waited = true;
        this.stats.lockWaits++;
        this.logger.debug(`Waiting on in-flight computation for ${key}`);
      }

      // Holder is computing: poll until its result lands, the lock disappears, or we give up
      while (this.now() < deadline) {
        await this.sleepFn(this.config.pollIntervalMs);

        const polled = await this.lookup(key);
        if (polled.hit) {
          return { value: polled.value, cached: true };
        }

        if ((await this.resultStore.get(lockKey)) === null) {
          break;
        }
      }

      if (this.now() >= deadline) {
        this.stats.redundantComputations++;
        this.logger.warn(`Lock wait timed out for ${key}, computing without the lock`);
        const value = await this.runCompute(compute);
        await this.storeIfAllowed(key, value, options);
        return { value, cached: false };
      }
    }
  }

  getStats(): CacheStats {
    return { ttlSeconds: this.config.ttlSeconds, ...this.stats };
  }

  private async computeWithLock(
    key: string,
    lockKey: string,
    token: string,
    compute: () => Promise<StoredExtraction>,
    options: ComputeOptions,
  ): Promise<ComputeOutcome> {
    // Extend the lease while computing so a long job never lets a waiter start a second computation
    const heartbeat = startLeaseHeartbeat(
      lockKey,
      () => this.resultStore.extendIfEquals(lockKey, token, this.config.lockLeaseMs),
      this.config.lockLeaseMs / 3,
    );

    try {
      // Another holder may have finished between our lookup and acquiring the lock
      const recheck = await this.lookup(key);
      if (recheck.hit) {
        return { value: recheck.value, cached: true };
      }

      const value = await this.runCompute(compute);
      await this.storeIfAllowed(key, value, options);
      return { value, cached: false };
    } finally {
      heartbeat.stop();
      await this.releaseLock(lockKey, token);
    }
  }

  private async runCompute(compute: () => Promise<StoredExtraction>): Promise<StoredExtraction> {
    this.stats.computations++;
    return await compute();
  }

  private async storeIfAllowed(key: string, value: StoredExtraction, options: ComputeOptions): Promise<void> {
    if (options.shouldStore && !options.shouldStore(value)) {
      this.logger.debug(`Result for ${key} not cached`);
      return;
    }
    await this.store(key, value);
  }

  private async releaseLock(lockKey: string, token: string): Promise<void> {
    try {
      const released = await this.resultStore.deleteIfEquals(lockKey, token);
      if (!released) {
        this.logger.warn(`Lock ${lockKey} expired before release`);
      }
    } catch (error) {
      // The lease bounds how long an unreleased lock can block other callers
      this.logger.error(`Failed to release ${lockKey}`, { error: ErrorUtils.getMessage(error) });
    }
  }

  private parse(raw: string): StoredExtraction | null {
    try {
      const result = StoredExtractionSchema.safeParse(JSON.parse(raw));
      return result.success ? result.data : null;
    } catch {
      return null;
    }
  }
}
