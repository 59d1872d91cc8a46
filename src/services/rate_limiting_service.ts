/**
 * Rate Limiting Service
 * Fixed-window request counting shared by every service instance through the result store
 */

import { getLogger } from "@config/logging.ts";
import type { RateLimitConfig, RateLimitOperation, RateLimitResult } from "@models/rate_limiting.ts";
import type { ResultStore } from "@services/result_store.ts";
import { ErrorUtils } from "@utils/error_catalog.ts";

export const RATE_LIMIT_KEY_PREFIX = "rate_limit:";

/**
 * Default rate limit configurations
 */
export const DEFAULT_RATE_LIMITS: Record<RateLimitOperation, RateLimitConfig> = {
  document_upload: { operation: "document_upload", limit: 10, windowSeconds: 60 },
  status_check: { operation: "status_check", limit: 60, windowSeconds: 60 },
  results_retrieval: { operation: "results_retrieval", limit: 30, windowSeconds: 60 },
};

export interface RateLimitingOptions {
  enabled?: boolean;
  limits?: Partial<Record<RateLimitOperation, Partial<RateLimitConfig>>>;
  now?: () => number;
}

export class RateLimitingService {
  private logger = getLogger("rate-limit");
  private configs: Map<RateLimitOperation, RateLimitConfig> = new Map();
  private readonly enabled: boolean;
  private readonly now: () => number;

  constructor(private readonly store: ResultStore, options: RateLimitingOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? Date.now;

    for (const config of Object.values(DEFAULT_RATE_LIMITS)) {
      this.configs.set(config.operation, { ...config, ...options.limits?.[config.operation] });
    }
  }

  /**
   * Count one request for `identity` and decide whether it is allowed.
   * Requests are allowed while the window count stays at or below the limit.
   */
  async checkAndIncrement(
    identity: string,
    operation: RateLimitOperation = "document_upload",
  ): Promise<RateLimitResult> {
    const config = this.getConfig(operation);
    const nowMs = this.now();
    const windowMs = config.windowSeconds * 1000;
    const windowId = Math.floor(nowMs / windowMs);
    const resetAtMs = (windowId + 1) * windowMs;
    const retryAfter = Math.max(1, Math.ceil((resetAtMs - nowMs) / 1000));

    if (!this.enabled) {
      return this.buildResult(config, identity, windowId, resetAtMs, retryAfter, 0, false);
    }

    try {
      const key = this.windowKey(operation, identity, windowId);
      const count = await this.store.incrementWindow(key, config.windowSeconds);
      const result = this.buildResult(config, identity, windowId, resetAtMs, retryAfter, count, false);

      if (!result.allowed) {
        this.logger.warn(`Rate limit exceeded for ${identity} on ${operation} (${count}/${config.limit})`);
      }

      return result;
    } catch (error) {
      this.logger.warn(`Rate limit check failed for ${identity}, allowing request`, {
        error: ErrorUtils.getMessage(error),
      });

      // Fail open - allow request if rate limiting fails
      return this.buildResult(config, identity, windowId, resetAtMs, retryAfter, 0, true);
    }
  }

  getConfig(operation: RateLimitOperation): RateLimitConfig {
    return this.configs.get(operation) ?? DEFAULT_RATE_LIMITS[operation];
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  private windowKey(operation: RateLimitOperation, identity: string, windowId: number): string {
    return `${RATE_LIMIT_KEY_PREFIX}${operation}:${identity}:${windowId}`;
  }

  private buildResult(
    config: RateLimitConfig,
    identity: string,
    windowId: number,
    resetAtMs: number,
    retryAfter: number,
    count: number,
    failOpen: boolean,
  ): RateLimitResult {
    const allowed = count <= config.limit;
    const remaining = Math.max(0, config.limit - count);
    const headers: Record<string, string> = {
      "X-RateLimit-Limit": config.limit.toString(),
      "X-RateLimit-Remaining": remaining.toString(),
      "X-RateLimit-Reset": Math.floor(resetAtMs / 1000).toString(),
    };

    if (!allowed) {
      headers["Retry-After"] = retryAfter.toString();
    }

    return {
      allowed,
      operation: config.operation,
      identity,
      limit: config.limit,
      remaining,
      count,
      windowId,
      resetAt: new Date(resetAtMs),
      retryAfter,
      headers,
      failOpen,
    };
  }
}
