/**
 * Rate Limiting Models and Types
 * Fixed-window request limits per client identity and operation
 */

/**
 * Rate limit operation types
 */
export type RateLimitOperation = "document_upload" | "status_check" | "results_retrieval";

/**
 * Rate limit configuration for one operation
 */
export interface RateLimitConfig {
  operation: RateLimitOperation;
  limit: number;
  windowSeconds: number;
}

/**
 * Outcome of a single check-and-increment
 */
export interface RateLimitResult {
  allowed: boolean;
  operation: RateLimitOperation;
  identity: string;
  limit: number;
  remaining: number;
  count: number;
  windowId: number;
  resetAt: Date;
  retryAfter: number; // seconds until the window rolls over
  headers: Record<string, string>;
  failOpen: boolean;
}
