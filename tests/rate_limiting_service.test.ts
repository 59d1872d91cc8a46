import { describe, expect, it } from "vitest";
import { RateLimitingService } from "@services/rate_limiting_service.ts";
import { MemoryResultStore } from "./support/memory_store.ts";

// 15 seconds into a 60 second window
const WINDOW_START = 60_000 * 28_333_333;
const START = WINDOW_START + 15_000;

describe("RateLimitingService", () => {
  it("allows the tenth request in a window and rejects the eleventh", async () => {
    const store = new MemoryResultStore();
    const limiter = new RateLimitingService(store, { now: () => START });

    for (let i = 1; i <= 10; i++) {
      const result = await limiter.checkAndIncrement("api_key:test-key");
      expect(result.allowed).toBe(true);
      expect(result.remaining).toBe(10 - i);
    }

    const rejected = await limiter.checkAndIncrement("api_key:test-key");
    expect(rejected.allowed).toBe(false);
    expect(rejected.remaining).toBe(0);
    expect(rejected.retryAfter).toBe(45);
    expect(rejected.headers["Retry-After"]).toBe("45");
  });

  it("allows requests again once the window rolls over", async () => {
    const store = new MemoryResultStore();
    let now = START;
    const limiter = new RateLimitingService(store, { now: () => now });

    for (let i = 0; i < 11; i++) {
      await limiter.checkAndIncrement("ip:10.0.0.1");
    }

    now = WINDOW_START + 60_000;
    const next = await limiter.checkAndIncrement("ip:10.0.0.1");

    expect(next.allowed).toBe(true);
    expect(next.count).toBe(1);
    expect(next.remaining).toBe(9);
  });

  it("builds rate limit headers from the window", async () => {
    const limiter = new RateLimitingService(new MemoryResultStore(), { now: () => START });

    const result = await limiter.checkAndIncrement("ip:10.0.0.2");

    expect(result.headers).toEqual({
      "X-RateLimit-Limit": "10",
      "X-RateLimit-Remaining": "9",
      "X-RateLimit-Reset": String((WINDOW_START + 60_000) / 1000),
    });
    expect(result.resetAt.getTime()).toBe(WINDOW_START + 60_000);
  });

  it("counts identities and operations separately", async () => {
    const limiter = new RateLimitingService(new MemoryResultStore(), { now: () => START });

    for (let i = 0; i < 10; i++) {
      await limiter.checkAndIncrement("ip:10.0.0.3");
    }

    expect((await limiter.checkAndIncrement("ip:10.0.0.4")).allowed).toBe(true);

    const status = await limiter.checkAndIncrement("ip:10.0.0.3", "status_check");
    expect(status.allowed).toBe(true);
    expect(status.limit).toBe(60);
  });

  it("applies configured limit overrides", async () => {
    const limiter = new RateLimitingService(new MemoryResultStore(), {
      now: () => START,
      limits: { document_upload: { limit: 2 } },
    });

    await limiter.checkAndIncrement("ip:10.0.0.5");
    await limiter.checkAndIncrement("ip:10.0.0.5");
    const third = await limiter.checkAndIncrement("ip:10.0.0.5");

    expect(third.allowed).toBe(false);
    expect(third.limit).toBe(2);
  });

  it("fails open when the store is unreachable", async () => {
    const store = new MemoryResultStore();
    store.outage = true;
    const limiter = new RateLimitingService(store, { now: () => START });

    const result = await limiter.checkAndIncrement("ip:10.0.0.6");

    expect(result.allowed).toBe(true);
    expect(result.failOpen).toBe(true);
  });

  it("does not touch the store when disabled", async () => {
    const store = new MemoryResultStore();
    const limiter = new RateLimitingService(store, { enabled: false, now: () => START });

    for (let i = 0; i < 20; i++) {
      expect((await limiter.checkAndIncrement("ip:10.0.0.7")).allowed).toBe(true);
    }
    expect(store.operations).toEqual([]);
  });

  it("sets the counter expiry to the window length", async () => {
    const store = new MemoryResultStore();
    const limiter = new RateLimitingService(store, { now: () => START });

    await limiter.checkAndIncrement("ip:10.0.0.8");

    const [key] = store.keys();
    expect(key).toBe(`rate_limit:document_upload:ip:10.0.0.8:${WINDOW_START / 60_000}`);
    const ttl = key ? store.ttlOf(key) : undefined;
    expect(ttl).toBeGreaterThan(59_000);
    expect(ttl).toBeLessThanOrEqual(60_000);
  });
});
