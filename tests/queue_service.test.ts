import { describe, expect, it } from "vitest";
import { QueueService } from "@services/queue_service.ts";
import { MemoryResultStore } from "./support/memory_store.ts";

function clock(start = 1_000) {
  let now = start;
  return () => now++;
}

describe("QueueService", () => {
  it("dequeues jobs in submission order", async () => {
    const queue = new QueueService(new MemoryResultStore(), {}, clock());

    await queue.enqueue("job-a", "pdf");
    await queue.enqueue("job-b", "image");
    await queue.enqueue("job-c", "hybrid-pdf");

    expect((await queue.dequeue())?.jobId).toBe("job-a");
    expect((await queue.dequeue())?.jobId).toBe("job-b");
    const last = await queue.dequeue();
    expect(last?.jobId).toBe("job-c");
    expect(last?.kind).toBe("hybrid-pdf");
    expect(await queue.dequeue()).toBeNull();
  });

  it("reports position and estimated wait on enqueue", async () => {
    const queue = new QueueService(new MemoryResultStore(), { averageJobSeconds: 30, workerCount: 2 }, clock());

    await queue.enqueue("job-a", "pdf");
    await queue.enqueue("job-b", "pdf");
    const third = await queue.enqueue("job-c", "pdf");

    expect(third.success).toBe(true);
    expect(third.queuePosition).toBe(3);
    expect(third.estimatedWaitSeconds).toBe(60);
  });

  it("stops accepting at the size ceiling", async () => {
    const queue = new QueueService(new MemoryResultStore(), { maxQueueSize: 2 }, clock());

    await queue.enqueue("job-a", "pdf");
    expect((await queue.checkCapacity()).accepting).toBe(true);

    await queue.enqueue("job-b", "pdf");
    expect(await queue.checkCapacity()).toMatchObject({ accepting: false, reason: "queue_full", size: 2, maxSize: 2 });
    expect((await queue.healthCheck()).status).toBe("unhealthy");
  });

  it("keeps accepting when rejection is disabled", async () => {
    const queue = new QueueService(new MemoryResultStore(), { maxQueueSize: 1, rejectionEnabled: false }, clock());

    await queue.enqueue("job-a", "pdf");
    await queue.enqueue("job-b", "pdf");

    expect((await queue.checkCapacity()).accepting).toBe(true);
  });

  it("turns away payloads the store has no memory left for", async () => {
    const store = new MemoryResultStore();
    store.maxBytes = 10_000;
    store.usedBytes = 8_000;
    const queue = new QueueService(store, {}, clock());

    // 750 bytes encode to 1000: exactly the 90% mark
    expect((await queue.checkCapacity(750)).accepting).toBe(true);

    expect(await queue.checkCapacity(753)).toEqual({
      accepting: false,
      reason: "storage_full",
      size: 0,
      maxSize: 100,
      estimatedWaitSeconds: 0,
      storage: { usedBytes: 8_000, maxBytes: 10_000, requiredBytes: 1_004 },
    });
  });

  it("skips the memory check when the store has no limit", async () => {
    const store = new MemoryResultStore();
    store.usedBytes = 50 * 1024 * 1024;
    const queue = new QueueService(store, {}, clock());

    expect((await queue.checkCapacity(40 * 1024 * 1024)).accepting).toBe(true);
  });

  it("requeues a message behind later work with its attempt counted", async () => {
    const queue = new QueueService(new MemoryResultStore(), {}, clock());
    await queue.enqueue("job-a", "pdf");
    const first = await queue.dequeue();
    if (!first) throw new Error("expected a message");

    await queue.requeue(first);

    expect(await queue.dequeue()).toEqual({ ...first, attempt: 1 });
  });

  it("skips entries it cannot parse", async () => {
    const store = new MemoryResultStore();
    const queue = new QueueService(store, {}, clock(5_000));

    await store.enqueue("queue:extraction", "not a message", 1);
    await queue.enqueue("job-a", "pdf");

    expect((await queue.dequeue())?.jobId).toBe("job-a");
  });

  it("reports enqueue failures instead of throwing", async () => {
    const store = new MemoryResultStore();
    const queue = new QueueService(store, {}, clock());
    store.outage = true;

    const result = await queue.enqueue("job-a", "pdf");

    expect(result.success).toBe(false);
    expect(result.error).toBeDefined();
  });
});
