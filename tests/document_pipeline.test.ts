import { afterEach, describe, expect, it, vi } from "vitest";
import type { SubmissionRequest } from "@services/document_upload_service.ts";
import { ExtractionServiceError } from "@utils/error_catalog.ts";
import { FakeDocument, LONG_TEXT } from "./support/fakes.ts";
import type { FakePageLayout } from "./support/fakes.ts";
import { bytes, createHarness } from "./support/harness.ts";
import type { Harness } from "./support/harness.ts";

const HYBRID_PAGES: FakePageLayout[] = [
  { text: LONG_TEXT },
  { text: "" },
  { text: LONG_TEXT, images: 1, areaRatio: 0.5 },
];

function request(overrides: Partial<SubmissionRequest> = {}): SubmissionRequest {
  return {
    identity: "api_key:test-key",
    fileName: "scan.pdf",
    data: bytes("%PDF-1.7 test document"),
    options: { chunkSize: 2 },
    ...overrides,
  };
}

async function rejection(promise: Promise<unknown>): Promise<ExtractionServiceError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ExtractionServiceError) return error;
    throw error;
  }
  throw new Error("expected the call to fail");
}

async function drain(harness: Harness): Promise<void> {
  const worker = harness.worker();
  while (await worker.pollOnce()) {
    // keep going until the queue is empty
  }
}

describe("document pipeline", () => {
  let harness: Harness | undefined;

  afterEach(async () => {
    await harness?.services.workers.stopAllWorkers();
    harness = undefined;
  });

  it("processes a hybrid PDF from submission to result", async () => {
    const h = createHarness({ document: () => new FakeDocument(HYBRID_PAGES) });

    const submitted = await h.services.uploads.submitHybridPdf(request());
    expect(submitted).toMatchObject({ status: "queued", kind: "hybrid-pdf", queuePosition: 1 });
    expect((await h.services.registry.getStatus(submitted.jobId)).status).toBe("queued");

    expect(await h.worker().pollOnce()).toBe(true);

    const { job } = await h.services.status.getStatus("api_key:test-key", submitted.jobId);
    expect(job.status).toBe("completed");
    expect(job.progress).toEqual({ totalUnits: 3, completedUnits: 3, percent: 100 });

    const { result } = await h.services.status.getResult("api_key:test-key", submitted.jobId);
    if (result.state !== "completed") throw new Error(`unexpected state ${result.state}`);
    expect(result.result.cached).toBe(false);
    expect(result.result.fullText).toBe(`${LONG_TEXT}\n\ntext of page-2\n\ntext of page-3`);
    expect(result.result.pages.map((page) => page.extractionMethod)).toEqual([
      "direct",
      "recognition-engine",
      "recognition-engine",
    ]);
    expect(h.engine.calls.sort()).toEqual(["page-2", "page-3"]);
    expect(await h.store.get(`job:${submitted.jobId}:payload`)).toBeNull();
  });

  it("recognizes a submitted image as one page", async () => {
    const h = createHarness();

    const submitted = await h.services.uploads.submitImage(request({ fileName: "receipt.png", data: bytes("PNG") }));
    await drain(h);

    const view = await h.services.registry.getResult(submitted.jobId);
    if (view.state !== "completed") throw new Error(`unexpected state ${view.state}`);
    expect(view.result.pageCount).toBe(1);
    expect(view.result.fullText).toBe("text of page-1");
    expect(h.engine.calls).toEqual(["page-1"]);
    expect(h.decoder.opened).toBe(0);
  });

  it("computes identical documents once and serves the second from cache", async () => {
    const h = createHarness({ document: () => new FakeDocument([{}, {}, {}]), engineDelayMs: 5 });

    const first = await h.services.uploads.submitPdf(request());
    const second = await h.services.uploads.submitPdf(request());
    await Promise.all([h.worker().pollOnce(), h.worker().pollOnce()]);

    const views = await Promise.all([first, second].map((job) => h.services.registry.getResult(job.jobId)));
    const cachedFlags = views.map((view) => (view.state === "completed" ? view.result.cached : undefined));

    expect(cachedFlags.sort()).toEqual([false, true]);
    expect(h.engine.calls).toHaveLength(3);
    expect(h.decoder.opened).toBe(1);
  });

  it("reuses cached results across later submissions", async () => {
    const h = createHarness({ document: () => new FakeDocument([{}]) });

    await h.services.uploads.submitPdf(request());
    await drain(h);
    const again = await h.services.uploads.submitPdf(request());
    await drain(h);

    const view = await h.services.registry.getResult(again.jobId);
    expect(view.state === "completed" && view.result.cached).toBe(true);
    expect(h.engine.calls).toEqual(["page-1"]);
  });

  it("does not share results across different parameters", async () => {
    const h = createHarness({ document: () => new FakeDocument([{}]) });

    await h.services.uploads.submitPdf(request());
    await h.services.uploads.submitPdf(request({ options: { chunkSize: 2, dpi: 150 } }));
    await drain(h);

    expect(h.engine.calls).toEqual(["page-1", "page-1"]);
  });

  it("completes with page failures but leaves them out of the cache", async () => {
    const h = createHarness({ document: () => new FakeDocument([{}, {}, {}]) });
    h.engine.failing.add("page-2");

    const first = await h.services.uploads.submitPdf(request());
    await drain(h);

    const view = await h.services.registry.getResult(first.jobId);
    if (view.state !== "completed") throw new Error(`unexpected state ${view.state}`);
    expect(view.result.stats.failedPages).toBe(1);
    expect(view.result.fullText).toBe("text of page-1\n\ntext of page-3");

    await h.services.uploads.submitPdf(request());
    await drain(h);
    expect(h.engine.calls).toHaveLength(6);
  });

  it("fails jobs for documents that cannot be processed", async () => {
    const h = createHarness({ document: () => new FakeDocument([{}, {}], true) });

    const submitted = await h.services.uploads.submitPdf(request());
    await drain(h);

    const { job } = await h.services.status.getStatus("api_key:test-key", submitted.jobId);
    expect(job.status).toBe("failed");
    expect(job.error).toEqual({ code: "E2002", kind: "validation_failure", message: "Document is encrypted" });
  });

  it("fails jobs whose bytes do not decode", async () => {
    const h = createHarness();

    const submitted = await h.services.uploads.submitPdf(request());
    await drain(h);

    const view = await h.services.registry.getResult(submitted.jobId);
    expect(view).toEqual({
      state: "failed",
      jobId: submitted.jobId,
      error: { code: "E2002", kind: "validation_failure", message: "Could not open PDF: no document configured" },
    });
  });

  it("retries a completion write the store drops once", async () => {
    const h = createHarness({ document: () => new FakeDocument([{}]) });
    const submitted = await h.services.uploads.submitPdf(request());
    h.store.failNextSet((key, value) => key === `job:${submitted.jobId}` && value.includes('"status":"completed"'));

    expect(await h.worker().pollOnce()).toBe(true);

    expect((await h.services.registry.getStatus(submitted.jobId)).status).toBe("completed");
    const failedLater = await h.services.registry.fail(submitted.jobId, {
      code: "E6003",
      kind: "internal",
      message: "late failure",
    });
    expect(failedLater).toBeNull();
    expect((await h.services.registry.getStatus(submitted.jobId)).status).toBe("completed");
  });

  it("keeps the payload and requeues a job the store kept from starting", async () => {
    const h = createHarness({ document: () => new FakeDocument([{}]) });
    const submitted = await h.services.uploads.submitPdf(request());
    const startWrite = (key: string, value: string) =>
      key === `job:${submitted.jobId}` && value.includes('"status":"processing"');
    for (let attempt = 0; attempt < 3; attempt++) {
      h.store.failNextSet(startWrite);
    }
    const worker = h.worker();

    await expect(worker.pollOnce()).rejects.toBeInstanceOf(ExtractionServiceError);

    expect((await h.services.registry.getStatus(submitted.jobId)).status).toBe("queued");
    expect(await h.store.get(`job:${submitted.jobId}:payload`)).not.toBeNull();
    const requeued = await h.services.queue.dequeue();
    expect(requeued).toMatchObject({ jobId: submitted.jobId, attempt: 1 });
    if (requeued) await h.services.queue.requeue(requeued);

    expect(await worker.pollOnce()).toBe(true);

    expect((await h.services.registry.getStatus(submitted.jobId)).status).toBe("completed");
    expect(await h.store.get(`job:${submitted.jobId}:payload`)).toBeNull();
  });

  it("fails a job whose previous worker stopped mid-run", async () => {
    const h = createHarness({ document: () => new FakeDocument([{}]) });
    const submitted = await h.services.uploads.submitPdf(request());
    await h.services.registry.start(submitted.jobId, 1, "worker-gone");

    expect(await h.worker().pollOnce()).toBe(true);

    const { job } = await h.services.status.getStatus("api_key:test-key", submitted.jobId);
    expect(job.status).toBe("failed");
    expect(job.error).toEqual({ code: "E6003", kind: "internal", message: "Job was interrupted before it finished" });
    expect(h.engine.calls).toEqual([]);
  });

  it("rate limits uploads per identity", async () => {
    const h = createHarness({ document: () => new FakeDocument([{}]) });

    for (let i = 0; i < 10; i++) {
      await h.services.uploads.submitPdf(request());
    }
    const error = await rejection(h.services.uploads.submitPdf(request()));

    expect(error.kind).toBe("rate_limited");
    expect(error.httpStatus).toBe(429);
    expect(error.retryAfter).toBe(45);
    expect(await h.services.queue.size()).toBe(10);

    const other = await h.services.uploads.submitPdf(request({ identity: "ip:192.0.2.10" }));
    expect(other.status).toBe("queued");
  });

  it("rejects invalid submissions before creating a job", async () => {
    const h = createHarness({ env: { MAX_IMAGE_SIZE: "16" } });

    const badDpi = await rejection(h.services.uploads.submitPdf(request({ options: { dpi: 50 } })));
    expect(badDpi.code).toBe("E2001");
    expect(badDpi.details).toEqual(["dpi: Number must be greater than or equal to 72"]);

    const empty = await rejection(h.services.uploads.submitPdf(request({ data: new Uint8Array() })));
    expect(empty.message).toBe("Document is empty");

    const tooLarge = await rejection(h.services.uploads.submitImage(request({ data: bytes("x".repeat(17)) })));
    expect(tooLarge.code).toBe("E2003");
    expect(tooLarge.httpStatus).toBe(413);

    const pageCeiling = await rejection(h.services.uploads.submitPdf(request({ options: { maxPages: 101 } })));
    expect(pageCeiling.message).toBe("maxPages cannot exceed 100");

    expect(await h.services.queue.size()).toBe(0);
    expect(h.store.keys().filter((key) => key.startsWith("job:"))).toEqual([]);
  });

  it("rejects submissions when the queue is full", async () => {
    const h = createHarness({ env: { MAX_QUEUE_SIZE: "1" } });

    await h.services.uploads.submitPdf(request());
    const error = await rejection(h.services.uploads.submitPdf(request()));

    expect(error.kind).toBe("capacity_exceeded");
    expect(error.code).toBe("E4003");
    expect(error.retryAfter).toBe(30);
  });

  it("reports storage outages on submission", async () => {
    const h = createHarness();
    h.store.outage = true;

    const error = await rejection(h.services.uploads.submitPdf(request()));

    expect(error.kind).toBe("storage_unavailable");
  });

  it("keeps one job id across retried job creation", async () => {
    const h = createHarness();
    h.store.failNextSet((key, value) => /^job:[^:]+$/.test(key) && value.includes('"status":"queued"'));

    const submitted = await h.services.uploads.submitPdf(request());

    expect(h.store.keys().filter((key) => /^job:[^:]+$/.test(key))).toEqual([`job:${submitted.jobId}`]);
    expect((await h.services.registry.getStatus(submitted.jobId)).status).toBe("queued");
    expect(await h.services.queue.size()).toBe(1);
  });

  it("rejects documents the store has no memory left for", async () => {
    const h = createHarness();
    h.store.maxBytes = 1_000;
    h.store.usedBytes = 890;

    const error = await rejection(h.services.uploads.submitPdf(request()));

    expect(error.kind).toBe("capacity_exceeded");
    expect(error.message).toBe("Result store is out of memory for this document (890/1000 bytes used)");
    expect(h.store.keys().filter((key) => key.startsWith("job:"))).toEqual([]);
  });

  it("reports pending results without waiting", async () => {
    const h = createHarness({ document: () => new FakeDocument([{}]) });

    const submitted = await h.services.uploads.submitPdf(request());
    const { result, rateLimit } = await h.services.status.getResult("ip:192.0.2.20", submitted.jobId);

    expect(result).toEqual({
      state: "pending",
      jobId: submitted.jobId,
      status: "queued",
      progress: { totalUnits: 0, completedUnits: 0 },
    });
    expect(rateLimit.operation).toBe("results_retrieval");
  });

  it("reports unknown jobs as not found", async () => {
    const h = createHarness();

    const error = await rejection(h.services.status.getStatus("ip:192.0.2.30", "7c9e6679-7425-40de-944b-e07fc1f90ae7"));

    expect(error.kind).toBe("not_found");
    expect(error.httpStatus).toBe(404);
  });

  it("runs background workers until stopped", async () => {
    const h = createHarness({ env: { QUEUE_POLL_INTERVAL_MS: "5" }, document: () => new FakeDocument([{}, {}]) });
    harness = h;

    const before = await h.services.health.check();
    expect(before.checks.workers.totalWorkers).toBe(0);
    expect(before.status).toBe("unhealthy");

    h.services.workers.startWorkers(1);
    const submitted = await h.services.uploads.submitPdf(request());

    await vi.waitFor(async () => {
      expect((await h.services.registry.getStatus(submitted.jobId)).status).toBe("completed");
    });

    const after = await h.services.health.check();
    expect(after.status).toBe("healthy");
    expect(after.checks.cache.computations).toBe(1);
  });
});
