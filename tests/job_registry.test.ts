import { describe, expect, it } from "vitest";
import { JobRegistry } from "@services/job_registry.ts";
import type { JobInput } from "@models/job.ts";
import type { ExtractionResult } from "@models/document.ts";
import { ErrorUtils, ExtractionServiceError } from "@utils/error_catalog.ts";
import { testParameters } from "./support/fakes.ts";
import { MemoryResultStore } from "./support/memory_store.ts";

const input: JobInput = {
  fileName: "invoice.pdf",
  byteSize: 2048,
  contentHash: "feed",
  cacheKey: "ocr:result:feed",
  parameters: testParameters(),
};

const result: ExtractionResult = {
  pages: [{ pageNumber: 1, classification: "text", extractionMethod: "direct", success: true, text: "hello" }],
  fullText: "hello",
  pageCount: 1,
  stats: { textPages: 1, recognizedPages: 0, failedPages: 0, durationMs: 3 },
  cached: false,
};

function setup() {
  const store = new MemoryResultStore();
  const registry = new JobRegistry(store, { ttlSeconds: 3600, ownerLeaseMs: 1000 });
  return { store, registry };
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

describe("JobRegistry", () => {
  it("creates queued jobs with zero progress", async () => {
    const { registry } = setup();

    const jobId = await registry.submit("pdf", input);
    const status = await registry.getStatus(jobId);

    expect(status.status).toBe("queued");
    expect(status.fileName).toBe("invoice.pdf");
    expect(status.progress).toEqual({ totalUnits: 0, completedUnits: 0, percent: 0 });
    expect(status.startedAt).toBeUndefined();
  });

  it("reports unknown jobs as not found", async () => {
    const { registry } = setup();

    const error = await rejection(registry.getStatus("9f0c3a52-1d7e-4c8e-8a7a-3c2b1e0f4d21"));

    expect(error.kind).toBe("not_found");
    expect(error.code).toBe("E3001");
  });

  it("rejects malformed job ids", async () => {
    const { registry } = setup();

    const error = await rejection(registry.getResult("../../etc"));

    expect(error.kind).toBe("validation_failure");
    expect(error.code).toBe("E2004");
  });

  it("runs a job through its lifecycle", async () => {
    const { registry } = setup();
    const jobId = await registry.submit("pdf", input);

    expect(await registry.claim(jobId, "worker-1")).toBe(true);
    await registry.start(jobId, 0, "worker-1");
    await registry.updateProgress(jobId, 2, 4);
    await registry.updateProgress(jobId, 1);

    const processing = await registry.getStatus(jobId);
    expect(processing.status).toBe("processing");
    expect(processing.progress).toEqual({ totalUnits: 4, completedUnits: 2, percent: 50 });
    expect(await registry.getResult(jobId)).toEqual({
      state: "pending",
      jobId,
      status: "processing",
      progress: { totalUnits: 4, completedUnits: 2 },
    });

    await registry.complete(jobId, result);

    const view = await registry.getResult(jobId);
    expect(view).toEqual({ state: "completed", jobId, result });
    const completed = await registry.getStatus(jobId);
    expect(completed.progress).toEqual({ totalUnits: 4, completedUnits: 4, percent: 100 });
    expect(completed.finishedAt).toBeDefined();
  });

  it("keeps the first terminal transition", async () => {
    const { registry } = setup();
    const jobId = await registry.submit("image", input, 1);
    await registry.start(jobId, 1, "worker-1");

    expect(await registry.complete(jobId, result)).not.toBeNull();
    expect(await registry.complete(jobId, { ...result, fullText: "other" })).toBeNull();
    expect(await registry.fail(jobId, { code: "E6003", kind: "internal", message: "late failure" })).toBeNull();

    const view = await registry.getResult(jobId);
    expect(view.state === "completed" && view.result.fullText).toBe("hello");
  });

  it("records failures with their error", async () => {
    const { registry } = setup();
    const jobId = await registry.submit("pdf", input);

    await registry.fail(jobId, { code: "E2002", kind: "validation_failure", message: "Document is encrypted" });

    expect(await registry.getResult(jobId)).toEqual({
      state: "failed",
      jobId,
      error: { code: "E2002", kind: "validation_failure", message: "Document is encrypted" },
    });
  });

  it("lets only one worker claim a job until release", async () => {
    const { registry } = setup();
    const jobId = await registry.submit("pdf", input);

    expect(await registry.claim(jobId, "worker-1")).toBe(true);
    expect(await registry.claim(jobId, "worker-2")).toBe(false);

    await registry.release(jobId, "worker-2");
    expect(await registry.claim(jobId, "worker-2")).toBe(false);

    await registry.release(jobId, "worker-1");
    expect(await registry.claim(jobId, "worker-2")).toBe(true);
  });

  it("renews the expiry on every write", async () => {
    const { store, registry } = setup();
    const jobId = await registry.submit("pdf", input);
    await registry.start(jobId, 4, "worker-1");

    store.advance(3000 * 1000);
    await registry.updateProgress(jobId, 1);
    store.advance(3000 * 1000);

    expect((await registry.getStatus(jobId)).progress.completedUnits).toBe(1);

    store.advance(3601 * 1000);
    expect((await rejection(registry.getStatus(jobId))).kind).toBe("not_found");
  });

  it("returns the started job when the same worker starts it again", async () => {
    const { registry } = setup();
    const jobId = await registry.submit("pdf", input);
    await registry.start(jobId, 2, "worker-1");

    const again = await registry.start(jobId, 2, "worker-1");
    expect(again?.status).toBe("processing");
    expect(await registry.start(jobId, 2, "worker-2")).toBeNull();
  });

  it("gives the terminal marker back when the terminal write fails", async () => {
    const { store, registry } = setup();
    const jobId = await registry.submit("pdf", input);
    await registry.start(jobId, 1, "worker-1");
    store.failNextSet((key, value) => key === `job:${jobId}` && value.includes('"status":"completed"'));

    await expect(registry.complete(jobId, result)).rejects.toBeInstanceOf(ExtractionServiceError);
    expect(await store.get(`job:${jobId}:terminal`)).toBeNull();
    expect((await registry.getStatus(jobId)).status).toBe("processing");

    const completed = await registry.complete(jobId, result);
    expect(completed?.status).toBe("completed");
  });

  it("renews a claim only for the worker holding it", async () => {
    const { store, registry } = setup();
    const jobId = await registry.submit("pdf", input);
    await registry.claim(jobId, "worker-1");

    store.advance(800);
    expect(await registry.renewClaim(jobId, "worker-2")).toBe(false);
    expect(await registry.renewClaim(jobId, "worker-1")).toBe(true);
    store.advance(800);

    expect(await registry.claim(jobId, "worker-2")).toBe(false);
    const remaining = store.ttlOf(`job:${jobId}:owner`);
    expect(remaining).toBeGreaterThan(150);
    expect(remaining).toBeLessThanOrEqual(200);
  });

  it("creates the job under a caller-chosen id, overwriting on retry", async () => {
    const { store, registry } = setup();
    const jobId = "3b241101-e2bb-4255-8caf-4136c566a962";

    expect(await registry.submit("pdf", input, 0, jobId)).toBe(jobId);
    expect(await registry.submit("pdf", input, 0, jobId)).toBe(jobId);

    expect(store.keys()).toEqual([`job:${jobId}`]);
  });

  it("treats unreadable records as internal errors", async () => {
    const { store, registry } = setup();
    const jobId = "0d4f9a1e-6b2c-4e3a-9f1d-2a3b4c5d6e7f";
    await store.set(`job:${jobId}`, "{not json", 60);

    const error = await rejection(registry.getJob(jobId));
    expect(ErrorUtils.isKind(error, "internal")).toBe(true);
  });
});
