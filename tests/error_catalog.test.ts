import { describe, expect, it } from "vitest";
import { ERROR_CATALOG, ErrorFactory, ErrorUtils, ExtractionServiceError } from "@utils/error_catalog.ts";
import { canonicalJson, sha256Hex } from "@utils/hashing.ts";

describe("ExtractionServiceError", () => {
  it("builds a response carrying the retry hint", () => {
    const error = ErrorFactory.rateLimit(12, { traceId: "trace-1", identity: "ip:192.0.2.1" });

    const response = error.toErrorResponse();

    expect(response.status).toBe("error");
    expect(response.error).toEqual({ code: "E2101", kind: "rate_limited", retryable: true, retryAfter: 12 });
    expect(response.trace.traceId).toBe("trace-1");
    expect(error.message).toBe("Rate limit exceeded, retry after 12s");
  });

  it("records code, kind and details on jobs", () => {
    const error = ErrorFactory.processing("chunk_failed", { jobId: "job-1" }, "1 of 3 chunks failed", ["chunk 2: boom"]);

    expect(error.toJobError()).toEqual({
      code: "E3004",
      kind: "chunk_infrastructure_failure",
      message: "1 of 3 chunks failed",
      details: ["chunk 2: boom"],
    });
    expect(error.requiresAlert()).toBe(true);
  });

  it("uses the catalog message without a custom one", () => {
    expect(ErrorFactory.processing("not_found").message).toBe(ERROR_CATALOG.E3001.message);
  });
});

describe("ErrorUtils", () => {
  it("wraps foreign errors as internal", () => {
    const wrapped = ErrorUtils.wrap(new TypeError("bad state"), { jobId: "job-2" });

    expect(wrapped).toBeInstanceOf(ExtractionServiceError);
    expect(wrapped.kind).toBe("internal");
    expect(wrapped.message).toBe("bad state");
    expect(wrapped.context.jobId).toBe("job-2");
  });

  it("passes service errors through unchanged", () => {
    const original = ErrorFactory.storage("queue_full");
    expect(ErrorUtils.wrap(original)).toBe(original);
  });

  it("knows which errors are retryable", () => {
    expect(ErrorUtils.isRetryable(ErrorFactory.storage("unavailable"))).toBe(true);
    expect(ErrorUtils.isRetryable(ErrorFactory.validation("invalid_request"))).toBe(false);
    expect(ErrorUtils.isRetryable(new Error("plain"))).toBe(false);
  });
});

describe("hashing", () => {
  it("hashes text and bytes alike", () => {
    expect(sha256Hex("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
    expect(sha256Hex(new TextEncoder().encode("abc"))).toBe(sha256Hex("abc"));
  });

  it("sorts keys at every level", () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 0 }], c: null } })).toBe(
      "{\"a\":{\"c\":null,\"d\":[2,{\"y\":0,\"z\":1}]},\"b\":1}",
    );
  });
});
