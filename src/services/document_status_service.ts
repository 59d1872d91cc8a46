/**
 * Document Status Service
 * Polling boundary for job status and results
 */

import type { JobResultView, JobStatusView } from "@models/job.ts";
import type { RateLimitResult } from "@models/rate_limiting.ts";
import type { JobRegistry } from "@services/job_registry.ts";
import type { RateLimitingService } from "@services/rate_limiting_service.ts";
import { ErrorFactory } from "@utils/error_catalog.ts";

export interface StatusResponse {
  job: JobStatusView;
  rateLimit: RateLimitResult;
}

export interface ResultResponse {
  result: JobResultView;
  rateLimit: RateLimitResult;
}

export class DocumentStatusService {
  constructor(
    private readonly rateLimiter: RateLimitingService,
    private readonly registry: JobRegistry,
  ) {}

  async getStatus(identity: string, jobId: string): Promise<StatusResponse> {
    const rateLimit = await this.rateLimiter.checkAndIncrement(identity, "status_check");
    if (!rateLimit.allowed) {
      throw ErrorFactory.rateLimit(rateLimit.retryAfter, { identity, jobId, operation: "status_check" });
    }

    return { job: await this.registry.getStatus(jobId), rateLimit };
  }

  async getResult(identity: string, jobId: string): Promise<ResultResponse> {
    const rateLimit = await this.rateLimiter.checkAndIncrement(identity, "results_retrieval");
    if (!rateLimit.allowed) {
      throw ErrorFactory.rateLimit(rateLimit.retryAfter, { identity, jobId, operation: "results_retrieval" });
    }

    return { result: await this.registry.getResult(jobId), rateLimit };
  }
}
