/**
 * Document Upload Service
 * Submission boundary: rate limiting, validation, admission, job creation and enqueue
 */

import { generateUuid, z } from "@/deps.ts";
import { getLogger } from "@config/logging.ts";
import type { ExtractionParameters, JobKind } from "@models/job.ts";
import type { RateLimitResult } from "@models/rate_limiting.ts";
import { deriveCacheKey } from "@services/cache_service.ts";
import type { JobRegistry } from "@services/job_registry.ts";
import type { PayloadStore } from "@services/payload_store.ts";
import type { QueueService } from "@services/queue_service.ts";
import type { RateLimitingService } from "@services/rate_limiting_service.ts";
import { ErrorFactory, ErrorUtils } from "@utils/error_catalog.ts";
import { DEFAULT_RECOVERY_CONFIGS, errorRecoveryService } from "@utils/error_recovery.ts";
import type { ErrorRecoveryService } from "@utils/error_recovery.ts";
import { sha256Hex } from "@utils/hashing.ts";

export const SubmissionOptionsSchema = z.object({
  dpi: z.number().int().min(72).max(600).optional(),
  chunkSize: z.number().int().min(1).optional(),
  maxPages: z.number().int().min(1).optional(),
  textThreshold: z.number().int().min(0).optional(),
  imageAreaThreshold: z.number().min(0).max(1).optional(),
  minConfidence: z.number().min(0).max(1).optional(),
}).strict();
export type SubmissionOptions = z.infer<typeof SubmissionOptionsSchema>;

export interface SubmissionRequest {
  /** Rate-limit identity, see resolveClientIdentity */
  identity: string;
  fileName: string;
  data: Uint8Array;
  options?: SubmissionOptions;
}

export interface SubmissionResponse {
  jobId: string;
  status: "queued";
  kind: JobKind;
  fileName: string;
  byteSize: number;
  parameters: ExtractionParameters;
  queuePosition?: number;
  estimatedWaitSeconds?: number;
  rateLimit: RateLimitResult;
}

export interface UploadLimits {
  maxImageSize: number;
  maxPdfSize: number;
  /** Upper bound for the per-request maxPages option */
  maxPagesCeiling: number;
  defaults: ExtractionParameters;
}

export const DEFAULT_UPLOAD_LIMITS: UploadLimits = {
  maxImageSize: 10 * 1024 * 1024,
  maxPdfSize: 50 * 1024 * 1024,
  maxPagesCeiling: 100,
  defaults: {
    dpi: 300,
    chunkSize: 10,
    maxPages: 100,
    textThreshold: 30,
    imageAreaThreshold: 0,
    minConfidence: 0,
  },
};

export class DocumentUploadService {
  private logger = getLogger("document-upload");

  constructor(
    private readonly rateLimiter: RateLimitingService,
    private readonly registry: JobRegistry,
    private readonly queue: QueueService,
    private readonly payloads: PayloadStore,
    private readonly limits: UploadLimits = DEFAULT_UPLOAD_LIMITS,
    private readonly recovery: ErrorRecoveryService = errorRecoveryService,
  ) {}

  async submitImage(request: SubmissionRequest): Promise<SubmissionResponse> {
    return await this.submit("image", request);
  }

  async submitPdf(request: SubmissionRequest): Promise<SubmissionResponse> {
    return await this.submit("pdf", request);
  }

  async submitHybridPdf(request: SubmissionRequest): Promise<SubmissionResponse> {
    return await this.submit("hybrid-pdf", request);
  }

  /**
   * Accept a document for asynchronous extraction and return its job id immediately
   */
  async submit(kind: JobKind, request: SubmissionRequest): Promise<SubmissionResponse> {
    const context = { identity: request.identity, operation: `submit_${kind}` };

    const rateLimit = await this.rateLimiter.checkAndIncrement(request.identity, "document_upload");
    if (!rateLimit.allowed) {
      throw ErrorFactory.rateLimit(rateLimit.retryAfter, context);
    }

    const parameters = this.validate(kind, request);

    const capacity = await this.queue.checkCapacity(request.data.byteLength);
    if (!capacity.accepting) {
      const message = capacity.reason === "storage_full"
        ? `Result store is out of memory for this document (${capacity.storage.usedBytes}/${capacity.storage.maxBytes} bytes used)`
        : `Processing queue is full (${capacity.size}/${capacity.maxSize})`;
      this.logger.warn(`Rejecting submission: ${message}`);
      throw ErrorFactory.storage("queue_full", context, message, capacity.estimatedWaitSeconds);
    }

    const contentHash = sha256Hex(request.data);
    const input = {
      fileName: request.fileName,
      byteSize: request.data.byteLength,
      contentHash,
      cacheKey: deriveCacheKey(contentHash, kind, parameters),
      parameters,
    };
    const totalUnits = kind === "image" ? 1 : 0;

    // One id for every attempt, so a slow write that lands late is overwritten rather than orphaned
    const jobId = generateUuid();
    await this.recovery.execute(
      () => this.registry.submit(kind, input, totalUnits, jobId),
      DEFAULT_RECOVERY_CONFIGS.job_submission,
      context,
      "job_submission",
    );

    try {
      await this.payloads.put(jobId, request.data);
    } catch (error) {
      await this.abandon(jobId, error);
      throw error;
    }

    const queued = await this.queue.enqueue(jobId, kind);
    if (!queued.success) {
      const failure = ErrorFactory.storage("unavailable", { ...context, jobId }, queued.error);
      await this.abandon(jobId, failure);
      throw failure;
    }

    this.logger.info(`Accepted ${kind} job ${jobId} (${request.fileName}, ${input.byteSize} bytes)`);

    return {
      jobId,
      status: "queued",
      kind,
      fileName: request.fileName,
      byteSize: input.byteSize,
      parameters,
      queuePosition: queued.queuePosition,
      estimatedWaitSeconds: queued.estimatedWaitSeconds,
      rateLimit,
    };
  }

  /**
   * Resolve request options against defaults and enforce size limits
   */
  private validate(kind: JobKind, request: SubmissionRequest): ExtractionParameters {
    if (!request.fileName.trim()) {
      throw ErrorFactory.validation("invalid_request", {}, "File name is required");
    }

    if (request.data.byteLength === 0) {
      throw ErrorFactory.validation("invalid_request", {}, "Document is empty");
    }

    const maxSize = kind === "image" ? this.limits.maxImageSize : this.limits.maxPdfSize;
    if (request.data.byteLength > maxSize) {
      throw ErrorFactory.validation(
        "file_too_large",
        {},
        `Document is ${request.data.byteLength} bytes, limit for ${kind} is ${maxSize} bytes`,
      );
    }

    const parsed = SubmissionOptionsSchema.safeParse(request.options ?? {});
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`);
      throw ErrorFactory.validation("invalid_request", {}, `Invalid options: ${details.join("; ")}`, details);
    }

    const parameters: ExtractionParameters = { ...this.limits.defaults, ...parsed.data };

    if (parameters.maxPages > this.limits.maxPagesCeiling) {
      throw ErrorFactory.validation(
        "invalid_request",
        {},
        `maxPages cannot exceed ${this.limits.maxPagesCeiling}`,
      );
    }

    return parameters;
  }

  private async abandon(jobId: string, cause: unknown): Promise<void> {
    const failure = ErrorUtils.wrap(cause, { jobId });
    try {
      await this.registry.fail(jobId, failure.toJobError());
    } catch (error) {
      this.logger.error(`Could not mark abandoned job ${jobId} as failed`, { error: ErrorUtils.getMessage(error) });
    }
  }
}
