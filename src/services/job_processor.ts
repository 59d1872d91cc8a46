/**
 * Job Processor
 * Runs one claimed job end to end: cache check, chunked extraction, terminal transition
 */

import { getLogger } from "@config/logging.ts";
import type { DocumentDecoder, ExtractionResult, StoredExtraction } from "@models/document.ts";
import { isTerminal } from "@models/job.ts";
import type { Job } from "@models/job.ts";
import type { CacheService } from "@services/cache_service.ts";
import type { ChunkScheduler } from "@services/chunk_scheduler.ts";
import { openDocument } from "@services/document_sources.ts";
import type { JobRegistry } from "@services/job_registry.ts";
import type { PayloadStore } from "@services/payload_store.ts";
import { ErrorFactory, ErrorUtils } from "@utils/error_catalog.ts";
import { DEFAULT_RECOVERY_CONFIGS, ErrorRecoveryService } from "@utils/error_recovery.ts";
import { startLeaseHeartbeat } from "@utils/lease_heartbeat.ts";
import { structuredLogger } from "@utils/structured_logger.ts";

export type ProcessOutcome = "completed" | "failed" | "skipped";

/**
 * Only fully successful extractions are cached, so a transient page failure is retried on resubmission
 */
export function isCacheable(value: StoredExtraction): boolean {
  return value.stats.failedPages === 0;
}

export class JobProcessor {
  private logger = getLogger("job-processor");

  constructor(
    private readonly registry: JobRegistry,
    private readonly cache: CacheService,
    private readonly scheduler: ChunkScheduler,
    private readonly payloads: PayloadStore,
    private readonly decoder: DocumentDecoder,
    private readonly recovery: ErrorRecoveryService = new ErrorRecoveryService(),
  ) {}

  /**
   * Run a queued job. Throws only when the job could not be started or finished because the
   * store stayed unreachable; the payload is then kept so a redelivery can pick the job up again.
   */
  async process(jobId: string, workerId: string): Promise<ProcessOutcome> {
    if (!(await this.registry.claim(jobId, workerId))) {
      return "skipped";
    }

    const heartbeat = startLeaseHeartbeat(
      `job:${jobId}:owner`,
      () => this.registry.renewClaim(jobId, workerId),
      this.registry.getOwnerLeaseMs() / 3,
    );
    let settled = false;

    try {
      const job = await this.loadQueuedJob(jobId);
      if (!job) {
        settled = true;
        return "skipped";
      }

      const started = await this.transition(jobId, "start", () =>
        this.registry.start(jobId, job.progress.totalUnits, workerId));
      if (!started) {
        settled = true;
        return "skipped";
      }

      const outcome = await this.execute(job);
      settled = true;
      return outcome;
    } finally {
      heartbeat.stop();
      if (settled) {
        await this.payloads.remove(jobId);
      }
      await this.registry.release(jobId, workerId);
    }
  }

  private async loadQueuedJob(jobId: string): Promise<Job | null> {
    let job: Job;
    try {
      job = await this.transition(jobId, "load", () => this.registry.getJob(jobId));
    } catch (error) {
      if (ErrorUtils.isKind(error, "not_found")) {
        this.logger.warn(`Job ${jobId} expired before processing`);
        return null;
      }
      throw error;
    }

    if (isTerminal(job.status)) {
      this.logger.info(`Skipping job ${jobId} in status ${job.status}`);
      return null;
    }

    if (job.status === "processing") {
      // Holding the claim means the previous owner is gone without writing a terminal state
      this.logger.warn(`Job ${jobId} was interrupted during processing, failing it`);
      const interrupted = ErrorFactory.system({ jobId }, "Job was interrupted before it finished");
      await this.transition(jobId, "fail", () => this.registry.fail(jobId, interrupted.toJobError()));
      return null;
    }

    return job;
  }

  private async execute(job: Job): Promise<ProcessOutcome> {
    let result: ExtractionResult;
    try {
      const outcome = await this.cache.computeOrWait(
        job.input.cacheKey,
        () => this.extract(job),
        { shouldStore: isCacheable },
      );
      result = { ...outcome.value, cached: outcome.cached };
    } catch (error) {
      const failure = ErrorUtils.wrap(error, { jobId: job.id });
      structuredLogger.logError(failure);
      await this.transition(job.id, "fail", () => this.registry.fail(job.id, failure.toJobError()));
      return "failed";
    }

    await this.transition(job.id, "complete", () => this.registry.complete(job.id, result));
    this.logger.info(
      `Job ${job.id} completed: ${result.pageCount} pages${result.cached ? " (cached)" : ""}`,
    );
    return "completed";
  }

  /**
   * Registry reads and writes on the worker path are retried with backoff, never dropped
   */
  private async transition<T>(jobId: string, step: string, operation: () => Promise<T>): Promise<T> {
    return await this.recovery.execute(
      operation,
      DEFAULT_RECOVERY_CONFIGS.store_operation,
      { jobId },
      `job_${step}`,
    );
  }

  private async extract(job: Job): Promise<StoredExtraction> {
    const data = await this.payloads.get(job.id);
    if (!data) {
      throw ErrorFactory.processing("not_found", { jobId: job.id }, "Document payload expired before processing");
    }

    const document = await openDocument(job.kind, data, this.decoder);
    try {
      return await this.scheduler.run({
        jobId: job.id,
        kind: job.kind,
        parameters: job.input.parameters,
        document,
      });
    } finally {
      await document.close();
    }
  }
}
