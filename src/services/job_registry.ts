/**
 * Job Registry
 * Durable job records: creation, status reads and owner-only lifecycle transitions
 */

import { generateUuid, isUuid } from "@/deps.ts";
import { getLogger } from "@config/logging.ts";
import { JobSchema, transitionJob } from "@models/job.ts";
import type { Job, JobError, JobEvent, JobInput, JobKind, JobResultView, JobStatusView } from "@models/job.ts";
import type { ExtractionResult } from "@models/document.ts";
import type { ResultStore } from "@services/result_store.ts";
import { ErrorFactory, ErrorUtils } from "@utils/error_catalog.ts";
import { structuredLogger } from "@utils/structured_logger.ts";

export const JOB_KEY_PREFIX = "job:";

export interface JobRegistryConfig {
  ttlSeconds: number;
  /** How long a worker's claim on a job stays valid */
  ownerLeaseMs: number;
}

export const DEFAULT_JOB_REGISTRY_CONFIG: JobRegistryConfig = {
  ttlSeconds: 3600,
  ownerLeaseMs: 660_000,
};

export class JobRegistry {
  private logger = getLogger("job-registry");
  private config: JobRegistryConfig;

  constructor(
    private readonly store: ResultStore,
    config: Partial<JobRegistryConfig> = {},
    private readonly now: () => Date = () => new Date(),
  ) {
    this.config = { ...DEFAULT_JOB_REGISTRY_CONFIG, ...config };
  }

  /**
   * Create a queued job and return its id. Passing the id makes a retried submission overwrite the same record.
   */
  async submit(kind: JobKind, input: JobInput, totalUnits = 0, jobId: string = generateUuid()): Promise<string> {
    this.assertJobId(jobId);
    const at = this.now().toISOString();
    const job: Job = {
      id: jobId,
      kind,
      input,
      status: "queued",
      progress: { totalUnits, completedUnits: 0 },
      createdAt: at,
      updatedAt: at,
    };

    await this.save(job);

    structuredLogger.logBusinessEvent({
      event: "job_submitted",
      entity: "job",
      entityId: job.id,
      outcome: "success",
      details: { kind, fileName: input.fileName, byteSize: input.byteSize },
    });

    return job.id;
  }

  /**
   * Load a job. Unknown or expired ids raise NotFound.
   */
  async getJob(jobId: string): Promise<Job> {
    this.assertJobId(jobId);

    const raw = await this.store.get(this.jobKey(jobId));
    if (raw === null) {
      throw ErrorFactory.processing("not_found", { jobId }, `Job ${jobId} not found`);
    }

    const parsed = this.parse(raw);
    if (!parsed) {
      throw ErrorFactory.system({ jobId }, `Stored job ${jobId} is unreadable`);
    }
    return parsed;
  }

  async getStatus(jobId: string): Promise<JobStatusView> {
    const job = await this.getJob(jobId);
    const { totalUnits, completedUnits } = job.progress;

    return {
      jobId: job.id,
      status: job.status,
      kind: job.kind,
      fileName: job.input.fileName,
      progress: {
        totalUnits,
        completedUnits,
        percent: totalUnits > 0 ? Math.round((completedUnits / totalUnits) * 100) : 0,
      },
      createdAt: job.createdAt,
      updatedAt: job.updatedAt,
      ...(job.status !== "queued" && job.startedAt ? { startedAt: job.startedAt } : {}),
      ...(job.status === "completed" || job.status === "failed" ? { finishedAt: job.finishedAt } : {}),
      ...(job.status === "failed" ? { error: job.error } : {}),
    };
  }

  /**
   * Result of a finished job, or an indication that it is still pending. Never blocks.
   */
  async getResult(jobId: string): Promise<JobResultView> {
    const job = await this.getJob(jobId);

    switch (job.status) {
      case "completed":
        return { state: "completed", jobId: job.id, result: job.result };
      case "failed":
        return { state: "failed", jobId: job.id, error: job.error };
      case "queued":
      case "processing":
        return { state: "pending", jobId: job.id, status: job.status, progress: job.progress };
    }
  }

  /**
   * Take single-writer ownership of a job. Only the claimant may transition it.
   */
  async claim(jobId: string, workerId: string): Promise<boolean> {
    const claimed = await this.store.setIfAbsent(`${this.jobKey(jobId)}:owner`, workerId, this.config.ownerLeaseMs);
    if (!claimed) {
      this.logger.warn(`Job ${jobId} already claimed by another worker`);
    }
    return claimed;
  }

  /**
   * Extend a held claim. False once the claim has expired or passed to another worker.
   */
  async renewClaim(jobId: string, workerId: string): Promise<boolean> {
    return await this.store.extendIfEquals(`${this.jobKey(jobId)}:owner`, workerId, this.config.ownerLeaseMs);
  }

  getOwnerLeaseMs(): number {
    return this.config.ownerLeaseMs;
  }

  async release(jobId: string, workerId: string): Promise<void> {
    await this.store.deleteIfEquals(`${this.jobKey(jobId)}:owner`, workerId);
  }

  /**
   * Move a queued job to processing. Repeating the call for the same worker returns the started job,
   * so a retry after a write that landed but reported failure still proceeds.
   */
  async start(jobId: string, totalUnits: number, workerId: string): Promise<Job | null> {
    const started = await this.apply(jobId, { type: "start", totalUnits, workerId, at: this.now().toISOString() });
    if (started) {
      return started;
    }

    const current = await this.getJob(jobId);
    return current.status === "processing" && current.workerId === workerId ? current : null;
  }

  /**
   * Record progress. Progress never moves backwards; `totalUnits` is set once the page count is known.
   */
  async updateProgress(jobId: string, completedUnits: number, totalUnits?: number): Promise<Job | null> {
    return await this.apply(jobId, { type: "progress", completedUnits, totalUnits, at: this.now().toISOString() });
  }

  /**
   * Complete a job. Only the first terminal transition is written; repeats are no-ops.
   */
  async complete(jobId: string, result: ExtractionResult): Promise<Job | null> {
    if (!(await this.markTerminal(jobId))) {
      return null;
    }

    const job = await this.applyTerminal(jobId, { type: "complete", result, at: this.now().toISOString() });
    if (job) {
      structuredLogger.logBusinessEvent({
        event: "job_completed",
        entity: "job",
        entityId: jobId,
        outcome: result.stats.failedPages > 0 ? "partial" : "success",
        details: { pageCount: result.pageCount, cached: result.cached, durationMs: result.stats.durationMs },
      });
    }
    return job;
  }

  /**
   * Fail a job. Only the first terminal transition is written; repeats are no-ops.
   */
  async fail(jobId: string, error: JobError): Promise<Job | null> {
    if (!(await this.markTerminal(jobId))) {
      return null;
    }

    const job = await this.applyTerminal(jobId, { type: "fail", error, at: this.now().toISOString() });
    if (job) {
      structuredLogger.logBusinessEvent({
        event: "job_failed",
        entity: "job",
        entityId: jobId,
        outcome: "failure",
        details: { code: error.code, kind: error.kind, message: error.message },
      });
    }
    return job;
  }

  private async apply(jobId: string, event: JobEvent): Promise<Job | null> {
    const current = await this.getJob(jobId);
    const next = transitionJob(current, event);

    if (!next) {
      if (event.type !== "progress") {
        this.logger.warn(`Ignoring ${event.type} for job ${jobId} in status ${current.status}`);
      }
      return null;
    }

    await this.save(next);
    this.logger.debug(`Job ${jobId}: ${current.status} -> ${next.status}`);
    return next;
  }

  /**
   * Write a terminal transition under the marker. A failed write gives the marker back so a retry can land.
   */
  private async applyTerminal(jobId: string, event: JobEvent): Promise<Job | null> {
    try {
      return await this.apply(jobId, event);
    } catch (error) {
      await this.clearTerminal(jobId);
      throw error;
    }
  }

  private async clearTerminal(jobId: string): Promise<void> {
    try {
      await this.store.delete(`${this.jobKey(jobId)}:terminal`);
    } catch (error) {
      this.logger.error(`Failed to clear terminal marker for job ${jobId}`, { error: ErrorUtils.getMessage(error) });
    }
  }

  private async markTerminal(jobId: string): Promise<boolean> {
    const marked = await this.store.setIfAbsent(
      `${this.jobKey(jobId)}:terminal`,
      this.now().toISOString(),
      this.config.ttlSeconds * 1000,
    );
    if (!marked) {
      this.logger.info(`Job ${jobId} already reached a terminal state`);
    }
    return marked;
  }

  private async save(job: Job): Promise<void> {
    // Every write renews the expiry
    await this.store.set(this.jobKey(job.id), JSON.stringify(job), this.config.ttlSeconds);
  }

  private assertJobId(jobId: string): void {
    if (!isUuid(jobId)) {
      throw ErrorFactory.validation("invalid_job_id", { jobId }, `Invalid job id: ${jobId}`);
    }
  }

  private jobKey(jobId: string): string {
    return `${JOB_KEY_PREFIX}${jobId}`;
  }

  private parse(raw: string): Job | null {
    try {
      const result = JobSchema.safeParse(JSON.parse(raw));
      return result.success ? result.data : null;
    } catch {
      return null;
    }
  }
}
