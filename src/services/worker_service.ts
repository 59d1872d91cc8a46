/**
 * Worker Service
 * Long-running workers that pull jobs from the queue and hand them to the job processor
 */

import { generateUuid } from "@/deps.ts";
import { getLogger } from "@config/logging.ts";
import type { QueueMessage } from "@models/queue.ts";
import type { JobProcessor } from "@services/job_processor.ts";
import type { QueueService } from "@services/queue_service.ts";
import { ErrorUtils } from "@utils/error_catalog.ts";
import { sleep } from "@utils/error_recovery.ts";
import type { SleepFn } from "@utils/error_recovery.ts";

export type WorkerStatus = "idle" | "processing" | "error" | "stopped" | "starting";

export interface WorkerInfo {
  workerId: string;
  status: WorkerStatus;
  currentJob: string | undefined;
  startedAt: Date;
  lastHeartbeat: Date;
  processedCount: number;
  failedCount: number;
  errorCount: number;
  averageProcessingTime: number;
}

export interface WorkerTimings {
  idlePollMs: number;
  errorBackoffMs: number;
}

export const DEFAULT_WORKER_TIMINGS: WorkerTimings = {
  idlePollMs: 1000,
  errorBackoffMs: 5000,
};

export class JobWorker {
  private workerId: string;
  private status: WorkerStatus = "idle";
  private currentJob: string | undefined;
  private startedAt: Date;
  private lastHeartbeat: Date;
  private processedCount = 0;
  private failedCount = 0;
  private errorCount = 0;
  private totalProcessingTime = 0;
  private logger = getLogger("worker");
  private isRunning = false;
  private processingPromise?: Promise<void>;

  constructor(
    private readonly queue: QueueService,
    private readonly processor: JobProcessor,
    private readonly timings: WorkerTimings = DEFAULT_WORKER_TIMINGS,
    private readonly sleepFn: SleepFn = sleep,
  ) {
    this.workerId = `worker-${generateUuid()}`;
    this.startedAt = new Date();
    this.lastHeartbeat = new Date();
  }

  /**
   * Start worker loop
   */
  start(): void {
    if (this.isRunning) {
      throw new Error("Worker already running");
    }

    this.isRunning = true;
    this.status = "starting";
    this.logger.info(`Starting worker: ${this.workerId}`);

    this.processingPromise = this.processLoop();
    this.status = "idle";
  }

  /**
   * Stop worker loop, waiting for the current job to finish
   */
  async stop(): Promise<void> {
    this.isRunning = false;

    if (this.processingPromise) {
      await this.processingPromise;
    }

    this.status = "stopped";
    this.logger.info(`Worker stopped: ${this.workerId}`);
  }

  /**
   * Take at most one job from the queue and process it. Returns false when the queue was empty.
   */
  async pollOnce(): Promise<boolean> {
    this.lastHeartbeat = new Date();

    const message = await this.queue.dequeue();
    if (!message) {
      return false;
    }

    await this.processMessage(message);
    return true;
  }

  private async processLoop(): Promise<void> {
    while (this.isRunning) {
      try {
        const processed = await this.pollOnce();

        if (!processed) {
          await this.sleepFn(this.timings.idlePollMs);
        }
      } catch (error) {
        this.logger.error(`Worker ${this.workerId} processing error`, { error: ErrorUtils.getMessage(error) });
        this.errorCount++;
        this.status = "error";

        // Wait before retrying to avoid rapid error loops
        await this.sleepFn(this.timings.errorBackoffMs);
        this.status = "idle";
      }
    }
  }

  private async processMessage(message: QueueMessage): Promise<void> {
    this.status = "processing";
    this.currentJob = message.jobId;
    const startTime = Date.now();

    try {
      this.logger.info(`Worker ${this.workerId} processing job ${message.jobId}`);

      const outcome = await this.processor.process(message.jobId, this.workerId);

      if (outcome === "completed") {
        this.processedCount++;
      } else if (outcome === "failed") {
        this.failedCount++;
      }

      this.totalProcessingTime += Date.now() - startTime;
    } catch (error) {
      if (ErrorUtils.isRetryable(error)) {
        await this.handBack(message);
      }
      throw error;
    } finally {
      this.status = this.isRunning ? "idle" : "stopped";
      this.currentJob = undefined;
    }
  }

  /**
   * Return a job the store kept us from finishing, so another delivery can pick it up
   */
  private async handBack(message: QueueMessage): Promise<void> {
    try {
      await this.queue.requeue(message);
    } catch (error) {
      this.logger.error(`Failed to requeue job ${message.jobId}`, { error: ErrorUtils.getMessage(error) });
    }
  }

  /**
   * Get worker information
   */
  getInfo(): WorkerInfo {
    const finished = this.processedCount + this.failedCount;
    return {
      workerId: this.workerId,
      status: this.status,
      currentJob: this.currentJob,
      startedAt: this.startedAt,
      lastHeartbeat: this.lastHeartbeat,
      processedCount: this.processedCount,
      failedCount: this.failedCount,
      errorCount: this.errorCount,
      averageProcessingTime: finished > 0 ? Math.round(this.totalProcessingTime / finished) : 0,
    };
  }
}

/**
 * Worker Pool Manager
 */
export class WorkerPoolService {
  private logger = getLogger("worker-pool-service");
  private workers: Map<string, JobWorker> = new Map();

  constructor(
    private readonly queue: QueueService,
    private readonly processor: JobProcessor,
    private readonly timings: WorkerTimings = DEFAULT_WORKER_TIMINGS,
  ) {}

  /**
   * Start `count` job workers
   */
  startWorkers(count: number): void {
    for (let i = 0; i < count; i++) {
      const worker = new JobWorker(this.queue, this.processor, this.timings);
      this.workers.set(worker.getInfo().workerId, worker);
      worker.start();
    }

    this.logger.info(`Started ${count} job workers`);
  }

  /**
   * Stop all workers
   */
  async stopAllWorkers(): Promise<void> {
    await Promise.all(Array.from(this.workers.values()).map((worker) => worker.stop()));
    this.workers.clear();
    this.logger.info("All workers stopped");
  }

  /**
   * Get worker statistics
   */
  getWorkerStats(): WorkerInfo[] {
    return Array.from(this.workers.values()).map((worker) => worker.getInfo());
  }

  /**
   * Health check for job workers
   */
  healthCheck(): {
    status: "healthy" | "degraded" | "unhealthy";
    totalWorkers: number;
    activeWorkers: number;
    idleWorkers: number;
    errorWorkers: number;
  } {
    const workers = this.getWorkerStats();
    const totalWorkers = workers.length;
    const activeWorkers = workers.filter((w) => w.status === "processing").length;
    const idleWorkers = workers.filter((w) => w.status === "idle").length;
    const errorWorkers = workers.filter((w) => w.status === "error").length;

    let status: "healthy" | "degraded" | "unhealthy" = "healthy";

    if (errorWorkers > totalWorkers * 0.2) {
      status = "degraded";
    }

    if (totalWorkers === 0 || errorWorkers > totalWorkers * 0.5) {
      status = "unhealthy";
    }

    return { status, totalWorkers, activeWorkers, idleWorkers, errorWorkers };
  }
}
