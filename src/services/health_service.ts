/**
 * Health Service
 * Aggregates store, queue, worker and cache health into one report
 */

import { getLogger } from "@config/logging.ts";
import type { CacheService, CacheStats } from "@services/cache_service.ts";
import type { QueueService } from "@services/queue_service.ts";
import type { ResultStore } from "@services/result_store.ts";
import type { WorkerPool, WorkerPoolStats } from "@services/worker_pool.ts";
import type { WorkerPoolService } from "@services/worker_service.ts";
import { ErrorUtils } from "@utils/error_catalog.ts";

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export interface HealthReport {
  status: HealthStatus;
  timestamp: string;
  checks: {
    store: { status: HealthStatus; latencyMs?: number; error?: string };
    queue: { status: HealthStatus; queuedJobs: number; maxQueueSize: number };
    workers: { status: HealthStatus; totalWorkers: number; activeWorkers: number; errorWorkers: number };
    chunkPool: WorkerPoolStats;
    cache: CacheStats;
  };
}

const RANK: Record<HealthStatus, number> = { healthy: 0, degraded: 1, unhealthy: 2 };

export class HealthService {
  private logger = getLogger("health");

  constructor(
    private readonly store: ResultStore,
    private readonly queue: QueueService,
    private readonly workers: WorkerPoolService,
    private readonly pool: WorkerPool,
    private readonly cache: CacheService,
  ) {}

  async check(): Promise<HealthReport> {
    const store = await this.checkStore();
    const queueHealth = await this.queue.healthCheck();
    const workerHealth = this.workers.healthCheck();

    const statuses: HealthStatus[] = [store.status, queueHealth.status, workerHealth.status];
    const status = statuses.reduce((worst, current) => (RANK[current] > RANK[worst] ? current : worst), "healthy");

    if (status !== "healthy") {
      this.logger.warn(`Service health is ${status}`);
    }

    return {
      status,
      timestamp: new Date().toISOString(),
      checks: {
        store,
        queue: {
          status: queueHealth.status,
          queuedJobs: queueHealth.details.queuedJobs,
          maxQueueSize: queueHealth.details.maxQueueSize,
        },
        workers: {
          status: workerHealth.status,
          totalWorkers: workerHealth.totalWorkers,
          activeWorkers: workerHealth.activeWorkers,
          errorWorkers: workerHealth.errorWorkers,
        },
        chunkPool: this.pool.getStats(),
        cache: this.cache.getStats(),
      },
    };
  }

  private async checkStore(): Promise<HealthReport["checks"]["store"]> {
    try {
      const latencyMs = await this.store.ping();
      return { status: latencyMs > 1000 ? "degraded" : "healthy", latencyMs };
    } catch (error) {
      return { status: "unhealthy", error: ErrorUtils.getMessage(error) };
    }
  }
}
