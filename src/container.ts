/**
 * Service Container
 * Wires every service against one result store and configuration
 */

import type { Config } from "@config/env.ts";
import type { ExtractionCollaborators } from "@models/document.ts";
import { CacheService } from "@services/cache_service.ts";
import { ChunkScheduler } from "@services/chunk_scheduler.ts";
import { DocumentStatusService } from "@services/document_status_service.ts";
import { DocumentUploadService } from "@services/document_upload_service.ts";
import { HealthService } from "@services/health_service.ts";
import { JobProcessor } from "@services/job_processor.ts";
import { JobRegistry } from "@services/job_registry.ts";
import { PageExtractor } from "@services/page_extractor.ts";
import type { ChunkProcessor } from "@services/chunk_scheduler.ts";
import { PayloadStore } from "@services/payload_store.ts";
import { QueueService } from "@services/queue_service.ts";
import { RateLimitingService } from "@services/rate_limiting_service.ts";
import type { ResultStore } from "@services/result_store.ts";
import { WorkerPool } from "@services/worker_pool.ts";
import { WorkerPoolService } from "@services/worker_service.ts";
import { ErrorRecoveryService } from "@utils/error_recovery.ts";
import type { SleepFn } from "@utils/error_recovery.ts";

export interface ServiceContainer {
  config: Config;
  store: ResultStore;
  rateLimiter: RateLimitingService;
  registry: JobRegistry;
  cache: CacheService;
  queue: QueueService;
  payloads: PayloadStore;
  pool: WorkerPool;
  scheduler: ChunkScheduler;
  processor: JobProcessor;
  workers: WorkerPoolService;
  uploads: DocumentUploadService;
  status: DocumentStatusService;
  health: HealthService;
}

export interface ContainerOverrides {
  /** Replaces the page extractor as the chunk task body */
  chunkProcessor?: ChunkProcessor;
  sleep?: SleepFn;
  now?: () => number;
}

export function createServices(
  store: ResultStore,
  collaborators: ExtractionCollaborators,
  config: Config,
  overrides: ContainerOverrides = {},
): ServiceContainer {
  const now = overrides.now ?? Date.now;

  const rateLimiter = new RateLimitingService(store, {
    enabled: config.enableRateLimiting,
    limits: {
      document_upload: { limit: config.rateLimitPerMinute, windowSeconds: config.rateLimitWindowSeconds },
    },
    now,
  });

  const registry = new JobRegistry(
    store,
    { ttlSeconds: config.jobTtlSeconds, ownerLeaseMs: config.cacheLockLeaseMs + 60_000 },
    () => new Date(now()),
  );

  const cache = new CacheService(
    store,
    {
      ttlSeconds: config.cacheTtlSeconds,
      lockLeaseMs: config.cacheLockLeaseMs,
      lockWaitTimeoutMs: config.cacheLockWaitTimeoutMs,
      pollIntervalMs: config.cachePollIntervalMs,
    },
    overrides.sleep,
    now,
  );

  const queue = new QueueService(
    store,
    {
      maxQueueSize: config.maxQueueSize,
      rejectionEnabled: config.queueRejectionEnabled,
      workerCount: config.jobWorkers,
    },
    now,
  );

  const payloads = new PayloadStore(store, config.jobTtlSeconds);
  const pool = new WorkerPool(config.workerPoolSize, config.chunkTimeoutMs);

  const extractor = new PageExtractor(collaborators.engine, collaborators.textExtractor);
  const chunkProcessor: ChunkProcessor = overrides.chunkProcessor ?? ((task) => extractor.processChunk(task));
  const scheduler = new ChunkScheduler(pool, registry, chunkProcessor, { chunkTimeoutMs: config.chunkTimeoutMs });

  const recovery = new ErrorRecoveryService(overrides.sleep);
  const processor = new JobProcessor(registry, cache, scheduler, payloads, collaborators.decoder, recovery);
  const workers = new WorkerPoolService(queue, processor, {
    idlePollMs: config.queuePollIntervalMs,
    errorBackoffMs: 5000,
  });

  const uploads = new DocumentUploadService(
    rateLimiter,
    registry,
    queue,
    payloads,
    {
      maxImageSize: config.maxImageSize,
      maxPdfSize: config.maxPdfSize,
      maxPagesCeiling: config.maxPages,
      defaults: {
        dpi: config.defaultDpi,
        chunkSize: config.defaultChunkSize,
        maxPages: config.maxPages,
        textThreshold: config.pageTextThreshold,
        imageAreaThreshold: 0,
        minConfidence: 0,
      },
    },
    recovery,
  );

  const status = new DocumentStatusService(rateLimiter, registry);
  const health = new HealthService(store, queue, workers, pool, cache);

  return {
    config,
    store,
    rateLimiter,
    registry,
    cache,
    queue,
    payloads,
    pool,
    scheduler,
    processor,
    workers,
    uploads,
    status,
    health,
  };
}
