/**
 * Document Extraction Service
 * Bootstraps configuration, logging, Redis and the job workers
 */

import { getConfig } from "@config/env.ts";
import { getLogger, setupLogging } from "@config/logging.ts";
import { redis } from "@config/redis.ts";
import { createServices } from "@/container.ts";
import type { ServiceContainer } from "@/container.ts";
import type { ExtractionCollaborators } from "@models/document.ts";
import { RedisResultStore } from "@services/result_store.ts";

export interface RunningService {
  services: ServiceContainer;
  shutdown(): Promise<void>;
}

/**
 * Start the service with the external document collaborators
 */
export async function bootstrap(collaborators: ExtractionCollaborators): Promise<RunningService> {
  const config = getConfig();
  setupLogging(config.logLevel);

  const logger = getLogger("main");
  logger.info(`Starting document extraction service (${config.environment})`);

  await redis.initialize(config.redisUrl);

  const services = createServices(new RedisResultStore(), collaborators, config);
  services.workers.startWorkers(config.jobWorkers);

  logger.info(
    `Service ready: ${config.jobWorkers} job workers, chunk pool of ${config.workerPoolSize}, ` +
      `rate limiting ${config.enableRateLimiting ? "enabled" : "disabled"}`,
  );

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down...");
    await services.workers.stopAllWorkers();
    services.pool.shutdown();
    await redis.close();
  };

  return { services, shutdown };
}

export { createServices } from "@/container.ts";
export type { ServiceContainer } from "@/container.ts";
export * from "@models/document.ts";
export type { Job, JobKind, JobResultView, JobStatusView, ExtractionParameters } from "@models/job.ts";
export { resolveClientIdentity } from "@utils/client_identity.ts";
export { ExtractionServiceError } from "@utils/error_catalog.ts";
