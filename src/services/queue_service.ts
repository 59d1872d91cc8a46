/**
 * Queue Service
 * FIFO job queue on a sorted set, with admission control against a size ceiling
 */

import { generateUuid } from "@/deps.ts";
import { getLogger } from "@config/logging.ts";
import { QueueMessageSchema } from "@models/queue.ts";
import type { QueueCapacity, QueueConfig, QueueMessage, QueueOperationResult } from "@models/queue.ts";
import type { JobKind } from "@models/job.ts";
import type { ResultStore } from "@services/result_store.ts";
import { ErrorUtils } from "@utils/error_catalog.ts";

/**
 * Default queue configuration
 */
export const DEFAULT_QUEUE_CONFIG: QueueConfig = {
  queueName: "queue:extraction",
  maxQueueSize: 100,
  rejectionEnabled: true,
  averageJobSeconds: 30,
  workerCount: 2,
  memoryThreshold: 0.9,
};

/**
 * Bytes a payload takes once base64 encoded for the store
 */
export function encodedPayloadBytes(byteLength: number): number {
  return Math.ceil(byteLength / 3) * 4;
}

export class QueueService {
  private logger = getLogger("queue");
  private config: QueueConfig;

  constructor(
    private readonly store: ResultStore,
    config: Partial<QueueConfig> = {},
    private readonly now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_QUEUE_CONFIG, ...config };
  }

  /**
   * Enqueue a job id. Earlier submissions are dequeued first.
   */
  async enqueue(jobId: string, kind: JobKind): Promise<QueueOperationResult> {
    const enqueuedAt = this.now();
    const message: QueueMessage = {
      id: generateUuid(),
      jobId,
      kind,
      enqueuedAt: new Date(enqueuedAt).toISOString(),
      attempt: 0,
    };

    try {
      await this.store.enqueue(this.config.queueName, JSON.stringify(message), enqueuedAt);
      const queuePosition = await this.store.queueLength(this.config.queueName);

      this.logger.info(`Job ${jobId} enqueued (position: ${queuePosition})`);

      return {
        success: true,
        messageId: message.id,
        queuePosition,
        estimatedWaitSeconds: this.estimateWaitSeconds(queuePosition),
      };
    } catch (error) {
      this.logger.error(`Failed to enqueue job ${jobId}`, { error: ErrorUtils.getMessage(error) });
      return {
        success: false,
        error: ErrorUtils.getMessage(error),
      };
    }
  }

  /**
   * Pop the oldest message, skipping entries that cannot be parsed
   */
  /**
   * Put a message back at the tail of the queue for another delivery attempt
   */
  async requeue(message: QueueMessage): Promise<void> {
    const next: QueueMessage = { ...message, attempt: message.attempt + 1 };
    await this.store.enqueue(this.config.queueName, JSON.stringify(next), this.now());
    this.logger.info(`Message requeued: ${message.id} (job ${message.jobId}, attempt ${next.attempt})`);
  }

  async dequeue(): Promise<QueueMessage | null> {
    while (true) {
      const raw = await this.store.dequeue(this.config.queueName);
      if (raw === null) {
        return null;
      }

      const message = this.parseMessage(raw);
      if (message) {
        this.logger.debug(`Message dequeued: ${message.id} (job ${message.jobId})`);
        return message;
      }

      this.logger.warn("Dropping unreadable queue entry");
    }
  }

  async size(): Promise<number> {
    return await this.store.queueLength(this.config.queueName);
  }

  /**
   * Whether a new job may be admitted, with an estimated wait. Checks the queue ceiling and
   * whether the store has memory left for a payload of `payloadBytes`.
   */
  async checkCapacity(payloadBytes = 0): Promise<QueueCapacity> {
    const [size, memory] = await Promise.all([this.size(), this.store.memoryUsage()]);
    const requiredBytes = encodedPayloadBytes(payloadBytes);

    const queueFull = this.config.rejectionEnabled && size >= this.config.maxQueueSize;
    // No memory limit configured on the store means nothing to check against
    const storageFull = memory.maxBytes > 0 &&
      memory.usedBytes + requiredBytes > memory.maxBytes * this.config.memoryThreshold;

    if (storageFull) {
      this.logger.warn(
        `Store memory at ${memory.usedBytes}/${memory.maxBytes} bytes, cannot fit ${requiredBytes} more`,
      );
    }

    return {
      accepting: !queueFull && !storageFull,
      ...(queueFull ? { reason: "queue_full" as const } : storageFull ? { reason: "storage_full" as const } : {}),
      size,
      maxSize: this.config.maxQueueSize,
      estimatedWaitSeconds: this.estimateWaitSeconds(size),
      storage: { usedBytes: memory.usedBytes, maxBytes: memory.maxBytes, requiredBytes },
    };
  }

  /**
   * Health check for queue service
   */
  async healthCheck(): Promise<{
    status: "healthy" | "degraded" | "unhealthy";
    details: { storeConnection: boolean; queuedJobs: number; maxQueueSize: number };
  }> {
    try {
      const queuedJobs = await this.size();
      let status: "healthy" | "degraded" | "unhealthy" = "healthy";

      if (queuedJobs > this.config.maxQueueSize * 0.8) {
        status = "degraded";
      }
      if (queuedJobs >= this.config.maxQueueSize) {
        status = "unhealthy";
      }

      return {
        status,
        details: { storeConnection: true, queuedJobs, maxQueueSize: this.config.maxQueueSize },
      };
    } catch (error) {
      this.logger.error("Queue health check failed", { error: ErrorUtils.getMessage(error) });
      return {
        status: "unhealthy",
        details: { storeConnection: false, queuedJobs: 0, maxQueueSize: this.config.maxQueueSize },
      };
    }
  }

  getConfig(): QueueConfig {
    return this.config;
  }

  private estimateWaitSeconds(queuePosition: number): number {
    const workers = Math.max(1, this.config.workerCount);
    return Math.ceil(queuePosition / workers) * this.config.averageJobSeconds;
  }

  private parseMessage(raw: string): QueueMessage | null {
    try {
      const result = QueueMessageSchema.safeParse(JSON.parse(raw));
      return result.success ? result.data : null;
    } catch {
      return null;
    }
  }
}
