/**
 * Queue Models and Types
 * Job queue messages and capacity information
 */

import { z } from "@/deps.ts";
import { JobKindSchema } from "@models/job.ts";

export const QueueMessageSchema = z.object({
  id: z.string(),
  jobId: z.string(),
  kind: JobKindSchema,
  enqueuedAt: z.string(),
  attempt: z.number().int().nonnegative(),
});
export type QueueMessage = z.infer<typeof QueueMessageSchema>;

/**
 * Queue operation result
 */
export interface QueueOperationResult {
  success: boolean;
  messageId?: string;
  queuePosition?: number;
  estimatedWaitSeconds?: number;
  error?: string;
}

/**
 * Admission check against the configured queue ceiling
 */
export interface QueueCapacity {
  accepting: boolean;
  /** Why a submission is turned away */
  reason?: "queue_full" | "storage_full";
  size: number;
  maxSize: number;
  estimatedWaitSeconds: number;
  storage: { usedBytes: number; maxBytes: number; requiredBytes: number };
}

export interface QueueConfig {
  queueName: string;
  maxQueueSize: number;
  rejectionEnabled: boolean;
  /** Rough per-job processing time used for wait estimates */
  averageJobSeconds: number;
  workerCount: number;
  /** Share of the store's memory limit a new payload may fill up to */
  memoryThreshold: number;
}
