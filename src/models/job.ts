/**
 * Job Models
 * Extraction job records and the lifecycle state machine
 */

import { z } from "@/deps.ts";
import { ExtractionResultSchema } from "@models/document.ts";
import type { ErrorCode, ErrorKind } from "@utils/error_catalog.ts";

export const JOB_KINDS = ["image", "pdf", "hybrid-pdf"] as const;
export const JobKindSchema = z.enum(JOB_KINDS);
export type JobKind = z.infer<typeof JobKindSchema>;

export type JobStatus = "queued" | "processing" | "completed" | "failed";

export const ExtractionParametersSchema = z.object({
  dpi: z.number().int().min(72).max(600),
  chunkSize: z.number().int().positive(),
  maxPages: z.number().int().positive(),
  textThreshold: z.number().int().nonnegative(),
  imageAreaThreshold: z.number().min(0).max(1),
  minConfidence: z.number().min(0).max(1),
});
export type ExtractionParameters = z.infer<typeof ExtractionParametersSchema>;

export const JobInputSchema = z.object({
  fileName: z.string(),
  byteSize: z.number().int().nonnegative(),
  contentHash: z.string(),
  cacheKey: z.string(),
  parameters: ExtractionParametersSchema,
});
export type JobInput = z.infer<typeof JobInputSchema>;

export const JobProgressSchema = z.object({
  totalUnits: z.number().int().nonnegative(),
  completedUnits: z.number().int().nonnegative(),
});
export type JobProgress = z.infer<typeof JobProgressSchema>;

const ERROR_CODES = [
  "E2001",
  "E2002",
  "E2003",
  "E2004",
  "E2101",
  "E3001",
  "E3003",
  "E3004",
  "E4001",
  "E4003",
  "E6003",
] as const satisfies readonly ErrorCode[];

const ERROR_KINDS = [
  "validation_failure",
  "rate_limited",
  "not_found",
  "recognition_failure",
  "chunk_infrastructure_failure",
  "storage_unavailable",
  "capacity_exceeded",
  "internal",
] as const satisfies readonly ErrorKind[];

export const JobErrorSchema = z.object({
  code: z.enum(ERROR_CODES),
  kind: z.enum(ERROR_KINDS),
  message: z.string(),
  details: z.array(z.string()).optional(),
});
export type JobError = z.infer<typeof JobErrorSchema>;

const jobBase = {
  id: z.string().uuid(),
  kind: JobKindSchema,
  input: JobInputSchema,
  progress: JobProgressSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
  workerId: z.string().optional(),
};

export const JobSchema = z.discriminatedUnion("status", [
  z.object({ ...jobBase, status: z.literal("queued") }),
  z.object({ ...jobBase, status: z.literal("processing"), startedAt: z.string() }),
  z.object({
    ...jobBase,
    status: z.literal("completed"),
    startedAt: z.string(),
    finishedAt: z.string(),
    result: ExtractionResultSchema,
  }),
  z.object({
    ...jobBase,
    status: z.literal("failed"),
    startedAt: z.string().optional(),
    finishedAt: z.string(),
    error: JobErrorSchema,
  }),
]);
export type Job = z.infer<typeof JobSchema>;
export type CompletedJob = Extract<Job, { status: "completed" }>;
export type FailedJob = Extract<Job, { status: "failed" }>;

export type JobEvent =
  | { type: "start"; totalUnits: number; workerId: string; at: string }
  | { type: "progress"; completedUnits: number; totalUnits?: number; at: string }
  | { type: "complete"; result: z.infer<typeof ExtractionResultSchema>; at: string }
  | { type: "fail"; error: JobError; at: string };

/**
 * Apply a lifecycle event. Returns null when the event does not apply to the
 * job's current status, which callers treat as a no-op.
 *
 * queued -> processing -> completed | failed; queued -> failed.
 * Terminal jobs never change again.
 */
export function transitionJob(job: Job, event: JobEvent): Job | null {
  switch (event.type) {
    case "start": {
      if (job.status !== "queued") return null;
      return {
        id: job.id,
        kind: job.kind,
        input: job.input,
        createdAt: job.createdAt,
        status: "processing",
        workerId: event.workerId,
        startedAt: event.at,
        updatedAt: event.at,
        progress: { totalUnits: event.totalUnits, completedUnits: 0 },
      };
    }

    case "progress": {
      if (job.status !== "processing") return null;
      const totalUnits = Math.max(job.progress.totalUnits, event.totalUnits ?? 0);
      const completedUnits = Math.min(totalUnits, Math.max(job.progress.completedUnits, event.completedUnits));
      if (totalUnits === job.progress.totalUnits && completedUnits === job.progress.completedUnits) return null;
      return {
        ...job,
        updatedAt: event.at,
        progress: { totalUnits, completedUnits },
      };
    }

    case "complete": {
      if (job.status !== "processing") return null;
      const totalUnits = Math.max(job.progress.totalUnits, event.result.pageCount);
      return {
        ...job,
        status: "completed",
        updatedAt: event.at,
        finishedAt: event.at,
        progress: { totalUnits, completedUnits: totalUnits },
        result: event.result,
      };
    }

    case "fail": {
      if (job.status !== "queued" && job.status !== "processing") return null;
      return { ...job, status: "failed", updatedAt: event.at, finishedAt: event.at, error: event.error };
    }
  }
}

export function isTerminal(status: JobStatus): boolean {
  return status === "completed" || status === "failed";
}

/**
 * Status snapshot returned to pollers
 */
export interface JobStatusView {
  jobId: string;
  status: JobStatus;
  kind: JobKind;
  fileName: string;
  progress: JobProgress & { percent: number };
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  finishedAt?: string;
  error?: JobError;
}

export type JobResultView =
  | { state: "completed"; jobId: string; result: z.infer<typeof ExtractionResultSchema> }
  | { state: "pending"; jobId: string; status: "queued" | "processing"; progress: JobProgress }
  | { state: "failed"; jobId: string; error: JobError };
