/**
 * Worker Pool
 * Bounded in-process executor shared by all jobs; tasks beyond the bound wait in FIFO order
 */

import { getLogger } from "@config/logging.ts";
import { ErrorFactory } from "@utils/error_catalog.ts";
import { withTimeout } from "@utils/error_recovery.ts";

export interface WorkerPoolStats {
  size: number;
  active: number;
  queued: number;
  completed: number;
  failed: number;
  timedOut: number;
}

export interface RunOptions {
  timeoutMs?: number;
  label?: string;
}

interface PendingTask {
  run: () => void;
  reject: (error: Error) => void;
}

export class WorkerPool {
  private logger = getLogger("worker-pool");
  private active = 0;
  private pending: PendingTask[] = [];
  private closed = false;
  private counters = { completed: 0, failed: 0, timedOut: 0 };

  constructor(
    private readonly size: number,
    private readonly defaultTimeoutMs: number = 540_000,
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Worker pool size must be a positive integer, got ${size}`);
    }
  }

  /**
   * Run a task once a slot is free. Rejects with ChunkInfrastructureFailure when it exceeds its timeout.
   */
  run<T>(task: () => Promise<T>, options: RunOptions = {}): Promise<T> {
    if (this.closed) {
      return Promise.reject(ErrorFactory.processing("chunk_failed", {}, "Worker pool is shut down"));
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const label = options.label ?? "task";

    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.active++;
        let timedOut = false;
        const body = Promise.resolve().then(task);

        // The slot is held until the task body settles, even after the caller has timed out
        const releaseSlot = () => {
          this.active--;
          this.drain();
        };
        void body.then(releaseSlot, releaseSlot);

        void withTimeout(body, timeoutMs, () => {
          timedOut = true;
          return ErrorFactory.processing("chunk_failed", {}, `${label} timed out after ${timeoutMs}ms`);
        }).then((value) => {
          this.counters.completed++;
          resolve(value);
        }, (error: unknown) => {
          this.counters.failed++;
          if (timedOut) {
            this.counters.timedOut++;
            this.logger.warn(`${label} exceeded ${timeoutMs}ms, slot held until it settles`);
          }
          reject(error);
        });
      };

      this.pending.push({ run: start, reject });
      this.drain();
    });
  }

  getStats(): WorkerPoolStats {
    return {
      size: this.size,
      active: this.active,
      queued: this.pending.length,
      ...this.counters,
    };
  }

  /**
   * Stop accepting work and reject anything still waiting for a slot
   */
  shutdown(): void {
    this.closed = true;
    const waiting = this.pending.splice(0);
    for (const task of waiting) {
      task.reject(ErrorFactory.processing("chunk_failed", {}, "Worker pool shut down before task started"));
    }
    if (waiting.length > 0) {
      this.logger.info(`Worker pool shut down, ${waiting.length} waiting tasks rejected`);
    }
  }

  private drain(): void {
    while (this.active < this.size && this.pending.length > 0) {
      const next = this.pending.shift();
      next?.run();
    }
  }
}
