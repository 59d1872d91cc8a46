/**
 * Payload Store
 * Holds submitted document bytes until a worker picks the job up
 */

import { getLogger } from "@config/logging.ts";
import type { ResultStore } from "@services/result_store.ts";
import { ErrorUtils } from "@utils/error_catalog.ts";

export class PayloadStore {
  private logger = getLogger("payload-store");

  constructor(private readonly store: ResultStore, private readonly ttlSeconds: number = 3600) {}

  async put(jobId: string, data: Uint8Array): Promise<void> {
    await this.store.set(this.key(jobId), Buffer.from(data).toString("base64"), this.ttlSeconds);
  }

  async get(jobId: string): Promise<Uint8Array | null> {
    const encoded = await this.store.get(this.key(jobId));
    return encoded === null ? null : new Uint8Array(Buffer.from(encoded, "base64"));
  }

  async remove(jobId: string): Promise<void> {
    try {
      await this.store.delete(this.key(jobId));
    } catch (error) {
      // Expires with the job either way
      this.logger.warn(`Failed to remove payload for job ${jobId}`, { error: ErrorUtils.getMessage(error) });
    }
  }

  private key(jobId: string): string {
    return `job:${jobId}:payload`;
  }
}
