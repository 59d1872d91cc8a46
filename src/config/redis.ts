/**
 * Redis Configuration
 * Manages the Redis connection backing the result store, cache, rate limits and job queue
 */

import { createClient } from "@/deps.ts";
import { getConfig } from "@config/env.ts";
import { getLogger } from "@config/logging.ts";

export type RedisClient = ReturnType<typeof createClient>;

/**
 * Redis configuration interface
 */
export interface RedisConfig {
  url: string;
  maxRetryAttempts: number;
  retryDelayMs: number;
}

/**
 * Redis health information
 */
export interface RedisHealth {
  status: "healthy" | "unhealthy";
  latency?: number;
  lastCheck: string;
}

class RedisManager {
  private client: RedisClient | null = null;
  private config: RedisConfig | null = null;
  private logger = getLogger("redis");
  private healthInfo: RedisHealth = {
    status: "unhealthy",
    lastCheck: new Date().toISOString(),
  };

  /**
   * Initialize Redis connection
   */
  async initialize(url?: string): Promise<void> {
    if (this.client) {
      this.logger.warn("Redis client already initialized");
      return;
    }

    try {
      this.config = {
        url: url ?? getConfig().redisUrl,
        maxRetryAttempts: 3,
        retryDelayMs: 1000,
      };

      this.validateConfig(this.config);

      const { maxRetryAttempts, retryDelayMs } = this.config;
      const client = createClient({
        url: this.config.url,
        socket: {
          reconnectStrategy: (retries: number) =>
            retries > maxRetryAttempts ? new Error("Redis reconnection attempts exhausted") : retryDelayMs,
        },
      });

      client.on("error", (error: unknown) => {
        this.logger.error("Redis client error", {
          error: error instanceof Error ? error.message : String(error),
        });
      });

      await client.connect();
      this.client = client;

      await this.testConnection();

      this.logger.info("Redis client initialized successfully");
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : "Unknown error";
      this.logger.error(`Failed to initialize Redis client: ${errorMessage}`);
      throw new Error(`Redis initialization failed: ${errorMessage}`);
    }
  }

  /**
   * Validate Redis configuration
   */
  private validateConfig(config: RedisConfig): void {
    if (!config.url) {
      throw new Error("Redis URL not configured");
    }

    let parsed: URL;
    try {
      parsed = new URL(config.url);
    } catch {
      throw new Error("Invalid Redis URL format");
    }

    if (parsed.protocol !== "redis:" && parsed.protocol !== "rediss:") {
      throw new Error(`Unsupported Redis URL protocol: ${parsed.protocol}`);
    }
  }

  /**
   * Test Redis connection
   */
  private async testConnection(): Promise<void> {
    const health = await this.getHealthInfo();
    if (health.status !== "healthy") {
      throw new Error("Redis connection test failed");
    }
    this.logger.info(`Redis connection test successful (${health.latency ?? 0}ms)`);
  }

  /**
   * Get Redis client instance
   */
  getClient(): RedisClient {
    if (!this.client) {
      throw new Error("Redis client not initialized. Call initialize() first.");
    }
    return this.client;
  }

  /**
   * Get Redis health information
   */
  async getHealthInfo(): Promise<RedisHealth> {
    if (!this.client) {
      return {
        status: "unhealthy",
        lastCheck: new Date().toISOString(),
      };
    }

    try {
      const startTime = Date.now();
      await this.client.ping();
      const latency = Date.now() - startTime;

      this.healthInfo = {
        status: "healthy",
        latency,
        lastCheck: new Date().toISOString(),
      };
    } catch (error) {
      this.logger.error("Redis health check failed", {
        error: error instanceof Error ? error.message : String(error),
      });

      this.healthInfo = {
        status: "unhealthy",
        lastCheck: new Date().toISOString(),
      };
    }

    return this.healthInfo;
  }

  /**
   * Close Redis connection
   */
  async close(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
      this.logger.info("Redis connection closed");
    }
  }
}

export const redis = new RedisManager();
