/**
 * Error Recovery Mechanisms
 * Retry with exponential backoff, operation timeouts and circuit breaking
 */

import { getLogger } from "@config/logging.ts";
import { ErrorFactory, ErrorUtils, ExtractionServiceError } from "@utils/error_catalog.ts";
import type { ErrorContext } from "@utils/error_catalog.ts";

/**
 * Recovery strategy types
 */
export type RecoveryStrategy = "retry" | "circuit_breaker" | "fail_fast";

/**
 * Recovery configuration
 */
export interface RecoveryConfig {
  strategy: RecoveryStrategy;
  maxRetries: number;
  retryDelay: number; // milliseconds
  exponentialBackoff: boolean;
  maxRetryDelay: number; // milliseconds
  timeout: number; // milliseconds
  circuitBreakerThreshold: number;
}

/**
 * Recovery result
 */
export type RecoveryResult<T> =
  | { success: true; data: T; recoveryAttempted: boolean; attempts: number; totalDuration: number }
  | {
    success: false;
    error: ExtractionServiceError;
    recoveryAttempted: boolean;
    attempts: number;
    totalDuration: number;
  };

export interface CircuitBreakerState {
  failures: number;
  lastFailure: Date;
  state: "closed" | "open" | "half_open";
  nextAttempt: Date;
}

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Race an operation against a timer, clearing the timer either way
 */
export function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  return Promise.race([operation, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Delay before the next attempt (attempt is 1-based)
 */
export function calculateRetryDelay(attempt: number, config: RecoveryConfig): number {
  if (!config.exponentialBackoff) {
    return config.retryDelay;
  }

  const delay = config.retryDelay * Math.pow(2, attempt - 1);
  return Math.min(delay, config.maxRetryDelay);
}

export class ErrorRecoveryService {
  private logger = getLogger("error-recovery");
  private circuitBreakers: Map<string, CircuitBreakerState> = new Map();

  constructor(private readonly sleepFn: SleepFn = sleep) {}

  /**
   * Execute operation with error recovery
   */
  async executeWithRecovery<T>(
    operation: () => Promise<T>,
    config: RecoveryConfig,
    context: Partial<ErrorContext>,
    operationName: string,
  ): Promise<RecoveryResult<T>> {
    const startTime = Date.now();
    let attempts = 0;
    let lastError: ExtractionServiceError | null = null;

    if (config.strategy === "circuit_breaker") {
      const circuitState = this.getCircuitBreakerState(operationName);
      if (circuitState.state === "open") {
        return {
          success: false,
          error: ErrorFactory.storage("unavailable", context, `Circuit breaker is open for ${operationName}`),
          recoveryAttempted: false,
          attempts,
          totalDuration: Date.now() - startTime,
        };
      }
    }

    for (attempts = 1; attempts <= config.maxRetries; attempts++) {
      try {
        const result = await withTimeout(
          operation(),
          config.timeout,
          () => ErrorFactory.storage("unavailable", context, `Operation timeout after ${config.timeout}ms`),
        );

        if (config.strategy === "circuit_breaker") {
          this.resetCircuitBreaker(operationName);
        }

        return {
          success: true,
          data: result,
          recoveryAttempted: attempts > 1,
          attempts,
          totalDuration: Date.now() - startTime,
        };
      } catch (error) {
        lastError = ErrorUtils.wrap(error, context);

        this.logger.warn(
          `Operation ${operationName} failed (attempt ${attempts}/${config.maxRetries})`,
          { error: lastError.code, message: lastError.message, traceId: context.traceId },
        );

        if (config.strategy === "circuit_breaker") {
          this.updateCircuitBreaker(operationName, config);
        }

        if (!this.shouldRetry(lastError, attempts, config)) {
          break;
        }

        await this.sleepFn(calculateRetryDelay(attempts, config));
      }
    }

    return {
      success: false,
      error: lastError || ErrorFactory.system(context),
      recoveryAttempted: attempts > 1,
      attempts: Math.min(attempts, config.maxRetries),
      totalDuration: Date.now() - startTime,
    };
  }

  /**
   * Run an operation and throw its final error when recovery fails
   */
  async execute<T>(
    operation: () => Promise<T>,
    config: RecoveryConfig,
    context: Partial<ErrorContext>,
    operationName: string,
  ): Promise<T> {
    const result = await this.executeWithRecovery(operation, config, context, operationName);
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  private shouldRetry(error: ExtractionServiceError, attempt: number, config: RecoveryConfig): boolean {
    if (config.strategy === "fail_fast" || attempt >= config.maxRetries) {
      return false;
    }

    return error.retryable && error.category !== "validation";
  }

  private getCircuitBreakerState(operationName: string): CircuitBreakerState {
    const existing = this.circuitBreakers.get(operationName);

    if (existing) {
      if (existing.state === "open" && Date.now() > existing.nextAttempt.getTime()) {
        existing.state = "half_open";
      }
      return existing;
    }

    const newState: CircuitBreakerState = {
      failures: 0,
      lastFailure: new Date(),
      state: "closed",
      nextAttempt: new Date(),
    };

    this.circuitBreakers.set(operationName, newState);
    return newState;
  }

  private updateCircuitBreaker(operationName: string, config: RecoveryConfig): void {
    const state = this.getCircuitBreakerState(operationName);

    state.failures++;
    state.lastFailure = new Date();

    if (state.failures >= config.circuitBreakerThreshold) {
      state.state = "open";
      state.nextAttempt = new Date(Date.now() + 60000);

      this.logger.warn(`Circuit breaker opened for ${operationName}`, {
        failures: state.failures,
        nextAttempt: state.nextAttempt.toISOString(),
      });
    }
  }

  private resetCircuitBreaker(operationName: string): void {
    const state = this.circuitBreakers.get(operationName);
    if (state && state.failures > 0) {
      state.failures = 0;
      state.state = "closed";
      this.logger.info(`Circuit breaker reset for ${operationName}`);
    }
  }

  /**
   * Get circuit breaker statistics
   */
  getCircuitBreakerStats(): Record<string, CircuitBreakerState> {
    return Object.fromEntries(this.circuitBreakers.entries());
  }
}

export const errorRecoveryService = new ErrorRecoveryService();

/**
 * Default recovery configurations for common operations
 */
export const DEFAULT_RECOVERY_CONFIGS = {
  store_operation: {
    strategy: "retry",
    maxRetries: 3,
    retryDelay: 200,
    exponentialBackoff: true,
    maxRetryDelay: 2000,
    timeout: 5000,
    circuitBreakerThreshold: 5,
  },

  job_submission: {
    strategy: "circuit_breaker",
    maxRetries: 3,
    retryDelay: 250,
    exponentialBackoff: true,
    maxRetryDelay: 4000,
    timeout: 10000,
    circuitBreakerThreshold: 10,
  },
} satisfies Record<string, RecoveryConfig>;
