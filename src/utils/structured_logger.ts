/**
 * Structured Logger Utility
 * JSON log entries for job lifecycle events, errors and timings
 */

import { getLogger } from "@config/logging.ts";
import type { ErrorContext, ExtractionServiceError } from "@utils/error_catalog.ts";

/**
 * Log entry types
 */
export type LogEntryType = "error" | "business_event" | "performance";

/**
 * Structured log entry
 */
export interface StructuredLogEntry {
  timestamp: string;
  level: "DEBUG" | "INFO" | "WARN" | "ERROR";
  type: LogEntryType;
  message: string;

  traceId?: string;
  jobId?: string;
  identity?: string;
  duration?: number;

  error?: {
    code?: string;
    kind?: string;
    severity?: string;
    stack?: string;
  };

  business?: {
    operation?: string;
    entity?: string;
    entityId?: string;
    outcome?: "success" | "failure" | "partial";
  };

  metadata?: Record<string, unknown>;
  environment?: string;
  service: string;
}

/**
 * Business event log entry
 */
export interface BusinessEventLogEntry {
  event: string;
  entity: string;
  entityId: string;
  outcome: "success" | "failure" | "partial";
  details?: Record<string, unknown>;
  traceId?: string;
  identity?: string;
}

const SERVICE_NAME = "document-extraction-service";

class StructuredLogger {
  private logger = getLogger("structured");

  /**
   * Log a catalogued error
   */
  logError(error: ExtractionServiceError, duration?: number): void {
    const definitionLevel = error.severity === "low" ? "INFO" : error.severity === "medium" ? "WARN" : "ERROR";

    this.write({
      timestamp: new Date().toISOString(),
      level: definitionLevel,
      type: "error",
      message: error.message,
      traceId: error.traceId,
      jobId: error.context.jobId,
      identity: error.context.identity,
      duration,
      error: {
        code: error.code,
        kind: error.kind,
        severity: error.severity,
        stack: error.requiresAlert() ? error.stack : undefined,
      },
      metadata: error.context.metadata,
      environment: process.env.ENVIRONMENT,
      service: SERVICE_NAME,
    });
  }

  /**
   * Log business event
   */
  logBusinessEvent(entry: BusinessEventLogEntry): void {
    this.write({
      timestamp: new Date().toISOString(),
      level: entry.outcome === "success" ? "INFO" : "WARN",
      type: "business_event",
      message: `${entry.event}: ${entry.entity}(${entry.entityId}) - ${entry.outcome}`,
      traceId: entry.traceId,
      identity: entry.identity,
      business: {
        operation: entry.event,
        entity: entry.entity,
        entityId: entry.entityId,
        outcome: entry.outcome,
      },
      metadata: entry.details,
      environment: process.env.ENVIRONMENT,
      service: SERVICE_NAME,
    });
  }

  /**
   * Log performance metrics
   */
  logPerformance(
    operation: string,
    duration: number,
    context: Partial<ErrorContext>,
    metadata?: Record<string, unknown>,
  ): void {
    this.write({
      timestamp: new Date().toISOString(),
      level: "INFO",
      type: "performance",
      message: `Performance: ${operation} completed in ${duration}ms`,
      traceId: context.traceId,
      jobId: context.jobId,
      duration,
      business: {
        operation,
        outcome: "success",
      },
      metadata: { ...context.metadata, ...metadata },
      environment: process.env.ENVIRONMENT,
      service: SERVICE_NAME,
    });
  }

  private write(entry: StructuredLogEntry): void {
    const logLine = JSON.stringify(entry);

    switch (entry.level) {
      case "DEBUG":
        this.logger.debug(logLine);
        break;
      case "INFO":
        this.logger.info(logLine);
        break;
      case "WARN":
        this.logger.warn(logLine);
        break;
      case "ERROR":
        this.logger.error(logLine);
        break;
    }
  }
}

export const structuredLogger = new StructuredLogger();
