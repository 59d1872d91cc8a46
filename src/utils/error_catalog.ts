/**
 * Error Catalog
 * Error definitions with specific codes and user-facing messages
 */

import { generateUuid } from "@/deps.ts";

/**
 * Error severity levels
 */
export type ErrorSeverity = "low" | "medium" | "high" | "critical";

/**
 * Error category types
 */
export type ErrorCategory =
  | "validation"
  | "rate_limiting"
  | "processing"
  | "storage"
  | "capacity"
  | "system";

/**
 * Failure kinds surfaced to callers and recorded on failed jobs
 */
export type ErrorKind =
  | "validation_failure"
  | "rate_limited"
  | "not_found"
  | "recognition_failure"
  | "chunk_infrastructure_failure"
  | "storage_unavailable"
  | "capacity_exceeded"
  | "internal";

export type ErrorCode =
  | "E2001"
  | "E2002"
  | "E2003"
  | "E2004"
  | "E2101"
  | "E3001"
  | "E3003"
  | "E3004"
  | "E4001"
  | "E4003"
  | "E6003";

/**
 * Error definition structure
 */
export interface ErrorDefinition {
  code: ErrorCode;
  kind: ErrorKind;
  category: ErrorCategory;
  severity: ErrorSeverity;
  httpStatus: number;
  title: string;
  message: string;
  userMessage: string;
  suggestions: string[];
  retryable: boolean;
  logLevel: "DEBUG" | "INFO" | "WARN" | "ERROR";
  alertRequired: boolean;
}

/**
 * Error context for enhanced logging
 */
export interface ErrorContext {
  traceId: string;
  jobId: string | undefined;
  identity: string | undefined;
  operation: string | undefined;
  timestamp: Date;
  metadata: Record<string, unknown> | undefined;
}

/**
 * Error response returned across the service boundary
 */
export interface ErrorResponse {
  status: "error";
  error: {
    code: ErrorCode;
    kind: ErrorKind;
    category: ErrorCategory;
    title: string;
    message: string;
    suggestions?: string[];
    retryable: boolean;
    retryAfter?: number;
    severity: ErrorSeverity;
  };
  trace: {
    traceId: string;
    jobId: string;
    timestamp: string;
  };
  meta: {
    version: string;
    environment?: string;
  };
}

/**
 * Error recorded on a failed job
 */
export interface JobErrorRecord {
  code: ErrorCode;
  kind: ErrorKind;
  message: string;
  details?: string[];
}

export const ERROR_CATALOG: Record<ErrorCode, ErrorDefinition> = {
  // Validation Errors (E2001-E2099)
  "E2001": {
    code: "E2001",
    kind: "validation_failure",
    category: "validation",
    severity: "low",
    httpStatus: 400,
    title: "Invalid Request",
    message: "Request parameters failed validation",
    userMessage: "The request contains invalid or missing parameters",
    suggestions: [
      "DPI must be between 72 and 600",
      "Chunk size must be a positive integer",
      "Provide a non-empty document",
    ],
    retryable: false,
    logLevel: "INFO",
    alertRequired: false,
  },

  "E2002": {
    code: "E2002",
    kind: "validation_failure",
    category: "validation",
    severity: "low",
    httpStatus: 400,
    title: "Document Rejected",
    message: "The document cannot be processed",
    userMessage: "The document has no pages, is encrypted, or exceeds the page limit",
    suggestions: [
      "Remove password protection before uploading",
      "Split documents that exceed the page limit",
    ],
    retryable: false,
    logLevel: "INFO",
    alertRequired: false,
  },

  "E2003": {
    code: "E2003",
    kind: "validation_failure",
    category: "validation",
    severity: "low",
    httpStatus: 413,
    title: "File Too Large",
    message: "Document exceeds the maximum allowed size",
    userMessage: "The document is larger than the allowed limit",
    suggestions: [
      "Images are limited to 10MB",
      "PDF documents are limited to 50MB",
    ],
    retryable: false,
    logLevel: "INFO",
    alertRequired: false,
  },

  "E2004": {
    code: "E2004",
    kind: "validation_failure",
    category: "validation",
    severity: "low",
    httpStatus: 400,
    title: "Invalid Job Identifier",
    message: "Job identifier format is invalid",
    userMessage: "The job identifier is not a valid UUID",
    suggestions: ["Use the job identifier returned by the submission call"],
    retryable: false,
    logLevel: "DEBUG",
    alertRequired: false,
  },

  // Rate Limiting Errors (E2101-E2199)
  "E2101": {
    code: "E2101",
    kind: "rate_limited",
    category: "rate_limiting",
    severity: "medium",
    httpStatus: 429,
    title: "Rate Limit Exceeded",
    message: "Too many requests in the current window",
    userMessage: "You have exceeded the request limit. Please wait before retrying",
    suggestions: [
      "Wait for the number of seconds given in Retry-After",
      "Spread requests evenly over time",
    ],
    retryable: true,
    logLevel: "WARN",
    alertRequired: false,
  },

  // Processing Errors (E3001-E3099)
  "E3001": {
    code: "E3001",
    kind: "not_found",
    category: "processing",
    severity: "low",
    httpStatus: 404,
    title: "Job Not Found",
    message: "No job exists with the given identifier",
    userMessage: "The job does not exist or its results have expired",
    suggestions: [
      "Results are retained for one hour after the last update",
      "Resubmit the document to process it again",
    ],
    retryable: false,
    logLevel: "INFO",
    alertRequired: false,
  },

  "E3003": {
    code: "E3003",
    kind: "recognition_failure",
    category: "processing",
    severity: "medium",
    httpStatus: 422,
    title: "Recognition Failed",
    message: "Text extraction failed for a page",
    userMessage: "Text could not be extracted from a page",
    suggestions: ["Check the image quality of the affected page"],
    retryable: false,
    logLevel: "WARN",
    alertRequired: false,
  },

  "E3004": {
    code: "E3004",
    kind: "chunk_infrastructure_failure",
    category: "processing",
    severity: "high",
    httpStatus: 500,
    title: "Chunk Processing Failed",
    message: "A page chunk could not be processed",
    userMessage: "Processing of the document was interrupted",
    suggestions: ["Resubmit the document"],
    retryable: false,
    logLevel: "ERROR",
    alertRequired: true,
  },

  // Storage and Capacity Errors (E4001-E4099)
  "E4001": {
    code: "E4001",
    kind: "storage_unavailable",
    category: "storage",
    severity: "high",
    httpStatus: 503,
    title: "Storage Unavailable",
    message: "The result store is not reachable",
    userMessage: "The service is temporarily unavailable",
    suggestions: ["Retry the request in a few seconds"],
    retryable: true,
    logLevel: "ERROR",
    alertRequired: true,
  },

  "E4003": {
    code: "E4003",
    kind: "capacity_exceeded",
    category: "capacity",
    severity: "medium",
    httpStatus: 503,
    title: "Queue Full",
    message: "The processing queue is at capacity",
    userMessage: "The service is busy. Please retry later",
    suggestions: ["Retry after the estimated wait time"],
    retryable: true,
    logLevel: "WARN",
    alertRequired: false,
  },

  // System Errors (E6001-E6099)
  "E6003": {
    code: "E6003",
    kind: "internal",
    category: "system",
    severity: "critical",
    httpStatus: 500,
    title: "Internal Error",
    message: "An unexpected error occurred",
    userMessage: "An unexpected error occurred",
    suggestions: ["Try again later"],
    retryable: false,
    logLevel: "ERROR",
    alertRequired: true,
  },
};

export class ExtractionServiceError extends Error {
  public readonly code: ErrorCode;
  public readonly kind: ErrorKind;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly httpStatus: number;
  public readonly userMessage: string;
  public readonly suggestions: string[];
  public readonly retryable: boolean;
  public readonly traceId: string;
  public readonly context: Partial<ErrorContext>;
  public readonly retryAfter: number | undefined;
  public readonly details: string[] | undefined;

  constructor(
    code: ErrorCode,
    context: Partial<ErrorContext> = {},
    customMessage?: string,
    extras: { retryAfter?: number; details?: string[] } = {},
  ) {
    const errorDef = ERROR_CATALOG[code];
    super(customMessage || errorDef.message);

    this.code = errorDef.code;
    this.kind = errorDef.kind;
    this.category = errorDef.category;
    this.severity = errorDef.severity;
    this.httpStatus = errorDef.httpStatus;
    this.userMessage = errorDef.userMessage;
    this.suggestions = errorDef.suggestions;
    this.retryable = errorDef.retryable;
    this.traceId = context.traceId || generateUuid();
    this.context = context;
    this.retryAfter = extras.retryAfter;
    this.details = extras.details;
    this.name = "ExtractionServiceError";
  }

  /**
   * Convert to error response format
   */
  toErrorResponse(): ErrorResponse {
    return {
      status: "error",
      error: {
        code: this.code,
        kind: this.kind,
        category: this.category,
        title: ERROR_CATALOG[this.code].title,
        message: this.kind === "validation_failure" ? this.message : this.userMessage,
        suggestions: this.suggestions,
        retryable: this.retryable,
        retryAfter: this.retryAfter,
        severity: this.severity,
      },
      trace: {
        traceId: this.traceId,
        jobId: this.context.jobId || "",
        timestamp: (this.context.timestamp || new Date()).toISOString(),
      },
      meta: {
        version: "v1",
        environment: process.env.ENVIRONMENT || "development",
      },
    };
  }

  /**
   * Error as stored on a failed job
   */
  toJobError(): JobErrorRecord {
    return {
      code: this.code,
      kind: this.kind,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }

  /**
   * Check if error requires alerting
   */
  requiresAlert(): boolean {
    return ERROR_CATALOG[this.code].alertRequired || this.severity === "critical";
  }
}

/**
 * Error factory functions for common errors
 */
export class ErrorFactory {
  /**
   * Create validation error
   */
  static validation(
    type: "invalid_request" | "document_rejected" | "file_too_large" | "invalid_job_id",
    context: Partial<ErrorContext> = {},
    customMessage?: string,
    details?: string[],
  ): ExtractionServiceError {
    const codes = {
      invalid_request: "E2001",
      document_rejected: "E2002",
      file_too_large: "E2003",
      invalid_job_id: "E2004",
    } as const;

    return new ExtractionServiceError(codes[type], context, customMessage, { details });
  }

  /**
   * Create rate limiting error
   */
  static rateLimit(retryAfter: number, context: Partial<ErrorContext> = {}): ExtractionServiceError {
    return new ExtractionServiceError(
      "E2101",
      context,
      `Rate limit exceeded, retry after ${retryAfter}s`,
      { retryAfter },
    );
  }

  /**
   * Create processing error
   */
  static processing(
    type: "not_found" | "recognition_failed" | "chunk_failed",
    context: Partial<ErrorContext> = {},
    customMessage?: string,
    details?: string[],
  ): ExtractionServiceError {
    const codes = {
      not_found: "E3001",
      recognition_failed: "E3003",
      chunk_failed: "E3004",
    } as const;

    return new ExtractionServiceError(codes[type], context, customMessage, { details });
  }

  /**
   * Create storage error
   */
  static storage(
    type: "unavailable" | "queue_full",
    context: Partial<ErrorContext> = {},
    customMessage?: string,
    retryAfter?: number,
  ): ExtractionServiceError {
    const codes = {
      unavailable: "E4001",
      queue_full: "E4003",
    } as const;

    return new ExtractionServiceError(codes[type], context, customMessage, { retryAfter });
  }

  /**
   * Create system error
   */
  static system(context: Partial<ErrorContext> = {}, customMessage?: string): ExtractionServiceError {
    return new ExtractionServiceError("E6003", context, customMessage);
  }
}

/**
 * Utility functions for error handling
 */
export class ErrorUtils {
  /**
   * Check if error is retryable
   */
  static isRetryable(error: unknown): boolean {
    if (error instanceof ExtractionServiceError) {
      return error.retryable;
    }
    return false;
  }

  /**
   * Check for a specific failure kind
   */
  static isKind(error: unknown, kind: ErrorKind): error is ExtractionServiceError {
    return error instanceof ExtractionServiceError && error.kind === kind;
  }

  /**
   * Extract a readable message from any thrown value
   */
  static getMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  /**
   * Wrap an unknown thrown value as an internal error
   */
  static wrap(error: unknown, context: Partial<ErrorContext> = {}): ExtractionServiceError {
    if (error instanceof ExtractionServiceError) {
      return error;
    }
    return ErrorFactory.system(context, ErrorUtils.getMessage(error));
  }
}
