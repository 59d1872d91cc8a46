/**
 * Chunk Scheduler
 * Splits a document into page chunks, runs them on the worker pool and
 * assembles the ordered result. Progress is written after every chunk.
 */

import { getLogger } from "@config/logging.ts";
import type { ChunkRange, DecodedDocument, PageRecord, StoredExtraction } from "@models/document.ts";
import type { ExtractionParameters, JobKind } from "@models/job.ts";
import type { ChunkTask, PageStrategy } from "@services/page_extractor.ts";
import type { WorkerPool } from "@services/worker_pool.ts";
import { ErrorFactory, ErrorUtils } from "@utils/error_catalog.ts";
import { structuredLogger } from "@utils/structured_logger.ts";

export type ChunkProcessor = (task: ChunkTask) => Promise<PageRecord[]>;

/**
 * Receives progress updates; implemented by the job registry
 */
export interface ProgressSink {
  updateProgress(jobId: string, completedUnits: number, totalUnits?: number): Promise<unknown>;
}

export interface ChunkSchedulerConfig {
  chunkTimeoutMs: number;
}

export interface ScheduleRequest {
  jobId: string;
  kind: JobKind;
  parameters: ExtractionParameters;
  document: DecodedDocument;
}

/**
 * Half-open page ranges of at most `chunkSize` pages covering [0, pageCount)
 */
export function partitionPages(pageCount: number, chunkSize: number): ChunkRange[] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw ErrorFactory.validation("invalid_request", {}, `Chunk size must be a positive integer, got ${chunkSize}`);
  }

  const chunks: ChunkRange[] = [];
  for (let startPage = 0, chunkIndex = 0; startPage < pageCount; startPage += chunkSize, chunkIndex++) {
    chunks.push({ chunkIndex, startPage, endPage: Math.min(startPage + chunkSize, pageCount) });
  }
  return chunks;
}

/**
 * Ordered concatenation of successful, non-empty page text
 */
export function assembleFullText(pages: PageRecord[]): string {
  return pages
    .filter((page) => page.success && page.text.length > 0)
    .map((page) => page.text)
    .join("\n\n");
}

export function strategyFor(kind: JobKind): PageStrategy {
  return kind === "hybrid-pdf" ? "classify" : "recognize";
}

export class ChunkScheduler {
  private logger = getLogger("chunk-scheduler");

  constructor(
    private readonly pool: WorkerPool,
    private readonly progress: ProgressSink,
    private readonly processChunk: ChunkProcessor,
    private readonly config: ChunkSchedulerConfig = { chunkTimeoutMs: 540_000 },
  ) {}

  /**
   * Reject documents the pipeline will not process
   */
  validateDocument(document: DecodedDocument, parameters: ExtractionParameters): void {
    if (document.encrypted) {
      throw ErrorFactory.validation("document_rejected", {}, "Document is encrypted");
    }
    if (document.pageCount === 0) {
      throw ErrorFactory.validation("document_rejected", {}, "Document has no pages");
    }
    if (document.pageCount > parameters.maxPages) {
      throw ErrorFactory.validation(
        "document_rejected",
        {},
        `Document has ${document.pageCount} pages, maximum is ${parameters.maxPages}`,
      );
    }
  }

  async run(request: ScheduleRequest): Promise<StoredExtraction> {
    const startTime = Date.now();
    const { jobId, document, parameters } = request;

    this.validateDocument(document, parameters);

    const pageCount = document.pageCount;
    const chunks = partitionPages(pageCount, parameters.chunkSize);
    const strategy = strategyFor(request.kind);
    const slots: Array<PageRecord | undefined> = new Array<PageRecord | undefined>(pageCount).fill(undefined);

    let completedUnits = 0;
    let progressChain: Promise<void> = this.reportProgress(jobId, 0, pageCount);

    this.logger.info(`Job ${jobId}: ${pageCount} pages in ${chunks.length} chunks (${strategy})`);

    const outcomes = await Promise.allSettled(chunks.map(async (range) => {
      const records = await this.pool.run(
        () => this.processChunk({ jobId, document, range, parameters, strategy }),
        { timeoutMs: this.config.chunkTimeoutMs, label: `job ${jobId} chunk ${range.chunkIndex}` },
      );

      this.mergeChunk(slots, range, records);

      completedUnits += range.endPage - range.startPage;
      const snapshot = completedUnits;
      // Serialized so writes land in order
      progressChain = progressChain.then(() => this.reportProgress(jobId, snapshot, pageCount));
    }));

    await progressChain;

    const failures = outcomes.flatMap((outcome, index) =>
      outcome.status === "rejected" ? [`chunk ${index}: ${ErrorUtils.getMessage(outcome.reason)}`] : []
    );

    if (failures.length > 0) {
      this.logger.error(`Job ${jobId}: ${failures.length} of ${chunks.length} chunks failed`);
      throw ErrorFactory.processing(
        "chunk_failed",
        { jobId },
        `${failures.length} of ${chunks.length} chunks failed`,
        failures,
      );
    }

    const pages = slots.filter((page): page is PageRecord => page !== undefined);
    const durationMs = Date.now() - startTime;
    const result: StoredExtraction = {
      pages,
      fullText: assembleFullText(pages),
      pageCount,
      stats: {
        textPages: pages.filter((page) => page.success && page.extractionMethod === "direct").length,
        recognizedPages: pages.filter((page) => page.success && page.extractionMethod === "recognition-engine").length,
        failedPages: pages.filter((page) => !page.success).length,
        durationMs,
      },
    };

    structuredLogger.logPerformance("document_extraction", durationMs, { jobId }, {
      pageCount,
      chunks: chunks.length,
      failedPages: result.stats.failedPages,
    });

    return result;
  }

  /**
   * Place a chunk's records into their page slots, rejecting incomplete chunks
   */
  private mergeChunk(slots: Array<PageRecord | undefined>, range: ChunkRange, records: PageRecord[]): void {
    for (let index = range.startPage; index < range.endPage; index++) {
      const record = records.find((candidate) => candidate.pageNumber === index + 1);
      if (!record) {
        throw ErrorFactory.processing("chunk_failed", {}, `Chunk ${range.chunkIndex} returned no record for page ${index + 1}`);
      }
      slots[index] = record;
    }
  }

  private async reportProgress(jobId: string, completedUnits: number, totalUnits: number): Promise<void> {
    try {
      await this.progress.updateProgress(jobId, completedUnits, totalUnits);
    } catch (error) {
      // Progress is advisory; the final transition carries the full count
      this.logger.warn(`Failed to record progress for job ${jobId}`, { error: ErrorUtils.getMessage(error) });
    }
  }
}
