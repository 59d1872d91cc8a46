/**
 * Page Extractor
 * Worker task body: classify each page of a chunk and extract its text.
 * Page failures are recorded on the page and never abort the chunk.
 */

import { getLogger } from "@config/logging.ts";
import type {
  ChunkRange,
  DecodedDocument,
  DirectText,
  DocumentPage,
  PageClassification,
  PageRecord,
  RecognitionEngine,
  TextExtractor,
} from "@models/document.ts";
import type { ExtractionParameters } from "@models/job.ts";
import { classifyDocumentPage } from "@services/page_classifier.ts";
import { ErrorUtils } from "@utils/error_catalog.ts";

/**
 * `classify` routes text pages to direct extraction; `recognize` sends every page to the engine
 */
export type PageStrategy = "classify" | "recognize";

export interface ChunkTask {
  jobId: string;
  document: DecodedDocument;
  range: ChunkRange;
  parameters: ExtractionParameters;
  strategy: PageStrategy;
}

/**
 * Reads the page text layer
 */
export const textLayerExtractor: TextExtractor = {
  async extractText(page: DocumentPage): Promise<DirectText> {
    const [text, blocks] = await Promise.all([page.getText(), page.getTextBlocks()]);
    return { text: text.trim(), blocks };
  },
};

export class PageExtractor {
  private logger = getLogger("page-extractor");

  constructor(
    private readonly engine: RecognitionEngine,
    private readonly textExtractor: TextExtractor = textLayerExtractor,
  ) {}

  /**
   * Extract every page in the chunk's range, in page order
   */
  async processChunk(task: ChunkTask): Promise<PageRecord[]> {
    const records: PageRecord[] = [];

    for (let index = task.range.startPage; index < task.range.endPage; index++) {
      records.push(await this.processPage(task, index));
    }

    this.logger.debug(
      `Job ${task.jobId} chunk ${task.range.chunkIndex} processed pages ${task.range.startPage + 1}-${task.range.endPage}`,
    );
    return records;
  }

  private async processPage(task: ChunkTask, index: number): Promise<PageRecord> {
    const pageNumber = index + 1;
    let page: DocumentPage;

    try {
      page = await task.document.loadPage(index);
    } catch (error) {
      return this.failedPage(pageNumber, "image", `Failed to load page: ${ErrorUtils.getMessage(error)}`);
    }

    const classification: PageClassification = task.strategy === "classify"
      ? await classifyDocumentPage(page, task.parameters)
      : "image";

    return classification === "text"
      ? await this.extractDirect(page, pageNumber)
      : await this.recognize(page, pageNumber, task.parameters);
  }

  private async extractDirect(page: DocumentPage, pageNumber: number): Promise<PageRecord> {
    try {
      const { text, blocks } = await this.textExtractor.extractText(page);
      return {
        pageNumber,
        classification: "text",
        extractionMethod: "direct",
        success: true,
        text,
        blocks,
      };
    } catch (error) {
      this.logger.warn(`Direct extraction failed on page ${pageNumber}`, { error: ErrorUtils.getMessage(error) });
      return this.failedPage(pageNumber, "text", ErrorUtils.getMessage(error));
    }
  }

  private async recognize(page: DocumentPage, pageNumber: number, parameters: ExtractionParameters): Promise<PageRecord> {
    try {
      const image = await page.render(parameters.dpi);
      const recognized = await this.engine.recognize(image, `page-${pageNumber}`);
      const lines = recognized.filter((line) => line.confidence >= parameters.minConfidence);

      return {
        pageNumber,
        classification: "image",
        extractionMethod: "recognition-engine",
        success: true,
        text: lines.map((line) => line.text).join("\n"),
        lines,
      };
    } catch (error) {
      this.logger.warn(`Recognition failed on page ${pageNumber}`, { error: ErrorUtils.getMessage(error) });
      return this.failedPage(pageNumber, "image", ErrorUtils.getMessage(error));
    }
  }

  private failedPage(pageNumber: number, classification: PageClassification, error: string): PageRecord {
    return {
      pageNumber,
      classification,
      extractionMethod: classification === "text" ? "direct" : "recognition-engine",
      success: false,
      text: "",
      error,
    };
  }
}
