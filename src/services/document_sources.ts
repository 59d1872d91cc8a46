/**
 * Document Sources
 * Opens submitted bytes as a decoded document for the scheduler
 */

import type { DecodedDocument, DocumentDecoder, DocumentPage, ImageCoverage, TextBlock } from "@models/document.ts";
import type { JobKind } from "@models/job.ts";
import { ErrorFactory, ExtractionServiceError, ErrorUtils } from "@utils/error_catalog.ts";

class ImagePage implements DocumentPage {
  readonly pageIndex = 0;

  constructor(private readonly data: Uint8Array) {}

  async getText(): Promise<string> {
    return "";
  }

  async getTextBlocks(): Promise<TextBlock[]> {
    return [];
  }

  async getImageCoverage(): Promise<ImageCoverage> {
    return { imageCount: 1, areaRatio: 1 };
  }

  /**
   * Images are recognized as submitted; DPI only applies to rendered PDF pages
   */
  async render(): Promise<Uint8Array> {
    return this.data;
  }
}

/**
 * A standalone image seen as a one-page document
 */
export class ImageDocument implements DecodedDocument {
  readonly pageCount = 1;
  readonly encrypted = false;
  private readonly page: ImagePage;

  constructor(data: Uint8Array) {
    this.page = new ImagePage(data);
  }

  async loadPage(index: number): Promise<DocumentPage> {
    if (index !== 0) {
      throw new Error(`Image documents have a single page, requested index ${index}`);
    }
    return this.page;
  }

  async close(): Promise<void> {}
}

/**
 * Open bytes for a job kind. Undecodable PDFs are rejected as invalid documents.
 */
export async function openDocument(kind: JobKind, data: Uint8Array, decoder: DocumentDecoder): Promise<DecodedDocument> {
  if (kind === "image") {
    return new ImageDocument(data);
  }

  try {
    return await decoder.open(data);
  } catch (error) {
    if (error instanceof ExtractionServiceError) {
      throw error;
    }
    throw ErrorFactory.validation("document_rejected", {}, `Could not open PDF: ${ErrorUtils.getMessage(error)}`);
  }
}
