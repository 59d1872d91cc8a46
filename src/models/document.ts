/**
 * Document Models
 * Page records, extraction results and the collaborator interfaces used to read documents
 */

import { z } from "@/deps.ts";

export const PageClassificationSchema = z.enum(["text", "image"]);
export type PageClassification = z.infer<typeof PageClassificationSchema>;

export const ExtractionMethodSchema = z.enum(["direct", "recognition-engine"]);
export type ExtractionMethod = z.infer<typeof ExtractionMethodSchema>;

/**
 * Axis-aligned box: [x0, y0, x1, y1]
 */
export const BoundingBoxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);
export type BoundingBox = z.infer<typeof BoundingBoxSchema>;

export const PointSchema = z.tuple([z.number(), z.number()]);
export type Point = z.infer<typeof PointSchema>;

export const TextBlockSchema = z.object({
  text: z.string(),
  bbox: BoundingBoxSchema,
});
export type TextBlock = z.infer<typeof TextBlockSchema>;

export const RecognizedLineSchema = z.object({
  text: z.string(),
  confidence: z.number(),
  bbox: z.array(PointSchema),
});
export type RecognizedLine = z.infer<typeof RecognizedLineSchema>;

export const PageRecordSchema = z.object({
  pageNumber: z.number().int().positive(),
  classification: PageClassificationSchema,
  extractionMethod: ExtractionMethodSchema,
  success: z.boolean(),
  text: z.string(),
  blocks: z.array(TextBlockSchema).optional(),
  lines: z.array(RecognizedLineSchema).optional(),
  error: z.string().optional(),
});
export type PageRecord = z.infer<typeof PageRecordSchema>;

export const ExtractionStatsSchema = z.object({
  textPages: z.number().int().nonnegative(),
  recognizedPages: z.number().int().nonnegative(),
  failedPages: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
});
export type ExtractionStats = z.infer<typeof ExtractionStatsSchema>;

/**
 * Extraction output as written to the cache
 */
export const StoredExtractionSchema = z.object({
  pages: z.array(PageRecordSchema),
  fullText: z.string(),
  pageCount: z.number().int().nonnegative(),
  stats: ExtractionStatsSchema,
});
export type StoredExtraction = z.infer<typeof StoredExtractionSchema>;

export const ExtractionResultSchema = StoredExtractionSchema.extend({
  cached: z.boolean(),
});
export type ExtractionResult = z.infer<typeof ExtractionResultSchema>;

/**
 * Half-open page range [startPage, endPage), zero-based
 */
export interface ChunkRange {
  chunkIndex: number;
  startPage: number;
  endPage: number;
}

/**
 * Signals read from a page's text layer, input to classification
 */
export interface PageSignals {
  textLength: number;
  imageCount: number;
  imageAreaRatio: number;
}

export interface ImageCoverage {
  imageCount: number;
  /** Fraction of the page area covered by images, 0..1 */
  areaRatio: number;
}

export interface DocumentPage {
  readonly pageIndex: number;
  getText(): Promise<string>;
  getTextBlocks(): Promise<TextBlock[]>;
  getImageCoverage(): Promise<ImageCoverage>;
  render(dpi: number): Promise<Uint8Array>;
}

export interface DecodedDocument {
  readonly pageCount: number;
  readonly encrypted: boolean;
  loadPage(index: number): Promise<DocumentPage>;
  close(): Promise<void>;
}

/**
 * Opens PDF bytes. Implemented outside this service.
 */
export interface DocumentDecoder {
  open(data: Uint8Array): Promise<DecodedDocument>;
}

/**
 * Recognizes text lines in a rendered page image. Implemented outside this service.
 */
export interface RecognitionEngine {
  recognize(image: Uint8Array, label: string): Promise<RecognizedLine[]>;
}

export interface DirectText {
  text: string;
  blocks: TextBlock[];
}

/**
 * Reads text directly from a page's text layer
 */
export interface TextExtractor {
  extractText(page: DocumentPage): Promise<DirectText>;
}

/**
 * External collaborators wired into the service at startup
 */
export interface ExtractionCollaborators {
  decoder: DocumentDecoder;
  engine: RecognitionEngine;
  textExtractor?: TextExtractor;
}
