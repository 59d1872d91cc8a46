/**
 * Page Classifier
 * Decides whether a page can be read from its text layer or needs recognition
 */

import { getLogger } from "@config/logging.ts";
import type { DocumentPage, PageClassification, PageSignals } from "@models/document.ts";
import { ErrorUtils } from "@utils/error_catalog.ts";

export interface ClassificationThresholds {
  /** Minimum trimmed characters for a text page */
  textThreshold: number;
  /** Image coverage at or above which a page is treated as an image (0 means any image) */
  imageAreaThreshold: number;
}

export const DEFAULT_THRESHOLDS: ClassificationThresholds = {
  textThreshold: 30,
  imageAreaThreshold: 0,
};

const logger = getLogger("page-classifier");

/**
 * Pure classification of page signals
 */
export function classifyPage(
  signals: PageSignals,
  thresholds: ClassificationThresholds = DEFAULT_THRESHOLDS,
): PageClassification {
  if (signals.imageCount > 0 && signals.imageAreaRatio >= thresholds.imageAreaThreshold) {
    return "image";
  }

  return signals.textLength >= thresholds.textThreshold ? "text" : "image";
}

export async function readPageSignals(page: DocumentPage): Promise<PageSignals> {
  const [text, coverage] = await Promise.all([page.getText(), page.getImageCoverage()]);
  return {
    textLength: text.trim().length,
    imageCount: coverage.imageCount,
    imageAreaRatio: coverage.areaRatio,
  };
}

/**
 * Classify a page of a decoded document. Pages whose signals cannot be read go to recognition.
 */
export async function classifyDocumentPage(
  page: DocumentPage,
  thresholds: ClassificationThresholds = DEFAULT_THRESHOLDS,
): Promise<PageClassification> {
  try {
    return classifyPage(await readPageSignals(page), thresholds);
  } catch (error) {
    logger.warn(`Could not read page ${page.pageIndex + 1} for classification, using recognition`, {
      error: ErrorUtils.getMessage(error),
    });
    return "image";
  }
}
