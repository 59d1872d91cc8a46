import { describe, expect, it } from "vitest";
import { classifyDocumentPage, classifyPage, readPageSignals } from "@services/page_classifier.ts";
import { FakePage, LONG_TEXT } from "./support/fakes.ts";

describe("classifyPage", () => {
  it("treats a page with enough text and no images as text", () => {
    expect(classifyPage({ textLength: 30, imageCount: 0, imageAreaRatio: 0 })).toBe("text");
  });

  it("treats a page below the text threshold as an image", () => {
    expect(classifyPage({ textLength: 29, imageCount: 0, imageAreaRatio: 0 })).toBe("image");
  });

  it("treats any embedded image as an image page by default", () => {
    expect(classifyPage({ textLength: 500, imageCount: 1, imageAreaRatio: 0.01 })).toBe("image");
  });

  it("ignores small images when an area threshold is set", () => {
    const thresholds = { textThreshold: 30, imageAreaThreshold: 0.5 };

    expect(classifyPage({ textLength: 500, imageCount: 2, imageAreaRatio: 0.2 }, thresholds)).toBe("text");
    expect(classifyPage({ textLength: 500, imageCount: 2, imageAreaRatio: 0.6 }, thresholds)).toBe("image");
  });

  it("gives the same answer for the same signals", () => {
    const signals = { textLength: 42, imageCount: 0, imageAreaRatio: 0 };
    expect(classifyPage(signals)).toBe(classifyPage(signals));
  });
});

describe("classifyDocumentPage", () => {
  it("reads trimmed text length and image coverage", async () => {
    const page = new FakePage(0, { text: "   short   ", images: 3, areaRatio: 0.4 });

    expect(await readPageSignals(page)).toEqual({ textLength: 5, imageCount: 3, imageAreaRatio: 0.4 });
  });

  it("classifies a text-layer page as text", async () => {
    expect(await classifyDocumentPage(new FakePage(0, { text: LONG_TEXT }))).toBe("text");
  });

  it("sends unreadable pages to recognition", async () => {
    expect(await classifyDocumentPage(new FakePage(4, { text: LONG_TEXT, unreadable: true }))).toBe("image");
  });
});
