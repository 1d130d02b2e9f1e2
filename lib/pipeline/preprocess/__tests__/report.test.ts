import { describe, it, expect } from "vitest";
import { formatProcessingReport, summarizeBatch } from "../report";

describe("summarizeBatch", () => {
  it("combines sizes and computes the reduction", () => {
    const summary = summarizeBatch(
      [
        { originalBytes: 1000, finalBytes: 400, durationMs: 10 },
        { originalBytes: 2000, finalBytes: 600, durationMs: 30 },
      ],
      55
    );

    expect(summary.totalImages).toBe(2);
    expect(summary.totalProcessingMs).toBe(40);
    expect(summary.combinedOriginalBytes).toBe(3000);
    expect(summary.combinedFinalBytes).toBe(1000);
    expect(summary.reducedBytes).toBe(2000);
    expect(summary.reducedPct).toBeCloseTo(66.67, 2);
    expect(summary.totalRuntimeMs).toBe(55);
  });

  it("reports 0% when nothing was processed", () => {
    const summary = summarizeBatch([], 1);
    expect(summary.reducedPct).toBe(0);
    expect(summary.reducedBytes).toBe(0);
  });
});

describe("formatProcessingReport", () => {
  it("writes per-image blocks and the summary", () => {
    const images = [
      {
        fileName: "license_01.jpg",
        outputFileName: "license_01_preprocessed.jpg",
        originalBytes: 2000,
        finalBytes: 500,
        durationMs: 12.5,
        threshold: 96,
      },
    ];
    const text = formatProcessingReport({
      images,
      failures: [],
      summary: summarizeBatch(images, 1500),
    });

    expect(text).toBe(
      [
        "=== IMAGE PREPROCESSING RESULTS ===",
        "",
        "Preprocessed: license_01.jpg",
        "  - Original size: 2000 bytes",
        "  - Final size: 500 bytes",
        "  - Processing time: 12.50 ms",
        "",
        "",
        "=== SUMMARY ===",
        "Total images processed:          1",
        "Total local preprocessing time:  0.0125 sec",
        "Combined original size:          2000 bytes",
        "Combined final size:             500 bytes",
        "Size reduced (absolute):         1500 bytes",
        "Size reduced (percentage):       75.00%",
        "Total runtime (all steps):       1500.00 ms",
        "",
      ].join("\n")
    );
  });

  it("lists skipped images", () => {
    const text = formatProcessingReport({
      images: [],
      failures: [{ fileName: "broken.jpg", message: "Could not read image: broken.jpg" }],
      summary: summarizeBatch([], 1),
    });

    expect(text).toContain("Skipped: broken.jpg\n  - Could not read image: broken.jpg\n");
  });
});
