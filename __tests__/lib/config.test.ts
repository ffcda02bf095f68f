import { describe, expect, it } from "vitest";

import { DEFAULT_PIPELINE_CONFIG, getPipelineConfig } from "@/lib/config";

describe("getPipelineConfig", () => {
  it("falls back to defaults when nothing is set", () => {
    expect(getPipelineConfig({})).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it("reads numeric and boolean settings from the environment", () => {
    const config = getPipelineConfig({
      ESG_LOW_CONFIDENCE_THRESHOLD: "0.6",
      ESG_EXTRACTION_CONCURRENCY: "4",
      ESG_TRUST_REPORTED_CONFIDENCE: "false",
    });
    expect(config.lowConfidenceThreshold).toBe(0.6);
    expect(config.extractionConcurrency).toBe(4);
    expect(config.trustReportedConfidence).toBe(false);
  });

  it("ignores unparseable values", () => {
    expect(getPipelineConfig({ ESG_MAX_BOARD_SIZE: "many" }).maxBoardSize).toBe(20);
  });

  it("applies overrides after the environment", () => {
    expect(getPipelineConfig({ ESG_MAX_CHUNKS_PER_METRIC: "5" }, { maxChunksPerMetric: 2 }).maxChunksPerMetric).toBe(2);
  });

  it("rejects out-of-bounds settings", () => {
    expect(() => getPipelineConfig({ ESG_LOW_CONFIDENCE_THRESHOLD: "1.5" })).toThrow();
  });

  it("reads report-year bounds and rejects an inverted range", () => {
    expect(getPipelineConfig({ ESG_MAX_REPORT_YEAR: "2030" }).maxReportYear).toBe(2030);
    expect(() => getPipelineConfig({ ESG_MIN_REPORT_YEAR: "2030" })).toThrow("minReportYear must not exceed maxReportYear");
  });
});
