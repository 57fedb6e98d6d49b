import { describe, expect, it } from "vitest";
import { DEFAULT_ANALYSIS_CONFIG, resolveAnalysisConfig } from "./analysis-config.ts";

describe("resolveAnalysisConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveAnalysisConfig()).toEqual(DEFAULT_ANALYSIS_CONFIG);
  });

  it("merges partial weight and selection overrides", () => {
    const config = resolveAnalysisConfig({ topK: 3, weights: { keywordMatch: 0.5 } });
    expect(config.topK).toBe(3);
    expect(config.maxPerDocument).toBe(2);
    expect(config.weights).toEqual({
      keywordMatch: 0.5,
      sectionType: 0.2,
      contentDepth: 0.2,
      quantitativeContent: 0.15,
      positionImportance: 0.15,
    });
  });

  it("rejects invalid values", () => {
    expect(() => resolveAnalysisConfig({ topK: 0 })).toThrow("topK must be a positive integer, got 0");
    expect(() => resolveAnalysisConfig({ maxPerDocument: 1.5 })).toThrow(
      "maxPerDocument must be a positive integer, got 1.5",
    );
    expect(() => resolveAnalysisConfig({ minScore: 2 })).toThrow("minScore must be between 0 and 1, got 2");
    expect(() => resolveAnalysisConfig({ minSectionWords: -1 })).toThrow(
      "minSectionWords must be a non-negative integer, got -1",
    );
    expect(() => resolveAnalysisConfig({ keywordSaturation: 0 })).toThrow("keywordSaturation must be in (0, 1], got 0");
    expect(() => resolveAnalysisConfig({ weights: { sectionType: -0.1 } })).toThrow(
      "weights.sectionType must be between 0 and 1, got -0.1",
    );
  });
});
