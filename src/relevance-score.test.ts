import { describe, expect, it } from "vitest";
import { DEFAULT_ANALYSIS_CONFIG, DEFAULT_RELEVANCE_WEIGHTS } from "./analysis-config.ts";
import type { Section } from "./document-types.ts";
import { createDefaultProfile, createPersonaProfile } from "./persona-analyze.ts";
import {
  combineFactors,
  measureContentDepth,
  measureQuantitativeDensity,
  scoreDocumentSections,
  scoreKeywordMatch,
  scorePositionImportance,
} from "./relevance-score.ts";
import type { PersonaProfile } from "./relevance-types.ts";
import { countWords } from "./text-lines.ts";

const sharedText =
  "The survey gathered responses from volunteers who catalogue letters in small regional archives.";

describe("scoreDocumentSections", () => {
  it("keeps every factor and score within the unit interval", () => {
    const sections = [
      section({ index: 0, title: "Overview", text: sharedText }),
      section({ index: 1, title: "Costs", text: "Revenue rose 12% in 2023 while costs fell 4% and profit reached 3.1 million dollars overall." }),
      section({ index: 2, title: "Regression Results", text: "The regression model calibration improved throughput. ".repeat(4) }),
    ];
    const profiles = [
      createDefaultProfile(),
      createPersonaProfile("Investment analyst", "Analyze revenue trends"),
      createPersonaProfile("PhD researcher", "Compare regression model calibration"),
    ];
    for (const profile of profiles) {
      const scored = scoreDocumentSections(documentOf(sections), profile, DEFAULT_ANALYSIS_CONFIG);
      expect(scored).toHaveLength(3);
      for (const entry of scored) {
        expect(entry.score).toBeGreaterThanOrEqual(0);
        expect(entry.score).toBeLessThanOrEqual(1);
        for (const factor of Object.values(entry.factors)) {
          expect(factor).toBeGreaterThanOrEqual(0);
          expect(factor).toBeLessThanOrEqual(1);
        }
      }
    }
  });

  it("skips sections below the minimum word count", () => {
    const scored = scoreDocumentSections(
      documentOf([section({ index: 0, text: "Too short to rank." }), section({ index: 1, text: sharedText })]),
      createDefaultProfile(),
      DEFAULT_ANALYSIS_CONFIG,
    );
    expect(scored.map((entry) => entry.section.index)).toEqual([1]);
    expect(scored[0]).toMatchObject({ documentId: "archive.pdf", documentOrder: 0, documentTitle: "Archive Notes" });
  });

  it("flips the top section between research and study personas", () => {
    const sections = [
      section({ index: 0, title: "Introduction", text: sharedText }),
      section({ index: 1, title: "Results", text: sharedText }),
    ];
    const topFor = (profile: PersonaProfile): string => {
      const scored = scoreDocumentSections(documentOf(sections), profile, DEFAULT_ANALYSIS_CONFIG);
      return [...scored].sort((left, right) => right.score - left.score)[0].section.title;
    };
    expect(topFor(createPersonaProfile("PhD researcher", ""))).toBe("Results");
    expect(topFor(createPersonaProfile("Undergraduate student", ""))).toBe("Introduction");
  });

  it("rewards financial sections more for a business persona", () => {
    const costs = section({
      index: 0,
      title: "Profit and Costs",
      text: "Revenue rose 12% in 2023 while costs fell 4% and profit reached 3.1 million dollars overall.",
    });
    const scoreFor = (persona: string): number =>
      scoreDocumentSections(documentOf([costs]), createPersonaProfile(persona, ""), DEFAULT_ANALYSIS_CONFIG)[0].score;
    expect(scoreFor("Investment analyst")).toBeGreaterThan(scoreFor("PhD researcher"));
  });
});

describe("relevance factors", () => {
  it("matches keywords as whole words with plural tolerance", () => {
    const profile: PersonaProfile = {
      ...createDefaultProfile(),
      expertiseKeywords: ["archive"],
      priorityKeywords: ["letters", "ledger", "storage"],
    };
    const target = { title: "", text: "The letter archive uses a ledger" };
    expect(scoreKeywordMatch(target, profile, 0.5)).toBe(1);
    expect(scoreKeywordMatch(target, profile, 1)).toBe(0.75);
    expect(scoreKeywordMatch(target, createDefaultProfile(), 0.5)).toBe(0);
  });

  it("measures quantitative density per hundred words", () => {
    expect(measureQuantitativeDensity("Revenue grew 12% to 4.5 million in 2023")).toBe(1);
    const oneNumberIn40Words = ["12", ...Array.from({ length: 39 }, () => "word")].join(" ");
    expect(measureQuantitativeDensity(oneNumberIn40Words)).toBeCloseTo(0.5);
    expect(measureQuantitativeDensity("plain words only here")).toBe(0);
    expect(measureQuantitativeDensity("")).toBe(0);
  });

  it("measures content depth from sentence length and technical vocabulary", () => {
    expect(measureContentDepth("")).toBe(0);
    expect(measureContentDepth("Short text.")).toBe(0);
    expect(measureContentDepth("The regression model calibration improved throughput.")).toBeCloseTo(0.5);
  });

  it("damps position importance for long documents", () => {
    expect(scorePositionImportance(0, 5)).toBe(1);
    expect(scorePositionImportance(2, 4)).toBe(0.5);
    expect(scorePositionImportance(30, 40)).toBeCloseTo(0.625);
    expect(scorePositionImportance(0, 0)).toBe(0);
  });

  it("combines factors with the configured weights", () => {
    const ones = { keywordMatch: 1, sectionType: 1, contentDepth: 1, quantitativeContent: 1, positionImportance: 1 };
    expect(combineFactors(ones, DEFAULT_RELEVANCE_WEIGHTS)).toBeCloseTo(1);
    expect(
      combineFactors({ ...ones, keywordMatch: 0, positionImportance: 0 }, DEFAULT_RELEVANCE_WEIGHTS),
    ).toBeCloseTo(0.55);
  });
});

function documentOf(sections: Section[]) {
  return { id: "archive.pdf", order: 0, title: "Archive Notes", sections };
}

function section(overrides: Partial<Section> = {}): Section {
  const text = overrides.text ?? "";
  return {
    index: 0,
    level: "H1",
    title: "Section",
    lines: [],
    startPage: 0,
    endPage: 0,
    text,
    wordCount: countWords(text),
    ...overrides,
  };
}
