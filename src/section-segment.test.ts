import { describe, expect, it } from "vitest";
import type { HeadingCandidate, LineLevel, TextLine } from "./document-types.ts";
import { segmentSections } from "./section-segment.ts";

describe("segmentSections", () => {
  const candidates = [
    candidate("NONE", line({ text: "Prepared for the archive board" })),
    candidate("TITLE", line({ text: "Archive Handbook" })),
    candidate("H1", line({ text: "Intake" })),
    candidate("NONE", line({ text: "Letters arrive weekly" })),
    candidate("NONE", line({ pageIndex: 1, text: "and are logged" })),
    candidate("H2", line({ pageIndex: 1, text: "Logging  rules" })),
    candidate("NONE", line({ pageIndex: 1, text: "Use the ledger" })),
    candidate("H1", line({ pageIndex: 2, text: "Storage" })),
  ];

  it("groups body lines under the heading that precedes them", () => {
    const sections = segmentSections(candidates);
    expect(
      sections.map(({ index, level, title, startPage, endPage, text, wordCount, parentIndex }) => ({
        index,
        level,
        title,
        startPage,
        endPage,
        text,
        wordCount,
        parentIndex,
      })),
    ).toEqual([
      {
        index: 0,
        level: "PREAMBLE",
        title: "",
        startPage: 0,
        endPage: 0,
        text: "Prepared for the archive board",
        wordCount: 5,
        parentIndex: undefined,
      },
      {
        index: 1,
        level: "H1",
        title: "Intake",
        startPage: 0,
        endPage: 1,
        text: "Letters arrive weekly\nand are logged",
        wordCount: 6,
        parentIndex: undefined,
      },
      {
        index: 2,
        level: "H2",
        title: "Logging rules",
        startPage: 1,
        endPage: 1,
        text: "Use the ledger",
        wordCount: 3,
        parentIndex: 1,
      },
      {
        index: 3,
        level: "H1",
        title: "Storage",
        startPage: 2,
        endPage: 2,
        text: "",
        wordCount: 0,
        parentIndex: undefined,
      },
    ]);
  });

  it("assigns every non-title line to exactly one section", () => {
    const sections = segmentSections(candidates);
    const owned = sections.flatMap((section) => [
      ...(section.heading ? [section.heading.line] : []),
      ...section.lines,
    ]);
    const expected = candidates.filter((entry) => entry.level !== "TITLE").map((entry) => entry.line);
    expect(owned).toHaveLength(expected.length);
    for (const entry of expected) {
      expect(owned.filter((ownedLine) => ownedLine === entry)).toHaveLength(1);
    }
  });

  it("returns no sections when there are no lines", () => {
    expect(segmentSections([])).toEqual([]);
  });
});

function candidate(level: LineLevel, sourceLine: TextLine): HeadingCandidate {
  return { line: sourceLine, level, confidence: level === "NONE" ? 0 : 0.8 };
}

function line(overrides: Partial<TextLine> = {}): TextLine {
  return {
    pageIndex: 0,
    pageWidth: 600,
    pageHeight: 800,
    x: 50,
    y: 100,
    bottom: 110,
    width: 200,
    fontSize: 10,
    bold: false,
    italic: false,
    text: "Body text",
    runs: [],
    ...overrides,
  };
}
