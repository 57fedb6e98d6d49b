import { describe, expect, it } from "vitest";
import type { ExtractedDocument, TextLine, TextRun } from "./document-types.ts";
import {
  collectTextLines,
  computeDocumentStats,
  computePageVerticalExtents,
  countWords,
  isNearPageEdge,
  normalizeSpacing,
  roundFontSize,
} from "./text-lines.ts";

describe("collectTextLines", () => {
  it("merges runs on a shared baseline and inserts spaces across visible gaps", () => {
    const lines = collectTextLines(documentOf([
      [
        run({ text: "world", x0: 45, y1: 101 }),
        run({ text: "Hello", x0: 0, y1: 100 }),
        run({ text: "Next line", x0: 0, y1: 120 }),
      ],
    ]));

    expect(lines.map((entry) => entry.text)).toEqual(["Hello world", "Next line"]);
    expect(lines[0]).toMatchObject({ pageIndex: 0, x: 0, y: 90, bottom: 101, width: 85, fontSize: 10 });
  });

  it("joins runs without a space when they touch", () => {
    const lines = collectTextLines(documentOf([
      [run({ text: "Hel", x0: 0, y1: 50, width: 15 }), run({ text: "lo", x0: 15.5, y1: 50, width: 10 })],
    ]));
    expect(lines.map((entry) => entry.text)).toEqual(["Hello"]);
  });

  it("takes the font size carrying the most text and style by strict majority", () => {
    const [line] = collectTextLines(documentOf([
      [
        run({ text: "A", x0: 0, y1: 50, width: 8, fontSize: 14, bold: true }),
        run({ text: "body text", x0: 20, y1: 50, width: 60, fontSize: 10.04 }),
      ],
    ]));
    expect(line.fontSize).toBe(10);
    expect(line.bold).toBe(false);
  });

  it("orders lines by page, then top to bottom", () => {
    const lines = collectTextLines(documentOf([
      [run({ text: "Lower", y1: 300 }), run({ text: "Upper", y1: 100 })],
      [run({ text: "Second page", y1: 50 })],
    ]));
    expect(lines.map((entry) => [entry.pageIndex, entry.text])).toEqual([
      [0, "Upper"],
      [0, "Lower"],
      [1, "Second page"],
    ]);
  });

  it("drops whitespace-only runs", () => {
    expect(collectTextLines(documentOf([[run({ text: "   ", y1: 100 })]]))).toEqual([]);
  });
});

describe("computeDocumentStats", () => {
  it("picks the most frequent size, preferring the larger one on ties", () => {
    const stats = computeDocumentStats([
      line({ fontSize: 10 }),
      line({ fontSize: 10 }),
      line({ fontSize: 12 }),
      line({ fontSize: 12 }),
      line({ fontSize: 18, pageIndex: 1 }),
    ]);
    expect(stats.dominantSize).toBe(12);
    expect(stats.distinctSizes).toEqual([18, 12, 10]);
    expect(stats.lineCount).toBe(5);
    expect(stats.maxSizeByPage.get(0)).toBe(12);
    expect(stats.maxSizeByPage.get(1)).toBe(18);
    expect(stats.linesPerPage.get(0)).toBe(4);
  });

  it("falls back to the default body size for an empty document", () => {
    const stats = computeDocumentStats([]);
    expect(stats.dominantSize).toBe(10);
    expect(stats.distinctSizes).toEqual([]);
  });
});

describe("page geometry helpers", () => {
  it("treats lines in the outer margin of the text block as page edges", () => {
    const lines = [line({ y: 0 }), line({ y: 50 }), line({ y: 100 })];
    const extents = computePageVerticalExtents([...lines, line({ y: 5 }), line({ y: 95 })]);
    expect(isNearPageEdge(line({ y: 5 }), extents)).toBe(true);
    expect(isNearPageEdge(line({ y: 50 }), extents)).toBe(false);
    expect(isNearPageEdge(line({ y: 95 }), extents)).toBe(true);
  });

  it("rounds font sizes to one decimal place", () => {
    expect(roundFontSize(11.96)).toBe(12);
    expect(roundFontSize(9.44)).toBe(9.4);
  });

  it("normalizes spacing and counts words", () => {
    expect(normalizeSpacing("  two\n  words\t")).toBe("two words");
    expect(countWords("  ")).toBe(0);
    expect(countWords("one two  three")).toBe(3);
  });
});

function documentOf(pages: TextRun[][]): ExtractedDocument {
  return {
    pages: pages.map((runs, pageIndex) => ({
      pageIndex,
      width: 600,
      height: 800,
      runs: runs.map((entry) => ({ ...entry, pageIndex })),
    })),
  };
}

function run({
  text,
  x0 = 0,
  y1,
  width = 40,
  fontSize = 10,
  bold = false,
}: {
  text: string;
  x0?: number;
  y1: number;
  width?: number;
  fontSize?: number;
  bold?: boolean;
}): TextRun {
  return {
    text,
    fontSize,
    fontName: bold ? "Helvetica-Bold" : "Helvetica",
    bold,
    italic: false,
    bbox: { x0, y0: y1 - fontSize, x1: x0 + width, y1 },
    pageIndex: 0,
  };
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
