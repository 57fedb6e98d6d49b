import { describe, expect, it } from "vitest";
import { analyzeDocumentStructure, createEmptyOutline, extractOutline, toOutlineRecord } from "./document-structure.ts";
import type { ExtractedDocument, TextRun } from "./document-types.ts";

interface RunInput {
  text: string;
  y1: number;
  fontSize?: number;
  bold?: boolean;
}

describe("analyzeDocumentStructure", () => {
  it("reports a bold cover line as the title and no outline when nothing else stands out", () => {
    const document = documentOf([
      [
        { text: "Market Report 2024", y1: 84, fontSize: 24, bold: true },
        { text: "Quarterly sales rose across every region we track.", y1: 150 },
        { text: "the north grew fastest over the period.", y1: 170 },
        { text: "margins held steady through the winter months.", y1: 190 },
      ],
      [
        { text: "Inventory levels fell slightly in the spring.", y1: 100 },
        { text: "shipping delays eased toward the end of june.", y1: 120 },
      ],
      [
        { text: "Staffing remained flat across all stores.", y1: 100 },
        { text: "training hours rose for new employees.", y1: 120 },
      ],
    ]);

    expect(extractOutline(document)).toEqual({ title: "Market Report 2024", outline: [] });
  });

  it("keeps the cover title when later pages repeat it as a small running header", () => {
    const document = documentOf([
      [
        { text: "Annual Archive Review", y1: 84, fontSize: 24, bold: true },
        { text: "Quarterly sales rose across every region we track.", y1: 150 },
        { text: "the north grew fastest over the period.", y1: 170 },
        { text: "margins held steady through the winter months.", y1: 190 },
      ],
      [
        { text: "Annual Archive Review", y1: 30, fontSize: 8 },
        { text: "Inventory levels fell slightly in the spring.", y1: 100 },
        { text: "shipping delays eased toward the end of june.", y1: 120 },
      ],
      [
        { text: "Annual Archive Review", y1: 30, fontSize: 8 },
        { text: "Staffing remained flat across all stores.", y1: 100 },
        { text: "training hours rose for new employees.", y1: 120 },
      ],
    ]);

    const structure = analyzeDocumentStructure(document);
    expect(structure.title).toBe("Annual Archive Review");
    expect(structure.outline).toEqual([]);
    expect(structure.titleLine?.pageIndex).toBe(0);
    expect(structure.titleLine?.fontSize).toBe(24);
  });

  it("levels numbered headings by the document's size ranking", () => {
    const structure = analyzeDocumentStructure(numberedDocument());
    expect(structure.title).toBe("");
    expect(structure.outline).toEqual([
      { level: "H1", text: "1. Introduction", page: 0 },
      { level: "H2", text: "1.1 Background", page: 0 },
      { level: "H1", text: "2. Methodology", page: 1 },
    ]);
    expect(structure.stats.dominantSize).toBe(10);
    expect(structure.sections.map((section) => [section.title, section.parentIndex, section.lines.length])).toEqual([
      ["1. Introduction", undefined, 2],
      ["1.1 Background", 0, 2],
      ["2. Methodology", undefined, 2],
    ]);
  });

  it("produces identical results when run twice on the same input", () => {
    const document = numberedDocument();
    expect(extractOutline(document)).toEqual(extractOutline(document));
  });

  it("passes heading policy overrides through", () => {
    const outline = extractOutline(numberedDocument(), { headingPolicy: { maxHeadings: 1 } });
    expect(outline.outline).toEqual([{ level: "H1", text: "1. Introduction", page: 0 }]);
  });

  it("keeps running headers when artifact filtering is off", () => {
    const pages = [0, 1, 2].map((pageIndex): RunInput[] => [
      { text: "ARCHIVE BULLETIN", y1: 30 },
      { text: `entry ${pageIndex + 1} describes a donated letter.`, y1: 200 },
      { text: `entry ${pageIndex + 1} also notes its condition.`, y1: 220 },
    ]);
    const document = documentOf(pages);

    expect(extractOutline(document).outline).toEqual([]);
    expect(extractOutline(document, { filterArtifacts: false }).outline.map((entry) => entry.text)).toEqual([
      "ARCHIVE BULLETIN",
      "ARCHIVE BULLETIN",
      "ARCHIVE BULLETIN",
    ]);
  });

  it("handles a document without text", () => {
    const structure = analyzeDocumentStructure({ pages: [{ pageIndex: 0, width: 600, height: 800, runs: [] }] });
    expect(toOutlineRecord(structure)).toEqual(createEmptyOutline());
    expect(structure.sections).toEqual([]);
  });
});

function numberedDocument(): ExtractedDocument {
  return documentOf([
    [
      { text: "1. Introduction", y1: 80, fontSize: 18 },
      { text: "this report reviews the archive intake process.", y1: 110 },
      { text: "it covers letters received during the last year.", y1: 125 },
      { text: "1.1 Background", y1: 160, fontSize: 14 },
      { text: "the archive was founded by a local society.", y1: 190 },
      { text: "volunteers have run it for two decades.", y1: 205 },
    ],
    [
      { text: "2. Methodology", y1: 80, fontSize: 18 },
      { text: "we sampled one hundred letters at random.", y1: 110 },
      { text: "each letter was scored by two reviewers.", y1: 125 },
    ],
  ]);
}

function documentOf(pages: RunInput[][]): ExtractedDocument {
  return {
    pages: pages.map((inputs, pageIndex) => ({
      pageIndex,
      width: 600,
      height: 800,
      runs: inputs.map((input) => run(input, pageIndex)),
    })),
  };
}

function run({ text, y1, fontSize = 10, bold = false }: RunInput, pageIndex: number): TextRun {
  return {
    text,
    fontSize,
    fontName: bold ? "Helvetica-Bold" : "Helvetica",
    bold,
    italic: false,
    bbox: { x0: 72, y0: y1 - fontSize, x1: 72 + text.length * fontSize * 0.5, y1 },
    pageIndex,
  };
}
