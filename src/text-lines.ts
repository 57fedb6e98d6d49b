import type {
  DocumentStats,
  ExtractedDocument,
  ExtractedPage,
  PageVerticalExtent,
  TextLine,
  TextRun,
} from "./document-types.ts";
import {
  DEFAULT_BODY_FONT_SIZE,
  FONT_SIZE_PRECISION,
  LINE_BASELINE_TOLERANCE,
  PAGE_EDGE_MARGIN,
  RUN_SPACE_GAP_RATIO,
} from "./document-types.ts";

export function collectTextLines(document: ExtractedDocument): TextLine[] {
  const lines: TextLine[] = [];
  for (const page of document.pages) {
    lines.push(...collectPageLines(page));
  }
  return lines.sort(compareLinesForReadingOrder);
}

function collectPageLines(page: ExtractedPage): TextLine[] {
  const runs = page.runs
    .filter((run) => run.text.trim().length > 0)
    .sort((left, right) => left.bbox.y1 - right.bbox.y1 || left.bbox.x0 - right.bbox.x0);

  const lines: TextLine[] = [];
  let current: TextRun[] = [];
  for (const run of runs) {
    if (current.length > 0 && Math.abs(run.bbox.y1 - current[0].bbox.y1) > LINE_BASELINE_TOLERANCE) {
      lines.push(buildLine(page, current));
      current = [];
    }
    current.push(run);
  }
  if (current.length > 0) lines.push(buildLine(page, current));
  return lines.filter((line) => line.text.length > 0);
}

function buildLine(page: ExtractedPage, baselineRuns: TextRun[]): TextLine {
  const runs = [...baselineRuns].sort((left, right) => left.bbox.x0 - right.bbox.x0);
  const x = Math.min(...runs.map((run) => run.bbox.x0));
  const right = Math.max(...runs.map((run) => run.bbox.x1));
  return {
    pageIndex: page.pageIndex,
    pageWidth: page.width,
    pageHeight: page.height,
    x,
    y: Math.min(...runs.map((run) => run.bbox.y0)),
    bottom: Math.max(...runs.map((run) => run.bbox.y1)),
    width: Math.max(right - x, 0),
    fontSize: dominantRunFontSize(runs),
    bold: isMajority(runs, (run) => run.bold),
    italic: isMajority(runs, (run) => run.italic),
    text: joinRunText(runs),
    runs,
  };
}

function joinRunText(runs: TextRun[]): string {
  let text = "";
  let previous: TextRun | undefined;
  for (const run of runs) {
    if (previous && run.bbox.x0 - previous.bbox.x1 > previous.fontSize * RUN_SPACE_GAP_RATIO) {
      text += " ";
    }
    text += run.text;
    previous = run;
  }
  return normalizeSpacing(text);
}

function dominantRunFontSize(runs: TextRun[]): number {
  const lengthBySize = new Map<number, number>();
  for (const run of runs) {
    const size = roundFontSize(run.fontSize);
    lengthBySize.set(size, (lengthBySize.get(size) ?? 0) + run.text.trim().length);
  }
  return pickMostFrequent(lengthBySize) ?? DEFAULT_BODY_FONT_SIZE;
}

function isMajority(runs: TextRun[], predicate: (run: TextRun) => boolean): boolean {
  return runs.filter(predicate).length * 2 > runs.length;
}

function compareLinesForReadingOrder(left: TextLine, right: TextLine): number {
  if (left.pageIndex !== right.pageIndex) return left.pageIndex - right.pageIndex;
  if (left.y !== right.y) return left.y - right.y;
  return left.x - right.x;
}

export function computeDocumentStats(lines: TextLine[]): DocumentStats {
  const fontSizes = lines.map((line) => line.fontSize);
  const frequencies = new Map<number, number>();
  const linesPerPage = new Map<number, number>();
  const maxSizeByPage = new Map<number, number>();
  for (const line of lines) {
    frequencies.set(line.fontSize, (frequencies.get(line.fontSize) ?? 0) + 1);
    linesPerPage.set(line.pageIndex, (linesPerPage.get(line.pageIndex) ?? 0) + 1);
    maxSizeByPage.set(line.pageIndex, Math.max(maxSizeByPage.get(line.pageIndex) ?? 0, line.fontSize));
  }
  return {
    lineCount: lines.length,
    fontSizes,
    dominantSize: pickMostFrequent(frequencies) ?? DEFAULT_BODY_FONT_SIZE,
    distinctSizes: [...frequencies.keys()].sort((left, right) => right - left),
    linesPerPage,
    maxSizeByPage,
  };
}

function pickMostFrequent(frequencies: Map<number, number>): number | undefined {
  let best: number | undefined;
  let bestCount = -1;
  for (const [size, count] of frequencies) {
    if (count > bestCount || (count === bestCount && best !== undefined && size > best)) {
      best = size;
      bestCount = count;
    }
  }
  return best;
}

export function roundFontSize(fontSize: number): number {
  return Math.round(fontSize * FONT_SIZE_PRECISION) / FONT_SIZE_PRECISION;
}

export function computePageVerticalExtents(lines: TextLine[]): Map<number, PageVerticalExtent> {
  const extents = new Map<number, PageVerticalExtent>();
  for (const line of lines) {
    const current = extents.get(line.pageIndex);
    if (!current) {
      extents.set(line.pageIndex, { minY: line.y, maxY: line.y });
      continue;
    }
    current.minY = Math.min(current.minY, line.y);
    current.maxY = Math.max(current.maxY, line.y);
  }
  return extents;
}

export function getRelativeVerticalPosition(
  line: TextLine,
  pageExtents: Map<number, PageVerticalExtent>,
): number {
  const extent = pageExtents.get(line.pageIndex);
  if (!extent) return 0.5;
  const span = extent.maxY - extent.minY;
  if (span <= 0) return 0.5;
  return (line.y - extent.minY) / span;
}

export function isNearPageEdge(
  line: TextLine,
  pageExtents: Map<number, PageVerticalExtent>,
  edgeMargin: number = PAGE_EDGE_MARGIN,
): boolean {
  const relativeY = getRelativeVerticalPosition(line, pageExtents);
  return relativeY <= edgeMargin || relativeY >= 1 - edgeMargin;
}

export function normalizeSpacing(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function splitWords(text: string): string[] {
  return normalizeSpacing(text)
    .split(" ")
    .filter((token) => token.length > 0);
}

export function countWords(text: string): number {
  return splitWords(text).length;
}
