import type { PageVerticalExtent, TextLine } from "./document-types.ts";
import {
  MIN_REPEATED_EDGE_TEXT_PAGE_COVERAGE,
  MIN_REPEATED_EDGE_TEXT_PAGES,
  STANDALONE_PAGE_NUMBER_PATTERN,
} from "./document-types.ts";
import { computePageVerticalExtents, isNearPageEdge, normalizeSpacing } from "./text-lines.ts";

interface EdgeTextStat {
  pageIndexes: Set<number>;
  minEdgeFontSize: number;
}

export function filterPageArtifacts(lines: TextLine[]): TextLine[] {
  if (lines.length === 0) return lines;
  const pageExtents = computePageVerticalExtents(lines);
  const repeatedEdgeTexts = findRepeatedEdgeTexts(lines, pageExtents);
  return lines.filter((line) => {
    if (isStandalonePageNumber(line, pageExtents)) return false;
    if (!isNearPageEdge(line, pageExtents)) return true;
    // A title repeated as a small running header keeps its larger first occurrence.
    const minEdgeFontSize = repeatedEdgeTexts.get(edgeTextKey(line.text));
    return minEdgeFontSize === undefined || line.fontSize > minEdgeFontSize;
  });
}

export function isStandalonePageNumber(
  line: TextLine,
  pageExtents: Map<number, PageVerticalExtent>,
): boolean {
  if (!STANDALONE_PAGE_NUMBER_PATTERN.test(line.text)) return false;
  return isNearPageEdge(line, pageExtents);
}

export function findRepeatedEdgeTexts(
  lines: TextLine[],
  pageExtents: Map<number, PageVerticalExtent>,
): Map<string, number> {
  const totalPages = new Set(lines.map((line) => line.pageIndex)).size;
  if (totalPages < MIN_REPEATED_EDGE_TEXT_PAGES) return new Map();

  const stats = new Map<string, EdgeTextStat>();
  for (const line of lines) {
    if (!isNearPageEdge(line, pageExtents)) continue;
    const key = edgeTextKey(line.text);
    if (key.length === 0) continue;
    const existing = stats.get(key);
    if (existing) {
      existing.pageIndexes.add(line.pageIndex);
      existing.minEdgeFontSize = Math.min(existing.minEdgeFontSize, line.fontSize);
    } else {
      stats.set(key, { pageIndexes: new Set([line.pageIndex]), minEdgeFontSize: line.fontSize });
    }
  }

  const minPages = Math.max(
    MIN_REPEATED_EDGE_TEXT_PAGES,
    Math.ceil(totalPages * MIN_REPEATED_EDGE_TEXT_PAGE_COVERAGE),
  );
  const repeated = new Map<string, number>();
  for (const [text, stat] of stats) {
    if (stat.pageIndexes.size >= minPages) repeated.set(text, stat.minEdgeFontSize);
  }
  return repeated;
}

function edgeTextKey(text: string): string {
  return normalizeSpacing(text).toLowerCase();
}
