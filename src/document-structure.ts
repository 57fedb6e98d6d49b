import type {
  DocumentOutline,
  DocumentStructure,
  ExtractedDocument,
  HeadingCandidate,
  OutlineEntry,
} from "./document-types.ts";
import type { HeadingPolicy } from "./heading-detect.ts";
import { classifyHeadings, createHeadingPolicy } from "./heading-detect.ts";
import { filterPageArtifacts } from "./page-filter.ts";
import { segmentSections } from "./section-segment.ts";
import { collectTextLines, computeDocumentStats, normalizeSpacing } from "./text-lines.ts";
import { detectTitle } from "./title-detect.ts";

export interface StructureOptions {
  filterArtifacts?: boolean;
  headingPolicy?: Partial<HeadingPolicy>;
}

export function analyzeDocumentStructure(
  document: ExtractedDocument,
  options: StructureOptions = {},
): DocumentStructure {
  const collected = collectTextLines(document);
  const lines = options.filterArtifacts === false ? collected : filterPageArtifacts(collected);
  const stats = computeDocumentStats(lines);
  const title = detectTitle(lines, stats);
  const candidates = classifyHeadings(
    lines,
    stats,
    title ? { line: title.line, score: title.score } : undefined,
    createHeadingPolicy(options.headingPolicy),
  );
  return {
    title: title?.text ?? "",
    titleLine: title?.line,
    outline: buildOutline(candidates),
    stats,
    candidates,
    sections: segmentSections(candidates),
  };
}

export function extractOutline(
  document: ExtractedDocument,
  options: StructureOptions = {},
): DocumentOutline {
  return toOutlineRecord(analyzeDocumentStructure(document, options));
}

export function toOutlineRecord(structure: DocumentOutline): DocumentOutline {
  return {
    title: structure.title,
    outline: structure.outline.map((entry) => ({ level: entry.level, text: entry.text, page: entry.page })),
  };
}

function buildOutline(candidates: HeadingCandidate[]): OutlineEntry[] {
  const outline: OutlineEntry[] = [];
  for (const { line, level } of candidates) {
    if (level === "NONE" || level === "TITLE") continue;
    outline.push({ level, text: normalizeSpacing(line.text), page: line.pageIndex });
  }
  return outline;
}

export function createEmptyOutline(): DocumentOutline {
  return { title: "", outline: [] };
}
