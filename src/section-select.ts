import type { AnalysisConfig } from "./analysis-config.ts";
import type { RankedSection, ScoredSection } from "./relevance-types.ts";
import { refineExcerptText } from "./string-utils.ts";

type SelectionConfig = Pick<AnalysisConfig, "topK" | "maxPerDocument" | "minScore" | "maxExcerptLength">;

export function compareScoredSections(left: ScoredSection, right: ScoredSection): number {
  return (
    right.score - left.score ||
    left.documentOrder - right.documentOrder ||
    left.section.startPage - right.section.startPage ||
    left.section.index - right.section.index
  );
}

export function selectDiverseSections(
  scored: ScoredSection[],
  config: SelectionConfig,
): RankedSection[] {
  const qualifying = scored
    .filter((candidate) => candidate.score >= config.minScore)
    .sort(compareScoredSections);
  const qualifyingDocuments = new Set(qualifying.map((candidate) => candidate.documentId));
  // Raised just enough that K sections fit across the qualifying documents.
  const ceiling = Math.max(
    config.maxPerDocument,
    Math.ceil(config.topK / Math.max(qualifyingDocuments.size, 1)),
  );

  const remaining = [...qualifying];
  const selected: ScoredSection[] = [];
  const perDocument = new Map<string, number>();
  while (selected.length < config.topK && remaining.length > 0) {
    let pickIndex = remaining.findIndex((candidate) => !perDocument.has(candidate.documentId));
    if (pickIndex < 0) {
      pickIndex = remaining.findIndex(
        (candidate) => (perDocument.get(candidate.documentId) ?? 0) < ceiling,
      );
    }
    if (pickIndex < 0) break;
    const [picked] = remaining.splice(pickIndex, 1);
    selected.push(picked);
    perDocument.set(picked.documentId, (perDocument.get(picked.documentId) ?? 0) + 1);
  }

  return selected.sort(compareScoredSections).map((candidate, index) => ({
    ...candidate,
    importanceRank: index + 1,
    refinedText: refineExcerptText(candidate.section.text, config.maxExcerptLength),
  }));
}
