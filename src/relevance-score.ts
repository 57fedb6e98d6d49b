import type { AnalysisConfig } from "./analysis-config.ts";
import {
  LONG_WORD_MIN_LETTERS,
  MAX_SENTENCE_WORDS,
  MIN_SENTENCE_WORDS,
  POSITION_DAMPING_SECTION_COUNT,
  QUANTITATIVE_TOKENS_PER_100_WORDS_SATURATION,
  TECHNICAL_DENSITY_SATURATION,
} from "./analysis-config.ts";
import type { Section } from "./document-types.ts";
import { clampUnit } from "./math-utils.ts";
import type { PersonaProfile, RelevanceFactors, ScoredSection } from "./relevance-types.ts";
import { classifySectionType, scoreSectionType } from "./section-classify.ts";
import { countWords, normalizeSpacing } from "./text-lines.ts";
import { loadWordList, tokenizeWords } from "./word-lists.ts";

const NUMBER_PATTERN = /\d+(?:[.,]\d+)*/g;
const PERCENTAGE_PATTERN = /\d(?:[.,]\d+)*\s?%|\bper\s?cent\b/gi;
const STATISTICAL_TERMS = new Set([
  "average",
  "correlation",
  "decrease",
  "deviation",
  "growth",
  "increase",
  "mean",
  "median",
  "percent",
  "percentage",
  "probability",
  "rate",
  "ratio",
  "regression",
  "significant",
  "statistic",
  "statistics",
  "total",
  "variance",
]);

export interface DocumentSections {
  id: string;
  order: number;
  title: string;
  sections: Section[];
}

export function scoreCollectionSections(
  documents: DocumentSections[],
  profile: PersonaProfile,
  config: AnalysisConfig,
): ScoredSection[] {
  return documents.flatMap((document) => scoreDocumentSections(document, profile, config));
}

export function scoreDocumentSections(
  document: DocumentSections,
  profile: PersonaProfile,
  config: AnalysisConfig,
): ScoredSection[] {
  const total = document.sections.length;
  const scored: ScoredSection[] = [];
  for (const section of document.sections) {
    if (section.wordCount < config.minSectionWords) continue;
    const sectionType = classifySectionType(section);
    const factors: RelevanceFactors = {
      keywordMatch: scoreKeywordMatch(section, profile, config.keywordSaturation),
      sectionType: scoreSectionType(sectionType, profile),
      contentDepth: 1 - Math.abs(measureContentDepth(section.text) - profile.preferences.technicalDepth),
      quantitativeContent:
        1 - Math.abs(measureQuantitativeDensity(section.text) - profile.preferences.quantitativeFocus),
      positionImportance: scorePositionImportance(section.index, total),
    };
    scored.push({
      documentId: document.id,
      documentOrder: document.order,
      documentTitle: document.title,
      section,
      sectionType,
      factors,
      score: combineFactors(factors, config.weights),
    });
  }
  return scored;
}

export function combineFactors(factors: RelevanceFactors, weights: AnalysisConfig["weights"]): number {
  return clampUnit(
    factors.keywordMatch * weights.keywordMatch +
      factors.sectionType * weights.sectionType +
      factors.contentDepth * weights.contentDepth +
      factors.quantitativeContent * weights.quantitativeContent +
      factors.positionImportance * weights.positionImportance,
  );
}

export function scoreKeywordMatch(
  section: Pick<Section, "title" | "text">,
  profile: PersonaProfile,
  saturation: number,
): number {
  const keywords = [...new Set([...profile.expertiseKeywords, ...profile.priorityKeywords])];
  if (keywords.length === 0) return 0;
  const words = new Set(tokenizeWords(`${section.title} ${section.text}`));
  const matched = keywords.filter((keyword) => matchesKeyword(words, keyword)).length;
  return clampUnit(matched / (keywords.length * saturation));
}

function matchesKeyword(words: Set<string>, keyword: string): boolean {
  if (words.has(keyword) || words.has(`${keyword}s`) || words.has(`${keyword}es`)) return true;
  return keyword.endsWith("s") && words.has(keyword.slice(0, -1));
}

export function measureContentDepth(text: string): number {
  const normalized = normalizeSpacing(text);
  const sentences = normalized.split(/[.!?]+(?:\s|$)/).filter((sentence) => countWords(sentence) > 0);
  if (sentences.length === 0) return 0;
  const averageSentenceWords = countWords(normalized) / sentences.length;
  const sentenceComponent = clampUnit(
    (averageSentenceWords - MIN_SENTENCE_WORDS) / (MAX_SENTENCE_WORDS - MIN_SENTENCE_WORDS),
  );

  const words = tokenizeWords(normalized);
  const technicalTerms = loadWordList("technical-terms");
  const technicalWords = words.filter(
    (word) => word.length >= LONG_WORD_MIN_LETTERS || technicalTerms.has(word),
  ).length;
  const densityComponent = clampUnit(
    technicalWords / Math.max(words.length, 1) / TECHNICAL_DENSITY_SATURATION,
  );
  return (sentenceComponent + densityComponent) / 2;
}

export function measureQuantitativeDensity(text: string): number {
  const wordCount = countWords(text);
  if (wordCount === 0) return 0;
  const numbers = text.match(NUMBER_PATTERN)?.length ?? 0;
  const percentages = text.match(PERCENTAGE_PATTERN)?.length ?? 0;
  const statisticalTerms = tokenizeWords(text).filter((word) => STATISTICAL_TERMS.has(word)).length;
  const per100Words = ((numbers + percentages + statisticalTerms) / wordCount) * 100;
  return clampUnit(per100Words / QUANTITATIVE_TOKENS_PER_100_WORDS_SATURATION);
}

export function scorePositionImportance(index: number, total: number): number {
  if (total <= 0) return 0;
  const damping = Math.min(1, POSITION_DAMPING_SECTION_COUNT / total);
  return clampUnit(1 - (index / total) * damping);
}
