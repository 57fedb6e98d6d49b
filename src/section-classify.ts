import { MIN_BODY_SECTION_TYPE_HITS } from "./analysis-config.ts";
import type { Section } from "./document-types.ts";
import type { PersonaProfile, PersonaType, SectionType } from "./relevance-types.ts";
import { tokenizeWords } from "./word-lists.ts";

type ClassifiedSectionType = Exclude<SectionType, "other">;

// Checked in this order against heading words; earlier types win ties.
const SECTION_TYPE_ORDER: readonly ClassifiedSectionType[] = [
  "introduction",
  "methodology",
  "results",
  "discussion",
  "financial",
  "conceptual",
];

export const SECTION_TYPE_VOCABULARIES: Record<ClassifiedSectionType, readonly string[]> = {
  introduction: ["abstract", "background", "introduction", "overview", "preface", "summary", "basics"],
  methodology: ["approach", "design", "experimental", "implementation", "method", "methodology", "methods", "procedure"],
  results: ["benchmark", "benchmarks", "evaluation", "experiments", "findings", "outcomes", "performance", "result", "results"],
  discussion: ["analysis", "conclusion", "conclusions", "discussion", "implications", "limitations", "recommendations"],
  financial: ["budget", "cost", "costs", "earnings", "finance", "financial", "income", "investment", "profit", "revenue"],
  conceptual: ["concept", "concepts", "definition", "definitions", "fundamentals", "mechanism", "mechanisms", "principles", "theory"],
};

export const SECTION_TYPE_AFFINITY: Record<PersonaType, Record<SectionType, number>> = {
  academic_researcher: {
    methodology: 0.9,
    results: 0.9,
    introduction: 0.5,
    discussion: 0.8,
    financial: 0.3,
    conceptual: 0.6,
    other: 0.4,
  },
  business_analyst: {
    methodology: 0.4,
    results: 0.85,
    introduction: 0.4,
    discussion: 0.7,
    financial: 0.95,
    conceptual: 0.4,
    other: 0.4,
  },
  student: {
    methodology: 0.5,
    results: 0.4,
    introduction: 0.9,
    discussion: 0.6,
    financial: 0.3,
    conceptual: 0.9,
    other: 0.5,
  },
  technical_professional: {
    methodology: 0.8,
    results: 0.7,
    introduction: 0.5,
    discussion: 0.6,
    financial: 0.4,
    conceptual: 0.6,
    other: 0.5,
  },
};

const INTRODUCTORY_SECTION_TYPES = new Set<SectionType>(["introduction", "conceptual"]);

export function classifySectionType(section: Pick<Section, "title" | "text">): SectionType {
  const titleWords = new Set(tokenizeWords(section.title));
  for (const sectionType of SECTION_TYPE_ORDER) {
    if (SECTION_TYPE_VOCABULARIES[sectionType].some((term) => titleWords.has(term))) return sectionType;
  }

  const hits = countBodyHits(tokenizeWords(section.text));
  let best: SectionType = "other";
  let bestHits = MIN_BODY_SECTION_TYPE_HITS - 1;
  for (const sectionType of SECTION_TYPE_ORDER) {
    const count = hits.get(sectionType) ?? 0;
    if (count > bestHits) {
      best = sectionType;
      bestHits = count;
    }
  }
  return best;
}

function countBodyHits(words: string[]): Map<ClassifiedSectionType, number> {
  const hits = new Map<ClassifiedSectionType, number>();
  for (const sectionType of SECTION_TYPE_ORDER) {
    const vocabulary = new Set(SECTION_TYPE_VOCABULARIES[sectionType]);
    hits.set(sectionType, words.filter((word) => vocabulary.has(word)).length);
  }
  return hits;
}

export function scoreSectionType(sectionType: SectionType, profile: PersonaProfile): number {
  const affinity = SECTION_TYPE_AFFINITY[profile.personaType][sectionType];
  if (!INTRODUCTORY_SECTION_TYPES.has(sectionType)) return affinity;
  return (affinity + profile.preferences.introductoryFocus) / 2;
}
