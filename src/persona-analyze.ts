import { MIN_KEYWORD_LETTERS } from "./analysis-config.ts";
import type { ContentPreferences, PersonaProfile, PersonaType } from "./relevance-types.ts";
import { PERSONA_TYPES } from "./relevance-types.ts";
import { normalizeSpacing } from "./text-lines.ts";
import { loadWordList, tokenizeWords } from "./word-lists.ts";

const DEFAULT_PERSONA_TYPE: PersonaType = "technical_professional";

export const PERSONA_VOCABULARIES: Record<PersonaType, readonly string[]> = {
  academic_researcher: [
    "academic",
    "investigator",
    "lecturer",
    "phd",
    "postdoc",
    "professor",
    "research",
    "researcher",
    "scholar",
    "scientist",
  ],
  business_analyst: [
    "accountant",
    "analyst",
    "banker",
    "business",
    "economist",
    "finance",
    "financial",
    "investment",
    "investor",
    "market",
    "revenue",
  ],
  student: ["course", "coursework", "exam", "exams", "graduate", "learner", "pupil", "student", "undergraduate"],
  technical_professional: ["administrator", "architect", "developer", "engineer", "programmer", "technical", "technician"],
};

export const PERSONA_PREFERENCES: Record<PersonaType, ContentPreferences> = {
  academic_researcher: { technicalDepth: 0.8, quantitativeFocus: 0.5, introductoryFocus: 0.1 },
  business_analyst: { technicalDepth: 0.5, quantitativeFocus: 0.9, introductoryFocus: 0.2 },
  student: { technicalDepth: 0.2, quantitativeFocus: 0.2, introductoryFocus: 0.8 },
  technical_professional: { technicalDepth: 0.6, quantitativeFocus: 0.4, introductoryFocus: 0.3 },
};

export const NEUTRAL_PREFERENCES: ContentPreferences = {
  technicalDepth: 0.5,
  quantitativeFocus: 0.5,
  introductoryFocus: 0.5,
};

const ROLE_WORDS = new Set([
  "analyst",
  "developer",
  "engineer",
  "expert",
  "manager",
  "planner",
  "professional",
  "professor",
  "researcher",
  "scientist",
  "specialist",
  "student",
]);

const JOB_PHRASE_EXPANSIONS: Array<readonly [RegExp, readonly string[]]> = [
  [/\bliterature review\b/i, ["methodology", "datasets", "performance", "benchmarks"]],
  [/\brevenue trends?\b/i, ["revenue", "trends", "financial", "analysis"]],
  [/\bexam preparation\b|\bprepare for (?:an |the )?exams?\b/i, ["concepts", "mechanisms", "fundamentals"]],
];

export function createPersonaProfile(persona?: string, jobToBeDone?: string): PersonaProfile {
  const personaText = normalizeSpacing(persona ?? "");
  const jobText = normalizeSpacing(jobToBeDone ?? "");
  if (personaText.length === 0 && jobText.length === 0) return createDefaultProfile();

  const personaType = personaText.length > 0 ? classifyPersonaType(personaText) : DEFAULT_PERSONA_TYPE;
  return {
    personaType,
    expertiseKeywords: extractKeywords(personaText).filter((word) => !ROLE_WORDS.has(word)),
    priorityKeywords: dedupe([...extractKeywords(jobText), ...expandJobPhrases(jobText)]),
    preferences: { ...(personaText.length > 0 ? PERSONA_PREFERENCES[personaType] : NEUTRAL_PREFERENCES) },
    isDefault: false,
  };
}

export function createDefaultProfile(): PersonaProfile {
  return {
    personaType: DEFAULT_PERSONA_TYPE,
    expertiseKeywords: [],
    priorityKeywords: [],
    preferences: { ...NEUTRAL_PREFERENCES },
    isDefault: true,
  };
}

export function classifyPersonaType(persona: string): PersonaType {
  const words = new Set(tokenizeWords(persona));
  let best: PersonaType = DEFAULT_PERSONA_TYPE;
  let bestHits = 0;
  for (const personaType of PERSONA_TYPES) {
    const hits = PERSONA_VOCABULARIES[personaType].filter((term) => words.has(term)).length;
    if (hits > bestHits) {
      best = personaType;
      bestHits = hits;
    }
  }
  return best;
}

export function extractKeywords(text: string): string[] {
  const stopWords = loadWordList("stop-words");
  return dedupe(
    tokenizeWords(text).filter((word) => word.length >= MIN_KEYWORD_LETTERS && !stopWords.has(word)),
  );
}

export function expandJobPhrases(jobToBeDone: string): string[] {
  return JOB_PHRASE_EXPANSIONS.flatMap(([pattern, expansion]) =>
    pattern.test(jobToBeDone) ? [...expansion] : [],
  );
}

function dedupe(words: string[]): string[] {
  return [...new Set(words)];
}
