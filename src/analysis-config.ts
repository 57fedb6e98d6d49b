import type { StructureOptions } from "./document-structure.ts";

export interface RelevanceWeights {
  keywordMatch: number;
  sectionType: number;
  contentDepth: number;
  quantitativeContent: number;
  positionImportance: number;
}

export interface AnalysisConfig {
  weights: RelevanceWeights;
  topK: number;
  maxPerDocument: number;
  minScore: number;
  minSectionWords: number;
  maxExcerptLength: number;
  /** Share of the profile's keywords that, once matched, saturates the keyword factor. */
  keywordSaturation: number;
  structure: StructureOptions;
}

export type AnalysisOverrides = Partial<Omit<AnalysisConfig, "weights">> & {
  weights?: Partial<RelevanceWeights>;
};

export const DEFAULT_RELEVANCE_WEIGHTS: RelevanceWeights = {
  keywordMatch: 0.3,
  sectionType: 0.2,
  contentDepth: 0.2,
  quantitativeContent: 0.15,
  positionImportance: 0.15,
};

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  weights: DEFAULT_RELEVANCE_WEIGHTS,
  topK: 5,
  maxPerDocument: 2,
  minScore: 0.2,
  minSectionWords: 10,
  maxExcerptLength: 500,
  keywordSaturation: 0.5,
  structure: {},
};

export const MIN_SENTENCE_WORDS = 8;
export const MAX_SENTENCE_WORDS = 30;
export const TECHNICAL_DENSITY_SATURATION = 0.15;
export const LONG_WORD_MIN_LETTERS = 10;
export const QUANTITATIVE_TOKENS_PER_100_WORDS_SATURATION = 5;
export const POSITION_DAMPING_SECTION_COUNT = 20;
export const MIN_BODY_SECTION_TYPE_HITS = 2;
export const MIN_KEYWORD_LETTERS = 4;

export function resolveAnalysisConfig(overrides: AnalysisOverrides = {}): AnalysisConfig {
  const config: AnalysisConfig = {
    ...DEFAULT_ANALYSIS_CONFIG,
    ...overrides,
    weights: { ...DEFAULT_RELEVANCE_WEIGHTS, ...overrides.weights },
    structure: { ...DEFAULT_ANALYSIS_CONFIG.structure, ...overrides.structure },
  };
  assertPositiveInteger("topK", config.topK);
  assertPositiveInteger("maxPerDocument", config.maxPerDocument);
  assertPositiveInteger("maxExcerptLength", config.maxExcerptLength);
  assertNonNegativeInteger("minSectionWords", config.minSectionWords);
  assertUnitInterval("minScore", config.minScore);
  if (config.keywordSaturation <= 0 || config.keywordSaturation > 1) {
    throw new Error(`keywordSaturation must be in (0, 1], got ${config.keywordSaturation}`);
  }
  for (const [name, weight] of Object.entries(config.weights)) {
    assertUnitInterval(`weights.${name}`, weight);
  }
  return config;
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
}

function assertNonNegativeInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got ${value}`);
  }
}

function assertUnitInterval(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`${name} must be between 0 and 1, got ${value}`);
  }
}
