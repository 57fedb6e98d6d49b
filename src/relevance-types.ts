import type { ExtractedDocument, Section } from "./document-types.ts";

export const PERSONA_TYPES = [
  "academic_researcher",
  "business_analyst",
  "student",
  "technical_professional",
] as const;

export type PersonaType = (typeof PERSONA_TYPES)[number];

export interface ContentPreferences {
  technicalDepth: number;
  quantitativeFocus: number;
  introductoryFocus: number;
}

export interface PersonaProfile {
  personaType: PersonaType;
  expertiseKeywords: string[];
  priorityKeywords: string[];
  preferences: ContentPreferences;
  /** True when neither persona nor job text was available. */
  isDefault: boolean;
}

export const SECTION_TYPES = [
  "methodology",
  "results",
  "introduction",
  "discussion",
  "financial",
  "conceptual",
  "other",
] as const;

export type SectionType = (typeof SECTION_TYPES)[number];

export interface RelevanceFactors {
  keywordMatch: number;
  sectionType: number;
  contentDepth: number;
  quantitativeContent: number;
  positionImportance: number;
}

export interface ScoredSection {
  documentId: string;
  documentOrder: number;
  documentTitle: string;
  section: Section;
  sectionType: SectionType;
  factors: RelevanceFactors;
  score: number;
}

export interface RankedSection extends ScoredSection {
  importanceRank: number;
  refinedText: string;
}

export interface CollectionDocument {
  id: string;
  document: ExtractedDocument;
}

export interface CollectionInput {
  documents: CollectionDocument[];
  persona: string;
  jobToBeDone: string;
}

export interface ExtractedSectionRecord {
  document: string;
  section_title: string;
  importance_rank: number;
  page_number: number;
}

export interface SubSectionRecord {
  document: string;
  refined_text: string;
  page_number: number;
}

export interface CollectionAnalysisRecord {
  metadata: {
    input_documents: string[];
    persona: string;
    job_to_be_done: string;
    processing_timestamp: string;
  };
  extracted_sections: ExtractedSectionRecord[];
  sub_section_analysis: SubSectionRecord[];
}
