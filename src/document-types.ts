export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/** Styled text fragment from the PDF extractor. Coordinates grow downward from the top-left. */
export interface TextRun {
  text: string;
  fontSize: number;
  fontName: string;
  bold: boolean;
  italic: boolean;
  bbox: BoundingBox;
  pageIndex: number;
}

export interface ExtractedDocument {
  pages: ExtractedPage[];
}

export interface ExtractedPage {
  pageIndex: number;
  width: number;
  height: number;
  runs: TextRun[];
}

export interface TextLine {
  pageIndex: number;
  pageWidth: number;
  pageHeight: number;
  x: number;
  y: number;
  bottom: number;
  width: number;
  fontSize: number;
  bold: boolean;
  italic: boolean;
  text: string;
  runs: TextRun[];
}

export interface DocumentStats {
  readonly lineCount: number;
  readonly fontSizes: readonly number[];
  readonly dominantSize: number;
  /** Distinct line font sizes, largest first. */
  readonly distinctSizes: readonly number[];
  readonly linesPerPage: ReadonlyMap<number, number>;
  readonly maxSizeByPage: ReadonlyMap<number, number>;
}

export interface PageVerticalExtent {
  minY: number;
  maxY: number;
}

export type HeadingLevel = "H1" | "H2" | "H3";
export type LineLevel = "TITLE" | HeadingLevel | "NONE";

export interface HeadingCandidate {
  line: TextLine;
  level: LineLevel;
  confidence: number;
}

export interface HeadingThresholds {
  h1: number;
  h2: number;
  h3: number;
}

export type SectionLevel = HeadingLevel | "PREAMBLE";

export interface Section {
  index: number;
  heading?: HeadingCandidate;
  level: SectionLevel;
  title: string;
  lines: TextLine[];
  startPage: number;
  endPage: number;
  text: string;
  wordCount: number;
  parentIndex?: number;
}

export interface OutlineEntry {
  level: HeadingLevel;
  text: string;
  page: number;
}

export interface DocumentOutline {
  title: string;
  outline: OutlineEntry[];
}

export interface DocumentStructure extends DocumentOutline {
  titleLine?: TextLine;
  stats: DocumentStats;
  candidates: HeadingCandidate[];
  sections: Section[];
}

export const LINE_BASELINE_TOLERANCE = 2;
export const RUN_SPACE_GAP_RATIO = 0.2;
export const FONT_SIZE_PRECISION = 10;
export const DEFAULT_BODY_FONT_SIZE = 10;
export const PAGE_EDGE_MARGIN = 0.08;
export const STANDALONE_PAGE_NUMBER_PATTERN = /^(?:page\s+)?\d{1,4}(?:\s+of\s+\d{1,4})?$/i;
export const MIN_REPEATED_EDGE_TEXT_PAGES = 3;
export const MIN_REPEATED_EDGE_TEXT_PAGE_COVERAGE = 0.6;
export const TITLE_CANDIDATE_LINE_LIMIT = 15;
export const TITLE_MIN_TEXT_LENGTH = 3;
export const TITLE_MIN_SCORE = 0.55;
export const TITLE_MAX_RELATIVE_POSITION = 0.5;
export const TITLE_MIN_WORDS = 3;
export const TITLE_MAX_WORDS = 25;
export const TITLE_MAX_LENGTH = 100;
export const TITLE_SIZE_WEIGHT = 0.4;
export const TITLE_POSITION_WEIGHT = 0.2;
export const TITLE_CONTENT_WEIGHT = 0.2;
export const TITLE_STYLE_WEIGHT = 0.2;
export const MIN_DISTINCT_SIZES_FOR_RANKED_THRESHOLDS = 3;
export const H1_FALLBACK_RATIO = 1.5;
export const H2_FALLBACK_RATIO = 1.3;
export const H3_FALLBACK_RATIO = 1.1;
export const MAX_HEADING_WORDS = 20;
export const MAX_NUMBERED_HEADING_WORDS = 12;
export const MAX_TOP_LEVEL_SECTION_NUMBER = 50;
export const MAX_ALL_CAPS_HEADING_WORDS = 8;
export const MIN_ALL_CAPS_HEADING_LETTERS = 4;
export const MAX_BOLD_HEADING_WORDS = 10;
export const HEADING_SIZE_CONFIDENCE_WEIGHT = 0.6;
export const HEADING_PATTERN_CONFIDENCE_WEIGHT = 0.4;
export const DEFAULT_MAX_HEADINGS = 60;
export const DEFAULT_MAX_HEADINGS_PER_PAGE = 5;
