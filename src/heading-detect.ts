import type {
  DocumentStats,
  HeadingCandidate,
  HeadingLevel,
  HeadingThresholds,
  TextLine,
} from "./document-types.ts";
import {
  DEFAULT_MAX_HEADINGS,
  DEFAULT_MAX_HEADINGS_PER_PAGE,
  H1_FALLBACK_RATIO,
  H2_FALLBACK_RATIO,
  H3_FALLBACK_RATIO,
  HEADING_PATTERN_CONFIDENCE_WEIGHT,
  HEADING_SIZE_CONFIDENCE_WEIGHT,
  MAX_ALL_CAPS_HEADING_WORDS,
  MAX_BOLD_HEADING_WORDS,
  MAX_HEADING_WORDS,
  MAX_NUMBERED_HEADING_WORDS,
  MAX_TOP_LEVEL_SECTION_NUMBER,
  MIN_ALL_CAPS_HEADING_LETTERS,
  MIN_DISTINCT_SIZES_FOR_RANKED_THRESHOLDS,
} from "./document-types.ts";
import { clampUnit } from "./math-utils.ts";
import { isAllCaps, startsWithCapital } from "./string-utils.ts";
import { countWords, normalizeSpacing } from "./text-lines.ts";

const NUMBERED_HEADING_PATTERN = /^(\d+(?:\.\d+)*)\.?\s+(.+)$/u;
const KEYWORD_HEADING_PATTERNS: Array<readonly [RegExp, HeadingLevel]> = [
  [/^(?:chapter|part)\s+(?:\d+|[IVXLC]+)\b/i, "H1"],
  [/^appendix\s+(?:[A-Z]|\d+)\b/i, "H1"],
  [/^section\s+\d+(?:\.\d+)*\b/i, "H2"],
];
const NAMED_SECTION_HEADINGS = new Set([
  "abstract",
  "acknowledgement",
  "acknowledgements",
  "acknowledgment",
  "acknowledgments",
  "bibliography",
  "conclusion",
  "conclusions",
  "introduction",
  "references",
  "summary",
]);
const LEVELS_BY_DEPTH: HeadingLevel[] = ["H1", "H2", "H3"];

export type HeadingPatternKind = "numbered" | "keyword" | "named" | "styled";

export interface HeadingPatternMatch {
  kind: HeadingPatternKind;
  /** Structural level; absent for style-only matches, which take their level from size. */
  level?: HeadingLevel;
}

export interface HeadingPolicy {
  computeThresholds: (stats: DocumentStats, titleSize?: number) => HeadingThresholds;
  matchPattern: (line: TextLine, stats: DocumentStats) => HeadingPatternMatch | undefined;
  isHeadingShaped: (text: string) => boolean;
  minConfidence: number;
  maxHeadings: number;
  maxHeadingsPerPage: number;
}

export function createHeadingPolicy(overrides: Partial<HeadingPolicy> = {}): HeadingPolicy {
  return {
    computeThresholds: computeHeadingThresholds,
    matchPattern: matchHeadingPattern,
    isHeadingShaped,
    minConfidence: 0,
    maxHeadings: DEFAULT_MAX_HEADINGS,
    maxHeadingsPerPage: DEFAULT_MAX_HEADINGS_PER_PAGE,
    ...overrides,
  };
}

export function computeHeadingThresholds(
  stats: DocumentStats,
  titleSize?: number,
): HeadingThresholds {
  const dominant = stats.dominantSize;
  const fallback = {
    h1: dominant * H1_FALLBACK_RATIO,
    h2: dominant * H2_FALLBACK_RATIO,
    h3: dominant * H3_FALLBACK_RATIO,
  };
  if (stats.distinctSizes.length < MIN_DISTINCT_SIZES_FOR_RANKED_THRESHOLDS) return fallback;

  const headingSizes = stats.distinctSizes.filter((size) => size > dominant && size !== titleSize);
  const h1 = headingSizes[0] ?? fallback.h1;
  const h2 = Math.min(headingSizes[1] ?? fallback.h2, h1);
  const h3 = Math.min(headingSizes[2] ?? fallback.h3, h2);
  return { h1, h2, h3 };
}

export function detectNumberedHeadingDepth(text: string): number | undefined {
  const match = NUMBERED_HEADING_PATTERN.exec(normalizeSpacing(text));
  if (!match) return undefined;
  const parts = match[1].split(".");
  const topLevel = Number.parseInt(parts[0], 10);
  if (!Number.isFinite(topLevel) || topLevel < 1 || topLevel > MAX_TOP_LEVEL_SECTION_NUMBER) {
    return undefined;
  }
  return isValidNumberedHeadingText(match[2].trim()) ? parts.length : undefined;
}

function isValidNumberedHeadingText(text: string): boolean {
  if (!startsWithCapital(text)) return false;
  if (/[.!?]$/.test(text)) return false;
  return countWords(text) <= MAX_NUMBERED_HEADING_WORDS;
}

export function levelForNumberingDepth(depth: number): HeadingLevel {
  return LEVELS_BY_DEPTH[Math.min(Math.max(depth, 1), LEVELS_BY_DEPTH.length) - 1];
}

export function matchHeadingPattern(
  line: TextLine,
  stats: DocumentStats,
): HeadingPatternMatch | undefined {
  const text = normalizeSpacing(line.text);
  if (line.fontSize < stats.dominantSize) return undefined;

  // Numbered list items share the body size, so numbering alone needs size or weight behind it.
  const depth = detectNumberedHeadingDepth(text);
  if (depth !== undefined && (line.fontSize > stats.dominantSize || line.bold)) {
    return { kind: "numbered", level: levelForNumberingDepth(depth) };
  }

  for (const [pattern, level] of KEYWORD_HEADING_PATTERNS) {
    if (pattern.test(text)) return { kind: "keyword", level };
  }

  if (NAMED_SECTION_HEADINGS.has(text.toLowerCase().replace(/[:.]$/, ""))) {
    return { kind: "named", level: "H1" };
  }

  if (isAllCapsShortLine(text) || isBoldShortLine(line, text)) return { kind: "styled" };
  return undefined;
}

function isAllCapsShortLine(text: string): boolean {
  if (!isAllCaps(text)) return false;
  const wordCount = countWords(text);
  if (wordCount < 1 || wordCount > MAX_ALL_CAPS_HEADING_WORDS) return false;
  return text.replace(/[^\p{L}]/gu, "").length >= MIN_ALL_CAPS_HEADING_LETTERS;
}

function isBoldShortLine(line: TextLine, text: string): boolean {
  if (!line.bold) return false;
  if (text.endsWith(".")) return false;
  return countWords(text) <= MAX_BOLD_HEADING_WORDS;
}

export function isHeadingShaped(text: string): boolean {
  const normalized = normalizeSpacing(text);
  const wordCount = countWords(normalized);
  if (wordCount < 1 || wordCount > MAX_HEADING_WORDS) return false;
  if (!/\p{L}/u.test(normalized)) return false;
  return !/[,;]$/.test(normalized);
}

export function levelForFontSize(
  fontSize: number,
  thresholds: HeadingThresholds,
  dominantSize: number,
): HeadingLevel | undefined {
  if (fontSize <= dominantSize) return undefined;
  if (fontSize >= thresholds.h1) return "H1";
  if (fontSize >= thresholds.h2) return "H2";
  if (fontSize >= thresholds.h3) return "H3";
  return undefined;
}

export function computeHeadingConfidence(
  fontSize: number,
  thresholds: HeadingThresholds,
  dominantSize: number,
  patternMatched: boolean,
): number {
  const span = thresholds.h1 - dominantSize;
  const sizeComponent = span > 0 ? clampUnit((fontSize - dominantSize) / span) : 0;
  return clampUnit(
    sizeComponent * HEADING_SIZE_CONFIDENCE_WEIGHT +
      (patternMatched ? HEADING_PATTERN_CONFIDENCE_WEIGHT : 0),
  );
}

export interface TitleAssignment {
  line: TextLine;
  score: number;
}

export function classifyHeadings(
  lines: TextLine[],
  stats: DocumentStats,
  title?: TitleAssignment,
  policy: HeadingPolicy = createHeadingPolicy(),
): HeadingCandidate[] {
  if (lines.length === 0 || stats.distinctSizes.length === 0) return [];
  const thresholds = policy.computeThresholds(stats, title?.line.fontSize);

  const candidates = lines.map((line): HeadingCandidate => {
    if (title && line === title.line) {
      return { line, level: "TITLE", confidence: clampUnit(title.score) };
    }
    return classifyLine(line, stats, thresholds, policy);
  });

  demoteLowConfidence(candidates, policy.minConfidence);
  demoteConsecutiveDuplicates(candidates);
  demoteExcessHeadings(candidates, policy.maxHeadings, policy.maxHeadingsPerPage);
  return candidates;
}

function classifyLine(
  line: TextLine,
  stats: DocumentStats,
  thresholds: HeadingThresholds,
  policy: HeadingPolicy,
): HeadingCandidate {
  if (!policy.isHeadingShaped(line.text)) return { line, level: "NONE", confidence: 0 };

  const pattern = policy.matchPattern(line, stats);
  const sizeLevel = levelForFontSize(line.fontSize, thresholds, stats.dominantSize);
  const level = pattern?.level ?? sizeLevel ?? (pattern ? "H3" : undefined);
  if (!level) return { line, level: "NONE", confidence: 0 };

  return {
    line,
    level,
    confidence: computeHeadingConfidence(
      line.fontSize,
      thresholds,
      stats.dominantSize,
      pattern !== undefined,
    ),
  };
}

function isHeading(candidate: HeadingCandidate): boolean {
  return candidate.level !== "NONE" && candidate.level !== "TITLE";
}

function demote(candidate: HeadingCandidate): void {
  candidate.level = "NONE";
}

function demoteLowConfidence(candidates: HeadingCandidate[], minConfidence: number): void {
  for (const candidate of candidates) {
    if (isHeading(candidate) && candidate.confidence < minConfidence) demote(candidate);
  }
}

function demoteConsecutiveDuplicates(candidates: HeadingCandidate[]): void {
  let previous: HeadingCandidate | undefined;
  for (const candidate of candidates) {
    if (!isHeading(candidate)) continue;
    if (
      previous &&
      previous.line.pageIndex === candidate.line.pageIndex &&
      headingKey(previous.line.text) === headingKey(candidate.line.text)
    ) {
      demote(candidate);
      continue;
    }
    previous = candidate;
  }
}

interface OrderedHeading {
  candidate: HeadingCandidate;
  order: number;
}

function demoteExcessHeadings(
  candidates: HeadingCandidate[],
  maxHeadings: number,
  maxHeadingsPerPage: number,
): void {
  const headingsByPage = new Map<number, OrderedHeading[]>();
  candidates.forEach((candidate, order) => {
    if (!isHeading(candidate)) return;
    const pageHeadings = headingsByPage.get(candidate.line.pageIndex);
    if (pageHeadings) {
      pageHeadings.push({ candidate, order });
    } else {
      headingsByPage.set(candidate.line.pageIndex, [{ candidate, order }]);
    }
  });
  for (const pageHeadings of headingsByPage.values()) {
    demoteLowestConfidence(pageHeadings, maxHeadingsPerPage);
  }

  const remaining = [...headingsByPage.values()]
    .flat()
    .filter((entry) => isHeading(entry.candidate))
    .sort((left, right) => left.order - right.order);
  demoteLowestConfidence(remaining, maxHeadings);
}

function demoteLowestConfidence(headings: OrderedHeading[], limit: number): void {
  if (headings.length <= limit) return;
  [...headings]
    .sort((left, right) => right.candidate.confidence - left.candidate.confidence || left.order - right.order)
    .slice(Math.max(limit, 0))
    .forEach((entry) => demote(entry.candidate));
}

function headingKey(text: string): string {
  return normalizeSpacing(text).toLowerCase();
}
