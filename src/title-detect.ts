import type { DocumentStats, TextLine } from "./document-types.ts";
import {
  TITLE_CANDIDATE_LINE_LIMIT,
  TITLE_CONTENT_WEIGHT,
  TITLE_MAX_LENGTH,
  TITLE_MAX_RELATIVE_POSITION,
  TITLE_MAX_WORDS,
  TITLE_MIN_SCORE,
  TITLE_MIN_TEXT_LENGTH,
  TITLE_MIN_WORDS,
  TITLE_POSITION_WEIGHT,
  TITLE_SIZE_WEIGHT,
  TITLE_STYLE_WEIGHT,
} from "./document-types.ts";
import { detectNumberedHeadingDepth } from "./heading-detect.ts";
import { clampUnit } from "./math-utils.ts";
import { isAllCaps, startsWithCapital } from "./string-utils.ts";
import { normalizeSpacing, splitWords } from "./text-lines.ts";

const NON_TITLE_LABEL_PATTERN = /^(?:page|figure|fig\.|table)\s+\S/i;

export interface TitleScore {
  size: number;
  position: number;
  content: number;
  style: number;
  total: number;
}

export interface TitleDetection {
  line: TextLine;
  text: string;
  score: number;
}

export function detectTitle(lines: TextLine[], stats: DocumentStats): TitleDetection | undefined {
  const firstPageLines = lines.filter((line) => line.pageIndex === 0).slice(0, TITLE_CANDIDATE_LINE_LIMIT);
  const maxFirstPageSize = stats.maxSizeByPage.get(0) ?? 0;
  if (firstPageLines.length === 0 || maxFirstPageSize <= 0) return undefined;

  let best: TitleDetection | undefined;
  for (const line of firstPageLines) {
    if (!isTitleCandidate(line, stats.dominantSize)) continue;
    const score = scoreTitleCandidate(line, maxFirstPageSize).total;
    if (score < TITLE_MIN_SCORE) continue;
    if (best && best.score >= score) continue;
    const text = cleanTitle(line.text);
    if (text.length === 0) continue;
    best = { line, text, score };
  }
  return best;
}

function isTitleCandidate(line: TextLine, dominantSize: number): boolean {
  const text = normalizeSpacing(line.text);
  if (text.length < TITLE_MIN_TEXT_LENGTH) return false;
  if (detectNumberedHeadingDepth(text) !== undefined) return false;
  if (NON_TITLE_LABEL_PATTERN.test(text)) return false;
  return line.fontSize > dominantSize || line.bold;
}

export function scoreTitleCandidate(line: TextLine, maxFirstPageSize: number): TitleScore {
  const size = scoreTitleSize(line, maxFirstPageSize);
  const position = scoreTitlePosition(line);
  const content = scoreTitleContent(line.text);
  const style = scoreTitleStyle(line);
  const total =
    size * TITLE_SIZE_WEIGHT +
    position * TITLE_POSITION_WEIGHT +
    content * TITLE_CONTENT_WEIGHT +
    style * TITLE_STYLE_WEIGHT;
  return { size, position, content, style, total };
}

export function scoreTitleSize(line: TextLine, maxFirstPageSize: number): number {
  if (maxFirstPageSize <= 0) return 0;
  return clampUnit(line.fontSize / maxFirstPageSize);
}

export function scoreTitlePosition(line: TextLine): number {
  if (line.pageHeight <= 0) return 0.5;
  return clampUnit(1 - line.y / (line.pageHeight * TITLE_MAX_RELATIVE_POSITION));
}

export function scoreTitleContent(text: string): number {
  const normalized = normalizeSpacing(text);
  const wordCount = splitWords(normalized).length;
  let score = 0.5;
  if (wordCount < TITLE_MIN_WORDS || wordCount > TITLE_MAX_WORDS) score -= 0.3;
  if (isAllCaps(normalized)) {
    score -= 0.2;
  } else if (startsWithCapital(normalized)) {
    score += 0.3;
  }
  score += /[.,;:]$/.test(normalized) ? -0.2 : 0.2;
  return clampUnit(score);
}

export function scoreTitleStyle(line: TextLine): number {
  if (line.bold) return 1;
  return line.italic ? 0.5 : 0;
}

export function cleanTitle(title: string): string {
  let cleaned = normalizeSpacing(title);
  if (cleaned.length > TITLE_MAX_LENGTH) {
    const words = cleaned.slice(0, TITLE_MAX_LENGTH).split(" ");
    cleaned = words.length > 1 ? words.slice(0, -1).join(" ") : words[0];
  }
  return cleaned.length >= TITLE_MIN_TEXT_LENGTH ? cleaned : "";
}

