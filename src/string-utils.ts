import { normalizeSpacing } from "./text-lines.ts";

const LINE_BREAK_HYPHENATION_PATTERN = /(\p{L})-\s*\n\s*(\p{Ll})/gu;
const CONTROL_CHARACTER_PATTERN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;
const EXCERPT_ELLIPSIS = "...";

export function isAllCaps(text: string): boolean {
  const letters = text.replace(/[^\p{L}]/gu, "");
  return letters.length > 0 && letters === letters.toUpperCase() && letters !== letters.toLowerCase();
}

export function startsWithCapital(text: string): boolean {
  return /^[^\p{L}]*\p{Lu}/u.test(text);
}

export function refineExcerptText(text: string, maxLength: number): string {
  const cleaned = normalizeSpacing(
    text.replace(CONTROL_CHARACTER_PATTERN, " ").replace(LINE_BREAK_HYPHENATION_PATTERN, "$1$2"),
  );
  return truncateAtWordBoundary(cleaned, maxLength);
}

export function truncateAtWordBoundary(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  const slice = text.slice(0, maxLength);
  const lastSpace = slice.lastIndexOf(" ");
  const head = lastSpace > 0 ? slice.slice(0, lastSpace) : slice;
  return `${head.replace(/[\s,;:]+$/, "")}${EXCERPT_ELLIPSIS}`;
}
