import type { HeadingCandidate, Section, SectionLevel, TextLine } from "./document-types.ts";
import { countWords, normalizeSpacing } from "./text-lines.ts";

const LEVEL_RANK: Record<SectionLevel, number> = {
  PREAMBLE: 0,
  H1: 1,
  H2: 2,
  H3: 3,
};

interface SectionDraft {
  heading?: HeadingCandidate;
  level: SectionLevel;
  lines: TextLine[];
}

export function segmentSections(candidates: HeadingCandidate[]): Section[] {
  const drafts: SectionDraft[] = [];
  let current: SectionDraft | undefined;

  for (const candidate of candidates) {
    const level = candidate.level;
    if (level === "TITLE") continue;
    if (level === "NONE") {
      if (!current) {
        current = { level: "PREAMBLE", lines: [] };
        drafts.push(current);
      }
      current.lines.push(candidate.line);
      continue;
    }
    current = { heading: candidate, level, lines: [] };
    drafts.push(current);
  }

  const sections: Section[] = [];
  drafts.forEach((draft, index) => {
    sections.push(finalizeSection(draft, index, findParentIndex(sections, draft.level)));
  });
  return sections;
}

function findParentIndex(previous: Section[], level: SectionLevel): number | undefined {
  if (level === "PREAMBLE") return undefined;
  for (let i = previous.length - 1; i >= 0; i -= 1) {
    const candidate = previous[i];
    if (candidate.level === "PREAMBLE") continue;
    if (LEVEL_RANK[candidate.level] < LEVEL_RANK[level]) return candidate.index;
  }
  return undefined;
}

function finalizeSection(draft: SectionDraft, index: number, parentIndex: number | undefined): Section {
  const text = draft.lines.map((line) => line.text).join("\n");
  const pages = draft.lines.map((line) => line.pageIndex);
  if (draft.heading) pages.push(draft.heading.line.pageIndex);
  const startPage = draft.heading?.line.pageIndex ?? Math.min(...pages);
  return {
    index,
    heading: draft.heading,
    level: draft.level,
    title: draft.heading ? normalizeSpacing(draft.heading.line.text) : "",
    lines: draft.lines,
    startPage,
    endPage: Math.max(...pages),
    text,
    wordCount: countWords(text),
    parentIndex,
  };
}
