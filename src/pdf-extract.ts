import { readFile } from "node:fs/promises";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ExtractedDocument, ExtractedPage, TextRun } from "./document-types.ts";
export { assertReadableFile } from "./file-access.ts";

const BOLD_FONT_NAME_PATTERN = /bold|black|heavy|semibold|demi/i;
const ITALIC_FONT_NAME_PATTERN = /italic|oblique/i;
const SUBSET_PREFIX_PATTERN = /^[A-Z]{6}\+/;

interface PdfTextItem {
  str: string;
  transform: number[];
  width: number;
  fontName: string;
}

interface PdfFontInfo {
  name: string;
  bold: boolean;
  italic: boolean;
}

interface PdfFontObjects {
  has: (objId: string) => boolean;
  get: (objId: string) => unknown;
}

interface PageGeometry {
  pageIndex: number;
  toViewportPoint: (x: number, y: number) => number[];
}

export async function extractDocument(inputPdfPath: string): Promise<ExtractedDocument> {
  const data = new Uint8Array(await readFile(inputPdfPath));
  return extractDocumentFromBuffer(data);
}

export async function extractDocumentFromBuffer(data: Uint8Array): Promise<ExtractedDocument> {
  const pdf = await getDocument({ data, useSystemFonts: true }).promise;
  const pages: ExtractedPage[] = [];

  try {
    for (let i = 0; i < pdf.numPages; i++) {
      const page = await pdf.getPage(i + 1);
      const viewport = page.getViewport({ scale: 1 });
      const textContent = await page.getTextContent();
      // Font objects are only resolved once the operator list has been loaded.
      await page.getOperatorList();
      const geometry: PageGeometry = {
        pageIndex: i,
        toViewportPoint: (x, y) => applyTransform(viewport.transform, x, y),
      };
      pages.push({
        pageIndex: i,
        width: viewport.width,
        height: viewport.height,
        runs: collectPageRuns(textContent.items, geometry, page.commonObjs),
      });
    }
    return { pages };
  } finally {
    await pdf.destroy();
  }
}

export function collectPageRuns(
  items: unknown[],
  geometry: PageGeometry,
  fonts: PdfFontObjects,
): TextRun[] {
  const fontCache = new Map<string, PdfFontInfo>();
  const runs: TextRun[] = [];

  for (const item of items) {
    if (!isPdfTextItem(item)) continue;
    let font = fontCache.get(item.fontName);
    if (!font) {
      font = resolveFontInfo(item.fontName, fonts);
      fontCache.set(item.fontName, font);
    }
    const run = toTextRun(item, font, geometry);
    if (run) runs.push(run);
  }

  return runs;
}

function applyTransform(matrix: number[], x: number, y: number): number[] {
  const [a = 1, b = 0, c = 0, d = 1, e = 0, f = 0] = matrix;
  return [a * x + c * y + e, b * x + d * y + f];
}

function isPdfTextItem(item: unknown): item is PdfTextItem {
  return (
    typeof item === "object" &&
    item !== null &&
    "str" in item &&
    typeof item.str === "string" &&
    "transform" in item &&
    Array.isArray(item.transform) &&
    "width" in item &&
    typeof item.width === "number" &&
    "fontName" in item &&
    typeof item.fontName === "string"
  );
}

export function resolveFontInfo(fontName: string, fonts: PdfFontObjects): PdfFontInfo {
  const loaded = fonts.has(fontName) ? fonts.get(fontName) : undefined;
  const name = readStringProperty(loaded, "name") ?? fontName;
  const cleanName = name.replace(SUBSET_PREFIX_PATTERN, "");
  return {
    name: cleanName,
    bold: readBooleanProperty(loaded, "bold") || BOLD_FONT_NAME_PATTERN.test(cleanName),
    italic: readBooleanProperty(loaded, "italic") || ITALIC_FONT_NAME_PATTERN.test(cleanName),
  };
}

function readStringProperty(value: unknown, key: string): string | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  const property: unknown = Reflect.get(value, key);
  return typeof property === "string" && property.length > 0 ? property : undefined;
}

function readBooleanProperty(value: unknown, key: string): boolean {
  if (typeof value !== "object" || value === null) return false;
  return Reflect.get(value, key) === true;
}

function toTextRun(item: PdfTextItem, font: PdfFontInfo, geometry: PageGeometry): TextRun | undefined {
  const text = item.str.replace(/\s+/g, " ");
  if (text.trim().length === 0) return undefined;
  const [, , c = 0, d = 0, e = 0, f = 0] = item.transform;
  const fontSize = Math.hypot(c, d);
  const [startX = e, baseline = f] = geometry.toViewportPoint(e, f);
  return {
    text,
    fontSize,
    fontName: font.name,
    bold: font.bold,
    italic: font.italic,
    bbox: {
      x0: startX,
      y0: baseline - fontSize,
      x1: startX + item.width,
      y1: baseline,
    },
    pageIndex: geometry.pageIndex,
  };
}
