import { mkdir, readdir, writeFile } from "node:fs/promises";
import { dirname, join, parse, resolve } from "node:path";
import type { StructureOptions } from "./document-structure.ts";
import { createEmptyOutline, extractOutline } from "./document-structure.ts";
import type { DocumentOutline, ExtractedDocument } from "./document-types.ts";
import { createExtractionError, errorMessage } from "./errors.ts";
import { assertReadableFile, extractDocument } from "./pdf-extract.ts";

export interface ConvertPdfToOutlineInput {
  inputPdfPath: string;
  outputJsonPath: string;
  structure?: StructureOptions;
}

export interface ConvertPdfToOutlineResult {
  outputJsonPath: string;
  outline: DocumentOutline;
}

export interface ConvertPdfDirectoryInput {
  inputDirPath: string;
  outputDirPath: string;
  structure?: StructureOptions;
}

export interface ConvertedPdfFile {
  inputPdfPath: string;
  outputJsonPath: string;
  succeeded: boolean;
}

export interface PdfToOutlineDependencies {
  assertReadableFile: (filePath: string) => Promise<void>;
  extractDocument: (inputPdfPath: string) => Promise<ExtractedDocument>;
  writeTextFile: (filePath: string, content: string) => Promise<void>;
  readDirectory: (dirPath: string) => Promise<string[]>;
}

export async function convertPdfToOutline(
  { inputPdfPath, outputJsonPath, structure }: ConvertPdfToOutlineInput,
  dependencies: PdfToOutlineDependencies = createDefaultDependencies(),
): Promise<ConvertPdfToOutlineResult> {
  const resolvedInputPdfPath = resolve(inputPdfPath);
  const resolvedOutputJsonPath = resolve(outputJsonPath);

  await dependencies.assertReadableFile(resolvedInputPdfPath);
  const outline = extractOutline(await extractPdf(resolvedInputPdfPath, dependencies), structure);
  await dependencies.writeTextFile(resolvedOutputJsonPath, serializeOutline(outline));

  return { outputJsonPath: resolvedOutputJsonPath, outline };
}

export async function convertPdfDirectoryToOutlines(
  { inputDirPath, outputDirPath, structure }: ConvertPdfDirectoryInput,
  dependencies: PdfToOutlineDependencies = createDefaultDependencies(),
): Promise<ConvertedPdfFile[]> {
  const resolvedInputDirPath = resolve(inputDirPath);
  const resolvedOutputDirPath = resolve(outputDirPath);
  const pdfFileNames = (await dependencies.readDirectory(resolvedInputDirPath))
    .filter((fileName) => fileName.toLowerCase().endsWith(".pdf"))
    .sort((left, right) => left.localeCompare(right));

  console.log(`Processing ${pdfFileNames.length} PDF document(s)`);
  const startedAt = Date.now();
  const converted: ConvertedPdfFile[] = [];

  for (const fileName of pdfFileNames) {
    const fileStartedAt = Date.now();
    const inputPdfPath = join(resolvedInputDirPath, fileName);
    const outputJsonPath = join(resolvedOutputDirPath, `${parse(fileName).name}.json`);
    try {
      await convertPdfToOutline({ inputPdfPath, outputJsonPath, structure }, dependencies);
      console.log(`Processed ${fileName} -> ${parse(outputJsonPath).base} (${formatElapsed(fileStartedAt)})`);
      converted.push({ inputPdfPath, outputJsonPath, succeeded: true });
    } catch (error) {
      console.error(`Error processing ${fileName}: ${errorMessage(error)}`);
      await dependencies.writeTextFile(outputJsonPath, serializeOutline(createEmptyOutline()));
      converted.push({ inputPdfPath, outputJsonPath, succeeded: false });
    }
  }

  console.log(`Completed ${pdfFileNames.length} document(s) in ${formatElapsed(startedAt)}`);
  return converted;
}

async function extractPdf(
  inputPdfPath: string,
  dependencies: PdfToOutlineDependencies,
): Promise<ExtractedDocument> {
  try {
    return await dependencies.extractDocument(inputPdfPath);
  } catch (error) {
    throw createExtractionError(inputPdfPath, error);
  }
}

export function serializeOutline(outline: DocumentOutline): string {
  return `${JSON.stringify(outline, null, 2)}\n`;
}

function formatElapsed(startedAt: number): string {
  return `${((Date.now() - startedAt) / 1000).toFixed(2)}s`;
}

function createDefaultDependencies(): PdfToOutlineDependencies {
  return {
    assertReadableFile: (filePath) => assertReadableFile(filePath, "input PDF"),
    extractDocument,
    writeTextFile: async (filePath, content) => {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, content, "utf8");
    },
    readDirectory: (dirPath) => readdir(dirPath),
  };
}
