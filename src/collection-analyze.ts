import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join, normalize, resolve, sep } from "node:path";
import type { AnalysisConfig, AnalysisOverrides } from "./analysis-config.ts";
import { resolveAnalysisConfig } from "./analysis-config.ts";
import type { CollectionConfig } from "./collection-config.ts";
import { parseCollectionConfigJson } from "./collection-config.ts";
import { analyzeDocumentStructure } from "./document-structure.ts";
import type { ExtractedDocument } from "./document-types.ts";
import { createExtractionError, errorMessage } from "./errors.ts";
import { assertReadableFile, extractDocument } from "./pdf-extract.ts";
import { createPersonaProfile } from "./persona-analyze.ts";
import type { DocumentSections } from "./relevance-score.ts";
import { scoreCollectionSections } from "./relevance-score.ts";
import type {
  CollectionAnalysisRecord,
  CollectionDocument,
  CollectionInput,
  PersonaProfile,
  RankedSection,
} from "./relevance-types.ts";
import { selectDiverseSections } from "./section-select.ts";

export interface CollectionRanking {
  profile: PersonaProfile;
  ranked: RankedSection[];
}

export function rankCollectionSections(
  input: CollectionInput,
  config: AnalysisConfig,
  documentTitles: ReadonlyMap<string, string> = new Map(),
): CollectionRanking {
  const profile = createPersonaProfile(input.persona, input.jobToBeDone);
  const documents: DocumentSections[] = [];
  input.documents.forEach((entry, order) => {
    const sections = collectDocumentSections(entry, order, config, documentTitles.get(entry.id));
    if (sections) documents.push(sections);
  });
  const scored = scoreCollectionSections(documents, profile, config);
  return { profile, ranked: selectDiverseSections(scored, config) };
}

function collectDocumentSections(
  entry: CollectionDocument,
  order: number,
  config: AnalysisConfig,
  fallbackTitle: string | undefined,
): DocumentSections | undefined {
  try {
    const structure = analyzeDocumentStructure(entry.document, config.structure);
    return {
      id: entry.id,
      order,
      title: structure.title || fallbackTitle || entry.id,
      sections: structure.sections,
    };
  } catch (error) {
    console.error(`Warning: skipping ${entry.id}: ${errorMessage(error)}`);
    return undefined;
  }
}

export function analyzeCollection(
  input: CollectionInput,
  overrides: AnalysisOverrides = {},
  now: () => Date = () => new Date(),
): CollectionAnalysisRecord {
  const config = resolveAnalysisConfig(overrides);
  const { ranked } = rankCollectionSections(input, config);
  return toCollectionRecord(input, ranked, now());
}

export function toCollectionRecord(
  input: CollectionInput,
  ranked: RankedSection[],
  timestamp: Date,
  inputDocuments: string[] = input.documents.map((entry) => entry.id),
): CollectionAnalysisRecord {
  return {
    metadata: {
      input_documents: inputDocuments,
      persona: input.persona,
      job_to_be_done: input.jobToBeDone,
      processing_timestamp: timestamp.toISOString(),
    },
    extracted_sections: ranked.map((entry) => ({
      document: entry.documentId,
      section_title: entry.section.title || entry.documentTitle,
      importance_rank: entry.importanceRank,
      page_number: entry.section.startPage,
    })),
    sub_section_analysis: ranked.map((entry) => ({
      document: entry.documentId,
      refined_text: entry.refinedText,
      page_number: entry.section.startPage,
    })),
  };
}

export interface AnalyzeCollectionFileInput {
  inputJsonPath: string;
  outputJsonPath: string;
  documentsDirPath?: string;
  overrides?: AnalysisOverrides;
}

export interface AnalyzeCollectionDirectoryInput {
  inputDirPath: string;
  outputJsonPath: string;
  overrides?: AnalysisOverrides;
}

export interface AnalyzeCollectionFileResult {
  outputJsonPath: string;
  record: CollectionAnalysisRecord;
}

export interface CollectionAnalysisDependencies {
  readTextFile: (filePath: string) => Promise<string>;
  readDirectory: (dirPath: string) => Promise<string[]>;
  extractDocument: (inputPdfPath: string) => Promise<ExtractedDocument>;
  writeTextFile: (filePath: string, content: string) => Promise<void>;
  now: () => Date;
}

export async function analyzeCollectionFile(
  { inputJsonPath, outputJsonPath, documentsDirPath, overrides = {} }: AnalyzeCollectionFileInput,
  dependencies: CollectionAnalysisDependencies = createDefaultDependencies(),
): Promise<AnalyzeCollectionFileResult> {
  const resolvedInputPath = resolve(inputJsonPath);
  const config = resolveAnalysisConfig(overrides);
  const collection = parseCollectionConfigJson(
    await dependencies.readTextFile(resolvedInputPath),
    resolvedInputPath,
  );
  return runCollectionAnalysis(
    {
      collection,
      source: resolvedInputPath,
      documentsDir: resolve(documentsDirPath ?? dirname(resolvedInputPath)),
      outputJsonPath: resolve(outputJsonPath),
      config,
    },
    dependencies,
  );
}

/**
 * Analyzes a directory: the first collection JSON in it, by name, when there is one,
 * otherwise every PDF in it under a blank persona and job.
 */
export async function analyzeCollectionDirectory(
  { inputDirPath, outputJsonPath, overrides = {} }: AnalyzeCollectionDirectoryInput,
  dependencies: CollectionAnalysisDependencies = createDefaultDependencies(),
): Promise<AnalyzeCollectionFileResult> {
  const resolvedInputDirPath = resolve(inputDirPath);
  const config = resolveAnalysisConfig(overrides);
  const fileNames = (await dependencies.readDirectory(resolvedInputDirPath)).sort((left, right) =>
    left.localeCompare(right),
  );

  const collectionFileName = fileNames.find((fileName) => fileName.toLowerCase().endsWith(".json"));
  if (collectionFileName) {
    console.log(`Using collection input ${collectionFileName}`);
    return analyzeCollectionFile(
      { inputJsonPath: join(resolvedInputDirPath, collectionFileName), outputJsonPath, overrides },
      dependencies,
    );
  }

  const pdfFileNames = fileNames.filter((fileName) => fileName.toLowerCase().endsWith(".pdf"));
  if (pdfFileNames.length === 0) {
    throw new Error(`No collection input or PDF documents in directory: ${resolvedInputDirPath}`);
  }
  console.log(`No collection input found; analyzing ${pdfFileNames.length} PDF document(s)`);
  return runCollectionAnalysis(
    {
      collection: {
        documents: pdfFileNames.map((filename) => ({ filename })),
        persona: "",
        jobToBeDone: "",
      },
      source: resolvedInputDirPath,
      documentsDir: resolvedInputDirPath,
      outputJsonPath: resolve(outputJsonPath),
      config,
    },
    dependencies,
  );
}

interface CollectionRun {
  collection: CollectionConfig;
  source: string;
  documentsDir: string;
  outputJsonPath: string;
  config: AnalysisConfig;
}

async function runCollectionAnalysis(
  { collection, source, documentsDir, outputJsonPath, config }: CollectionRun,
  dependencies: CollectionAnalysisDependencies,
): Promise<AnalyzeCollectionFileResult> {
  const startedAt = Date.now();
  const extracted = await Promise.all(
    collection.documents.map(async (entry): Promise<CollectionDocument | undefined> => {
      const pdfPath = resolve(documentsDir, entry.filename);
      try {
        return { id: documentId(entry.filename), document: await dependencies.extractDocument(pdfPath) };
      } catch (error) {
        console.error(`Warning: ${createExtractionError(pdfPath, error).message}`);
        return undefined;
      }
    }),
  );
  const documents = extracted.filter((entry): entry is CollectionDocument => entry !== undefined);
  if (documents.length === 0) {
    throw new Error(`No readable documents in collection: ${source}`);
  }

  const input: CollectionInput = {
    documents,
    persona: collection.persona,
    jobToBeDone: collection.jobToBeDone,
  };
  const documentTitles = new Map(
    collection.documents.flatMap((entry) =>
      entry.title ? [[documentId(entry.filename), entry.title] as const] : [],
    ),
  );
  const { ranked } = rankCollectionSections(input, config, documentTitles);
  const record = toCollectionRecord(
    input,
    ranked,
    dependencies.now(),
    collection.documents.map((entry) => documentId(entry.filename)),
  );

  await dependencies.writeTextFile(outputJsonPath, `${JSON.stringify(record, null, 2)}\n`);
  const elapsedSeconds = ((Date.now() - startedAt) / 1000).toFixed(2);
  console.log(
    `Analyzed ${documents.length} document(s) in ${elapsedSeconds}s; selected ${ranked.length} section(s)`,
  );
  return { outputJsonPath, record };
}

// Documents are named by their path relative to the documents directory, so same-named files in
// different subdirectories stay distinct.
export function documentId(filename: string): string {
  return normalize(filename).split(sep).join("/");
}

export function createDefaultDependencies(): CollectionAnalysisDependencies {
  return {
    readTextFile: async (filePath) => {
      await assertReadableFile(filePath, "collection input");
      return readFile(filePath, "utf8");
    },
    readDirectory: (dirPath) => readdir(dirPath),
    extractDocument,
    writeTextFile: async (filePath, content) => {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, content, "utf8");
    },
    now: () => new Date(),
  };
}
