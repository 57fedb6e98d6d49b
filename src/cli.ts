#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import type { AnalysisOverrides } from "./analysis-config.ts";
import { analyzeCollectionDirectory, analyzeCollectionFile } from "./collection-analyze.ts";
import { errorMessage } from "./errors.ts";
import { convertPdfDirectoryToOutlines, convertPdfToOutline } from "./pdf-to-outline.ts";

interface AnalyzeOptions {
  documentsDir?: string;
  topK?: number;
  maxPerDocument?: number;
  minScore?: number;
}

const program = new Command();

program
  .name("pdf-outline")
  .description("Extract PDF outlines and rank document sections for a persona")
  .showHelpAfterError();

program
  .command("outline")
  .description("Write the title and H1-H3 outline of a PDF as JSON")
  .argument("<pdfPath>", "Path to input PDF file")
  .argument("<outputJsonPath>", "Path to output JSON file")
  .action(async (pdfPath: string, outputJsonPath: string) => {
    const conversion = await convertPdfToOutline({ inputPdfPath: pdfPath, outputJsonPath });
    console.log(
      `Generated outline with ${conversion.outline.outline.length} heading(s) at ${conversion.outputJsonPath}`,
    );
  });

program
  .command("outline-dir")
  .description("Write an outline JSON file for every PDF in a directory")
  .argument("<inputDir>", "Directory containing PDF files")
  .argument("<outputDir>", "Directory for the JSON outlines")
  .action(async (inputDir: string, outputDir: string) => {
    const converted = await convertPdfDirectoryToOutlines({ inputDirPath: inputDir, outputDirPath: outputDir });
    const failed = converted.filter((file) => !file.succeeded).length;
    if (failed > 0) console.error(`${failed} document(s) fell back to an empty outline`);
  });

program
  .command("analyze")
  .description("Rank the sections of a document collection for a persona and job")
  .argument("<inputJsonPath>", "Collection input JSON naming documents, persona and job")
  .argument("<outputJsonPath>", "Path to output JSON file")
  .option("--documents-dir <dir>", "Directory the document file names resolve against")
  .option("--top-k <count>", "Number of sections to select", parsePositiveInteger)
  .option("--max-per-document <count>", "Sections allowed per document", parsePositiveInteger)
  .option("--min-score <score>", "Minimum relevance score between 0 and 1", parseUnitInterval)
  .action(async (inputJsonPath: string, outputJsonPath: string, options: AnalyzeOptions) => {
    const analysis = await analyzeCollectionFile({
      inputJsonPath,
      outputJsonPath,
      documentsDirPath: options.documentsDir,
      overrides: toOverrides(options),
    });
    console.log(`Generated analysis at ${analysis.outputJsonPath}`);
  });

program
  .command("analyze-dir")
  .description("Rank sections using the first collection JSON in a directory, or every PDF in it")
  .argument("<inputDir>", "Directory with a collection JSON or PDF files")
  .argument("<outputJsonPath>", "Path to output JSON file")
  .option("--top-k <count>", "Number of sections to select", parsePositiveInteger)
  .option("--max-per-document <count>", "Sections allowed per document", parsePositiveInteger)
  .option("--min-score <score>", "Minimum relevance score between 0 and 1", parseUnitInterval)
  .action(async (inputDir: string, outputJsonPath: string, options: AnalyzeOptions) => {
    const analysis = await analyzeCollectionDirectory({
      inputDirPath: inputDir,
      outputJsonPath,
      overrides: toOverrides(options),
    });
    console.log(`Generated analysis at ${analysis.outputJsonPath}`);
  });

program.action(() => {
  program.outputHelp();
});

function toOverrides(options: AnalyzeOptions): AnalysisOverrides {
  const overrides: AnalysisOverrides = {};
  if (options.topK !== undefined) overrides.topK = options.topK;
  if (options.maxPerDocument !== undefined) overrides.maxPerDocument = options.maxPerDocument;
  if (options.minScore !== undefined) overrides.minScore = options.minScore;
  return overrides;
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function parseUnitInterval(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError("Expected a number between 0 and 1.");
  }
  return parsed;
}

void program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exitCode = 1;
});
