import { z } from "zod";

const DocumentEntrySchema = z.union([
  z.string().min(1),
  z.object({
    filename: z.string().min(1),
    title: z.string().optional(),
  }),
]);

const PersonaSchema = z.union([z.string(), z.object({ role: z.string() })]);
const JobSchema = z.union([z.string(), z.object({ task: z.string() })]);

export const CollectionConfigSchema = z.object({
  documents: z.array(DocumentEntrySchema).min(1),
  persona: PersonaSchema.optional(),
  job_to_be_done: JobSchema.optional(),
});

export type RawCollectionConfig = z.infer<typeof CollectionConfigSchema>;

export interface CollectionDocumentEntry {
  filename: string;
  title?: string;
}

export interface CollectionConfig {
  documents: CollectionDocumentEntry[];
  persona: string;
  jobToBeDone: string;
}

export function parseCollectionConfig(raw: unknown): CollectionConfig {
  const parsed = CollectionConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid collection input: ${issues}`);
  }
  return normalizeCollectionConfig(parsed.data);
}

export function parseCollectionConfigJson(json: string, sourcePath: string): CollectionConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new Error(`Collection input is not valid JSON: ${sourcePath}`, { cause: error });
  }
  return parseCollectionConfig(raw);
}

function normalizeCollectionConfig(config: RawCollectionConfig): CollectionConfig {
  const persona = typeof config.persona === "object" ? config.persona.role : config.persona;
  const job = typeof config.job_to_be_done === "object" ? config.job_to_be_done.task : config.job_to_be_done;
  return {
    documents: config.documents.map((entry) =>
      typeof entry === "string" ? { filename: entry } : { filename: entry.filename, title: entry.title },
    ),
    persona: (persona ?? "").trim(),
    jobToBeDone: (job ?? "").trim(),
  };
}
