import fs from "node:fs/promises";
import { z } from "zod";
import { recordsFromGuideExport } from "./guide-export.js";
import { SOURCE_KINDS, type RawRecord } from "./types.js";

const sourceKindSchema = z.enum(SOURCE_KINDS);

const recordsFileSchema = z.object({
  records: z.array(
    z.object({
      sourceKind: sourceKindSchema,
      fields: z.record(z.string(), z.unknown())
    })
  )
});

const guideExportFileSchema = z.object({
  support_items: z.array(z.record(z.string(), z.unknown())).optional(),
  claiming_rules: z.record(z.string(), z.record(z.string(), z.unknown())).optional(),
  guidance_markdown: z.string().optional()
});

export class CorpusFileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CorpusFileError";
  }
}

/** Accepts either `{ records: [...] }` or the ingestor's export shape. */
export const parseCorpusFile = (raw: unknown): RawRecord[] => {
  const asRecords = recordsFileSchema.safeParse(raw);
  if (asRecords.success) {
    return asRecords.data.records;
  }

  const asExport = guideExportFileSchema.safeParse(raw);
  if (asExport.success && Object.keys(asExport.data).length > 0) {
    return recordsFromGuideExport(asExport.data);
  }

  const details = asRecords.error.issues
    .slice(0, 5)
    .map((issue) => `- ${issue.path.join(".") || "corpus"}: ${issue.message}`)
    .join("\n");
  throw new CorpusFileError(`Corpus file is neither a record list nor a guide export:\n${details}`);
};

/** Failure messages never quote file content; the underlying error is kept as `cause`. */
export const loadCorpusFile = async (filePath: string): Promise<RawRecord[]> => {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new CorpusFileError(`Could not read corpus file ${filePath}.`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CorpusFileError(`Corpus file ${filePath} is not valid JSON.`, { cause: error });
  }
  return parseCorpusFile(raw);
};
