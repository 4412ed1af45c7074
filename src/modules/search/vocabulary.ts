import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const intentKindSchema = z.enum(["pricing", "claiming", "definition"]);

const nonEmptyPhrases = z.array(z.string().trim().min(1)).min(1);

export const queryVocabularySchema = z.object({
  intents: z.array(
    z.object({
      intent: intentKindSchema,
      phrases: nonEmptyPhrases
    })
  ),
  regions: z.array(
    z.object({
      code: z.string().trim().min(1).transform((value) => value.toUpperCase()),
      names: nonEmptyPhrases,
      // Codes that are also everyday words ("act", "wa") only count when written in capitals.
      codeCaseSensitive: z.boolean().default(false)
    })
  ),
  categories: z.array(
    z.object({
      name: z.string().trim().min(1),
      aliases: nonEmptyPhrases
    })
  ),
  frameworks: z.array(
    z.object({
      framework: z.enum(["old", "new"]),
      phrases: nonEmptyPhrases
    })
  ),
  stopWords: z.array(z.string().trim().min(1)).default([])
});

export type QueryVocabulary = z.infer<typeof queryVocabularySchema>;

export const DEFAULT_VOCABULARY_FILE = fileURLToPath(
  new URL("../../../data/query-vocabulary.json", import.meta.url)
);

export class VocabularyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VocabularyError";
  }
}

export const parseQueryVocabulary = (raw: unknown): QueryVocabulary => {
  const parsed = queryVocabularySchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "vocabulary"}: ${issue.message}`)
      .join("\n");
    throw new VocabularyError(`Invalid query vocabulary:\n${details}`);
  }
  return parsed.data;
};

export const loadQueryVocabulary = (filePath: string = DEFAULT_VOCABULARY_FILE): QueryVocabulary => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown read error";
    throw new VocabularyError(`Could not read query vocabulary ${filePath}: ${message}`);
  }
  return parseQueryVocabulary(raw);
};

let defaultVocabulary: QueryVocabulary | null = null;

export const getDefaultVocabulary = (): QueryVocabulary => {
  if (!defaultVocabulary) {
    defaultVocabulary = loadQueryVocabulary();
  }
  return defaultVocabulary;
};
