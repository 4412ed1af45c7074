import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

const runtimeModeSchema = z.enum(["local", "prod"]);

const DOTENV_LINE = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*?)\s*$/;
const QUOTED = /^(["'])(.*)\1$/;

/** Parses `KEY=value` lines; comments, blank lines and keyless lines are skipped. */
export function parseDotEnv(content: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const line of content.split(/\r?\n/)) {
    if (line.trimStart().startsWith("#")) {
      continue;
    }
    const match = DOTENV_LINE.exec(line);
    if (!match) {
      continue;
    }
    const [, key, rawValue] = match;
    entries.set(key, rawValue.replace(QUOTED, "$2"));
  }
  return entries;
}

const readIfPresent = (filePath: string): string | undefined =>
  fs.existsSync(filePath) ? fs.readFileSync(filePath, "utf8") : undefined;

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  readFile?: (filePath: string) => string | undefined;
}

/**
 * Applies `.env.<APP_MODE>` (or the first of `.env.local`, `.env.prod`
 * when no mode is set) on top of the environment. Variables that are
 * already set win.
 */
export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): string | null {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const readFile = options.readFile ?? readIfPresent;
  const mode = runtimeModeSchema.safeParse(processEnv.APP_MODE?.trim().toLowerCase());
  const modes = mode.success ? [mode.data] : runtimeModeSchema.options;

  for (const candidateMode of modes) {
    const envFilePath = path.join(cwd, `.env.${candidateMode}`);
    const content = readFile(envFilePath);
    if (content === undefined) {
      continue;
    }
    for (const [key, value] of parseDotEnv(content)) {
      processEnv[key] ??= value;
    }
    return envFilePath;
  }
  return null;
}

if (process.env.NODE_ENV !== "test") {
  loadModeEnvFile();
}

const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });

const optionalTrimmed = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

export const envSchema = z.object({
  APP_MODE: runtimeModeSchema.default("prod"),
  PORT: z.coerce.number().int().positive().default(3000),
  FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:5173"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),
  OPENAI_API_KEY: optionalTrimmed,
  OPENAI_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  MOCK_PROVIDER: booleanFlagSchema.default(false),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(7000),
  CORPUS_FILE: optionalTrimmed,
  EMBEDDING_CACHE_FILE: optionalTrimmed,
  EMBED_ON_STARTUP: booleanFlagSchema.default(false),
  SEARCH_MAX_RESULTS: z.coerce.number().int().positive().max(200).default(20),
  SEMANTIC_BLEND_WEIGHT: z.coerce.number().min(0).max(1).default(0.5),
  CONTEXT_BUDGET_CHARS: z.coerce.number().int().positive().default(6000)
}).superRefine((value, ctx) => {
  if (value.APP_MODE === "prod" && value.EMBED_ON_STARTUP && !value.OPENAI_API_KEY && !value.MOCK_PROVIDER) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["OPENAI_API_KEY"],
      message: "OPENAI_API_KEY is required when EMBED_ON_STARTUP is enabled in prod mode"
    });
  }
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return parsed.data;
}

export const env: Env = parseEnv(process.env);
