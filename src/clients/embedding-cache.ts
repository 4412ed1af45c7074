import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Document } from "../modules/corpus/types.js";

const cacheFileSchema = z.object({
  entries: z.record(z.string(), z.array(z.number()))
});

type CacheShape = z.infer<typeof cacheFileSchema>;

export interface EmbeddingCache {
  readonly filePath: string | null;
  readonly size: number;
  get(key: string): number[] | undefined;
  set(key: string, vector: readonly number[]): void;
  /** Drops every entry whose key is not in `keep`; returns how many were dropped. */
  prune(keep: ReadonlySet<string>): number;
  flush(): Promise<void>;
}

/** Keyed by id and content hash, so edited records miss the cache. */
export const embeddingCacheKey = (document: Pick<Document, "id" | "contentHash">): string =>
  `${document.id}:${document.contentHash}`;

function resolveCachePath(configured: string): string {
  return path.isAbsolute(configured) ? configured : path.resolve(process.cwd(), configured);
}

async function readCache(filePath: string): Promise<CacheShape> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { entries: {} };
    }
    throw error;
  }

  const parsed = cacheFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Embedding cache ${filePath} is malformed: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
  }
  return parsed.data;
}

async function writeCache(filePath: string, cache: CacheShape): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  await fs.writeFile(tempPath, JSON.stringify(cache), "utf8");
  await fs.rename(tempPath, filePath);
}

/** Opens a persisted cache when a path is given, otherwise a process-local one. */
export async function openEmbeddingCache(configuredPath?: string): Promise<EmbeddingCache> {
  const filePath = configuredPath ? resolveCachePath(configuredPath) : null;
  const initial = filePath ? await readCache(filePath) : { entries: {} };
  const entries = new Map<string, number[]>(Object.entries(initial.entries));
  let dirty = false;

  return {
    filePath,

    get size() {
      return entries.size;
    },

    get(key) {
      return entries.get(key);
    },

    set(key, vector) {
      entries.set(key, [...vector]);
      dirty = true;
    },

    prune(keep) {
      let dropped = 0;
      for (const key of [...entries.keys()]) {
        if (!keep.has(key)) {
          entries.delete(key);
          dropped += 1;
        }
      }
      if (dropped > 0) {
        dirty = true;
      }
      return dropped;
    },

    async flush() {
      if (!filePath || !dirty) {
        return;
      }
      await writeCache(filePath, { entries: Object.fromEntries(entries) });
      dirty = false;
    }
  };
}
