import { tokenize } from "../search/tokenizer.js";
import type { EmbeddingGenerationProvider } from "./types.js";

const MOCK_DIMENSIONS = 64;

const fnv1a = (value: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
};

/** Feature-hashed bag of tokens, so texts sharing words land close together. */
export const hashedEmbedding = (text: string, dimensions: number = MOCK_DIMENSIONS): number[] => {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of tokenize(text)) {
    const hash = fnv1a(token);
    vector[hash % dimensions] += (hash & 1) === 0 ? 1 : -1;
  }
  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  return norm === 0 ? vector : vector.map((value) => value / norm);
};

const firstContextLine = (promptContext: string): string => {
  const lines = promptContext.split("\n").map((line) => line.trim());
  const headerIndex = lines.findIndex((line) => line.startsWith("[Document 1"));
  return headerIndex >= 0 ? (lines[headerIndex + 1] ?? "") : "";
};

/** Offline stand-in enabled with MOCK_PROVIDER=1 for local runs. */
export function createMockProvider(): EmbeddingGenerationProvider {
  return {
    name: "mock",

    async embed(text) {
      return hashedEmbedding(text);
    },

    async generate(promptContext, question) {
      const excerpt = firstContextLine(promptContext);
      if (!excerpt) {
        return `The provided context does not answer "${question}".`;
      }
      return `According to Document 1, ${excerpt}`;
    }
  };
}
