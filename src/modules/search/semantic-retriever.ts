import type { Document } from "../corpus/types.js";
import { EmbeddingUnavailable } from "../errors.js";
import { compareRanked } from "./ranking.js";

export type SemanticMatch = {
  documentId: string;
  similarity: number;
};

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Flat cosine scan over document embeddings. */
export class SemanticRetriever {
  private readonly ordinals = new Map<string, number>();

  constructor(private readonly documents: readonly Document[]) {
    documents.forEach((document, ordinal) => this.ordinals.set(document.id, ordinal));
  }

  get ready(): boolean {
    return this.documents.length > 0 && this.documents.every((document) => document.embedding !== undefined);
  }

  get missingEmbeddingCount(): number {
    return this.documents.filter((document) => document.embedding === undefined).length;
  }

  search(queryEmbedding: readonly number[], topK: number): SemanticMatch[] {
    if (queryEmbedding.length === 0) {
      throw new EmbeddingUnavailable("Query embedding is empty.");
    }

    const scored: Array<SemanticMatch & { score: number }> = [];
    for (const document of this.documents) {
      const embedding = document.embedding;
      if (!embedding) {
        throw new EmbeddingUnavailable(`Document ${document.id} has no embedding yet.`);
      }
      if (embedding.length !== queryEmbedding.length) {
        throw new EmbeddingUnavailable(
          `Document ${document.id} embedding has ${embedding.length} dimensions, query has ${queryEmbedding.length}.`
        );
      }
      const similarity = cosineSimilarity(queryEmbedding, embedding);
      scored.push({ documentId: document.id, similarity, score: similarity });
    }

    const ordinal = (documentId: string): number => this.ordinals.get(documentId) ?? Number.MAX_SAFE_INTEGER;
    return scored
      .sort(compareRanked(ordinal))
      .slice(0, Math.max(0, topK))
      .map(({ documentId, similarity }) => ({ documentId, similarity }));
  }
}
