import type { Document } from "../corpus/types.js";
import { tokenize } from "./tokenizer.js";

export type IndexedField = "title" | "category" | "content";

export const FIELD_WEIGHTS: Readonly<Record<IndexedField, number>> = {
  title: 3.0,
  category: 2.0,
  content: 1.0
};

const EMPTY_IDS: ReadonlySet<string> = new Set();
const EMPTY_FIELDS: ReadonlySet<IndexedField> = new Set();

const readTextField = (document: Document, key: string): string => {
  const value = document.metadata[key];
  return typeof value === "string" ? value : "";
};

/**
 * Inverted index over Document tokens. Each posting remembers which fields
 * the token occurred in. Instances are never mutated after construction;
 * a rebuild produces a new index.
 */
export class LexicalIndex {
  private readonly postingsByToken = new Map<string, Map<string, Set<IndexedField>>>();
  private readonly documentsById = new Map<string, Document>();
  private readonly ordinals = new Map<string, number>();
  private readonly orderedDocuments: readonly Document[];

  private constructor(documents: readonly Document[]) {
    this.orderedDocuments = Object.freeze([...documents]);
    documents.forEach((document, ordinal) => {
      if (this.documentsById.has(document.id)) {
        throw new Error(`Duplicate document id "${document.id}" in index build.`);
      }
      this.documentsById.set(document.id, document);
      this.ordinals.set(document.id, ordinal);
      this.addField(document.id, "title", readTextField(document, "title"));
      this.addField(document.id, "category", readTextField(document, "category"));
      this.addField(document.id, "content", document.content);
    });
  }

  static build(documents: readonly Document[]): LexicalIndex {
    return new LexicalIndex(documents);
  }

  get size(): number {
    return this.orderedDocuments.length;
  }

  postings(token: string): ReadonlySet<string> {
    const postings = this.postingsByToken.get(token.toLowerCase());
    return postings ? new Set(postings.keys()) : EMPTY_IDS;
  }

  fieldsFor(token: string, documentId: string): ReadonlySet<IndexedField> {
    return this.postingsByToken.get(token.toLowerCase())?.get(documentId) ?? EMPTY_FIELDS;
  }

  vocabulary(): string[] {
    return [...this.postingsByToken.keys()].sort();
  }

  document(documentId: string): Document | undefined {
    return this.documentsById.get(documentId);
  }

  /** Ingestion position of a document; unknown ids sort last. */
  ordinal(documentId: string): number {
    return this.ordinals.get(documentId) ?? Number.MAX_SAFE_INTEGER;
  }

  private addField(documentId: string, field: IndexedField, text: string): void {
    for (const token of tokenize(text)) {
      let postings = this.postingsByToken.get(token);
      if (!postings) {
        postings = new Map();
        this.postingsByToken.set(token, postings);
      }
      let fields = postings.get(documentId);
      if (!fields) {
        fields = new Set();
        postings.set(documentId, fields);
      }
      fields.add(field);
    }
  }
}

export const buildLexicalIndex = (documents: readonly Document[]): LexicalIndex => LexicalIndex.build(documents);
