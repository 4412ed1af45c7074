import type { MalformedRecordReason, SourceKind } from "./corpus/types.js";

export type RetrievalErrorCode =
  | "malformed_record"
  | "embedding_unavailable"
  | "generation_unavailable"
  | "budget_too_small"
  | "query_aborted"
  | "corpus_not_loaded";

export abstract class RetrievalError extends Error {
  abstract readonly code: RetrievalErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedRecord extends RetrievalError {
  readonly code = "malformed_record";

  constructor(
    readonly recordIndex: number,
    readonly sourceKind: SourceKind,
    readonly reason: MalformedRecordReason,
    message: string
  ) {
    super(message);
  }
}

export class EmbeddingUnavailable extends RetrievalError {
  readonly code = "embedding_unavailable";
}

export class GenerationUnavailable extends RetrievalError {
  readonly code = "generation_unavailable";
}

export class BudgetTooSmall extends RetrievalError {
  readonly code = "budget_too_small";

  constructor(
    readonly budget: number,
    readonly requiredSize: number
  ) {
    super(`Context budget ${budget} cannot fit the top-ranked document (size ${requiredSize}).`);
  }
}

export class QueryAbortedError extends RetrievalError {
  readonly code = "query_aborted";

  constructor() {
    super("Query was aborted by the caller.");
  }
}

export class CorpusNotLoadedError extends RetrievalError {
  readonly code = "corpus_not_loaded";

  constructor() {
    super("Corpus has not been loaded yet.");
  }
}
