import { logInfo } from "../../observability/logger.js";
import { NO_MATCH_ANSWER } from "../../prompts/index.js";
import { resolveCitedLabels, type Citation } from "../context/citation-builder.js";
import { assemble, type ContextBlock, type ContextBudget } from "../context/context-assembler.js";
import { GenerationUnavailable } from "../errors.js";
import type { EmbeddingGenerationProvider } from "../provider/types.js";
import type { QueryOrchestrator } from "../search/query-orchestrator.js";
import type { QueryFilters, RetrievalOutcome, SearchMode } from "../search/types.js";

export type RequestOptions = {
  requestId?: string;
  signal?: AbortSignal;
  maxResults?: number;
};

export type AnswerContext = {
  outcome: RetrievalOutcome;
  context: ContextBlock;
};

export type AskOptions = RequestOptions & {
  filters?: QueryFilters;
  mode?: SearchMode;
  budget?: ContextBudget;
};

export type Answer = {
  answer: string;
  generated: boolean;
  citations: Citation[];
  cited: Citation[];
  unresolvedLabels: string[];
  outcome: RetrievalOutcome;
  context: ContextBlock;
};

export interface AnswerServiceDependencies {
  orchestrator: QueryOrchestrator;
  provider?: EmbeddingGenerationProvider | null;
  defaultBudget?: ContextBudget;
  logInfo?: typeof logInfo;
}

const DEFAULT_CONTEXT_BUDGET = 6000;

export class AnswerService {
  private readonly orchestrator: QueryOrchestrator;
  private readonly provider: EmbeddingGenerationProvider | null;
  private readonly defaultBudget: ContextBudget;
  private readonly log: typeof logInfo;

  constructor(dependencies: AnswerServiceDependencies) {
    this.orchestrator = dependencies.orchestrator;
    this.provider = dependencies.provider ?? null;
    this.defaultBudget = dependencies.defaultBudget ?? DEFAULT_CONTEXT_BUDGET;
    this.log = dependencies.logInfo ?? logInfo;
  }

  search(
    text: string,
    filters: QueryFilters = {},
    mode: SearchMode = "lexical",
    options: RequestOptions = {}
  ): Promise<RetrievalOutcome> {
    return this.orchestrator.retrieve(text, {
      filters,
      semantic: mode === "hybrid",
      maxResults: options.maxResults,
      requestId: options.requestId,
      signal: options.signal
    });
  }

  async answerContext(
    text: string,
    filters: QueryFilters = {},
    budget: ContextBudget = this.defaultBudget,
    options: RequestOptions & { mode?: SearchMode } = {}
  ): Promise<AnswerContext> {
    const outcome = await this.search(text, filters, options.mode, options);
    return { outcome, context: assemble(outcome.results, budget) };
  }

  /**
   * Retrieves, assembles and generates. When nothing matched, the fixed
   * no-match answer is returned and the generator is not called.
   */
  async ask(question: string, options: AskOptions = {}): Promise<Answer> {
    const { outcome, context } = await this.answerContext(
      question,
      options.filters,
      options.budget ?? this.defaultBudget,
      options
    );

    if (outcome.results.length === 0) {
      return {
        answer: NO_MATCH_ANSWER,
        generated: false,
        citations: [],
        cited: [],
        unresolvedLabels: [],
        outcome,
        context
      };
    }

    if (!this.provider) {
      throw new GenerationUnavailable("No generation provider is configured.");
    }

    const answer = await this.provider.generate(context.rendered, question, {
      signal: options.signal,
      requestId: options.requestId
    });
    const { cited, unresolvedLabels } = resolveCitedLabels(answer, context.citations);

    this.log("assistant.answer.complete", { requestId: options.requestId }, {
      provider: this.provider.name,
      context_documents: context.entries.length,
      cited_count: cited.length,
      unresolved_labels: unresolvedLabels
    });

    return {
      answer,
      generated: true,
      citations: context.citations,
      cited,
      unresolvedLabels,
      outcome,
      context
    };
  }
}
