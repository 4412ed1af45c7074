import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { AnswerService } from "../../modules/assistant/answer-service.js";
import type { ContextBlock } from "../../modules/context/context-assembler.js";
import type { RetrievalOutcome, RetrievalResult } from "../../modules/search/types.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { abortOnDisconnect, resolveRequestId, sendDomainError, toValidationError } from "./errors.js";

const filtersSchema = z
  .object({
    region: z.string().trim().min(1).optional(),
    category: z.string().trim().min(1).optional(),
    framework: z.enum(["old", "new"]).optional()
  })
  .strict();

const budgetSchema = z.union([
  z.number().int().nonnegative(),
  z.object({
    limit: z.number().int().nonnegative(),
    unit: z.enum(["characters", "tokens"]).optional()
  })
]);

const searchBodySchema = z.object({
  query: z.string().trim().min(1, "query is required"),
  filters: filtersSchema.optional(),
  mode: z.enum(["lexical", "hybrid"]).optional(),
  max_results: z.number().int().positive().max(200).optional()
});

const contextBodySchema = searchBodySchema.extend({
  budget: budgetSchema.optional()
});

const answerBodySchema = z.object({
  question: z.string().trim().min(1, "question is required"),
  filters: filtersSchema.optional(),
  mode: z.enum(["lexical", "hybrid"]).optional(),
  max_results: z.number().int().positive().max(200).optional(),
  budget: budgetSchema.optional()
});

export const serializeResult = (result: RetrievalResult) => ({
  id: result.document.id,
  source_kind: result.document.sourceKind,
  score: result.score,
  lexical_score: result.lexicalScore,
  similarity: result.similarity ?? null,
  matched_terms: result.matchedTerms,
  metadata: result.document.metadata,
  content: result.document.content
});

export const serializeOutcome = (outcome: RetrievalOutcome) => ({
  query: outcome.query,
  intent: {
    kind: outcome.intent.kind,
    matched_phrase: outcome.intent.matchedPhrase ?? null
  },
  filters: outcome.filters,
  results: outcome.results.map(serializeResult),
  suggestions: outcome.suggestions,
  semantic: outcome.semantic,
  semantic_error: outcome.semanticError ?? null,
  latency_ms: outcome.latencyMs
});

const serializeContext = (context: ContextBlock) => ({
  rendered: context.rendered,
  total_size: context.totalSize,
  budget: context.budget,
  skipped_document_ids: context.skippedDocumentIds,
  citations: context.citations.map((citation) => ({
    label: citation.label,
    document_id: citation.documentId,
    source_kind: citation.sourceKind,
    title: citation.title ?? null,
    item_number: citation.itemNumber ?? null,
    score: citation.score
  }))
});

export interface SearchRoutesDependencies {
  answers: Pick<AnswerService, "search" | "answerContext" | "ask">;
}

const withDomainErrors =
  <T extends z.ZodTypeAny>(
    schema: T,
    handle: (body: z.output<T>, context: { requestId: string; signal: AbortSignal }) => Promise<unknown>
  ) =>
  async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const requestId = resolveRequestId(request);
    const parsed = schema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422).send(toValidationError(parsed.error));
      return;
    }

    try {
      const payload = await handle(parsed.data, { requestId, signal: abortOnDisconnect(reply) });
      reply.send(payload);
    } catch (error) {
      sendDomainError(reply, error, requestId);
    }
  };

export async function registerSearchRoutes(app: FastifyInstance, dependencies: SearchRoutesDependencies): Promise<void> {
  const { answers } = dependencies;

  app.post(
    "/api/search",
    withDomainErrors(searchBodySchema, async (body, context) =>
      serializeOutcome(
        await answers.search(body.query, body.filters, body.mode, { ...context, maxResults: body.max_results })
      )
    )
  );

  app.post(
    "/api/context",
    withDomainErrors(contextBodySchema, async (body, context) => {
      const result = await answers.answerContext(body.query, body.filters, body.budget, {
        ...context,
        mode: body.mode,
        maxResults: body.max_results
      });
      return {
        ...serializeOutcome(result.outcome),
        context: serializeContext(result.context)
      };
    })
  );

  app.post(
    "/api/answer",
    withDomainErrors(answerBodySchema, async (body, context) => {
      const answer = await answers.ask(body.question, {
        ...context,
        filters: body.filters,
        mode: body.mode,
        budget: body.budget,
        maxResults: body.max_results
      });
      const serialized = serializeContext(answer.context);
      return {
        answer: answer.answer,
        generated: answer.generated,
        cited_labels: answer.cited.map((citation) => citation.label),
        unresolved_labels: answer.unresolvedLabels,
        citations: serialized.citations,
        suggestions: answer.outcome.suggestions,
        semantic: answer.outcome.semantic,
        semantic_error: answer.outcome.semanticError ?? null
      };
    })
  );
}
