import type { FastifyReply, FastifyRequest } from "fastify";
import type { z } from "zod";
import { CorpusFileError } from "../../modules/corpus/corpus-loader.js";
import { BudgetTooSmall, RetrievalError, type RetrievalErrorCode } from "../../modules/errors.js";
import { errorFields, logWarn } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { CorpusSourceMissingError } from "../../runtime.js";

export const toValidationError = (error: z.ZodError) => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: ["body", ...issue.path],
    msg: issue.message
  }))
});

export const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

/** Aborts when the client goes away before the response is written. */
export const abortOnDisconnect = (reply: FastifyReply): AbortSignal => {
  const controller = new AbortController();
  reply.raw.once("close", () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
};

const CLIENT_CLOSED_REQUEST = 499;

const STATUS_BY_CODE: Record<RetrievalErrorCode, number> = {
  malformed_record: 422,
  budget_too_small: 409,
  embedding_unavailable: 503,
  generation_unavailable: 503,
  corpus_not_loaded: 503,
  query_aborted: CLIENT_CLOSED_REQUEST
};

/**
 * Maps domain failures to HTTP responses. Anything unrecognised is
 * rethrown so Fastify's default 500 handling applies.
 */
export const sendDomainError = (reply: FastifyReply, error: unknown, requestId: string): void => {
  if (error instanceof RetrievalError) {
    const statusCode = STATUS_BY_CODE[error.code];
    recordErrorRate(error.code);
    logWarn("api.request.failed", { requestId }, { status: statusCode, ...errorFields(error) });
    const body: Record<string, unknown> = { detail: error.message, code: error.code };
    if (error instanceof BudgetTooSmall) {
      body.budget = error.budget;
      body.required_size = error.requiredSize;
    }
    reply.code(statusCode).send(body);
    return;
  }

  if (error instanceof RangeError || error instanceof CorpusFileError || error instanceof CorpusSourceMissingError) {
    recordErrorRate("validation_422");
    if (error instanceof CorpusFileError) {
      logWarn("api.corpus.file_rejected", { requestId }, { ...errorFields(error), cause: errorFields(error.cause) });
    }
    reply.code(422).send({ detail: error.message });
    return;
  }

  throw error;
};
