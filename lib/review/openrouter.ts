/**
 * OpenRouter client — uses Vercel AI SDK pointed at the OpenRouter endpoint.
 *
 * OpenRouter acts as a gateway to all LLM providers via a single API key.
 * Each reviewer carries a chain of models: a rate limit (429) or a missing
 * model (404) moves the request down the chain; other failures are retried
 * on the same model with exponential backoff.
 */

import { setTimeout as delay } from "node:timers/promises";
import { createOpenAI } from "@ai-sdk/openai";
import { APICallError, generateText } from "ai";
import { BackendError, type BackendErrorKind } from "./errors";
import { buildReviewRequest, buildReviewerSystemPrompt } from "./prompts";
import type {
  ReviewBackend,
  ReviewDocument,
  ReviewReply,
  ReviewerConfig,
} from "./types";

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

/**
 * Create a Vercel AI SDK provider configured for OpenRouter.
 */
function getOpenRouterProvider() {
  const apiKey = process.env.OPENROUTER_API_KEY;
  if (!apiKey) {
    throw new BackendError(
      "auth",
      "OPENROUTER_API_KEY environment variable is not set"
    );
  }

  return createOpenAI({
    baseURL: OPENROUTER_BASE_URL,
    apiKey,
  });
}

export interface ReviewRequest {
  system: string;
  document: ReviewDocument;
}

export interface RequestOptions {
  /** Per-call timeout in milliseconds (default 120s) */
  timeoutMs?: number;
  /** Retries on the same model after the first attempt (default 3) */
  maxRetries?: number;
  /** First backoff delay; doubles after each retry (default 2s) */
  initialBackoffMs?: number;
  maxOutputTokens?: number;
  signal?: AbortSignal;
}

function classifyStatus(statusCode: number | undefined): BackendErrorKind {
  if (statusCode === 429) return "rate_limit";
  if (statusCode === 401 || statusCode === 403) return "auth";
  if (statusCode === 404) return "not_found";
  return "unavailable";
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Send one review request down a model fallback chain.
 *
 * @param models - OpenRouter model ids, best first
 * @returns The review text and the model that produced it
 * @throws BackendError once every model and retry is exhausted
 */
export async function requestReview(
  models: string[],
  request: ReviewRequest,
  options: RequestOptions = {}
): Promise<ReviewReply> {
  if (models.length === 0) {
    throw new BackendError("not_found", "No reviewer models configured");
  }

  const provider = getOpenRouterProvider();
  const timeoutMs = options.timeoutMs ?? 120_000;
  const maxRetries = options.maxRetries ?? 3;
  let backoffMs = options.initialBackoffMs ?? 2_000;
  let modelIndex = 0;
  let retryCount = 0;

  for (;;) {
    const model = models[modelIndex];
    const start = Date.now();
    const timeout = AbortSignal.timeout(timeoutMs);
    const abortSignal = options.signal
      ? AbortSignal.any([options.signal, timeout])
      : timeout;

    let failure: BackendError;
    try {
      const result = await generateText({
        model: provider.chat(model),
        system: request.system,
        messages: [
          {
            role: "user",
            content: [
              { type: "text", text: buildReviewRequest(request.document.filename) },
              {
                type: "file",
                data: request.document.data,
                mediaType: "application/pdf",
                filename: request.document.filename,
              },
            ],
          },
        ],
        maxOutputTokens: options.maxOutputTokens ?? 4_000,
        maxRetries: 0,
        abortSignal,
      });

      if (result.text.trim().length === 0) {
        throw new BackendError("empty_response", `${model} returned no text`);
      }

      return {
        text: result.text,
        model,
        downgraded: modelIndex > 0,
        responseTimeMs: Date.now() - start,
      };
    } catch (error) {
      if (options.signal?.aborted) {
        throw new BackendError("aborted", `Review request to ${model} was cancelled`);
      }
      if (error instanceof BackendError) {
        failure = error;
      } else if (APICallError.isInstance(error)) {
        failure = new BackendError(
          classifyStatus(error.statusCode),
          `${model}: ${error.message}`,
          error.statusCode
        );
      } else if (timeout.aborted) {
        failure = new BackendError("aborted", `${model} timed out after ${timeoutMs}ms`);
      } else {
        failure = new BackendError("unavailable", `${model}: ${describe(error)}`);
      }
    }

    if (
      (failure.kind === "rate_limit" || failure.kind === "not_found") &&
      modelIndex < models.length - 1
    ) {
      modelIndex += 1;
      retryCount = 0;
      console.warn(
        `[openrouter] ${failure.message} — downgrading to ${models[modelIndex]}`
      );
      continue;
    }

    if (
      failure.kind === "auth" ||
      failure.kind === "empty_response" ||
      retryCount >= maxRetries
    ) {
      console.error(`[openrouter] Giving up on ${model}:`, failure.message);
      throw failure;
    }

    retryCount += 1;
    console.warn(
      `[openrouter] ${failure.message} — retry ${retryCount}/${maxRetries} in ${backoffMs}ms`
    );
    try {
      await delay(backoffMs, undefined, { signal: options.signal });
    } catch {
      throw new BackendError("aborted", `Review request to ${model} was cancelled`);
    }
    backoffMs *= 2;
  }
}

/**
 * ReviewBackend backed by OpenRouter, one request chain per reviewer.
 */
export function createOpenRouterBackend(
  options: Omit<RequestOptions, "signal"> = {}
): ReviewBackend {
  return {
    review(
      reviewer: ReviewerConfig,
      document: ReviewDocument,
      signal: AbortSignal
    ) {
      return requestReview(
        reviewer.models,
        { system: buildReviewerSystemPrompt(reviewer), document },
        { ...options, signal }
      );
    },
  };
}
