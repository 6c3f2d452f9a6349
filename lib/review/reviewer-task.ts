/**
 * Reviewer Task — one reviewer's evaluation of one submission.
 *
 * Calls the backend, classifies the reply, writes the optional report
 * artifact and persists exactly one Decision. A task never throws: every
 * failure ends as an ERROR decision or as a logged, reported status, so
 * sibling tasks and the coordinator keep running.
 */

import type { ArtifactStore } from "./artifacts";
import { parseDecision, type ParsedDecision } from "./decision-parser";
import { describeReviewFailure, isReviewError } from "./errors";
import type { SubmissionStore } from "./store";
import type {
  DecisionRecord,
  NewDecision,
  ReviewBackend,
  ReviewDocument,
  ReviewerConfig,
  ReviewReply,
} from "./types";

export interface ReviewerTaskInput {
  submissionId: string;
  reviewer: ReviewerConfig;
  document: ReviewDocument;
  signal: AbortSignal;
}

export interface ReviewerTaskDeps {
  store: SubmissionStore;
  backend: ReviewBackend;
  artifacts?: ArtifactStore;
}

/**
 * recorded   — this task wrote the reviewer's Decision
 * superseded — another writer (the timeout sweep) got there first
 * abandoned  — the coordinator aborted the task; it wrote nothing
 * failed     — the Decision could not be persisted
 */
export type ReviewerTaskStatus = "recorded" | "superseded" | "abandoned" | "failed";

export interface ReviewerTaskResult {
  reviewerName: string;
  status: ReviewerTaskStatus;
  decision: DecisionRecord | null;
}

async function buildDecision(
  input: ReviewerTaskInput,
  deps: ReviewerTaskDeps
): Promise<NewDecision | null> {
  const { submissionId, reviewer, document, signal } = input;
  const base = {
    submissionId,
    reviewerName: reviewer.name,
    fileUrl: null,
  };

  let reply: ReviewReply;
  try {
    reply = await deps.backend.review(reviewer, document, signal);
  } catch (error) {
    if (signal.aborted) return null;
    console.error(`[reviewer] ${reviewer.name} failed on ${submissionId}:`, error);
    const message = describeReviewFailure(error);
    return {
      ...base,
      decision: "ERROR",
      errorReason: "backend",
      summary: message,
      fullReview: message,
      modelUsed: reviewer.models[0] ?? null,
      modelDowngraded: false,
    };
  }

  if (signal.aborted) return null;

  let parsed: ParsedDecision;
  try {
    parsed = parseDecision(reply.text);
  } catch (error) {
    if (!isReviewError(error, "PARSE_ERROR")) throw error;
    console.warn(
      `[reviewer] ${reviewer.name} on ${submissionId}: ${error.message}`
    );
    return {
      ...base,
      decision: "ERROR",
      errorReason: "parse",
      summary: describeReviewFailure(error),
      fullReview: reply.text,
      modelUsed: reply.model,
      modelDowngraded: reply.downgraded,
    };
  }

  let fileUrl: string | null = null;
  if (deps.artifacts) {
    try {
      fileUrl = await deps.artifacts.writeReviewReport({
        submissionId,
        reviewerName: reviewer.name,
        decision: parsed.decision,
        reviewText: parsed.fullReview,
        modelUsed: reply.model,
      });
    } catch (error) {
      console.error(
        `[artifacts] Report for ${reviewer.name} on ${submissionId} failed:`,
        error
      );
    }
  }

  return {
    ...base,
    decision: parsed.decision,
    errorReason: null,
    summary: parsed.summary,
    fullReview: parsed.fullReview,
    modelUsed: reply.model,
    modelDowngraded: reply.downgraded,
    fileUrl,
  };
}

export async function runReviewerTask(
  input: ReviewerTaskInput,
  deps: ReviewerTaskDeps
): Promise<ReviewerTaskResult> {
  const reviewerName = input.reviewer.name;

  let decision: NewDecision | null;
  try {
    decision = await buildDecision(input, deps);
  } catch (error) {
    console.error(
      `[reviewer] ${reviewerName} crashed on ${input.submissionId}:`,
      error
    );
    decision = input.signal.aborted
      ? null
      : {
          submissionId: input.submissionId,
          reviewerName,
          decision: "ERROR",
          errorReason: "backend",
          summary: describeReviewFailure(error),
          fullReview: describeReviewFailure(error),
          modelUsed: null,
          modelDowngraded: false,
          fileUrl: null,
        };
  }

  if (!decision) {
    console.info(`[reviewer] ${reviewerName} on ${input.submissionId} abandoned`);
    return { reviewerName, status: "abandoned", decision: null };
  }

  try {
    const record = await deps.store.recordDecision(decision);
    return { reviewerName, status: "recorded", decision: record };
  } catch (error) {
    if (isReviewError(error, "DUPLICATE_DECISION")) {
      console.warn(`[reviewer] ${error.message}; keeping the existing decision`);
      return { reviewerName, status: "superseded", decision: null };
    }
    console.error(
      `[reviewer] Could not save ${reviewerName} on ${input.submissionId}:`,
      error
    );
    return { reviewerName, status: "failed", decision: null };
  }
}
