/**
 * Status query — a point-in-time view of a submission for polling
 * clients. Reads the store and the coordinator arena; never waits on
 * running tasks. A submission left incomplete past its timeout with no
 * live run is finalized first.
 */

import { aggregate, tallyDecisions } from "./aggregator";
import { fileUrl } from "./artifacts";
import type { ReviewCoordinator } from "./coordinator";
import type { SubmissionStore } from "./store";
import type { DecisionValue, ErrorReason, Outcome } from "./types";

export interface ReviewerResult {
  decision: DecisionValue;
  summary: string;
  fullReview: string;
  modelUsed: string | null;
  modelDowngraded: boolean;
  fileUrl: string | null;
  errorReason: ErrorReason | null;
}

export interface SubmissionStatus {
  submissionId: string;
  paperTitle: string | null;
  filename: string | null;
  status: "processing" | "complete";
  processingComplete: boolean;
  allAccepted: boolean;
  outcome: Outcome;
  error: string | null;
  createdAt: string;
  completedAt: string | null;
  reviews: Record<string, ReviewerResult>;
  tally: Record<DecisionValue, number>;
  pendingReviewers: string[];
  certificateUrl: string | null;
}

type RunView = Pick<
  ReviewCoordinator,
  "activeReviewers" | "expectedReviewers" | "recoverIfStale"
>;

export async function getSubmissionStatus(
  store: SubmissionStore,
  coordinator: RunView,
  submissionId: string
): Promise<SubmissionStatus | null> {
  const stored = await store.getSubmission(submissionId);
  if (!stored) return null;
  const submission = await coordinator.recoverIfStale(stored);

  const decisions = await store.listDecisions(submissionId);
  const reviews: Record<string, ReviewerResult> = {};
  for (const d of decisions) {
    reviews[d.reviewerName] = {
      decision: d.decision,
      summary: d.summary,
      fullReview: d.fullReview,
      modelUsed: d.modelUsed,
      modelDowngraded: d.modelDowngraded,
      fileUrl: d.fileUrl,
      errorReason: d.errorReason,
    };
  }

  // The stored outcome is only written at finalization; while processing
  // the outcome reflects whatever has been decided so far.
  const outcome = submission.processingComplete
    ? submission.outcome
    : aggregate(decisions.map((d) => d.decision));

  const pendingReviewers = submission.processingComplete
    ? []
    : [
        ...new Set([
          ...coordinator.expectedReviewers(submissionId),
          ...coordinator.activeReviewers(submissionId),
        ]),
      ]
        .filter((name) => !(name in reviews))
        .sort();

  return {
    submissionId: submission.submissionId,
    paperTitle: submission.paperTitle,
    filename: submission.filename,
    status: submission.processingComplete ? "complete" : "processing",
    processingComplete: submission.processingComplete,
    allAccepted: submission.allAccepted,
    outcome,
    error: submission.error,
    createdAt: submission.createdAt.toISOString(),
    completedAt: submission.completedAt?.toISOString() ?? null,
    reviews,
    tally: tallyDecisions(decisions.map((d) => d.decision)),
    pendingReviewers,
    certificateUrl: submission.certificateFilename
      ? fileUrl(submission.certificateFilename)
      : null,
  };
}
