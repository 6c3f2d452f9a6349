/**
 * Core type definitions for the review pipeline.
 *
 * Pipeline:
 *   Intake:      store the PDF, create the Submission record
 *   Fan-out:     one Reviewer Task per reviewer, run concurrently
 *   Aggregation: combine Decisions into one Outcome
 *   Status:      polling clients read a point-in-time projection
 */

// ---------------------------------------------------------------------------
// Decisions & Outcomes
// ---------------------------------------------------------------------------

export const DECISION_VALUES = [
  "ACCEPTED",
  "REVISION",
  "REJECTED",
  "ERROR",
] as const;

export type DecisionValue = (typeof DECISION_VALUES)[number];

export const OUTCOME_VALUES = [...DECISION_VALUES, "PENDING"] as const;

export type Outcome = (typeof OUTCOME_VALUES)[number];

/** Why a reviewer slot ended up as ERROR. */
export const ERROR_REASONS = [
  "backend",
  "parse",
  "timeout",
  "store",
] as const;

export type ErrorReason = (typeof ERROR_REASONS)[number];

export type RevisionSeverity = "minor" | "major";

// ---------------------------------------------------------------------------
// Reviewers
// ---------------------------------------------------------------------------

export interface ReviewerConfig {
  name: string;
  /** OpenRouter model ids, best first. Later entries are downgrades. */
  models: string[];
  /** Extra instruction appended to the review rubric. */
  focus?: string;
}

export const DEFAULT_REVIEWER_MODELS: string[] = [
  "anthropic/claude-sonnet-4",
  "anthropic/claude-3.7-sonnet",
  "anthropic/claude-3.5-haiku",
];

export function buildDefaultRoster(
  count: number,
  models: string[] = DEFAULT_REVIEWER_MODELS
): ReviewerConfig[] {
  return Array.from({ length: count }, (_, i) => ({
    name: `Reviewer ${i + 1}`,
    models: [...models],
  }));
}

// ---------------------------------------------------------------------------
// Documents & backend replies
// ---------------------------------------------------------------------------

export interface ReviewDocument {
  filename: string;
  data: Uint8Array;
}

export interface ReviewReply {
  text: string;
  model: string;
  downgraded: boolean;
  responseTimeMs: number;
}

export interface ReviewBackend {
  review(
    reviewer: ReviewerConfig,
    document: ReviewDocument,
    signal: AbortSignal
  ): Promise<ReviewReply>;
}

// ---------------------------------------------------------------------------
// Persisted records
// ---------------------------------------------------------------------------

export interface Submission {
  submissionId: string;
  paperTitle: string | null;
  filename: string | null;
  filePath: string;
  createdAt: Date;
  processingComplete: boolean;
  allAccepted: boolean;
  outcome: Outcome;
  error: string | null;
  certificateFilename: string | null;
  completedAt: Date | null;
}

export interface NewSubmission {
  submissionId: string;
  paperTitle: string | null;
  filename: string | null;
  filePath: string;
}

export interface TerminalState {
  allAccepted: boolean;
  outcome: Outcome;
  certificateFilename: string | null;
  error: string | null;
}

export interface DecisionRecord {
  submissionId: string;
  reviewerName: string;
  decision: DecisionValue;
  errorReason: ErrorReason | null;
  summary: string;
  fullReview: string;
  modelUsed: string | null;
  modelDowngraded: boolean;
  fileUrl: string | null;
  createdAt: Date;
}

export type NewDecision = Omit<DecisionRecord, "createdAt">;
