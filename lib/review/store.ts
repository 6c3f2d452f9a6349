/**
 * Submission Store contract.
 *
 * The Drizzle implementation lives in lib/db/queries.ts. Every
 * implementation must enforce the same integrity rules:
 *   - one Submission per submissionId        (DuplicateSubmissionError)
 *   - one Decision per (submission, reviewer) (DuplicateDecisionError)
 *   - markComplete is a compare-and-set on processingComplete false→true;
 *     repeating it with the same terminal state is a no-op, a different
 *     state raises AlreadyFinalizedError
 */

import type {
  DecisionRecord,
  NewDecision,
  NewSubmission,
  Submission,
  TerminalState,
} from "./types";

export interface SubmissionStore {
  createSubmission(input: NewSubmission): Promise<Submission>;
  getSubmission(submissionId: string): Promise<Submission | null>;
  /** Removes the submission and, by cascade, its decisions. */
  deleteSubmission(submissionId: string): Promise<boolean>;
  markComplete(submissionId: string, state: TerminalState): Promise<Submission>;
  /**
   * Compare-and-set processingComplete true→false for a retry.
   * Returns null when the submission is missing or not complete.
   */
  reopenSubmission(submissionId: string): Promise<Submission | null>;
  recordDecision(input: NewDecision): Promise<DecisionRecord>;
  listDecisions(submissionId: string): Promise<DecisionRecord[]>;
  /** Deletes ERROR decisions for the named reviewers only. */
  clearDecisions(submissionId: string, reviewerNames: string[]): Promise<number>;
}

export function isSameTerminalState(
  submission: Submission,
  state: TerminalState
): boolean {
  return (
    submission.allAccepted === state.allAccepted &&
    submission.outcome === state.outcome &&
    submission.certificateFilename === state.certificateFilename &&
    submission.error === state.error
  );
}
