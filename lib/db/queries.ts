/**
 * Database repository functions.
 *
 * All database access goes through these functions — no raw queries
 * elsewhere in the codebase. Together they implement SubmissionStore.
 */

import { and, asc, eq, inArray } from "drizzle-orm";
import { db } from "./index";
import { reviewResults, submissions } from "./schema";
import {
  AlreadyFinalizedError,
  DuplicateDecisionError,
  DuplicateSubmissionError,
  NotFoundError,
} from "@/lib/review/errors";
import { isSameTerminalState, type SubmissionStore } from "@/lib/review/store";
import type {
  DecisionRecord,
  NewDecision,
  NewSubmission,
  Submission,
  TerminalState,
} from "@/lib/review/types";

type SubmissionRow = typeof submissions.$inferSelect;
type ReviewResultRow = typeof reviewResults.$inferSelect;

function toSubmission({ id: _id, ...row }: SubmissionRow): Submission {
  return row;
}

function toDecision({ id: _id, ...row }: ReviewResultRow): DecisionRecord {
  return row;
}

// ---------------------------------------------------------------------------
// Submissions
// ---------------------------------------------------------------------------

export async function createSubmission(data: NewSubmission): Promise<Submission> {
  const [row] = await db
    .insert(submissions)
    .values({
      submissionId: data.submissionId,
      paperTitle: data.paperTitle,
      filename: data.filename,
      filePath: data.filePath,
    })
    .onConflictDoNothing({ target: submissions.submissionId })
    .returning();
  if (!row) throw new DuplicateSubmissionError(data.submissionId);
  return toSubmission(row);
}

export async function getSubmission(submissionId: string): Promise<Submission | null> {
  const [row] = await db
    .select()
    .from(submissions)
    .where(eq(submissions.submissionId, submissionId))
    .limit(1);
  return row ? toSubmission(row) : null;
}

export async function deleteSubmission(submissionId: string): Promise<boolean> {
  const deleted = await db
    .delete(submissions)
    .where(eq(submissions.submissionId, submissionId))
    .returning({ id: submissions.id });
  return deleted.length > 0;
}

export async function markComplete(
  submissionId: string,
  state: TerminalState
): Promise<Submission> {
  const [row] = await db
    .update(submissions)
    .set({
      processingComplete: true,
      allAccepted: state.allAccepted,
      outcome: state.outcome,
      certificateFilename: state.certificateFilename,
      error: state.error,
      completedAt: new Date(),
    })
    .where(
      and(
        eq(submissions.submissionId, submissionId),
        eq(submissions.processingComplete, false)
      )
    )
    .returning();
  if (row) return toSubmission(row);

  const existing = await getSubmission(submissionId);
  if (!existing) throw new NotFoundError(submissionId);
  if (isSameTerminalState(existing, state)) return existing;
  throw new AlreadyFinalizedError(submissionId);
}

export async function reopenSubmission(submissionId: string): Promise<Submission | null> {
  const [row] = await db
    .update(submissions)
    .set({
      processingComplete: false,
      allAccepted: false,
      outcome: "PENDING",
      certificateFilename: null,
      error: null,
      completedAt: null,
    })
    .where(
      and(
        eq(submissions.submissionId, submissionId),
        eq(submissions.processingComplete, true)
      )
    )
    .returning();
  return row ? toSubmission(row) : null;
}

// ---------------------------------------------------------------------------
// Review results
// ---------------------------------------------------------------------------

export async function recordDecision(data: NewDecision): Promise<DecisionRecord> {
  const [row] = await db
    .insert(reviewResults)
    .values(data)
    .onConflictDoNothing({
      target: [reviewResults.submissionId, reviewResults.reviewerName],
    })
    .returning();
  if (!row) throw new DuplicateDecisionError(data.submissionId, data.reviewerName);
  return toDecision(row);
}

export async function listDecisions(submissionId: string): Promise<DecisionRecord[]> {
  const rows = await db
    .select()
    .from(reviewResults)
    .where(eq(reviewResults.submissionId, submissionId))
    .orderBy(asc(reviewResults.reviewerName));
  return rows.map(toDecision);
}

export async function clearDecisions(
  submissionId: string,
  reviewerNames: string[]
): Promise<number> {
  if (reviewerNames.length === 0) return 0;
  const deleted = await db
    .delete(reviewResults)
    .where(
      and(
        eq(reviewResults.submissionId, submissionId),
        eq(reviewResults.decision, "ERROR"),
        inArray(reviewResults.reviewerName, reviewerNames)
      )
    )
    .returning({ id: reviewResults.id });
  return deleted.length;
}

export const drizzleSubmissionStore: SubmissionStore = {
  createSubmission,
  getSubmission,
  deleteSubmission,
  markComplete,
  reopenSubmission,
  recordDecision,
  listDecisions,
  clearDecisions,
};
