/**
 * In-process SubmissionStore with the same integrity rules as the
 * Drizzle implementation.
 */

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

export class MemoryStore implements SubmissionStore {
  readonly submissions = new Map<string, Submission>();
  readonly decisions = new Map<string, DecisionRecord[]>();
  /** Reviewer names whose next recordDecision call fails. */
  readonly failNextWriteFor = new Set<string>();
  /** Reviewer names whose recordDecision calls always fail. */
  readonly failWritesFor = new Set<string>();
  markCompleteCalls = 0;

  async createSubmission(input: NewSubmission): Promise<Submission> {
    if (this.submissions.has(input.submissionId)) {
      throw new DuplicateSubmissionError(input.submissionId);
    }
    const submission: Submission = {
      ...input,
      createdAt: new Date(),
      processingComplete: false,
      allAccepted: false,
      outcome: "PENDING",
      error: null,
      certificateFilename: null,
      completedAt: null,
    };
    this.submissions.set(input.submissionId, submission);
    this.decisions.set(input.submissionId, []);
    return { ...submission };
  }

  async getSubmission(submissionId: string): Promise<Submission | null> {
    const submission = this.submissions.get(submissionId);
    return submission ? { ...submission } : null;
  }

  async deleteSubmission(submissionId: string): Promise<boolean> {
    this.decisions.delete(submissionId);
    return this.submissions.delete(submissionId);
  }

  async markComplete(submissionId: string, state: TerminalState): Promise<Submission> {
    this.markCompleteCalls += 1;
    const submission = this.submissions.get(submissionId);
    if (!submission) throw new NotFoundError(submissionId);
    if (submission.processingComplete) {
      if (isSameTerminalState(submission, state)) return { ...submission };
      throw new AlreadyFinalizedError(submissionId);
    }
    const completed: Submission = {
      ...submission,
      ...state,
      processingComplete: true,
      completedAt: new Date(),
    };
    this.submissions.set(submissionId, completed);
    return { ...completed };
  }

  async reopenSubmission(submissionId: string): Promise<Submission | null> {
    const submission = this.submissions.get(submissionId);
    if (!submission?.processingComplete) return null;
    const reopened: Submission = {
      ...submission,
      processingComplete: false,
      allAccepted: false,
      outcome: "PENDING",
      error: null,
      certificateFilename: null,
      completedAt: null,
    };
    this.submissions.set(submissionId, reopened);
    return { ...reopened };
  }

  async recordDecision(input: NewDecision): Promise<DecisionRecord> {
    if (this.failNextWriteFor.delete(input.reviewerName) || this.failWritesFor.has(input.reviewerName)) {
      throw new Error(`write refused for ${input.reviewerName}`);
    }
    const rows = this.decisions.get(input.submissionId);
    if (!rows) throw new NotFoundError(input.submissionId);
    if (rows.some((row) => row.reviewerName === input.reviewerName)) {
      throw new DuplicateDecisionError(input.submissionId, input.reviewerName);
    }
    const record: DecisionRecord = { ...input, createdAt: new Date() };
    rows.push(record);
    return { ...record };
  }

  async listDecisions(submissionId: string): Promise<DecisionRecord[]> {
    return [...(this.decisions.get(submissionId) ?? [])]
      .sort((a, b) => a.reviewerName.localeCompare(b.reviewerName))
      .map((row) => ({ ...row }));
  }

  async clearDecisions(submissionId: string, reviewerNames: string[]): Promise<number> {
    const rows = this.decisions.get(submissionId) ?? [];
    const kept = rows.filter(
      (row) => !(row.decision === "ERROR" && reviewerNames.includes(row.reviewerName))
    );
    this.decisions.set(submissionId, kept);
    return rows.length - kept.length;
  }
}

export function newSubmission(submissionId = "20250101_abcdef12"): NewSubmission {
  return {
    submissionId,
    paperTitle: "Test Paper",
    filename: "paper.pdf",
    filePath: `/tmp/uploads/${submissionId}_paper.pdf`,
  };
}
