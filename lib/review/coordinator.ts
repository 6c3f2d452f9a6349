/**
 * Fan-out coordinator.
 *
 * Runs every Reviewer Task for a submission concurrently and supervises
 * them until each reviewer has a Decision or the submission timeout
 * expires. Task handles are kept in an arena keyed by
 * (submission, reviewer) so outstanding tasks can be found and aborted.
 *
 * Ordering: markComplete is only called after every Decision write for
 * the run has settled, and at most one run per submission exists at a
 * time.
 */

import path from "node:path";
import { readUpload } from "@/lib/storage/files";
import { aggregate, isAllAccepted } from "./aggregator";
import type { ArtifactStore } from "./artifacts";
import {
  AlreadyDispatchedError,
  AlreadyFinalizedError,
  InvalidReviewersError,
  NotFoundError,
  NothingToRetryError,
  isReviewError,
} from "./errors";
import { runReviewerTask, type ReviewerTaskResult } from "./reviewer-task";
import type { SubmissionStore } from "./store";
import type {
  ErrorReason,
  Outcome,
  ReviewBackend,
  ReviewDocument,
  ReviewerConfig,
  Submission,
  TerminalState,
} from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CoordinatorOptions {
  store: SubmissionStore;
  backend: ReviewBackend;
  artifacts?: ArtifactStore;
  /** Reviewers used when dispatch is called without an explicit set. */
  roster: ReviewerConfig[];
  /** Wall-clock limit for one run, in milliseconds. */
  timeoutMs: number;
  loadDocument?: (submission: Submission) => Promise<ReviewDocument>;
}

interface TaskHandle {
  submissionId: string;
  reviewerName: string;
  controller: AbortController;
  promise: Promise<ReviewerTaskResult>;
  startedAt: Date;
}

export interface RunResult {
  submissionId: string;
  outcome: Outcome;
  /** Reviewers whose ERROR/timeout Decision was written by this run. */
  timedOut: string[];
  /** Finalized submission, or null when finalizing itself failed. */
  submission: Submission | null;
}

export const TIMEOUT_MESSAGE =
  "The reviewer did not respond within the time limit. Please retry this review.";
const STORE_FAILURE_MESSAGE =
  "The review could not be saved. Please retry this review.";
const DOCUMENT_FAILURE_MESSAGE = "The uploaded document could not be read.";
const RUN_FAILURE_MESSAGE = "Review processing failed. Please try again.";

interface Deadline {
  expired: Promise<"timeout">;
  expire(): void;
  clear(): void;
}

interface ActiveRun {
  done: Promise<RunResult>;
  deadline: Deadline;
  reviewers: string[];
}

function createDeadline(ms: number): Deadline {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let fire: () => void = () => undefined;
  const expired = new Promise<"timeout">((resolve) => {
    fire = () => resolve("timeout");
    timer = setTimeout(fire, ms);
  });
  return {
    expired,
    expire: () => fire(),
    clear: () => clearTimeout(timer),
  };
}

function taskKey(submissionId: string, reviewerName: string) {
  return `${submissionId}::${reviewerName}`;
}

export function validateReviewers(reviewers: ReviewerConfig[]) {
  if (reviewers.length === 0) {
    throw new InvalidReviewersError("At least one reviewer is required");
  }
  const names = new Set<string>();
  for (const reviewer of reviewers) {
    if (!reviewer.name.trim()) {
      throw new InvalidReviewersError("Reviewer names must not be empty");
    }
    if (names.has(reviewer.name)) {
      throw new InvalidReviewersError(`Duplicate reviewer: ${reviewer.name}`);
    }
    if (reviewer.models.length === 0) {
      throw new InvalidReviewersError(`${reviewer.name} has no models configured`);
    }
    names.add(reviewer.name);
  }
}

async function readSubmissionDocument(submission: Submission): Promise<ReviewDocument> {
  return {
    filename: submission.filename ?? path.basename(submission.filePath),
    data: await readUpload(submission.filePath),
  };
}

function terminalStateOf(submission: Submission): TerminalState {
  return {
    allAccepted: submission.allAccepted,
    outcome: submission.outcome,
    certificateFilename: submission.certificateFilename,
    error: submission.error,
  };
}

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

export class ReviewCoordinator {
  private readonly tasks = new Map<string, TaskHandle>();
  private readonly runs = new Map<string, ActiveRun>();
  private readonly claimed = new Set<string>();

  constructor(private readonly options: CoordinatorOptions) {
    validateReviewers(options.roster);
  }

  get roster(): ReviewerConfig[] {
    return this.options.roster;
  }

  /**
   * Start reviewing a submission. Resolves once the run is registered,
   * not when the reviews finish.
   */
  async dispatch(
    submissionId: string,
    reviewers: ReviewerConfig[] = this.options.roster
  ): Promise<void> {
    validateReviewers(reviewers);
    this.claim(submissionId);
    try {
      const submission = await this.options.store.getSubmission(submissionId);
      if (!submission) throw new NotFoundError(submissionId);
      if (submission.processingComplete) {
        throw new AlreadyFinalizedError(submissionId);
      }
      this.start(submission, reviewers);
    } finally {
      this.claimed.delete(submissionId);
    }
  }

  /**
   * Re-run failed reviewers of a finalized submission, keeping every
   * other Decision. Returns the names of the reviewers that were re-run.
   */
  async retry(submissionId: string, reviewerName?: string): Promise<string[]> {
    const { store } = this.options;
    this.claim(submissionId);
    try {
      let submission = await store.getSubmission(submissionId);
      if (!submission) throw new NotFoundError(submissionId);
      if (!submission.processingComplete) {
        if (!this.isStale(submission)) {
          throw new AlreadyDispatchedError(submissionId);
        }
        submission = await this.finalizeStale(submission);
      }

      const decisions = await store.listDecisions(submissionId);
      const decided = new Set(decisions.map((d) => d.reviewerName));
      let targets = decisions
        .filter((d) => d.decision === "ERROR")
        .map((d) => d.reviewerName);
      if (submission.error) {
        targets.push(
          ...this.options.roster
            .map((r) => r.name)
            .filter((name) => !decided.has(name))
        );
      }
      if (reviewerName !== undefined) {
        targets = targets.filter((name) => name === reviewerName);
      }
      if (targets.length === 0) {
        throw new NothingToRetryError(submissionId, reviewerName);
      }

      const fallbackModels = this.options.roster[0].models;
      const reviewers = targets.map(
        (name) =>
          this.options.roster.find((r) => r.name === name) ?? {
            name,
            models: fallbackModels,
          }
      );

      const reopened = await store.reopenSubmission(submissionId);
      if (!reopened) throw new AlreadyDispatchedError(submissionId);

      try {
        await store.clearDecisions(submissionId, targets);
      } catch (error) {
        await store.markComplete(submissionId, terminalStateOf(submission));
        throw error;
      }

      console.info(
        `[coordinator] Retrying ${targets.join(", ")} for ${submissionId}`
      );
      this.start(reopened, reviewers);
      return targets;
    } finally {
      this.claimed.delete(submissionId);
    }
  }

  isRunning(submissionId: string): boolean {
    return this.runs.has(submissionId) || this.claimed.has(submissionId);
  }

  /** Reviewers of this submission whose task has not returned yet. */
  activeReviewers(submissionId: string): string[] {
    return [...this.tasks.values()]
      .filter((task) => task.submissionId === submissionId)
      .map((task) => task.reviewerName)
      .sort();
  }

  /** Reviewers the current run is waiting on, including tasks not yet launched. */
  expectedReviewers(submissionId: string): string[] {
    return [...(this.runs.get(submissionId)?.reviewers ?? [])].sort();
  }

  /**
   * Finalize a submission left incomplete with no run in this process
   * (after a restart, or a run whose own finalization failed) once its
   * timeout has passed. Reviewers without a Decision are recorded as timed
   * out. Returns the submission as stored afterwards.
   */
  async recoverIfStale(submission: Submission): Promise<Submission> {
    const id = submission.submissionId;
    if (submission.processingComplete || this.isRunning(id) || !this.isStale(submission)) {
      return submission;
    }
    this.claimed.add(id);
    try {
      return await this.finalizeStale(submission);
    } finally {
      this.claimed.delete(id);
    }
  }

  /** Resolves when the current run finishes; null when nothing is running. */
  async waitFor(submissionId: string): Promise<RunResult | null> {
    return (await this.runs.get(submissionId)?.done) ?? null;
  }

  /**
   * Expire every running submission now: outstanding reviewers are
   * recorded as timed out and each run finalizes before this resolves.
   */
  async shutdown(): Promise<RunResult[]> {
    const active = [...this.runs.values()];
    for (const run of active) run.deadline.expire();
    return Promise.all(active.map((run) => run.done));
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private claim(submissionId: string) {
    if (this.isRunning(submissionId)) {
      throw new AlreadyDispatchedError(submissionId);
    }
    this.claimed.add(submissionId);
  }

  private start(submission: Submission, reviewers: ReviewerConfig[]) {
    const id = submission.submissionId;
    const deadline = createDeadline(this.options.timeoutMs);
    const done = this.supervise(submission, reviewers, deadline).finally(() => {
      deadline.clear();
      this.runs.delete(id);
    });
    this.runs.set(id, {
      done,
      deadline,
      reviewers: reviewers.map((reviewer) => reviewer.name),
    });
    console.info(
      `[coordinator] Dispatched ${reviewers.length} reviewer(s) for ${id}`
    );
  }

  private isStale(submission: Submission): boolean {
    return Date.now() - submission.createdAt.getTime() >= this.options.timeoutMs;
  }

  private async finalizeStale(submission: Submission): Promise<Submission> {
    const id = submission.submissionId;
    console.warn(`[coordinator] ${id} has no live run past its timeout; finalizing`);
    try {
      return await this.finalize(submission, this.options.roster, "timeout", TIMEOUT_MESSAGE);
    } catch (error) {
      if (!isReviewError(error, "ALREADY_FINALIZED")) throw error;
      return (await this.options.store.getSubmission(id)) ?? submission;
    }
  }

  private async supervise(
    submission: Submission,
    reviewers: ReviewerConfig[],
    deadline: Deadline
  ): Promise<RunResult> {
    const id = submission.submissionId;
    const load = this.options.loadDocument ?? readSubmissionDocument;

    let loaded: ReviewDocument | "timeout";
    try {
      loaded = await Promise.race([load(submission), deadline.expired]);
    } catch (error) {
      console.error(`[coordinator] Could not load document for ${id}:`, error);
      return this.finalizeWithError(id, DOCUMENT_FAILURE_MESSAGE);
    }

    if (loaded === "timeout") {
      console.warn(`[coordinator] ${id} expired while loading its document`);
      try {
        const completed = await this.finalize(submission, reviewers, "timeout", TIMEOUT_MESSAGE);
        return {
          submissionId: id,
          outcome: completed.outcome,
          timedOut: reviewers.map((r) => r.name),
          submission: completed,
        };
      } catch (error) {
        console.error(`[coordinator] Run for ${id} failed:`, error);
        return this.finalizeWithError(id, RUN_FAILURE_MESSAGE);
      }
    }
    const document = loaded;

    try {
      const handles = reviewers.map((reviewer) =>
        this.launch(id, reviewer, document)
      );
      const timedOut = await this.awaitTasks(id, handles, deadline);
      const completed = await this.finalize(submission, reviewers);
      return { submissionId: id, outcome: completed.outcome, timedOut, submission: completed };
    } catch (error) {
      console.error(`[coordinator] Run for ${id} failed:`, error);
      return this.finalizeWithError(id, RUN_FAILURE_MESSAGE);
    }
  }

  private launch(
    submissionId: string,
    reviewer: ReviewerConfig,
    document: ReviewDocument
  ): TaskHandle {
    const key = taskKey(submissionId, reviewer.name);
    const controller = new AbortController();
    const promise = runReviewerTask(
      { submissionId, reviewer, document, signal: controller.signal },
      this.options
    ).finally(() => {
      if (this.tasks.get(key)?.controller === controller) {
        this.tasks.delete(key);
      }
    });

    const handle: TaskHandle = {
      submissionId,
      reviewerName: reviewer.name,
      controller,
      promise,
      startedAt: new Date(),
    };
    this.tasks.set(key, handle);
    return handle;
  }

  /**
   * Wait for every task or the timeout. Returns the reviewers that were
   * still outstanding when the timeout fired.
   */
  private async awaitTasks(
    submissionId: string,
    handles: TaskHandle[],
    deadline: Deadline
  ): Promise<string[]> {
    const settled = Promise.all(handles.map((h) => h.promise)).then(
      () => "done" as const
    );

    const winner = await Promise.race([settled, deadline.expired]);
    deadline.clear();
    if (winner === "done") return [];

    const outstanding = handles.filter(
      (h) =>
        this.tasks.get(taskKey(submissionId, h.reviewerName))?.controller ===
        h.controller
    );

    // Record first, then abort, so an aborted task finds its slot taken.
    // Every outstanding task is aborted even when a write fails.
    const writes = await Promise.allSettled(
      outstanding.map((h) =>
        this.recordFailure(submissionId, h.reviewerName, "timeout", TIMEOUT_MESSAGE)
      )
    );
    for (const h of outstanding) {
      h.controller.abort();
      this.tasks.delete(taskKey(submissionId, h.reviewerName));
    }

    console.warn(
      `[coordinator] ${submissionId} expired with ${outstanding.length} reviewer(s) outstanding: ` +
        (outstanding.map((h) => h.reviewerName).join(", ") || "none")
    );

    const timedOut: string[] = [];
    for (const [i, write] of writes.entries()) {
      if (write.status === "rejected") throw write.reason;
      if (write.value) timedOut.push(outstanding[i].reviewerName);
    }
    return timedOut;
  }

  private async recordFailure(
    submissionId: string,
    reviewerName: string,
    reason: ErrorReason,
    message: string
  ): Promise<boolean> {
    try {
      await this.options.store.recordDecision({
        submissionId,
        reviewerName,
        decision: "ERROR",
        errorReason: reason,
        summary: message,
        fullReview: message,
        modelUsed: null,
        modelDowngraded: false,
        fileUrl: null,
      });
      return true;
    } catch (error) {
      if (!isReviewError(error, "DUPLICATE_DECISION")) throw error;
      return false;
    }
  }

  private async finalize(
    submission: Submission,
    reviewers: ReviewerConfig[],
    missingReason: ErrorReason = "store",
    missingMessage: string = STORE_FAILURE_MESSAGE
  ): Promise<Submission> {
    const { store, artifacts } = this.options;
    const id = submission.submissionId;

    let decisions = await store.listDecisions(id);
    const decided = new Set(decisions.map((d) => d.reviewerName));
    const missing = reviewers.filter((r) => !decided.has(r.name));
    if (missing.length > 0) {
      for (const reviewer of missing) {
        await this.recordFailure(id, reviewer.name, missingReason, missingMessage);
      }
      decisions = await store.listDecisions(id);
    }

    const outcome = aggregate(decisions.map((d) => d.decision));
    const allAccepted = isAllAccepted(outcome);

    let certificateFilename: string | null = null;
    if (allAccepted && artifacts) {
      try {
        certificateFilename = await artifacts.writeCertificate({
          submissionId: id,
          paperTitle: submission.paperTitle ?? submission.filename ?? "Research Paper",
        });
      } catch (error) {
        console.error(`[artifacts] Certificate for ${id} failed:`, error);
      }
    }

    const completed = await store.markComplete(id, {
      allAccepted,
      outcome,
      certificateFilename,
      error: null,
    });
    console.info(`[coordinator] ${id} finalized: ${outcome}`);
    return completed;
  }

  private async finalizeWithError(
    submissionId: string,
    message: string
  ): Promise<RunResult> {
    try {
      const submission = await this.options.store.markComplete(submissionId, {
        allAccepted: false,
        outcome: "ERROR",
        certificateFilename: null,
        error: message,
      });
      return { submissionId, outcome: "ERROR", timedOut: [], submission };
    } catch (error) {
      console.error(
        `[coordinator] Could not record failure for ${submissionId}:`,
        error
      );
      return { submissionId, outcome: "ERROR", timedOut: [], submission: null };
    }
  }
}
