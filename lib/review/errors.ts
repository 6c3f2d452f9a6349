/**
 * Error taxonomy for the review pipeline.
 *
 * Integrity violations (duplicates, finalized submissions) are raised at
 * the store boundary. Backend and parse failures are caught inside the
 * Reviewer Task and turned into ERROR decisions.
 */

export type ReviewErrorCode =
  | "DUPLICATE_SUBMISSION"
  | "DUPLICATE_DECISION"
  | "ALREADY_FINALIZED"
  | "ALREADY_DISPATCHED"
  | "NOT_FOUND"
  | "BACKEND_ERROR"
  | "PARSE_ERROR"
  | "NOTHING_TO_RETRY"
  | "INVALID_UPLOAD"
  | "INVALID_REVIEWERS";

export class ReviewError extends Error {
  constructor(
    readonly code: ReviewErrorCode,
    message: string
  ) {
    super(message);
    this.name = "ReviewError";
  }
}

export class DuplicateSubmissionError extends ReviewError {
  constructor(submissionId: string) {
    super("DUPLICATE_SUBMISSION", `Submission ${submissionId} already exists`);
    this.name = "DuplicateSubmissionError";
  }
}

export class DuplicateDecisionError extends ReviewError {
  constructor(submissionId: string, reviewerName: string) {
    super(
      "DUPLICATE_DECISION",
      `${reviewerName} already has a decision for ${submissionId}`
    );
    this.name = "DuplicateDecisionError";
  }
}

export class AlreadyFinalizedError extends ReviewError {
  constructor(submissionId: string) {
    super("ALREADY_FINALIZED", `Submission ${submissionId} is already finalized`);
    this.name = "AlreadyFinalizedError";
  }
}

export class AlreadyDispatchedError extends ReviewError {
  constructor(submissionId: string) {
    super(
      "ALREADY_DISPATCHED",
      `Submission ${submissionId} is still being reviewed`
    );
    this.name = "AlreadyDispatchedError";
  }
}

export class NotFoundError extends ReviewError {
  constructor(submissionId: string) {
    super("NOT_FOUND", `Submission ${submissionId} not found`);
    this.name = "NotFoundError";
  }
}

export class NothingToRetryError extends ReviewError {
  constructor(submissionId: string, reviewerName?: string) {
    super(
      "NOTHING_TO_RETRY",
      reviewerName
        ? `${reviewerName} has no failed review for ${submissionId}`
        : `Submission ${submissionId} has no failed reviews`
    );
    this.name = "NothingToRetryError";
  }
}

export class InvalidUploadError extends ReviewError {
  constructor(message: string) {
    super("INVALID_UPLOAD", message);
    this.name = "InvalidUploadError";
  }
}

export class InvalidReviewersError extends ReviewError {
  constructor(message: string) {
    super("INVALID_REVIEWERS", message);
    this.name = "InvalidReviewersError";
  }
}

export class ParseError extends ReviewError {
  constructor(message: string) {
    super("PARSE_ERROR", message);
    this.name = "ParseError";
  }
}

export type BackendErrorKind =
  | "rate_limit"
  | "auth"
  | "not_found"
  | "empty_response"
  | "aborted"
  | "unavailable";

export class BackendError extends ReviewError {
  constructor(
    readonly kind: BackendErrorKind,
    message: string,
    readonly statusCode?: number
  ) {
    super("BACKEND_ERROR", message);
    this.name = "BackendError";
  }
}

export function isReviewError(
  error: unknown,
  code?: ReviewErrorCode
): error is ReviewError {
  return (
    error instanceof ReviewError && (code === undefined || error.code === code)
  );
}

/**
 * Message shown to the author in place of a failed review.
 */
export function describeReviewFailure(error: unknown): string {
  if (error instanceof BackendError) {
    switch (error.kind) {
      case "rate_limit":
        return "Our review system is currently busy. Please wait 60 seconds and try again.";
      case "auth":
        return "There was an issue with our review system. Please contact support.";
      case "aborted":
        return "The reviewer did not respond in time. Please retry this review.";
      default:
        break;
    }
  }
  if (error instanceof ParseError) {
    return "The reviewer's response did not include a clear final decision. Please retry this review.";
  }
  return "An unexpected error occurred. Please try again or contact support if the issue persists.";
}
