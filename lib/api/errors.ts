/**
 * Maps pipeline errors onto JSON error responses.
 */

import { NextResponse } from "next/server";
import { isReviewError, type ReviewErrorCode } from "@/lib/review/errors";

const STATUS_BY_CODE: Partial<Record<ReviewErrorCode, number>> = {
  NOT_FOUND: 404,
  ALREADY_FINALIZED: 409,
  ALREADY_DISPATCHED: 409,
  NOTHING_TO_RETRY: 409,
  DUPLICATE_SUBMISSION: 409,
  DUPLICATE_DECISION: 409,
  INVALID_UPLOAD: 400,
  INVALID_REVIEWERS: 400,
};

export function errorResponse(error: unknown, context: string) {
  if (isReviewError(error)) {
    const status = STATUS_BY_CODE[error.code];
    if (status !== undefined) {
      return NextResponse.json(
        { error: error.message, code: error.code },
        { status }
      );
    }
  }

  console.error(`[api] ${context} failed:`, error);
  return NextResponse.json(
    { error: "An unexpected error occurred. Please try again." },
    { status: 500 }
  );
}
