/**
 * Decision parser — extracts the reviewer's final decision from review text.
 *
 * Reviewers are instructed to end with one of these exact lines:
 *   FINAL DECISION: **ACCEPTED**
 *   FINAL DECISION: **ACCEPTED WITH MINOR REVISION REQUIRED**
 *   FINAL DECISION: **ACCEPTED WITH MAJOR REVISION REQUIRED**
 *   FINAL DECISION: **REJECTED**
 *
 * A reply without a marker, or with markers that disagree, is not
 * classified by keyword search: it is a ParseError.
 */

import { ParseError } from "./errors";
import type { DecisionValue, RevisionSeverity } from "./types";

export const SUMMARY_MAX_LENGTH = 300;

export interface ParsedDecision {
  decision: Exclude<DecisionValue, "ERROR">;
  severity: RevisionSeverity | null;
  summary: string;
  fullReview: string;
}

const MARKER_PATTERN =
  /FINAL DECISION:\s*\**\s*(ACCEPTED WITH (MINOR|MAJOR) REVISIONS?(?: REQUIRED)?|ACCEPTED(?!\s+WITH)|REJECTED)/g;

interface MarkerMatch {
  decision: ParsedDecision["decision"];
  severity: RevisionSeverity | null;
}

function readMarkers(text: string): MarkerMatch[] {
  const matches: MarkerMatch[] = [];
  for (const match of text.toUpperCase().matchAll(MARKER_PATTERN)) {
    const phrase = match[1];
    if (phrase === "ACCEPTED") {
      matches.push({ decision: "ACCEPTED", severity: null });
    } else if (phrase === "REJECTED") {
      matches.push({ decision: "REJECTED", severity: null });
    } else {
      matches.push({
        decision: "REVISION",
        severity: match[2] === "MAJOR" ? "major" : "minor",
      });
    }
  }
  return matches;
}

/**
 * First paragraph of the review, truncated for list views.
 */
export function summarizeReview(
  text: string,
  prefix = "",
  maxLength: number = SUMMARY_MAX_LENGTH
): string {
  const firstParagraph = text.trim().split(/\n\s*\n/)[0] ?? "";
  const summary = prefix + firstParagraph.trim();
  return summary.length > maxLength
    ? summary.slice(0, maxLength) + "..."
    : summary;
}

export function parseDecision(text: string): ParsedDecision {
  if (!text || text.trim().length === 0) {
    throw new ParseError("Review text is empty");
  }

  const markers = readMarkers(text);
  if (markers.length === 0) {
    throw new ParseError("Review has no FINAL DECISION line");
  }

  const distinct = new Set(markers.map((m) => `${m.decision}:${m.severity}`));
  if (distinct.size > 1) {
    throw new ParseError("Review names more than one final decision");
  }

  const { decision, severity } = markers[0];
  const prefix =
    decision === "REVISION"
      ? `${severity === "major" ? "MAJOR" : "MINOR"} REVISION REQUIRED: `
      : "";

  return {
    decision,
    severity,
    summary: summarizeReview(text, prefix),
    fullReview: text.trim(),
  };
}
