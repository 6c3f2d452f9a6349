/**
 * Outcome aggregation.
 *
 * Precedence, highest first: ERROR > REJECTED > REVISION > ACCEPTED.
 * No decisions at all is PENDING.
 */

import type { DecisionValue, Outcome } from "./types";

export function aggregate(decisions: Iterable<DecisionValue>): Outcome {
  let seen = false;
  let hasRejected = false;
  let hasRevision = false;

  for (const decision of decisions) {
    seen = true;
    if (decision === "ERROR") return "ERROR";
    if (decision === "REJECTED") hasRejected = true;
    else if (decision === "REVISION") hasRevision = true;
  }

  if (hasRejected) return "REJECTED";
  if (hasRevision) return "REVISION";
  return seen ? "ACCEPTED" : "PENDING";
}

export function isAllAccepted(outcome: Outcome): boolean {
  return outcome === "ACCEPTED";
}

export type DecisionTally = Record<DecisionValue, number>;

export function tallyDecisions(decisions: Iterable<DecisionValue>): DecisionTally {
  const tally: DecisionTally = { ACCEPTED: 0, REVISION: 0, REJECTED: 0, ERROR: 0 };
  for (const decision of decisions) {
    tally[decision] += 1;
  }
  return tally;
}
