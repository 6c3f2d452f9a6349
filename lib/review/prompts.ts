/**
 * Prompt templates for reviewer models.
 *
 * The closing decision phrases must stay in sync with the patterns in
 * decision-parser.ts.
 */

import type { ReviewerConfig } from "./types";

export const FINAL_DECISION_PHRASES = [
  "FINAL DECISION: **ACCEPTED**",
  "FINAL DECISION: **ACCEPTED WITH MINOR REVISION REQUIRED**",
  "FINAL DECISION: **ACCEPTED WITH MAJOR REVISION REQUIRED**",
  "FINAL DECISION: **REJECTED**",
] as const;

export const REVIEW_RUBRIC = `You are an academic reviewer evaluating a research paper. Write your review in third person,
starting with "The reviewer has evaluated this paper based on the given criteria and arrived
at the following conclusions:"

Evaluate each criterion from 0-100%:

1. Methodology (20% of total): research methodology, experimental design, and validation
2. Novelty (20% of total): innovation and original contribution to the field
3. Technical Depth (15% of total): technical accuracy, depth of analysis, and rigor
4. Clarity (15% of total): writing quality, organization, and presentation
5. Literature Review (15% of total): coverage and understanding of related work
6. Impact (15% of total): potential influence on the field and practical applications

For each criterion:
- Begin with positive aspects before addressing issues
- Provide constructive suggestions for improvement
- Assign a percentage score

Calculate the weighted final score from the criteria weights.

Recommendation thresholds:
- Accept (>60%): good paper that contributes to the field
- Accept with Minor Revision (50-60%): promising work needing minor improvements
- Accept with Major Revision (40-50%): valuable contribution requiring significant changes
- Reject (<40%): does not meet basic publication standards

The review concludes with:
1. Final weighted score
2. Summary of major strengths first, then minor weaknesses
3. Constructive suggestions for improvement
4. Exactly one of these phrases on its own line, and no other decision phrase anywhere:
${FINAL_DECISION_PHRASES.map((phrase) => `   - "${phrase}"`).join("\n")}

Always maintain third-person perspective throughout the review.`;

export function buildReviewerSystemPrompt(reviewer: ReviewerConfig): string {
  if (!reviewer.focus) return REVIEW_RUBRIC;
  return `${REVIEW_RUBRIC}\n\nAdditional focus for this review: ${reviewer.focus}`;
}

export function buildReviewRequest(filename: string): string {
  return `Review the attached paper (${filename}) according to the criteria above.`;
}
