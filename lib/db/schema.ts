/**
 * Drizzle ORM schema — submissions and their per-reviewer results.
 *
 * One review_results row per (submission, reviewer); deleting a
 * submission removes its results.
 */

import {
  pgTable,
  serial,
  text,
  timestamp,
  boolean,
  uniqueIndex,
  index,
} from "drizzle-orm/pg-core";
import {
  DECISION_VALUES,
  ERROR_REASONS,
  OUTCOME_VALUES,
} from "@/lib/review/types";

export const submissions = pgTable("submissions", {
  id: serial("id").primaryKey(),
  submissionId: text("submission_id").notNull().unique(),
  paperTitle: text("paper_title"),
  filename: text("filename"),
  filePath: text("file_path").notNull(),
  createdAt: timestamp("created_at", { mode: "date" }).defaultNow().notNull(),
  processingComplete: boolean("processing_complete").default(false).notNull(),
  allAccepted: boolean("all_accepted").default(false).notNull(),
  outcome: text("outcome", { enum: OUTCOME_VALUES }).default("PENDING").notNull(),
  error: text("error"),
  certificateFilename: text("certificate_filename"),
  completedAt: timestamp("completed_at", { mode: "date" }),
});

export const reviewResults = pgTable(
  "review_results",
  {
    id: serial("id").primaryKey(),
    submissionId: text("submission_id")
      .notNull()
      .references(() => submissions.submissionId, { onDelete: "cascade" }),
    reviewerName: text("reviewer_name").notNull(),
    decision: text("decision", { enum: DECISION_VALUES }).notNull(),
    errorReason: text("error_reason", { enum: ERROR_REASONS }),
    summary: text("summary").notNull(),
    fullReview: text("full_review").notNull(),
    modelUsed: text("model_used"),
    modelDowngraded: boolean("model_downgraded").default(false).notNull(),
    fileUrl: text("file_url"),
    createdAt: timestamp("created_at", { mode: "date" }).defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex("review_results_submission_reviewer_idx").on(
      table.submissionId,
      table.reviewerName
    ),
    index("review_results_submission_idx").on(table.submissionId),
  ]
);
