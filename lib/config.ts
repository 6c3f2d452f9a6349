/**
 * Runtime configuration, read from the environment once.
 *
 * POSTGRES_URL is consumed by @vercel/postgres and OPENROUTER_API_KEY by
 * the reviewer backend; neither is parsed here.
 */

import path from "node:path";
import { z } from "zod";
import {
  DEFAULT_REVIEWER_MODELS,
  buildDefaultRoster,
  type ReviewerConfig,
} from "@/lib/review/types";

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const EnvSchema = z.object({
  UPLOAD_FOLDER: z.preprocess(blankToUndefined, z.string().default("uploads")),
  RESULTS_FOLDER: z.preprocess(blankToUndefined, z.string().default("results")),
  REVIEWER_COUNT: positiveInt(3),
  REVIEWER_MODELS: z.preprocess(
    blankToUndefined,
    z
      .string()
      .transform((value) =>
        value
          .split(",")
          .map((model) => model.trim())
          .filter(Boolean)
      )
      .pipe(z.array(z.string()).min(1, "REVIEWER_MODELS must name at least one model"))
      .optional()
  ),
  REVIEW_TIMEOUT_MS: positiveInt(600_000),
  BACKEND_TIMEOUT_MS: positiveInt(120_000),
  BACKEND_MAX_RETRIES: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0).default(3)
  ),
});

export interface AppConfig {
  uploadFolder: string;
  resultsFolder: string;
  reviewers: ReviewerConfig[];
  reviewTimeoutMs: number;
  backendTimeoutMs: number;
  backendMaxRetries: number;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const data = parsed.data;
  return {
    uploadFolder: path.resolve(data.UPLOAD_FOLDER),
    resultsFolder: path.resolve(data.RESULTS_FOLDER),
    reviewers: buildDefaultRoster(
      data.REVIEWER_COUNT,
      data.REVIEWER_MODELS ?? DEFAULT_REVIEWER_MODELS
    ),
    reviewTimeoutMs: data.REVIEW_TIMEOUT_MS,
    backendTimeoutMs: data.BACKEND_TIMEOUT_MS,
    backendMaxRetries: data.BACKEND_MAX_RETRIES,
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  cached ??= loadConfig();
  return cached;
}
