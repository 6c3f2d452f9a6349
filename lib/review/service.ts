/**
 * Process-wide wiring for the route handlers: configuration, the Drizzle
 * store, the OpenRouter backend, file artifacts and one coordinator.
 *
 * Built on first use so that importing a route (for example during
 * `next build`) does not require the environment to be complete.
 */

import { getConfig, type AppConfig } from "@/lib/config";
import { drizzleSubmissionStore } from "@/lib/db/queries";
import { ensureDirectories } from "@/lib/storage/files";
import { createFileArtifactStore } from "./artifacts";
import { ReviewCoordinator } from "./coordinator";
import { createOpenRouterBackend } from "./openrouter";
import type { SubmissionStore } from "./store";

export interface ReviewService {
  config: AppConfig;
  store: SubmissionStore;
  coordinator: ReviewCoordinator;
}

let service: Promise<ReviewService> | null = null;

async function createReviewService(): Promise<ReviewService> {
  const config = getConfig();
  await ensureDirectories(config.uploadFolder, config.resultsFolder);

  const store = drizzleSubmissionStore;
  const coordinator = new ReviewCoordinator({
    store,
    backend: createOpenRouterBackend({
      timeoutMs: config.backendTimeoutMs,
      maxRetries: config.backendMaxRetries,
    }),
    artifacts: createFileArtifactStore(config.resultsFolder),
    roster: config.reviewers,
    timeoutMs: config.reviewTimeoutMs,
  });

  console.info(
    `[coordinator] Ready with ${config.reviewers.length} reviewer(s), ` +
      `timeout ${config.reviewTimeoutMs}ms`
  );
  return { config, store, coordinator };
}

export function getReviewService(): Promise<ReviewService> {
  service ??= createReviewService().catch((error: unknown) => {
    service = null;
    throw error;
  });
  return service;
}
