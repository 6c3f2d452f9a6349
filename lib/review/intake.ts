/**
 * Paper intake: validate the upload, store it, create the Submission and
 * hand it to the coordinator. Either all of that happens or none of it
 * is left behind.
 */

import path from "node:path";
import {
  generateSubmissionId,
  removeFile,
  sanitizeFilename,
  saveUpload,
} from "@/lib/storage/files";
import type { ReviewCoordinator } from "./coordinator";
import { InvalidUploadError } from "./errors";
import type { SubmissionStore } from "./store";
import type { Submission } from "./types";

export interface IntakeDeps {
  store: SubmissionStore;
  coordinator: Pick<ReviewCoordinator, "dispatch">;
  uploadFolder: string;
  generateId?: () => string;
}

export interface PaperUpload {
  title?: string | null;
  filename: string;
  data: Uint8Array;
}

const PDF_MAGIC = "%PDF-";

export function validatePaperUpload(upload: PaperUpload) {
  if (!upload.filename) {
    throw new InvalidUploadError("No file selected");
  }
  if (path.extname(upload.filename).toLowerCase() !== ".pdf") {
    throw new InvalidUploadError("Only PDF files are accepted");
  }
  if (upload.data.byteLength === 0) {
    throw new InvalidUploadError("The uploaded file is empty");
  }
  const header = String.fromCharCode(...upload.data.subarray(0, PDF_MAGIC.length));
  if (header !== PDF_MAGIC) {
    throw new InvalidUploadError("The uploaded file is not a valid PDF");
  }
}

export function resolvePaperTitle(title: string | null | undefined, filename: string) {
  const trimmed = title?.trim();
  if (trimmed) return trimmed;
  const base = filename.split(/[\\/]/).pop() ?? filename;
  return base.slice(0, base.length - path.extname(base).length).trim() || base;
}

export async function submitPaper(
  deps: IntakeDeps,
  upload: PaperUpload
): Promise<Submission> {
  validatePaperUpload(upload);

  const submissionId = (deps.generateId ?? generateSubmissionId)();
  const filename = sanitizeFilename(upload.filename);
  const filePath = await saveUpload(deps.uploadFolder, submissionId, filename, upload.data);

  let created = false;
  try {
    const submission = await deps.store.createSubmission({
      submissionId,
      paperTitle: resolvePaperTitle(upload.title, upload.filename),
      filename,
      filePath,
    });
    created = true;
    await deps.coordinator.dispatch(submissionId);
    console.info(`[api] Accepted ${submissionId} (${filename})`);
    return submission;
  } catch (error) {
    console.error(`[api] Intake of ${submissionId} failed, rolling back:`, error);
    if (created) {
      await deps.store.deleteSubmission(submissionId);
    }
    await removeFile(filePath);
    throw error;
  }
}
