/**
 * "Download all" archive: certificate, every per-reviewer report that
 * exists on disk, and a plain-text summary of the decisions.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import JSZip from "jszip";
import { isMissingFile } from "@/lib/storage/files";
import { reviewReportFilename } from "./artifacts";
import type { DecisionRecord, Submission } from "./types";

async function readIfPresent(filePath: string): Promise<Uint8Array | null> {
  try {
    return new Uint8Array(await readFile(filePath));
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

export function buildArchiveSummary(
  submission: Submission,
  decisions: DecisionRecord[]
): string {
  const lines = [
    `Paper: ${submission.paperTitle ?? submission.filename ?? "Research Paper"}`,
    `Submission: ${submission.submissionId}`,
    `Outcome: ${submission.outcome}`,
    "",
  ];
  for (const d of decisions) {
    lines.push(`${d.reviewerName}: ${d.decision}`);
    lines.push(`  ${d.summary}`);
  }
  return lines.join("\n") + "\n";
}

/**
 * Returns null when there is nothing to download (no certificate and no
 * reports).
 */
export async function buildSubmissionArchive(
  resultsFolder: string,
  submission: Submission,
  decisions: DecisionRecord[]
): Promise<Uint8Array | null> {
  const zip = new JSZip();
  let files = 0;

  if (submission.certificateFilename) {
    const data = await readIfPresent(
      path.join(resultsFolder, submission.certificateFilename)
    );
    if (data) {
      zip.file("certificate.pdf", data);
      files += 1;
    }
  }

  for (const d of decisions) {
    if (!d.fileUrl) continue;
    const filename = reviewReportFilename(submission.submissionId, d.reviewerName);
    const data = await readIfPresent(path.join(resultsFolder, filename));
    if (!data) continue;
    zip.file(filename.slice(submission.submissionId.length + 1), data);
    files += 1;
  }

  if (files === 0) return null;

  zip.file("summary.txt", buildArchiveSummary(submission, decisions));
  return zip.generateAsync({ type: "uint8array", compression: "DEFLATE" });
}
