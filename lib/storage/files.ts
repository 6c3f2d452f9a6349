/**
 * Upload and results folder helpers.
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";

/**
 * `YYYYMMDD_xxxxxxxx` — date prefix plus 8 hex characters.
 */
export function generateSubmissionId(now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${date}_${randomUUID().slice(0, 8)}`;
}

/**
 * Reduce an uploaded filename to a safe basename.
 */
export function sanitizeFilename(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? "";
  const cleaned = base
    .normalize("NFKD")
    .replace(/[^\w.\- ]+/g, "")
    .trim()
    .replace(/\s+/g, "_")
    .replace(/^\.+/, "");
  return cleaned || "paper.pdf";
}

export async function ensureDirectories(...folders: string[]) {
  await Promise.all(folders.map((folder) => mkdir(folder, { recursive: true })));
}

export async function saveUpload(
  uploadFolder: string,
  submissionId: string,
  filename: string,
  data: Uint8Array
): Promise<string> {
  const filePath = path.join(uploadFolder, `${submissionId}_${filename}`);
  await writeFile(filePath, data, { flag: "wx" });
  return filePath;
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function removeFile(filePath: string) {
  await rm(filePath, { force: true });
}

export async function readUpload(filePath: string): Promise<Uint8Array> {
  return new Uint8Array(await readFile(filePath));
}

/**
 * Resolve a plain filename inside the results folder. Names that are
 * empty or could leave the folder resolve to null.
 */
export function resolveResultFile(resultsFolder: string, filename: string): string | null {
  if (!filename || filename.includes("..") || /[\\/\0]/.test(filename)) {
    return null;
  }
  return path.join(resultsFolder, filename);
}

/**
 * Attachment name such as `Deep_Learning_Survey_Certificate.pdf`.
 */
export function buildDownloadName(title: string | null, suffix: string): string {
  const base = (title ?? "")
    .replace(/[^a-zA-Z0-9 _-]/g, "")
    .trim()
    .replace(/\s+/g, "_");
  return `${base || "Research_Paper"}_${suffix}`;
}

const CONTENT_TYPES: Record<string, string> = {
  ".pdf": "application/pdf",
  ".zip": "application/zip",
  ".txt": "text/plain; charset=utf-8",
};

export function contentTypeFor(filename: string): string {
  return CONTENT_TYPES[path.extname(filename).toLowerCase()] ?? "application/octet-stream";
}
