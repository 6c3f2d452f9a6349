import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  buildDownloadName,
  contentTypeFor,
  ensureDirectories,
  generateSubmissionId,
  isMissingFile,
  readUpload,
  removeFile,
  resolveResultFile,
  sanitizeFilename,
  saveUpload,
} from "@/lib/storage/files";

describe("generateSubmissionId", () => {
  it("prefixes the UTC date to eight hex characters", () => {
    const id = generateSubmissionId(new Date("2025-03-09T23:00:00Z"));
    expect(id).toMatch(/^20250309_[0-9a-f]{8}$/);
  });

  it("is unique per call", () => {
    const now = new Date();
    expect(generateSubmissionId(now)).not.toBe(generateSubmissionId(now));
  });
});

describe("sanitizeFilename", () => {
  it("keeps only the basename", () => {
    expect(sanitizeFilename("../../etc/passwd.pdf")).toBe("passwd.pdf");
    expect(sanitizeFilename("C:\\Users\\me\\paper.pdf")).toBe("paper.pdf");
  });

  it("replaces spaces and drops unsafe characters", () => {
    expect(sanitizeFilename("Résumé draft #1.pdf")).toBe("Resume_draft_1.pdf");
  });

  it("strips leading dots", () => {
    expect(sanitizeFilename("..hidden.pdf")).toBe("hidden.pdf");
  });

  it("falls back when nothing usable remains", () => {
    expect(sanitizeFilename("???")).toBe("paper.pdf");
  });
});

describe("resolveResultFile", () => {
  it("resolves plain names inside the folder", () => {
    expect(resolveResultFile("/srv/results", "a_certificate.pdf")).toBe(
      path.join("/srv/results", "a_certificate.pdf")
    );
  });

  it("rejects names that could leave the folder", () => {
    expect(resolveResultFile("/srv/results", "")).toBeNull();
    expect(resolveResultFile("/srv/results", "../secret.pdf")).toBeNull();
    expect(resolveResultFile("/srv/results", "sub/file.pdf")).toBeNull();
    expect(resolveResultFile("/srv/results", "sub\\file.pdf")).toBeNull();
  });
});

describe("buildDownloadName", () => {
  it("uses the sanitized paper title", () => {
    expect(buildDownloadName("Deep Learning: A Survey", "Certificate.pdf")).toBe(
      "Deep_Learning_A_Survey_Certificate.pdf"
    );
  });

  it("falls back to a generic title", () => {
    expect(buildDownloadName(null, "All_Reviews.zip")).toBe("Research_Paper_All_Reviews.zip");
    expect(buildDownloadName("???", "Certificate.pdf")).toBe("Research_Paper_Certificate.pdf");
  });
});

describe("contentTypeFor", () => {
  it("maps known extensions", () => {
    expect(contentTypeFor("x.PDF")).toBe("application/pdf");
    expect(contentTypeFor("x.zip")).toBe("application/zip");
    expect(contentTypeFor("x.bin")).toBe("application/octet-stream");
  });
});

describe("upload files", () => {
  let folder: string;

  beforeEach(async () => {
    folder = await mkdtemp(path.join(os.tmpdir(), "storage-"));
  });

  afterEach(async () => {
    await rm(folder, { recursive: true, force: true });
  });

  it("saves, reads and removes an upload", async () => {
    const uploads = path.join(folder, "uploads");
    await ensureDirectories(uploads);

    const filePath = await saveUpload(uploads, "20250101_abcdef12", "paper.pdf", new Uint8Array([1, 2]));

    expect(filePath).toBe(path.join(uploads, "20250101_abcdef12_paper.pdf"));
    expect([...(await readUpload(filePath))]).toEqual([1, 2]);
    await removeFile(filePath);
    await expect(stat(filePath)).rejects.toThrow();
    await removeFile(filePath);
  });

  it("never overwrites an existing upload", async () => {
    await saveUpload(folder, "id", "paper.pdf", new Uint8Array([1]));
    await expect(saveUpload(folder, "id", "paper.pdf", new Uint8Array([2]))).rejects.toThrow();
    expect([...(await readFile(path.join(folder, "id_paper.pdf")))]).toEqual([1]);
  });
});

describe("isMissingFile", () => {
  it("recognises ENOENT from fs and nothing else", async () => {
    const missing = await readUpload(path.join(os.tmpdir(), "no-such-upload.pdf")).catch(
      (error: unknown) => error
    );
    expect(isMissingFile(missing)).toBe(true);
    expect(isMissingFile(new Error("ENOENT"))).toBe(false);
    expect(isMissingFile("ENOENT")).toBe(false);
  });
});
