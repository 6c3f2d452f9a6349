/**
 * PDF artifacts — certificates of acceptance and per-reviewer reports.
 *
 * Rendered with pdf-lib's standard Helvetica fonts, which only encode
 * WinAnsi; text is reduced to that set before drawing.
 */

import { writeFile } from "node:fs/promises";
import path from "node:path";
import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage } from "pdf-lib";
import type { DecisionValue } from "./types";

export interface ReviewReportInput {
  submissionId: string;
  reviewerName: string;
  decision: DecisionValue;
  reviewText: string;
  modelUsed: string | null;
}

export interface CertificateInput {
  submissionId: string;
  paperTitle: string;
}

export interface ArtifactStore {
  /** Writes the report and returns its download URL. */
  writeReviewReport(input: ReviewReportInput): Promise<string>;
  /** Writes the certificate and returns its filename in the results folder. */
  writeCertificate(input: CertificateInput): Promise<string>;
}

const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const MARGIN = 56;
const TITLE_MAX_LENGTH = 80;

const REPLACEMENTS: Record<string, string> = {
  "‘": "'",
  "’": "'",
  "“": '"',
  "”": '"',
  "–": "-",
  "—": "-",
  "…": "...",
  " ": " ",
  "\t": "    ",
};

/**
 * Replace characters Helvetica cannot encode. Keeps newlines.
 */
export function toPdfSafeText(text: string): string {
  let out = "";
  for (const char of text.replace(/\r\n?/g, "\n")) {
    if (REPLACEMENTS[char] !== undefined) {
      out += REPLACEMENTS[char];
    } else if (char === "\n" || (char >= " " && char <= "~")) {
      out += char;
    } else {
      out += "?";
    }
  }
  return out;
}

/**
 * Greedy word wrap. Blank lines in the source are kept; a word wider than
 * the line is split by character.
 */
export function wrapText(
  text: string,
  font: PDFFont,
  fontSize: number,
  maxWidth: number
): string[] {
  const lines: string[] = [];
  const fits = (value: string) =>
    font.widthOfTextAtSize(value, fontSize) <= maxWidth;

  for (const paragraph of text.split("\n")) {
    let line = "";
    for (const word of paragraph.split(/ +/).filter(Boolean)) {
      const candidate = line ? `${line} ${word}` : word;
      if (fits(candidate)) {
        line = candidate;
        continue;
      }
      if (line) lines.push(line);
      line = "";
      let rest = word;
      while (rest.length > 1 && !fits(rest)) {
        let cut = rest.length - 1;
        while (cut > 1 && !fits(rest.slice(0, cut))) cut -= 1;
        lines.push(rest.slice(0, cut));
        rest = rest.slice(cut);
      }
      line = rest;
    }
    lines.push(line);
  }
  return lines;
}

export function truncateTitle(title: string): string {
  return title.length > TITLE_MAX_LENGTH
    ? `${title.slice(0, TITLE_MAX_LENGTH)}...`
    : title;
}

export function formatCertificateDate(date: Date): string {
  return date.toLocaleDateString("en-US", {
    year: "numeric",
    month: "long",
    day: "2-digit",
    timeZone: "UTC",
  });
}

function drawCentered(
  page: PDFPage,
  text: string,
  font: PDFFont,
  size: number,
  y: number
) {
  const width = font.widthOfTextAtSize(text, size);
  page.drawText(text, {
    x: (PAGE_WIDTH - width) / 2,
    y,
    size,
    font,
    color: rgb(0.1, 0.1, 0.1),
  });
}

export async function renderCertificatePdf(
  paperTitle: string,
  certificateId: string,
  issuedAt: Date = new Date()
): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  doc.setTitle("Certificate of Acceptance");
  doc.setSubject(certificateId);

  const page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  const regular = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);

  let y = PAGE_HEIGHT - 200;
  drawCentered(page, "Certificate of Acceptance", bold, 28, y);
  y -= 60;

  const titleLines = wrapText(
    toPdfSafeText(truncateTitle(paperTitle)),
    bold,
    16,
    PAGE_WIDTH - MARGIN * 2
  );
  for (const line of titleLines) {
    drawCentered(page, line, bold, 16, y);
    y -= 22;
  }
  y -= 20;

  drawCentered(
    page,
    "has successfully passed the AI-assisted peer review process",
    regular,
    13,
    y
  );
  y -= 60;

  drawCentered(page, `Date: ${formatCertificateDate(issuedAt)}`, regular, 11, y);
  y -= 18;
  drawCentered(page, `Certificate ID: ${certificateId}`, regular, 11, y);

  return doc.save();
}

export async function renderReviewPdf(input: ReviewReportInput): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  doc.setTitle(`${input.reviewerName} review`);
  doc.setSubject(input.submissionId);

  const regular = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);
  const fontSize = 10;
  const lineHeight = 14;

  let page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  let y = PAGE_HEIGHT - MARGIN;

  page.drawText(toPdfSafeText(`${input.reviewerName} - ${input.decision}`), {
    x: MARGIN,
    y,
    size: 16,
    font: bold,
  });
  y -= 22;
  page.drawText(
    toPdfSafeText(
      `Submission ${input.submissionId}${input.modelUsed ? ` | ${input.modelUsed}` : ""}`
    ),
    { x: MARGIN, y, size: 9, font: regular, color: rgb(0.4, 0.4, 0.4) }
  );
  y -= 28;

  const lines = wrapText(
    toPdfSafeText(input.reviewText),
    regular,
    fontSize,
    PAGE_WIDTH - MARGIN * 2
  );
  for (const line of lines) {
    if (y < MARGIN) {
      page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
      y = PAGE_HEIGHT - MARGIN;
    }
    page.drawText(line, { x: MARGIN, y, size: fontSize, font: regular });
    y -= lineHeight;
  }

  return doc.save();
}

export function slugifyReviewer(reviewerName: string): string {
  return (
    reviewerName
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, "-")
      .replace(/^-+|-+$/g, "") || "reviewer"
  );
}

export function reviewReportFilename(submissionId: string, reviewerName: string): string {
  return `${submissionId}_${slugifyReviewer(reviewerName)}_review.pdf`;
}

export function certificateFilename(submissionId: string): string {
  return `${submissionId}_certificate.pdf`;
}

export function fileUrl(filename: string): string {
  return `/api/files/${encodeURIComponent(filename)}`;
}

/**
 * ArtifactStore writing into the results folder.
 */
export function createFileArtifactStore(resultsFolder: string): ArtifactStore {
  return {
    async writeReviewReport(input) {
      const filename = reviewReportFilename(input.submissionId, input.reviewerName);
      await writeFile(path.join(resultsFolder, filename), await renderReviewPdf(input));
      return fileUrl(filename);
    },

    async writeCertificate(input) {
      const filename = certificateFilename(input.submissionId);
      await writeFile(
        path.join(resultsFolder, filename),
        await renderCertificatePdf(input.paperTitle, input.submissionId)
      );
      return filename;
    },
  };
}
