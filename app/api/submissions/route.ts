/**
 * POST /api/submissions — Upload a paper and start its review.
 *
 * Multipart form: `paper` (PDF file), optional `paper_title`.
 * Returns 202 immediately; clients poll the status URL.
 */

import { NextRequest, NextResponse } from "next/server";
import { errorResponse } from "@/lib/api/errors";
import { submitPaper } from "@/lib/review/intake";
import { getReviewService } from "@/lib/review/service";

export async function POST(request: NextRequest) {
  let form: FormData;
  try {
    form = await request.formData();
  } catch {
    return NextResponse.json(
      { error: "Expected a multipart form upload" },
      { status: 400 }
    );
  }

  const paper = form.get("paper");
  if (!(paper instanceof File)) {
    return NextResponse.json({ error: "No file uploaded" }, { status: 400 });
  }
  const title = form.get("paper_title");

  try {
    const { config, store, coordinator } = await getReviewService();
    const submission = await submitPaper(
      { store, coordinator, uploadFolder: config.uploadFolder },
      {
        title: typeof title === "string" ? title : null,
        filename: paper.name,
        data: new Uint8Array(await paper.arrayBuffer()),
      }
    );

    return NextResponse.json(
      {
        submissionId: submission.submissionId,
        statusUrl: `/api/submissions/${encodeURIComponent(submission.submissionId)}`,
      },
      { status: 202 }
    );
  } catch (error) {
    return errorResponse(error, "Submission");
  }
}
