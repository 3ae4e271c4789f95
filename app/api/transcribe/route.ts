import { NextResponse } from "next/server";
import { getTranscriptionService } from "@/lib/container";
import { errorResponse } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json({ error: "Request body must be valid JSON" }, { status: 400 });
  }

  try {
    const service = await getTranscriptionService();
    const task = await service.submit(body);

    return NextResponse.json({
      task_id: task.id,
      status: task.status,
      message: "Transcription started. Poll the status URL for progress.",
      check_status_url: `/api/status/${task.id}`,
    });
  } catch (error) {
    return errorResponse(error, "starting transcription");
  }
}
