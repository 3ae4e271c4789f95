import { NextResponse } from "next/server";
import { getTranscriptionService } from "@/lib/container";
import { errorResponse } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const service = await getTranscriptionService();
    return NextResponse.json(await service.health());
  } catch (error) {
    return errorResponse(error, "checking health");
  }
}
