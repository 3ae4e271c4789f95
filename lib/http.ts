import { NextResponse } from "next/server";
import { PipelineError } from "@/lib/errors";
import { logErrorWithTs } from "@/lib/logger";

/** Map an error to the JSON `{ error }` body the API answers with. */
export function errorResponse(error: unknown, context: string): NextResponse {
  if (error instanceof PipelineError) {
    return NextResponse.json({ error: error.message }, { status: error.status });
  }
  logErrorWithTs(`Error ${context}:`, error);
  return NextResponse.json({ error: "Internal server error" }, { status: 500 });
}
