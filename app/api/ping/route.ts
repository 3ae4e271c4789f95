import { NextResponse } from "next/server";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

// Liveness only: answers without touching the store or the queue.
export async function GET() {
  return NextResponse.json({ pong: new Date().toISOString() });
}
