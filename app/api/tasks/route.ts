import { NextResponse } from "next/server";
import { getTranscriptionService } from "@/lib/container";
import { errorResponse } from "@/lib/http";
import { toPublicTask } from "@/lib/task-document";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const service = await getTranscriptionService();
    const tasks = await service.listTasks();
    return NextResponse.json({ tasks: tasks.map(toPublicTask) });
  } catch (error) {
    return errorResponse(error, "listing tasks");
  }
}

export async function DELETE(req: Request) {
  const { searchParams } = new URL(req.url);
  const taskId = searchParams.get("id");

  if (!taskId) {
    return NextResponse.json({ error: "Task ID is required" }, { status: 400 });
  }

  try {
    const service = await getTranscriptionService();
    await service.deleteTask(taskId);
    return NextResponse.json({ success: true, task_id: taskId });
  } catch (error) {
    return errorResponse(error, `deleting task ${taskId}`);
  }
}
