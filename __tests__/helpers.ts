import fs from "fs";
import os from "os";
import path from "path";

export async function makeTempDir(prefix = "transcriber-test-"): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Resolve once `check` returns true, polling every few milliseconds. */
export async function waitFor(check: () => Promise<boolean> | boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await check())) {
    if (Date.now() > deadline) throw new Error("waitFor timed out");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/** A response whose body reports when it is cancelled without being read. */
export function cancellableResponse(status: number, onCancel: () => void): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode(`status ${status}`));
    },
    cancel() {
      onCancel();
    },
  });
  return new Response(body, { status });
}
