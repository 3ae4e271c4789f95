import fs from "fs";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { cleanupTempFile, ensureDir, fileSize } from "@/lib/files";
import { logDebugWithTs } from "@/lib/logger";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** Thrown for non-2xx responses; `status` lets the retry helper spot 5xx. */
export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ""}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

const SNIFF_WINDOW_BYTES = 2048;

const ERROR_PAGE_MARKERS = [
  "<!doctype html",
  "<html",
  "quota exceeded",
  "too many users have viewed or downloaded this file",
  "access denied",
  "virus scan warning",
];

async function* readChunks(body: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}

/** Stream a response body to `dest`, removing the partial file on failure. */
export async function writeResponseToFile(response: Response, dest: string): Promise<number> {
  if (!response.body) {
    throw new Error("Response has no body");
  }
  await ensureDir(path.dirname(dest));
  try {
    await pipeline(Readable.from(readChunks(response.body)), fs.createWriteStream(dest));
  } catch (error) {
    await cleanupTempFile(dest);
    throw error;
  }
  return (await fileSize(dest)) ?? 0;
}

export async function downloadFileStream(
  fetchImpl: FetchLike,
  url: string,
  dest: string,
  signal?: AbortSignal
): Promise<number> {
  const res = await fetchImpl(url, { redirect: "follow", signal });
  if (!res.ok) {
    throw new HttpStatusError(res.status, res.statusText);
  }
  const bytes = await writeResponseToFile(res, dest);
  logDebugWithTs(`⬇️ Downloaded ${bytes} bytes to ${path.basename(dest)}`);
  return bytes;
}

/**
 * Reason a downloaded artifact is not usable media, or null when it is fine.
 * Small files are sniffed for HTML or a known error page.
 */
export async function inspectArtifact(filePath: string, sniffMaxBytes: number): Promise<string | null> {
  const size = await fileSize(filePath);
  if (size === null) return "downloaded file is missing";
  if (size === 0) return "downloaded file is empty";
  if (size >= sniffMaxBytes) return null;

  const handle = await fs.promises.open(filePath, "r");
  let head: string;
  try {
    const buffer = Buffer.alloc(Math.min(SNIFF_WINDOW_BYTES, size));
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
    head = buffer.subarray(0, bytesRead).toString("utf-8").toLowerCase();
  } finally {
    await handle.close();
  }

  const marker = ERROR_PAGE_MARKERS.find((m) => head.includes(m));
  return marker ? `downloaded file is an error page (${marker})` : null;
}

/** Like inspectArtifact, but deletes and throws on an unusable file. */
export async function validateArtifact(filePath: string, sniffMaxBytes: number): Promise<number> {
  const problem = await inspectArtifact(filePath, sniffMaxBytes);
  if (problem) {
    await cleanupTempFile(filePath);
    throw new Error(problem);
  }
  return (await fileSize(filePath)) ?? 0;
}
