/**
 * Turns a transcription request into a local media file under the downloads
 * directory, whatever the source kind.
 */
import fs from "fs";
import path from "path";
import type { AcquiredSource } from "@/types/transcription";
import type { TranscriptionRequest } from "@/lib/request";
import { AcquisitionError, CancelledError } from "@/lib/errors";
import { downloadFileStream, validateArtifact, type FetchLike } from "@/lib/download";
import { DriveDownloader, parseDriveFileId } from "@/lib/drive";
import { cleanupTempFile, ensureDir, safeFileName } from "@/lib/files";
import { logWithTs } from "@/lib/logger";

const DEFAULT_FILENAME = "video.mp4";

/**
 * Decode an inline payload: optional data-URI prefix, whitespace and the
 * URL-safe alphabet are accepted; anything else outside base64 is rejected.
 */
export function decodeBase64Payload(data: string): Buffer {
  let payload = data.trim();
  const prefix = payload.match(/^data:[^,]*;base64,/i);
  if (prefix) payload = payload.slice(prefix[0].length);

  payload = payload.replace(/\s+/g, "").replace(/-/g, "+").replace(/_/g, "/");
  if (!payload.includes("=")) {
    if (payload.length % 4 === 2) payload += "==";
    else if (payload.length % 4 === 3) payload += "=";
  }

  if (payload.length % 4 !== 0 || !/^[A-Za-z0-9+/]*={0,2}$/.test(payload)) {
    throw new AcquisitionError("Invalid base64 payload");
  }

  const bytes = Buffer.from(payload, "base64");
  if (bytes.length === 0) {
    throw new AcquisitionError("Base64 payload decodes to an empty file");
  }
  return bytes;
}

/** Last path component of a URL, when it looks like a file name. */
export function filenameFromUrl(rawUrl: string): string | null {
  try {
    const last = new URL(rawUrl).pathname.split("/").filter(Boolean).pop();
    if (!last) return null;
    const decoded = decodeURIComponent(last);
    return path.extname(decoded) ? decoded : null;
  } catch {
    return null;
  }
}

export interface SourceResolverOptions {
  downloadsDir: string;
  sniffMaxBytes: number;
  fetchImpl?: FetchLike;
  drive?: DriveDownloader;
}

export class SourceResolver {
  private readonly fetchImpl: FetchLike;
  private readonly drive: DriveDownloader;

  constructor(private readonly options: SourceResolverOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.drive =
      options.drive ?? new DriveDownloader({ sniffMaxBytes: options.sniffMaxBytes, fetchImpl: this.fetchImpl });
  }

  async resolve(taskId: string, request: TranscriptionRequest, signal?: AbortSignal): Promise<AcquiredSource> {
    await ensureDir(this.options.downloadsDir);
    if (request.google_drive_url !== undefined) {
      return this.resolveDrive(taskId, request.google_drive_url, request.filename, signal);
    }
    if (request.base64_data !== undefined) {
      return this.resolveInline(taskId, request.base64_data, request.filename);
    }
    if (request.url !== undefined) {
      return this.resolveUrl(taskId, request.url, request.filename, signal);
    }
    throw new AcquisitionError("No source provided");
  }

  private destination(taskId: string, filename: string): string {
    return path.join(this.options.downloadsDir, `${taskId}_${safeFileName(filename, DEFAULT_FILENAME)}`);
  }

  private async resolveUrl(
    taskId: string,
    url: string,
    filenameHint: string | undefined,
    signal?: AbortSignal
  ): Promise<AcquiredSource> {
    const filename = filenameHint ?? filenameFromUrl(url) ?? DEFAULT_FILENAME;
    const dest = this.destination(taskId, filename);
    logWithTs(`⬇️ Downloading ${new URL(url).host} source for task ${taskId}`);

    try {
      await downloadFileStream(this.fetchImpl, url, dest, signal);
      const sizeBytes = await validateArtifact(dest, this.options.sniffMaxBytes);
      return { path: dest, filename, sizeBytes, sourceType: "url" };
    } catch (error) {
      await cleanupTempFile(dest);
      if (signal?.aborted) throw new CancelledError();
      throw new AcquisitionError(`Download failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async resolveDrive(
    taskId: string,
    shareUrl: string,
    filenameHint: string | undefined,
    signal?: AbortSignal
  ): Promise<AcquiredSource> {
    const fileId = parseDriveFileId(shareUrl);
    const dest = this.destination(taskId, filenameHint ?? `${fileId}.mp4`);
    logWithTs(`⬇️ Downloading Google Drive file ${fileId} for task ${taskId}`);

    const result = await this.drive.download(fileId, dest, signal);
    logWithTs(`✅ Google Drive file ${fileId} acquired via ${result.strategy}`);

    if (filenameHint || !result.filename) {
      return { path: dest, filename: filenameHint ?? `${fileId}.mp4`, sizeBytes: result.sizeBytes, sourceType: "google_drive" };
    }

    // Keep the announced name (and so its extension) for the local copy.
    const named = this.destination(taskId, result.filename);
    if (named !== dest) {
      await fs.promises.rename(dest, named);
    }
    return { path: named, filename: result.filename, sizeBytes: result.sizeBytes, sourceType: "google_drive" };
  }

  private async resolveInline(
    taskId: string,
    data: string,
    filenameHint: string | undefined
  ): Promise<AcquiredSource> {
    const bytes = decodeBase64Payload(data);
    const filename = filenameHint ?? DEFAULT_FILENAME;
    const dest = this.destination(taskId, filename);
    await fs.promises.writeFile(dest, bytes);
    logWithTs(`📦 Wrote inline payload for task ${taskId} (${(bytes.length / 1024 / 1024).toFixed(2)} MB)`);
    return { path: dest, filename, sizeBytes: bytes.length, sourceType: "base64" };
  }
}
