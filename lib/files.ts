import fs from "fs";
import path from "path";
import { randomUUID } from "crypto";
import { logDebugWithTs, logWarnWithTs } from "@/lib/logger";

export function isNotFoundError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    Reflect.get(err, "code") === "ENOENT"
  );
}

export async function ensureDir(dir: string): Promise<void> {
  await fs.promises.mkdir(dir, { recursive: true });
}

/**
 * Write a file by writing a sibling temp file and renaming it over the target,
 * so readers only ever see the old or the new content.
 */
export async function writeFileAtomic(filePath: string, content: string | Uint8Array): Promise<void> {
  const tempPath = `${filePath}.${randomUUID().slice(0, 8)}.tmp`;
  try {
    await fs.promises.writeFile(tempPath, content);
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

/** Remove a file, ignoring a missing one. Returns true when something was deleted. */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.promises.unlink(filePath);
    return true;
  } catch (error) {
    if (isNotFoundError(error)) return false;
    throw error;
  }
}

/**
 * Clean up temporary file; failures are logged, never thrown
 */
export async function cleanupTempFile(filePath: string): Promise<void> {
  try {
    if (await removeFile(filePath)) {
      logDebugWithTs(`🗑️ Removed temp file ${path.basename(filePath)}`);
    }
  } catch (error) {
    logWarnWithTs(`Failed to cleanup temp file: ${filePath}`, error);
  }
}

export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw error;
  }
}

/** Lowercase, filesystem-safe version of a user supplied file name. */
export function safeFileName(name: string, fallback = "video.mp4"): string {
  const base = path.basename(name.trim());
  const cleaned = base
    .toLowerCase()
    .replace(/[^a-z0-9_.-]/gi, "_")
    .replace(/_+/g, "_")
    .replace(/^[._]+/, "");
  return cleaned.slice(0, 120) || fallback;
}
