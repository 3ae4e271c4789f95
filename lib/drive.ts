/**
 * Google Drive acquisition: share-link parsing and the download fallback chain
 * (direct, confirmation page, alternate hosts, headless browser).
 */
import fs from "fs";
import * as cheerio from "cheerio";
import { AcquisitionError, CancelledError } from "@/lib/errors";
import { HttpStatusError, validateArtifact, writeResponseToFile, type FetchLike } from "@/lib/download";
import { cleanupTempFile, ensureDir } from "@/lib/files";
import { retryWithBackoff } from "@/lib/retry";
import { logWarnWithTs, logWithTs } from "@/lib/logger";

export const DRIVE_FILE_ID_PATTERN = /^[A-Za-z0-9_-]{25,64}$/;

const DRIVE_HOSTS = new Set(["drive.google.com", "docs.google.com"]);

/**
 * Extract the file id from a Drive share link. Throws before any network call
 * for foreign hosts, unknown link shapes and malformed ids.
 */
export function parseDriveFileId(input: string): string {
  let url: URL;
  try {
    url = new URL(input.trim());
  } catch {
    throw new AcquisitionError("Invalid Google Drive URL");
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new AcquisitionError("Invalid Google Drive URL");
  }

  const host = url.hostname.toLowerCase();
  const fileMatch = url.pathname.match(/^\/file\/d\/([^/]+)/);
  let id: string | null = null;

  if (DRIVE_HOSTS.has(host) && fileMatch) {
    id = fileMatch[1];
  } else if (host === "drive.google.com" && (url.pathname === "/open" || url.pathname === "/uc")) {
    id = url.searchParams.get("id");
  } else if (host === "drive.usercontent.google.com" && url.pathname === "/download") {
    id = url.searchParams.get("id");
  }

  if (!id) {
    throw new AcquisitionError("Unsupported Google Drive URL: expected a file share link");
  }
  if (!DRIVE_FILE_ID_PATTERN.test(id)) {
    throw new AcquisitionError("Invalid Google Drive file id");
  }
  return id;
}

export function directDownloadUrl(fileId: string): string {
  return `https://drive.google.com/uc?export=download&id=${fileId}`;
}

export function alternateDownloadUrls(fileId: string): string[] {
  return [
    `https://drive.usercontent.google.com/download?id=${fileId}&export=download&confirm=t`,
    `https://drive.google.com/uc?export=download&id=${fileId}&confirm=t`,
    `https://docs.google.com/uc?export=download&id=${fileId}&confirm=t`,
  ];
}

export type ConfirmationSource = "form" | "link" | "token";

export interface ConfirmationTarget {
  source: ConfirmationSource;
  url: string;
}

function unescapeEmbeddedUrl(value: string): string {
  return value
    .replace(/\\u([0-9a-fA-F]{4})/g, (_match, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/\\\//g, "/")
    .replace(/&amp;/g, "&");
}

/**
 * Find the real download URL on Drive's "can't scan for viruses" page.
 * Tries a hidden download form, then an embedded usercontent link, then a
 * confirm token (from the page or the download_warning cookie).
 */
export function parseConfirmationPage(
  html: string,
  fileId: string,
  setCookie?: string | null
): ConfirmationTarget | null {
  const $ = cheerio.load(html);

  const form = $("form#download-form").length > 0 ? $("form#download-form") : $("form[action*='download']");
  const action = form.first().attr("action");
  if (action) {
    const url = new URL(action, "https://drive.usercontent.google.com");
    form
      .first()
      .find("input[type='hidden']")
      .each((_, input) => {
        const name = $(input).attr("name");
        if (name) url.searchParams.set(name, $(input).attr("value") ?? "");
      });
    return { source: "form", url: url.toString() };
  }

  const anchor = $("a[href*='drive.usercontent.google.com/download']").first().attr("href");
  if (anchor) {
    return { source: "link", url: unescapeEmbeddedUrl(anchor) };
  }

  const embedded =
    html.match(/https:\/\/drive\.usercontent\.google\.com\/download\?[^"'\s<>]+/)?.[0] ??
    html.match(/"downloadUrl"\s*:\s*"([^"]+)"/)?.[1];
  if (embedded) {
    return { source: "link", url: unescapeEmbeddedUrl(embedded) };
  }

  const token =
    html.match(/[?&;]confirm=([0-9A-Za-z_-]+)/)?.[1] ??
    setCookie?.match(/download_warning[^=]*=([^;,\s]+)/)?.[1];
  if (token) {
    return {
      source: "token",
      url: `https://drive.google.com/uc?export=download&confirm=${token}&id=${fileId}`,
    };
  }

  return null;
}

/** File name announced by Content-Disposition, if any. */
export function filenameFromContentDisposition(header: string | null): string | null {
  if (!header) return null;
  const extended = header.match(/filename\*\s*=\s*(?:UTF-8|utf-8)''([^;]+)/);
  if (extended) {
    try {
      return decodeURIComponent(extended[1].trim());
    } catch {
      return extended[1].trim();
    }
  }
  return header.match(/filename\s*=\s*"([^"]+)"/)?.[1] ?? header.match(/filename\s*=\s*([^;]+)/)?.[1]?.trim() ?? null;
}

export interface BrowserDownloader {
  /** Download the file into `downloadDir` and return the finished file's path. */
  download(fileId: string, downloadDir: string, signal?: AbortSignal): Promise<string>;
}

export interface DriveDownloadResult {
  strategy: string;
  sizeBytes: number;
  /** Name announced by Drive, when one was. */
  filename: string | null;
}

export interface DriveDownloaderOptions {
  sniffMaxBytes: number;
  fetchImpl?: FetchLike;
  browser?: BrowserDownloader | null;
  /** Total tries per attempt for transport errors. */
  retryAttempts?: number;
  retryBaseDelayMs?: number;
}

type AttemptOutcome =
  | { ok: true; sizeBytes: number; filename: string | null }
  | { ok: false; reason: string; html?: string; setCookie?: string | null };

export class DriveDownloader {
  private readonly fetchImpl: FetchLike;
  private readonly retryAttempts: number;
  private readonly retryBaseDelayMs: number;

  constructor(private readonly options: DriveDownloaderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.retryAttempts = options.retryAttempts ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
  }

  /** Run the fallback chain until one strategy yields a valid file at `dest`. */
  async download(fileId: string, dest: string, signal?: AbortSignal): Promise<DriveDownloadResult> {
    const attempts: string[] = [];
    const record = (label: string, reason: string) => {
      attempts.push(`${label}: ${reason}`);
      logWarnWithTs(`⚠️ Drive ${label} failed for ${fileId}: ${reason}`);
    };

    const direct = await this.attempt("direct", directDownloadUrl(fileId), dest, signal);
    if (direct.ok) return { strategy: "direct", sizeBytes: direct.sizeBytes, filename: direct.filename };
    record("direct", direct.reason);

    if (direct.html !== undefined) {
      const target = parseConfirmationPage(direct.html, fileId, direct.setCookie);
      if (target) {
        const confirmed = await this.attempt("confirmation", target.url, dest, signal);
        if (confirmed.ok) {
          return { strategy: `confirmation-${target.source}`, sizeBytes: confirmed.sizeBytes, filename: confirmed.filename };
        }
        record("confirmation", confirmed.reason);
      } else {
        record("confirmation", "no download link on the confirmation page");
      }
    }

    const alternates = alternateDownloadUrls(fileId);
    for (const [i, url] of alternates.entries()) {
      const label = `alternate-${i + 1}`;
      const outcome = await this.attempt(label, url, dest, signal);
      if (outcome.ok) return { strategy: label, sizeBytes: outcome.sizeBytes, filename: outcome.filename };
      record(label, outcome.reason);
    }

    if (this.options.browser) {
      try {
        const sizeBytes = await this.downloadWithBrowser(this.options.browser, fileId, dest, signal);
        return { strategy: "browser", sizeBytes, filename: null };
      } catch (error) {
        if (signal?.aborted) throw new CancelledError();
        record("browser", error instanceof Error ? error.message : String(error));
      }
    }

    throw new AcquisitionError(
      `Google Drive download failed after ${attempts.length} attempts: ${attempts.join("; ")}`,
      attempts
    );
  }

  private async attempt(label: string, url: string, dest: string, signal?: AbortSignal): Promise<AttemptOutcome> {
    if (signal?.aborted) throw new CancelledError();
    try {
      const response = await retryWithBackoff(
        `Drive ${label} download`,
        async () => {
          const res = await this.fetchImpl(url, { redirect: "follow", signal });
          if (res.status >= 500) {
            await res.body?.cancel();
            throw new HttpStatusError(res.status, res.statusText);
          }
          return res;
        },
        this.retryAttempts,
        this.retryBaseDelayMs
      );

      if (!response.ok) {
        await response.body?.cancel();
        return { ok: false, reason: `HTTP ${response.status}` };
      }

      const contentType = response.headers.get("content-type") ?? "";
      if (contentType.includes("text/html")) {
        return {
          ok: false,
          reason: "received an HTML page instead of the file",
          html: await response.text(),
          setCookie: response.headers.get("set-cookie"),
        };
      }

      await writeResponseToFile(response, dest);
      const sizeBytes = await validateArtifact(dest, this.options.sniffMaxBytes);
      logWithTs(`✅ Drive ${label} download complete (${(sizeBytes / 1024 / 1024).toFixed(2)} MB)`);
      return {
        ok: true,
        sizeBytes,
        filename: filenameFromContentDisposition(response.headers.get("content-disposition")),
      };
    } catch (error) {
      if (signal?.aborted) throw new CancelledError();
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }
  }

  private async downloadWithBrowser(
    browser: BrowserDownloader,
    fileId: string,
    dest: string,
    signal?: AbortSignal
  ): Promise<number> {
    const downloadDir = `${dest}.browser`;
    await ensureDir(downloadDir);
    try {
      const downloaded = await browser.download(fileId, downloadDir, signal);
      await fs.promises.rename(downloaded, dest);
      return await validateArtifact(dest, this.options.sniffMaxBytes);
    } catch (error) {
      await cleanupTempFile(dest);
      throw error;
    } finally {
      await fs.promises.rm(downloadDir, { recursive: true, force: true });
    }
  }
}
