import fs from "fs";
import path from "path";
import puppeteer, { type Page } from "puppeteer-core";
import { CancelledError } from "@/lib/errors";
import type { BrowserDownloader } from "@/lib/drive";
import { ensureDir } from "@/lib/files";
import { sleep } from "@/lib/retry";
import { logDebugWithTs, logWithTs } from "@/lib/logger";

const PARTIAL_DOWNLOAD_SUFFIXES = [".crdownload", ".part", ".tmp"];

const DOWNLOAD_CONTROLS = [
  "#uc-download-link",
  "form#download-form input[type='submit']",
  "form#download-form button",
  "a[href*='export=download']",
];

export interface WaitForDownloadOptions {
  timeoutMs: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

/**
 * Poll `dir` until a finished download appears: no partial files left and the
 * candidate's size unchanged between two polls.
 */
export async function waitForCompletedDownload(dir: string, options: WaitForDownloadOptions): Promise<string> {
  const pollIntervalMs = options.pollIntervalMs ?? 2000;
  const deadline = Date.now() + options.timeoutMs;
  let lastSeen: { file: string; size: number } | null = null;

  while (Date.now() < deadline) {
    if (options.signal?.aborted) throw new CancelledError();

    const entries = await fs.promises.readdir(dir);
    const partial = entries.some((entry) => PARTIAL_DOWNLOAD_SUFFIXES.some((suffix) => entry.endsWith(suffix)));
    const candidate = entries.find(
      (entry) => !entry.startsWith(".") && !PARTIAL_DOWNLOAD_SUFFIXES.some((suffix) => entry.endsWith(suffix))
    );

    if (candidate && !partial) {
      const file = path.join(dir, candidate);
      const { size } = await fs.promises.stat(file);
      if (size > 0 && lastSeen?.file === file && lastSeen.size === size) {
        return file;
      }
      lastSeen = { file, size };
    } else {
      lastSeen = null;
    }

    await sleep(pollIntervalMs);
  }

  throw new Error(`Browser download timed out after ${Math.round(options.timeoutMs / 1000)}s`);
}

async function clickDownloadControl(page: Page): Promise<boolean> {
  for (const selector of DOWNLOAD_CONTROLS) {
    const control = await page.$(selector);
    if (control) {
      await control.click();
      return true;
    }
  }
  return false;
}

export interface PuppeteerDriveDownloaderOptions {
  executablePath: string;
  timeoutMs: number;
  pollIntervalMs?: number;
}

/** Last-resort Drive download through a locally installed Chromium. */
export class PuppeteerDriveDownloader implements BrowserDownloader {
  constructor(private readonly options: PuppeteerDriveDownloaderOptions) {}

  async download(fileId: string, downloadDir: string, signal?: AbortSignal): Promise<string> {
    await ensureDir(downloadDir);
    logWithTs(`🌐 Opening Drive download page for ${fileId} in a headless browser`);

    const browser = await puppeteer.launch({
      executablePath: this.options.executablePath,
      headless: true,
      args: ["--no-sandbox", "--disable-dev-shm-usage"],
    });
    try {
      const page = await browser.newPage();
      const session = await page.createCDPSession();
      await session.send("Browser.setDownloadBehavior", { behavior: "allow", downloadPath: downloadDir });

      try {
        await page.goto(`https://drive.google.com/uc?export=download&id=${fileId}`, {
          waitUntil: "networkidle2",
          timeout: 60_000,
        });
      } catch (error) {
        // Navigation that turns into a download is reported as aborted.
        if (!(error instanceof Error && error.message.includes("ERR_ABORTED"))) throw error;
      }

      const clicked = await clickDownloadControl(page);
      logDebugWithTs(clicked ? "🖱️ Clicked Drive download control" : "🖱️ No download control, waiting for download");

      return await waitForCompletedDownload(downloadDir, {
        timeoutMs: this.options.timeoutMs,
        pollIntervalMs: this.options.pollIntervalMs,
        signal,
      });
    } finally {
      await browser.close();
    }
  }
}
