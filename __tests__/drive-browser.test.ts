import fs from "fs";
import path from "path";
import { afterEach, beforeEach, expect, test } from "vitest";
import { waitForCompletedDownload } from "@/lib/drive-browser";
import { CancelledError } from "@/lib/errors";
import { makeTempDir, removeDir } from "./helpers";

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(dir);
});

test("returns a download once its size is stable", async () => {
  await fs.promises.writeFile(path.join(dir, "Lecture.mp4"), "bytes");

  expect(await waitForCompletedDownload(dir, { timeoutMs: 1000, pollIntervalMs: 10 })).toBe(
    path.join(dir, "Lecture.mp4")
  );
});

test("times out while only a partial download exists", async () => {
  await fs.promises.writeFile(path.join(dir, "Lecture.mp4.crdownload"), "byt");

  await expect(waitForCompletedDownload(dir, { timeoutMs: 50, pollIntervalMs: 10 })).rejects.toThrow(
    "Browser download timed out after 0s"
  );
});

test("stops when cancelled", async () => {
  const controller = new AbortController();
  controller.abort();

  await expect(
    waitForCompletedDownload(dir, { timeoutMs: 1000, pollIntervalMs: 10, signal: controller.signal })
  ).rejects.toThrow(CancelledError);
});
