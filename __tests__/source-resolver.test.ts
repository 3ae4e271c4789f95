import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { SourceResolver, decodeBase64Payload, filenameFromUrl } from "@/lib/source-resolver";
import { DriveDownloader } from "@/lib/drive";
import { parseTranscriptionRequest } from "@/lib/request";
import { AcquisitionError } from "@/lib/errors";
import { exists, makeTempDir, removeDir } from "./helpers";

const FILE_ID = "1AbCdEfGhIjKlMnOpQrStUvWxYz0";

describe("decodeBase64Payload", () => {
  test("accepts data URIs, whitespace and the URL-safe alphabet", () => {
    expect(decodeBase64Payload("data:video/mp4;base64,SGVsbG8=").toString("utf-8")).toBe("Hello");
    expect(decodeBase64Payload("SGVs\nbG8=").toString("utf-8")).toBe("Hello");
    expect(decodeBase64Payload("-_8")).toEqual(Buffer.from([0xfb, 0xff]));
  });

  test("rejects malformed and empty payloads", () => {
    expect(() => decodeBase64Payload("abc$%")).toThrow(new AcquisitionError("Invalid base64 payload"));
    expect(() => decodeBase64Payload("data:video/mp4;base64,")).toThrow("Base64 payload decodes to an empty file");
  });
});

test("filenameFromUrl keeps names with an extension only", () => {
  expect(filenameFromUrl("https://cdn.example.com/media/My%20Talk.mp4?sig=1")).toBe("My Talk.mp4");
  expect(filenameFromUrl("https://cdn.example.com/watch")).toBeNull();
  expect(filenameFromUrl("https://cdn.example.com/")).toBeNull();
});

describe("SourceResolver", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function resolverWith(fetchImpl: (url: string) => Promise<Response>, sniffMaxBytes = 0) {
    return new SourceResolver({ downloadsDir: dir, sniffMaxBytes, fetchImpl });
  }

  test("writes an inline payload under the task's name", async () => {
    const resolver = resolverWith(async () => new Response(null, { status: 500 }));

    const source = await resolver.resolve(
      "task-1",
      parseTranscriptionRequest({ base64_data: "SGVsbG8=", filename: "Clip.MP4" })
    );

    expect(source).toEqual({ path: path.join(dir, "task-1_clip.mp4"), filename: "Clip.MP4", sizeBytes: 5, sourceType: "base64" });
    expect(await fs.promises.readFile(source.path, "utf-8")).toBe("Hello");
  });

  test("downloads a url source named after its path", async () => {
    const fetchImpl = vi.fn(async () => new Response("video-bytes", { status: 200 }));
    const resolver = resolverWith(fetchImpl);

    const source = await resolver.resolve(
      "task-1",
      parseTranscriptionRequest({ url: "https://cdn.example.com/media/talk.mp4" })
    );

    expect(source).toEqual({ path: path.join(dir, "task-1_talk.mp4"), filename: "talk.mp4", sizeBytes: 11, sourceType: "url" });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  test("reports HTTP failures and leaves nothing behind", async () => {
    const resolver = resolverWith(async () => new Response("nope", { status: 404, statusText: "Not Found" }));

    await expect(
      resolver.resolve("task-1", parseTranscriptionRequest({ url: "https://cdn.example.com/media/talk.mp4" }))
    ).rejects.toThrow(new AcquisitionError("Download failed: HTTP 404 Not Found"));
    expect(await fs.promises.readdir(dir)).toEqual([]);
  });

  test("rejects an HTML error page served as media", async () => {
    const resolver = resolverWith(async () => new Response("<html><body>Access denied</body></html>"), 1024);

    await expect(
      resolver.resolve("task-1", parseTranscriptionRequest({ url: "https://cdn.example.com/media/talk.mp4" }))
    ).rejects.toThrow("Download failed: downloaded file is an error page (<html)");
    expect(await exists(path.join(dir, "task-1_talk.mp4"))).toBe(false);
  });

  test("rejects a bad Drive link without any network call", async () => {
    const fetchImpl = vi.fn(async () => new Response("unused"));
    const resolver = resolverWith(fetchImpl);

    await expect(
      resolver.resolve("task-1", parseTranscriptionRequest({ google_drive_url: "https://example.com/file/d/xyz" }))
    ).rejects.toThrow("Unsupported Google Drive URL: expected a file share link");
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  test("renames a Drive download to the name Drive announces", async () => {
    const fetchImpl = vi.fn(
      async () =>
        new Response("drive-audio", {
          status: 200,
          headers: { "content-type": "audio/mpeg", "content-disposition": 'attachment; filename="Lecture 1.mp3"' },
        })
    );
    const resolver = new SourceResolver({
      downloadsDir: dir,
      sniffMaxBytes: 0,
      drive: new DriveDownloader({ sniffMaxBytes: 0, fetchImpl, retryAttempts: 1 }),
    });

    const source = await resolver.resolve(
      "task-2",
      parseTranscriptionRequest({ google_drive_url: `https://drive.google.com/file/d/${FILE_ID}/view` })
    );

    expect(source).toEqual({
      path: path.join(dir, "task-2_lecture_1.mp3"),
      filename: "Lecture 1.mp3",
      sizeBytes: 11,
      sourceType: "google_drive",
    });
    expect(await fs.promises.readdir(dir)).toEqual(["task-2_lecture_1.mp3"]);
  });
});
