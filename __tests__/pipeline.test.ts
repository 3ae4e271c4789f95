import fs from "fs";
import path from "path";
import { afterEach, beforeEach, expect, test, vi } from "vitest";
import type { AcquiredSource, MediaSegment, TaskPatch, TranscriptTask, TranscriptionResult } from "@/types/transcription";
import { FileTaskStore, newTask } from "@/lib/store";
import { TranscriptionPipeline, mergeResults, withCaptions, type SegmentTranscriber } from "@/lib/pipeline";
import { parseTranscriptionRequest, type TranscriptionRequest } from "@/lib/request";
import { TranscriptionAdapter, type RawTranscript, type SpeechToText, type TranscribeOptions } from "@/lib/transcription";
import { AcquisitionError, TranscriptionFailure, TranscriptionTimeout } from "@/lib/errors";
import { exists, makeTempDir, removeDir } from "./helpers";

const TASK_ID = "task-1";

class RecordingStore extends FileTaskStore {
  readonly history: TranscriptTask[] = [];

  override async update(id: string, patch: TaskPatch): Promise<TranscriptTask> {
    const task = await super.update(id, patch);
    this.history.push(task);
    return task;
  }
}

let root: string;
let store: RecordingStore;

beforeEach(async () => {
  root = await makeTempDir();
  store = new RecordingStore({ dir: path.join(root, "tasks") });
  await store.init();
  await store.create(newTask(TASK_ID, "video.mp4"));
});

afterEach(async () => {
  await removeDir(root);
});

function resolverFor(filename: string) {
  return {
    resolve: vi.fn(async (taskId: string): Promise<AcquiredSource> => {
      const dir = path.join(root, "downloads");
      await fs.promises.mkdir(dir, { recursive: true });
      const file = path.join(dir, `${taskId}_${filename}`);
      await fs.promises.writeFile(file, "media");
      return { path: file, filename, sizeBytes: 5, sourceType: "url" };
    }),
  };
}

/** Segmenter double: one unowned segment, or owned pieces written to the work dir. */
function segmenterFor(offsets: number[], pieceSec = 600, captions: string | null = null) {
  return {
    split: vi.fn(async (file: string, _maxMinutes: number, workDir: string): Promise<MediaSegment[]> => {
      if (offsets.length === 1) {
        return [{ index: 0, path: file, startOffsetSec: 0, durationSec: pieceSec, owned: false }];
      }
      await fs.promises.mkdir(workDir, { recursive: true });
      return Promise.all(
        offsets.map(async (offset, index) => {
          const piece = path.join(workDir, `part${index + 1}.mp3`);
          await fs.promises.writeFile(piece, "audio");
          return { index, path: piece, startOffsetSec: offset, durationSec: pieceSec, owned: true };
        })
      );
    }),
    extractAudio: vi.fn(async (file: string, workDir: string): Promise<string> => {
      await fs.promises.mkdir(workDir, { recursive: true });
      const output = path.join(workDir, `${path.parse(file).name}_audio.mp3`);
      await fs.promises.writeFile(output, "audio");
      return output;
    }),
    extractCaptions: vi.fn(async (): Promise<string | null> => captions),
  };
}

function transcriberFrom(handler: (file: string) => Promise<string> | string) {
  return {
    transcribe: vi.fn(async (file: string, options?: TranscribeOptions): Promise<TranscriptionResult> => {
      const text = await handler(file);
      const offsetMs = options?.offsetMs ?? 0;
      return { text, segments: [{ startMs: offsetMs, endMs: offsetMs + 1000, text }], language: "pt" };
    }),
  };
}

const PART_TEXT: Record<string, string> = {
  "part1.mp3": "part one",
  "part2.mp3": "part two",
  "part3.mp3": "part three",
};

function pipelineWith(
  resolver: ReturnType<typeof resolverFor> | { resolve: (taskId: string) => Promise<AcquiredSource> },
  segmenter: ReturnType<typeof segmenterFor>,
  transcriber: SegmentTranscriber
) {
  return new TranscriptionPipeline({
    store,
    resolver,
    segmenter,
    transcriber,
    settings: {
      tempDir: path.join(root, "temp"),
      transcriptsDir: path.join(root, "transcripts"),
      defaultMaxSegmentMinutes: 10,
      extractAudio: true,
      transcribeConcurrency: 2,
      defaultLanguage: "pt",
    },
  });
}

function request(input: Record<string, unknown>): TranscriptionRequest {
  return parseTranscriptionRequest(input);
}

async function finalTask(): Promise<TranscriptTask> {
  const task = await store.get(TASK_ID);
  if (!task) throw new Error("task disappeared");
  return task;
}

test("transcribes segments concurrently and merges them in order", async () => {
  const resolver = resolverFor("talk.mp3");
  const segmenter = segmenterFor([0, 600, 1200]);
  const transcriber = transcriberFrom(async (file) => {
    const name = path.basename(file);
    if (name === "part1.mp3") await new Promise((resolve) => setTimeout(resolve, 30));
    return PART_TEXT[name];
  });

  await pipelineWith(resolver, segmenter, transcriber).run(
    TASK_ID,
    request({ url: "https://cdn.example.com/talk.mp3" })
  );

  const task = await finalTask();
  const transcriptFile = path.join(root, "transcripts", "task-1_transcription.txt");
  expect(task.status).toBe("succeeded");
  expect(task.progress).toBe(1);
  expect(task.message).toBe("Transcription completed");
  expect(task.transcript).toBe("part one\n\npart two\n\npart three");
  expect(task.segments).toEqual([
    { startMs: 0, endMs: 1000, text: "part one" },
    { startMs: 600_000, endMs: 601_000, text: "part two" },
    { startMs: 1_200_000, endMs: 1_201_000, text: "part three" },
  ]);
  expect(task.language).toBe("pt");
  expect(task.filename).toBe("talk.mp3");
  expect(task.transcriptFile).toBe(transcriptFile);
  expect(task.fileInfo).toEqual({
    sizeBytes: 5,
    sizeMb: 0,
    sourceType: "url",
    sourcePath: path.join(root, "downloads", "task-1_talk.mp3"),
    durationSec: 1800,
    segmentCount: 3,
  });
  expect(await fs.promises.readFile(transcriptFile, "utf-8")).toBe(task.transcript);

  expect(segmenter.extractAudio).not.toHaveBeenCalled();
  expect(segmenter.extractCaptions).not.toHaveBeenCalled();
  expect(segmenter.split.mock.calls[0][1]).toBe(10);
  expect(transcriber.transcribe.mock.calls.map((call) => call[1]?.language)).toEqual(["pt", "pt", "pt"]);

  expect(await exists(path.join(root, "downloads", "task-1_talk.mp3"))).toBe(false);
  expect(await exists(path.join(root, "temp", TASK_ID))).toBe(false);
});

test("reports stages in order with progress that never decreases", async () => {
  await pipelineWith(resolverFor("talk.mp3"), segmenterFor([0, 600, 1200]), transcriberFrom((file) => PART_TEXT[path.basename(file)])).run(
    TASK_ID,
    request({ url: "https://cdn.example.com/talk.mp3" })
  );

  const statuses = store.history.map((task) => task.status).filter((status, i, all) => status !== all[i - 1]);
  expect(statuses).toEqual(["acquiring", "segmenting", "transcribing", "persisting", "succeeded"]);

  const progress = store.history.map((task) => task.progress);
  for (let i = 1; i < progress.length; i++) {
    expect(progress[i]).toBeGreaterThanOrEqual(progress[i - 1]);
  }
  expect(progress.slice(0, 4)).toEqual([0.05, 0.15, 0.2, 0.25]);
  expect(progress[progress.length - 2]).toBe(0.95);
  expect(progress[progress.length - 3]).toBeCloseTo(0.9);
  expect(store.history.map((task) => task.message)).toContain("Transcribing segment 3/3...");
});

test("prepends embedded captions and transcribes extracted audio", async () => {
  const segmenter = segmenterFor([0], 42, "Hello caption");
  const transcriber = transcriberFrom(() => "spoken words");

  await pipelineWith(resolverFor("talk.mp4"), segmenter, transcriber).run(
    TASK_ID,
    request({ url: "https://cdn.example.com/talk.mp4", extract_subtitles: true, language: "en", max_segment_minutes: 5 })
  );

  const task = await finalTask();
  const audio = path.join(root, "temp", TASK_ID, "task-1_talk_audio.mp3");
  expect(task.transcript).toBe("=== CAPTIONS ===\nHello caption\n\n=== TRANSCRIPT ===\nspoken words");
  expect(segmenter.extractAudio.mock.calls[0][0]).toBe(path.join(root, "downloads", "task-1_talk.mp4"));
  expect(segmenter.split.mock.calls[0].slice(0, 2)).toEqual([audio, 5]);
  expect(transcriber.transcribe.mock.calls[0][0]).toBe(audio);
  expect(transcriber.transcribe.mock.calls[0][1]?.language).toBe("en");
  expect(await exists(audio)).toBe(false);
});

test("retries a failed single audio segment with the original file", async () => {
  const source = path.join(root, "downloads", "task-1_talk.mp4");
  const transcriber = transcriberFrom((file) => {
    if (file.endsWith("_audio.mp3")) throw new TranscriptionFailure("fake returned no transcript");
    return "original words";
  });

  await pipelineWith(resolverFor("talk.mp4"), segmenterFor([0]), transcriber).run(
    TASK_ID,
    request({ url: "https://cdn.example.com/talk.mp4" })
  );

  const task = await finalTask();
  expect(task.status).toBe("succeeded");
  expect(task.transcript).toBe("original words");
  expect(transcriber.transcribe).toHaveBeenCalledTimes(2);
  expect(transcriber.transcribe.mock.calls[1][0]).toBe(source);
  expect(transcriber.transcribe.mock.calls[1][1]?.offsetMs).toBe(0);
});

test("skips a failed segment when others succeed", async () => {
  const transcriber = transcriberFrom((file) => {
    const name = path.basename(file);
    if (name === "part2.mp3") throw new TranscriptionFailure("fake returned no transcript");
    return PART_TEXT[name];
  });

  await pipelineWith(resolverFor("talk.mp3"), segmenterFor([0, 600, 1200]), transcriber).run(
    TASK_ID,
    request({ url: "https://cdn.example.com/talk.mp3" })
  );

  const task = await finalTask();
  expect(task.status).toBe("succeeded");
  expect(task.transcript).toBe("part one\n\npart three");
  expect(task.segments.map((segment) => segment.startMs)).toEqual([0, 1_200_000]);
});

test("fails the task when every segment fails", async () => {
  const transcriber = transcriberFrom(() => {
    throw new TranscriptionTimeout(1000);
  });

  await pipelineWith(resolverFor("talk.mp3"), segmenterFor([0, 600]), transcriber).run(
    TASK_ID,
    request({ url: "https://cdn.example.com/talk.mp3" })
  );

  const task = await finalTask();
  expect(task.status).toBe("failed");
  expect(task.message).toBe("Transcription timed out after 1s");
  expect(task.transcript).toBeNull();
  expect(task.transcriptFile).toBeNull();
  expect(task.completedAt).not.toBeNull();
  expect(task.progress).toBeLessThan(1);
  expect(await exists(path.join(root, "transcripts", "task-1_transcription.txt"))).toBe(false);
  expect(await exists(path.join(root, "downloads", "task-1_talk.mp3"))).toBe(false);
});

test("fails the task when the backend misses the transcription deadline", async () => {
  const signals: AbortSignal[] = [];
  const backend: SpeechToText = {
    name: "stalled",
    transcribeFile: (_file, options) => {
      signals.push(options.signal);
      return new Promise<RawTranscript>(() => undefined);
    },
  };
  const transcriber = new TranscriptionAdapter(backend, { timeoutMs: 50, defaultLanguage: "pt" });

  await pipelineWith(resolverFor("talk.mp3"), segmenterFor([0]), transcriber).run(
    TASK_ID,
    request({ url: "https://cdn.example.com/talk.mp3" })
  );

  const task = await finalTask();
  expect(task.status).toBe("failed");
  expect(task.message).toBe("Transcription timed out after 0s");
  expect(task.transcript).toBeNull();
  expect(signals).toHaveLength(1);
  expect(signals[0].aborted).toBe(true);
});

test("records acquisition failures verbatim and never segments", async () => {
  const message = "Google Drive download failed after 4 attempts: direct: HTTP 404";
  const segmenter = segmenterFor([0]);
  const resolver = {
    resolve: async (): Promise<AcquiredSource> => {
      throw new AcquisitionError(message);
    },
  };

  await pipelineWith(resolver, segmenter, transcriberFrom(() => "unused")).run(
    TASK_ID,
    request({ google_drive_url: "https://drive.google.com/file/d/abc/view" })
  );

  const task = await finalTask();
  expect(task.status).toBe("failed");
  expect(task.message).toBe(message);
  expect(segmenter.split).not.toHaveBeenCalled();
});

test("keeps internal paths out of failure messages", async () => {
  const resolver = {
    resolve: async (): Promise<AcquiredSource> => {
      throw new Error("open '/var/lib/app/secret/file.mp4' failed");
    },
  };

  await pipelineWith(resolver, segmenterFor([0]), transcriberFrom(() => "unused")).run(
    TASK_ID,
    request({ url: "https://cdn.example.com/file.mp4" })
  );

  expect((await finalTask()).message).toBe("open 'file.mp4' failed");
});

test("ends as cancelled when the signal fires mid-transcription", async () => {
  const controller = new AbortController();
  const transcriber = transcriberFrom(() => {
    controller.abort();
    throw new Error("request aborted");
  });

  await pipelineWith(resolverFor("talk.mp3"), segmenterFor([0]), transcriber).run(
    TASK_ID,
    request({ url: "https://cdn.example.com/talk.mp3" }),
    controller.signal
  );

  const task = await finalTask();
  expect(task.status).toBe("failed");
  expect(task.message).toBe("Cancelled by request");
  expect(await exists(path.join(root, "downloads", "task-1_talk.mp3"))).toBe(false);
});

test("resolves even when the task was deleted underneath it", async () => {
  const resolver = {
    resolve: async (taskId: string): Promise<AcquiredSource> => {
      await store.delete(taskId);
      throw new Error("network down");
    },
  };

  await expect(
    pipelineWith(resolver, segmenterFor([0]), transcriberFrom(() => "unused")).run(
      TASK_ID,
      request({ url: "https://cdn.example.com/talk.mp3" })
    )
  ).resolves.toBeUndefined();
  expect(await store.get(TASK_ID)).toBeNull();
});

test("merge helpers", () => {
  const result = (text: string, language: string): TranscriptionResult => ({
    text,
    segments: [{ startMs: 0, endMs: 1000, text }],
    language,
  });

  expect(mergeResults([result(" a ", "en"), null, result("", "pt"), result("b", "pt")])).toEqual({
    text: "a\n\nb",
    segments: [
      { startMs: 0, endMs: 1000, text: " a " },
      { startMs: 0, endMs: 1000, text: "" },
      { startMs: 0, endMs: 1000, text: "b" },
    ],
    language: "en",
  });
  expect(mergeResults([null]).language).toBeNull();
  expect(withCaptions("body", null)).toBe("body");
});
