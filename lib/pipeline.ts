/**
 * Drives one task from `queued` to a terminal state:
 * acquire, prepare media, transcribe each segment, merge, persist, clean up.
 */
import fs from "fs";
import path from "path";
import type {
  AcquiredSource,
  FileInfo,
  MediaSegment,
  TaskPatch,
  TranscriptSegment,
  TranscriptionResult,
} from "@/types/transcription";
import type { TranscriptionRequest } from "@/lib/request";
import type { TaskStore } from "@/lib/store";
import type { Segmenter } from "@/lib/segmenter";
import { isVideoFile } from "@/lib/segmenter";
import type { TranscribeOptions } from "@/lib/transcription";
import { runWithConcurrency } from "@/lib/concurrency";
import { CancelledError, TranscriptionFailure, errorCode, sanitizeErrorMessage } from "@/lib/errors";
import { cleanupTempFile, ensureDir, writeFileAtomic } from "@/lib/files";
import { logErrorWithTs, logWarnWithTs, logWithTs } from "@/lib/logger";

export interface SourceAcquirer {
  resolve(taskId: string, request: TranscriptionRequest, signal?: AbortSignal): Promise<AcquiredSource>;
}

export type MediaPreparer = Pick<Segmenter, "split" | "extractAudio" | "extractCaptions">;

export interface SegmentTranscriber {
  transcribe(filePath: string, options?: TranscribeOptions): Promise<TranscriptionResult>;
}

export interface PipelineSettings {
  tempDir: string;
  transcriptsDir: string;
  defaultMaxSegmentMinutes: number;
  extractAudio: boolean;
  transcribeConcurrency: number;
  defaultLanguage?: string;
}

export interface PipelineDeps {
  store: TaskStore;
  resolver: SourceAcquirer;
  segmenter: MediaPreparer;
  transcriber: SegmentTranscriber;
  settings: PipelineSettings;
}

export const PROGRESS = {
  acquiring: 0.05,
  acquired: 0.15,
  segmenting: 0.2,
  transcribing: 0.25,
  transcribed: 0.9,
  persisting: 0.95,
} as const;

type SegmentOutcome = { ok: true; result: TranscriptionResult } | { ok: false; error: unknown };

export function transcriptFileName(taskId: string): string {
  return `${taskId}_transcription.txt`;
}

/** Prepend embedded captions to the transcript when any were found. */
export function withCaptions(transcript: string, captions: string | null): string {
  if (!captions) return transcript;
  return `=== CAPTIONS ===\n${captions}\n\n=== TRANSCRIPT ===\n${transcript}`;
}

/** Join successful segment results in index order. */
export function mergeResults(results: Array<TranscriptionResult | null>): {
  text: string;
  segments: TranscriptSegment[];
  language: string | null;
} {
  const present = results.filter((result): result is TranscriptionResult => result !== null);
  return {
    text: present
      .map((result) => result.text.trim())
      .filter(Boolean)
      .join("\n\n"),
    segments: present.flatMap((result) => result.segments),
    language: present[0]?.language ?? null,
  };
}

function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) throw new CancelledError();
}

export class TranscriptionPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  /** Never rejects: every failure ends as a `failed` task. */
  async run(taskId: string, request: TranscriptionRequest, signal: AbortSignal = new AbortController().signal): Promise<void> {
    const { store, settings } = this.deps;
    const workDir = path.join(settings.tempDir, taskId);
    const toDelete = new Set<string>();
    let transcriptFile: string | null = null;
    const update = (patch: TaskPatch) => store.update(taskId, patch);

    try {
      throwIfCancelled(signal);
      logWithTs(`▶️ Processing task ${taskId}`);
      await update({ status: "acquiring", progress: PROGRESS.acquiring, message: "Downloading source..." });

      const source = await this.deps.resolver.resolve(taskId, request, signal);
      toDelete.add(source.path);
      const fileInfo: FileInfo = {
        sizeBytes: source.sizeBytes,
        sizeMb: Math.round((source.sizeBytes / (1024 * 1024)) * 100) / 100,
        sourceType: source.sourceType,
        sourcePath: source.path,
      };
      await update({
        progress: PROGRESS.acquired,
        message: "Source acquired",
        filename: request.filename ?? source.filename,
        fileInfo,
      });

      throwIfCancelled(signal);
      await update({ status: "segmenting", progress: PROGRESS.segmenting, message: "Preparing media..." });

      const captions = request.extract_subtitles
        ? await this.deps.segmenter.extractCaptions(source.path, workDir, signal)
        : null;

      let mediaPath = source.path;
      let extracted = false;
      if (settings.extractAudio && isVideoFile(source.path)) {
        mediaPath = await this.deps.segmenter.extractAudio(source.path, workDir, signal);
        toDelete.add(mediaPath);
        extracted = true;
      }

      const maxMinutes = request.max_segment_minutes ?? settings.defaultMaxSegmentMinutes;
      const segments = await this.deps.segmenter.split(mediaPath, maxMinutes, workDir, signal);
      for (const segment of segments) {
        if (segment.owned) toDelete.add(segment.path);
      }

      throwIfCancelled(signal);
      const language = request.language ?? settings.defaultLanguage;
      const results = await this.transcribeSegments(taskId, segments, language, signal, {
        fileInfo: {
          ...fileInfo,
          durationSec: segments.reduce((total, segment) => total + segment.durationSec, 0),
          segmentCount: segments.length,
        },
        fallbackPath: extracted ? source.path : null,
      });

      const merged = mergeResults(results);
      const transcript = withCaptions(merged.text, captions);

      throwIfCancelled(signal);
      await update({ status: "persisting", progress: PROGRESS.persisting, message: "Saving transcript..." });
      await ensureDir(settings.transcriptsDir);
      transcriptFile = path.join(settings.transcriptsDir, transcriptFileName(taskId));
      await writeFileAtomic(transcriptFile, transcript);

      await update({
        status: "succeeded",
        progress: 1,
        message: "Transcription completed",
        transcript,
        segments: merged.segments,
        language: merged.language,
        transcriptFile,
      });
      logWithTs(`✅ Completed task ${taskId} (${transcript.length} chars, ${merged.segments.length} segments)`);
    } catch (error) {
      const message = signal.aborted ? new CancelledError().message : sanitizeErrorMessage(error);
      logErrorWithTs(`❌ Failed task ${taskId} [${errorCode(error)}]:`, error);
      if (transcriptFile) await cleanupTempFile(transcriptFile);
      try {
        await update({ status: "failed", message });
      } catch (updateError) {
        logWarnWithTs(`⚠️ Could not record failure of task ${taskId}:`, updateError);
      }
    } finally {
      await this.cleanup(taskId, toDelete, workDir);
    }
  }

  /**
   * Transcribe every segment with bounded fan-out. A failed segment among
   * several is skipped; the task fails only when none succeeds. A single
   * segment cut from extracted audio gets one retry on the original file.
   */
  private async transcribeSegments(
    taskId: string,
    segments: MediaSegment[],
    language: string | undefined,
    signal: AbortSignal,
    context: { fileInfo: FileInfo; fallbackPath: string | null }
  ): Promise<Array<TranscriptionResult | null>> {
    const { store, transcriber, settings } = this.deps;
    const total = segments.length;
    let done = 0;

    await store.update(taskId, {
      status: "transcribing",
      progress: PROGRESS.transcribing,
      message: `Transcribing segment 1/${total}...`,
      fileInfo: context.fileInfo,
    });

    const outcomes = await runWithConcurrency<SegmentOutcome>(
      segments.map((segment) => async () => {
        throwIfCancelled(signal);
        if (segment.index > 0) {
          await store.update(taskId, { message: `Transcribing segment ${segment.index + 1}/${total}...` });
        }
        try {
          const result = await transcriber.transcribe(segment.path, {
            language,
            offsetMs: Math.round(segment.startOffsetSec * 1000),
            signal,
          });
          return { ok: true, result };
        } catch (error) {
          return { ok: false, error };
        } finally {
          done += 1;
          await store.update(taskId, {
            progress: PROGRESS.transcribing + (PROGRESS.transcribed - PROGRESS.transcribing) * (done / total),
          });
        }
      }),
      settings.transcribeConcurrency
    );

    throwIfCancelled(signal);

    const failures = outcomes.flatMap((outcome, index) => (outcome.ok ? [] : [{ index, error: outcome.error }]));
    if (failures.length === 0) {
      return outcomes.map((outcome) => (outcome.ok ? outcome.result : null));
    }

    if (failures.length < total) {
      for (const failure of failures) {
        logWarnWithTs(
          `⚠️ Task ${taskId}: skipping segment ${failure.index + 1}/${total}: ${sanitizeErrorMessage(failure.error)}`
        );
      }
      return outcomes.map((outcome) => (outcome.ok ? outcome.result : null));
    }

    const lastError = failures[failures.length - 1].error;
    if (total === 1 && context.fallbackPath && lastError instanceof TranscriptionFailure) {
      logWarnWithTs(`⚠️ Task ${taskId}: extracted audio failed to transcribe, retrying with the original file`);
      return [await transcriber.transcribe(context.fallbackPath, { language, offsetMs: 0, signal })];
    }
    throw lastError;
  }

  private async cleanup(taskId: string, files: Set<string>, workDir: string): Promise<void> {
    await Promise.all([...files].map((file) => cleanupTempFile(file)));
    try {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    } catch (error) {
      logWarnWithTs(`⚠️ Could not remove work directory of task ${taskId}:`, error);
    }
  }
}
