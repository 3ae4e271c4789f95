/**
 * Media probing and segmentation on top of ffprobe/ffmpeg.
 */
import fs from "fs";
import path from "path";
import type { MediaSegment } from "@/types/transcription";
import { runCommand, type CommandRunner } from "@/lib/command";
import { SegmentationError } from "@/lib/errors";
import { cleanupTempFile, ensureDir } from "@/lib/files";
import { captionsToText, parseSRT } from "@/lib/subtitles";
import { logDebugWithTs, logWarnWithTs, logWithTs } from "@/lib/logger";

const VIDEO_EXTENSIONS = new Set([".mp4", ".avi", ".mov", ".mkv", ".wmv", ".flv", ".webm", ".m4v", ".mpeg", ".mpg"]);

// Mono 16 kHz mp3 is plenty for speech recognition and keeps uploads small.
const SPEECH_AUDIO_ARGS = ["-vn", "-ac", "1", "-ar", "16000", "-c:a", "libmp3lame", "-b:a", "64k"];

export function isVideoFile(fileName: string): boolean {
  return VIDEO_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

export interface SegmentPlan {
  index: number;
  startSec: number;
  durationSec: number;
}

/**
 * Partition a duration into ceil(duration / max) equal pieces, so the last
 * piece is never a short remainder. Within the ceiling it stays one piece.
 */
export function planSegments(durationSec: number, maxMinutes: number): SegmentPlan[] {
  if (!Number.isFinite(durationSec) || durationSec <= 0) {
    throw new SegmentationError("Media has no measurable duration");
  }
  if (!Number.isFinite(maxMinutes) || maxMinutes <= 0) {
    throw new SegmentationError(`Invalid maximum segment length: ${maxMinutes} minutes`);
  }

  const maxSec = maxMinutes * 60;
  if (durationSec <= maxSec) {
    return [{ index: 0, startSec: 0, durationSec }];
  }

  const count = Math.ceil(durationSec / maxSec);
  const pieceSec = durationSec / count;
  return Array.from({ length: count }, (_, index) => {
    const startSec = index * pieceSec;
    return {
      index,
      startSec,
      durationSec: index === count - 1 ? durationSec - startSec : pieceSec,
    };
  });
}

export interface SegmenterOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  commandTimeoutMs?: number;
  run?: CommandRunner;
}

export class Segmenter {
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;
  private readonly commandTimeoutMs: number;
  private readonly run: CommandRunner;

  constructor(options: SegmenterOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.ffprobePath = options.ffprobePath ?? "ffprobe";
    this.commandTimeoutMs = options.commandTimeoutMs ?? 30 * 60 * 1000;
    this.run = options.run ?? runCommand;
  }

  async probeDuration(file: string): Promise<number> {
    let stdout: string;
    try {
      ({ stdout } = await this.run({
        command: this.ffprobePath,
        args: ["-v", "error", "-show_entries", "format=duration", "-of", "default=noprint_wrappers=1:nokey=1", file],
        timeoutMs: 60_000,
      }));
    } catch (error) {
      throw new SegmentationError(
        `Could not read media duration: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const duration = parseFloat(stdout.trim());
    if (!Number.isFinite(duration) || duration <= 0) {
      throw new SegmentationError("Media has no measurable duration");
    }
    return duration;
  }

  /**
   * Split `file` into segments of at most `maxMinutes`. A file within the
   * ceiling is returned as-is (not owned, no re-encode); otherwise each piece
   * is written to `workDir` and owned by the caller.
   */
  async split(file: string, maxMinutes: number, workDir: string, signal?: AbortSignal): Promise<MediaSegment[]> {
    const duration = await this.probeDuration(file);
    const plan = planSegments(duration, maxMinutes);

    if (plan.length === 1) {
      logDebugWithTs(`🎞️ ${path.basename(file)} is ${duration.toFixed(1)}s, no split needed`);
      return [{ index: 0, path: file, startOffsetSec: 0, durationSec: duration, owned: false }];
    }

    logWithTs(
      `✂️ Splitting ${path.basename(file)} (${duration.toFixed(1)}s) into ${plan.length} segments of ${plan[0].durationSec.toFixed(1)}s`
    );
    await ensureDir(workDir);

    const baseName = path.parse(file).name;
    const segments: MediaSegment[] = [];
    try {
      for (const piece of plan) {
        const output = path.join(workDir, `${baseName}_part${String(piece.index + 1).padStart(3, "0")}.mp3`);
        await this.run({
          command: this.ffmpegPath,
          args: [
            "-hide_banner",
            "-loglevel",
            "error",
            "-y",
            "-ss",
            piece.startSec.toFixed(3),
            "-t",
            piece.durationSec.toFixed(3),
            "-i",
            file,
            ...SPEECH_AUDIO_ARGS,
            output,
          ],
          timeoutMs: this.commandTimeoutMs,
          signal,
        });
        segments.push({
          index: piece.index,
          path: output,
          startOffsetSec: piece.startSec,
          durationSec: piece.durationSec,
          owned: true,
        });
      }
    } catch (error) {
      await Promise.all(segments.map((segment) => cleanupTempFile(segment.path)));
      throw new SegmentationError(
        `Could not split media into segments: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return segments;
  }

  /** Write the audio track of `file` as a speech-friendly mp3 in `workDir`. */
  async extractAudio(file: string, workDir: string, signal?: AbortSignal): Promise<string> {
    await ensureDir(workDir);
    const output = path.join(workDir, `${path.parse(file).name}_audio.mp3`);
    try {
      await this.run({
        command: this.ffmpegPath,
        args: ["-hide_banner", "-loglevel", "error", "-y", "-i", file, ...SPEECH_AUDIO_ARGS, output],
        timeoutMs: this.commandTimeoutMs,
        signal,
      });
    } catch (error) {
      await cleanupTempFile(output);
      throw new SegmentationError(
        `Audio extraction failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return output;
  }

  /**
   * Text of the first embedded subtitle stream, or null when the container has
   * none. Caption problems never fail a task, so errors are logged and read as "none".
   */
  async extractCaptions(file: string, workDir: string, signal?: AbortSignal): Promise<string | null> {
    const output = path.join(workDir, `${path.parse(file).name}_captions.srt`);
    try {
      const { stdout } = await this.run({
        command: this.ffprobePath,
        args: ["-v", "error", "-select_streams", "s", "-show_entries", "stream=index", "-of", "csv=p=0", file],
        timeoutMs: 60_000,
        signal,
      });
      if (!stdout.trim()) {
        logDebugWithTs(`💬 No subtitle streams in ${path.basename(file)}`);
        return null;
      }

      await ensureDir(workDir);
      await this.run({
        command: this.ffmpegPath,
        args: ["-hide_banner", "-loglevel", "error", "-y", "-i", file, "-map", "0:s:0", "-f", "srt", output],
        timeoutMs: this.commandTimeoutMs,
        signal,
      });

      const text = captionsToText(parseSRT(await fs.promises.readFile(output, "utf-8")));
      return text || null;
    } catch (error) {
      logWarnWithTs(`⚠️ Caption extraction failed for ${path.basename(file)}:`, error);
      return null;
    } finally {
      await cleanupTempFile(output);
    }
  }
}
