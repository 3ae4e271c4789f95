/**
 * Types for video transcription tasks and their results
 */

export type TaskStatus =
  | "queued"
  | "acquiring"
  | "segmenting"
  | "transcribing"
  | "persisting"
  | "succeeded"
  | "failed";

export const TERMINAL_STATUSES: readonly TaskStatus[] = ["succeeded", "failed"];

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export type SourceType = "url" | "google_drive" | "base64";

/** A timed span of recognized speech. */
export interface TranscriptSegment {
  startMs: number;
  endMs: number;
  text: string;
  speaker?: string;
}

export interface FileInfo {
  sizeBytes: number;
  sizeMb: number;
  sourceType: SourceType;
  /** Local path of the acquired file; never exposed through the API. */
  sourcePath?: string;
  durationSec?: number;
  segmentCount?: number;
}

export interface TranscriptTask {
  id: string;
  status: TaskStatus;
  progress: number;
  message: string;
  transcript: string | null;
  segments: TranscriptSegment[];
  filename: string;
  fileInfo: FileInfo | null;
  language: string | null;
  transcriptFile: string | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

export type TaskPatch = Partial<
  Pick<
    TranscriptTask,
    | "status"
    | "progress"
    | "message"
    | "transcript"
    | "segments"
    | "filename"
    | "fileInfo"
    | "language"
    | "transcriptFile"
    | "completedAt"
  >
>;

/** Normalized output of one speech-to-text call. */
export interface TranscriptionResult {
  text: string;
  segments: TranscriptSegment[];
  language: string;
}

/** A bounded-duration slice of the source media produced by the segmenter. */
export interface MediaSegment {
  index: number;
  path: string;
  startOffsetSec: number;
  durationSec: number;
  /** True when the file was materialized for this task and must be deleted by the caller. */
  owned: boolean;
}

export interface AcquiredSource {
  path: string;
  filename: string;
  sizeBytes: number;
  sourceType: SourceType;
}
