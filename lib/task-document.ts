/**
 * Persisted/served shape of a task: one snake_case JSON document per task id.
 */
import { z } from "zod";
import type { TranscriptTask } from "@/types/transcription";

const segmentDocumentSchema = z.object({
  start_ms: z.number(),
  end_ms: z.number(),
  text: z.string(),
  speaker: z.string().optional(),
});

const fileInfoDocumentSchema = z.object({
  size_bytes: z.number(),
  size_mb: z.number(),
  source_type: z.enum(["url", "google_drive", "base64"]),
  source_path: z.string().optional(),
  duration_sec: z.number().optional(),
  segment_count: z.number().optional(),
});

export const taskDocumentSchema = z.object({
  task_id: z.string(),
  status: z.enum(["queued", "acquiring", "segmenting", "transcribing", "persisting", "succeeded", "failed"]),
  progress: z.number().min(0).max(1),
  message: z.string(),
  transcription: z.string().nullable(),
  segments: z.array(segmentDocumentSchema),
  filename: z.string(),
  language: z.string().nullable().default(null),
  created_at: z.string(),
  updated_at: z.string().optional(),
  completed_at: z.string().nullable(),
  file_info: fileInfoDocumentSchema.nullable(),
  transcript_file: z.string().nullable().default(null),
});

export type TaskDocument = z.infer<typeof taskDocumentSchema>;

/** Task as returned to API callers: internal paths removed. */
export type PublicTaskDocument = Omit<TaskDocument, "transcript_file" | "file_info"> & {
  file_info: Omit<NonNullable<TaskDocument["file_info"]>, "source_path"> | null;
};

export function toTaskDocument(task: TranscriptTask): TaskDocument {
  return {
    task_id: task.id,
    status: task.status,
    progress: task.progress,
    message: task.message,
    transcription: task.transcript,
    segments: task.segments.map((segment) => ({
      start_ms: segment.startMs,
      end_ms: segment.endMs,
      text: segment.text,
      ...(segment.speaker !== undefined ? { speaker: segment.speaker } : {}),
    })),
    filename: task.filename,
    language: task.language,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
    completed_at: task.completedAt,
    file_info: task.fileInfo
      ? {
          size_bytes: task.fileInfo.sizeBytes,
          size_mb: task.fileInfo.sizeMb,
          source_type: task.fileInfo.sourceType,
          source_path: task.fileInfo.sourcePath,
          duration_sec: task.fileInfo.durationSec,
          segment_count: task.fileInfo.segmentCount,
        }
      : null,
    transcript_file: task.transcriptFile,
  };
}

export function fromTaskDocument(doc: TaskDocument): TranscriptTask {
  return {
    id: doc.task_id,
    status: doc.status,
    progress: doc.progress,
    message: doc.message,
    transcript: doc.transcription,
    segments: doc.segments.map((segment) => ({
      startMs: segment.start_ms,
      endMs: segment.end_ms,
      text: segment.text,
      ...(segment.speaker !== undefined ? { speaker: segment.speaker } : {}),
    })),
    filename: doc.filename,
    language: doc.language,
    createdAt: doc.created_at,
    updatedAt: doc.updated_at ?? doc.created_at,
    completedAt: doc.completed_at,
    fileInfo: doc.file_info
      ? {
          sizeBytes: doc.file_info.size_bytes,
          sizeMb: doc.file_info.size_mb,
          sourceType: doc.file_info.source_type,
          sourcePath: doc.file_info.source_path,
          durationSec: doc.file_info.duration_sec,
          segmentCount: doc.file_info.segment_count,
        }
      : null,
    transcriptFile: doc.transcript_file,
  };
}

/** Parse raw JSON text; returns null for anything that is not a valid task document. */
export function parseTaskDocument(raw: string): TaskDocument | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = taskDocumentSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export function toPublicTask(task: TranscriptTask): PublicTaskDocument {
  const { transcript_file: _transcriptFile, file_info, ...rest } = toTaskDocument(task);
  if (!file_info) return { ...rest, file_info: null };
  const { source_path: _sourcePath, ...publicInfo } = file_info;
  return { ...rest, file_info: publicInfo };
}
