/**
 * Error taxonomy for the transcription pipeline.
 *
 * Every pipeline error carries a stable `code` (persisted in logs) and the HTTP
 * status a route handler should answer with when the error reaches a caller.
 */

export class PipelineError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** Bad or unreachable source, or every download strategy exhausted. */
export class AcquisitionError extends PipelineError {
  readonly attempts: string[];

  constructor(message: string, attempts: string[] = []) {
    super(message, "E_ACQUISITION", 422);
    this.attempts = attempts;
  }
}

/** Unreadable or zero-duration media. */
export class SegmentationError extends PipelineError {
  constructor(message: string) {
    super(message, "E_SEGMENTATION", 422);
  }
}

/** Missing, empty or unreadable file detected before calling the backend. */
export class InvalidMediaError extends PipelineError {
  constructor(message: string) {
    super(message, "E_INVALID_MEDIA", 422);
  }
}

export class TranscriptionTimeout extends PipelineError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(
      `Transcription timed out after ${Math.round(timeoutMs / 1000)}s`,
      "E_TRANSCRIPTION_TIMEOUT",
      504
    );
    this.timeoutMs = timeoutMs;
  }
}

/** The backend raised, or returned an empty transcript or the error marker. */
export class TranscriptionFailure extends PipelineError {
  constructor(message: string) {
    super(message, "E_TRANSCRIPTION_FAILED", 502);
  }
}

/** Concurrency ceiling reached; returned to the submitter, never a task state. */
export class AdmissionRejected extends PipelineError {
  readonly limit: number;

  constructor(limit: number) {
    super(
      `Server busy: ${limit} transcriptions already running. Try again in a few minutes.`,
      "E_ADMISSION",
      503
    );
    this.limit = limit;
  }
}

export class RequestValidationError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid request: ${issues.join("; ")}`, "E_INVALID_REQUEST", 400);
    this.issues = issues;
  }
}

export class InvalidTaskIdError extends PipelineError {
  constructor() {
    super("Invalid task id", "E_INVALID_TASK_ID", 400);
  }
}

export class TaskNotFoundError extends PipelineError {
  constructor(taskId: string) {
    super(`Task ${taskId} not found`, "E_TASK_NOT_FOUND", 404);
  }
}

/** Attempted mutation of a task whose snapshot is already terminal. */
export class TaskStateError extends PipelineError {
  constructor(message: string) {
    super(message, "E_TASK_STATE", 409);
  }
}

/** Transcript requested for a task that has not succeeded. */
export class TranscriptNotReadyError extends PipelineError {
  constructor(taskId: string, status: string) {
    super(`Task ${taskId} has no transcript (status: ${status})`, "E_TRANSCRIPT_NOT_READY", 400);
  }
}

export class CancelledError extends PipelineError {
  constructor() {
    super("Cancelled by request", "E_CANCELLED", 499);
  }
}

const MAX_PUBLIC_MESSAGE_LENGTH = 500;

// Directory and file names may contain single spaces when the path ends in a file extension.
const PATH_SEGMENT = String.raw`[\w.@%+-]+(?: [\w.@%+-]+)*`;
const FILE_PATH = new RegExp(String.raw`(^|[\s"'(=])((?:\/${PATH_SEGMENT}){2,}\.[A-Za-z0-9]{1,5})(?![\w.])`, "g");
const ABSOLUTE_PATH = /(^|[\s"'(=])((?:\/[\w.@%+-]+){2,}\/?)/g;
const SECRET_QUERY = /\b(key|token|access_token|confirm|signature|uuid)=([^&\s"']+)/gi;
const AUTH_HEADER = /\b(authorization|bearer)(:?\s+)([^\s"',]+)/gi;

function basename(filePath: string): string {
  const trimmed = filePath.replace(/\/+$/, "");
  return trimmed.slice(trimmed.lastIndexOf("/") + 1);
}

/**
 * Short, non-sensitive summary of an error for the task `message` field.
 * Internal paths collapse to their file name and credential-like values are redacted.
 */
export function sanitizeErrorMessage(error: unknown): string {
  const raw =
    error instanceof Error
      ? error.message
      : typeof error === "string"
        ? error
        : "Unexpected error";

  const cleaned = raw
    .replace(FILE_PATH, (_match, prefix: string, filePath: string) => `${prefix}${basename(filePath)}`)
    .replace(ABSOLUTE_PATH, (_match, prefix: string, filePath: string) => `${prefix}${basename(filePath)}`)
    .replace(SECRET_QUERY, (_match, name: string) => `${name}=[redacted]`)
    .replace(AUTH_HEADER, (_match, name: string, sep: string) => `${name}${sep}[redacted]`)
    .trim();

  if (!cleaned) return "Unexpected error";
  return cleaned.length > MAX_PUBLIC_MESSAGE_LENGTH
    ? `${cleaned.slice(0, MAX_PUBLIC_MESSAGE_LENGTH - 3)}...`
    : cleaned;
}

/** Stable error code for logs; unknown errors share one code. */
export function errorCode(error: unknown): string {
  return error instanceof PipelineError ? error.code : "E_TASK_FAILED";
}
