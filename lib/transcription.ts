/**
 * Transcription adapter: one speech-to-text backend behind a common interface,
 * with preflight checks, a hard deadline and output normalization.
 */
import fs from "fs";
import path from "path";
import type { TranscriptSegment, TranscriptionResult } from "@/types/transcription";
import {
  CancelledError,
  InvalidMediaError,
  PipelineError,
  TranscriptionFailure,
  TranscriptionTimeout,
} from "@/lib/errors";
import { isNotFoundError } from "@/lib/files";
import { logWithTs } from "@/lib/logger";

/** Literal a backend returns (or a caller stores) in place of a transcript on failure. */
export const TRANSCRIPTION_ERROR_MARKER = "[TRANSCRIPTION_ERROR]";

/**
 * Width of the synthetic spans given to text without timing. These are an
 * ordering aid for consumers, not real timestamps.
 */
export const PLACEHOLDER_SPAN_MS = 1000;

export interface RawSentence {
  text: string;
  startMs?: number;
  endMs?: number;
  speaker?: string;
}

export interface RawWord {
  text: string;
  startMs: number;
  endMs: number;
  speaker?: string;
}

/** What a backend hands back before normalization. */
export type RawTranscript =
  | { kind: "text"; text: string; language?: string }
  | { kind: "sentences"; sentences: RawSentence[]; text?: string; language?: string }
  | { kind: "words"; words: RawWord[]; text?: string; language?: string };

export interface SpeechToTextOptions {
  language?: string;
  signal: AbortSignal;
}

export interface SpeechToText {
  readonly name: string;
  transcribeFile(filePath: string, options: SpeechToTextOptions): Promise<RawTranscript>;
}

// [HH:MM:SS] Speaker 1: text   or   [MM:SS] text
const TIMESTAMPED_LINE = /^\[(\d{1,2}(?::\d{1,2}){1,2})(?:[.,]\d+)?\]\s*(?:(speaker\s*[^:\]]{1,20}):\s*)?(.*)$/i;
const WORD_GROUP_GAP_MS = 1500;

function timestampToMs(value: string): number {
  return value.split(":").reduce((acc, part) => acc * 60 + parseInt(part, 10), 0) * 1000;
}

export function formatTimestamp(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const h = Math.floor(totalSeconds / 3600);
  const m = Math.floor((totalSeconds % 3600) / 60);
  const s = totalSeconds % 60;
  return [h, m, s].map((n) => String(n).padStart(2, "0")).join(":");
}

function splitSentences(text: string): string[] {
  return text
    .split(/\n+|(?<=[.!?…])\s+/)
    .map((sentence) => sentence.trim())
    .filter(Boolean);
}

function placeholderSpans(texts: string[], offsetMs: number): TranscriptSegment[] {
  return texts.map((text, i) => ({
    startMs: offsetMs + i * PLACEHOLDER_SPAN_MS,
    endMs: offsetMs + (i + 1) * PLACEHOLDER_SPAN_MS,
    text,
  }));
}

interface TimedLine {
  startMs: number;
  speaker?: string;
  text: string;
}

function parseTimestampedLines(text: string): TimedLine[] | null {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
  const parsed: TimedLine[] = [];
  const leading: string[] = [];

  for (const line of lines) {
    const match = line.match(TIMESTAMPED_LINE);
    if (match) {
      if (parsed.length === 0 && leading.length > 0) {
        // Untimed lines before the first timestamp belong to the start of the piece.
        parsed.push({ startMs: 0, text: leading.join(" ") });
      }
      parsed.push({
        startMs: timestampToMs(match[1]),
        speaker: match[2]?.trim().replace(/\s+/g, " "),
        text: match[3].trim(),
      });
    } else if (parsed.length > 0) {
      // continuation of the previous utterance
      const last = parsed[parsed.length - 1];
      last.text = last.text ? `${last.text} ${line}` : line;
    } else {
      leading.push(line);
    }
  }

  return parsed.length > 0 ? parsed : null;
}

function normalizeText(text: string, offsetMs: number): { text: string; segments: TranscriptSegment[] } {
  const trimmed = text.trim();
  const timed = parseTimestampedLines(trimmed);
  if (!timed) {
    return { text: trimmed, segments: placeholderSpans(splitSentences(trimmed), offsetMs) };
  }

  const segments = timed
    .map((line, i): TranscriptSegment => {
      const next = timed[i + 1];
      const startMs = offsetMs + line.startMs;
      const endMs =
        next && next.startMs > line.startMs ? offsetMs + next.startMs : startMs + PLACEHOLDER_SPAN_MS;
      return { startMs, endMs, text: line.text, ...(line.speaker ? { speaker: line.speaker } : {}) };
    })
    .filter((segment) => segment.text);

  // Rewrite with absolute timestamps so merged segments read as one timeline.
  const rewritten = segments
    .map((s) => `[${formatTimestamp(s.startMs)}] ${s.speaker ? `${s.speaker}: ` : ""}${s.text}`)
    .join("\n");
  return { text: rewritten, segments };
}

function normalizeSentences(sentences: RawSentence[], offsetMs: number): TranscriptSegment[] {
  return sentences
    .map((sentence, i): TranscriptSegment => {
      const startMs = offsetMs + (sentence.startMs ?? i * PLACEHOLDER_SPAN_MS);
      const endMs =
        sentence.endMs !== undefined && sentence.endMs >= (sentence.startMs ?? 0)
          ? offsetMs + sentence.endMs
          : startMs + PLACEHOLDER_SPAN_MS;
      return {
        startMs,
        endMs,
        text: sentence.text.trim(),
        ...(sentence.speaker ? { speaker: sentence.speaker } : {}),
      };
    })
    .filter((segment) => segment.text);
}

/** Group a word stream into utterances on speaker change, sentence end or a long pause. */
function groupWords(words: RawWord[], offsetMs: number): TranscriptSegment[] {
  const segments: TranscriptSegment[] = [];
  let current: RawWord[] = [];

  const flush = () => {
    if (current.length === 0) return;
    const first = current[0];
    const last = current[current.length - 1];
    segments.push({
      startMs: offsetMs + first.startMs,
      endMs: offsetMs + last.endMs,
      text: current.map((word) => word.text).join(" "),
      ...(first.speaker ? { speaker: first.speaker } : {}),
    });
    current = [];
  };

  for (const word of words) {
    const text = word.text.trim();
    if (!text) continue;
    const previous = current[current.length - 1];
    if (
      previous &&
      (previous.speaker !== word.speaker ||
        /[.!?…]$/.test(previous.text) ||
        word.startMs - previous.endMs > WORD_GROUP_GAP_MS)
    ) {
      flush();
    }
    current.push({ ...word, text });
  }
  flush();

  return segments;
}

/**
 * Map any backend output to the canonical `{text, segments, language}` shape.
 * `offsetMs` shifts every span so segment timings are absolute in the source.
 */
export function normalizeTranscript(
  raw: RawTranscript,
  offsetMs = 0,
  fallbackLanguage = "unknown"
): TranscriptionResult {
  const language = raw.language?.trim() || fallbackLanguage;

  switch (raw.kind) {
    case "text": {
      const { text, segments } = normalizeText(raw.text, offsetMs);
      return { text, segments, language };
    }
    case "sentences": {
      const segments = normalizeSentences(raw.sentences, offsetMs);
      const text = raw.text?.trim() || segments.map((segment) => segment.text).join(" ");
      return { text, segments, language };
    }
    case "words": {
      const segments = groupWords(raw.words, offsetMs);
      const text = raw.text?.trim() || segments.map((segment) => segment.text).join(" ");
      return { text, segments, language };
    }
  }
}

export function isFailureText(text: string): boolean {
  const trimmed = text.trim();
  return trimmed === "" || trimmed === TRANSCRIPTION_ERROR_MARKER;
}

/** Checks that run before any backend call, so certain failures cost no quota. */
export async function assertTranscribableFile(filePath: string): Promise<number> {
  const name = path.basename(filePath);
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(filePath);
  } catch (error) {
    if (isNotFoundError(error)) throw new InvalidMediaError(`Media file not found: ${name}`);
    throw new InvalidMediaError(`Media file is not accessible: ${name}`);
  }

  if (!stats.isFile()) throw new InvalidMediaError(`Media path is not a file: ${name}`);
  if (stats.size === 0) throw new InvalidMediaError(`Media file is empty: ${name}`);

  try {
    const handle = await fs.promises.open(filePath, "r");
    await handle.close();
  } catch {
    throw new InvalidMediaError(`Media file is not readable: ${name}`);
  }
  return stats.size;
}

export interface TranscribeOptions {
  language?: string;
  offsetMs?: number;
  signal?: AbortSignal;
}

export interface TranscriptionAdapterOptions {
  timeoutMs: number;
  defaultLanguage?: string;
}

export class TranscriptionAdapter {
  constructor(
    private readonly backend: SpeechToText,
    private readonly options: TranscriptionAdapterOptions
  ) {}

  async transcribe(filePath: string, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    const size = await assertTranscribableFile(filePath);
    const language = options.language ?? this.options.defaultLanguage;

    logWithTs(
      `🎤 Transcribing ${path.basename(filePath)} with ${this.backend.name} (${(size / 1024 / 1024).toFixed(2)} MB)`
    );
    const raw = await this.callWithDeadline(filePath, language, options.signal);

    if (raw.kind === "text" && isFailureText(raw.text)) {
      throw new TranscriptionFailure(`${this.backend.name} returned no transcript`);
    }

    const result = normalizeTranscript(raw, options.offsetMs ?? 0, language ?? "unknown");
    if (isFailureText(result.text)) {
      throw new TranscriptionFailure(`${this.backend.name} returned no transcript`);
    }
    return result;
  }

  /**
   * Race the backend call against the deadline. On expiry the backend's signal
   * is aborted and the caller gets TranscriptionTimeout right away, whether or
   * not the backend honours the abort.
   */
  private async callWithDeadline(
    filePath: string,
    language: string | undefined,
    outer: AbortSignal | undefined
  ): Promise<RawTranscript> {
    if (outer?.aborted) throw new CancelledError();

    const timeoutMs = this.options.timeoutMs;
    const controller = new AbortController();
    const onOuterAbort = () => controller.abort();
    outer?.addEventListener("abort", onOuterAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TranscriptionTimeout(timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.backend.transcribeFile(filePath, { language, signal: controller.signal }),
        deadline,
      ]);
    } catch (error) {
      if (error instanceof TranscriptionTimeout) throw error;
      if (outer?.aborted) throw new CancelledError();
      if (error instanceof PipelineError) throw error;
      throw new TranscriptionFailure(
        `${this.backend.name} transcription failed: ${error instanceof Error ? error.message : String(error)}`
      );
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onOuterAbort);
    }
  }
}
