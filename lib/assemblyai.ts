import fs from "fs";
import { z } from "zod";
import type { FetchLike } from "@/lib/download";
import { HttpStatusError } from "@/lib/download";
import type { RawSentence, RawTranscript, RawWord, SpeechToText, SpeechToTextOptions } from "@/lib/transcription";
import { retryWithBackoff, sleep } from "@/lib/retry";
import { logWarnWithTs, logWithTs } from "@/lib/logger";

export const ASSEMBLYAI_API_BASE = "https://api.assemblyai.com/v2";

const uploadResponseSchema = z.object({ upload_url: z.string().url() });

const timedTextSchema = z.object({
  text: z.string(),
  start: z.number(),
  end: z.number(),
  speaker: z.string().nullable().optional(),
});

const transcriptResponseSchema = z.object({
  id: z.string(),
  status: z.enum(["queued", "processing", "completed", "error"]),
  text: z.string().nullable().optional(),
  error: z.string().nullable().optional(),
  language_code: z.string().nullable().optional(),
  words: z.array(timedTextSchema).nullable().optional(),
});

const sentencesResponseSchema = z.object({ sentences: z.array(timedTextSchema) });

type TranscriptResponse = z.infer<typeof transcriptResponseSchema>;

interface ApiCall {
  method: "GET" | "POST";
  headers?: Record<string, string>;
  body?: RequestInit["body"];
}

function speakerLabel(speaker: string | null | undefined): string | undefined {
  return speaker ? `Speaker ${speaker}` : undefined;
}

export interface AssemblyAISpeechToTextOptions {
  apiKey: string;
  fetchImpl?: FetchLike;
  baseUrl?: string;
  pollIntervalMs?: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
}

/** AssemblyAI REST backend: upload, create transcript, poll until done. */
export class AssemblyAISpeechToText implements SpeechToText {
  readonly name = "assemblyai";
  private readonly fetchImpl: FetchLike;
  private readonly baseUrl: string;
  private readonly pollIntervalMs: number;
  private readonly retryAttempts: number;
  private readonly retryBaseDelayMs: number;

  constructor(private readonly options: AssemblyAISpeechToTextOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.baseUrl = options.baseUrl ?? ASSEMBLYAI_API_BASE;
    this.pollIntervalMs = options.pollIntervalMs ?? 5000;
    this.retryAttempts = options.retryAttempts ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 2000;
  }

  async transcribeFile(filePath: string, options: SpeechToTextOptions): Promise<RawTranscript> {
    const { signal } = options;
    const uploadUrl = await this.upload(filePath, signal);
    const id = await this.createTranscript(uploadUrl, options.language, signal);
    logWithTs(`🛰️ AssemblyAI transcript ${id} created, polling...`);

    const transcript = await this.poll(id, signal);
    const language = transcript.language_code ?? options.language;
    const text = transcript.text ?? undefined;

    const sentences = await this.fetchSentences(id, signal);
    if (sentences && sentences.length > 0) {
      return { kind: "sentences", sentences, text, language };
    }

    const words: RawWord[] = (transcript.words ?? []).map((word) => ({
      text: word.text,
      startMs: word.start,
      endMs: word.end,
      speaker: speakerLabel(word.speaker),
    }));
    if (words.length > 0) {
      return { kind: "words", words, text, language };
    }
    return { kind: "text", text: text ?? "", language };
  }

  private async request<T>(
    label: string,
    path: string,
    call: ApiCall,
    schema: z.ZodType<T>,
    signal: AbortSignal
  ): Promise<T> {
    const response = await retryWithBackoff(label, async () => {
      const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: call.method,
        headers: { authorization: this.options.apiKey, ...call.headers },
        body: call.body,
        signal,
      });
      if (res.status >= 500) {
        await res.body?.cancel();
        throw new HttpStatusError(res.status, res.statusText);
      }
      return res;
    }, this.retryAttempts, this.retryBaseDelayMs);

    if (!response.ok) {
      throw new Error(`${label} failed: HTTP ${response.status} ${await response.text()}`);
    }
    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`${label} returned an unexpected response`);
    }
    return parsed.data;
  }

  private async upload(filePath: string, signal: AbortSignal): Promise<string> {
    const body = new Uint8Array(await fs.promises.readFile(filePath));
    const json = await this.request(
      "AssemblyAI upload",
      "/upload",
      { method: "POST", headers: { "content-type": "application/octet-stream" }, body },
      uploadResponseSchema,
      signal
    );
    return json.upload_url;
  }

  private async createTranscript(audioUrl: string, language: string | undefined, signal: AbortSignal): Promise<string> {
    const json = await this.request(
      "AssemblyAI transcript creation",
      "/transcript",
      {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          audio_url: audioUrl,
          speaker_labels: true,
          punctuate: true,
          format_text: true,
          ...(language ? { language_code: language.replace("-", "_").toLowerCase() } : { language_detection: true }),
        }),
      },
      transcriptResponseSchema,
      signal
    );
    return json.id;
  }

  private async poll(id: string, signal: AbortSignal): Promise<TranscriptResponse> {
    for (;;) {
      if (signal.aborted) throw new Error("AssemblyAI polling aborted");
      const json = await this.request(
        "AssemblyAI transcript fetch",
        `/transcript/${id}`,
        { method: "GET" },
        transcriptResponseSchema,
        signal
      );
      if (json.status === "completed") return json;
      if (json.status === "error") {
        throw new Error(json.error || "AssemblyAI transcription failed");
      }
      await sleep(this.pollIntervalMs);
    }
  }

  private async fetchSentences(id: string, signal: AbortSignal): Promise<RawSentence[] | null> {
    try {
      const json = await this.request(
        "AssemblyAI sentences",
        `/transcript/${id}/sentences`,
        { method: "GET" },
        sentencesResponseSchema,
        signal
      );
      return json.sentences.map((sentence) => ({
        text: sentence.text,
        startMs: sentence.start,
        endMs: sentence.end,
        speaker: speakerLabel(sentence.speaker),
      }));
    } catch (error) {
      if (signal.aborted) throw error;
      logWarnWithTs(`⚠️ AssemblyAI sentences unavailable for ${id}, using words`, error);
      return null;
    }
  }
}
