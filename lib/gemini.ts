/**
 * Gemini Speech-to-Text backend
 *
 * Uses Google Gemini API with Files API support for large media files.
 */

import { FileState, GoogleGenAI } from "@google/genai";
import fs from "fs";
import path from "path";
import type { RawTranscript, SpeechToText, SpeechToTextOptions } from "@/lib/transcription";
import { retryWithBackoff, sleep } from "@/lib/retry";
import { logWithTs, logErrorWithTs, logWarnWithTs } from "@/lib/logger";

// Supported MIME types
const MIME_TYPES: Record<string, string> = {
  ".mp3": "audio/mp3",
  ".wav": "audio/wav",
  ".aiff": "audio/aiff",
  ".aac": "audio/aac",
  ".ogg": "audio/ogg",
  ".flac": "audio/flac",
  ".m4a": "audio/mp4",
  ".mp4": "video/mp4",
  ".mov": "video/quicktime",
  ".avi": "video/x-msvideo",
  ".mkv": "video/x-matroska",
  ".webm": "video/webm",
  ".mpeg": "video/mpeg",
  ".mpg": "video/mpeg",
  ".wmv": "video/x-ms-wmv",
  ".flv": "video/x-flv",
};

// Inline requests above this size go through the Files API instead.
const INLINE_LIMIT_BYTES = 15 * 1024 * 1024;

const FILE_POLL_INTERVAL_MS = 5000;

const LANGUAGE_NAMES: Record<string, string> = {
  pt: "Portuguese",
  en: "English",
  es: "Spanish",
  fr: "French",
  de: "German",
  it: "Italian",
};

export function buildTranscriptionPrompt(language?: string): string {
  const base = language?.split("-")[0].toLowerCase();
  const languageLine = language
    ? `- The speech is in ${(base && LANGUAGE_NAMES[base]) || language}; transcribe it in that language without translating\n`
    : "";

  return `
Transcribe the audio content as plain text with speaker diarization.

IMPORTANT: Return ONLY plain text. Do NOT return JSON, summaries, or structured data.

Format requirements:
- Each line should be: [HH:MM:SS] Speaker X: <speech content>
- Use consistent speaker labels (Speaker 1, Speaker 2, etc.)
- Include timestamps in HH:MM:SS or MM:SS format
- Preserve conversation flow and order
${languageLine}- If there is no intelligible speech, return exactly: [TRANSCRIPTION_ERROR]

Example output:
[00:01] Speaker 1: Hello, how are you today?
[00:05] Speaker 2: I'm doing well, thanks for asking.
[00:10] Speaker 1: Great to hear from you.
`;
}

/**
 * Get MIME type from file extension or filename
 */
export function getMimeType(fileNameOrPath: string): string {
  const ext = path.extname(fileNameOrPath).toLowerCase();
  return MIME_TYPES[ext] || "audio/mp3";
}

interface UploadedFile {
  uri: string;
  mimeType: string;
  name: string;
}

export interface GeminiSpeechToTextOptions {
  apiKey: string;
  model: string;
  /** Preconfigured client; built from `apiKey` when omitted. */
  client?: GoogleGenAI;
  maxFileChecks?: number;
}

export class GeminiSpeechToText implements SpeechToText {
  readonly name = "gemini";
  private ai: GoogleGenAI | null;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxFileChecks: number;

  constructor(options: GeminiSpeechToTextOptions) {
    this.ai = options.client ?? null;
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.maxFileChecks = options.maxFileChecks ?? 360; // ~30 minutes at 5s intervals
  }

  // Built on first use so a missing key only fails transcriptions.
  private client(): GoogleGenAI {
    if (!this.ai) {
      this.ai = new GoogleGenAI({ apiKey: this.apiKey });
    }
    return this.ai;
  }

  /**
   * Uses inline data for files up to 15MB, Files API for larger files
   */
  async transcribeFile(filePath: string, options: SpeechToTextOptions): Promise<RawTranscript> {
    const mimeType = getMimeType(filePath);
    const { size } = await fs.promises.stat(filePath);
    const prompt = buildTranscriptionPrompt(options.language);

    logWithTs(`Using Gemini model: ${this.model}`);
    logWithTs(`📊 File size: ${(size / 1024 / 1024).toFixed(2)} MB, MIME type: ${mimeType}`);

    const text =
      size > INLINE_LIMIT_BYTES
        ? await this.transcribeWithFilesAPI(filePath, mimeType, prompt, options.signal)
        : await this.transcribeInline(filePath, mimeType, prompt, options.signal);

    return { kind: "text", text, language: options.language };
  }

  private async transcribeInline(
    filePath: string,
    mimeType: string,
    prompt: string,
    signal: AbortSignal
  ): Promise<string> {
    logWithTs(`📝 Using inline data for transcription...`);
    const base64Audio = (await fs.promises.readFile(filePath)).toString("base64");

    const response = await retryWithBackoff("Gemini inline transcription", () =>
      this.client().models.generateContent({
        model: this.model,
        contents: [{ parts: [{ inlineData: { mimeType, data: base64Audio } }, { text: prompt }] }],
        config: { abortSignal: signal },
      })
    );

    const responseText = response.text;
    logWithTs(`📄 Gemini response (${responseText?.length || 0} chars)`);
    return responseText ?? "";
  }

  private async transcribeWithFilesAPI(
    filePath: string,
    mimeType: string,
    prompt: string,
    signal: AbortSignal
  ): Promise<string> {
    logWithTs(`📤 Using Files API for large file...`);
    const uploaded = await this.upload(filePath, mimeType);

    try {
      await this.waitForFileReady(uploaded.name, signal);

      logWithTs(`🔄 Processing transcription (this may take several minutes for long media)...`);
      const response = await retryWithBackoff("Gemini file transcription", () =>
        this.client().models.generateContent({
          model: this.model,
          contents: [
            { parts: [{ fileData: { fileUri: uploaded.uri, mimeType: uploaded.mimeType } }, { text: prompt }] },
          ],
          config: { abortSignal: signal },
        })
      );

      const responseText = response.text;
      logWithTs(`📄 Gemini file API response received (${responseText?.length || 0} chars)`);
      return responseText ?? "";
    } finally {
      await this.deleteUploaded(uploaded.name);
    }
  }

  private async upload(filePath: string, mimeType: string): Promise<UploadedFile> {
    logWithTs(`📤 Uploading file to Gemini Files API...`);
    const file = await retryWithBackoff(
      "Gemini upload",
      () => this.client().files.upload({ file: filePath, config: { mimeType } }),
      5, // 5 attempts for uploads
      3000
    );

    if (!file.uri || !file.name) {
      throw new Error("Gemini upload returned no file reference");
    }
    logWithTs(`✅ Upload complete. File name: ${file.name}`);
    return { uri: file.uri, mimeType: file.mimeType ?? mimeType, name: file.name };
  }

  private async waitForFileReady(fileName: string, signal: AbortSignal): Promise<void> {
    logWithTs(`⏳ Waiting for file to be ready in Gemini...`);

    for (let attempts = 0; attempts < this.maxFileChecks; attempts++) {
      if (signal.aborted) throw new Error("Gemini file processing aborted");

      const fileInfo = await this.client().files.get({ name: fileName });
      if (fileInfo.state === FileState.ACTIVE) {
        logWithTs(`✅ File is ready (${attempts + 1} checks)`);
        return;
      }
      if (fileInfo.state !== FileState.PROCESSING) {
        throw new Error(`File processing failed. State: ${fileInfo.state}`);
      }
      if (attempts % 10 === 0) {
        logWithTs(`   File state: ${fileInfo.state} (check ${attempts + 1}/${this.maxFileChecks})`);
      }
      await sleep(FILE_POLL_INTERVAL_MS);
    }

    throw new Error("Gemini file processing did not finish in time");
  }

  private async deleteUploaded(fileName: string): Promise<void> {
    try {
      await this.client().files.delete({ name: fileName });
      logWithTs(`🗑️ Deleted file from Gemini: ${fileName}`);
    } catch (err) {
      logErrorWithTs(`Failed to delete file from Gemini:`, err);
    }
  }
}

export function createGeminiBackend(apiKey: string | undefined, model: string): GeminiSpeechToText {
  if (!apiKey) {
    logWarnWithTs("⚠️ GOOGLE_API_KEY is not set; Gemini requests will be rejected");
  }
  return new GeminiSpeechToText({ apiKey: apiKey ?? "", model });
}
