import path from "path";
import { z } from "zod";

import dotenv from "dotenv";
dotenv.config();

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const optionalString = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const envSchema = z.object({
  DATA_DIR: z.string().default("./data"),
  DOWNLOADS_DIR: optionalString,
  TEMP_DIR: optionalString,
  TRANSCRIPTS_DIR: optionalString,
  TASKS_DIR: optionalString,

  MAX_CONCURRENT_TASKS: z.coerce.number().int().min(1).max(64).default(3),
  TRANSCRIBE_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
  DEFAULT_MAX_SEGMENT_MINUTES: z.coerce.number().int().min(1).max(60).default(10),
  EXTRACT_AUDIO: booleanFlag.default("true"),
  DEFAULT_LANGUAGE: z.string().trim().min(2).max(10).default("pt"),

  TRANSCRIBER: z.enum(["gemini", "assemblyai"]).default("gemini"),
  TRANSCRIPTION_TIMEOUT_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  GOOGLE_API_KEY: optionalString,
  GEMINI_MODEL: z.string().trim().min(1).default("gemini-2.5-flash"),
  ASSEMBLYAI_API_KEY: optionalString,

  DISPATCH_MODE: z.enum(["local", "queue"]).default("local"),
  REDIS_URL: optionalString,

  BROWSER_EXECUTABLE_PATH: optionalString,
  BROWSER_DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  SNIFF_MAX_BYTES: z.coerce.number().int().min(0).default(100 * 1024),

  FFMPEG_PATH: z.string().trim().min(1).default("ffmpeg"),
  FFPROBE_PATH: z.string().trim().min(1).default("ffprobe"),
});

export interface AppConfig {
  dirs: {
    downloads: string;
    temp: string;
    transcripts: string;
    tasks: string;
  };
  maxConcurrentTasks: number;
  transcribeConcurrency: number;
  defaultMaxSegmentMinutes: number;
  extractAudio: boolean;
  defaultLanguage: string;
  transcriber: "gemini" | "assemblyai";
  transcriptionTimeoutMs: number;
  googleApiKey?: string;
  geminiModel: string;
  assemblyAiApiKey?: string;
  dispatchMode: "local" | "queue";
  redisUrl?: string;
  browserExecutablePath?: string;
  browserDownloadTimeoutMs: number;
  sniffMaxBytes: number;
  ffmpegPath: string;
  ffprobePath: string;
}

/**
 * Build the application config from environment variables.
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join("; ")}`);
  }

  const e = parsed.data;
  if (e.DISPATCH_MODE === "queue" && !e.REDIS_URL) {
    throw new Error("Invalid environment configuration: REDIS_URL is required when DISPATCH_MODE=queue");
  }

  const dataDir = path.resolve(e.DATA_DIR);
  const dir = (value: string | undefined, fallback: string) =>
    path.resolve(value ?? path.join(dataDir, fallback));

  return {
    dirs: {
      downloads: dir(e.DOWNLOADS_DIR, "downloads"),
      temp: dir(e.TEMP_DIR, "temp"),
      transcripts: dir(e.TRANSCRIPTS_DIR, "transcriptions"),
      tasks: dir(e.TASKS_DIR, "tasks"),
    },
    maxConcurrentTasks: e.MAX_CONCURRENT_TASKS,
    transcribeConcurrency: e.TRANSCRIBE_CONCURRENCY,
    defaultMaxSegmentMinutes: e.DEFAULT_MAX_SEGMENT_MINUTES,
    extractAudio: e.EXTRACT_AUDIO,
    defaultLanguage: e.DEFAULT_LANGUAGE,
    transcriber: e.TRANSCRIBER,
    transcriptionTimeoutMs: e.TRANSCRIPTION_TIMEOUT_MS,
    googleApiKey: e.GOOGLE_API_KEY,
    geminiModel: e.GEMINI_MODEL,
    assemblyAiApiKey: e.ASSEMBLYAI_API_KEY,
    dispatchMode: e.DISPATCH_MODE,
    redisUrl: e.REDIS_URL,
    browserExecutablePath: e.BROWSER_EXECUTABLE_PATH,
    browserDownloadTimeoutMs: e.BROWSER_DOWNLOAD_TIMEOUT_MS,
    sniffMaxBytes: e.SNIFF_MAX_BYTES,
    ffmpegPath: e.FFMPEG_PATH,
    ffprobePath: e.FFPROBE_PATH,
  };
}
