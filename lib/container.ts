/**
 * Composition root: one store, pipeline and service per process, built from config.
 */
import { loadConfig, type AppConfig } from "@/lib/config";
import { FileTaskStore, type TaskStore } from "@/lib/store";
import { DriveDownloader } from "@/lib/drive";
import { PuppeteerDriveDownloader } from "@/lib/drive-browser";
import { SourceResolver } from "@/lib/source-resolver";
import { Segmenter } from "@/lib/segmenter";
import { TranscriptionAdapter, type SpeechToText } from "@/lib/transcription";
import { createGeminiBackend } from "@/lib/gemini";
import { AssemblyAISpeechToText } from "@/lib/assemblyai";
import { TranscriptionPipeline } from "@/lib/pipeline";
import { LocalDispatcher, QueueDispatcher, type Dispatcher } from "@/lib/dispatcher";
import { createRedisConnection, createTranscriptionQueue } from "@/lib/queue";
import { TranscriptionService } from "@/lib/service";
import { logWarnWithTs, logWithTs } from "@/lib/logger";

export const SERVICE_VERSION = "1.0.0";

export function createSpeechToText(config: AppConfig): SpeechToText {
  if (config.transcriber === "assemblyai") {
    if (!config.assemblyAiApiKey) {
      logWarnWithTs("⚠️ ASSEMBLYAI_API_KEY is not set; AssemblyAI requests will be rejected");
    }
    return new AssemblyAISpeechToText({ apiKey: config.assemblyAiApiKey ?? "" });
  }
  return createGeminiBackend(config.googleApiKey, config.geminiModel);
}

export function createPipeline(config: AppConfig, store: TaskStore): TranscriptionPipeline {
  const browser = config.browserExecutablePath
    ? new PuppeteerDriveDownloader({
        executablePath: config.browserExecutablePath,
        timeoutMs: config.browserDownloadTimeoutMs,
      })
    : null;

  return new TranscriptionPipeline({
    store,
    resolver: new SourceResolver({
      downloadsDir: config.dirs.downloads,
      sniffMaxBytes: config.sniffMaxBytes,
      drive: new DriveDownloader({ sniffMaxBytes: config.sniffMaxBytes, browser }),
    }),
    segmenter: new Segmenter({ ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath }),
    transcriber: new TranscriptionAdapter(createSpeechToText(config), {
      timeoutMs: config.transcriptionTimeoutMs,
      defaultLanguage: config.defaultLanguage,
    }),
    settings: {
      tempDir: config.dirs.temp,
      transcriptsDir: config.dirs.transcripts,
      defaultMaxSegmentMinutes: config.defaultMaxSegmentMinutes,
      extractAudio: config.extractAudio,
      transcribeConcurrency: config.transcribeConcurrency,
      defaultLanguage: config.defaultLanguage,
    },
  });
}

export interface Container {
  config: AppConfig;
  store: FileTaskStore;
  dispatcher: Dispatcher;
  service: TranscriptionService;
  close(): Promise<void>;
}

export async function createContainer(config: AppConfig = loadConfig()): Promise<Container> {
  // In queue mode the worker process writes the task documents too.
  const store = new FileTaskStore({ dir: config.dirs.tasks, shared: config.dispatchMode === "queue" });
  await store.init();

  let dispatcher: Dispatcher;
  let close = async (): Promise<void> => {};

  if (config.dispatchMode === "queue") {
    if (!config.redisUrl) {
      throw new Error("REDIS_URL is required when DISPATCH_MODE=queue");
    }
    const connection = createRedisConnection(config.redisUrl);
    const queue = createTranscriptionQueue(connection);
    dispatcher = new QueueDispatcher(queue);
    close = async () => {
      await queue.close();
      await connection.quit();
    };
  } else {
    await store.recoverInterrupted();
    const local = new LocalDispatcher(createPipeline(config, store));
    dispatcher = local;
    close = () => local.drain();
  }

  const service = new TranscriptionService({
    store,
    dispatcher,
    maxConcurrentTasks: config.maxConcurrentTasks,
    provider: config.transcriber,
    version: SERVICE_VERSION,
  });

  logWithTs(`⚙️ Transcription service ready (${config.dispatchMode} mode, ${config.transcriber} backend)`);
  return { config, store, dispatcher, service, close };
}

let containerPromise: Promise<Container> | null = null;

export function getContainer(): Promise<Container> {
  if (!containerPromise) {
    containerPromise = createContainer().catch((error: unknown) => {
      containerPromise = null;
      throw error;
    });
  }
  return containerPromise;
}

export async function getTranscriptionService(): Promise<TranscriptionService> {
  return (await getContainer()).service;
}
