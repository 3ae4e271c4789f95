import { Worker } from "bullmq";
import { loadConfig } from "@/lib/config";
import { FileTaskStore } from "@/lib/store";
import { createPipeline } from "@/lib/container";
import { TRANSCRIPTION_QUEUE, createRedisConnection, type TranscriptionJobData } from "@/lib/queue";
import { logWithTs, logErrorWithTs } from "@/lib/logger";

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.redisUrl) {
    throw new Error("REDIS_URL is not configured");
  }

  logWithTs("🚀 Transcription worker starting...");

  const connection = createRedisConnection(config.redisUrl);
  // The API process creates and reads the same task documents.
  const store = new FileTaskStore({ dir: config.dirs.tasks, shared: true });
  await store.init();
  const pipeline = createPipeline(config, store);
  const controllers = new Map<string, AbortController>();

  logWithTs(`⚙️ Worker concurrency: ${config.maxConcurrentTasks}`);

  const worker = new Worker<TranscriptionJobData>(
    TRANSCRIPTION_QUEUE,
    async (job) => {
      const { taskId, request } = job.data;
      logWithTs(`▶️ Processing job ${job.id} for task ${taskId}`);

      const controller = new AbortController();
      controllers.set(taskId, controller);
      try {
        await pipeline.run(taskId, request, controller.signal);
      } finally {
        controllers.delete(taskId);
      }
    },
    { connection, concurrency: config.maxConcurrentTasks }
  );

  worker.on("completed", (job) => {
    logWithTs(`Job ${job.id} completed`);
  });

  worker.on("failed", (job, err) => {
    logErrorWithTs(`Job ${job?.id} failed:`, err);
  });

  worker.on("error", (err) => {
    logErrorWithTs("Worker error:", err);
  });

  const shutdown = async (signal: string) => {
    logWithTs(`Gracefully shutting down worker (${signal})...`);
    for (const controller of controllers.values()) controller.abort();
    await worker.close();
    await connection.quit();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logErrorWithTs("Worker shutdown failed:", error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logErrorWithTs("❌ Worker failed to start:", error);
  process.exit(1);
});
