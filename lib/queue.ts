import { Queue } from "bullmq";
import IORedis from "ioredis";
import type { TranscriptionRequest } from "@/lib/request";

export const TRANSCRIPTION_QUEUE = "transcriptions";

export interface TranscriptionJobData {
  taskId: string;
  request: TranscriptionRequest;
}

export function createRedisConnection(redisUrl: string): IORedis {
  return new IORedis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
  });
}

export function createTranscriptionQueue(connection: IORedis): Queue<TranscriptionJobData> {
  return new Queue<TranscriptionJobData>(TRANSCRIPTION_QUEUE, {
    connection,
    defaultJobOptions: {
      // The pipeline records failures on the task itself; jobs never retry.
      attempts: 1,
      removeOnComplete: true,
      removeOnFail: 100,
    },
  });
}
