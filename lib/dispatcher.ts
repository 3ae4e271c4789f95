/**
 * Starts one background unit of work per task and lets callers cancel it.
 */
import type { Queue } from "bullmq";
import type { TranscriptionRequest } from "@/lib/request";
import type { TranscriptionJobData } from "@/lib/queue";
import { logErrorWithTs, logWithTs } from "@/lib/logger";

export type DispatchMode = "local" | "queue";

export interface Dispatcher {
  readonly mode: DispatchMode;
  dispatch(taskId: string, request: TranscriptionRequest): Promise<void>;
  /** Stop a task that has not finished. Resolves true when something was cancelled. */
  cancel(taskId: string): Promise<boolean>;
  activeTaskIds(): Promise<string[]>;
}

export interface TaskRunner {
  run(taskId: string, request: TranscriptionRequest, signal?: AbortSignal): Promise<void>;
}

interface RunningTask {
  controller: AbortController;
  done: Promise<void>;
}

/** Runs the pipeline in this process; one AbortController per task. */
export class LocalDispatcher implements Dispatcher {
  readonly mode = "local";
  private readonly running = new Map<string, RunningTask>();

  constructor(private readonly runner: TaskRunner) {}

  async dispatch(taskId: string, request: TranscriptionRequest): Promise<void> {
    const controller = new AbortController();
    const done: Promise<void> = this.runner
      .run(taskId, request, controller.signal)
      .catch((error: unknown) => {
        logErrorWithTs(`❌ Task ${taskId} crashed:`, error);
      })
      .finally(() => {
        if (this.running.get(taskId)?.done === done) this.running.delete(taskId);
      });
    this.running.set(taskId, { controller, done });
    logWithTs(`🚀 Started task ${taskId} (${this.running.size} running)`);
  }

  async cancel(taskId: string): Promise<boolean> {
    const entry = this.running.get(taskId);
    if (!entry) return false;
    entry.controller.abort();
    await entry.done;
    return true;
  }

  async activeTaskIds(): Promise<string[]> {
    return [...this.running.keys()];
  }

  /** Resolves once every running task has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.running.values()].map((entry) => entry.done));
  }
}

const CANCELLABLE_STATES = new Set(["waiting", "delayed", "prioritized", "waiting-children"]);

/** Hands tasks to a separate worker process through a BullMQ queue. */
export class QueueDispatcher implements Dispatcher {
  readonly mode = "queue";

  constructor(private readonly queue: Queue<TranscriptionJobData>) {}

  async dispatch(taskId: string, request: TranscriptionRequest): Promise<void> {
    await this.queue.add("transcribe", { taskId, request }, { jobId: taskId });
    logWithTs(`📥 Queued task ${taskId}`);
  }

  /** Only jobs no worker has picked up yet can be removed. */
  async cancel(taskId: string): Promise<boolean> {
    const job = await this.queue.getJob(taskId);
    if (!job) return false;
    const state = await job.getState();
    if (!CANCELLABLE_STATES.has(state)) return false;
    await job.remove();
    return true;
  }

  async activeTaskIds(): Promise<string[]> {
    const jobs = await this.queue.getJobs(["active", "waiting", "delayed"]);
    return jobs.flatMap((job) => (job ? [job.data.taskId] : []));
  }
}
