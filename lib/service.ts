/**
 * Facade the route handlers talk to: validation, admission control, task
 * creation and dispatch, plus reads and deletes.
 */
import fs from "fs";
import path from "path";
import type { TranscriptTask } from "@/types/transcription";
import { isTerminalStatus } from "@/types/transcription";
import { parseTranscriptionRequest, type TranscriptionRequest } from "@/lib/request";
import { assertValidTaskId, generateTaskId, newTask, type TaskStore } from "@/lib/store";
import type { Dispatcher } from "@/lib/dispatcher";
import { filenameFromUrl } from "@/lib/source-resolver";
import {
  AdmissionRejected,
  TaskNotFoundError,
  TranscriptNotReadyError,
  sanitizeErrorMessage,
} from "@/lib/errors";
import { isNotFoundError } from "@/lib/files";
import { logErrorWithTs, logWithTs } from "@/lib/logger";

export interface TranscriptionServiceOptions {
  store: TaskStore;
  dispatcher: Dispatcher;
  maxConcurrentTasks: number;
  provider: string;
  version: string;
}

export interface HealthReport {
  status: "healthy";
  timestamp: string;
  version: string;
  active_tasks: number;
  provider: string;
}

export interface TranscriptDownload {
  filename: string;
  content: string;
}

function initialFilename(request: TranscriptionRequest): string {
  if (request.filename) return request.filename;
  if (request.url) return filenameFromUrl(request.url) ?? "video.mp4";
  return "video.mp4";
}

export class TranscriptionService {
  // Admission check and task creation run one submission at a time.
  private admission: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: TranscriptionServiceOptions) {}

  async submit(input: unknown): Promise<TranscriptTask> {
    const request = parseTranscriptionRequest(input);

    const task = await this.serialize(async () => {
      const active = (await this.options.store.list()).filter((t) => !isTerminalStatus(t.status)).length;
      if (active >= this.options.maxConcurrentTasks) {
        throw new AdmissionRejected(this.options.maxConcurrentTasks);
      }
      return this.options.store.create(newTask(generateTaskId(), initialFilename(request)));
    });

    try {
      await this.options.dispatcher.dispatch(task.id, request);
    } catch (error) {
      logErrorWithTs(`❌ Could not dispatch task ${task.id}:`, error);
      await this.options.store.update(task.id, { status: "failed", message: sanitizeErrorMessage(error) });
      throw error;
    }

    logWithTs(`📝 Accepted task ${task.id} (${this.options.dispatcher.mode} mode)`);
    return task;
  }

  async getTask(id: string): Promise<TranscriptTask> {
    assertValidTaskId(id);
    const task = await this.options.store.get(id);
    if (!task) throw new TaskNotFoundError(id);
    return task;
  }

  listTasks(): Promise<TranscriptTask[]> {
    return this.options.store.list();
  }

  /** Cancel the task if it is still running, then remove it and its transcript. */
  async deleteTask(id: string): Promise<void> {
    const task = await this.getTask(id);
    if (!isTerminalStatus(task.status)) {
      const cancelled = await this.options.dispatcher.cancel(id);
      if (cancelled) logWithTs(`🛑 Cancelled task ${id} before deleting it`);
    }
    await this.options.store.delete(id);
    logWithTs(`🗑️ Deleted task ${id}`);
  }

  async readTranscript(id: string): Promise<TranscriptDownload> {
    const task = await this.getTask(id);
    if (task.status !== "succeeded") {
      throw new TranscriptNotReadyError(id, task.status);
    }

    let content = task.transcript ?? "";
    if (task.transcriptFile) {
      try {
        content = await fs.promises.readFile(task.transcriptFile, "utf-8");
      } catch (error) {
        if (!isNotFoundError(error)) throw error;
      }
    }

    const base = path.parse(task.filename).name || id;
    return { filename: `${base}_transcription.txt`, content };
  }

  async health(): Promise<HealthReport> {
    return {
      status: "healthy",
      timestamp: new Date().toISOString(),
      version: this.options.version,
      active_tasks: (await this.options.dispatcher.activeTaskIds()).length,
      provider: this.options.provider,
    };
  }

  private serialize<T>(op: () => Promise<T>): Promise<T> {
    const run = this.admission.then(op);
    this.admission = run.catch(() => undefined);
    return run;
  }
}
