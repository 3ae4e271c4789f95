/**
 * Task store: an in-memory map for the owning process plus one JSON document
 * per task on disk, rewritten in full (temp file + rename) on every write.
 */
import fs from "fs";
import path from "path";
import { randomUUID } from "crypto";
import type { TaskPatch, TranscriptTask } from "@/types/transcription";
import { isTerminalStatus } from "@/types/transcription";
import { InvalidTaskIdError, TaskNotFoundError, TaskStateError } from "@/lib/errors";
import { ensureDir, isNotFoundError, removeFile, writeFileAtomic } from "@/lib/files";
import { fromTaskDocument, parseTaskDocument, toTaskDocument } from "@/lib/task-document";
import { logWarnWithTs, logWithTs } from "@/lib/logger";

export interface TaskStore {
  init(): Promise<void>;
  create(task: TranscriptTask): Promise<TranscriptTask>;
  update(id: string, patch: TaskPatch): Promise<TranscriptTask>;
  get(id: string): Promise<TranscriptTask | null>;
  delete(id: string): Promise<boolean>;
  list(): Promise<TranscriptTask[]>;
}

const TASK_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/** Rejects anything that could escape the tasks directory when used in a path. */
export function assertValidTaskId(id: string): void {
  if (!TASK_ID_PATTERN.test(id)) {
    throw new InvalidTaskIdError();
  }
}

/**
 * Generate a unique task ID
 */
export function generateTaskId(): string {
  return randomUUID();
}

/** Fresh `queued` snapshot for a newly submitted task. */
export function newTask(id: string, filename: string, now = new Date()): TranscriptTask {
  const timestamp = now.toISOString();
  return {
    id,
    status: "queued",
    progress: 0,
    message: "Task queued",
    transcript: null,
    segments: [],
    filename,
    fileInfo: null,
    language: null,
    transcriptFile: null,
    createdAt: timestamp,
    updatedAt: timestamp,
    completedAt: null,
  };
}

/**
 * Merge a patch into a snapshot, enforcing the task invariants:
 * terminal snapshots are frozen, progress never decreases and only reaches 1
 * on success, and transcript/segments exist only on success.
 */
export function applyPatch(current: TranscriptTask, patch: TaskPatch, now = new Date()): TranscriptTask {
  if (isTerminalStatus(current.status)) {
    throw new TaskStateError(`Task ${current.id} is already ${current.status}`);
  }

  const status = patch.status ?? current.status;
  const succeeded = status === "succeeded";
  const requested = patch.progress ?? current.progress;
  const progress = succeeded ? 1 : Math.min(Math.max(current.progress, requested, 0), 0.99);
  const timestamp = now.toISOString();

  return {
    ...current,
    ...patch,
    id: current.id,
    createdAt: current.createdAt,
    status,
    progress,
    transcript: succeeded ? (patch.transcript ?? current.transcript ?? "") : null,
    segments: succeeded ? (patch.segments ?? current.segments) : [],
    language: patch.language ?? current.language,
    updatedAt: timestamp,
    completedAt: isTerminalStatus(status) ? (patch.completedAt ?? timestamp) : null,
  };
}

export interface FileTaskStoreOptions {
  dir: string;
  /**
   * Set when another process writes the documents (queue mode): reads always
   * go to disk instead of trusting the in-memory copy.
   */
  shared?: boolean;
}

export class FileTaskStore implements TaskStore {
  private readonly tasks = new Map<string, TranscriptTask>();
  private readonly locks = new Map<string, Promise<void>>();
  private initialized = false;

  constructor(private readonly options: FileTaskStoreOptions) {}

  /** Create the directory and load every persisted document into memory. */
  async init(): Promise<void> {
    if (this.initialized) return;
    await ensureDir(this.options.dir);
    const loaded = await this.loadAll();
    for (const task of loaded) {
      this.tasks.set(task.id, task);
    }
    this.initialized = true;
    logWithTs(`📂 Task store ready: ${loaded.length} task(s) loaded from ${this.options.dir}`);
  }

  async create(task: TranscriptTask): Promise<TranscriptTask> {
    assertValidTaskId(task.id);
    return this.withLock(task.id, async () => {
      if (this.tasks.has(task.id) || (await this.load(task.id))) {
        throw new TaskStateError(`Task ${task.id} already exists`);
      }
      await this.persist(task);
      return structuredClone(task);
    });
  }

  async update(id: string, patch: TaskPatch): Promise<TranscriptTask> {
    assertValidTaskId(id);
    return this.withLock(id, async () => {
      const current = (this.options.shared ? null : this.tasks.get(id)) ?? (await this.load(id));
      if (!current) {
        throw new TaskNotFoundError(id);
      }
      const next = applyPatch(current, patch);
      await this.persist(next);
      return structuredClone(next);
    });
  }

  async get(id: string): Promise<TranscriptTask | null> {
    assertValidTaskId(id);
    if (!this.options.shared) {
      const cached = this.tasks.get(id);
      if (cached) return structuredClone(cached);
    }

    const loaded = await this.load(id);
    if (loaded) {
      this.tasks.set(id, loaded);
      return structuredClone(loaded);
    }
    this.tasks.delete(id);
    return null;
  }

  /** Remove the task, its document and its saved transcript file. */
  async delete(id: string): Promise<boolean> {
    assertValidTaskId(id);
    return this.withLock(id, async () => {
      const current = (this.options.shared ? null : this.tasks.get(id)) ?? (await this.load(id));
      this.tasks.delete(id);
      const removedDocument = await removeFile(this.documentPath(id));
      if (current?.transcriptFile) {
        await removeFile(current.transcriptFile);
      }
      return Boolean(current) || removedDocument;
    });
  }

  async list(): Promise<TranscriptTask[]> {
    const tasks = this.options.shared ? await this.loadAll() : [...this.tasks.values()];
    return tasks
      .map((task) => structuredClone(task))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  /**
   * Fail every task persisted in a non-terminal state. Only valid when this
   * process is the sole executor: such tasks were cut off by a restart.
   */
  async recoverInterrupted(): Promise<string[]> {
    const recovered: string[] = [];
    for (const task of await this.list()) {
      if (isTerminalStatus(task.status)) continue;
      await this.update(task.id, {
        status: "failed",
        message: "Interrupted by a server restart",
      });
      recovered.push(task.id);
    }
    if (recovered.length > 0) {
      logWarnWithTs(`♻️ Marked ${recovered.length} interrupted task(s) as failed`);
    }
    return recovered;
  }

  private documentPath(id: string): string {
    return path.join(this.options.dir, `${id}.json`);
  }

  private async persist(task: TranscriptTask): Promise<void> {
    await ensureDir(this.options.dir);
    await writeFileAtomic(this.documentPath(task.id), JSON.stringify(toTaskDocument(task), null, 2));
    this.tasks.set(task.id, task);
  }

  private async load(id: string): Promise<TranscriptTask | null> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.documentPath(id), "utf-8");
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }

    const doc = parseTaskDocument(raw);
    if (!doc || doc.task_id !== id) {
      logWarnWithTs(`⚠️ Ignoring malformed task document ${id}.json`);
      return null;
    }
    return fromTaskDocument(doc);
  }

  private async loadAll(): Promise<TranscriptTask[]> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.options.dir);
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }

    const tasks: TranscriptTask[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(".json")) continue;
      const id = entry.slice(0, -".json".length);
      if (!TASK_ID_PATTERN.test(id)) continue;
      const task = await this.load(id);
      if (task) tasks.push(task);
    }
    return tasks;
  }

  /** Serialize every read-modify-write of one task id. */
  private withLock<T>(id: string, op: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(id) ?? Promise.resolve();
    const run = previous.then(op);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(id, settled);
    void settled.then(() => {
      if (this.locks.get(id) === settled) this.locks.delete(id);
    });
    return run;
  }
}
