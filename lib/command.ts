import { spawn } from "child_process";
import { CancelledError } from "@/lib/errors";

export interface RunCommandOptions {
  command: string;
  args: string[];
  cwd?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CommandResult {
  code: number;
  stdout: string;
}

export type CommandRunner = (options: RunCommandOptions) => Promise<CommandResult>;

const COMMAND_ERROR_EXCERPT_LINES = 20;

function tailLines(text: string, count: number): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .slice(-count);
}

/**
 * Run an external tool (ffmpeg/ffprobe) and collect its stdout.
 * Rejects on spawn error, non-zero exit, timeout or abort, with a stderr excerpt.
 */
export async function runCommand(options: RunCommandOptions): Promise<CommandResult> {
  // An already-aborted signal never fires "abort".
  if (options.signal?.aborted) throw new CancelledError();

  const child = spawn(options.command, options.args, {
    cwd: options.cwd,
    stdio: ["ignore", "pipe", "pipe"],
  });

  let stdout = "";
  let stderr = "";
  child.stdout.on("data", (chunk: Buffer) => {
    stdout += chunk.toString();
  });
  child.stderr.on("data", (chunk: Buffer) => {
    stderr += chunk.toString();
    if (stderr.length > 64 * 1024) stderr = stderr.slice(-32 * 1024);
  });

  return await new Promise<CommandResult>((resolve, reject) => {
    let timedOut = false;
    let aborted = false;

    const onAbort = () => {
      aborted = true;
      child.kill("SIGTERM");
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const timeoutTimer =
      typeof options.timeoutMs === "number" && Number.isFinite(options.timeoutMs) && options.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGTERM");
          }, options.timeoutMs)
        : null;

    const finish = () => {
      if (timeoutTimer) clearTimeout(timeoutTimer);
      options.signal?.removeEventListener("abort", onAbort);
    };

    child.on("error", (error) => {
      finish();
      reject(error);
    });

    child.on("close", (code) => {
      finish();
      const label = `${options.command} ${options.args.join(" ")}`;
      if (aborted) {
        reject(new Error(`Command aborted: ${label}`));
        return;
      }
      if (timedOut) {
        reject(new Error(`Command timeout after ${options.timeoutMs}ms: ${label}`));
        return;
      }
      if (code !== 0) {
        const excerpt = tailLines(stderr, COMMAND_ERROR_EXCERPT_LINES);
        const detail = excerpt.length > 0 ? `\nstderr: ${excerpt.join(" | ")}` : "";
        reject(new Error(`Command failed with code ${code}: ${label}${detail}`));
        return;
      }
      resolve({ code: code ?? 0, stdout });
    });
  });
}
