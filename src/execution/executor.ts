// Process execution layer: every cargo invocation passes through this module.
// LocalExecutor.execute() is the hard boundary between tool code and the OS:
// argv only (shell: false), stdout/stderr captured separately, and a child
// environment built from scratch instead of copied from this process.
import { spawn } from "node:child_process";
import type { ChildProcess, SpawnOptions } from "node:child_process";
import type { ProcessResult, ProcessSpec } from "../types/command.js";
import type { ServerConfig } from "../types/config.js";
import { CargoMcpError, ErrorKind, errnoCode } from "../errors.js";
import { logger } from "../logger.js";

export interface ExecuteOptions {
  /** Wall-clock limit; 0 or absent means none. */
  readonly timeoutMs?: number;
  /** Per-stream capture ceiling in bytes; 0 or absent means unbounded. */
  readonly maxOutputBytes?: number;
  /** Delay between SIGTERM and SIGKILL when the child has to be stopped. */
  readonly killGraceMs?: number;
  /** Aborting kills the child and rejects with ErrorKind.Cancelled. */
  readonly signal?: AbortSignal;
}

/** Executor interface: the dispatcher only ever talks to this. */
export interface Executor {
  execute(spec: ProcessSpec, options?: ExecuteOptions): Promise<ProcessResult>;
}

/** Host variables a child needs to locate its executable, and nothing more. */
const LOCATOR_ENV_KEYS: readonly string[] =
  process.platform === "win32" ? ["PATH", "PATHEXT", "SystemRoot"] : ["PATH"];

const DEFAULT_KILL_GRACE_MS = 5_000;

/** Child environment: locator variables from the host, then the caller's overlay. */
export function childEnvironment(
  overlay: Readonly<Record<string, string>>,
  host: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of LOCATOR_ENV_KEYS) {
    const value = host[key];
    if (value !== undefined) env[key] = value;
  }
  return { ...env, ...overlay };
}

/** Map server configuration onto executor options. */
export function executionOptions(config: ServerConfig, signal?: AbortSignal): ExecuteOptions {
  return {
    timeoutMs: config.execution.timeout_seconds * 1000,
    maxOutputBytes: config.execution.max_output_bytes,
    killGraceMs: config.execution.kill_grace_ms,
    signal,
  };
}

/** Buffers one output stream, keeping at most `limit` bytes. */
class StreamCapture {
  private readonly chunks: Buffer[] = [];
  private bytes = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    if (this.limit <= 0) {
      this.chunks.push(chunk);
      return;
    }
    const room = this.limit - this.bytes;
    if (chunk.length > room) {
      this.truncated = true;
      if (room <= 0) return;
      chunk = chunk.subarray(0, room);
    }
    this.chunks.push(chunk);
    this.bytes += chunk.length;
  }

  text(): string {
    const bytes = Buffer.concat(this.chunks);
    return (this.truncated ? trimPartialCharacter(bytes) : bytes).toString("utf-8");
  }
}

/** Drop a UTF-8 sequence cut short at the end of `bytes`. */
export function trimPartialCharacter(bytes: Buffer): Buffer {
  let lead = bytes.length - 1;
  while (lead > 0 && bytes.length - lead < 4 && (bytes[lead] & 0xc0) === 0x80) lead--;
  if (lead < 0) return bytes;
  const byte = bytes[lead];
  const width = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
  return bytes.length - lead < width ? bytes.subarray(0, lead) : bytes;
}

/** The subset of child_process.spawn the executor calls. */
export type SpawnProcess = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

/** Local executor using node:child_process. */
export class LocalExecutor implements Executor {
  constructor(private readonly spawnProcess: SpawnProcess = spawn) {}

  execute(spec: ProcessSpec, options: ExecuteOptions = {}): Promise<ProcessResult> {
    const { timeoutMs = 0, maxOutputBytes = 0, killGraceMs = DEFAULT_KILL_GRACE_MS, signal } = options;
    const start = performance.now();

    return new Promise<ProcessResult>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CargoMcpError(ErrorKind.Cancelled, `Cancelled before ${spec.executable} started`));
        return;
      }

      const spawnError = (err: unknown): CargoMcpError =>
        new CargoMcpError(
          ErrorKind.SpawnError,
          `Failed to start ${spec.executable}: ${err instanceof Error ? err.message : String(err)}`,
          { executable: spec.executable, code: errnoCode(err) },
        );

      let spawned = false;
      let settled = false;
      let timedOut = false;
      let cancelled = false;
      let killTimer: NodeJS.Timeout | undefined;

      let child: ChildProcess;
      try {
        child = this.spawnProcess(spec.executable, spec.args, {
          cwd: spec.cwd,
          env: childEnvironment(spec.env),
          shell: false,
          stdio: ["ignore", "pipe", "pipe"],
          windowsHide: true,
        });
      } catch (err) {
        // Invalid arguments and E2BIG surface as a synchronous throw
        reject(spawnError(err));
        return;
      }

      // Resource errors (EMFILE, ENOENT, ...) arrive here on the next tick, with no stdio attached
      child.once("spawn", () => {
        spawned = true;
      });
      child.on("error", (err) => {
        if (spawned) {
          // kill() failures land here; "close" still follows
          logger.warn({ executable: spec.executable, error: err.message }, "Child process error");
          return;
        }
        if (!finish()) return;
        reject(spawnError(err));
      });

      const stdout = new StreamCapture(maxOutputBytes);
      const stderr = new StreamCapture(maxOutputBytes);
      child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

      const terminate = (): void => {
        if (child.exitCode !== null || child.signalCode !== null) return;
        child.kill("SIGTERM");
        killTimer = setTimeout(() => child.kill("SIGKILL"), killGraceMs);
        killTimer.unref();
      };

      const timer = timeoutMs > 0
        ? setTimeout(() => {
          timedOut = true;
          logger.warn({ executable: spec.executable, timeoutMs }, "Child process timed out, terminating");
          terminate();
        }, timeoutMs)
        : undefined;

      const onAbort = (): void => {
        cancelled = true;
        terminate();
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      const finish = (): boolean => {
        if (settled) return false;
        settled = true;
        clearTimeout(timer);
        clearTimeout(killTimer);
        signal?.removeEventListener("abort", onAbort);
        return true;
      };

      child.once("close", (code, sig) => {
        if (!finish()) return;
        if (cancelled) {
          reject(new CargoMcpError(ErrorKind.Cancelled, `${spec.executable} was cancelled`));
          return;
        }
        resolve({
          exitCode: code,
          signal: sig,
          stdout: stdout.text(),
          stderr: stderr.text(),
          durationMs: Math.round(performance.now() - start),
          timedOut,
          truncated: stdout.truncated || stderr.truncated,
        });
      });
    });
  }
}
