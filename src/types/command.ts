/**
 * A fully resolved child-process invocation.
 * Tool code never builds command strings; it produces ProcessSpec objects.
 */
export interface ProcessSpec {
  /** Executable name, resolved through PATH by the executor. */
  readonly executable: string;
  /** Arguments after the executable, one discrete token each. */
  readonly args: readonly string[];
  readonly cwd: string;
  /** Caller-supplied variables only; never a copy of the host environment. */
  readonly env: Readonly<Record<string, string>>;
}

/** Outcome of a child process that was spawned and has terminated. */
export interface ProcessResult {
  /** null when the child was ended by a signal. */
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
  readonly timedOut: boolean;
  readonly truncated: boolean;
}
