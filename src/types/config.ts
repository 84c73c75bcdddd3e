/** Full server configuration as read from config.yaml. */
export interface ServerConfig {
  toolchain: {
    /** Toolchain selector applied when a call names none (e.g. "stable", "nightly"). */
    default: string | null;
  };
  execution: {
    /** Wall-clock limit per cargo invocation; 0 disables it. */
    timeout_seconds: number;
    /** Per-stream capture ceiling; bytes past it are dropped. */
    max_output_bytes: number;
    /** Delay between SIGTERM and SIGKILL when a child is stopped. */
    kill_grace_ms: number;
  };
}
