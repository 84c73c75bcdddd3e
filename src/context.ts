import type { ServerConfig } from "./types/config.js";
import type { Executor } from "./execution/executor.js";
import type { ToolRegistry } from "./tools/registry.js";

/**
 * Shared server context: created once at startup and passed to the dispatcher.
 * Everything reachable from here is read-only after construction.
 */
export interface ServerContext {
  readonly config: Readonly<ServerConfig>;
  readonly executor: Executor;
  readonly registry: ToolRegistry;
}
