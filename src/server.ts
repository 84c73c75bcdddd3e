#!/usr/bin/env node

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { LocalExecutor } from "./execution/executor.js";
import { createToolRegistry } from "./tools/index.js";
import { startServer } from "./app.js";
import { SERVER_NAME } from "./rpc/dispatcher.js";
import type { ServerContext } from "./context.js";

async function main(): Promise<void> {
  logger.info(`Starting ${SERVER_NAME} server`);

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, firstRun } = loadConfig(process.env.CARGO_MCP_CONFIG ?? undefined);
  logger.info({ configPath, firstRun, defaultToolchain: config.toolchain.default }, "Configuration loaded");

  // ── Phase 2: Build the tool registry ──────────────────────────
  const registry = createToolRegistry();
  logger.info({ toolCount: registry.size }, "Tools registered");

  // ── Phase 3: Shared context ───────────────────────────────────
  const ctx: ServerContext = Object.freeze({ config, executor: new LocalExecutor(), registry });

  // ── Phase 4: Connect transport ────────────────────────────────
  const { transport, dispatcher } = await startServer(ctx);
  logger.info({ tools: registry.size }, `${SERVER_NAME} server running on stdio`);

  const exitWhenIdle = (): void => {
    dispatcher
      .drain()
      .then(() => transport.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.fatal({ error: err }, "Shutdown failed");
        process.exit(1);
      });
  };

  // Input closed: answer what is still running, then exit.
  process.stdin.once("end", exitWhenIdle);
  const shutdown = (signal: string): void => {
    dispatcher.cancelAll(signal);
    exitWhenIdle();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
