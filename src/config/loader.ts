// Config loader: reads ~/.config/cargo-mcp/config.yaml and merges it over defaults.
// On first run (no config file), writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// CARGO_MCP_DEFAULT_TOOLCHAIN overrides toolchain.default after the file is read.
// The returned config is frozen: request handlers share it without synchronization.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { ServerConfig } from "../types/config.js";
import { TOOLCHAIN_PATTERN } from "../tools/schemas.js";
import { formatIssues } from "../tools/validator.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "cargo-mcp");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const TOOLCHAIN_ENV_VAR = "CARGO_MCP_DEFAULT_TOOLCHAIN";

export const DEFAULT_CONFIG: ServerConfig = {
  toolchain: { default: null },
  execution: { timeout_seconds: 0, max_output_bytes: 10 * 1024 * 1024, kill_grace_ms: 5_000 },
};

const DEFAULT_CONFIG_YAML = `# cargo-mcp: Configuration
# Generated automatically on first run. All values shown are defaults.

toolchain:
  # Toolchain used when a call does not name one, e.g. stable or nightly.
  # ${TOOLCHAIN_ENV_VAR} overrides this value.
  default: null

execution:
  # Wall-clock limit per cargo invocation in seconds; 0 disables it.
  timeout_seconds: 0
  # Captured bytes kept per stream (stdout, stderr); 0 keeps everything.
  max_output_bytes: 10485760
  # Milliseconds between SIGTERM and SIGKILL when a child is stopped.
  kill_grace_ms: 5000
`;

const ConfigFileSchema = z.object({
  toolchain: z.object({
    default: z.string().regex(TOOLCHAIN_PATTERN).nullable(),
  }).partial().strict().optional(),
  execution: z.object({
    timeout_seconds: z.number().int().min(0),
    max_output_bytes: z.number().int().min(0),
    kill_grace_ms: z.number().int().min(0),
  }).partial().strict().optional(),
}).strict();

export interface ConfigResult {
  config: Readonly<ServerConfig>;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: finalize(DEFAULT_CONFIG, env), configPath, firstRun: true };
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    const parsed = ConfigFileSchema.safeParse(parseYaml(raw) ?? {});
    if (!parsed.success) {
      logger.error({ configPath, issues: formatIssues(parsed.error.issues) }, "Invalid config, using defaults");
      return { config: finalize(DEFAULT_CONFIG, env), configPath, firstRun: false };
    }
    const file = parsed.data;
    const merged: ServerConfig = {
      toolchain: { ...DEFAULT_CONFIG.toolchain, ...file.toolchain },
      execution: { ...DEFAULT_CONFIG.execution, ...file.execution },
    };
    return { config: finalize(merged, env), configPath, firstRun: false };
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to parse config, using defaults");
    return { config: finalize(DEFAULT_CONFIG, env), configPath, firstRun: false };
  }
}

/** Apply the environment override and freeze the result. */
function finalize(config: ServerConfig, env: NodeJS.ProcessEnv): Readonly<ServerConfig> {
  let toolchain = config.toolchain.default;
  const fromEnv = env[TOOLCHAIN_ENV_VAR];
  if (fromEnv) {
    if (TOOLCHAIN_PATTERN.test(fromEnv)) {
      logger.info({ toolchain: fromEnv }, `Default toolchain set from ${TOOLCHAIN_ENV_VAR}`);
      toolchain = fromEnv;
    } else {
      logger.warn({ toolchain: fromEnv }, `Ignoring invalid ${TOOLCHAIN_ENV_VAR}`);
    }
  }
  return Object.freeze({
    toolchain: Object.freeze({ default: toolchain }),
    execution: Object.freeze({ ...config.execution }),
  });
}
