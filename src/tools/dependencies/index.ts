import type { ToolArgs, ToolDefinition } from "../../types/tool.js";
import type { ToolRegistry } from "../registry.js";
import { TOOL_SCHEMAS } from "../schemas.js";
import { featureList, flag, packageScope } from "../helpers.js";

// Dependency lists are emitted in caller order: cargo resolves them left to right.

// ── cargo_add ───────────────────────────────────────────────────
export const cargoAdd: ToolDefinition<"cargo_add"> = {
  name: "cargo_add",
  description: "Add dependencies to Cargo.toml (cargo add).",
  module: "dependencies",
  subcommand: "add",
  inputSchema: TOOL_SCHEMAS.cargo_add,
  annotations: { readOnlyHint: false, destructiveHint: false, openWorldHint: true },
  examples: [
    { description: "Add a simple dependency", arguments: { dependencies: ["serde"] } },
    { description: "Add multiple dependencies with versions", arguments: { dependencies: ["serde@1.0", "tokio@1.0"] } },
    { description: "Add a dev dependency", arguments: { dependencies: ["criterion"], dev: true } },
    { description: "Add a dependency with features", arguments: { dependencies: ["tokio"], features: ["full"] } },
  ],
};

export function addArgs(args: ToolArgs["cargo_add"]): string[] {
  return [
    ...packageScope(args.package),
    ...args.dependencies,
    ...flag(args.dev, "--dev"),
    ...flag(args.optional, "--optional"),
    ...featureList(args.features),
  ];
}

// ── cargo_remove ────────────────────────────────────────────────
export const cargoRemove: ToolDefinition<"cargo_remove"> = {
  name: "cargo_remove",
  description: "Remove dependencies from Cargo.toml (cargo remove).",
  module: "dependencies",
  subcommand: "remove",
  inputSchema: TOOL_SCHEMAS.cargo_remove,
  annotations: { readOnlyHint: false, destructiveHint: true },
  examples: [
    { description: "Remove a dependency", arguments: { dependencies: ["serde"] } },
    { description: "Remove multiple dependencies", arguments: { dependencies: ["serde", "tokio"] } },
    { description: "Remove a dev dependency", arguments: { dependencies: ["criterion"], dev: true } },
  ],
};

export function removeArgs(args: ToolArgs["cargo_remove"]): string[] {
  return [...packageScope(args.package), ...args.dependencies, ...flag(args.dev, "--dev")];
}

// ── cargo_update ────────────────────────────────────────────────
export const cargoUpdate: ToolDefinition<"cargo_update"> = {
  name: "cargo_update",
  description: "Update dependencies recorded in Cargo.lock (cargo update).",
  module: "dependencies",
  subcommand: "update",
  inputSchema: TOOL_SCHEMAS.cargo_update,
  annotations: { readOnlyHint: false, destructiveHint: false, openWorldHint: true },
  examples: [
    { description: "Update all dependencies", arguments: {} },
    { description: "See what would be updated", arguments: { dry_run: true } },
    { description: "Update specific dependencies", arguments: { dependencies: ["serde", "tokio"] } },
    { description: "Update dependencies of one package", arguments: { package: "my-lib" } },
  ],
};

export function updateArgs(args: ToolArgs["cargo_update"]): string[] {
  return [...packageScope(args.package), ...args.dependencies, ...flag(args.dry_run, "--dry-run")];
}

export function registerDependencyTools(registry: ToolRegistry): void {
  registry.register(cargoAdd);
  registry.register(cargoRemove);
  registry.register(cargoUpdate);
}
