import type { ToolArgs, ToolDefinition } from "../../types/tool.js";
import type { ToolRegistry } from "../registry.js";
import { TOOL_SCHEMAS } from "../schemas.js";
import { flag, packageScope } from "../helpers.js";

// ── cargo_check ─────────────────────────────────────────────────
export const cargoCheck: ToolDefinition<"cargo_check"> = {
  name: "cargo_check",
  description: "Type-check a Rust project without producing binaries (cargo check).",
  module: "build",
  subcommand: "check",
  inputSchema: TOOL_SCHEMAS.cargo_check,
  annotations: { readOnlyHint: true, idempotentHint: true },
  examples: [
    { description: "Check the whole project", arguments: {} },
    { description: "Check a specific package in a workspace", arguments: { package: "my-lib" } },
    { description: "Check using the nightly toolchain", arguments: { toolchain: "nightly" } },
    { description: "Check with custom environment variables", arguments: { cargo_env: { RUSTFLAGS: "-D warnings" } } },
  ],
};

export function checkArgs(args: ToolArgs["cargo_check"]): string[] {
  return packageScope(args.package);
}

// ── cargo_clippy ────────────────────────────────────────────────
export const cargoClippy: ToolDefinition<"cargo_clippy"> = {
  name: "cargo_clippy",
  description: "Run the clippy linter (cargo clippy). With fix=true clippy rewrites sources in place.",
  module: "build",
  subcommand: "clippy",
  inputSchema: TOOL_SCHEMAS.cargo_clippy,
  annotations: { readOnlyHint: false, destructiveHint: false },
  examples: [
    { description: "Lint the whole project", arguments: {} },
    { description: "Lint a specific package", arguments: { package: "my-lib" } },
    { description: "Apply automatic fixes", arguments: { fix: true } },
    { description: "Treat warnings as errors", arguments: { cargo_env: { RUSTFLAGS: "-D warnings" } } },
  ],
};

export function clippyArgs(args: ToolArgs["cargo_clippy"]): string[] {
  return [...packageScope(args.package), ...flag(args.fix, "--fix")];
}

// ── cargo_fmt_check ─────────────────────────────────────────────
export const cargoFmtCheck: ToolDefinition<"cargo_fmt_check"> = {
  name: "cargo_fmt_check",
  description: "Check formatting without modifying files (cargo fmt --check).",
  module: "build",
  subcommand: "fmt",
  inputSchema: TOOL_SCHEMAS.cargo_fmt_check,
  annotations: { readOnlyHint: true, idempotentHint: true },
  examples: [
    { description: "Check formatting", arguments: {} },
    { description: "Check formatting with the nightly rustfmt", arguments: { toolchain: "nightly" } },
  ],
};

export function fmtCheckArgs(_args: ToolArgs["cargo_fmt_check"]): string[] {
  return ["--check"];
}

// ── cargo_build ─────────────────────────────────────────────────
export const cargoBuild: ToolDefinition<"cargo_build"> = {
  name: "cargo_build",
  description: "Compile the project (cargo build).",
  module: "build",
  subcommand: "build",
  inputSchema: TOOL_SCHEMAS.cargo_build,
  annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: true },
  examples: [
    { description: "Build in debug mode", arguments: {} },
    { description: "Build in release mode", arguments: { release: true } },
    { description: "Build a specific package", arguments: { package: "my-lib" } },
  ],
};

export function buildArgs(args: ToolArgs["cargo_build"]): string[] {
  return [...packageScope(args.package), ...flag(args.release, "--release")];
}

// ── cargo_clean ─────────────────────────────────────────────────
export const cargoClean: ToolDefinition<"cargo_clean"> = {
  name: "cargo_clean",
  description: "Remove build artifacts from the target directory (cargo clean).",
  module: "build",
  subcommand: "clean",
  inputSchema: TOOL_SCHEMAS.cargo_clean,
  annotations: { readOnlyHint: false, destructiveHint: true, idempotentHint: true },
  examples: [
    { description: "Clean all build artifacts", arguments: {} },
    { description: "Clean artifacts of one package", arguments: { package: "my-lib" } },
  ],
};

export function cleanArgs(args: ToolArgs["cargo_clean"]): string[] {
  return packageScope(args.package);
}

export function registerBuildTools(registry: ToolRegistry): void {
  registry.register(cargoCheck);
  registry.register(cargoClippy);
  registry.register(cargoFmtCheck);
  registry.register(cargoBuild);
  registry.register(cargoClean);
}
