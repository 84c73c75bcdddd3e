import type { ToolArgs, ToolDefinition } from "../../types/tool.js";
import type { ToolRegistry } from "../registry.js";
import { TOOL_SCHEMAS } from "../schemas.js";
import { featureList, flag, option, packageScope, passthrough } from "../helpers.js";

// ── cargo_test ──────────────────────────────────────────────────
export const cargoTest: ToolDefinition<"cargo_test"> = {
  name: "cargo_test",
  description: "Run the project's tests (cargo test). A failing test run is reported as output, not as an error.",
  module: "testing",
  subcommand: "test",
  inputSchema: TOOL_SCHEMAS.cargo_test,
  annotations: { readOnlyHint: false, destructiveHint: false },
  examples: [
    { description: "Run all tests", arguments: {} },
    { description: "Run tests for a specific package", arguments: { package: "my-lib" } },
    { description: "Run a specific test", arguments: { test_name: "test_addition" } },
    { description: "Show test output while running", arguments: { no_capture: true } },
    { description: "Run tests with custom environment", arguments: { cargo_env: { RUST_LOG: "debug" } } },
  ],
};

export function testArgs(args: ToolArgs["cargo_test"]): string[] {
  const tokens = [...packageScope(args.package)];
  if (args.test_name) tokens.push(args.test_name);
  // Harness flags go to the test binary, not to cargo
  return [...tokens, ...passthrough(flag(args.no_capture, "--no-capture"))];
}

// ── cargo_bench ─────────────────────────────────────────────────
export const cargoBench: ToolDefinition<"cargo_bench"> = {
  name: "cargo_bench",
  description: "Run benchmarks (cargo bench). Benchmarks can run for a long time.",
  module: "testing",
  subcommand: "bench",
  inputSchema: TOOL_SCHEMAS.cargo_bench,
  annotations: { readOnlyHint: false, destructiveHint: false },
  examples: [
    { description: "Run all benchmarks", arguments: {} },
    { description: "Run a specific benchmark", arguments: { bench_name: "my_benchmark" } },
    { description: "Run benchmarks for a specific package", arguments: { package: "my-lib" } },
    { description: "Save results as a named baseline", arguments: { baseline: "main" } },
  ],
};

export function benchArgs(args: ToolArgs["cargo_bench"]): string[] {
  const tokens = [...packageScope(args.package)];
  if (args.bench_name) tokens.push(args.bench_name);
  return [...tokens, ...passthrough(option("--save-baseline", args.baseline))];
}

// ── cargo_run ───────────────────────────────────────────────────
export const cargoRun: ToolDefinition<"cargo_run"> = {
  name: "cargo_run",
  description: "Build and run a binary or example of the project (cargo run). Program arguments follow --.",
  module: "testing",
  subcommand: "run",
  inputSchema: TOOL_SCHEMAS.cargo_run,
  annotations: { readOnlyHint: false, openWorldHint: true },
  examples: [
    { description: "Run the default binary", arguments: {} },
    { description: "Run a specific binary", arguments: { bin: "my-binary" } },
    { description: "Run an example", arguments: { example: "hello" } },
    { description: "Pass arguments to the program", arguments: { args: ["--verbose", "input.txt"] } },
    { description: "Run in release mode with features", arguments: { release: true, features: ["feature1", "feature2"] } },
    { description: "Run a binary from a workspace package", arguments: { package: "my-crate", bin: "worker", args: ["--config", "prod.toml"] } },
  ],
};

export function runArgs(args: ToolArgs["cargo_run"]): string[] {
  return [
    ...packageScope(args.package),
    ...option("--bin", args.bin),
    ...option("--example", args.example),
    ...flag(args.release, "--release"),
    ...featureList(args.features),
    ...flag(args.all_features, "--all-features"),
    ...flag(args.no_default_features, "--no-default-features"),
    ...passthrough(args.args),
  ];
}

export function registerTestingTools(registry: ToolRegistry): void {
  registry.register(cargoTest);
  registry.register(cargoBench);
  registry.register(cargoRun);
}
