// Closed input schemas for every whitelisted cargo tool.
// Every object is .strict(): unknown keys are a validation error, never ignored.
// Adding a capability means adding a schema here and a definition in a tool module;
// no schema may accept a free-form command string.
import { z } from "zod";

/** Toolchain selectors as rustup names them: "stable", "nightly-2024-05-01", "1.79.0". */
export const TOOLCHAIN_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Anything handed to the OS as argv, env or cwd must be a C string.
const NUL_FREE = /^[^\0]*$/;

const text = (what: string) => z.string().regex(NUL_FREE, `${what} must not contain NUL bytes`);

// Values that land in cargo's own argv (positionals or flag values) may not look like options.
const token = (what: string) =>
  text(what).min(1).regex(/^[^-]/, `${what} must not start with '-'`);

const pathField = text("path").min(1).describe("Path to the Rust project directory (must contain Cargo.toml)");
const packageField = token("package").optional().describe("Workspace package to operate on (-p)");
const toolchainField = z
  .string()
  .regex(TOOLCHAIN_PATTERN, "toolchain must be a rustup toolchain name such as 'stable' or '1.79.0'")
  .optional()
  .describe("Rust toolchain to use (e.g. 'stable', 'nightly', '1.70.0'); overrides the server default");
const envField = z
  .record(
    z.string().regex(ENV_NAME_PATTERN, "environment variable names must match [A-Za-z_][A-Za-z0-9_]*"),
    text("environment variable values"),
  )
  .optional()
  .describe("Environment variables for the cargo process; the server's own environment is not inherited");

const common = { path: pathField, toolchain: toolchainField, cargo_env: envField };

export const cargoCheckSchema = z.object({ ...common, package: packageField }).strict();

export const cargoClippySchema = z.object({
  ...common,
  package: packageField,
  fix: z.boolean().optional().default(false).describe("Apply clippy's suggested fixes (--fix)"),
}).strict();

export const cargoTestSchema = z.object({
  ...common,
  package: packageField,
  test_name: token("test_name").optional().describe("Only run tests whose name contains this filter"),
  no_capture: z.boolean().optional().default(false).describe("Show test output as it is produced (-- --no-capture)"),
}).strict();

export const cargoFmtCheckSchema = z.object({ ...common }).strict();

export const cargoBuildSchema = z.object({
  ...common,
  package: packageField,
  release: z.boolean().optional().default(false).describe("Build with the release profile (--release)"),
}).strict();

export const cargoBenchSchema = z.object({
  ...common,
  package: packageField,
  bench_name: token("bench_name").optional().describe("Only run benchmarks whose name contains this filter"),
  baseline: token("baseline").optional().describe("Save results under this baseline name (-- --save-baseline)"),
}).strict();

export const cargoAddSchema = z.object({
  ...common,
  dependencies: z.array(token("dependency")).min(1, "at least one dependency is required")
    .describe("Dependencies to add, e.g. ['serde', 'tokio@1.0']"),
  package: packageField,
  dev: z.boolean().optional().default(false).describe("Add as development dependencies (--dev)"),
  optional: z.boolean().optional().default(false).describe("Add as optional dependencies (--optional)"),
  features: z.array(token("feature")).optional().default([]).describe("Features to enable on the added dependencies"),
}).strict();

export const cargoRemoveSchema = z.object({
  ...common,
  dependencies: z.array(token("dependency")).min(1, "at least one dependency is required")
    .describe("Dependencies to remove"),
  package: packageField,
  dev: z.boolean().optional().default(false).describe("Remove from development dependencies (--dev)"),
}).strict();

export const cargoUpdateSchema = z.object({
  ...common,
  package: packageField,
  dependencies: z.array(token("dependency")).optional().default([])
    .describe("Only update these dependencies, in the given order; omit to update the whole lock file"),
  dry_run: z.boolean().optional().default(false).describe("Report what would change without writing Cargo.lock (--dry-run)"),
}).strict();

export const cargoCleanSchema = z.object({ ...common, package: packageField }).strict();

export const cargoRunSchema = z.object({
  ...common,
  package: packageField,
  bin: token("bin").optional().describe("Binary target to run (--bin)"),
  example: token("example").optional().describe("Example target to run (--example)"),
  release: z.boolean().optional().default(false).describe("Run the release build (--release)"),
  features: z.array(token("feature")).optional().default([]).describe("Features to activate (--features)"),
  all_features: z.boolean().optional().default(false).describe("Activate all features (--all-features)"),
  no_default_features: z.boolean().optional().default(false).describe("Do not activate the default feature (--no-default-features)"),
  args: z.array(text("program arguments")).optional().default([]).describe("Arguments passed to the program after --"),
}).strict();

export const TOOL_SCHEMAS = {
  cargo_check: cargoCheckSchema,
  cargo_clippy: cargoClippySchema,
  cargo_test: cargoTestSchema,
  cargo_fmt_check: cargoFmtCheckSchema,
  cargo_build: cargoBuildSchema,
  cargo_bench: cargoBenchSchema,
  cargo_add: cargoAddSchema,
  cargo_remove: cargoRemoveSchema,
  cargo_update: cargoUpdateSchema,
  cargo_clean: cargoCleanSchema,
  cargo_run: cargoRunSchema,
} as const;
