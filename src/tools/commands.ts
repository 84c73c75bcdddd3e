// Command builder: turns a validated argument record into a ProcessSpec.
// argv layout is always: cargo [+toolchain] <fixed subcommand> <tool tokens...>
import type { ProcessSpec } from "../types/command.js";
import type { ValidatedArguments } from "../types/tool.js";
import type { ProjectRoot } from "../project/precondition.js";
import { buildArgs, cargoBuild, cargoCheck, cargoClean, cargoClippy, cargoFmtCheck, checkArgs, cleanArgs, clippyArgs, fmtCheckArgs } from "./build/index.js";
import { benchArgs, cargoBench, cargoRun, cargoTest, runArgs, testArgs } from "./testing/index.js";
import { addArgs, cargoAdd, cargoRemove, cargoUpdate, removeArgs, updateArgs } from "./dependencies/index.js";

export const CARGO_EXECUTABLE = "cargo";

export interface CommandContext {
  /** Process-wide toolchain, used when the call names none. */
  readonly defaultToolchain: string | null;
}

export function buildCommand(validated: ValidatedArguments, project: ProjectRoot, ctx: CommandContext): ProcessSpec {
  const toolchain = validated.args.toolchain ?? ctx.defaultToolchain;
  return {
    executable: CARGO_EXECUTABLE,
    args: [...(toolchain ? [`+${toolchain}`] : []), ...subcommandTokens(validated)],
    cwd: project.root,
    env: { ...validated.args.cargo_env },
  };
}

/** Fixed subcommand followed by the tool's own tokens. */
function subcommandTokens(v: ValidatedArguments): string[] {
  switch (v.tool) {
    case "cargo_check": return [cargoCheck.subcommand, ...checkArgs(v.args)];
    case "cargo_clippy": return [cargoClippy.subcommand, ...clippyArgs(v.args)];
    case "cargo_test": return [cargoTest.subcommand, ...testArgs(v.args)];
    case "cargo_fmt_check": return [cargoFmtCheck.subcommand, ...fmtCheckArgs(v.args)];
    case "cargo_build": return [cargoBuild.subcommand, ...buildArgs(v.args)];
    case "cargo_bench": return [cargoBench.subcommand, ...benchArgs(v.args)];
    case "cargo_add": return [cargoAdd.subcommand, ...addArgs(v.args)];
    case "cargo_remove": return [cargoRemove.subcommand, ...removeArgs(v.args)];
    case "cargo_update": return [cargoUpdate.subcommand, ...updateArgs(v.args)];
    case "cargo_clean": return [cargoClean.subcommand, ...cleanArgs(v.args)];
    case "cargo_run": return [cargoRun.subcommand, ...runArgs(v.args)];
    default: {
      const unreachable: never = v;
      throw new Error(`No command builder for ${JSON.stringify(unreachable)}`);
    }
  }
}

/** Full argv, executable first. */
export function argv(spec: ProcessSpec): string[] {
  return [spec.executable, ...spec.args];
}

/** Display form of the argv. Tokens with whitespace or quotes are JSON-quoted. */
export function formatCommand(spec: ProcessSpec): string {
  return argv(spec)
    .map((token) => (token === "" || /[\s"'\\]/.test(token) ? JSON.stringify(token) : token))
    .join(" ");
}
