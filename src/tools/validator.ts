import type { z } from "zod";
import type { ToolArgs, ToolName, ValidatedArguments } from "../types/tool.js";
import { CargoMcpError, ErrorKind } from "../errors.js";
import { TOOL_SCHEMAS } from "./schemas.js";

/**
 * Validate an untyped argument bag against the tool's closed schema and
 * return the typed record for that tool. Defaults are applied here.
 * Throws CargoMcpError(ValidationError) listing every problem found.
 */
export function validateArguments(tool: ToolName, raw: unknown): ValidatedArguments {
  const bag = raw ?? {};
  switch (tool) {
    case "cargo_check": return parseAs(tool, TOOL_SCHEMAS.cargo_check, bag);
    case "cargo_clippy": return parseAs(tool, TOOL_SCHEMAS.cargo_clippy, bag);
    case "cargo_test": return parseAs(tool, TOOL_SCHEMAS.cargo_test, bag);
    case "cargo_fmt_check": return parseAs(tool, TOOL_SCHEMAS.cargo_fmt_check, bag);
    case "cargo_build": return parseAs(tool, TOOL_SCHEMAS.cargo_build, bag);
    case "cargo_bench": return parseAs(tool, TOOL_SCHEMAS.cargo_bench, bag);
    case "cargo_add": return parseAs(tool, TOOL_SCHEMAS.cargo_add, bag);
    case "cargo_remove": return parseAs(tool, TOOL_SCHEMAS.cargo_remove, bag);
    case "cargo_update": return parseAs(tool, TOOL_SCHEMAS.cargo_update, bag);
    case "cargo_clean": return parseAs(tool, TOOL_SCHEMAS.cargo_clean, bag);
    case "cargo_run": return parseAs(tool, TOOL_SCHEMAS.cargo_run, bag);
    default: {
      const unreachable: never = tool;
      throw new CargoMcpError(ErrorKind.UnknownTool, `Unknown tool: ${String(unreachable)}`);
    }
  }
}

function parseAs<K extends ToolName>(
  tool: K,
  schema: z.ZodType<ToolArgs[K], z.ZodTypeDef, unknown>,
  raw: unknown,
): { readonly tool: K; readonly args: ToolArgs[K] } {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new CargoMcpError(
      ErrorKind.ValidationError,
      `Invalid arguments for ${tool}: ${formatIssues(parsed.error.issues)}`,
      { tool, issues: parsed.error.issues.length },
    );
  }
  return { tool, args: parsed.data };
}

/** "field: message" per issue; issues on the bag itself are reported as "arguments". */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "arguments"}: ${issue.message}`)
    .join("; ");
}
