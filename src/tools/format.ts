import type { ProcessResult, ProcessSpec } from "../types/command.js";
import { formatCommand } from "./commands.js";

function statusLine(result: ProcessResult): string {
  if (result.timedOut) return `Command timed out after ${result.durationMs} ms`;
  if (result.exitCode === 0) return "Command completed successfully";
  if (result.exitCode === null) return `Command terminated by signal ${result.signal ?? "unknown"}`;
  return `Command failed with exit code: ${result.exitCode}`;
}

function section(title: string, body: string): string {
  return `${title}:\n${body.endsWith("\n") ? body : `${body}\n`}\n`;
}

/** Human-readable report of one cargo invocation, returned as the tool's text content. */
export function formatReport(label: string, spec: ProcessSpec, result: ProcessResult): string {
  let out = `=== ${label} ===\n`;
  out += `Working directory: ${spec.cwd}\n`;
  out += `Command: ${formatCommand(spec)}\n\n`;
  out += `${statusLine(result)}\n\n`;
  if (result.truncated) out += "Output was truncated at the configured capture limit.\n\n";
  if (result.stdout) out += section("STDOUT", result.stdout);
  if (result.stderr) out += section("STDERR", result.stderr);
  if (!result.stdout && !result.stderr) out += "No output produced\n";
  return out;
}
