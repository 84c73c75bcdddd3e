import type { z } from "zod";
import type { TOOL_SCHEMAS } from "../tools/schemas.js";

type ToolSchemas = typeof TOOL_SCHEMAS;

export type ToolName = keyof ToolSchemas;

/** Validated (defaults applied) argument record per tool. */
export type ToolArgs = { [K in ToolName]: z.output<ToolSchemas[K]> };

/**
 * Output of the validator: one variant per tool, discriminated on `tool`,
 * so a builder can only read fields its own tool declares.
 */
export type ValidatedArguments = {
  [K in ToolName]: { readonly tool: K; readonly args: Readonly<ToolArgs[K]> };
}[ToolName];

export type ToolModule = "build" | "testing" | "dependencies";

export interface ToolAnnotations {
  readonly readOnlyHint?: boolean;
  readonly destructiveHint?: boolean;
  readonly idempotentHint?: boolean;
  readonly openWorldHint?: boolean;
}

/** Usage example shown in the tool listing; `path` is left out. */
export interface ToolExample<K extends ToolName> {
  readonly description: string;
  readonly arguments: Omit<z.input<ToolSchemas[K]>, "path">;
}

/** Immutable description of one whitelisted tool. */
export interface ToolDefinition<K extends ToolName> {
  readonly name: K;
  readonly description: string;
  readonly module: ToolModule;
  /** Fixed cargo subcommand token; never taken from caller input. */
  readonly subcommand: string;
  readonly inputSchema: ToolSchemas[K];
  readonly annotations: ToolAnnotations;
  readonly examples: readonly ToolExample<K>[];
}

export type AnyToolDefinition = { [K in ToolName]: ToolDefinition<K> }[ToolName];
