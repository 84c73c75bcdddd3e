import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { AnyToolDefinition } from "../types/tool.js";
import { logger } from "../logger.js";

/** Listing entry returned by tools/list. */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ReturnType<typeof zodToJsonSchema>;
  readonly annotations: AnyToolDefinition["annotations"];
}

/**
 * Tool Registry: the closed set of cargo operations this server will run.
 * Filled once at startup, then frozen; request handlers only read from it.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, AnyToolDefinition>();
  private frozen = false;

  register(tool: AnyToolDefinition): void {
    if (this.frozen) {
      throw new Error(`Tool registry is frozen; cannot register '${tool.name}'`);
    }
    if (this.tools.has(tool.name)) {
      logger.warn({ tool: tool.name }, "Duplicate tool registration, overwriting");
    }
    this.tools.set(tool.name, tool);
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  lookup(name: string): AnyToolDefinition | undefined {
    return this.tools.get(name);
  }

  list(): AnyToolDefinition[] {
    return [...this.tools.values()];
  }

  get size(): number {
    return this.tools.size;
  }

  describeTools(): ToolDescriptor[] {
    return this.list().map((tool) => {
      const schema: z.ZodTypeAny = tool.inputSchema;
      return {
        name: tool.name,
        description: describeTool(tool),
        inputSchema: zodToJsonSchema(schema),
        annotations: tool.annotations,
      };
    });
  }
}

/** Description plus the tool's usage examples, as shown to callers. */
export function describeTool(tool: AnyToolDefinition): string {
  const examples: readonly { description: string; arguments: object }[] = tool.examples;
  if (examples.length === 0) return tool.description;
  const lines = examples.map((ex) => `- ${ex.description}: ${JSON.stringify(ex.arguments)}`);
  return `${tool.description}\n\nExamples (path omitted):\n${lines.join("\n")}`;
}
