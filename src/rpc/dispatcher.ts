// Request dispatcher: accepts inbound JSON-RPC messages one at a time, in arrival order.
// Lookup, validation and the project check run synchronously inside accept(); the
// cargo invocation then runs as its own unit of work so a long build never holds up
// the next request. Every accepted request gets exactly one response, unless the
// caller cancels it, in which case the response is suppressed.
import {
  CallToolRequestSchema,
  CancelledNotificationSchema,
  LATEST_PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
  isJSONRPCNotification,
  isJSONRPCRequest,
} from "@modelcontextprotocol/sdk/types.js";
import type {
  CallToolResult,
  JSONRPCMessage,
  JSONRPCNotification,
  JSONRPCRequest,
  RequestId,
  Result,
} from "@modelcontextprotocol/sdk/types.js";
import type { ServerContext } from "../context.js";
import type { ProcessResult, ProcessSpec } from "../types/command.js";
import type { AnyToolDefinition, ValidatedArguments } from "../types/tool.js";
import type { ProjectRoot } from "../project/precondition.js";
import { checkProject } from "../project/precondition.js";
import { validateArguments } from "../tools/validator.js";
import { buildCommand, formatCommand } from "../tools/commands.js";
import { formatReport } from "../tools/format.js";
import { executionOptions } from "../execution/executor.js";
import { CargoMcpError, ErrorKind } from "../errors.js";
import { logger } from "../logger.js";
import type { ResponseEncoder } from "./encoder.js";

export const SERVER_NAME = "cargo-mcp";
export const SERVER_VERSION = "0.1.0";

export const INSTRUCTIONS = `Cargo operations for Rust projects.

Every tool takes a "path" argument naming the project directory; it must contain Cargo.toml.
A non-zero cargo exit code is reported in the result (exit_code), not as an error.`;

interface InFlight {
  readonly controller: AbortController;
  readonly done: Promise<void>;
}

/** A tool call that passed lookup, validation and the project check. */
interface AcceptedCall {
  readonly definition: AnyToolDefinition;
  readonly validated: ValidatedArguments;
  readonly project: ProjectRoot;
}

export class RequestDispatcher {
  private readonly inFlight = new Map<RequestId, InFlight>();

  constructor(
    private readonly ctx: ServerContext,
    private readonly encoder: ResponseEncoder,
  ) {}

  /** Number of requests still waiting for their response to be written. */
  get pending(): number {
    return this.inFlight.size;
  }

  accept(message: JSONRPCMessage): void {
    if (isJSONRPCRequest(message)) {
      this.acceptRequest(message);
    } else if (isJSONRPCNotification(message)) {
      this.acceptNotification(message);
    } else {
      logger.debug({ message }, "Ignoring inbound response message");
    }
  }

  /** Resolves once every accepted request has been answered (or cancelled). */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight.values()].map((unit) => unit.done));
    }
  }

  /** Abort the unit for `id`; its child is killed and no response is written. */
  cancel(id: RequestId, reason?: string): boolean {
    const unit = this.inFlight.get(id);
    if (!unit) return false;
    logger.info({ id, reason }, "Cancelling request");
    unit.controller.abort();
    return true;
  }

  cancelAll(reason: string): void {
    for (const id of [...this.inFlight.keys()]) this.cancel(id, reason);
  }

  private acceptRequest(request: JSONRPCRequest): void {
    const { id, method } = request;
    if (this.inFlight.has(id)) {
      logger.warn({ id, method }, "Request id already in flight, dropping duplicate");
      return;
    }

    switch (method) {
      case "initialize":
        this.settle(id, Promise.resolve(this.initializeResult(request)));
        return;
      case "ping":
        this.settle(id, Promise.resolve({}));
        return;
      case "tools/list":
        this.settle(id, Promise.resolve({ tools: this.ctx.registry.describeTools() }));
        return;
      case "tools/call":
        this.acceptToolCall(request);
        return;
      default:
        this.settle(id, Promise.reject(new CargoMcpError(ErrorKind.MethodNotFound, `Method not found: ${method}`)));
    }
  }

  private acceptNotification(notification: JSONRPCNotification): void {
    if (notification.method !== "notifications/cancelled") return;
    const parsed = CancelledNotificationSchema.safeParse(notification);
    if (!parsed.success) {
      logger.warn({ params: notification.params }, "Malformed cancellation notification");
      return;
    }
    const { requestId, reason } = parsed.data.params;
    if (requestId === undefined) return;
    this.cancel(requestId, reason);
  }

  private acceptToolCall(request: JSONRPCRequest): void {
    let call: AcceptedCall;
    try {
      call = this.prepare(request);
    } catch (err) {
      this.settle(request.id, Promise.reject(err));
      return;
    }
    const controller = new AbortController();
    this.settle(request.id, this.invoke(request.id, call, controller.signal), controller);
  }

  /** Lookup → validate → project check. Throws before any process exists. */
  private prepare(request: JSONRPCRequest): AcceptedCall {
    const parsed = CallToolRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new CargoMcpError(ErrorKind.InvalidParams, "tools/call requires params.name (string) and optional params.arguments (object)");
    }
    const { name, arguments: raw } = parsed.data.params;

    const definition = this.ctx.registry.lookup(name);
    if (!definition) {
      throw new CargoMcpError(ErrorKind.UnknownTool, `Unknown tool: ${name}`, { tool: name });
    }
    const validated = validateArguments(definition.name, raw);
    const project = checkProject(validated.args.path);
    return { definition, validated, project };
  }

  private async invoke(id: RequestId, call: AcceptedCall, signal: AbortSignal): Promise<CallToolResult> {
    const spec = buildCommand(call.validated, call.project, { defaultToolchain: this.ctx.config.toolchain.default });
    logger.info({ id, tool: call.definition.name, command: formatCommand(spec), cwd: spec.cwd }, "Running cargo");

    const result = await this.ctx.executor.execute(spec, executionOptions(this.ctx.config, signal));
    logger.info({ id, tool: call.definition.name, exitCode: result.exitCode, durationMs: result.durationMs }, "Cargo finished");
    return toolCallResult(call.definition, spec, result);
  }

  /** Register a unit of work and write its outcome once it settles. */
  private settle(id: RequestId, work: Promise<Result>, controller = new AbortController()): void {
    const done = work
      .then(
        (result) => (controller.signal.aborted ? undefined : this.encoder.success(id, result)),
        (err: unknown) => {
          if (controller.signal.aborted) return undefined;
          if (!(err instanceof CargoMcpError)) logger.error({ id, error: err }, "Unexpected error while handling request");
          return this.encoder.failure(id, err);
        },
      )
      .catch((err: unknown) => {
        logger.error({ id, error: err }, "Failed to write response");
      })
      .finally(() => {
        this.inFlight.delete(id);
      });
    this.inFlight.set(id, { controller, done });
  }

  private initializeResult(request: JSONRPCRequest): Result {
    const requested = request.params?.protocolVersion;
    const protocolVersion = typeof requested === "string" && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
      ? requested
      : LATEST_PROTOCOL_VERSION;
    return {
      protocolVersion,
      capabilities: { tools: {} },
      serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
      instructions: INSTRUCTIONS,
    };
  }
}

/** Tool-call payload: a readable report plus the raw process result. */
export function toolCallResult(definition: AnyToolDefinition, spec: ProcessSpec, result: ProcessResult): CallToolResult {
  return {
    content: [{ type: "text", text: formatReport(`cargo ${definition.subcommand}`, spec, result) }],
    structuredContent: {
      tool: definition.name,
      command: formatCommand(spec),
      cwd: spec.cwd,
      exit_code: result.exitCode,
      signal: result.signal,
      stdout: result.stdout,
      stderr: result.stderr,
      duration_ms: result.durationMs,
      timed_out: result.timedOut,
      truncated: result.truncated,
    },
  };
}
