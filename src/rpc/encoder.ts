import type { JSONRPCMessage, RequestId, Result } from "@modelcontextprotocol/sdk/types.js";
import { toRpcError } from "../errors.js";

/** Outbound channel; StdioServerTransport satisfies it. */
export interface MessageSink {
  send(message: JSONRPCMessage): Promise<void>;
}

/**
 * Response encoder: wraps results and errors in JSON-RPC envelopes and writes them
 * one at a time. Writes queue behind each other on a promise chain, so two
 * completions can never interleave on the outbound stream.
 */
export class ResponseEncoder {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly sink: MessageSink) {}

  success(id: RequestId, result: Result): Promise<void> {
    return this.write({ jsonrpc: "2.0", id, result });
  }

  failure(id: RequestId, err: unknown): Promise<void> {
    const error = toRpcError(err);
    return this.write({ jsonrpc: "2.0", id, error });
  }

  private write(message: JSONRPCMessage): Promise<void> {
    const next = this.tail.then(() => this.sink.send(message));
    // The caller observes a failed write through `next`; the chain itself must keep going.
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }
}
