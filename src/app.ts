import type { Readable, Writable } from "node:stream";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { ServerContext } from "./context.js";
import { RequestDispatcher } from "./rpc/dispatcher.js";
import { ResponseEncoder } from "./rpc/encoder.js";
import { logger } from "./logger.js";

export interface RunningServer {
  readonly transport: StdioServerTransport;
  readonly dispatcher: RequestDispatcher;
}

/**
 * Wire the line-delimited JSON-RPC transport to the dispatcher.
 * The transport reads one message per line; the encoder serializes writes back.
 */
export async function startServer(
  ctx: ServerContext,
  stdin: Readable = process.stdin,
  stdout: Writable = process.stdout,
): Promise<RunningServer> {
  const transport = new StdioServerTransport(stdin, stdout);
  const dispatcher = new RequestDispatcher(ctx, new ResponseEncoder(transport));

  transport.onmessage = (message) => dispatcher.accept(message);
  transport.onerror = (err) => {
    logger.warn({ error: err.message }, "Discarded unreadable inbound message");
  };

  await transport.start();
  return { transport, dispatcher };
}
