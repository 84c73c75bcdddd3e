import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import type { JSONRPCMessage, RequestId } from '@modelcontextprotocol/sdk/types.js';
import type { ExecuteOptions, Executor } from '../src/execution/executor.js';
import type { MessageSink } from '../src/rpc/encoder.js';
import type { ProcessResult, ProcessSpec } from '../src/types/command.js';
import { CargoMcpError } from '../src/errors.js';

export function okResult(overrides: Partial<ProcessResult> = {}): ProcessResult {
  return {
    exitCode: 0,
    signal: null,
    stdout: '',
    stderr: '',
    durationMs: 12,
    timedOut: false,
    truncated: false,
    ...overrides,
  };
}

/** Records every spec it is asked to run instead of spawning anything. */
export class FakeExecutor implements Executor {
  readonly calls: Array<{ spec: ProcessSpec; options?: ExecuteOptions }> = [];

  constructor(
    private readonly respond: (spec: ProcessSpec, options?: ExecuteOptions) => Promise<ProcessResult> =
      async () => okResult(),
  ) {}

  execute(spec: ProcessSpec, options?: ExecuteOptions): Promise<ProcessResult> {
    this.calls.push({ spec, options });
    return this.respond(spec, options);
  }
}

/** Collects outbound messages in write order. */
export class MemorySink implements MessageSink {
  readonly messages: JSONRPCMessage[] = [];

  async send(message: JSONRPCMessage): Promise<void> {
    this.messages.push(message);
  }
}

export function toolCall(id: RequestId, name: string, args?: Record<string, unknown>): JSONRPCMessage {
  return { jsonrpc: '2.0', id, method: 'tools/call', params: { name, arguments: args } };
}

/** Temp directory containing a minimal Cargo.toml; returns its real path. */
export async function makeProject(prefix = 'cargo-mcp-project-'): Promise<string> {
  const dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
  await fs.writeFile(path.join(dir, 'Cargo.toml'), '[package]\nname = "demo"\nversion = "0.1.0"\n');
  return dir;
}

/** Run `fn` and return the CargoMcpError it throws. */
export function thrown(fn: () => unknown): CargoMcpError {
  try {
    fn();
  } catch (err) {
    if (err instanceof CargoMcpError) return err;
    throw err;
  }
  throw new Error('expected a CargoMcpError to be thrown');
}
