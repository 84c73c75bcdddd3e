import type { JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { ResponseEncoder } from '../../../src/rpc/encoder.js';
import type { MessageSink } from '../../../src/rpc/encoder.js';
import { CargoMcpError, ErrorKind } from '../../../src/errors.js';
import { MemorySink } from '../../helpers.js';

/** Sink that yields between accepting and finishing each write. */
class SlowSink implements MessageSink {
  readonly messages: JSONRPCMessage[] = [];
  active = 0;
  maxActive = 0;

  async send(message: JSONRPCMessage): Promise<void> {
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise((resolve) => setImmediate(resolve));
    this.messages.push(message);
    this.active -= 1;
  }
}

describe('ResponseEncoder', () => {
  it('wraps a result in a JSON-RPC envelope', async () => {
    const sink = new MemorySink();
    await new ResponseEncoder(sink).success(7, { tools: [] });
    expect(sink.messages).toEqual([{ jsonrpc: '2.0', id: 7, result: { tools: [] } }]);
  });

  it('wraps a CargoMcpError with its code and kind', async () => {
    const sink = new MemorySink();
    await new ResponseEncoder(sink).failure('req-1', new CargoMcpError(ErrorKind.ValidationError, 'bad arguments'));
    expect(sink.messages).toEqual([
      { jsonrpc: '2.0', id: 'req-1', error: { code: -32002, kind: 'ValidationError', message: 'bad arguments' } },
    ]);
  });

  it('reports unexpected errors as Internal', async () => {
    const sink = new MemorySink();
    await new ResponseEncoder(sink).failure(3, new TypeError('boom'));
    expect(sink.messages).toEqual([{ jsonrpc: '2.0', id: 3, error: { code: -32603, kind: 'Internal', message: 'boom' } }]);
  });

  it('never has more than one write in flight', async () => {
    const sink = new SlowSink();
    const encoder = new ResponseEncoder(sink);
    await Promise.all([encoder.success(1, {}), encoder.success(2, {}), encoder.failure(3, new Error('x'))]);
    expect(sink.maxActive).toBe(1);
    expect(sink.messages.map((m) => ('id' in m ? m.id : undefined))).toEqual([1, 2, 3]);
  });

  it('keeps writing after a failed send', async () => {
    const written: JSONRPCMessage[] = [];
    let calls = 0;
    const encoder = new ResponseEncoder({
      send: async (message) => {
        calls += 1;
        if (calls === 1) throw new Error('stream closed');
        written.push(message);
      },
    });
    await expect(encoder.success(1, {})).rejects.toThrow('stream closed');
    await encoder.success(2, {});
    expect(written).toEqual([{ jsonrpc: '2.0', id: 2, result: {} }]);
  });
});
