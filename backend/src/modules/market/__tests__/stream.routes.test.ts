/**
 * WebSocket sink tests
 */

import { describe, it, expect } from 'vitest';
import { WebSocket } from 'ws';
import { createSocketSink } from '../routes/stream.routes.js';
import type { SocketLike } from '../routes/stream.routes.js';
import { projectStreamFrame } from '../services/snapshot.builder.js';
import { MarketState } from '../services/market.state.js';
import { FIXED_CLOCK, PARAMS, POSITIONS, mockLogger } from './fixtures.js';

class FakeSocket implements SocketLike {
  readyState: number = WebSocket.OPEN;
  bufferedAmount = 0;
  sendError: Error | undefined;
  readonly sent: string[] = [];
  readonly closes: [number | undefined, string | undefined][] = [];

  send(data: string, cb?: (err?: Error) => void): void {
    this.sent.push(data);
    cb?.(this.sendError);
  }

  close(code?: number, reason?: string): void {
    this.closes.push([code, reason]);
    this.readyState = WebSocket.CLOSED;
  }
}

function frame() {
  const state = new MarketState({ logger: mockLogger(), clock: FIXED_CLOCK });
  return projectStreamFrame(state.seed(PARAMS, POSITIONS));
}

describe('createSocketSink', () => {
  it('should send frames as JSON', async () => {
    const socket = new FakeSocket();
    const sink = createSocketSink(socket, { maxBufferedBytes: 1024 });
    const f = frame();

    await sink.send(f);

    expect(socket.sent).toHaveLength(1);
    expect(JSON.parse(socket.sent[0])).toMatchObject({
      type: 'snapshot',
      tick: 0,
      timestamp: '2026-01-02T10:00:00.000Z',
      pnlSummary: { positionCount: 2, totalPnl: 0 },
    });
  });

  it('should skip frames while the socket is backed up', async () => {
    const socket = new FakeSocket();
    socket.bufferedAmount = 2048;
    const sink = createSocketSink(socket, { maxBufferedBytes: 1024 });

    await sink.send(frame());

    expect(socket.sent).toEqual([]);
  });

  it('should reject when the socket is not open', async () => {
    const socket = new FakeSocket();
    socket.readyState = WebSocket.CLOSED;
    const sink = createSocketSink(socket, { maxBufferedBytes: 1024 });

    await expect(sink.send(frame())).rejects.toThrow('WebSocket is not open');
  });

  it('should reject when the write fails', async () => {
    const socket = new FakeSocket();
    socket.sendError = new Error('write EPIPE');
    const sink = createSocketSink(socket, { maxBufferedBytes: 1024 });

    await expect(sink.send(frame())).rejects.toThrow('write EPIPE');
  });

  it('should close an open socket once', () => {
    const socket = new FakeSocket();
    const sink = createSocketSink(socket, { maxBufferedBytes: 1024 });

    sink.close?.('delivery failed');
    sink.close?.('unsubscribed');

    expect(socket.closes).toEqual([[1001, 'delivery failed']]);
  });
});
