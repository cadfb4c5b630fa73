/**
 * MARKET — WebSocket stream
 * =========================
 *
 * GET /ws/stream pushes one StreamFrame per tick. Delivery is best-effort:
 * frames are skipped while the socket is backed up, and a closed or
 * failing socket ends only its own subscription.
 */

import type { FastifyInstance } from 'fastify';
import { WebSocket } from 'ws';
import type { StreamFrame } from '../contracts/market.types.js';
import type { MarketModuleDeps } from '../market.runtime.js';
import type { SnapshotSink } from '../services/snapshot.distributor.js';
import { projectStreamFrame } from '../services/snapshot.builder.js';

/** The part of a ws WebSocket the sink uses */
export interface SocketLike {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

export interface SocketSinkOptions {
  maxBufferedBytes: number;
}

export function createSocketSink(
  socket: SocketLike,
  options: SocketSinkOptions
): SnapshotSink<StreamFrame> {
  return {
    send: (frame) =>
      new Promise<void>((resolve, reject) => {
        if (socket.readyState !== WebSocket.OPEN) {
          reject(new Error('WebSocket is not open'));
          return;
        }
        if (socket.bufferedAmount > options.maxBufferedBytes) {
          // slow consumer: skip this frame, the next one carries the latest state
          resolve();
          return;
        }
        socket.send(JSON.stringify(frame), (err) => (err ? reject(err) : resolve()));
      }),
    close: (reason) => {
      if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
        socket.close(1001, reason);
      }
    },
  };
}

export async function registerStreamRoutes(
  app: FastifyInstance,
  deps: MarketModuleDeps
): Promise<void> {
  const { distributor, streamOptions } = deps;

  app.get('/ws/stream', { websocket: true }, (socket, req) => {
    const subscription = distributor.subscribe(
      createSocketSink(socket, { maxBufferedBytes: streamOptions.maxBufferedBytes }),
      projectStreamFrame,
      { mode: streamOptions.mode, intervalMs: streamOptions.intervalMs }
    );

    req.log.info({ id: subscription.id }, 'WebSocket client connected');

    socket.on('close', () => {
      subscription.unsubscribe();
      req.log.info({ id: subscription.id }, 'WebSocket client disconnected');
    });
    socket.on('error', (err) => {
      req.log.warn({ id: subscription.id, err: err.message }, 'WebSocket error');
      subscription.unsubscribe();
    });
  });

  app.log.info('Stream route registered at /ws/stream');
}
