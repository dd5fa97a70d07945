import type WebSocket from 'ws';
import { TransportDisconnect } from '../errors';
import { log } from '../log';
import { incInboundAudioFramesDropped } from '../metrics';
import { AsyncQueue } from '../streams/asyncQueue';

export const WS_OPEN = 1;

/** The slice of a `ws` WebSocket the transports use. */
export interface DuplexSocket {
  readonly readyState: number;
  send(data: string | Buffer, options: { binary: boolean }, cb?: (error?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  on(event: 'message', listener: (data: WebSocket.RawData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type WsFrame = { data: Buffer; isBinary: boolean };

export type WsMessageQueueOptions = {
  maxBacklog?: number;
  logContext?: Record<string, unknown>;
};

// 1005 is reported when the peer sent a close frame without a status code.
const CLEAN_CLOSE_CODES = new Set([1000, 1001, 1005]);

export function rawDataToBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * Turns `ws` callbacks into an async iterator of frames. A clean close ends the iterator;
 * an abnormal close or a socket error rejects it with TransportDisconnect.
 */
export class WsMessageQueue implements AsyncIterable<WsFrame> {
  private readonly queue = new AsyncQueue<WsFrame>();
  private readonly maxBacklog: number;
  private readonly logContext: Record<string, unknown>;
  private dropped = 0;

  constructor(socket: DuplexSocket, options: WsMessageQueueOptions = {}) {
    this.maxBacklog = options.maxBacklog ?? 500;
    this.logContext = options.logContext ?? {};

    socket.on('message', (data, isBinary) => {
      if (this.queue.length >= this.maxBacklog) {
        this.dropped += 1;
        incInboundAudioFramesDropped('backlog_full');
        if (this.dropped === 1 || this.dropped % 100 === 0) {
          log.warn(
            { event: 'ws_backlog_full', dropped: this.dropped, backlog: this.queue.length, ...this.logContext },
            'inbound backlog full, dropping frame',
          );
        }
        return;
      }
      this.queue.push({ data: rawDataToBuffer(data), isBinary });
    });

    socket.on('close', (code, reason) => {
      const reasonText = reason.toString('utf8');
      if (CLEAN_CLOSE_CODES.has(code)) {
        this.queue.end();
      } else {
        this.queue.end(new TransportDisconnect(`transport closed code=${code} reason=${reasonText}`, code));
      }
    });

    socket.on('error', (error) => {
      log.warn({ err: error, event: 'ws_error', ...this.logContext }, 'transport socket error');
      this.queue.end(new TransportDisconnect(`transport error: ${error.message}`));
    });
  }

  public next(): Promise<IteratorResult<WsFrame>> {
    return this.queue.next();
  }

  public end(): void {
    this.queue.end();
  }

  public [Symbol.asyncIterator](): AsyncIterator<WsFrame> {
    return this.queue[Symbol.asyncIterator]();
  }
}
