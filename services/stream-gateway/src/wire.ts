/**
 * WebSocket wire connection
 *
 * Adapts one accepted `ws` socket to the WireConnection port. Inbound text
 * frames are buffered in a lane queue so the router can pull them at its own
 * pace; the socket closing closes that queue, which surfaces to the reader
 * as WireDisconnectedError.
 */

import { randomUUID } from 'crypto';
import WebSocket from 'ws';
import {
  WireConnection,
  OutboundMessage,
  LaneQueue,
  END_OF_LANE,
  WireDisconnectedError,
} from '@streamlens/domain';

export function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf-8');
  }
  return data.toString('utf-8');
}

export class WsWireConnection implements WireConnection {
  readonly connectionId: string;
  private readonly socket: WebSocket;
  private readonly inbox = new LaneQueue<string>('wire-inbox');
  private closeCode = 1000;
  private closeReason = '';

  constructor(socket: WebSocket, connectionId: string = randomUUID()) {
    this.socket = socket;
    this.connectionId = connectionId;

    socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) {
        console.warn(`[Wire] Ignoring binary frame on ${this.connectionId}`);
        return;
      }
      if (!this.inbox.isClosed) {
        this.inbox.put(rawDataToString(data));
      }
    });

    socket.on('close', (code: number, reason: Buffer) => {
      this.closeCode = code;
      this.closeReason = reason.toString();
      this.inbox.close();
    });

    socket.on('error', (error: Error) => {
      console.error(`[Wire] Socket error on ${this.connectionId}:`, error.message);
    });
  }

  async receive(signal?: AbortSignal): Promise<string> {
    const item = await this.inbox.get(signal);
    if (item === END_OF_LANE) {
      throw new WireDisconnectedError(this.closeCode, this.closeReason);
    }
    return item;
  }

  send(message: OutboundMessage): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new WireDisconnectedError(this.closeCode, this.closeReason));
    }

    return new Promise((resolve, reject) => {
      this.socket.send(JSON.stringify(message), (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  close(code: number = 1000, reason: string = ''): void {
    if (
      this.socket.readyState === WebSocket.CLOSING ||
      this.socket.readyState === WebSocket.CLOSED
    ) {
      return;
    }
    this.socket.close(code, reason);
  }
}
