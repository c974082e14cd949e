import { OutboundMessage } from '../types/messages.js';

/**
 * One long-lived full-duplex client connection carrying JSON text messages
 *
 * Production: `ws` WebSocket accepted by the stream gateway
 */
export interface WireConnection {
  /** Connection identity assigned at accept time (not the transport object) */
  readonly connectionId: string;

  /**
   * Receive the next text message.
   * Rejects with WireDisconnectedError once the remote side is gone,
   * or with AbortError when the signal fires.
   */
  receive(signal?: AbortSignal): Promise<string>;

  /**
   * Send one JSON message. Rejects with WireDisconnectedError when closed.
   */
  send(message: OutboundMessage): Promise<void>;

  /**
   * Close the connection. Idempotent.
   */
  close(code?: number, reason?: string): void;
}
