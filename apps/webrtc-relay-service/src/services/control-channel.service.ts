/**
 * Control channel over a WebSocket
 * JSON text frames, one signaling message per frame
 */
import { WebSocket, RawData } from 'ws';
import { SignalingMessage, serializeSignalingMessage } from '../types/protocol.js';
import { SerialQueue } from '../utils/serial-queue.js';

/**
 * Socket surface used by the control channel (satisfied by ws.WebSocket)
 */
export interface ControlSocket {
  readonly readyState: number;
  send(data: string, callback: (error?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * Outbound half of the signaling channel
 */
export interface ControlChannel {
  readonly isOpen: boolean;
  send(message: SignalingMessage): Promise<void>;
  close(code?: number, reason?: string): void;
}

/**
 * Decode a ws frame into text
 */
export function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * Writes go through one queue so the answer path and the candidate
 * callback never interleave frames on the socket.
 */
export class WebSocketControlChannel implements ControlChannel {
  private readonly writeLock = new SerialQueue();

  constructor(private readonly socket: ControlSocket) {}

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(message: SignalingMessage): Promise<void> {
    const text = serializeSignalingMessage(message);
    return this.writeLock.run(() => this.write(text));
  }

  close(code?: number, reason?: string): void {
    if (this.socket.readyState === WebSocket.CLOSING || this.socket.readyState === WebSocket.CLOSED) {
      return;
    }
    this.socket.close(code, reason);
  }

  private write(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.isOpen) {
        reject(new Error('Control channel is not open'));
        return;
      }
      this.socket.send(text, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
