/**
 * Relay error taxonomy
 */
import type { MediaKind } from './index.js';

export type RelayErrorCode =
  | 'SETUP_FAILED'
  | 'NEGOTIATION_FAILED'
  | 'UNKNOWN_MESSAGE_TYPE'
  | 'MESSAGE_DECODE_FAILED'
  | 'TRANSPORT_READ_FAILED'
  | 'PACKET_DECODE_FAILED'
  | 'SAMPLE_WRITE_FAILED';

/**
 * Base class for every error the relay raises on purpose
 */
export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Peer connection or track construction failed. No session is created.
 */
export class SetupError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SETUP_FAILED', message, options);
  }
}

/**
 * An offer/answer or candidate step failed.
 * `recoverable` is false once the local description may be half-applied.
 */
export class NegotiationError extends RelayError {
  readonly recoverable: boolean;

  constructor(message: string, options?: { cause?: unknown; recoverable?: boolean }) {
    super('NEGOTIATION_FAILED', message, options);
    this.recoverable = options?.recoverable ?? true;
  }
}

export class UnknownMessageTypeError extends RelayError {
  readonly messageType: string;

  constructor(messageType: string) {
    super('UNKNOWN_MESSAGE_TYPE', `Unknown message type: ${messageType}`);
    this.messageType = messageType;
  }
}

export class MessageDecodeError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MESSAGE_DECODE_FAILED', message, options);
  }
}

/**
 * Socket failure while reading datagrams. A read timeout is not one.
 */
export class TransportReadError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT_READ_FAILED', message, options);
  }
}

export class PacketDecodeError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PACKET_DECODE_FAILED', message, options);
  }
}

export class SampleWriteError extends RelayError {
  readonly kind: MediaKind;

  constructor(kind: MediaKind, message: string, options?: { cause?: unknown }) {
    super('SAMPLE_WRITE_FAILED', message, options);
    this.kind = kind;
  }
}

/**
 * Readable message for anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
