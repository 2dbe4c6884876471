/**
 * WebSocket signaling protocol shared with the browser client.
 * Every message is a JSON text frame with a mandatory `type` field.
 */
import { MessageDecodeError, UnknownMessageTypeError } from './errors.js';

/**
 * Session description exchanged during offer/answer
 */
export interface SessionDescription {
  type: 'offer' | 'answer';
  sdp: string;
}

/**
 * ICE candidate as serialized by RTCIceCandidate.toJSON()
 */
export interface IceCandidateInit {
  candidate: string;
  sdpMid?: string | null;
  sdpMLineIndex?: number | null;
  usernameFragment?: string | null;
}

export interface OfferMessage {
  type: 'offer';
  /** Absent or malformed descriptions are rejected during negotiation */
  sdp: SessionDescription | null;
}

export interface AnswerMessage {
  type: 'answer';
  sdp: SessionDescription;
}

export interface IceMessage {
  type: 'ice';
  /** null marks end-of-candidates */
  ice: IceCandidateInit | null;
}

export interface ErrorMessage {
  type: 'error';
  error: string;
}

export type SignalingMessage = OfferMessage | AnswerMessage | IceMessage | ErrorMessage;

export type SignalingMessageType = SignalingMessage['type'];

export const SIGNALING_MESSAGE_TYPES: readonly SignalingMessageType[] = ['offer', 'answer', 'ice', 'error'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSignalingMessageType(value: string): value is SignalingMessageType {
  return SIGNALING_MESSAGE_TYPES.some(type => type === value);
}

function toSessionDescription(value: unknown): SessionDescription | null {
  if (!isRecord(value)) {
    return null;
  }
  const { type, sdp } = value;
  if ((type !== 'offer' && type !== 'answer') || typeof sdp !== 'string') {
    return null;
  }
  return { type, sdp };
}

function toIceCandidate(value: unknown): IceCandidateInit | null {
  if (!isRecord(value) || typeof value.candidate !== 'string') {
    return null;
  }
  const candidate: IceCandidateInit = { candidate: value.candidate };
  if (typeof value.sdpMid === 'string' || value.sdpMid === null) {
    candidate.sdpMid = value.sdpMid;
  }
  if (typeof value.sdpMLineIndex === 'number' || value.sdpMLineIndex === null) {
    candidate.sdpMLineIndex = value.sdpMLineIndex;
  }
  if (typeof value.usernameFragment === 'string' || value.usernameFragment === null) {
    candidate.usernameFragment = value.usernameFragment;
  }
  return candidate;
}

/**
 * Decode one inbound text frame
 * @throws MessageDecodeError when the frame is not a JSON object with a string type
 * @throws UnknownMessageTypeError when the type is not part of the protocol
 */
export function parseSignalingMessage(raw: string): SignalingMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MessageDecodeError('Signaling message is not valid JSON', { cause: error });
  }

  if (!isRecord(parsed) || typeof parsed.type !== 'string') {
    throw new MessageDecodeError('Signaling message must be an object with a string "type"');
  }

  const type = parsed.type;
  if (!isSignalingMessageType(type)) {
    throw new UnknownMessageTypeError(type);
  }

  switch (type) {
    case 'offer':
      return { type, sdp: toSessionDescription(parsed.sdp) };
    case 'answer': {
      const sdp = toSessionDescription(parsed.sdp);
      if (!sdp) {
        throw new MessageDecodeError('answer message requires an "sdp" description');
      }
      return { type, sdp };
    }
    case 'ice': {
      if (parsed.ice === null || parsed.ice === undefined) {
        return { type, ice: null };
      }
      const ice = toIceCandidate(parsed.ice);
      if (!ice) {
        throw new MessageDecodeError('ice message carries a malformed candidate');
      }
      return { type, ice };
    }
    case 'error':
      return { type, error: typeof parsed.error === 'string' ? parsed.error : '' };
  }
}

/**
 * Encode one outbound message as a text frame
 */
export function serializeSignalingMessage(message: SignalingMessage): string {
  return JSON.stringify(message);
}
