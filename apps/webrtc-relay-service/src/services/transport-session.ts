/**
 * Contract between the session layer and the WebRTC stack.
 * Encryption, ICE connectivity and congestion control stay behind it.
 */
import { MediaKind, MediaSample } from '../types/index.js';
import { IceCandidateInit, SessionDescription } from '../types/protocol.js';

/**
 * Outgoing track that accepts whole media samples
 */
export interface OutgoingTrack {
  readonly kind: MediaKind;
  /**
   * @throws SampleWriteError
   */
  writeSample(sample: MediaSample): void;
}

/**
 * Callbacks the transport session raises outside the signaling path
 */
export interface TransportSessionHandler {
  /** A local candidate was gathered. End-of-candidates is not reported. */
  onLocalCandidate(candidate: IceCandidateInit): void;
  onConnectionStateChange(state: string): void;
}

export interface TransportSession {
  /** Register an outgoing track. Must happen before negotiation. */
  addSampleTrack(kind: MediaKind): OutgoingTrack;
  setHandler(handler: TransportSessionHandler): void;
  setRemoteDescription(description: SessionDescription): Promise<void>;
  createAnswer(): Promise<SessionDescription>;
  setLocalDescription(description: SessionDescription): Promise<void>;
  /** Resolves once local ICE gathering has completed; rejects if closed first */
  waitForGatheringComplete(): Promise<void>;
  readonly localDescription: SessionDescription | null;
  addIceCandidate(candidate: IceCandidateInit): Promise<void>;
  close(): Promise<void>;
}

export interface TransportSessionOptions {
  /** The only ICE server the session uses */
  iceServerUrl: string;
}

export type TransportSessionFactory = (options: TransportSessionOptions) => TransportSession;
