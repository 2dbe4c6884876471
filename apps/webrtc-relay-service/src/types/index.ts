/**
 * Core type definitions for the WebRTC relay service
 */

/**
 * Media kinds the relay forwards
 */
export type MediaKind = 'video' | 'audio';

/**
 * RTP payload type identifiers accepted on the ingest socket.
 * Fixed, not negotiated with the browser.
 */
export const PAYLOAD_TYPES = {
  video: 96,
  audio: 111,
} as const satisfies Record<MediaKind, number>;

/**
 * RTP clock rates used to convert timestamp deltas into durations
 */
export const CLOCK_RATES = {
  video: 90000,
  audio: 48000,
} as const satisfies Record<MediaKind, number>;

/**
 * Parsed RTP packet received on the ingest socket
 */
export interface TransportPacket {
  /** 16-bit sequence number */
  sequenceNumber: number;
  /** 32-bit media timestamp in clock-rate units */
  timestamp: number;
  /** 7-bit payload type identifier */
  payloadType: number;
  marker: boolean;
  ssrc: number;
  /** Codec payload with CSRCs, extension and padding removed */
  payload: Buffer;
}

/**
 * Reassembled, presentable media sample
 */
export interface MediaSample {
  /** Depacketized codec frame */
  data: Buffer;
  /** RTP timestamp of the first packet of the sample */
  packetTimestamp: number;
  /** Presentation duration in milliseconds */
  durationMs: number;
  /** Packets dropped since the previous sample was emitted */
  prevDroppedPackets: number;
  /** Set for video samples that begin with a key frame */
  isKeyframe?: boolean;
}

/**
 * Reassembler counters
 */
export interface SampleBuilderStats {
  samplesEmitted: number;
  packetsDropped: number;
  duplicatePackets: number;
  latePackets: number;
  pendingPackets: number;
}

/**
 * Media ingest counters
 */
export interface IngestStats {
  isRunning: boolean;
  /** Bound address once the socket is listening */
  localAddress: string | null;
  localPort: number | null;
  packetsReceived: number;
  packetsDecodeFailed: number;
  packetsUnknownPayloadType: number;
  readErrors: number;
  writeErrors: number;
  samplesWritten: Record<MediaKind, number>;
  reassembly: Record<MediaKind, SampleBuilderStats>;
}

/**
 * Signaling lifecycle states
 */
export type SignalingState = 'idle' | 'negotiating' | 'established' | 'failed';

/**
 * Session status reported by the API
 */
export interface SessionStatus {
  id: string;
  remoteAddress: string | null;
  signalingState: SignalingState;
  connectionState: string;
  createdAt: Date;
  closed: boolean;
  ingest: IngestStats;
}
