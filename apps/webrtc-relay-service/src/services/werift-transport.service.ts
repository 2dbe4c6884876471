/**
 * TransportSession backed by werift's RTCPeerConnection
 */
import {
  MediaStreamTrack,
  RTCIceCandidate,
  RTCPeerConnection,
  RTCRtpCodecParameters,
  RtpHeader,
  RtpPacket,
} from 'werift';
import { CLOCK_RATES, MediaKind, MediaSample, PAYLOAD_TYPES } from '../types/index.js';
import { IceCandidateInit, SessionDescription } from '../types/protocol.js';
import { SampleWriteError, errorMessage } from '../types/errors.js';
import {
  OpusPayloader,
  SamplePacketizer,
  VP8Payloader,
} from '../modules/SamplePacketizer.js';
import { abortable } from '../utils/abortable.js';
import { ModuleLogger } from '../utils/logger.js';
import {
  OutgoingTrack,
  TransportSession,
  TransportSessionFactory,
  TransportSessionHandler,
  TransportSessionOptions,
} from './transport-session.js';

const logger = new ModuleLogger('WeriftTransport');

/**
 * Outgoing werift track fed with samples instead of RTP
 */
export class WeriftSampleTrack implements OutgoingTrack {
  private readonly packetizer: SamplePacketizer;

  constructor(
    readonly kind: MediaKind,
    private readonly track: MediaStreamTrack
  ) {
    this.packetizer = new SamplePacketizer({
      payloader: kind === 'video' ? new VP8Payloader() : new OpusPayloader(),
      payloadType: PAYLOAD_TYPES[kind],
      clockRate: CLOCK_RATES[kind],
    });
  }

  writeSample(sample: MediaSample): void {
    try {
      for (const packet of this.packetizer.packetize(sample)) {
        const header = new RtpHeader({
          payloadType: packet.payloadType,
          sequenceNumber: packet.sequenceNumber,
          timestamp: packet.timestamp,
          ssrc: packet.ssrc,
          marker: packet.marker,
        });
        this.track.writeRtp(new RtpPacket(header, packet.payload));
      }
    } catch (error) {
      throw new SampleWriteError(this.kind, `Failed to write ${this.kind} sample: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  stop(): void {
    this.track.stop();
  }
}

/**
 * werift peer connection with VP8 and Opus registered at the relay's
 * fixed payload types
 */
export class WeriftTransportSession implements TransportSession {
  private readonly peerConnection: RTCPeerConnection;
  private readonly tracks: WeriftSampleTrack[] = [];
  private handler: TransportSessionHandler | null = null;
  private readonly closed = new AbortController();

  constructor(options: TransportSessionOptions) {
    this.peerConnection = new RTCPeerConnection({
      iceServers: [{ urls: options.iceServerUrl }],
      codecs: {
        video: [
          new RTCRtpCodecParameters({
            mimeType: 'video/VP8',
            clockRate: CLOCK_RATES.video,
            payloadType: PAYLOAD_TYPES.video,
            rtcpFeedback: [
              { type: 'ccm', parameter: 'fir' },
              { type: 'nack' },
              { type: 'nack', parameter: 'pli' },
              { type: 'goog-remb' },
            ],
          }),
        ],
        audio: [
          new RTCRtpCodecParameters({
            mimeType: 'audio/opus',
            clockRate: CLOCK_RATES.audio,
            payloadType: PAYLOAD_TYPES.audio,
            channels: 2,
          }),
        ],
      },
    });

    this.peerConnection.onIceCandidate.subscribe((candidate?: RTCIceCandidate) => {
      if (!candidate || !this.handler) {
        return;
      }
      this.handler.onLocalCandidate({
        candidate: candidate.candidate,
        sdpMid: candidate.sdpMid ?? null,
        sdpMLineIndex: candidate.sdpMLineIndex ?? null,
      });
    });

    this.peerConnection.iceConnectionStateChange.subscribe((state) => {
      this.handler?.onConnectionStateChange(String(state));
    });
  }

  addSampleTrack(kind: MediaKind): OutgoingTrack {
    const track = new MediaStreamTrack({ kind });
    this.peerConnection.addTrack(track);
    const sampleTrack = new WeriftSampleTrack(kind, track);
    this.tracks.push(sampleTrack);
    return sampleTrack;
  }

  setHandler(handler: TransportSessionHandler): void {
    this.handler = handler;
  }

  async setRemoteDescription(description: SessionDescription): Promise<void> {
    await this.peerConnection.setRemoteDescription({ type: description.type, sdp: description.sdp });
  }

  async createAnswer(): Promise<SessionDescription> {
    const answer = await this.peerConnection.createAnswer();
    return { type: 'answer', sdp: answer.sdp };
  }

  async setLocalDescription(description: SessionDescription): Promise<void> {
    await this.peerConnection.setLocalDescription({ type: description.type, sdp: description.sdp });
  }

  /**
   * Rejects if the session is closed first: werift drops its gathering
   * listeners on close without settling them.
   */
  async waitForGatheringComplete(): Promise<void> {
    if (this.peerConnection.iceGatheringState === 'complete') {
      return;
    }
    await abortable(
      this.peerConnection.iceGatheringStateChange.watch((state) => state === 'complete'),
      this.closed.signal,
      () => new Error('Peer connection closed before ICE gathering completed')
    );
  }

  get localDescription(): SessionDescription | null {
    const description = this.peerConnection.localDescription;
    if (!description) {
      return null;
    }
    return { type: description.type === 'offer' ? 'offer' : 'answer', sdp: description.sdp };
  }

  async addIceCandidate(candidate: IceCandidateInit): Promise<void> {
    await this.peerConnection.addIceCandidate(
      new RTCIceCandidate({
        candidate: candidate.candidate,
        sdpMid: candidate.sdpMid ?? undefined,
        sdpMLineIndex: candidate.sdpMLineIndex ?? undefined,
      })
    );
  }

  async close(): Promise<void> {
    this.closed.abort();
    for (const track of this.tracks) {
      track.stop();
    }
    this.handler = null;
    await this.peerConnection.close();
    logger.log('debug', 'Peer connection closed');
  }
}

export const createWeriftTransportSession: TransportSessionFactory = (options) =>
  new WeriftTransportSession(options);
