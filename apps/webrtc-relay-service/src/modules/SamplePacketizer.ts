/**
 * Sample Packetizer
 * Splits outgoing media samples back into RTP packets with continuous
 * sequence numbers and timestamps for one outgoing track.
 */
import { randomInt } from 'crypto';
import { MediaSample } from '../types/index.js';

export const DEFAULT_MTU = 1200;

/**
 * Header fields and payload of one outgoing RTP packet
 */
export interface OutgoingRtpPacket {
  payloadType: number;
  sequenceNumber: number;
  timestamp: number;
  ssrc: number;
  marker: boolean;
  payload: Buffer;
}

/**
 * Codec-specific splitting of a frame into RTP payloads
 */
export interface Payloader {
  payload(mtu: number, frame: Buffer): Buffer[];
}

/**
 * VP8 payloader: a one-byte descriptor per packet, S bit on the first
 */
export class VP8Payloader implements Payloader {
  private static readonly DESCRIPTOR_SIZE = 1;

  payload(mtu: number, frame: Buffer): Buffer[] {
    const maxFragmentSize = mtu - VP8Payloader.DESCRIPTOR_SIZE;
    if (frame.length === 0 || maxFragmentSize <= 0) {
      return [];
    }

    const payloads: Buffer[] = [];
    for (let offset = 0; offset < frame.length; offset += maxFragmentSize) {
      const fragment = frame.subarray(offset, offset + maxFragmentSize);
      const descriptor = Buffer.from([offset === 0 ? 0x10 : 0x00]);
      payloads.push(Buffer.concat([descriptor, fragment]));
    }
    return payloads;
  }
}

/**
 * Opus payloader: the whole frame in one packet
 */
export class OpusPayloader implements Payloader {
  payload(_mtu: number, frame: Buffer): Buffer[] {
    return frame.length === 0 ? [] : [frame];
  }
}

/**
 * SamplePacketizer configuration
 */
export interface SamplePacketizerConfig {
  payloader: Payloader;
  payloadType: number;
  clockRate: number;
  /** Maximum RTP payload size (default: 1200) */
  mtu?: number;
  /** Random when omitted */
  ssrc?: number;
  /** Random when omitted */
  initialSequenceNumber?: number;
  /** Random when omitted */
  initialTimestamp?: number;
}

export class SamplePacketizer {
  private readonly payloader: Payloader;
  private readonly payloadType: number;
  private readonly clockRate: number;
  private readonly mtu: number;
  readonly ssrc: number;
  private sequenceNumber: number;
  private timestamp: number;

  constructor(config: SamplePacketizerConfig) {
    this.payloader = config.payloader;
    this.payloadType = config.payloadType;
    this.clockRate = config.clockRate;
    this.mtu = config.mtu ?? DEFAULT_MTU;
    this.ssrc = config.ssrc ?? randomInt(0, 0x100000000);
    this.sequenceNumber = config.initialSequenceNumber ?? randomInt(0, 0x10000);
    this.timestamp = config.initialTimestamp ?? randomInt(0, 0x100000000);
  }

  /**
   * Packetize one sample. The timestamp advances by the sample duration
   * even when the sample yields no packets.
   */
  packetize(sample: MediaSample): OutgoingRtpPacket[] {
    const payloads = this.payloader.payload(this.mtu, sample.data);
    const timestamp = this.timestamp;

    const packets = payloads.map((payload, index): OutgoingRtpPacket => {
      const packet: OutgoingRtpPacket = {
        payloadType: this.payloadType,
        sequenceNumber: this.sequenceNumber,
        timestamp,
        ssrc: this.ssrc,
        marker: index === payloads.length - 1,
        payload,
      };
      this.sequenceNumber = (this.sequenceNumber + 1) & 0xffff;
      return packet;
    });

    const samples = Math.round((sample.durationMs * this.clockRate) / 1000);
    this.timestamp = (this.timestamp + samples) >>> 0;

    return packets;
  }
}
