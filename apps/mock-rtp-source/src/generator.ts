/**
 * Synthetic VP8 / Opus packet streams
 * Frames carry a recognisable byte pattern, not decodable media.
 */

export type RandomSource = () => number;

export interface SyntheticPacket {
  sequenceNumber: number;
  timestamp: number;
  payloadType: number;
  marker: boolean;
  ssrc: number;
  payload: Buffer;
}

export interface StreamProfile {
  name: string;
  payloadType: number;
  clockRate: number;
  frameIntervalMs: number;
  packetsPerFrame: number;
  /** Payload bytes per packet, excluding any payload descriptor */
  bytesPerPacket: number;
  ssrc: number;
  /** VP8 only: every Nth frame is a keyframe */
  keyframeInterval?: number;
}

export const VIDEO_PROFILE: StreamProfile = {
  name: 'video',
  payloadType: 96,
  clockRate: 90000,
  frameIntervalMs: 1000 / 30,
  packetsPerFrame: 3,
  bytesPerPacket: 400,
  ssrc: 0x11111111,
  keyframeInterval: 30,
};

export const AUDIO_PROFILE: StreamProfile = {
  name: 'audio',
  payloadType: 111,
  clockRate: 48000,
  frameIntervalMs: 20,
  packetsPerFrame: 1,
  bytesPerPacket: 80,
  ssrc: 0x22222222,
};

const VP8_START_OF_PARTITION = 0x10;

export class SyntheticStream {
  private sequenceNumber: number;
  private timestamp: number;
  private frameIndex = 0;
  private nextFrameDueMs = 0;

  constructor(
    readonly profile: StreamProfile,
    initialSequenceNumber: number = 0,
    initialTimestamp: number = 0
  ) {
    this.sequenceNumber = initialSequenceNumber & 0xffff;
    this.timestamp = initialTimestamp >>> 0;
  }

  get framesGenerated(): number {
    return this.frameIndex;
  }

  /**
   * Every frame whose send time has passed by `elapsedMs`, in order
   */
  framesDue(elapsedMs: number): SyntheticPacket[][] {
    const frames: SyntheticPacket[][] = [];
    while (this.nextFrameDueMs <= elapsedMs) {
      frames.push(this.nextFrame());
      this.nextFrameDueMs += this.profile.frameIntervalMs;
    }
    return frames;
  }

  /**
   * Packets of the next frame; all share one timestamp, marker on the last
   */
  nextFrame(): SyntheticPacket[] {
    const { profile } = this;
    const packets: SyntheticPacket[] = [];
    const fill = this.frameIndex & 0xff;

    for (let i = 0; i < profile.packetsPerFrame; i++) {
      const body = Buffer.alloc(profile.bytesPerPacket, fill);
      packets.push({
        sequenceNumber: this.sequenceNumber,
        timestamp: this.timestamp,
        payloadType: profile.payloadType,
        marker: i === profile.packetsPerFrame - 1,
        ssrc: profile.ssrc,
        payload: profile.keyframeInterval === undefined ? body : this.vp8Payload(body, i === 0),
      });
      this.sequenceNumber = (this.sequenceNumber + 1) & 0xffff;
    }

    this.frameIndex++;
    const ticks = Math.round((profile.frameIntervalMs * profile.clockRate) / 1000);
    this.timestamp = (this.timestamp + ticks) >>> 0;
    return packets;
  }

  private vp8Payload(body: Buffer, first: boolean): Buffer {
    if (!first) {
      return Buffer.concat([Buffer.from([0x00]), body]);
    }
    // Bit 0 of the frame tag clear marks a keyframe
    const interval = this.profile.keyframeInterval ?? 1;
    const keyframe = this.frameIndex % interval === 0;
    const frame = Buffer.from(body);
    frame[0] = keyframe ? 0x00 : 0x01;
    return Buffer.concat([Buffer.from([VP8_START_OF_PARTITION]), frame]);
  }
}

export interface ImpairmentOptions {
  /** Chance that a packet swaps places with the one after it */
  reorderProbability: number;
  /** Chance that a packet is not sent */
  dropProbability: number;
  random?: RandomSource;
}

export interface ImpairmentResult {
  packets: SyntheticPacket[];
  dropped: number;
  reordered: number;
}

/**
 * Drop and reorder packets to imitate a lossy network path
 */
export function impair(packets: SyntheticPacket[], options: ImpairmentOptions): ImpairmentResult {
  const random = options.random ?? Math.random;
  const kept: SyntheticPacket[] = [];
  let dropped = 0;

  for (const packet of packets) {
    if (random() < options.dropProbability) {
      dropped++;
    } else {
      kept.push(packet);
    }
  }

  let reordered = 0;
  for (let i = 0; i + 1 < kept.length; i++) {
    if (random() < options.reorderProbability) {
      const current = kept[i];
      const next = kept[i + 1];
      if (current && next) {
        kept[i] = next;
        kept[i + 1] = current;
        reordered++;
        i++;
      }
    }
  }

  return { packets: kept, dropped, reordered };
}
