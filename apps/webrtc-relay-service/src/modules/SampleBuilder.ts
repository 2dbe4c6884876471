/**
 * SampleBuilder
 * Reorders RTP packets inside a bounded window and reassembles them into
 * media samples, one instance per media kind.
 */
import { MediaSample, SampleBuilderStats, TransportPacket } from '../types/index.js';
import { PacketDecodeError } from '../types/errors.js';
import { ModuleLogger } from '../utils/logger.js';
import { Depacketizer } from './Depacketizer.js';
import { nextSequence, sequenceDistance, timestampDelta } from './RtpPacket.js';

const logger = new ModuleLogger('SampleBuilder');

export const DEFAULT_REASSEMBLY_WINDOW = 10;

/**
 * SampleBuilder configuration
 */
export interface SampleBuilderConfig {
  /** Codec payload format */
  depacketizer: Depacketizer;
  /** RTP clock rate in Hz */
  clockRate: number;
  /** Window capacity in packets (default: 10) */
  maxLate?: number;
  /** Label used in log lines */
  label?: string;
}

/**
 * Samples are emitted in sequence order. A sample is ready once all of its
 * packets and the first packet of the following sample are buffered, since
 * the duration comes from the timestamp delta between the two. The window
 * never spans more than `maxLate` sequence numbers: past that, the head
 * frame is emitted or dropped and missing packets are skipped instead of
 * waited for.
 */
export class SampleBuilder {
  private readonly depacketizer: Depacketizer;
  private readonly clockRate: number;
  private readonly maxLate: number;
  private readonly label: string;

  private packets = new Map<number, TransportPacket>();
  private head: number | null = null;
  private newest: number | null = null;
  private ssrc: number | null = null;
  private ready: MediaSample[] = [];
  private droppedSinceLastSample = 0;

  private stats = {
    samplesEmitted: 0,
    packetsDropped: 0,
    duplicatePackets: 0,
    latePackets: 0,
  };

  constructor(config: SampleBuilderConfig) {
    if (config.clockRate <= 0) {
      throw new RangeError(`clockRate must be positive, got ${config.clockRate}`);
    }
    const maxLate = config.maxLate ?? DEFAULT_REASSEMBLY_WINDOW;
    if (!Number.isInteger(maxLate) || maxLate < 2) {
      throw new RangeError(`maxLate must be an integer >= 2, got ${maxLate}`);
    }

    this.depacketizer = config.depacketizer;
    this.clockRate = config.clockRate;
    this.maxLate = maxLate;
    this.label = config.label ?? 'media';
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    logger.log(level, `[${this.label}] ${message}`, ...args);
  }

  /**
   * Buffer a packet and assemble every sample it completes
   */
  push(packet: TransportPacket): void {
    // Padding-only packets carry no media
    if (packet.payload.length === 0) {
      return;
    }

    if (this.ssrc !== null && packet.ssrc !== this.ssrc) {
      this.log('info', `SSRC changed ${this.ssrc} -> ${packet.ssrc}, resetting window`);
      this.reset();
    }
    this.ssrc = packet.ssrc;

    const sequenceNumber = packet.sequenceNumber;

    if (this.head === null || this.newest === null) {
      this.head = sequenceNumber;
      this.newest = sequenceNumber;
    } else {
      if (sequenceDistance(this.head, sequenceNumber) < 0) {
        this.stats.latePackets++;
        this.log('debug', `Dropping late packet ${sequenceNumber} (head ${this.head})`);
        return;
      }
      if (this.packets.has(sequenceNumber)) {
        this.stats.duplicatePackets++;
        return;
      }
      if (sequenceDistance(this.newest, sequenceNumber) > 0) {
        this.newest = sequenceNumber;
      }
    }

    this.packets.set(sequenceNumber, packet);
    this.build();
  }

  /**
   * Next ready sample, or null when none is ready
   */
  pop(): MediaSample | null {
    return this.ready.shift() ?? null;
  }

  /**
   * Drop all buffered state
   */
  reset(): void {
    this.packets.clear();
    this.ready = [];
    this.head = null;
    this.newest = null;
    this.ssrc = null;
    this.droppedSinceLastSample = 0;
  }

  getStats(): SampleBuilderStats {
    return {
      ...this.stats,
      pendingPackets: this.packets.size,
    };
  }

  private build(): void {
    for (;;) {
      if (this.buildSample()) {
        continue;
      }
      if (!this.isOverflowing()) {
        return;
      }
      this.forceHead();
    }
  }

  /**
   * Try to consume one sample at the head of the window
   * @returns true if the head moved
   */
  private buildSample(): boolean {
    if (this.head === null) {
      return false;
    }

    const first = this.packets.get(this.head);
    if (!first) {
      return false;
    }

    // Frame start was lost: this packet can never be rendered
    if (!this.depacketizer.isPartitionHead(first.payload)) {
      this.dropPacket(this.head);
      this.head = nextSequence(this.head);
      return true;
    }

    const run: TransportPacket[] = [];
    let sequenceNumber = this.head;
    for (;;) {
      const packet = this.packets.get(sequenceNumber);
      if (!packet) {
        return false;
      }
      if (packet.timestamp !== first.timestamp) {
        this.emitSample(run, packet.timestamp);
        this.head = sequenceNumber;
        return true;
      }
      run.push(packet);
      sequenceNumber = nextSequence(sequenceNumber);
    }
  }

  /**
   * True when the window spans more sequence numbers than it may hold
   */
  private isOverflowing(): boolean {
    if (this.head === null || this.newest === null) {
      return false;
    }
    return sequenceDistance(this.head, this.newest) + 1 > this.maxLate;
  }

  /**
   * Force a decision on the frame at the head of an overfull window.
   *
   * The head run ends at a hole or at the newest packet. A complete frame
   * followed by a hole is emitted with its duration stretched over the
   * hole; anything else is dropped, including a frame longer than the
   * window. Missing sequence numbers after the run are skipped.
   */
  private forceHead(): void {
    if (this.head === null || this.newest === null) {
      return;
    }
    const end = nextSequence(this.newest);

    const run: TransportPacket[] = [];
    let cursor = this.head;
    for (let packet = this.packets.get(cursor); packet; packet = this.packets.get(cursor)) {
      if (run.length > 0 && packet.timestamp !== run[0].timestamp) {
        break;
      }
      run.push(packet);
      cursor = nextSequence(cursor);
    }

    let resume = cursor;
    let skipped = 0;
    while (!this.packets.has(resume) && resume !== end) {
      skipped++;
      resume = nextSequence(resume);
    }

    const next = this.packets.get(resume);
    if (next && this.isCompleteFrame(run)) {
      this.emitSample(run, next.timestamp);
    } else if (run.length > 0) {
      this.log('debug', `Window overflow: dropping ${run.length} packet(s) of frame at ${this.head}`);
      for (const packet of run) {
        this.dropPacket(packet.sequenceNumber);
      }
    }

    if (skipped > 0) {
      this.log('debug', `Window overflow: skipping ${skipped} missing packet(s) from ${cursor}`);
      this.droppedSinceLastSample += skipped;
      this.stats.packetsDropped += skipped;
    }
    this.head = resume;
  }

  private isCompleteFrame(run: TransportPacket[]): boolean {
    if (run.length === 0) {
      return false;
    }
    const first = run[0];
    const last = run[run.length - 1];
    return (
      run.every(packet => packet.timestamp === first.timestamp) &&
      this.depacketizer.isPartitionHead(first.payload) &&
      this.depacketizer.isPartitionTail(last.marker, last.payload)
    );
  }

  private emitSample(run: TransportPacket[], nextTimestamp: number): void {
    for (const packet of run) {
      this.packets.delete(packet.sequenceNumber);
    }

    const first = run[0];
    let data: Buffer;
    try {
      data = Buffer.concat(run.map(packet => this.depacketizer.unmarshal(packet.payload)));
    } catch (error) {
      if (!(error instanceof PacketDecodeError)) {
        throw error;
      }
      this.log('debug', `Dropping undecodable sample at ${first.sequenceNumber}: ${error.message}`);
      this.droppedSinceLastSample += run.length;
      this.stats.packetsDropped += run.length;
      return;
    }

    const sample: MediaSample = {
      data,
      packetTimestamp: first.timestamp,
      durationMs: (timestampDelta(first.timestamp, nextTimestamp) * 1000) / this.clockRate,
      prevDroppedPackets: this.droppedSinceLastSample,
    };
    if (this.depacketizer.isKeyframe) {
      sample.isKeyframe = this.depacketizer.isKeyframe(data);
    }

    this.ready.push(sample);
    this.droppedSinceLastSample = 0;
    this.stats.samplesEmitted++;
  }

  private dropPacket(sequenceNumber: number): void {
    if (this.packets.delete(sequenceNumber)) {
      this.droppedSinceLastSample++;
      this.stats.packetsDropped++;
    }
  }
}
