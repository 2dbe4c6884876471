/**
 * Media Ingest
 * Reads RTP from a local UDP socket, reassembles it per media kind and
 * writes the resulting samples into the session's outgoing tracks.
 */
import dgram from 'dgram';
import {
  CLOCK_RATES,
  IngestStats,
  MediaKind,
  MediaSample,
  PAYLOAD_TYPES,
  TransportPacket,
} from '../types/index.js';
import { PacketDecodeError, TransportReadError, errorMessage } from '../types/errors.js';
import { OutgoingTrack } from '../services/transport-session.js';
import { ModuleLogger } from '../utils/logger.js';
import { OpusDepacketizer, VP8Depacketizer } from './Depacketizer.js';
import { parseRtpPacket } from './RtpPacket.js';
import { DEFAULT_REASSEMBLY_WINDOW, SampleBuilder } from './SampleBuilder.js';

const logger = new ModuleLogger('MediaIngest');

export const DEFAULT_READ_TIMEOUT_MS = 100;

/** Datagrams buffered between reads before new ones are discarded */
const MAX_QUEUED_DATAGRAMS = 4096;

/**
 * UDP socket surface used by the ingest loop (satisfied by dgram.Socket)
 */
export interface DatagramSocket {
  bind(port: number, address: string, callback: () => void): unknown;
  address(): { address: string; port: number };
  close(): unknown;
  on(event: 'message', listener: (message: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  removeListener(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * MediaIngest configuration
 */
export interface MediaIngestConfig {
  /** Local address to bind */
  host: string;
  /** Local port to bind (0 = ephemeral) */
  port: number;
  /** Outgoing tracks by media kind */
  tracks: Record<MediaKind, OutgoingTrack>;
  /** Bounded wait per read, in ms (default: 100) */
  readTimeoutMs?: number;
  /** Reassembly window in packets (default: 10) */
  reassemblyWindow?: number;
  /** Socket factory (default: dgram udp4) */
  createSocket?: () => DatagramSocket;
  /** Label used in log lines */
  label?: string;
}

type QueueEntry = { datagram: Buffer } | { error: Error };

/**
 * Turns socket events into reads with a bounded wait
 */
class DatagramReader {
  private entries: QueueEntry[] = [];
  private waiter: ((entry: QueueEntry | null) => void) | null = null;
  overflowed = 0;

  constructor(socket: DatagramSocket) {
    socket.on('message', (datagram) => this.enqueue({ datagram }));
    socket.on('error', (error) => this.enqueue({ error }));
  }

  /**
   * Next datagram, or null when the timeout elapses or the read is cancelled
   * @throws TransportReadError when the socket reported an error
   */
  async read(timeoutMs: number): Promise<Buffer | null> {
    const entry = this.entries.shift() ?? (await this.waitForEntry(timeoutMs));
    if (!entry) {
      return null;
    }
    if ('error' in entry) {
      throw new TransportReadError(`UDP read failed: ${entry.error.message}`, { cause: entry.error });
    }
    return entry.datagram;
  }

  /**
   * Wake a pending read with no data
   */
  cancel(): void {
    this.waiter?.(null);
  }

  private waitForEntry(timeoutMs: number): Promise<QueueEntry | null> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);

      this.waiter = (entry) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(entry);
      };
    });
  }

  private enqueue(entry: QueueEntry): void {
    if (this.waiter) {
      this.waiter(entry);
      return;
    }
    if (this.entries.length >= MAX_QUEUED_DATAGRAMS) {
      this.overflowed++;
      return;
    }
    this.entries.push(entry);
  }
}

/**
 * Media ingest loop for one session
 */
export class MediaIngest {
  private readonly config: MediaIngestConfig;
  private readonly readTimeoutMs: number;
  private readonly builders: Record<MediaKind, SampleBuilder>;
  private readonly kindsByPayloadType: Map<number, MediaKind>;

  private socket: DatagramSocket | null = null;
  private socketClosed = false;
  private started = false;
  private isRunning = false;
  private localAddress: { address: string; port: number } | null = null;

  private stats: Omit<IngestStats, 'isRunning' | 'localAddress' | 'localPort' | 'reassembly'> = {
    packetsReceived: 0,
    packetsDecodeFailed: 0,
    packetsUnknownPayloadType: 0,
    readErrors: 0,
    writeErrors: 0,
    samplesWritten: { video: 0, audio: 0 },
  };

  constructor(config: MediaIngestConfig) {
    this.config = config;
    this.readTimeoutMs = config.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;

    const maxLate = config.reassemblyWindow ?? DEFAULT_REASSEMBLY_WINDOW;
    const label = config.label ?? 'ingest';
    this.builders = {
      video: new SampleBuilder({
        depacketizer: new VP8Depacketizer(),
        clockRate: CLOCK_RATES.video,
        maxLate,
        label: `${label}/video`,
      }),
      audio: new SampleBuilder({
        depacketizer: new OpusDepacketizer(),
        clockRate: CLOCK_RATES.audio,
        maxLate,
        label: `${label}/audio`,
      }),
    };

    this.kindsByPayloadType = new Map<number, MediaKind>([
      [PAYLOAD_TYPES.video, 'video'],
      [PAYLOAD_TYPES.audio, 'audio'],
    ]);
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    logger.log(level, `[${this.config.label ?? 'ingest'}] ${message}`, ...args);
  }

  /**
   * Bind the socket and pump datagrams until `signal` aborts.
   * Never rejects: a bind failure is logged and ends the loop.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (signal.aborted || this.started) {
      return;
    }
    this.started = true;

    let reader: DatagramReader;
    try {
      reader = await this.open();
    } catch (error) {
      this.log('error', `Failed to listen on UDP ${this.config.host}:${this.config.port}: ${errorMessage(error)}`);
      this.close();
      return;
    }

    const onAbort = () => reader.cancel();
    signal.addEventListener('abort', onAbort, { once: true });
    this.isRunning = true;
    this.log('info', `📡 Receiving RTP on ${this.localAddress?.address}:${this.localAddress?.port}`);

    try {
      while (!signal.aborted) {
        let datagram: Buffer | null;
        try {
          datagram = await reader.read(this.readTimeoutMs);
        } catch (error) {
          this.stats.readErrors++;
          this.log('warn', 'Error during read:', error);
          continue;
        }

        if (!datagram) {
          continue;
        }
        try {
          this.processDatagram(datagram);
        } catch (error) {
          this.log('error', 'Unexpected error while processing datagram:', error);
        }
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
      this.isRunning = false;
      this.close();
      if (reader.overflowed > 0) {
        this.log('warn', `Discarded ${reader.overflowed} datagram(s) while the read queue was full`);
      }
      this.log('info', 'Media ingest stopped');
    }
  }

  /**
   * Parse, demultiplex, reassemble and forward one datagram
   */
  processDatagram(datagram: Buffer): void {
    this.stats.packetsReceived++;

    let packet: TransportPacket;
    try {
      packet = parseRtpPacket(datagram);
    } catch (error) {
      if (!(error instanceof PacketDecodeError)) {
        throw error;
      }
      this.stats.packetsDecodeFailed++;
      this.log('debug', `Error unmarshaling RTP packet: ${error.message}`);
      return;
    }

    const kind = this.kindsByPayloadType.get(packet.payloadType);
    if (!kind) {
      this.stats.packetsUnknownPayloadType++;
      return;
    }

    const builder = this.builders[kind];
    builder.push(packet);
    for (let sample = builder.pop(); sample; sample = builder.pop()) {
      this.writeSample(kind, sample);
    }
  }

  /**
   * Close the socket. Safe to call repeatedly or before run().
   */
  close(): void {
    if (!this.socket || this.socketClosed) {
      return;
    }
    this.socketClosed = true;
    try {
      this.socket.close();
    } catch (error) {
      this.log('warn', `Error closing UDP socket: ${errorMessage(error)}`);
    }
  }

  getStats(): IngestStats {
    return {
      isRunning: this.isRunning,
      localAddress: this.localAddress?.address ?? null,
      localPort: this.localAddress?.port ?? null,
      packetsReceived: this.stats.packetsReceived,
      packetsDecodeFailed: this.stats.packetsDecodeFailed,
      packetsUnknownPayloadType: this.stats.packetsUnknownPayloadType,
      readErrors: this.stats.readErrors,
      writeErrors: this.stats.writeErrors,
      samplesWritten: { ...this.stats.samplesWritten },
      reassembly: {
        video: this.builders.video.getStats(),
        audio: this.builders.audio.getStats(),
      },
    };
  }

  private writeSample(kind: MediaKind, sample: MediaSample): void {
    try {
      this.config.tracks[kind].writeSample(sample);
      this.stats.samplesWritten[kind]++;
    } catch (error) {
      this.stats.writeErrors++;
      this.log('warn', `Error writing ${kind} sample: ${errorMessage(error)}`);
    }
  }

  private async open(): Promise<DatagramReader> {
    const socket: DatagramSocket = this.config.createSocket
      ? this.config.createSocket()
      : dgram.createSocket('udp4');
    this.socket = socket;
    this.socketClosed = false;

    const reader = new DatagramReader(socket);

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      socket.once('error', onError);
      socket.bind(this.config.port, this.config.host, () => {
        socket.removeListener('error', onError);
        resolve();
      });
    });

    this.localAddress = socket.address();
    return reader;
  }
}
