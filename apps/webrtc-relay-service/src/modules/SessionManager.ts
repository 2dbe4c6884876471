/**
 * Session Manager
 * Owns one browser peer: its transport session, outgoing tracks, control
 * channel, media ingest loop and shutdown signal.
 */
import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { MediaKind, SessionStatus, SignalingState } from '../types/index.js';
import { IceCandidateInit } from '../types/protocol.js';
import {
  MessageDecodeError,
  NegotiationError,
  SetupError,
  UnknownMessageTypeError,
  errorMessage,
} from '../types/errors.js';
import { ControlChannel } from '../services/control-channel.service.js';
import {
  OutgoingTrack,
  TransportSession,
  TransportSessionFactory,
  TransportSessionHandler,
} from '../services/transport-session.js';
import { ModuleLogger } from '../utils/logger.js';
import { DatagramSocket, MediaIngest } from './MediaIngest.js';
import { SignalingStateMachine } from './SignalingStateMachine.js';

const logger = new ModuleLogger('SessionManager');

/**
 * SessionManager configuration
 */
export interface SessionManagerConfig {
  /** Outbound half of the client's WebSocket */
  channel: ControlChannel;
  /** Builds the WebRTC transport session */
  createTransport: TransportSessionFactory;
  /** STUN/TURN server URL */
  iceServerUrl: string;
  ingest: {
    host: string;
    port: number;
    readTimeoutMs?: number;
    reassemblyWindow?: number;
    createSocket?: () => DatagramSocket;
  };
  /** Client address, for status and logs */
  remoteAddress?: string | null;
}

/**
 * SessionManager events
 */
export interface SessionManagerEvents {
  'signaling:state': (state: SignalingState) => void;
  'connection:state': (state: string) => void;
  'closed': () => void;
}

export class SessionManager extends EventEmitter implements TransportSessionHandler {
  readonly id: string;
  private readonly config: SessionManagerConfig;
  private readonly transport: TransportSession;
  private readonly channel: ControlChannel;
  private readonly ingest: MediaIngest;
  private readonly signaling: SignalingStateMachine;
  private readonly shutdown = new AbortController();
  private readonly createdAt = new Date();

  private ingestTask: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  private connectionState = 'new';

  /**
   * Build the transport session and register both outgoing tracks before
   * any negotiation, so the first answer already carries them.
   * @throws SetupError
   */
  static async create(config: SessionManagerConfig): Promise<SessionManager> {
    let transport: TransportSession;
    try {
      transport = config.createTransport({ iceServerUrl: config.iceServerUrl });
    } catch (error) {
      throw new SetupError(`Failed to create peer connection: ${errorMessage(error)}`, { cause: error });
    }

    try {
      const tracks: Record<MediaKind, OutgoingTrack> = {
        video: transport.addSampleTrack('video'),
        audio: transport.addSampleTrack('audio'),
      };
      return new SessionManager(config, transport, tracks);
    } catch (error) {
      try {
        await transport.close();
      } catch (closeError) {
        logger.log('warn', `Error closing peer connection after failed setup: ${errorMessage(closeError)}`);
      }
      throw new SetupError(`Failed to add media tracks: ${errorMessage(error)}`, { cause: error });
    }
  }

  private constructor(
    config: SessionManagerConfig,
    transport: TransportSession,
    tracks: Record<MediaKind, OutgoingTrack>
  ) {
    super();
    this.id = randomUUID();
    this.config = config;
    this.transport = transport;
    this.channel = config.channel;

    this.ingest = new MediaIngest({
      ...config.ingest,
      tracks,
      label: this.shortId,
    });

    this.signaling = new SignalingStateMachine(transport, this.channel, this.shortId);
    this.signaling.on('state:change', (state) => this.emit('signaling:state', state));

    transport.setHandler(this);

    this.log('info', `Session created${config.remoteAddress ? ` for ${config.remoteAddress}` : ''}`);
  }

  private get shortId(): string {
    return this.id.slice(0, 8);
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    logger.log(level, `[${this.shortId}] ${message}`, ...args);
  }

  /**
   * Start the media ingest loop in the background
   */
  startIngest(): void {
    if (this.ingestTask || this.closing) {
      return;
    }
    this.ingestTask = this.ingest.run(this.shutdown.signal);
  }

  /**
   * Handle one inbound control frame. Failures are logged here; a
   * negotiation failure that leaves the peer connection unusable closes the
   * control channel, which tears the session down.
   */
  async handleMessage(raw: string): Promise<void> {
    if (this.closing) {
      return;
    }

    try {
      await this.signaling.handleMessage(raw);
    } catch (error) {
      // Closing rejects a pending gathering wait; nothing left to report
      if (this.closing) {
        this.log('debug', `Signaling message abandoned on close: ${errorMessage(error)}`);
        return;
      }
      if (error instanceof UnknownMessageTypeError) {
        this.log('warn', `Failed to handle signaling message: ${error.message}`);
        return;
      }
      if (error instanceof MessageDecodeError) {
        this.log('warn', `Dropping malformed signaling message: ${error.message}`);
        return;
      }
      if (error instanceof NegotiationError) {
        this.log('error', `Negotiation failed: ${error.message}`);
        if (!error.recoverable) {
          this.channel.close(1011, 'negotiation failed');
        }
        return;
      }
      this.log('error', 'Unexpected error while handling signaling message:', error);
    }
  }

  onLocalCandidate(candidate: IceCandidateInit): void {
    if (this.closing) {
      return;
    }
    this.channel.send({ type: 'ice', ice: candidate }).catch((error: unknown) => {
      this.log('warn', `Failed to send ICE candidate: ${errorMessage(error)}`);
    });
  }

  onConnectionStateChange(state: string): void {
    this.connectionState = state;
    this.log('info', `ICE connection state has changed: ${state}`);
    this.emit('connection:state', state);
  }

  /**
   * Release everything the session owns. Every call after the first returns
   * the same promise; never rejects.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.teardown();
    }
    return this.closing;
  }

  getStatus(): SessionStatus {
    return {
      id: this.id,
      remoteAddress: this.config.remoteAddress ?? null,
      signalingState: this.signaling.getState(),
      connectionState: this.connectionState,
      createdAt: this.createdAt,
      closed: this.closing !== null,
      ingest: this.ingest.getStats(),
    };
  }

  private async teardown(): Promise<void> {
    this.log('info', '🛑 Closing session');

    this.shutdown.abort();
    if (this.ingestTask) {
      await this.ingestTask;
    }
    this.ingest.close();

    try {
      await this.transport.close();
    } catch (error) {
      this.log('warn', `Error closing peer connection: ${errorMessage(error)}`);
    }

    this.log('info', '✅ Session closed');
    this.emit('closed');
  }

  // Typed event emitter methods
  on<K extends keyof SessionManagerEvents>(
    event: K,
    listener: SessionManagerEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof SessionManagerEvents>(
    event: K,
    ...args: Parameters<SessionManagerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
