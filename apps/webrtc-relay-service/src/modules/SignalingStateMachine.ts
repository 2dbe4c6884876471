/**
 * Signaling State Machine
 * Drives offer/answer and ICE candidate exchange for one peer connection
 */
import { EventEmitter } from 'events';
import { SignalingState } from '../types/index.js';
import {
  IceCandidateInit,
  SessionDescription,
  SignalingMessage,
  parseSignalingMessage,
} from '../types/protocol.js';
import { NegotiationError, errorMessage } from '../types/errors.js';
import { ControlChannel } from '../services/control-channel.service.js';
import { TransportSession } from '../services/transport-session.js';
import { ModuleLogger } from '../utils/logger.js';

const logger = new ModuleLogger('SignalingStateMachine');

/**
 * SignalingStateMachine events
 */
export interface SignalingStateMachineEvents {
  'state:change': (state: SignalingState, previous: SignalingState) => void;
}

/**
 * The browser always offers; the relay only answers.
 *
 * Messages must be handed in one at a time: an offer holds the caller
 * until ICE gathering has finished and the answer is on the wire.
 */
export class SignalingStateMachine extends EventEmitter {
  private state: SignalingState = 'idle';

  constructor(
    private readonly transport: TransportSession,
    private readonly channel: ControlChannel,
    private readonly label: string = 'session'
  ) {
    super();
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    logger.log(level, `[${this.label}] ${message}`, ...args);
  }

  getState(): SignalingState {
    return this.state;
  }

  /**
   * Decode and dispatch one inbound text frame
   * @throws MessageDecodeError | UnknownMessageTypeError | NegotiationError
   */
  async handleMessage(raw: string): Promise<void> {
    await this.dispatch(parseSignalingMessage(raw));
  }

  /**
   * Dispatch one decoded message
   * @throws NegotiationError
   */
  async dispatch(message: SignalingMessage): Promise<void> {
    switch (message.type) {
      case 'offer':
        await this.handleOffer(message.sdp);
        return;
      case 'ice':
        await this.handleIceCandidate(message.ice);
        return;
      case 'answer':
        this.log('warn', 'Ignoring inbound answer: the relay never sends offers');
        return;
      case 'error':
        this.log('warn', `Peer reported an error: ${message.error}`);
        return;
    }
  }

  private async handleOffer(offer: SessionDescription | null): Promise<void> {
    if (!offer || offer.type !== 'offer') {
      throw await this.rejectOffer(
        new NegotiationError('offer message requires an sdp description of type "offer"')
      );
    }
    if (this.state === 'failed') {
      throw await this.rejectOffer(
        new NegotiationError('Negotiation previously failed on this connection', { recoverable: false })
      );
    }

    const previous = this.state;
    this.setState('negotiating');
    this.log('info', '📨 Received offer');

    try {
      await this.transport.setRemoteDescription(offer);
    } catch (error) {
      this.setState(previous);
      throw await this.rejectOffer(
        new NegotiationError(`Failed to set remote description: ${errorMessage(error)}`, { cause: error })
      );
    }

    let answer: SessionDescription;
    try {
      const created = await this.transport.createAnswer();
      await this.transport.setLocalDescription(created);
      this.log('debug', 'Waiting for ICE gathering to complete');
      await this.transport.waitForGatheringComplete();

      const local = this.transport.localDescription;
      if (!local) {
        throw new Error('no local description after gathering');
      }
      answer = local;
    } catch (error) {
      this.setState('failed');
      throw await this.rejectOffer(
        new NegotiationError(`Failed to create local answer: ${errorMessage(error)}`, {
          cause: error,
          recoverable: false,
        })
      );
    }

    try {
      await this.channel.send({ type: 'answer', sdp: answer });
    } catch (error) {
      this.setState('failed');
      throw new NegotiationError(`Failed to send answer: ${errorMessage(error)}`, {
        cause: error,
        recoverable: false,
      });
    }

    this.setState('established');
    this.log('info', '📤 Sent answer with gathered candidates');
  }

  private async handleIceCandidate(candidate: IceCandidateInit | null): Promise<void> {
    // null marks end-of-candidates
    if (!candidate) {
      return;
    }

    try {
      await this.transport.addIceCandidate(candidate);
    } catch (error) {
      throw new NegotiationError(`Failed to add ICE candidate: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Tell the peer why its offer failed, then hand back the error to throw
   */
  private async rejectOffer(error: NegotiationError): Promise<NegotiationError> {
    try {
      await this.channel.send({ type: 'error', error: error.message });
    } catch (sendError) {
      this.log('warn', `Failed to report negotiation error to peer: ${errorMessage(sendError)}`);
    }
    return error;
  }

  private setState(state: SignalingState): void {
    if (state === this.state) {
      return;
    }
    const previous = this.state;
    this.state = state;
    this.log('debug', `State ${previous} -> ${state}`);
    this.emit('state:change', state, previous);
  }

  // Typed event emitter methods
  on<K extends keyof SignalingStateMachineEvents>(
    event: K,
    listener: SignalingStateMachineEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof SignalingStateMachineEvents>(
    event: K,
    ...args: Parameters<SignalingStateMachineEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
