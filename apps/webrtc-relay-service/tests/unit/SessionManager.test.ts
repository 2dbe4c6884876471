/**
 * Unit tests for SessionManager
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { SessionManager, SessionManagerConfig } from '../../src/modules/SessionManager.js';
import { SetupError } from '../../src/types/errors.js';
import { initLogger } from '../../src/utils/logger.js';
import {
  FakeControlChannel,
  FakeDatagramSocket,
  FakeTransportSession,
  waitFor,
} from '../fixtures/fakes.js';

// Initialize logger for tests
initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

const OFFER = JSON.stringify({ type: 'offer', sdp: { type: 'offer', sdp: 'v=0 offer' } });

describe('SessionManager', () => {
  let transport: FakeTransportSession;
  let channel: FakeControlChannel;
  let socket: FakeDatagramSocket;
  let config: SessionManagerConfig;

  beforeEach(() => {
    transport = new FakeTransportSession();
    channel = new FakeControlChannel();
    socket = new FakeDatagramSocket();
    config = {
      channel,
      createTransport: () => transport,
      iceServerUrl: 'stun:stun.example.test:3478',
      ingest: {
        host: '127.0.0.1',
        port: 0,
        readTimeoutMs: 10,
        createSocket: () => socket,
      },
      remoteAddress: '10.0.0.5',
    };
  });

  describe('create', () => {
    it('should register both tracks and itself as the transport handler', async () => {
      const session = await SessionManager.create(config);

      expect(transport.calls).toEqual(['addSampleTrack:video', 'addSampleTrack:audio']);
      expect(transport.handler).toBe(session);
      expect(session.getStatus()).toMatchObject({
        id: session.id,
        remoteAddress: '10.0.0.5',
        signalingState: 'idle',
        connectionState: 'new',
        closed: false,
      });
    });

    it('should pass the configured ICE server to the transport', async () => {
      const seen: string[] = [];
      await SessionManager.create({
        ...config,
        createTransport: (options) => {
          seen.push(options.iceServerUrl);
          return transport;
        },
      });

      expect(seen).toEqual(['stun:stun.example.test:3478']);
    });

    it('should close the transport and throw SetupError when a track cannot be added', async () => {
      transport.failAddTrack = new Error('codec missing');

      await expect(SessionManager.create(config)).rejects.toThrow(SetupError);
      expect(transport.closeCount).toBe(1);
    });

    it('should throw SetupError when the transport cannot be created', async () => {
      await expect(
        SessionManager.create({
          ...config,
          createTransport: () => {
            throw new Error('no network');
          },
        })
      ).rejects.toThrow('Failed to create peer connection: no network');
    });
  });

  describe('handleMessage', () => {
    it('should answer an offer', async () => {
      const session = await SessionManager.create(config);

      await session.handleMessage(OFFER);

      expect(channel.sent).toEqual([
        { type: 'answer', sdp: { type: 'answer', sdp: 'v=0 answer +candidates' } },
      ]);
      expect(session.getStatus().signalingState).toBe('established');
    });

    it('should swallow unknown and malformed messages', async () => {
      const session = await SessionManager.create(config);

      await session.handleMessage('{"type":"bogus"}');
      await session.handleMessage('not json');

      expect(channel.sent).toEqual([]);
      expect(channel.closes).toEqual([]);
    });

    it('should keep the channel open after a recoverable negotiation failure', async () => {
      const session = await SessionManager.create(config);

      await session.handleMessage('{"type":"offer"}');

      expect(channel.sent.map(m => m.type)).toEqual(['error']);
      expect(channel.closes).toEqual([]);
    });

    it('should close the channel after an unrecoverable negotiation failure', async () => {
      transport.failCreateAnswer = new Error('no codecs');
      const session = await SessionManager.create(config);

      await session.handleMessage(OFFER);

      expect(channel.closes).toEqual([{ code: 1011, reason: 'negotiation failed' }]);
    });

    it('should ignore messages after close', async () => {
      const session = await SessionManager.create(config);
      await session.close();

      await session.handleMessage(OFFER);

      expect(transport.calls).not.toContain('createAnswer');
    });

    it('should settle an offer still waiting on ICE gathering when closed', async () => {
      transport.gatheringGate = new Promise<void>(() => {});
      const session = await SessionManager.create(config);

      const pending = session.handleMessage(OFFER);
      await waitFor(() => transport.calls.includes('waitForGatheringComplete'));
      await session.close();
      await pending;

      expect(channel.sent.some(m => m.type === 'answer')).toBe(false);
      expect(channel.closes).toEqual([]);
      expect(session.getStatus().signalingState).toBe('failed');
    });
  });

  describe('transport callbacks', () => {
    it('should forward local candidates as ice messages', async () => {
      const session = await SessionManager.create(config);

      session.onLocalCandidate({ candidate: 'candidate:1 1 udp 1 10.0.0.1 9 typ host', sdpMid: '0', sdpMLineIndex: 0 });
      await waitFor(() => channel.sent.length === 1);

      expect(channel.sent).toEqual([
        { type: 'ice', ice: { candidate: 'candidate:1 1 udp 1 10.0.0.1 9 typ host', sdpMid: '0', sdpMLineIndex: 0 } },
      ]);
    });

    it('should survive a failed candidate send', async () => {
      const session = await SessionManager.create(config);
      channel.failSend = new Error('closed');

      session.onLocalCandidate({ candidate: 'candidate:2' });
      await new Promise(resolve => setTimeout(resolve, 10));

      expect(channel.sent).toEqual([]);
    });

    it('should track and emit connection state changes', async () => {
      const session = await SessionManager.create(config);
      const seen: string[] = [];
      session.on('connection:state', state => seen.push(state));

      session.onConnectionStateChange('connected');

      expect(seen).toEqual(['connected']);
      expect(session.getStatus().connectionState).toBe('connected');
    });
  });

  describe('close', () => {
    it('should release everything exactly once when called twice', async () => {
      const session = await SessionManager.create(config);
      let closedEvents = 0;
      session.on('closed', () => closedEvents++);
      session.startIngest();
      await waitFor(() => socket.bound);

      await Promise.all([session.close(), session.close()]);
      await session.close();

      expect(transport.closeCount).toBe(1);
      expect(socket.closeCount).toBe(1);
      expect(closedEvents).toBe(1);
      expect(session.getStatus().closed).toBe(true);
    });

    it('should close cleanly when ingest never started', async () => {
      const session = await SessionManager.create(config);

      await session.close();

      expect(transport.closeCount).toBe(1);
      expect(socket.closeCount).toBe(0);
    });

    it('should not start ingest after close', async () => {
      const session = await SessionManager.create(config);
      await session.close();

      session.startIngest();
      await new Promise(resolve => setTimeout(resolve, 10));

      expect(socket.bound).toBe(false);
    });
  });
});
