import { RawData } from 'ws';
import { Config } from '../utils/config.js';
import { ModuleLogger } from '../utils/logger.js';
import { SetupError, errorMessage } from '../types/errors.js';
import { SessionManager } from '../modules/SessionManager.js';
import { DatagramSocket } from '../modules/MediaIngest.js';
import {
  ControlSocket,
  WebSocketControlChannel,
  rawDataToString,
} from '../services/control-channel.service.js';
import { SessionRegistry } from '../services/session-registry.service.js';
import { TransportSessionFactory } from '../services/transport-session.js';
import { SerialQueue } from '../utils/serial-queue.js';

const logger = new ModuleLogger('WebSocketHandler');

export interface ConnectionDependencies {
  config: Pick<Config, 'webrtc' | 'ingest'>;
  registry: SessionRegistry<SessionManager>;
  createTransport: TransportSessionFactory;
  createSocket?: () => DatagramSocket;
}

/**
 * Bind one WebSocket connection to a session.
 *
 * Inbound frames are handled strictly in arrival order, behind session
 * setup. Resolves with the session once setup has settled, or null when
 * setup failed and the connection was closed.
 */
export function handleConnection(
  socket: ControlSocket,
  remoteAddress: string | null,
  deps: ConnectionDependencies
): Promise<SessionManager | null> {
  const peer = remoteAddress ?? 'unknown';
  logger.log('info', `🔌 Client connected: ${peer}`);

  const channel = new WebSocketControlChannel(socket);
  const inbound = new SerialQueue();

  const setup = inbound.run(async (): Promise<SessionManager | null> => {
    try {
      const session = await SessionManager.create({
        channel,
        createTransport: deps.createTransport,
        iceServerUrl: deps.config.webrtc.iceServerUrl,
        ingest: {
          ...deps.config.ingest,
          createSocket: deps.createSocket,
        },
        remoteAddress,
      });
      deps.registry.add(session);
      session.startIngest();
      return session;
    } catch (error) {
      const reason = error instanceof SetupError ? error.message : `Unexpected setup failure: ${errorMessage(error)}`;
      logger.log('error', `❌ Failed to set up session for ${peer}: ${reason}`);
      channel.close(1011, 'session setup failed');
      return null;
    }
  });

  socket.on('message', (data: RawData, isBinary: boolean) => {
    if (isBinary) {
      logger.log('warn', `Ignoring binary frame from ${peer}`);
      return;
    }
    const text = rawDataToString(data);

    inbound
      .run(async () => {
        const session = await setup;
        await session?.handleMessage(text);
      })
      .catch((error: unknown) => {
        logger.log('error', `Error handling message from ${peer}:`, error);
      });
  });

  socket.on('close', (code: number) => {
    logger.log('info', `Client disconnected: ${peer} (code ${code})`);

    // Only setup is awaited. A queued offer may still be waiting on ICE
    // gathering; closing the session rejects that wait.
    setup
      .then(async (session) => {
        if (!session) {
          return;
        }
        await session.close();
        deps.registry.remove(session.id);
      })
      .catch((error: unknown) => {
        logger.log('error', `Error tearing down session for ${peer}:`, error);
      });
  });

  socket.on('error', (error: Error) => {
    logger.log('warn', `WebSocket error from ${peer}: ${error.message}`);
  });

  return setup;
}
