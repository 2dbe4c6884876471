/**
 * WebRTC Relay Service - Main Entry Point
 * Serves the browser page, accepts signaling over WebSocket and relays
 * locally ingested RTP into each peer connection.
 */
import express, { Request, Response, NextFunction } from 'express';
import { createServer } from 'http';
import { WebSocketServer } from 'ws';
import { getConfig, Config } from './utils/config.js';
import { initLogger, getLogger } from './utils/logger.js';
import { SessionManager } from './modules/SessionManager.js';
import { SessionRegistry } from './services/session-registry.service.js';
import { createWeriftTransportSession } from './services/werift-transport.service.js';
import { handleConnection } from './handlers/websocket.handler.js';

// Load configuration
const config: Config = getConfig();

// Initialize logger
initLogger(config.logging);
const logger = getLogger();

const registry = new SessionRegistry<SessionManager>(config.ingest.port);

// Create Express app
const app = express();

// Middleware
app.use(express.json());
app.use(express.static(config.server.staticPath));

/**
 * Health check endpoint
 */
app.get('/api/health', (req: Request, res: Response) => {
  res.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    sessions: registry.size,
  });
});

/**
 * Live session status
 */
app.get('/api/sessions', (req: Request, res: Response) => {
  res.json({
    sessions: registry.list(),
  });
});

/**
 * Error handling middleware
 */
app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
  logger.error('Unhandled error:', err);
  res.status(500).json({
    success: false,
    error: err.message || 'Internal server error',
  });
});

const server = createServer(app);
const wss = new WebSocketServer({ noServer: true });

server.on('upgrade', (request, socket, head) => {
  const { pathname } = new URL(request.url ?? '/', 'http://localhost');
  if (pathname !== config.server.wsPath) {
    logger.warn(`Rejecting WebSocket upgrade on ${pathname}`);
    socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
    socket.destroy();
    return;
  }

  wss.handleUpgrade(request, socket, head, (ws) => {
    wss.emit('connection', ws, request);
  });
});

wss.on('connection', (ws, request) => {
  handleConnection(ws, request.socket.remoteAddress ?? null, {
    config,
    registry,
    createTransport: createWeriftTransportSession,
  }).catch((error: unknown) => {
    logger.error('Connection handler failed:', error);
  });
});

/**
 * Graceful shutdown
 */
let shuttingDown = false;
const shutdown = async () => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info('Shutting down gracefully...');

  for (const client of wss.clients) {
    client.close(1001, 'server shutting down');
  }

  try {
    await registry.closeAll();
  } catch (error) {
    logger.error('Error closing sessions during shutdown:', error);
  }

  wss.close();
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
};

process.on('SIGTERM', () => {
  shutdown().catch((error: unknown) => {
    logger.error('Shutdown failed:', error);
    process.exit(1);
  });
});
process.on('SIGINT', () => {
  shutdown().catch((error: unknown) => {
    logger.error('Shutdown failed:', error);
    process.exit(1);
  });
});

/**
 * Start server
 */
server.listen(config.server.port, config.server.host, () => {
  logger.info(`🚀 WebRTC Relay Service started`);
  logger.info(`📡 Server running on http://${config.server.host}:${config.server.port}`);
  logger.info(`🔗 Signaling at ws://${config.server.host}:${config.server.port}${config.server.wsPath}`);
  logger.info(`🎬 RTP ingest on udp://${config.ingest.host}:${config.ingest.port || '<ephemeral>'}`);
  logger.info(`🧊 ICE server: ${config.webrtc.iceServerUrl}`);
  logger.info(`✅ Ready for viewers!`);
});
