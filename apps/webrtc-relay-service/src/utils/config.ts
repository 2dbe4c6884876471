/**
 * Configuration loader and validator
 */
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

/**
 * Application configuration
 */
export interface Config {
  server: {
    host: string;
    port: number;
    nodeEnv: string;
    staticPath: string;
    wsPath: string;
  };
  webrtc: {
    /** The single STUN/TURN server handed to every peer connection */
    iceServerUrl: string;
  };
  ingest: {
    host: string;
    /** 0 binds an ephemeral port */
    port: number;
    readTimeoutMs: number;
    /** Reassembly window, in packets */
    reassemblyWindow: number;
  };
  logging: {
    level: string;
    format: 'json' | 'simple';
    toFile: boolean;
    toConsole: boolean;
    logsPath: string;
    moduleFilter?: string[];
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    server: {
      host: env.HOST || '0.0.0.0',
      port: parseInt(env.PORT || '8080', 10),
      nodeEnv: env.NODE_ENV || 'development',
      staticPath: path.resolve(__dirname, '../..', env.STATIC_PATH || './public'),
      wsPath: env.WS_PATH || '/ws',
    },
    webrtc: {
      iceServerUrl: env.ICE_SERVER_URL || 'stun:stun.l.google.com:19302',
    },
    ingest: {
      host: env.RTP_INGEST_HOST || '127.0.0.1',
      port: parseInt(env.RTP_INGEST_PORT || '5004', 10),
      readTimeoutMs: parseInt(env.RTP_READ_TIMEOUT_MS || '100', 10),
      reassemblyWindow: parseInt(env.REASSEMBLY_WINDOW || '10', 10),
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
      format: env.LOG_FORMAT === 'json' ? 'json' : 'simple',
      toFile: env.LOG_TO_FILE === 'true',
      toConsole: env.LOG_TO_CONSOLE !== 'false',
      logsPath: env.LOGS_PATH || './storage/logs',
      moduleFilter: env.LOG_MODULE_FILTER
        ? env.LOG_MODULE_FILTER.split(',').map(m => m.trim()).filter(m => m.length > 0)
        : undefined,
    },
  };
}

/**
 * Validate configuration
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: Config): void {
  const errors: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port <= 0 || config.server.port > 65535) {
    errors.push('PORT must be between 1 and 65535');
  }

  if (!config.server.wsPath.startsWith('/')) {
    errors.push('WS_PATH must start with "/"');
  }

  if (!/^(stun|stuns|turn|turns):/.test(config.webrtc.iceServerUrl)) {
    errors.push('ICE_SERVER_URL must be a stun:, stuns:, turn: or turns: URL');
  }

  if (!Number.isInteger(config.ingest.port) || config.ingest.port < 0 || config.ingest.port > 65535) {
    errors.push('RTP_INGEST_PORT must be between 0 and 65535');
  }

  if (!Number.isInteger(config.ingest.readTimeoutMs) || config.ingest.readTimeoutMs <= 0) {
    errors.push('RTP_READ_TIMEOUT_MS must be positive');
  }

  if (!Number.isInteger(config.ingest.reassemblyWindow) || config.ingest.reassemblyWindow < 2) {
    errors.push('REASSEMBLY_WINDOW must be at least 2');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
}

/**
 * Get validated configuration
 */
export function getConfig(): Config {
  const config = loadConfig();
  validateConfig(config);
  return config;
}
