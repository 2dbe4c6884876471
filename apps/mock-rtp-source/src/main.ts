/**
 * Mock RTP Source - Simple test tool
 * Sends synthetic VP8 video and Opus audio RTP to the relay's ingest port,
 * optionally reordering and dropping packets.
 */
import dgram from 'dgram';
import * as dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { RtpHeader, RtpPacket } from 'werift';
import {
  AUDIO_PROFILE,
  SyntheticPacket,
  SyntheticStream,
  VIDEO_PROFILE,
  impair,
} from './generator.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Load environment variables
dotenv.config({ path: path.join(__dirname, '../.env') });

// Configuration
const targetHost = process.env.TARGET_HOST ?? '127.0.0.1';
const targetPort = process.env.TARGET_PORT ? Number(process.env.TARGET_PORT) : 5004;
const packetIntervalMs = process.env.PACKET_INTERVAL_MS
  ? Number(process.env.PACKET_INTERVAL_MS)
  : 10;
const reorderProbability = process.env.REORDER_PROBABILITY
  ? Number(process.env.REORDER_PROBABILITY)
  : 0;
const dropProbability = process.env.DROP_PROBABILITY
  ? Number(process.env.DROP_PROBABILITY)
  : 0;
const durationSeconds = process.env.DURATION_SECONDS
  ? Number(process.env.DURATION_SECONDS)
  : 0;

console.log('Mock RTP Source Configuration:');
console.log(`  Target: udp://${targetHost}:${targetPort}`);
console.log(`  Tick Interval: ${packetIntervalMs}ms`);
console.log(`  Reorder Probability: ${reorderProbability}`);
console.log(`  Drop Probability: ${dropProbability}`);
console.log(`  Duration: ${durationSeconds > 0 ? `${durationSeconds}s` : 'until stopped'}\n`);

const socket = dgram.createSocket('udp4');
const streams = [new SyntheticStream(VIDEO_PROFILE), new SyntheticStream(AUDIO_PROFILE)];

// Statistics
const stats = {
  packetsSent: 0,
  packetsDropped: 0,
  packetsReordered: 0,
  bytesSent: 0,
  sendErrors: 0,
  startTime: Date.now(),
};

function serialize(packet: SyntheticPacket): Buffer {
  const header = new RtpHeader({
    payloadType: packet.payloadType,
    sequenceNumber: packet.sequenceNumber,
    timestamp: packet.timestamp,
    ssrc: packet.ssrc,
    marker: packet.marker,
  });
  return new RtpPacket(header, packet.payload).serialize();
}

function send(packet: SyntheticPacket): void {
  const datagram = serialize(packet);
  socket.send(datagram, targetPort, targetHost, (error) => {
    if (error) {
      stats.sendErrors++;
      console.error(`❌ Send failed: ${error.message}`);
      return;
    }
    stats.packetsSent++;
    stats.bytesSent += datagram.length;
  });
}

function tick(): void {
  const elapsedMs = Date.now() - stats.startTime;
  const due: SyntheticPacket[] = [];
  for (const stream of streams) {
    for (const frame of stream.framesDue(elapsedMs)) {
      due.push(...frame);
    }
  }

  const { packets, dropped, reordered } = impair(due, { reorderProbability, dropProbability });
  stats.packetsDropped += dropped;
  stats.packetsReordered += reordered;
  packets.forEach(send);
}

function printStats(): void {
  const uptime = ((Date.now() - stats.startTime) / 1000).toFixed(1);
  console.log(`📊 [${uptime}s] sent=${stats.packetsSent} dropped=${stats.packetsDropped} reordered=${stats.packetsReordered} bytes=${stats.bytesSent} errors=${stats.sendErrors}`);
  console.log(`   video frames=${streams[0]?.framesGenerated ?? 0} audio frames=${streams[1]?.framesGenerated ?? 0}`);
}

const tickTimer = setInterval(tick, packetIntervalMs);
const statsTimer = setInterval(printStats, 5000);

console.log(`🎬 Streaming to ${targetHost}:${targetPort}...\n`);

function stop(reason: string): void {
  console.log(`\n${reason}, stopping...`);
  clearInterval(tickTimer);
  clearInterval(statsTimer);
  printStats();
  socket.close(() => {
    console.log('Socket closed');
    process.exit(0);
  });
}

if (durationSeconds > 0) {
  setTimeout(() => stop(`⏱️  ${durationSeconds}s elapsed`), durationSeconds * 1000);
}

process.on('SIGTERM', () => stop('SIGTERM received'));
process.on('SIGINT', () => stop('SIGINT received'));
