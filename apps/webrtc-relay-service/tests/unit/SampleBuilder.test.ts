/**
 * Unit tests for SampleBuilder
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { SampleBuilder } from '../../src/modules/SampleBuilder.js';
import { OpusDepacketizer, VP8Depacketizer } from '../../src/modules/Depacketizer.js';
import { MediaSample, TransportPacket } from '../../src/types/index.js';
import { initLogger } from '../../src/utils/logger.js';
import { opusPacket, packet } from '../fixtures/fakes.js';

// Initialize logger for tests
initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

function drain(builder: SampleBuilder): MediaSample[] {
  const samples: MediaSample[] = [];
  for (let sample = builder.pop(); sample; sample = builder.pop()) {
    samples.push(sample);
  }
  return samples;
}

function vp8Packet(
  sequenceNumber: number,
  timestamp: number,
  options: { head?: boolean; marker?: boolean; body?: number[] } = {}
): TransportPacket {
  const descriptor = options.head ? 0x10 : 0x00;
  return packet({
    sequenceNumber,
    timestamp,
    payloadType: 96,
    marker: options.marker ?? false,
    payload: Buffer.from([descriptor, ...(options.body ?? [sequenceNumber & 0xff])]),
  });
}

describe('SampleBuilder', () => {
  describe('configuration', () => {
    it('should reject a window smaller than two packets', () => {
      expect(
        () => new SampleBuilder({ depacketizer: new OpusDepacketizer(), clockRate: 48000, maxLate: 1 })
      ).toThrow(RangeError);
    });

    it('should reject a non-positive clock rate', () => {
      expect(() => new SampleBuilder({ depacketizer: new OpusDepacketizer(), clockRate: 0 })).toThrow(RangeError);
    });
  });

  describe('VP8 reassembly', () => {
    let builder: SampleBuilder;

    beforeEach(() => {
      builder = new SampleBuilder({ depacketizer: new VP8Depacketizer(), clockRate: 90000 });
    });

    it('should emit one sample for a reordered two-packet frame once its tail arrives', () => {
      builder.push(vp8Packet(1, 1000, { head: true, body: [0x00, 0xa1] }));
      builder.push(vp8Packet(3, 4000, { head: true, body: [0x01, 0xa3] }));
      expect(builder.pop()).toBeNull();

      builder.push(vp8Packet(2, 1000, { marker: true, body: [0xa2] }));
      const samples = drain(builder);

      expect(samples).toHaveLength(1);
      expect([...(samples[0]?.data ?? [])]).toEqual([0x00, 0xa1, 0xa2]);
      expect(samples[0]?.packetTimestamp).toBe(1000);
      expect(samples[0]?.durationMs).toBeCloseTo(33.333, 3);
      expect(samples[0]?.prevDroppedPackets).toBe(0);
      expect(samples[0]?.isKeyframe).toBe(true);
      expect(builder.getStats().pendingPackets).toBe(1);
    });

    it('should emit the same samples whether packets arrive in order or shuffled', () => {
      const frames = [
        vp8Packet(10, 0, { head: true, body: [0x00] }),
        vp8Packet(11, 0, { marker: true }),
        vp8Packet(12, 3000, { head: true, body: [0x01] }),
        vp8Packet(13, 3000, { marker: true }),
        vp8Packet(14, 6000, { head: true, body: [0x01] }),
        vp8Packet(15, 6000, { marker: true }),
        vp8Packet(16, 9000, { head: true, body: [0x01] }),
      ];

      const inOrder = new SampleBuilder({ depacketizer: new VP8Depacketizer(), clockRate: 90000 });
      frames.forEach(p => inOrder.push(p));

      const shuffled = new SampleBuilder({ depacketizer: new VP8Depacketizer(), clockRate: 90000 });
      [10, 12, 11, 14, 13, 16, 15].forEach(seq => {
        const match = frames.find(p => p.sequenceNumber === seq);
        if (match) {
          shuffled.push(match);
        }
      });

      const expected = drain(inOrder);
      expect(expected).toHaveLength(3);
      expect(drain(shuffled)).toEqual(expected);
    });

    it('should drop a frame whose first packet never starts a partition', () => {
      builder.push(vp8Packet(2, 1000, { marker: true }));
      builder.push(vp8Packet(3, 4000, { head: true, body: [0x01] }));
      builder.push(vp8Packet(4, 7000, { head: true, body: [0x01] }));

      const samples = drain(builder);
      expect(samples).toHaveLength(1);
      expect(samples[0]?.packetTimestamp).toBe(4000);
      expect(samples[0]?.prevDroppedPackets).toBe(1);
      expect(samples[0]?.isKeyframe).toBe(false);
      expect(builder.getStats().packetsDropped).toBe(1);
    });
  });

  describe('window bound', () => {
    it('should never hold more than the window when contiguous packets share one timestamp', () => {
      const builder = new SampleBuilder({ depacketizer: new VP8Depacketizer(), clockRate: 90000, maxLate: 10 });
      let maxPending = 0;

      for (let seq = 1; seq <= 200; seq++) {
        builder.push(vp8Packet(seq, 1000, { head: seq === 1 }));
        maxPending = Math.max(maxPending, builder.getStats().pendingPackets);
      }

      expect(maxPending).toBeLessThanOrEqual(10);
      expect(builder.getStats()).toMatchObject({ samplesEmitted: 0, packetsDropped: 200, pendingPackets: 0 });

      builder.push(vp8Packet(201, 4000, { head: true, marker: true, body: [0x00] }));
      builder.push(vp8Packet(202, 7000, { head: true, marker: true, body: [0x01] }));
      const samples = drain(builder);

      expect(samples).toHaveLength(1);
      expect(samples[0]?.packetTimestamp).toBe(4000);
      expect(samples[0]?.prevDroppedPackets).toBe(200);
    });

    it('should stay bounded over a full sequence cycle of a frozen clock', () => {
      const builder = new SampleBuilder({ depacketizer: new OpusDepacketizer(), clockRate: 48000, maxLate: 10 });
      let maxPending = 0;

      for (let i = 0; i < 70000; i++) {
        builder.push(packet({ sequenceNumber: i & 0xffff, timestamp: 0, marker: true, payload: Buffer.from([0xfc]) }));
        maxPending = Math.max(maxPending, builder.getStats().pendingPackets);
      }

      expect(maxPending).toBeLessThanOrEqual(10);
      expect(builder.getStats()).toMatchObject({
        samplesEmitted: 0,
        latePackets: 0,
        packetsDropped: 69993,
        pendingPackets: 7,
      });
    });

    it('should drop a frame that spans more packets than the window', () => {
      const builder = new SampleBuilder({ depacketizer: new VP8Depacketizer(), clockRate: 90000, maxLate: 10 });

      for (let seq = 1; seq <= 12; seq++) {
        builder.push(vp8Packet(seq, 1000, { head: seq === 1, marker: seq === 12, body: [0x00] }));
      }
      expect(builder.pop()).toBeNull();
      expect(builder.getStats().packetsDropped).toBe(12);

      builder.push(vp8Packet(13, 4000, { head: true, marker: true, body: [0x00] }));
      builder.push(vp8Packet(14, 7000, { head: true, marker: true, body: [0x01] }));
      const samples = drain(builder);

      expect(samples).toHaveLength(1);
      expect(samples[0]?.packetTimestamp).toBe(4000);
      expect(samples[0]?.prevDroppedPackets).toBe(12);
    });
  });

  describe('Opus reassembly', () => {
    let builder: SampleBuilder;

    beforeEach(() => {
      builder = new SampleBuilder({ depacketizer: new OpusDepacketizer(), clockRate: 48000, maxLate: 10 });
    });

    it('should emit one 20 ms sample per packet once the next packet arrives', () => {
      [1, 2, 3].forEach(seq => builder.push(opusPacket(seq)));
      const samples = drain(builder);

      expect(samples.map(s => s.packetTimestamp)).toEqual([0, 960]);
      expect(samples.map(s => s.durationMs)).toEqual([20, 20]);
      expect(samples[0]?.isKeyframe).toBeUndefined();
    });

    it('should skip a lost packet once the window overflows', () => {
      builder.push(opusPacket(1));
      for (let seq = 3; seq <= 10; seq++) {
        builder.push(opusPacket(seq));
      }
      expect(builder.pop()).toBeNull();

      builder.push(opusPacket(11));
      const samples = drain(builder);

      expect(samples).toHaveLength(9);
      expect(samples.map(s => s.packetTimestamp)).toEqual([0, 1920, 2880, 3840, 4800, 5760, 6720, 7680, 8640]);
      expect(samples[0]?.durationMs).toBe(40);
      expect(samples[0]?.prevDroppedPackets).toBe(0);
      expect(samples[1]?.durationMs).toBe(20);
      expect(samples[1]?.prevDroppedPackets).toBe(1);
      expect(samples[2]?.prevDroppedPackets).toBe(0);
      expect(builder.getStats().packetsDropped).toBe(1);
    });

    it('should wait for a late packet while the window has room', () => {
      builder.push(opusPacket(1));
      builder.push(opusPacket(3));
      builder.push(opusPacket(4));
      expect(builder.pop()).toBeNull();

      builder.push(opusPacket(2));
      expect(drain(builder).map(s => s.packetTimestamp)).toEqual([0, 960, 1920]);
    });

    it('should continue across the sequence number wrap', () => {
      [65534, 65535, 0, 1].forEach(seq =>
        builder.push(packet({ sequenceNumber: seq, timestamp: ((seq + 2) & 0xffff) * 960, marker: true, payload: Buffer.from([seq & 0xff]) }))
      );

      const samples = drain(builder);
      expect(samples.map(s => [...s.data])).toEqual([[0xfe], [0xff], [0x00]]);
      expect(samples.every(s => s.durationMs === 20)).toBe(true);
    });

    it('should ignore duplicates and packets older than the head', () => {
      [1, 2, 3].forEach(seq => builder.push(opusPacket(seq)));
      drain(builder);

      builder.push(opusPacket(3));
      builder.push(opusPacket(1));

      const stats = builder.getStats();
      expect(stats.duplicatePackets).toBe(1);
      expect(stats.latePackets).toBe(1);
      expect(stats.samplesEmitted).toBe(2);
      expect(builder.pop()).toBeNull();
    });

    it('should ignore padding-only packets', () => {
      builder.push(packet({ sequenceNumber: 1, timestamp: 0, payload: Buffer.alloc(0) }));
      expect(builder.getStats().pendingPackets).toBe(0);
    });

    it('should reset when the SSRC changes', () => {
      builder.push(opusPacket(1, 111));
      builder.push(opusPacket(500, 222));
      builder.push(opusPacket(501, 222));

      const samples = drain(builder);
      expect(samples).toHaveLength(1);
      expect(samples[0]?.packetTimestamp).toBe(499 * 960);
      expect(builder.getStats().pendingPackets).toBe(1);
    });

    it('should forget everything on reset()', () => {
      builder.push(opusPacket(1));
      builder.push(opusPacket(2));
      builder.reset();

      expect(builder.pop()).toBeNull();
      expect(builder.getStats().pendingPackets).toBe(0);
    });
  });
});
