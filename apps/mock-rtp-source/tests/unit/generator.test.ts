/**
 * Unit tests for the synthetic packet generator
 */
import { describe, it, expect } from 'vitest';
import {
  AUDIO_PROFILE,
  SyntheticPacket,
  SyntheticStream,
  VIDEO_PROFILE,
  impair,
} from '../../src/generator.js';

describe('SyntheticStream', () => {
  describe('video', () => {
    it('should split a frame into packets sharing one timestamp', () => {
      const stream = new SyntheticStream(VIDEO_PROFILE, 65534, 0);
      const packets = stream.nextFrame();

      expect(packets.map(p => p.sequenceNumber)).toEqual([65534, 65535, 0]);
      expect(packets.map(p => p.timestamp)).toEqual([0, 0, 0]);
      expect(packets.map(p => p.marker)).toEqual([false, false, true]);
      expect(packets.every(p => p.payloadType === 96)).toBe(true);
    });

    it('should mark the first packet as partition start and flag keyframes', () => {
      const stream = new SyntheticStream(VIDEO_PROFILE);
      const [first, second] = stream.nextFrame();

      expect(first?.payload[0]).toBe(0x10);
      expect(first?.payload[1]).toBe(0x00);
      expect(first?.payload.length).toBe(VIDEO_PROFILE.bytesPerPacket + 1);
      expect(second?.payload[0]).toBe(0x00);

      const [nextFirst] = stream.nextFrame();
      expect(nextFirst?.payload[1]).toBe(0x01);
    });

    it('should advance the timestamp by one frame interval', () => {
      const stream = new SyntheticStream(VIDEO_PROFILE);
      stream.nextFrame();
      const [packet] = stream.nextFrame();

      expect(packet?.timestamp).toBe(3000);
      expect(packet?.sequenceNumber).toBe(3);
    });
  });

  describe('audio', () => {
    it('should emit one marked packet per frame', () => {
      const stream = new SyntheticStream(AUDIO_PROFILE);
      const packets = stream.nextFrame();

      expect(packets).toHaveLength(1);
      expect(packets[0]?.marker).toBe(true);
      expect(packets[0]?.payloadType).toBe(111);
      expect(packets[0]?.payload.length).toBe(AUDIO_PROFILE.bytesPerPacket);
    });

    it('should release frames as their send time passes', () => {
      const stream = new SyntheticStream(AUDIO_PROFILE);

      expect(stream.framesDue(0)).toHaveLength(1);
      const later = stream.framesDue(59);
      expect(later).toHaveLength(2);
      expect(later.map(frame => frame[0]?.timestamp)).toEqual([960, 1920]);
      expect(stream.framesDue(59)).toHaveLength(0);
      expect(stream.framesGenerated).toBe(3);
    });
  });
});

describe('impair', () => {
  const packets = (): SyntheticPacket[] => new SyntheticStream(AUDIO_PROFILE).framesDue(60).flat();

  it('should pass packets through untouched when probabilities are zero', () => {
    const input = packets();
    const result = impair(input, { reorderProbability: 0, dropProbability: 0, random: () => 0.5 });

    expect(result.packets).toEqual(input);
    expect(result.dropped).toBe(0);
    expect(result.reordered).toBe(0);
  });

  it('should drop every packet at probability one', () => {
    const result = impair(packets(), { reorderProbability: 0, dropProbability: 1, random: () => 0.5 });

    expect(result.packets).toHaveLength(0);
    expect(result.dropped).toBe(4);
  });

  it('should swap adjacent pairs without moving a packet twice', () => {
    const result = impair(packets(), { reorderProbability: 0.5, dropProbability: 0, random: () => 0 });

    expect(result.packets.map(p => p.sequenceNumber)).toEqual([1, 0, 3, 2]);
    expect(result.reordered).toBe(2);
  });
});
