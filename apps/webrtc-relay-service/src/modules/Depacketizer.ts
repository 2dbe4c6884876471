/**
 * Codec-specific RTP depacketizers
 */
import { PacketDecodeError } from '../types/errors.js';

/**
 * Strategy used by SampleBuilder to turn RTP payloads into codec frames
 */
export interface Depacketizer {
  /** True when the payload starts a new frame */
  isPartitionHead(payload: Buffer): boolean;
  /** True when the packet ends a frame */
  isPartitionTail(marker: boolean, payload: Buffer): boolean;
  /** Strip the RTP payload format header and return codec bytes */
  unmarshal(payload: Buffer): Buffer;
  /** True when the reassembled frame is independently decodable */
  isKeyframe?(frame: Buffer): boolean;
}

/**
 * VP8 payload descriptor (RFC 7741 §4.2)
 *
 *      0 1 2 3 4 5 6 7
 *     +-+-+-+-+-+-+-+-+
 *     |X|R|N|S|R| PID |
 *     +-+-+-+-+-+-+-+-+
 *  X: |I|L|T|K| RSV   |
 *     +-+-+-+-+-+-+-+-+
 *  I: |M| PictureID   |  (second byte when M is set)
 *  L: |   TL0PICIDX   |
 *  T/K: |TID|Y| KEYIDX|
 */
export class VP8Depacketizer implements Depacketizer {
  isPartitionHead(payload: Buffer): boolean {
    if (payload.length < 1) {
      return false;
    }
    const startOfPartition = (payload[0] & 0x10) !== 0;
    const partitionIndex = payload[0] & 0x07;
    return startOfPartition && partitionIndex === 0;
  }

  /**
   * The marker bit is set on the last packet of a VP8 frame
   */
  isPartitionTail(marker: boolean): boolean {
    return marker;
  }

  unmarshal(payload: Buffer): Buffer {
    return payload.subarray(this.descriptorLength(payload));
  }

  /**
   * VP8 frame tag: the low bit of the first byte is 0 for key frames
   */
  isKeyframe(frame: Buffer): boolean {
    return frame.length > 0 && (frame[0] & 0x01) === 0;
  }

  private descriptorLength(payload: Buffer): number {
    if (payload.length < 1) {
      throw new PacketDecodeError('Empty VP8 payload');
    }

    let index = 1;
    const extended = (payload[0] & 0x80) !== 0;
    if (extended) {
      if (payload.length <= index) {
        throw new PacketDecodeError('VP8 payload truncated in extension byte');
      }
      const ext = payload[index];
      index++;

      const hasPictureId = (ext & 0x80) !== 0;
      const hasTl0PicIdx = (ext & 0x40) !== 0;
      const hasTidOrKeyIdx = (ext & 0x20) !== 0 || (ext & 0x10) !== 0;

      if (hasPictureId) {
        if (payload.length <= index) {
          throw new PacketDecodeError('VP8 payload truncated in picture id');
        }
        // M bit selects a 15-bit picture id
        index += (payload[index] & 0x80) !== 0 ? 2 : 1;
      }
      if (hasTl0PicIdx) {
        index++;
      }
      if (hasTidOrKeyIdx) {
        index++;
      }
    }

    if (payload.length <= index) {
      throw new PacketDecodeError(`VP8 payload has no data after ${index}-byte descriptor`);
    }
    return index;
  }
}

/**
 * Opus (RFC 7587): one RTP payload carries exactly one Opus packet
 */
export class OpusDepacketizer implements Depacketizer {
  isPartitionHead(payload: Buffer): boolean {
    return payload.length > 0;
  }

  isPartitionTail(): boolean {
    return true;
  }

  unmarshal(payload: Buffer): Buffer {
    if (payload.length === 0) {
      throw new PacketDecodeError('Empty Opus payload');
    }
    return payload;
  }
}
