/**
 * RTP (RFC 3550) header parsing and sequence arithmetic
 */
import { TransportPacket } from '../types/index.js';
import { PacketDecodeError } from '../types/errors.js';

export const RTP_HEADER_SIZE = 12;
export const RTP_VERSION = 2;

/**
 * Parse one datagram as an RTP packet
 * @throws PacketDecodeError on truncated or non-RTP data
 */
export function parseRtpPacket(datagram: Buffer): TransportPacket {
  if (datagram.length < RTP_HEADER_SIZE) {
    throw new PacketDecodeError(`RTP packet too short: ${datagram.length} bytes`);
  }

  const first = datagram.readUInt8(0);
  const version = first >> 6;
  if (version !== RTP_VERSION) {
    throw new PacketDecodeError(`Unsupported RTP version: ${version}`);
  }

  const hasPadding = (first & 0x20) !== 0;
  const hasExtension = (first & 0x10) !== 0;
  const csrcCount = first & 0x0f;

  const second = datagram.readUInt8(1);
  const marker = (second & 0x80) !== 0;
  const payloadType = second & 0x7f;

  let offset = RTP_HEADER_SIZE + csrcCount * 4;
  if (datagram.length < offset) {
    throw new PacketDecodeError(`RTP packet truncated in CSRC list (${csrcCount} entries)`);
  }

  if (hasExtension) {
    if (datagram.length < offset + 4) {
      throw new PacketDecodeError('RTP packet truncated in header extension');
    }
    const extensionWords = datagram.readUInt16BE(offset + 2);
    offset += 4 + extensionWords * 4;
    if (datagram.length < offset) {
      throw new PacketDecodeError(`RTP header extension overruns packet (${extensionWords} words)`);
    }
  }

  let end = datagram.length;
  if (hasPadding) {
    const paddingSize = datagram.readUInt8(datagram.length - 1);
    if (paddingSize === 0 || end - paddingSize < offset) {
      throw new PacketDecodeError(`Invalid RTP padding size: ${paddingSize}`);
    }
    end -= paddingSize;
  }

  return {
    sequenceNumber: datagram.readUInt16BE(2),
    timestamp: datagram.readUInt32BE(4),
    ssrc: datagram.readUInt32BE(8),
    payloadType,
    marker,
    payload: datagram.subarray(offset, end),
  };
}

/**
 * Signed distance from `from` to `to` on the 16-bit sequence circle
 */
export function sequenceDistance(from: number, to: number): number {
  return ((to - from) << 16) >> 16;
}

/**
 * Next 16-bit sequence number
 */
export function nextSequence(sequenceNumber: number): number {
  return (sequenceNumber + 1) & 0xffff;
}

/**
 * Unsigned difference between two 32-bit RTP timestamps
 */
export function timestampDelta(from: number, to: number): number {
  return (to - from) >>> 0;
}
