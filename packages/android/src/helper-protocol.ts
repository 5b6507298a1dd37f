/**
 * scrcpy-server socket framing
 * See: https://github.com/Genymobile/scrcpy/blob/master/doc/develop.md
 *
 * First socket: 64-byte device name (NUL padded)
 * Video socket: 12-byte codec header (codec id, width, height), then frames
 * Audio socket: 4-byte codec header (codec id), then frames
 * Frame: 8-byte pts with flags in the top bits, 4-byte payload size, payload
 */

export const DEVICE_NAME_LENGTH = 64;
export const FRAME_HEADER_LENGTH = 12;
export const CODEC_META_LENGTH = {
  video: 12,
  audio: 4,
} as const;

const PACKET_FLAG_CONFIG = 0x80;
const PACKET_FLAG_KEY_FRAME = 0x40;

export function parseDeviceName(bytes: Uint8Array): string {
  const end = bytes.indexOf(0);
  return new TextDecoder().decode(end === -1 ? bytes : bytes.subarray(0, end));
}

export interface VideoCodecMeta {
  codec: string;
  width: number;
  height: number;
}

/**
 * Codec ids are four ASCII characters packed big-endian ("h264", "h265", "av1\0")
 */
export function parseVideoCodecMeta(bytes: Uint8Array): VideoCodecMeta {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return {
    codec: parseDeviceName(bytes.subarray(0, 4)),
    width: view.getUint32(4),
    height: view.getUint32(8),
  };
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.byteLength === 0) return b;
  const out = new Uint8Array(a.byteLength + b.byteLength);
  out.set(a, 0);
  out.set(b, a.byteLength);
  return out;
}

/**
 * Pull-based reader over a socket's chunks
 */
export class SocketReader {
  private iterator: AsyncIterator<Uint8Array>;
  private buffered: Uint8Array = new Uint8Array(0);

  constructor(source: AsyncIterable<Uint8Array>) {
    this.iterator = source[Symbol.asyncIterator]();
  }

  /**
   * Read exactly `length` bytes; throws if the socket ends first
   */
  async readExactly(length: number): Promise<Uint8Array> {
    while (this.buffered.byteLength < length) {
      const result = await this.iterator.next();
      if (result.done) {
        throw new Error(`Socket closed after ${this.buffered.byteLength} of ${length} bytes`);
      }
      this.buffered = concat(this.buffered, result.value);
    }

    const out = this.buffered.slice(0, length);
    this.buffered = this.buffered.subarray(length);
    return out;
  }

  /**
   * Everything after what has been read, as it arrives
   */
  async *rest(): AsyncGenerator<Uint8Array> {
    if (this.buffered.byteLength > 0) {
      const leftover = this.buffered;
      this.buffered = new Uint8Array(0);
      yield leftover;
    }

    for (;;) {
      const result = await this.iterator.next();
      if (result.done) {
        return;
      }
      yield result.value;
    }
  }
}

export interface HelperPacket {
  type: 'meta' | 'frame';
  /**
   * Packet bytes exactly as the helper sent them, header included
   */
  bytes: Uint8Array;
  config: boolean;
  keyFrame: boolean;
}

/**
 * Splits a media socket into the codec header and whole frames.
 * With frame meta disabled there are no frame boundaries, so chunks pass
 * through as they arrive.
 */
export class FrameSplitter {
  private metaLength: number;
  private framed: boolean;
  private metaDone: boolean;
  private pending: Uint8Array = new Uint8Array(0);

  constructor(metaLength: number, framed: boolean) {
    this.metaLength = metaLength;
    this.framed = framed;
    this.metaDone = metaLength === 0;
  }

  push(chunk: Uint8Array): HelperPacket[] {
    this.pending = concat(this.pending, chunk);
    const packets: HelperPacket[] = [];

    if (!this.metaDone) {
      if (this.pending.byteLength < this.metaLength) {
        return packets;
      }
      packets.push({ type: 'meta', bytes: this.take(this.metaLength), config: false, keyFrame: false });
      this.metaDone = true;
    }

    if (!this.framed) {
      if (this.pending.byteLength > 0) {
        packets.push({ type: 'frame', bytes: this.take(this.pending.byteLength), config: false, keyFrame: false });
      }
      return packets;
    }

    while (this.pending.byteLength >= FRAME_HEADER_LENGTH) {
      const view = new DataView(this.pending.buffer, this.pending.byteOffset, this.pending.byteLength);
      const total = FRAME_HEADER_LENGTH + view.getUint32(8);
      if (this.pending.byteLength < total) {
        break;
      }

      const flags = this.pending[0];
      packets.push({
        type: 'frame',
        bytes: this.take(total),
        config: (flags & PACKET_FLAG_CONFIG) !== 0,
        keyFrame: (flags & PACKET_FLAG_KEY_FRAME) !== 0,
      });
    }

    return packets;
  }

  /**
   * Bytes received but not yet part of a whole packet
   */
  get buffered(): number {
    return this.pending.byteLength;
  }

  private take(length: number): Uint8Array {
    const out = this.pending.slice(0, length);
    this.pending = this.pending.subarray(length);
    return out;
  }
}

/**
 * Build a frame the way the helper writes one
 */
export function encodeHelperFrame(payload: Uint8Array, options: { pts?: number; config?: boolean; keyFrame?: boolean } = {}): Uint8Array {
  const out = new Uint8Array(FRAME_HEADER_LENGTH + payload.byteLength);
  const view = new DataView(out.buffer);
  view.setBigUint64(0, BigInt(options.pts ?? 0));
  if (options.config) out[0] |= PACKET_FLAG_CONFIG;
  if (options.keyFrame) out[0] |= PACKET_FLAG_KEY_FRAME;
  view.setUint32(8, payload.byteLength);
  out.set(payload, FRAME_HEADER_LENGTH);
  return out;
}
