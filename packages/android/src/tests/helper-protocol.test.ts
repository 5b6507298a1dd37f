import { describe, expect, it } from 'vitest';

import {
  FrameSplitter,
  SocketReader,
  encodeHelperFrame,
  parseDeviceName,
  parseVideoCodecMeta,
} from '../helper-protocol';
import { deviceNameHeader, videoCodecMeta } from './fakes';

async function* chunksOf(...chunks: number[][]): AsyncGenerator<Uint8Array> {
  for (const chunk of chunks) {
    yield new Uint8Array(chunk);
  }
}

describe('header parsing', () => {
  it('reads a NUL padded device name', () => {
    expect(parseDeviceName(deviceNameHeader('Pixel Test'))).toBe('Pixel Test');
  });

  it('reads the video codec header', () => {
    expect(parseVideoCodecMeta(videoCodecMeta('h265', 720, 1280))).toEqual({
      codec: 'h265',
      width: 720,
      height: 1280,
    });
  });
});

describe('SocketReader', () => {
  it('reads exact lengths across chunk boundaries and hands over the rest', async () => {
    const reader = new SocketReader(chunksOf([1, 2], [3, 4, 5], [6]));

    expect(Array.from(await reader.readExactly(3))).toEqual([1, 2, 3]);

    const rest: number[][] = [];
    for await (const chunk of reader.rest()) {
      rest.push(Array.from(chunk));
    }
    expect(rest).toEqual([[4, 5], [6]]);
  });

  it('fails when the socket ends early', async () => {
    const reader = new SocketReader(chunksOf([1, 2]));

    await expect(reader.readExactly(4)).rejects.toThrow('Socket closed after 2 of 4 bytes');
  });
});

describe('FrameSplitter', () => {
  it('splits the codec header then whole frames', () => {
    const splitter = new FrameSplitter(4, true);
    const config = encodeHelperFrame(new Uint8Array([9, 9]), { config: true });
    const key = encodeHelperFrame(new Uint8Array([1, 2, 3]), { pts: 1000, keyFrame: true });

    const stream = new Uint8Array([0x6f, 0x70, 0x75, 0x73, ...config, ...key]);
    const first = splitter.push(stream.subarray(0, 20));
    const second = splitter.push(stream.subarray(20));

    expect(first.map(p => [p.type, p.config, p.keyFrame])).toEqual([
      ['meta', false, false],
      ['frame', true, false],
    ]);
    expect(Array.from(first[1].bytes)).toEqual(Array.from(config));
    expect(second).toHaveLength(1);
    expect(second[0].keyFrame).toBe(true);
    expect(Array.from(second[0].bytes)).toEqual(Array.from(key));
    expect(splitter.buffered).toBe(0);
  });

  it('holds a partial frame until the rest arrives', () => {
    const splitter = new FrameSplitter(0, true);
    const frame = encodeHelperFrame(new Uint8Array([1, 2, 3, 4]));

    expect(splitter.push(frame.subarray(0, 10))).toEqual([]);
    expect(splitter.buffered).toBe(10);
    expect(splitter.push(frame.subarray(10))).toHaveLength(1);
  });

  it('passes chunks through when frame meta is off', () => {
    const splitter = new FrameSplitter(4, false);

    const packets = splitter.push(new Uint8Array([1, 2, 3, 4, 5, 6]));

    expect(packets.map(p => Array.from(p.bytes))).toEqual([[1, 2, 3, 4], [5, 6]]);
  });
});

describe('encodeHelperFrame', () => {
  it('writes pts, flags and length big-endian', () => {
    const frame = encodeHelperFrame(new Uint8Array([7]), { pts: 258, keyFrame: true });

    expect(Array.from(frame)).toEqual([0x40, 0, 0, 0, 0, 0, 1, 2, 0, 0, 0, 1, 7]);
  });
});
