import { describe, expect, it, vi } from 'vitest';

import { SessionNotFoundError, StreamNotFoundError, SubscriberAttachFailedError } from '../errors';
import { delay } from '../retry';
import { StreamRouter } from '../stream-router';
import { SubscriberHub } from '../subscriber-hub';
import type { SubscriberSink } from '../interfaces';
import type { StreamKind, TerminalNotice } from '../types';

function createRouter(maxSubscribersPerSession = 5): StreamRouter {
  const hub = new SubscriberHub({
    queueSizes: { video: 4, audio: 4, control: 4 },
    controlBlockTimeoutMs: 50,
  });
  return new StreamRouter(hub, { drainTimeoutMs: 200, maxSubscribersPerSession });
}

function createSink(): SubscriberSink & { frames: string[]; notices: TerminalNotice[] } {
  const frames: string[] = [];
  const notices: TerminalNotice[] = [];
  return {
    frames,
    notices,
    deliver: (kind: StreamKind, frame: Uint8Array) => {
      frames.push(`${kind}:${Array.from(frame).join(',')}`);
    },
    end: (notice: TerminalNotice) => {
      notices.push(notice);
    },
  };
}

const stoppedNotice: TerminalNotice = {
  sessionId: 'session-1',
  serial: 'emulator-5554',
  state: 'stopped',
  reason: null,
  at: 1000,
};

describe('stream router attach', () => {
  it('rejects an unknown session', () => {
    const router = createRouter();

    expect(() => router.attach('missing', 'sub-1', ['video'], createSink())).toThrow(SessionNotFoundError);
  });

  it('rejects a kind the session does not stream', () => {
    const router = createRouter();
    router.openRoute('session-1', 'emulator-5554', ['video', 'control']);

    expect(() => router.attach('session-1', 'sub-1', ['audio'], createSink()))
      .toThrow('Cannot attach to session session-1: session does not stream audio');
  });

  it('rejects an empty kind list', () => {
    const router = createRouter();
    router.openRoute('session-1', 'emulator-5554', ['video']);

    expect(() => router.attach('session-1', 'sub-1', [], createSink())).toThrow(SubscriberAttachFailedError);
  });

  it('enforces the subscriber limit', () => {
    const router = createRouter(2);
    router.openRoute('session-1', 'emulator-5554', ['video']);
    router.attach('session-1', 'sub-1', ['video'], createSink());
    router.attach('session-1', 'sub-2', ['video'], createSink());

    expect(() => router.attach('session-1', 'sub-3', ['video'], createSink()))
      .toThrow('Cannot attach to session session-1: subscriber limit of 2 reached');
    expect(router.subscriberCount('session-1')).toBe(2);
  });

  it('rejects attaching to an ended session', async () => {
    const router = createRouter();
    router.openRoute('session-1', 'emulator-5554', ['video']);
    await router.closeRoute('session-1', stoppedNotice);

    expect(() => router.attach('session-1', 'sub-1', ['video'], createSink()))
      .toThrow('Cannot attach to session session-1: session has ended');
  });

  it('returns the attached subscriber', () => {
    const router = createRouter();
    router.openRoute('session-1', 'emulator-5554', ['video', 'control']);

    const info = router.attach('session-1', 'sub-1', ['video', 'control', 'video'], createSink());

    expect(info.kinds).toEqual(['video', 'control']);
    expect(info.sessionId).toBe('session-1');
    expect(info.ended).toBe(false);
  });
});

describe('stream router inbound', () => {
  it('replays the preamble to late subscribers', async () => {
    const router = createRouter();
    router.openRoute('session-1', 'emulator-5554', ['video']);
    router.setPreamble('session-1', 'video', [Uint8Array.of(0, 0, 0, 1)]);
    const sink = createSink();

    router.attach('session-1', 'sub-1', ['video'], sink);
    await router.publishInbound('session-1', 'video', Uint8Array.of(9));

    await vi.waitFor(() => expect(sink.frames).toEqual(['video:0,0,0,1', 'video:9']));
  });

  it('discards frames once the route is closed and notifies once', async () => {
    const router = createRouter();
    router.openRoute('session-1', 'emulator-5554', ['video']);
    const sink = createSink();
    router.attach('session-1', 'sub-1', ['video'], sink);

    await router.publishInbound('session-1', 'video', Uint8Array.of(1));
    await router.closeRoute('session-1', stoppedNotice);
    await router.closeRoute('session-1', stoppedNotice);
    await router.publishInbound('session-1', 'video', Uint8Array.of(2));

    expect(sink.frames).toEqual(['video:1']);
    expect(sink.notices).toEqual([stoppedNotice]);
    expect(router.isAccepting('session-1')).toBe(false);
  });

  it('detach is idempotent', () => {
    const router = createRouter();
    router.openRoute('session-1', 'emulator-5554', ['video']);
    router.attach('session-1', 'sub-1', ['video'], createSink());

    router.detach('sub-1');
    router.detach('sub-1');

    expect(router.subscriberCount('session-1')).toBe(0);
  });
});

describe('stream router control', () => {
  it('rejects an unknown subscriber', async () => {
    const router = createRouter();

    await expect(router.publishControl('nobody', Uint8Array.of(1))).rejects.toThrow(StreamNotFoundError);
  });

  it('rejects a subscriber not attached to control', async () => {
    const router = createRouter();
    router.openRoute('session-1', 'emulator-5554', ['video', 'control']);
    router.attach('session-1', 'sub-1', ['video'], createSink());

    await expect(router.publishControl('sub-1', Uint8Array.of(1)))
      .rejects.toThrow('No control stream for subscriber sub-1: subscriber is not attached to control');
  });

  it('rejects when the session has no live control socket', async () => {
    const router = createRouter();
    router.openRoute('session-1', 'emulator-5554', ['control']);
    router.attach('session-1', 'sub-1', ['control'], createSink());

    await expect(router.publishControl('sub-1', Uint8Array.of(1)))
      .rejects.toThrow('No control stream for subscriber sub-1: session has no live control socket');
  });

  it('never interleaves writes from different subscribers', async () => {
    const router = createRouter();
    router.openRoute('session-1', 'emulator-5554', ['control']);
    const writes: string[] = [];
    router.bindControl('session-1', async (bytes) => {
      writes.push(`start:${bytes[0]}`);
      await delay(5);
      writes.push(`end:${bytes[0]}`);
    });
    router.attach('session-1', 'sub-1', ['control'], createSink());
    router.attach('session-1', 'sub-2', ['control'], createSink());

    await Promise.all([
      router.publishControl('sub-1', Uint8Array.of(1)),
      router.publishControl('sub-2', Uint8Array.of(2)),
      router.publishControl('sub-1', Uint8Array.of(3)),
    ]);

    expect(writes).toEqual(['start:1', 'end:1', 'start:2', 'end:2', 'start:3', 'end:3']);
  });

  it('wraps a failed device write', async () => {
    const router = createRouter();
    router.openRoute('session-1', 'emulator-5554', ['control']);
    router.bindControl('session-1', async () => {
      throw new Error('socket closed');
    });
    router.attach('session-1', 'sub-1', ['control'], createSink());

    const error = await router.publishControl('sub-1', Uint8Array.of(1)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StreamNotFoundError);
    expect(error).toMatchObject({ code: 'STREAM_NOT_FOUND', message: 'No control stream for subscriber sub-1: control write failed: socket closed' });
  });

  it('forwards device control bytes to control subscribers', async () => {
    const router = createRouter();
    router.openRoute('session-1', 'emulator-5554', ['control']);
    const sink = createSink();
    router.attach('session-1', 'sub-1', ['control'], sink);

    await router.publishInbound('session-1', 'control', Uint8Array.of(0, 5));

    await vi.waitFor(() => expect(sink.frames).toEqual(['control:0,5']));
  });
});
