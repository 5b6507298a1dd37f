import { afterEach, describe, expect, it, vi } from 'vitest';
import { WebSocket, WebSocketServer } from 'ws';
import type { RawData } from 'ws';
import { StreamNotFoundError } from '@droidrelay/core';
import type { StreamKind, SubscriberSink } from '@droidrelay/core';

import { bindWebSocketSubscriber } from '../ws-subscriber';
import type { StreamSurface } from '../ws-subscriber';

class FakeSurface implements StreamSurface {
  sink: SubscriberSink | null = null;
  kinds: StreamKind[] = [];
  detached: string[] = [];
  controls: number[][] = [];
  controlError: Error | null = null;

  attachSubscriber(sessionId: string, kinds: StreamKind[], sink: SubscriberSink): string {
    this.kinds = kinds;
    this.sink = sink;
    return 'sub-1';
  }

  detachSubscriber(subscriberId: string): void {
    this.detached.push(subscriberId);
  }

  async sendControl(subscriberId: string, bytes: Uint8Array): Promise<void> {
    if (this.controlError) {
      throw this.controlError;
    }
    this.controls.push(Array.from(bytes));
  }

  attachedSink(): SubscriberSink {
    if (!this.sink) {
      throw new Error('no subscriber attached');
    }
    return this.sink;
  }
}

interface Client {
  ws: WebSocket;
  messages: Array<{ binary: boolean; data: Buffer }>;
  closes: Array<[number, string]>;
}

let server: WebSocketServer | null = null;
const clients: WebSocket[] = [];

function toBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  return data;
}

async function startServer(surface: FakeSurface): Promise<string> {
  const wss = new WebSocketServer({ host: '127.0.0.1', port: 0 });
  server = wss;
  await new Promise<void>((resolve) => wss.once('listening', () => resolve()));

  wss.on('connection', (ws) => {
    bindWebSocketSubscriber(surface, ws, 'session-1', ['video', 'control']);
  });

  const address = wss.address();
  if (typeof address !== 'object' || address === null) {
    throw new Error('server has no port');
  }
  return `ws://127.0.0.1:${address.port}`;
}

async function connect(url: string, surface: FakeSurface): Promise<Client> {
  const ws = new WebSocket(url);
  clients.push(ws);
  const client: Client = { ws, messages: [], closes: [] };

  ws.on('message', (data, isBinary) => {
    client.messages.push({ binary: isBinary, data: toBuffer(data) });
  });
  ws.on('close', (code, reason) => {
    client.closes.push([code, reason.toString()]);
  });

  await new Promise<void>((resolve, reject) => {
    ws.once('open', () => resolve());
    ws.once('error', reject);
  });
  await vi.waitFor(() => expect(surface.sink).not.toBeNull());
  return client;
}

afterEach(async () => {
  for (const ws of clients.splice(0)) {
    ws.terminate();
  }

  const wss = server;
  server = null;
  if (wss) {
    for (const ws of wss.clients) {
      ws.terminate();
    }
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  }
});

describe('WebSocket subscriber', () => {
  it('attaches with the requested kinds and sends tagged binary frames', async () => {
    const surface = new FakeSurface();
    const client = await connect(await startServer(surface), surface);

    await surface.attachedSink().deliver('control', new Uint8Array([1, 2]));

    expect(surface.kinds).toEqual(['video', 'control']);
    await vi.waitFor(() => expect(client.messages).toHaveLength(1));
    expect(client.messages[0].binary).toBe(true);
    expect(Array.from(client.messages[0].data)).toEqual([2, 1, 2]);
  });

  it('forwards control frames from the client', async () => {
    const surface = new FakeSurface();
    const client = await connect(await startServer(surface), surface);

    client.ws.send(Buffer.from([2, 5, 6]));

    await vi.waitFor(() => expect(surface.controls).toEqual([[5, 6]]));
  });

  it('answers a rejected control write with an error message', async () => {
    const surface = new FakeSurface();
    surface.controlError = new StreamNotFoundError('sub-1', 'subscriber is not attached to control');
    const client = await connect(await startServer(surface), surface);

    client.ws.send(Buffer.from([2, 5]));

    await vi.waitFor(() => expect(client.messages).toHaveLength(1));
    expect(JSON.parse(client.messages[0].data.toString())).toEqual({
      type: 'error',
      code: 'STREAM_NOT_FOUND',
      message: 'No control stream for subscriber sub-1: subscriber is not attached to control',
    });
  });

  it('rejects text and non-control frames', async () => {
    const surface = new FakeSurface();
    const client = await connect(await startServer(surface), surface);

    client.ws.send('hello');
    client.ws.send(Buffer.from([0, 1]));

    await vi.waitFor(() => expect(client.messages).toHaveLength(2));
    expect(client.messages.map(m => JSON.parse(m.data.toString()).message)).toEqual([
      'expected a binary control frame',
      'only control frames are accepted',
    ]);
    expect(surface.controls).toEqual([]);
  });

  it('sends the end notice and closes', async () => {
    const surface = new FakeSurface();
    const client = await connect(await startServer(surface), surface);

    await surface.attachedSink().end({
      sessionId: 'session-1',
      serial: 'emulator-5554',
      state: 'crashed',
      reason: 'helper process exited',
      at: 1234,
    });

    await vi.waitFor(() => expect(client.closes).toEqual([[1000, 'crashed']]));
    expect(JSON.parse(client.messages[0].data.toString())).toEqual({
      type: 'session_ended',
      sessionId: 'session-1',
      serial: 'emulator-5554',
      state: 'crashed',
      reason: 'helper process exited',
      timestamp: 1234,
    });
    await vi.waitFor(() => expect(surface.detached).toEqual(['sub-1']));
  });

  it('detaches when the client goes away and rejects later deliveries', async () => {
    const surface = new FakeSurface();
    const client = await connect(await startServer(surface), surface);

    client.ws.close();

    await vi.waitFor(() => expect(surface.detached).toEqual(['sub-1']));
    await expect(surface.attachedSink().deliver('video', new Uint8Array([1]))).rejects.toThrow('WebSocket is not open');
  });
});
