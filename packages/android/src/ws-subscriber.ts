/**
 * WebSocket subscriber adapter
 * Binary frames carry a one-byte stream tag; the end-of-session notice and
 * errors go out as JSON text
 */

import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import {
  EngineError,
  createErrorMessage,
  createSessionEndedMessage,
  decodeTaggedFrame,
  encodeTaggedFrame,
  errorMessage,
} from '@droidrelay/core';
import type { StreamKind, SubscriberSink } from '@droidrelay/core';
import type { DeviceSessionEngine } from './session-engine';

export type StreamSurface = Pick<DeviceSessionEngine, 'attachSubscriber' | 'detachSubscriber' | 'sendControl'>;

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) {
    return new Uint8Array(Buffer.concat(data));
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Sink that writes tagged frames to a WebSocket.
 * A send on a socket that is no longer open rejects, which detaches the subscriber.
 */
export function createWebSocketSink(ws: WebSocket): SubscriberSink {
  return {
    deliver(kind: StreamKind, frame: Uint8Array): Promise<void> {
      if (ws.readyState !== WebSocket.OPEN) {
        return Promise.reject(new Error('WebSocket is not open'));
      }

      return new Promise((resolve, reject) => {
        ws.send(encodeTaggedFrame(kind, frame), { binary: true }, (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },

    end(notice): void {
      if (ws.readyState !== WebSocket.OPEN) return;

      ws.send(JSON.stringify(createSessionEndedMessage(notice)));
      ws.close(1000, notice.state);
    },
  };
}

/**
 * Attach a WebSocket to a session. Inbound binary messages tagged as control
 * are forwarded to the device; the subscriber detaches when the socket closes.
 * Returns the subscriber id.
 */
export function bindWebSocketSubscriber(
  surface: StreamSurface,
  ws: WebSocket,
  sessionId: string,
  kinds: StreamKind[]
): string {
  const subscriberId = surface.attachSubscriber(sessionId, kinds, createWebSocketSink(ws));
  console.log(`[WsSubscriber] ${subscriberId} bound to session ${sessionId}`);

  ws.on('message', (data, isBinary) => {
    if (!isBinary) {
      sendError(ws, 'BAD_MESSAGE', 'expected a binary control frame');
      return;
    }

    const decoded = decodeTaggedFrame(toBytes(data));
    if (!decoded || decoded.kind !== 'control') {
      sendError(ws, 'BAD_MESSAGE', 'only control frames are accepted');
      return;
    }

    surface.sendControl(subscriberId, decoded.frame).catch((error: unknown) => {
      const code = error instanceof EngineError ? error.code : 'INTERNAL_ERROR';
      sendError(ws, code, errorMessage(error));
    });
  });

  ws.on('close', () => {
    surface.detachSubscriber(subscriberId);
    console.log(`[WsSubscriber] ${subscriberId} closed`);
  });

  ws.on('error', (error) => {
    console.error(`[WsSubscriber] ${subscriberId} socket error:`, error.message);
  });

  return subscriberId;
}

function sendError(ws: WebSocket, code: string, message: string): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(createErrorMessage(code, message)));
  }
}
