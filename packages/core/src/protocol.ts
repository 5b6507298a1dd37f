/**
 * Subscriber-facing wire constants and message types
 * Media bytes pass through untouched; this only tags and frames them
 */

import type { StreamKind, TerminalNotice } from './types';

/**
 * One-byte tag prepended to each binary frame sent to a multiplexed subscriber
 */
export const STREAM_TAG = {
  video: 0,
  audio: 1,
  control: 2,
} as const satisfies Record<StreamKind, number>;

/**
 * Message types for JSON text messages to subscribers
 */
export const MESSAGE_TYPE = {
  SESSION_ENDED: 'session_ended',
  ERROR: 'error',
} as const;

/**
 * Sent once when the session a subscriber is attached to stops or crashes
 */
export interface SessionEndedMessage {
  type: 'session_ended';
  sessionId: string;
  serial: string;
  state: 'stopped' | 'crashed';
  reason: string | null;
  timestamp: number;
}

/**
 * Sent when a subscriber request is rejected
 */
export interface ErrorMessage {
  type: 'error';
  code: string;
  message: string;
}

export function createSessionEndedMessage(notice: TerminalNotice): SessionEndedMessage {
  return {
    type: 'session_ended',
    sessionId: notice.sessionId,
    serial: notice.serial,
    state: notice.state,
    reason: notice.reason,
    timestamp: notice.at,
  };
}

export function createErrorMessage(code: string, message: string): ErrorMessage {
  return { type: 'error', code, message };
}

/**
 * Prefix a frame with its stream tag
 */
export function encodeTaggedFrame(kind: StreamKind, frame: Uint8Array): Uint8Array {
  const out = new Uint8Array(frame.byteLength + 1);
  out[0] = STREAM_TAG[kind];
  out.set(frame, 1);
  return out;
}

/**
 * Split a tagged frame; undefined for an empty message or an unknown tag
 */
export function decodeTaggedFrame(message: Uint8Array): { kind: StreamKind; frame: Uint8Array } | undefined {
  if (message.byteLength === 0) {
    return undefined;
  }

  const kind = streamKindForTag(message[0]);
  if (!kind) {
    return undefined;
  }

  return { kind, frame: message.subarray(1) };
}

function streamKindForTag(tag: number): StreamKind | undefined {
  switch (tag) {
    case STREAM_TAG.video:
      return 'video';
    case STREAM_TAG.audio:
      return 'audio';
    case STREAM_TAG.control:
      return 'control';
    default:
      return undefined;
  }
}
