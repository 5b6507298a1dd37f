/**
 * Subscriber Hub
 * Holds attached subscribers and fans frames out to them through one bounded
 * queue and one delivery pump per subscriber per stream kind
 */

import { EventEmitter } from 'events';
import { errorMessage } from './errors';
import { FrameQueue } from './frame-queue';
import { settlesWithin } from './retry';
import type { SubscriberSink } from './interfaces';
import type { StreamKind, SubscriberInfo, TerminalNotice } from './types';

export interface SubscriberHubOptions {
  queueSizes: Record<StreamKind, number>;
  /**
   * How long a device->subscriber control message may wait for queue space
   * before the subscriber is detached
   */
  controlBlockTimeoutMs: number;
}

/**
 * Frames replayed to a subscriber before live frames, per kind
 */
export type StreamPreamble = Partial<Record<StreamKind, Uint8Array[]>>;

interface SubscriberChannel {
  queue: FrameQueue<Uint8Array>;
  pump: Promise<void>;
}

interface SubscriberEntry {
  id: string;
  sessionId: string;
  kinds: StreamKind[];
  sink: SubscriberSink;
  attachedAt: number;
  channels: Map<StreamKind, SubscriberChannel>;
  /** set once the session's terminal notice is on its way */
  ending: boolean;
  ended: boolean;
}

export class SubscriberHub extends EventEmitter {
  private readonly options: SubscriberHubOptions;
  private subscribers: Map<string, SubscriberEntry> = new Map();
  private bySession: Map<string, Set<string>> = new Map();

  constructor(options: SubscriberHubOptions) {
    super();
    this.options = options;
  }

  /**
   * Register a subscriber and start its delivery pumps.
   * Preamble frames are queued ahead of anything broadcast afterwards and are
   * never dropped for a slow subscriber.
   */
  add(subscriberId: string, sessionId: string, kinds: StreamKind[], sink: SubscriberSink, preamble: StreamPreamble = {}): void {
    if (this.subscribers.has(subscriberId)) {
      throw new Error(`Subscriber ${subscriberId} is already attached`);
    }

    const entry: SubscriberEntry = {
      id: subscriberId,
      sessionId,
      kinds: [...kinds],
      sink,
      attachedAt: Date.now(),
      channels: new Map(),
      ending: false,
      ended: false,
    };

    for (const kind of entry.kinds) {
      const queue = new FrameQueue<Uint8Array>(this.options.queueSizes[kind]);
      for (const frame of preamble[kind] ?? []) {
        queue.pushPinned(frame);
      }
      entry.channels.set(kind, { queue, pump: this.pump(entry, kind, queue) });
    }

    this.subscribers.set(subscriberId, entry);
    let ids = this.bySession.get(sessionId);
    if (!ids) {
      ids = new Set();
      this.bySession.set(sessionId, ids);
    }
    ids.add(subscriberId);

    console.log(`[SubscriberHub] ${subscriberId} attached to ${sessionId} (${entry.kinds.join(',')}), ${ids.size} subscriber(s)`);
  }

  /**
   * Detach a subscriber and discard its queued frames. Idempotent.
   */
  remove(subscriberId: string, reason: string): boolean {
    const entry = this.subscribers.get(subscriberId);
    if (!entry) {
      return false;
    }

    this.release(entry);
    console.log(`[SubscriberHub] ${subscriberId} detached from ${entry.sessionId}: ${reason}`);
    this.emit('detached', { subscriberId, sessionId: entry.sessionId, reason });
    return true;
  }

  /**
   * Queue a frame for every subscriber of the session attached to this kind.
   * Video/audio never wait: a full queue loses its oldest frame.
   * Control waits for space up to controlBlockTimeoutMs per subscriber, and a
   * subscriber that stays full is detached.
   */
  async broadcast(sessionId: string, kind: StreamKind, frame: Uint8Array): Promise<void> {
    const targets = this.entriesFor(sessionId).filter(entry => entry.channels.has(kind));

    if (kind !== 'control') {
      for (const entry of targets) {
        entry.channels.get(kind)?.queue.push(frame);
      }
      return;
    }

    await Promise.all(targets.map(async (entry) => {
      const channel = entry.channels.get(kind);
      if (!channel) return;

      const accepted = await channel.queue.pushOrWait(frame, this.options.controlBlockTimeoutMs);
      if (!accepted && !entry.ended && !entry.ending) {
        console.warn(`[SubscriberHub] ${entry.id} control queue stayed full for ${this.options.controlBlockTimeoutMs}ms`);
        this.remove(entry.id, 'control queue overflow');
      }
    }));
  }

  /**
   * Deliver the terminal notice to every subscriber of a session.
   * Queued frames drain first, for at most drainTimeoutMs; whatever is left
   * after that is discarded.
   */
  async end(sessionId: string, notice: TerminalNotice, drainTimeoutMs: number): Promise<void> {
    const entries = this.entriesFor(sessionId);
    if (entries.length === 0) {
      return;
    }

    const pumps: Promise<void>[] = [];
    for (const entry of entries) {
      entry.ending = true;
      for (const channel of entry.channels.values()) {
        channel.queue.close();
        pumps.push(channel.pump);
      }
    }

    if (!(await settlesWithin(Promise.all(pumps), drainTimeoutMs))) {
      console.warn(`[SubscriberHub] Drain for ${sessionId} exceeded ${drainTimeoutMs}ms, discarding queued frames`);
    }

    await Promise.all(entries.map(async (entry) => {
      if (entry.ended) return;
      this.release(entry);

      try {
        await entry.sink.end(notice);
      } catch (error) {
        console.warn(`[SubscriberHub] Failed to deliver end of ${sessionId} to ${entry.id}:`, errorMessage(error));
      }
    }));
  }

  has(subscriberId: string): boolean {
    return this.subscribers.has(subscriberId);
  }

  get(subscriberId: string): SubscriberInfo | undefined {
    const entry = this.subscribers.get(subscriberId);
    return entry ? this.toInfo(entry) : undefined;
  }

  listBySession(sessionId: string): SubscriberInfo[] {
    return this.entriesFor(sessionId).map(entry => this.toInfo(entry));
  }

  countBySession(sessionId: string): number {
    return this.bySession.get(sessionId)?.size ?? 0;
  }

  get size(): number {
    return this.subscribers.size;
  }

  private async pump(entry: SubscriberEntry, kind: StreamKind, queue: FrameQueue<Uint8Array>): Promise<void> {
    for (;;) {
      const frame = await queue.take();
      if (frame === undefined || entry.ended) {
        return;
      }

      try {
        await entry.sink.deliver(kind, frame);
      } catch (error) {
        if (!entry.ended) {
          console.warn(`[SubscriberHub] Delivery of ${kind} to ${entry.id} failed:`, errorMessage(error));
          this.remove(entry.id, `delivery failed: ${errorMessage(error)}`);
        }
        return;
      }
    }
  }

  private release(entry: SubscriberEntry): void {
    entry.ended = true;
    for (const channel of entry.channels.values()) {
      channel.queue.close();
      channel.queue.clear();
    }

    this.subscribers.delete(entry.id);
    const ids = this.bySession.get(entry.sessionId);
    ids?.delete(entry.id);
    if (ids?.size === 0) {
      this.bySession.delete(entry.sessionId);
    }
  }

  private entriesFor(sessionId: string): SubscriberEntry[] {
    const entries: SubscriberEntry[] = [];
    for (const id of this.bySession.get(sessionId) ?? []) {
      const entry = this.subscribers.get(id);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  private toInfo(entry: SubscriberEntry): SubscriberInfo {
    const dropped: Record<StreamKind, number> = { video: 0, audio: 0, control: 0 };
    for (const [kind, channel] of entry.channels) {
      dropped[kind] = channel.queue.dropped;
    }

    return {
      subscriberId: entry.id,
      sessionId: entry.sessionId,
      kinds: [...entry.kinds],
      attachedAt: entry.attachedAt,
      ended: entry.ended,
      dropped,
    };
  }
}
