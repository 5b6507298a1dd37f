/**
 * Stream Router
 * Binds sessions to the subscriber hub: inbound frames from the device fan
 * out to subscribers, control bytes from subscribers go to the device
 */

import {
  SessionNotFoundError,
  StreamNotFoundError,
  SubscriberAttachFailedError,
  errorMessage,
} from './errors';
import { AsyncMutex } from './mutex';
import type { SubscriberSink } from './interfaces';
import type { StreamPreamble, SubscriberHub } from './subscriber-hub';
import type { StreamKind, SubscriberInfo, TerminalNotice } from './types';

/**
 * Writes control bytes to the device
 */
export type ControlWriter = (bytes: Uint8Array) => Promise<void>;

export interface StreamRouterOptions {
  drainTimeoutMs: number;
  maxSubscribersPerSession: number;
}

interface Route {
  sessionId: string;
  serial: string;
  kinds: Set<StreamKind>;
  accepting: boolean;
  closed: boolean;
  preamble: StreamPreamble;
  control: ControlWriter | null;
  controlLock: AsyncMutex;
}

export class StreamRouter {
  private readonly hub: SubscriberHub;
  private readonly options: StreamRouterOptions;
  private routes: Map<string, Route> = new Map();

  constructor(hub: SubscriberHub, options: StreamRouterOptions) {
    this.hub = hub;
    this.options = options;
  }

  /**
   * Create (or reset, on restart) the route of a session
   */
  openRoute(sessionId: string, serial: string, kinds: StreamKind[]): void {
    const existing = this.routes.get(sessionId);
    this.routes.set(sessionId, {
      sessionId,
      serial,
      kinds: new Set(kinds),
      accepting: true,
      closed: false,
      preamble: {},
      control: null,
      controlLock: existing?.controlLock ?? new AsyncMutex(),
    });
  }

  /**
   * Set or clear the device control writer of a session
   */
  bindControl(sessionId: string, writer: ControlWriter | null): void {
    const route = this.routes.get(sessionId);
    if (route) {
      route.control = writer;
    }
  }

  /**
   * Replace the frames replayed to subscribers attaching later
   */
  setPreamble(sessionId: string, kind: StreamKind, frames: Uint8Array[]): void {
    const route = this.routes.get(sessionId);
    if (route) {
      route.preamble[kind] = [...frames];
    }
  }

  attach(sessionId: string, subscriberId: string, kinds: StreamKind[], sink: SubscriberSink): SubscriberInfo {
    const route = this.routes.get(sessionId);
    if (!route) {
      throw new SessionNotFoundError(sessionId);
    }

    if (route.closed) {
      throw new SubscriberAttachFailedError(sessionId, 'session has ended');
    }

    const unique = [...new Set(kinds)];
    if (unique.length === 0) {
      throw new SubscriberAttachFailedError(sessionId, 'no stream kinds requested');
    }

    const missing = unique.find(kind => !route.kinds.has(kind));
    if (missing) {
      throw new SubscriberAttachFailedError(sessionId, `session does not stream ${missing}`);
    }

    if (this.hub.countBySession(sessionId) >= this.options.maxSubscribersPerSession) {
      throw new SubscriberAttachFailedError(sessionId, `subscriber limit of ${this.options.maxSubscribersPerSession} reached`);
    }

    if (this.hub.has(subscriberId)) {
      throw new SubscriberAttachFailedError(sessionId, `subscriber ${subscriberId} is already attached`);
    }

    this.hub.add(subscriberId, sessionId, unique, sink, route.preamble);
    const info = this.hub.get(subscriberId);
    if (!info) {
      throw new SubscriberAttachFailedError(sessionId, 'subscriber detached during attach');
    }
    return info;
  }

  /**
   * Idempotent
   */
  detach(subscriberId: string): void {
    this.hub.remove(subscriberId, 'detached');
  }

  /**
   * Fan a device frame out to the session's subscribers.
   * Discarded once the route has stopped accepting.
   */
  async publishInbound(sessionId: string, kind: StreamKind, frame: Uint8Array): Promise<void> {
    const route = this.routes.get(sessionId);
    if (!route?.accepting) {
      return;
    }

    await this.hub.broadcast(sessionId, kind, frame);
  }

  /**
   * Forward a subscriber's control event to the device.
   * Writes for one session never interleave.
   */
  async publishControl(subscriberId: string, bytes: Uint8Array): Promise<void> {
    const info = this.hub.get(subscriberId);
    if (!info || info.ended) {
      throw new StreamNotFoundError(subscriberId, 'subscriber is not attached');
    }

    if (!info.kinds.includes('control')) {
      throw new StreamNotFoundError(subscriberId, 'subscriber is not attached to control');
    }

    const route = this.routes.get(info.sessionId);
    if (!route) {
      throw new StreamNotFoundError(subscriberId, 'session has no route');
    }

    await route.controlLock.withLock(async () => {
      const writer = route.control;
      if (!route.accepting || !writer) {
        throw new StreamNotFoundError(subscriberId, 'session has no live control socket');
      }

      try {
        await writer(bytes);
      } catch (error) {
        throw new StreamNotFoundError(subscriberId, `control write failed: ${errorMessage(error)}`, { cause: error });
      }
    });
  }

  /**
   * Stop accepting frames, drain subscribers and send each the terminal notice.
   * Safe to call more than once; later calls are no-ops.
   */
  async closeRoute(sessionId: string, notice: TerminalNotice): Promise<void> {
    const route = this.routes.get(sessionId);
    if (!route || route.closed) {
      return;
    }

    route.accepting = false;
    route.closed = true;
    route.control = null;

    await this.hub.end(sessionId, notice, this.options.drainTimeoutMs);
  }

  /**
   * Forget a session's route; subscribers still attached are detached
   */
  dropRoute(sessionId: string): void {
    for (const info of this.hub.listBySession(sessionId)) {
      this.hub.remove(info.subscriberId, 'session removed');
    }
    this.routes.delete(sessionId);
  }

  hasRoute(sessionId: string): boolean {
    return this.routes.has(sessionId);
  }

  isAccepting(sessionId: string): boolean {
    return this.routes.get(sessionId)?.accepting ?? false;
  }

  subscriberCount(sessionId: string): number {
    return this.hub.countBySession(sessionId);
  }

  listSubscribers(sessionId: string): SubscriberInfo[] {
    return this.hub.listBySession(sessionId);
  }
}
