/**
 * Session Supervisor
 * Owns one run of scrcpy-server on a device: deploys it, spawns it, connects
 * its sockets, and drives the session state machine.
 * Every state change goes through one mutex-guarded mailbox per session.
 */

import { EventEmitter } from 'events';
import {
  AsyncMutex,
  DeployFailedError,
  LinkTimeoutError,
  SessionCrashedError,
  SessionStartFailedError,
  abortable,
  delay,
  errorMessage,
  settlesWithin,
  withTimeout,
} from '@droidrelay/core';
import type {
  DeviceSocket,
  RemoteProcess,
  SessionSnapshot,
  SessionState,
  StreamKind,
  StreamRouter,
  TerminalNotice,
} from '@droidrelay/core';
import type { DeviceLink } from './device-link';
import type { HelperArtifact, HelperDeployer } from './helper-deployer';
import {
  CODEC_META_LENGTH,
  DEVICE_NAME_LENGTH,
  FrameSplitter,
  SocketReader,
  parseDeviceName,
  parseVideoCodecMeta,
} from './helper-protocol';
import type { HelperPacket } from './helper-protocol';
import {
  enabledStreams,
  generateScid,
  helperSocketName,
  toHelperCommand,
} from './session-config';
import type { SessionConfig } from './session-config';

/**
 * Order in which the supervisor connects into the helper's socket.
 * The helper writes the device name header on whichever connects first.
 */
export const SOCKET_OPEN_ORDER: readonly StreamKind[] = ['control', 'video', 'audio'];

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  idle: ['deploying', 'stopped'],
  deploying: ['starting', 'stopped'],
  starting: ['running', 'crashed', 'stopped'],
  running: ['stopping', 'crashed', 'stopped'],
  stopping: ['stopped'],
  stopped: [],
  crashed: ['idle', 'stopped'],
};

type SupervisorEvent =
  | { type: 'process_exited'; generation: number }
  | { type: 'socket_closed'; generation: number; kind: StreamKind; error: unknown }
  | { type: 'link_lost'; reason: string }
  | { type: 'stop' }
  | { type: 'teardown'; reason: string };

export interface SessionSupervisorOptions {
  sessionId: string;
  serial: string;
  config: Readonly<SessionConfig>;
  artifact: HelperArtifact;
  deployer: HelperDeployer;
  router: StreamRouter;
  handshakeTimeoutMs: number;
  socketRetryDelayMs: number;
  stopGraceMs: number;
}

interface KindPreamble {
  meta?: Uint8Array;
  config?: Uint8Array;
}

/**
 * Events:
 * - 'state' ({ sessionId, serial, from, to })
 */
export class SessionSupervisor extends EventEmitter {
  readonly sessionId: string;
  readonly serial: string;
  readonly config: Readonly<SessionConfig>;
  readonly createdAt = Date.now();

  private options: SessionSupervisorOptions;
  private router: StreamRouter;
  private currentState: SessionState = 'idle';
  private history: SessionState[] = ['idle'];
  private link: DeviceLink | null = null;
  private process: RemoteProcess | null = null;
  private sockets: Map<StreamKind, DeviceSocket> = new Map();
  private scid: string | null = null;
  private deviceName: string | null = null;
  private startedAt: number | null = null;
  private lastCrashReason: string | null = null;
  private lastError: string | null = null;
  private preamble: Partial<Record<StreamKind, KindPreamble>> = {};
  private mailbox = new AsyncMutex();
  private startAbort: AbortController | null = null;
  private stopRequested = false;
  private generation = 0;

  constructor(options: SessionSupervisorOptions) {
    super();
    this.options = options;
    this.sessionId = options.sessionId;
    this.serial = options.serial;
    this.config = options.config;
    this.router = options.router;
    this.router.openRoute(this.sessionId, this.serial, enabledStreams(this.config));
  }

  get state(): SessionState {
    return this.currentState;
  }

  isTerminal(): boolean {
    return this.currentState === 'stopped' || this.currentState === 'crashed';
  }

  isActive(): boolean {
    return !this.isTerminal();
  }

  snapshot(): SessionSnapshot {
    return {
      sessionId: this.sessionId,
      serial: this.serial,
      state: this.currentState,
      history: [...this.history],
      streams: enabledStreams(this.config),
      deviceName: this.deviceName,
      createdAt: this.createdAt,
      startedAt: this.startedAt,
      lastCrashReason: this.lastCrashReason,
      lastError: this.lastError,
      subscriberCount: this.router.subscriberCount(this.sessionId),
    };
  }

  /**
   * Deploy, spawn and connect. Resolves once running; rejects with
   * DeployFailedError or SessionStartFailedError, leaving the session
   * stopped or crashed.
   */
  async start(link: DeviceLink): Promise<void> {
    const { generation, signal } = await this.mailbox.withLock(async () => {
      if (this.currentState !== 'idle') {
        throw new SessionStartFailedError(this.serial, `session is ${this.currentState}`);
      }

      this.link = link;
      this.stopRequested = false;
      this.lastError = null;
      this.startAbort = new AbortController();
      this.generation++;
      this.transition('deploying');
      return { generation: this.generation, signal: this.startAbort.signal };
    });

    try {
      await abortable(this.options.deployer.deploy(link, this.options.artifact), signal);
    } catch (error) {
      await this.mailbox.withLock(async () => {
        if (generation !== this.generation || this.isTerminal()) return;

        if (this.stopRequested) {
          await this.teardownSequence(null);
        } else {
          this.lastError = errorMessage(error);
          await this.teardownSequence(this.lastError);
        }
      });
      throw this.startFailure(error);
    }

    try {
      await this.mailbox.withLock(async () => {
        this.assertStillStarting(generation, 'deploying', signal);
        this.transition('starting');
      });

      await this.launch(link, generation, signal);

      await this.mailbox.withLock(async () => {
        this.assertStillStarting(generation, 'starting', signal);
        this.startAbort = null;
        this.startedAt = Date.now();
        this.transition('running');
      });
    } catch (error) {
      await this.mailbox.withLock(async () => {
        if (generation !== this.generation) return;

        if (this.stopRequested && !this.isTerminal()) {
          await this.teardownSequence(null);
        } else if (!this.isTerminal()) {
          await this.crashSequence(errorMessage(error));
        }
        // A socket connected while the start was being aborted
        await this.releaseSockets();
      });
      throw this.startFailure(error);
    }
  }

  /**
   * Graceful stop. Succeeds without side effects on a stopped session.
   */
  async stop(): Promise<void> {
    this.requestStop('stopped before start completed');
    await this.post({ type: 'stop' });
  }

  /**
   * Forced stop (device disconnect, engine shutdown)
   */
  async teardown(reason: string): Promise<void> {
    this.requestStop(reason);
    await this.post({ type: 'teardown', reason });
  }

  /**
   * Bring a crashed session back up on a fresh link
   */
  async restart(link: DeviceLink): Promise<void> {
    await this.mailbox.withLock(async () => {
      if (this.currentState !== 'crashed') {
        throw new SessionStartFailedError(this.serial, `only a crashed session can be restarted, session is ${this.currentState}`);
      }

      this.transition('idle');
      this.process = null;
      this.scid = null;
      this.deviceName = null;
      this.startedAt = null;
      this.preamble = {};
      this.router.openRoute(this.sessionId, this.serial, enabledStreams(this.config));
    });

    await this.start(link);
  }

  notifyLinkLost(reason: string): Promise<void> {
    return this.post({ type: 'link_lost', reason });
  }

  private requestStop(reason: string): void {
    this.stopRequested = true;
    this.startAbort?.abort(new SessionStartFailedError(this.serial, reason));
    this.startAbort = null;
  }

  private post(event: SupervisorEvent): Promise<void> {
    return this.mailbox.withLock(() => this.handle(event));
  }

  private async handle(event: SupervisorEvent): Promise<void> {
    switch (event.type) {
      case 'process_exited':
        if (event.generation !== this.generation) return;
        if (this.currentState === 'starting' || this.currentState === 'running') {
          await this.crashSequence('helper process exited');
        }
        return;

      case 'socket_closed':
        if (event.generation !== this.generation) return;
        if (this.currentState === 'starting' || this.currentState === 'running') {
          const detail = event.error === undefined ? '' : `: ${errorMessage(event.error)}`;
          await this.crashSequence(`${event.kind} socket closed${detail}`);
        }
        return;

      case 'link_lost':
        if (this.currentState === 'starting' || this.currentState === 'running') {
          await this.crashSequence(`link lost: ${event.reason}`);
        } else if (this.currentState === 'idle' || this.currentState === 'deploying') {
          this.lastError = `link lost: ${event.reason}`;
          await this.teardownSequence(this.lastError);
        }
        return;

      case 'stop':
        await this.handleStop();
        return;

      case 'teardown':
        if (this.currentState !== 'stopped') {
          await this.teardownSequence(event.reason);
        }
        return;
    }
  }

  private async handleStop(): Promise<void> {
    switch (this.currentState) {
      case 'stopped':
      case 'stopping':
        return;
      case 'crashed':
        this.transition('stopped');
        return;
      case 'running':
        await this.stopSequence();
        return;
      case 'idle':
      case 'deploying':
      case 'starting':
        await this.teardownSequence(null);
        return;
    }
  }

  /**
   * Spawn the helper, connect its sockets and wait for the device name header
   */
  private async launch(link: DeviceLink, generation: number, signal: AbortSignal): Promise<void> {
    const { handshakeTimeoutMs } = this.options;
    const scid = generateScid();
    this.scid = scid;

    const command = toHelperCommand(this.config, { remotePath: this.options.artifact.remotePath, scid });
    console.log(`[SessionSupervisor] Starting helper on ${this.serial}: ${command}`);

    const helper = await abortable(link.spawnProcess(command), signal);
    this.process = helper;
    this.watchProcess(helper, generation);

    const deadline = Date.now() + handshakeTimeoutMs;
    const socketName = helperSocketName(scid);
    const readers: Array<[StreamKind, SocketReader]> = [];

    for (const kind of SOCKET_OPEN_ORDER) {
      if (!this.config[kind]) continue;

      const socket = await this.connectSocket(link, socketName, deadline, signal);
      this.sockets.set(kind, socket);
      readers.push([kind, new SocketReader(socket.chunks())]);
    }

    const [first] = readers;
    if (!first) {
      throw new SessionStartFailedError(this.serial, 'no stream enabled');
    }

    const header = await withTimeout(
      abortable(first[1].readExactly(DEVICE_NAME_LENGTH), signal),
      Math.max(0, deadline - Date.now()),
      () => new LinkTimeoutError(this.serial, 'helper handshake', handshakeTimeoutMs)
    );
    this.deviceName = parseDeviceName(header);
    console.log(`[SessionSupervisor] Helper ready on ${this.serial} (device "${this.deviceName}")`);

    for (const [kind, reader] of readers) {
      this.pumpSocket(kind, reader, generation);
    }

    const control = this.sockets.get('control');
    if (control) {
      this.router.bindControl(this.sessionId, bytes => control.write(bytes));
    }
  }

  /**
   * The helper binds its socket some time after the process starts, so
   * connect attempts are retried until the handshake deadline. A connect that
   * is still pending at the deadline is abandoned and closed if it lands later.
   */
  private async connectSocket(link: DeviceLink, name: string, deadline: number, signal: AbortSignal): Promise<DeviceSocket> {
    for (let attempt = 1; ; attempt++) {
      const opening = link.openSocket(name);
      let timedOut = false;

      try {
        return await withTimeout(
          abortable(opening, signal),
          Math.max(0, deadline - Date.now()),
          () => {
            timedOut = true;
            return new LinkTimeoutError(this.serial, `connect to ${name}`, this.options.handshakeTimeoutMs);
          }
        );
      } catch (error) {
        if (signal.aborted || timedOut) {
          opening.then(socket => socket.close()).catch((closeError: unknown) => {
            console.warn(`[SessionSupervisor] Late socket on ${this.serial} not closed:`, errorMessage(closeError));
          });
          throw error;
        }

        if (Date.now() + this.options.socketRetryDelayMs >= deadline) {
          console.warn(`[SessionSupervisor] Giving up on ${name} after ${attempt} attempt(s):`, errorMessage(error));
          throw new LinkTimeoutError(this.serial, `connect to ${name}`, this.options.handshakeTimeoutMs);
        }
      }

      await abortable(delay(this.options.socketRetryDelayMs), signal);
    }
  }

  private watchProcess(helper: RemoteProcess, generation: number): void {
    helper.exited
      .then(
        () => this.post({ type: 'process_exited', generation }),
        () => this.post({ type: 'process_exited', generation })
      )
      .catch((error: unknown) => {
        console.error(`[SessionSupervisor] Failed to handle helper exit for ${this.sessionId}:`, error);
      });
  }

  /**
   * Read a socket until it ends, publishing what arrives
   */
  private pumpSocket(kind: StreamKind, reader: SocketReader, generation: number): void {
    this.readSocket(kind, reader)
      .then(
        () => this.post({ type: 'socket_closed', generation, kind, error: undefined }),
        (error: unknown) => this.post({ type: 'socket_closed', generation, kind, error })
      )
      .catch((error: unknown) => {
        console.error(`[SessionSupervisor] Failed to handle ${kind} socket close for ${this.sessionId}:`, error);
      });
  }

  private async readSocket(kind: StreamKind, reader: SocketReader): Promise<void> {
    if (kind === 'control') {
      for await (const chunk of reader.rest()) {
        await this.router.publishInbound(this.sessionId, kind, chunk);
      }
      return;
    }

    const splitter = new FrameSplitter(CODEC_META_LENGTH[kind], this.config.sendFrameMeta);
    for await (const chunk of reader.rest()) {
      for (const packet of splitter.push(chunk)) {
        this.rememberPreamble(kind, packet);
        await this.router.publishInbound(this.sessionId, kind, packet.bytes);
      }
    }
  }

  /**
   * Keep the codec header and latest config packet for late subscribers
   */
  private rememberPreamble(kind: 'video' | 'audio', packet: HelperPacket): void {
    const entry = this.preamble[kind] ?? {};

    if (packet.type === 'meta') {
      entry.meta = packet.bytes;
      if (kind === 'video') {
        const meta = parseVideoCodecMeta(packet.bytes);
        console.log(`[SessionSupervisor] ${this.serial} video: ${meta.codec} ${meta.width}x${meta.height}`);
      }
    } else if (packet.config) {
      entry.config = packet.bytes;
    } else {
      return;
    }

    this.preamble[kind] = entry;
    const frames: Uint8Array[] = [];
    if (entry.meta) frames.push(entry.meta);
    if (entry.config) frames.push(entry.config);
    this.router.setPreamble(this.sessionId, kind, frames);
  }

  private assertStillStarting(generation: number, expected: SessionState, signal: AbortSignal): void {
    if (signal.aborted) {
      throw signal.reason instanceof Error ? signal.reason : new Error('start aborted');
    }
    if (generation !== this.generation || this.currentState !== expected) {
      throw new SessionStartFailedError(this.serial, `session became ${this.currentState}`);
    }
  }

  private startFailure(error: unknown): Error {
    if (error instanceof DeployFailedError || error instanceof SessionStartFailedError) {
      return error;
    }
    return new SessionStartFailedError(this.serial, this.lastCrashReason ?? errorMessage(error), { cause: error });
  }

  // Sequences below run inside the mailbox

  private async crashSequence(reason: string): Promise<void> {
    this.lastCrashReason = reason;
    this.transition('crashed');
    this.startAbort?.abort(new SessionCrashedError(this.serial, reason));
    this.startAbort = null;
    console.error(`[SessionSupervisor] Session ${this.sessionId} on ${this.serial} crashed: ${reason}`);

    await this.router.closeRoute(this.sessionId, this.notice('crashed', reason));
    await this.releaseSockets();
    await this.terminateProcess();
  }

  private async stopSequence(): Promise<void> {
    this.transition('stopping');
    await this.router.closeRoute(this.sessionId, this.notice('stopped', null));
    await this.releaseSockets();
    await this.terminateProcess();
    this.transition('stopped');
  }

  private async teardownSequence(reason: string | null): Promise<void> {
    this.startAbort?.abort(new SessionStartFailedError(this.serial, reason ?? 'stopped before start completed'));
    this.startAbort = null;

    await this.router.closeRoute(this.sessionId, this.notice('stopped', reason));
    await this.releaseSockets();
    await this.terminateProcess();
    this.transition('stopped');
  }

  private async releaseSockets(): Promise<void> {
    this.router.bindControl(this.sessionId, null);

    const sockets = Array.from(this.sockets.entries());
    this.sockets.clear();

    await Promise.all(sockets.map(async ([kind, socket]) => {
      try {
        await socket.close();
      } catch (error) {
        console.warn(`[SessionSupervisor] Failed to close ${kind} socket on ${this.serial}:`, errorMessage(error));
      }
    }));
  }

  /**
   * Ask the helper to exit; force-kill it by scid once the grace period passes
   */
  private async terminateProcess(): Promise<void> {
    const helper = this.process;
    const scid = this.scid;
    const link = this.link;
    this.process = null;
    this.scid = null;

    if (!link?.isValid) {
      return;
    }

    let exited = false;
    if (helper) {
      try {
        await helper.kill();
      } catch (error) {
        console.warn(`[SessionSupervisor] Failed to signal helper on ${this.serial}:`, errorMessage(error));
      }
      exited = await settlesWithin(helper.exited, this.options.stopGraceMs);
    }

    if (!exited && scid) {
      console.warn(`[SessionSupervisor] Helper on ${this.serial} did not exit in ${this.options.stopGraceMs}ms, force killing`);
      try {
        await link.execShell(`pkill -9 -f scid=${scid}`);
      } catch (error) {
        console.warn(`[SessionSupervisor] Force kill failed on ${this.serial}:`, errorMessage(error));
      }
    }
  }

  private transition(next: SessionState): void {
    const from = this.currentState;
    if (!TRANSITIONS[from].includes(next)) {
      throw new Error(`Invalid session transition ${from} -> ${next}`);
    }

    this.currentState = next;
    this.history.push(next);
    console.log(`[SessionSupervisor] ${this.sessionId} (${this.serial}): ${from} -> ${next}`);
    this.emit('state', { sessionId: this.sessionId, serial: this.serial, from, to: next });
  }

  private notice(state: 'stopped' | 'crashed', reason: string | null): TerminalNotice {
    return { sessionId: this.sessionId, serial: this.serial, state, reason, at: Date.now() };
  }
}
