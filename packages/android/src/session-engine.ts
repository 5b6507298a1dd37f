/**
 * Device Session Engine
 * Entry point for callers: devices, sessions and subscribers
 */

import { randomUUID } from 'crypto';
import {
  DeviceNotFoundError,
  KeyedMutex,
  SessionConflictError,
  SessionNotFoundError,
  SessionStartFailedError,
  StreamRouter,
  SubscriberHub,
  errorMessage,
} from '@droidrelay/core';
import type {
  Device,
  DeviceTransport,
  EngineStats,
  SessionSnapshot,
  StreamKind,
  SubscriberSink,
} from '@droidrelay/core';
import { engineConfig } from './config';
import type { EngineConfig } from './config';
import { LinkConnector } from './device-link';
import { DeviceRegistry } from './device-registry';
import { HelperDeployer } from './helper-deployer';
import type { HelperArtifact } from './helper-deployer';
import { buildSessionConfig, sessionDefaults } from './session-config';
import type { SessionConfig } from './session-config';
import { SessionSupervisor } from './session-supervisor';

export interface DeviceSessionEngineOptions {
  transport: DeviceTransport;
  artifact: HelperArtifact;
  /**
   * Overrides for values otherwise read from the environment
   */
  config?: Partial<EngineConfig>;
}

export class DeviceSessionEngine {
  private config: EngineConfig;
  private artifact: HelperArtifact;
  private defaults: SessionConfig;
  private registry: DeviceRegistry;
  private hub: SubscriberHub;
  private router: StreamRouter;
  private deployer = new HelperDeployer();
  private sessions: Map<string, SessionSupervisor> = new Map();
  private sessionsById: Map<string, SessionSupervisor> = new Map();
  // Last snapshot of sessions that stopped and were released
  private retired: Map<string, SessionSnapshot> = new Map();
  private locks = new KeyedMutex();

  constructor(options: DeviceSessionEngineOptions) {
    this.config = { ...engineConfig, ...options.config };
    this.artifact = options.artifact;
    this.defaults = sessionDefaults(this.config);

    const connector = new LinkConnector(options.transport, {
      connectTimeoutMs: this.config.connectTimeout,
      shellTimeoutMs: this.config.shellTimeout,
      retryAttempts: this.config.retryAttempts,
      retryBaseDelayMs: this.config.retryBaseDelay,
      retryMaxDelayMs: this.config.retryMaxDelay,
    });

    this.registry = new DeviceRegistry(options.transport, connector, {
      discoveryIntervalMs: this.config.discoveryInterval,
      discoveryGraceMs: this.config.discoveryGrace,
      evictionAgeMs: this.config.deviceEvictionAge,
      healthCheckIntervalMs: this.config.healthCheckInterval,
      healthCheckFailures: this.config.healthCheckFailures,
      onBeforeDisconnect: serial => this.teardownSession(serial, 'device disconnected'),
    });
    this.registry.on('link-lost', ({ serial, reason }: { serial: string; reason: string }) => {
      this.handleLinkLost(serial, reason);
    });

    this.hub = new SubscriberHub({
      queueSizes: {
        video: this.config.videoQueueSize,
        audio: this.config.audioQueueSize,
        control: this.config.controlQueueSize,
      },
      controlBlockTimeoutMs: this.config.controlBlockTimeout,
    });
    this.hub.on('detached', ({ sessionId }: { sessionId: string }) => this.collect(sessionId));

    this.router = new StreamRouter(this.hub, {
      drainTimeoutMs: this.config.drainTimeout,
      maxSubscribersPerSession: this.config.maxSubscribersPerSession,
    });
  }

  async init(): Promise<void> {
    await this.registry.start();
    console.log('[DeviceSessionEngine] Initialized');
  }

  /**
   * Tear down every session and close every link; failures are logged
   */
  async shutdown(): Promise<void> {
    const supervisors = Array.from(this.sessions.values());

    await Promise.all(supervisors.map(async (supervisor) => {
      try {
        await supervisor.teardown('engine shutdown');
      } catch (error) {
        console.error(`[DeviceSessionEngine] Failed to tear down ${supervisor.sessionId}:`, errorMessage(error));
      }
    }));

    await this.registry.shutdown();
    console.log(`[DeviceSessionEngine] Shut down (${supervisors.length} session(s))`);
  }

  // Sessions

  /**
   * Start a session and wait until it is running
   */
  async startSession(serial: string, overrides: unknown = {}): Promise<string> {
    const config = buildSessionConfig(this.defaults, overrides);
    return this.startWithConfig(serial, config);
  }

  /**
   * Graceful stop; a no-op for a session that already stopped
   */
  async stopSession(serial: string): Promise<void> {
    const supervisor = this.sessions.get(serial);
    if (!supervisor) {
      if (this.retired.has(serial)) return;
      throw new SessionNotFoundError(serial);
    }

    await supervisor.stop();
  }

  getSessionStatus(serial: string): SessionSnapshot | undefined {
    const supervisor = this.sessions.get(serial);
    if (supervisor) {
      return supervisor.snapshot();
    }

    const retired = this.retired.get(serial);
    return retired ? { ...retired, history: [...retired.history], streams: [...retired.streams] } : undefined;
  }

  /**
   * Start a crashed session again under the same session id
   */
  async restartSession(serial: string): Promise<string> {
    const supervisor = this.sessions.get(serial);
    if (!supervisor) {
      throw new SessionNotFoundError(serial);
    }

    const link = await this.locks.withKeyLock(serial, async () => {
      if (supervisor.state !== 'crashed') {
        throw new SessionConflictError(serial, supervisor.sessionId, supervisor.state);
      }
      this.assertCapacity(serial);
      return this.registry.getOrConnect(serial);
    });

    await supervisor.restart(link);
    return supervisor.sessionId;
  }

  /**
   * Apply overrides on top of the current configuration, stop the session and
   * start a new one. Subscribers attach again to the new session id.
   */
  async reconfigureSession(serial: string, overrides: unknown): Promise<string> {
    const current = this.sessions.get(serial);
    if (!current) {
      throw new SessionNotFoundError(serial);
    }

    const config = buildSessionConfig(current.config, overrides);
    await current.stop();
    return this.startWithConfig(serial, config);
  }

  listSessions(): SessionSnapshot[] {
    return Array.from(this.sessions.values(), supervisor => supervisor.snapshot());
  }

  // Streams

  attachSubscriber(sessionId: string, kinds: StreamKind[], sink: SubscriberSink): string {
    if (!this.sessionsById.has(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }

    const subscriberId = randomUUID();
    this.router.attach(sessionId, subscriberId, kinds, sink);
    return subscriberId;
  }

  detachSubscriber(subscriberId: string): void {
    this.router.detach(subscriberId);
  }

  async sendControl(subscriberId: string, bytes: Uint8Array): Promise<void> {
    await this.router.publishControl(subscriberId, bytes);
  }

  // Devices

  listDevices(): Device[] {
    return this.registry.listDevices();
  }

  /**
   * Known device by serial, with whatever details its last connect reported
   */
  getDevice(serial: string): Device {
    const device = this.registry.getDevice(serial);
    if (!device) {
      throw new DeviceNotFoundError(serial);
    }
    return device;
  }

  async connectDevice(serial: string): Promise<Device> {
    await this.registry.getOrConnect(serial);
    const device = this.registry.getDevice(serial);
    if (!device) {
      throw new SessionStartFailedError(serial, 'device vanished while connecting');
    }
    return device;
  }

  async disconnectDevice(serial: string): Promise<void> {
    await this.registry.disconnect(serial);
  }

  stats(): EngineStats {
    const subscribersPerSession: Record<string, number> = {};
    let activeSessions = 0;

    for (const supervisor of this.sessions.values()) {
      if (supervisor.isActive()) activeSessions++;
      subscribersPerSession[supervisor.sessionId] = this.router.subscriberCount(supervisor.sessionId);
    }

    return {
      activeDevices: this.registry.activeLinkCount,
      activeSessions,
      subscribersPerSession,
    };
  }

  private async startWithConfig(serial: string, config: Readonly<SessionConfig>): Promise<string> {
    const { supervisor, link } = await this.locks.withKeyLock(serial, async () => {
      const existing = this.sessions.get(serial);
      if (existing?.isActive()) {
        throw new SessionConflictError(serial, existing.sessionId, existing.state);
      }
      this.assertCapacity(serial);

      const link = await this.registry.getOrConnect(serial);

      if (existing) {
        this.release(existing);
      }
      const supervisor = this.createSupervisor(serial, config);
      return { supervisor, link };
    });

    await supervisor.start(link);
    return supervisor.sessionId;
  }

  private createSupervisor(serial: string, config: Readonly<SessionConfig>): SessionSupervisor {
    const supervisor = new SessionSupervisor({
      sessionId: randomUUID(),
      serial,
      config,
      artifact: this.artifact,
      deployer: this.deployer,
      router: this.router,
      handshakeTimeoutMs: this.config.handshakeTimeout,
      socketRetryDelayMs: this.config.socketRetryDelay,
      stopGraceMs: this.config.stopGrace,
    });

    supervisor.on('state', ({ to }: { to: string }) => {
      if (to === 'stopped') {
        this.collect(supervisor.sessionId);
      }
    });

    this.sessions.set(serial, supervisor);
    this.sessionsById.set(supervisor.sessionId, supervisor);
    this.retired.delete(serial);
    return supervisor;
  }

  private assertCapacity(serial: string): void {
    let active = 0;
    for (const supervisor of this.sessions.values()) {
      if (supervisor.isActive()) active++;
    }

    if (active >= this.config.maxConcurrentSessions) {
      throw new SessionStartFailedError(serial, `limit of ${this.config.maxConcurrentSessions} concurrent sessions reached`);
    }
  }

  /**
   * Release a stopped session once nobody is attached to it
   */
  private collect(sessionId: string): void {
    const supervisor = this.sessionsById.get(sessionId);
    if (!supervisor || supervisor.state !== 'stopped' || this.router.subscriberCount(sessionId) > 0) {
      return;
    }

    this.retired.set(supervisor.serial, supervisor.snapshot());
    this.release(supervisor);
  }

  private release(supervisor: SessionSupervisor): void {
    supervisor.removeAllListeners('state');
    this.sessionsById.delete(supervisor.sessionId);
    if (this.sessions.get(supervisor.serial) === supervisor) {
      this.sessions.delete(supervisor.serial);
    }
    this.router.dropRoute(supervisor.sessionId);
  }

  private async teardownSession(serial: string, reason: string): Promise<void> {
    const supervisor = this.sessions.get(serial);
    if (supervisor) {
      await supervisor.teardown(reason);
    }
  }

  private handleLinkLost(serial: string, reason: string): void {
    const supervisor = this.sessions.get(serial);
    if (!supervisor) return;

    supervisor.notifyLinkLost(reason).catch((error: unknown) => {
      console.error(`[DeviceSessionEngine] Failed to handle link loss on ${serial}:`, errorMessage(error));
    });
  }
}
