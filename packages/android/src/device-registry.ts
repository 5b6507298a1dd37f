/**
 * Device Registry
 * Tracks known devices and their links; reconciles against the transport's
 * reachable set on a polling interval
 */

import { EventEmitter } from 'events';
import {
  DeviceNotFoundError,
  DeviceUnauthorizedError,
  KeyedMutex,
  errorMessage,
} from '@droidrelay/core';
import type { Device, DeviceTransport, LinkState, ReachableDevice } from '@droidrelay/core';
import { transportOf } from './adb-transport';
import { DeviceLink, LinkConnector } from './device-link';

export interface DeviceRegistryOptions {
  discoveryIntervalMs: number;
  discoveryGraceMs: number;
  evictionAgeMs: number;
  healthCheckIntervalMs: number;
  healthCheckFailures: number;
  /**
   * Runs before a device is explicitly disconnected
   */
  onBeforeDisconnect?: (serial: string) => Promise<void>;
  clock?: () => number;
}

/**
 * Events:
 * - 'device-added' (Device)
 * - 'device-state' (Device)
 * - 'device-removed' (serial)
 * - 'link-lost' ({ serial, reason }) when a live link stops working
 */
export class DeviceRegistry extends EventEmitter {
  private transport: DeviceTransport;
  private connector: LinkConnector;
  private options: DeviceRegistryOptions;
  private now: () => number;
  private devices: Map<string, Device> = new Map();
  private links: Map<string, DeviceLink> = new Map();
  private missingSince: Map<string, number> = new Map();
  private locks = new KeyedMutex();
  private pollTimer: NodeJS.Timeout | null = null;
  private polling = false;

  constructor(transport: DeviceTransport, connector: LinkConnector, options: DeviceRegistryOptions) {
    super();
    this.transport = transport;
    this.connector = connector;
    this.options = options;
    this.now = options.clock ?? Date.now;
  }

  /**
   * First discovery pass, then poll on an interval
   */
  async start(): Promise<void> {
    try {
      await this.poll();
    } catch (error) {
      console.error('[DeviceRegistry] Initial discovery failed:', errorMessage(error));
    }

    this.pollTimer = setInterval(() => {
      if (this.polling) return;

      this.poll().catch((error: unknown) => {
        console.error('[DeviceRegistry] Discovery failed:', errorMessage(error));
      });
    }, this.options.discoveryIntervalMs);
  }

  listDevices(): Device[] {
    return Array.from(this.devices.values(), device => ({ ...device }));
  }

  getDevice(serial: string): Device | undefined {
    const device = this.devices.get(serial);
    return device ? { ...device } : undefined;
  }

  /**
   * Live link for a serial, if one is up
   */
  getLink(serial: string): DeviceLink | undefined {
    const link = this.links.get(serial);
    return link?.isValid ? link : undefined;
  }

  get activeLinkCount(): number {
    let count = 0;
    for (const link of this.links.values()) {
      if (link.isValid) count++;
    }
    return count;
  }

  /**
   * Reuse the live link or connect a new one
   */
  async getOrConnect(serial: string): Promise<DeviceLink> {
    return this.locks.withKeyLock(serial, async () => {
      const existing = this.links.get(serial);
      if (existing?.isValid) {
        return existing;
      }
      if (existing) {
        this.links.delete(serial);
        await this.closeLink(existing);
      }

      this.setState(serial, 'connecting');

      try {
        const link = await this.connector.connect(serial);
        this.adopt(serial, link);
        await this.describe(serial, link);
        this.setState(serial, 'connected');
        return link;
      } catch (error) {
        this.setState(serial, this.stateForConnectError(error));
        throw error;
      }
    });
  }

  /**
   * Tear down the device's session, close its link and forget it
   */
  async disconnect(serial: string): Promise<void> {
    if (!this.devices.has(serial) && !this.links.has(serial)) {
      throw new DeviceNotFoundError(serial);
    }

    if (this.options.onBeforeDisconnect) {
      await this.options.onBeforeDisconnect(serial);
    }

    await this.locks.withKeyLock(serial, async () => {
      const link = this.links.get(serial);
      this.links.delete(serial);
      if (link) {
        await this.closeLink(link);
      }

      this.devices.delete(serial);
      this.missingSince.delete(serial);
      console.log(`[DeviceRegistry] Disconnected ${serial}`);
      this.emit('device-removed', serial);
    });
  }

  /**
   * One discovery pass
   */
  async poll(): Promise<void> {
    this.polling = true;
    try {
      const reachable = await this.transport.listReachable();
      const now = this.now();
      const seen = new Set<string>();

      for (const found of reachable) {
        seen.add(found.serial);
        this.missingSince.delete(found.serial);
        this.reconcileReachable(found, now);
      }

      for (const [serial, device] of Array.from(this.devices)) {
        if (seen.has(serial)) continue;

        let since = this.missingSince.get(serial);
        if (since === undefined) {
          since = now;
          this.missingSince.set(serial, since);
        }

        if (device.state !== 'disconnected' && now - since >= this.options.discoveryGraceMs) {
          await this.markVanished(serial);
        }

        if (now - device.lastSeenAt >= this.options.evictionAgeMs) {
          await this.evict(serial);
        }
      }
    } finally {
      this.polling = false;
    }
  }

  /**
   * Stop polling and close every link
   */
  async shutdown(): Promise<void> {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }

    const links = Array.from(this.links.values());
    this.links.clear();
    await Promise.all(links.map(link => this.closeLink(link)));

    for (const device of this.devices.values()) {
      device.state = 'disconnected';
    }
    console.log(`[DeviceRegistry] Shut down, closed ${links.length} link(s)`);
  }

  private reconcileReachable(found: ReachableDevice, now: number): void {
    const existing = this.devices.get(found.serial);

    if (!existing) {
      const device: Device = {
        serial: found.serial,
        transport: found.transport,
        state: this.stateForReachable(found),
        model: found.model,
        lastHealthCheckAt: null,
        lastSeenAt: now,
      };
      this.devices.set(found.serial, device);
      console.log(`[DeviceRegistry] Discovered ${found.serial} (${device.state})`);
      this.emit('device-added', { ...device });
      return;
    }

    existing.lastSeenAt = now;
    existing.model = existing.model ?? found.model;

    if (this.links.get(found.serial)?.isValid || existing.state === 'connecting') {
      return;
    }

    const next = this.stateForReachable(found);
    if (existing.state !== next) {
      this.setState(found.serial, next);
    }
  }

  private async markVanished(serial: string): Promise<void> {
    await this.locks.withKeyLock(serial, async () => {
      const link = this.links.get(serial);
      this.links.delete(serial);
      this.setState(serial, 'disconnected');
      console.warn(`[DeviceRegistry] ${serial} no longer reachable`);

      if (link) {
        await this.closeLink(link);
        this.emit('link-lost', { serial, reason: 'device no longer reachable' });
      }
    });
  }

  private async evict(serial: string): Promise<void> {
    await this.locks.withKeyLock(serial, async () => {
      if (this.links.get(serial)?.isValid) return;

      this.devices.delete(serial);
      this.links.delete(serial);
      this.missingSince.delete(serial);
      console.log(`[DeviceRegistry] Evicted ${serial}`);
      this.emit('device-removed', serial);
    });
  }

  private adopt(serial: string, link: DeviceLink): void {
    this.links.set(serial, link);

    link.on('health', ({ ok }: { ok: boolean }) => {
      const device = this.devices.get(serial);
      if (device) {
        device.lastHealthCheckAt = this.now();
        if (ok && device.state === 'offline' && this.links.get(serial) === link) {
          this.setState(serial, 'connected');
        }
      }
    });

    link.once('lost', (reason: string) => {
      if (this.links.get(serial) !== link) return;

      this.links.delete(serial);
      this.setState(serial, 'offline');
      this.emit('link-lost', { serial, reason });
      this.closeLink(link).catch((error: unknown) => {
        console.error(`[DeviceRegistry] Failed to close lost link ${serial}:`, error);
      });
    });

    link.startHealthChecks({
      intervalMs: this.options.healthCheckIntervalMs,
      failureThreshold: this.options.healthCheckFailures,
    });
  }

  private async describe(serial: string, link: DeviceLink): Promise<void> {
    const details = await link.readDetails();
    const device = this.devices.get(serial);
    if (!device) return;

    device.model = details.model ?? device.model;
    device.manufacturer = details.manufacturer ?? device.manufacturer;
    device.androidVersion = details.androidVersion ?? device.androidVersion;
    device.resolution = details.resolution ?? device.resolution;
  }

  private setState(serial: string, state: LinkState): void {
    let device = this.devices.get(serial);
    if (!device) {
      device = {
        serial,
        transport: transportOf(serial),
        state,
        lastHealthCheckAt: null,
        lastSeenAt: this.now(),
      };
      this.devices.set(serial, device);
      this.emit('device-added', { ...device });
      return;
    }

    if (device.state === state) return;
    device.state = state;
    this.emit('device-state', { ...device });
  }

  private stateForReachable(found: ReachableDevice): LinkState {
    switch (found.state) {
      case 'device':
        return 'discovered';
      case 'unauthorized':
        return 'unauthorized';
      case 'offline':
        return 'offline';
    }
  }

  private stateForConnectError(error: unknown): LinkState {
    if (error instanceof DeviceUnauthorizedError) {
      return 'unauthorized';
    }
    if (error instanceof DeviceNotFoundError) {
      return 'disconnected';
    }
    return 'offline';
  }

  private async closeLink(link: DeviceLink): Promise<void> {
    try {
      await link.close();
    } catch (error) {
      console.error(`[DeviceRegistry] Failed to close link to ${link.serial}:`, errorMessage(error));
    }
  }
}
