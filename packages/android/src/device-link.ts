/**
 * Device Link
 * One live transport connection to a device, with bounded shell calls and a
 * periodic health probe
 */

import { EventEmitter } from 'events';
import {
  EngineError,
  LinkDisconnectedError,
  LinkTimeoutError,
  PermissionDeniedError,
  errorMessage,
  isTransientError,
  retryWithBackoff,
  withTimeout,
} from '@droidrelay/core';
import type {
  DeviceDetails,
  DeviceSocket,
  DeviceTransport,
  LinkCapabilities,
  RemoteProcess,
  Resolution,
  TransportConnection,
  TransportParams,
} from '@droidrelay/core';

export interface HealthCheckOptions {
  intervalMs: number;
  failureThreshold: number;
}

/**
 * Events:
 * - 'health' ({ serial, ok, consecutiveFailures })
 * - 'lost' (reason) once health checks give up; the link is invalid afterwards
 */
export class DeviceLink extends EventEmitter {
  readonly serial: string;
  private connection: TransportConnection;
  private shellTimeoutMs: number;
  private valid = true;
  private closed = false;
  private healthTimer: NodeJS.Timeout | null = null;
  private checking = false;
  private consecutiveFailures = 0;
  private lastHealthCheckAt: number | null = null;

  constructor(connection: TransportConnection, shellTimeoutMs: number) {
    super();
    this.serial = connection.serial;
    this.connection = connection;
    this.shellTimeoutMs = shellTimeoutMs;
  }

  get capabilities(): LinkCapabilities {
    return this.connection.capabilities;
  }

  get isValid(): boolean {
    return this.valid;
  }

  get lastHealthCheck(): number | null {
    return this.lastHealthCheckAt;
  }

  async execShell(command: string, timeoutMs: number = this.shellTimeoutMs): Promise<string> {
    this.assertValid();

    try {
      return await withTimeout(
        this.connection.shell(command),
        timeoutMs,
        () => new LinkTimeoutError(this.serial, 'shell', timeoutMs)
      );
    } catch (error) {
      throw this.toLinkError(error);
    }
  }

  async pushFile(data: Uint8Array, remotePath: string): Promise<void> {
    this.assertValid();

    try {
      await this.connection.push(data, remotePath);
    } catch (error) {
      if (errorMessage(error).toLowerCase().includes('permission denied')) {
        throw new PermissionDeniedError(this.serial, remotePath, { cause: error });
      }
      throw this.toLinkError(error);
    }
  }

  async spawnProcess(command: string): Promise<RemoteProcess> {
    this.assertValid();

    try {
      return await this.connection.spawn(command);
    } catch (error) {
      throw this.toLinkError(error);
    }
  }

  async openSocket(name: string): Promise<DeviceSocket> {
    this.assertValid();

    try {
      return await this.connection.openSocket(name);
    } catch (error) {
      throw this.toLinkError(error);
    }
  }

  /**
   * Round-trip an echo through the shell. Never throws.
   */
  async healthCheck(): Promise<boolean> {
    if (!this.valid) {
      return false;
    }

    try {
      const output = await this.execShell('echo ping');
      return output.trim() === 'ping';
    } catch (error) {
      console.warn(`[DeviceLink] Health check failed for ${this.serial}:`, errorMessage(error));
      return false;
    } finally {
      this.lastHealthCheckAt = Date.now();
    }
  }

  /**
   * Probe on a fixed interval; after failureThreshold consecutive failures the
   * link is invalidated and 'lost' is emitted
   */
  startHealthChecks(options: HealthCheckOptions): void {
    this.stopHealthChecks();

    this.healthTimer = setInterval(() => {
      // Skip a tick rather than stack probes behind a slow one
      if (this.checking || !this.valid) return;
      this.checking = true;

      this.healthCheck()
        .then((ok) => {
          this.consecutiveFailures = ok ? 0 : this.consecutiveFailures + 1;
          this.emit('health', { serial: this.serial, ok, consecutiveFailures: this.consecutiveFailures });

          if (this.consecutiveFailures >= options.failureThreshold) {
            const reason = `${this.consecutiveFailures} consecutive health checks failed`;
            console.warn(`[DeviceLink] ${this.serial} lost: ${reason}`);
            this.invalidate();
            this.emit('lost', reason);
          }
        })
        .catch((error: unknown) => {
          console.error(`[DeviceLink] Health listener for ${this.serial} threw:`, error);
        })
        .finally(() => {
          this.checking = false;
        });
    }, options.intervalMs);
  }

  stopHealthChecks(): void {
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
  }

  /**
   * Mark the link unusable without closing the connection
   */
  invalidate(): void {
    this.valid = false;
    this.stopHealthChecks();
  }

  /**
   * Close the underlying connection; later calls are no-ops
   */
  async close(): Promise<void> {
    this.invalidate();
    if (this.closed) {
      return;
    }

    this.closed = true;
    await this.connection.close();
    console.log(`[DeviceLink] Closed link to ${this.serial}`);
  }

  /**
   * Model, manufacturer, Android version and physical screen size.
   * A query that fails leaves its field unset.
   */
  async readDetails(): Promise<DeviceDetails> {
    const [model, manufacturer, androidVersion, wmSize] = await Promise.all([
      this.readProperty('ro.product.model'),
      this.readProperty('ro.product.manufacturer'),
      this.readProperty('ro.build.version.release'),
      this.readProperty('wm size', 'wm size'),
    ]);

    return {
      model,
      manufacturer,
      androidVersion,
      resolution: wmSize === undefined ? undefined : parseResolution(wmSize),
    };
  }

  private async readProperty(property: string, command = `getprop ${property}`): Promise<string | undefined> {
    try {
      const output = (await this.execShell(command)).trim();
      return output || undefined;
    } catch (error) {
      console.warn(`[DeviceLink] Failed to read ${property} on ${this.serial}:`, errorMessage(error));
      return undefined;
    }
  }

  private assertValid(): void {
    if (!this.valid) {
      throw new LinkDisconnectedError(this.serial);
    }
  }

  private toLinkError(error: unknown): EngineError {
    if (error instanceof EngineError) {
      return error;
    }
    return new LinkDisconnectedError(this.serial, { cause: error });
  }
}

/**
 * Physical size from `wm size` output; an override size is ignored
 */
export function parseResolution(output: string): Resolution | undefined {
  const match = output.match(/Physical size:\s*(\d+)x(\d+)/);
  if (match) {
    return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
  }
  return undefined;
}

export interface LinkConnectorOptions {
  connectTimeoutMs: number;
  shellTimeoutMs: number;
  retryAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

/**
 * Opens links through a transport.
 * Concurrent connects for one serial share a single attempt.
 */
export class LinkConnector {
  private transport: DeviceTransport;
  private options: LinkConnectorOptions;
  private pending: Map<string, Promise<DeviceLink>> = new Map();

  constructor(transport: DeviceTransport, options: LinkConnectorOptions) {
    this.transport = transport;
    this.options = options;
  }

  connect(serial: string): Promise<DeviceLink> {
    const inFlight = this.pending.get(serial);
    if (inFlight) {
      return inFlight;
    }

    const attempt = this.connectWithRetry(serial).finally(() => {
      this.pending.delete(serial);
    });
    this.pending.set(serial, attempt);
    return attempt;
  }

  private async connectWithRetry(serial: string): Promise<DeviceLink> {
    const { connectTimeoutMs } = this.options;
    const params: TransportParams = { timeoutMs: connectTimeoutMs };

    const connection = await retryWithBackoff(
      () => {
        const opening = this.transport.open(serial, params);
        return withTimeout(opening, connectTimeoutMs, () => {
          opening.then(late => late.close()).catch((error: unknown) => {
            console.warn(`[LinkConnector] Late connection to ${serial} not closed:`, errorMessage(error));
          });
          return new LinkTimeoutError(serial, 'connect', connectTimeoutMs);
        });
      },
      {
        attempts: this.options.retryAttempts,
        baseDelayMs: this.options.retryBaseDelayMs,
        maxDelayMs: this.options.retryMaxDelayMs,
        shouldRetry: isTransientError,
        onRetry: (error, attempt, delayMs) => {
          console.warn(`[LinkConnector] Connect to ${serial} failed (attempt ${attempt}), retrying in ${delayMs}ms:`, errorMessage(error));
        },
      }
    );

    console.log(`[LinkConnector] Connected to ${serial}`);
    return new DeviceLink(connection, this.options.shellTimeoutMs);
  }
}
