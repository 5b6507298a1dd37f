/**
 * Core types for device sessions and stream routing
 * Shared across all @droidrelay packages
 */

/**
 * Byte-streams a helper process can expose
 */
export type StreamKind = 'video' | 'audio' | 'control';

export const STREAM_KINDS: readonly StreamKind[] = ['video', 'audio', 'control'];

/**
 * How the device is reached
 * - usb: attached over USB
 * - network: adb over TCP (serial is host:port)
 * - virtual: emulator instance
 */
export type TransportKind = 'usb' | 'network' | 'virtual';

/**
 * Link state of a known device
 */
export type LinkState =
  | 'discovered'    // Seen by discovery, no link yet
  | 'connecting'    // Link being established
  | 'connected'     // Link up and healthy
  | 'unauthorized'  // Device refuses the debugging key
  | 'offline'       // Reported offline or failed health checks
  | 'disconnected'; // Gone from discovery or explicitly disconnected

export interface Resolution {
  width: number;
  height: number;
}

/**
 * What a connected device reports about itself
 */
export interface DeviceDetails {
  model?: string;
  manufacturer?: string;
  androidVersion?: string;
  resolution?: Resolution;
}

/**
 * A device known to the registry. Details are filled in on first connect.
 */
export interface Device extends DeviceDetails {
  serial: string;
  transport: TransportKind;
  state: LinkState;
  lastHealthCheckAt: number | null;
  lastSeenAt: number;
}

/**
 * A device as reported by the transport during discovery
 */
export interface ReachableDevice {
  serial: string;
  state: 'device' | 'unauthorized' | 'offline';
  transport: TransportKind;
  model?: string;
}

/**
 * Session lifecycle states
 */
export type SessionState =
  | 'idle'
  | 'deploying'
  | 'starting'
  | 'running'
  | 'stopping'
  | 'stopped'
  | 'crashed';

/**
 * Read-only view of a session
 */
export interface SessionSnapshot {
  sessionId: string;
  serial: string;
  state: SessionState;
  history: SessionState[];
  streams: StreamKind[];
  deviceName: string | null;
  createdAt: number;
  startedAt: number | null;
  lastCrashReason: string | null;
  lastError: string | null;
  subscriberCount: number;
}

/**
 * Final message delivered to every subscriber when a session ends
 */
export interface TerminalNotice {
  sessionId: string;
  serial: string;
  state: 'stopped' | 'crashed';
  reason: string | null;
  at: number;
}

/**
 * Read-only view of an attached subscriber
 */
export interface SubscriberInfo {
  subscriberId: string;
  sessionId: string;
  kinds: StreamKind[];
  attachedAt: number;
  ended: boolean;
  dropped: Record<StreamKind, number>;
}

/**
 * Counters consumed by the health/metrics layer
 */
export interface EngineStats {
  activeDevices: number;
  activeSessions: number;
  subscribersPerSession: Record<string, number>;
}
