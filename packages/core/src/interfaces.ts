/**
 * Core interfaces for device transports and stream consumers
 */

import type { ReachableDevice, StreamKind, TerminalNotice } from './types';

/**
 * Parameters for opening a transport connection
 */
export interface TransportParams {
  timeoutMs: number;
}

/**
 * What a transport connection can do
 */
export interface LinkCapabilities {
  shell: boolean;
  fileTransfer: boolean;
}

/**
 * Reaches devices; implemented per platform (ADB server, fakes in tests)
 */
export interface DeviceTransport {
  /**
   * List devices the transport can currently see
   */
  listReachable(): Promise<ReachableDevice[]>;

  /**
   * Open a connection to a device.
   * Rejects with DeviceNotFoundError, DeviceUnauthorizedError or DeviceOfflineError
   */
  open(serial: string, params: TransportParams): Promise<TransportConnection>;
}

/**
 * A live connection to one device
 */
export interface TransportConnection {
  readonly serial: string;
  readonly capabilities: LinkCapabilities;

  /**
   * Run a shell command and return its text output
   */
  shell(command: string): Promise<string>;

  /**
   * Write bytes to a file on the device
   */
  push(data: Uint8Array, remotePath: string): Promise<void>;

  /**
   * Start a long-running shell process
   */
  spawn(command: string): Promise<RemoteProcess>;

  /**
   * Connect to a device-side abstract socket
   */
  openSocket(name: string): Promise<DeviceSocket>;

  close(): Promise<void>;
}

/**
 * Handle to a process running on the device
 */
export interface RemoteProcess {
  /**
   * Settles when the process is gone
   */
  readonly exited: Promise<void>;

  /**
   * Ask the process to terminate
   */
  kill(): Promise<void>;
}

/**
 * Binary socket into the device
 */
export interface DeviceSocket {
  /**
   * Chunks as they arrive; ends when either side closes
   */
  chunks(): AsyncIterable<Uint8Array>;

  write(data: Uint8Array): Promise<void>;

  close(): Promise<void>;
}

/**
 * Push channel to one subscriber.
 * A rejected or throwing delivery detaches the subscriber.
 */
export interface SubscriberSink {
  deliver(kind: StreamKind, frame: Uint8Array): void | Promise<void>;
  end(notice: TerminalNotice): void | Promise<void>;
}
