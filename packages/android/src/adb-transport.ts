/**
 * Device transport over a local ADB server using TangoADB
 * See: https://tangoadb.dev/
 */

import {
  DeviceNotFoundError,
  DeviceOfflineError,
  DeviceUnauthorizedError,
  errorMessage,
} from '@droidrelay/core';
import type {
  DeviceSocket,
  DeviceTransport,
  LinkCapabilities,
  ReachableDevice,
  RemoteProcess,
  TransportConnection,
  TransportKind,
  TransportParams,
} from '@droidrelay/core';
import { Adb, AdbServerClient } from '@yume-chan/adb';
import type { AdbSocket } from '@yume-chan/adb';
import { AdbScrcpyClient } from '@yume-chan/adb-scrcpy';
import { AdbServerNodeTcpConnector } from '@yume-chan/adb-server-node-tcp';
import { ReadableStream } from '@yume-chan/stream-extra';

export interface AdbTransportOptions {
  host: string;
  port: number;
}

/**
 * Serial naming decides how a device is attached:
 * emulator-NNNN is virtual, host:port is adb over TCP, anything else is USB
 */
export function transportOf(serial: string): TransportKind {
  if (serial.startsWith('emulator-')) {
    return 'virtual';
  }
  if (serial.includes(':')) {
    return 'network';
  }
  return 'usb';
}

/**
 * Reads an optional string field that not every server release reports
 */
function readStringField(device: object, key: string): string | undefined {
  if (!(key in device)) {
    return undefined;
  }
  const value: unknown = Reflect.get(device, key);
  return typeof value === 'string' ? value : undefined;
}

function readState(device: object): ReachableDevice['state'] {
  const state = readStringField(device, 'state');
  if (state === 'unauthorized' || state === 'offline') {
    return state;
  }
  if (Reflect.get(device, 'authenticating') === true) {
    return 'unauthorized';
  }
  return 'device';
}

export class AdbDeviceTransport implements DeviceTransport {
  private client: AdbServerClient;

  constructor(options: AdbTransportOptions) {
    const connector = new AdbServerNodeTcpConnector({
      host: options.host,
      port: options.port,
    });
    this.client = new AdbServerClient(connector);
  }

  async listReachable(): Promise<ReachableDevice[]> {
    const deviceList = await this.client.getDevices();

    return deviceList.map(device => ({
      serial: device.serial,
      state: readState(device),
      transport: transportOf(device.serial),
      model: readStringField(device, 'model'),
    }));
  }

  async open(serial: string, _params: TransportParams): Promise<TransportConnection> {
    const deviceList = await this.client.getDevices();
    const device = deviceList.find(d => d.serial === serial);
    if (!device) {
      throw new DeviceNotFoundError(serial);
    }

    switch (readState(device)) {
      case 'unauthorized':
        throw new DeviceUnauthorizedError(serial);
      case 'offline':
        throw new DeviceOfflineError(serial);
      case 'device':
        break;
    }

    try {
      // Use createTransport + new Adb()
      // See: https://tangoadb.dev/tango/server/transport/
      const transport = await this.client.createTransport(device);
      return new AdbConnection(serial, new Adb(transport));
    } catch (error) {
      throw new DeviceOfflineError(serial, { cause: error });
    }
  }
}

class AdbConnection implements TransportConnection {
  readonly serial: string;
  readonly capabilities: LinkCapabilities = { shell: true, fileTransfer: true };
  private adb: Adb;

  constructor(serial: string, adb: Adb) {
    this.serial = serial;
    this.adb = adb;
  }

  /**
   * Uses spawnWaitText for convenience
   * See: https://tangoadb.dev/api/adb/subprocess/none-protocol/
   */
  async shell(command: string): Promise<string> {
    return this.adb.subprocess.noneProtocol.spawnWaitText(command);
  }

  /**
   * Uses AdbScrcpyClient.pushServer, which writes through the sync protocol
   * See: https://tangoadb.dev/scrcpy/push-server/
   */
  async push(data: Uint8Array, remotePath: string): Promise<void> {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(data);
        controller.close();
      }
    });

    await AdbScrcpyClient.pushServer(this.adb, stream, remotePath);
  }

  async spawn(command: string): Promise<RemoteProcess> {
    const child = await this.adb.subprocess.noneProtocol.spawn(command);

    // Output must be consumed or the process stalls once the buffer fills
    this.drainOutput(child.output).catch((error: unknown) => {
      console.warn(`[AdbTransport] Output of process on ${this.serial} ended with error:`, errorMessage(error));
    });

    return {
      exited: child.exited.then(() => undefined),
      kill: async () => {
        await child.kill();
      },
    };
  }

  async openSocket(name: string): Promise<DeviceSocket> {
    const socket = await this.adb.createSocket(`localabstract:${name}`);
    return new AdbDeviceSocket(socket);
  }

  async close(): Promise<void> {
    await this.adb.close();
  }

  private async drainOutput(output: ReadableStream<Uint8Array>): Promise<void> {
    const decoder = new TextDecoder();
    const reader = output.getReader();

    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      for (const line of decoder.decode(value, { stream: true }).split('\n')) {
        if (line.trim()) {
          console.log(`[Helper ${this.serial}] ${line.trim()}`);
        }
      }
    }
  }
}

type AdbSocketWriter = ReturnType<AdbSocket['writable']['getWriter']>;

class AdbDeviceSocket implements DeviceSocket {
  private socket: AdbSocket;
  private writer: AdbSocketWriter | undefined;

  constructor(socket: AdbSocket) {
    this.socket = socket;
  }

  async *chunks(): AsyncIterable<Uint8Array> {
    const reader = this.socket.readable.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          return;
        }
        yield value;
      }
    } finally {
      reader.releaseLock();
    }
  }

  async write(data: Uint8Array): Promise<void> {
    if (!this.writer) {
      this.writer = this.socket.writable.getWriter();
    }
    await this.writer.write(data);
  }

  async close(): Promise<void> {
    await this.socket.close();
  }
}
