/**
 * In-process stand-ins for an ADB server, a device and scrcpy-server
 */

import {
  DeviceNotFoundError,
  DeviceOfflineError,
  DeviceUnauthorizedError,
} from '@droidrelay/core';
import type {
  DeviceSocket,
  DeviceTransport,
  LinkCapabilities,
  ReachableDevice,
  RemoteProcess,
  StreamKind,
  SubscriberSink,
  TerminalNotice,
  TransportConnection,
  TransportKind,
} from '@droidrelay/core';
import { DEVICE_NAME_LENGTH, encodeHelperFrame } from '../helper-protocol';
import type { HelperArtifact } from '../helper-deployer';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const TEST_ARTIFACT: HelperArtifact = {
  version: '2.1',
  bytes: new Uint8Array([0x50, 0x4b, 0x03, 0x04, 1, 2, 3, 4]),
  remotePath: '/data/local/tmp/helper.jar',
};

export function deviceNameHeader(name: string): Uint8Array {
  const header = new Uint8Array(DEVICE_NAME_LENGTH);
  header.set(encoder.encode(name));
  return header;
}

export function videoCodecMeta(codec: string, width: number, height: number): Uint8Array {
  const meta = new Uint8Array(12);
  meta.set(encoder.encode(codec));
  const view = new DataView(meta.buffer);
  view.setUint32(4, width);
  view.setUint32(8, height);
  return meta;
}

/**
 * Resolves once release() is called
 */
export class Gate {
  readonly opened: Promise<void>;
  private open: () => void = () => undefined;

  constructor() {
    this.opened = new Promise<void>((resolve) => {
      this.open = resolve;
    });
  }

  release(): void {
    this.open();
  }
}

export class FakeSocket implements DeviceSocket {
  readonly kind: StreamKind;
  readonly written: Uint8Array[] = [];
  closeCount = 0;
  private timeline: string[];
  private buffer: Uint8Array[] = [];
  private ended = false;
  private wake: (() => void) | null = null;

  constructor(kind: StreamKind, timeline: string[]) {
    this.kind = kind;
    this.timeline = timeline;
  }

  /**
   * Bytes from the device side
   */
  feed(bytes: Uint8Array): void {
    if (this.ended) return;
    this.buffer.push(bytes);
    this.notify();
  }

  end(): void {
    this.ended = true;
    this.notify();
  }

  async *chunks(): AsyncGenerator<Uint8Array> {
    for (;;) {
      const next = this.buffer.shift();
      if (next) {
        yield next;
        continue;
      }
      if (this.ended) {
        return;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.ended) {
      throw new Error('socket closed');
    }
    this.written.push(data);
  }

  async close(): Promise<void> {
    this.closeCount++;
    this.timeline.push(`close:${this.kind}`);
    this.end();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

export class FakeProcess implements RemoteProcess {
  readonly exited: Promise<void>;
  killCount = 0;
  hasExited = false;
  private ignoreKill: boolean;
  private resolveExit: () => void = () => undefined;

  constructor(ignoreKill: boolean) {
    this.ignoreKill = ignoreKill;
    this.exited = new Promise<void>((resolve) => {
      this.resolveExit = resolve;
    });
  }

  exit(): void {
    this.hasExited = true;
    this.resolveExit();
  }

  async kill(): Promise<void> {
    this.killCount++;
    if (!this.ignoreKill) {
      this.exit();
    }
  }
}

/**
 * One run of scrcpy-server. Accepts connections in control, video, audio
 * order (skipping disabled streams) and writes the device name on the first.
 */
export class FakeHelper {
  readonly command: string;
  readonly scid: string;
  readonly process: FakeProcess;
  readonly sockets: Map<StreamKind, FakeSocket> = new Map();
  connectAttempts = 0;
  private device: FakeDevice;
  private expected: StreamKind[];

  constructor(command: string, device: FakeDevice) {
    this.command = command;
    this.device = device;
    this.scid = /scid=([0-9a-f]+)/.exec(command)?.[1] ?? '';
    this.process = new FakeProcess(device.ignoreKill);

    const enabled = (kind: StreamKind, fallback: boolean): boolean => {
      const match = new RegExp(`\\b${kind}=(true|false)`).exec(command);
      return match ? match[1] === 'true' : fallback;
    };
    this.expected = (['control', 'video', 'audio'] as const).filter(kind => enabled(kind, kind !== 'audio'));
  }

  connect(name: string): FakeSocket {
    this.connectAttempts++;

    if (this.process.hasExited) {
      throw new Error('connection refused');
    }
    if (name !== `scrcpy_${this.scid}`) {
      throw new Error(`no socket named ${name}`);
    }
    if (this.device.refuseConnects > 0) {
      this.device.refuseConnects--;
      throw new Error('connection refused');
    }

    const kind = this.expected[this.sockets.size];
    if (!kind) {
      throw new Error('unexpected connection');
    }

    const socket = new FakeSocket(kind, this.device.timeline);
    if (this.sockets.size === 0 && !this.device.withholdHandshake) {
      socket.feed(deviceNameHeader(this.device.name));
    }
    if (kind === 'video') {
      socket.feed(videoCodecMeta('h264', 1080, 1920));
    }
    if (kind === 'audio') {
      socket.feed(encoder.encode('opus'));
    }
    this.sockets.set(kind, socket);
    return socket;
  }

  socket(kind: StreamKind): FakeSocket {
    const socket = this.sockets.get(kind);
    if (!socket) {
      throw new Error(`no ${kind} socket`);
    }
    return socket;
  }

  sendVideo(payload: number[], options: { pts?: number; config?: boolean; keyFrame?: boolean } = {}): Uint8Array {
    const frame = encodeHelperFrame(new Uint8Array(payload), options);
    this.socket('video').feed(frame);
    return frame;
  }

  /**
   * The helper dies; its sockets stay open until the host closes them
   */
  crash(): void {
    this.process.exit();
  }
}

export class FakeDevice {
  readonly serial: string;
  state: ReachableDevice['state'] = 'device';
  reachable = true;
  model = 'Pixel_Test';
  name = 'Pixel Test';
  transport: TransportKind;

  readonly files: Map<string, Uint8Array> = new Map();
  readonly commands: string[] = [];
  readonly timeline: string[] = [];
  readonly helpers: FakeHelper[] = [];
  readonly killedScids: string[] = [];

  readonly props: Map<string, string> = new Map([
    ['ro.product.model', 'Pixel Test'],
    ['ro.product.manufacturer', 'Google'],
    ['ro.build.version.release', '14'],
  ]);
  wmSize = 'Physical size: 1080x2400\n';

  healthy = true;
  pushCount = 0;
  pushFailures = 0;
  pushError = 'write failed';
  pushGate: Gate | null = null;
  /** holds an accepted helper connection back from the host until released */
  socketGate: Gate | null = null;
  refuseConnects = 0;
  withholdHandshake = false;
  ignoreKill = false;

  constructor(serial: string) {
    this.serial = serial;
    this.transport = serial.startsWith('emulator-') ? 'virtual' : 'usb';
  }

  get helper(): FakeHelper {
    const helper = this.helpers[this.helpers.length - 1];
    if (!helper) {
      throw new Error(`no helper spawned on ${this.serial}`);
    }
    return helper;
  }

  shell(command: string): string {
    this.commands.push(command);

    const probe = /^echo "\$\(cat (\S+) 2>\/dev\/null\)\|\$\(stat -c %s (\S+) 2>\/dev\/null\)"$/.exec(command);
    if (probe) {
      const marker = this.files.get(probe[1]);
      const file = this.files.get(probe[2]);
      return `${marker ? decoder.decode(marker) : ''}|${file ? file.byteLength : ''}\n`;
    }

    if (command === 'echo ping') {
      if (!this.healthy) {
        throw new Error('device not responding');
      }
      return 'ping\n';
    }

    const getprop = /^getprop (\S+)$/.exec(command);
    if (getprop) {
      return `${this.props.get(getprop[1]) ?? ''}\n`;
    }

    if (command === 'wm size') {
      return this.wmSize;
    }

    const chmod = /^chmod 644 (\S+)$/.exec(command);
    if (chmod) {
      return '';
    }

    const write = /^echo (\S+) > (\S+)$/.exec(command);
    if (write) {
      this.files.set(write[2], encoder.encode(write[1]));
      return '';
    }

    const pkill = /^pkill -9 -f scid=(\w+)$/.exec(command);
    if (pkill) {
      this.killedScids.push(pkill[1]);
      for (const helper of this.helpers) {
        if (helper.scid === pkill[1]) helper.process.exit();
      }
      return '';
    }

    const remove = /^rm -f (.+)$/.exec(command);
    if (remove) {
      for (const path of remove[1].split(' ')) {
        this.files.delete(path);
      }
      return '';
    }

    throw new Error(`unexpected command: ${command}`);
  }

  async push(data: Uint8Array, remotePath: string): Promise<void> {
    this.pushCount++;
    if (this.pushGate) {
      await this.pushGate.opened;
    }
    if (this.pushFailures > 0) {
      this.pushFailures--;
      throw new Error(this.pushError);
    }
    this.files.set(remotePath, data);
  }

  spawn(command: string): FakeHelper {
    const helper = new FakeHelper(command, this);
    this.helpers.push(helper);
    return helper;
  }
}

export class FakeConnection implements TransportConnection {
  readonly serial: string;
  readonly capabilities: LinkCapabilities = { shell: true, fileTransfer: true };
  closed = false;
  private device: FakeDevice;

  constructor(device: FakeDevice) {
    this.serial = device.serial;
    this.device = device;
  }

  async shell(command: string): Promise<string> {
    return this.device.shell(command);
  }

  async push(data: Uint8Array, remotePath: string): Promise<void> {
    await this.device.push(data, remotePath);
  }

  async spawn(command: string): Promise<RemoteProcess> {
    return this.device.spawn(command).process;
  }

  async openSocket(name: string): Promise<DeviceSocket> {
    const socket = this.device.helper.connect(name);
    if (this.device.socketGate) {
      await this.device.socketGate.opened;
    }
    return socket;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeTransport implements DeviceTransport {
  readonly devices: Map<string, FakeDevice> = new Map();
  readonly connections: FakeConnection[] = [];
  openCount = 0;
  openFailures = 0;
  openGate: Gate | null = null;

  addDevice(serial: string): FakeDevice {
    const device = new FakeDevice(serial);
    this.devices.set(serial, device);
    return device;
  }

  async listReachable(): Promise<ReachableDevice[]> {
    return Array.from(this.devices.values())
      .filter(device => device.reachable)
      .map(device => ({
        serial: device.serial,
        state: device.state,
        transport: device.transport,
        model: device.model,
      }));
  }

  async open(serial: string): Promise<TransportConnection> {
    this.openCount++;

    const device = this.devices.get(serial);
    if (!device || !device.reachable) {
      throw new DeviceNotFoundError(serial);
    }
    if (device.state === 'unauthorized') {
      throw new DeviceUnauthorizedError(serial);
    }
    if (device.state === 'offline' || this.openFailures > 0) {
      this.openFailures = Math.max(0, this.openFailures - 1);
      throw new DeviceOfflineError(serial);
    }

    const connection = new FakeConnection(device);
    this.connections.push(connection);
    if (this.openGate) {
      await this.openGate.opened;
    }
    return connection;
  }
}

/**
 * Sink that records what a subscriber receives
 */
export class RecordingSink implements SubscriberSink {
  readonly frames: Array<{ kind: StreamKind; bytes: Uint8Array }> = [];
  readonly notices: TerminalNotice[] = [];
  private timeline: string[] | null;

  constructor(timeline: string[] | null = null) {
    this.timeline = timeline;
  }

  deliver(kind: StreamKind, frame: Uint8Array): void {
    this.frames.push({ kind, bytes: frame });
  }

  end(notice: TerminalNotice): void {
    this.notices.push(notice);
    this.timeline?.push(`notice:${notice.state}`);
  }
}
