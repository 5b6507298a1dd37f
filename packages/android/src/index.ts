/**
 * @droidrelay/android
 * Android device sessions via TangoADB + scrcpy-server
 */

import { AdbDeviceTransport } from './adb-transport';
import { engineConfig } from './config';
import type { EngineConfig } from './config';
import { loadHelperArtifact } from './helper-deployer';
import { DeviceSessionEngine } from './session-engine';

export { engineConfig } from './config';
export type { EngineConfig } from './config';

export { AdbDeviceTransport, transportOf } from './adb-transport';
export type { AdbTransportOptions } from './adb-transport';

export { DeviceLink, LinkConnector, parseResolution } from './device-link';
export type { HealthCheckOptions, LinkConnectorOptions } from './device-link';

export { DeviceRegistry } from './device-registry';
export type { DeviceRegistryOptions } from './device-registry';

export {
  sessionConfigSchema,
  buildSessionConfig,
  sessionDefaults,
  enabledStreams,
  compareVersions,
  toHelperArgs,
  toHelperCommand,
} from './session-config';
export type { SessionConfig, SessionConfigOverrides } from './session-config';

export { HelperDeployer, loadHelperArtifact } from './helper-deployer';
export type { HelperArtifact, DeployOutcome } from './helper-deployer';

export { SessionSupervisor, SOCKET_OPEN_ORDER } from './session-supervisor';
export type { SessionSupervisorOptions } from './session-supervisor';

export { DeviceSessionEngine } from './session-engine';
export type { DeviceSessionEngineOptions } from './session-engine';

export { createWebSocketSink, bindWebSocketSubscriber } from './ws-subscriber';
export type { StreamSurface } from './ws-subscriber';

/**
 * Engine over the local ADB server, with the helper read from
 * HELPER_ARTIFACT_PATH. Call init() before use.
 */
export async function createAdbSessionEngine(overrides: Partial<EngineConfig> = {}): Promise<DeviceSessionEngine> {
  const config = { ...engineConfig, ...overrides };
  const artifact = await loadHelperArtifact(config.helperArtifactPath, config.helperVersion, config.helperRemotePath);

  return new DeviceSessionEngine({
    transport: new AdbDeviceTransport({ host: config.adbHost, port: config.adbPort }),
    artifact,
    config,
  });
}
