/**
 * Engine Configuration
 * External configuration with environment variable overrides
 */

/**
 * Parse environment variable as integer with fallback
 */
function parseIntEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value) {
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }
  return defaultValue;
}

/**
 * Parse environment variable as string with fallback
 */
function parseStringEnv(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Engine configuration with environment variable overrides
 */
export const engineConfig = {
  /**
   * ADB server the transport talks to
   */
  adbHost: parseStringEnv('ADB_HOST', '127.0.0.1'),
  adbPort: parseIntEnv('ADB_PORT', 5037),

  /**
   * Local path of the scrcpy-server artifact pushed to devices
   */
  helperArtifactPath: parseStringEnv('HELPER_ARTIFACT_PATH', './scrcpy-server'),

  /**
   * Version of that artifact; also passed to the helper on its command line
   */
  helperVersion: parseStringEnv('HELPER_VERSION', '2.1'),

  /**
   * Where the helper lives on the device
   */
  helperRemotePath: parseStringEnv('HELPER_REMOTE_PATH', '/data/local/tmp/scrcpy-server.jar'),

  /**
   * Link health probing
   */
  healthCheckInterval: parseIntEnv('HEALTH_CHECK_INTERVAL', 2000),
  healthCheckFailures: parseIntEnv('HEALTH_CHECK_FAILURES', 3),

  /**
   * Discovery polling; vanished devices are marked disconnected after the
   * grace period and forgotten after the eviction age
   */
  discoveryInterval: parseIntEnv('DISCOVERY_INTERVAL', 2000),
  discoveryGrace: parseIntEnv('DISCOVERY_GRACE', 5000),
  deviceEvictionAge: parseIntEnv('DEVICE_EVICTION_AGE', 60000),

  /**
   * Timeouts in milliseconds
   */
  connectTimeout: parseIntEnv('CONNECT_TIMEOUT', 10000),
  shellTimeout: parseIntEnv('SHELL_TIMEOUT', 10000),
  handshakeTimeout: parseIntEnv('HANDSHAKE_TIMEOUT', 10000),
  socketRetryDelay: parseIntEnv('SOCKET_RETRY_DELAY', 100),
  stopGrace: parseIntEnv('STOP_GRACE', 3000),
  drainTimeout: parseIntEnv('DRAIN_TIMEOUT', 1000),

  /**
   * Per-subscriber queue sizes
   */
  videoQueueSize: parseIntEnv('VIDEO_QUEUE_SIZE', 30),
  audioQueueSize: parseIntEnv('AUDIO_QUEUE_SIZE', 50),
  controlQueueSize: parseIntEnv('CONTROL_QUEUE_SIZE', 64),
  controlBlockTimeout: parseIntEnv('CONTROL_BLOCK_TIMEOUT', 500),

  /**
   * Backoff for transient link failures
   */
  retryBaseDelay: parseIntEnv('RETRY_BASE_DELAY', 250),
  retryMaxDelay: parseIntEnv('RETRY_MAX_DELAY', 4000),
  retryAttempts: parseIntEnv('RETRY_ATTEMPTS', 3),

  maxConcurrentSessions: parseIntEnv('MAX_CONCURRENT_SESSIONS', 10),
  maxSubscribersPerSession: parseIntEnv('MAX_SUBSCRIBERS_PER_SESSION', 5),

  /**
   * Session defaults applied before caller overrides
   */
  defaultMaxSize: parseIntEnv('DEFAULT_MAX_SIZE', 1920),
  defaultBitRate: parseIntEnv('DEFAULT_BIT_RATE', 8000000),
  defaultMaxFps: parseIntEnv('DEFAULT_MAX_FPS', 60),
} as const;

export type EngineConfig = typeof engineConfig;
