/**
 * @droidrelay/core
 * Shared types, errors, and stream routing for device sessions
 */

// Types
export { STREAM_KINDS } from './types';
export type {
  StreamKind,
  TransportKind,
  LinkState,
  Device,
  DeviceDetails,
  ReachableDevice,
  Resolution,
  SessionState,
  SessionSnapshot,
  TerminalNotice,
  SubscriberInfo,
  EngineStats,
} from './types';

// Interfaces
export type {
  TransportParams,
  LinkCapabilities,
  DeviceTransport,
  TransportConnection,
  RemoteProcess,
  DeviceSocket,
  SubscriberSink,
} from './interfaces';

// Errors
export {
  EngineError,
  DeviceUnauthorizedError,
  DeviceOfflineError,
  DeviceNotFoundError,
  LinkTimeoutError,
  LinkDisconnectedError,
  PermissionDeniedError,
  DeployFailedError,
  SessionStartFailedError,
  SessionConflictError,
  SessionCrashedError,
  SessionNotFoundError,
  SubscriberAttachFailedError,
  StreamNotFoundError,
  ValidationError,
  isTransientError,
  errorMessage,
} from './errors';
export type { EngineErrorCode } from './errors';

// Protocol
export {
  STREAM_TAG,
  MESSAGE_TYPE,
  createSessionEndedMessage,
  createErrorMessage,
  encodeTaggedFrame,
  decodeTaggedFrame,
} from './protocol';
export type { SessionEndedMessage, ErrorMessage } from './protocol';

// Streaming
export { FrameQueue } from './frame-queue';
export { SubscriberHub } from './subscriber-hub';
export type { SubscriberHubOptions, StreamPreamble } from './subscriber-hub';
export { StreamRouter } from './stream-router';
export type { ControlWriter, StreamRouterOptions } from './stream-router';

// Utilities
export { AsyncMutex, KeyedMutex } from './mutex';
export {
  delay,
  backoffDelay,
  retryWithBackoff,
  withTimeout,
  settlesWithin,
  abortable,
} from './retry';
export type { RetryOptions } from './retry';
