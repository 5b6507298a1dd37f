/**
 * Error taxonomy for the session engine
 * Every error carries a stable code so adapters can map it to a response
 */

export type EngineErrorCode =
  | 'DEVICE_UNAUTHORIZED'
  | 'DEVICE_OFFLINE'
  | 'DEVICE_NOT_FOUND'
  | 'LINK_TIMEOUT'
  | 'LINK_DISCONNECTED'
  | 'PERMISSION_DENIED'
  | 'DEPLOY_FAILED'
  | 'SESSION_START_FAILED'
  | 'SESSION_CONFLICT'
  | 'SESSION_CRASHED'
  | 'SESSION_NOT_FOUND'
  | 'SUBSCRIBER_ATTACH_FAILED'
  | 'STREAM_NOT_FOUND'
  | 'VALIDATION_ERROR';

export class EngineError extends Error {
  code: EngineErrorCode;
  details?: Record<string, unknown>;

  constructor(
    code: EngineErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EngineError';
    this.code = code;
    this.details = details;
  }

  toJSON(): { code: EngineErrorCode; message: string; details?: Record<string, unknown> } {
    return { code: this.code, message: this.message, details: this.details };
  }
}

// Device / link errors

export class DeviceUnauthorizedError extends EngineError {
  constructor(serial: string) {
    super('DEVICE_UNAUTHORIZED', `Device ${serial} is unauthorized. Accept the debugging prompt on the device`, { serial });
    this.name = 'DeviceUnauthorizedError';
  }
}

export class DeviceOfflineError extends EngineError {
  constructor(serial: string, options?: { cause?: unknown }) {
    super('DEVICE_OFFLINE', `Device ${serial} is offline`, { serial }, options);
    this.name = 'DeviceOfflineError';
  }
}

export class DeviceNotFoundError extends EngineError {
  constructor(serial: string) {
    super('DEVICE_NOT_FOUND', `Device ${serial} not found`, { serial });
    this.name = 'DeviceNotFoundError';
  }
}

export class LinkTimeoutError extends EngineError {
  constructor(serial: string, operation: string, timeoutMs: number) {
    super('LINK_TIMEOUT', `${operation} on ${serial} timed out after ${timeoutMs}ms`, { serial, operation, timeoutMs });
    this.name = 'LinkTimeoutError';
  }
}

export class LinkDisconnectedError extends EngineError {
  constructor(serial: string, options?: { cause?: unknown }) {
    super('LINK_DISCONNECTED', `Link to ${serial} is disconnected`, { serial }, options);
    this.name = 'LinkDisconnectedError';
  }
}

export class PermissionDeniedError extends EngineError {
  constructor(serial: string, remotePath: string, options?: { cause?: unknown }) {
    super('PERMISSION_DENIED', `Permission denied writing ${remotePath} on ${serial}`, { serial, remotePath }, options);
    this.name = 'PermissionDeniedError';
  }
}

// Session errors

export class DeployFailedError extends EngineError {
  constructor(serial: string, reason: string, options?: { cause?: unknown }) {
    super('DEPLOY_FAILED', `Failed to deploy helper to ${serial}: ${reason}`, { serial, reason }, options);
    this.name = 'DeployFailedError';
  }
}

export class SessionStartFailedError extends EngineError {
  constructor(serial: string, reason: string, options?: { cause?: unknown }) {
    super('SESSION_START_FAILED', `Session for ${serial} failed to start: ${reason}`, { serial, reason }, options);
    this.name = 'SessionStartFailedError';
  }
}

export class SessionConflictError extends EngineError {
  constructor(serial: string, sessionId: string, state: string) {
    super('SESSION_CONFLICT', `A session is already ${state} for ${serial}`, { serial, sessionId, state });
    this.name = 'SessionConflictError';
  }
}

export class SessionCrashedError extends EngineError {
  reason: string;

  constructor(serial: string, reason: string) {
    super('SESSION_CRASHED', `Session for ${serial} crashed: ${reason}`, { serial, reason });
    this.name = 'SessionCrashedError';
    this.reason = reason;
  }
}

export class SessionNotFoundError extends EngineError {
  constructor(key: string) {
    super('SESSION_NOT_FOUND', `Session not found: ${key}`, { key });
    this.name = 'SessionNotFoundError';
  }
}

// Stream errors

export class SubscriberAttachFailedError extends EngineError {
  constructor(sessionId: string, reason: string) {
    super('SUBSCRIBER_ATTACH_FAILED', `Cannot attach to session ${sessionId}: ${reason}`, { sessionId, reason });
    this.name = 'SubscriberAttachFailedError';
  }
}

export class StreamNotFoundError extends EngineError {
  constructor(subscriberId: string, reason: string, options?: { cause?: unknown }) {
    super('STREAM_NOT_FOUND', `No control stream for subscriber ${subscriberId}: ${reason}`, { subscriberId, reason }, options);
    this.name = 'StreamNotFoundError';
  }
}

export class ValidationError extends EngineError {
  field: string;
  reason: string;

  constructor(field: string, reason: string) {
    super('VALIDATION_ERROR', `Invalid ${field || 'config'}: ${reason}`, { field, reason });
    this.name = 'ValidationError';
    this.field = field;
    this.reason = reason;
  }
}

/**
 * Whether an operation failing with this error may succeed when retried
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof EngineError) {
    switch (error.code) {
      case 'LINK_TIMEOUT':
      case 'LINK_DISCONNECTED':
      case 'DEVICE_OFFLINE':
        return true;
      default:
        return false;
    }
  }

  return false;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
