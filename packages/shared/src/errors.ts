/**
 * Error taxonomy for discovery.
 *
 * None of these cross the public probe boundaries: probes catch them,
 * log a diagnostic and return null. CleanupError is only ever logged.
 */

export type ProbeErrorCategory =
  | 'connection'
  | 'handshake'
  | 'protocol'
  | 'timeout'
  | 'provision'
  | 'cleanup';

export class ProbeError extends Error {
  readonly category: ProbeErrorCategory;

  constructor(category: ProbeErrorCategory, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProbeError';
    this.category = category;
  }
}

/** The process or resource failed to start. */
export class ConnectionError extends ProbeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('connection', message, options);
    this.name = 'ConnectionError';
  }
}

/** Missing or invalid initialize response. */
export class HandshakeError extends ProbeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('handshake', message, options);
    this.name = 'HandshakeError';
  }
}

/** Malformed JSON, unexpected EOF, or a message that is not what was expected. */
export class ProtocolError extends ProbeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('protocol', message, options);
    this.name = 'ProtocolError';
  }
}

export class TimeoutError extends ProbeError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super('timeout', message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export type ProvisionFailureReason =
  | 'forbidden'
  | 'not-found'
  | 'conflict'
  | 'unavailable'
  | 'unknown';

/** The runtime or orchestration API rejected provisioning. */
export class ResourceProvisionError extends ProbeError {
  readonly reason: ProvisionFailureReason;

  constructor(reason: ProvisionFailureReason, message: string, options?: { cause?: unknown }) {
    super('provision', message, options);
    this.name = 'ResourceProvisionError';
    this.reason = reason;
  }
}

/** A provisioned resource could not be removed. */
export class CleanupError extends ProbeError {
  readonly resource: string;
  readonly attempts: number;

  constructor(resource: string, attempts: number, options?: { cause?: unknown }) {
    super(
      'cleanup',
      `Failed to remove ${resource} after ${attempts} attempt(s); manual removal required`,
      options,
    );
    this.name = 'CleanupError';
    this.resource = resource;
    this.attempts = attempts;
  }
}

/** Normalize a caught value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
