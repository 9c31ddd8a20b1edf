/**
 * Error taxonomy shared by the session, backend and loop layers.
 *
 * Per-attempt outcomes (seat taken, rejected, payment declined) are result
 * values, not exceptions. The classes here cover conditions that abort the
 * current operation.
 */

abstract class RailBotError extends Error {
  constructor(message: string, name: string) {
    super(message);
    this.name = name;

    // Keep instanceof working for subclasses
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Manual login not completed within the allowed window. */
export class AuthTimeoutError extends RailBotError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Manual login not completed within ${Math.round(timeoutMs / 1000)}s`, 'AuthTimeoutError');
    this.timeoutMs = timeoutMs;
  }
}

/** Login looked complete but the backend does not accept the resulting session. */
export class AuthFailedError extends RailBotError {
  constructor(message: string) {
    super(message, 'AuthFailedError');
  }
}

export class SessionExpiredError extends RailBotError {
  public readonly code?: string;

  constructor(message = 'Session expired', code?: string) {
    super(message, 'SessionExpiredError');
    this.code = code;
  }
}

/** Transport-level failure; the request may or may not have reached the backend. */
export class NetworkFaultError extends RailBotError {
  public readonly endpoint: string;

  constructor(endpoint: string, message: string) {
    super(`Network fault calling ${endpoint}: ${message}`, 'NetworkFaultError');
    this.endpoint = endpoint;
  }
}

/** Response did not have the shape we expect. */
export class BackendProtocolError extends RailBotError {
  public readonly endpoint: string;
  public readonly rawBody?: string;

  constructor(endpoint: string, message: string, rawBody?: string) {
    super(`${message} (${endpoint})`, 'BackendProtocolError');
    this.endpoint = endpoint;
    this.rawBody = rawBody?.slice(0, 500);
  }
}

/** Backend answered with an explicit failure envelope. */
export class RailApiError extends RailBotError {
  public readonly code: string;
  public readonly endpoint: string;

  constructor(endpoint: string, message: string, code: string) {
    super(message, 'RailApiError');
    this.code = code;
    this.endpoint = endpoint;
  }
}

export class CredentialStoreError extends RailBotError {
  constructor(message: string) {
    super(message, 'CredentialStoreError');
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
