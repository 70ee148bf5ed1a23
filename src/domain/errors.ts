export type TranscriberErrorCode =
  | "DEVICE_ENUMERATION"
  | "DEVICE_LOST"
  | "CONNECTION"
  | "AUTH"
  | "PROTOCOL"
  | "BACKEND"
  | "SESSION_STATE";

export class TranscriberError extends Error {
  constructor(
    readonly code: TranscriberErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DeviceEnumerationError extends TranscriberError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DEVICE_ENUMERATION", message, options);
  }
}

export class DeviceLostError extends TranscriberError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DEVICE_LOST", message, options);
  }
}

export class ConnectionError extends TranscriberError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONNECTION", message, options);
  }
}

export class AuthError extends TranscriberError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("AUTH", message, options);
  }
}

/** A backend message that could not be understood. */
export class ProtocolError extends TranscriberError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PROTOCOL", message, options);
  }
}

/** The backend explicitly reported a failure. */
export class BackendError extends TranscriberError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BACKEND", message, options);
  }
}

export class SessionStateError extends TranscriberError {
  constructor(message: string) {
    super("SESSION_STATE", message);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
