/**
 * Stowage Wire Protocol — Errors
 *
 * One taxonomy for everything that can end an operation or a single file's transfer.
 * Every error carries a machine-readable code so callers can branch without instanceof chains.
 */

export type ErrorCode =
  | "CONNECTION_FAILED"   // socket could not be established or was lost while connecting
  | "IO_ERROR"            // send/receive moved fewer bytes than required, or timed out
  | "MALFORMED_MESSAGE"   // bytes violate the wire format
  | "VERSION_MISMATCH"    // server speaks another protocol version
  | "FILE_ACCESS";        // local file could not be read or written

export class ProtocolError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConnectionError extends ProtocolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONNECTION_FAILED", message, options);
  }
}

export class IOError extends ProtocolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("IO_ERROR", message, options);
  }
}

export class MalformedMessageError extends ProtocolError {
  constructor(message: string) {
    super("MALFORMED_MESSAGE", message);
  }
}

export class VersionMismatchError extends ProtocolError {
  readonly clientVersion: number;
  readonly serverVersion: number;

  constructor(clientVersion: number, serverVersion: number, message?: string) {
    super(
      "VERSION_MISMATCH",
      message ?? `Server speaks protocol v${serverVersion}, client expects v${clientVersion}`,
    );
    this.clientVersion = clientVersion;
    this.serverVersion = serverVersion;
  }
}

export class FileAccessError extends ProtocolError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("FILE_ACCESS", message, options);
    this.path = path;
  }
}

/**
 * Wrap a filesystem failure for a path.
 */
export function createFileAccessError(path: string, action: "read" | "write", cause: unknown): FileAccessError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new FileAccessError(path, `Cannot ${action} ${path}: ${detail}`, { cause });
}

/**
 * Type guard: is this one of our protocol errors?
 */
export function isProtocolError(err: unknown): err is ProtocolError {
  return err instanceof ProtocolError;
}
