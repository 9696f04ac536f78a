/**
 * Stowage Wire Protocol — Types
 *
 * Defines the request and response messages exchanged between a stowage client and a
 * file-storage server over a raw TCP byte stream.
 *
 * Byte layout lives in codec.ts. Everything here is the in-memory shape of a frame.
 *
 * Protocol version: see version.ts
 */

// =============================================================================
// Codes
// =============================================================================

/** Request codes (closed set; extend only with a version bump) */
export const RequestCode = {
  BACKUP: 100,
  RESTORE: 200,
  DELETE: 201,
  LIST: 202,
} as const;

export type RequestCode = (typeof RequestCode)[keyof typeof RequestCode];
export type RequestCodeName = keyof typeof RequestCode;

/** Response status codes (closed set; extend only with a version bump) */
export const StatusCode = {
  FILE_RESTORED: 210,
  FILE_LIST: 211,
  OK: 212,
  FILE_NOT_FOUND: 1001,
  NO_FILES: 1002,
  SERVER_ERROR: 1003,
  VERSION_MISMATCH: 1004,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];
export type StatusCodeName = keyof typeof StatusCode;

const REQUEST_NAMES = new Map<number, RequestCodeName>([
  [RequestCode.BACKUP, "BACKUP"],
  [RequestCode.RESTORE, "RESTORE"],
  [RequestCode.DELETE, "DELETE"],
  [RequestCode.LIST, "LIST"],
]);

const STATUS_NAMES = new Map<number, StatusCodeName>([
  [StatusCode.FILE_RESTORED, "FILE_RESTORED"],
  [StatusCode.FILE_LIST, "FILE_LIST"],
  [StatusCode.OK, "OK"],
  [StatusCode.FILE_NOT_FOUND, "FILE_NOT_FOUND"],
  [StatusCode.NO_FILES, "NO_FILES"],
  [StatusCode.SERVER_ERROR, "SERVER_ERROR"],
  [StatusCode.VERSION_MISMATCH, "VERSION_MISMATCH"],
]);

export function isRequestCode(value: number): value is RequestCode {
  return REQUEST_NAMES.has(value);
}

export function isStatusCode(value: number): value is StatusCode {
  return STATUS_NAMES.has(value);
}

export function requestCodeName(code: RequestCode): RequestCodeName {
  const name = REQUEST_NAMES.get(code);
  if (name === undefined) throw new RangeError(`Unknown request code ${code}`);
  return name;
}

export function statusCodeName(code: StatusCode): StatusCodeName {
  const name = STATUS_NAMES.get(code);
  if (name === undefined) throw new RangeError(`Unknown status code ${code}`);
  return name;
}

// =============================================================================
// Data Model
// =============================================================================

/** A server's network address */
export interface Endpoint {
  readonly host: string;
  readonly port: number;
}

/**
 * A stored or local file. `content` is present when the bytes travel with the descriptor
 * (backup payloads, restored files); listings carry only name and size.
 */
export interface FileDescriptor {
  name: string;
  size: number;
  content?: Uint8Array;
}

// =============================================================================
// Client → Server
// =============================================================================

interface RequestBase {
  /** Client protocol version, echo-validated by the server */
  version: number;
  /** Per-connection user identity (uint32) */
  userId: number;
}

export interface ListRequest extends RequestBase {
  code: typeof RequestCode.LIST;
}

export interface BackupRequest extends RequestBase {
  code: typeof RequestCode.BACKUP;
  name: string;
  /** Declared content length; must equal content.length when content is given */
  size: number;
  /** Omitted when the content is streamed separately after the request head */
  content?: Uint8Array;
}

export interface RestoreRequest extends RequestBase {
  code: typeof RequestCode.RESTORE;
  name: string;
}

export interface DeleteRequest extends RequestBase {
  code: typeof RequestCode.DELETE;
  name: string;
}

export type RequestMessage = ListRequest | BackupRequest | RestoreRequest | DeleteRequest;

/** Fixed part of a request frame, as read off the wire */
export interface RequestHeader {
  userId: number;
  version: number;
  code: RequestCode;
  nameLength: number;
}

// =============================================================================
// Server → Client
// =============================================================================

/** Fixed part of a response frame, as read off the wire */
export interface ResponseHeader {
  version: number;
  status: StatusCode;
  /** Length of the echoed filename that follows the fixed header */
  nameLength: number;
}

interface ResponseBase {
  version: number;
  /** Filename echoed by the server (empty when none) */
  name: string;
}

export interface FileRestoredResponse extends ResponseBase {
  status: typeof StatusCode.FILE_RESTORED;
  content: Uint8Array;
}

export interface FileListResponse extends ResponseBase {
  status: typeof StatusCode.FILE_LIST;
  files: FileDescriptor[];
}

/** Statuses that carry no payload */
export type BareStatus = Exclude<
  StatusCode,
  typeof StatusCode.FILE_RESTORED | typeof StatusCode.FILE_LIST
>;

export interface BareResponse extends ResponseBase {
  status: BareStatus;
}

export type ResponseMessage = FileRestoredResponse | FileListResponse | BareResponse;

/** Decoded payload, shaped by the request it answers */
export type ResponsePayload = FileDescriptor[] | Uint8Array | null;
