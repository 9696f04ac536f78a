/**
 * Stowage Wire Protocol — Codec
 *
 * Byte-exact translation between messages and frames. All integers are little-endian.
 *
 * Request:  userId u32 | version u8 | code u8 | nameLength u16 | name
 *           [BACKUP: size u32 | content]
 * Response: version u8 | status u16 | nameLength u16 | name
 *           [FILE_RESTORED, FILE_LIST: size u32 | payload]
 * Listing:  (nameLength u16 | name | size u32)*
 */

import {
  RequestCode,
  StatusCode,
  isRequestCode,
  isStatusCode,
  requestCodeName,
  type FileDescriptor,
  type RequestHeader,
  type RequestMessage,
  type ResponseHeader,
  type ResponseMessage,
  type ResponsePayload,
} from "./types.js";
import { MalformedMessageError, VersionMismatchError } from "./errors.js";

export const REQUEST_HEADER_SIZE = 8;
export const RESPONSE_HEADER_SIZE = 5;
export const SIZE_FIELD_SIZE = 4;

export const MAX_NAME_LENGTH = 0xffff;
export const MAX_FILE_SIZE = 0xffffffff;
const MAX_USER_ID = 0xffffffff;
const MAX_VERSION = 0xff;

// =============================================================================
// Requests
// =============================================================================

/**
 * Encode a request frame without BACKUP content: the fixed header, the name and,
 * for BACKUP, the declared size. The content is expected to follow on the wire.
 */
export function encodeRequestHead(message: RequestMessage): Buffer {
  checkUint(message.userId, MAX_USER_ID, "userId");
  checkUint(message.version, MAX_VERSION, "version");

  const name = encodeName(message.code === RequestCode.LIST ? "" : message.name);
  const sizeField = message.code === RequestCode.BACKUP ? SIZE_FIELD_SIZE : 0;
  const head = Buffer.alloc(REQUEST_HEADER_SIZE + name.length + sizeField);

  head.writeUInt32LE(message.userId, 0);
  head.writeUInt8(message.version, 4);
  head.writeUInt8(message.code, 5);
  head.writeUInt16LE(name.length, 6);
  name.copy(head, REQUEST_HEADER_SIZE);

  if (message.code === RequestCode.BACKUP) {
    checkUint(message.size, MAX_FILE_SIZE, "size");
    head.writeUInt32LE(message.size, REQUEST_HEADER_SIZE + name.length);
  }
  return head;
}

/**
 * Encode a complete request frame. BACKUP requests must carry content matching their size.
 */
export function encodeRequest(message: RequestMessage): Buffer {
  const head = encodeRequestHead(message);
  if (message.code !== RequestCode.BACKUP) return head;

  const content = message.content ?? new Uint8Array(0);
  if (content.length !== message.size) {
    throw new RangeError(
      `Backup of "${message.name}" declares ${message.size} bytes but carries ${content.length}`,
    );
  }
  return Buffer.concat([head, content]);
}

export function decodeRequestHeader(bytes: Uint8Array): RequestHeader {
  if (bytes.length < REQUEST_HEADER_SIZE) {
    throw new MalformedMessageError(
      `Request header needs ${REQUEST_HEADER_SIZE} bytes, got ${bytes.length}`,
    );
  }
  const buf = toBuffer(bytes);
  const code = buf.readUInt8(5);
  if (!isRequestCode(code)) {
    throw new MalformedMessageError(`Unknown request code ${code}`);
  }
  return {
    userId: buf.readUInt32LE(0),
    version: buf.readUInt8(4),
    code,
    nameLength: buf.readUInt16LE(6),
  };
}

/**
 * Total length of the request frame starting at bytes[0], or null while too few bytes
 * have arrived to tell.
 */
export function requestFrameLength(bytes: Uint8Array): number | null {
  if (bytes.length < REQUEST_HEADER_SIZE) return null;
  const header = decodeRequestHeader(bytes);
  const headLength = REQUEST_HEADER_SIZE + header.nameLength;
  if (header.code !== RequestCode.BACKUP) return headLength;
  if (bytes.length < headLength + SIZE_FIELD_SIZE) return null;
  return headLength + SIZE_FIELD_SIZE + toBuffer(bytes).readUInt32LE(headLength);
}

/**
 * Decode exactly one complete request frame.
 */
export function decodeRequest(bytes: Uint8Array): RequestMessage {
  const length = requestFrameLength(bytes);
  if (length === null || bytes.length < length) {
    throw new MalformedMessageError(`Request frame truncated at ${bytes.length} bytes`);
  }
  if (bytes.length > length) {
    throw new MalformedMessageError(`Request frame has ${bytes.length - length} trailing bytes`);
  }

  const header = decodeRequestHeader(bytes);
  const buf = toBuffer(bytes);
  const nameEnd = REQUEST_HEADER_SIZE + header.nameLength;
  const name = buf.toString("utf8", REQUEST_HEADER_SIZE, nameEnd);
  const base = { version: header.version, userId: header.userId };

  switch (header.code) {
    case RequestCode.LIST:
      return { ...base, code: RequestCode.LIST };
    case RequestCode.BACKUP: {
      const content = Buffer.from(buf.subarray(nameEnd + SIZE_FIELD_SIZE));
      return { ...base, code: RequestCode.BACKUP, name, size: content.length, content };
    }
    case RequestCode.RESTORE:
      return { ...base, code: RequestCode.RESTORE, name };
    case RequestCode.DELETE:
      return { ...base, code: RequestCode.DELETE, name };
    default:
      return assertNever(header.code);
  }
}

// =============================================================================
// Responses
// =============================================================================

export interface DecodeResponseOptions {
  /** When set, a different version fails before any other field is interpreted */
  expectedVersion?: number;
}

export function decodeResponseHeader(
  bytes: Uint8Array,
  options: DecodeResponseOptions = {},
): ResponseHeader {
  if (bytes.length < RESPONSE_HEADER_SIZE) {
    throw new MalformedMessageError(
      `Response header needs ${RESPONSE_HEADER_SIZE} bytes, got ${bytes.length}`,
    );
  }
  const buf = toBuffer(bytes);
  const version = buf.readUInt8(0);
  if (options.expectedVersion !== undefined && version !== options.expectedVersion) {
    throw new VersionMismatchError(options.expectedVersion, version);
  }
  const status = buf.readUInt16LE(1);
  if (!isStatusCode(status)) {
    throw new MalformedMessageError(`Unknown status code ${status}`);
  }
  return { version, status, nameLength: buf.readUInt16LE(3) };
}

/** Decode the u32 size field that precedes a response payload */
export function decodeSize(bytes: Uint8Array): number {
  if (bytes.length !== SIZE_FIELD_SIZE) {
    throw new MalformedMessageError(`Size field needs ${SIZE_FIELD_SIZE} bytes, got ${bytes.length}`);
  }
  return toBuffer(bytes).readUInt32LE(0);
}

/** Whether a size field and payload follow the echoed name */
export function hasPayload(
  status: StatusCode,
): status is typeof StatusCode.FILE_RESTORED | typeof StatusCode.FILE_LIST {
  switch (status) {
    case StatusCode.FILE_RESTORED:
    case StatusCode.FILE_LIST:
      return true;
    case StatusCode.OK:
    case StatusCode.FILE_NOT_FOUND:
    case StatusCode.NO_FILES:
    case StatusCode.SERVER_ERROR:
    case StatusCode.VERSION_MISMATCH:
      return false;
    default:
      return assertNever(status);
  }
}

/** Whether `status` is a legal answer to a request with `code` */
export function answers(code: RequestCode, status: StatusCode): boolean {
  switch (status) {
    case StatusCode.FILE_NOT_FOUND:
    case StatusCode.SERVER_ERROR:
    case StatusCode.VERSION_MISMATCH:
      return true;
    case StatusCode.FILE_RESTORED:
      return code === RequestCode.RESTORE;
    case StatusCode.FILE_LIST:
    case StatusCode.NO_FILES:
      return code === RequestCode.LIST;
    case StatusCode.OK:
      return code === RequestCode.BACKUP || code === RequestCode.DELETE;
    default:
      return assertNever(status);
  }
}

/**
 * Decode a response payload. Its shape is selected by the request it answers:
 * LIST → listing, RESTORE → file bytes, BACKUP/DELETE → nothing.
 */
export function decodePayload(bytes: Uint8Array, declaredLength: number, code: typeof RequestCode.LIST): FileDescriptor[];
export function decodePayload(bytes: Uint8Array, declaredLength: number, code: typeof RequestCode.RESTORE): Uint8Array;
export function decodePayload(bytes: Uint8Array, declaredLength: number, code: RequestCode): ResponsePayload;
export function decodePayload(bytes: Uint8Array, declaredLength: number, code: RequestCode): ResponsePayload {
  if (bytes.length !== declaredLength) {
    throw new MalformedMessageError(
      `Payload declares ${declaredLength} bytes, got ${bytes.length}`,
    );
  }

  switch (code) {
    case RequestCode.LIST:
      return decodeListing(bytes);
    case RequestCode.RESTORE:
      return bytes;
    case RequestCode.BACKUP:
    case RequestCode.DELETE:
      if (declaredLength !== 0) {
        throw new MalformedMessageError(
          `${requestCodeName(code)} acknowledgement carries no payload, got ${declaredLength} bytes`,
        );
      }
      return null;
    default:
      return assertNever(code);
  }
}

export function decodeListing(bytes: Uint8Array): FileDescriptor[] {
  const buf = toBuffer(bytes);
  const files: FileDescriptor[] = [];
  let offset = 0;

  while (offset < buf.length) {
    if (offset + 2 > buf.length) {
      throw new MalformedMessageError(`Listing entry at offset ${offset} is truncated`);
    }
    const nameLength = buf.readUInt16LE(offset);
    const nameEnd = offset + 2 + nameLength;
    if (nameEnd + SIZE_FIELD_SIZE > buf.length) {
      throw new MalformedMessageError(`Listing entry at offset ${offset} is truncated`);
    }
    files.push({
      name: buf.toString("utf8", offset + 2, nameEnd),
      size: buf.readUInt32LE(nameEnd),
    });
    offset = nameEnd + SIZE_FIELD_SIZE;
  }

  return files;
}

export function encodeListing(files: readonly FileDescriptor[]): Buffer {
  const parts: Buffer[] = [];
  for (const file of files) {
    checkUint(file.size, MAX_FILE_SIZE, "size");
    const name = encodeName(file.name);
    const entry = Buffer.alloc(2 + name.length + SIZE_FIELD_SIZE);
    entry.writeUInt16LE(name.length, 0);
    name.copy(entry, 2);
    entry.writeUInt32LE(file.size, 2 + name.length);
    parts.push(entry);
  }
  return Buffer.concat(parts);
}

/**
 * Encode a complete response frame (the server side of the exchange).
 */
export function encodeResponse(message: ResponseMessage): Buffer {
  checkUint(message.version, MAX_VERSION, "version");

  let payload: Uint8Array | null = null;
  if (message.status === StatusCode.FILE_RESTORED) payload = message.content;
  else if (message.status === StatusCode.FILE_LIST) payload = encodeListing(message.files);

  const name = encodeName(message.name);
  const sizeField = payload ? SIZE_FIELD_SIZE : 0;
  const head = Buffer.alloc(RESPONSE_HEADER_SIZE + name.length + sizeField);

  head.writeUInt8(message.version, 0);
  head.writeUInt16LE(message.status, 1);
  head.writeUInt16LE(name.length, 3);
  name.copy(head, RESPONSE_HEADER_SIZE);

  if (!payload) return head;
  checkUint(payload.length, MAX_FILE_SIZE, "payload size");
  head.writeUInt32LE(payload.length, RESPONSE_HEADER_SIZE + name.length);
  return Buffer.concat([head, payload]);
}

// =============================================================================
// Helpers
// =============================================================================

function encodeName(name: string): Buffer {
  const bytes = Buffer.from(name, "utf8");
  if (bytes.length > MAX_NAME_LENGTH) {
    throw new RangeError(`Filename is ${bytes.length} bytes, limit is ${MAX_NAME_LENGTH}`);
  }
  return bytes;
}

function checkUint(value: number, max: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new RangeError(`${field} out of range: ${value}`);
  }
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function assertNever(value: never): never {
  throw new MalformedMessageError(`Unhandled code ${String(value)}`);
}
