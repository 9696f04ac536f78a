/**
 * @stowage/protocol — Wire protocol for stowage
 *
 * Defines the frames exchanged between a stowage client and a file-storage server over TCP.
 * All packages in the stowage workspace import codes, types and errors from here.
 */

export { PROTOCOL_VERSION } from "./version.js";

export {
  RequestCode,
  StatusCode,
  isRequestCode,
  isStatusCode,
  requestCodeName,
  statusCodeName,
} from "./types.js";

export type {
  // Codes
  RequestCodeName,
  StatusCodeName,

  // Data model
  Endpoint,
  FileDescriptor,

  // Client → Server
  RequestMessage,
  RequestHeader,
  ListRequest,
  BackupRequest,
  RestoreRequest,
  DeleteRequest,

  // Server → Client
  ResponseMessage,
  ResponseHeader,
  ResponsePayload,
  FileRestoredResponse,
  FileListResponse,
  BareResponse,
  BareStatus,
} from "./types.js";

export {
  REQUEST_HEADER_SIZE,
  RESPONSE_HEADER_SIZE,
  SIZE_FIELD_SIZE,
  MAX_NAME_LENGTH,
  MAX_FILE_SIZE,
  encodeRequest,
  encodeRequestHead,
  decodeRequestHeader,
  decodeRequest,
  requestFrameLength,
  decodeResponseHeader,
  decodeSize,
  decodePayload,
  decodeListing,
  encodeListing,
  encodeResponse,
  hasPayload,
  answers,
} from "./codec.js";
export type { DecodeResponseOptions } from "./codec.js";

export {
  ProtocolError,
  ConnectionError,
  IOError,
  MalformedMessageError,
  VersionMismatchError,
  FileAccessError,
  createFileAccessError,
  isProtocolError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";
