/**
 * Protocol Engine
 *
 * Runs one operation per connection: connect, exchange one request/response pair per file
 * in order, close. Per-file failures (server statuses, unreadable or unwritable local files)
 * are recorded and the loop continues; transport, framing and version errors abort the
 * operation and mark the remaining files skipped.
 *
 * Non-protocol errors (bugs) propagate to the caller after the connection is closed.
 */

import {
  PROTOCOL_VERSION,
  RequestCode,
  StatusCode,
  RESPONSE_HEADER_SIZE,
  SIZE_FIELD_SIZE,
  answers,
  decodePayload,
  decodeResponseHeader,
  decodeSize,
  encodeRequestHead,
  hasPayload,
  requestCodeName,
  statusCodeName,
  FileAccessError,
  MalformedMessageError,
  VersionMismatchError,
  isProtocolError,
  type Endpoint,
  type RequestMessage,
  type ResponseMessage,
} from "@stowage/protocol";
import type { OperationKind, OperationRequest } from "@stowage/commands";
import { connect, type ByteConnection, type Connector } from "./connection.js";
import { LocalFileAdapter, type FileAdapter } from "./files.js";
import {
  createOperationState,
  operationReducer,
  toResult,
  type OperationAction,
  type OperationResult,
  type OperationState,
} from "./operation.js";

/** Backup content goes out in slices of at most this many bytes */
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export interface BackupClientOptions {
  endpoint: Endpoint;
  /** uint32 identity sent with every request */
  userId: number;
  /** Version sent and required back (default: PROTOCOL_VERSION) */
  version?: number;
  /** Local filesystem access (default: LocalFileAdapter over the working directory) */
  files?: FileAdapter;
  /** Opens connections (default: TCP) */
  connector?: Connector;
  /** Connect, send and receive timeout, per call */
  timeoutMs?: number;
  chunkSize?: number;
  /** Called with the initial state and after every transition */
  onUpdate?: (state: OperationState) => void;
}

export interface RestoreOptions {
  /** Local path for the restored bytes; only valid with a single name */
  saveAs?: string;
}

const VERBS: Record<OperationKind, string> = {
  list: "list files",
  backup: "store",
  restore: "restore",
  delete: "delete",
};

// =============================================================================
// Operation tracking
// =============================================================================

class OperationTracker {
  state: OperationState;
  private onUpdate: ((state: OperationState) => void) | undefined;

  constructor(kind: OperationKind, names: readonly string[], onUpdate?: (state: OperationState) => void) {
    this.state = createOperationState(kind, names);
    this.onUpdate = onUpdate;
    onUpdate?.(this.state);
  }

  dispatch(action: OperationAction): void {
    const next = operationReducer(this.state, action);
    if (next === this.state) return;
    this.state = next;
    this.onUpdate?.(next);
  }
}

// =============================================================================
// Client
// =============================================================================

export class BackupClient {
  private endpoint: Endpoint;
  private userId: number;
  private version: number;
  private files: FileAdapter;
  private connector: Connector;
  private timeoutMs: number | undefined;
  private chunkSize: number;
  private onUpdate: ((state: OperationState) => void) | undefined;

  constructor(options: BackupClientOptions) {
    const version = options.version ?? PROTOCOL_VERSION;
    if (!Number.isInteger(options.userId) || options.userId < 0 || options.userId > 0xffffffff) {
      throw new RangeError(`userId must be a uint32, got ${options.userId}`);
    }
    if (!Number.isInteger(version) || version < 0 || version > 0xff) {
      throw new RangeError(`version must be a uint8, got ${version}`);
    }
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }

    this.endpoint = options.endpoint;
    this.userId = options.userId;
    this.version = version;
    this.files = options.files ?? new LocalFileAdapter();
    this.connector = options.connector ?? connect;
    this.timeoutMs = options.timeoutMs;
    this.chunkSize = chunkSize;
    this.onUpdate = options.onUpdate;
  }

  /**
   * Ask the server for this user's stored files. A NO_FILES answer completes with an
   * empty listing.
   */
  list(): Promise<OperationResult> {
    return this.execute("list", [], async (connection, op) => {
      const head = encodeRequestHead({ code: RequestCode.LIST, version: this.version, userId: this.userId });
      const response = await this.exchange(connection, op, head, RequestCode.LIST);

      switch (response.status) {
        case StatusCode.FILE_LIST:
          op.dispatch({ type: "LISTED", files: response.files });
          return;
        case StatusCode.NO_FILES:
          op.dispatch({ type: "LISTED", files: [] });
          return;
        case StatusCode.SERVER_ERROR:
          op.dispatch({ type: "FATAL", reason: "SERVER_ERROR", message: "Server failed to list files" });
          return;
        case StatusCode.FILE_NOT_FOUND:
          op.dispatch({ type: "FATAL", reason: "FILE_NOT_FOUND", message: "Server found no files to list" });
          return;
        default:
          throw unexpected(response, RequestCode.LIST);
      }
    });
  }

  /**
   * Upload each local file under its path as given. Unreadable files are recorded as
   * FILE_ACCESS failures without contacting the server for them.
   */
  backup(paths: readonly string[]): Promise<OperationResult> {
    return this.execute("backup", paths, async (connection, op) => {
      for (const [index, path] of paths.entries()) {
        op.dispatch({ type: "BEGIN_FILE", index });

        let content: Uint8Array;
        try {
          content = await this.files.readAll(path);
        } catch (err) {
          if (!(err instanceof FileAccessError)) throw err;
          op.dispatch({ type: "FILE_FAILED", reason: "FILE_ACCESS", message: err.message });
          continue;
        }

        const head = this.frame(op, {
          code: RequestCode.BACKUP,
          version: this.version,
          userId: this.userId,
          name: path,
          size: content.length,
        });
        if (!head) continue;

        const response = await this.exchange(connection, op, head, RequestCode.BACKUP, content);
        if (response.status === StatusCode.OK) {
          op.dispatch({ type: "FILE_SUCCEEDED", size: content.length });
        } else {
          this.reject(op, response, RequestCode.BACKUP, path);
        }
      }
    });
  }

  /**
   * Download each named file and write it locally under the same name, or under
   * `options.saveAs` when restoring a single file.
   */
  restore(names: readonly string[], options: RestoreOptions = {}): Promise<OperationResult> {
    const { saveAs } = options;
    if (saveAs !== undefined && names.length !== 1) {
      return Promise.reject(new RangeError(`saveAs needs exactly one file name, got ${names.length}`));
    }

    return this.execute("restore", names, async (connection, op) => {
      for (const [index, name] of names.entries()) {
        op.dispatch({ type: "BEGIN_FILE", index });

        const head = this.frame(op, { code: RequestCode.RESTORE, version: this.version, userId: this.userId, name });
        if (!head) continue;

        const response = await this.exchange(connection, op, head, RequestCode.RESTORE);
        if (response.status !== StatusCode.FILE_RESTORED) {
          this.reject(op, response, RequestCode.RESTORE, name);
          continue;
        }
        if (response.name !== "" && response.name !== name) {
          throw new MalformedMessageError(`Server sent "${response.name}" in answer to a restore of "${name}"`);
        }

        const target = saveAs ?? name;
        try {
          await this.files.writeAll(target, response.content);
        } catch (err) {
          if (!(err instanceof FileAccessError)) throw err;
          op.dispatch({ type: "FILE_FAILED", reason: "FILE_ACCESS", message: err.message });
          continue;
        }
        op.dispatch({ type: "FILE_SUCCEEDED", size: response.content.length, savedTo: target });
      }
    });
  }

  delete(names: readonly string[]): Promise<OperationResult> {
    return this.execute("delete", names, async (connection, op) => {
      for (const [index, name] of names.entries()) {
        op.dispatch({ type: "BEGIN_FILE", index });

        const head = this.frame(op, { code: RequestCode.DELETE, version: this.version, userId: this.userId, name });
        if (!head) continue;

        const response = await this.exchange(connection, op, head, RequestCode.DELETE);
        if (response.status === StatusCode.OK) {
          op.dispatch({ type: "FILE_SUCCEEDED" });
        } else {
          this.reject(op, response, RequestCode.DELETE, name);
        }
      }
    });
  }

  /** Dispatch a routed operation request */
  run(request: OperationRequest): Promise<OperationResult> {
    switch (request.op) {
      case "list":
        return this.list();
      case "backup":
        return this.backup(request.files);
      case "restore":
        return this.restore(request.files, request.saveAs === undefined ? {} : { saveAs: request.saveAs });
      case "delete":
        return this.delete(request.files);
    }
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private async execute(
    kind: OperationKind,
    names: readonly string[],
    body: (connection: ByteConnection, op: OperationTracker) => Promise<void>,
  ): Promise<OperationResult> {
    const op = new OperationTracker(kind, names, this.onUpdate);
    let connection: ByteConnection | null = null;

    try {
      connection = await this.connector(this.endpoint, { timeoutMs: this.timeoutMs });
      op.dispatch({ type: "CONNECTED" });
      await body(connection, op);
      op.dispatch({ type: "FINISHED" });
    } catch (err) {
      if (!isProtocolError(err)) throw err;
      op.dispatch({ type: "FATAL", reason: err.code, message: err.message });
    } finally {
      connection?.close();
    }

    return toResult(op.state);
  }

  /**
   * Encode a request head. A name or size the wire cannot carry fails only this file;
   * nothing has been sent for it yet.
   */
  private frame(op: OperationTracker, request: RequestMessage): Buffer | null {
    try {
      return encodeRequestHead(request);
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      op.dispatch({ type: "FILE_FAILED", reason: "MALFORMED_MESSAGE", message: err.message });
      return null;
    }
  }

  private async exchange(
    connection: ByteConnection,
    op: OperationTracker,
    head: Uint8Array,
    code: RequestCode,
    content?: Uint8Array,
  ): Promise<ResponseMessage> {
    await connection.sendExact(head);
    if (content) {
      for (let offset = 0; offset < content.length; offset += this.chunkSize) {
        await connection.sendExact(content.subarray(offset, offset + this.chunkSize));
      }
    }
    op.dispatch({ type: "REQUEST_SENT" });

    const response = await this.receive(connection, code);
    op.dispatch({ type: "RESPONSE_RECEIVED" });
    return response;
  }

  private async receive(connection: ByteConnection, code: RequestCode): Promise<ResponseMessage> {
    const header = decodeResponseHeader(await connection.recvExact(RESPONSE_HEADER_SIZE), {
      expectedVersion: this.version,
    });
    const name = header.nameLength > 0
      ? Buffer.from(await connection.recvExact(header.nameLength)).toString("utf8")
      : "";

    if (header.status === StatusCode.VERSION_MISMATCH) {
      throw new VersionMismatchError(
        this.version,
        header.version,
        `Server rejected protocol v${this.version}`,
      );
    }
    if (!answers(code, header.status)) {
      throw new MalformedMessageError(
        `${statusCodeName(header.status)} does not answer a ${requestCodeName(code)} request`,
      );
    }

    if (hasPayload(header.status)) {
      const size = decodeSize(await connection.recvExact(SIZE_FIELD_SIZE));
      const payload = await connection.recvExact(size);
      if (header.status === StatusCode.FILE_RESTORED) {
        return {
          version: header.version,
          status: StatusCode.FILE_RESTORED,
          name,
          content: decodePayload(payload, size, RequestCode.RESTORE),
        };
      }
      return {
        version: header.version,
        status: StatusCode.FILE_LIST,
        name,
        files: decodePayload(payload, size, RequestCode.LIST),
      };
    }

    return { version: header.version, status: header.status, name };
  }

  /** Record a per-file failure status */
  private reject(op: OperationTracker, response: ResponseMessage, code: RequestCode, name: string): void {
    switch (response.status) {
      case StatusCode.FILE_NOT_FOUND:
        op.dispatch({ type: "FILE_FAILED", reason: "FILE_NOT_FOUND", message: `"${name}" not found on the server` });
        return;
      case StatusCode.SERVER_ERROR:
        op.dispatch({
          type: "FILE_FAILED",
          reason: "SERVER_ERROR",
          message: `Server failed to ${VERBS[kindOf(code)]} "${name}"`,
        });
        return;
      default:
        throw unexpected(response, code);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function kindOf(code: RequestCode): OperationKind {
  switch (code) {
    case RequestCode.LIST:
      return "list";
    case RequestCode.BACKUP:
      return "backup";
    case RequestCode.RESTORE:
      return "restore";
    case RequestCode.DELETE:
      return "delete";
  }
}

function unexpected(response: ResponseMessage, code: RequestCode): MalformedMessageError {
  return new MalformedMessageError(
    `Unexpected ${statusCodeName(response.status)} response to ${requestCodeName(code)}`,
  );
}
