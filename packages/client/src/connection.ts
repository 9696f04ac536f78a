/**
 * TCP Transport
 *
 * Owns one byte-stream connection to a stowage server and moves exact byte counts over it:
 * `sendExact` resolves once every byte is handed to the socket, `recvExact` resolves once
 * exactly `count` bytes have arrived, however the peer chunked them.
 *
 * No retries here. Failures surface as ConnectionError (connect) or IOError (send/receive).
 */

import { connect as netConnect, type Socket } from "node:net";
import type { Duplex } from "node:stream";
import { ConnectionError, IOError, type Endpoint } from "@stowage/protocol";

/**
 * Minimal connection interface used by the protocol engine.
 * SocketConnection implements it over a socket. Tests can provide a scripted stand-in.
 */
export interface ByteConnection {
  sendExact(bytes: Uint8Array): Promise<void>;
  recvExact(count: number): Promise<Uint8Array>;
  /** Release the socket. Safe to call more than once. */
  close(): void;
  readonly closed: boolean;
}

export interface ConnectOptions {
  /** Applies to connect, and to each sendExact/recvExact call independently */
  timeoutMs?: number;
}

export type Connector = (endpoint: Endpoint, options?: ConnectOptions) => Promise<ByteConnection>;

/** Stop reading from the socket while this much is buffered and nobody is waiting */
const HIGH_WATER_MARK = 1024 * 1024;

interface PendingReceive {
  count: number;
  resolve: (bytes: Uint8Array) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

export class SocketConnection implements ByteConnection {
  private stream: Duplex;
  private timeoutMs: number | undefined;
  private chunks: Buffer[] = [];
  private buffered = 0;
  private pending: PendingReceive | null = null;
  /** Set once the peer can no longer deliver bytes */
  private failure: IOError | null = null;
  private isClosed = false;

  constructor(stream: Duplex, options: ConnectOptions = {}) {
    this.stream = stream;
    this.timeoutMs = options.timeoutMs;

    stream.on("data", (chunk: Buffer | string) => {
      const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      this.chunks.push(bytes);
      this.buffered += bytes.length;
      this.drain();
      if (!this.pending && this.buffered >= HIGH_WATER_MARK) {
        stream.pause();
      }
    });

    stream.on("end", () => {
      this.fail(new IOError("Peer closed the connection"));
    });

    stream.on("close", () => {
      this.fail(new IOError("Connection closed"));
    });

    stream.on("error", (err: Error) => {
      this.fail(new IOError(`Socket error: ${err.message}`, { cause: err }));
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Write all of `bytes`. Resolves when the socket accepted them.
   */
  sendExact(bytes: Uint8Array): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new IOError("Connection is closed"));
    }
    if (this.failure || !this.stream.writable) {
      return Promise.reject(new IOError(`Cannot send ${bytes.length} bytes: connection lost`));
    }
    if (bytes.length === 0) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const timer = this.startTimer(() => {
        if (settled) return;
        settled = true;
        reject(new IOError(`Timed out sending ${bytes.length} bytes after ${this.timeoutMs}ms`));
        this.stream.destroy();
      });

      this.stream.write(bytes, (err?: Error | null) => {
        if (timer) clearTimeout(timer);
        if (settled) return;
        settled = true;
        if (err) {
          reject(new IOError(`Failed to send ${bytes.length} bytes: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Read exactly `count` bytes. Only one receive may be outstanding.
   */
  recvExact(count: number): Promise<Uint8Array> {
    if (!Number.isInteger(count) || count < 0) {
      return Promise.reject(new RangeError(`Invalid byte count ${count}`));
    }
    if (this.pending) {
      return Promise.reject(new Error("recvExact called while another receive is pending"));
    }
    if (this.isClosed) {
      return Promise.reject(new IOError("Connection is closed"));
    }
    if (this.buffered >= count) {
      return Promise.resolve(this.take(count));
    }
    if (this.failure) {
      return Promise.reject(this.shortRead(count));
    }

    return new Promise<Uint8Array>((resolve, reject) => {
      const pending: PendingReceive = { count, resolve, reject, timer: null };
      pending.timer = this.startTimer(() => {
        if (this.pending !== pending) return;
        this.pending = null;
        reject(new IOError(
          `Timed out after ${this.timeoutMs}ms waiting for ${count} bytes (${this.buffered} received)`,
        ));
        this.stream.destroy();
      });
      this.pending = pending;
      this.stream.resume();
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    const pending = this.pending;
    this.pending = null;
    if (pending) {
      if (pending.timer) clearTimeout(pending.timer);
      pending.reject(new IOError("Connection closed while receiving"));
    }
    this.chunks = [];
    this.buffered = 0;
    this.stream.destroy();
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private drain(): void {
    const pending = this.pending;
    if (!pending || this.buffered < pending.count) return;
    this.pending = null;
    if (pending.timer) clearTimeout(pending.timer);
    pending.resolve(this.take(pending.count));
  }

  private take(count: number): Buffer {
    const out = Buffer.allocUnsafe(count);
    let offset = 0;
    while (offset < count) {
      const head = this.chunks[0];
      const needed = count - offset;
      if (head.length <= needed) {
        head.copy(out, offset);
        offset += head.length;
        this.chunks.shift();
      } else {
        head.copy(out, offset, 0, needed);
        this.chunks[0] = head.subarray(needed);
        offset += needed;
      }
    }
    this.buffered -= count;
    return out;
  }

  private fail(error: IOError): void {
    if (this.failure) return;
    this.failure = error;
    const pending = this.pending;
    if (pending && this.buffered < pending.count) {
      this.pending = null;
      if (pending.timer) clearTimeout(pending.timer);
      pending.reject(this.shortRead(pending.count));
    }
  }

  private shortRead(count: number): IOError {
    const reason = this.failure?.message ?? "Connection lost";
    return new IOError(`${reason} after ${this.buffered} of ${count} bytes`, { cause: this.failure ?? undefined });
  }

  private startTimer(onTimeout: () => void): ReturnType<typeof setTimeout> | null {
    if (this.timeoutMs === undefined || this.timeoutMs <= 0) return null;
    return setTimeout(onTimeout, this.timeoutMs);
  }
}

export type SocketOpener = (endpoint: Endpoint) => Socket;

const openTcp: SocketOpener = (endpoint) => netConnect({ host: endpoint.host, port: endpoint.port });

/**
 * Build a Connector over `open`, which starts connecting a socket to the endpoint.
 */
export function createConnector(open: SocketOpener = openTcp): Connector {
  return (endpoint, options = {}) => new Promise<ByteConnection>((resolve, reject) => {
    const socket = open(endpoint);
    const target = `${endpoint.host}:${endpoint.port}`;

    const timer = options.timeoutMs !== undefined && options.timeoutMs > 0
      ? setTimeout(() => {
          socket.destroy();
          reject(new ConnectionError(`Timed out connecting to ${target} after ${options.timeoutMs}ms`));
        }, options.timeoutMs)
      : null;

    const onError = (err: Error) => {
      if (timer) clearTimeout(timer);
      socket.destroy();
      reject(new ConnectionError(`Cannot connect to ${target}: ${err.message}`, { cause: err }));
    };

    socket.once("error", onError);
    socket.once("connect", () => {
      if (timer) clearTimeout(timer);
      socket.off("error", onError);
      socket.setNoDelay(true);
      resolve(new SocketConnection(socket, options));
    });
  });
}

/** Open a TCP connection to `endpoint` */
export const connect: Connector = createConnector();
