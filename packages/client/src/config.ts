/**
 * Client configuration files.
 *
 *   server.info   one line, `host:port` (IPv6 hosts in brackets)
 *   backup.info   one local path per line
 */

import { randomBytes } from "node:crypto";
import { readFile } from "node:fs/promises";
import type { Endpoint } from "@stowage/protocol";

export const DEFAULT_SERVER_INFO = "server.info";
export const DEFAULT_BACKUP_INFO = "backup.info";

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Parse `host:port`. Throws ConfigError on an empty host or a port outside 1–65535.
 */
export function parseEndpoint(text: string): Endpoint {
  const value = text.trim();

  let host: string;
  let portText: string;
  if (value.startsWith("[")) {
    const close = value.indexOf("]");
    if (close === -1 || value[close + 1] !== ":") {
      throw new ConfigError(`Invalid endpoint "${value}": expected [host]:port`);
    }
    host = value.slice(1, close);
    portText = value.slice(close + 2);
  } else {
    const colon = value.lastIndexOf(":");
    if (colon === -1) {
      throw new ConfigError(`Invalid endpoint "${value}": expected host:port`);
    }
    host = value.slice(0, colon);
    portText = value.slice(colon + 1);
    if (host.includes(":")) {
      throw new ConfigError(`Invalid endpoint "${value}": IPv6 hosts go in brackets`);
    }
  }

  if (host.length === 0) {
    throw new ConfigError(`Invalid endpoint "${value}": empty host`);
  }
  const port = /^\d+$/.test(portText) ? Number(portText) : NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid endpoint "${value}": port must be 1-65535`);
  }

  return { host, port };
}

/** Split backup.info content into paths */
export function parseBackupList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function readServerInfo(path: string = DEFAULT_SERVER_INFO): Promise<Endpoint> {
  const text = await readConfigFile(path);
  const line = text.split(/\r?\n/).find((l) => l.trim().length > 0);
  if (line === undefined) {
    throw new ConfigError(`${path} is empty`);
  }
  try {
    return parseEndpoint(line);
  } catch (err) {
    if (err instanceof ConfigError) throw new ConfigError(`${path}: ${err.message}`, { cause: err });
    throw err;
  }
}

export async function readBackupInfo(path: string = DEFAULT_BACKUP_INFO): Promise<string[]> {
  return parseBackupList(await readConfigFile(path));
}

/** Random per-process identity */
export function generateUserId(): number {
  return randomBytes(4).readUInt32LE(0);
}

/**
 * Parse a `--user-id` value. Throws ConfigError unless it is a uint32.
 */
export function parseUserId(text: string): number {
  const value = /^\d+$/.test(text) ? Number(text) : NaN;
  if (!Number.isInteger(value) || value > 0xffffffff) {
    throw new ConfigError(`Invalid user id "${text}": expected 0-4294967295`);
  }
  return value;
}

async function readConfigFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read ${path}: ${detail}`, { cause: err });
  }
}
