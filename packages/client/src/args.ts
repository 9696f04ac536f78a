/**
 * Command-line parsing for the stowage CLI.
 *
 * Global options may appear anywhere. Everything else (the command, its operands and its
 * own options such as `--as`) is kept in order for the command router.
 */

import { ConfigError, DEFAULT_BACKUP_INFO, DEFAULT_SERVER_INFO, parseUserId } from "./config.js";

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface CliOptions {
  serverInfo: string;
  backupInfo: string;
  /** `host:port`, overrides serverInfo */
  server?: string;
  /** Random when omitted */
  userId?: number;
  timeoutMs: number;
  verbose: boolean;
}

export type CliCommand = "help" | "session" | "shell" | "operation";

export interface ParsedArgs {
  command: CliCommand;
  /** Command line for the router (operation commands only) */
  tokens: string[];
  options: CliOptions;
}

/** Bad command-line usage; the CLI exits with status 2 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  const options: CliOptions = {
    serverInfo: DEFAULT_SERVER_INFO,
    backupInfo: DEFAULT_BACKUP_INFO,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    verbose: false,
  };
  const rest: string[] = [];
  let help = false;

  const valueOf = (i: number, flag: string): string => {
    if (i >= args.length) throw new UsageError(`${flag} needs a value`);
    return args[i];
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--help":
      case "-h":
        help = true;
        break;
      case "--verbose":
      case "-v":
        options.verbose = true;
        break;
      case "--server-info":
        options.serverInfo = valueOf(++i, arg);
        break;
      case "--backup-info":
        options.backupInfo = valueOf(++i, arg);
        break;
      case "--server":
        options.server = valueOf(++i, arg);
        break;
      case "--user-id": {
        const value = valueOf(++i, arg);
        try {
          options.userId = parseUserId(value);
        } catch (err) {
          if (err instanceof ConfigError) throw new UsageError(err.message);
          throw err;
        }
        break;
      }
      case "--timeout": {
        const value = valueOf(++i, arg);
        const ms = /^\d+$/.test(value) ? Number(value) : NaN;
        if (!Number.isSafeInteger(ms) || ms <= 0) {
          throw new UsageError(`Invalid --timeout "${value}": expected milliseconds`);
        }
        options.timeoutMs = ms;
        break;
      }
      default:
        rest.push(arg);
    }
  }

  if (help || rest.length === 0) {
    return { command: "help", tokens: [], options };
  }

  const name = rest[0].toLowerCase();
  if (name === "session" || name === "shell") {
    if (rest.length > 1) throw new UsageError(`"${name}" takes no arguments`);
    return { command: name, tokens: [], options };
  }

  return { command: "operation", tokens: rest, options };
}

export function helpText(): string {
  return `stowage — Back up, restore, list and delete files on a stowage server

Usage:
  stowage <command> [args] [options]

Commands:
  list                              List the files stored for this user
  backup [file...]                  Upload files (no args = files from the backup list)
  restore <name...> [--as <path>]   Download stored files
  delete <name...>                  Delete stored files
  session                           Run the reference session against the backup list
  shell                             Interactive terminal UI

Options:
  --server-info <path>   File holding host:port (default: ${DEFAULT_SERVER_INFO})
  --backup-info <path>   File listing files to back up (default: ${DEFAULT_BACKUP_INFO})
  --server <host:port>   Server address, overrides --server-info
  --user-id <n>          User id, 0-4294967295 (default: random)
  --timeout <ms>         Connect/send/receive timeout (default: ${DEFAULT_TIMEOUT_MS})
  --verbose, -v          Print every operation phase to stderr
  --help, -h             Show this help

Examples:
  stowage list --server 127.0.0.1:1234
  stowage backup notes.txt photo.jpg
  stowage restore "my notes.txt" --as restored.txt
  stowage session --user-id 42
`;
}
